export type * from './types';

export { ParseError, isParseError } from './errors';

export {
  call as callNode,
  childrenOf,
  dottedName,
  firstToken,
  fitsSlot,
  isExpression,
  isNode,
  isNodeOfType,
  isSmallStatement,
  isStatement,
  isToken,
  leadingOf,
  mapChildren,
  name,
  parse,
  parseExpression,
  print,
  spanOf,
  statementWithLeading,
  substitute,
  token,
  tokenize,
  tokensOf,
  walk,
  withLeading
} from './cst';
export type { ChildMapper, WalkVisitor } from './cst';

export {
  allOf,
  any,
  anyOf,
  attribute,
  call,
  findMatches,
  functionDef,
  hasKeyword,
  keywordArg,
  kind,
  literal,
  literalValue,
  matches,
  not,
  oneOfNames,
  positionalArgs,
  qualifiedName,
  qualifiedPath,
  raiseOf,
  unwrapParens,
  yieldOf
} from './matcher';

export {
  awaitSuspendPass,
  buildPasses,
  callRenamePass,
  coroutineMarkerPass,
  definePass,
  defineRule,
  keywordRemovalPass,
  keywordRenamePass,
  noState,
  qualifyNamesPass,
  removedAttributePass,
  returnValuePass,
  startUnwrapPass,
  valueAccessorPass,
  VALUE_PLACEHOLDER
} from './passes';
export type { RuleDefinition } from './passes';

export { DiagnosticCollector, insertAdvisories } from './diagnostics';
export { RUNNER, run } from './runner';
export { createCatalogue, DEFAULT_CATALOGUE, DEFAULT_CONFIG, defaultPasses } from './catalogue';
export type { Catalogue } from './catalogue';
export { migrationConfigSchema } from './config/schema';
export { validatePass, validatePasses } from './pass-validator';
export { validateWithSchema } from './validator';
export { cstMigrate, cstParse, cstStringify, createProcessor, diagnosticsOf, migrate } from './pipeline';
export type { MigrateFileOptions, MigrateOptions } from './pipeline';
export { decide, wouldTouch } from './change-reporter';
export { migrateUnits } from './batch';
export {
  formatBatchSummary,
  formatDiagnostics,
  formatSeverityCounts,
  formatUnitLine
} from './report';
export type { DiagnosticReportOptions } from './report';
