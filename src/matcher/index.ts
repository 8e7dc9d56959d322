export {
  allOf,
  any,
  anyOf,
  attribute,
  call,
  functionDef,
  hasKeyword,
  kind,
  literal,
  not,
  oneOfNames,
  qualifiedName,
  raiseOf,
  yieldOf
} from './patterns';
export {
  findMatches,
  keywordArg,
  matches,
  positionalArgs,
  qualifiedPath,
  unwrapParens
} from './matches';
export { literalValue } from './literal-value';
