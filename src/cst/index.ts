export { tokenize } from './tokenizer';
export { parse, parseExpression } from './parser';
export { childrenOf, print, spanOf, tokensOf } from './printer';
export { fitsSlot, mapChildren } from './transform';
export type { ChildMapper } from './transform';
export {
  isExpression,
  isNode,
  isNodeOfType,
  isSmallStatement,
  isStatement,
  isToken
} from './guards';
export {
  call,
  dottedName,
  firstToken,
  leadingOf,
  name,
  statementWithLeading,
  substitute,
  token,
  withLeading
} from './builders';
export { walk } from './walk';
export type { WalkVisitor } from './walk';
