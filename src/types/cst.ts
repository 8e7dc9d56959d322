import type { Position } from 'unist';

/**
 * Lexical category of a {@link Token}.
 *
 * `indent`, `dedent` and `endmarker` are zero-width structural tokens: their
 * `value` is always empty. `newline` carries the physical line break (`\n`,
 * `\r\n`, `\r`) or the empty string for the implicit NEWLINE emitted at the end
 * of a file that lacks a trailing line break.
 */
export type TokenKind =
  | 'name'
  | 'number'
  | 'string'
  | 'op'
  | 'newline'
  | 'indent'
  | 'dedent'
  | 'endmarker';

/**
 * The only leaf of the syntax tree.
 *
 * Trivia model
 * ------------
 * Every byte of the source belongs to exactly one token, either as its `value`
 * or as part of its `leading` trivia (whitespace, comments, blank lines,
 * backslash continuations preceding it). Zero-width tokens never own trivia;
 * it is attached to the next token with a non-empty value, or to the
 * end-of-file marker.
 *
 * Printing a tree is therefore the concatenation of `leading + value` for every
 * token in document order.
 */
export type Token = {
  type: 'Token';
  kind: TokenKind;
  value: string;
  leading: string;

  /**
   * Source span of `value` (trivia excluded). Present on tokens produced by the
   * tokenizer; synthesised tokens have none.
   */
  position?: Position;
};

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

export type Name = { type: 'Name'; token: Token };

export type NumberLiteral = { type: 'Number'; token: Token };

/** One or more adjacent string tokens (implicit concatenation). */
export type StringLiteral = { type: 'String'; parts: Token[] };

export type EllipsisLiteral = { type: 'Ellipsis'; token: Token };

export type Attribute = {
  type: 'Attribute';
  value: Expression;
  dot: Token;
  attr: Token;
};

export type Call = {
  type: 'Call';
  func: Expression;
  open: Token;
  args: Arg[];
  close: Token;
};

export type Subscript = {
  type: 'Subscript';
  value: Expression;
  open: Token;
  items: SubscriptItem[];
  close: Token;
};

export type UnaryOp = { type: 'UnaryOp'; operator: Token; operand: Expression };

/**
 * Any binary operator, including comparisons and boolean operators.
 * `operator` holds two tokens for `not in` and `is not`.
 */
export type BinaryOp = {
  type: 'BinaryOp';
  left: Expression;
  operator: Token[];
  right: Expression;
};

export type IfExp = {
  type: 'IfExp';
  body: Expression;
  ifKeyword: Token;
  test: Expression;
  elseKeyword: Token;
  orelse: Expression;
};

export type Lambda = {
  type: 'Lambda';
  keyword: Token;
  params: Param[];
  colon: Token;
  body: Expression;
};

export type Await = { type: 'Await'; keyword: Token; value: Expression };

/** `yield`, `yield <value>` or `yield from <value>`. */
export type Yield = {
  type: 'Yield';
  keyword: Token;
  fromKeyword?: Token;
  value?: Expression;
};

/** `*value` or `**value` in calls, displays, targets and patterns. */
export type Starred = { type: 'Starred'; star: Token; value: Expression };

export type NamedExpr = {
  type: 'NamedExpr';
  target: Expression;
  operator: Token;
  value: Expression;
};

/** `value as target` inside `with`/`except` headers and match patterns. */
export type AsExpr = {
  type: 'AsExpr';
  value: Expression;
  keyword: Token;
  target: Expression;
};

export type Paren = {
  type: 'Paren';
  open: Token;
  value?: Expression;
  close: Token;
};

/** A tuple written without its own parentheses. */
export type Tuple = { type: 'Tuple'; elements: Element[] };

export type List = { type: 'List'; open: Token; elements: Element[]; close: Token };

export type SetDisplay = {
  type: 'Set';
  open: Token;
  elements: Element[];
  close: Token;
};

export type Dict = {
  type: 'Dict';
  open: Token;
  elements: Array<DictEntry | Element>;
  close: Token;
};

/**
 * List/set/dict comprehension or generator expression. Bracket tokens are
 * absent for a generator passed as the sole call argument.
 */
export type Comprehension = {
  type: 'Comprehension';
  open?: Token;
  element: Expression | DictEntry;
  clauses: Array<CompFor | CompIf>;
  close?: Token;
};

export type Expression =
  | Name
  | NumberLiteral
  | StringLiteral
  | EllipsisLiteral
  | Attribute
  | Call
  | Subscript
  | UnaryOp
  | BinaryOp
  | IfExp
  | Lambda
  | Await
  | Yield
  | Starred
  | NamedExpr
  | AsExpr
  | Paren
  | Tuple
  | List
  | SetDisplay
  | Dict
  | Comprehension;

// ---------------------------------------------------------------------------
// Auxiliary (structural) nodes
// ---------------------------------------------------------------------------

/** A call argument. Owns its trailing comma. */
export type Arg = {
  type: 'Arg';
  star?: Token;
  keyword?: Token;
  equal?: Token;
  value: Expression;
  comma?: Token;
};

/** A display/tuple element. Owns its trailing comma. */
export type Element = { type: 'Element'; value: Expression; comma?: Token };

export type DictEntry = {
  type: 'DictEntry';
  key: Expression;
  colon: Token;
  value: Expression;
  comma?: Token;
};

export type SubscriptItem = {
  type: 'SubscriptItem';
  value: Expression | Slice;
  comma?: Token;
};

export type Slice = {
  type: 'Slice';
  lower?: Expression;
  firstColon: Token;
  upper?: Expression;
  secondColon?: Token;
  step?: Expression;
};

/**
 * A parameter of a `def`, `lambda` or type-parameter list.
 * The bare `*` and `/` markers are params with only `star` set.
 */
export type Param = {
  type: 'Param';
  star?: Token;
  name?: Token;
  colon?: Token;
  annotation?: Expression;
  equal?: Token;
  defaultValue?: Expression;
  comma?: Token;
};

export type TypeParams = {
  type: 'TypeParams';
  open: Token;
  params: Param[];
  close: Token;
};

export type CompFor = {
  type: 'CompFor';
  asyncKeyword?: Token;
  forKeyword: Token;
  target: Expression;
  inKeyword: Token;
  iter: Expression;
};

export type CompIf = { type: 'CompIf'; ifKeyword: Token; test: Expression };

export type Decorator = {
  type: 'Decorator';
  at: Token;
  expression: Expression;
  newline: Token;
};

export type AssignTarget = { type: 'AssignTarget'; target: Expression; equal: Token };

/** An indented block: NEWLINE INDENT statement+ DEDENT. */
export type Block = {
  type: 'Block';
  newline: Token;
  indent: Token;
  body: Statement[];
  dedent: Token;
};

export type Suite = Block | SimpleStatementLine;

/**
 * One clause of a compound statement (`if`, `elif`, `else`, `for`, `while`,
 * `with`, `try`, `except`, `finally`, `match`, `case`).
 *
 * `keywords` holds the introducing tokens (`async for`, `except *`), `header`
 * the tokens and expressions between them and the colon.
 */
export type Clause = {
  type: 'Clause';
  keywords: Token[];
  header: Array<Token | Expression>;
  colon: Token;
  body: Suite | MatchBody;
};

/** The indented `case` clauses of a `match` statement. */
export type MatchBody = {
  type: 'MatchBody';
  newline: Token;
  indent: Token;
  cases: Clause[];
  dedent: Token;
};

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

export type ExprStatement = { type: 'Expr'; value: Expression };

export type Assign = { type: 'Assign'; targets: AssignTarget[]; value: Expression };

export type AugAssign = {
  type: 'AugAssign';
  target: Expression;
  operator: Token;
  value: Expression;
};

export type AnnAssign = {
  type: 'AnnAssign';
  target: Expression;
  colon: Token;
  annotation: Expression;
  equal?: Token;
  value?: Expression;
};

export type Return = { type: 'Return'; keyword: Token; value?: Expression };

export type Raise = {
  type: 'Raise';
  keyword: Token;
  exc?: Expression;
  fromKeyword?: Token;
  cause?: Expression;
};

/** `pass`, `break`, `continue`. */
export type KeywordStatement = { type: 'Keyword'; token: Token };

export type Del = { type: 'Del'; keyword: Token; target: Expression };

export type Assert = {
  type: 'Assert';
  keyword: Token;
  test: Expression;
  comma?: Token;
  message?: Expression;
};

/** `global a, b` / `nonlocal a, b`; names and commas interleaved. */
export type Declaration = { type: 'Declaration'; keyword: Token; names: Token[] };

/** `import …` / `from … import …`, kept as raw tokens. */
export type Import = { type: 'Import'; tokens: Token[] };

export type TypeAlias = {
  type: 'TypeAlias';
  keyword: Token;
  name: Token;
  typeParams?: TypeParams;
  equal: Token;
  value: Expression;
};

export type SmallStatement =
  | ExprStatement
  | Assign
  | AugAssign
  | AnnAssign
  | Return
  | Raise
  | KeywordStatement
  | Del
  | Assert
  | Declaration
  | Import
  | TypeAlias;

/**
 * `small (; small)* [;] NEWLINE`. `semicolons[i]` follows `body[i]`; a
 * trailing semicolon makes both arrays the same length.
 */
export type SimpleStatementLine = {
  type: 'SimpleStatementLine';
  body: SmallStatement[];
  semicolons: Token[];
  newline: Token;
};

export type FunctionDef = {
  type: 'FunctionDef';
  decorators: Decorator[];
  asyncKeyword?: Token;
  defKeyword: Token;
  name: Token;
  typeParams?: TypeParams;
  open: Token;
  params: Param[];
  close: Token;
  arrow?: Token;
  returns?: Expression;
  colon: Token;
  body: Suite;
};

export type ClassDef = {
  type: 'ClassDef';
  decorators: Decorator[];
  classKeyword: Token;
  name: Token;
  typeParams?: TypeParams;
  open?: Token;
  args: Arg[];
  close?: Token;
  colon: Token;
  body: Suite;
};

export type Compound = { type: 'Compound'; clauses: Clause[] };

export type Statement = SimpleStatementLine | FunctionDef | ClassDef | Compound;

/** Root of every parsed file. `end` is the ENDMARKER and owns trailing trivia. */
export type Module = { type: 'Module'; body: Statement[]; end: Token };

export type AuxiliaryNode =
  | Arg
  | Element
  | DictEntry
  | SubscriptItem
  | Slice
  | Param
  | TypeParams
  | CompFor
  | CompIf
  | Decorator
  | AssignTarget
  | Block
  | Clause
  | MatchBody;

export type SyntaxNode =
  | Module
  | Statement
  | SmallStatement
  | Expression
  | AuxiliaryNode;

export type NodeType = SyntaxNode['type'];

export type NodeOfType<K extends NodeType> = Extract<SyntaxNode, { type: K }>;

/** Anything that can appear as a child: a node or a token. */
export type SyntaxChild = SyntaxNode | Token;
