import type {
  Arg,
  AssignTarget,
  Clause,
  CompFor,
  CompIf,
  Comprehension,
  Decorator,
  DictEntry,
  Element,
  Expression,
  FunctionDef,
  ClassDef,
  Module,
  Param,
  SimpleStatementLine,
  SmallStatement,
  Statement,
  SubscriptItem,
  Suite,
  SyntaxNode,
  Token,
  TokenKind,
  TypeParams,
  Yield
} from '../types';
import { ParseError } from '../errors';
import { isToken } from './guards';
import { childrenOf, spanOf } from './printer';
import { tokenize } from './tokenizer';

/** Recursive expression forms (`not`, unary signs, `**`, conditionals, lambdas). */
const MAX_NESTING = 200;

/**
 * Deepest tree the traversals accept. Operator, attribute and call chains are
 * parsed in loops, so their depth is only bounded here.
 */
const MAX_TREE_DEPTH = 1000;

const HARD_KEYWORDS = new Set([
  'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break',
  'class', 'continue', 'def', 'del', 'elif', 'else', 'except', 'finally',
  'for', 'from', 'global', 'if', 'import', 'in', 'is', 'lambda', 'nonlocal',
  'not', 'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield'
]);

/** Keywords that may start an expression. */
const EXPRESSION_KEYWORDS = new Set([
  'False', 'None', 'True', 'not', 'lambda', 'await', 'yield'
]);

const EXPRESSION_START_OPERATORS = new Set([
  '(', '[', '{', '-', '+', '~', '*', '**', '...'
]);

const AUGMENTED_ASSIGNMENT = new Set([
  '+=', '-=', '*=', '/=', '//=', '%=', '@=', '&=', '|=', '^=', '>>=', '<<=',
  '**='
]);

const COMPARISON_OPERATORS = new Set(['<', '>', '==', '>=', '<=', '!=']);

/**
 * Binary operator ladder below the comparisons, loosest first. Each level
 * parses the next one as its operands.
 */
const BINARY_LEVELS: ReadonlyArray<ReadonlySet<string>> = [
  new Set(['|']),
  new Set(['^']),
  new Set(['&']),
  new Set(['<<', '>>']),
  new Set(['+', '-']),
  new Set(['*', '/', '//', '%', '@'])
];

/**
 * Precedence level an element list is parsed at.
 * - `test`: full expressions including lambda, conditional and walrus.
 * - `or`: stops before a conditional `if` (comprehension iterables, case patterns).
 * - `bitor`: stops before comparisons, so `in` stays available (for targets).
 */
type Level = 'test' | 'or' | 'bitor';

type ListOptions = {
  star?: boolean;
  allowAs?: boolean;
  level?: Level;
};

/**
 * Recursive-descent parser over the lossless token stream.
 *
 * Every token produced by the tokenizer ends up in exactly one slot of the
 * resulting tree, which is what makes `print(parse(text)) === text` hold.
 */
class Parser {
  private index = 0;
  private depth = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  // -- token cursor --------------------------------------------------------

  private peek(offset = 0): Token {
    const token =
      this.tokens[this.index + offset] ?? this.tokens[this.tokens.length - 1];
    if (!token) throw new ParseError('empty token stream', { line: 1, column: 1, offset: 0 });
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'endmarker') this.index++;
    return token;
  }

  private isOp(value: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === 'op' && token.value === value;
  }

  private isName(value: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === 'name' && token.value === value;
  }

  private isKind(kind: TokenKind, offset = 0): boolean {
    return this.peek(offset).kind === kind;
  }

  private fail(message: string, token: Token = this.peek()): never {
    const start = token.position?.start;
    throw new ParseError(message, {
      line: start?.line ?? 1,
      column: start?.column ?? 1,
      offset: start?.offset ?? 0
    });
  }

  private nested<T>(parse: () => T): T {
    if (this.depth >= MAX_NESTING) this.fail('too deeply nested');
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  private describe(token: Token): string {
    switch (token.kind) {
      case 'newline':
        return 'end of line';
      case 'indent':
        return 'indent';
      case 'dedent':
        return 'dedent';
      case 'endmarker':
        return 'end of file';
      default:
        return `'${token.value}'`;
    }
  }

  private expectOp(value: string): Token {
    if (!this.isOp(value)) {
      this.fail(`expected '${value}', found ${this.describe(this.peek())}`);
    }
    return this.next();
  }

  private expectName(value?: string): Token {
    const token = this.peek();
    if (token.kind !== 'name' || (value !== undefined && token.value !== value)) {
      this.fail(`expected ${value ? `'${value}'` : 'a name'}, found ${this.describe(token)}`);
    }
    if (value === undefined && HARD_KEYWORDS.has(token.value)) {
      this.fail(`'${token.value}' is a reserved keyword`);
    }
    return this.next();
  }

  private expectKind(kind: TokenKind): Token {
    if (!this.isKind(kind)) {
      this.fail(`expected ${kind}, found ${this.describe(this.peek())}`);
    }
    return this.next();
  }

  private startsExpression(offset = 0): boolean {
    const token = this.peek(offset);
    switch (token.kind) {
      case 'number':
      case 'string':
        return true;
      case 'name':
        return !HARD_KEYWORDS.has(token.value) || EXPRESSION_KEYWORDS.has(token.value);
      case 'op':
        return EXPRESSION_START_OPERATORS.has(token.value);
      default:
        return false;
    }
  }

  private atCompFor(): boolean {
    return this.isName('for') || (this.isName('async') && this.isName('for', 1));
  }

  // -- module & statements -------------------------------------------------

  parseModule(): Module {
    const body: Statement[] = [];
    while (!this.isKind('endmarker')) {
      body.push(this.parseStatement());
    }
    return { type: 'Module', body, end: this.next() };
  }

  parseStandaloneExpression(): Expression {
    if (this.isKind('indent')) this.fail('unexpected indent');
    const expression = this.isName('yield')
      ? this.parseYield()
      : this.parseExpressionList({ star: true });
    this.expectKind('newline');
    if (!this.isKind('endmarker')) {
      this.fail(`unexpected ${this.describe(this.peek())} after expression`);
    }
    return expression;
  }

  private parseStatement(): Statement {
    const token = this.peek();

    if (token.kind === 'indent') this.fail('unexpected indent');
    if (token.kind === 'dedent' || token.kind === 'newline') {
      this.fail(`unexpected ${this.describe(token)}`);
    }

    if (token.kind === 'op' && token.value === '@') {
      return this.parseDecorated();
    }

    if (token.kind === 'name') {
      switch (token.value) {
        case 'def':
          return this.parseFunctionDef([]);
        case 'class':
          return this.parseClassDef([]);
        case 'if':
        case 'while':
        case 'for':
        case 'try':
        case 'with':
          return this.parseCompound();
        case 'async':
          if (this.isName('def', 1)) return this.parseFunctionDef([]);
          if (this.isName('for', 1) || this.isName('with', 1)) {
            return this.parseCompound();
          }
          break;
        case 'match': {
          const match = this.tryParseMatch();
          if (match) return match;
          break;
        }
      }
    }

    return this.parseSimpleStatementLine();
  }

  private parseDecorated(): Statement {
    const decorators: Decorator[] = [];
    while (this.isOp('@')) {
      const at = this.next();
      const expression = this.parseNamedExpr();
      decorators.push({
        type: 'Decorator',
        at,
        expression,
        newline: this.expectKind('newline')
      });
    }
    if (this.isName('class')) return this.parseClassDef(decorators);
    if (this.isName('def') || (this.isName('async') && this.isName('def', 1))) {
      return this.parseFunctionDef(decorators);
    }
    return this.fail('expected a function or class definition after decorator');
  }

  private parseFunctionDef(decorators: Decorator[]): FunctionDef {
    const asyncKeyword = this.isName('async') ? this.next() : undefined;
    const defKeyword = this.expectName('def');
    const name = this.expectName();
    const typeParams = this.isOp('[') ? this.parseTypeParams() : undefined;
    const open = this.expectOp('(');
    const params = this.parseParams(')', true);
    const close = this.expectOp(')');

    let arrow: Token | undefined;
    let returns: Expression | undefined;
    if (this.isOp('->')) {
      arrow = this.next();
      returns = this.parseTest();
    }

    const colon = this.expectOp(':');
    const body = this.parseSuite();

    return {
      type: 'FunctionDef',
      decorators,
      asyncKeyword,
      defKeyword,
      name,
      typeParams,
      open,
      params,
      close,
      arrow,
      returns,
      colon,
      body
    };
  }

  private parseClassDef(decorators: Decorator[]): ClassDef {
    const classKeyword = this.expectName('class');
    const name = this.expectName();
    const typeParams = this.isOp('[') ? this.parseTypeParams() : undefined;

    let open: Token | undefined;
    let args: Arg[] = [];
    let close: Token | undefined;
    if (this.isOp('(')) {
      open = this.next();
      args = this.parseCallArgs();
      close = this.expectOp(')');
    }

    const colon = this.expectOp(':');
    return {
      type: 'ClassDef',
      decorators,
      classKeyword,
      name,
      typeParams,
      open,
      args,
      close,
      colon,
      body: this.parseSuite()
    };
  }

  private parseTypeParams(): TypeParams {
    const open = this.expectOp('[');
    const params = this.parseParams(']', true);
    return { type: 'TypeParams', open, params, close: this.expectOp(']') };
  }

  /**
   * Parameters up to (not including) `closer`. Annotations are only accepted
   * for `def` and type-parameter lists; a lambda's colon ends its parameters.
   */
  private parseParams(closer: string, annotations: boolean): Param[] {
    const params: Param[] = [];

    while (!this.isOp(closer)) {
      const param: Param = { type: 'Param' };

      if (this.isOp('*') || this.isOp('**') || this.isOp('/')) {
        const star = this.next();
        param.star = star;
        const bare = star.value === '/' || this.isOp(',') || this.isOp(closer);
        if (!bare) param.name = this.expectName();
      } else {
        param.name = this.expectName();
      }

      if (param.name && annotations && this.isOp(':')) {
        param.colon = this.next();
        param.annotation = this.isOp('*')
          ? this.parseStarred('bitor')
          : this.parseTest();
      }

      if (param.name && this.isOp('=')) {
        param.equal = this.next();
        param.defaultValue = this.parseTest();
      }

      params.push(param);
      if (!this.isOp(',')) break;
      param.comma = this.next();
    }

    return params;
  }

  private parseSuite(): Suite {
    if (!this.isKind('newline')) {
      return this.parseSimpleStatementLine();
    }

    const newline = this.next();
    const indent = this.isKind('indent')
      ? this.next()
      : this.fail('expected an indented block');
    const body: Statement[] = [];
    while (!this.isKind('dedent')) {
      body.push(this.parseStatement());
    }
    return { type: 'Block', newline, indent, body, dedent: this.next() };
  }

  private clause(keywords: Token[], header: Array<Token | Expression>): Clause {
    const colon = this.expectOp(':');
    return { type: 'Clause', keywords, header, colon, body: this.parseSuite() };
  }

  private parseCompound(): Statement {
    const clauses: Clause[] = [];
    const asyncKeyword = this.isName('async') ? this.next() : undefined;
    const leading = asyncKeyword ? [asyncKeyword] : [];
    const keyword = this.next();

    switch (keyword.value) {
      case 'if':
      case 'while': {
        clauses.push(this.clause([keyword], [this.parseNamedExpr()]));
        while (keyword.value === 'if' && this.isName('elif')) {
          const elif = this.next();
          clauses.push(this.clause([elif], [this.parseNamedExpr()]));
        }
        break;
      }

      case 'for': {
        const target = this.parseExpressionList({ star: true, level: 'bitor' });
        const inKeyword = this.expectName('in');
        const iter = this.parseExpressionList({ star: true });
        clauses.push(this.clause([...leading, keyword], [target, inKeyword, iter]));
        break;
      }

      case 'with': {
        const items = this.parseExpressionList({ allowAs: true });
        clauses.push(this.clause([...leading, keyword], [items]));
        break;
      }

      case 'try': {
        clauses.push(this.clause([keyword], []));
        while (this.isName('except')) {
          const keywords = [this.next()];
          if (this.isOp('*')) keywords.push(this.next());
          const header = this.isOp(':')
            ? []
            : [this.parseExpressionList({ allowAs: true })];
          clauses.push(this.clause(keywords, header));
        }
        break;
      }

      default:
        return this.fail(`unexpected '${keyword.value}'`, keyword);
    }

    if (keyword.value !== 'try' && this.isName('else')) {
      clauses.push(this.clause([this.next()], []));
    }

    if (keyword.value === 'try') {
      if (this.isName('else')) clauses.push(this.clause([this.next()], []));
      if (this.isName('finally')) clauses.push(this.clause([this.next()], []));
      if (clauses.length === 1) {
        this.fail("expected 'except' or 'finally' block");
      }
    }

    return { type: 'Compound', clauses };
  }

  /**
   * `match` is a soft keyword. The statement is only committed to once the
   * `match <subject>: NEWLINE INDENT` prefix parses; otherwise the line is an
   * ordinary statement that happens to use `match` as a name.
   */
  private tryParseMatch(): Statement | undefined {
    const start = this.index;
    let keyword: Token;
    let subject: Expression;
    let colon: Token;
    let newline: Token;
    let indent: Token;

    try {
      keyword = this.next();
      subject = this.parseExpressionList({ star: true });
      colon = this.expectOp(':');
      newline = this.expectKind('newline');
      indent = this.expectKind('indent');
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      this.index = start;
      return undefined;
    }

    const cases: Clause[] = [];
    while (!this.isKind('dedent')) {
      const caseKeyword = this.expectName('case');
      const header: Array<Token | Expression> = [
        this.parseExpressionList({ star: true, allowAs: true, level: 'or' })
      ];
      if (this.isName('if')) {
        header.push(this.next(), this.parseNamedExpr());
      }
      cases.push(this.clause([caseKeyword], header));
    }

    return {
      type: 'Compound',
      clauses: [
        {
          type: 'Clause',
          keywords: [keyword],
          header: [subject],
          colon,
          body: { type: 'MatchBody', newline, indent, cases, dedent: this.next() }
        }
      ]
    };
  }

  private parseSimpleStatementLine(): SimpleStatementLine {
    const body = [this.parseSmallStatement()];
    const semicolons: Token[] = [];

    while (this.isOp(';')) {
      semicolons.push(this.next());
      if (this.isKind('newline')) break;
      body.push(this.parseSmallStatement());
    }

    return {
      type: 'SimpleStatementLine',
      body,
      semicolons,
      newline: this.expectKind('newline')
    };
  }

  private atStatementEnd(): boolean {
    return this.isKind('newline') || this.isOp(';');
  }

  private parseSmallStatement(): SmallStatement {
    const token = this.peek();

    if (token.kind === 'name') {
      switch (token.value) {
        case 'pass':
        case 'break':
        case 'continue':
          return { type: 'Keyword', token: this.next() };

        case 'return': {
          const keyword = this.next();
          const value = this.atStatementEnd()
            ? undefined
            : this.parseExpressionList({ star: true });
          return { type: 'Return', keyword, value };
        }

        case 'raise': {
          const keyword = this.next();
          if (this.atStatementEnd()) return { type: 'Raise', keyword };
          const exc = this.parseTest();
          if (!this.isName('from')) return { type: 'Raise', keyword, exc };
          const fromKeyword = this.next();
          return { type: 'Raise', keyword, exc, fromKeyword, cause: this.parseTest() };
        }

        case 'del':
          return {
            type: 'Del',
            keyword: this.next(),
            target: this.parseExpressionList({ star: true, level: 'bitor' })
          };

        case 'assert': {
          const keyword = this.next();
          const test = this.parseTest();
          if (!this.isOp(',')) return { type: 'Assert', keyword, test };
          const comma = this.next();
          return { type: 'Assert', keyword, test, comma, message: this.parseTest() };
        }

        case 'global':
        case 'nonlocal': {
          const keyword = this.next();
          const names = [this.expectName()];
          while (this.isOp(',')) {
            names.push(this.next(), this.expectName());
          }
          return { type: 'Declaration', keyword, names };
        }

        case 'import':
        case 'from': {
          const tokens = [this.next()];
          while (!this.atStatementEnd() && !this.isKind('endmarker')) {
            tokens.push(this.next());
          }
          return { type: 'Import', tokens };
        }

        case 'type':
          if (
            this.peek(1).kind === 'name' &&
            !HARD_KEYWORDS.has(this.peek(1).value) &&
            (this.isOp('=', 2) || this.isOp('[', 2))
          ) {
            const keyword = this.next();
            const name = this.next();
            const typeParams = this.isOp('[') ? this.parseTypeParams() : undefined;
            const equal = this.expectOp('=');
            return {
              type: 'TypeAlias',
              keyword,
              name,
              typeParams,
              equal,
              value: this.parseTest()
            };
          }
          break;
      }
    }

    return this.parseExpressionStatement();
  }

  private parseAssignedValue(): Expression {
    return this.isName('yield')
      ? this.parseYield()
      : this.parseExpressionList({ star: true });
  }

  private parseExpressionStatement(): SmallStatement {
    const first = this.parseAssignedValue();

    if (this.isOp('=')) {
      const targets: AssignTarget[] = [];
      let value = first;
      while (this.isOp('=')) {
        targets.push({ type: 'AssignTarget', target: value, equal: this.next() });
        value = this.parseAssignedValue();
      }
      return { type: 'Assign', targets, value };
    }

    const operator = this.peek();
    if (operator.kind === 'op' && AUGMENTED_ASSIGNMENT.has(operator.value)) {
      this.next();
      return { type: 'AugAssign', target: first, operator, value: this.parseAssignedValue() };
    }

    if (this.isOp(':')) {
      const colon = this.next();
      const annotation = this.parseTest();
      if (!this.isOp('=')) return { type: 'AnnAssign', target: first, colon, annotation };
      const equal = this.next();
      return {
        type: 'AnnAssign',
        target: first,
        colon,
        annotation,
        equal,
        value: this.parseAssignedValue()
      };
    }

    return { type: 'Expr', value: first };
  }

  // -- expressions ---------------------------------------------------------

  private parseAt(level: Level): Expression {
    switch (level) {
      case 'test':
        return this.parseNamedExpr();
      case 'or':
        return this.parseOrTest();
      case 'bitor':
        return this.parseBinary(0);
    }
  }

  private parseStarred(level: Level): Expression {
    const star = this.next();
    return { type: 'Starred', star, value: this.parseAt(level) };
  }

  private parseListElement(options: ListOptions): Expression {
    const level = options.level ?? 'test';
    const value =
      options.star && (this.isOp('*') || this.isOp('**'))
        ? this.parseStarred(level === 'test' ? 'bitor' : level)
        : this.parseAt(level);

    if (options.allowAs && this.isName('as')) {
      const keyword = this.next();
      return { type: 'AsExpr', value, keyword, target: this.parseAt('bitor') };
    }
    return value;
  }

  /**
   * `a`, or `a, b, …` as an unparenthesised {@link Tuple}. A trailing comma
   * yields a one-element tuple.
   */
  private parseExpressionList(options: ListOptions): Expression {
    const first = this.parseListElement(options);
    if (!this.isOp(',')) return first;

    const elements: Element[] = [{ type: 'Element', value: first, comma: this.next() }];
    while (this.startsExpression()) {
      const element: Element = { type: 'Element', value: this.parseListElement(options) };
      elements.push(element);
      if (!this.isOp(',')) break;
      element.comma = this.next();
    }
    return { type: 'Tuple', elements };
  }

  private parseNamedExpr(): Expression {
    const target = this.parseTest();
    if (!this.isOp(':=')) return target;
    const operator = this.next();
    return { type: 'NamedExpr', target, operator, value: this.parseTest() };
  }

  private parseTest(): Expression {
    if (this.isName('lambda')) return this.parseLambda();

    const body = this.parseOrTest();
    if (!this.isName('if')) return body;

    const ifKeyword = this.next();
    const test = this.parseOrTest();
    const elseKeyword = this.expectName('else');
    return {
      type: 'IfExp',
      body,
      ifKeyword,
      test,
      elseKeyword,
      orelse: this.nested(() => this.parseTest())
    };
  }

  private parseLambda(): Expression {
    const keyword = this.next();
    const params = this.parseParams(':', false);
    const colon = this.expectOp(':');
    return { type: 'Lambda', keyword, params, colon, body: this.nested(() => this.parseTest()) };
  }

  private parseOrTest(): Expression {
    let left = this.parseAndTest();
    while (this.isName('or')) {
      const operator = [this.next()];
      left = { type: 'BinaryOp', left, operator, right: this.parseAndTest() };
    }
    return left;
  }

  private parseAndTest(): Expression {
    let left = this.parseNotTest();
    while (this.isName('and')) {
      const operator = [this.next()];
      left = { type: 'BinaryOp', left, operator, right: this.parseNotTest() };
    }
    return left;
  }

  private parseNotTest(): Expression {
    if (!this.isName('not')) return this.parseComparison();
    const operator = this.next();
    return { type: 'UnaryOp', operator, operand: this.nested(() => this.parseNotTest()) };
  }

  private comparisonOperator(): Token[] | undefined {
    const token = this.peek();
    if (token.kind === 'op' && COMPARISON_OPERATORS.has(token.value)) {
      return [this.next()];
    }
    if (this.isName('in')) return [this.next()];
    if (this.isName('not') && this.isName('in', 1)) return [this.next(), this.next()];
    if (this.isName('is')) {
      const is = this.next();
      return this.isName('not') ? [is, this.next()] : [is];
    }
    return undefined;
  }

  private parseComparison(): Expression {
    let left = this.parseBinary(0);
    for (let operator = this.comparisonOperator(); operator; operator = this.comparisonOperator()) {
      left = { type: 'BinaryOp', left, operator, right: this.parseBinary(0) };
    }
    return left;
  }

  private parseBinary(level: number): Expression {
    const operators = BINARY_LEVELS[level];
    if (!operators) return this.parseFactor();

    let left = this.parseBinary(level + 1);
    for (
      let token = this.peek();
      token.kind === 'op' && operators.has(token.value);
      token = this.peek()
    ) {
      const operator = [this.next()];
      left = { type: 'BinaryOp', left, operator, right: this.parseBinary(level + 1) };
    }
    return left;
  }

  private parseFactor(): Expression {
    if (this.isOp('+') || this.isOp('-') || this.isOp('~')) {
      const operator = this.next();
      return { type: 'UnaryOp', operator, operand: this.nested(() => this.parseFactor()) };
    }

    const base = this.isName('await') ? this.parseAwait() : this.parsePrimary();
    if (!this.isOp('**')) return base;

    const operator = [this.next()];
    return { type: 'BinaryOp', left: base, operator, right: this.nested(() => this.parseFactor()) };
  }

  private parseAwait(): Expression {
    const keyword = this.next();
    return { type: 'Await', keyword, value: this.parsePrimary() };
  }

  private parsePrimary(): Expression {
    let value = this.parseAtom();

    for (;;) {
      if (this.isOp('.')) {
        const dot = this.next();
        value = { type: 'Attribute', value, dot, attr: this.expectName() };
      } else if (this.isOp('(')) {
        const open = this.next();
        const args = this.parseCallArgs();
        value = { type: 'Call', func: value, open, args, close: this.expectOp(')') };
      } else if (this.isOp('[')) {
        const open = this.next();
        const items = this.parseSubscriptItems();
        value = { type: 'Subscript', value, open, items, close: this.expectOp(']') };
      } else {
        return value;
      }
    }
  }

  private parseAtom(): Expression {
    const token = this.peek();

    switch (token.kind) {
      case 'name':
        if (HARD_KEYWORDS.has(token.value) && !EXPRESSION_KEYWORDS.has(token.value)) {
          return this.fail(`invalid syntax at '${token.value}'`);
        }
        if (token.value === 'not' || token.value === 'lambda' || token.value === 'await' || token.value === 'yield') {
          return this.fail(`'${token.value}' is not allowed here`);
        }
        return { type: 'Name', token: this.next() };

      case 'number':
        return { type: 'Number', token: this.next() };

      case 'string': {
        const parts = [this.next()];
        while (this.isKind('string')) parts.push(this.next());
        return { type: 'String', parts };
      }

      case 'op':
        switch (token.value) {
          case '...':
            return { type: 'Ellipsis', token: this.next() };
          case '(':
            return this.parseParenthesized();
          case '[':
            return this.parseList();
          case '{':
            return this.parseBrace();
        }
        break;
    }

    return this.fail(`unexpected ${this.describe(token)}`);
  }

  private parseElements(closer: string): Element[] {
    const elements: Element[] = [];
    while (!this.isOp(closer)) {
      const element: Element = {
        type: 'Element',
        value: this.parseListElement({ star: true, allowAs: true })
      };
      elements.push(element);
      if (!this.isOp(',')) break;
      element.comma = this.next();
    }
    return elements;
  }

  private parseCompClauses(): Array<CompFor | CompIf> {
    const clauses: Array<CompFor | CompIf> = [];
    for (;;) {
      if (this.atCompFor()) {
        const asyncKeyword = this.isName('async') ? this.next() : undefined;
        const forKeyword = this.next();
        const target = this.parseExpressionList({ star: true, level: 'bitor' });
        const inKeyword = this.expectName('in');
        clauses.push({
          type: 'CompFor',
          asyncKeyword,
          forKeyword,
          target,
          inKeyword,
          iter: this.parseOrTest()
        });
      } else if (this.isName('if')) {
        const ifKeyword = this.next();
        clauses.push({ type: 'CompIf', ifKeyword, test: this.parseOrTest() });
      } else {
        return clauses;
      }
    }
  }

  private parseComprehension(
    open: Token,
    element: Expression | DictEntry,
    closer: string
  ): Comprehension {
    const clauses = this.parseCompClauses();
    return { type: 'Comprehension', open, element, clauses, close: this.expectOp(closer) };
  }

  private parseParenthesized(): Expression {
    const open = this.next();
    if (this.isOp(')')) return { type: 'Paren', open, close: this.next() };

    if (this.isName('yield')) {
      const value = this.parseYield();
      return { type: 'Paren', open, value, close: this.expectOp(')') };
    }

    const first = this.parseListElement({ star: true, allowAs: true });
    if (this.atCompFor()) return this.parseComprehension(open, first, ')');

    if (!this.isOp(',')) {
      return { type: 'Paren', open, value: first, close: this.expectOp(')') };
    }

    const elements: Element[] = [{ type: 'Element', value: first, comma: this.next() }];
    elements.push(...this.parseElements(')'));
    return {
      type: 'Paren',
      open,
      value: { type: 'Tuple', elements },
      close: this.expectOp(')')
    };
  }

  private parseList(): Expression {
    const open = this.next();
    if (!this.isOp(']')) {
      const first = this.parseListElement({ star: true, allowAs: true });
      if (this.atCompFor()) return this.parseComprehension(open, first, ']');

      const head: Element = { type: 'Element', value: first };
      const elements = [head];
      if (this.isOp(',')) {
        head.comma = this.next();
        elements.push(...this.parseElements(']'));
      }
      return { type: 'List', open, elements, close: this.expectOp(']') };
    }
    return { type: 'List', open, elements: [], close: this.next() };
  }

  private parseDictEntry(key: Expression): DictEntry {
    const colon = this.expectOp(':');
    return { type: 'DictEntry', key, colon, value: this.parseTest() };
  }

  private parseBrace(): Expression {
    const open = this.next();
    if (this.isOp('}')) return { type: 'Dict', open, elements: [], close: this.next() };

    const startsWithStar = this.isOp('**');
    const first = startsWithStar
      ? this.parseStarred('bitor')
      : this.parseListElement({ star: true, allowAs: true });

    if (!startsWithStar && !this.isOp(':')) {
      // Set display or set comprehension.
      if (this.atCompFor()) return this.parseComprehension(open, first, '}');
      const head: Element = { type: 'Element', value: first };
      const elements = [head];
      if (this.isOp(',')) {
        head.comma = this.next();
        elements.push(...this.parseElements('}'));
      }
      return { type: 'Set', open, elements, close: this.expectOp('}') };
    }

    const head: DictEntry | Element = startsWithStar
      ? { type: 'Element', value: first }
      : this.parseDictEntry(first);
    if (head.type === 'DictEntry' && this.atCompFor()) {
      return this.parseComprehension(open, head, '}');
    }

    const elements: Array<DictEntry | Element> = [head];
    let last = head;
    while (this.isOp(',')) {
      last.comma = this.next();
      if (this.isOp('}')) break;
      last = this.isOp('**')
        ? { type: 'Element', value: this.parseStarred('bitor') }
        : this.parseDictEntry(this.parseTest());
      elements.push(last);
    }
    return { type: 'Dict', open, elements, close: this.expectOp('}') };
  }

  private parseCallArgs(): Arg[] {
    const args: Arg[] = [];

    while (!this.isOp(')')) {
      let arg: Arg;
      if (this.isOp('*') || this.isOp('**')) {
        const star = this.next();
        arg = { type: 'Arg', star, value: this.parseTest() };
      } else if (this.peek().kind === 'name' && this.isOp('=', 1)) {
        const keyword = this.expectName();
        const equal = this.next();
        arg = { type: 'Arg', keyword, equal, value: this.parseTest() };
      } else {
        const value = this.parseNamedExpr();
        arg = {
          type: 'Arg',
          value: this.atCompFor()
            ? { type: 'Comprehension', element: value, clauses: this.parseCompClauses() }
            : value
        };
      }

      args.push(arg);
      if (!this.isOp(',')) break;
      arg.comma = this.next();
    }

    return args;
  }

  private parseSubscriptItems(): SubscriptItem[] {
    const items: SubscriptItem[] = [];

    const atSliceEnd = () => this.isOp(',') || this.isOp(']');

    while (!this.isOp(']')) {
      let item: SubscriptItem;
      const lower = this.isOp(':') ? undefined : this.parseListElement({ star: true });

      if (lower && !this.isOp(':')) {
        item = { type: 'SubscriptItem', value: lower };
      } else {
        const firstColon = this.expectOp(':');
        const upper = atSliceEnd() || this.isOp(':') ? undefined : this.parseTest();
        let secondColon: Token | undefined;
        let step: Expression | undefined;
        if (this.isOp(':')) {
          secondColon = this.next();
          step = atSliceEnd() ? undefined : this.parseTest();
        }
        item = {
          type: 'SubscriptItem',
          value: { type: 'Slice', lower, firstColon, upper, secondColon, step }
        };
      }

      items.push(item);
      if (!this.isOp(',')) break;
      item.comma = this.next();
    }

    if (items.length === 0) this.fail('expected a subscript');
    return items;
  }

  private parseYield(): Yield {
    const keyword = this.next();
    if (this.isName('from')) {
      const fromKeyword = this.next();
      return { type: 'Yield', keyword, fromKeyword, value: this.parseTest() };
    }
    if (!this.startsExpression()) return { type: 'Yield', keyword };
    return { type: 'Yield', keyword, value: this.parseExpressionList({ star: true }) };
  }
}

function checkDepth<N extends SyntaxNode>(tree: N): N {
  const pending: Array<{ node: SyntaxNode; depth: number }> = [{ node: tree, depth: 1 }];

  for (let entry = pending.pop(); entry !== undefined; entry = pending.pop()) {
    const { node, depth } = entry;
    if (depth > MAX_TREE_DEPTH) {
      const start = spanOf(node)?.start;
      throw new ParseError('too deeply nested', {
        line: start?.line ?? 1,
        column: start?.column ?? 1,
        offset: start?.offset ?? 0
      });
    }
    for (const child of childrenOf(node)) {
      if (!isToken(child)) pending.push({ node: child, depth: depth + 1 });
    }
  }

  return tree;
}

/**
 * Parses a complete Python source file into a lossless {@link Module}.
 *
 * @throws {ParseError} when `text` is not syntactically valid.
 */
export function parse(text: string): Module {
  return checkDepth(new Parser(tokenize(text)).parseModule());
}

/**
 * Parses a single expression, e.g. a replacement template such as
 * `format(__value__, 'b')`.
 *
 * @throws {ParseError} when `text` is not exactly one expression.
 */
export function parseExpression(text: string): Expression {
  return checkDepth(new Parser(tokenize(text)).parseStandaloneExpression());
}
