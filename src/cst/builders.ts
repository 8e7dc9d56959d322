import type {
  Arg,
  Call,
  Expression,
  Name,
  SmallStatement,
  Statement,
  SyntaxChild,
  SyntaxNode,
  Token,
  TokenKind
} from '../types';
import { isExpression, isNodeOfType } from './guards';
import { tokensOf } from './printer';
import { mapChildren } from './transform';

// Synthesised nodes carry no `position`: they never came from the source.

export function token(kind: TokenKind, value: string, leading = ''): Token {
  return { type: 'Token', kind, value, leading };
}

export function name(value: string, leading = ''): Name {
  return { type: 'Name', token: token('name', value, leading) };
}

/**
 * Builds the `Name`/`Attribute` chain for a dotted path.
 *
 * @example
 * dottedName('cocotb.triggers.RisingEdge', ' ')
 * // prints as " cocotb.triggers.RisingEdge"
 */
export function dottedName(path: string, leading = ''): Expression {
  const [head = '', ...rest] = path.split('.');
  return rest.reduce<Expression>(
    (value, segment) => ({
      type: 'Attribute',
      value,
      dot: token('op', '.'),
      attr: token('name', segment)
    }),
    name(head, leading)
  );
}

/** First token of `child` in document order. */
export function firstToken(child: SyntaxChild): Token | undefined {
  for (const first of tokensOf(child)) return first;
  return undefined;
}

/** Trivia in front of `child`, or `''` when it has no tokens. */
export function leadingOf(child: SyntaxChild): string {
  return firstToken(child)?.leading ?? '';
}

function relead(token: Token, leading: string): Token {
  return token.leading === leading ? token : { ...token, leading };
}

/**
 * Copy of `node` whose first token carries `leading` as its trivia. Only the
 * path down to that token is copied; the rest of the tree is shared.
 */
export function withLeading(node: Expression, leading: string): Expression {
  switch (node.type) {
    case 'Name':
    case 'Number':
    case 'Ellipsis':
      return { ...node, token: relead(node.token, leading) };
    case 'String': {
      const [first, ...rest] = node.parts;
      return first ? { ...node, parts: [relead(first, leading), ...rest] } : node;
    }
    case 'Attribute':
    case 'Subscript':
      return { ...node, value: withLeading(node.value, leading) };
    case 'Call':
      return { ...node, func: withLeading(node.func, leading) };
    case 'BinaryOp':
      return { ...node, left: withLeading(node.left, leading) };
    case 'IfExp':
      return { ...node, body: withLeading(node.body, leading) };
    case 'NamedExpr':
      return { ...node, target: withLeading(node.target, leading) };
    case 'AsExpr':
      return { ...node, value: withLeading(node.value, leading) };
    case 'UnaryOp':
      return { ...node, operator: relead(node.operator, leading) };
    case 'Lambda':
    case 'Await':
    case 'Yield':
      return { ...node, keyword: relead(node.keyword, leading) };
    case 'Starred':
      return { ...node, star: relead(node.star, leading) };
    case 'Paren':
    case 'List':
    case 'Set':
    case 'Dict':
      return { ...node, open: relead(node.open, leading) };
    case 'Comprehension': {
      if (node.open) return { ...node, open: relead(node.open, leading) };
      const { element } = node;
      return isNodeOfType(element, 'DictEntry')
        ? { ...node, element: { ...element, key: withLeading(element.key, leading) } }
        : { ...node, element: withLeading(element, leading) };
    }
    case 'Tuple': {
      const [first, ...rest] = node.elements;
      if (!first) return node;
      return {
        ...node,
        elements: [{ ...first, value: withLeading(first.value, leading) }, ...rest]
      };
    }
  }
}

function smallWithLeading(node: SmallStatement, leading: string): SmallStatement {
  switch (node.type) {
    case 'Expr':
      return { ...node, value: withLeading(node.value, leading) };
    case 'Assign': {
      const [first, ...rest] = node.targets;
      if (!first) return node;
      return {
        ...node,
        targets: [{ ...first, target: withLeading(first.target, leading) }, ...rest]
      };
    }
    case 'AugAssign':
    case 'AnnAssign':
      return { ...node, target: withLeading(node.target, leading) };
    case 'Keyword':
      return { ...node, token: relead(node.token, leading) };
    case 'Import': {
      const [first, ...rest] = node.tokens;
      return first ? { ...node, tokens: [relead(first, leading), ...rest] } : node;
    }
    case 'Return':
    case 'Raise':
    case 'Del':
    case 'Assert':
    case 'Declaration':
    case 'TypeAlias':
      return { ...node, keyword: relead(node.keyword, leading) };
  }
}

/** {@link withLeading} for statements. */
export function statementWithLeading(node: Statement, leading: string): Statement {
  switch (node.type) {
    case 'SimpleStatementLine': {
      const [first, ...rest] = node.body;
      return first ? { ...node, body: [smallWithLeading(first, leading), ...rest] } : node;
    }
    case 'FunctionDef':
    case 'ClassDef': {
      const [first, ...rest] = node.decorators;
      if (first) {
        return { ...node, decorators: [{ ...first, at: relead(first.at, leading) }, ...rest] };
      }
      if (node.type === 'ClassDef') {
        return { ...node, classKeyword: relead(node.classKeyword, leading) };
      }
      return node.asyncKeyword
        ? { ...node, asyncKeyword: relead(node.asyncKeyword, leading) }
        : { ...node, defKeyword: relead(node.defKeyword, leading) };
    }
    case 'Compound': {
      const [clause, ...clauses] = node.clauses;
      const [keyword, ...keywords] = clause?.keywords ?? [];
      if (!clause || !keyword) return node;
      return {
        ...node,
        clauses: [{ ...clause, keywords: [relead(keyword, leading), ...keywords] }, ...clauses]
      };
    }
  }
}

/**
 * `func(a, b, …)`. Arguments after the first get a single space of leading
 * trivia unless they already carry some.
 */
export function call(func: Expression, args: readonly Expression[]): Call {
  return {
    type: 'Call',
    func,
    open: token('op', '('),
    args: args.map(
      (value, index): Arg => ({
        type: 'Arg',
        value: index > 0 && leadingOf(value) === '' ? withLeading(value, ' ') : value,
        comma: index < args.length - 1 ? token('op', ',') : undefined
      })
    ),
    close: token('op', ')')
  };
}

/**
 * Replaces every `Name` spelled `placeholder` in `template` by `value`. The
 * substituted value takes over the placeholder's leading trivia.
 *
 * @example
 * substitute(parseExpression("format(__value__, 'b')"), '__value__', receiver)
 */
export function substitute(
  template: Expression,
  placeholder: string,
  value: Expression
): Expression {
  const visit = (node: SyntaxNode): SyntaxNode =>
    isNodeOfType(node, 'Name') && node.token.value === placeholder
      ? withLeading(value, node.token.leading)
      : mapChildren(node, visit);

  const result = visit(template);
  if (!isExpression(result)) {
    throw new TypeError('[cocotb-migrate] Template substitution produced a non-expression.');
  }
  return result;
}
