import type {
  AuxiliaryNode,
  Block,
  Expression,
  MatchBody,
  NodeOfType,
  SimpleStatementLine,
  SmallStatement,
  Statement,
  SyntaxNode,
  Token
} from '../types';
import {
  isExpression,
  isNodeOfType,
  isSmallStatement,
  isStatement,
  isToken
} from './guards';

/** Maps a child node to its replacement (or to itself). */
export type ChildMapper = (child: SyntaxNode) => SyntaxNode;

/**
 * Whether `replacement` may stand where `original` stood: expressions are
 * interchangeable, as are small statements and statements. Every other node
 * must be replaced by a node of the same type.
 */
export function fitsSlot(original: SyntaxNode, replacement: SyntaxNode): boolean {
  if (isExpression(original)) return isExpression(replacement);
  if (isSmallStatement(original)) return isSmallStatement(replacement);
  if (isStatement(original)) return isStatement(replacement);
  return original.type === replacement.type;
}

function misplaced(original: SyntaxNode, replacement: SyntaxNode): TypeError {
  return new TypeError(
    `[cocotb-migrate] A ${replacement.type} node cannot replace a ${original.type} node.`
  );
}

/**
 * Tracks whether any slot received a new value while a node is rebuilt.
 * Every accessor returns the original value when the mapper returned it
 * unchanged.
 */
class Rebuild {
  changed = false;

  constructor(private readonly map: ChildMapper) {}

  expression(node: Expression): Expression {
    const next = this.map(node);
    if (next === node) return node;
    if (!isExpression(next)) throw misplaced(node, next);
    this.changed = true;
    return next;
  }

  optional(node: Expression | undefined): Expression | undefined {
    return node === undefined ? undefined : this.expression(node);
  }

  small(node: SmallStatement): SmallStatement {
    const next = this.map(node);
    if (next === node) return node;
    if (!isSmallStatement(next)) throw misplaced(node, next);
    this.changed = true;
    return next;
  }

  statement(node: Statement): Statement {
    const next = this.map(node);
    if (next === node) return node;
    if (!isStatement(next)) throw misplaced(node, next);
    this.changed = true;
    return next;
  }

  auxiliary<K extends AuxiliaryNode['type']>(node: NodeOfType<K>, type: K): NodeOfType<K> {
    const next = this.map(node);
    if (next === node) return node;
    if (!isNodeOfType(next, type)) throw misplaced(node, next);
    this.changed = true;
    return next;
  }

  suite(node: Block | SimpleStatementLine): Block | SimpleStatementLine {
    const next = this.map(node);
    if (next === node) return node;
    if (!isNodeOfType(next, 'Block') && !isNodeOfType(next, 'SimpleStatementLine')) {
      throw misplaced(node, next);
    }
    this.changed = true;
    return next;
  }

  clauseBody(node: Block | SimpleStatementLine | MatchBody) {
    return isNodeOfType(node, 'MatchBody')
      ? this.auxiliary(node, 'MatchBody')
      : this.suite(node);
  }

  header(parts: Array<Token | Expression>): Array<Token | Expression> {
    return this.list(parts, part => (isToken(part) ? part : this.expression(part)));
  }

  /** Maps every item; returns `items` itself when nothing changed. */
  list<T>(items: T[], mapItem: (item: T) => T): T[] {
    let result: T[] | undefined;
    items.forEach((item, index) => {
      const next = mapItem(item);
      if (next === item) return;
      result ??= items.slice();
      result[index] = next;
    });
    return result ?? items;
  }
}

function rebuild(node: SyntaxNode, r: Rebuild): SyntaxNode {
  switch (node.type) {
    case 'Module':
      return { ...node, body: r.list(node.body, s => r.statement(s)) };
    case 'SimpleStatementLine':
      return { ...node, body: r.list(node.body, s => r.small(s)) };
    case 'FunctionDef':
      return {
        ...node,
        decorators: r.list(node.decorators, d => r.auxiliary(d, 'Decorator')),
        typeParams: node.typeParams && r.auxiliary(node.typeParams, 'TypeParams'),
        params: r.list(node.params, p => r.auxiliary(p, 'Param')),
        returns: r.optional(node.returns),
        body: r.suite(node.body)
      };
    case 'ClassDef':
      return {
        ...node,
        decorators: r.list(node.decorators, d => r.auxiliary(d, 'Decorator')),
        typeParams: node.typeParams && r.auxiliary(node.typeParams, 'TypeParams'),
        args: r.list(node.args, a => r.auxiliary(a, 'Arg')),
        body: r.suite(node.body)
      };
    case 'Compound':
      return { ...node, clauses: r.list(node.clauses, c => r.auxiliary(c, 'Clause')) };
    case 'Clause':
      return { ...node, header: r.header(node.header), body: r.clauseBody(node.body) };
    case 'MatchBody':
      return { ...node, cases: r.list(node.cases, c => r.auxiliary(c, 'Clause')) };
    case 'Block':
      return { ...node, body: r.list(node.body, s => r.statement(s)) };
    case 'Decorator':
      return { ...node, expression: r.expression(node.expression) };

    case 'Expr':
      return { ...node, value: r.expression(node.value) };
    case 'Assign':
      return {
        ...node,
        targets: r.list(node.targets, t => r.auxiliary(t, 'AssignTarget')),
        value: r.expression(node.value)
      };
    case 'AssignTarget':
      return { ...node, target: r.expression(node.target) };
    case 'AugAssign':
      return { ...node, target: r.expression(node.target), value: r.expression(node.value) };
    case 'AnnAssign':
      return {
        ...node,
        target: r.expression(node.target),
        annotation: r.expression(node.annotation),
        value: r.optional(node.value)
      };
    case 'Return':
      return { ...node, value: r.optional(node.value) };
    case 'Raise':
      return { ...node, exc: r.optional(node.exc), cause: r.optional(node.cause) };
    case 'Del':
      return { ...node, target: r.expression(node.target) };
    case 'Assert':
      return { ...node, test: r.expression(node.test), message: r.optional(node.message) };
    case 'TypeAlias':
      return {
        ...node,
        typeParams: node.typeParams && r.auxiliary(node.typeParams, 'TypeParams'),
        value: r.expression(node.value)
      };
    case 'Keyword':
    case 'Declaration':
    case 'Import':
    case 'Name':
    case 'Number':
    case 'String':
    case 'Ellipsis':
      return node;

    case 'Attribute':
      return { ...node, value: r.expression(node.value) };
    case 'Call':
      return {
        ...node,
        func: r.expression(node.func),
        args: r.list(node.args, a => r.auxiliary(a, 'Arg'))
      };
    case 'Subscript':
      return {
        ...node,
        value: r.expression(node.value),
        items: r.list(node.items, i => r.auxiliary(i, 'SubscriptItem'))
      };
    case 'UnaryOp':
      return { ...node, operand: r.expression(node.operand) };
    case 'BinaryOp':
      return { ...node, left: r.expression(node.left), right: r.expression(node.right) };
    case 'IfExp':
      return {
        ...node,
        body: r.expression(node.body),
        test: r.expression(node.test),
        orelse: r.expression(node.orelse)
      };
    case 'Lambda':
      return {
        ...node,
        params: r.list(node.params, p => r.auxiliary(p, 'Param')),
        body: r.expression(node.body)
      };
    case 'Await':
    case 'Starred':
      return { ...node, value: r.expression(node.value) };
    case 'Yield':
    case 'Paren':
      return { ...node, value: r.optional(node.value) };
    case 'NamedExpr':
      return { ...node, target: r.expression(node.target), value: r.expression(node.value) };
    case 'AsExpr':
      return { ...node, value: r.expression(node.value), target: r.expression(node.target) };
    case 'Tuple':
    case 'List':
    case 'Set':
      return { ...node, elements: r.list(node.elements, e => r.auxiliary(e, 'Element')) };
    case 'Dict':
      return {
        ...node,
        elements: r.list(node.elements, e =>
          isNodeOfType(e, 'DictEntry')
            ? r.auxiliary(e, 'DictEntry')
            : r.auxiliary(e, 'Element')
        )
      };
    case 'Comprehension':
      return {
        ...node,
        element: isNodeOfType(node.element, 'DictEntry')
          ? r.auxiliary(node.element, 'DictEntry')
          : r.expression(node.element),
        clauses: r.list(node.clauses, c =>
          isNodeOfType(c, 'CompFor') ? r.auxiliary(c, 'CompFor') : r.auxiliary(c, 'CompIf')
        )
      };

    case 'Arg':
    case 'Element':
      return { ...node, value: r.expression(node.value) };
    case 'DictEntry':
      return { ...node, key: r.expression(node.key), value: r.expression(node.value) };
    case 'SubscriptItem':
      return {
        ...node,
        value: isNodeOfType(node.value, 'Slice')
          ? r.auxiliary(node.value, 'Slice')
          : r.expression(node.value)
      };
    case 'Slice':
      return {
        ...node,
        lower: r.optional(node.lower),
        upper: r.optional(node.upper),
        step: r.optional(node.step)
      };
    case 'Param':
      return {
        ...node,
        annotation: r.optional(node.annotation),
        defaultValue: r.optional(node.defaultValue)
      };
    case 'TypeParams':
      return { ...node, params: r.list(node.params, p => r.auxiliary(p, 'Param')) };
    case 'CompFor':
      return { ...node, target: r.expression(node.target), iter: r.expression(node.iter) };
    case 'CompIf':
      return { ...node, test: r.expression(node.test) };
  }
}

/**
 * Copy-on-write rebuild of `node` with every child node passed through `map`.
 *
 * Returns `node` itself when `map` returned every child unchanged, so callers
 * can detect modification with `===`. Tokens are never passed to `map`.
 *
 * @throws {TypeError} when `map` returns a node that cannot occupy the
 *   child's slot (see {@link fitsSlot}).
 */
export function mapChildren(node: SyntaxNode, map: ChildMapper): SyntaxNode {
  const r = new Rebuild(map);
  const next = rebuild(node, r);
  return r.changed ? next : node;
}
