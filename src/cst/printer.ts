import type { Position } from 'unist';

import type { SyntaxChild, SyntaxNode, Token } from '../types';
import { isToken } from './guards';

type Slot = SyntaxChild | SyntaxChild[] | undefined;

function collect(...slots: Slot[]): SyntaxChild[] {
  const children: SyntaxChild[] = [];
  for (const slot of slots) {
    if (slot === undefined) continue;
    if (Array.isArray(slot)) children.push(...slot);
    else children.push(slot);
  }
  return children;
}

/**
 * Ordered children (nodes and tokens) of `node`, in source order.
 *
 * The switch is exhaustive over the closed node union; adding a node type
 * without teaching this function about it is a compile error.
 */
export function childrenOf(node: SyntaxNode): SyntaxChild[] {
  switch (node.type) {
    case 'Module':
      return collect(node.body, node.end);

    case 'SimpleStatementLine':
      return collect(
        node.body.flatMap((statement, index) =>
          collect(statement, node.semicolons[index])
        ),
        node.newline
      );

    case 'FunctionDef':
      return collect(
        node.decorators,
        node.asyncKeyword,
        node.defKeyword,
        node.name,
        node.typeParams,
        node.open,
        node.params,
        node.close,
        node.arrow,
        node.returns,
        node.colon,
        node.body
      );

    case 'ClassDef':
      return collect(
        node.decorators,
        node.classKeyword,
        node.name,
        node.typeParams,
        node.open,
        node.args,
        node.close,
        node.colon,
        node.body
      );

    case 'Compound':
      return collect(node.clauses);
    case 'Clause':
      return collect(node.keywords, node.header, node.colon, node.body);
    case 'MatchBody':
      return collect(node.newline, node.indent, node.cases, node.dedent);
    case 'Block':
      return collect(node.newline, node.indent, node.body, node.dedent);
    case 'Decorator':
      return collect(node.at, node.expression, node.newline);

    case 'Expr':
      return collect(node.value);
    case 'Assign':
      return collect(node.targets, node.value);
    case 'AssignTarget':
      return collect(node.target, node.equal);
    case 'AugAssign':
      return collect(node.target, node.operator, node.value);
    case 'AnnAssign':
      return collect(node.target, node.colon, node.annotation, node.equal, node.value);
    case 'Return':
      return collect(node.keyword, node.value);
    case 'Raise':
      return collect(node.keyword, node.exc, node.fromKeyword, node.cause);
    case 'Keyword':
      return collect(node.token);
    case 'Del':
      return collect(node.keyword, node.target);
    case 'Assert':
      return collect(node.keyword, node.test, node.comma, node.message);
    case 'Declaration':
      return collect(node.keyword, node.names);
    case 'Import':
      return collect(node.tokens);
    case 'TypeAlias':
      return collect(node.keyword, node.name, node.typeParams, node.equal, node.value);

    case 'Name':
    case 'Number':
    case 'Ellipsis':
      return collect(node.token);
    case 'String':
      return collect(node.parts);
    case 'Attribute':
      return collect(node.value, node.dot, node.attr);
    case 'Call':
      return collect(node.func, node.open, node.args, node.close);
    case 'Subscript':
      return collect(node.value, node.open, node.items, node.close);
    case 'UnaryOp':
      return collect(node.operator, node.operand);
    case 'BinaryOp':
      return collect(node.left, node.operator, node.right);
    case 'IfExp':
      return collect(node.body, node.ifKeyword, node.test, node.elseKeyword, node.orelse);
    case 'Lambda':
      return collect(node.keyword, node.params, node.colon, node.body);
    case 'Await':
      return collect(node.keyword, node.value);
    case 'Yield':
      return collect(node.keyword, node.fromKeyword, node.value);
    case 'Starred':
      return collect(node.star, node.value);
    case 'NamedExpr':
      return collect(node.target, node.operator, node.value);
    case 'AsExpr':
      return collect(node.value, node.keyword, node.target);
    case 'Paren':
      return collect(node.open, node.value, node.close);
    case 'Tuple':
      return collect(node.elements);
    case 'List':
    case 'Set':
    case 'Dict':
      return collect(node.open, node.elements, node.close);
    case 'Comprehension':
      return collect(node.open, node.element, node.clauses, node.close);

    case 'Arg':
      return collect(node.star, node.keyword, node.equal, node.value, node.comma);
    case 'Element':
      return collect(node.value, node.comma);
    case 'DictEntry':
      return collect(node.key, node.colon, node.value, node.comma);
    case 'SubscriptItem':
      return collect(node.value, node.comma);
    case 'Slice':
      return collect(node.lower, node.firstColon, node.upper, node.secondColon, node.step);
    case 'Param':
      return collect(
        node.star,
        node.name,
        node.colon,
        node.annotation,
        node.equal,
        node.defaultValue,
        node.comma
      );
    case 'TypeParams':
      return collect(node.open, node.params, node.close);
    case 'CompFor':
      return collect(node.asyncKeyword, node.forKeyword, node.target, node.inKeyword, node.iter);
    case 'CompIf':
      return collect(node.ifKeyword, node.test);
  }
}

/**
 * All tokens under `child`, in document order.
 *
 * Iterates with an explicit stack: left-nested operator chains can be far
 * deeper than the call stack allows.
 */
export function* tokensOf(child: SyntaxChild): Generator<Token> {
  const pending: SyntaxChild[] = [child];

  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    if (isToken(next)) {
      yield next;
      continue;
    }
    const children = childrenOf(next);
    for (let index = children.length - 1; index >= 0; index--) {
      const grandchild = children[index];
      if (grandchild !== undefined) pending.push(grandchild);
    }
  }
}

/**
 * Renders a tree back to source text.
 *
 * For a tree produced by `parse(text)` and left unmodified the result equals
 * `text` byte for byte.
 */
export function print(child: SyntaxChild): string {
  let text = '';
  for (const token of tokensOf(child)) {
    text += token.leading + token.value;
  }
  return text;
}

/**
 * Source span covered by `child`: from the first positioned token's start to
 * the last positioned token's end. Synthesised subtrees have no span.
 */
export function spanOf(child: SyntaxChild): Position | undefined {
  let start: Position['start'] | undefined;
  let end: Position['end'] | undefined;
  for (const token of tokensOf(child)) {
    if (!token.position || token.value === '') continue;
    start ??= token.position.start;
    end = token.position.end;
  }
  return start && end ? { start, end } : undefined;
}
