import type {
  Expression,
  NodeOfType,
  NodeType,
  SmallStatement,
  Statement,
  SyntaxChild,
  SyntaxNode,
  Token
} from '../types';

const EXPRESSION_TYPES: Record<Expression['type'], true> = {
  Name: true,
  Number: true,
  String: true,
  Ellipsis: true,
  Attribute: true,
  Call: true,
  Subscript: true,
  UnaryOp: true,
  BinaryOp: true,
  IfExp: true,
  Lambda: true,
  Await: true,
  Yield: true,
  Starred: true,
  NamedExpr: true,
  AsExpr: true,
  Paren: true,
  Tuple: true,
  List: true,
  Set: true,
  Dict: true,
  Comprehension: true
};

const SMALL_STATEMENT_TYPES: Record<SmallStatement['type'], true> = {
  Expr: true,
  Assign: true,
  AugAssign: true,
  AnnAssign: true,
  Return: true,
  Raise: true,
  Keyword: true,
  Del: true,
  Assert: true,
  Declaration: true,
  Import: true,
  TypeAlias: true
};

const STATEMENT_TYPES: Record<Statement['type'], true> = {
  SimpleStatementLine: true,
  FunctionDef: true,
  ClassDef: true,
  Compound: true
};

export function isToken(child: SyntaxChild): child is Token {
  return child.type === 'Token';
}

export function isNode(child: SyntaxChild): child is SyntaxNode {
  return child.type !== 'Token';
}

export function isExpression(child: SyntaxChild): child is Expression {
  return Object.hasOwn(EXPRESSION_TYPES, child.type);
}

export function isSmallStatement(child: SyntaxChild): child is SmallStatement {
  return Object.hasOwn(SMALL_STATEMENT_TYPES, child.type);
}

export function isStatement(child: SyntaxChild): child is Statement {
  return Object.hasOwn(STATEMENT_TYPES, child.type);
}

export function isNodeOfType<K extends NodeType>(
  child: SyntaxChild,
  type: K
): child is NodeOfType<K> {
  return child.type === type;
}
