import type { Arg, Expression, Pattern, SyntaxChild, SyntaxNode } from '../types';
import { walk } from '../cst';
import { literalValue } from './literal-value';

/**
 * Segments of a dotted `Name`/`Attribute` chain, or `undefined` when the
 * expression is anything else (a call, a subscript, …).
 *
 * @example
 * qualifiedPath(parseExpression('cocotb.triggers.Timer'))
 * // ['cocotb', 'triggers', 'Timer']
 */
export function qualifiedPath(node: SyntaxChild | undefined): string[] | undefined {
  if (!node) return undefined;
  if (node.type === 'Name') return [node.token.value];
  if (node.type !== 'Attribute') return undefined;

  const head = qualifiedPath(node.value);
  return head && [...head, node.attr.value];
}

/** Positional arguments of a call: neither keyword nor starred. */
export function positionalArgs(args: readonly Arg[]): Arg[] {
  return args.filter(arg => !arg.keyword && !arg.star);
}

/** The argument passed as `keyword=…`, if any. */
export function keywordArg(args: readonly Arg[], keyword: string): Arg | undefined {
  return args.find(arg => arg.keyword?.value === keyword);
}

function samePath(actual: readonly string[] | undefined, expected: readonly string[]): boolean {
  return (
    actual !== undefined &&
    actual.length === expected.length &&
    actual.every((segment, index) => segment === expected[index])
  );
}

function optional(node: SyntaxChild | undefined, pattern: Pattern | undefined): boolean {
  return pattern === undefined || matches(node, pattern);
}

/**
 * Tests `node` against `pattern`.
 *
 * Absent nodes only match `not(…)` of something they fail; in particular
 * `any()` requires a node to be present.
 */
export function matches(node: SyntaxChild | undefined, pattern: Pattern): boolean {
  switch (pattern.match) {
    case 'any':
      return node !== undefined;

    case 'kind': {
      const type = node?.type;
      return type !== undefined && pattern.types.some(candidate => candidate === type);
    }

    case 'qualifiedName':
      return samePath(qualifiedPath(node), pattern.path);

    case 'attribute':
      return (
        node?.type === 'Attribute' &&
        (pattern.attr === undefined || node.attr.value === pattern.attr) &&
        optional(node.value, pattern.value)
      );

    case 'call': {
      if (node?.type !== 'Call') return false;
      if (!optional(node.func, pattern.func)) return false;

      const { args } = node;
      const expected = pattern.args;
      if (expected) {
        const actual = positionalArgs(args);
        if (actual.length !== expected.length) return false;
        if (!actual.every((arg, index) => optional(arg.value, expected[index]))) {
          return false;
        }
      }

      return Object.entries(pattern.keywords ?? {}).every(([keyword, value]) => {
        const arg = keywordArg(args, keyword);
        return arg !== undefined && matches(arg.value, value);
      });
    }

    case 'yieldOf':
      return (
        node?.type === 'Yield' &&
        (pattern.delegate === undefined || (node.fromKeyword !== undefined) === pattern.delegate) &&
        optional(node.value, pattern.value)
      );

    case 'raiseOf':
      return node?.type === 'Raise' && optional(node.exc, pattern.exc);

    case 'functionDef': {
      if (node?.type !== 'FunctionDef') return false;
      if (pattern.async !== undefined && (node.asyncKeyword !== undefined) !== pattern.async) {
        return false;
      }
      const { decorator } = pattern;
      return (
        decorator === undefined ||
        node.decorators.some(entry => matches(entry.expression, decorator))
      );
    }

    case 'hasKeyword': {
      if (node?.type !== 'Call') return false;
      const arg = keywordArg(node.args, pattern.name);
      return arg !== undefined && optional(arg.value, pattern.value);
    }

    case 'literal':
      return literalValue(node) === pattern.value;

    case 'allOf':
      return pattern.patterns.every(inner => matches(node, inner));

    case 'anyOf':
      return pattern.patterns.some(inner => matches(node, inner));

    case 'not':
      return !matches(node, pattern.pattern);
  }
}

/** Every node under `root` matching `pattern`, children before parents. */
export function findMatches(root: SyntaxNode, pattern: Pattern): SyntaxNode[] {
  const found: SyntaxNode[] = [];
  walk(root, node => {
    if (matches(node, pattern)) found.push(node);
  });
  return found;
}

/** `expression` without any number of wrapping parentheses. */
export function unwrapParens(expression: Expression): Expression {
  let current = expression;
  while (current.type === 'Paren' && current.value) current = current.value;
  return current;
}
