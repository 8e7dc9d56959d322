import { describe, expect, it, test } from 'vitest';

import type { Arg, SimpleStatementLine, SyntaxNode } from '../../types';
import {
  call,
  childrenOf,
  dottedName,
  fitsSlot,
  isNodeOfType,
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
  tokensOf,
  walk,
  withLeading
} from '..';

/**
 * Test suite: tree access, copy-on-write rebuilding and node builders.
 */

const passLine: SimpleStatementLine = {
  type: 'SimpleStatementLine',
  body: [{ type: 'Keyword', token: token('name', 'pass') }],
  semicolons: [],
  newline: token('newline', '\n')
};

const argument: Arg = { type: 'Arg', value: name('x') };

const firstStatement = (text: string) => {
  const [statement] = parse(text).body;
  if (!statement) throw new Error(`No statement in ${JSON.stringify(text)}`);
  return statement;
};

const parseCall = (text: string) => {
  const expression = parseExpression(text);
  if (!isNodeOfType(expression, 'Call')) throw new Error(`Not a call: ${text}`);
  return expression;
};

describe('Tree access', () => {
  it('lists node and token children in source order', () => {
    expect(childrenOf(parseCall('f(a, b)')).map(child => child.type)).toEqual([
      'Name',
      'Token',
      'Arg',
      'Arg',
      'Token'
    ]);
  });

  it('yields every token in document order', () => {
    expect([...tokensOf(parseExpression('a.b'))].map(t => t.value)).toEqual(['a', '.', 'b']);
  });

  it('computes the span of a parsed node', () => {
    const statement = firstStatement('x = foo(1)\n');
    if (!isNodeOfType(statement, 'SimpleStatementLine')) throw new Error('unexpected shape');
    const [assign] = statement.body;
    if (!assign || !isNodeOfType(assign, 'Assign')) throw new Error('unexpected shape');

    expect(spanOf(assign.value)).toEqual({
      start: { line: 1, column: 5, offset: 4 },
      end: { line: 1, column: 11, offset: 10 }
    });
  });

  it('has no span for synthesised nodes', () => {
    expect(spanOf(name('x'))).toBeUndefined();
  });

  it('walks children before their parent', () => {
    const visited: string[] = [];
    const ancestry: string[][] = [];

    walk(parseCall('f(a)'), (node, ancestors) => {
      visited.push(node.type);
      if (isNodeOfType(node, 'Name') && node.token.value === 'a') {
        ancestry.push(ancestors.map(ancestor => ancestor.type));
      }
    });

    expect(visited).toEqual(['Name', 'Name', 'Arg', 'Call']);
    expect(ancestry).toEqual([['Call', 'Arg']]);
  });

  it('reads the leading trivia of a statement', () => {
    expect(leadingOf(firstStatement('# c\nx = 1\n'))).toBe('# c\n');
  });
});

describe('mapChildren', () => {
  it('returns the node itself when no child changes', () => {
    const node = parseCall('f(a, b)');
    expect(mapChildren(node, child => child)).toBe(node);
  });

  it('copies only the changed path', () => {
    const node = parseCall('f(a, b)');
    const next = mapChildren(node, child =>
      isNodeOfType(child, 'Name') ? name('g', child.token.leading) : child
    );

    expect(print(next)).toBe('g(a, b)');
    expect(print(node)).toBe('f(a, b)');
    if (!isNodeOfType(next, 'Call')) throw new Error('unexpected shape');
    expect(next.args).toBe(node.args);
  });

  it('rejects a replacement that does not fit the slot', () => {
    const node = parseCall('f(a)');
    expect(() =>
      mapChildren(node, child => (isNodeOfType(child, 'Name') ? passLine : child))
    ).toThrow(
      new TypeError('[cocotb-migrate] A SimpleStatementLine node cannot replace a Name node.')
    );
  });
});

describe('fitsSlot', () => {
  const rows: Array<{ id: string; original: SyntaxNode; replacement: SyntaxNode; fits: boolean }> = [
    { id: 'expression → expression', original: name('x'), replacement: call(name('f'), []), fits: true },
    {
      id: 'small statement → small statement',
      original: { type: 'Raise', keyword: token('name', 'raise') },
      replacement: { type: 'Return', keyword: token('name', 'return') },
      fits: true
    },
    { id: 'statement → statement', original: firstStatement('def f(): pass\n'), replacement: passLine, fits: true },
    { id: 'expression → statement', original: name('x'), replacement: passLine, fits: false },
    { id: 'argument → expression', original: argument, replacement: name('x'), fits: false },
    { id: 'expression → argument', original: name('x'), replacement: argument, fits: false }
  ];

  test.for(rows)('[$id] $fits', ({ original, replacement, fits }) => {
    expect(fitsSlot(original, replacement)).toBe(fits);
  });
});

describe('Builders', () => {
  it('builds a dotted name', () => {
    expect(print(dottedName('cocotb.triggers.RisingEdge', ' '))).toBe(
      ' cocotb.triggers.RisingEdge'
    );
  });

  test.for([
    { id: 'call chain', source: 'a.b(c)', expected: '  a.b(c)' },
    { id: 'unary', source: '-x', expected: '  -x' },
    { id: 'tuple', source: 'a, b', expected: '  a, b' },
    { id: 'string concatenation', source: '"a" "b"', expected: '  "a" "b"' },
    { id: 'conditional', source: 'a if b else c', expected: '  a if b else c' }
  ])('[$id] withLeading replaces the first trivia', ({ source, expected }) => {
    const original = parseExpression(source);
    expect(print(withLeading(original, '  '))).toBe(expected);
    expect(print(original)).toBe(source);
  });

  it('spaces call arguments that carry no trivia', () => {
    const x = parseExpression('x');
    expect(print(call(name('int'), [x, parseExpression('y')]))).toBe('int(x, y)');
    expect(print(call(name('int'), [x, withLeading(parseExpression('y'), '\n    ')]))).toBe(
      'int(x,\n    y)'
    );
  });

  test.for([
    { template: "format(__value__, 'b')", expected: "format(sig.value, 'b')" },
    { template: 'int( __value__ )', expected: 'int( sig.value )' },
    { template: '__value__.to_signed()', expected: 'sig.value.to_signed()' }
  ])('substitutes into $template', ({ template, expected }) => {
    const result = substitute(parseExpression(template), '__value__', parseExpression('sig.value'));
    expect(print(result)).toBe(expected);
  });

  it('moves statement trivia in front of the first decorator', () => {
    const definition = firstStatement('@d\ndef f(): pass\n');
    expect(print(statementWithLeading(definition, '# note\n'))).toBe('# note\n@d\ndef f(): pass\n');
  });
});
