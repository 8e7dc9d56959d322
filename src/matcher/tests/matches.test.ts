import { describe, expect, it, test } from 'vitest';

import type { Pattern, SyntaxChild } from '../../types';
import { isNodeOfType, parse, parseExpression } from '../../cst';
import {
  allOf,
  any,
  anyOf,
  attribute,
  call,
  findMatches,
  functionDef,
  hasKeyword,
  keywordArg,
  kind,
  literal,
  matches,
  not,
  oneOfNames,
  positionalArgs,
  qualifiedName,
  qualifiedPath,
  raiseOf,
  unwrapParens,
  yieldOf
} from '..';

/**
 * Test suite: pattern matching.
 *
 * Each row pairs a subject with a pattern and the expected verdict. Subjects
 * are parsed once, up front.
 */

type Scenario = {
  id: string;
  subject: SyntaxChild | undefined;
  pattern: Pattern;
  expected: boolean;
};

const firstStatement = (text: string) => {
  const [statement] = parse(text).body;
  if (!statement) throw new Error(`No statement in ${JSON.stringify(text)}`);
  return statement;
};

const firstSmall = (text: string) => {
  const statement = firstStatement(text);
  if (!isNodeOfType(statement, 'SimpleStatementLine')) throw new Error('Not a simple line');
  return statement.body[0];
};

const expression = (text: string) => parseExpression(text);

const RETURN_VALUE = oneOfNames(['ReturnValue', 'cocotb.result.ReturnValue']);

const scenarios: Scenario[] = [
  // any / kind
  { id: 'any-present', subject: expression('x'), pattern: any(), expected: true },
  { id: 'any-absent', subject: undefined, pattern: any(), expected: false },
  { id: 'not-absent', subject: undefined, pattern: not(any()), expected: true },
  { id: 'kind-hit', subject: expression('f()'), pattern: kind('Call', 'Name'), expected: true },
  { id: 'kind-miss', subject: expression('x.y'), pattern: kind('Call'), expected: false },

  // qualifiedName
  {
    id: 'name-split',
    subject: expression('cocotb.triggers.Timer'),
    pattern: qualifiedName('cocotb', 'triggers.Timer'),
    expected: true
  },
  { id: 'name-suffix', subject: expression('cocotb.fork'), pattern: qualifiedName('fork'), expected: false },
  {
    id: 'name-call',
    subject: expression('cocotb.fork()'),
    pattern: qualifiedName('cocotb.fork'),
    expected: false
  },

  // attribute
  { id: 'attr-name', subject: expression('dut.sig.value'), pattern: attribute({ attr: 'value' }), expected: true },
  {
    id: 'attr-receiver',
    subject: expression('dut.sig.value'),
    pattern: attribute({ attr: 'value', value: qualifiedName('dut.sig') }),
    expected: true
  },
  { id: 'attr-miss', subject: expression('dut.sig.value'), pattern: attribute({ attr: 'integer' }), expected: false },

  // call
  {
    id: 'call-positional',
    subject: expression('Timer(10, units="ns")'),
    pattern: call({ func: qualifiedName('Timer'), args: [literal(10)] }),
    expected: true
  },
  { id: 'call-arity', subject: expression('Timer(10, units="ns")'), pattern: call({ args: [] }), expected: false },
  {
    id: 'call-keyword',
    subject: expression('Timer(10, units="ns")'),
    pattern: call({ keywords: { units: literal('ns') } }),
    expected: true
  },
  {
    id: 'call-missing-keyword',
    subject: expression('Timer(10, units="ns")'),
    pattern: call({ keywords: { unit: any() } }),
    expected: false
  },
  { id: 'call-starred', subject: expression('f(*args)'), pattern: call({ args: [] }), expected: true },
  { id: 'call-not-call', subject: expression('f'), pattern: call(), expected: false },

  // yield
  { id: 'yield-call', subject: expression('yield Timer(1)'), pattern: yieldOf(call()), expected: true },
  { id: 'yield-not-delegate', subject: expression('yield Timer(1)'), pattern: yieldOf(call(), true), expected: false },
  { id: 'yield-from', subject: expression('yield from gen()'), pattern: yieldOf(call(), true), expected: true },
  { id: 'yield-bare-value', subject: expression('yield'), pattern: yieldOf(any()), expected: false },
  { id: 'yield-bare', subject: expression('yield'), pattern: yieldOf(), expected: true },

  // raise
  {
    id: 'raise-return-value',
    subject: firstSmall('raise ReturnValue(1)\n'),
    pattern: raiseOf(call({ func: RETURN_VALUE })),
    expected: true
  },
  {
    id: 'raise-qualified',
    subject: firstSmall('raise cocotb.result.ReturnValue(1)\n'),
    pattern: raiseOf(call({ func: RETURN_VALUE })),
    expected: true
  },
  { id: 'raise-bare-any', subject: firstSmall('raise\n'), pattern: raiseOf(any()), expected: false },
  { id: 'raise-bare', subject: firstSmall('raise\n'), pattern: raiseOf(), expected: true },

  // functionDef
  {
    id: 'def-decorator',
    subject: firstStatement('@cocotb.coroutine\ndef f(): pass\n'),
    pattern: functionDef({ decorator: qualifiedName('cocotb.coroutine') }),
    expected: true
  },
  {
    id: 'def-async',
    subject: firstStatement('@cocotb.coroutine\ndef f(): pass\n'),
    pattern: functionDef({ async: true }),
    expected: false
  },
  {
    id: 'def-called-decorator',
    subject: firstStatement('@cocotb.test()\nasync def t(dut): pass\n'),
    pattern: functionDef({ decorator: call({ func: qualifiedName('cocotb.test') }), async: true }),
    expected: true
  },

  // hasKeyword / literal
  {
    id: 'keyword-present',
    subject: expression('Clock(clk, 10, units="ns")'),
    pattern: hasKeyword('units'),
    expected: true
  },
  {
    id: 'keyword-value',
    subject: expression('Clock(clk, 10, units="ns")'),
    pattern: hasKeyword('units', literal('us')),
    expected: false
  },
  { id: 'literal-hex', subject: expression('0x10'), pattern: literal(16), expected: true },
  { id: 'literal-quotes', subject: expression(`'a' "b"`), pattern: literal('ab'), expected: true },

  // combinators
  {
    id: 'all-of',
    subject: expression('fork(x)'),
    pattern: allOf(call(), not(call({ func: qualifiedName('cocotb.fork') }))),
    expected: true
  },
  {
    id: 'any-of',
    subject: expression('f()'),
    pattern: anyOf(kind('Name'), kind('Attribute')),
    expected: false
  }
];

describe('matches', () => {
  test.for(scenarios)('[$id] → $expected', ({ subject, pattern, expected }) => {
    expect(matches(subject, pattern)).toBe(expected);
  });

  it('never modifies the subject', () => {
    const subject = expression('cocotb.fork(clock.start(cycles=3))');
    const before = JSON.stringify(subject);
    matches(subject, call({ func: qualifiedName('cocotb.fork'), args: [call()] }));
    expect(JSON.stringify(subject)).toBe(before);
  });
});

describe('findMatches', () => {
  it('returns matches children first', () => {
    const found = findMatches(parse('f(g(1))\n'), call());
    expect(found.map(node => (isNodeOfType(node, 'Call') ? qualifiedPath(node.func) : []))).toEqual([
      ['g'],
      ['f']
    ]);
  });
});

describe('Helpers', () => {
  test.for([
    { source: 'a.b.c', path: ['a', 'b', 'c'] },
    { source: 'a().b', path: undefined },
    { source: 'a[0]', path: undefined }
  ])('qualifiedPath($source)', ({ source, path }) => {
    expect(qualifiedPath(expression(source))).toEqual(path);
  });

  it('separates positional and keyword arguments', () => {
    const node = expression('f(a, *b, c=1, **d)');
    if (!isNodeOfType(node, 'Call')) throw new Error('Not a call');

    expect(positionalArgs(node.args)).toHaveLength(1);
    expect(keywordArg(node.args, 'c')?.value).toMatchObject({ type: 'Number' });
    expect(keywordArg(node.args, 'd')).toBeUndefined();
  });

  it('unwraps nested parentheses', () => {
    expect(unwrapParens(expression('((x))'))).toMatchObject({ type: 'Name', token: { value: 'x' } });
  });
});
