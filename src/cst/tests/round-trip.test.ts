import fc from 'fast-check';
import { describe, expect, it, test } from 'vitest';

import { migrate } from '../../pipeline';
import { parse, print, tokenize } from '..';
import { readFixture } from './helpers';

/**
 * Test suite: lossless round trip.
 *
 * `print(parse(text)) === text` for every valid input, whatever its trivia,
 * line-break style or final line break.
 */

const corpus = readFixture('syntax_corpus.py');

describe('print(parse(text))', () => {
  it('reproduces the syntax corpus byte for byte', () => {
    expect(print(parse(corpus))).toBe(corpus);
  });

  it('reproduces the corpus with CRLF line breaks', () => {
    const crlf = corpus.replace(/\n/g, '\r\n');
    expect(print(parse(crlf))).toBe(crlf);
  });

  it('reproduces the corpus without its final line break', () => {
    const unterminated = corpus.trimEnd();
    expect(print(parse(unterminated))).toBe(unterminated);
  });

  test.for([
    { id: 'empty', text: '' },
    { id: 'only whitespace', text: '  \n\t\n' },
    { id: 'only comments', text: '# a\n# b' },
    { id: 'byte order mark', text: '\uFEFFx = 1\n' },
    { id: 'form feed', text: '\fx = 1\n' },
    { id: 'trailing spaces', text: 'x = 1   \n' },
    { id: 'semicolon', text: 'x = 1;\n' }
  ])('[$id] survives the round trip', ({ text }) => {
    expect(print(parse(text))).toBe(text);
  });

  it('keeps the token stream lossless as well', () => {
    const text = tokenize(corpus)
      .map(token => token.leading + token.value)
      .join('');
    expect(text).toBe(corpus);
  });
});

// -- generated sources ------------------------------------------------------

/** Top-level snippets, written with `\n`; the arbitrary swaps line breaks. */
const SNIPPETS = [
  'x = 1',
  'f(a, b=2)',
  'dut.sig.value.integer',
  'clock = Clock(dut.clk, 10, units="ns")',
  'cocotb.fork(clock.start(cycles=3))',
  'await RisingEdge(dut.clk)',
  'values = [v for v in range(3) if v]',
  'if ready:\n    go()\nelse:\n    stop()',
  '@cocotb.coroutine\ndef helper(dut):\n    yield Timer(1)\n    raise ReturnValue(dut.out.value)',
  'class Model:\n    def step(self):\n        return self.state'
];

const snippetArbitrary = fc.record({
  snippet: fc.constantFrom(...SNIPPETS),
  comment: fc.constantFrom('', '  # note', '\t#tabbed'),
  blankLines: fc.nat({ max: 2 })
});

const sourceArbitrary = fc
  .record({
    parts: fc.array(snippetArbitrary, { maxLength: 6 }),
    newline: fc.constantFrom('\n', '\r\n'),
    finalNewline: fc.boolean()
  })
  .map(({ parts, newline, finalNewline }) => {
    const text = parts
      .map(({ snippet, comment, blankLines }) =>
        newline.repeat(blankLines) + snippet.replace(/\n/g, newline) + comment
      )
      .join(newline);
    return finalNewline && text !== '' ? text + newline : text;
  });

describe('Generated sources', () => {
  it('round-trip through parse and print', () => {
    fc.assert(
      fc.property(sourceArbitrary, text => {
        expect(print(parse(text))).toBe(text);
      })
    );
  });

  it('are left unchanged by a second migration', () => {
    fc.assert(
      fc.property(sourceArbitrary, text => {
        const once = migrate(text).rewrittenText;
        const twice = migrate(once);
        expect(twice.changed).toBe(false);
        expect(twice.rewrittenText).toBe(once);
      })
    );
  });
});
