import { describe, expect, it, test } from 'vitest';

import type { Token } from '../../types';
import { tokenize } from '..';
import { captureParseError } from './helpers';

/**
 * Test suite: tokenizer.
 *
 * Coverage:
 * - Trivia ownership (whitespace, comments, blank lines, continuations).
 * - Structural tokens (NEWLINE, INDENT, DEDENT, ENDMARKER).
 * - Positions.
 * - Lexical errors.
 */

const summarize = (tokens: readonly Token[]) =>
  tokens.map(({ kind, value, leading }) => ({ kind, value, leading }));

describe('tokenize', () => {
  describe('Trivia ownership', () => {
    it('attaches spaces and trailing comments to the following token', () => {
      expect(summarize(tokenize('x = 1  # note\n'))).toEqual([
        { kind: 'name', value: 'x', leading: '' },
        { kind: 'op', value: '=', leading: ' ' },
        { kind: 'number', value: '1', leading: ' ' },
        { kind: 'newline', value: '\n', leading: '  # note' },
        { kind: 'endmarker', value: '', leading: '' }
      ]);
    });

    it('folds comment-only and blank lines into the next token', () => {
      const [first] = tokenize('# header\n\n   \nx\n');
      expect(first).toMatchObject({ kind: 'name', value: 'x', leading: '# header\n\n   \n' });
    });

    it('treats line breaks inside brackets as trivia', () => {
      expect(summarize(tokenize('f(a,\n  b)\n'))).toEqual([
        { kind: 'name', value: 'f', leading: '' },
        { kind: 'op', value: '(', leading: '' },
        { kind: 'name', value: 'a', leading: '' },
        { kind: 'op', value: ',', leading: '' },
        { kind: 'name', value: 'b', leading: '\n  ' },
        { kind: 'op', value: ')', leading: '' },
        { kind: 'newline', value: '\n', leading: '' },
        { kind: 'endmarker', value: '', leading: '' }
      ]);
    });

    it('keeps backslash continuations in the trivia', () => {
      const tokens = tokenize('x = 1 + \\\n    2\n');
      expect(tokens[4]).toMatchObject({ kind: 'number', value: '2', leading: ' \\\n    ' });
    });

    it('gives trailing trivia to the end marker', () => {
      const tokens = tokenize('x\n# done\n');
      expect(tokens.at(-1)).toMatchObject({ kind: 'endmarker', leading: '# done\n' });
    });
  });

  describe('Structural tokens', () => {
    it('emits zero-width indent and dedent tokens without trivia', () => {
      const tokens = tokenize('if x:\n    y\n');
      expect(tokens.map(token => token.kind)).toEqual([
        'name',
        'name',
        'op',
        'newline',
        'indent',
        'name',
        'newline',
        'dedent',
        'endmarker'
      ]);
      expect(tokens[4]).toMatchObject({ value: '', leading: '' });
      expect(tokens[5]).toMatchObject({ value: 'y', leading: '    ' });
    });

    it('emits an empty newline for a file without a final line break', () => {
      expect(summarize(tokenize('x  # end'))).toEqual([
        { kind: 'name', value: 'x', leading: '' },
        { kind: 'newline', value: '', leading: '  # end' },
        { kind: 'endmarker', value: '', leading: '' }
      ]);
    });

    test.for([
      { style: 'LF', text: 'x\n', newline: '\n' },
      { style: 'CRLF', text: 'x\r\n', newline: '\r\n' },
      { style: 'CR', text: 'x\r', newline: '\r' }
    ])('[$style] keeps the line break as the newline value', ({ text, newline }) => {
      expect(tokenize(text)[1]).toMatchObject({ kind: 'newline', value: newline });
    });

    it('measures tabs to the next multiple of eight', () => {
      // One tab and eight spaces are the same level: no second indent.
      const kinds = tokenize('if x:\n\ty\n        z\n').map(token => token.kind);
      expect(kinds.filter(kind => kind === 'indent')).toHaveLength(1);
    });
  });

  describe('Literals', () => {
    test.for([
      { id: 'prefixed', text: `rb'\\x00' f"{a['k']!r:>{width}}"`, count: 2 },
      { id: 'triple quoted', text: '"""a\n"b"\n"""', count: 1 },
      { id: 'escaped quote', text: "'it\\'s'", count: 1 }
    ])('[$id] scans string literals as single tokens', ({ text, count }) => {
      const strings = tokenize(`${text}\n`).filter(token => token.kind === 'string');
      expect(strings).toHaveLength(count);
      expect(strings.map(token => token.leading + token.value).join('')).toBe(text);
    });

    test.for(['0xFF_FF', '0b1010', '0o17', '1_000', '1e-3', '.5', '2.', '3j'])(
      'scans %s as one number',
      number => {
        expect(tokenize(`${number}\n`)[0]).toMatchObject({ kind: 'number', value: number });
      }
    );

    it('prefers the longest operator', () => {
      const operators = tokenize('a **= b // c -> ...\n')
        .filter(token => token.kind === 'op')
        .map(token => token.value);
      expect(operators).toEqual(['**=', '//', '->', '...']);
    });
  });

  describe('Positions', () => {
    it('records 1-based line/column and 0-based offset spans', () => {
      const tokens = tokenize('x = 10\ny\n');
      expect(tokens[2]?.position).toEqual({
        start: { line: 1, column: 5, offset: 4 },
        end: { line: 1, column: 7, offset: 6 }
      });
      expect(tokens[4]?.position?.start).toEqual({ line: 2, column: 1, offset: 7 });
    });
  });

  describe('Errors', () => {
    test.for([
      { id: 'string', text: "'abc", reason: 'unterminated string literal', line: 1, column: 1 },
      { id: 'unclosed', text: 'f(', reason: "'(' was never closed", line: 1, column: 2 },
      { id: 'unmatched', text: ')', reason: "unmatched ')'", line: 1, column: 1 },
      {
        id: 'mismatched',
        text: '(]',
        reason: "closing ']' does not match opening '('",
        line: 1,
        column: 2
      },
      {
        id: 'dedent',
        text: 'if x:\n    y\n  z\n',
        reason: 'unindent does not match any outer indentation level',
        line: 3,
        column: 3
      },
      { id: 'character', text: 'x = $', reason: "invalid character '$'", line: 1, column: 5 },
      {
        id: 'continuation',
        text: 'x = \\ y',
        reason: 'unexpected character after line continuation',
        line: 1,
        column: 5
      }
    ])('[$id] rejects with a positioned ParseError', ({ text, reason, line, column }) => {
      const error = captureParseError(() => tokenize(text));
      expect(error.reason).toBe(reason);
      expect(error.position).toMatchObject({ line, column });
      expect(error.message).toBe(`${reason} (${line}:${column})`);
    });
  });
});
