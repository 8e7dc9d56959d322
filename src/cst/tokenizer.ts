import type { Point } from 'unist';

import type { Token, TokenKind } from '../types';
import { ParseError } from '../errors';

const OPERATORS_3 = new Set(['**=', '//=', '>>=', '<<=', '...']);

const OPERATORS_2 = new Set([
  '!=', '%=', '&=', '**', '*=', '+=', '-=', '->', '//', '/=', ':=', '<<',
  '<=', '==', '>=', '>>', '@=', '^=', '|='
]);

const OPERATORS_1 = new Set([
  '%', '&', '(', ')', '*', '+', ',', '-', '.', '/', ':', ';', '<', '=', '>',
  '@', '[', ']', '^', '{', '|', '}', '~'
]);

const CLOSING_BRACKET: Record<string, string> = { '(': ')', '[': ']', '{': '}' };

const STRING_PREFIXES = new Set([
  'r', 'u', 'b', 'f', 't', 'br', 'rb', 'fr', 'rf', 'tr', 'rt'
]);

const NAME_PATTERN = /[_\p{ID_Start}][\p{ID_Continue}]*/uy;

const NUMBER_PATTERN =
  /0[xX](?:_?[0-9a-fA-F])+|0[bB](?:_?[01])+|0[oO](?:_?[0-7])+|(?:(?:[0-9](?:_?[0-9])*)?\.[0-9](?:_?[0-9])*|[0-9](?:_?[0-9])*\.?)(?:[eE][+-]?[0-9](?:_?[0-9])*)?[jJ]?/y;

const TAB_SIZE = 8;

/** Same bounds as CPython's tokenizer. */
const MAX_BRACKET_DEPTH = 200;
const MAX_INDENT_DEPTH = 100;

/**
 * Width of a run of indentation characters. Tabs advance to the next multiple
 * of eight; form feeds reset the count.
 */
function indentWidth(indent: string): number {
  let width = 0;
  for (const char of indent) {
    if (char === '\t') width = (Math.floor(width / TAB_SIZE) + 1) * TAB_SIZE;
    else if (char === '\f') width = 0;
    else width += 1;
  }
  return width;
}

function isInlineSpace(char: string | undefined): boolean {
  return char === ' ' || char === '\t' || char === '\f';
}

function newlineAt(text: string, index: number): string {
  const char = text[index];
  if (char === '\n') return '\n';
  if (char === '\r') return text[index + 1] === '\n' ? '\r\n' : '\r';
  return '';
}

function lineEnd(text: string, index: number): number {
  let end = index;
  while (end < text.length && text[end] !== '\n' && text[end] !== '\r') end++;
  return end;
}

function computeLineStarts(text: string): number[] {
  const starts = [0];
  for (let index = 0; index < text.length; index++) {
    const newline = newlineAt(text, index);
    if (!newline) continue;
    index += newline.length - 1;
    starts.push(index + 1);
  }
  return starts;
}

/**
 * Converts Python source text into a flat token stream.
 *
 * The stream is lossless: concatenating `leading + value` over all tokens
 * reproduces `text` exactly. Besides significant tokens it contains the
 * structural NEWLINE, INDENT and DEDENT tokens and a final ENDMARKER which
 * owns any trailing trivia.
 *
 * @throws {ParseError} on unterminated strings, unbalanced brackets,
 *   inconsistent dedents and characters that cannot start a token.
 */
export function tokenize(text: string): Token[] {
  const lineStarts = computeLineStarts(text);

  const pointAt = (offset: number): Required<Point> => {
    let low = 0;
    let high = lineStarts.length - 1;
    while (low < high) {
      const middle = (low + high + 1) >> 1;
      if ((lineStarts[middle] ?? 0) <= offset) low = middle;
      else high = middle - 1;
    }
    return {
      line: low + 1,
      column: offset - (lineStarts[low] ?? 0) + 1,
      offset
    };
  };

  const fail = (message: string, offset: number): never => {
    throw new ParseError(message, pointAt(offset));
  };

  const tokens: Token[] = [];
  const indents = [0];
  const brackets: Array<{ char: string; offset: number }> = [];
  let trivia = '';
  let atLineStart = true;
  let index = 0;

  const push = (kind: TokenKind, value: string, start: number) => {
    const zeroWidth = value.length === 0 && kind !== 'newline';
    tokens.push({
      type: 'Token',
      kind,
      value,
      leading: zeroWidth ? '' : trivia,
      position: { start: pointAt(start), end: pointAt(start + value.length) }
    });
    if (!zeroWidth) trivia = '';
  };

  // -- strings -------------------------------------------------------------

  const scanFormatSpec = (from: number, triple: boolean): number => {
    let cursor = from;
    while (cursor < text.length) {
      const char = text[cursor];
      if (char === '{') {
        cursor = scanReplacementField(cursor + 1, triple);
        continue;
      }
      if (char === '}') return cursor + 1;
      if (!triple && newlineAt(text, cursor)) break;
      cursor++;
    }
    return fail('unterminated f-string replacement field', from);
  };

  const scanReplacementField = (from: number, triple: boolean): number => {
    let cursor = from;
    let depth = 0;
    while (cursor < text.length) {
      const char = text[cursor];
      if (char === "'" || char === '"') {
        let prefixStart = cursor;
        while (prefixStart > from && /[a-zA-Z]/.test(text[prefixStart - 1] ?? '')) {
          prefixStart--;
        }
        const prefix = text.slice(prefixStart, cursor).toLowerCase();
        cursor = scanStringBody(cursor, STRING_PREFIXES.has(prefix) ? prefix : '');
        continue;
      }
      if (char === '(' || char === '[' || char === '{') depth++;
      else if (char === ')' || char === ']') depth--;
      else if (char === '}') {
        if (depth === 0) return cursor + 1;
        depth--;
      } else if (char === ':' && depth === 0 && text[cursor + 1] !== '=') {
        return scanFormatSpec(cursor + 1, triple);
      } else if (!triple && newlineAt(text, cursor)) {
        break;
      }
      cursor++;
    }
    return fail('unterminated f-string replacement field', from);
  };

  /** Scans a string starting at its opening quote; returns the end offset. */
  const scanStringBody = (quoteOffset: number, prefix: string): number => {
    const quote = text[quoteOffset] ?? '';
    const triple = text.startsWith(quote.repeat(3), quoteOffset);
    const formatted = prefix.includes('f') || prefix.includes('t');
    let cursor = quoteOffset + (triple ? 3 : 1);

    while (cursor < text.length) {
      const char = text[cursor];
      if (char === '\\') {
        cursor += 1 + Math.max(newlineAt(text, cursor + 1).length, 1);
        continue;
      }
      if (formatted && char === '{') {
        if (text[cursor + 1] === '{') cursor += 2;
        else cursor = scanReplacementField(cursor + 1, triple);
        continue;
      }
      if (triple) {
        if (text.startsWith(quote.repeat(3), cursor)) return cursor + 3;
      } else {
        if (char === quote) return cursor + 1;
        if (newlineAt(text, cursor)) break;
      }
      cursor++;
    }
    return fail('unterminated string literal', quoteOffset);
  };

  // -- main loop -----------------------------------------------------------

  // A byte order mark is trivia of the first token.
  if (text.startsWith('\uFEFF')) {
    trivia = '\uFEFF';
    index = 1;
  }

  while (index < text.length) {
    if (atLineStart && brackets.length === 0) {
      let cursor = index;
      while (isInlineSpace(text[cursor])) cursor++;
      const next = text[cursor];

      if (next === undefined) {
        trivia += text.slice(index);
        index = text.length;
        break;
      }

      // Blank and comment-only lines never produce tokens.
      if (next === '#' || newlineAt(text, cursor)) {
        const end = lineEnd(text, cursor);
        const stop = end + newlineAt(text, end).length;
        trivia += text.slice(index, stop);
        index = stop;
        continue;
      }

      const width = indentWidth(text.slice(index, cursor));
      const current = indents[indents.length - 1] ?? 0;
      if (width > current) {
        if (indents.length > MAX_INDENT_DEPTH) fail('too many levels of indentation', cursor);
        indents.push(width);
        push('indent', '', cursor);
      } else if (width < current) {
        while (width < (indents[indents.length - 1] ?? 0)) {
          indents.pop();
          push('dedent', '', cursor);
        }
        if (width !== (indents[indents.length - 1] ?? 0)) {
          fail('unindent does not match any outer indentation level', cursor);
        }
      }

      trivia += text.slice(index, cursor);
      index = cursor;
      atLineStart = false;
      continue;
    }

    const char = text[index] ?? '';

    if (isInlineSpace(char)) {
      trivia += char;
      index++;
      continue;
    }

    if (char === '#') {
      const end = lineEnd(text, index);
      trivia += text.slice(index, end);
      index = end;
      continue;
    }

    if (char === '\\') {
      const newline = newlineAt(text, index + 1);
      if (!newline) fail('unexpected character after line continuation', index);
      trivia += char + newline;
      index += 1 + newline.length;
      continue;
    }

    const newline = newlineAt(text, index);
    if (newline) {
      if (brackets.length > 0) {
        trivia += newline;
      } else {
        push('newline', newline, index);
        atLineStart = true;
      }
      index += newline.length;
      continue;
    }

    if (char === "'" || char === '"') {
      const end = scanStringBody(index, '');
      push('string', text.slice(index, end), index);
      index = end;
      continue;
    }

    NAME_PATTERN.lastIndex = index;
    const name = NAME_PATTERN.exec(text);
    if (name) {
      const word = name[0];
      const after = index + word.length;
      const quote = text[after];
      if ((quote === "'" || quote === '"') && STRING_PREFIXES.has(word.toLowerCase())) {
        const end = scanStringBody(after, word.toLowerCase());
        push('string', text.slice(index, end), index);
        index = end;
      } else {
        push('name', word, index);
        index = after;
      }
      continue;
    }

    if (/[0-9]/.test(char) || (char === '.' && /[0-9]/.test(text[index + 1] ?? ''))) {
      NUMBER_PATTERN.lastIndex = index;
      const number = NUMBER_PATTERN.exec(text);
      if (number) {
        push('number', number[0], index);
        index += number[0].length;
        continue;
      }
    }

    const operator = [3, 2, 1]
      .map(length => text.slice(index, index + length))
      .find(
        candidate =>
          OPERATORS_3.has(candidate) ||
          OPERATORS_2.has(candidate) ||
          OPERATORS_1.has(candidate)
      );

    if (operator === undefined) {
      return fail(`invalid character '${char}'`, index);
    }

    if (operator === '(' || operator === '[' || operator === '{') {
      if (brackets.length >= MAX_BRACKET_DEPTH) fail('too many nested parentheses', index);
      brackets.push({ char: operator, offset: index });
    } else if (operator === ')' || operator === ']' || operator === '}') {
      const open = brackets.pop();
      if (!open) fail(`unmatched '${operator}'`, index);
      else if (CLOSING_BRACKET[open.char] !== operator) {
        fail(`closing '${operator}' does not match opening '${open.char}'`, index);
      }
    }

    push('op', operator, index);
    index += operator.length;
  }

  const unclosed = brackets.at(-1);
  if (unclosed) fail(`'${unclosed.char}' was never closed`, unclosed.offset);

  if (!atLineStart) push('newline', '', text.length);
  while (indents.length > 1) {
    indents.pop();
    push('dedent', '', text.length);
  }

  tokens.push({
    type: 'Token',
    kind: 'endmarker',
    value: '',
    leading: trivia,
    position: { start: pointAt(text.length), end: pointAt(text.length) }
  });

  return tokens;
}
