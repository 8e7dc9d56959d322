import type { LiteralValue, SyntaxChild, Token } from '../types';

const STRING_PARTS = /^([a-zA-Z]*)('''|"""|'|")/;

const ESCAPE = /\\(x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8}|[0-7]{1,3}|\r\n|[\s\S])/g;

const SIMPLE_ESCAPES: Record<string, string> = {
  '\n': '',
  '\r': '',
  '\r\n': '',
  '\\': '\\',
  "'": "'",
  '"': '"',
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v'
};

function decodeEscapes(body: string): string {
  return body.replace(ESCAPE, (sequence, escape: string) => {
    const simple = SIMPLE_ESCAPES[escape];
    if (simple !== undefined) return simple;
    if (/^[0-7]/.test(escape)) return String.fromCodePoint(parseInt(escape, 8));
    if (/^[xuU]/.test(escape)) return String.fromCodePoint(parseInt(escape.slice(1), 16));
    return sequence;
  });
}

/** Decoded content of one string token; `undefined` for f-, t- and byte strings. */
function stringPart(part: Token): string | undefined {
  const match = STRING_PARTS.exec(part.value);
  if (!match) return undefined;

  const prefix = (match[1] ?? '').toLowerCase();
  const quote = match[2] ?? '';
  if (/[fbt]/.test(prefix)) return undefined;

  const body = part.value.slice(match[0].length, part.value.length - quote.length);
  return prefix.includes('r') ? body : decodeEscapes(body);
}

function numberValue(text: string): number | undefined {
  const digits = text.replace(/_/g, '');
  if (/[jJ]$/.test(digits)) return undefined;

  const radix = /^0[xX]/.test(digits)
    ? 16
    : /^0[bB]/.test(digits)
      ? 2
      : /^0[oO]/.test(digits)
        ? 8
        : 10;
  return radix === 10 ? Number(digits) : parseInt(digits.slice(2), radix);
}

/**
 * Value of a string or number literal, as `literal(value)` compares it.
 *
 * Adjacent string parts are concatenated; formatted, template and byte strings
 * have no static value. A unary minus before a number literal is folded in.
 * Anything else yields `undefined`.
 */
export function literalValue(node: SyntaxChild | undefined): LiteralValue | undefined {
  if (!node) return undefined;

  switch (node.type) {
    case 'Number':
      return numberValue(node.token.value);

    case 'UnaryOp': {
      if (node.operator.value !== '-' || node.operand.type !== 'Number') return undefined;
      const value = numberValue(node.operand.token.value);
      return value === undefined ? undefined : -value;
    }

    case 'String': {
      let text = '';
      for (const part of node.parts) {
        const decoded = stringPart(part);
        if (decoded === undefined) return undefined;
        text += decoded;
      }
      return text;
    }

    default:
      return undefined;
  }
}
