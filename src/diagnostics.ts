import type { Position } from 'unist';

import type { Diagnostic, DiagnosticInput, Module } from './types';
import { leadingOf, statementWithLeading, tokensOf } from './cst';

/**
 * Identity of a diagnostic for de-duplication: same pass, rule, message and
 * start position.
 */
function diagnosticKey(diagnostic: Diagnostic): string {
  const start = diagnostic.position?.start;
  return [
    diagnostic.pass,
    diagnostic.rule ?? '',
    diagnostic.message,
    start ? `${start.line}:${start.column}` : ''
  ].join('\u0000');
}

/**
 * Ordered, de-duplicating sink for diagnostics.
 *
 * Entries keep insertion order, which the runner arranges to be pass order
 * first and node-visitation order second. Re-reporting an identical finding
 * (as happens when the pass list is iterated to a fixed point) is a no-op.
 */
export class DiagnosticCollector {
  private readonly entries: Diagnostic[] = [];
  private readonly seen = new Set<string>();

  add(diagnostic: Diagnostic): void {
    const key = diagnosticKey(diagnostic);
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.entries.push(diagnostic);
  }

  /**
   * Records a rule's finding, filling in defaults: `warning` severity and the
   * position of the node the rule was looking at.
   */
  report(
    pass: string,
    rule: string | undefined,
    input: DiagnosticInput,
    fallbackPosition?: Position
  ): void {
    this.add({
      pass,
      rule,
      message: input.message,
      severity: input.severity ?? 'warning',
      position: input.position ?? fallbackPosition
    });
  }

  get size(): number {
    return this.entries.length;
  }

  toArray(): Diagnostic[] {
    return [...this.entries];
  }
}

// -- advisories -------------------------------------------------------------

const SHEBANG = /^#!/;

/** Python's source-encoding declaration (only honoured on lines 1 and 2). */
const ENCODING = /^[ \t\f]*#.*?coding[:=][ \t]*[-\w.]+/;

function splitLines(text: string): string[] {
  return text.match(/[^\r\n]*(?:\r\n|\r|\n)|[^\r\n]+$/g) ?? [];
}

function stripLineEnd(line: string): string {
  return line.replace(/(?:\r\n|\r|\n)$/, '').trimEnd();
}

/** The file's first line break, or `\n` when it has none. */
export function detectNewline(tree: Module): string {
  for (const token of tokensOf(tree)) {
    if (token.kind === 'newline' && token.value !== '') return token.value;
  }
  return '\n';
}

/**
 * Adds advisory comment lines to the top of the file.
 *
 * Placement
 * ---------
 * The lines go directly after a shebang and/or encoding declaration if the
 * file starts with them, otherwise at the very top. They become part of the
 * leading trivia of the first statement (or of the end-of-file token for a
 * file without statements), so printing picks them up like any comment.
 *
 * Order
 * -----
 * `advisories` keep their given order. Each call inserts above the advisories
 * of earlier calls, so when several passes each add one, the last pass's
 * advisory ends up first.
 *
 * Idempotence
 * -----------
 * A line already present among the comments above the first statement is not
 * added again, and duplicates within `advisories` collapse to one. Running the
 * migration twice therefore never stacks advisories.
 *
 * @returns `tree` itself when nothing had to be inserted.
 */
export function insertAdvisories(tree: Module, advisories: readonly string[]): Module {
  const [first, ...rest] = tree.body;
  const leading = first ? leadingOf(first) : tree.end.leading;
  const lines = splitLines(leading);

  const present = new Set(lines.map(stripLineEnd));
  const missing = [...new Set(advisories)].filter(line => !present.has(line));
  if (missing.length === 0) return tree;

  // 1. Keep the shebang / encoding header in place.
  let headerLength = 0;
  while (headerLength < 2) {
    const line = lines[headerLength];
    if (line === undefined) break;
    const isHeader = (headerLength === 0 && SHEBANG.test(line)) || ENCODING.test(line);
    if (!isHeader) break;
    headerLength++;
  }

  // 2. Insert after it, in the file's own line-break style.
  const newline = detectNewline(tree);
  let header = lines.slice(0, headerLength).join('');
  if (header !== '' && !/[\r\n]$/.test(header)) header += newline;

  const nextLeading =
    header +
    missing.map(line => line + newline).join('') +
    lines.slice(headerLength).join('');

  // 3. Attach to the first token of the file.
  return first
    ? { ...tree, body: [statementWithLeading(first, nextLeading), ...rest] }
    : { ...tree, end: { ...tree.end, leading: nextLeading } };
}
