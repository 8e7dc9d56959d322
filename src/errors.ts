import type { Point } from 'unist';

/**
 * Raised when source text is not syntactically valid Python.
 *
 * Parsing is all-or-nothing: no partial tree accompanies this error. The batch
 * boundary (`migrateUnits`) catches it per unit, so one broken file never
 * aborts the rest of a run.
 */
export class ParseError extends Error {
  override readonly name = 'ParseError';

  /**
   * Where the parser gave up. `line` and `column` are 1-based, `offset` is the
   * 0-based UTF-16 index into the source text.
   */
  readonly position: Required<Point>;

  /** The message without the position suffix. */
  readonly reason: string;

  constructor(reason: string, position: Required<Point>) {
    super(`${reason} (${position.line}:${position.column})`);
    this.reason = reason;
    this.position = position;
  }
}

export function isParseError(value: unknown): value is ParseError {
  return value instanceof ParseError;
}
