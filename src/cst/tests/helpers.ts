import { readFileSync } from 'node:fs';

import type { ParseError } from '../../errors';
import { isParseError } from '../../errors';

/**
 * Runs `action` and returns the `ParseError` it throws.
 * Fails the test when nothing, or something else, is thrown.
 */
export function captureParseError(action: () => unknown): ParseError {
  try {
    action();
  } catch (error) {
    if (isParseError(error)) return error;
    throw error;
  }
  throw new Error('Expected a ParseError, but nothing was thrown.');
}

/** Reads a fixture stored next to the tests of this module. */
export function readFixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');
}
