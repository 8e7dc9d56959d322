import type { AnyPass, Diagnostic } from '../../types';
import { parse, print } from '../../cst';
import { run } from '../../runner';

export type PassScenario = {
  id: string;
  description: string;
  source: string;
  expected: string;
};

/** Runs a single pass over `source` and prints the result. */
export function applyPass(
  pass: AnyPass,
  source: string
): { text: string; diagnostics: Diagnostic[] } {
  const outcome = run(parse(source), [pass]);
  return { text: print(outcome.tree), diagnostics: outcome.diagnostics };
}
