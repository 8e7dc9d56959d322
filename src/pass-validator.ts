import type { AnyPass } from './types';
import { RUNNER } from './runner';

function findDuplicate(names: readonly string[]): string | undefined {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) return name;
    seen.add(name);
  }
  return undefined;
}

/**
 * Validates the runtime integrity of a single pass.
 *
 * A pass must have a name (other than the reserved `runner`), at least one
 * rule, and rule names unique within the pass, since diagnostics are keyed
 * by them.
 *
 * @returns The validated pass.
 * @throws Error if the pass is malformed.
 */
export function validatePass<P extends AnyPass>(pass: P): P {
  // 1. Validate identity
  if (!pass.name) {
    throw new Error('[cocotb-migrate] Invalid pass: a pass must have a non-empty name.');
  }
  if (pass.name === RUNNER) {
    throw new Error(`[cocotb-migrate] Invalid pass: the name "${RUNNER}" is reserved.`);
  }

  // 2. Validate functional requirements
  if (pass.rules.length === 0) {
    throw new Error(
      `[cocotb-migrate] Invalid pass "${pass.name}": the pass is empty. It must define at least one rule.`
    );
  }

  const duplicate = findDuplicate(pass.rules.map(rule => rule.name));
  if (duplicate !== undefined) {
    throw new Error(
      `[cocotb-migrate] Invalid pass "${pass.name}": the rule name "${duplicate}" is used more than once.`
    );
  }

  return pass;
}

/**
 * Validates an ordered pass list: non-empty, every pass well-formed, pass
 * names unique.
 */
export function validatePasses(passes: readonly AnyPass[]): AnyPass[] {
  if (passes.length === 0) {
    throw new Error('[cocotb-migrate] Invalid pass list: at least one pass is required.');
  }

  const validated = passes.map(pass => validatePass(pass));

  const duplicate = findDuplicate(validated.map(pass => pass.name));
  if (duplicate !== undefined) {
    throw new Error(
      `[cocotb-migrate] Invalid pass list: the pass name "${duplicate}" is used more than once.`
    );
  }

  return validated;
}
