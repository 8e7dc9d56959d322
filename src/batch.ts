import type { SourceUnit, UnitOutcome } from './types';
import { isParseError } from './errors';
import { migrate } from './pipeline';
import type { MigrateOptions } from './pipeline';

/**
 * Migrates independent files one after another.
 *
 * Each unit is parsed and migrated on its own; a unit that fails to parse is
 * recorded as `failed` and the batch carries on. Any other error is a defect
 * in a pass or in the engine and propagates.
 *
 * Outcomes are returned in input order. Nothing is written: persisting
 * `changed` units is up to the caller.
 */
export function migrateUnits(
  units: readonly SourceUnit[],
  options: MigrateOptions = {}
): UnitOutcome[] {
  return units.map(({ path, text }): UnitOutcome => {
    try {
      const result = migrate(text, { ...options, path });
      return { path, status: result.changed ? 'changed' : 'unchanged', result };
    } catch (error) {
      if (isParseError(error)) return { path, status: 'failed', error };
      throw error;
    }
  });
}
