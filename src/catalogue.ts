import type { AnyPass, MigrationConfig, MigrationConfigOverrides } from './types';
import defaults from './config/cocotb2.json';
import { migrationConfigSchema } from './config/schema';
import { buildPasses } from './passes';
import { validatePasses } from './pass-validator';
import { validateWithSchema } from './validator';

/** A validated configuration and the passes built from it. */
export type Catalogue = {
  readonly config: MigrationConfig;
  readonly passes: readonly AnyPass[];
};

/** The bundled cocotb 1.x → 2.x tables. */
export const DEFAULT_CONFIG: MigrationConfig = validateWithSchema(
  migrationConfigSchema,
  defaults,
  'bundled configuration'
);

/**
 * Builds the pass catalogue from the bundled tables, with any table replaced
 * by `overrides`.
 *
 * Overrides replace whole tables; they are not merged into the defaults.
 * A table left empty by an override yields no rules, and its pass is left out
 * of the catalogue.
 *
 * @throws Error naming the offending path when a table is malformed, or when
 *   no pass is left.
 */
export function createCatalogue(overrides: MigrationConfigOverrides = {}): Catalogue {
  const config = validateWithSchema(
    migrationConfigSchema,
    { ...DEFAULT_CONFIG, ...overrides },
    'configuration'
  );
  const passes = validatePasses(buildPasses(config).filter(pass => pass.rules.length > 0));
  return { config, passes };
}

/** The default catalogue, built once. Passes hold no state between runs. */
export const DEFAULT_CATALOGUE: Catalogue = createCatalogue();

export const defaultPasses: readonly AnyPass[] = DEFAULT_CATALOGUE.passes;
