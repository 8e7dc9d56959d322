import type { MigrationConfig } from '../types';
import { attribute } from '../matcher';
import { definePass, defineRule } from './define';

/** Removed attributes seen during the traversal. */
type SeenAttributes = ReadonlySet<string>;

/**
 * Flags accesses to attributes that no longer exist (`clk.frequency`).
 *
 * Nothing is rewritten. Each access is reported, and once per attribute an
 * advisory comment is placed at the top of the file, in configuration order.
 */
export function removedAttributePass(config: MigrationConfig['removedAttribute']) {
  return definePass<SeenAttributes>({
    name: 'removed-attribute',
    description: 'Reports attributes removed in cocotb 2.0 and adds an advisory comment.',
    initialState: () => new Set<string>(),
    rules: config.map(entry =>
      defineRule<SeenAttributes, 'Attribute'>({
        name: `attribute:${entry.attribute}`,
        kind: 'Attribute',
        pattern: attribute({ attr: entry.attribute }),
        rewrite: (_node, seen) => ({
          state: seen.has(entry.attribute) ? seen : new Set([...seen, entry.attribute]),
          diagnostics: [{ message: entry.message }]
        })
      })
    ),
    finish: seen => ({
      advisories: config.filter(entry => seen.has(entry.attribute)).map(entry => entry.advisory)
    })
  });
}
