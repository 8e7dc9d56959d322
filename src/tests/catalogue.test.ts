import { describe, expect, it, test } from 'vitest';

import type { AnyPass, MigrationConfigOverrides } from '../types';
import { createCatalogue, DEFAULT_CATALOGUE, DEFAULT_CONFIG } from '../catalogue';
import { migrationConfigSchema } from '../config/schema';
import { definePass, defineRule, noState } from '../passes';
import { kind } from '../matcher';
import { validatePass, validatePasses } from '../pass-validator';
import { validateWithSchema } from '../validator';

/**
 * Test suite: pass catalogue and its configuration.
 *
 * Coverage:
 * - The bundled catalogue and its order.
 * - Table overrides.
 * - Schema errors, reported with the offending path.
 * - Pass and pass-list integrity checks.
 */

const observer = (ruleName: string) =>
  defineRule<undefined, 'Name'>({
    name: ruleName,
    kind: 'Name',
    pattern: kind('Name'),
    rewrite: () => undefined
  });

const passNamed = (passName: string, ruleNames: string[] = ['observe']): AnyPass =>
  definePass({
    name: passName,
    description: 'Test pass.',
    initialState: noState,
    rules: ruleNames.map(observer)
  });

describe('catalogue', () => {
  it('lists the passes in application order', () => {
    expect(DEFAULT_CATALOGUE.passes.map(pass => pass.name)).toEqual([
      'coroutine-marker',
      'await-suspend',
      'return-value',
      'call-rename',
      'start-unwrap',
      'keyword-rename',
      'keyword-removal',
      'value-accessor',
      'removed-attribute',
      'qualify-names'
    ]);
  });

  it('replaces whole tables', () => {
    const { config } = createCatalogue({ callRename: { 'sim.spawn': 'sim.start_soon' } });
    expect(config.callRename).toEqual({ 'sim.spawn': 'sim.start_soon' });
    expect(config.qualifyNames).toEqual(DEFAULT_CONFIG.qualifyNames);
  });

  it('leaves out passes whose table is empty', () => {
    const { passes } = createCatalogue({
      keywordRename: [],
      keywordRemoval: [],
      removedAttribute: [],
      valueAccessor: { receiver: 'value', attributes: {}, methods: {} }
    });

    expect(passes.map(pass => pass.name)).toEqual([
      'coroutine-marker',
      'await-suspend',
      'return-value',
      'call-rename',
      'start-unwrap',
      'qualify-names'
    ]);
  });

  test.for<{ id: string; description: string; overrides: MigrationConfigOverrides; message: string }>([
    {
      id: 'callee',
      description: 'rejects a callee that is not a dotted name',
      overrides: { callRename: { 'cocotb.fork': 'start soon' } },
      message:
        '[cocotb-migrate] Invalid configuration at "callRename.cocotb.fork": Expected a dotted name such as "cocotb.fork"'
    },
    {
      id: 'template',
      description: 'rejects a template that is not an expression',
      overrides: {
        valueAccessor: { receiver: 'value', attributes: { hex: 'format(' }, methods: {} }
      },
      message:
        '[cocotb-migrate] Invalid configuration at "valueAccessor.attributes.hex": Expected a single expression'
    },
    {
      id: 'advisory',
      description: 'rejects an advisory that is not a comment',
      overrides: {
        removedAttribute: [{ attribute: 'period', message: 'Gone.', advisory: 'WARNING: gone' }]
      },
      message:
        '[cocotb-migrate] Invalid configuration at "removedAttribute.0.advisory": Advisories must be comment lines'
    },
    {
      id: 'multi-line-advisory',
      description: 'rejects an advisory spanning lines',
      overrides: {
        removedAttribute: [{ attribute: 'period', message: 'Gone.', advisory: '# one\n# two' }]
      },
      message:
        '[cocotb-migrate] Invalid configuration at "removedAttribute.0.advisory": Advisories must fit on a single line'
    },
    {
      id: 'keywords',
      description: 'rejects a removal without keywords',
      overrides: { keywordRemoval: [{ method: 'start', keywords: [], message: 'Gone.' }] },
      message:
        '[cocotb-migrate] Invalid configuration at "keywordRemoval.0.keywords": Array must contain at least 1 element(s)'
    }
  ])('[$id] $description', ({ overrides, message }) => {
    expect(() => createCatalogue(overrides)).toThrow(message);
  });

  it('rejects unknown tables', () => {
    expect(() =>
      validateWithSchema(migrationConfigSchema, { ...DEFAULT_CONFIG, extra: {} }, 'configuration')
    ).toThrow(`[cocotb-migrate] Invalid configuration at "(root)": Unrecognized key(s) in object: 'extra'`);
  });
});

describe('validateWithSchema', () => {
  it('refuses asynchronous validators', () => {
    const schema = {
      '~standard': {
        version: 1 as const,
        vendor: 'test',
        validate: (value: unknown) => Promise.resolve({ value })
      }
    };
    expect(() => validateWithSchema(schema, {}, 'settings')).toThrow(
      '[cocotb-migrate] Async schema validation is not supported for settings.'
    );
  });
});

describe('validatePass', () => {
  test.for([
    {
      id: 'name',
      pass: passNamed(''),
      message: '[cocotb-migrate] Invalid pass: a pass must have a non-empty name.'
    },
    {
      id: 'reserved',
      pass: passNamed('runner'),
      message: '[cocotb-migrate] Invalid pass: the name "runner" is reserved.'
    },
    {
      id: 'empty',
      pass: passNamed('empty', []),
      message:
        '[cocotb-migrate] Invalid pass "empty": the pass is empty. It must define at least one rule.'
    },
    {
      id: 'duplicate',
      pass: passNamed('twice', ['same', 'other', 'same']),
      message: '[cocotb-migrate] Invalid pass "twice": the rule name "same" is used more than once.'
    }
  ])('[$id] rejects a malformed pass', ({ pass, message }) => {
    expect(() => validatePass(pass)).toThrow(message);
  });

  it('returns a well-formed pass as is', () => {
    const pass = passNamed('fine');
    expect(validatePass(pass)).toBe(pass);
  });
});

describe('validatePasses', () => {
  it('requires at least one pass', () => {
    expect(() => validatePasses([])).toThrow(
      '[cocotb-migrate] Invalid pass list: at least one pass is required.'
    );
  });

  it('requires unique pass names', () => {
    expect(() => validatePasses([passNamed('a'), passNamed('b'), passNamed('a')])).toThrow(
      '[cocotb-migrate] Invalid pass list: the pass name "a" is used more than once.'
    );
  });
});
