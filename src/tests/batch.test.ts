import { describe, expect, it } from 'vitest';

import { migrateUnits } from '../batch';
import { ParseError } from '../errors';
import { kind } from '../matcher';
import { definePass, defineRule, noState } from '../passes';

describe('migrateUnits', () => {
  const units = [
    { path: 'tb/test_edges.py', text: 'RisingEdge(clk)\n' },
    { path: 'tb/broken.py', text: 'def f()\n    pass\n' },
    { path: 'tb/util.py', text: 'x = 1\n' }
  ];

  it('migrates every unit in input order', () => {
    const outcomes = migrateUnits(units);

    expect(outcomes.map(outcome => [outcome.path, outcome.status])).toEqual([
      ['tb/test_edges.py', 'changed'],
      ['tb/broken.py', 'failed'],
      ['tb/util.py', 'unchanged']
    ]);
  });

  it('keeps the result of each migrated unit', () => {
    const [edges] = migrateUnits(units);

    expect(edges).toEqual({
      path: 'tb/test_edges.py',
      status: 'changed',
      result: {
        rewrittenText: 'cocotb.triggers.RisingEdge(clk)\n',
        changed: true,
        diagnostics: []
      }
    });
  });

  it('records parse errors and carries on', () => {
    const broken = migrateUnits(units)[1];

    expect(broken?.status).toBe('failed');
    if (broken?.status !== 'failed') return;
    expect(broken.error).toBeInstanceOf(ParseError);
    expect(broken.error.message).toBe("expected ':', found end of line (1:8)");
  });

  it('records files nested too deeply to migrate', () => {
    const terms = Array.from({ length: 5000 }, (_, index) => `a${index}`).join(' + ');
    const outcomes = migrateUnits([
      { path: 'tb/generated.py', text: `x = ${terms}\n` },
      { path: 'tb/util.py', text: 'x = 1\n' }
    ]);

    expect(outcomes.map(outcome => outcome.status)).toEqual(['failed', 'unchanged']);
    const [generated] = outcomes;
    if (generated?.status !== 'failed') return;
    expect(generated.error.reason).toBe('too deeply nested');
  });

  it('lets engine errors through', () => {
    const faulty = definePass({
      name: 'faulty',
      description: 'Fails while finishing.',
      initialState: noState,
      rules: [
        defineRule<undefined, 'Name'>({
          name: 'observe',
          kind: 'Name',
          pattern: kind('Name'),
          rewrite: () => undefined
        })
      ],
      finish: () => {
        throw new Error('finish failed');
      }
    });

    expect(() => migrateUnits(units, { passes: [faulty] })).toThrow('finish failed');
  });

  it('accepts an empty batch', () => {
    expect(migrateUnits([])).toEqual([]);
  });
});
