import type { MigrationConfig } from '../types';
import { leadingOf, withLeading } from '../cst';
import { anyOf, attribute, call, oneOfNames } from '../matcher';
import { definePass, defineRule, noState } from './define';

/**
 * `cocotb.start_soon(clock.start())` → `clock.start()`.
 *
 * `Clock.start()` schedules its own task in cocotb 2.x; handing its result to
 * a launcher a second time is an error there.
 */
export function startUnwrapPass(config: MigrationConfig['startUnwrap']) {
  const starter = call({
    func: anyOf(...config.methods.map(method => attribute({ attr: method })))
  });

  return definePass({
    name: 'start-unwrap',
    description: 'Drops task launchers around calls that already start their own task.',
    initialState: noState,
    rules: [
      defineRule<undefined, 'Call'>({
        name: 'unwrap-start',
        kind: 'Call',
        pattern: call({ func: oneOfNames(config.launchers), args: [starter] }),
        rewrite: node => {
          // Keyword arguments to the launcher (`name=…`) would be lost.
          const [arg, ...extra] = node.args;
          if (!arg || extra.length > 0) return undefined;
          return { replacement: withLeading(arg.value, leadingOf(node)) };
        }
      })
    ]
  });
}
