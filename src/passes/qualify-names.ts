import type { MigrationConfig } from '../types';
import { dottedName } from '../cst';
import { allOf, call, kind, oneOfNames } from '../matcher';
import { definePass, defineRule, noState } from './define';

/**
 * `RisingEdge(clk)` → `cocotb.triggers.RisingEdge(clk)`.
 *
 * Only bare callees are touched; a call that is already qualified, through
 * any namespace, fails the `Name` guard and is left as written.
 */
export function qualifyNamesPass(config: MigrationConfig['qualifyNames']) {
  const namespaces = new Map<string, string>();
  for (const [namespace, symbols] of Object.entries(config)) {
    for (const symbol of symbols) {
      if (!namespaces.has(symbol)) namespaces.set(symbol, namespace);
    }
  }

  return definePass({
    name: 'qualify-names',
    description: 'Qualifies bare calls to namespaced symbols.',
    initialState: noState,
    rules: [
      defineRule<undefined, 'Call'>({
        name: 'qualify-callee',
        kind: 'Call',
        pattern: allOf(
          call({ func: kind('Name') }),
          call({ func: oneOfNames([...namespaces.keys()]) })
        ),
        rewrite: node => {
          const { func } = node;
          if (func.type !== 'Name') return undefined;

          const namespace = namespaces.get(func.token.value);
          if (namespace === undefined) return undefined;

          return {
            replacement: {
              ...node,
              func: dottedName(`${namespace}.${func.token.value}`, func.token.leading)
            }
          };
        }
      })
    ]
  });
}
