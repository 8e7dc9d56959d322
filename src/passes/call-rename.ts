import type { MigrationConfig } from '../types';
import { dottedName, leadingOf } from '../cst';
import { call, oneOfNames, qualifiedPath } from '../matcher';
import { definePass, defineRule, noState } from './define';

/**
 * Legacy callee → replacement callee (`cocotb.fork(t)` → `cocotb.start_soon(t)`).
 * Arguments are not touched.
 */
export function callRenamePass(config: MigrationConfig['callRename']) {
  const renames = new Map(Object.entries(config));

  return definePass({
    name: 'call-rename',
    description: 'Renames calls to functions that moved or were renamed.',
    initialState: noState,
    rules: [
      defineRule<undefined, 'Call'>({
        name: 'rename-callee',
        kind: 'Call',
        pattern: call({ func: oneOfNames([...renames.keys()]) }),
        rewrite: node => {
          const target = renames.get(qualifiedPath(node.func)?.join('.') ?? '');
          if (target === undefined) return undefined;
          return {
            replacement: { ...node, func: dottedName(target, leadingOf(node.func)) }
          };
        }
      })
    ]
  });
}
