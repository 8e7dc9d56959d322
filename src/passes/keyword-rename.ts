import type { Arg, DiagnosticInput, MigrationConfig } from '../types';
import { spanOf } from '../cst';
import { allOf, anyOf, call, hasKeyword, keywordArg, oneOfNames } from '../matcher';
import { definePass, defineRule, noState } from './define';

type RenameEntry = MigrationConfig['keywordRename'][number];

function renameRule(entry: RenameEntry) {
  const renames = new Map(Object.entries(entry.renames));
  const [callee = ''] = entry.callees;

  return defineRule<undefined, 'Call'>({
    name: `rename:${callee}`,
    kind: 'Call',
    pattern: allOf(
      call({ func: oneOfNames(entry.callees) }),
      anyOf(...[...renames.keys()].map(legacy => hasKeyword(legacy)))
    ),
    rewrite: node => {
      const diagnostics: DiagnosticInput[] = [];
      let renamed = false;

      const args = node.args.map((arg): Arg => {
        const legacy = arg.keyword;
        const target = legacy && renames.get(legacy.value);
        if (!legacy || target === undefined) return arg;

        if (keywordArg(node.args, target)) {
          diagnostics.push({
            message: `Keyword "${legacy.value}" cannot be renamed to "${target}": the call already passes "${target}".`,
            position: spanOf(arg)
          });
          return arg;
        }

        renamed = true;
        return { ...arg, keyword: { ...legacy, value: target, position: undefined } };
      });

      return renamed ? { replacement: { ...node, args }, diagnostics } : { diagnostics };
    }
  });
}

/**
 * Renames keyword arguments of configured callees
 * (`Clock(sig, 10, units="ns")` → `Clock(sig, 10, unit="ns")`). Values and
 * other keywords are left as written.
 */
export function keywordRenamePass(config: MigrationConfig['keywordRename']) {
  return definePass({
    name: 'keyword-rename',
    description: 'Renames keyword arguments whose name changed.',
    initialState: noState,
    rules: config.map(renameRule)
  });
}
