import type { Arg, DiagnosticInput, MigrationConfig, Token } from '../types';
import { leadingOf, spanOf, withLeading } from '../cst';
import { allOf, anyOf, attribute, call, hasKeyword } from '../matcher';
import { definePass, defineRule } from './define';

type RemovalEntry = MigrationConfig['keywordRemoval'][number];

/** Advisories requested so far in this traversal. */
type RemovalState = ReadonlySet<string>;

function relead(target: Token, leading: string): Token {
  return { ...target, leading };
}

function argWithLeading(arg: Arg, leading: string): Arg {
  if (arg.star) return { ...arg, star: relead(arg.star, leading) };
  if (arg.keyword) return { ...arg, keyword: relead(arg.keyword, leading) };
  return { ...arg, value: withLeading(arg.value, leading) };
}

/**
 * Drops the arguments whose keyword is in `removed`.
 *
 * Separators are repaired so that the call still prints as a well-formed
 * argument list: a dropped argument's comma moves to the kept argument before
 * it, and when the first argument goes, the next kept one takes its trivia.
 */
function dropKeywords(args: readonly Arg[], removed: ReadonlySet<string>): Arg[] {
  const kept: Arg[] = [];
  let pendingLeading: string | undefined;

  for (const arg of args) {
    const keyword = arg.keyword?.value;
    if (keyword !== undefined && removed.has(keyword)) {
      const previous = kept.pop();
      if (previous) {
        kept.push({ ...previous, comma: arg.comma });
      } else {
        pendingLeading ??= leadingOf(arg);
      }
      continue;
    }

    kept.push(pendingLeading === undefined ? arg : argWithLeading(arg, pendingLeading));
    pendingLeading = undefined;
  }

  return kept;
}

function removalRule(entry: RemovalEntry) {
  const removed = new Set(entry.keywords);

  return defineRule<RemovalState, 'Call'>({
    name: `remove:${entry.method}`,
    kind: 'Call',
    pattern: allOf(
      call({ func: attribute({ attr: entry.method }) }),
      anyOf(...entry.keywords.map(keyword => hasKeyword(keyword)))
    ),
    rewrite: (node, state) => {
      const diagnostics: DiagnosticInput[] = node.args
        .filter(arg => arg.keyword !== undefined && removed.has(arg.keyword.value))
        .map(arg => ({ message: entry.message, position: spanOf(arg) }));

      const { advisory } = entry;
      return {
        replacement: { ...node, args: dropKeywords(node.args, removed) },
        state: advisory === undefined ? state : new Set([...state, advisory]),
        diagnostics
      };
    }
  });
}

/**
 * Removes keyword arguments that no longer exist
 * (`clk.start(cycles=4)` → `clk.start()`).
 *
 * The removal can change what the testbench does at run time, so every
 * dropped keyword is reported for manual review, and an entry with an
 * `advisory` puts that comment at the top of the file.
 */
export function keywordRemovalPass(config: MigrationConfig['keywordRemoval']) {
  return definePass<RemovalState>({
    name: 'keyword-removal',
    description: 'Drops keyword arguments that were removed and flags the call for review.',
    initialState: () => new Set<string>(),
    rules: config.map(removalRule),
    finish: state => ({ advisories: [...state] })
  });
}
