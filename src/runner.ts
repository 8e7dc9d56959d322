import type {
  AnyPass,
  Diagnostic,
  Module,
  NodeType,
  RewriteResult,
  Rule,
  RunOptions,
  RunOutcome,
  SyntaxNode
} from './types';
import { fitsSlot, isNodeOfType, mapChildren, spanOf } from './cst';
import { matches } from './matcher';
import { DiagnosticCollector, insertAdvisories } from './diagnostics';

/** Pass name used for diagnostics raised by the runner itself. */
export const RUNNER = 'runner';

type PassOutcome = {
  tree: Module;
  modified: boolean;
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function groupByKind(rules: ReadonlyArray<Rule<unknown>>): Map<NodeType, Rule<unknown>[]> {
  const byKind = new Map<NodeType, Rule<unknown>[]>();
  for (const rule of rules) {
    const group = byKind.get(rule.kind) ?? [];
    group.push(rule);
    byKind.set(rule.kind, group);
  }
  return byKind;
}

/**
 * Applies one pass to `tree` in a single traversal.
 *
 * Traversal
 * ---------
 * Post-order: a node's children are rebuilt first, so the rules for the parent
 * see already-rewritten children. Rebuilding is copy-on-write; untouched
 * subtrees keep their identity and `modified` is a plain identity check.
 *
 * Rule selection
 * --------------
 * Rules of the node's kind run in declaration order, each only if its pattern
 * matches. A rule returning `undefined` declines. A result without a
 * replacement is an observation: its state and diagnostics are kept and the
 * next rule runs. The first replacement wins; later rules are still consulted,
 * and if any of them would also rewrite the node an `ambiguity` warning names
 * every candidate. Their results are otherwise discarded.
 *
 * Failure isolation
 * -----------------
 * A rule that throws, or returns a replacement that cannot stand in the node's
 * slot, leaves the node unchanged and is reported as an `error` diagnostic.
 */
function runPass(tree: Module, pass: AnyPass, collector: DiagnosticCollector): PassOutcome {
  const rulesByKind = groupByKind(pass.rules);
  let state = pass.initialState();

  const fail = (rule: Rule<unknown>, node: SyntaxNode, reason: string) => {
    collector.report(
      pass.name,
      rule.name,
      { severity: 'error', message: `Rule failed and was skipped: ${reason}` },
      spanOf(node)
    );
  };

  const rewriteNode = (node: SyntaxNode, ancestors: readonly SyntaxNode[]): SyntaxNode => {
    const rules = rulesByKind.get(node.type);
    if (!rules) return node;

    let winner: { rule: Rule<unknown>; replacement: SyntaxNode } | undefined;
    const contenders: string[] = [];

    for (const rule of rules) {
      if (!matches(node, rule.pattern)) continue;

      let result: RewriteResult<unknown> | undefined;
      try {
        result = rule.apply(node, state, { ancestors });
      } catch (error) {
        fail(rule, node, describeError(error));
        continue;
      }
      if (!result) continue;

      const { replacement } = result;

      if (winner) {
        if (replacement) contenders.push(rule.name);
        continue;
      }

      if (replacement && !fitsSlot(node, replacement)) {
        fail(rule, node, `a ${replacement.type} node cannot replace a ${node.type} node`);
        continue;
      }

      if ('state' in result) state = result.state;
      for (const diagnostic of result.diagnostics ?? []) {
        collector.report(pass.name, rule.name, diagnostic, spanOf(node));
      }
      if (replacement) winner = { rule, replacement };
    }

    if (!winner) return node;

    if (contenders.length > 0) {
      const names = [winner.rule.name, ...contenders].join(', ');
      collector.report(
        pass.name,
        'ambiguity',
        {
          message: `Several rules match this ${node.type}: ${names}. Applied "${winner.rule.name}".`
        },
        spanOf(node)
      );
    }

    return winner.replacement;
  };

  const visit = (node: SyntaxNode, ancestors: readonly SyntaxNode[]): SyntaxNode => {
    const path = [...ancestors, node];
    const rebuilt = mapChildren(node, child => visit(child, path));
    return rewriteNode(rebuilt, ancestors);
  };

  // 1. Traverse
  const visited = visit(tree, []);
  if (!isNodeOfType(visited, 'Module')) {
    throw new TypeError(`[cocotb-migrate] Pass "${pass.name}" replaced the module root.`);
  }

  // 2. Finish: advisories and closing diagnostics
  let result = visited;
  if (pass.finish) {
    const finished = pass.finish(state, result);
    for (const diagnostic of finished.diagnostics ?? []) {
      collector.report(pass.name, undefined, diagnostic);
    }
    result = insertAdvisories(result, finished.advisories ?? []);
  }

  return { tree: result, modified: result !== tree };
}

function resolveMaxIterations(options: RunOptions): number {
  const maxIterations = options.maxIterations ?? 1;
  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new RangeError(
      `[cocotb-migrate] "maxIterations" must be a positive integer, received ${maxIterations}.`
    );
  }
  return maxIterations;
}

/**
 * Applies `passes` to `tree`, in order, each in its own traversal.
 *
 * With `maxIterations > 1` the whole list is repeated until an iteration
 * changes nothing. Reaching the bound while the last iteration still changed
 * the tree adds a `fixed-point` warning. Repeated iterations do not repeat
 * diagnostics.
 *
 * @throws {RangeError} for a non-positive or fractional `maxIterations`.
 */
export function run(
  tree: Module,
  passes: readonly AnyPass[],
  options: RunOptions = {}
): RunOutcome {
  const maxIterations = resolveMaxIterations(options);
  const collector = new DiagnosticCollector();

  let current = tree;
  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    let changed = false;
    for (const pass of passes) {
      const outcome = runPass(current, pass, collector);
      current = outcome.tree;
      changed ||= outcome.modified;
    }

    if (!changed) break;

    if (iteration === maxIterations && maxIterations > 1) {
      collector.report(RUNNER, 'fixed-point', {
        message: `Rewrites were still pending after ${maxIterations} iterations; the result may not be final.`
      });
    }
  }

  const diagnostics: Diagnostic[] = collector.toArray();
  return { tree: current, modified: current !== tree, diagnostics };
}
