import type {
  NodeType,
  Pattern,
  Rewrite,
  Rule,
  TransformationPass
} from '../types';
import { isNodeOfType } from '../cst';

export type RuleDefinition<State, K extends NodeType> = {
  name: string;
  kind: K;
  pattern: Pattern;
  rewrite: Rewrite<State, K>;
};

/**
 * Creates a rule with a rewrite typed for its node kind.
 *
 * The returned {@link Rule} is erased over the kind so that rules for
 * different kinds can live in one pass. The runner only ever calls `apply`
 * with nodes of `kind`; the guard keeps that contract checked at run time.
 *
 * @example
 * ```ts
 * defineRule<undefined, 'Yield'>({
 *   name: 'yield-call',
 *   kind: 'Yield',
 *   pattern: yieldOf(call()),
 *   rewrite: node => ({ replacement: toAwait(node) })
 * });
 * ```
 */
export function defineRule<State, K extends NodeType>(
  definition: RuleDefinition<State, K>
): Rule<State> {
  const { name, kind, pattern, rewrite } = definition;
  return {
    name,
    kind,
    pattern,
    apply(node, state, context) {
      return isNodeOfType(node, kind) ? rewrite(node, state, context) : undefined;
    }
  };
}

/** Identity helper that fixes a pass's accumulator type. */
export function definePass<State = undefined>(
  pass: TransformationPass<State>
): TransformationPass<State> {
  return pass;
}

/** `initialState` for passes that keep no accumulator. */
export function noState(): undefined {
  return undefined;
}
