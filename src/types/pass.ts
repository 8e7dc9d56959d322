import type { Position } from 'unist';

import type {
  Expression,
  Module,
  NodeOfType,
  NodeType,
  SmallStatement,
  Statement,
  SyntaxNode
} from './cst';
import type { Pattern } from './pattern';

export type Severity = 'info' | 'warning' | 'error';

/**
 * A finding the engine could not (or chose not to) resolve mechanically.
 *
 * Diagnostics are never dropped and never fatal. They reach the caller in pass
 * order, then in node-visitation order.
 */
export type Diagnostic = {
  /** Name of the pass that produced the diagnostic. */
  pass: string;

  /**
   * Rule id within the pass; absent for findings of a pass's `finish` step.
   * Reserved ids:
   * - `ambiguity`: more than one rule wanted to rewrite the same node.
   * - `fixed-point`: the iteration bound was reached with rewrites pending
   *   (reported under the pass name `runner`).
   *
   * A rule that throws is reported under its own id with severity `error`.
   */
  rule?: string;
  message: string;
  severity: Severity;
  position?: Position;
};

/**
 * A diagnostic as emitted by a rule. The runner fills in `pass` and `rule`,
 * defaults `severity` to `warning` and `position` to the matched node's span.
 */
export type DiagnosticInput = {
  message: string;
  severity?: Severity;
  position?: Position;
};

/**
 * The category of node that may replace `N` in its parent slot.
 *
 * An expression may be replaced by any expression (e.g. an attribute access by
 * a call), a small statement by any small statement (`raise` by `return`).
 * Structural nodes are replaced by a node of the same type.
 */
export type Replacement<N extends SyntaxNode> = N extends Expression
  ? Expression
  : N extends SmallStatement
    ? SmallStatement
    : N extends Statement
      ? Statement
      : N;

/** Read-only context handed to every rewrite. */
export type RewriteContext = {
  /** Ancestors of the node, root (`Module`) first, parent last. */
  ancestors: readonly SyntaxNode[];
};

/**
 * Outcome of a rewrite.
 *
 * - `replacement`: the node to put in place of the matched one. Omit to keep
 *   the node (a diagnostic-only or state-only outcome).
 * - `state`: the next accumulator value for the current traversal.
 * - `diagnostics`: findings attached to this node.
 */
export type RewriteResult<State, R extends SyntaxNode = SyntaxNode> = {
  replacement?: R;
  state?: State;
  diagnostics?: readonly DiagnosticInput[];
};

/**
 * Typed rewrite function for nodes of kind `K`. Returning `undefined` declines
 * the node, leaving it to the next rule of the same kind.
 */
export type Rewrite<State, K extends NodeType> = (
  node: NodeOfType<K>,
  state: State,
  context: RewriteContext
) => RewriteResult<State, Replacement<NodeOfType<K>>> | undefined;

/**
 * A single rewrite rule, erased over its node kind so that rules targeting
 * different kinds can share one list. Create rules with `defineRule`.
 */
export type Rule<State> = {
  /** Rule id, unique within its pass. */
  name: string;

  /** The node kind the rule inspects. */
  kind: NodeType;

  /**
   * Precondition checked by the runner before `apply` is called. Also used by
   * `wouldTouch` to pre-scan a tree without rewriting it.
   */
  pattern: Pattern;

  apply(
    node: SyntaxNode,
    state: State,
    context: RewriteContext
  ): RewriteResult<State> | undefined;
};

/**
 * Result of a pass's `finish` step. `advisories` are comment lines
 * (`# WARNING: …`) to place at the top of the file; they are inserted only when
 * not already present there.
 */
export type FinishResult = {
  advisories?: readonly string[];
  diagnostics?: readonly DiagnosticInput[];
};

/**
 * A named rewrite unit applied in one traversal of one tree.
 *
 * @template State - Accumulator scoped to a single traversal. Passes that need
 *   no accumulator use `undefined`.
 */
export type TransformationPass<State = undefined> = {
  name: string;
  description: string;
  rules: ReadonlyArray<Rule<State>>;

  /** Produces a fresh accumulator for each traversal. */
  initialState(): State;

  /** Turns the final accumulator into advisory notices. */
  finish?(state: State, tree: Module): FinishResult;
};

/**
 * A pass of any accumulator type, as held by the runner. Method syntax on
 * {@link Rule} and {@link TransformationPass} keeps specific passes assignable.
 */
export type AnyPass = TransformationPass<unknown>;
