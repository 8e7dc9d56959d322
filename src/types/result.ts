import type { Position } from 'unist';

import type { Module, NodeType } from './cst';
import type { Diagnostic } from './pass';
import type { ParseError } from '../errors';

export type RunOptions = {
  /**
   * Upper bound on how often the whole pass list is applied. With the default
   * of `1`, every pass traverses the tree exactly once. Larger values repeat
   * the pass list until no pass modifies the tree.
   *
   * @default 1
   */
  maxIterations?: number;
};

/** What `run` hands back: the (possibly new) tree and everything it found. */
export type RunOutcome = {
  tree: Module;
  modified: boolean;
  diagnostics: Diagnostic[];
};

/** Immutable terminal artifact of one migration. */
export type MigrationResult = Readonly<{
  rewrittenText: string;

  /** `rewrittenText !== original`; the only signal callers should persist on. */
  changed: boolean;
  diagnostics: readonly Diagnostic[];
}>;

/** A node some rule's pattern matched during a pre-scan. */
export type Finding = {
  pass: string;
  rule: string;
  kind: NodeType;
  position?: Position;
};

/** One file handed over by a file-discovery collaborator. */
export type SourceUnit = {
  path: string;
  text: string;
};

export type UnitStatus = 'changed' | 'unchanged' | 'failed';

export type UnitOutcome =
  | {
      path: string;
      status: 'changed' | 'unchanged';
      result: MigrationResult;
    }
  | {
      path: string;
      status: 'failed';
      error: ParseError;
    };
