import type { SyntaxNode } from '../types';
import { isNode } from './guards';
import { childrenOf } from './printer';

export type WalkVisitor = (node: SyntaxNode, ancestors: readonly SyntaxNode[]) => void;

/**
 * Visits every node under (and including) `root`, children before their
 * parent: the same order the pass runner rewrites in.
 *
 * `ancestors` runs from `root` down to the parent of the visited node.
 */
export function walk(root: SyntaxNode, visit: WalkVisitor): void {
  const descend = (node: SyntaxNode, ancestors: SyntaxNode[]) => {
    const path = [...ancestors, node];
    for (const child of childrenOf(node)) {
      if (isNode(child)) descend(child, path);
    }
    visit(node, ancestors);
  };
  descend(root, []);
}
