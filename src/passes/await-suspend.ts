import type { Await, RewriteContext, SyntaxNode } from '../types';
import { token } from '../cst';
import { call, yieldOf } from '../matcher';
import { definePass, defineRule, noState } from './define';

/** Nearest enclosing function or lambda, innermost first. */
function enclosingFunction(ancestors: readonly SyntaxNode[]): SyntaxNode | undefined {
  for (let index = ancestors.length - 1; index >= 0; index--) {
    const ancestor = ancestors[index];
    if (ancestor?.type === 'FunctionDef' || ancestor?.type === 'Lambda') return ancestor;
  }
  return undefined;
}

function insideCoroutine({ ancestors }: RewriteContext): boolean {
  const owner = enclosingFunction(ancestors);
  return owner?.type === 'FunctionDef' && owner.asyncKeyword !== undefined;
}

const OUTSIDE_COROUTINE =
  '`yield <call>` outside a coroutine was left unchanged; make the function `async def` and review it manually.';

/**
 * `yield <call>` → `await <call>` inside `async def`.
 *
 * The same yield in a plain `def` (an undecorated generator helper, say) is
 * reported and left alone: its callers may already `await` it.
 *
 * Bare `yield`, `yield from …`, tuples and non-call operands are out of reach
 * of the pattern and stay as written.
 */
export function awaitSuspendPass() {
  return definePass({
    name: 'await-suspend',
    description: 'Rewrites `yield <trigger>` suspension points to `await <trigger>`.',
    initialState: noState,
    rules: [
      defineRule<undefined, 'Yield'>({
        name: 'yield-call',
        kind: 'Yield',
        pattern: yieldOf(call(), false),
        rewrite: (node, _state, context) => {
          const { value } = node;
          if (!value) return undefined;
          if (!insideCoroutine(context)) return { diagnostics: [{ message: OUTSIDE_COROUTINE }] };

          const replacement: Await = {
            type: 'Await',
            keyword: token('name', 'await', node.keyword.leading),
            value
          };
          return { replacement };
        }
      })
    ]
  });
}
