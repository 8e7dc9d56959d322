import type { Decorator, FunctionDef, MigrationConfig, Token } from '../types';
import { token } from '../cst';
import { allOf, anyOf, call, functionDef, matches, not, oneOfNames } from '../matcher';
import { definePass, defineRule, noState } from './define';

/**
 * Trivia of a dropped decorator that must survive it: comments and blank lines
 * in front of the `@`, without the indentation of the `@` line itself.
 */
function carriedTrivia(decorator: Decorator): string {
  const { leading } = decorator.at;
  const lineStart = leading.lastIndexOf('\n') + 1;
  return leading.slice(0, lineStart);
}

function prefixed(target: Token, prefix: string): Token {
  return prefix ? { ...target, leading: prefix + target.leading } : target;
}

/**
 * Turns a function into `async def`. The new `async` keyword takes over the
 * trivia in front of `def`, which is left with a single space.
 */
function makeAsync(node: FunctionDef): FunctionDef {
  if (node.asyncKeyword) return node;
  return {
    ...node,
    asyncKeyword: token('name', 'async', node.defKeyword.leading),
    defKeyword: { ...node.defKeyword, leading: ' ' }
  };
}

/**
 * Removes every decorator matched by `isLegacy`. Comments above a dropped
 * decorator move to whatever now starts its line: the next decorator, or the
 * `async`/`def` keyword.
 */
function dropDecorators(
  node: FunctionDef,
  isLegacy: (decorator: Decorator) => boolean
): FunctionDef {
  const decorators: Decorator[] = [];
  let pending = '';

  for (const decorator of node.decorators) {
    if (isLegacy(decorator)) {
      pending += carriedTrivia(decorator);
      continue;
    }
    decorators.push(pending ? { ...decorator, at: prefixed(decorator.at, pending) } : decorator);
    pending = '';
  }

  if (!pending) return { ...node, decorators };

  return node.asyncKeyword
    ? { ...node, decorators, asyncKeyword: prefixed(node.asyncKeyword, pending) }
    : { ...node, decorators, defKeyword: prefixed(node.defKeyword, pending) };
}

/**
 * Generator-based coroutines
 * --------------------------
 * `@cocotb.coroutine def f(): …` becomes `async def f(): …`. Functions
 * decorated with a retained marker (`@cocotb.test`, `@cocotb.test()`) keep it
 * but are made `async` as well, since generator-based tests are no longer
 * accepted.
 *
 * Runs first in the catalogue: `await-suspend` only rewrites `yield` inside
 * `async` functions.
 */
export function coroutineMarkerPass(config: MigrationConfig['coroutineMarker']) {
  const legacy = oneOfNames(config.legacy);
  const retained = oneOfNames(config.retained);
  const isLegacy = (decorator: Decorator) => matches(decorator.expression, legacy);

  return definePass({
    name: 'coroutine-marker',
    description: 'Drops legacy coroutine decorators and turns the function into `async def`.',
    initialState: noState,
    rules: [
      defineRule<undefined, 'FunctionDef'>({
        name: 'drop-marker',
        kind: 'FunctionDef',
        pattern: functionDef({ decorator: legacy }),
        rewrite: node => ({ replacement: makeAsync(dropDecorators(node, isLegacy)) })
      }),
      defineRule<undefined, 'FunctionDef'>({
        name: 'async-test',
        kind: 'FunctionDef',
        pattern: allOf(
          functionDef({ decorator: anyOf(retained, call({ func: retained })), async: false }),
          not(functionDef({ decorator: legacy }))
        ),
        rewrite: node => ({ replacement: makeAsync(node) })
      })
    ]
  });
}
