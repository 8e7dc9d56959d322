import type { Call, Expression, MigrationConfig, Paren, Return } from '../types';
import { print, token, withLeading } from '../cst';
import { call, keywordArg, oneOfNames, positionalArgs, raiseOf } from '../matcher';
import { definePass, defineRule, noState } from './define';

type Extraction = { value?: Expression } | { problem: string };

/**
 * The value carried by the exception call, or why there is no single one.
 * Accepts `X()`, `X(value)` and `X(<keyword>=value)`.
 */
function extractValue(exception: Call, keyword: string): Extraction {
  const { args } = exception;
  if (args.some(arg => arg.star)) {
    return { problem: 'it unpacks its arguments' };
  }
  if (args.length > 1) {
    return { problem: `it passes ${args.length} arguments` };
  }

  const [arg] = args;
  if (!arg) return {};
  if (positionalArgs(args).length === 1) return { value: arg.value };
  if (keywordArg(args, keyword)) return { value: arg.value };

  return { problem: `it passes the unknown keyword "${arg.keyword?.value ?? ''}"` };
}

/**
 * The value as it will follow `return `. A value whose trivia spans lines was
 * only legal inside the call's parentheses, so it keeps a pair of its own.
 */
function returnedValue(exception: Call, value: Expression): Expression {
  if (!print(value).includes('\n')) return withLeading(value, ' ');

  const wrapped: Paren = {
    type: 'Paren',
    open: token('op', '(', ' '),
    value,
    close: token('op', ')', exception.close.leading)
  };
  return wrapped;
}

/**
 * `raise ReturnValue(x)` → `return x`, `raise ReturnValue()` → `return`.
 *
 * Anything that does not map onto a single return value (`from` clauses,
 * several arguments, unpacking) is left alone and reported.
 */
export function returnValuePass(config: MigrationConfig['returnValue']) {
  const exception = oneOfNames(config.exceptions);

  return definePass({
    name: 'return-value',
    description: 'Replaces `raise ReturnValue(x)` with `return x`.',
    initialState: noState,
    rules: [
      defineRule<undefined, 'Raise'>({
        name: 'raise-to-return',
        kind: 'Raise',
        pattern: raiseOf(call({ func: exception })),
        rewrite: node => {
          const { exc } = node;
          if (exc?.type !== 'Call') return undefined;

          if (node.fromKeyword) {
            return {
              diagnostics: [
                {
                  message:
                    'Cannot turn this `raise ... from ...` into a return statement; rewrite it manually.'
                }
              ]
            };
          }

          const extraction = extractValue(exc, config.keyword);
          if ('problem' in extraction) {
            return {
              diagnostics: [
                {
                  message: `Cannot turn this return exception into a return statement: ${extraction.problem}.`
                }
              ]
            };
          }

          const keyword = token('name', 'return', node.keyword.leading);
          const replacement: Return = extraction.value
            ? { type: 'Return', keyword, value: returnedValue(exc, extraction.value) }
            : { type: 'Return', keyword };
          return { replacement };
        }
      })
    ]
  });
}
