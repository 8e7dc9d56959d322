import type { Attribute, Expression, MigrationConfig, SyntaxChild, SyntaxNode } from '../types';
import { leadingOf, parseExpression, substitute, withLeading } from '../cst';
import { attribute, call } from '../matcher';
import { definePass, defineRule, noState } from './define';

/** Name standing for the receiver in replacement templates. */
export const VALUE_PLACEHOLDER = '__value__';

type AccessorConfig = MigrationConfig['valueAccessor'];

/**
 * Whether `node` is written to rather than read: an assignment, augmented or
 * annotated assignment, or `del` target, possibly nested in tuple, list,
 * parenthesised or starred targets.
 *
 * `node` may already be a rebuilt copy of the child held by its parent, so the
 * first step compares the attribute token, which rebuilding never replaces.
 */
function isStoreTarget(node: Attribute, ancestors: readonly SyntaxNode[]): boolean {
  let holds = (slot: SyntaxChild | undefined) =>
    slot?.type === 'Attribute' && slot.attr === node.attr;

  for (let index = ancestors.length - 1; index >= 0; index--) {
    const parent = ancestors[index];
    if (!parent) return false;

    switch (parent.type) {
      case 'AssignTarget':
      case 'AugAssign':
      case 'AnnAssign':
      case 'Del':
        return holds(parent.target);
      case 'Element':
      case 'Starred':
      case 'Paren':
        if (!holds(parent.value)) return false;
        break;
      case 'Tuple':
      case 'List':
        break;
      default:
        return false;
    }

    const child = parent;
    holds = slot => slot === child;
  }

  return false;
}

function compile(templates: Record<string, string>): Map<string, Expression> {
  return new Map(
    Object.entries(templates).map(([legacy, template]) => [legacy, parseExpression(template)])
  );
}

/** `template` with the receiver filled in, starting with `leading`. */
function expand(template: Expression, receiver: Expression, leading: string): Expression {
  return withLeading(substitute(template, VALUE_PLACEHOLDER, receiver), leading);
}

/**
 * Legacy value accessors
 * ----------------------
 * `sig.value.integer` → `int(sig.value)`, `sig.value.binstr` →
 * `format(sig.value, 'b')`, `sig.value.get_value()` → `sig.value`.
 *
 * Replacements are expression templates in which `__value__` stands for the
 * receiver (`sig.value`). Templates are parsed once, when the pass is built;
 * a malformed template fails there with a `ParseError`.
 *
 * Writes through a legacy accessor (`sig.value.integer = 3`) have no
 * expression-level equivalent and are reported instead.
 */
export function valueAccessorPass(config: AccessorConfig) {
  const receiver = attribute({ attr: config.receiver });
  const attributes = compile(config.attributes);
  const methods = compile(config.methods);

  const attributeRules = [...attributes].map(([legacy, template]) =>
    defineRule<undefined, 'Attribute'>({
      name: `attribute:${legacy}`,
      kind: 'Attribute',
      pattern: attribute({ attr: legacy, value: receiver }),
      rewrite: (node, _state, { ancestors }) => {
        if (isStoreTarget(node, ancestors)) {
          return {
            diagnostics: [
              {
                message: `Assignment through ".${legacy}" has no cocotb 2.0 equivalent; assign to the signal value directly.`
              }
            ]
          };
        }
        return { replacement: expand(template, node.value, leadingOf(node)) };
      }
    })
  );

  const methodRules = [...methods].map(([legacy, template]) =>
    defineRule<undefined, 'Call'>({
      name: `method:${legacy}`,
      kind: 'Call',
      pattern: call({ func: attribute({ attr: legacy, value: receiver }), args: [] }),
      rewrite: node => {
        const { func } = node;
        if (func.type !== 'Attribute' || node.args.length > 0) return undefined;
        return { replacement: expand(template, func.value, leadingOf(node)) };
      }
    })
  );

  return definePass({
    name: 'value-accessor',
    description: 'Replaces removed value accessors with their cocotb 2.0 spelling.',
    initialState: noState,
    rules: [...attributeRules, ...methodRules]
  });
}
