import type { StandardSchemaV1 } from '@standard-schema/spec';

function formatPath(path: StandardSchemaV1.Issue['path']): string {
  if (!path || path.length === 0) return '(root)';
  return path
    .map(segment => String(typeof segment === 'object' ? segment.key : segment))
    .join('.');
}

/**
 * Validates `input` using a Standard Schema V1 compliant validator.
 *
 * The schema is used only through its `~standard` property, so any library
 * implementing the Standard Schema interface (Zod, Valibot, ArkType, …) is
 * accepted. The engine ships a Zod schema for its configuration tables.
 *
 * Schema Object Layout:
 * ```ts
 * const schema = {
 *   // 1. Universal Adapter (Result Pattern):
 *   //    - Returns an object ({ value } or { issues }).
 *   //    - Does NOT throw errors.
 *   "~standard": {
 *     validate: (input) => Result
 *   },
 *
 *   // 2. Library-Specific Internals (Ignored):
 *   parse,
 *   ...otherLibrarySpecificProps
 * };
 * ```
 *
 * @param subject - What is being validated, for error messages.
 * @returns The validated (and possibly transformed) value.
 *
 * @throws
 * - If the validator returns a Promise (migration is synchronous).
 * - If validation fails; the message names the first offending path.
 */

/**
 * Public Overload:
 * `InferOutput<S>` cannot be verified against the `unknown` value the
 * implementation receives from `validate`. Keeping the typed signature apart
 * from the implementation avoids a type assertion in the body.
 */
export function validateWithSchema<S extends StandardSchemaV1>(
  schema: S,
  input: unknown,
  subject: string
): StandardSchemaV1.InferOutput<S>;

export function validateWithSchema(
  schema: StandardSchemaV1,
  input: unknown,
  subject: string
): unknown {
  const result = schema['~standard'].validate(input);

  if (result instanceof Promise) {
    throw new Error(`[cocotb-migrate] Async schema validation is not supported for ${subject}.`);
  }

  // Result pattern: issues must be checked explicitly.
  const [firstIssue] = result.issues ?? [];
  if (firstIssue) {
    throw new Error(
      `[cocotb-migrate] Invalid ${subject} at "${formatPath(firstIssue.path)}": ${firstIssue.message}`
    );
  }

  return 'value' in result ? result.value : input;
}
