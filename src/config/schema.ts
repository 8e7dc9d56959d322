import { z } from 'zod';

import type { MigrationConfig } from '../types';
import { parseExpression } from '../cst';
import { isParseError } from '../errors';

const dottedName = z
  .string()
  .regex(/^[A-Za-z_]\w*(\.[A-Za-z_]\w*)*$/, 'Expected a dotted name such as "cocotb.fork"');

const identifier = z.string().regex(/^[A-Za-z_]\w*$/, 'Expected an identifier');

const advisory = z.string().startsWith('#', 'Advisories must be comment lines').refine(
  line => !/[\r\n]/.test(line),
  'Advisories must fit on a single line'
);

function isExpression(template: string): boolean {
  try {
    parseExpression(template);
    return true;
  } catch (error) {
    if (isParseError(error)) return false;
    throw error;
  }
}

const template = z.string().refine(isExpression, 'Expected a single expression');

const nonEmpty = <T extends z.ZodTypeAny>(item: T) => z.array(item).min(1);

/**
 * Schema of {@link MigrationConfig}. Checked through its Standard Schema
 * interface (`~standard`) by `createCatalogue`.
 */
export const migrationConfigSchema: z.ZodType<MigrationConfig> = z.object({
  coroutineMarker: z.object({
    legacy: z.array(dottedName),
    retained: z.array(dottedName)
  }),
  returnValue: z.object({
    exceptions: z.array(dottedName),
    keyword: identifier
  }),
  callRename: z.record(dottedName, dottedName),
  startUnwrap: z.object({
    launchers: z.array(dottedName),
    methods: z.array(identifier)
  }),
  keywordRename: z.array(
    z.object({
      callees: nonEmpty(dottedName),
      renames: z.record(identifier, identifier)
    })
  ),
  keywordRemoval: z.array(
    z.object({
      method: identifier,
      keywords: nonEmpty(identifier),
      message: z.string().min(1),
      advisory: advisory.optional()
    })
  ),
  valueAccessor: z.object({
    receiver: identifier,
    attributes: z.record(identifier, template),
    methods: z.record(identifier, template)
  }),
  removedAttribute: z.array(
    z.object({
      attribute: identifier,
      message: z.string().min(1),
      advisory
    })
  ),
  qualifyNames: z.record(dottedName, z.array(identifier))
}).strict();
