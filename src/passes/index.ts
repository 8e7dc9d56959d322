import type { AnyPass, MigrationConfig } from '../types';
import { awaitSuspendPass } from './await-suspend';
import { callRenamePass } from './call-rename';
import { coroutineMarkerPass } from './coroutine-marker';
import { keywordRemovalPass } from './keyword-removal';
import { keywordRenamePass } from './keyword-rename';
import { qualifyNamesPass } from './qualify-names';
import { removedAttributePass } from './removed-attribute';
import { returnValuePass } from './return-value';
import { startUnwrapPass } from './start-unwrap';
import { valueAccessorPass } from './value-accessor';

export { definePass, defineRule, noState } from './define';
export type { RuleDefinition } from './define';
export {
  awaitSuspendPass,
  callRenamePass,
  coroutineMarkerPass,
  keywordRemovalPass,
  keywordRenamePass,
  qualifyNamesPass,
  removedAttributePass,
  returnValuePass,
  startUnwrapPass,
  valueAccessorPass
};
export { VALUE_PLACEHOLDER } from './value-accessor';

/**
 * The cocotb 2 catalogue, in application order.
 *
 * The order is load-bearing:
 * - `coroutine-marker` makes functions `async` before `await-suspend` looks
 *   for an enclosing coroutine.
 * - `call-rename` turns `cocotb.fork` into `cocotb.start_soon` before
 *   `start-unwrap` looks for launchers.
 * - `keyword-rename` sees callees before `qualify-names` rewrites them, and
 *   lists both spellings anyway.
 *
 * With this order a single iteration reaches the fixed point.
 */
export function buildPasses(config: MigrationConfig): AnyPass[] {
  return [
    coroutineMarkerPass(config.coroutineMarker),
    awaitSuspendPass(),
    returnValuePass(config.returnValue),
    callRenamePass(config.callRename),
    startUnwrapPass(config.startUnwrap),
    keywordRenamePass(config.keywordRename),
    keywordRemovalPass(config.keywordRemoval),
    valueAccessorPass(config.valueAccessor),
    removedAttributePass(config.removedAttribute),
    qualifyNamesPass(config.qualifyNames)
  ];
}
