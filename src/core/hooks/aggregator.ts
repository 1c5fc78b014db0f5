/**
 * Reduces the results of one event into a single decision:
 * - deny when a hook marked blocking returned block
 * - allow_with_warnings when anything else did not pass (a block from a
 *   non-blocking hook lands here)
 * - allow otherwise
 */

import { AggregationError } from '../errors/index.js';
import type { AggregateDecision, CheckResult, Decision, HookDefinition } from './types.js';

export function aggregate(
  results: readonly CheckResult[],
  hooks: readonly HookDefinition[],
): AggregateDecision {
  const byName = new Map(hooks.map((hook) => [hook.name, hook]));

  let denied = false;
  let warned = false;
  for (const result of results) {
    const hook = byName.get(result.hookName);
    if (!hook) {
      throw new AggregationError(result.hookName);
    }

    if (result.classification === 'block' && hook.blocking) {
      denied = true;
    } else if (result.classification !== 'pass') {
      warned = true;
    }
  }

  let overall: Decision = 'allow';
  if (denied) {
    overall = 'deny';
  } else if (warned) {
    overall = 'allow_with_warnings';
  }

  return { overall, results: [...results] };
}
