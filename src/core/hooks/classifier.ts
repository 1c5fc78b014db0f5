/**
 * Exit code contract for hook processes:
 * - 0: pass
 * - 2: block (stderr is the reason)
 * - anything else, timeouts included: warn and continue
 */

import type { CheckOutcome, CheckResult, Classification, HookDefinition } from './types.js';

export function classify(exitCode: number): Classification {
  if (exitCode === 0) return 'pass';
  if (exitCode === 2) return 'block';
  return 'warn';
}

/**
 * Turn a raw outcome into a result. A hook that could not be started is a
 * block: a check that never ran must not pass silently.
 */
export function toCheckResult(hook: HookDefinition, outcome: CheckOutcome): CheckResult {
  const result: CheckResult = {
    hookName: hook.name,
    classification: outcome.spawnError !== undefined ? 'block' : classify(outcome.exitCode),
    exitCode: outcome.exitCode,
    stdout: outcome.stdout,
    stderr: outcome.stderr,
    durationMs: outcome.durationMs,
    timedOut: outcome.timedOut,
  };
  if (outcome.spawnError !== undefined) {
    result.spawnError = outcome.spawnError;
  }
  return result;
}

/**
 * Human-readable reason for a result: stderr, else stdout, else a
 * generic line
 */
export function summarizeResult(result: CheckResult): string {
  const stderr = result.stderr.trim();
  if (stderr) return stderr;

  const stdout = result.stdout.trim();
  if (stdout) return stdout;

  if (result.timedOut) return 'Hook timed out';
  switch (result.classification) {
    case 'block':
      return 'Hook blocked the operation';
    case 'warn':
      return `Hook exited with code ${result.exitCode}`;
    default:
      return 'Hook passed';
  }
}
