import {
  DEFAULT_TIMEOUT_MS,
  type CheckResult,
  type Classification,
  type HookDefinition,
} from '../../../src/core/hooks/index.js';

export function makeHook(overrides: Partial<HookDefinition> & { name: string }): HookDefinition {
  return {
    event: 'PreToolUse',
    matcher: '',
    command: 'true',
    timeoutMs: DEFAULT_TIMEOUT_MS,
    blocking: false,
    ...overrides,
  };
}

export function makeResult(hookName: string, classification: Classification): CheckResult {
  const exitCode = classification === 'pass' ? 0 : classification === 'block' ? 2 : 1;
  return {
    hookName,
    classification,
    exitCode,
    stdout: '',
    stderr: '',
    durationMs: 1,
    timedOut: false,
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run fn and return what it threw, failing the test if it did not throw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
