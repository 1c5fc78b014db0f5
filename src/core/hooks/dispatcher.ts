/**
 * EventDispatcher
 *
 * Resolves the hooks matching a lifecycle event and drives them through a
 * Checker. Hooks of one event share no state, so by default they run
 * concurrently; results always come back in declaration order.
 */

import type { Checker } from './executor.js';
import { toCheckResult } from './classifier.js';
import type { HookRegistry } from './registry.js';
import {
  SPAWN_ERROR_EXIT_CODE,
  type CheckOutcome,
  type CheckResult,
  type HookDefinition,
  type LifecycleEvent,
  type StageListener,
} from './types.js';
import { errorMessage } from '../errors/index.js';
import { logger } from '../../utils/logger.js';

const TAG = '[Dispatcher]';

export type RegistryProvider = () => HookRegistry;

export interface DispatcherOptions {
  /** Run matched hooks concurrently (default: true) */
  parallel?: boolean;
  onStage?: StageListener;
}

export interface DispatchOutcome {
  /** Hooks that matched, in declaration order */
  hooks: readonly HookDefinition[];
  /** One result per hook, same order */
  results: CheckResult[];
}

interface HookRun {
  hook: HookDefinition;
  outcome: CheckOutcome;
}

export class EventDispatcher {
  private readonly registry: RegistryProvider;
  private readonly parallel: boolean;
  private readonly onStage?: StageListener;

  constructor(
    registry: HookRegistry | RegistryProvider,
    private readonly checker: Checker,
    options: DispatcherOptions = {},
  ) {
    this.registry = typeof registry === 'function' ? registry : () => registry;
    this.parallel = options.parallel ?? true;
    this.onStage = options.onStage;
  }

  async dispatch(event: LifecycleEvent): Promise<CheckResult[]> {
    const { results } = await this.dispatchWithHooks(event);
    return results;
  }

  /**
   * Like dispatch, also returning the matched definitions so the caller can
   * aggregate against the same registry snapshot
   */
  async dispatchWithHooks(event: LifecycleEvent): Promise<DispatchOutcome> {
    this.onStage?.('received', event);

    // One snapshot per dispatch; a reload mid-flight does not affect it
    const registry = this.registry();

    this.onStage?.('matching', event);
    const hooks = registry.query(event.kind, event.toolName, event.filePath);
    logger.debug(TAG, `${event.kind}: ${hooks.length} hook(s) matched`);

    this.onStage?.('executing', event);
    const runs = hooks.length === 0 ? [] : await this.runAll(hooks, event);

    this.onStage?.('classifying', event);
    const results = runs.map(({ hook, outcome }) => toCheckResult(hook, outcome));

    return { hooks, results };
  }

  private async runAll(hooks: readonly HookDefinition[], event: LifecycleEvent): Promise<HookRun[]> {
    if (this.parallel) {
      // Promise.all keeps input order whatever the completion order
      return Promise.all(
        hooks.map(async (hook) => ({ hook, outcome: await this.runOne(hook, event) })),
      );
    }

    const runs: HookRun[] = [];
    for (const hook of hooks) {
      runs.push({ hook, outcome: await this.runOne(hook, event) });
    }
    return runs;
  }

  /**
   * A checker that rejects is treated like a hook that could not start
   */
  private async runOne(hook: HookDefinition, event: LifecycleEvent): Promise<CheckOutcome> {
    try {
      return await this.checker.run(hook, event);
    } catch (error) {
      logger.error(TAG, `checker failed for ${hook.name}`, error);
      return {
        exitCode: SPAWN_ERROR_EXIT_CODE,
        stdout: '',
        stderr: `Hook "${hook.name}" could not be run: ${errorMessage(error)}`,
        durationMs: 0,
        timedOut: false,
        truncated: false,
        spawnError: errorMessage(error),
      };
    }
  }
}
