/**
 * EventDispatcher Tests
 *
 * Matching, ordering, concurrency and failure isolation, with a scripted
 * in-memory checker standing in for subprocesses
 */

import { describe, it, expect } from 'vitest';
import {
  EventDispatcher,
  HookRegistry,
  createLifecycleEvent,
  type Checker,
  type CheckOutcome,
  type HookDefinition,
  type LifecycleEvent,
  type LifecycleStage,
} from '../../../src/core/hooks/index.js';
import { sleep } from './fixtures.js';

interface Script {
  delayMs: number;
  exitCode: number;
}

class ScriptedChecker implements Checker {
  readonly calls: string[] = [];
  readonly completed: string[] = [];
  private active = 0;
  maxActive = 0;

  constructor(private readonly scripts: Record<string, Script> = {}) {}

  async run(hook: HookDefinition, _event: LifecycleEvent): Promise<CheckOutcome> {
    this.calls.push(hook.name);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);

    const script = this.scripts[hook.name] ?? { delayMs: 0, exitCode: 0 };
    await sleep(script.delayMs);

    this.active -= 1;
    this.completed.push(hook.name);
    return {
      exitCode: script.exitCode,
      stdout: '',
      stderr: '',
      durationMs: script.delayMs,
      timedOut: false,
      truncated: false,
    };
  }
}

function buildRegistry(hookNames: string[]): HookRegistry {
  return HookRegistry.fromDocument({
    hooks: {
      PreToolUse: [
        {
          matcher: 'Write|Edit',
          hooks: hookNames.map((name) => ({ type: 'command', command: `./${name}.sh`, name })),
        },
      ],
    },
  });
}

const writeEvent = createLifecycleEvent('PreToolUse', { toolName: 'Write', filePath: '/repo/src/app.ts' });

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) return [items];
  return items.flatMap((item, index) =>
    permutations([...items.slice(0, index), ...items.slice(index + 1)]).map((rest) => [item, ...rest]),
  );
}

describe('EventDispatcher', () => {
  describe('dispatch()', () => {
    it('should return results in declaration order whatever the completion order', async () => {
      const names = ['env-check', 'port-check', 'config-check'];
      const registry = buildRegistry(names);

      for (const delays of permutations([5, 25, 45])) {
        const scripts: Record<string, Script> = {};
        names.forEach((name, index) => {
          scripts[name] = { delayMs: delays[index] ?? 0, exitCode: index };
        });
        const checker = new ScriptedChecker(scripts);
        const dispatcher = new EventDispatcher(registry, checker);

        const results = await dispatcher.dispatch(writeEvent);

        expect(results.map((result) => result.hookName)).toEqual(names);
        expect(results.map((result) => result.exitCode)).toEqual([0, 1, 2]);
        expect(results.map((result) => result.classification)).toEqual(['pass', 'warn', 'block']);
      }
    });

    it('should run matched hooks concurrently by default', async () => {
      const registry = buildRegistry(['a', 'b', 'c']);
      const checker = new ScriptedChecker({
        a: { delayMs: 20, exitCode: 0 },
        b: { delayMs: 20, exitCode: 0 },
        c: { delayMs: 20, exitCode: 0 },
      });

      await new EventDispatcher(registry, checker).dispatch(writeEvent);

      expect(checker.maxActive).toBe(3);
    });

    it('should run hooks one at a time when parallel is off', async () => {
      const registry = buildRegistry(['a', 'b', 'c']);
      const checker = new ScriptedChecker({
        a: { delayMs: 15, exitCode: 0 },
        b: { delayMs: 5, exitCode: 0 },
        c: { delayMs: 10, exitCode: 0 },
      });

      const results = await new EventDispatcher(registry, checker, { parallel: false }).dispatch(writeEvent);

      expect(checker.maxActive).toBe(1);
      expect(checker.completed).toEqual(['a', 'b', 'c']);
      expect(results.map((result) => result.hookName)).toEqual(['a', 'b', 'c']);
    });

    it('should return immediately without running anything when no hook matches', async () => {
      const registry = buildRegistry(['a', 'b']);
      const checker = new ScriptedChecker();
      const dispatcher = new EventDispatcher(registry, checker);
      const readEvent = createLifecycleEvent('PreToolUse', { toolName: 'Read' });

      const start = performance.now();
      const results = await dispatcher.dispatch(readEvent);
      const elapsed = performance.now() - start;

      expect(results).toEqual([]);
      expect(checker.calls).toEqual([]);
      expect(elapsed).toBeLessThan(10);
    });

    it('should isolate a checker that rejects', async () => {
      const registry = buildRegistry(['ok', 'broken']);
      const checker: Checker = {
        async run(hook) {
          if (hook.name === 'broken') {
            throw new Error('pool exhausted');
          }
          return { exitCode: 0, stdout: '', stderr: '', durationMs: 1, timedOut: false, truncated: false };
        },
      };

      const results = await new EventDispatcher(registry, checker).dispatch(writeEvent);

      expect(results.map((result) => result.classification)).toEqual(['pass', 'block']);
      expect(results[1]?.spawnError).toBe('pool exhausted');
      expect(results[1]?.stderr).toBe('Hook "broken" could not be run: pool exhausted');
    });

    it('should report lifecycle stages in order', async () => {
      const stages: LifecycleStage[] = [];
      const dispatcher = new EventDispatcher(buildRegistry(['a']), new ScriptedChecker(), {
        onStage: (stage) => stages.push(stage),
      });

      await dispatcher.dispatch(writeEvent);

      expect(stages).toEqual(['received', 'matching', 'executing', 'classifying']);
    });
  });

  describe('dispatchWithHooks()', () => {
    it('should return the matched definitions alongside the results', async () => {
      const dispatcher = new EventDispatcher(buildRegistry(['a', 'b']), new ScriptedChecker());

      const { hooks, results } = await dispatcher.dispatchWithHooks(writeEvent);

      expect(hooks.map((hook) => hook.name)).toEqual(['a', 'b']);
      expect(results).toHaveLength(2);
    });

    it('should read the registry through a provider on every dispatch', async () => {
      let current = buildRegistry(['a']);
      const checker = new ScriptedChecker();
      const dispatcher = new EventDispatcher(() => current, checker);

      await dispatcher.dispatch(writeEvent);
      current = buildRegistry(['b', 'c']);
      const results = await dispatcher.dispatch(writeEvent);

      expect(checker.calls).toEqual(['a', 'b', 'c']);
      expect(results.map((result) => result.hookName)).toEqual(['b', 'c']);
    });
  });
});
