/**
 * HookRunner Tests
 *
 * Whole pipeline from a lifecycle event to a reported decision, with real
 * shell hooks where the exit code contract matters.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fsp from 'fs/promises';
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import {
  HookRegistry,
  HookRunner,
  InProcessChecker,
  createLifecycleEvent,
  type LifecycleStage,
} from '../../../src/core/hooks/index.js';
import { AuditLog } from '../../../src/core/audit/log.js';
import { ConfigError, ConfigErrorCode } from '../../../src/core/errors/index.js';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('HookRunner', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'hookrunner-runner-'));
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  function registryOf(document: unknown): HookRegistry {
    return HookRegistry.fromDocument(document, { projectDir: tempDir });
  }

  describe('end to end', () => {
    it('should deny a commit when a blocking hook exits 2', async () => {
      const runner = new HookRunner(
        registryOf({
          hooks: {
            PreCommit: [
              {
                blocking: true,
                hooks: [{ command: 'echo "missing API key" >&2; exit 2', name: 'env-check' }],
              },
            ],
          },
        }),
      );

      const report = await runner.run(createLifecycleEvent('PreCommit'));

      expect(report.overall).toBe('deny');
      expect(report.results).toHaveLength(1);
      expect(report.results[0]?.classification).toBe('block');
      expect(report.results[0]?.stderr).toContain('missing API key');
    });

    it('should warn when one of two edit hooks exits 1', async () => {
      const runner = new HookRunner(
        registryOf({
          hooks: {
            PostToolUse: [
              {
                matcher: '*.ts',
                hooks: [
                  { command: 'exit 0', name: 'lint' },
                  { command: 'exit 1', name: 'format' },
                ],
              },
            ],
          },
        }),
      );

      const report = await runner.run(
        createLifecycleEvent('PostToolUse', { toolName: 'Edit', filePath: 'src/app.ts', cwd: tempDir }),
      );

      expect(report.overall).toBe('allow_with_warnings');
      expect(report.results.map((result) => result.hookName)).toEqual(['lint', 'format']);
      expect(report.results.map((result) => result.classification)).toEqual(['pass', 'warn']);
      expect(report.toolName).toBe('Edit');
      expect(report.filePath).toBe(path.join(tempDir, 'src/app.ts'));
    });

    it('should downgrade a block from a non-blocking hook', async () => {
      const runner = new HookRunner(
        registryOf({
          hooks: {
            PreCommit: [{ blocking: false, hooks: [{ command: 'exit 2', name: 'advisory' }] }],
          },
        }),
      );

      const report = await runner.run(createLifecycleEvent('PreCommit'));

      expect(report.overall).toBe('allow_with_warnings');
      expect(report.results[0]?.classification).toBe('block');
    });

    it('should deny when a blocking gate points at a missing script', async () => {
      const runner = new HookRunner(
        registryOf({
          hooks: {
            PreCommit: [{ blocking: true, hooks: [{ command: './scripts/check-env.sh', name: 'env-gate' }] }],
          },
        }),
      );

      const report = await runner.run(createLifecycleEvent('PreCommit'));

      expect(report.overall).toBe('deny');
      expect(report.results[0]?.exitCode).toBe(127);
      expect(report.results[0]?.classification).toBe('block');
    });

    it('should allow with warnings when every hook times out', async () => {
      const runner = new HookRunner(
        registryOf({
          hooks: {
            PreCommit: [
              {
                blocking: true,
                hooks: [
                  { command: 'sleep 5', name: 'slow-a', timeoutMs: 50 },
                  { command: 'sleep 5', name: 'slow-b', timeoutMs: 50 },
                ],
              },
            ],
          },
        }),
      );

      const report = await runner.run(createLifecycleEvent('PreCommit'));

      expect(report.overall).toBe('allow_with_warnings');
      expect(report.results.every((result) => result.timedOut && result.exitCode === -1)).toBe(true);
    });

    it('should allow an event with no matching hooks', async () => {
      const runner = new HookRunner(registryOf({ hooks: {} }));

      const report = await runner.run(createLifecycleEvent('PreToolUse', { toolName: 'Read' }));

      expect(report.overall).toBe('allow');
      expect(report.results).toEqual([]);
      expect(report.id).toMatch(UUID_V4);
    });
  });

  describe('stages', () => {
    it('should report every stage in order', async () => {
      const stages: LifecycleStage[] = [];
      const checker = new InProcessChecker({ ok: async () => ({ exitCode: 0 }) });
      const runner = new HookRunner(registryOf({ hooks: { PreCommit: [{ hooks: [{ command: 'ok' }] }] } }), {
        checker,
        onStage: (stage) => stages.push(stage),
      });

      await runner.run(createLifecycleEvent('PreCommit'));

      expect(stages).toEqual(['received', 'matching', 'executing', 'classifying', 'aggregated', 'reported']);
    });
  });

  describe('reload()', () => {
    const passing = { hooks: { PreCommit: [{ hooks: [{ command: 'ok', name: 'first' }] }] } };

    it('should swap in the new registry', async () => {
      const checker = new InProcessChecker({ ok: async () => ({ exitCode: 0 }) });
      const runner = new HookRunner(registryOf(passing), { checker });

      const next = await runner.reload({
        document: { hooks: { PreCommit: [{ hooks: [{ command: 'ok', name: 'second' }] }] } },
      });

      expect(runner.getRegistry()).toBe(next);
      expect(next.projectDir).toBe(tempDir);
      const report = await runner.run(createLifecycleEvent('PreCommit'));
      expect(report.results.map((result) => result.hookName)).toEqual(['second']);
    });

    it('should keep the current registry when the new configuration is invalid', async () => {
      const runner = new HookRunner(registryOf(passing));
      const before = runner.getRegistry();

      const error = await runner.reload({ json: '{ not json' }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ code: ConfigErrorCode.INVALID_JSON });
      expect(runner.getRegistry()).toBe(before);
    });

    it('should let a dispatch in flight finish against its own snapshot', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const checker = new InProcessChecker({
        ok: async () => {
          await gate;
          return { exitCode: 0 };
        },
      });
      const runner = new HookRunner(registryOf(passing), { checker });

      const inFlight = runner.run(createLifecycleEvent('PreCommit'));
      await runner.reload({ document: { hooks: {} } });
      release();

      const report = await inFlight;
      expect(report.results.map((result) => result.hookName)).toEqual(['first']);
      expect((await runner.run(createLifecycleEvent('PreCommit'))).results).toEqual([]);
    });
  });

  describe('audit log', () => {
    it('should append one JSON line per run', async () => {
      const logPath = path.join(tempDir, 'logs', 'audit.jsonl');
      const checker = new InProcessChecker({
        ok: async () => ({ exitCode: 0 }),
        fail: async () => ({ exitCode: 2, stderr: 'blocked' }),
      });
      const runner = new HookRunner(
        registryOf({ hooks: { PreCommit: [{ blocking: true, hooks: [{ command: 'fail', name: 'guard' }] }] } }),
        { checker, auditLog: new AuditLog(logPath) },
      );

      const first = await runner.run(createLifecycleEvent('PreCommit'));
      await runner.run(createLifecycleEvent('PreCommit'));

      const lines = (await fsp.readFile(logPath, 'utf-8')).trim().split('\n');
      expect(lines).toHaveLength(2);
      const entry: unknown = JSON.parse(lines[0] ?? '');
      expect(entry).toMatchObject({ id: first.id, event: 'PreCommit', overall: 'deny' });
      expect(entry).toHaveProperty('timestamp');
    });

    it('should keep the decision when the log cannot be written', async () => {
      // A directory where the log file should be
      const logPath = path.join(tempDir, 'audit.jsonl');
      await fs.ensureDir(logPath);
      const checker = new InProcessChecker({ ok: async () => ({ exitCode: 0 }) });
      const runner = new HookRunner(registryOf({ hooks: { PreCommit: [{ hooks: [{ command: 'ok' }] }] } }), {
        checker,
        auditLog: new AuditLog(logPath),
      });

      const report = await runner.run(createLifecycleEvent('PreCommit'));

      expect(report.overall).toBe('allow');
    });
  });
});
