/**
 * Hook executors
 *
 * Protocol for subprocess hooks:
 * - Input: JSON via stdin, plus FILE_PATH / TOOL_NAME / HOOK_EVENT_NAME
 *   in the environment for shell scripts that predate the JSON contract
 * - Output: stdout and stderr, each capped at MAX_OUTPUT_BYTES
 * - Exit codes: see classifier.ts
 *
 * A hook that overruns its timeout gets SIGTERM, then SIGKILL after a
 * grace window, and is recorded with TIMEOUT_EXIT_CODE.
 */

import { spawn, type ChildProcess } from 'child_process';
import { toCheckResult } from './classifier.js';
import { toStdinDocument } from './event.js';
import {
  DEFAULT_KILL_GRACE_MS,
  MAX_OUTPUT_BYTES,
  SPAWN_ERROR_EXIT_CODE,
  TIMEOUT_EXIT_CODE,
  type CheckOutcome,
  type CheckResult,
  type HookDefinition,
  type LifecycleEvent,
} from './types.js';
import { errorMessage } from '../errors/index.js';
import { logger } from '../../utils/logger.js';

const TAG = '[HookExecutor]';

/**
 * Runs one hook against one event. Implementations never reject for a
 * failing check; a non-zero exit is an ordinary outcome.
 */
export interface Checker {
  run(hook: HookDefinition, event: LifecycleEvent): Promise<CheckOutcome>;
}

export interface SubprocessCheckerOptions {
  /** Working directory of hook processes (default: process cwd) */
  projectDir?: string;
  /** Delay between SIGTERM and SIGKILL on timeout */
  killGraceMs?: number;
  /** Cap on captured stdout and stderr, per stream */
  maxOutputBytes?: number;
  /** Extra environment for every hook process */
  env?: NodeJS.ProcessEnv;
}

/**
 * Substitute ${NAME} placeholders for the given variables. Unknown
 * placeholders are left as they are.
 */
export function substituteVariables(value: string, variables: Record<string, string>): string {
  return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (placeholder, name: string) =>
    Object.prototype.hasOwnProperty.call(variables, name) ? (variables[name] ?? '') : placeholder,
  );
}

export function truncationMarker(limit: number): string {
  return `\n[output truncated at ${limit} bytes]`;
}

/**
 * Accumulates a stream up to a byte limit
 */
class BoundedOutput {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const remaining = this.limit - this.size;
    if (remaining <= 0) {
      this.truncated = this.truncated || chunk.length > 0;
      return;
    }
    if (chunk.length > remaining) {
      this.chunks.push(chunk.subarray(0, remaining));
      this.size = this.limit;
      this.truncated = true;
      return;
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  toString(): string {
    const bytes = Buffer.concat(this.chunks);
    if (!this.truncated) {
      return bytes.toString('utf-8');
    }
    return bytes.subarray(0, completeUtf8Length(bytes)).toString('utf-8') + truncationMarker(this.limit);
  }
}

/**
 * Length of the buffer without a trailing, partially cut UTF-8 character
 */
function completeUtf8Length(bytes: Buffer): number {
  for (let i = bytes.length - 1; i >= Math.max(0, bytes.length - 4); i--) {
    const byte = bytes.readUInt8(i);
    // Continuation byte: keep looking for the lead byte
    if ((byte & 0xc0) === 0x80) continue;

    const width = byte >= 0xf0 ? 4 : byte >= 0xe0 ? 3 : byte >= 0xc0 ? 2 : 1;
    return i + width > bytes.length ? i : bytes.length;
  }
  return bytes.length;
}

/**
 * What /bin/sh prints when it cannot run the command it was given
 * (dash: "not found", bash: "command not found", both: "Permission denied")
 */
const SHELL_LAUNCH_FAILURE = /: (?:not found|command not found|No such file or directory|Permission denied|cannot execute[^\n]*)\s*$/m;
const SHELL_NOT_FOUND_EXIT = 127;
const SHELL_NOT_EXECUTABLE_EXIT = 126;

/**
 * The shell's diagnostic line when a 126 or 127 exit means the hook never
 * started, undefined otherwise
 */
export function shellLaunchFailure(exitCode: number, stderr: string): string | undefined {
  if (exitCode !== SHELL_NOT_FOUND_EXIT && exitCode !== SHELL_NOT_EXECUTABLE_EXIT) {
    return undefined;
  }
  const match = SHELL_LAUNCH_FAILURE.exec(stderr);
  if (!match) {
    return undefined;
  }
  const lineStart = stderr.lastIndexOf('\n', match.index) + 1;
  return stderr.slice(lineStart, match.index + match[0].length).trim();
}

export class SubprocessChecker implements Checker {
  private readonly projectDir: string;
  private readonly killGraceMs: number;
  private readonly maxOutputBytes: number;
  private readonly extraEnv: NodeJS.ProcessEnv;

  constructor(options: SubprocessCheckerOptions = {}) {
    this.projectDir = options.projectDir ?? process.cwd();
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.maxOutputBytes = options.maxOutputBytes ?? MAX_OUTPUT_BYTES;
    this.extraEnv = options.env ?? {};
  }

  /**
   * Run a hook and classify its outcome
   */
  async execute(hook: HookDefinition, event: LifecycleEvent): Promise<CheckResult> {
    return toCheckResult(hook, await this.run(hook, event));
  }

  run(hook: HookDefinition, event: LifecycleEvent): Promise<CheckOutcome> {
    const variables: Record<string, string> = {
      HOOKRUNNER_PROJECT_DIR: this.projectDir,
    };
    const env: NodeJS.ProcessEnv = {
      ...process.env,
      ...this.extraEnv,
      HOOK_EVENT_NAME: event.kind,
      HOOKRUNNER_PROJECT_DIR: this.projectDir,
      FILE_PATH: event.filePath ?? '',
      TOOL_NAME: event.toolName ?? '',
    };

    let file: string;
    let args: string[];
    let viaShell = false;
    if (hook.args) {
      // No shell involved, so event values are safe to substitute
      const argVariables = {
        ...variables,
        FILE_PATH: event.filePath ?? '',
        TOOL_NAME: event.toolName ?? '',
      };
      file = substituteVariables(hook.command, variables);
      args = hook.args.map((arg) => substituteVariables(arg, argVariables));
    } else {
      const isWindows = process.platform === 'win32';
      const command = substituteVariables(hook.command, variables);
      file = isWindows ? 'cmd.exe' : '/bin/sh';
      args = isWindows ? ['/c', command] : ['-c', command];
      viaShell = !isWindows;
    }

    const stdin = JSON.stringify(toStdinDocument(event, this.projectDir));
    logger.debug(TAG, `running ${hook.name} for ${event.kind}`, { file, args });

    return this.spawnProcess(hook, file, args, env, stdin, viaShell);
  }

  private spawnProcess(
    hook: HookDefinition,
    file: string,
    args: string[],
    env: NodeJS.ProcessEnv,
    stdin: string,
    viaShell: boolean,
  ): Promise<CheckOutcome> {
    return new Promise((resolve) => {
      const startTime = Date.now();
      const stdout = new BoundedOutput(this.maxOutputBytes);
      const stderr = new BoundedOutput(this.maxOutputBytes);
      let timedOut = false;
      let exited = false;
      let spawnError: string | undefined;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      // Own process group, so a timeout also reaches the shell's children
      const child = spawn(file, args, {
        cwd: this.projectDir,
        env,
        detached: process.platform !== 'win32',
      });

      const finish = (exitCode: number): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        if (killTimer) clearTimeout(killTimer);

        const outcome: CheckOutcome = {
          exitCode,
          stdout: stdout.toString(),
          stderr: stderr.toString(),
          durationMs: Date.now() - startTime,
          timedOut,
          truncated: stdout.truncated || stderr.truncated,
        };
        if (spawnError !== undefined) {
          outcome.spawnError = spawnError;
        }
        if (timedOut) {
          logger.warn(TAG, `${hook.name} timed out after ${outcome.durationMs}ms (limit ${hook.timeoutMs}ms)`);
        }
        resolve(outcome);
      };

      // A timed-out hook settles on its own 'exit'. A process that left the
      // group (setsid) may keep the pipes, and so 'close', open indefinitely.
      const abandon = (): void => {
        this.signal(child, 'SIGKILL');
        child.stdout.destroy();
        child.stderr.destroy();
        finish(TIMEOUT_EXIT_CODE);
      };

      const timeoutId = setTimeout(() => {
        timedOut = true;
        if (exited) {
          abandon();
          return;
        }
        this.signal(child, 'SIGTERM');
        killTimer = setTimeout(() => this.signal(child, 'SIGKILL'), this.killGraceMs);
      }, hook.timeoutMs);

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      // Hooks may exit without reading stdin
      child.stdin.on('error', (error) => {
        logger.debug(TAG, `stdin of ${hook.name} closed early: ${error.message}`);
      });

      child.on('error', (error) => {
        if (child.pid !== undefined) {
          logger.debug(TAG, `process error in ${hook.name}: ${error.message}`);
          return;
        }
        spawnError = error.message;
        stderr.push(Buffer.from(`Failed to start hook "${hook.name}": ${error.message}`));
        finish(SPAWN_ERROR_EXIT_CODE);
      });

      child.on('exit', () => {
        exited = true;
        if (timedOut) abandon();
      });

      child.on('close', (code) => {
        if (timedOut) {
          finish(TIMEOUT_EXIT_CODE);
          return;
        }
        const exitCode = code ?? 1;
        const launchFailure = viaShell ? shellLaunchFailure(exitCode, stderr.toString()) : undefined;
        if (launchFailure !== undefined) {
          spawnError = launchFailure;
          stderr.push(Buffer.from(`Failed to start hook "${hook.name}": shell exited ${exitCode}`));
        }
        finish(exitCode);
      });

      child.stdin.end(stdin);
    });
  }

  private signal(child: ChildProcess, signal: NodeJS.Signals): void {
    try {
      if (process.platform !== 'win32' && child.pid !== undefined) {
        process.kill(-child.pid, signal);
      } else {
        child.kill(signal);
      }
    } catch (error) {
      // ESRCH once the group has already exited
      logger.debug(TAG, `${signal} not delivered: ${errorMessage(error)}`);
    }
  }
}

/**
 * A check implemented in TypeScript rather than as an external program
 */
export type CheckFunction = (
  event: LifecycleEvent,
  hook: HookDefinition,
) => Promise<{ exitCode: number; stdout?: string; stderr?: string }>;

/**
 * Runs checks registered under a command name in-process, with the same
 * exit code and timeout contract as SubprocessChecker
 */
export class InProcessChecker implements Checker {
  private readonly checks: Map<string, CheckFunction>;

  constructor(checks: Record<string, CheckFunction> = {}) {
    this.checks = new Map(Object.entries(checks));
  }

  register(command: string, check: CheckFunction): void {
    this.checks.set(command, check);
  }

  async execute(hook: HookDefinition, event: LifecycleEvent): Promise<CheckResult> {
    return toCheckResult(hook, await this.run(hook, event));
  }

  async run(hook: HookDefinition, event: LifecycleEvent): Promise<CheckOutcome> {
    const startTime = Date.now();
    const check = this.checks.get(hook.command);
    if (!check) {
      return {
        exitCode: SPAWN_ERROR_EXIT_CODE,
        stdout: '',
        stderr: `No in-process check registered for "${hook.command}"`,
        durationMs: 0,
        timedOut: false,
        truncated: false,
        spawnError: 'not registered',
      };
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), hook.timeoutMs);
    });

    try {
      const result = await Promise.race([check(event, hook), timeout]);
      if (result === 'timeout') {
        return {
          exitCode: TIMEOUT_EXIT_CODE,
          stdout: '',
          stderr: '',
          durationMs: Date.now() - startTime,
          timedOut: true,
          truncated: false,
        };
      }
      return {
        exitCode: result.exitCode,
        stdout: result.stdout ?? '',
        stderr: result.stderr ?? '',
        durationMs: Date.now() - startTime,
        timedOut: false,
        truncated: false,
      };
    } catch (error) {
      return {
        exitCode: SPAWN_ERROR_EXIT_CODE,
        stdout: '',
        stderr: `Check "${hook.name}" threw: ${errorMessage(error)}`,
        durationMs: Date.now() - startTime,
        timedOut: false,
        truncated: false,
        spawnError: errorMessage(error),
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
