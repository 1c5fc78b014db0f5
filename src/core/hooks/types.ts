/**
 * Hook System Types
 *
 * Data model for the validation hook pipeline: configured hooks, the
 * lifecycle events they react to, and the results they produce.
 */

/**
 * All supported lifecycle events. PreToolUse fires before a file edit or
 * tool call, PostToolUse after it, PreCommit before a commit is recorded.
 */
export const HOOK_EVENT_TYPES = ['PreToolUse', 'PostToolUse', 'PreCommit'] as const;

export type HookEventType = (typeof HOOK_EVENT_TYPES)[number];

export function isHookEventType(value: string): value is HookEventType {
  return HOOK_EVENT_TYPES.some((type) => type === value);
}

/** Default per-hook timeout when the configuration gives none */
export const DEFAULT_TIMEOUT_MS = 10_000;

/** Time between SIGTERM and SIGKILL for a hook that overran its timeout */
export const DEFAULT_KILL_GRACE_MS = 2_000;

/** Upper bound on captured stdout and stderr, per stream */
export const MAX_OUTPUT_BYTES = 64 * 1024;

/** Exit code recorded for a hook killed after exceeding its timeout */
export const TIMEOUT_EXIT_CODE = -1;

/** Exit code recorded for a hook whose process could not be started */
export const SPAWN_ERROR_EXIT_CODE = -2;

/**
 * A validated, immutable hook entry
 */
export interface HookDefinition {
  /** Unique within its event */
  readonly name: string;
  readonly event: HookEventType;
  /** Tool-name regex ("Write|Edit"), file glob ("src/**\/*.ts"), or "" / "*" for all */
  readonly matcher: string;
  /** Shell command line, or the executable when `args` is set */
  readonly command: string;
  /** When present the command is executed directly, without a shell */
  readonly args?: readonly string[];
  readonly timeoutMs: number;
  /** A block from a non-blocking hook only warns */
  readonly blocking: boolean;
  readonly description?: string;
}

/**
 * A runtime occurrence to be checked
 */
export interface LifecycleEvent {
  kind: HookEventType;
  /** Tool about to run or that just ran (e.g. "Write", "Bash") */
  toolName?: string;
  /** Absolute path of the file being touched */
  filePath?: string;
  /** Free-form context, e.g. the command text for Bash */
  payload: Record<string, unknown>;
}

export type Classification = 'pass' | 'warn' | 'block';

export type Decision = 'allow' | 'allow_with_warnings' | 'deny';

/**
 * Raw outcome of running one hook, before classification
 */
export interface CheckOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  truncated: boolean;
  /** Set when the check could not run at all */
  spawnError?: string;
}

/**
 * Classified outcome of one hook against one event
 */
export interface CheckResult {
  hookName: string;
  classification: Classification;
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  spawnError?: string;
}

export interface AggregateDecision {
  overall: Decision;
  results: CheckResult[];
}

/**
 * What the runner hands back to its caller for one event
 */
export interface HookRunReport extends AggregateDecision {
  id: string;
  event: HookEventType;
  toolName?: string;
  filePath?: string;
  totalDuration: number;
}

/**
 * Stages every event passes through, in order
 */
export type LifecycleStage =
  | 'received'
  | 'matching'
  | 'executing'
  | 'classifying'
  | 'aggregated'
  | 'reported';

export type StageListener = (stage: LifecycleStage, event: LifecycleEvent) => void;

/**
 * JSON document written to a hook's stdin
 */
export interface HookStdinDocument {
  hook_event_name: HookEventType;
  tool_name: string | null;
  tool_input: {
    file_path: string | null;
    [key: string]: unknown;
  };
  cwd: string;
}
