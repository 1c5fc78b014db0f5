/**
 * Hooks Module
 *
 * Validation hooks for PreToolUse, PostToolUse and PreCommit events.
 */

export * from './types.js';
export { HookMatcher, isPathPattern, isMatchAll } from './matcher.js';
export type { MatchTarget } from './matcher.js';
export { HookRegistry, loadRegistry, deriveHookName } from './registry.js';
export type { ConfigSource, RegistryOptions } from './registry.js';
export { classify, toCheckResult, summarizeResult } from './classifier.js';
export {
  SubprocessChecker,
  InProcessChecker,
  substituteVariables,
  truncationMarker,
  shellLaunchFailure,
} from './executor.js';
export type { Checker, CheckFunction, SubprocessCheckerOptions } from './executor.js';
export { createLifecycleEvent, parseHostEvent, toStdinDocument } from './event.js';
export type { LifecycleEventInit } from './event.js';
export { EventDispatcher } from './dispatcher.js';
export type { DispatcherOptions, DispatchOutcome, RegistryProvider } from './dispatcher.js';
export { aggregate } from './aggregator.js';
export { HookRunner } from './runner.js';
export type { HookRunnerOptions } from './runner.js';
