import chalk, { type ChalkInstance } from 'chalk';
import { summarizeResult } from '../core/hooks/classifier.js';
import type { HookRegistry } from '../core/hooks/registry.js';
import {
  HOOK_EVENT_TYPES,
  type CheckResult,
  type Decision,
  type HookEventType,
  type HookRunReport,
} from '../core/hooks/types.js';

const DECISION_LABELS: Record<Decision, string> = {
  allow: 'ALLOW',
  allow_with_warnings: 'ALLOW WITH WARNINGS',
  deny: 'DENY',
};

function describeExit(result: CheckResult): string {
  if (result.spawnError !== undefined) return 'failed to start';
  if (result.timedOut) return 'timed out';
  return `exit ${result.exitCode}`;
}

function decisionLabel(decision: Decision, color: ChalkInstance): string {
  const label = DECISION_LABELS[decision];
  switch (decision) {
    case 'deny':
      return color.red.bold(label);
    case 'allow_with_warnings':
      return color.yellow(label);
    default:
      return color.green(label);
  }
}

/**
 * Text report: every non-passing hook with its reason, then the decision
 */
export function formatReport(report: HookRunReport, color: ChalkInstance = chalk): string {
  const lines: string[] = [];

  for (const result of report.results) {
    if (result.classification === 'pass') continue;

    const icon = result.classification === 'block' ? color.red('✖') : color.yellow('⚠');
    lines.push(
      `${icon} ${color.bold(result.hookName)}: ${result.classification} (${describeExit(result)}, ${result.durationMs}ms)`,
    );
    for (const line of summarizeResult(result).split('\n')) {
      lines.push(`    ${line}`);
    }
  }

  const passed = report.results.filter((result) => result.classification === 'pass').length;
  lines.push(
    `Decision: ${decisionLabel(report.overall, color)} for ${report.event} ` +
      `(${report.results.length} hook(s) run, ${passed} passed)`,
  );
  return lines.join('\n');
}

export function formatReportJson(report: HookRunReport): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Registry listing for `hookrunner list`
 */
export function formatRegistry(
  registry: HookRegistry,
  events: readonly HookEventType[] = HOOK_EVENT_TYPES,
  color: ChalkInstance = chalk,
): string {
  const lines: string[] = [];
  for (const event of events) {
    const hooks = registry.getHooksForEvent(event);
    lines.push(color.bold(`${event} (${hooks.length})`));
    if (hooks.length === 0) {
      lines.push(color.dim('  (none)'));
      continue;
    }
    for (const hook of hooks) {
      const mode = hook.blocking ? color.red('blocking') : 'advisory';
      lines.push(`  - ${hook.name} matcher=${hook.matcher || '*'} ${mode} timeout=${hook.timeoutMs}ms`);
      const invocation = hook.args ? [hook.command, ...hook.args].join(' ') : hook.command;
      lines.push(`      ${color.dim(invocation)}`);
    }
  }
  return lines.join('\n');
}
