/**
 * HookRunner
 *
 * The full pipeline for one lifecycle event:
 *   received → matching → executing → classifying → aggregated → reported
 *
 * The runner holds the current registry by reference. `reload` builds a
 * new registry and swaps the reference; dispatches already in flight keep
 * the snapshot they started with.
 */

import { v4 as uuidv4 } from 'uuid';
import type { AuditLog } from '../audit/log.js';
import { errorMessage } from '../errors/index.js';
import { logger } from '../../utils/logger.js';
import { aggregate } from './aggregator.js';
import { EventDispatcher } from './dispatcher.js';
import { SubprocessChecker, type Checker } from './executor.js';
import { loadRegistry, type ConfigSource, type HookRegistry } from './registry.js';
import type { HookRunReport, LifecycleEvent, StageListener } from './types.js';

const TAG = '[HookRunner]';

export interface HookRunnerOptions {
  /** Defaults to a SubprocessChecker rooted at the registry's project dir */
  checker?: Checker;
  parallel?: boolean;
  auditLog?: AuditLog;
  onStage?: StageListener;
}

export class HookRunner {
  private registry: HookRegistry;
  private readonly dispatcher: EventDispatcher;
  private readonly auditLog?: AuditLog;
  private readonly onStage?: StageListener;

  constructor(registry: HookRegistry, options: HookRunnerOptions = {}) {
    this.registry = registry;
    this.auditLog = options.auditLog;
    this.onStage = options.onStage;

    const checker = options.checker ?? new SubprocessChecker({ projectDir: registry.projectDir });
    this.dispatcher = new EventDispatcher(() => this.registry, checker, {
      parallel: options.parallel,
      onStage: options.onStage,
    });
  }

  getRegistry(): HookRegistry {
    return this.registry;
  }

  /**
   * Load a new configuration and swap it in. On failure the current
   * registry stays in place and the ConfigError propagates.
   */
  async reload(source: ConfigSource): Promise<HookRegistry> {
    const next = await loadRegistry(source, { projectDir: this.registry.projectDir });
    this.registry = next;
    logger.debug(TAG, `registry reloaded: ${next.getStats().total} hook(s)`);
    return next;
  }

  async run(event: LifecycleEvent): Promise<HookRunReport> {
    const startTime = Date.now();
    const { hooks, results } = await this.dispatcher.dispatchWithHooks(event);

    const decision = aggregate(results, hooks);
    this.onStage?.('aggregated', event);

    const report: HookRunReport = {
      id: uuidv4(),
      event: event.kind,
      ...(event.toolName ? { toolName: event.toolName } : {}),
      ...(event.filePath ? { filePath: event.filePath } : {}),
      overall: decision.overall,
      results: decision.results,
      totalDuration: Date.now() - startTime,
    };

    if (this.auditLog) {
      try {
        await this.auditLog.append(report);
      } catch (error) {
        // The decision stands even if it cannot be recorded
        logger.warn(TAG, `failed to write audit log ${this.auditLog.filePath}: ${errorMessage(error)}`);
      }
    }

    logger.debug(TAG, `${event.kind} → ${report.overall} (${results.length} hook(s), ${report.totalDuration}ms)`);
    this.onStage?.('reported', event);
    return report;
  }
}
