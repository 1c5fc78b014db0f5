/**
 * hookrunner library entry
 *
 * ```typescript
 * const registry = await HookRegistry.fromFile('.claude/settings.json');
 * const runner = new HookRunner(registry);
 * const report = await runner.run(createLifecycleEvent('PreCommit', { filePath: 'src/app.ts' }));
 * if (report.overall === 'deny') process.exitCode = 1;
 * ```
 */

export * from './hooks/index.js';
export { AuditLog } from './audit/log.js';
export type { AuditEntry } from './audit/log.js';
export {
  resolveConfigPath,
  readConfigFile,
  parseConfigText,
  loadRunnerSettings,
  PROJECT_CONFIG_PATHS,
} from './config/loader.js';
export type { ResolveConfigOptions } from './config/loader.js';
export { HooksDocumentSchema } from './config/types.js';
export type { HooksDocument, HookGroupConfig, HookCommandConfig, RunnerSettings } from './config/types.js';
export { ConfigError, ConfigErrorCode, AggregationError } from './errors/index.js';
