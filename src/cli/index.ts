import path from 'path';
import chalk from 'chalk';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { AuditLog } from '../core/audit/log.js';
import { loadRunnerSettings, resolveConfigPath } from '../core/config/loader.js';
import type { RunnerSettings } from '../core/config/types.js';
import { AggregationError, ConfigError } from '../core/errors/index.js';
import { createLifecycleEvent, parseHostEvent } from '../core/hooks/event.js';
import { HookRegistry } from '../core/hooks/registry.js';
import { HookRunner } from '../core/hooks/runner.js';
import { HOOK_EVENT_TYPES, type HookEventType, type LifecycleEvent } from '../core/hooks/types.js';
import { logger } from '../utils/logger.js';
import { formatRegistry, formatReport, formatReportJson } from './report.js';

export const VERSION = '0.1.0';

/**
 * Process exit codes. DENY is what git hooks and CI branch on.
 */
export const EXIT_CODES = {
  ALLOW: 0,
  DENY: 1,
  USAGE: 64,
  INTERNAL: 70,
  CONFIG: 78,
} as const;

export interface CliIO {
  writeOut(text: string): void;
  writeErr(text: string): void;
  readStdin(): Promise<string>;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

interface CommonOptions {
  config?: string;
  json?: boolean;
  debug?: boolean;
}

interface CheckOptions extends CommonOptions {
  event?: HookEventType;
  tool?: string;
  file?: string;
  payload?: Record<string, unknown>;
  stdin?: boolean;
  sequential?: boolean;
  auditLog?: string;
}

interface ListOptions extends CommonOptions {
  event?: HookEventType;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export function processIO(): CliIO {
  return {
    writeOut: (text) => process.stdout.write(text),
    writeErr: (text) => process.stderr.write(text),
    readStdin: readProcessStdin,
    cwd: process.cwd(),
    env: process.env,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parsePayload(value: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new InvalidArgumentError('Payload must be valid JSON.');
  }
  if (!isRecord(parsed)) {
    throw new InvalidArgumentError('Payload must be a JSON object.');
  }
  return parsed;
}

async function loadProjectRegistry(
  configPath: string | undefined,
  io: CliIO,
): Promise<{ registry: HookRegistry; configPath: string }> {
  const resolved = await resolveConfigPath({ configPath, cwd: io.cwd, env: io.env });
  const registry = await HookRegistry.fromFile(resolved, { projectDir: io.cwd });
  logger.debug('[CLI]', `loaded ${registry.getStats().total} hook(s) from ${resolved}`);
  return { registry, configPath: resolved };
}

function buildEvent(options: CheckOptions, stdinText: string | undefined, io: CliIO): LifecycleEvent {
  if (stdinText !== undefined) {
    const event = parseHostEvent(stdinText, options.event);
    // Explicit flags win over the piped document
    if (options.event) event.kind = options.event;
    if (options.tool) event.toolName = options.tool;
    if (options.file) event.filePath = path.resolve(io.cwd, options.file);
    if (options.payload) event.payload = { ...event.payload, ...options.payload };
    return event;
  }

  if (!options.event) {
    throw new UsageError(`--event is required unless --stdin is given (one of ${HOOK_EVENT_TYPES.join(', ')})`);
  }
  return createLifecycleEvent(options.event, {
    toolName: options.tool,
    filePath: options.file,
    payload: options.payload,
    cwd: io.cwd,
  });
}

async function runCheck(options: CheckOptions, io: CliIO, settings: RunnerSettings): Promise<number> {
  const stdinText = options.stdin ? await io.readStdin() : undefined;
  const event = buildEvent(options, stdinText, io);

  const { registry } = await loadProjectRegistry(options.config ?? settings.configPath, io);
  const auditLogPath = options.auditLog ?? settings.auditLogPath;
  const runner = new HookRunner(registry, {
    parallel: settings.parallel && !options.sequential,
    auditLog: auditLogPath ? new AuditLog(path.resolve(io.cwd, auditLogPath)) : undefined,
  });

  const report = await runner.run(event);
  io.writeOut((options.json ? formatReportJson(report) : formatReport(report)) + '\n');
  return report.overall === 'deny' ? EXIT_CODES.DENY : EXIT_CODES.ALLOW;
}

async function runList(options: ListOptions, io: CliIO, settings: RunnerSettings): Promise<number> {
  const { registry } = await loadProjectRegistry(options.config ?? settings.configPath, io);
  if (options.json) {
    io.writeOut(JSON.stringify(registry.toDocument(), null, 2) + '\n');
  } else {
    const events = options.event ? [options.event] : HOOK_EVENT_TYPES;
    io.writeOut(formatRegistry(registry, events) + '\n');
  }
  return EXIT_CODES.ALLOW;
}

async function runValidate(options: CommonOptions, io: CliIO, settings: RunnerSettings): Promise<number> {
  const { registry, configPath } = await loadProjectRegistry(options.config ?? settings.configPath, io);
  const { total, byEvent } = registry.getStats();
  const counts = HOOK_EVENT_TYPES.map((event) => `${event}: ${byEvent[event]}`).join(', ');
  io.writeOut(`${chalk.green('Configuration OK')}: ${configPath}\n  ${counts} (${total} total)\n`);
  return EXIT_CODES.ALLOW;
}

function reportError(error: unknown, io: CliIO): number {
  if (error instanceof CommanderError) {
    // Commander already printed its own message
    return error.exitCode === 0 ? EXIT_CODES.ALLOW : EXIT_CODES.USAGE;
  }
  if (error instanceof UsageError) {
    io.writeErr(chalk.red(`error: ${error.message}`) + '\n');
    return EXIT_CODES.USAGE;
  }
  if (error instanceof ConfigError) {
    io.writeErr(chalk.red(`Configuration error [${error.code}]: ${error.message}`) + '\n');
    if (error.suggestion) {
      io.writeErr(chalk.dim(error.suggestion) + '\n');
    }
    return EXIT_CODES.CONFIG;
  }
  if (error instanceof AggregationError) {
    io.writeErr(chalk.red(`Internal error: ${error.message}`) + '\n');
    return EXIT_CODES.INTERNAL;
  }
  const message = error instanceof Error ? error.message : String(error);
  io.writeErr(chalk.red('Fatal Error: ') + message + '\n');
  return EXIT_CODES.INTERNAL;
}

/**
 * Run the CLI and return the process exit code
 */
export async function main(argv: string[] = process.argv, io: CliIO = processIO()): Promise<number> {
  const settings = loadRunnerSettings(io.env);
  logger.setDebug(settings.debug);

  let exitCode: number = EXIT_CODES.ALLOW;
  const eventOption = () =>
    new Option('-e, --event <event>', 'lifecycle event').choices(HOOK_EVENT_TYPES);

  const program = new Command();
  program
    .name('hookrunner')
    .description('Run validation hooks for edit and commit lifecycle events')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.writeOut(text),
      writeErr: (text) => io.writeErr(text),
    });

  program
    .command('check')
    .description('Run the hooks matching one lifecycle event and print the decision')
    .addOption(eventOption())
    .option('-t, --tool <name>', 'tool name, e.g. Write or Bash')
    .option('-f, --file <path>', 'file being touched')
    .option('-p, --payload <json>', 'extra tool input as a JSON object', parsePayload)
    .option('--stdin', 'read the event document from standard input')
    .option('--json', 'print the report as JSON')
    .option('-c, --config <path>', 'hook configuration file')
    .option('--sequential', 'run matched hooks one at a time')
    .option('--audit-log <path>', 'append every decision to a JSONL file')
    .option('--debug', 'verbose logging on stderr')
    .action(async (options: CheckOptions) => {
      if (options.debug) logger.setDebug(true);
      exitCode = await runCheck(options, io, settings);
    });

  program
    .command('list')
    .description('List configured hooks')
    .addOption(eventOption())
    .option('--json', 'print the configuration as JSON')
    .option('-c, --config <path>', 'hook configuration file')
    .action(async (options: ListOptions) => {
      exitCode = await runList(options, io, settings);
    });

  program
    .command('validate')
    .description('Load and validate the hook configuration')
    .option('-c, --config <path>', 'hook configuration file')
    .action(async (options: CommonOptions) => {
      exitCode = await runValidate(options, io, settings);
    });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (error) {
    return reportError(error, io);
  }
}
