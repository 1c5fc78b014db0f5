/**
 * HookRegistry
 *
 * Parses and validates a hook configuration document into an immutable,
 * ordered set of HookDefinitions grouped by event. Declaration order is
 * execution order.
 */

import type { ZodError } from 'zod';
import type { HookCommandConfig, HookGroupConfig, HooksDocument } from '../config/types.js';
import { HooksDocumentSchema } from '../config/types.js';
import { parseConfigText, readConfigFile } from '../config/loader.js';
import { ConfigError, ConfigErrorCode } from '../errors/index.js';
import { HookMatcher } from './matcher.js';
import {
  DEFAULT_TIMEOUT_MS,
  HOOK_EVENT_TYPES,
  isHookEventType,
  type HookDefinition,
  type HookEventType,
} from './types.js';

export interface RegistryOptions {
  /** Root for relative path matchers; defaults to the process cwd */
  projectDir?: string;
  /** Where the configuration came from, for messages */
  source?: string;
}

export type ConfigSource = { path: string } | { json: string } | { document: unknown };

export class HookRegistry {
  private readonly hooks: ReadonlyMap<HookEventType, readonly HookDefinition[]>;
  private readonly matcher: HookMatcher;
  readonly source?: string;
  readonly projectDir: string;

  private constructor(hooks: Map<HookEventType, HookDefinition[]>, options: RegistryOptions) {
    this.hooks = hooks;
    this.projectDir = options.projectDir ?? process.cwd();
    this.matcher = new HookMatcher(this.projectDir);
    this.source = options.source;
  }

  /**
   * Build a registry from an already-parsed configuration document
   * @throws ConfigError when the document is invalid
   */
  static fromDocument(document: unknown, options: RegistryOptions = {}): HookRegistry {
    const parsed = HooksDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid hook configuration${describeSource(options.source)}: ${formatZodError(parsed.error)}`,
        ConfigErrorCode.INVALID_SCHEMA,
        'Each event maps to an array of { matcher, hooks: [{ type: "command", command }] } groups.',
      );
    }

    const hooks = new Map<HookEventType, HookDefinition[]>();
    for (const event of HOOK_EVENT_TYPES) {
      hooks.set(event, []);
    }

    for (const [eventName, groups] of Object.entries(parsed.data.hooks)) {
      if (!isHookEventType(eventName)) {
        throw new ConfigError(
          `Unknown hook event "${eventName}"${describeSource(options.source)}`,
          ConfigErrorCode.UNKNOWN_EVENT,
          `Supported events: ${HOOK_EVENT_TYPES.join(', ')}`,
        );
      }

      const definitions = hooks.get(eventName) ?? [];
      const seen = new Set<string>();

      groups.forEach((group, groupIndex) => {
        group.hooks.forEach((hookConfig, hookIndex) => {
          const location = `${eventName}[${groupIndex}].hooks[${hookIndex}]`;
          const definition = buildDefinition(eventName, group, hookConfig, location);

          if (seen.has(definition.name)) {
            throw new ConfigError(
              `Duplicate hook name "${definition.name}" in ${eventName}`,
              ConfigErrorCode.DUPLICATE_HOOK_NAME,
              'Give each hook a distinct "name", or change its matcher or command.',
            );
          }
          seen.add(definition.name);
          definitions.push(definition);
        });
      });

      hooks.set(eventName, definitions);
    }

    return new HookRegistry(hooks, options);
  }

  /**
   * Build a registry from JSON text
   */
  static fromJson(text: string, options: RegistryOptions = {}): HookRegistry {
    return HookRegistry.fromDocument(parseConfigText(text, options.source), options);
  }

  /**
   * Build a registry from a JSON file on disk
   */
  static async fromFile(filePath: string, options: RegistryOptions = {}): Promise<HookRegistry> {
    const document = await readConfigFile(filePath);
    return HookRegistry.fromDocument(document, { ...options, source: options.source ?? filePath });
  }

  /**
   * Hooks registered for an event whose matcher applies to the given
   * tool name or file path, in declaration order
   */
  query(event: HookEventType, toolName?: string, filePath?: string): HookDefinition[] {
    return this.getHooksForEvent(event).filter((hook) =>
      this.matcher.matches(hook.matcher, { toolName, filePath }),
    );
  }

  get(event: HookEventType, name: string): HookDefinition | undefined {
    return this.getHooksForEvent(event).find((hook) => hook.name === name);
  }

  getHooksForEvent(event: HookEventType): readonly HookDefinition[] {
    return this.hooks.get(event) ?? [];
  }

  hasHooksForEvent(event: HookEventType): boolean {
    return this.getHooksForEvent(event).length > 0;
  }

  getStats(): { total: number; byEvent: Record<HookEventType, number> } {
    const byEvent: Record<HookEventType, number> = { PreToolUse: 0, PostToolUse: 0, PreCommit: 0 };
    let total = 0;
    for (const event of HOOK_EVENT_TYPES) {
      const count = this.getHooksForEvent(event).length;
      byEvent[event] = count;
      total += count;
    }
    return { total, byEvent };
  }

  /**
   * Serialize back to the configuration format. Each hook becomes its
   * own group so per-hook matcher and blocking flags survive.
   */
  toDocument(): HooksDocument {
    const document: HooksDocument = { hooks: {} };
    for (const event of HOOK_EVENT_TYPES) {
      const definitions = this.getHooksForEvent(event);
      if (definitions.length === 0) continue;

      document.hooks[event] = definitions.map((hook): HookGroupConfig => {
        const command: HookCommandConfig = {
          type: 'command',
          name: hook.name,
          command: hook.command,
          timeoutMs: hook.timeoutMs,
        };
        if (hook.args) command.args = [...hook.args];
        if (hook.description) command.description = hook.description;
        return { matcher: hook.matcher, blocking: hook.blocking, hooks: [command] };
      });
    }
    return document;
  }
}

/**
 * Load a registry from any configuration source
 */
export async function loadRegistry(
  source: ConfigSource,
  options: RegistryOptions = {},
): Promise<HookRegistry> {
  if ('path' in source) {
    return HookRegistry.fromFile(source.path, options);
  }
  if ('json' in source) {
    return HookRegistry.fromJson(source.json, options);
  }
  return HookRegistry.fromDocument(source.document, options);
}

/**
 * Name used when a hook gives none: matcher plus invocation
 */
export function deriveHookName(matcher: string, command: string, args?: readonly string[]): string {
  const invocation = args && args.length > 0 ? [command, ...args].join(' ') : command;
  return `${matcher.trim() || '*'}:${invocation}`;
}

function buildDefinition(
  event: HookEventType,
  group: HookGroupConfig,
  hookConfig: HookCommandConfig,
  location: string,
): HookDefinition {
  const command = hookConfig.command.trim();
  if (!command) {
    throw new ConfigError(
      `Empty command at ${location}`,
      ConfigErrorCode.EMPTY_COMMAND,
      'Every hook needs a non-empty "command".',
    );
  }

  const timeoutMs = hookConfig.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigError(
      `Invalid timeoutMs ${timeoutMs} at ${location}`,
      ConfigErrorCode.INVALID_TIMEOUT,
      'timeoutMs must be a positive integer number of milliseconds.',
    );
  }

  const matcher = group.matcher ?? '';
  const args = hookConfig.args ? Object.freeze([...hookConfig.args]) : undefined;
  const description = hookConfig.description ?? group.description;

  return Object.freeze({
    name: hookConfig.name ?? deriveHookName(matcher, command, args),
    event,
    matcher,
    command,
    ...(args ? { args } : {}),
    timeoutMs,
    blocking: hookConfig.blocking ?? group.blocking ?? false,
    ...(description ? { description } : {}),
  });
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

function describeSource(source?: string): string {
  return source ? ` (${source})` : '';
}
