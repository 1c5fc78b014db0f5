/**
 * Lifecycle events and their wire form
 *
 * Hooks receive the event on stdin as
 *   { "hook_event_name", "tool_name", "tool_input": { "file_path", ... }, "cwd" }
 * which is also the document a host may pipe into `hookrunner check --stdin`.
 */

import path from 'path';
import { z } from 'zod';
import { ConfigError, ConfigErrorCode } from '../errors/index.js';
import {
  HOOK_EVENT_TYPES,
  isHookEventType,
  type HookEventType,
  type HookStdinDocument,
  type LifecycleEvent,
} from './types.js';

export interface LifecycleEventInit {
  toolName?: string;
  filePath?: string;
  payload?: Record<string, unknown>;
  /** Base for relative file paths */
  cwd?: string;
}

export function createLifecycleEvent(kind: HookEventType, init: LifecycleEventInit = {}): LifecycleEvent {
  const event: LifecycleEvent = { kind, payload: { ...(init.payload ?? {}) } };
  if (init.toolName) {
    event.toolName = init.toolName;
  }
  if (init.filePath) {
    event.filePath = path.resolve(init.cwd ?? process.cwd(), init.filePath);
  }
  return event;
}

export function toStdinDocument(event: LifecycleEvent, cwd: string): HookStdinDocument {
  return {
    hook_event_name: event.kind,
    tool_name: event.toolName ?? null,
    tool_input: {
      ...event.payload,
      file_path: event.filePath ?? null,
    },
    cwd,
  };
}

const HostEventSchema = z.object({
  hook_event_name: z.string().optional(),
  tool_name: z.string().nullable().optional(),
  tool_input: z.record(z.string(), z.unknown()).nullable().optional(),
  cwd: z.string().optional(),
});

/**
 * Parse an event document sent by the host. `fallbackKind` is used when
 * the document carries no event name.
 */
export function parseHostEvent(text: string, fallbackKind?: HookEventType): LifecycleEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(
      `Invalid event JSON on stdin: ${error instanceof Error ? error.message : String(error)}`,
      ConfigErrorCode.INVALID_JSON,
    );
  }

  const parsed = HostEventSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid event document: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
      ConfigErrorCode.INVALID_SCHEMA,
    );
  }

  const document = parsed.data;
  const kindName = document.hook_event_name ?? fallbackKind;
  if (!kindName || !isHookEventType(kindName)) {
    throw new ConfigError(
      `Unknown hook event "${kindName ?? ''}" in event document`,
      ConfigErrorCode.UNKNOWN_EVENT,
      `Supported events: ${HOOK_EVENT_TYPES.join(', ')}`,
    );
  }

  const { file_path: filePath, ...payload } = document.tool_input ?? {};
  return createLifecycleEvent(kindName, {
    toolName: document.tool_name ?? undefined,
    filePath: typeof filePath === 'string' ? filePath : undefined,
    payload,
    cwd: document.cwd,
  });
}
