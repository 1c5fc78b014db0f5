/**
 * Hook configuration document
 *
 * Mirrors the `hooks` block of a `.claude/settings.json`:
 *
 * {
 *   "hooks": {
 *     "PreToolUse": [
 *       { "matcher": "Write|Edit", "blocking": true,
 *         "hooks": [{ "type": "command", "command": "./scripts/check-env.sh" }] }
 *     ]
 *   }
 * }
 */

import { z } from 'zod';

export const HookCommandSchema = z.object({
  type: z.literal('command').default('command'),
  command: z.string(),
  args: z.array(z.string()).optional(),
  name: z.string().min(1).optional(),
  timeoutMs: z.number().optional(),
  /** Overrides the group's blocking flag */
  blocking: z.boolean().optional(),
  description: z.string().optional(),
});

export const HookGroupSchema = z.object({
  matcher: z.string().optional(),
  blocking: z.boolean().optional(),
  description: z.string().optional(),
  hooks: z.array(HookCommandSchema),
});

// Other top-level settings keys are stripped, not rejected
export const HooksDocumentSchema = z.object({
  description: z.string().optional(),
  hooks: z.record(z.string(), z.array(HookGroupSchema)).default({}),
});

export type HookCommandConfig = z.infer<typeof HookCommandSchema>;
export type HookGroupConfig = z.infer<typeof HookGroupSchema>;
export type HooksDocument = z.infer<typeof HooksDocumentSchema>;

/**
 * Runner settings taken from the environment
 */
export interface RunnerSettings {
  debug: boolean;
  parallel: boolean;
  auditLogPath?: string;
  configPath?: string;
}
