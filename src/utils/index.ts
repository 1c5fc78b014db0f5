/**
 * Utility Functions
 */

/**
 * Get environment variable with default value
 */
export function getEnv(key: string, defaultValue: string, env: NodeJS.ProcessEnv = process.env): string {
  return env[key] ?? defaultValue;
}

/**
 * Interpret an environment flag such as HOOKRUNNER_DEBUG=1
 */
export function isEnvFlagSet(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}
