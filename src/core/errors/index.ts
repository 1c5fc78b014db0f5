export enum ConfigErrorCode {
  INVALID_JSON = 'INVALID_JSON',
  INVALID_SCHEMA = 'INVALID_SCHEMA',
  UNKNOWN_EVENT = 'UNKNOWN_EVENT',
  EMPTY_COMMAND = 'EMPTY_COMMAND',
  INVALID_TIMEOUT = 'INVALID_TIMEOUT',
  DUPLICATE_HOOK_NAME = 'DUPLICATE_HOOK_NAME',
  CONFIG_NOT_FOUND = 'CONFIG_NOT_FOUND',
}

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly suggestion?: string;

  constructor(message: string, code: ConfigErrorCode, suggestion?: string) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.suggestion = suggestion;

    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Raised when a check result cannot be traced back to the hook that
 * produced it. This is a bug in the pipeline, never a configuration issue.
 */
export class AggregationError extends Error {
  public readonly hookName: string;

  constructor(hookName: string) {
    super(`Check result references unknown hook "${hookName}"`);
    this.name = 'AggregationError';
    this.hookName = hookName;

    Object.setPrototypeOf(this, AggregationError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
