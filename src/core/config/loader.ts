import fsp from 'fs/promises';
import path from 'path';
import fs from 'fs-extra';
import type { RunnerSettings } from './types.js';
import { ConfigError, ConfigErrorCode } from '../errors/index.js';
import { getEnv, isEnvFlagSet } from '../../utils/index.js';

export const CONFIG_ENV_VAR = 'HOOKRUNNER_CONFIG';
export const DEBUG_ENV_VAR = 'HOOKRUNNER_DEBUG';
export const AUDIT_LOG_ENV_VAR = 'HOOKRUNNER_AUDIT_LOG';
export const SEQUENTIAL_ENV_VAR = 'HOOKRUNNER_SEQUENTIAL';

/**
 * Project-relative locations searched when no path is given, in order
 */
export const PROJECT_CONFIG_PATHS = [
  path.join('.hookrunner', 'hooks.json'),
  path.join('.claude', 'settings.json'),
];

export interface ResolveConfigOptions {
  /** Explicit path (e.g. from --config), wins over everything else */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Find the configuration file to load
 *
 * Lookup order:
 * 1. Explicit path
 * 2. $HOOKRUNNER_CONFIG
 * 3. ./.hookrunner/hooks.json
 * 4. ./.claude/settings.json
 */
export async function resolveConfigPath(options: ResolveConfigOptions = {}): Promise<string> {
  const cwd = options.cwd || process.cwd();
  const env = options.env ?? process.env;

  const explicit = options.configPath || env[CONFIG_ENV_VAR];
  if (explicit) {
    return path.resolve(cwd, explicit);
  }

  for (const candidate of PROJECT_CONFIG_PATHS) {
    const fullPath = path.join(cwd, candidate);
    if (await fs.pathExists(fullPath)) {
      return fullPath;
    }
  }

  throw new ConfigError(
    `No hook configuration found in ${cwd}`,
    ConfigErrorCode.CONFIG_NOT_FOUND,
    `Create ${PROJECT_CONFIG_PATHS.join(' or ')}, pass --config, or set ${CONFIG_ENV_VAR}.`,
  );
}

/**
 * Read and parse a JSON configuration file
 */
export async function readConfigFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    const stats = await fsp.stat(filePath);
    if (!stats.isFile()) {
      throw new ConfigError(
        `Config path is not a file: ${filePath}`,
        ConfigErrorCode.CONFIG_NOT_FOUND,
      );
    }
    content = await fsp.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new ConfigError(
        `Config file not found: ${filePath}`,
        ConfigErrorCode.CONFIG_NOT_FOUND,
        'Check the --config path.',
      );
    }
    throw error;
  }

  return parseConfigText(content, filePath);
}

/**
 * Parse configuration text, reporting syntax errors as ConfigError
 */
export function parseConfigText(content: string, source = '<inline>'): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(
        `Invalid JSON in config ${source}: ${error.message}`,
        ConfigErrorCode.INVALID_JSON,
        'Check the configuration file syntax.',
      );
    }
    throw error;
  }
}

/**
 * Runner settings from environment variables
 */
export function loadRunnerSettings(env: NodeJS.ProcessEnv = process.env): RunnerSettings {
  const auditLogPath = getEnv(AUDIT_LOG_ENV_VAR, '', env);
  const configPath = getEnv(CONFIG_ENV_VAR, '', env);

  return {
    debug: isEnvFlagSet(env[DEBUG_ENV_VAR]),
    parallel: !isEnvFlagSet(env[SEQUENTIAL_ENV_VAR]),
    auditLogPath: auditLogPath || undefined,
    configPath: configPath || undefined,
  };
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
