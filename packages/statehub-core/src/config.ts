/**
 * Configuration for stores, buses and hubs
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigError } from './errors.js';
import { createLogger, type Logger, type LogLevelName } from './logger.js';
import type { HandlerErrorHook } from './types.js';

export type MutationLockMode = 'shared' | 'per-type';
export type ChangeDetectionMode = 'structural' | 'reference';

export interface StateHubConfig {
  /**
   * `shared` serializes every mutation of a store behind one lock.
   * `per-type` keeps one lock per state type, so unrelated types mutate concurrently.
   */
  mutationLock: MutationLockMode;

  /**
   * How a field's before and after values are compared.
   * `structural` compares canonical encodings and sees in-place edits of nested objects;
   * `reference` compares with `Object.is` and only sees reassigned fields.
   */
  changeDetection: ChangeDetectionMode;

  /** Level of the default console logger; ignored when `logger` is given */
  logLevel: LogLevelName;

  /** Logger instance (not serialized in config files) */
  logger?: Logger;

  /** Called for every listener failure after it has been logged (not serialized in config files) */
  onHandlerError?: HandlerErrorHook;
}

/** Keys a config file may set */
export type StateHubFileConfig = Partial<Pick<StateHubConfig, 'mutationLock' | 'changeDetection' | 'logLevel'>>;

export const defaultConfig: Readonly<StateHubConfig> = Object.freeze({
  mutationLock: 'shared',
  changeDetection: 'structural',
  logLevel: 'warn',
});

const MUTATION_LOCK_MODES: readonly MutationLockMode[] = ['shared', 'per-type'];
const CHANGE_DETECTION_MODES: readonly ChangeDetectionMode[] = ['structural', 'reference'];
const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Config file name searched for by `loadConfig`
 */
export const CONFIG_FILE_NAME = 'statehub.config.json';

/**
 * Helper for typed config objects
 *
 * @example
 * ```typescript
 * const config = defineConfig({ mutationLock: 'per-type' });
 * const store = new TypedStateStore(config);
 * ```
 */
export function defineConfig(config: Partial<StateHubConfig>): Partial<StateHubConfig> {
  return config;
}

function isOneOf<T extends string>(options: readonly T[], value: unknown): value is T {
  return options.some((option) => option === value);
}

/**
 * Merge user config with defaults
 *
 * @throws {ConfigError} when an enumerated option holds an unknown value
 */
export function mergeConfig(userConfig: Partial<StateHubConfig> = {}): StateHubConfig {
  const merged: StateHubConfig = { ...defaultConfig };

  if (userConfig.mutationLock !== undefined) {
    if (!isOneOf(MUTATION_LOCK_MODES, userConfig.mutationLock)) {
      throw new ConfigError(`Unknown mutationLock "${String(userConfig.mutationLock)}"`, {
        expected: MUTATION_LOCK_MODES,
      });
    }
    merged.mutationLock = userConfig.mutationLock;
  }
  if (userConfig.changeDetection !== undefined) {
    if (!isOneOf(CHANGE_DETECTION_MODES, userConfig.changeDetection)) {
      throw new ConfigError(`Unknown changeDetection "${String(userConfig.changeDetection)}"`, {
        expected: CHANGE_DETECTION_MODES,
      });
    }
    merged.changeDetection = userConfig.changeDetection;
  }
  if (userConfig.logLevel !== undefined) {
    if (!isOneOf(LOG_LEVEL_NAMES, userConfig.logLevel)) {
      throw new ConfigError(`Unknown logLevel "${String(userConfig.logLevel)}"`, { expected: LOG_LEVEL_NAMES });
    }
    merged.logLevel = userConfig.logLevel;
  }
  if (userConfig.logger) merged.logger = userConfig.logger;
  if (userConfig.onHandlerError) merged.onHandlerError = userConfig.onHandlerError;

  return merged;
}

/**
 * The configured logger, or a console logger at `logLevel`
 */
export function resolveLogger(config: StateHubConfig): Logger {
  return config.logger ?? createLogger(config.logLevel);
}

/**
 * Read overrides from `STATEHUB_MUTATION_LOCK`, `STATEHUB_CHANGE_DETECTION` and `STATEHUB_LOG_LEVEL`
 *
 * @throws {ConfigError} when a variable holds an unknown value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): StateHubFileConfig {
  return toFileConfig(
    {
      mutationLock: env.STATEHUB_MUTATION_LOCK || undefined,
      changeDetection: env.STATEHUB_CHANGE_DETECTION || undefined,
      logLevel: env.STATEHUB_LOG_LEVEL?.toLowerCase() || undefined,
    },
    'environment',
  );
}

function readOption<T extends string>(
  raw: Record<string, unknown>,
  key: keyof StateHubFileConfig,
  options: readonly T[],
  source: string,
): T | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!isOneOf(options, value)) {
    throw new ConfigError(`Unknown ${key} "${String(value)}" in ${source}`, { expected: options });
  }
  return value;
}

function toFileConfig(raw: Record<string, unknown>, source: string): StateHubFileConfig {
  const fileConfig: StateHubFileConfig = {};
  const mutationLock = readOption(raw, 'mutationLock', MUTATION_LOCK_MODES, source);
  const changeDetection = readOption(raw, 'changeDetection', CHANGE_DETECTION_MODES, source);
  const logLevel = readOption(raw, 'logLevel', LOG_LEVEL_NAMES, source);
  if (mutationLock) fileConfig.mutationLock = mutationLock;
  if (changeDetection) fileConfig.changeDetection = changeDetection;
  if (logLevel) fileConfig.logLevel = logLevel;
  return fileConfig;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Find config file by searching up directory tree
 *
 * @param startPath - Path to start searching from
 * @returns Path to config file, or null if not found
 */
export function findConfigFile(startPath: string): string | null {
  let currentPath = startPath;

  // Search up to 10 levels to avoid infinite loops
  for (let i = 0; i < 10; i++) {
    const configPath = join(currentPath, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentPath = join(currentPath, '..');
    if (parentPath === currentPath) {
      break;
    }
    currentPath = parentPath;
  }

  return null;
}

/**
 * Load configuration from `statehub.config.json` (searched upwards from `searchPath`),
 * then apply environment overrides.
 *
 * A missing file yields the defaults. An unreadable file, invalid JSON or a non-object
 * logs a warning and yields the defaults.
 *
 * @example
 * ```typescript
 * const config = await loadConfig();
 * const hub = new StateHub(config);
 * ```
 */
export async function loadConfig(
  searchPath: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): Promise<StateHubConfig> {
  const configPath = findConfigFile(searchPath);
  const envConfig = configFromEnv(env);

  if (!configPath) {
    return mergeConfig(envConfig);
  }

  const warnings = createLogger(envConfig.logLevel ?? defaultConfig.logLevel);
  let fileConfig: StateHubFileConfig = {};
  try {
    const parsed: unknown = JSON.parse(await readFile(configPath, 'utf-8'));
    if (isRecord(parsed)) {
      fileConfig = toFileConfig(parsed, configPath);
    } else {
      warnings.warn(
        `Invalid config file at ${configPath}: expected object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`,
      );
    }
  } catch (error) {
    if (error instanceof SyntaxError) {
      warnings.warn(`Failed to parse config file at ${configPath}: ${error.message}`);
    } else {
      warnings.warn(
        `Failed to load config file at ${configPath}:`,
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  return mergeConfig({ ...fileConfig, ...envConfig });
}
