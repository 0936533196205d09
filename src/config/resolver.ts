/**
 * Configuration Resolver
 *
 * Merges built-in defaults, the optional YAML file, WSL_VHD_* environment
 * variables and CLI flags (in that order of precedence, lowest first) into
 * a frozen AppConfig.
 */

import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

import { ConfigError } from '../core/errors.js';
import { getDefaultConfigFile, getDefaultTrackingFile } from '../lib/paths.js';
import { parseSize } from '../lib/size.js';
import { isFilesystemType, type FilesystemType } from '../lib/validation.js';
import { loadOptionalYamlFile, loadYamlFile } from './loader.js';
import type { AppConfig, ConfigOverrides, FileConfig } from './types.js';
import { validateConfig } from './validator.js';

/**
 * Default values when not specified anywhere
 */
export const DEFAULTS = {
  maxHistory: 50,
  historyLimit: 10,
  sleepAfterAttachSeconds: 2,
  detachTimeoutSeconds: 30,
  lockTimeoutMs: 5000,
  defaultSize: '1G',
  defaultFsType: 'ext4' as const,
};

/**
 * Environment variables read by the resolver
 */
export const ENV = {
  config: 'WSL_VHD_CONFIG',
  trackingFile: 'WSL_VHD_TRACKING_FILE',
  maxHistory: 'WSL_VHD_MAX_HISTORY',
  historyLimit: 'WSL_VHD_HISTORY_LIMIT',
  sleepAfterAttach: 'WSL_VHD_SLEEP_AFTER_ATTACH',
  detachTimeout: 'WSL_VHD_DETACH_TIMEOUT',
  lockTimeout: 'WSL_VHD_LOCK_TIMEOUT',
  defaultSize: 'WSL_VHD_DEFAULT_SIZE',
  defaultFsType: 'WSL_VHD_DEFAULT_FSTYPE',
  quiet: 'WSL_VHD_QUIET',
  debug: 'WSL_VHD_DEBUG',
  yes: 'WSL_VHD_YES',
} as const;

/**
 * Expand a path, resolving ~ to the home directory and $VAR references,
 * and making relative paths absolute.
 */
export function expandPath(
  inputPath: string,
  basePath: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  let expanded = inputPath;

  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = join(env['HOME'] ?? homedir(), expanded.slice(1));
  }

  expanded = expanded.replace(/\$([A-Za-z_][A-Za-z0-9_]*)/g, (_, varName: string) => {
    return env[varName] ?? '';
  });

  if (!isAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}

/**
 * Resolve the complete runtime configuration.
 *
 * @param overrides - Flags from the command line
 * @param env - Environment to read WSL_VHD_* variables from
 * @throws ConfigError if the file or any variable holds an invalid value
 */
export async function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<AppConfig> {
  const { fileConfig, configPath } = await loadFileConfig(overrides, env);
  const cwd = process.cwd();

  const trackingFileRaw =
    nonEmpty(env[ENV.trackingFile]) ?? fileConfig.tracking_file ?? getDefaultTrackingFile(env);

  const maxHistory =
    envInteger(env, ENV.maxHistory, 1) ?? fileConfig.max_history ?? DEFAULTS.maxHistory;
  const historyLimit =
    envInteger(env, ENV.historyLimit, 0) ?? fileConfig.history_limit ?? DEFAULTS.historyLimit;
  const sleepAfterAttach =
    envNumber(env, ENV.sleepAfterAttach) ??
    fileConfig.sleep_after_attach ??
    DEFAULTS.sleepAfterAttachSeconds;
  const detachTimeout =
    envNumber(env, ENV.detachTimeout) ?? fileConfig.detach_timeout ?? DEFAULTS.detachTimeoutSeconds;
  const lockTimeoutMs =
    envInteger(env, ENV.lockTimeout, 0) ?? fileConfig.lock_timeout_ms ?? DEFAULTS.lockTimeoutMs;

  const defaultSize =
    nonEmpty(env[ENV.defaultSize]) ?? fileConfig.default_size ?? DEFAULTS.defaultSize;
  if (parseSize(defaultSize) === null) {
    throw new ConfigError(
      `Invalid default size: ${defaultSize}`,
      'Use a size such as 500M, 1G or 10GB.'
    );
  }

  const config: AppConfig = {
    trackingFile: expandPath(trackingFileRaw, cwd, env),
    maxHistory,
    historyLimit: Math.min(historyLimit, maxHistory),
    sleepAfterAttachMs: Math.round(sleepAfterAttach * 1000),
    detachTimeoutMs: Math.round(detachTimeout * 1000),
    lockTimeoutMs,
    defaultSize,
    defaultFsType: envFsType(env) ?? fileConfig.default_fstype ?? DEFAULTS.defaultFsType,
    quiet: overrides.quiet ?? envBoolean(env, ENV.quiet) ?? false,
    debug: overrides.debug ?? envBoolean(env, ENV.debug) ?? false,
    yes: overrides.yes ?? envBoolean(env, ENV.yes) ?? false,
    json: overrides.json ?? false,
    configPath,
  };

  return Object.freeze(config);
}

/**
 * Load the YAML file named by --config or WSL_VHD_CONFIG, or the default
 * file when it exists. A file named explicitly must exist.
 */
async function loadFileConfig(
  overrides: ConfigOverrides,
  env: NodeJS.ProcessEnv
): Promise<{ fileConfig: FileConfig; configPath: string | null }> {
  const explicit = overrides.configPath ?? nonEmpty(env[ENV.config]);
  const configPath = resolve(explicit ?? getDefaultConfigFile(env));

  const loaded = explicit
    ? { data: await loadYamlFile(configPath) }
    : await loadOptionalYamlFile(configPath);
  if (loaded === undefined) {
    return { fileConfig: {}, configPath: null };
  }

  const result = validateConfig(loaded.data);
  if (!result.valid) {
    throw new ConfigError(
      `Invalid configuration file: ${configPath}`,
      'Fix the listed keys or remove them to use the defaults.',
      configPath,
      result.errors
    );
  }

  return { fileConfig: result.config, configPath };
}

// =============================================================================
// Environment Parsing
// =============================================================================

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

function envInteger(env: NodeJS.ProcessEnv, name: string, min: number): number | undefined {
  const raw = nonEmpty(env[name]);
  if (raw === undefined) {
    return undefined;
  }
  if (!/^[0-9]+$/.test(raw) || Number.parseInt(raw, 10) < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got '${raw}'`);
  }
  return Number.parseInt(raw, 10);
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = nonEmpty(env[name]);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative number, got '${raw}'`);
  }
  return value;
}

function envBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = nonEmpty(env[name])?.toLowerCase();
  if (raw === undefined) {
    return undefined;
  }
  if (raw === '1' || raw === 'true' || raw === 'yes') {
    return true;
  }
  if (raw === '0' || raw === 'false' || raw === 'no') {
    return false;
  }
  throw new ConfigError(`${name} must be true or false, got '${raw}'`);
}

function envFsType(env: NodeJS.ProcessEnv): FilesystemType | undefined {
  const raw = nonEmpty(env[ENV.defaultFsType])?.toLowerCase();
  if (raw === undefined) {
    return undefined;
  }
  if (!isFilesystemType(raw)) {
    throw new ConfigError(`${ENV.defaultFsType} names an unsupported filesystem: '${raw}'`);
  }
  return raw;
}
