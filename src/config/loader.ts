/**
 * Configuration Loader
 *
 * Loads the optional YAML configuration file from the filesystem.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';

import { ConfigError } from '../core/errors.js';

/**
 * Error thrown when a configuration file cannot be read or parsed
 */
export class ConfigLoadError extends ConfigError {
  constructor(
    message: string,
    public readonly filePath: string,
    public override readonly cause?: Error
  ) {
    super(message, 'Fix or remove the configuration file.', filePath);
    this.name = 'ConfigLoadError';
    Object.setPrototypeOf(this, ConfigLoadError.prototype);
  }
}

/**
 * Load and parse a YAML configuration file.
 *
 * @param filePath - Path to the YAML configuration file
 * @returns Parsed YAML content as unknown (requires validation)
 * @throws ConfigLoadError if the file cannot be read or parsed
 */
export async function loadYamlFile(filePath: string): Promise<unknown> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new ConfigLoadError(`Configuration file not found: ${filePath}`, filePath, err);
    }
    if (err.code === 'EACCES') {
      throw new ConfigLoadError(
        `Permission denied reading configuration file: ${filePath}`,
        filePath,
        err
      );
    }
    throw new ConfigLoadError(`Failed to read configuration file: ${filePath}`, filePath, err);
  }

  try {
    return yaml.load(content);
  } catch (error) {
    const err = error as yaml.YAMLException;
    throw new ConfigLoadError(`Invalid YAML syntax in ${filePath}: ${err.message}`, filePath, err);
  }
}

/**
 * Load a YAML file that may be absent.
 *
 * @returns Parsed content wrapped in `data`, or undefined when the file does
 *   not exist (an empty file parses to `{ data: undefined }`)
 */
export async function loadOptionalYamlFile(
  filePath: string
): Promise<{ data: unknown } | undefined> {
  try {
    return { data: await loadYamlFile(filePath) };
  } catch (error) {
    if (error instanceof ConfigLoadError && isMissingFile(error.cause)) {
      return undefined;
    }
    throw error;
  }
}

function isMissingFile(error: Error | undefined): boolean {
  return (error as NodeJS.ErrnoException | undefined)?.code === 'ENOENT';
}
