/**
 * Command Context
 *
 * Wires configuration, logging, the command runner, the device observer,
 * the tracking store and the service together for one CLI invocation, and
 * runs command bodies with uniform error handling.
 */

import { resolveConfig } from '../config/resolver.js';
import type { AppConfig } from '../config/types.js';
import { VhdService } from '../core/service.js';
import { MountUnitManager } from '../core/units.js';
import { AmbiguousError, ConfigError, getExitCode, isVhdError } from '../core/errors.js';
import { Logger } from '../lib/logger.js';
import { TrackingStore } from '../state/store.js';
import { CommandExecutor, LsblkDeviceObserver, WslClient } from '../wsl/index.js';
import { createOutput, type OutputFormatter } from './output.js';

/**
 * Flags accepted by every command
 */
export interface GlobalOptions {
  quiet?: boolean;
  debug?: boolean;
  yes?: boolean;
  json?: boolean;
  config?: string;
}

/**
 * Everything a command body needs
 */
export interface CommandContext {
  config: AppConfig;
  logger: Logger;
  service: VhdService;
  output: OutputFormatter;
}

function createStore(config: AppConfig): TrackingStore {
  return new TrackingStore({
    filePath: config.trackingFile,
    maxHistory: config.maxHistory,
    defaultHistoryLimit: config.historyLimit,
    lockTimeoutMs: config.lockTimeoutMs,
  });
}

/**
 * Build the service stack from resolved configuration.
 */
export function createService(config: AppConfig, logger: Logger): VhdService {
  const runner = new CommandExecutor({ verbose: config.debug });

  return new VhdService({
    store: createStore(config),
    observer: new LsblkDeviceObserver(runner, { settleMs: config.sleepAfterAttachMs }),
    operations: new WslClient(runner, { detachTimeoutMs: config.detachTimeoutMs }),
    config,
    logger,
  });
}

/**
 * Build the mount unit manager. Units start this same script with the
 * running Node binary.
 */
export function createUnitManager(config: AppConfig, logger: Logger): MountUnitManager {
  const script = process.argv[1];
  if (script === undefined) {
    throw new Error('Cannot determine the wsl-vhd script path');
  }

  return new MountUnitManager({
    store: createStore(config),
    runner: new CommandExecutor({ verbose: config.debug }),
    config,
    logger,
    launcher: [process.execPath, script],
  });
}

/**
 * Run a command body and exit the process with its status.
 *
 * The body returns normally on success; any thrown error is reported
 * through the output layer and mapped to an exit code.
 */
export async function runCommand(
  name: string,
  options: GlobalOptions,
  body: (context: CommandContext) => Promise<void>
): Promise<never> {
  const output = createOutput(name, { json: options.json, quiet: options.quiet });

  try {
    const config = await resolveConfig({
      quiet: options.quiet,
      debug: options.debug,
      yes: options.yes,
      json: options.json,
      configPath: options.config,
    });
    const logger = new Logger({ quiet: config.quiet, debug: config.debug, json: config.json });
    logger.debug(`Tracking file: ${config.trackingFile}`);

    await body({ config, logger, service: createService(config, logger), output });

    output.flush();
    process.exit(output.getExitCode());
  } catch (error) {
    handleError(output, error);
  }
}

/**
 * Report an error and exit with its code.
 */
export function handleError(output: OutputFormatter, error: unknown): never {
  if (error instanceof ConfigError) {
    output.error(error.message, error);
    if (error.validationErrors) {
      output.validationErrors(error.validationErrors);
    }
  } else if (error instanceof AmbiguousError) {
    output.error(error.message, error);
    output.errorDetails({ candidates: error.candidates });
  } else if (isVhdError(error)) {
    output.error(error.message, error);
  } else if (error instanceof Error) {
    output.error(error.message);
  } else {
    output.error(String(error));
  }

  output.flush();
  process.exit(getExitCode(error));
}
