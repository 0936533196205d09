/**
 * Mount Unit Manager
 *
 * Creates and manages systemd services that mount a tracked VHD when the
 * WSL instance boots. Units are written to the system unit directory and
 * run `wsl-vhd mount` and `wsl-vhd umount`; enabling, disabling and
 * querying them goes through systemctl.
 */

import { access, mkdir, readdir, unlink, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';

import type { AppConfig } from '../config/types.js';
import type { Logger } from '../lib/logger.js';
import { vhdFileExists } from '../lib/paths.js';
import { validateMountPoint, validateWindowsPath } from '../lib/validation.js';
import type { TrackingStore } from '../state/store.js';
import {
  buildMountUnit,
  buildSystemctl,
  type Command,
  type SystemctlAction,
} from '../wsl/commands.js';
import { formatErrorMessage, type CommandResult, type CommandRunner } from '../wsl/executor.js';
import {
  CommandError,
  InvalidInputError,
  NotFoundError,
  PermissionError,
  VhdStateError,
} from './errors.js';
import type { FileExistsCheck } from './reconciler.js';

/**
 * Directory system units are written to
 */
const DEFAULT_UNIT_DIR = '/usr/lib/systemd/system';

/**
 * Prefix of every unit this tool creates
 */
const UNIT_PREFIX = 'wsl-vhd-mount-';

const UNIT_SUFFIX = '.service';
const UNIT_NAME_PATTERN = /^[A-Za-z0-9:_.@-]+$/;

/**
 * Collaborators of the unit manager
 */
export interface MountUnitManagerDeps {
  store: TrackingStore;
  runner: CommandRunner;
  config: AppConfig;
  logger: Logger;
  /** Program and leading arguments that start wsl-vhd */
  launcher: readonly string[];
  /** Directory units are written to (default: /usr/lib/systemd/system) */
  unitDir?: string;
  /** Whether the process runs as root (default: effective uid 0) */
  isRoot?: () => boolean;
  fileExists?: FileExistsCheck;
}

/**
 * A unit written by create()
 */
export interface CreatedUnit {
  unit: string;
  unitPath: string;
  vhdPath: string;
  mountPoint: string;
  uuid: string;
}

/**
 * State of a unit as systemctl reports it
 */
export interface UnitState {
  unit: string;
  /** e.g. enabled, disabled */
  enabled: string;
  /** e.g. active, inactive, failed */
  active: string;
}

/**
 * Turn a user-supplied name into a unit file name.
 *
 * @example
 * toUnitName('wsl-vhd-mount-data') // 'wsl-vhd-mount-data.service'
 */
export function toUnitName(name: string): string {
  const unit = name.endsWith(UNIT_SUFFIX) ? name : `${name}${UNIT_SUFFIX}`;
  const stem = unit.slice(0, -UNIT_SUFFIX.length);
  if (stem === '' || !UNIT_NAME_PATTERN.test(stem)) {
    throw new InvalidInputError(
      `Invalid service name '${name}'`,
      'name',
      'Use letters, digits and any of : _ . @ -'
    );
  }
  return unit;
}

/**
 * Default unit name for a VHD, derived from its file name.
 *
 * @example
 * defaultUnitName('C:\\VMs\\My Data.vhdx') // 'wsl-vhd-mount-my-data.service'
 */
export function defaultUnitName(vhdPath: string): string {
  const file = basename(vhdPath.replace(/\\/g, '/'));
  const stem = file
    .slice(0, file.length - extname(file).length)
    .toLowerCase()
    .replace(/[^a-z0-9_.-]/g, '-');
  return toUnitName(`${UNIT_PREFIX}${stem}`);
}

export class MountUnitManager {
  private readonly store: TrackingStore;
  private readonly runner: CommandRunner;
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly launcher: readonly string[];
  private readonly unitDir: string;
  private readonly isRoot: () => boolean;
  private readonly fileExists: FileExistsCheck;

  constructor(deps: MountUnitManagerDeps) {
    this.store = deps.store;
    this.runner = deps.runner;
    this.config = deps.config;
    this.logger = deps.logger;
    this.launcher = deps.launcher;
    this.unitDir = deps.unitDir ?? DEFAULT_UNIT_DIR;
    this.isRoot = deps.isRoot ?? (() => process.geteuid?.() === 0);
    this.fileExists = deps.fileExists ?? vhdFileExists;
  }

  /**
   * Write a unit that mounts a VHD at boot.
   *
   * The VHD must exist and be tracked with a filesystem UUID, i.e. it has
   * been formatted and mounted by this tool before.
   */
  async create(vhdPath: string, mountPoint: string, name?: string): Promise<CreatedUnit> {
    const pathProblem = validateWindowsPath(vhdPath);
    if (pathProblem) {
      throw new InvalidInputError(`Invalid VHD path '${vhdPath}': ${pathProblem}`, 'path');
    }
    const mountProblem = validateMountPoint(mountPoint);
    if (mountProblem) {
      throw new InvalidInputError(`Invalid mount point '${mountPoint}': ${mountProblem}`, 'mountPoint');
    }
    const unit = name === undefined ? defaultUnitName(vhdPath) : toUnitName(name);

    if (!(await this.fileExists(vhdPath))) {
      throw new NotFoundError(
        `VHD file not found: ${vhdPath}`,
        `Create it first: wsl-vhd create --vhd-path "${vhdPath}"`
      );
    }

    const uuid = await this.store.lookupUUIDByPath(vhdPath);
    if (uuid === undefined) {
      throw new NotFoundError(
        `${vhdPath} is not tracked with a filesystem UUID`,
        `Mount it once first: wsl-vhd mount --vhd-path "${vhdPath}" --mount-point "${mountPoint}"`
      );
    }
    this.logger.debug(`VHD is tracked with UUID ${uuid}`);

    this.requireRoot('Creating system services');
    const unitPath = join(this.unitDir, unit);
    if (await pathExists(unitPath)) {
      throw new VhdStateError(
        `Service ${unit} already exists`,
        'ALREADY_EXISTS',
        `Remove it first: sudo wsl-vhd service remove --name ${unit}`
      );
    }

    const content = buildMountUnit({
      vhdPath,
      mountPoint,
      launcher: this.launcher,
      trackingFile: this.config.trackingFile,
    });
    await mkdir(this.unitDir, { recursive: true });
    await writeFile(unitPath, content, { encoding: 'utf-8', mode: 0o644 });

    this.logger.success(`Service created: ${unit}`);
    return { unit, unitPath, vhdPath, mountPoint, uuid };
  }

  /**
   * Enable a unit so it starts on boot.
   */
  async enable(name: string): Promise<string> {
    const unit = toUnitName(name);
    this.requireRoot('Enabling system services');

    await this.systemctl('daemon-reload', undefined, { tolerate: true });
    await this.systemctl('enable', unit);
    this.logger.success(`Service enabled: ${unit}`);
    return unit;
  }

  /**
   * Disable a unit so it no longer starts on boot.
   */
  async disable(name: string): Promise<string> {
    const unit = toUnitName(name);
    this.requireRoot('Disabling system services');

    await this.systemctl('disable', unit);
    this.logger.success(`Service disabled: ${unit}`);
    return unit;
  }

  /**
   * Stop, disable and delete a unit.
   */
  async remove(name: string): Promise<string> {
    const unit = toUnitName(name);
    this.requireRoot('Removing system services');

    const unitPath = join(this.unitDir, unit);
    if (!(await pathExists(unitPath))) {
      throw new NotFoundError(`Service file not found: ${unitPath}`);
    }

    await this.systemctl('stop', unit, { tolerate: true });
    await this.systemctl('disable', unit, { tolerate: true });
    await unlink(unitPath);
    await this.systemctl('daemon-reload', undefined, { tolerate: true });

    this.logger.success(`Service removed: ${unit}`);
    return unit;
  }

  /**
   * Report whether a unit is enabled and active.
   */
  async status(name: string): Promise<UnitState> {
    const unit = toUnitName(name);
    if (!(await pathExists(join(this.unitDir, unit)))) {
      throw new NotFoundError(`Service not found: ${unit}`, 'List services with: wsl-vhd service list');
    }
    return this.stateOf(unit);
  }

  /**
   * List the units this tool created, in name order.
   */
  async list(): Promise<UnitState[]> {
    let entries: string[];
    try {
      entries = await readdir(this.unitDir);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const units = entries
      .filter((entry) => entry.startsWith(UNIT_PREFIX) && entry.endsWith(UNIT_SUFFIX))
      .sort();

    const states: UnitState[] = [];
    for (const unit of units) {
      states.push(await this.stateOf(unit));
    }
    return states;
  }

  private async stateOf(unit: string): Promise<UnitState> {
    // is-enabled and is-active exit non-zero for disabled or inactive units
    const enabled = await this.systemctl('is-enabled', unit, { tolerate: true });
    const active = await this.systemctl('is-active', unit, { tolerate: true });
    return {
      unit,
      enabled: enabled.stdout.trim() || 'unknown',
      active: active.stdout.trim() || 'unknown',
    };
  }

  private requireRoot(what: string): void {
    if (!this.isRoot()) {
      throw new PermissionError(`${what} requires root privileges`);
    }
  }

  /**
   * Run systemctl. A non-zero exit is an error unless `tolerate` is set,
   * in which case it is logged at debug level.
   */
  private async systemctl(
    action: SystemctlAction,
    unit?: string,
    options: { tolerate?: boolean } = {}
  ): Promise<CommandResult> {
    const command = buildSystemctl(action, unit);
    const result = await this.runner.run(command.command, command.args, { allowFailure: true });
    if (result.exitCode !== 0) {
      if (!options.tolerate) {
        throw failure(command, result);
      }
      this.logger.debug(`systemctl ${action} exited with code ${result.exitCode}`);
    }
    return result;
  }
}

function failure(command: Command, result: CommandResult): CommandError {
  return new CommandError(
    formatErrorMessage(command.command, result),
    'COMMAND_FAILED',
    [command.command, ...command.args].join(' '),
    result.exitCode,
    result.stderr
  );
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}
