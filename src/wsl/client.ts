/**
 * VHD Operations
 *
 * State-changing OS actions: attach and detach through wsl.exe, mount and
 * format through sudo, image creation through qemu-img. Paths passed in
 * are Windows paths; they are converted to their WSL form where a Linux
 * tool needs the file.
 */

import { rename, unlink } from 'node:fs/promises';

import { CommandError, NotFoundError, VhdStateError } from '../core/errors.js';
import { toWslPath } from '../lib/paths.js';
import {
  buildAttach,
  buildChown,
  buildCopyTree,
  buildCreateImage,
  buildDetach,
  buildDirectoryUsage,
  buildFormat,
  buildListFiles,
  buildMakeDirectory,
  buildMount,
  buildUnmount,
  type Command,
} from './commands.js';
import {
  formatErrorMessage,
  type CommandResult,
  type CommandRunner,
  type RunOptions,
} from './executor.js';

/**
 * State-changing VHD actions.
 */
export interface VhdOperations {
  /** @throws VhdStateError ALREADY_ATTACHED when WSL reports the VHD attached */
  attach(path: string): Promise<void>;
  /** @throws VhdStateError NOT_ATTACHED when WSL does not know the VHD */
  detach(path: string): Promise<void>;
  mount(uuid: string, mountPoint: string): Promise<void>;
  unmount(mountPoint: string): Promise<void>;
  format(deviceName: string, fsType: string): Promise<void>;
  createVhd(path: string, sizeBytes: number): Promise<void>;
  deleteVhd(path: string): Promise<void>;
  renameVhd(from: string, to: string): Promise<void>;
  /** Bytes used by the files under a directory */
  getDirectoryUsage(path: string): Promise<number>;
  countFiles(path: string): Promise<number>;
  copyTree(source: string, destination: string): Promise<void>;
}

/**
 * Options for constructing a WslClient
 */
export interface WslClientOptions {
  /** Timeout for wsl.exe --unmount in milliseconds (default: 30000) */
  detachTimeoutMs?: number;
  /** Owner given to new mount points (default: $SUDO_USER or $USER) */
  owner?: string;
}

const ALREADY_ATTACHED_MARKERS = [
  'WSL_E_USER_VHD_ALREADY_ATTACHED',
  'already attached',
  'already mounted',
];

// Data copies during resize run for as long as the disk takes
const COPY_TIMEOUT_MS = 24 * 60 * 60 * 1000;

const NOT_ATTACHED_MARKERS = ['ERROR_FILE_NOT_FOUND', 'not attached', 'not mounted'];

export class WslClient implements VhdOperations {
  private readonly detachTimeoutMs: number;
  private readonly owner: string | undefined;

  constructor(
    private readonly runner: CommandRunner,
    options: WslClientOptions = {}
  ) {
    this.detachTimeoutMs = options.detachTimeoutMs ?? 30000;
    this.owner = options.owner ?? process.env['SUDO_USER'] ?? process.env['USER'];
  }

  async attach(path: string): Promise<void> {
    const result = await this.exec(buildAttach(path), { allowFailure: true });
    if (result.exitCode === 0) {
      return;
    }
    const output = combinedOutput(result);
    if (containsAny(output, ALREADY_ATTACHED_MARKERS)) {
      throw new VhdStateError(
        `VHD is already attached: ${path}`,
        'ALREADY_ATTACHED',
        undefined,
        path
      );
    }
    throw this.failure(
      buildAttach(path),
      result,
      'Check that the file is not open in Windows or attached to a Hyper-V VM.'
    );
  }

  async detach(path: string): Promise<void> {
    const command = buildDetach(path);
    const result = await this.exec(command, {
      allowFailure: true,
      timeout: this.detachTimeoutMs,
    });
    if (result.exitCode === 0) {
      return;
    }
    if (containsAny(combinedOutput(result), NOT_ATTACHED_MARKERS)) {
      throw new VhdStateError(`VHD is not attached: ${path}`, 'NOT_ATTACHED', undefined, path);
    }
    throw this.failure(command, result);
  }

  async mount(uuid: string, mountPoint: string): Promise<void> {
    await this.exec(buildMakeDirectory(mountPoint));
    await this.exec(buildMount(uuid, mountPoint));
    if (this.owner && this.owner !== 'root') {
      await this.exec(buildChown(mountPoint, this.owner));
    }
  }

  async unmount(mountPoint: string): Promise<void> {
    const command = buildUnmount(mountPoint);
    const result = await this.exec(command, { allowFailure: true });
    if (result.exitCode === 0) {
      return;
    }
    if (/not mounted/i.test(combinedOutput(result))) {
      throw new VhdStateError(`Nothing is mounted at ${mountPoint}`, 'NOT_MOUNTED');
    }
    throw this.failure(
      command,
      result,
      `Close programs using ${mountPoint}, or force it with: sudo umount -l ${mountPoint}`
    );
  }

  async format(deviceName: string, fsType: string): Promise<void> {
    await this.exec(buildFormat(deviceName, fsType), { timeout: 300000 });
  }

  async createVhd(path: string, sizeBytes: number): Promise<void> {
    await this.exec(buildCreateImage(toWslPath(path), sizeBytes));
  }

  async deleteVhd(path: string): Promise<void> {
    try {
      await unlink(toWslPath(path));
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new NotFoundError(`VHD file not found: ${path}`);
      }
      throw error;
    }
  }

  async renameVhd(from: string, to: string): Promise<void> {
    await rename(toWslPath(from), toWslPath(to));
  }

  async getDirectoryUsage(path: string): Promise<number> {
    const result = await this.exec(buildDirectoryUsage(path), { timeout: 600000 });
    // du -sb prints "<bytes>\t<path>"
    const bytes = Number.parseInt(result.stdout.trim().split(/\s+/)[0] ?? '', 10);
    return Number.isNaN(bytes) ? 0 : bytes;
  }

  async countFiles(path: string): Promise<number> {
    const result = await this.exec(buildListFiles(path), { timeout: 600000 });
    return result.stdout.split('\n').filter((line) => line.trim() !== '').length;
  }

  async copyTree(source: string, destination: string): Promise<void> {
    await this.exec(buildCopyTree(source, destination), { timeout: COPY_TIMEOUT_MS });
  }

  private exec(command: Command, options?: RunOptions): Promise<CommandResult> {
    return this.runner.run(command.command, command.args, options);
  }

  private failure(command: Command, result: CommandResult, suggestion?: string): CommandError {
    return new CommandError(
      formatErrorMessage(command.command, result),
      'COMMAND_FAILED',
      [command.command, ...command.args].join(' '),
      result.exitCode,
      result.stderr,
      suggestion
    );
  }
}

function combinedOutput(result: CommandResult): string {
  return `${result.stdout}\n${result.stderr}`.trim();
}

function containsAny(output: string, markers: readonly string[]): boolean {
  const lower = output.toLowerCase();
  return markers.some((marker) => lower.includes(marker.toLowerCase()));
}
