/**
 * Device Observer
 *
 * Read-only view of the live block device table. Every query re-reads the
 * table; nothing is cached between calls because devices change outside
 * this program's control.
 */

import { AmbiguousError } from '../core/errors.js';
import { stripDevPrefix } from '../lib/validation.js';
import { buildGetUuid, buildListBlockDevices } from './commands.js';
import { runJson, type CommandRunner } from './executor.js';
import { deviceMountPoints, isDynamicDevice, type BlockDevice, type LsblkOutput } from './types.js';

/**
 * Queries against the live block device table.
 */
export interface DeviceObserver {
  /** Names of all top-level block devices */
  listBlockDevices(): Promise<string[]>;
  /** Full records of all top-level block devices */
  getBlockDevices(): Promise<BlockDevice[]>;
  isAttached(uuid: string): Promise<boolean>;
  isMounted(uuid: string): Promise<boolean>;
  getUUIDForDevice(deviceName: string): Promise<string | undefined>;
  getDeviceForUUID(uuid: string): Promise<string | undefined>;
  getMountPoint(uuid: string): Promise<string | undefined>;
  /**
   * @throws AmbiguousError when filesystems with different UUIDs are mounted there
   */
  findUUIDByMountPoint(mountPoint: string): Promise<string | undefined>;
  /**
   * Find the dynamic VHD device that appeared since `before` was taken.
   *
   * Racy when another VHD is attached concurrently on the host; the first
   * new device in table order wins.
   */
  detectNewDeviceAfterAttach(before: readonly string[]): Promise<string | undefined>;
}

/**
 * Options for LsblkDeviceObserver
 */
export interface LsblkDeviceObserverOptions {
  /** Delay before re-reading the table after an attach (default: 2000) */
  settleMs?: number;
  /** Sleep function, replaceable in tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * DeviceObserver backed by `lsblk -J` and `blkid`.
 */
export class LsblkDeviceObserver implements DeviceObserver {
  private readonly settleMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly runner: CommandRunner,
    options: LsblkDeviceObserverOptions = {}
  ) {
    this.settleMs = options.settleMs ?? 2000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async getBlockDevices(): Promise<BlockDevice[]> {
    const { command, args } = buildListBlockDevices();
    const output = await runJson<LsblkOutput>(this.runner, command, args);
    return parseBlockDevices(output);
  }

  async listBlockDevices(): Promise<string[]> {
    const devices = await this.getBlockDevices();
    return devices.map((device) => device.name);
  }

  async isAttached(uuid: string): Promise<boolean> {
    return (await this.findByUuid(uuid)) !== undefined;
  }

  async isMounted(uuid: string): Promise<boolean> {
    return (await this.getMountPoint(uuid)) !== undefined;
  }

  async getUUIDForDevice(deviceName: string): Promise<string | undefined> {
    const { command, args } = buildGetUuid(stripDevPrefix(deviceName));
    // blkid exits 2 when the device carries no filesystem
    const result = await this.runner.run(command, args, { allowFailure: true });
    const uuid = result.stdout.trim();
    if (result.exitCode !== 0 || uuid === '') {
      return undefined;
    }
    return uuid;
  }

  async getDeviceForUUID(uuid: string): Promise<string | undefined> {
    return (await this.findByUuid(uuid))?.name;
  }

  async getMountPoint(uuid: string): Promise<string | undefined> {
    const device = await this.findByUuid(uuid);
    return device ? deviceMountPoints(device)[0] : undefined;
  }

  async findUUIDByMountPoint(mountPoint: string): Promise<string | undefined> {
    const wanted = trimTrailingSlashes(mountPoint);
    const devices = await this.getBlockDevices();

    const uuids = new Set<string>();
    for (const device of devices) {
      if (!device.uuid) continue;
      if (deviceMountPoints(device).some((mp) => trimTrailingSlashes(mp) === wanted)) {
        uuids.add(device.uuid.toLowerCase());
      }
    }

    if (uuids.size > 1) {
      throw new AmbiguousError(
        `Several filesystems are mounted at ${mountPoint}`,
        [...uuids],
        'Specify the VHD by path or UUID instead.'
      );
    }
    return [...uuids][0];
  }

  async detectNewDeviceAfterAttach(before: readonly string[]): Promise<string | undefined> {
    const known = new Set(before.filter(isDynamicDevice));

    await this.sleep(this.settleMs);

    const after = await this.listBlockDevices();
    return after.find((name) => isDynamicDevice(name) && !known.has(name));
  }

  private async findByUuid(uuid: string): Promise<BlockDevice | undefined> {
    if (uuid === '') {
      return undefined;
    }
    const wanted = uuid.toLowerCase();
    const devices = await this.getBlockDevices();
    return devices.find((device) => device.uuid?.toLowerCase() === wanted);
  }
}

/**
 * Normalize lsblk output.
 *
 * Older lsblk releases report a single `mountpoint` instead of `mountpoints`.
 */
export function parseBlockDevices(output: LsblkOutput | null): BlockDevice[] {
  if (!output || !Array.isArray(output.blockdevices)) {
    return [];
  }
  return output.blockdevices.map((device) => {
    const legacy: unknown = Reflect.get(device, 'mountpoint');
    const mountpoints = Array.isArray(device.mountpoints)
      ? device.mountpoints
      : typeof legacy === 'string'
        ? [legacy]
        : [];
    return {
      ...device,
      uuid: device.uuid ?? null,
      fstype: device.fstype ?? null,
      mountpoints,
    };
  });
}

function trimTrailingSlashes(path: string): string {
  const trimmed = path.replace(/\/+$/, '');
  return trimmed === '' ? '/' : trimmed;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
