/**
 * VHD Service
 *
 * Command logic for the VHD lifecycle. Performs OS actions through
 * VhdOperations, observes their effect through DeviceObserver, and records
 * the outcome in the TrackingStore.
 *
 * Ordering rule: the store is updated only after the OS action succeeded,
 * and a detach clears the mount points before the detach event is recorded.
 */

import type { AppConfig } from '../config/types.js';
import type { Logger } from '../lib/logger.js';
import { normalizeVhdPath, vhdFileExists } from '../lib/paths.js';
import { formatBytes, parseSize } from '../lib/size.js';
import {
  isFilesystemType,
  stripDevPrefix,
  validateDeviceName,
  validateFilesystemType,
  validateMountPoint,
  validateUuid,
  validateWindowsPath,
  type FilesystemType,
} from '../lib/validation.js';
import type { TrackingStore } from '../state/store.js';
import type { DetachEvent, Mapping } from '../state/types.js';
import type { VhdOperations } from '../wsl/client.js';
import type { DeviceObserver } from '../wsl/observer.js';
import { deviceMountPoints, type BlockDevice } from '../wsl/types.js';
import {
  InvalidInputError,
  NotFoundError,
  VhdError,
  VhdStateError,
} from './errors.js';
import { SyncReconciler, type FileExistsCheck, type ReconcileResult } from './reconciler.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Live state of a tracked VHD
 */
export type VhdState = 'detached' | 'attached (unformatted)' | 'attached' | 'mounted';

/**
 * A tracked VHD with its live state
 */
export interface VhdStatus {
  path: string;
  uuid: string;
  deviceName: string;
  mountPoints: string[];
  state: VhdState;
  lastAttached: string;
  fsType?: string;
  size?: string;
  fsAvail?: string;
  fsUse?: string;
}

export interface AttachResult {
  path: string;
  uuid: string;
  deviceName: string;
  /** True when the VHD was attached before this call */
  alreadyAttached: boolean;
}

export interface FormatResult {
  /** Tracked path of the device, when known */
  path?: string;
  deviceName: string;
  uuid: string;
  fsType: FilesystemType;
}

export interface MountResult {
  path: string;
  uuid: string;
  deviceName: string;
  mountPoint: string;
  /** True when the filesystem was already mounted there */
  alreadyMounted: boolean;
  /** True when the VHD was attached before this call */
  alreadyAttached: boolean;
}

export interface UnmountResult {
  /** Tracked path, when the filesystem is tracked */
  path?: string;
  uuid: string;
  mountPoint: string;
}

export interface CreateResult {
  path: string;
  sizeBytes: number;
  /** Set when the new VHD was formatted */
  format?: FormatResult;
}

export interface ResizeResult {
  path: string;
  requestedBytes: number;
  sizeBytes: number;
  uuid: string;
  mountPoint: string;
  backupPath: string;
  fileCount: number;
}

/**
 * Ways to name a VHD on the command line
 */
export type VhdTarget =
  | { path: string }
  | { uuid: string }
  | { deviceName: string }
  | { mountPoint: string };

export type DetachTarget = Exclude<VhdTarget, { mountPoint: string }>;
export type UnmountTarget = Exclude<VhdTarget, { deviceName: string }>;
export type FormatTarget = Extract<VhdTarget, { path: string } | { deviceName: string }>;

/**
 * Partial update applied by updateMapping()
 */
export type MappingPatch = Partial<Pick<Mapping, 'uuid' | 'deviceName' | 'mountPoints'>>;

/**
 * Collaborators of the service
 */
export interface VhdServiceDeps {
  store: TrackingStore;
  observer: DeviceObserver;
  operations: VhdOperations;
  config: AppConfig;
  logger: Logger;
  fileExists?: FileExistsCheck;
}

/**
 * Free space kept on top of the used bytes when resizing
 */
const RESIZE_HEADROOM = 1.3;

// =============================================================================
// Service
// =============================================================================

export class VhdService {
  private readonly store: TrackingStore;
  private readonly observer: DeviceObserver;
  private readonly operations: VhdOperations;
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly fileExists: FileExistsCheck;
  private readonly reconciler: SyncReconciler;

  constructor(deps: VhdServiceDeps) {
    this.store = deps.store;
    this.observer = deps.observer;
    this.operations = deps.operations;
    this.config = deps.config;
    this.logger = deps.logger;
    this.fileExists = deps.fileExists ?? vhdFileExists;
    this.reconciler = new SyncReconciler(this.store, this.observer, this.fileExists);
  }

  // ===========================================================================
  // Attach / Detach
  // ===========================================================================

  /**
   * Attach a VHD as a bare block device and track it.
   *
   * When WSL reports the VHD already attached and the tracked device is
   * still present, the tracked state is returned instead of an error.
   */
  async attach(path: string): Promise<AttachResult> {
    assertWindowsPath(path);
    await this.assertFileExists(path);

    const before = await this.observer.listBlockDevices();

    try {
      this.logger.info(`Attaching ${path}...`);
      await this.operations.attach(path);
    } catch (error) {
      if (error instanceof VhdStateError && error.code === 'ALREADY_ATTACHED') {
        const tracked = await this.findAttachedTracked(path);
        if (tracked) {
          this.logger.debug(`Already attached as ${tracked.deviceName || 'unknown device'}`);
          return tracked;
        }
        throw new VhdStateError(
          error.message,
          'ALREADY_ATTACHED',
          'The VHD is attached but not tracked. Detach it with wsl.exe --unmount and attach it again.',
          path
        );
      }
      throw error;
    }

    const deviceName = await this.observer.detectNewDeviceAfterAttach(before);
    if (!deviceName) {
      throw new NotFoundError(
        `Attached ${path} but no new block device appeared`,
        'Run lsblk to find the device, then re-run attach once it shows up.'
      );
    }
    const uuid = (await this.observer.getUUIDForDevice(deviceName)) ?? '';

    await this.releaseDeviceClaims(deviceName, path);
    await this.store.saveMapping(path, uuid, [], deviceName);
    await this.store.removeDetachHistory(path);

    this.logger.success(`Attached ${path} as /dev/${deviceName}`);
    return { path: normalizeVhdPath(path), uuid, deviceName, alreadyAttached: false };
  }

  /**
   * Detach a VHD, unmounting it first when mounted, and record the detach.
   */
  async detach(target: DetachTarget): Promise<DetachEvent> {
    const path = await this.resolveTrackedPath(target);
    const mapping = await this.store.getMapping(path);
    const uuid = mapping?.uuid ?? '';

    let deviceName = mapping?.deviceName ?? '';
    if (uuid) {
      deviceName = (await this.observer.getDeviceForUUID(uuid)) ?? deviceName;
      const mountPoint = await this.observer.getMountPoint(uuid);
      if (mountPoint) {
        this.logger.info(`Unmounting ${mountPoint}...`);
        await this.operations.unmount(mountPoint);
      }
    }

    this.logger.info(`Detaching ${path}...`);
    try {
      await this.operations.detach(path);
    } catch (error) {
      if (error instanceof VhdStateError && error.code === 'NOT_ATTACHED') {
        throw new VhdStateError(
          error.message,
          'NOT_ATTACHED',
          'Run `wsl-vhd sync` to drop stale tracking entries.',
          path
        );
      }
      throw error;
    }

    if (mapping) {
      await this.store.updateMountPoints(path, []);
    }
    const event = await this.store.saveDetachHistory(path, uuid, deviceName);

    this.logger.success(`Detached ${path}`);
    return event;
  }

  // ===========================================================================
  // Format / Mount / Unmount
  // ===========================================================================

  /**
   * Create a filesystem on an attached VHD. Any existing filesystem is lost.
   */
  async format(target: FormatTarget, fsType?: string): Promise<FormatResult> {
    const type = resolveFsType(fsType ?? this.config.defaultFsType);

    let path: string | undefined;
    let deviceName: string;
    if ('path' in target) {
      assertWindowsPath(target.path);
      path = normalizeVhdPath(target.path);
      deviceName = await this.resolveAttachedDevice(path);
    } else {
      deviceName = stripDevPrefix(target.deviceName);
      assertDeviceName(deviceName);
      path = await this.store.lookupPathByDeviceName(deviceName);
    }

    const devices = await this.observer.getBlockDevices();
    const device = devices.find((candidate) => candidate.name === deviceName);
    if (!device) {
      throw new NotFoundError(`Block device /dev/${deviceName} not found`);
    }
    if (deviceMountPoints(device).length > 0) {
      throw new VhdStateError(
        `/dev/${deviceName} is mounted at ${deviceMountPoints(device).join(', ')}`,
        'ALREADY_MOUNTED',
        'Unmount it before formatting.',
        path
      );
    }

    this.logger.info(`Formatting /dev/${deviceName} as ${type}...`);
    await this.operations.format(deviceName, type);

    const uuid = await this.observer.getUUIDForDevice(deviceName);
    if (!uuid) {
      throw new NotFoundError(`No filesystem UUID found on /dev/${deviceName} after formatting`);
    }

    if (path) {
      await this.updateMapping(path, { uuid, deviceName, mountPoints: [] });
    }

    this.logger.success(`Formatted /dev/${deviceName} (UUID ${uuid})`);
    return { path, deviceName, uuid, fsType: type };
  }

  /**
   * Mount a VHD, attaching it first when needed.
   */
  async mount(path: string, mountPoint: string): Promise<MountResult> {
    assertWindowsPath(path);
    assertMountPoint(mountPoint);
    const key = normalizeVhdPath(path);

    const attached = (await this.findAttachedTracked(key)) ?? (await this.attach(path));
    if (!attached.uuid) {
      throw new VhdStateError(
        `${path} has no filesystem`,
        'NOT_FORMATTED',
        `Format it first: wsl-vhd format --vhd-path "${path}"`,
        key
      );
    }

    const existing = await this.store.getMapping(key);
    const tracked = existing?.mountPoints ?? [];

    const current = await this.observer.getMountPoint(attached.uuid);
    if (current !== undefined && samePath(current, mountPoint)) {
      await this.updateMapping(key, {
        uuid: attached.uuid,
        deviceName: attached.deviceName,
        mountPoints: union(tracked, [mountPoint]),
      });
      this.logger.info(`Already mounted at ${mountPoint}`);
      return { ...attached, path: key, mountPoint, alreadyMounted: true };
    }

    this.logger.info(`Mounting UUID ${attached.uuid} at ${mountPoint}...`);
    await this.operations.mount(attached.uuid, mountPoint);
    await this.updateMapping(key, {
      uuid: attached.uuid,
      deviceName: attached.deviceName,
      mountPoints: union(tracked, [mountPoint]),
    });

    this.logger.success(`Mounted ${path} at ${mountPoint}`);
    return { ...attached, path: key, mountPoint, alreadyMounted: false };
  }

  /**
   * Unmount a VHD's filesystem. The VHD stays attached.
   */
  async unmount(target: UnmountTarget): Promise<UnmountResult> {
    let uuid: string;
    let path: string | undefined;

    if ('mountPoint' in target) {
      assertMountPoint(target.mountPoint);
      const found = await this.observer.findUUIDByMountPoint(target.mountPoint);
      if (!found) {
        throw new VhdStateError(`Nothing is mounted at ${target.mountPoint}`, 'NOT_MOUNTED');
      }
      uuid = found;
      path = await this.store.lookupPathByUUID(uuid);
    } else if ('uuid' in target) {
      assertUuid(target.uuid);
      uuid = target.uuid;
      path = await this.store.lookupPathByUUID(uuid);
    } else {
      assertWindowsPath(target.path);
      path = normalizeVhdPath(target.path);
      const found = await this.store.lookupUUIDByPath(path);
      if (!found) {
        throw new NotFoundError(
          `No tracked filesystem for ${target.path}`,
          'Use --mount-point or --uuid instead.'
        );
      }
      uuid = found;
    }

    const mountPoint = await this.observer.getMountPoint(uuid);
    if (!mountPoint) {
      throw new VhdStateError(`UUID ${uuid} is not mounted`, 'NOT_MOUNTED', undefined, path);
    }

    this.logger.info(`Unmounting ${mountPoint}...`);
    await this.operations.unmount(mountPoint);

    if (path && (await this.store.getMapping(path))) {
      await this.store.updateMountPoints(path, []);
    }

    this.logger.success(`Unmounted ${mountPoint}`);
    return { path, uuid, mountPoint };
  }

  // ===========================================================================
  // Create / Delete / Resize
  // ===========================================================================

  /**
   * Create a dynamic VHDX, optionally attaching and formatting it.
   */
  async create(path: string, size?: string, fsType?: string): Promise<CreateResult> {
    assertWindowsPath(path);
    const sizeBytes = parseSizeOrThrow(size ?? this.config.defaultSize);
    const type = fsType === undefined ? undefined : resolveFsType(fsType);

    if (await this.fileExists(path)) {
      throw new VhdStateError(
        `File already exists: ${path}`,
        'ALREADY_EXISTS',
        'Choose another path or delete the existing VHD.',
        normalizeVhdPath(path)
      );
    }

    this.logger.info(`Creating ${path} (${formatBytes(sizeBytes)})...`);
    await this.operations.createVhd(path, sizeBytes);
    this.logger.success(`Created ${path}`);

    if (type === undefined) {
      return { path: normalizeVhdPath(path), sizeBytes };
    }

    await this.attach(path);
    const format = await this.format({ path }, type);
    return { path: normalizeVhdPath(path), sizeBytes, format };
  }

  /**
   * Delete a detached VHD file and forget it.
   */
  async delete(path: string): Promise<void> {
    assertWindowsPath(path);
    const key = normalizeVhdPath(path);

    if (!(await this.fileExists(path))) {
      throw new NotFoundError(`VHD file not found: ${path}`);
    }
    if (await this.findAttachedTracked(key)) {
      throw new VhdStateError(
        `${path} is attached`,
        'ALREADY_ATTACHED',
        `Detach it first: wsl-vhd detach --vhd-path "${path}"`,
        key
      );
    }

    this.logger.info(`Deleting ${path}...`);
    await this.operations.deleteVhd(path);
    await this.store.removeMapping(key);
    await this.store.removeDetachHistory(key);
    this.logger.success(`Deleted ${path}`);
  }

  /**
   * Resize a mounted VHD by migrating its files to a new disk.
   *
   * A new VHD is created beside the original, formatted with the same
   * filesystem, filled with rsync and verified by file count. The original
   * is kept as `<name>_bkp.<ext>` and the new disk takes its path and mount
   * point. The size is raised to the used bytes plus 30% when smaller.
   */
  async resize(path: string, size: string): Promise<ResizeResult> {
    assertWindowsPath(path);
    const key = normalizeVhdPath(path);
    const requestedBytes = parseSizeOrThrow(size);

    const mapping = await this.store.getMapping(key);
    if (!mapping) {
      throw new NotFoundError(`${path} is not tracked`, 'Attach and mount it with wsl-vhd first.');
    }
    const mountPoint = mapping.uuid ? await this.observer.getMountPoint(mapping.uuid) : undefined;
    if (!mountPoint) {
      throw new VhdStateError(
        `${path} is not mounted`,
        'NOT_MOUNTED',
        'Mount it first; resize copies the mounted files.',
        key
      );
    }

    const usedBytes = await this.operations.getDirectoryUsage(mountPoint);
    const minimumBytes = Math.ceil(usedBytes * RESIZE_HEADROOM);
    const sizeBytes = Math.max(requestedBytes, minimumBytes);
    if (sizeBytes > requestedBytes) {
      this.logger.warning(
        `Requested size ${formatBytes(requestedBytes)} is below the files plus 30%; using ${formatBytes(sizeBytes)}`
      );
    }
    const fileCount = await this.operations.countFiles(mountPoint);

    const fsType = await this.filesystemOf(mapping.uuid);
    const tempPath = siblingPath(path, '_temp');
    const backupPath = siblingPath(path, '_bkp');
    const tempMount = `${mountPoint.replace(/\/+$/, '')}_temp`;

    for (const candidate of [tempPath, backupPath]) {
      if (await this.fileExists(candidate)) {
        throw new VhdStateError(
          `File already exists: ${candidate}`,
          'ALREADY_EXISTS',
          'Remove it before resizing.',
          key
        );
      }
    }

    await this.create(tempPath, String(sizeBytes), fsType);
    try {
      await this.mount(tempPath, tempMount);
      this.logger.info(`Copying files from ${mountPoint} to ${tempMount}...`);
      await this.operations.copyTree(mountPoint, tempMount);

      const copied = await this.operations.countFiles(tempMount);
      if (copied !== fileCount) {
        throw new VhdError(
          `File count mismatch after copy: expected ${fileCount}, found ${copied}`,
          'VERIFICATION_FAILED',
          `The original disk is untouched at ${path}.`
        );
      }
    } catch (error) {
      await this.discardVhd(tempPath);
      throw error;
    }

    await this.detach({ path });
    await this.operations.renameVhd(path, backupPath);
    await this.detach({ path: tempPath });
    await this.operations.renameVhd(tempPath, path);
    await this.store.removeMapping(tempPath);
    await this.store.removeDetachHistory(tempPath);

    const remounted = await this.mount(path, mountPoint);

    this.logger.success(`Resized ${path} to ${formatBytes(sizeBytes)}; backup kept at ${backupPath}`);
    return {
      path: key,
      requestedBytes,
      sizeBytes,
      uuid: remounted.uuid,
      mountPoint,
      backupPath,
      fileCount,
    };
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * Tracked VHDs with their live state.
   *
   * @param target - Restrict to one VHD; all tracked VHDs when omitted
   */
  async status(target?: UnmountTarget): Promise<VhdStatus[]> {
    let mappings: Mapping[];
    if (target === undefined) {
      mappings = await this.store.getAllMappings();
    } else {
      const path = await this.resolveStatusPath(target);
      const mapping = await this.store.getMapping(path);
      if (!mapping) {
        throw new NotFoundError(`${path} is not tracked`);
      }
      mappings = [mapping];
    }

    const devices = await this.observer.getBlockDevices();
    return mappings.map((mapping) => describeMapping(mapping, devices));
  }

  /**
   * Recent detach events, newest first.
   */
  async history(limit?: number, path?: string): Promise<DetachEvent[]> {
    const count = limit ?? this.config.historyLimit;
    if (!Number.isInteger(count) || count < 0) {
      throw new InvalidInputError(`Invalid history limit: ${count}`, 'limit');
    }
    if (path === undefined) {
      return this.store.getDetachHistory(count);
    }

    const key = normalizeVhdPath(path);
    const events = await this.store.getDetachHistory(this.store.getMaxHistory());
    return events.filter((event) => event.path === key).slice(0, count);
  }

  /**
   * Drop tracking records that no longer match reality.
   */
  async sync(dryRun = false): Promise<ReconcileResult> {
    return this.reconciler.reconcile({ dryRun });
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /**
   * Read-then-write merge of a mapping. Fields absent from the patch keep
   * their stored values; a missing mapping starts empty.
   */
  async updateMapping(path: string, patch: MappingPatch): Promise<Mapping> {
    const existing = await this.store.getMapping(path);
    return this.store.saveMapping(
      path,
      patch.uuid ?? existing?.uuid ?? '',
      patch.mountPoints ?? existing?.mountPoints ?? [],
      patch.deviceName ?? existing?.deviceName ?? ''
    );
  }

  private async assertFileExists(path: string): Promise<void> {
    if (!(await this.fileExists(path))) {
      throw new NotFoundError(`VHD file not found: ${path}`, 'Check the path and drive letter.');
    }
  }

  /**
   * Tracked state of a VHD whose device is still present, or undefined.
   */
  private async findAttachedTracked(path: string): Promise<AttachResult | undefined> {
    const mapping = await this.store.getMapping(path);
    if (!mapping) {
      return undefined;
    }

    if (mapping.uuid) {
      const deviceName = await this.observer.getDeviceForUUID(mapping.uuid);
      if (!deviceName) {
        return undefined;
      }
      if (deviceName !== mapping.deviceName) {
        await this.updateMapping(mapping.path, { deviceName });
      }
      return { path: mapping.path, uuid: mapping.uuid, deviceName, alreadyAttached: true };
    }

    // Unformatted: the device name is the only handle
    if (mapping.deviceName) {
      const devices = await this.observer.getBlockDevices();
      const device = devices.find((candidate) => candidate.name === mapping.deviceName);
      if (device && !device.uuid) {
        return { path: mapping.path, uuid: '', deviceName: device.name, alreadyAttached: true };
      }
    }
    return undefined;
  }

  /**
   * Clear a device name from mappings of other VHDs that still claim it.
   */
  private async releaseDeviceClaims(deviceName: string, path: string): Promise<void> {
    const key = normalizeVhdPath(path);
    for (const mapping of await this.store.getAllMappings()) {
      if (mapping.deviceName === deviceName && mapping.path !== key) {
        this.logger.debug(`Clearing stale device ${deviceName} from ${mapping.path}`);
        await this.updateMapping(mapping.path, { deviceName: '' });
      }
    }
  }

  private async resolveTrackedPath(target: DetachTarget): Promise<string> {
    if ('path' in target) {
      assertWindowsPath(target.path);
      return normalizeVhdPath(target.path);
    }

    let path: string | undefined;
    if ('uuid' in target) {
      assertUuid(target.uuid);
      path = await this.store.lookupPathByUUID(target.uuid);
    } else {
      const deviceName = stripDevPrefix(target.deviceName);
      assertDeviceName(deviceName);
      path = await this.store.lookupPathByDeviceName(deviceName);
    }

    if (!path) {
      throw new NotFoundError(
        `No tracked VHD for ${'uuid' in target ? `UUID ${target.uuid}` : `device ${target.deviceName}`}`,
        'Pass the VHD path with --vhd-path.'
      );
    }
    return path;
  }

  private async resolveStatusPath(target: UnmountTarget): Promise<string> {
    if ('path' in target) {
      return normalizeVhdPath(target.path);
    }

    let uuid: string | undefined;
    if ('uuid' in target) {
      assertUuid(target.uuid);
      uuid = target.uuid;
    } else {
      assertMountPoint(target.mountPoint);
      uuid = await this.observer.findUUIDByMountPoint(target.mountPoint);
    }

    const path = uuid ? await this.store.lookupPathByUUID(uuid) : undefined;
    if (!path) {
      const what = 'uuid' in target ? `UUID ${target.uuid}` : `mount point ${target.mountPoint}`;
      throw new NotFoundError(`No tracked VHD for ${what}`);
    }
    return path;
  }

  /**
   * Live device of an attached, tracked VHD.
   */
  private async resolveAttachedDevice(path: string): Promise<string> {
    const mapping = await this.store.getMapping(path);
    if (mapping?.uuid) {
      const live = await this.observer.getDeviceForUUID(mapping.uuid);
      if (live) {
        return live;
      }
    }
    const attached = await this.findAttachedTracked(path);
    if (!attached) {
      throw new VhdStateError(
        `${path} is not attached`,
        'NOT_ATTACHED',
        `Attach it first: wsl-vhd attach --vhd-path "${path}"`,
        path
      );
    }
    return attached.deviceName;
  }

  private async filesystemOf(uuid: string): Promise<FilesystemType> {
    const devices = await this.observer.getBlockDevices();
    const fsType = devices.find((device) => sameUuid(device.uuid, uuid))?.fstype ?? '';
    return isFilesystemType(fsType) ? fsType : this.config.defaultFsType;
  }

  /**
   * Unmount, detach and delete a VHD created during a failed operation.
   * Cleanup failures are reported and do not mask the original error.
   */
  private async discardVhd(path: string): Promise<void> {
    this.logger.warning(`Removing incomplete VHD ${path}`);
    try {
      if (await this.findAttachedTracked(normalizeVhdPath(path))) {
        await this.detach({ path });
      }
      await this.operations.deleteVhd(path);
      await this.store.removeMapping(path);
      await this.store.removeDetachHistory(path);
    } catch (cleanupError) {
      const message = cleanupError instanceof Error ? cleanupError.message : String(cleanupError);
      this.logger.error(`Cleanup of ${path} failed: ${message}`);
    }
  }
}

// =============================================================================
// Pure Helpers
// =============================================================================

/**
 * Combine a tracked mapping with the live block device table.
 */
export function describeMapping(mapping: Mapping, devices: readonly BlockDevice[]): VhdStatus {
  const device = mapping.uuid
    ? devices.find((candidate) => sameUuid(candidate.uuid, mapping.uuid))
    : devices.find((candidate) => candidate.name === mapping.deviceName && !candidate.uuid);

  const status: VhdStatus = {
    path: mapping.path,
    uuid: mapping.uuid,
    deviceName: device?.name ?? mapping.deviceName,
    mountPoints: device ? deviceMountPoints(device) : [],
    state: 'detached',
    lastAttached: mapping.lastAttached,
  };

  if (!device) {
    return status;
  }

  status.fsType = device.fstype ?? undefined;
  status.size = device.size ?? undefined;
  status.fsAvail = device.fsavail ?? undefined;
  status.fsUse = device['fsuse%'] ?? undefined;

  if (!mapping.uuid) {
    status.state = 'attached (unformatted)';
  } else if (status.mountPoints.length > 0) {
    status.state = 'mounted';
  } else {
    status.state = 'attached';
  }
  return status;
}

/**
 * Insert a suffix before the extension of a Windows path.
 *
 * @example
 * siblingPath('C:/VMs/disk.vhdx', '_bkp') // 'C:/VMs/disk_bkp.vhdx'
 */
export function siblingPath(path: string, suffix: string): string {
  const separator = Math.max(path.lastIndexOf('/'), path.lastIndexOf('\\'));
  const dot = path.lastIndexOf('.');
  if (dot <= separator + 1) {
    return `${path}${suffix}`;
  }
  return `${path.slice(0, dot)}${suffix}${path.slice(dot)}`;
}

function sameUuid(a: string | null, b: string): boolean {
  return a !== null && a.toLowerCase() === b.toLowerCase();
}

function samePath(a: string, b: string): boolean {
  return a.replace(/\/+$/, '') === b.replace(/\/+$/, '');
}

function union(existing: readonly string[], added: readonly string[]): string[] {
  const result = [...existing];
  for (const item of added) {
    if (!result.some((present) => samePath(present, item))) {
      result.push(item);
    }
  }
  return result;
}

function parseSizeOrThrow(size: string): number {
  const bytes = parseSize(size);
  if (bytes === null || bytes <= 0) {
    throw new InvalidInputError(`Invalid size: ${size}`, 'size', 'Use a size such as 500M, 1G or 10GB.');
  }
  return bytes;
}

function resolveFsType(fsType: string): FilesystemType {
  const problem = validateFilesystemType(fsType);
  const lower = fsType.toLowerCase();
  if (problem || !isFilesystemType(lower)) {
    throw new InvalidInputError(`Invalid filesystem type '${fsType}': ${problem ?? 'unsupported'}`, 'fsType');
  }
  return lower;
}

function assertWindowsPath(path: string): void {
  const problem = validateWindowsPath(path);
  if (problem) {
    throw new InvalidInputError(`Invalid VHD path '${path}': ${problem}`, 'path');
  }
}

function assertMountPoint(mountPoint: string): void {
  const problem = validateMountPoint(mountPoint);
  if (problem) {
    throw new InvalidInputError(`Invalid mount point '${mountPoint}': ${problem}`, 'mountPoint');
  }
}

function assertUuid(uuid: string): void {
  const problem = validateUuid(uuid);
  if (problem) {
    throw new InvalidInputError(`Invalid UUID '${uuid}': ${problem}`, 'uuid');
  }
}

function assertDeviceName(deviceName: string): void {
  const problem = validateDeviceName(deviceName);
  if (problem) {
    throw new InvalidInputError(`Invalid device name '${deviceName}': ${problem}`, 'deviceName');
  }
}
