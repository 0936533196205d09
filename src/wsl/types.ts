/**
 * WSL Types
 *
 * Block device records as reported by lsblk, and the results of
 * state-changing VHD operations.
 */

import { validateDeviceName } from '../lib/validation.js';

/**
 * Block device entry from `lsblk -J -o NAME,UUID,FSTYPE,MOUNTPOINTS,FSAVAIL,FSUSE%,SIZE`
 */
export interface BlockDevice {
  /** Kernel device name (e.g. sdd) */
  name: string;
  /** Filesystem UUID, or null when unformatted */
  uuid: string | null;
  /** Filesystem type, or null when unformatted */
  fstype: string | null;
  /** Mount points; lsblk reports [null] for an unmounted device */
  mountpoints: Array<string | null>;
  /** Available space (human readable) */
  fsavail?: string | null;
  /** Usage percentage (e.g. "12%") */
  'fsuse%'?: string | null;
  /** Device size (human readable) */
  size?: string | null;
}

/**
 * Root of lsblk JSON output
 */
export interface LsblkOutput {
  blockdevices: BlockDevice[];
}

/**
 * Block devices WSL itself occupies
 */
const SYSTEM_DEVICES: ReadonlySet<string> = new Set(['sda', 'sdb', 'sdc']);

/**
 * Check whether a device name belongs to a dynamically attached VHD: any
 * valid device name (sdd ... sdz, sdaa ...) except the system disks.
 */
export function isDynamicDevice(name: string): boolean {
  return validateDeviceName(name) === null && !SYSTEM_DEVICES.has(name);
}

/**
 * Get the non-empty mount points of a block device.
 */
export function deviceMountPoints(device: BlockDevice): string[] {
  return device.mountpoints.filter((mp): mp is string => typeof mp === 'string' && mp !== '');
}
