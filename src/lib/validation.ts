/**
 * Input Validation
 *
 * Grammars for the values accepted from users and persisted in the
 * tracking database. Every function returns null when the value is valid
 * and a short reason otherwise.
 */

/**
 * Maximum accepted length for paths and mount points.
 */
export const MAX_PATH_LENGTH = 4096;

/**
 * Maximum accepted length for a device name.
 */
export const MAX_DEVICE_NAME_LENGTH = 10;

/**
 * Filesystem types accepted by format/create.
 */
export const SUPPORTED_FILESYSTEMS = [
  'ext2',
  'ext3',
  'ext4',
  'xfs',
  'btrfs',
  'ntfs',
  'vfat',
  'exfat',
] as const;

export type FilesystemType = (typeof SUPPORTED_FILESYSTEMS)[number];

const WINDOWS_PATH_PATTERN = /^[A-Za-z]:[/\\]/;
const UUID_PATTERN = /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;
// Volume serials reported by blkid for FAT/exFAT (XXXX-XXXX) and NTFS (16 hex digits)
const VOLUME_SERIAL_PATTERN = /^(?:[0-9a-fA-F]{4}-[0-9a-fA-F]{4}|[0-9a-fA-F]{16})$/;
// sd followed by one or more letters: sdd, sde, ..., sdz, sdaa, sdab
const DEVICE_NAME_PATTERN = /^sd[a-z]+$/;
const DANGEROUS_CHARS = /[`$();|&<>"'*?[\]!~]/;
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\x00-\x1f\x7f]/;

/**
 * Validate a Windows VHD path (e.g. `C:/VMs/disk.vhdx`).
 */
export function validateWindowsPath(path: string): string | null {
  if (path === '') {
    return 'path is empty';
  }
  if (path.length > MAX_PATH_LENGTH) {
    return 'path exceeds maximum length';
  }
  if (!WINDOWS_PATH_PATTERN.test(path)) {
    return 'path must start with a drive letter (e.g. C:/)';
  }
  if (DANGEROUS_CHARS.test(path) || CONTROL_CHARS.test(path)) {
    return 'path contains forbidden characters';
  }
  if (path.includes('..')) {
    return 'path contains traversal patterns';
  }
  return null;
}

/**
 * Validate a filesystem UUID.
 *
 * Accepts the RFC 4122 textual form used by ext4, xfs and btrfs, and the
 * shorter volume serials blkid reports for vfat, exfat and ntfs.
 */
export function validateUuid(uuid: string): string | null {
  if (uuid === '') {
    return 'UUID is empty';
  }
  if (!UUID_PATTERN.test(uuid) && !VOLUME_SERIAL_PATTERN.test(uuid)) {
    return 'UUID must look like xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx';
  }
  return null;
}

/**
 * Validate a block device name (`sdd`, `sde`, `sdaa`, ...).
 *
 * A leading `/dev/` is not accepted; strip it first.
 */
export function validateDeviceName(name: string): string | null {
  if (name === '') {
    return 'device name is empty';
  }
  if (name.length > MAX_DEVICE_NAME_LENGTH || !DEVICE_NAME_PATTERN.test(name)) {
    return 'device name must match sd[a-z]+';
  }
  return null;
}

/**
 * Validate an absolute Linux mount point.
 */
export function validateMountPoint(path: string): string | null {
  if (path === '') {
    return 'mount point is empty';
  }
  if (path.length > MAX_PATH_LENGTH) {
    return 'mount point exceeds maximum length';
  }
  if (!path.startsWith('/')) {
    return 'mount point must be an absolute path';
  }
  if (path !== path.trim()) {
    return 'mount point has leading or trailing whitespace';
  }
  if (DANGEROUS_CHARS.test(path) || CONTROL_CHARS.test(path) || path.includes(',')) {
    return 'mount point contains forbidden characters';
  }
  if (path.includes('..')) {
    return 'mount point contains traversal patterns';
  }
  return null;
}

/**
 * Validate a filesystem type against the supported list.
 */
export function validateFilesystemType(fsType: string): string | null {
  if (fsType === '') {
    return 'filesystem type is empty';
  }
  if (!isFilesystemType(fsType.toLowerCase())) {
    return `unsupported filesystem type (supported: ${SUPPORTED_FILESYSTEMS.join(', ')})`;
  }
  return null;
}

/**
 * Type guard for supported filesystem types.
 */
export function isFilesystemType(value: string): value is FilesystemType {
  return (SUPPORTED_FILESYSTEMS as readonly string[]).includes(value);
}

/**
 * Strip a leading `/dev/` from a device reference.
 */
export function stripDevPrefix(device: string): string {
  return device.startsWith('/dev/') ? device.slice('/dev/'.length) : device;
}
