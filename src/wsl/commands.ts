/**
 * Command Builders
 *
 * Builds argument vectors for the external commands used by the observer
 * and the VHD operations. Arguments are passed to spawn() directly, never
 * through a shell.
 */

/**
 * A command with its arguments
 */
export interface Command {
  command: string;
  args: string[];
}

/**
 * Columns requested from lsblk
 */
export const LSBLK_COLUMNS = 'NAME,UUID,FSTYPE,MOUNTPOINTS,FSAVAIL,FSUSE%,SIZE';

export function buildListBlockDevices(): Command {
  return { command: 'lsblk', args: ['-J', '-o', LSBLK_COLUMNS] };
}

export function buildGetUuid(deviceName: string): Command {
  return {
    command: 'sudo',
    args: ['blkid', '-s', 'UUID', '-o', 'value', `/dev/${deviceName}`],
  };
}

export function buildAttach(windowsPath: string): Command {
  return { command: 'wsl.exe', args: ['--mount', '--vhd', windowsPath, '--bare'] };
}

export function buildDetach(windowsPath: string): Command {
  return { command: 'wsl.exe', args: ['--unmount', windowsPath] };
}

export function buildMount(uuid: string, mountPoint: string): Command {
  return { command: 'sudo', args: ['mount', `UUID=${uuid}`, mountPoint] };
}

export function buildUnmount(mountPoint: string): Command {
  return { command: 'sudo', args: ['umount', mountPoint] };
}

export function buildMakeDirectory(path: string): Command {
  return { command: 'sudo', args: ['mkdir', '-p', path] };
}

export function buildChown(path: string, user: string): Command {
  return { command: 'sudo', args: ['chown', `${user}:${user}`, path] };
}

export function buildFormat(deviceName: string, fsType: string): Command {
  return { command: 'sudo', args: ['mkfs', '-t', fsType, `/dev/${deviceName}`] };
}

export function buildCreateImage(wslPath: string, sizeBytes: number): Command {
  return {
    command: 'qemu-img',
    args: ['create', '-f', 'vhdx', '-o', 'subformat=dynamic', wslPath, String(sizeBytes)],
  };
}

export function buildDirectoryUsage(path: string): Command {
  return { command: 'sudo', args: ['du', '-sb', path] };
}

export function buildListFiles(path: string): Command {
  return { command: 'sudo', args: ['find', path, '-type', 'f'] };
}

export function buildCopyTree(source: string, destination: string): Command {
  return { command: 'sudo', args: ['rsync', '-a', `${source}/`, `${destination}/`] };
}

// =============================================================================
// systemd
// =============================================================================

export type SystemctlAction =
  | 'daemon-reload'
  | 'enable'
  | 'disable'
  | 'stop'
  | 'is-enabled'
  | 'is-active';

export function buildSystemctl(action: SystemctlAction, unit?: string): Command {
  return { command: 'systemctl', args: unit === undefined ? [action] : [action, unit] };
}

/**
 * What a mount unit runs and for which VHD
 */
export interface MountUnitSpec {
  /** Windows path of the VHD */
  vhdPath: string;
  mountPoint: string;
  /** Program and leading arguments that start wsl-vhd */
  launcher: readonly string[];
  /** Tracking file the unit's commands use */
  trackingFile: string;
}

const UNIT_SEARCH_PATH = [
  '/usr/local/sbin',
  '/usr/local/bin',
  '/usr/sbin',
  '/usr/bin',
  '/sbin',
  '/bin',
  '/mnt/c/WINDOWS/system32',
  '/mnt/c/WINDOWS',
].join(':');

/**
 * Quote one word of a unit file command line or assignment.
 */
export function quoteUnitWord(word: string): string {
  const escaped = word.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/%/g, '%%');
  return `"${escaped}"`;
}

/**
 * Name of the systemd mount unit for the drive a Windows path lives on,
 * e.g. mnt-d.mount for D:/disks/data.vhdx.
 */
export function driveMountUnit(windowsPath: string): string {
  const drive = /^([A-Za-z]):/.exec(windowsPath)?.[1] ?? 'c';
  return `mnt-${drive.toLowerCase()}.mount`;
}

/**
 * Build the content of a oneshot service that mounts a VHD at boot and
 * unmounts it on stop.
 */
export function buildMountUnit(spec: MountUnitSpec): string {
  const vhdPath = spec.vhdPath.replace(/\\/g, '/');
  const driveUnit = driveMountUnit(vhdPath);
  const launcher = spec.launcher.map(quoteUnitWord).join(' ');
  const mountPoint = quoteUnitWord(spec.mountPoint);

  return [
    '[Unit]',
    `Description=Auto-mount VHD: ${vhdPath.replace(/%/g, '%%')}`,
    `After=local-fs.target ${driveUnit}`,
    `Requires=${driveUnit}`,
    'Before=network.target',
    '',
    '[Service]',
    'Type=oneshot',
    'RemainAfterExit=yes',
    `Environment=${quoteUnitWord(`PATH=${UNIT_SEARCH_PATH}`)}`,
    `Environment=${quoteUnitWord(`WSL_VHD_TRACKING_FILE=${spec.trackingFile}`)}`,
    `ExecStart=${launcher} mount --vhd-path ${quoteUnitWord(vhdPath)} --mount-point ${mountPoint}`,
    `ExecStop=${launcher} umount --mount-point ${mountPoint}`,
    'TimeoutStartSec=60',
    'TimeoutStopSec=30',
    '',
    '[Install]',
    'WantedBy=multi-user.target',
    '',
  ].join('\n');
}
