/**
 * Path Utilities
 *
 * Normalization of VHD paths into tracking keys, Windows-to-WSL path
 * conversion, and default locations for configuration and tracking files.
 */

import { access } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Directory name used under the user's configuration directory.
 */
export const APP_DIR_NAME = 'wsl-vhd';

/**
 * Normalize a VHD path into its tracking key.
 *
 * Backslashes become forward slashes and the whole string is lowercased,
 * so `C:\VMs\disk.vhdx` and `c:/vms/disk.vhdx` share one key.
 *
 * @param rawPath - Path as supplied by the user or a script
 * @returns Normalized path (e.g. `c:/vms/disk.vhdx`)
 */
export function normalizeVhdPath(rawPath: string): string {
  return rawPath.replace(/\\/g, '/').toLowerCase();
}

/**
 * Convert a Windows path to the path under which WSL sees it.
 *
 * @example
 * toWslPath('C:\\VMs\\disk.vhdx') // '/mnt/c/VMs/disk.vhdx'
 */
export function toWslPath(windowsPath: string): string {
  const path = windowsPath.replace(/\\/g, '/');
  if (/^[A-Za-z]:/.test(path)) {
    const drive = path.charAt(0).toLowerCase();
    return `/mnt/${drive}${path.slice(2)}`;
  }
  return path;
}

/**
 * Check whether the VHD file behind a Windows path exists.
 */
export async function vhdFileExists(windowsPath: string): Promise<boolean> {
  try {
    await access(toWslPath(windowsPath));
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve the home directory of the invoking user.
 *
 * Under sudo the invoking user's home is used, so that root and the user
 * share one tracking database.
 */
export function getUserHome(env: NodeJS.ProcessEnv = process.env): string {
  const sudoUser = env['SUDO_USER'];
  if (sudoUser && sudoUser !== 'root') {
    return join('/home', sudoUser);
  }
  return env['HOME'] ?? homedir();
}

/**
 * Get the configuration directory: `$XDG_CONFIG_HOME/wsl-vhd` or
 * `~/.config/wsl-vhd`.
 */
export function getDefaultConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env['XDG_CONFIG_HOME'];
  if (xdg && !env['SUDO_USER']) {
    return join(xdg, APP_DIR_NAME);
  }
  return join(getUserHome(env), '.config', APP_DIR_NAME);
}

/**
 * Get the default tracking database path.
 */
export function getDefaultTrackingFile(env: NodeJS.ProcessEnv = process.env): string {
  return join(getDefaultConfigDir(env), 'vhd_tracking.json');
}

/**
 * Get the default YAML configuration file path.
 */
export function getDefaultConfigFile(env: NodeJS.ProcessEnv = process.env): string {
  return join(getDefaultConfigDir(env), 'config.yaml');
}
