/**
 * Unit tests for Path Utilities
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import {
  normalizeVhdPath,
  toWslPath,
  vhdFileExists,
  getUserHome,
  getDefaultConfigDir,
  getDefaultTrackingFile,
  getDefaultConfigFile,
} from '../../../src/lib/paths.js';

describe('normalizeVhdPath', () => {
  it('should replace backslashes and lowercase', () => {
    assert.strictEqual(normalizeVhdPath('C:\\VMs\\Disk.VHDX'), 'c:/vms/disk.vhdx');
  });

  it('should map both separator styles to one key', () => {
    assert.strictEqual(
      normalizeVhdPath('C:/VMs/disk.vhdx'),
      normalizeVhdPath('c:\\vms\\DISK.vhdx')
    );
  });

  it('should be idempotent', () => {
    const once = normalizeVhdPath('D:\\Data\\Mixed\\Case.vhd');

    assert.strictEqual(normalizeVhdPath(once), once);
  });

  it('should leave an empty string empty', () => {
    assert.strictEqual(normalizeVhdPath(''), '');
  });
});

describe('toWslPath', () => {
  it('should map a drive letter to /mnt/<drive>', () => {
    assert.strictEqual(toWslPath('C:\\VMs\\disk.vhdx'), '/mnt/c/VMs/disk.vhdx');
  });

  it('should lowercase only the drive letter', () => {
    assert.strictEqual(toWslPath('D:/Data/Disk.vhdx'), '/mnt/d/Data/Disk.vhdx');
  });

  it('should only normalize separators without a drive', () => {
    assert.strictEqual(toWslPath('relative\\disk.vhdx'), 'relative/disk.vhdx');
  });
});

describe('vhdFileExists', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = join(tmpdir(), `wsl-vhd-paths-${randomUUID()}`);
    await mkdir(tempDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should return true for an existing file without a drive prefix', async () => {
    const file = join(tempDir, 'disk.vhdx');
    await writeFile(file, '');

    assert.strictEqual(await vhdFileExists(file), true);
  });

  it('should return false for a missing file', async () => {
    assert.strictEqual(await vhdFileExists(join(tempDir, 'missing.vhdx')), false);
  });
});

describe('default locations', () => {
  it('should use the invoking user home under sudo', () => {
    const env = { SUDO_USER: 'alice', HOME: '/root' };

    assert.strictEqual(getUserHome(env), '/home/alice');
    assert.strictEqual(getDefaultConfigDir(env), '/home/alice/.config/wsl-vhd');
  });

  it('should ignore SUDO_USER=root', () => {
    assert.strictEqual(getUserHome({ SUDO_USER: 'root', HOME: '/root' }), '/root');
  });

  it('should prefer XDG_CONFIG_HOME outside sudo', () => {
    const env = { HOME: '/home/bob', XDG_CONFIG_HOME: '/home/bob/.xdg' };

    assert.strictEqual(getDefaultConfigDir(env), '/home/bob/.xdg/wsl-vhd');
  });

  it('should name the tracking and config files inside the config dir', () => {
    const env = { HOME: '/home/bob' };

    assert.strictEqual(getDefaultTrackingFile(env), '/home/bob/.config/wsl-vhd/vhd_tracking.json');
    assert.strictEqual(getDefaultConfigFile(env), '/home/bob/.config/wsl-vhd/config.yaml');
  });
});
