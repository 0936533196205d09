/**
 * Unit tests for the Mount Unit Manager
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import {
  CommandError,
  InvalidInputError,
  NotFoundError,
  PermissionError,
  VhdStateError,
} from '../../../src/core/errors.js';
import { MountUnitManager, defaultUnitName, toUnitName } from '../../../src/core/units.js';
import { createSilentLogger } from '../../../src/lib/logger.js';
import { FakeRunner, fail, ok } from '../../helpers/fake-runner.js';
import { createHarness, type Harness } from '../../helpers/harness.js';

const DATA = 'D:\\VMs\\Data Disk.vhdx';
const UUID_A = '11111111-2222-4333-8444-555555555555';
const LAUNCHER = ['/usr/bin/node', '/opt/wsl-vhd/dist/cli/index.js'];
const DATA_UNIT = 'wsl-vhd-mount-data-disk.service';

describe('unit names', () => {
  it('should derive the default name from the VHD file name', () => {
    assert.strictEqual(defaultUnitName(DATA), DATA_UNIT);
    assert.strictEqual(defaultUnitName('C:/disks/backup+old.vhd'), 'wsl-vhd-mount-backup-old.service');
  });

  it('should add the .service suffix once', () => {
    assert.strictEqual(toUnitName('wsl-vhd-mount-data'), 'wsl-vhd-mount-data.service');
    assert.strictEqual(toUnitName('wsl-vhd-mount-data.service'), 'wsl-vhd-mount-data.service');
  });

  it('should refuse names that are not unit names', () => {
    assert.throws(() => toUnitName('../../etc/passwd'), InvalidInputError);
    assert.throws(() => toUnitName('.service'), InvalidInputError);
  });
});

describe('MountUnitManager', () => {
  let h: Harness;
  let runner: FakeRunner;
  let unitDir: string;
  let root: boolean;
  let units: MountUnitManager;

  beforeEach(async () => {
    h = await createHarness();
    runner = new FakeRunner();
    unitDir = join(h.dir, 'units');
    root = true;
    units = new MountUnitManager({
      store: h.store,
      runner,
      config: h.config,
      logger: createSilentLogger(),
      launcher: LAUNCHER,
      unitDir,
      isRoot: () => root,
      fileExists: h.host.fileExists,
    });
  });

  afterEach(async () => {
    await h.cleanup();
  });

  describe('create', () => {
    beforeEach(async () => {
      h.host.addDisk(DATA, { uuid: UUID_A });
      await h.store.saveMapping(DATA, UUID_A, ['/mnt/data'], 'sdd');
    });

    it('should write a unit that mounts the VHD by path', async () => {
      const created = await units.create(DATA, '/mnt/data');

      assert.deepStrictEqual(created, {
        unit: DATA_UNIT,
        unitPath: join(unitDir, DATA_UNIT),
        vhdPath: DATA,
        mountPoint: '/mnt/data',
        uuid: UUID_A,
      });
      const lines = (await readFile(created.unitPath, 'utf-8')).split('\n');
      assert.ok(
        lines.includes(
          'ExecStart="/usr/bin/node" "/opt/wsl-vhd/dist/cli/index.js" mount --vhd-path "D:/VMs/Data Disk.vhdx" --mount-point "/mnt/data"'
        )
      );
      assert.ok(lines.includes(`Environment="WSL_VHD_TRACKING_FILE=${h.config.trackingFile}"`));
      assert.deepStrictEqual(runner.commandLines(), []);
    });

    it('should use a given name', async () => {
      const created = await units.create(DATA, '/mnt/data', 'data-at-boot');

      assert.strictEqual(created.unit, 'data-at-boot.service');
      assert.deepStrictEqual(await readdir(unitDir), ['data-at-boot.service']);
    });

    it('should refuse a VHD without a tracked UUID', async () => {
      await h.store.saveMapping(DATA, '', [], 'sdd');

      await assert.rejects(units.create(DATA, '/mnt/data'), NotFoundError);
      await assert.rejects(readdir(unitDir), { code: 'ENOENT' });
    });

    it('should refuse a missing VHD file', async () => {
      await assert.rejects(units.create('D:/VMs/missing.vhdx', '/mnt/data'), {
        name: 'NotFoundError',
        message: 'VHD file not found: D:/VMs/missing.vhdx',
      });
    });

    it('should require root', async () => {
      root = false;

      await assert.rejects(units.create(DATA, '/mnt/data'), PermissionError);
      await assert.rejects(readdir(unitDir), { code: 'ENOENT' });
    });

    it('should not overwrite an existing unit', async () => {
      await mkdir(unitDir, { recursive: true });
      await writeFile(join(unitDir, DATA_UNIT), 'kept\n');

      await assert.rejects(units.create(DATA, '/mnt/data'), (error: unknown) => {
        assert.ok(error instanceof VhdStateError);
        assert.strictEqual(error.code, 'ALREADY_EXISTS');
        return true;
      });
      assert.strictEqual(await readFile(join(unitDir, DATA_UNIT), 'utf-8'), 'kept\n');
    });
  });

  describe('enable and disable', () => {
    it('should reload systemd and enable the unit', async () => {
      runner.on('systemctl daemon-reload', fail('Failed to connect to bus'));

      const unit = await units.enable('wsl-vhd-mount-data');

      assert.strictEqual(unit, 'wsl-vhd-mount-data.service');
      assert.deepStrictEqual(runner.commandLines(), [
        'systemctl daemon-reload',
        'systemctl enable wsl-vhd-mount-data.service',
      ]);
    });

    it('should fail when systemctl enable fails', async () => {
      runner.on('systemctl enable', fail('Unit file wsl-vhd-mount-data.service does not exist.'));

      await assert.rejects(units.enable('wsl-vhd-mount-data'), CommandError);
    });

    it('should disable the unit', async () => {
      await units.disable('wsl-vhd-mount-data.service');

      assert.deepStrictEqual(runner.commandLines(), [
        'systemctl disable wsl-vhd-mount-data.service',
      ]);
    });

    it('should require root before calling systemctl', async () => {
      root = false;

      await assert.rejects(units.disable('wsl-vhd-mount-data'), PermissionError);
      assert.deepStrictEqual(runner.commandLines(), []);
    });
  });

  describe('remove', () => {
    it('should stop, disable and delete the unit', async () => {
      await mkdir(unitDir, { recursive: true });
      await writeFile(join(unitDir, DATA_UNIT), '[Unit]\n');
      runner.on('systemctl stop', fail('not loaded', 5));

      await units.remove(DATA_UNIT);

      assert.deepStrictEqual(runner.commandLines(), [
        `systemctl stop ${DATA_UNIT}`,
        `systemctl disable ${DATA_UNIT}`,
        'systemctl daemon-reload',
      ]);
      assert.deepStrictEqual(await readdir(unitDir), []);
    });

    it('should report a unit that does not exist', async () => {
      await assert.rejects(units.remove('wsl-vhd-mount-none'), NotFoundError);
      assert.deepStrictEqual(runner.commandLines(), []);
    });
  });

  describe('status and list', () => {
    beforeEach(async () => {
      await mkdir(unitDir, { recursive: true });
      for (const file of [
        'wsl-vhd-mount-beta.service',
        'wsl-vhd-mount-alpha.service',
        'other.service',
        'wsl-vhd-mount-alpha.conf',
      ]) {
        await writeFile(join(unitDir, file), '[Unit]\n');
      }
      runner
        .on('systemctl is-enabled wsl-vhd-mount-alpha', ok('enabled\n'))
        .on('systemctl is-active wsl-vhd-mount-alpha', ok('active\n'))
        .on('systemctl is-enabled wsl-vhd-mount-beta', { stdout: 'disabled\n', stderr: '', exitCode: 1 })
        .on('systemctl is-active wsl-vhd-mount-beta', { stdout: 'inactive\n', stderr: '', exitCode: 3 });
    });

    it('should list only mount units, in name order', async () => {
      assert.deepStrictEqual(await units.list(), [
        { unit: 'wsl-vhd-mount-alpha.service', enabled: 'enabled', active: 'active' },
        { unit: 'wsl-vhd-mount-beta.service', enabled: 'disabled', active: 'inactive' },
      ]);
    });

    it('should report the state of one unit', async () => {
      assert.deepStrictEqual(await units.status('wsl-vhd-mount-beta'), {
        unit: 'wsl-vhd-mount-beta.service',
        enabled: 'disabled',
        active: 'inactive',
      });
    });

    it('should report an unknown unit', async () => {
      await assert.rejects(units.status('wsl-vhd-mount-gamma'), NotFoundError);
    });

    it('should list nothing when the unit directory is missing', async () => {
      const empty = new MountUnitManager({
        store: h.store,
        runner,
        config: h.config,
        logger: createSilentLogger(),
        launcher: LAUNCHER,
        unitDir: join(h.dir, 'absent'),
      });

      assert.deepStrictEqual(await empty.list(), []);
    });
  });
});
