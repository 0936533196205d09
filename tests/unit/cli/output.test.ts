/**
 * Unit tests for the CLI Output Layer
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';

import { OutputFormatter } from '../../../src/cli/output.js';
import { AmbiguousError, VhdStateError } from '../../../src/core/errors.js';
import type { VhdStatus } from '../../../src/core/service.js';

const UUID_A = '11111111-2222-4333-8444-555555555555';

const MOUNTED: VhdStatus = {
  path: 'c:/vms/data.vhdx',
  uuid: UUID_A,
  deviceName: 'sdd',
  mountPoints: ['/mnt/data'],
  state: 'mounted',
  lastAttached: '2026-03-01T12:30:45Z',
  fsUse: '12%',
};

describe('OutputFormatter', () => {
  let stdout: string[];
  let stderr: string[];
  let originalLog: typeof console.log;
  let originalError: typeof console.error;
  let originalWarn: typeof console.warn;

  beforeEach(() => {
    stdout = [];
    stderr = [];
    originalLog = console.log;
    originalError = console.error;
    originalWarn = console.warn;
    console.log = (...args: unknown[]): void => {
      stdout.push(args.join(' '));
    };
    console.error = (...args: unknown[]): void => {
      stderr.push(args.join(' '));
    };
    console.warn = console.error;
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
    console.warn = originalWarn;
  });

  describe('human mode', () => {
    it('should print the status table with a summary', () => {
      const output = new OutputFormatter('status');

      output.statusTable([MOUNTED]);

      assert.deepStrictEqual(stdout, [
        'PATH' +
          ' '.repeat(14) +
          'STATE' +
          ' '.repeat(4) +
          'DEVICE' +
          ' '.repeat(2) +
          'UUID' +
          ' '.repeat(34) +
          'MOUNT POINTS' +
          ' '.repeat(2) +
          'USE',
        'c:/vms/data.vhdx  mounted  sdd' +
          ' '.repeat(5) +
          UUID_A +
          '  /mnt/data' +
          ' '.repeat(5) +
          '12%',
        '',
        '1 VHD tracked, 1 attached.',
      ]);
    });

    it('should show dashes for a detached VHD', () => {
      const output = new OutputFormatter('status', { quiet: true });

      output.statusTable([{ ...MOUNTED, state: 'detached', mountPoints: [], fsUse: undefined }]);

      assert.strictEqual(stdout.length, 2);
      assert.match(stdout[1] ?? '', /^c:\/vms\/data\.vhdx {2}detached {2}- +11111111-.* - +-$/);
    });

    it('should print result lines but no summary when quiet', () => {
      const output = new OutputFormatter('status', { quiet: true });

      output.statusTable([]);
      output.success('done');

      assert.deepStrictEqual(stdout, ['No tracked VHDs.']);
    });

    it('should print an error with its fix and fail the command', () => {
      const output = new OutputFormatter('detach');

      output.error(
        'VHD is not attached',
        new VhdStateError('VHD is not attached', 'NOT_ATTACHED', 'Run `wsl-vhd sync`.')
      );

      assert.deepStrictEqual(stderr, ['✗ VHD is not attached', '  Fix: Run `wsl-vhd sync`.']);
      assert.strictEqual(output.getExitCode(), 1);
    });

    it('should report a dry-run sync', () => {
      const output = new OutputFormatter('sync');

      output.syncReport({
        removedMappings: [{ path: 'c:/vms/gone.vhdx', uuid: UUID_A, reason: 'not attached' }],
        removedHistory: [{ path: 'c:/vms/old.vhdx', entries: 2, reason: 'file not found' }],
        errors: [{ path: 'c:/vms/locked.vhdx', message: 'permission denied' }],
        dryRun: true,
      });

      assert.deepStrictEqual(stdout, [
        'Would remove mapping c:/vms/gone.vhdx (not attached)',
        'Would remove 2 history entries for c:/vms/old.vhdx (file not found)',
        '',
        'Dry run: no changes made. Run `wsl-vhd sync` to apply.',
      ]);
      assert.deepStrictEqual(stderr, ['⚠ Could not check c:/vms/locked.vhdx: permission denied']);
    });

    it('should report a sync with nothing to do', () => {
      const output = new OutputFormatter('sync');

      output.syncReport({ removedMappings: [], removedHistory: [], errors: [], dryRun: false });

      assert.deepStrictEqual(stdout, ['Tracking is in sync. Nothing to remove.']);
    });

    it('should print mount services with their state', () => {
      const output = new OutputFormatter('service list');

      output.unitTable([{ unit: 'wsl-vhd-mount-alpha.service', enabled: 'enabled', active: 'active' }]);

      assert.deepStrictEqual(stdout, [
        'SERVICE' + ' '.repeat(22) + 'ENABLED  ACTIVE',
        'wsl-vhd-mount-alpha.service  enabled  active',
      ]);
    });

    it('should say when there are no mount services', () => {
      const output = new OutputFormatter('service list');

      output.unitTable([]);

      assert.deepStrictEqual(stdout, ['No VHD mount services found.']);
    });

    it('should print detach history rows', () => {
      const output = new OutputFormatter('history');

      output.historyTable([
        { path: 'c:/vms/a.vhdx', uuid: '', deviceName: 'sde', timestamp: '2026-03-01T12:30:45Z' },
      ]);

      assert.deepStrictEqual(stdout, [
        'TIMESTAMP' + ' '.repeat(13) + 'PATH' + ' '.repeat(11) + 'UUID  DEVICE',
        '2026-03-01T12:30:45Z  c:/vms/a.vhdx  -' + ' '.repeat(5) + 'sde',
      ]);
    });
  });

  describe('JSON mode', () => {
    it('should print nothing until flush and then one object', () => {
      const output = new OutputFormatter('status', { json: true });

      output.info('Checking...');
      output.statusTable([MOUNTED]);
      assert.deepStrictEqual(stdout, []);

      output.flush();

      assert.strictEqual(stdout.length, 1);
      assert.deepStrictEqual(JSON.parse(stdout[0] ?? ''), {
        success: true,
        command: 'status',
        vhds: [MOUNTED],
      });
    });

    it('should include error code, suggestion and details', () => {
      const output = new OutputFormatter('detach', { json: true });
      const error = new AmbiguousError(
        'Several tracked VHDs match UUID x',
        ['c:/a.vhdx', 'c:/b.vhdx'],
        'Pass the VHD path explicitly.'
      );

      output.error(error.message, error);
      output.errorDetails({ candidates: error.candidates });
      output.flush();

      assert.deepStrictEqual(stderr, []);
      assert.deepStrictEqual(JSON.parse(stdout[0] ?? ''), {
        success: false,
        command: 'detach',
        error: {
          code: 'AMBIGUOUS',
          message: 'Several tracked VHDs match UUID x',
          suggestion: 'Pass the VHD path explicitly.',
          details: { candidates: ['c:/a.vhdx', 'c:/b.vhdx'] },
        },
      });
    });

    it('should carry extra data set by commands', () => {
      const output = new OutputFormatter('attach', { json: true });

      output.setData('deviceName', 'sdd');

      assert.deepStrictEqual(output.getResult(), {
        success: true,
        command: 'attach',
        deviceName: 'sdd',
      });
      assert.strictEqual(output.getExitCode(), 0);
    });
  });
});
