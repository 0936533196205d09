/**
 * Unit tests for Configuration Resolver
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { randomUUID } from 'node:crypto';

import { resolveConfig, expandPath, DEFAULTS } from '../../../src/config/resolver.js';
import { ConfigError } from '../../../src/core/errors.js';

const CONFIGS = join(import.meta.dirname, '../../fixtures/configs');

describe('expandPath', () => {
  it('should expand ~ from HOME', () => {
    assert.strictEqual(expandPath('~/vhd/db.json', '/base', { HOME: '/home/tester' }), '/home/tester/vhd/db.json');
  });

  it('should expand $VAR references', () => {
    assert.strictEqual(expandPath('$DATA/db.json', '/base', { DATA: '/srv/data' }), '/srv/data/db.json');
  });

  it('should resolve relative paths against the base', () => {
    assert.strictEqual(expandPath('db.json', '/base/dir', {}), resolve('/base/dir', 'db.json'));
  });

  it('should leave absolute paths unchanged', () => {
    assert.strictEqual(expandPath('/abs/db.json', '/base', {}), '/abs/db.json');
  });
});

describe('resolveConfig', () => {
  let home: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(async () => {
    home = join(tmpdir(), `wsl-vhd-config-${randomUUID()}`);
    await mkdir(home, { recursive: true });
    env = { HOME: home };
  });

  afterEach(async () => {
    await rm(home, { recursive: true, force: true });
  });

  it('should use defaults when nothing is configured', async () => {
    const config = await resolveConfig({}, env);

    assert.deepStrictEqual(config, {
      trackingFile: join(home, '.config', 'wsl-vhd', 'vhd_tracking.json'),
      maxHistory: DEFAULTS.maxHistory,
      historyLimit: DEFAULTS.historyLimit,
      sleepAfterAttachMs: 2000,
      detachTimeoutMs: 30000,
      lockTimeoutMs: 5000,
      defaultSize: '1G',
      defaultFsType: 'ext4',
      quiet: false,
      debug: false,
      yes: false,
      json: false,
      configPath: null,
    });
  });

  it('should return a frozen object', async () => {
    const config = await resolveConfig({}, env);

    assert.strictEqual(Object.isFrozen(config), true);
  });

  it('should read the file named by --config', async () => {
    const configPath = join(CONFIGS, 'full.yaml');

    const config = await resolveConfig({ configPath }, env);

    assert.strictEqual(config.trackingFile, join(home, 'vhd', 'tracking.json'));
    assert.strictEqual(config.maxHistory, 20);
    assert.strictEqual(config.historyLimit, 5);
    assert.strictEqual(config.sleepAfterAttachMs, 500);
    assert.strictEqual(config.detachTimeoutMs, 45000);
    assert.strictEqual(config.lockTimeoutMs, 2000);
    assert.strictEqual(config.defaultSize, '10G');
    assert.strictEqual(config.defaultFsType, 'xfs');
    assert.strictEqual(config.configPath, configPath);
  });

  it('should read the default config file when present', async () => {
    const dir = join(home, '.config', 'wsl-vhd');
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, 'config.yaml'), 'history_limit: 3\n');

    const config = await resolveConfig({}, env);

    assert.strictEqual(config.historyLimit, 3);
    assert.strictEqual(config.configPath, join(dir, 'config.yaml'));
  });

  it('should fail when an explicit config file is missing', async () => {
    await assert.rejects(
      resolveConfig({ configPath: join(home, 'missing.yaml') }, env),
      ConfigError
    );
  });

  it('should report validation errors of the file', async () => {
    await assert.rejects(
      resolveConfig({ configPath: join(CONFIGS, 'out-of-range.yaml') }, env),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.strictEqual(error.validationErrors?.length, 2);
        return true;
      }
    );
  });

  it('should let environment variables override the file', async () => {
    env['WSL_VHD_CONFIG'] = join(CONFIGS, 'full.yaml');
    env['WSL_VHD_MAX_HISTORY'] = '30';
    env['WSL_VHD_DEFAULT_FSTYPE'] = 'EXT3';
    env['WSL_VHD_TRACKING_FILE'] = '/srv/db.json';

    const config = await resolveConfig({}, env);

    assert.strictEqual(config.maxHistory, 30);
    assert.strictEqual(config.defaultFsType, 'ext3');
    assert.strictEqual(config.trackingFile, '/srv/db.json');
    assert.strictEqual(config.historyLimit, 5);
  });

  it('should let flags override environment booleans', async () => {
    env['WSL_VHD_QUIET'] = 'yes';
    env['WSL_VHD_DEBUG'] = 'true';

    const config = await resolveConfig({ debug: false }, env);

    assert.strictEqual(config.quiet, true);
    assert.strictEqual(config.debug, false);
  });

  it('should cap the history limit at the retention limit', async () => {
    env['WSL_VHD_MAX_HISTORY'] = '4';

    const config = await resolveConfig({}, env);

    assert.strictEqual(config.historyLimit, 4);
  });

  it('should reject malformed environment values', async () => {
    await assert.rejects(resolveConfig({}, { ...env, WSL_VHD_MAX_HISTORY: '0' }), ConfigError);
    await assert.rejects(resolveConfig({}, { ...env, WSL_VHD_DEBUG: 'maybe' }), ConfigError);
    await assert.rejects(resolveConfig({}, { ...env, WSL_VHD_DEFAULT_SIZE: 'lots' }), ConfigError);
    await assert.rejects(resolveConfig({}, { ...env, WSL_VHD_DEFAULT_FSTYPE: 'zfs' }), ConfigError);
  });
});
