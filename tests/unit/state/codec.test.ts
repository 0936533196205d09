/**
 * Unit tests for the tracking file codec
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  createEmptyDatabase,
  decodeDatabase,
  decodeMountPoints,
  encodeDatabase,
  encodeMountPoints,
} from '../../../src/state/codec.js';
import { CorruptDatabaseError } from '../../../src/core/errors.js';

const UUID = '11111111-2222-4333-8444-555555555555';

describe('mount point encoding', () => {
  it('should split and trim comma-separated values', () => {
    assert.deepStrictEqual(decodeMountPoints('/mnt/a, /mnt/b,'), ['/mnt/a', '/mnt/b']);
  });

  it('should decode empty and missing values as no mount points', () => {
    assert.deepStrictEqual(decodeMountPoints(''), []);
    assert.deepStrictEqual(decodeMountPoints(undefined), []);
  });

  it('should join with commas', () => {
    assert.strictEqual(encodeMountPoints(['/mnt/a', '/mnt/b']), '/mnt/a,/mnt/b');
  });
});

describe('decodeDatabase', () => {
  it('should map the on-disk layout to the in-memory model', () => {
    const content = JSON.stringify({
      version: '1.0',
      mappings: {
        'c:/vms/disk.vhdx': {
          uuid: UUID,
          dev_name: 'sdd',
          mount_points: '/mnt/data',
          last_attached: '2026-02-01T08:00:00Z',
        },
      },
      detach_history: [
        { path: 'c:/vms/old.vhdx', uuid: UUID, dev_name: 'sde', timestamp: '2026-01-31T10:00:00Z' },
      ],
    });

    const db = decodeDatabase(content, '/tmp/db.json');

    assert.deepStrictEqual(db, {
      version: '1.0',
      mappings: new Map([
        [
          'c:/vms/disk.vhdx',
          {
            path: 'c:/vms/disk.vhdx',
            uuid: UUID,
            deviceName: 'sdd',
            mountPoints: ['/mnt/data'],
            lastAttached: '2026-02-01T08:00:00Z',
          },
        ],
      ]),
      detachHistory: [
        { path: 'c:/vms/old.vhdx', uuid: UUID, deviceName: 'sde', timestamp: '2026-01-31T10:00:00Z' },
      ],
    });
  });

  it('should fill optional fields', () => {
    const db = decodeDatabase(
      JSON.stringify({ version: '1.0', mappings: { 'c:/a.vhdx': { uuid: '' } } }),
      '/tmp/db.json'
    );

    assert.deepStrictEqual(db.mappings.get('c:/a.vhdx'), {
      path: 'c:/a.vhdx',
      uuid: '',
      deviceName: '',
      mountPoints: [],
      lastAttached: '',
    });
    assert.deepStrictEqual(db.detachHistory, []);
  });

  it('should reject invalid JSON', () => {
    assert.throws(() => decodeDatabase('{', '/tmp/db.json'), CorruptDatabaseError);
  });

  it('should reject a missing mappings object', () => {
    assert.throws(() => decodeDatabase('{"version":"1.0"}', '/tmp/db.json'), CorruptDatabaseError);
  });

  it('should reject a malformed timestamp', () => {
    const content = JSON.stringify({
      version: '1.0',
      mappings: {},
      detach_history: [{ path: 'c:/a.vhdx', uuid: '', timestamp: 'yesterday' }],
    });

    assert.throws(() => decodeDatabase(content, '/tmp/db.json'), CorruptDatabaseError);
  });
});

describe('encodeDatabase', () => {
  it('should write an empty database', () => {
    assert.strictEqual(
      encodeDatabase(createEmptyDatabase()),
      '{\n  "version": "1.0",\n  "mappings": {},\n  "detach_history": []\n}\n'
    );
  });

  it('should produce content that decodes to the same database', () => {
    const db = createEmptyDatabase();
    db.mappings.set('c:/vms/disk.vhdx', {
      path: 'c:/vms/disk.vhdx',
      uuid: UUID,
      deviceName: 'sdd',
      mountPoints: ['/mnt/a', '/mnt/b'],
      lastAttached: '2026-02-01T08:00:00Z',
    });

    assert.deepStrictEqual(decodeDatabase(encodeDatabase(db), '/tmp/db.json'), db);
  });

  it('should write keys named like object properties as plain entries', () => {
    const db = createEmptyDatabase();
    db.mappings.set('__proto__', {
      path: '__proto__',
      uuid: '',
      deviceName: 'sdd',
      mountPoints: [],
      lastAttached: '2026-02-01T08:00:00Z',
    });

    const raw = JSON.parse(encodeDatabase(db));

    assert.deepStrictEqual(Object.keys(raw.mappings), ['__proto__']);
    assert.deepStrictEqual([...decodeDatabase(encodeDatabase(db), '/tmp/db.json').mappings.keys()], [
      '__proto__',
    ]);
  });
});
