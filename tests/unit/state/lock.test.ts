/**
 * Unit tests for the tracking lock
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, readdir, readFile, rm, writeFile, access } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';

import { FileLock, isProcessRunning } from '../../../src/state/lock.js';
import { LockTimeoutError, PersistenceError } from '../../../src/core/errors.js';

describe('FileLock', () => {
  let tempDir: string;
  let lockPath: string;

  beforeEach(async () => {
    tempDir = join(tmpdir(), `wsl-vhd-lock-${randomUUID()}`);
    await mkdir(tempDir, { recursive: true });
    lockPath = join(tempDir, 'db.json.lock');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should write the holder pid and remove the file on release', async () => {
    const lock = new FileLock(lockPath);

    await lock.acquire();
    const info = JSON.parse(await readFile(lockPath, 'utf-8'));
    assert.strictEqual(info.pid, process.pid);
    assert.strictEqual(lock.isHeld(), true);

    await lock.release();
    assert.strictEqual(lock.isHeld(), false);
    await assert.rejects(access(lockPath), { code: 'ENOENT' });
  });

  it('should release the lock when the function throws', async () => {
    const lock = new FileLock(lockPath);

    await assert.rejects(
      lock.withLock(async () => {
        throw new Error('boom');
      }),
      /boom/
    );

    await assert.rejects(access(lockPath), { code: 'ENOENT' });
  });

  it('should time out while a live process holds the lock', async () => {
    await writeFile(lockPath, JSON.stringify({ pid: process.pid, timestamp: Date.now() }));
    const lock = new FileLock(lockPath, { timeoutMs: 100, retryDelayMs: 10 });

    await assert.rejects(lock.acquire(), (error: unknown) => {
      assert.ok(error instanceof LockTimeoutError);
      assert.ok(error instanceof PersistenceError);
      assert.strictEqual(error.code, 'LOCK_TIMEOUT');
      return true;
    });
  });

  it('should break a lock older than the stale threshold', async () => {
    await writeFile(lockPath, JSON.stringify({ pid: process.pid, timestamp: 0 }));
    const lock = new FileLock(lockPath, { timeoutMs: 100, retryDelayMs: 10 });

    await lock.acquire();

    const info = JSON.parse(await readFile(lockPath, 'utf-8'));
    assert.notStrictEqual(info.timestamp, 0);
    await lock.release();
  });

  it('should break a lock whose holder process is gone', async () => {
    // Above the largest PID Linux hands out
    const deadPid = 4194305;
    await writeFile(lockPath, JSON.stringify({ pid: deadPid, timestamp: Date.now() }));
    const lock = new FileLock(lockPath, { timeoutMs: 100, retryDelayMs: 10 });

    await lock.acquire();

    const info = JSON.parse(await readFile(lockPath, 'utf-8'));
    assert.strictEqual(info.pid, process.pid);
    await lock.release();
    assert.deepStrictEqual(await readdir(tempDir), []);
  });

  it('should leave a lock file that now belongs to another holder', async () => {
    const lock = new FileLock(lockPath);
    await lock.acquire();
    const foreign = JSON.stringify({ pid: process.pid, timestamp: Date.now(), token: 'other' });
    await writeFile(lockPath, foreign);

    await lock.release();

    assert.strictEqual(await readFile(lockPath, 'utf-8'), foreign);
    assert.strictEqual(lock.isHeld(), false);
  });

  it('should keep the lock of whoever broke an overdue holder', async () => {
    // Arrange: first holder overruns the stale threshold of the second
    const first = new FileLock(lockPath);
    await first.acquire();
    await new Promise((resolve) => setTimeout(resolve, 60));
    const second = new FileLock(lockPath, { staleMs: 30 });
    await second.acquire();

    // Act
    await first.release();

    // Assert: a third contender still has to wait
    const third = new FileLock(lockPath, { timeoutMs: 100, retryDelayMs: 10 });
    await assert.rejects(third.acquire(), LockTimeoutError);
    await second.release();
    await third.acquire();
    await third.release();
    assert.deepStrictEqual(await readdir(tempDir), []);
  });

  it('should serialize concurrent holders', async () => {
    const order: string[] = [];
    const run = (name: string) =>
      new FileLock(lockPath, { retryDelayMs: 5 }).withLock(async () => {
        order.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, 20));
        order.push(`${name}:end`);
      });

    await Promise.all([run('a'), run('b')]);

    assert.strictEqual(order.length, 4);
    assert.ok(order[0]?.endsWith(':start'));
    assert.ok(order[1]?.endsWith(':end'));
    assert.strictEqual(order[0]?.split(':')[0], order[1]?.split(':')[0]);
  });
});

describe('isProcessRunning', () => {
  it('should report the current process as running', () => {
    assert.strictEqual(isProcessRunning(process.pid), true);
  });
});
