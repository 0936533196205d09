/**
 * Tracking Lock
 *
 * Advisory exclusive lock held for the duration of every mutating
 * tracking operation. The lock file is created with O_EXCL and contains
 * the PID, timestamp and a random token of the holder. A holder only ever
 * removes a lock file that still carries its own token.
 *
 * Features:
 * - Stale lock detection: a lock whose PID is gone, or which is older than
 *   the stale threshold, is broken. Breaking renames the file aside first
 *   and puts it back if a fresh lock was moved by mistake.
 * - Owned-file cleanup: lock and temp files created by this process are
 *   removed if the process exits while still holding them.
 */

import { randomBytes } from 'node:crypto';
import { rmSync } from 'node:fs';
import { link, open, readFile, rename, stat, unlink, type FileHandle } from 'node:fs/promises';

import { LockTimeoutError } from '../core/errors.js';

/**
 * Content of a lock file
 */
export interface LockInfo {
  pid: number;
  timestamp: number;
  /** Random value identifying one acquisition */
  token?: string;
}

/**
 * A lock file as read from disk
 */
interface LockSnapshot {
  info: LockInfo;
  /** Raw content, or null when the file vanished */
  raw: string | null;
}

/**
 * Options for acquiring a lock
 */
export interface FileLockOptions {
  /** Give up after this many milliseconds (default: 5000) */
  timeoutMs?: number;
  /** Delay between attempts in milliseconds (default: 50) */
  retryDelayMs?: number;
  /** Treat locks older than this as stale (default: 30000) */
  staleMs?: number;
}

// =============================================================================
// Owned File Registry
// =============================================================================

const ownedFiles = new Set<string>();
let exitHookInstalled = false;

/**
 * Register a file created by this process for removal on abnormal exit.
 */
export function trackOwnedFile(path: string): void {
  ownedFiles.add(path);
  if (!exitHookInstalled) {
    exitHookInstalled = true;
    process.once('exit', removeOwnedFiles);
  }
}

/**
 * Unregister a file that has been renamed or removed normally.
 */
export function untrackOwnedFile(path: string): void {
  ownedFiles.delete(path);
}

function removeOwnedFiles(): void {
  for (const path of ownedFiles) {
    rmSync(path, { force: true });
  }
  ownedFiles.clear();
}

// =============================================================================
// FileLock
// =============================================================================

export class FileLock {
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly staleMs: number;
  private token: string | null = null;

  constructor(
    private readonly lockPath: string,
    options: FileLockOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.retryDelayMs = options.retryDelayMs ?? 50;
    this.staleMs = options.staleMs ?? 30000;
  }

  /**
   * Acquire the lock, waiting up to the timeout.
   *
   * @throws LockTimeoutError if another live process keeps holding the lock
   */
  async acquire(): Promise<void> {
    if (this.token !== null) {
      throw new Error(`Lock already held by this instance: ${this.lockPath}`);
    }

    const deadline = Date.now() + this.timeoutMs;

    for (;;) {
      if (await this.tryCreate()) {
        return;
      }

      const snapshot = await this.readLockFile();
      const info = snapshot.info;
      if (snapshot.raw !== null && this.isStale(info)) {
        await this.breakLock(snapshot.raw);
        continue;
      }

      if (Date.now() >= deadline) {
        throw new LockTimeoutError(this.lockPath, info.pid > 0 ? info.pid : null);
      }

      await sleep(this.retryDelayMs);
    }
  }

  /**
   * Release the lock. Safe to call when the lock is not held.
   *
   * The file is removed only if it still carries this holder's token; a
   * lock that was broken and taken over by another holder is left alone.
   */
  async release(): Promise<void> {
    const token = this.token;
    if (token === null) {
      return;
    }
    this.token = null;

    const { info } = await this.readLockFile();
    if (info.token !== token) {
      return;
    }
    untrackOwnedFile(this.lockPath);
    await unlinkIfPresent(this.lockPath);
  }

  /**
   * Run a function while holding the lock.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  /**
   * Whether this instance currently holds the lock.
   */
  isHeld(): boolean {
    return this.token !== null;
  }

  private async tryCreate(): Promise<boolean> {
    let handle: FileHandle;
    try {
      handle = await open(this.lockPath, 'wx');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'EEXIST') {
        return false;
      }
      throw error;
    }

    trackOwnedFile(this.lockPath);
    const token = randomBytes(8).toString('hex');
    try {
      const info: LockInfo = { pid: process.pid, timestamp: Date.now(), token };
      await handle.writeFile(JSON.stringify(info), 'utf-8');
    } finally {
      await handle.close();
    }
    this.token = token;
    return true;
  }

  /**
   * Read the lock file.
   *
   * A lock file that cannot be parsed (for instance one another process is
   * still writing) is dated by its modification time, so it only counts as
   * stale once it is older than the stale threshold. A lock file that
   * vanished in the meantime reads as live so the next attempt retries.
   */
  private async readLockFile(path: string = this.lockPath): Promise<LockSnapshot> {
    let content: string;
    let mtimeMs: number;
    try {
      content = await readFile(path, 'utf-8');
      mtimeMs = (await stat(path)).mtimeMs;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return { info: { pid: -1, timestamp: Date.now() }, raw: null };
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      if (isLockInfo(parsed)) {
        return { info: parsed, raw: content };
      }
    } catch {
      // unparseable: dated by mtime below
    }
    return { info: { pid: -1, timestamp: mtimeMs }, raw: content };
  }

  private isStale(info: LockInfo): boolean {
    if (Date.now() - info.timestamp > this.staleMs) {
      return true;
    }
    if (info.pid > 0 && info.pid !== process.pid) {
      return !isProcessRunning(info.pid);
    }
    return false;
  }

  /**
   * Remove a stale lock file whose content was `staleRaw`.
   *
   * The file is first renamed to a unique name. If what was moved is not
   * the stale lock (another contender broke it and acquired in between),
   * it is linked back in place unless a newer lock already exists.
   */
  private async breakLock(staleRaw: string): Promise<void> {
    const aside = `${this.lockPath}.stale.${process.pid}.${randomBytes(6).toString('hex')}`;
    try {
      await rename(this.lockPath, aside);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return;
      }
      throw error;
    }
    trackOwnedFile(aside);

    try {
      const moved = await this.readLockFile(aside);
      if (moved.raw !== null && moved.raw !== staleRaw) {
        await restoreLock(aside, this.lockPath);
      }
    } finally {
      await unlinkIfPresent(aside);
      untrackOwnedFile(aside);
    }
  }
}

async function restoreLock(aside: string, lockPath: string): Promise<void> {
  try {
    await link(aside, lockPath);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'EEXIST') {
      throw error;
    }
  }
}

async function unlinkIfPresent(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw error;
    }
  }
}

function isLockInfo(value: unknown): value is LockInfo {
  return (
    typeof value === 'object' &&
    value !== null &&
    'pid' in value &&
    typeof value.pid === 'number' &&
    'timestamp' in value &&
    typeof value.timestamp === 'number' &&
    (!('token' in value) || typeof value.token === 'string')
  );
}

/**
 * Check if a process is still running.
 * Uses process.kill(pid, 0) which checks if the process exists without killing it.
 */
export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to another user
    return (error as NodeJS.ErrnoException).code === 'EPERM';
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
