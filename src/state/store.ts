/**
 * Tracking Store
 *
 * Durable mapping of VHD paths to filesystem UUIDs, device names and mount
 * points, plus a bounded history of detach events.
 *
 * Every mutating operation is a full read-modify-write-replace cycle held
 * under an exclusive lock file: the database is read, transformed in
 * memory, written to a uniquely named temp file in the same directory and
 * renamed over the original. Readers see either the old or the new file.
 */

import { randomBytes } from 'node:crypto';
import { mkdir, open, readFile, rename, unlink } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import {
  CorruptDatabaseError,
  InvalidInputError,
  NotFoundError,
  PersistenceError,
  AmbiguousError,
} from '../core/errors.js';
import { normalizeVhdPath } from '../lib/paths.js';
import { validateDeviceName, validateMountPoint, validateUuid } from '../lib/validation.js';
import { createEmptyDatabase, decodeDatabase, encodeDatabase } from './codec.js';
import { FileLock, trackOwnedFile, untrackOwnedFile } from './lock.js';
import type { DetachEvent, Mapping, TrackingDatabase } from './types.js';

/**
 * Default number of detach events retained
 */
export const DEFAULT_MAX_HISTORY = 50;

/**
 * Default number of detach events returned by getDetachHistory()
 */
export const DEFAULT_HISTORY_LIMIT = 10;

/**
 * File operations used by the store, replaceable in tests.
 */
export interface FileOps {
  readFile(path: string): Promise<string>;
  /** Create a new file exclusively, write it and flush it to disk */
  writeNewFile(path: string, content: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  unlink(path: string): Promise<void>;
  mkdir(path: string): Promise<void>;
}

export const nodeFileOps: FileOps = {
  readFile: (path) => readFile(path, 'utf-8'),
  async writeNewFile(path, content) {
    const handle = await open(path, 'wx', 0o644);
    try {
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
  },
  rename: (from, to) => rename(from, to),
  unlink: (path) => unlink(path),
  async mkdir(path) {
    await mkdir(path, { recursive: true });
  },
};

/**
 * Options for constructing a TrackingStore
 */
export interface TrackingStoreOptions {
  /** Path of the tracking database file */
  filePath: string;
  /** Maximum detach events retained (default: 50) */
  maxHistory?: number;
  /** Default number of events returned by getDetachHistory (default: 10) */
  defaultHistoryLimit?: number;
  /** Give up waiting for the lock after this many ms (default: 5000) */
  lockTimeoutMs?: number;
  /** Break locks older than this many ms (default: 30000) */
  staleLockMs?: number;
  /** Clock used for timestamps */
  clock?: () => Date;
  /** File operations (tests inject failures here) */
  fileOps?: FileOps;
}

/**
 * Removals applied by prune()
 */
export interface PruneRequest {
  /** Paths whose mappings are removed */
  mappings: string[];
  /** Paths whose detach history is removed */
  history: string[];
}

/**
 * Format a date as an RFC3339 UTC timestamp with second precision.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export class TrackingStore {
  private readonly filePath: string;
  private readonly dir: string;
  private readonly maxHistory: number;
  private readonly defaultHistoryLimit: number;
  private readonly clock: () => Date;
  private readonly fs: FileOps;
  private readonly lock: FileLock;

  constructor(options: TrackingStoreOptions) {
    this.filePath = resolve(options.filePath);
    this.dir = dirname(this.filePath);
    this.maxHistory = Math.max(1, options.maxHistory ?? DEFAULT_MAX_HISTORY);
    this.defaultHistoryLimit = options.defaultHistoryLimit ?? DEFAULT_HISTORY_LIMIT;
    this.clock = options.clock ?? (() => new Date());
    this.fs = options.fileOps ?? nodeFileOps;
    this.lock = new FileLock(`${this.filePath}.lock`, {
      timeoutMs: options.lockTimeoutMs,
      staleMs: options.staleLockMs,
    });
  }

  /**
   * Get the maximum number of retained detach events.
   */
  getMaxHistory(): number {
    return this.maxHistory;
  }

  /**
   * Ensure the database directory and file exist.
   *
   * Creates an empty database when the file is missing. An existing file
   * is left untouched, even if it is corrupt.
   *
   * @throws PersistenceError if the directory or file cannot be created
   */
  async init(): Promise<void> {
    await this.ensureDir();
    await this.lock.withLock(async () => {
      const existing = await this.readRaw();
      if (existing === null) {
        await this.writeDatabase(createEmptyDatabase());
      }
    });
  }

  // ===========================================================================
  // Mappings
  // ===========================================================================

  /**
   * Insert or replace the mapping for a VHD path.
   *
   * The record is written exactly as given; fields the caller wants to keep
   * must be passed with their existing values.
   */
  async saveMapping(
    path: string,
    uuid: string,
    mountPoints: readonly string[],
    deviceName: string
  ): Promise<Mapping> {
    const key = this.keyFor(path);
    assertUuid(uuid);
    assertDeviceName(deviceName);
    assertMountPoints(mountPoints);

    const mapping: Mapping = {
      path: key,
      uuid,
      deviceName,
      mountPoints: [...mountPoints],
      lastAttached: formatTimestamp(this.clock()),
    };

    await this.mutate((db) => {
      db.mappings.set(key, mapping);
    });
    return mapping;
  }

  /**
   * Get the mapping for a VHD path.
   */
  async getMapping(path: string): Promise<Mapping | undefined> {
    const db = await this.readDatabase();
    return db.mappings.get(normalizeVhdPath(path));
  }

  /**
   * Get all mappings, in file order.
   */
  async getAllMappings(): Promise<Mapping[]> {
    const db = await this.readDatabase();
    return [...db.mappings.values()];
  }

  /**
   * Look up the UUID recorded for a VHD path.
   *
   * @returns The UUID, or undefined when the path is unknown or unformatted
   */
  async lookupUUIDByPath(path: string): Promise<string | undefined> {
    const mapping = await this.getMapping(path);
    return mapping?.uuid ? mapping.uuid : undefined;
  }

  /**
   * Look up the VHD path tracked with a UUID.
   *
   * @throws AmbiguousError if several tracked VHDs carry the same UUID
   */
  async lookupPathByUUID(uuid: string): Promise<string | undefined> {
    if (uuid === '') {
      return undefined;
    }
    const wanted = uuid.toLowerCase();
    const matches = (await this.getAllMappings()).filter(
      (mapping) => mapping.uuid.toLowerCase() === wanted
    );
    return singleMatch(matches, `UUID ${uuid}`);
  }

  /**
   * Look up the VHD path last seen on a device.
   *
   * @throws AmbiguousError if several tracked VHDs claim the same device
   */
  async lookupPathByDeviceName(deviceName: string): Promise<string | undefined> {
    if (deviceName === '') {
      return undefined;
    }
    const matches = (await this.getAllMappings()).filter(
      (mapping) => mapping.deviceName === deviceName
    );
    return singleMatch(matches, `device ${deviceName}`);
  }

  /**
   * Replace the mount points of an existing mapping.
   *
   * @throws NotFoundError if the path has no mapping; nothing is created
   */
  async updateMountPoints(path: string, mountPoints: readonly string[]): Promise<Mapping> {
    const key = this.keyFor(path);
    assertMountPoints(mountPoints);

    return this.mutate((db) => {
      const existing = db.mappings.get(key);
      if (!existing) {
        throw new NotFoundError(`No tracking entry for ${key}`);
      }
      const updated: Mapping = { ...existing, mountPoints: [...mountPoints] };
      db.mappings.set(key, updated);
      return updated;
    });
  }

  /**
   * Remove the mapping for a VHD path. Removing an unknown path is not an error.
   *
   * @returns Whether a mapping was removed
   */
  async removeMapping(path: string): Promise<boolean> {
    const key = this.keyFor(path);
    return this.mutate((db) => {
      return db.mappings.delete(key);
    });
  }

  /**
   * Get all tracked mapping keys.
   */
  async getAllPaths(): Promise<Set<string>> {
    const db = await this.readDatabase();
    return new Set(db.mappings.keys());
  }

  // ===========================================================================
  // Detach History
  // ===========================================================================

  /**
   * Record a detach event at the head of the history.
   *
   * The history is truncated to the retention limit, oldest first.
   */
  async saveDetachHistory(path: string, uuid: string, deviceName: string): Promise<DetachEvent> {
    const key = this.keyFor(path);
    assertUuid(uuid);
    assertDeviceName(deviceName);

    const event: DetachEvent = {
      path: key,
      uuid,
      deviceName,
      timestamp: formatTimestamp(this.clock()),
    };

    await this.mutate((db) => {
      db.detachHistory = [event, ...db.detachHistory].slice(0, this.maxHistory);
    });
    return event;
  }

  /**
   * Remove every detach event for a VHD path.
   *
   * @returns Number of events removed
   */
  async removeDetachHistory(path: string): Promise<number> {
    const key = this.keyFor(path);
    return this.mutate((db) => {
      const before = db.detachHistory.length;
      db.detachHistory = db.detachHistory.filter((event) => event.path !== key);
      return before - db.detachHistory.length;
    });
  }

  /**
   * Get the most recent detach events, newest first.
   *
   * @param limit - Number of events; clamped to [0, maxHistory]
   */
  async getDetachHistory(limit: number = this.defaultHistoryLimit): Promise<DetachEvent[]> {
    const clamped = Math.min(Math.max(0, Math.floor(limit)), this.maxHistory);
    const db = await this.readDatabase();
    return db.detachHistory.slice(0, clamped);
  }

  /**
   * Get the most recent detach event for a VHD path.
   */
  async getLastDetachForPath(path: string): Promise<DetachEvent | undefined> {
    const key = normalizeVhdPath(path);
    const db = await this.readDatabase();
    return db.detachHistory.find((event) => event.path === key);
  }

  // ===========================================================================
  // Batch
  // ===========================================================================

  /**
   * Remove several mappings and the history of several paths in one cycle.
   */
  async prune(request: PruneRequest): Promise<void> {
    if (request.mappings.length === 0 && request.history.length === 0) {
      return;
    }
    const mappingKeys = new Set(request.mappings.map(normalizeVhdPath));
    const historyKeys = new Set(request.history.map(normalizeVhdPath));

    await this.mutate((db) => {
      for (const key of mappingKeys) {
        db.mappings.delete(key);
      }
      db.detachHistory = db.detachHistory.filter((event) => !historyKeys.has(event.path));
    });
  }

  // ===========================================================================
  // Persistence
  // ===========================================================================

  private keyFor(path: string): string {
    if (path.trim() === '') {
      throw new InvalidInputError('VHD path is empty', 'path');
    }
    return normalizeVhdPath(path);
  }

  /**
   * Read the raw file content, or null when the file does not exist.
   */
  private async readRaw(): Promise<string | null> {
    try {
      return await this.fs.readFile(this.filePath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw new PersistenceError(
        `Failed to read tracking database: ${this.filePath}`,
        this.filePath,
        'PERSISTENCE_FAILURE',
        'Check permissions on the tracking file.',
        toError(error)
      );
    }
  }

  /**
   * Read the database for a query. Missing or corrupt files read as empty.
   */
  private async readDatabase(): Promise<TrackingDatabase> {
    const content = await this.readRaw();
    if (content === null) {
      return createEmptyDatabase();
    }
    try {
      return decodeDatabase(content, this.filePath);
    } catch (error) {
      if (error instanceof CorruptDatabaseError) {
        return createEmptyDatabase();
      }
      throw error;
    }
  }

  /**
   * Apply a transformation under the lock and persist the result.
   *
   * A corrupt database is never overwritten: CorruptDatabaseError is thrown
   * before the transformation runs.
   */
  private async mutate<T>(transform: (db: TrackingDatabase) => T): Promise<T> {
    await this.ensureDir();
    return this.lock.withLock(async () => {
      const content = await this.readRaw();
      const db = content === null ? createEmptyDatabase() : decodeDatabase(content, this.filePath);
      const result = transform(db);
      await this.writeDatabase(db);
      return result;
    });
  }

  private async ensureDir(): Promise<void> {
    try {
      await this.fs.mkdir(this.dir);
    } catch (error) {
      throw new PersistenceError(
        `Failed to create tracking directory: ${this.dir}`,
        this.filePath,
        'PERSISTENCE_FAILURE',
        'Check permissions on the configuration directory.',
        toError(error)
      );
    }
  }

  /**
   * Write the database through a temp file and atomic rename.
   *
   * On failure the temp file is removed and the original file is untouched.
   */
  private async writeDatabase(db: TrackingDatabase): Promise<void> {
    const tempPath = `${this.filePath}.tmp.${process.pid}.${randomBytes(6).toString('hex')}`;
    trackOwnedFile(tempPath);

    try {
      await this.fs.writeNewFile(tempPath, encodeDatabase(db));
      await this.fs.rename(tempPath, this.filePath);
      untrackOwnedFile(tempPath);
    } catch (error) {
      await this.removeTempFile(tempPath);
      throw new PersistenceError(
        `Failed to write tracking database: ${this.filePath}`,
        this.filePath,
        'PERSISTENCE_FAILURE',
        'Check free disk space and permissions on the tracking directory.',
        toError(error)
      );
    }
  }

  /**
   * Remove a temp file this operation created.
   *
   * If removal fails the file stays registered and is retried on exit.
   */
  private async removeTempFile(tempPath: string): Promise<void> {
    try {
      await this.fs.unlink(tempPath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        return;
      }
    }
    untrackOwnedFile(tempPath);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function singleMatch(matches: Mapping[], what: string): string | undefined {
  if (matches.length > 1) {
    throw new AmbiguousError(
      `Several tracked VHDs match ${what}`,
      matches.map((mapping) => mapping.path),
      'Pass the VHD path explicitly.'
    );
  }
  return matches[0]?.path;
}

function assertUuid(uuid: string): void {
  if (uuid === '') {
    return;
  }
  const problem = validateUuid(uuid);
  if (problem) {
    throw new InvalidInputError(`Invalid UUID '${uuid}': ${problem}`, 'uuid');
  }
}

function assertDeviceName(deviceName: string): void {
  if (deviceName === '') {
    return;
  }
  const problem = validateDeviceName(deviceName);
  if (problem) {
    throw new InvalidInputError(`Invalid device name '${deviceName}': ${problem}`, 'deviceName');
  }
}

function assertMountPoints(mountPoints: readonly string[]): void {
  for (const mountPoint of mountPoints) {
    const problem = validateMountPoint(mountPoint);
    if (problem) {
      throw new InvalidInputError(`Invalid mount point '${mountPoint}': ${problem}`, 'mountPoints');
    }
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
