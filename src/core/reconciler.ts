/**
 * Sync Reconciler
 *
 * Brings the tracking database back into agreement with the live block
 * device table and the filesystem. A mapping with a UUID is stale when that
 * UUID is no longer attached; a mapping without one, and every detach
 * history entry, is stale when its VHD file is gone.
 */

import { vhdFileExists } from '../lib/paths.js';
import type { TrackingStore } from '../state/store.js';
import type { DeviceObserver } from '../wsl/observer.js';

/**
 * Why a record was removed
 */
export type RemovalReason = 'not attached' | 'file not found';

/**
 * A mapping removed (or to be removed) by reconciliation
 */
export interface RemovedMapping {
  path: string;
  uuid: string;
  reason: RemovalReason;
}

/**
 * The detach history of one path removed by reconciliation
 */
export interface RemovedHistory {
  path: string;
  /** Number of events removed for the path */
  entries: number;
  reason: RemovalReason;
}

/**
 * A record that could not be checked; it is kept
 */
export interface ReconcileError {
  path: string;
  message: string;
}

/**
 * Result of a reconciliation pass
 */
export interface ReconcileResult {
  removedMappings: RemovedMapping[];
  removedHistory: RemovedHistory[];
  errors: ReconcileError[];
  /** True when nothing was changed */
  dryRun: boolean;
}

/**
 * Options for a reconciliation pass
 */
export interface ReconcileOptions {
  /** Report removals without applying them */
  dryRun?: boolean;
}

/**
 * Checks whether the VHD file behind a tracked path exists.
 */
export type FileExistsCheck = (path: string) => Promise<boolean>;

export class SyncReconciler {
  constructor(
    private readonly store: TrackingStore,
    private readonly observer: DeviceObserver,
    private readonly fileExists: FileExistsCheck = vhdFileExists
  ) {}

  /**
   * Find stale mappings and history entries and, unless dryRun is set,
   * remove them in a single store update.
   *
   * Failures to check an individual record are collected in `errors`; the
   * record is kept. A failure to persist the removals is thrown.
   */
  async reconcile(options: ReconcileOptions = {}): Promise<ReconcileResult> {
    const dryRun = options.dryRun ?? false;
    const errors: ReconcileError[] = [];

    const removedMappings = await this.findStaleMappings(errors);
    const removedHistory = await this.findStaleHistory(errors);

    if (!dryRun) {
      await this.store.prune({
        mappings: removedMappings.map((entry) => entry.path),
        history: removedHistory.map((entry) => entry.path),
      });
    }

    return { removedMappings, removedHistory, errors, dryRun };
  }

  private async findStaleMappings(errors: ReconcileError[]): Promise<RemovedMapping[]> {
    const stale: RemovedMapping[] = [];

    for (const mapping of await this.store.getAllMappings()) {
      try {
        if (mapping.uuid) {
          if (!(await this.observer.isAttached(mapping.uuid))) {
            stale.push({ path: mapping.path, uuid: mapping.uuid, reason: 'not attached' });
          }
        } else if (!(await this.fileExists(mapping.path))) {
          stale.push({ path: mapping.path, uuid: '', reason: 'file not found' });
        }
      } catch (error) {
        errors.push({ path: mapping.path, message: errorMessage(error) });
      }
    }

    return stale;
  }

  private async findStaleHistory(errors: ReconcileError[]): Promise<RemovedHistory[]> {
    const history = await this.store.getDetachHistory(this.store.getMaxHistory());

    const counts = new Map<string, number>();
    for (const event of history) {
      counts.set(event.path, (counts.get(event.path) ?? 0) + 1);
    }

    const stale: RemovedHistory[] = [];
    for (const [path, entries] of counts) {
      try {
        if (!(await this.fileExists(path))) {
          stale.push({ path, entries, reason: 'file not found' });
        }
      } catch (error) {
        errors.push({ path, message: errorMessage(error) });
      }
    }

    return stale;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
