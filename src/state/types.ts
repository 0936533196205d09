/**
 * Tracking Types for wsl-vhd
 *
 * In-memory model of the tracking database and the on-disk record shapes
 * it is serialized to.
 */

/**
 * Current tracking file format version
 */
export const TRACKING_FORMAT_VERSION = '1.0';

/**
 * A tracked VHD, keyed by its normalized path.
 */
export interface Mapping {
  /** Normalized VHD path (lowercase, forward slashes) */
  path: string;
  /** Filesystem UUID; empty while attached but unformatted */
  uuid: string;
  /** Last known block device name (e.g. sdd); display hint only */
  deviceName: string;
  /** Current mount points; empty when not mounted */
  mountPoints: string[];
  /** RFC3339 timestamp of the last attach/mount observation */
  lastAttached: string;
}

/**
 * A recorded detach of a VHD.
 */
export interface DetachEvent {
  /** Normalized VHD path */
  path: string;
  /** Filesystem UUID at the time of detach */
  uuid: string;
  /** Device name at the time of detach, or empty */
  deviceName: string;
  /** RFC3339 timestamp of the detach */
  timestamp: string;
}

/**
 * Root of the tracking database.
 */
export interface TrackingDatabase {
  /** Format version tag */
  version: string;
  /** Mappings keyed by normalized path, in file order */
  mappings: Map<string, Mapping>;
  /** Detach events, most recent first */
  detachHistory: DetachEvent[];
}

// =============================================================================
// On-disk Records
// =============================================================================

/**
 * Mapping as persisted under `mappings` in vhd_tracking.json
 */
export interface MappingRecord {
  uuid: string;
  dev_name?: string;
  /** Comma-separated mount points, or empty */
  mount_points?: string;
  last_attached?: string;
}

/**
 * Detach event as persisted in `detach_history`
 */
export interface DetachEventRecord {
  path: string;
  uuid: string;
  dev_name?: string;
  timestamp: string;
}

/**
 * Root structure persisted as vhd_tracking.json
 */
export interface TrackingFileRecord {
  version: string;
  mappings: Record<string, MappingRecord>;
  detach_history?: DetachEventRecord[];
}
