/**
 * Configuration Types for wsl-vhd
 *
 * The optional YAML file, environment variables and CLI flags are merged
 * into one immutable AppConfig at startup.
 */

import type { FilesystemType } from '../lib/validation.js';

// =============================================================================
// YAML Input Types
// =============================================================================

/**
 * Root object parsed from config.yaml. Every key is optional.
 */
export interface FileConfig {
  /** Path of the tracking database */
  tracking_file?: string;
  /** Maximum detach events retained */
  max_history?: number;
  /** Default number of events listed by `history` */
  history_limit?: number;
  /** Seconds to wait for the kernel after an attach */
  sleep_after_attach?: number;
  /** Seconds before wsl.exe --unmount is abandoned */
  detach_timeout?: number;
  /** Milliseconds to wait for the tracking lock */
  lock_timeout_ms?: number;
  /** Size used by `create` when --size is omitted (e.g. "1G") */
  default_size?: string;
  /** Filesystem used by `format` when --type is omitted */
  default_fstype?: FilesystemType;
}

// =============================================================================
// Resolved Types
// =============================================================================

/**
 * Flags given on the command line. They override the file and environment.
 */
export interface ConfigOverrides {
  quiet?: boolean;
  debug?: boolean;
  yes?: boolean;
  json?: boolean;
  /** Explicit config file (--config) */
  configPath?: string;
}

/**
 * Fully resolved configuration, frozen for the process lifetime
 */
export interface AppConfig {
  readonly trackingFile: string;
  readonly maxHistory: number;
  readonly historyLimit: number;
  readonly sleepAfterAttachMs: number;
  readonly detachTimeoutMs: number;
  readonly lockTimeoutMs: number;
  readonly defaultSize: string;
  readonly defaultFsType: FilesystemType;
  readonly quiet: boolean;
  readonly debug: boolean;
  /** Skip confirmations; required by destructive commands */
  readonly yes: boolean;
  readonly json: boolean;
  /** Config file that was loaded, or null when none exists */
  readonly configPath: string | null;
}
