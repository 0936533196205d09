/**
 * Error Types for wsl-vhd
 *
 * Custom error classes with error codes for structured error handling.
 */

/**
 * Error codes for all wsl-vhd errors
 */
export type ErrorCode =
  | 'NOT_FOUND'
  | 'ALREADY_ATTACHED'
  | 'ALREADY_MOUNTED'
  | 'ALREADY_EXISTS'
  | 'NOT_ATTACHED'
  | 'NOT_MOUNTED'
  | 'NOT_FORMATTED'
  | 'AMBIGUOUS'
  | 'INVALID_INPUT'
  | 'CONFIG_INVALID'
  | 'PERMISSION_DENIED'
  | 'PERSISTENCE_FAILURE'
  | 'DATABASE_CORRUPT'
  | 'LOCK_TIMEOUT'
  | 'COMMAND_FAILED'
  | 'COMMAND_TIMEOUT'
  | 'COMMAND_NOT_AVAILABLE'
  | 'VERIFICATION_FAILED';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  NOT_FOUND: 1,
  ALREADY_ATTACHED: 1,
  ALREADY_MOUNTED: 1,
  ALREADY_EXISTS: 1,
  NOT_ATTACHED: 1,
  NOT_MOUNTED: 1,
  NOT_FORMATTED: 1,
  AMBIGUOUS: 1,
  INVALID_INPUT: 1,
  CONFIG_INVALID: 1,
  PERMISSION_DENIED: 1,
  PERSISTENCE_FAILURE: 2,
  DATABASE_CORRUPT: 2,
  LOCK_TIMEOUT: 2,
  COMMAND_FAILED: 2,
  COMMAND_TIMEOUT: 2,
  COMMAND_NOT_AVAILABLE: 2,
  VERIFICATION_FAILED: 2,
};

/**
 * Base error class for all wsl-vhd errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class VhdError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'VhdError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, VhdError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * A lookup found no matching mapping, history entry, file, device or UUID.
 */
export class NotFoundError extends VhdError {
  constructor(message: string, suggestion?: string) {
    super(message, 'NOT_FOUND', suggestion);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Codes of VhdStateError
 */
export type VhdStateCode =
  | 'ALREADY_ATTACHED'
  | 'ALREADY_MOUNTED'
  | 'ALREADY_EXISTS'
  | 'NOT_ATTACHED'
  | 'NOT_MOUNTED'
  | 'NOT_FORMATTED';

/**
 * The VHD is in a state that conflicts with the requested operation.
 */
export class VhdStateError extends VhdError {
  constructor(
    message: string,
    code: VhdStateCode,
    suggestion?: string,
    public readonly path?: string
  ) {
    super(message, code, suggestion);
    this.name = 'VhdStateError';
    Object.setPrototypeOf(this, VhdStateError.prototype);
  }
}

/**
 * A query matched more than one candidate and cannot pick one.
 */
export class AmbiguousError extends VhdError {
  constructor(
    message: string,
    public readonly candidates: string[],
    suggestion?: string
  ) {
    super(message, 'AMBIGUOUS', suggestion);
    this.name = 'AmbiguousError';
    Object.setPrototypeOf(this, AmbiguousError.prototype);
  }

  override format(): string {
    let output = `Error: ${this.message}\n\nCandidates:`;
    for (const candidate of this.candidates) {
      output += `\n  - ${candidate}`;
    }
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * A user-supplied or persisted value does not match its grammar.
 */
export class InvalidInputError extends VhdError {
  constructor(
    message: string,
    public readonly field?: string,
    suggestion?: string
  ) {
    super(message, 'INVALID_INPUT', suggestion);
    this.name = 'InvalidInputError';
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}

/**
 * The operation needs root privileges the process does not have.
 */
export class PermissionError extends VhdError {
  constructor(message: string, suggestion = 'Run the command with sudo.') {
    super(message, 'PERMISSION_DENIED', suggestion);
    this.name = 'PermissionError';
    Object.setPrototypeOf(this, PermissionError.prototype);
  }
}

/**
 * Configuration could not be loaded or failed validation.
 */
export class ConfigError extends VhdError {
  constructor(
    message: string,
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, 'CONFIG_INVALID', suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * The tracking database could not be read, parsed, written or replaced.
 */
export class PersistenceError extends VhdError {
  constructor(
    message: string,
    public readonly filePath: string,
    code: 'PERSISTENCE_FAILURE' | 'DATABASE_CORRUPT' | 'LOCK_TIMEOUT' = 'PERSISTENCE_FAILURE',
    suggestion?: string,
    public override readonly cause?: Error
  ) {
    super(message, code, suggestion);
    this.name = 'PersistenceError';
    Object.setPrototypeOf(this, PersistenceError.prototype);
  }
}

/**
 * The tracking database exists but is not a valid tracking file.
 *
 * Mutating operations refuse to overwrite it.
 */
export class CorruptDatabaseError extends PersistenceError {
  constructor(filePath: string, detail: string) {
    super(
      `Tracking database is corrupt: ${filePath} (${detail})`,
      filePath,
      'DATABASE_CORRUPT',
      'Inspect or move the file aside; it has not been modified.'
    );
    this.name = 'CorruptDatabaseError';
    Object.setPrototypeOf(this, CorruptDatabaseError.prototype);
  }
}

/**
 * Another process held the tracking lock for longer than the lock timeout.
 */
export class LockTimeoutError extends PersistenceError {
  constructor(
    lockPath: string,
    public readonly holderPid: number | null
  ) {
    super(
      `Timed out waiting for tracking lock: ${lockPath}` +
        (holderPid !== null ? ` (held by PID ${holderPid})` : ''),
      lockPath,
      'LOCK_TIMEOUT',
      'Wait for the other wsl-vhd process to finish, then retry.'
    );
    this.name = 'LockTimeoutError';
    Object.setPrototypeOf(this, LockTimeoutError.prototype);
  }
}

/**
 * An external command failed, timed out or could not be started.
 */
export class CommandError extends VhdError {
  constructor(
    message: string,
    code: 'COMMAND_FAILED' | 'COMMAND_TIMEOUT' | 'COMMAND_NOT_AVAILABLE',
    public readonly command: string,
    public readonly commandExitCode: number | null,
    public readonly stderr: string,
    suggestion?: string
  ) {
    super(message, code, suggestion);
    this.name = 'CommandError';
    Object.setPrototypeOf(this, CommandError.prototype);
  }
}

/**
 * Check if an error is a VhdError.
 */
export function isVhdError(error: unknown): error is VhdError {
  return error instanceof VhdError;
}

/**
 * Check if an error is a NotFoundError.
 */
export function isNotFound(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isVhdError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}
