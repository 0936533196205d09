/**
 * CLI Output Layer
 *
 * Provides consistent output formatting for CLI commands in both
 * human-readable and JSON modes.
 */

import type { ErrorCode, VhdError } from '../core/errors.js';
import type { ReconcileResult } from '../core/reconciler.js';
import type { VhdStatus } from '../core/service.js';
import type { UnitState } from '../core/units.js';
import type { DetachEvent } from '../state/types.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CommandResult {
  success: boolean;
  command: string;
  vhds?: VhdStatus[];
  history?: DetachEvent[];
  sync?: ReconcileResult;
  services?: UnitState[];
  error?: ErrorOutput;
  [key: string]: unknown;
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | 'UNKNOWN';
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

/**
 * Output mode for the formatter
 */
export type OutputMode = 'human' | 'json';

/**
 * Options for the formatter
 */
export interface OutputOptions {
  json?: boolean;
  /** Suppress progress messages; results are still printed */
  quiet?: boolean;
}

// =============================================================================
// OutputFormatter Class
// =============================================================================

/**
 * CLI-specific output formatter.
 *
 * In JSON mode, output is collected and emitted as a single JSON object
 * at flush.
 */
export class OutputFormatter {
  private readonly mode: OutputMode;
  private readonly quiet: boolean;
  private readonly result: CommandResult;
  private indentLevel: number = 0;

  constructor(command: string, options: OutputOptions = {}) {
    this.mode = options.json ? 'json' : 'human';
    this.quiet = options.quiet ?? false;
    this.result = {
      success: true,
      command,
    };
  }

  /**
   * Get the output mode.
   */
  getMode(): OutputMode {
    return this.mode;
  }

  /**
   * Check if in JSON mode.
   */
  isJson(): boolean {
    return this.mode === 'json';
  }

  // ===========================================================================
  // Indentation
  // ===========================================================================

  indent(): void {
    this.indentLevel++;
  }

  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  private showsProgress(): boolean {
    return this.mode === 'human' && !this.quiet;
  }

  // ===========================================================================
  // Basic Output Methods
  // ===========================================================================

  /**
   * Print a success message.
   */
  success(message: string): void {
    if (this.showsProgress()) {
      console.log(`${this.getIndent()}✓ ${message}`);
    }
  }

  /**
   * Print an error message and mark the command failed.
   */
  error(message: string, error?: VhdError): void {
    this.result.success = false;

    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${message}`);
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    }

    this.result.error = {
      code: error?.code ?? 'UNKNOWN',
      message,
      ...(error?.suggestion ? { suggestion: error.suggestion } : {}),
    };
  }

  /**
   * Attach details to the error of a failed command.
   */
  errorDetails(details: Record<string, unknown>): void {
    if (this.result.error) {
      this.result.error.details = details;
    }
  }

  /**
   * Print configuration validation errors under the current error.
   */
  validationErrors(errors: Array<{ path: string; message: string }>): void {
    if (this.mode === 'human') {
      for (const error of errors) {
        console.error(`${this.getIndent()}  - ${error.path}: ${error.message}`);
      }
    }
    this.errorDetails({ validationErrors: errors });
  }

  /**
   * Print an info message.
   */
  info(message: string): void {
    if (this.showsProgress()) {
      console.log(`${this.getIndent()}${message}`);
    }
  }

  /**
   * Print a result line. Shown in quiet mode too.
   */
  line(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${message}`);
    }
  }

  /**
   * Print a warning message.
   */
  warning(message: string): void {
    if (this.mode === 'human') {
      console.warn(`${this.getIndent()}⚠ ${message}`);
    }
  }

  /**
   * Print a blank line.
   */
  newline(): void {
    if (this.showsProgress()) {
      console.log();
    }
  }

  // ===========================================================================
  // Table Output
  // ===========================================================================

  /**
   * Print a table of data.
   */
  table(headers: string[], rows: string[][]): void {
    if (this.mode !== 'human') {
      return;
    }

    const widths = headers.map((h, i) => {
      const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
      return Math.max(h.length, maxRowWidth);
    });

    const format = (cells: string[]): string =>
      cells
        .map((cell, i) => cell.padEnd(widths[i] ?? 0))
        .join('  ')
        .trimEnd();

    console.log(`${this.getIndent()}${format(headers)}`);
    for (const row of rows) {
      console.log(`${this.getIndent()}${format(row)}`);
    }
  }

  // ===========================================================================
  // Status Output
  // ===========================================================================

  /**
   * Print the status table of tracked VHDs.
   */
  statusTable(statuses: VhdStatus[]): void {
    this.result.vhds = statuses;

    if (statuses.length === 0) {
      this.line('No tracked VHDs.');
      return;
    }

    const headers = ['PATH', 'STATE', 'DEVICE', 'UUID', 'MOUNT POINTS', 'USE'];
    const rows = statuses.map((status) => [
      status.path,
      status.state,
      status.state === 'detached' ? '-' : status.deviceName || '-',
      status.uuid || '-',
      status.mountPoints.join(',') || '-',
      status.fsUse ?? '-',
    ]);
    this.table(headers, rows);

    this.newline();
    const attached = statuses.filter((status) => status.state !== 'detached').length;
    this.info(
      `${statuses.length} VHD${statuses.length === 1 ? '' : 's'} tracked, ${attached} attached.`
    );
  }

  // ===========================================================================
  // History Output
  // ===========================================================================

  /**
   * Print detach history, newest first.
   */
  historyTable(events: DetachEvent[]): void {
    this.result.history = events;

    if (events.length === 0) {
      this.line('No detach history.');
      return;
    }

    this.table(
      ['TIMESTAMP', 'PATH', 'UUID', 'DEVICE'],
      events.map((event) => [
        event.timestamp,
        event.path,
        event.uuid || '-',
        event.deviceName || '-',
      ])
    );
  }

  // ===========================================================================
  // Sync Output
  // ===========================================================================

  /**
   * Print the outcome of a tracking sync.
   */
  syncReport(report: ReconcileResult): void {
    this.result.sync = report;

    const verb = report.dryRun ? 'Would remove' : 'Removed';
    const total = report.removedMappings.length + report.removedHistory.length;

    if (total === 0) {
      this.line('Tracking is in sync. Nothing to remove.');
    }

    for (const entry of report.removedMappings) {
      this.line(`${verb} mapping ${entry.path} (${entry.reason})`);
    }
    for (const entry of report.removedHistory) {
      const count = `${entry.entries} history entr${entry.entries === 1 ? 'y' : 'ies'}`;
      this.line(`${verb} ${count} for ${entry.path} (${entry.reason})`);
    }
    for (const failure of report.errors) {
      this.warning(`Could not check ${failure.path}: ${failure.message}`);
    }

    if (total > 0) {
      this.newline();
      this.info(
        report.dryRun
          ? 'Dry run: no changes made. Run `wsl-vhd sync` to apply.'
          : `Done. ${report.removedMappings.length} mapping(s) and ${report.removedHistory.length} history path(s) removed.`
      );
    }
  }

  // ===========================================================================
  // Service Output
  // ===========================================================================

  /**
   * Print mount units with their systemd state.
   */
  unitTable(states: UnitState[]): void {
    this.result.services = states;

    if (states.length === 0) {
      this.line('No VHD mount services found.');
      return;
    }

    this.table(
      ['SERVICE', 'ENABLED', 'ACTIVE'],
      states.map((state) => [state.unit, state.enabled, state.active])
    );
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  /**
   * Set additional data for JSON output.
   */
  setData(key: string, value: unknown): void {
    this.result[key] = value;
  }

  /**
   * Set success status explicitly.
   */
  setSuccess(success: boolean): void {
    this.result.success = success;
  }

  /**
   * Get the command result object.
   */
  getResult(): CommandResult {
    return this.result;
  }

  /**
   * Flush output.
   *
   * In JSON mode, prints the collected JSON.
   * In human mode, does nothing (output was printed inline).
   */
  flush(): void {
    if (this.mode === 'json') {
      console.log(JSON.stringify(this.result, null, 2));
    }
  }

  /**
   * Get the exit code based on success status.
   */
  getExitCode(): number {
    return this.result.success ? 0 : 1;
  }
}

/**
 * Create an OutputFormatter from CLI options.
 */
export function createOutput(command: string, options: OutputOptions): OutputFormatter {
  return new OutputFormatter(command, options);
}
