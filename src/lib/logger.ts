/**
 * Logger for wsl-vhd
 *
 * Progress and diagnostic messages for human readers. Command results are
 * printed by the CLI output layer, not here.
 */

/**
 * Log level for messages
 */
export type LogLevel = 'debug' | 'info' | 'success' | 'warning' | 'error';

/**
 * Options controlling which messages are printed
 */
export interface LoggerOptions {
  /** Suppress info and success messages */
  quiet?: boolean;
  /** Print debug messages */
  debug?: boolean;
  /** Machine-readable mode: only warnings, errors and debug (on stderr) are printed */
  json?: boolean;
}

/**
 * Destination for log lines, replaceable in tests.
 */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Logger class with quiet and debug modes.
 *
 * Info and success go to stdout; warnings, errors and debug lines go to
 * stderr so they never mix with JSON output.
 */
export class Logger {
  private readonly quiet: boolean;
  private readonly debugEnabled: boolean;
  private readonly json: boolean;
  private readonly sink: LogSink;
  private indentLevel: number = 0;

  constructor(options: LoggerOptions = {}, sink: LogSink = consoleSink) {
    this.quiet = options.quiet ?? false;
    this.debugEnabled = options.debug ?? false;
    this.json = options.json ?? false;
    this.sink = sink;
  }

  /**
   * Whether debug output is enabled.
   */
  isDebug(): boolean {
    return this.debugEnabled;
  }

  /**
   * Increase indent level for nested output.
   */
  indent(): void {
    this.indentLevel++;
  }

  /**
   * Decrease indent level.
   */
  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  private showsHuman(): boolean {
    return !this.quiet && !this.json;
  }

  /**
   * Log a debug message (only with --debug).
   */
  debug(message: string): void {
    if (this.debugEnabled) {
      this.sink.err(`${this.getIndent()}[DEBUG] ${message}`);
    }
  }

  /**
   * Log an info message.
   */
  info(message: string): void {
    if (this.showsHuman()) {
      this.sink.out(`${this.getIndent()}${message}`);
    }
  }

  /**
   * Log a success message.
   */
  success(message: string): void {
    if (this.showsHuman()) {
      this.sink.out(`${this.getIndent()}✓ ${message}`);
    }
  }

  /**
   * Log a warning message.
   */
  warning(message: string): void {
    this.sink.err(`${this.getIndent()}⚠ ${message}`);
  }

  /**
   * Log an error message.
   */
  error(message: string): void {
    this.sink.err(`${this.getIndent()}✗ ${message}`);
  }

  /**
   * Log at an arbitrary level.
   */
  log(level: LogLevel, message: string): void {
    switch (level) {
      case 'debug':
        this.debug(message);
        break;
      case 'info':
        this.info(message);
        break;
      case 'success':
        this.success(message);
        break;
      case 'warning':
        this.warning(message);
        break;
      case 'error':
        this.error(message);
        break;
    }
  }
}

/**
 * A logger that prints nothing.
 */
export function createSilentLogger(): Logger {
  return new Logger({ quiet: true }, { out: () => undefined, err: () => undefined });
}
