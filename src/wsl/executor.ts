/**
 * Command Executor for WSL Operations
 *
 * Spawns external commands (lsblk, blkid, wsl.exe, mount, mkfs, qemu-img)
 * and captures their output. Output from wsl.exe is UTF-16 on the Windows
 * side and arrives with interleaved NUL bytes, which are stripped here.
 */

import { spawn } from 'node:child_process';

import { CommandError } from '../core/errors.js';
import { formatCommand, supportsAnsi } from './verbose.js';

/**
 * Result of a completed command
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Options for running a command
 */
export interface RunOptions {
  /** Timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Resolve with the result instead of rejecting on a non-zero exit */
  allowFailure?: boolean;
}

/**
 * Runs external commands. Implemented by CommandExecutor; tests substitute fakes.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

/**
 * Options for constructing a CommandExecutor
 */
export interface CommandExecutorOptions {
  /** Print commands to stderr before execution (default: false) */
  verbose?: boolean;
}

/**
 * Executes external commands with a timeout and classifies failures.
 */
export class CommandExecutor implements CommandRunner {
  private readonly verbose: boolean;

  constructor(options?: CommandExecutorOptions) {
    this.verbose = options?.verbose ?? false;
  }

  /**
   * Run a command and capture its output.
   *
   * @throws CommandError if the command cannot be started, times out, or
   *   exits non-zero (unless allowFailure is set)
   */
  async run(
    command: string,
    args: readonly string[],
    options: RunOptions = {}
  ): Promise<CommandResult> {
    const { timeout = 30000, allowFailure = false } = options;
    const commandLine = [command, ...args].join(' ');

    if (this.verbose) {
      process.stderr.write(formatCommand(commandLine, supportsAnsi()));
    }

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, [...args]);

      let stdout = '';
      let stderr = '';
      let killed = false;

      const timeoutId = setTimeout(() => {
        killed = true;
        child.kill('SIGTERM');
        reject(
          new CommandError(
            `${command} timed out after ${timeout}ms`,
            'COMMAND_TIMEOUT',
            commandLine,
            null,
            cleanOutput(stderr)
          )
        );
      }, timeout);

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error: Error) => {
        clearTimeout(timeoutId);
        if (!killed) {
          reject(
            new CommandError(
              `Failed to run ${command}: ${error.message}`,
              'COMMAND_NOT_AVAILABLE',
              commandLine,
              null,
              cleanOutput(stderr),
              `Make sure ${command} is installed and on PATH.`
            )
          );
        }
      });

      child.on('close', (code: number | null) => {
        clearTimeout(timeoutId);
        if (killed) return;

        const result: CommandResult = {
          stdout: cleanOutput(stdout),
          stderr: cleanOutput(stderr),
          exitCode: code ?? -1,
        };

        if (result.exitCode !== 0 && !allowFailure) {
          reject(
            new CommandError(
              formatErrorMessage(command, result),
              'COMMAND_FAILED',
              commandLine,
              code,
              result.stderr
            )
          );
          return;
        }

        resolve(result);
      });
    });
  }
}

/**
 * Run a command and parse its stdout as JSON.
 *
 * @throws CommandError if the output is not valid JSON
 */
export async function runJson<T>(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: RunOptions
): Promise<T> {
  const result = await runner.run(command, args, options);
  try {
    return JSON.parse(result.stdout) as T;
  } catch {
    throw new CommandError(
      `Invalid JSON output from ${command}: ${result.stdout.slice(0, 200)}`,
      'COMMAND_FAILED',
      [command, ...args].join(' '),
      result.exitCode,
      result.stderr
    );
  }
}

/**
 * Strip NUL bytes, ANSI escape sequences and carriage returns.
 */
export function cleanOutput(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\0/g, '').replace(/\x1b\[[0-9;]*[a-zA-Z]/g, '').replace(/\r/g, '');
}

/**
 * Format a user-friendly error message from a failed command.
 */
export function formatErrorMessage(command: string, result: CommandResult): string {
  const output = result.stderr.trim() || result.stdout.trim();
  const meaningful = output
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .slice(0, 3);

  if (meaningful.length > 0) {
    return `${command} failed: ${meaningful.join(' | ')}`;
  }

  return `${command} exited with code ${result.exitCode}`;
}
