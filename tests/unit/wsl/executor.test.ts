/**
 * Unit tests for the Command Executor
 *
 * Commands are not actually run: spawn targets a program that does not
 * exist, and the output helpers are tested directly.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';

import {
  CommandExecutor,
  cleanOutput,
  formatErrorMessage,
  runJson,
  type CommandResult,
  type CommandRunner,
} from '../../../src/wsl/executor.js';
import { CommandError } from '../../../src/core/errors.js';

const MISSING_COMMAND = 'wsl-vhd-test-no-such-command';

function fixedRunner(result: CommandResult): CommandRunner {
  return {
    run: async () => result,
  };
}

describe('CommandExecutor', () => {
  it('should raise COMMAND_NOT_AVAILABLE when the program is missing', async () => {
    const executor = new CommandExecutor();

    await assert.rejects(executor.run(MISSING_COMMAND, ['--flag']), (error: unknown) => {
      assert.ok(error instanceof CommandError);
      assert.strictEqual(error.code, 'COMMAND_NOT_AVAILABLE');
      assert.strictEqual(error.command, `${MISSING_COMMAND} --flag`);
      assert.strictEqual(error.commandExitCode, null);
      return true;
    });
  });

  describe('verbose mode', () => {
    let originalWrite: typeof process.stderr.write;
    let captured: string[];

    beforeEach(() => {
      originalWrite = process.stderr.write;
      captured = [];
      process.stderr.write = function (chunk: unknown): boolean {
        if (typeof chunk === 'string') {
          captured.push(chunk);
        }
        return true;
      } as typeof process.stderr.write;
    });

    afterEach(() => {
      process.stderr.write = originalWrite;
    });

    it('should not echo commands by default', async () => {
      await assert.rejects(new CommandExecutor().run(MISSING_COMMAND, []));

      assert.strictEqual(captured.filter((s) => s.includes('[$]')).length, 0);
    });

    it('should echo the command line once before running it', async () => {
      await assert.rejects(new CommandExecutor({ verbose: true }).run(MISSING_COMMAND, ['-J', 'x']));

      const echoed = captured.filter((s) => s.includes('[$]'));
      assert.strictEqual(echoed.length, 1);
      assert.ok(echoed[0]?.includes(`[$] ${MISSING_COMMAND} -J x`));
    });
  });
});

describe('runJson', () => {
  it('should parse stdout', async () => {
    const runner = fixedRunner({ stdout: '{"blockdevices":[]}', stderr: '', exitCode: 0 });

    const parsed = await runJson<{ blockdevices: unknown[] }>(runner, 'lsblk', ['-J']);

    assert.deepStrictEqual(parsed, { blockdevices: [] });
  });

  it('should raise CommandError for invalid JSON', async () => {
    const runner = fixedRunner({ stdout: 'not json', stderr: '', exitCode: 0 });

    await assert.rejects(runJson(runner, 'lsblk', ['-J']), (error: unknown) => {
      assert.ok(error instanceof CommandError);
      assert.strictEqual(error.message, 'Invalid JSON output from lsblk: not json');
      assert.strictEqual(error.command, 'lsblk -J');
      return true;
    });
  });
});

describe('cleanOutput', () => {
  it('should strip NUL bytes from wsl.exe output', () => {
    assert.strictEqual(cleanOutput('E\0r\0r\0o\0r\0'), 'Error');
  });

  it('should strip ANSI sequences and carriage returns', () => {
    assert.strictEqual(cleanOutput('\x1b[31mred\x1b[0m\r\n'), 'red\n');
  });
});

describe('formatErrorMessage', () => {
  it('should join the first three meaningful lines', () => {
    const message = formatErrorMessage('mount', {
      stdout: '',
      stderr: 'line one\n\n  line two\nline three\nline four\n',
      exitCode: 32,
    });

    assert.strictEqual(message, 'mount failed: line one | line two | line three');
  });

  it('should fall back to stdout, then to the exit code', () => {
    assert.strictEqual(
      formatErrorMessage('wsl.exe', { stdout: 'bad path', stderr: '', exitCode: 1 }),
      'wsl.exe failed: bad path'
    );
    assert.strictEqual(
      formatErrorMessage('mkfs', { stdout: '', stderr: '  ', exitCode: 4 }),
      'mkfs exited with code 4'
    );
  });
});
