/**
 * Verbose Output Helpers
 *
 * Formats external commands for --debug CLI output.
 * Used by CommandExecutor to print commands to stderr before execution.
 */

/**
 * Prefix for verbose command output lines.
 */
const PREFIX = '[$] ';

/**
 * Indent for continuation lines (matches PREFIX width).
 */
const CONTINUATION_INDENT = '    ';

const ANSI_GRAY = '\x1b[90m';
const ANSI_RESET = '\x1b[0m';

/**
 * Check whether stderr supports ANSI escape codes.
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Format a command line for verbose output.
 *
 * The first line is prefixed with `[$] `, continuation lines are indented to
 * the prefix width, and the block is fenced with blank lines. With `ansi`
 * the block is wrapped in gray (SGR 90).
 *
 * @returns Formatted string ready for `process.stderr.write()`
 */
export function formatCommand(commandLine: string, ansi: boolean): string {
  const body = commandLine
    .split('\n')
    .map((line, i) => `${i === 0 ? PREFIX : CONTINUATION_INDENT}${line}\n`)
    .join('');

  const plain = `\n${body}\n`;

  if (ansi) {
    return `${ANSI_GRAY}${plain}${ANSI_RESET}`;
  }

  return plain;
}
