/**
 * History Command Handler
 */

import { InvalidInputError } from '../../core/errors.js';
import { runCommand, type GlobalOptions } from '../context.js';

export interface HistoryCommandOptions extends GlobalOptions {
  limit?: string;
  vhdPath?: string;
}

/**
 * Show recent detach events, newest first.
 */
export async function historyCommand(options: HistoryCommandOptions): Promise<void> {
  await runCommand('history', options, async ({ service, output }) => {
    const events = await service.history(parseLimit(options.limit), options.vhdPath);
    output.historyTable(events);
  });
}

function parseLimit(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (!/^[0-9]+$/.test(raw)) {
    throw new InvalidInputError(`Invalid limit: ${raw}`, 'limit', 'Use a non-negative integer.');
  }
  return Number.parseInt(raw, 10);
}
