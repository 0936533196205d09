/**
 * Sync Command Handler
 *
 * Drops tracking records for VHDs that are no longer attached or whose
 * files are gone.
 */

import { runCommand, type GlobalOptions } from '../context.js';

export interface SyncCommandOptions extends GlobalOptions {
  dryRun?: boolean;
}

export async function syncCommand(options: SyncCommandOptions): Promise<void> {
  await runCommand('sync', options, async ({ service, output }) => {
    const report = await service.sync(options.dryRun ?? false);
    output.syncReport(report);
  });
}
