/**
 * Status Command Handler
 *
 * Shows tracked VHDs with their live attach and mount state.
 */

import { runCommand, type GlobalOptions } from '../context.js';
import { toStatusTarget, type TargetFlags } from '../targets.js';

export interface StatusCommandOptions extends GlobalOptions, TargetFlags {}

/**
 * Execute the status command.
 *
 * Without a target flag every tracked VHD is listed.
 */
export async function statusCommand(options: StatusCommandOptions): Promise<void> {
  await runCommand('status', options, async ({ service, output }) => {
    const statuses = await service.status(toStatusTarget(options));
    output.statusTable(statuses);
  });
}
