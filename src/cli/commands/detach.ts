/**
 * Detach Command Handler
 */

import { runCommand, type GlobalOptions } from '../context.js';
import { toDetachTarget, type TargetFlags } from '../targets.js';

export interface DetachCommandOptions extends GlobalOptions, TargetFlags {}

/**
 * Detach a VHD (unmounting it first) and record the detach in history.
 */
export async function detachCommand(options: DetachCommandOptions): Promise<void> {
  await runCommand('detach', options, async ({ service, output }) => {
    const event = await service.detach(toDetachTarget(options));

    output.setData('detach', event);
    output.line(`Detached ${event.path}`);
  });
}
