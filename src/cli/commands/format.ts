/**
 * Format Command Handler
 *
 * Creates a filesystem on an attached VHD. Any existing filesystem is lost.
 */

import { runCommand, type GlobalOptions } from '../context.js';
import { toFormatTarget, type TargetFlags } from '../targets.js';

export interface FormatCommandOptions extends GlobalOptions, TargetFlags {
  type?: string;
}

export async function formatCommand(options: FormatCommandOptions): Promise<void> {
  await runCommand('format', options, async ({ service, output }) => {
    const result = await service.format(toFormatTarget(options), options.type);

    output.setData('vhd', result);
    output.line(`Formatted /dev/${result.deviceName} as ${result.fsType} (UUID ${result.uuid})`);
  });
}
