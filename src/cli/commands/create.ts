/**
 * Create Command Handler
 */

import { formatBytes } from '../../lib/size.js';
import { runCommand, type GlobalOptions } from '../context.js';

export interface CreateCommandOptions extends GlobalOptions {
  vhdPath: string;
  size?: string;
  /** Filesystem to create; the VHD is left unattached when omitted */
  format?: string;
}

/**
 * Create a dynamic VHDX, optionally attaching and formatting it.
 */
export async function createCommand(options: CreateCommandOptions): Promise<void> {
  await runCommand('create', options, async ({ service, output }) => {
    const result = await service.create(options.vhdPath, options.size, options.format);

    output.setData('vhd', result);
    output.line(`Created ${result.path} (${formatBytes(result.sizeBytes)})`);
    if (result.format) {
      output.line(
        `Attached as /dev/${result.format.deviceName}, ${result.format.fsType} UUID ${result.format.uuid}`
      );
    }
  });
}
