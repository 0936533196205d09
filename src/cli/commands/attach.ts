/**
 * Attach Command Handler
 */

import { runCommand, type GlobalOptions } from '../context.js';

export interface AttachCommandOptions extends GlobalOptions {
  vhdPath: string;
}

/**
 * Attach a VHD as a bare block device and start tracking it.
 */
export async function attachCommand(options: AttachCommandOptions): Promise<void> {
  await runCommand('attach', options, async ({ service, output }) => {
    const result = await service.attach(options.vhdPath);

    output.setData('vhd', result);
    if (result.alreadyAttached) {
      output.line(`${result.path} is already attached as /dev/${result.deviceName}`);
    } else {
      output.line(`Attached ${result.path} as /dev/${result.deviceName}`);
    }
    if (!result.uuid) {
      output.info(`No filesystem yet. Format it with: wsl-vhd format --vhd-path "${options.vhdPath}"`);
    }
  });
}
