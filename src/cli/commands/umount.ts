/**
 * Umount Command Handler
 */

import { runCommand, type GlobalOptions } from '../context.js';
import { toUnmountTarget, type TargetFlags } from '../targets.js';

export interface UmountCommandOptions extends GlobalOptions, TargetFlags {}

/**
 * Unmount a VHD's filesystem. The VHD stays attached.
 */
export async function umountCommand(options: UmountCommandOptions): Promise<void> {
  await runCommand('umount', options, async ({ service, output }) => {
    const result = await service.unmount(toUnmountTarget(options));

    output.setData('vhd', result);
    output.line(`Unmounted ${result.mountPoint}`);
  });
}
