/**
 * Mount Command Handler
 */

import { runCommand, type GlobalOptions } from '../context.js';

export interface MountCommandOptions extends GlobalOptions {
  vhdPath: string;
  mountPoint: string;
}

/**
 * Mount a VHD, attaching it first when needed.
 */
export async function mountCommand(options: MountCommandOptions): Promise<void> {
  await runCommand('mount', options, async ({ service, output }) => {
    const result = await service.mount(options.vhdPath, options.mountPoint);

    output.setData('vhd', result);
    if (result.alreadyMounted) {
      output.line(`${result.path} is already mounted at ${result.mountPoint}`);
    } else {
      output.line(`Mounted ${result.path} at ${result.mountPoint}`);
    }
  });
}
