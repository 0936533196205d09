/**
 * Resize Command Handler
 */

import { formatBytes } from '../../lib/size.js';
import { runCommand, type GlobalOptions } from '../context.js';

export interface ResizeCommandOptions extends GlobalOptions {
  vhdPath: string;
  size: string;
}

/**
 * Move a mounted VHD's files onto a new disk of the requested size.
 */
export async function resizeCommand(options: ResizeCommandOptions): Promise<void> {
  await runCommand('resize', options, async ({ service, output }) => {
    const result = await service.resize(options.vhdPath, options.size);

    output.setData('vhd', result);
    output.line(`Resized ${result.path} to ${formatBytes(result.sizeBytes)}`);
    output.line(`${result.fileCount} files copied; original kept at ${result.backupPath}`);
    output.info('Delete the backup once the new disk checks out.');
  });
}
