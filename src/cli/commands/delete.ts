/**
 * Delete Command Handler
 *
 * Removes a detached VHD file and its tracking records.
 * SAFETY: the file is only deleted when --yes is given.
 */

import { InvalidInputError } from '../../core/errors.js';
import { runCommand, type GlobalOptions } from '../context.js';

export interface DeleteCommandOptions extends GlobalOptions {
  vhdPath: string;
}

export async function deleteCommand(options: DeleteCommandOptions): Promise<void> {
  await runCommand('delete', options, async ({ service, config, output }) => {
    if (!config.yes) {
      throw new InvalidInputError(
        `Refusing to delete ${options.vhdPath} without confirmation`,
        'yes',
        `Use: wsl-vhd delete --vhd-path "${options.vhdPath}" --yes`
      );
    }

    await service.delete(options.vhdPath);

    output.setData('path', options.vhdPath);
    output.line(`Deleted ${options.vhdPath}`);
  });
}
