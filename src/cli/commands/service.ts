/**
 * Service Command Handlers
 *
 * Manage systemd services that mount a VHD when WSL starts. Every
 * subcommand except status and list needs root.
 */

import { createUnitManager, runCommand, type GlobalOptions } from '../context.js';

export interface ServiceCreateOptions extends GlobalOptions {
  vhdPath: string;
  mountPoint: string;
  name?: string;
}

export interface ServiceNameOptions extends GlobalOptions {
  name: string;
}

export async function serviceCreateCommand(options: ServiceCreateOptions): Promise<void> {
  await runCommand('service create', options, async ({ config, logger, output }) => {
    const units = createUnitManager(config, logger);
    const created = await units.create(options.vhdPath, options.mountPoint, options.name);

    output.setData('service', created);
    output.line(`Service file: ${created.unitPath}`);
    output.line(`Mounts UUID ${created.uuid} at ${created.mountPoint}`);
    output.newline();
    output.info(`Enable it with: sudo wsl-vhd service enable --name ${created.unit}`);
  });
}

export async function serviceEnableCommand(options: ServiceNameOptions): Promise<void> {
  await runCommand('service enable', options, async ({ config, logger, output }) => {
    const unit = await createUnitManager(config, logger).enable(options.name);

    output.setData('service', unit);
    output.info(`Start it now with: sudo systemctl start ${unit}`);
  });
}

export async function serviceDisableCommand(options: ServiceNameOptions): Promise<void> {
  await runCommand('service disable', options, async ({ config, logger, output }) => {
    output.setData('service', await createUnitManager(config, logger).disable(options.name));
  });
}

export async function serviceRemoveCommand(options: ServiceNameOptions): Promise<void> {
  await runCommand('service remove', options, async ({ config, logger, output }) => {
    output.setData('service', await createUnitManager(config, logger).remove(options.name));
  });
}

export async function serviceStatusCommand(options: ServiceNameOptions): Promise<void> {
  await runCommand('service status', options, async ({ config, logger, output }) => {
    const state = await createUnitManager(config, logger).status(options.name);
    output.unitTable([state]);
  });
}

export async function serviceListCommand(options: GlobalOptions): Promise<void> {
  await runCommand('service list', options, async ({ config, logger, output }) => {
    output.unitTable(await createUnitManager(config, logger).list());
  });
}
