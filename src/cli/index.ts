#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import type { GlobalOptions } from './context.js';
import { statusCommand } from './commands/status.js';
import { attachCommand } from './commands/attach.js';
import { detachCommand } from './commands/detach.js';
import { mountCommand } from './commands/mount.js';
import { umountCommand } from './commands/umount.js';
import { formatCommand } from './commands/format.js';
import { createCommand } from './commands/create.js';
import { deleteCommand } from './commands/delete.js';
import { resizeCommand } from './commands/resize.js';
import { historyCommand } from './commands/history.js';
import { syncCommand } from './commands/sync.js';
import {
  serviceCreateCommand,
  serviceDisableCommand,
  serviceEnableCommand,
  serviceListCommand,
  serviceRemoveCommand,
  serviceStatusCommand,
} from './commands/service.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packagePath, 'utf-8')) as { version: string };

program
  .name('wsl-vhd')
  .description('Attach, mount and track Windows VHD/VHDX disks inside WSL')
  .version(packageJson.version)
  .option('-q, --quiet', 'Only print results and errors')
  .option('-d, --debug', 'Print debug messages and external commands before execution')
  .option('-y, --yes', 'Confirm destructive operations')
  .option('--json', 'Output as JSON')
  .option('--config <file>', 'Configuration file (default: ~/.config/wsl-vhd/config.yaml)');

/**
 * Merge the global flags into command-level options.
 * Supports both positions:
 *   wsl-vhd --json status    (parent parses --json)
 *   wsl-vhd status --json    (global options are recognized after the subcommand)
 */
function withGlobalOpts<T extends object>(opts: T): T & GlobalOptions {
  const globalOpts = program.opts<GlobalOptions>();
  return { ...globalOpts, ...opts };
}

program
  .command('status')
  .description('Show tracked VHDs and their state')
  .option('--vhd-path <path>', 'Windows path of the VHD')
  .option('--uuid <uuid>', 'Filesystem UUID')
  .option('--mount-point <dir>', 'Mount point inside WSL')
  .action((opts) => statusCommand(withGlobalOpts(opts)));

program
  .command('attach')
  .description('Attach a VHD as a bare block device')
  .requiredOption('--vhd-path <path>', 'Windows path of the VHD')
  .action((opts) => attachCommand(withGlobalOpts(opts)));

program
  .command('detach')
  .description('Unmount and detach a VHD')
  .option('--vhd-path <path>', 'Windows path of the VHD')
  .option('--uuid <uuid>', 'Filesystem UUID')
  .option('--dev-name <name>', 'Block device name, e.g. sdd')
  .action((opts) => detachCommand(withGlobalOpts(opts)));

program
  .command('mount')
  .description('Mount a VHD, attaching it first when needed')
  .requiredOption('--vhd-path <path>', 'Windows path of the VHD')
  .requiredOption('--mount-point <dir>', 'Mount point inside WSL')
  .action((opts) => mountCommand(withGlobalOpts(opts)));

program
  .command('umount')
  .description('Unmount a VHD filesystem, leaving it attached')
  .option('--vhd-path <path>', 'Windows path of the VHD')
  .option('--uuid <uuid>', 'Filesystem UUID')
  .option('--mount-point <dir>', 'Mount point inside WSL')
  .action((opts) => umountCommand(withGlobalOpts(opts)));

program
  .command('format')
  .description('Create a filesystem on an attached VHD (erases its data)')
  .option('--vhd-path <path>', 'Windows path of the VHD')
  .option('--dev-name <name>', 'Block device name, e.g. sdd')
  .option('--type <fs>', 'Filesystem type (default from config: ext4)')
  .action((opts) => formatCommand(withGlobalOpts(opts)));

program
  .command('create')
  .description('Create a dynamic VHDX file')
  .requiredOption('--vhd-path <path>', 'Windows path of the new VHD')
  .option('--size <size>', 'Virtual size, e.g. 500M or 10G (default from config: 1G)')
  .option('--format <fs>', 'Attach and format the new VHD with this filesystem')
  .action((opts) => createCommand(withGlobalOpts(opts)));

program
  .command('delete')
  .description('Delete a detached VHD file and forget it (requires --yes)')
  .requiredOption('--vhd-path <path>', 'Windows path of the VHD')
  .action((opts) => deleteCommand(withGlobalOpts(opts)));

program
  .command('resize')
  .description('Move a mounted VHD onto a new disk of another size')
  .requiredOption('--vhd-path <path>', 'Windows path of the VHD')
  .requiredOption('--size <size>', 'New virtual size, e.g. 20G')
  .action((opts) => resizeCommand(withGlobalOpts(opts)));

program
  .command('history')
  .description('Show recent detach events')
  .option('--limit <n>', 'Number of events to show')
  .option('--vhd-path <path>', 'Only events for this VHD')
  .action((opts) => historyCommand(withGlobalOpts(opts)));

program
  .command('sync')
  .description('Drop tracking records for VHDs that are gone')
  .option('--dry-run', 'Report what would be removed without changing anything')
  .action((opts) => syncCommand(withGlobalOpts(opts)));

const service = program
  .command('service')
  .description('Manage systemd services that mount VHDs at boot');

service
  .command('create')
  .description('Create a service that mounts a tracked VHD at boot (requires root)')
  .requiredOption('--vhd-path <path>', 'Windows path of the VHD')
  .requiredOption('--mount-point <dir>', 'Mount point inside WSL')
  .option('--name <name>', 'Service name (default: wsl-vhd-mount-<file name>)')
  .action((opts) => serviceCreateCommand(withGlobalOpts(opts)));

service
  .command('enable')
  .description('Start a service on boot (requires root)')
  .requiredOption('--name <name>', 'Service name')
  .action((opts) => serviceEnableCommand(withGlobalOpts(opts)));

service
  .command('disable')
  .description('Stop starting a service on boot (requires root)')
  .requiredOption('--name <name>', 'Service name')
  .action((opts) => serviceDisableCommand(withGlobalOpts(opts)));

service
  .command('remove')
  .description('Stop, disable and delete a service (requires root)')
  .requiredOption('--name <name>', 'Service name')
  .action((opts) => serviceRemoveCommand(withGlobalOpts(opts)));

service
  .command('status')
  .description('Show whether a service is enabled and active')
  .requiredOption('--name <name>', 'Service name')
  .action((opts) => serviceStatusCommand(withGlobalOpts(opts)));

service
  .command('list')
  .description('List VHD mount services')
  .action(() => serviceListCommand(withGlobalOpts({})));

await program.parseAsync();
