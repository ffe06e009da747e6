#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import type { RunContext } from '../core/types.js';
import { Logger } from '../lib/logger.js';
import { collectOption, createContext, type CommandSettings, type GlobalOptions } from './context.js';
import { infoCommand, type InfoCommandOptions } from './commands/info.js';
import { inventoryCommand, type InventoryCommandOptions } from './commands/inventory.js';
import {
  createCommand,
  destroyCommand,
  startCommand,
  stopCommand,
} from './commands/lifecycle.js';
import { listCommand, type ListCommandOptions } from './commands/list.js';
import { createOutput, handleError } from './output.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packagePath, 'utf-8')) as { version: string };

program
  .name('kvmlab')
  .description('Manage labs of KVM/libvirt guests described by INI configuration files')
  .version(packageJson.version)
  .option('--verbose', 'Print trace messages and external commands before execution')
  .option('-n, --dryrun', 'Show state-changing commands without running them')
  .option('--config-dir <dir>', 'Configuration directory (default: $KVMLAB_CONFIG_DIR or ~/.config/kvmlab)');

/**
 * Build the run context from the global flags, then run a handler and
 * record its exit code.
 */
async function run(
  name: string,
  settings: CommandSettings,
  handler: (ctx: RunContext) => Promise<number>
): Promise<void> {
  const global = program.opts<GlobalOptions>();
  let ctx: RunContext;
  try {
    ctx = await createContext(global, settings);
  } catch (error) {
    process.exitCode = handleError(createOutput(name, Logger.fromOptions(global)), error);
    return;
  }
  process.exitCode = await handler(ctx);
}

program
  .command('create <lab>')
  .alias('new')
  .description('Create the guests of a lab')
  .option('--option <name=value>', 'Override a configuration option (repeatable)', collectOption, {})
  .action((lab: string, opts: { option: Record<string, string> }) =>
    run('create', { options: opts.option }, (ctx) => createCommand(lab, ctx))
  );

program
  .command('destroy <lab>')
  .alias('rm')
  .description('Remove the guests of a lab')
  .option('--purge', 'Also delete the saved state of each guest')
  .action((lab: string, opts: { purge?: boolean }) =>
    run('destroy', { purge: opts.purge === true }, (ctx) => destroyCommand(lab, ctx))
  );

program
  .command('start <lab>')
  .description('Start the guests of a lab')
  .action((lab: string) => run('start', {}, (ctx) => startCommand(lab, ctx)));

program
  .command('stop <lab>')
  .description('Shut down the guests of a lab')
  .action((lab: string) => run('stop', {}, (ctx) => stopCommand(lab, ctx)));

program
  .command('info <lab>')
  .alias('show')
  .description('Show resolved options and guest state of a lab')
  .option('--json', 'Output as JSON')
  .action((lab: string, opts: InfoCommandOptions) =>
    run('info', {}, (ctx) => infoCommand(lab, opts, ctx))
  );

program
  .command('inventory [lab]')
  .description('Print the dynamic inventory of a lab (default lab: $KVMLAB_LAB)')
  .option('--list', 'Print the whole inventory as JSON (default)')
  .option('--host <host>', 'Print the variables of one host as JSON')
  .option('--yaml', 'Print a static YAML inventory')
  .action((lab: string | undefined, opts: InventoryCommandOptions) =>
    run('inventory', {}, (ctx) => inventoryCommand(lab, opts, ctx))
  );

program
  .command('list')
  .alias('ls')
  .description('List labs')
  .option('--brief', 'Print lab names only')
  .option('--active', 'Only labs that are currently active')
  .option('--no-heading', 'Omit the column headings')
  .action((opts: ListCommandOptions) => run('list', {}, (ctx) => listCommand(opts, ctx)));

program
  .command('version')
  .description('Print the version')
  .action(() => {
    process.stdout.write(`${packageJson.version}\n`);
  });

await program.parseAsync();
