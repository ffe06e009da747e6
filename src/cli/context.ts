/**
 * Run Context Construction
 *
 * Builds the RunContext every command receives from the global CLI flags:
 * logger, virtualization client, merged configuration and overrides.
 */

import { InvalidArgumentError } from 'commander';

import { loadConfigDir } from '../config/loader.js';
import type { OptionOverrides } from '../config/types.js';
import type { RunContext } from '../core/types.js';
import { Logger } from '../lib/logger.js';
import { getConfigDir } from '../lib/paths.js';
import { ProcessRunner, type CommandRunner } from '../virt/executor.js';
import { VirtClient, type VirtClientOptions } from '../virt/client.js';
import type { ToolPaths } from '../virt/commands.js';

/**
 * Flags accepted before any command
 */
export interface GlobalOptions {
  verbose?: boolean;
  dryrun?: boolean;
  configDir?: string;
}

/**
 * Per-command settings carried in the context
 */
export interface CommandSettings {
  /** `--option` overrides (create only) */
  options?: OptionOverrides;
  /** Delete guest state on destroy */
  purge?: boolean;
}

/**
 * Collaborators a caller may substitute
 */
export interface ContextDependencies {
  runner?: CommandRunner;
  logger?: Logger;
  tools?: Partial<ToolPaths>;
  leaseDir?: string;
}

/**
 * Build the run context for one invocation.
 *
 * @throws ConfigError when a configuration file cannot be read or parsed
 */
export async function createContext(
  global: GlobalOptions,
  settings: CommandSettings = {},
  deps: ContextDependencies = {}
): Promise<RunContext> {
  const verbose = global.verbose === true;
  const dryrun = global.dryrun === true;
  const logger = deps.logger ?? Logger.fromOptions({ verbose });
  const runner = deps.runner ?? new ProcessRunner({ verbose });

  const configDir = getConfigDir(global.configDir);
  logger.trace(`Reading configuration from ${configDir}`);
  const config = await loadConfigDir(configDir);
  logger.trace(`Loaded ${config.getFiles().length} configuration file(s)`);

  const virtOptions: VirtClientOptions = { dryrun };
  if (deps.tools) {
    virtOptions.tools = deps.tools;
  }
  if (deps.leaseDir) {
    virtOptions.leaseDir = deps.leaseDir;
  }

  return {
    logger,
    virt: new VirtClient(runner, logger, virtOptions),
    config,
    options: settings.options ?? {},
    dryrun,
    purge: settings.purge === true,
  };
}

/**
 * Parse one `--option name=value` argument and add it to the overrides.
 * Names are case-insensitive, like configuration option names.
 */
export function collectOption(text: string, previous: OptionOverrides = {}): OptionOverrides {
  const equals = text.indexOf('=');
  const name = equals === -1 ? '' : text.slice(0, equals).trim().toLowerCase();
  if (!name) {
    throw new InvalidArgumentError(`Expected name=value, got '${text}'.`);
  }
  return { ...previous, [name]: text.slice(equals + 1) };
}
