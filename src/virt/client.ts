/**
 * Virtualization Client
 *
 * High-level operations on libvirt domains and the provisioning tool,
 * built on a CommandRunner. In dry-run mode every state-changing command
 * is logged instead of run; introspection still runs.
 */

import { CommandError } from '../core/errors.js';
import type { Logger } from '../lib/logger.js';
import {
  DEFAULT_TOOLS,
  buildCreateArgs,
  buildDomInfoArgs,
  buildDumpXmlArgs,
  buildRemoveArgs,
  buildShutdownArgs,
  buildStartArgs,
  type ToolPaths,
} from './commands.js';
import { summarizeStderr, type CommandRunner, type RunOptions } from './executor.js';
import { isMissingDomain, lookupLeaseIp, parseDomInfo, parseFirstMac } from './queries.js';
import type { CommandResult, CreateGuestParams, DomainInfo } from './types.js';
import { formatArgv } from './verbose.js';

/**
 * Options for constructing a VirtClient
 */
export interface VirtClientOptions {
  /** Log state-changing commands instead of running them */
  dryrun?: boolean;
  /** Executables to use */
  tools?: Partial<ToolPaths>;
  /** Directory of dnsmasq lease status files */
  leaseDir?: string;
}

/**
 * Domain management, introspection and provisioning.
 */
export class VirtClient {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly dryrun: boolean;
  private readonly tools: ToolPaths;
  private readonly leaseDir: string | undefined;

  constructor(runner: CommandRunner, logger: Logger, options: VirtClientOptions = {}) {
    this.runner = runner;
    this.logger = logger;
    this.dryrun = options.dryrun ?? false;
    this.tools = { ...DEFAULT_TOOLS, ...options.tools };
    this.leaseDir = options.leaseDir;
  }

  /**
   * Query a domain.
   *
   * @returns Domain information, or null when no such domain exists
   * @throws CommandError when virsh fails for any other reason
   */
  async domainInfo(name: string): Promise<DomainInfo | null> {
    const argv = buildDomInfoArgs(this.tools, name);
    const result = await this.runner.run(argv);
    if (result.exitCode === 0) {
      return parseDomInfo(name, result.stdout);
    }
    if (isMissingDomain(result.stderr)) {
      return null;
    }
    throw this.failure(`Failed to query domain ${name}`, argv, result);
  }

  /**
   * Get the first MAC address in a domain's definition.
   *
   * @throws CommandError when virsh fails
   */
  async domainMac(name: string): Promise<string | undefined> {
    const argv = buildDumpXmlArgs(this.tools, name);
    const result = await this.runner.run(argv);
    if (result.exitCode !== 0) {
      throw this.failure(`Failed to read definition of domain ${name}`, argv, result);
    }
    return parseFirstMac(result.stdout);
  }

  /**
   * Look up the IP leased to a MAC address on a bridge.
   */
  async leaseIp(bridge: string, mac: string): Promise<string | undefined> {
    return lookupLeaseIp(bridge, mac, this.leaseDir);
  }

  /**
   * Provision a guest.
   *
   * @throws CommandError when the installer exits unsuccessfully
   */
  async createGuest(params: CreateGuestParams): Promise<void> {
    await this.mutate(buildCreateArgs(this.tools, params), `Failed to create guest ${params.name}`, {
      capture: false,
    });
  }

  /**
   * Remove a guest's domain and disks.
   *
   * @throws CommandError when the installer exits unsuccessfully
   */
  async removeGuest(name: string): Promise<void> {
    await this.mutate(buildRemoveArgs(this.tools, name), `Failed to remove guest ${name}`, {
      capture: false,
    });
  }

  /**
   * Start a domain.
   *
   * @throws CommandError when virsh fails
   */
  async startDomain(name: string): Promise<void> {
    await this.mutate(buildStartArgs(this.tools, name), `Failed to start domain ${name}`);
  }

  /**
   * Request a graceful shutdown of a domain.
   *
   * @throws CommandError when virsh fails
   */
  async shutdownDomain(name: string): Promise<void> {
    await this.mutate(buildShutdownArgs(this.tools, name), `Failed to shut down domain ${name}`);
  }

  /**
   * Run a post-action hook snippet.
   *
   * @returns The command result; a zero result in dry-run mode
   */
  async runHook(script: string, options: RunOptions): Promise<CommandResult> {
    if (this.dryrun) {
      this.logger.info(`[dry-run] ${script}`);
      return { exitCode: 0, stdout: '', stderr: '' };
    }
    return this.runner.runShell(script, { capture: false, ...options });
  }

  private async mutate(
    argv: string[],
    message: string,
    options: RunOptions = {}
  ): Promise<void> {
    if (this.dryrun) {
      this.logger.info(`[dry-run] ${formatArgv(argv)}`);
      return;
    }
    const result = await this.runner.run(argv, options);
    if (result.exitCode !== 0) {
      throw this.failure(message, argv, result);
    }
  }

  private failure(message: string, argv: string[], result: CommandResult): CommandError {
    return new CommandError(
      `${message}: ${summarizeStderr(result.stderr, result.exitCode)}`,
      argv,
      result.exitCode,
      result.stderr
    );
  }
}
