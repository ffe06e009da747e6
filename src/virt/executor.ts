/**
 * Command Executor
 *
 * Spawns external commands (virsh, kvm-install-vm, hook snippets) and
 * collects their exit status and output. Arguments are passed as a vector;
 * only hook snippets go through a shell.
 */

import { spawn } from 'node:child_process';

import type { LogSink } from '../lib/logger.js';
import type { CommandResult } from './types.js';
import { formatArgv, formatCommand, supportsAnsi } from './verbose.js';

/**
 * Options for running a command
 */
export interface RunOptions {
  /** Capture stdout/stderr instead of passing them through (default: true) */
  capture?: boolean;
  /** Extra environment, merged over the current process environment */
  env?: Record<string, string>;
  /** Working directory */
  cwd?: string;
}

/**
 * Runs external commands. Implemented by ProcessRunner, and by in-process
 * fakes in tests.
 */
export interface CommandRunner {
  /**
   * Run an argument vector without a shell.
   */
  run(argv: readonly string[], options?: RunOptions): Promise<CommandResult>;

  /**
   * Run a user-authored shell snippet with /bin/sh -c.
   */
  runShell(script: string, options?: RunOptions): Promise<CommandResult>;
}

/**
 * Options for constructing a ProcessRunner
 */
export interface ProcessRunnerOptions {
  /** Print commands to stderr before execution (default: false) */
  verbose?: boolean;
  /** Shell used for hook snippets (default: '/bin/sh') */
  shell?: string;
  /** Where verbose command echoes go (default: process.stderr) */
  echo?: LogSink;
}

/**
 * Runs commands as child processes.
 */
export class ProcessRunner implements CommandRunner {
  private readonly verbose: boolean;
  private readonly shell: string;
  private readonly echo: LogSink;

  constructor(options?: ProcessRunnerOptions) {
    this.verbose = options?.verbose ?? false;
    this.shell = options?.shell ?? '/bin/sh';
    this.echo = options?.echo ?? process.stderr;
  }

  async run(argv: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    const [command, ...args] = argv;
    if (command === undefined) {
      throw new Error('Cannot run an empty command');
    }
    this.trace(formatArgv(argv));
    return this.spawnProcess(command, args, options);
  }

  async runShell(script: string, options: RunOptions = {}): Promise<CommandResult> {
    this.trace(script);
    return this.spawnProcess(this.shell, ['-c', script], options);
  }

  private trace(command: string): void {
    if (this.verbose) {
      this.echo.write(formatCommand(command, supportsAnsi()));
    }
  }

  private spawnProcess(
    command: string,
    args: string[],
    options: RunOptions
  ): Promise<CommandResult> {
    const { capture = true, env, cwd } = options;

    return new Promise<CommandResult>((resolve) => {
      const child = spawn(command, args, {
        cwd,
        env: env ? { ...process.env, ...env } : process.env,
        stdio: capture ? ['ignore', 'pipe', 'pipe'] : ['ignore', 'inherit', 'inherit'],
      });

      let stdout = '';
      let stderr = '';

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      // A command that cannot be spawned is reported like a failed one
      child.on('error', (error: Error) => {
        resolve({
          exitCode: 127,
          stdout,
          stderr: `${stderr}${command}: ${error.message}\n`,
        });
      });

      child.on('close', (code: number | null) => {
        resolve({ exitCode: code, stdout, stderr });
      });
    });
  }
}

/**
 * Pick the most useful line of a failed command's stderr.
 */
export function summarizeStderr(stderr: string, exitCode: number | null): string {
  // eslint-disable-next-line no-control-regex
  const clean = stderr.replace(/\x1b\[[0-9;]*[a-zA-Z]/g, '').replace(/\r/g, '');
  const lines = clean
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const errorLine = lines.find((line) => /^error:/i.test(line) && line.length > 'error:'.length + 1);
  if (errorLine) {
    return errorLine;
  }
  if (lines.length > 0) {
    return lines.slice(0, 3).join(' | ');
  }
  return `exited with code ${exitCode === null ? 'null (killed)' : exitCode}`;
}
