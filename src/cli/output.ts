/**
 * CLI Output Layer
 *
 * Provides consistent output formatting for CLI commands in both
 * human-readable and JSON modes.
 */

import { ConfigError, getExitCode, isKvmlabError, type ErrorCode } from '../core/errors.js';
import { formatValidationErrors } from '../config/validator.js';
import { describeAction } from '../core/reconciler.js';
import type { ReconcileResult } from '../core/reconciler.js';
import type { Action, ActionType } from '../core/types.js';
import type { Logger } from '../lib/logger.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CommandOutput {
  success: boolean;
  command: string;
  lab?: string;
  actions?: ActionOutput[];
  error?: ErrorOutput;
  summary?: Record<string, number>;
  [key: string]: unknown;
}

/**
 * Result of a single action execution
 */
export interface ActionOutput {
  type: ActionType;
  guest: string;
  status: 'completed' | 'failed';
  error?: string;
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | 'UNKNOWN';
  message: string;
  suggestion?: string;
}

// =============================================================================
// OutputFormatter Class
// =============================================================================

/**
 * Output mode for the formatter
 */
export type OutputMode = 'human' | 'json';

/**
 * CLI-specific output formatter.
 *
 * In human mode, messages go to the logger as they happen. In JSON mode,
 * output is collected and emitted as a single JSON object at flush.
 */
export class OutputFormatter {
  private readonly mode: OutputMode;
  private readonly logger: Logger;
  private readonly result: CommandOutput;

  constructor(command: string, logger: Logger, options: { json?: boolean } = {}) {
    this.mode = options.json ? 'json' : 'human';
    this.logger = logger;
    this.result = {
      success: true,
      command,
    };
  }

  /**
   * Check if in JSON mode.
   */
  isJson(): boolean {
    return this.mode === 'json';
  }

  /**
   * Print an info message.
   */
  info(message: string): void {
    if (this.mode === 'human') {
      this.logger.info(message);
    }
  }

  /**
   * Print a warning message.
   */
  warning(message: string): void {
    if (this.mode === 'human') {
      this.logger.warning(message);
    }
  }

  /**
   * Print the error that ended the command and mark the command failed.
   * Written in both modes, since stderr never carries the JSON document.
   */
  fatal(message: string, error?: unknown): void {
    this.result.success = false;

    const suggestion = isKvmlabError(error) ? error.suggestion : undefined;
    this.logger.fatal(message, suggestion);

    const output: ErrorOutput = {
      code: isKvmlabError(error) ? error.code : 'UNKNOWN',
      message,
    };
    if (suggestion) {
      output.suggestion = suggestion;
    }
    this.result.error = output;
  }

  /**
   * Print a blank line.
   */
  newline(): void {
    if (this.mode === 'human') {
      this.logger.newline();
    }
  }

  /**
   * Print a table.
   */
  table(headers: string[], rows: string[][], options: { heading?: boolean } = {}): void {
    if (this.mode === 'human') {
      this.logger.table(headers, rows, options);
    }
  }

  // ===========================================================================
  // Action Output Methods
  // ===========================================================================

  /**
   * Report an action starting.
   */
  actionStart(action: Action): void {
    if (this.mode === 'human') {
      this.logger.info(describeAction(action));
      this.logger.indent();
    }
  }

  /**
   * Report an action completed.
   */
  actionComplete(action: Action): void {
    if (this.mode === 'human') {
      this.logger.success(`${action.guestName} ${getActionPastTense(action.type)}`);
      this.logger.dedent();
    }
    this.addActionResult({ type: action.type, guest: action.guestName, status: 'completed' });
  }

  /**
   * Report an action failed.
   */
  actionFailed(action: Action, errorMessage: string): void {
    if (this.mode === 'human') {
      this.logger.error(`${action.type} failed: ${errorMessage}`);
      this.logger.dedent();
    } else {
      this.logger.error(`${action.guestName}: ${action.type} failed: ${errorMessage}`);
    }
    this.addActionResult({
      type: action.type,
      guest: action.guestName,
      status: 'failed',
      error: errorMessage,
    });
  }

  private addActionResult(actionResult: ActionOutput): void {
    if (!this.result.actions) {
      this.result.actions = [];
    }
    this.result.actions.push(actionResult);
  }

  // ===========================================================================
  // Summary Output
  // ===========================================================================

  /**
   * Print the final summary of a lab command.
   */
  summary(lab: string, reconcile: ReconcileResult): void {
    const counts = { created: 0, destroyed: 0, started: 0, stopped: 0 };
    for (const result of reconcile.results) {
      if (!result.success) {
        continue;
      }
      switch (result.action.type) {
        case 'create':
          counts.created++;
          break;
        case 'destroy':
          counts.destroyed++;
          break;
        case 'start':
          counts.started++;
          break;
        case 'stop':
          counts.stopped++;
          break;
      }
    }

    if (this.mode === 'human') {
      const parts: string[] = [];
      if (counts.created) parts.push(`${counts.created} created`);
      if (counts.destroyed) parts.push(`${counts.destroyed} destroyed`);
      if (counts.started) parts.push(`${counts.started} started`);
      if (counts.stopped) parts.push(`${counts.stopped} stopped`);
      if (reconcile.summary.skipped) parts.push(`${reconcile.summary.skipped} unchanged`);
      if (reconcile.summary.failed) parts.push(`${reconcile.summary.failed} failed`);

      this.newline();
      this.info(`Lab ${lab}: ${parts.length > 0 ? parts.join(', ') : 'no changes'}.`);
    }

    this.result.lab = lab;
    this.result.summary = {
      ...counts,
      skipped: reconcile.summary.skipped,
      failed: reconcile.summary.failed,
    };
    if (!reconcile.success) {
      this.result.success = false;
    }
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  /**
   * Set additional data for JSON output.
   */
  setData(key: string, value: unknown): void {
    this.result[key] = value;
  }

  /**
   * Flush output.
   *
   * In JSON mode, prints the collected JSON.
   * In human mode, does nothing (output was printed inline).
   */
  flush(): void {
    if (this.mode === 'json') {
      this.logger.print(JSON.stringify(this.result, null, 2));
    }
  }

  /**
   * Get the exit code based on success status.
   */
  getExitCode(): number {
    return this.result.success ? 0 : 1;
  }
}

function getActionPastTense(type: ActionType): string {
  switch (type) {
    case 'create':
      return 'created';
    case 'destroy':
      return 'destroyed';
    case 'start':
      return 'started';
    case 'stop':
      return 'stop requested';
  }
}

/**
 * Create an OutputFormatter from CLI options.
 */
export function createOutput(
  command: string,
  logger: Logger,
  options: { json?: boolean } = {}
): OutputFormatter {
  return new OutputFormatter(command, logger, options);
}

/**
 * Report an error that ended a command.
 *
 * @returns The process exit code for the error
 */
export function handleError(output: OutputFormatter, error: unknown): number {
  if (error instanceof ConfigError && error.validationErrors) {
    output.fatal(`${error.message}\n${formatValidationErrors(error.validationErrors)}`, error);
  } else if (isKvmlabError(error)) {
    output.fatal(error.message, error);
  } else if (error instanceof Error) {
    output.fatal(error.message);
  } else {
    output.fatal(String(error));
  }
  output.flush();
  return getExitCode(error);
}
