/**
 * Error Types for kvmlab
 *
 * Custom error classes with error codes for structured error handling.
 */

/**
 * Error codes for all kvmlab errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_SYNTAX'
  | 'CONFIG_VALIDATION_FAILED'
  | 'INVALID_LAB_NAME'
  | 'LAB_NOT_FOUND'
  | 'INVALID_SEQUENCE'
  | 'TEMPLATE_KEY_MISSING'
  | 'TEMPLATE_INVALID'
  | 'RESERVED_GROUP'
  | 'GROUP_OUT_OF_RANGE'
  | 'INVALID_GROUP'
  | 'STATE_CORRUPTED'
  | 'COMMAND_FAILED'
  | 'HOOK_FAILED';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_SYNTAX: 1,
  CONFIG_VALIDATION_FAILED: 1,
  INVALID_LAB_NAME: 1,
  LAB_NOT_FOUND: 1,
  INVALID_SEQUENCE: 1,
  TEMPLATE_KEY_MISSING: 1,
  TEMPLATE_INVALID: 1,
  RESERVED_GROUP: 1,
  GROUP_OUT_OF_RANGE: 1,
  INVALID_GROUP: 1,
  STATE_CORRUPTED: 2,
  COMMAND_FAILED: 2,
  HOOK_FAILED: 2,
};

/**
 * Base error class for all kvmlab errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class KvmlabError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'KvmlabError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, KvmlabError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

/**
 * Error for configuration-related issues.
 */
export class ConfigError extends KvmlabError {
  constructor(
    message: string,
    code:
      | 'CONFIG_NOT_FOUND'
      | 'CONFIG_INVALID_SYNTAX'
      | 'CONFIG_VALIDATION_FAILED'
      | 'INVALID_LAB_NAME'
      | 'LAB_NOT_FOUND',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Error for persisted state that cannot be read back.
 */
export class StateError extends KvmlabError {
  constructor(
    message: string,
    public readonly statePath: string,
    suggestion?: string
  ) {
    super(message, 'STATE_CORRUPTED', suggestion);
    this.name = 'StateError';
    Object.setPrototypeOf(this, StateError.prototype);
  }
}

/**
 * Error for an invalid token in a numeric sequence.
 */
export class SequenceError extends KvmlabError {
  constructor(
    message: string,
    public readonly token: string
  ) {
    super(message, 'INVALID_SEQUENCE');
    this.name = 'SequenceError';
    Object.setPrototypeOf(this, SequenceError.prototype);
  }
}

/**
 * Error for a template that cannot be expanded.
 */
export class TemplateError extends KvmlabError {
  constructor(
    message: string,
    code: 'TEMPLATE_KEY_MISSING' | 'TEMPLATE_INVALID',
    public readonly key: string
  ) {
    super(message, code);
    this.name = 'TemplateError';
    Object.setPrototypeOf(this, TemplateError.prototype);
  }
}

/**
 * Error for an inventory group definition that cannot be honored.
 */
export class InventoryError extends KvmlabError {
  constructor(
    message: string,
    code: 'RESERVED_GROUP' | 'GROUP_OUT_OF_RANGE' | 'INVALID_GROUP',
    public readonly group: string,
    suggestion?: string
  ) {
    super(message, code, suggestion);
    this.name = 'InventoryError';
    Object.setPrototypeOf(this, InventoryError.prototype);
  }
}

/**
 * Error for an external command that exited unsuccessfully.
 */
export class CommandError extends KvmlabError {
  constructor(
    message: string,
    public readonly argv: readonly string[],
    public readonly commandExitCode: number | null,
    public readonly stderr: string
  ) {
    super(message, 'COMMAND_FAILED');
    this.name = 'CommandError';
    Object.setPrototypeOf(this, CommandError.prototype);
  }
}

/**
 * Error for a post-action hook whose failure ends the command.
 */
export class HookError extends KvmlabError {
  constructor(
    message: string,
    public readonly hook: string,
    public readonly hookExitCode: number | null
  ) {
    super(message, 'HOOK_FAILED');
    this.name = 'HookError';
    Object.setPrototypeOf(this, HookError.prototype);
  }
}

/**
 * Check if an error is a KvmlabError.
 */
export function isKvmlabError(error: unknown): error is KvmlabError {
  return error instanceof KvmlabError;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isKvmlabError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}
