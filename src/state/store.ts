/**
 * Variable Store
 *
 * Durable key/value record for one lab or one guest. The document is read
 * once when the store is opened and written back on every change.
 * Uses atomic writes so a crash never leaves a half-written file; the last
 * writer wins.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import Ajv from 'ajv';

import { StateError } from '../core/errors.js';
import documentSchema from './schema.json' with { type: 'json' };
import type { JsonValue, VariableMap } from './types.js';

const ajv = new Ajv.default({ allErrors: true });
const validateDocument = ajv.compile<VariableMap>(documentSchema);

/**
 * Options for opening a store
 */
export interface VariableStoreOptions {
  /** Keep changes in memory only (dry run) */
  readOnly?: boolean;
}

/**
 * Check that parsed JSON is a variable document (a plain object).
 */
export function isVariableMap(value: unknown): value is VariableMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Persisted variables for a single lab or guest.
 */
export class VariableStore {
  private readonly filePath: string;
  private readonly readOnly: boolean;
  private vars: VariableMap;

  private constructor(filePath: string, vars: VariableMap, readOnly: boolean) {
    this.filePath = filePath;
    this.vars = vars;
    this.readOnly = readOnly;
  }

  /**
   * Open a store, loading its document if one exists.
   *
   * @param filePath - Location of the JSON document
   * @param options - Store options
   * @throws StateError if the document exists but does not match the variable schema
   */
  static async open(
    filePath: string,
    options: VariableStoreOptions = {}
  ): Promise<VariableStore> {
    const vars = await loadDocument(filePath);
    return new VariableStore(filePath, vars, options.readOnly ?? false);
  }

  /**
   * Get a variable.
   */
  get(key: string): JsonValue | undefined {
    return this.vars[key];
  }

  /**
   * Get a variable when it holds a string.
   */
  getString(key: string): string | undefined {
    const value = this.vars[key];
    return typeof value === 'string' ? value : undefined;
  }

  /**
   * Get a variable when it holds an object of strings.
   */
  getStringRecord(key: string): Record<string, string> | undefined {
    const value = this.vars[key];
    if (!isVariableMap(value)) {
      return undefined;
    }
    const record: Record<string, string> = {};
    for (const [name, item] of Object.entries(value)) {
      if (typeof item === 'string') {
        record[name] = item;
      }
    }
    return record;
  }

  /**
   * Get a variable when it holds an array of strings.
   */
  getStringList(key: string): string[] | undefined {
    const value = this.vars[key];
    if (!Array.isArray(value)) {
      return undefined;
    }
    return value.filter((item): item is string => typeof item === 'string');
  }

  /**
   * Check whether a variable is set.
   */
  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.vars, key);
  }

  /**
   * Get a copy of all variables.
   */
  entries(): VariableMap {
    return { ...this.vars };
  }

  /**
   * Set a variable and save the document.
   */
  async set(key: string, value: JsonValue): Promise<void> {
    this.vars[key] = value;
    await this.save();
  }

  /**
   * Remove a variable and save the document.
   */
  async delete(key: string): Promise<void> {
    if (!this.has(key)) {
      return;
    }
    delete this.vars[key];
    await this.save();
  }

  /**
   * Forget every variable and delete the document.
   */
  async purge(): Promise<void> {
    this.vars = {};
    if (this.readOnly) {
      return;
    }
    await rm(this.filePath, { force: true });
  }

  /**
   * Get the document path.
   */
  getPath(): string {
    return this.filePath;
  }

  /**
   * Save the document using atomic write.
   *
   * Writes to a temp file first, then renames to ensure atomicity.
   */
  private async save(): Promise<void> {
    if (this.readOnly) {
      return;
    }

    await mkdir(dirname(this.filePath), { recursive: true });

    const tempPath = `${this.filePath}.tmp`;
    const content = JSON.stringify(this.vars, null, 2);
    await writeFile(tempPath, `${content}\n`, 'utf-8');

    await rename(tempPath, this.filePath);
  }
}

/**
 * Read a variable document; a missing file is an empty document.
 */
async function loadDocument(filePath: string): Promise<VariableMap> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StateError(
      `State file is not valid JSON: ${filePath} (${reason})`,
      filePath,
      'Repair or remove the file; it will be recreated on the next change.'
    );
  }

  if (!isVariableMap(parsed)) {
    throw new StateError(
      `State file does not hold a JSON object: ${filePath}`,
      filePath,
      'Repair or remove the file; it will be recreated on the next change.'
    );
  }

  if (!validateDocument(parsed)) {
    throw new StateError(
      `State file is malformed: ${filePath} (${ajv.errorsText(validateDocument.errors, { dataVar: 'document' })})`,
      filePath,
      'Repair or remove the file; it will be recreated on the next change.'
    );
  }

  return parsed;
}

/**
 * Narrow an unknown error to a Node.js system error.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
