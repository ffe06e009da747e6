/**
 * Lab Registry
 *
 * Tracks the names of labs that have been created and not destroyed, so
 * they stay reachable after their section is removed from the
 * configuration.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { StateError } from '../core/errors.js';
import { getRegistryPath } from '../lib/paths.js';
import { isErrnoException } from './store.js';
import type { RegistryFile } from './types.js';

/**
 * Persisted set of active lab names.
 */
export class LabRegistry {
  private readonly registryPath: string;
  private readonly readOnly: boolean;
  private active: Set<string>;

  private constructor(registryPath: string, active: Set<string>, readOnly: boolean) {
    this.registryPath = registryPath;
    this.active = active;
    this.readOnly = readOnly;
  }

  /**
   * Open the registry kept under a data directory.
   *
   * @param vardir - Data directory
   * @param options - readOnly keeps changes in memory (dry run)
   */
  static async open(
    vardir: string,
    options: { readOnly?: boolean } = {}
  ): Promise<LabRegistry> {
    const registryPath = getRegistryPath(vardir);
    const file = await loadRegistry(registryPath);
    return new LabRegistry(registryPath, new Set(file.active), options.readOnly ?? false);
  }

  /**
   * Sorted names of active labs.
   */
  list(): string[] {
    return Array.from(this.active).sort();
  }

  /**
   * Check whether a lab is active.
   */
  has(labName: string): boolean {
    return this.active.has(labName);
  }

  /**
   * Record a lab as active.
   */
  async add(labName: string): Promise<void> {
    if (this.active.has(labName)) {
      return;
    }
    this.active.add(labName);
    await this.save();
  }

  /**
   * Forget a lab.
   */
  async remove(labName: string): Promise<void> {
    if (!this.active.delete(labName)) {
      return;
    }
    await this.save();
  }

  /**
   * Get the registry file path.
   */
  getPath(): string {
    return this.registryPath;
  }

  private async save(): Promise<void> {
    if (this.readOnly) {
      return;
    }
    const file: RegistryFile = { version: 1, active: this.list() };

    await mkdir(dirname(this.registryPath), { recursive: true });
    const tempPath = `${this.registryPath}.tmp`;
    await writeFile(tempPath, `${JSON.stringify(file, null, 2)}\n`, 'utf-8');
    await rename(tempPath, this.registryPath);
  }
}

async function loadRegistry(registryPath: string): Promise<RegistryFile> {
  let content: string;
  try {
    content = await readFile(registryPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return { version: 1, active: [] };
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw corrupted(registryPath);
  }

  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('active' in parsed) ||
    !Array.isArray(parsed.active)
  ) {
    throw corrupted(registryPath);
  }

  const active: string[] = [];
  for (const name of parsed.active) {
    if (typeof name === 'string') {
      active.push(name);
    }
  }
  return { version: 1, active };
}

function corrupted(registryPath: string): StateError {
  return new StateError(
    `Lab registry is corrupted: ${registryPath}`,
    registryPath,
    'Remove the file; active labs are re-registered by the next create or start.'
  );
}
