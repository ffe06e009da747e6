/**
 * Configuration Loader
 *
 * Loads INI configuration files from a directory and merges them into a
 * single read-only ConfigStore.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import ini from 'ini';

import { ConfigError } from '../core/errors.js';
import { isErrnoException } from '../state/store.js';
import type { ConfigSection } from './types.js';

/**
 * File names picked up from the configuration directory
 */
const CONFIG_FILE_PATTERN = /\.(cfg|ini)$/;

const SECTION_HEADER_PATTERN = /^\s*\[([^\]]+)\]\s*$/gm;

const COMMENT_LINE_PATTERN = /^[;#]/;

const LINE_BREAK_PATTERN = /\r\n|\r|\n/;

/**
 * Lab section names: letters, digits and underscores only
 */
export const LAB_NAME_PATTERN = /^[A-Za-z0-9_]+$/;

/**
 * Merged, read-only view of every configuration file.
 */
export class ConfigStore {
  private readonly sections: ReadonlyMap<string, Readonly<ConfigSection>>;
  private readonly files: readonly string[];

  constructor(sections: Map<string, ConfigSection>, files: string[] = []) {
    this.sections = sections;
    this.files = files;
  }

  /**
   * Get a section by name.
   */
  section(name: string): Readonly<ConfigSection> | undefined {
    return this.sections.get(name);
  }

  /**
   * Check whether a section exists.
   */
  has(name: string): boolean {
    return this.sections.has(name);
  }

  /**
   * Get an option from a section.
   */
  get(sectionName: string, key: string): string | undefined {
    const section = this.sections.get(sectionName);
    if (!section || !Object.prototype.hasOwnProperty.call(section, key)) {
      return undefined;
    }
    return section[key];
  }

  /**
   * All section names, in load order.
   */
  sectionNames(): string[] {
    return Array.from(this.sections.keys());
  }

  /**
   * Names of lab sections (no dot, not the global section), in load order.
   */
  labNames(): string[] {
    return this.sectionNames().filter((name) => LAB_NAME_PATTERN.test(name));
  }

  /**
   * Files the store was loaded from.
   */
  getFiles(): readonly string[] {
    return this.files;
  }
}

/**
 * Rewrite INI text so the ini package reads every value verbatim.
 *
 * - Indented lines continue the previous option; the parts are joined with `\n`.
 * - Only whole lines starting with `;` or `#` are comments.
 * - Options may use `=` or `:` as the delimiter.
 *
 * Each option is re-emitted as `key = "<JSON string>"`, which the ini
 * package unquotes without looking for inline comments.
 */
export function normalizeConfigText(content: string): string {
  const lines: string[] = [];
  let pending: { key: string; value: string } | undefined;

  const flush = (): void => {
    if (pending) {
      lines.push(`${pending.key} = ${JSON.stringify(pending.value)}`);
      pending = undefined;
    }
  };

  for (const line of content.split(LINE_BREAK_PATTERN)) {
    const trimmed = line.trim();
    if (trimmed === '') {
      flush();
      continue;
    }
    if (COMMENT_LINE_PATTERN.test(trimmed)) {
      continue;
    }
    if (pending && /^\s/.test(line)) {
      pending.value += `\n${trimmed}`;
      continue;
    }

    flush();
    const delimiter = findDelimiter(trimmed);
    if (trimmed.startsWith('[') || delimiter < 0) {
      lines.push(trimmed);
      continue;
    }
    pending = {
      key: trimmed.slice(0, delimiter).trim(),
      value: trimmed.slice(delimiter + 1).trim(),
    };
  }
  flush();

  return `${lines.join('\n')}\n`;
}

function findDelimiter(line: string): number {
  const positions = [line.indexOf('='), line.indexOf(':')].filter((index) => index >= 0);
  return positions.length > 0 ? Math.min(...positions) : -1;
}

/**
 * Parse INI text into sections.
 *
 * Dotted section names such as `[dev.1]` and `[.global]` are kept whole.
 * Option names are lower-cased. Options outside any section are rejected.
 * Values may span several lines (see normalizeConfigText).
 *
 * @param content - INI document
 * @param filePath - Path used in error messages
 */
export function parseConfigText(
  content: string,
  filePath: string
): Map<string, ConfigSection> {
  const sections = new Map<string, ConfigSection>();
  const normalized = normalizeConfigText(content);

  // Register headers first so empty sections exist and file order is kept
  for (const match of normalized.matchAll(SECTION_HEADER_PATTERN)) {
    const name = match[1]?.trim();
    if (name && !sections.has(name)) {
      sections.set(name, {});
    }
  }

  const decoded: Record<string, unknown> = ini.decode(normalized);

  collectSections(decoded, undefined, sections, filePath);
  return sections;
}

/**
 * Walk the decoded document. The ini package nests dotted section names
 * (`[dev.1]` becomes `dev -> 1`); nested objects are joined back with dots.
 */
function collectSections(
  node: Record<string, unknown>,
  prefix: string | undefined,
  sections: Map<string, ConfigSection>,
  filePath: string
): void {
  for (const [key, value] of Object.entries(node)) {
    if (isPlainObject(value)) {
      const name = prefix === undefined ? key : `${prefix}.${key}`;
      collectSections(value, name, sections, filePath);
      continue;
    }

    if (prefix === undefined) {
      throw new ConfigError(
        `Option '${key}' is outside of any section in ${filePath}`,
        'CONFIG_INVALID_SYNTAX',
        'Move the option under a [.global] or [<lab>] section.',
        filePath
      );
    }

    let section = sections.get(prefix);
    if (!section) {
      section = {};
      sections.set(prefix, section);
    }
    section[key.toLowerCase()] = toOptionText(value);
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Render a decoded value as the raw option string. The ini package turns
 * `true`/`false`/`null` into JSON values and `key[]` entries into arrays.
 */
function toOptionText(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (Array.isArray(value)) {
    return value.map((item) => toOptionText(item)).join('\n');
  }
  return String(value);
}

/**
 * Merge sections into a target map, option by option. Later values win.
 */
export function mergeSections(
  target: Map<string, ConfigSection>,
  source: Map<string, ConfigSection>
): void {
  for (const [name, options] of source) {
    const existing = target.get(name);
    if (existing) {
      Object.assign(existing, options);
    } else {
      target.set(name, { ...options });
    }
  }
}

/**
 * Load every *.cfg and *.ini file in a directory, in lexical order.
 *
 * A missing directory yields an empty store.
 *
 * @param configDir - Configuration directory
 * @throws ConfigError if a file cannot be read or parsed
 */
export async function loadConfigDir(configDir: string): Promise<ConfigStore> {
  let entries: string[];
  try {
    entries = await readdir(configDir);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return new ConfigStore(new Map());
    }
    throw new ConfigError(
      `Failed to read configuration directory: ${configDir}`,
      'CONFIG_NOT_FOUND',
      'Check the directory permissions or pass --config-dir.',
      configDir
    );
  }

  const files = entries
    .filter((name) => CONFIG_FILE_PATTERN.test(name))
    .sort()
    .map((name) => join(configDir, name));

  const merged = new Map<string, ConfigSection>();
  for (const filePath of files) {
    const content = await readConfigFile(filePath);
    mergeSections(merged, parseConfigText(content, filePath));
  }

  return new ConfigStore(merged, files);
}

async function readConfigFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = isErrnoException(error) ? error.code : undefined;
    const reason = code === 'EACCES' ? 'Permission denied reading' : 'Failed to read';
    throw new ConfigError(
      `${reason} configuration file: ${filePath}`,
      'CONFIG_NOT_FOUND',
      'Ensure the configuration file exists and is readable.',
      filePath
    );
  }
}
