/**
 * Naming Utilities
 *
 * Lab name validation and guest name / hostname derivation.
 */

import { LAB_NAME_PATTERN } from '../config/loader.js';
import { expandTemplate, type TemplateLookup } from '../config/template.js';
import { ConfigError } from './errors.js';

/**
 * Check a lab name: letters, digits and underscores only.
 *
 * @throws ConfigError when the name has any other character
 */
export function assertValidLabName(name: string): void {
  if (!LAB_NAME_PATTERN.test(name)) {
    throw new ConfigError(
      `Invalid lab name '${name}'`,
      'INVALID_LAB_NAME',
      'Lab names may contain only letters, digits and underscores.'
    );
  }
}

/**
 * Derive a guest name from the name template.
 *
 * @param namefmt - Raw name template, e.g. "{lab}{guest:02d}"
 * @param lookup - Placeholder values; {lab} and {guest} must be answered
 * @returns The expanded guest name
 *
 * @example
 * deriveGuestName('{lab}{guest:02d}', (k) => ({ lab: 'dev', guest: 1 })[k]) // 'dev01'
 */
export function deriveGuestName(namefmt: string, lookup: TemplateLookup): string {
  return expandTemplate(namefmt, lookup).trim();
}

/**
 * Build a guest's fully qualified hostname.
 */
export function buildHostname(name: string, domain: string): string {
  return domain ? `${name}.${domain}` : name;
}

/**
 * Prefix of the environment variables exported to hooks
 */
export const ENV_PREFIX = 'KVMLAB_';

/**
 * Second prefix every hook variable is exported under; older lab
 * playbooks read `VIRTLAB_BRIDGE`, `VIRTLAB_GATEWAY` and `VIRTLAB_DOMAIN`.
 */
export const LEGACY_ENV_PREFIX = 'VIRTLAB_';

/**
 * Convert an option name to the environment variable exported to hooks:
 * `group.web` becomes `KVMLAB_GROUP_WEB`.
 */
export function toEnvName(key: string, prefix: string = ENV_PREFIX): string {
  return `${prefix}${key.replace(/[^A-Za-z0-9]/g, '_').toUpperCase()}`;
}
