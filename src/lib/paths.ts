/**
 * Path Utilities
 *
 * Provides home-directory expansion and the locations of configuration,
 * state and lease files.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Directory holding libvirt's dnsmasq lease status files.
 */
export const LEASE_DIR = '/var/lib/libvirt/dnsmasq';

/**
 * Expand a leading ~ to the home directory.
 *
 * Only `~` and `~/...` are expanded; `~user` forms are left untouched.
 *
 * @param inputPath - Path that may start with ~
 * @returns Path with ~ expanded
 */
export function expandHome(inputPath: string): string {
  if (inputPath === '~') {
    return homedir();
  }
  if (inputPath.startsWith('~/')) {
    return join(homedir(), inputPath.slice(2));
  }
  return inputPath;
}

/**
 * Get the configuration directory.
 *
 * @param explicit - Directory given on the command line, if any
 * @returns --config-dir, else $KVMLAB_CONFIG_DIR, else ~/.config/kvmlab
 */
export function getConfigDir(explicit?: string): string {
  if (explicit) {
    return expandHome(explicit);
  }
  const fromEnv = process.env['KVMLAB_CONFIG_DIR'];
  if (fromEnv) {
    return expandHome(fromEnv);
  }
  return join(homedir(), '.config', 'kvmlab');
}

/**
 * Get the state file path for a lab.
 */
export function getLabStatePath(vardir: string, labName: string): string {
  return join(vardir, 'labs', `${labName}.json`);
}

/**
 * Get the state file path for a guest.
 */
export function getGuestStatePath(vardir: string, guestName: string): string {
  return join(vardir, 'guests', `${guestName}.json`);
}

/**
 * Get the path of the registry of active labs.
 */
export function getRegistryPath(vardir: string): string {
  return join(vardir, 'labs.json');
}

/**
 * Get the dnsmasq lease status file for a bridge.
 */
export function getLeaseFilePath(bridge: string, leaseDir: string = LEASE_DIR): string {
  return join(leaseDir, `${bridge}.status`);
}
