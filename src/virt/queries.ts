/**
 * Domain Queries
 *
 * Parsers for virsh output and the dnsmasq lease status files.
 */

import { readFile } from 'node:fs/promises';

import { getLeaseFilePath } from '../lib/paths.js';
import type { DomainInfo, DomainState, Lease } from './types.js';

const KNOWN_STATES: readonly DomainState[] = [
  'running',
  'idle',
  'paused',
  'in shutdown',
  'shut off',
  'crashed',
  'pmsuspended',
];

/**
 * Patterns in virsh stderr meaning the domain does not exist
 */
const MISSING_DOMAIN_PATTERNS = [/failed to get domain/i, /domain not found/i];

/**
 * Parse `virsh dominfo` output.
 *
 * @param name - Domain name queried
 * @param stdout - Command output, one `Field: value` per line
 */
export function parseDomInfo(name: string, stdout: string): DomainInfo {
  const fields = new Map<string, string>();
  for (const line of stdout.split('\n')) {
    const colon = line.indexOf(':');
    if (colon === -1) {
      continue;
    }
    fields.set(line.slice(0, colon).trim().toLowerCase(), line.slice(colon + 1).trim());
  }

  const stateText = (fields.get('state') ?? '').toLowerCase();
  const state = KNOWN_STATES.find((known) => known === stateText) ?? 'unknown';

  const info: DomainInfo = {
    name: fields.get('name') ?? name,
    state,
  };

  const uuid = fields.get('uuid');
  if (uuid) {
    info.uuid = uuid;
  }
  const cpus = Number.parseInt(fields.get('cpu(s)') ?? '', 10);
  if (!Number.isNaN(cpus)) {
    info.cpus = cpus;
  }
  const memory = Number.parseInt(fields.get('max memory') ?? '', 10);
  if (!Number.isNaN(memory)) {
    info.maxMemoryKiB = memory;
  }
  const autostart = fields.get('autostart');
  if (autostart) {
    info.autostart = autostart.toLowerCase() === 'enable';
  }

  return info;
}

/**
 * Check whether virsh stderr reports a missing domain.
 */
export function isMissingDomain(stderr: string): boolean {
  return MISSING_DOMAIN_PATTERNS.some((pattern) => pattern.test(stderr));
}

/**
 * Whether a domain state counts as running for start/stop decisions.
 */
export function isRunningState(state: DomainState): boolean {
  return state === 'running' || state === 'idle' || state === 'paused' || state === 'in shutdown';
}

/**
 * Find the first MAC address in `virsh dumpxml` output.
 *
 * @returns Lower-case MAC, or undefined when the definition has none
 */
export function parseFirstMac(xml: string): string | undefined {
  const match = /<mac\s+address\s*=\s*['"]([0-9A-Fa-f]{2}(?::[0-9A-Fa-f]{2}){5})['"]/.exec(xml);
  return match?.[1]?.toLowerCase();
}

/**
 * Parse a dnsmasq lease status document (a JSON array of lease objects).
 * Entries without an IP and MAC are dropped; anything unparsable yields [].
 */
export function parseLeases(content: string): Lease[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return [];
  }
  if (!Array.isArray(parsed)) {
    return [];
  }

  const leases: Lease[] = [];
  for (const entry of parsed) {
    if (typeof entry !== 'object' || entry === null) {
      continue;
    }
    const ip: unknown = 'ip-address' in entry ? entry['ip-address'] : undefined;
    const mac: unknown = 'mac-address' in entry ? entry['mac-address'] : undefined;
    if (typeof ip !== 'string' || typeof mac !== 'string') {
      continue;
    }
    const lease: Lease = { ipAddress: ip, macAddress: mac.toLowerCase() };
    const hostname: unknown = 'hostname' in entry ? entry.hostname : undefined;
    if (typeof hostname === 'string') {
      lease.hostname = hostname;
    }
    const expiry: unknown = 'expiry-time' in entry ? entry['expiry-time'] : undefined;
    if (typeof expiry === 'number') {
      lease.expiryTime = expiry;
    }
    leases.push(lease);
  }
  return leases;
}

/**
 * Look up the IP leased to a MAC address on a bridge.
 *
 * @param bridge - Bridge interface name
 * @param mac - Guest MAC address
 * @param leaseDir - Directory of `<bridge>.status` files
 * @returns IP address, or undefined when the file is missing or has no match
 */
export async function lookupLeaseIp(
  bridge: string,
  mac: string,
  leaseDir?: string
): Promise<string | undefined> {
  let content: string;
  try {
    content = await readFile(getLeaseFilePath(bridge, leaseDir), 'utf-8');
  } catch {
    return undefined;
  }

  const wanted = mac.toLowerCase();
  // The newest lease for a MAC is listed last
  const matches = parseLeases(content).filter((lease) => lease.macAddress === wanted);
  return matches[matches.length - 1]?.ipAddress;
}
