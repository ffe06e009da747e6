/**
 * Inventory Builder
 *
 * Builds the dynamic inventory document for a lab: groups from the lab's
 * `group.<name>` options, the implicit `ungrouped` and `all` groups, and
 * host variables from `var.<name>` options.
 */

import yaml from 'js-yaml';

import { GROUP_PREFIX, VAR_PREFIX } from '../config/defaults.js';
import { formatSequence, parseSequence } from '../lib/sequence.js';
import { InventoryError, SequenceError } from './errors.js';
import type { Lab } from './lab.js';

/**
 * Names every inventory document uses itself; user groups may not take them.
 */
export const RESERVED_GROUPS: ReadonlySet<string> = new Set(['all', 'ungrouped', '_meta']);

/**
 * One host of the inventory
 */
export interface InventoryHost {
  /** Guest number */
  number: number;
  /** Fully qualified hostname */
  hostname: string;
  /** Host variables, `var.` prefix stripped */
  vars: Record<string, string>;
}

/**
 * Everything the builder reads, in a form that does not need a Lab
 */
export interface InventorySource {
  /** Group name and member sequence text, in configuration order */
  groups: Array<[name: string, members: string]>;
  /** Hosts in guest order */
  hosts: InventoryHost[];
}

/**
 * Built inventory
 */
export interface Inventory {
  /** Group name to hostnames, user groups in order then `ungrouped` */
  groups: Map<string, string[]>;
  /** Hostname to host variables; every host has an entry */
  hostvars: Record<string, Record<string, string>>;
}

/**
 * Inventory document printed by `inventory --list`
 */
export type InventoryDocument = Record<
  string,
  | { hosts: string[] }
  | { children: string[] }
  | { hostvars: Record<string, Record<string, string>> }
>;

/**
 * Build an inventory.
 *
 * @throws InventoryError for a reserved group name, an invalid member
 *   sequence, or a member outside the lab's guests
 */
export function buildInventory(source: InventorySource): Inventory {
  const byNumber = new Map<number, string>();
  for (const host of source.hosts) {
    byNumber.set(host.number, host.hostname);
  }
  const count = source.hosts.length;

  const groups = new Map<string, string[]>();
  const grouped = new Set<number>();

  for (const [name, members] of source.groups) {
    if (name === '') {
      throw new InventoryError(`Group option '${GROUP_PREFIX}' has no name`, 'INVALID_GROUP', name);
    }
    if (RESERVED_GROUPS.has(name)) {
      throw new InventoryError(
        `Group name '${name}' is reserved`,
        'RESERVED_GROUP',
        name,
        `Rename ${GROUP_PREFIX}${name}; ${Array.from(RESERVED_GROUPS).join(', ')} are built in.`
      );
    }

    const numbers = parseMembers(name, members, count);
    const hosts: string[] = [];
    for (const number of numbers) {
      const hostname = byNumber.get(number);
      if (hostname === undefined) {
        throw new InventoryError(
          `Group '${name}' refers to guest ${number}, but the lab has guests ${formatSequence(byNumber.keys())}`,
          'GROUP_OUT_OF_RANGE',
          name
        );
      }
      hosts.push(hostname);
      grouped.add(number);
    }
    groups.set(name, hosts);
  }

  groups.set(
    'ungrouped',
    source.hosts
      .filter((host) => !grouped.has(host.number))
      .sort((a, b) => a.number - b.number)
      .map((host) => host.hostname)
  );

  const hostvars: Record<string, Record<string, string>> = {};
  for (const host of source.hosts) {
    setEntry(hostvars, host.hostname, { ...host.vars });
  }

  return { groups, hostvars };
}

/**
 * Collect a lab's groups, hosts and host variables.
 */
export async function readInventorySource(lab: Lab): Promise<InventorySource> {
  const groups: Array<[string, string]> = lab
    .keys()
    .filter((key) => key.startsWith(GROUP_PREFIX))
    .map((key): [string, string] => [key.slice(GROUP_PREFIX.length), lab.resolve(key)]);

  const hosts: InventoryHost[] = [];
  for (const guest of await lab.guests()) {
    const vars: Record<string, string> = {};
    for (const [key, value] of Object.entries(guest.values())) {
      if (key.startsWith(VAR_PREFIX)) {
        setEntry(vars, key.slice(VAR_PREFIX.length), value);
      }
    }
    hosts.push({ number: guest.number, hostname: guest.hostname(), vars });
  }

  return { groups, hosts };
}

/**
 * Build the inventory of a lab.
 */
export async function buildLabInventory(lab: Lab): Promise<Inventory> {
  return buildInventory(await readInventorySource(lab));
}

/**
 * Render the `--list` document.
 */
export function toInventoryDocument(inventory: Inventory): InventoryDocument {
  const document: InventoryDocument = {};
  for (const [name, hosts] of inventory.groups) {
    setEntry<InventoryDocument[string]>(document, name, { hosts: [...hosts] });
  }
  document['all'] = { children: Array.from(inventory.groups.keys()) };
  document['_meta'] = { hostvars: inventory.hostvars };
  return document;
}

/**
 * Variables of one host; unknown hosts have none.
 */
export function hostVars(inventory: Inventory, hostname: string): Record<string, string> {
  return Object.hasOwn(inventory.hostvars, hostname) ? inventory.hostvars[hostname] ?? {} : {};
}

/**
 * Render the inventory as a static YAML inventory file.
 */
export function renderInventoryYaml(inventory: Inventory): string {
  const children: Record<string, { hosts: Record<string, Record<string, string>> }> = {};
  for (const [name, hostnames] of inventory.groups) {
    const hosts: Record<string, Record<string, string>> = {};
    for (const hostname of hostnames) {
      setEntry(hosts, hostname, hostVars(inventory, hostname));
    }
    setEntry(children, name, { hosts });
  }
  return yaml.dump({ all: { children } }, { lineWidth: -1 });
}

function parseMembers(group: string, members: string, count: number): number[] {
  if (members.trim() === '*') {
    return Array.from({ length: count }, (_, index) => index + 1);
  }
  try {
    return parseSequence(members);
  } catch (error) {
    if (error instanceof SequenceError) {
      throw new InventoryError(
        `Invalid members for group '${group}': ${error.message}`,
        'INVALID_GROUP',
        group,
        'Use numbers and ranges such as 1,3..5, or * for every guest.'
      );
    }
    throw error;
  }
}

/**
 * Store a configuration-supplied name as an own property; plain assignment
 * of `__proto__` would replace the object's prototype instead.
 */
function setEntry<T>(record: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(record, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
