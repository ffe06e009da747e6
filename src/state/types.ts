/**
 * State Types for kvmlab
 *
 * These types represent the persisted variable documents kept for each lab
 * and guest, and the registry of active labs.
 */

/**
 * Any value that survives a JSON round trip
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Contents of one lab or guest variable file
 */
export type VariableMap = Record<string, JsonValue>;

/**
 * Lab status values written after each lifecycle command
 */
export type LabStatus = 'active' | 'inactive' | 'stopped';

/**
 * Registry of labs that have been created and not yet destroyed,
 * persisted as <vardir>/labs.json
 */
export interface RegistryFile {
  /** Schema version for migrations */
  version: 1;
  /** Names of active labs, sorted */
  active: string[];
}
