/**
 * Core Types for kvmlab
 *
 * Types for the run context, lifecycle actions and their results.
 */

import type { ConfigStore } from '../config/loader.js';
import type { OptionOverrides } from '../config/types.js';
import type { Logger } from '../lib/logger.js';
import type { CreateGuestParams } from '../virt/types.js';
import type { VirtClient } from '../virt/client.js';

/**
 * Everything a command needs, built once by the CLI and passed explicitly
 */
export interface RunContext {
  /** Diagnostic output */
  logger: Logger;
  /** Domain management and provisioning */
  virt: VirtClient;
  /** Merged configuration files */
  config: ConfigStore;
  /** Live `--option` overrides */
  options: OptionOverrides;
  /** Suppress state-changing commands and state writes */
  dryrun: boolean;
  /** Delete guest state files on destroy */
  purge: boolean;
}

/**
 * Lab lifecycle commands
 */
export type LabCommand = 'create' | 'destroy' | 'start' | 'stop';

/**
 * Types of actions the planner can emit
 */
export type ActionType =
  | 'create'   // Provision a new guest
  | 'destroy'  // Remove a guest's domain
  | 'start'    // Start an existing domain
  | 'stop';    // Shut down a running domain

/**
 * Planned action to be executed
 */
export interface Action {
  /** Type of action to perform */
  type: ActionType;
  /** Guest number within the lab */
  guestNumber: number;
  /** Guest (domain) name */
  guestName: string;
  /** Provisioning parameters, for create actions */
  params?: CreateGuestParams;
}

/**
 * Why a guest needs no action
 */
export type SkipReason =
  | 'exists'          // create: a domain with the guest's name already exists
  | 'owned-by-other'  // destroy/start/stop: domain belongs to another lab
  | 'absent'          // destroy/start/stop: no such domain
  | 'already-running' // start: domain is running
  | 'already-stopped'; // stop: domain is not running

/**
 * A guest the planner decided to leave alone
 */
export interface Skip {
  guestNumber: number;
  guestName: string;
  reason: SkipReason;
  /** Human-readable explanation */
  message: string;
  /** Whether the skip is worth a warning (otherwise traced) */
  warn: boolean;
}

/**
 * Planner decision for one guest
 */
export type GuestDecision =
  | { kind: 'action'; action: Action }
  | { kind: 'skip'; skip: Skip };

/**
 * Observed state of a guest's domain
 */
export interface GuestObservation {
  guestNumber: number;
  guestName: string;
  /** Whether a domain with the guest's name exists */
  exists: boolean;
  /** Whether the domain is running */
  running: boolean;
  /** Lab recorded as owner in the guest's state ('' when none) */
  owner: string;
}
