/**
 * Lab Command Reconciler for kvmlab
 *
 * Runs a lab command guest by guest: observe the domain, plan, execute,
 * and record the outcome in the guest's variables. Then updates the lab's
 * status and the registry, and runs the command's post-action hook.
 *
 * A failing guest does not stop the command; the result reports it.
 */

import { LabRegistry } from '../state/registry.js';
import type { LabStatus } from '../state/types.js';
import { isKvmlabError } from './errors.js';
import type { Guest } from './guest.js';
import { runPostHook } from './hooks.js';
import type { Lab } from './lab.js';
import { planGuestAction } from './planner.js';
import type { Action, GuestObservation, LabCommand, RunContext, Skip } from './types.js';

/**
 * Result of a single action execution
 */
export interface ActionResult {
  /** The action that was executed */
  action: Action;
  /** Whether the action succeeded */
  success: boolean;
  /** Error message if failed */
  error?: string;
}

/**
 * A guest whose domain could not be observed
 */
export interface ObservationFailure {
  guestNumber: number;
  guestName: string;
  error: string;
}

/**
 * Result of running a lab command
 */
export interface ReconcileResult {
  /** Whether every guest was handled without error */
  success: boolean;
  /** Results of each executed action */
  results: ActionResult[];
  /** Guests left alone */
  skips: Skip[];
  /** Guests that could not be observed */
  failures: ObservationFailure[];
  /** Whether the post-action hook succeeded (null when none is set) */
  hook: boolean | null;
  /** Summary statistics */
  summary: {
    succeeded: number;
    failed: number;
    skipped: number;
  };
}

/**
 * Callback for reporting action progress
 */
export type ActionProgressCallback = (
  action: Action,
  status: 'starting' | 'completed' | 'failed',
  error?: string
) => void;

/**
 * Options for running a lab command
 */
export interface ReconcileOptions {
  /** Callback for progress reporting */
  onProgress?: ActionProgressCallback;
}

/**
 * Lab status recorded after each command. Create and start mark the lab
 * active even when some guests failed.
 */
const LAB_STATUS_AFTER: Record<LabCommand, LabStatus> = {
  create: 'active',
  destroy: 'inactive',
  start: 'active',
  stop: 'stopped',
};

/**
 * Run a lab command against every guest of the lab.
 *
 * @throws HookError when the postdestroy hook fails
 * @throws StateError when a variable file cannot be read
 */
export async function runLabCommand(
  command: LabCommand,
  lab: Lab,
  ctx: RunContext,
  options: ReconcileOptions = {}
): Promise<ReconcileResult> {
  const { onProgress } = options;

  const results: ActionResult[] = [];
  const skips: Skip[] = [];
  const failures: ObservationFailure[] = [];

  for (const guest of await lab.guests()) {
    let observation: GuestObservation;
    try {
      observation = await guest.observe();
    } catch (error) {
      if (!isKvmlabError(error)) {
        throw error;
      }
      ctx.logger.error(error.message);
      failures.push({ guestNumber: guest.number, guestName: guest.name, error: error.message });
      continue;
    }

    const params = command === 'create' ? guest.createParams() : undefined;
    const decision = planGuestAction(command, observation, lab.name, params);

    if (decision.kind === 'skip') {
      const { skip } = decision;
      if (skip.warn) {
        ctx.logger.warning(skip.message);
      } else {
        ctx.logger.trace(skip.message);
      }
      skips.push(skip);

      // A vanished domain no longer belongs to the lab
      if (command === 'destroy' && skip.reason === 'absent' && guest.owner() === lab.name) {
        await guest.recordDestroyed(ctx.purge);
      }
      continue;
    }

    const { action } = decision;
    onProgress?.(action, 'starting');
    try {
      await executeAction(action, guest, ctx);
      results.push({ action, success: true });
      onProgress?.(action, 'completed');
    } catch (error) {
      if (!isKvmlabError(error)) {
        throw error;
      }
      results.push({ action, success: false, error: error.message });
      onProgress?.(action, 'failed', error.message);
    }
  }

  await lab.setStatus(LAB_STATUS_AFTER[command]);
  if (command === 'create') {
    await lab.saveOptions(ctx.options);
    await lab.saveGuestNames((await lab.guests()).map((guest) => guest.name));
  }
  await updateRegistry(command, lab, ctx);

  const hook = await runPostHook(command, lab, ctx);

  const failed = results.filter((result) => !result.success).length + failures.length;
  return {
    success: failed === 0,
    results,
    skips,
    failures,
    hook,
    summary: {
      succeeded: results.length - results.filter((result) => !result.success).length,
      failed,
      skipped: skips.length,
    },
  };
}

/**
 * Execute a single action and record its outcome.
 */
async function executeAction(action: Action, guest: Guest, ctx: RunContext): Promise<void> {
  switch (action.type) {
    case 'create':
      await ctx.virt.createGuest(action.params ?? guest.createParams());
      if (!ctx.dryrun) {
        await guest.recordCreated();
      }
      break;
    case 'destroy':
      await ctx.virt.removeGuest(action.guestName);
      await guest.recordDestroyed(ctx.purge);
      break;
    case 'start':
      await ctx.virt.startDomain(action.guestName);
      await guest.recordStatus('active');
      break;
    case 'stop':
      await ctx.virt.shutdownDomain(action.guestName);
      await guest.recordStatus('inactive');
      break;
  }
}

async function updateRegistry(command: LabCommand, lab: Lab, ctx: RunContext): Promise<void> {
  const registry = await LabRegistry.open(lab.getDataDir(), { readOnly: ctx.dryrun });
  if (command === 'create' || command === 'start') {
    await registry.add(lab.name);
  } else if (command === 'destroy') {
    await registry.remove(lab.name);
  }
}

/**
 * Describe an action for progress output.
 */
export function describeAction(action: Action): string {
  switch (action.type) {
    case 'create': {
      const params = action.params;
      const size = params ? ` (${params.cpus} CPU, ${params.memory} MB, ${params.disksize} GB)` : '';
      return `Create guest: ${action.guestName}${size}`;
    }
    case 'destroy':
      return `Destroy guest: ${action.guestName}`;
    case 'start':
      return `Start guest: ${action.guestName}`;
    case 'stop':
      return `Stop guest: ${action.guestName}`;
  }
}
