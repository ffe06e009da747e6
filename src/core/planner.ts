/**
 * Action Planner for kvmlab
 *
 * Decides, per guest, what a lab command must do given the observed state
 * of the guest's domain: an action to run, or a skip with its reason.
 */

import type { CreateGuestParams } from '../virt/types.js';
import type { Action, GuestDecision, GuestObservation, LabCommand, SkipReason } from './types.js';

/**
 * Decide what a command does to one guest.
 *
 * @param command - Lab command being run
 * @param observation - Observed state of the guest's domain
 * @param labName - Lab running the command
 * @param params - Provisioning parameters, required for create
 */
export function planGuestAction(
  command: LabCommand,
  observation: GuestObservation,
  labName: string,
  params?: CreateGuestParams
): GuestDecision {
  const { guestNumber, guestName, exists, running, owner } = observation;

  const skip = (reason: SkipReason, message: string, warn: boolean): GuestDecision => ({
    kind: 'skip',
    skip: { guestNumber, guestName, reason, message, warn },
  });
  const act = (action: Action): GuestDecision => ({ kind: 'action', action });

  if (command === 'create') {
    if (exists) {
      const who = owner && owner !== labName ? ` (owned by lab ${owner})` : '';
      return skip('exists', `Domain ${guestName} already exists${who}`, true);
    }
    const action: Action = { type: 'create', guestNumber, guestName };
    if (params) {
      action.params = params;
    }
    return act(action);
  }

  if (!exists) {
    return skip('absent', `Domain ${guestName} does not exist`, false);
  }
  if (owner !== labName) {
    const who = owner ? `lab ${owner}` : 'no lab';
    return skip('owned-by-other', `Domain ${guestName} belongs to ${who}, not ${labName}`, true);
  }

  switch (command) {
    case 'destroy':
      return act({ type: 'destroy', guestNumber, guestName });
    case 'start':
      return running
        ? skip('already-running', `Domain ${guestName} is already running`, false)
        : act({ type: 'start', guestNumber, guestName });
    case 'stop':
      return running
        ? act({ type: 'stop', guestNumber, guestName })
        : skip('already-stopped', `Domain ${guestName} is not running`, false);
  }
}
