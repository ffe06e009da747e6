/**
 * Lifecycle Command Handlers
 *
 * create, destroy, start and stop share one flow:
 * 1. Open the lab (validating its name and options)
 * 2. Run the command guest by guest, reporting progress
 * 3. Print a summary; exit non-zero when any guest failed
 */

import { Lab } from '../../core/lab.js';
import { runLabCommand } from '../../core/reconciler.js';
import type { LabCommand, RunContext } from '../../core/types.js';
import { createOutput, handleError } from '../output.js';

/**
 * Run a lifecycle command against a lab.
 *
 * @param command - Lifecycle command
 * @param labName - Lab to act on
 * @param ctx - Run context
 * @returns Process exit code
 */
export async function lifecycleCommand(
  command: LabCommand,
  labName: string,
  ctx: RunContext
): Promise<number> {
  const output = createOutput(command, ctx.logger);

  try {
    // A lab removed from the configuration can still be torn down
    const allowRegistered = command === 'destroy' || command === 'stop';
    const lab = await Lab.open(labName, ctx, { allowRegistered });

    if (ctx.dryrun) {
      output.info(`Dry run: no changes will be made to lab ${lab.name}`);
    }

    const result = await runLabCommand(command, lab, ctx, {
      onProgress: (action, status, error) => {
        if (status === 'starting') {
          output.actionStart(action);
        } else if (status === 'completed') {
          output.actionComplete(action);
        } else {
          output.actionFailed(action, error ?? 'unknown error');
        }
      },
    });

    output.summary(lab.name, result);
    output.flush();
    return output.getExitCode();
  } catch (error) {
    return handleError(output, error);
  }
}

/**
 * `create <lab>`: provision every guest that does not exist yet.
 */
export function createCommand(labName: string, ctx: RunContext): Promise<number> {
  return lifecycleCommand('create', labName, ctx);
}

/**
 * `destroy <lab>`: remove every guest the lab owns.
 */
export function destroyCommand(labName: string, ctx: RunContext): Promise<number> {
  return lifecycleCommand('destroy', labName, ctx);
}

/**
 * `start <lab>`: start every stopped guest the lab owns.
 */
export function startCommand(labName: string, ctx: RunContext): Promise<number> {
  return lifecycleCommand('start', labName, ctx);
}

/**
 * `stop <lab>`: shut down every running guest the lab owns.
 */
export function stopCommand(labName: string, ctx: RunContext): Promise<number> {
  return lifecycleCommand('stop', labName, ctx);
}
