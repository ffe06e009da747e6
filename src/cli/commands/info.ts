/**
 * Info Command Handler
 *
 * Shows a lab's resolved options and the state of its guests. Read-only:
 * domains are queried, nothing is changed and no state is written.
 */

import { isKvmlabError } from '../../core/errors.js';
import type { Guest } from '../../core/guest.js';
import { Lab } from '../../core/lab.js';
import type { RunContext } from '../../core/types.js';
import { createOutput, handleError, type OutputFormatter } from '../output.js';

/**
 * Options for the info command
 */
export interface InfoCommandOptions {
  json?: boolean;
}

/**
 * Guest row shown by info
 */
export interface GuestInfo {
  name: string;
  hostname: string;
  status: string;
  mac: string;
  ip: string;
}

/**
 * Execute the info command.
 *
 * @param labName - Lab to show
 * @param options - Command options
 * @param ctx - Run context
 * @returns Process exit code
 */
export async function infoCommand(
  labName: string,
  options: InfoCommandOptions,
  ctx: RunContext
): Promise<number> {
  const output = createOutput('info', ctx.logger, options);

  try {
    const lab = await Lab.open(labName, ctx, { allowRegistered: true });

    const values = lab.values();
    const keys = Object.keys(values).sort();

    const guests: GuestInfo[] = [];
    for (const guest of await lab.guests()) {
      guests.push(await describeGuest(guest, output));
    }

    if (output.isJson()) {
      output.setData('lab', lab.name);
      output.setData('status', lab.status());
      output.setData('options', Object.fromEntries(keys.map((key) => [key, values[key] ?? ''])));
      output.setData('guests', guests);
    } else {
      output.info(`Lab: ${lab.name}`);
      output.info(`Status: ${lab.status()}`);
      output.newline();
      output.table(
        ['OPTION', 'VALUE'],
        keys.map((key) => [key, values[key] ?? ''])
      );
      output.newline();
      output.table(
        ['NAME', 'HOSTNAME', 'STATUS', 'MAC', 'IP'],
        guests.map((guest) => [guest.name, guest.hostname, guest.status, guest.mac, guest.ip])
      );
    }

    output.flush();
    return output.getExitCode();
  } catch (error) {
    return handleError(output, error);
  }
}

/**
 * Gather a guest's live state, falling back to its persisted variables
 * when the domain cannot be queried.
 */
async function describeGuest(guest: Guest, output: OutputFormatter): Promise<GuestInfo> {
  const base = { name: guest.name, hostname: guest.hostname() };
  try {
    return {
      ...base,
      status: await guest.status(),
      mac: (await guest.mac()) ?? '',
      ip: (await guest.ip()) ?? '',
    };
  } catch (error) {
    if (!isKvmlabError(error)) {
      throw error;
    }
    output.warning(`${error.message}; showing last known state`);
    return {
      ...base,
      status: guest.store.getString('status') ?? 'inactive',
      mac: guest.store.getString('mac') ?? '',
      ip: guest.store.getString('ip') ?? '',
    };
  }
}
