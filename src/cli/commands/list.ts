/**
 * List Command Handler
 *
 * Lists every lab defined in the configuration, plus labs the registry
 * still records as active, with their guest count and status.
 */

import { resolveDataDir } from '../../config/resolver.js';
import { isKvmlabError } from '../../core/errors.js';
import { Lab } from '../../core/lab.js';
import type { RunContext } from '../../core/types.js';
import { LabRegistry } from '../../state/registry.js';
import { createOutput, handleError } from '../output.js';

/**
 * Options for the list command
 */
export interface ListCommandOptions {
  /** Print lab names only */
  brief?: boolean;
  /** Only labs recorded as active */
  active?: boolean;
  /** Print the column headings (default: true) */
  heading?: boolean;
}

/**
 * Execute the list command.
 *
 * @param options - Command options
 * @param ctx - Run context
 * @returns Process exit code
 */
export async function listCommand(options: ListCommandOptions, ctx: RunContext): Promise<number> {
  const output = createOutput('list', ctx.logger);

  try {
    const registry = await LabRegistry.open(resolveDataDir(ctx.config), { readOnly: true });
    const names = options.active
      ? registry.list()
      : Array.from(new Set([...ctx.config.labNames(), ...registry.list()])).sort();

    if (options.brief) {
      for (const name of names) {
        ctx.logger.print(name);
      }
      return 0;
    }

    const rows: string[][] = [];
    for (const name of names) {
      rows.push(await describeLab(name, ctx));
    }
    output.table(['NAME', 'GUESTS', 'STATUS'], rows, { heading: options.heading !== false });
    return 0;
  } catch (error) {
    return handleError(output, error);
  }
}

/**
 * One table row. A lab whose options cannot be resolved is listed with
 * status `invalid` rather than ending the listing.
 */
async function describeLab(name: string, ctx: RunContext): Promise<string[]> {
  try {
    const lab = await Lab.open(name, ctx, { allowRegistered: true });
    return [name, String(lab.guestCount()), lab.status()];
  } catch (error) {
    if (!isKvmlabError(error)) {
      throw error;
    }
    ctx.logger.trace(`${name}: ${error.message}`);
    return [name, '-', 'invalid'];
  }
}
