/**
 * Inventory Command Handler
 *
 * Prints a lab's dynamic inventory for configuration-management tools:
 * the JSON document (`--list`, the default), one host's variables
 * (`--host`), or a static YAML inventory (`--yaml`).
 *
 * The inventory is built completely before anything is printed, so an
 * invalid group definition produces no partial document.
 */

import { ConfigError } from '../../core/errors.js';
import {
  buildLabInventory,
  hostVars,
  renderInventoryYaml,
  toInventoryDocument,
} from '../../core/inventory.js';
import { Lab } from '../../core/lab.js';
import { toEnvName } from '../../core/naming.js';
import type { RunContext } from '../../core/types.js';
import { createOutput, handleError } from '../output.js';

/**
 * Options for the inventory command
 */
export interface InventoryCommandOptions {
  list?: boolean;
  host?: string;
  yaml?: boolean;
}

/**
 * Execute the inventory command.
 *
 * @param labArg - Lab name; defaults to $KVMLAB_LAB
 * @param options - Command options
 * @param ctx - Run context
 * @param env - Environment consulted for the default lab
 * @returns Process exit code
 */
export async function inventoryCommand(
  labArg: string | undefined,
  options: InventoryCommandOptions,
  ctx: RunContext,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const output = createOutput('inventory', ctx.logger);

  try {
    const labName = labArg ?? env[toEnvName('lab')];
    if (!labName) {
      throw new ConfigError(
        'No lab given',
        'LAB_NOT_FOUND',
        `Name the lab, or set ${toEnvName('lab')}.`
      );
    }

    const lab = await Lab.open(labName, ctx, { allowRegistered: true });
    const inventory = await buildLabInventory(lab);

    if (options.list) {
      ctx.logger.print(JSON.stringify(toInventoryDocument(inventory), null, 2));
    } else if (options.host !== undefined) {
      ctx.logger.print(JSON.stringify(hostVars(inventory, options.host), null, 2));
    } else if (options.yaml) {
      ctx.logger.print(renderInventoryYaml(inventory));
    } else {
      ctx.logger.print(JSON.stringify(toInventoryDocument(inventory), null, 2));
    }
    return 0;
  } catch (error) {
    return handleError(output, error);
  }
}
