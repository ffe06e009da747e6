/**
 * Post-Action Hooks
 *
 * Runs the lab's postcreate / postdestroy / poststart / poststop snippet
 * once per lab command, with the lab's resolved options exported to the
 * environment.
 */

import { HOOK_KEYS } from '../config/defaults.js';
import { HookError } from './errors.js';
import type { Lab } from './lab.js';
import { ENV_PREFIX, LEGACY_ENV_PREFIX, toEnvName } from './naming.js';
import type { LabCommand, RunContext } from './types.js';

/**
 * Environment exported to hooks: `KVMLAB_<KEY>` for every resolved lab
 * option, plus the lab name and its guest count. Each variable is also
 * exported under the legacy `VIRTLAB_` prefix.
 */
export function buildHookEnvironment(lab: Lab): Record<string, string> {
  const values: Record<string, string> = {
    ...lab.values(),
    lab: lab.name,
    guests: String(lab.guestCount()),
  };

  const env: Record<string, string> = {};
  for (const prefix of [LEGACY_ENV_PREFIX, ENV_PREFIX]) {
    for (const [key, value] of Object.entries(values)) {
      env[toEnvName(key, prefix)] = value;
    }
  }
  return env;
}

/**
 * Run the hook for a lab command, if the lab defines one.
 *
 * A failing postdestroy ends the command; other hooks only log.
 *
 * @returns Whether a hook ran and succeeded; false when it failed, null when none is set
 * @throws HookError when postdestroy fails
 */
export async function runPostHook(
  command: LabCommand,
  lab: Lab,
  ctx: RunContext
): Promise<boolean | null> {
  const hook = HOOK_KEYS[command];
  const script = lab.resolve(hook).trim();
  if (!script) {
    return null;
  }

  ctx.logger.trace(`Running ${hook} hook for lab ${lab.name}`);
  const cwd = lab.resolve('playbookdir');
  const result = await ctx.virt.runHook(script, {
    env: buildHookEnvironment(lab),
    ...(cwd ? { cwd } : {}),
  });

  if (result.exitCode === 0) {
    return true;
  }

  const message = `${hook} hook for lab ${lab.name} exited with code ${result.exitCode ?? 'null'}`;
  if (command === 'destroy') {
    throw new HookError(message, hook, result.exitCode);
  }
  ctx.logger.error(message);
  return false;
}
