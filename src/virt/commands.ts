/**
 * Command Builders
 *
 * Builds argument vectors for the domain management tool (virsh) and the
 * guest provisioning tool (kvm-install-vm).
 */

import type { CreateGuestParams } from './types.js';

/**
 * Executables used for each collaborator
 */
export interface ToolPaths {
  /** Domain management and introspection (default: 'virsh') */
  virsh: string;
  /** Guest provisioning (default: 'kvm-install-vm') */
  installer: string;
}

export const DEFAULT_TOOLS: ToolPaths = {
  virsh: 'virsh',
  installer: 'kvm-install-vm',
};

/**
 * `virsh dominfo <name>`
 */
export function buildDomInfoArgs(tools: ToolPaths, name: string): string[] {
  return [tools.virsh, 'dominfo', name];
}

/**
 * `virsh dumpxml <name>`
 */
export function buildDumpXmlArgs(tools: ToolPaths, name: string): string[] {
  return [tools.virsh, 'dumpxml', name];
}

/**
 * `virsh start <name>`
 */
export function buildStartArgs(tools: ToolPaths, name: string): string[] {
  return [tools.virsh, 'start', name];
}

/**
 * `virsh shutdown <name>`
 */
export function buildShutdownArgs(tools: ToolPaths, name: string): string[] {
  return [tools.virsh, 'shutdown', name];
}

/**
 * `kvm-install-vm remove <name>`
 */
export function buildRemoveArgs(tools: ToolPaths, name: string): string[] {
  return [tools.installer, 'remove', name];
}

/**
 * `kvm-install-vm create [flags] <name>`
 *
 * Empty string options are left out so the installer applies its own
 * default.
 */
export function buildCreateArgs(tools: ToolPaths, params: CreateGuestParams): string[] {
  const args: string[] = [tools.installer, 'create'];

  const flag = (name: string, value: string | number): void => {
    const text = String(value);
    if (text !== '') {
      args.push(name, text);
    }
  };

  if (params.autostart) {
    args.push('-a');
  }
  flag('-b', params.bridge);
  flag('-c', params.cpus);
  flag('-d', params.disksize);
  flag('-D', params.domain);
  flag('-f', params.feature);
  flag('-g', params.graphics);
  flag('-i', params.image);
  flag('-k', params.key);
  flag('-l', params.imagedir);
  flag('-L', params.vmdir);
  flag('-m', params.memory);
  flag('-M', params.mac);
  flag('-p', params.port);
  flag('-s', params.scriptname);
  flag('-t', params.distro);
  flag('-T', params.timezone);
  flag('-u', params.user);

  args.push(params.name);
  return args;
}
