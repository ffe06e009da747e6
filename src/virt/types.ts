/**
 * Virtualization Types
 *
 * Type definitions for libvirt domain introspection and guest provisioning.
 */

/**
 * Domain state values reported by `virsh dominfo`
 */
export type DomainState =
  | 'running'
  | 'idle'
  | 'paused'
  | 'in shutdown'
  | 'shut off'
  | 'crashed'
  | 'pmsuspended'
  | 'unknown';

/**
 * Domain information parsed from `virsh dominfo`
 */
export interface DomainInfo {
  /** Domain name */
  name: string;
  /** Current state */
  state: DomainState;
  /** Domain UUID, when reported */
  uuid?: string;
  /** Number of virtual CPUs, when reported */
  cpus?: number;
  /** Maximum memory in KiB, when reported */
  maxMemoryKiB?: number;
  /** Whether the domain starts with the host */
  autostart?: boolean;
}

/**
 * One DHCP lease from a libvirt dnsmasq status file
 */
export interface Lease {
  ipAddress: string;
  macAddress: string;
  hostname?: string;
  expiryTime?: number;
}

/**
 * Parameters for provisioning a guest with the installer tool
 */
export interface CreateGuestParams {
  /** Guest (domain) name */
  name: string;
  /** Start the domain when the host boots */
  autostart: boolean;
  /** Bridge interface */
  bridge: string;
  /** Number of virtual CPUs */
  cpus: number;
  /** Disk size in GB */
  disksize: number;
  /** DNS domain */
  domain: string;
  /** CPU model / feature set */
  feature: string;
  /** Graphics type */
  graphics: string;
  /** Custom base image */
  image: string;
  /** SSH public key */
  key: string;
  /** Directory of base images */
  imagedir: string;
  /** Directory of guest disks */
  vmdir: string;
  /** Memory size in MB */
  memory: number;
  /** MAC address override */
  mac: string;
  /** Console port */
  port: string;
  /** Custom post-install shell script */
  scriptname: string;
  /** Linux distribution */
  distro: string;
  /** Timezone */
  timezone: string;
  /** Extra user */
  user: string;
}

/**
 * Outcome of an external command
 */
export interface CommandResult {
  /** Exit code, null when killed by a signal */
  exitCode: number | null;
  /** Captured standard output ('' when not captured) */
  stdout: string;
  /** Captured standard error ('' when not captured) */
  stderr: string;
}
