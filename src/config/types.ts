/**
 * Configuration Types for kvmlab
 *
 * These types represent the INI configuration sections and the typed view
 * of a lab's resolved settings.
 */

// =============================================================================
// INI Input Types
// =============================================================================

/**
 * One configuration section: lower case option name to raw value.
 */
export type ConfigSection = Record<string, string>;

/**
 * Live `--option name=value` overrides for this invocation
 */
export type OptionOverrides = Record<string, string>;

// =============================================================================
// Resolved Types
// =============================================================================

/**
 * Typed view of the settings that drive guest provisioning, after the
 * resolution chain and post-processing
 */
export interface LabSettings {
  /** Start the domain when the host boots */
  autostart: boolean;
  /** Bridge interface the guest network attaches to */
  bridge: string;
  /** Number of virtual CPUs */
  cpus: number;
  /** Disk size in GB */
  disksize: number;
  /** Linux distribution known to the provisioning tool */
  distro: string;
  /** DNS domain; hostnames are {name}.{domain} */
  domain: string;
  /** CPU model / feature set */
  feature: string;
  /** Gateway address exported to hooks */
  gateway: string;
  /** Graphics type: spice, vnc or none */
  graphics: string;
  /** Number of guests in the lab */
  guests: number;
  /** Custom base image */
  image: string;
  /** Directory of base images */
  imagedir: string;
  /** SSH public key installed in the guest */
  key: string;
  /** MAC address override */
  mac: string;
  /** Memory size in MB */
  memory: number;
  /** Guest name template (raw, never expanded) */
  namefmt: string;
  /** Console port ('' for automatic) */
  port: string;
  /** Custom post-install shell script */
  scriptname: string;
  /** Timezone */
  timezone: string;
  /** Extra user created in the guest */
  user: string;
  /** Data directory for persisted state */
  vardir: string;
  /** Directory of guest disks */
  vmdir: string;
  /** Directory that relative script names are resolved against */
  scriptdir: string;
  /** Working directory for post-action hooks */
  playbookdir: string;
}
