/**
 * Built-in option defaults and option classification.
 */

import { userInfo } from 'node:os';

/**
 * Option holding the guest name template. Never template-expanded itself.
 */
export const NAMEFMT_KEY = 'namefmt';

/**
 * Section holding options shared by every lab.
 */
export const GLOBAL_SECTION = '.global';

/**
 * Prefix of inventory group options (`group.<name> = <sequence>`).
 */
export const GROUP_PREFIX = 'group.';

/**
 * Prefix of inventory host variable options (`var.<name> = <value>`).
 */
export const VAR_PREFIX = 'var.';

/**
 * Options whose values are paths and get ~ expanded.
 */
export const PATH_KEYS: ReadonlySet<string> = new Set([
  'image',
  'imagedir',
  'key',
  'playbookdir',
  'scriptdir',
  'scriptname',
  'vardir',
  'vmdir',
]);

/**
 * Post-action hook options, one per lab command.
 */
export const HOOK_KEYS = {
  create: 'postcreate',
  destroy: 'postdestroy',
  start: 'poststart',
  stop: 'poststop',
} as const;

function currentUser(): string {
  const fromEnv = process.env['USER'];
  if (fromEnv) {
    return fromEnv;
  }
  try {
    return userInfo().username;
  } catch {
    return 'root';
  }
}

/**
 * Default values when not specified in config
 */
export const DEFAULTS: Readonly<Record<string, string>> = {
  autostart: 'no',
  bridge: 'virbr0',
  cpus: '1',
  disksize: '10',
  distro: 'centos8',
  domain: 'example.com',
  feature: 'host',
  gateway: '',
  graphics: 'spice',
  guests: '3',
  image: '',
  imagedir: '~/virt/images',
  key: '~/.ssh/id_rsa.pub',
  mac: '',
  memory: '1024',
  namefmt: '{lab}{guest:02d}',
  playbookdir: '',
  port: '',
  postcreate: '',
  postdestroy: '',
  poststart: '',
  poststop: '',
  scriptdir: '',
  scriptname: '',
  timezone: 'US/Eastern',
  user: currentUser(),
  vardir: '~/.local/share/kvmlab',
  vmdir: '~/virt/vms',
};
