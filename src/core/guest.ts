/**
 * Guest
 *
 * One numbered member of a lab. Resolves per-guest options, derives the
 * guest's name and hostname, and computes MAC, IP and status from the
 * live domain with the persisted variables as fallback. Live values are
 * cached until resetCache() is called after a state transition.
 */

import { isAbsolute, join } from 'node:path';

import { NAMEFMT_KEY } from '../config/defaults.js';
import { Resolver, readSettings, type SpecialKeyHandler } from '../config/resolver.js';
import type { LabSettings } from '../config/types.js';
import { validateSettings } from '../config/validator.js';
import { getGuestStatePath } from '../lib/paths.js';
import { VariableStore } from '../state/store.js';
import { isRunningState } from '../virt/queries.js';
import type { CreateGuestParams, DomainInfo } from '../virt/types.js';
import { ConfigError, TemplateError, isKvmlabError } from './errors.js';
import type { Lab } from './lab.js';
import { buildHostname, deriveGuestName } from './naming.js';
import type { GuestObservation, RunContext } from './types.js';

/**
 * One guest of a lab, built per invocation.
 */
export class Guest {
  readonly lab: Lab;
  readonly number: number;
  readonly name: string;
  readonly store: VariableStore;
  private readonly ctx: RunContext;
  private readonly resolver: Resolver;

  // undefined = not looked up yet
  private domain: DomainInfo | null | undefined;
  private macValue: { value: string | undefined } | undefined;
  private ipValue: { value: string | undefined } | undefined;
  private statusValue: string | undefined;

  private constructor(lab: Lab, number: number, ctx: RunContext, name: string, store: VariableStore) {
    this.lab = lab;
    this.number = number;
    this.ctx = ctx;
    this.name = name;
    this.store = store;
    this.resolver = createGuestResolver(lab, number, ctx, {
      name: () => this.name,
      hostname: () => this.hostname(),
      mac: () => this.macSnapshot(),
      ip: () => this.ipSnapshot(),
      status: () => this.statusSnapshot(),
    });
  }

  /**
   * Open guest `number` of a lab: derive its name, unless a recorded name
   * is given, load its variables and validate its options.
   *
   * @throws ConfigError when the guest's options are invalid
   * @throws TemplateError when the name template cannot be expanded
   */
  static async open(
    lab: Lab,
    number: number,
    ctx: RunContext,
    recordedName?: string
  ): Promise<Guest> {
    const name = recordedName ?? deriveName(lab, number, ctx);
    const store = await VariableStore.open(getGuestStatePath(lab.getDataDir(), name), {
      readOnly: ctx.dryrun,
    });
    const guest = new Guest(lab, number, ctx, name, store);
    guest.validate();
    return guest;
  }

  /**
   * Resolve an option or special key; unknown keys resolve to ''.
   */
  resolve(key: string): string {
    return this.resolver.resolve(key);
  }

  /**
   * Resolve an option through the chain only.
   */
  option(key: string): string | undefined {
    return this.resolver.option(key);
  }

  /**
   * Typed view of the guest's settings.
   */
  settings(): LabSettings {
    return readSettings((key) => this.resolver.option(key));
  }

  /**
   * Fully qualified hostname.
   */
  hostname(): string {
    return buildHostname(this.name, this.resolver.resolve('domain'));
  }

  /**
   * Lab recorded as owner of the guest's domain ('' when none).
   */
  owner(): string {
    return this.store.getString('lab') ?? '';
  }

  /**
   * Whether the persisted owner is this guest's lab.
   */
  isOwned(): boolean {
    return this.owner() === this.lab.name;
  }

  /**
   * Query the guest's domain.
   *
   * @returns Domain information, or null when no such domain exists
   * @throws CommandError when the query itself fails
   */
  async domainInfo(): Promise<DomainInfo | null> {
    if (this.domain === undefined) {
      this.domain = await this.ctx.virt.domainInfo(this.name);
    }
    return this.domain;
  }

  /**
   * MAC address: read from the domain definition when the domain exists
   * and belongs to this lab, otherwise the persisted value.
   */
  async mac(): Promise<string | undefined> {
    if (this.macValue) {
      return this.macValue.value;
    }

    let value = this.store.getString('mac');
    const info = await this.domainInfo();
    if (info && this.isOwned()) {
      try {
        value = (await this.ctx.virt.domainMac(this.name)) ?? value;
      } catch (error) {
        if (!isKvmlabError(error)) {
          throw error;
        }
        this.ctx.logger.warning(`${error.message}; using last known MAC`);
      }
    }

    this.macValue = { value };
    return value;
  }

  /**
   * IP address: looked up in the bridge's lease file when the guest is
   * owned by this lab and its domain exists, otherwise the persisted value.
   */
  async ip(): Promise<string | undefined> {
    if (this.ipValue) {
      return this.ipValue.value;
    }

    let value = this.store.getString('ip');
    const bridge = this.resolver.resolve('bridge');
    if (this.isOwned() && bridge && (await this.domainInfo())) {
      const mac = await this.mac();
      if (mac) {
        value = (await this.ctx.virt.leaseIp(bridge, mac)) ?? value;
      }
    }

    this.ipValue = { value };
    return value;
  }

  /**
   * Guest status: `active` while the owned domain runs, `inactive` once it
   * is shut off, the raw domain state otherwise. Falls back to the
   * persisted status, then `inactive`.
   */
  async status(): Promise<string> {
    if (this.statusValue !== undefined) {
      return this.statusValue;
    }

    let value = this.store.getString('status') ?? 'inactive';
    const info = await this.domainInfo();
    if (info && this.isOwned()) {
      if (isRunningState(info.state)) {
        value = 'active';
      } else if (info.state === 'shut off') {
        value = 'inactive';
      } else {
        value = info.state;
      }
    }

    this.statusValue = value;
    return value;
  }

  /**
   * Observe the guest's domain for planning.
   */
  async observe(): Promise<GuestObservation> {
    const info = await this.domainInfo();
    return {
      guestNumber: this.number,
      guestName: this.name,
      exists: info !== null,
      running: info !== null && isRunningState(info.state),
      owner: this.owner(),
    };
  }

  /**
   * Forget live values so the next read queries again.
   */
  resetCache(): void {
    this.domain = undefined;
    this.macValue = undefined;
    this.ipValue = undefined;
    this.statusValue = undefined;
  }

  /**
   * Provisioning parameters from the guest's resolved settings. A relative
   * script name is taken from the script directory.
   */
  createParams(): CreateGuestParams {
    const settings = this.settings();
    const scriptdir = this.resolver.resolve('scriptdir');
    let scriptname = settings.scriptname;
    if (scriptname && scriptdir && !isAbsolute(scriptname)) {
      scriptname = join(scriptdir, scriptname);
    }

    return {
      name: this.name,
      autostart: settings.autostart,
      bridge: settings.bridge,
      cpus: settings.cpus,
      disksize: settings.disksize,
      domain: settings.domain,
      feature: settings.feature,
      graphics: settings.graphics,
      image: settings.image,
      key: settings.key,
      imagedir: settings.imagedir,
      vmdir: settings.vmdir,
      memory: settings.memory,
      mac: settings.mac,
      port: settings.port,
      scriptname,
      distro: settings.distro,
      timezone: settings.timezone,
      user: settings.user,
    };
  }

  /**
   * Record that this lab now owns the guest's domain, with its live MAC
   * and IP.
   */
  async recordCreated(): Promise<void> {
    await this.store.set('lab', this.lab.name);
    this.resetCache();

    const mac = await this.mac();
    if (mac) {
      await this.store.set('mac', mac);
    }
    const ip = await this.ip();
    if (ip) {
      await this.store.set('ip', ip);
    }
    await this.store.set('status', 'active');
  }

  /**
   * Release the guest's domain from this lab, or delete its variables
   * entirely when purging.
   */
  async recordDestroyed(purge: boolean): Promise<void> {
    if (purge) {
      await this.store.purge();
    } else {
      await this.store.set('lab', '');
      await this.store.set('status', 'inactive');
    }
    this.resetCache();
  }

  /**
   * Record the guest status after a start or stop.
   */
  async recordStatus(status: 'active' | 'inactive'): Promise<void> {
    await this.store.set('status', status);
    this.resetCache();
  }

  /**
   * Every resolved option value, special keys included.
   */
  values(): Record<string, string> {
    return this.resolver.values();
  }

  private macSnapshot(): string | undefined {
    return this.macValue ? this.macValue.value : this.store.getString('mac');
  }

  private ipSnapshot(): string | undefined {
    return this.ipValue ? this.ipValue.value : this.store.getString('ip');
  }

  private statusSnapshot(): string {
    return this.statusValue ?? this.store.getString('status') ?? 'inactive';
  }

  private validate(): void {
    const result = validateSettings(this.values());
    if (!result.valid) {
      throw new ConfigError(
        `Invalid options for guest ${this.number} of lab '${this.lab.name}'`,
        'CONFIG_VALIDATION_FAILED',
        `Check the [${this.lab.name}.${this.number}] section.`,
        undefined,
        result.errors
      );
    }
  }
}

/**
 * Build a resolver scoped to one guest. Identity keys are fixed; the
 * remaining special keys come from the caller.
 */
function createGuestResolver(
  lab: Lab,
  number: number,
  ctx: RunContext,
  specials: Record<'name' | 'hostname' | 'mac' | 'ip' | 'status', SpecialKeyHandler>
): Resolver {
  const handlers = new Map<string, SpecialKeyHandler>([
    ['lab', () => lab.name],
    ['guest', () => number],
    ...Object.entries(specials),
  ]);
  return new Resolver(
    { config: ctx.config, liveOptions: ctx.options, savedOptions: lab.savedOptions() },
    { lab: lab.name, guest: number },
    handlers
  );
}

/**
 * Guest name: the guest section's `name` when set, otherwise the name
 * template expanded for this guest.
 */
function deriveName(lab: Lab, number: number, ctx: RunContext): string {
  const explicit = ctx.config.get(`${lab.name}.${number}`, 'name')?.trim();
  if (explicit) {
    return explicit;
  }

  const nameOnly = (): never => {
    throw new TemplateError(
      `Circular reference while expanding '${NAMEFMT_KEY}'`,
      'TEMPLATE_INVALID',
      NAMEFMT_KEY
    );
  };
  const resolver = createGuestResolver(lab, number, ctx, {
    name: nameOnly,
    hostname: nameOnly,
    mac: () => undefined,
    ip: () => undefined,
    status: () => undefined,
  });
  return deriveGuestName(resolver.option(NAMEFMT_KEY) ?? '', (key) => resolver.templateValue(key));
}
