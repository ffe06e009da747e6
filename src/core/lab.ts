/**
 * Lab
 *
 * A named group of guests. Resolves the lab's option values, validates
 * them, and owns the lab's persisted variables (status, the options given
 * to the last create and the names of the guests it created).
 */

import { Resolver, readSettings, resolveDataDir, type SpecialKeyHandler } from '../config/resolver.js';
import type { LabSettings, OptionOverrides } from '../config/types.js';
import { validateSettings } from '../config/validator.js';
import { getLabStatePath } from '../lib/paths.js';
import { LabRegistry } from '../state/registry.js';
import { VariableStore } from '../state/store.js';
import type { LabStatus } from '../state/types.js';
import { ConfigError } from './errors.js';
import { Guest } from './guest.js';
import { assertValidLabName } from './naming.js';
import type { RunContext } from './types.js';

/**
 * Options for opening a lab
 */
export interface LabOpenOptions {
  /**
   * Accept a lab missing from the configuration when the registry still
   * lists it as active (teardown of a lab whose section was removed)
   */
  allowRegistered?: boolean;
}

/**
 * One lab, built per invocation.
 */
export class Lab {
  readonly name: string;
  readonly store: VariableStore;
  private readonly ctx: RunContext;
  private readonly dataDir: string;
  private readonly resolver: Resolver;
  private guestList: Guest[] | undefined;

  private constructor(name: string, ctx: RunContext, store: VariableStore, dataDir: string) {
    this.name = name;
    this.ctx = ctx;
    this.store = store;
    this.dataDir = dataDir;

    const specials = new Map<string, SpecialKeyHandler>([
      ['name', () => this.name],
      ['lab', () => this.name],
      ['status', () => this.status()],
    ]);
    this.resolver = new Resolver(
      { config: ctx.config, liveOptions: ctx.options, savedOptions: this.savedOptions() },
      { lab: name },
      specials
    );
  }

  /**
   * Open a lab: check its name, find its definition, load its variables
   * and validate its options.
   *
   * @throws ConfigError for an invalid name, an undefined lab or invalid options
   * @throws StateError when the lab's variable file is corrupt
   */
  static async open(name: string, ctx: RunContext, options: LabOpenOptions = {}): Promise<Lab> {
    assertValidLabName(name);

    const dataDir = resolveDataDir(ctx.config);
    if (!ctx.config.has(name)) {
      const registered = options.allowRegistered
        ? (await LabRegistry.open(dataDir, { readOnly: true })).has(name)
        : false;
      if (!registered) {
        throw new ConfigError(
          `Lab '${name}' is not defined`,
          'LAB_NOT_FOUND',
          `Add a [${name}] section to a .cfg or .ini file in the configuration directory.`
        );
      }
      ctx.logger.trace(`Lab ${name} has no configuration section; using defaults and saved state`);
    }

    const store = await VariableStore.open(getLabStatePath(dataDir, name), {
      readOnly: ctx.dryrun,
    });
    const lab = new Lab(name, ctx, store, dataDir);
    lab.validate();
    return lab;
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
   * Every option key visible to the lab.
   */
  keys(): string[] {
    return this.resolver.keys();
  }

  /**
   * Every resolved option value.
   */
  values(): Record<string, string> {
    return this.resolver.values();
  }

  /**
   * Typed view of the lab's settings.
   */
  settings(): LabSettings {
    return readSettings((key) => this.resolver.option(key));
  }

  /**
   * Whether the configuration has a section for the lab.
   */
  isConfigured(): boolean {
    return this.ctx.config.has(this.name);
  }

  /**
   * Number of guests in the lab. A lab whose section was removed keeps
   * the guests its last create recorded.
   */
  guestCount(): number {
    return this.recordedGuests()?.length ?? this.settings().guests;
  }

  /**
   * Persisted lab status; 'inactive' when never recorded.
   */
  status(): string {
    return this.store.getString('status') ?? 'inactive';
  }

  /**
   * Record the lab status.
   */
  async setStatus(status: LabStatus): Promise<void> {
    await this.store.set('status', status);
  }

  /**
   * Options saved by the lab's last create.
   */
  savedOptions(): OptionOverrides | undefined {
    return this.store.getStringRecord('options');
  }

  /**
   * Save the `--option` overrides given to a create.
   */
  async saveOptions(options: OptionOverrides): Promise<void> {
    await this.store.set('options', { ...options });
  }

  /**
   * Record the names of the lab's guests, so the lab can still be torn
   * down once its section is removed from the configuration.
   */
  async saveGuestNames(names: string[]): Promise<void> {
    await this.store.set('guests', names);
  }

  /**
   * Guest names recorded by the last create, used only while the lab has
   * no configuration section.
   */
  private recordedGuests(): string[] | undefined {
    return this.isConfigured() ? undefined : this.store.getStringList('guests');
  }

  /**
   * Data directory holding every lab's and guest's state.
   */
  getDataDir(): string {
    return this.dataDir;
  }

  /**
   * Open every guest of the lab, in guest order. Guests are opened once
   * per lab object.
   */
  async guests(): Promise<Guest[]> {
    if (this.guestList) {
      return this.guestList;
    }
    const guests: Guest[] = [];
    const recorded = this.recordedGuests();
    const count = this.guestCount();
    for (let number = 1; number <= count; number++) {
      guests.push(await Guest.open(this, number, this.ctx, recorded?.[number - 1]));
    }
    this.guestList = guests;
    return guests;
  }

  private validate(): void {
    const result = validateSettings(this.values());
    if (!result.valid) {
      throw new ConfigError(
        `Invalid options for lab '${this.name}'`,
        'CONFIG_VALIDATION_FAILED',
        `Check the [${this.name}] and [.global] sections and any --option values.`,
        undefined,
        result.errors
      );
    }
  }
}
