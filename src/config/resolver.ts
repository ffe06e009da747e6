/**
 * Configuration Resolver
 *
 * Resolves option values for a lab or one of its guests by walking the
 * precedence chain (CLI overrides, guest section, lab section, global
 * section, built-in defaults), then post-processes the raw value: newlines
 * collapse to spaces, placeholders are expanded, and path values get ~
 * expanded. Results are cached for the lifetime of the resolver.
 */

import { TemplateError } from '../core/errors.js';
import { expandHome } from '../lib/paths.js';
import {
  DEFAULTS,
  GLOBAL_SECTION,
  NAMEFMT_KEY,
  PATH_KEYS,
} from './defaults.js';
import type { ConfigStore } from './loader.js';
import { expandTemplate } from './template.js';
import type { LabSettings, OptionOverrides } from './types.js';

/**
 * Computed value for a key that bypasses the chain. Returning undefined
 * means the value is unknown.
 */
export type SpecialKeyHandler = () => string | number | undefined;

/**
 * Where a resolver looks for values
 */
export interface ResolverSources {
  /** Merged configuration files */
  config: ConfigStore;
  /** `--option` overrides given to this invocation */
  liveOptions: OptionOverrides;
  /** `--option` overrides saved by the lab's last create */
  savedOptions?: OptionOverrides;
}

/**
 * Which sections a resolver reads
 */
export interface ResolverScope {
  /** Lab section name */
  lab: string;
  /** Guest number; adds the `<lab>.<number>` section to the chain */
  guest?: number;
}

/**
 * Resolves option values for one lab or guest.
 */
export class Resolver {
  private readonly sources: ResolverSources;
  private readonly scope: ResolverScope;
  private readonly specials: ReadonlyMap<string, SpecialKeyHandler>;
  private readonly cache = new Map<string, string>();
  private readonly expanding = new Set<string>();

  constructor(
    sources: ResolverSources,
    scope: ResolverScope,
    specials: ReadonlyMap<string, SpecialKeyHandler> = new Map()
  ) {
    this.sources = sources;
    this.scope = scope;
    this.specials = specials;
  }

  /**
   * Resolve a key to its final string value.
   *
   * Special keys are answered by their handler. Every other key goes
   * through the chain and post-processing; unknown keys resolve to ''.
   */
  resolve(key: string): string {
    const special = this.specials.get(key);
    if (special) {
      const value = special();
      return value === undefined ? '' : String(value);
    }
    return this.option(key) ?? '';
  }

  /**
   * Resolve a key through the chain only, ignoring special keys.
   *
   * @returns The post-processed value, or undefined when no source has it
   */
  option(key: string): string | undefined {
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const raw = this.lookup(key);
    if (raw === undefined) {
      return undefined;
    }

    const value = key === NAMEFMT_KEY ? raw : this.postProcess(key, raw);
    this.cache.set(key, value);
    return value;
  }

  /**
   * Find the raw value of a key, highest precedence first.
   */
  lookup(key: string): string | undefined {
    const { config, liveOptions, savedOptions } = this.sources;

    // Saved overrides are only consulted once the live override is
    // non-empty, and then take precedence over it.
    const live = liveOptions[key];
    if (live) {
      const saved = savedOptions?.[key];
      return saved !== undefined ? saved : live;
    }

    if (this.scope.guest !== undefined) {
      const fromGuest = config.get(`${this.scope.lab}.${this.scope.guest}`, key);
      if (fromGuest !== undefined) {
        return fromGuest;
      }
    }

    const fromLab = config.get(this.scope.lab, key);
    if (fromLab !== undefined) {
      return fromLab;
    }

    const fromGlobal = config.get(GLOBAL_SECTION, key);
    if (fromGlobal !== undefined) {
      return fromGlobal;
    }

    return DEFAULTS[key];
  }

  /**
   * Every option key visible to this resolver: section options, defaults
   * and live overrides, lab section first.
   */
  keys(): string[] {
    const { config, liveOptions } = this.sources;
    const keys = new Set<string>();
    const add = (names: Iterable<string>): void => {
      for (const name of names) {
        keys.add(name);
      }
    };

    if (this.scope.guest !== undefined) {
      add(Object.keys(config.section(`${this.scope.lab}.${this.scope.guest}`) ?? {}));
    }
    add(Object.keys(config.section(this.scope.lab) ?? {}));
    add(Object.keys(config.section(GLOBAL_SECTION) ?? {}));
    add(Object.keys(DEFAULTS));
    add(Object.keys(liveOptions));
    return Array.from(keys);
  }

  /**
   * Resolve every visible key.
   */
  values(): Record<string, string> {
    const values: Record<string, string> = {};
    for (const key of this.keys()) {
      values[key] = this.resolve(key);
    }
    return values;
  }

  /**
   * Value source for template placeholders. Unknown keys yield undefined
   * so the expander reports them.
   */
  templateValue(key: string): string | number | undefined {
    const special = this.specials.get(key);
    if (special) {
      return special();
    }
    return this.option(key);
  }

  private postProcess(key: string, raw: string): string {
    let value = raw.replace(/\r\n|\r|\n/g, ' ');

    if (this.expanding.has(key)) {
      throw new TemplateError(
        `Circular reference while expanding '${key}'`,
        'TEMPLATE_INVALID',
        key
      );
    }
    this.expanding.add(key);
    try {
      value = expandTemplate(value, (name) => this.templateValue(name));
    } finally {
      this.expanding.delete(key);
    }

    if (PATH_KEYS.has(key)) {
      value = expandHome(value);
    }
    return value;
  }
}

/**
 * Interpret a boolean word (yes/no, true/false, on/off, 1/0).
 */
export function parseBoolean(value: string): boolean {
  return ['yes', 'true', 'on', '1'].includes(value.trim().toLowerCase());
}

/**
 * Interpret an integer option, falling back when it is empty.
 */
export function parseInteger(value: string, fallback: number): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return fallback;
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Build the typed settings view from an option source.
 *
 * @param option - Chain lookup (special keys excluded)
 */
export function readSettings(option: (key: string) => string | undefined): LabSettings {
  const text = (key: string): string => option(key) ?? '';
  const integer = (key: string): number =>
    parseInteger(text(key), parseInteger(DEFAULTS[key] ?? '', 0));

  return {
    autostart: parseBoolean(text('autostart')),
    bridge: text('bridge'),
    cpus: integer('cpus'),
    disksize: integer('disksize'),
    distro: text('distro'),
    domain: text('domain'),
    feature: text('feature'),
    gateway: text('gateway'),
    graphics: text('graphics'),
    guests: integer('guests'),
    image: text('image'),
    imagedir: text('imagedir'),
    key: text('key'),
    mac: text('mac'),
    memory: integer('memory'),
    namefmt: text(NAMEFMT_KEY),
    port: text('port'),
    scriptname: text('scriptname'),
    timezone: text('timezone'),
    user: text('user'),
    vardir: text('vardir'),
    vmdir: text('vmdir'),
    scriptdir: text('scriptdir'),
    playbookdir: text('playbookdir'),
  };
}

/**
 * Resolve the data directory, which is shared by every lab and so comes
 * from the global section or the defaults only.
 */
export function resolveDataDir(config: ConfigStore): string {
  const resolver = new Resolver({ config, liveOptions: {} }, { lab: GLOBAL_SECTION });
  return resolver.resolve('vardir');
}
