/**
 * Runtime configuration holder
 *
 * Readers take an immutable snapshot with current(); a replacement
 * never mutates a snapshot someone already holds, so a dispatch cycle
 * that read the config at its start keeps seeing the same rules and
 * policy until it finishes.
 */

import { parseConfig, saveConfig, type MirrorwatchConfig } from "./config.js";
import { sortRules } from "./sync/mapper.js";
import type { AutomationPolicy, MappingRule } from "./sync/types.js";

export type ConfigSnapshot = Readonly<{
  config: MirrorwatchConfig;
  /** Mapping rules ordered for resolution */
  rules: readonly MappingRule[];
  /** Increments on every replacement */
  revision: number;
}>;

/**
 * Partial update accepted at runtime (POST /config)
 */
export type ConfigPatch = {
  policy?: Partial<AutomationPolicy>;
  mappings?: MappingRule[];
  layout?: MirrorwatchConfig["layout"];
  exclude?: string[];
};

export interface ConfigStore {
  current(): ConfigSnapshot;
  /** Validate and swap in a whole new config */
  replace(next: unknown): Promise<ConfigSnapshot>;
  /** Merge a patch into the current config, validate and swap it in */
  update(patch: ConfigPatch): Promise<ConfigSnapshot>;
  /** Called after every successful replacement */
  subscribe(listener: (snapshot: ConfigSnapshot) => void): () => void;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function buildSnapshot(config: MirrorwatchConfig, revision: number): ConfigSnapshot {
  return deepFreeze({ config, rules: sortRules(config.mappings), revision });
}

/**
 * Config held only in memory
 */
export class MemoryConfigStore implements ConfigStore {
  private snapshot: ConfigSnapshot;
  private listeners = new Set<(snapshot: ConfigSnapshot) => void>();

  constructor(initial: MirrorwatchConfig) {
    this.snapshot = buildSnapshot(structuredClone(initial), 1);
  }

  current(): ConfigSnapshot {
    return this.snapshot;
  }

  async replace(next: unknown): Promise<ConfigSnapshot> {
    const config = parseConfig(next);
    await this.persist(config);

    this.snapshot = buildSnapshot(config, this.snapshot.revision + 1);
    for (const listener of this.listeners) {
      listener(this.snapshot);
    }
    return this.snapshot;
  }

  update(patch: ConfigPatch): Promise<ConfigSnapshot> {
    const { config } = this.snapshot;
    return this.replace({
      ...config,
      ...(patch.layout !== undefined ? { layout: patch.layout } : {}),
      ...(patch.mappings !== undefined ? { mappings: patch.mappings } : {}),
      ...(patch.exclude !== undefined ? { exclude: patch.exclude } : {}),
      policy: { ...config.policy, ...patch.policy },
    });
  }

  subscribe(listener: (snapshot: ConfigSnapshot) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  protected async persist(_config: MirrorwatchConfig): Promise<void> {}
}

/**
 * Config written back to its file on every replacement
 */
export class FileConfigStore extends MemoryConfigStore {
  readonly configPath: string;

  constructor(configPath: string, initial: MirrorwatchConfig) {
    super(initial);
    this.configPath = configPath;
  }

  protected override async persist(config: MirrorwatchConfig): Promise<void> {
    await saveConfig(this.configPath, config);
  }
}
