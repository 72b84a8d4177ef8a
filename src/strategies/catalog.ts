/**
 * StrategyCatalog — registry of intervention strategies.
 *
 * Static parameters are fixed at registration. The learned weight is the only
 * mutable field and is written through `setWeight()`, which the
 * FeedbackAdapter calls while holding that strategy's lock.
 */

import { ConfigError, StrategyNotFoundError } from '../core/errors.js';
import { clamp01 } from '../utils/math.js';
import type { Strategy, StrategyDefinition, WeightStore } from './types.js';

interface CatalogEntry {
  definition: Readonly<StrategyDefinition>;
  weight: number;
}

export class StrategyCatalog {
  private entries: Map<string, CatalogEntry> = new Map();

  constructor(definitions: StrategyDefinition[] = []) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  register(definition: StrategyDefinition): Strategy {
    const name = definition.name.trim();
    if (!name) {
      throw new ConfigError('Strategy name must not be empty');
    }
    if (this.entries.has(name)) {
      throw new ConfigError(`Strategy "${name}" is already registered`);
    }
    if (!Number.isFinite(definition.cooldownMs) || definition.cooldownMs < 0) {
      throw new ConfigError(`Strategy "${name}" needs a non-negative cooldown`);
    }
    if (definition.alpha !== undefined && !(definition.alpha > 0 && definition.alpha <= 1)) {
      throw new ConfigError(`Strategy "${name}" alpha must be in (0, 1]`);
    }

    const frozen: Readonly<StrategyDefinition> = Object.freeze({
      ...definition,
      name,
      baseEffectiveness: clamp01(definition.baseEffectiveness),
      cognitiveCost: clamp01(definition.cognitiveCost),
    });
    this.entries.set(name, {
      definition: frozen,
      weight: clamp01(definition.weight ?? frozen.baseEffectiveness),
    });
    return this.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * Snapshot of a strategy. Throws StrategyNotFoundError for unknown names.
   */
  get(name: string): Strategy {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new StrategyNotFoundError(name);
    }
    return toStrategy(entry);
  }

  find(name: string): Strategy | undefined {
    const entry = this.entries.get(name);
    return entry ? toStrategy(entry) : undefined;
  }

  /** All strategies sorted by name. */
  list(): Strategy[] {
    return [...this.entries.values()]
      .map(toStrategy)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  getWeight(name: string): number {
    return this.get(name).weight;
  }

  setWeight(name: string, weight: number): number {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new StrategyNotFoundError(name);
    }
    entry.weight = clamp01(weight);
    return entry.weight;
  }

  weights(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.weight;
    }
    return result;
  }

  /**
   * Overlay persisted weights. Names the catalog no longer has are skipped
   * and returned so the caller can report them.
   */
  async loadWeights(store: WeightStore): Promise<string[]> {
    const stored = await store.load();
    const unknown: string[] = [];
    for (const [name, weight] of Object.entries(stored)) {
      const entry = this.entries.get(name);
      if (!entry) {
        unknown.push(name);
        continue;
      }
      entry.weight = clamp01(weight);
    }
    return unknown;
  }

  get size(): number {
    return this.entries.size;
  }
}

function toStrategy(entry: CatalogEntry): Strategy {
  const { definition, weight } = entry;
  return {
    name: definition.name,
    kind: definition.kind,
    applicability: definition.applicability,
    baseEffectiveness: definition.baseEffectiveness,
    cognitiveCost: definition.cognitiveCost,
    cooldownMs: definition.cooldownMs,
    weight,
    alpha: definition.alpha,
  };
}
