/**
 * FeedbackAdapter — folds observed outcomes into strategy weights with an
 * exponential moving average:
 *
 *   new_weight = old_weight * (1 - alpha) + effectiveness * alpha
 *
 * Updates to one strategy are serialized (read, compute, persist, write all
 * happen under that strategy's lock); different strategies do not wait on
 * each other.
 */

import { KeyedMutex } from '../core/mutex.js';
import { getLogger } from '../core/logger.js';
import type { InterventionOutcome } from '../history/types.js';
import type { StrategyCatalog } from '../strategies/catalog.js';
import type { WeightStore } from '../strategies/types.js';
import { clamp01, round } from '../utils/math.js';

export const DEFAULT_ALPHA = 0.3;

export interface FeedbackAdapterOptions {
  alpha?: number;
  weightStore?: WeightStore;
}

export function emaUpdate(oldWeight: number, effectiveness: number, alpha: number): number {
  const next = oldWeight * (1 - alpha) + clamp01(effectiveness) * alpha;
  // Rounding keeps results like 0.5 -> 0.65 exact instead of 0.6499999999999999
  return clamp01(round(next, 10));
}

/**
 * Collapse a full outcome report into one effectiveness signal.
 */
export function outcomeEffectiveness(outcome: InterventionOutcome): number {
  return clamp01(
    0.6 * clamp01(outcome.effectiveness) +
      0.25 * clamp01(outcome.satisfaction) +
      0.15 * (outcome.completed ? 1 : 0),
  );
}

export class FeedbackAdapter {
  private locks = new KeyedMutex<string>();
  private alpha: number;
  private weightStore?: WeightStore;

  constructor(
    private readonly catalog: StrategyCatalog,
    options: FeedbackAdapterOptions = {},
  ) {
    this.alpha = options.alpha ?? DEFAULT_ALPHA;
    if (!(this.alpha > 0 && this.alpha <= 1)) {
      throw new RangeError(`alpha must be in (0, 1], got ${this.alpha}`);
    }
    this.weightStore = options.weightStore;
  }

  /**
   * Apply one effectiveness observation and return the updated weight.
   * Throws StrategyNotFoundError for names the catalog does not know and
   * RangeError for a non-finite effectiveness.
   */
  async applyFeedback(strategyName: string, effectiveness: number): Promise<number> {
    if (!Number.isFinite(effectiveness)) {
      throw new RangeError(`effectiveness must be a finite number, got ${effectiveness}`);
    }
    // Fail fast, before queueing on a lock for a name that cannot exist
    const strategy = this.catalog.get(strategyName);

    return this.locks.withLock(strategy.name, async () => {
      const current = this.catalog.getWeight(strategy.name);
      const alpha = strategy.alpha ?? this.alpha;
      const updated = emaUpdate(current, effectiveness, alpha);

      if (this.weightStore) {
        await this.weightStore.save(strategy.name, updated);
      }
      this.catalog.setWeight(strategy.name, updated);

      getLogger().debug(
        { strategy: strategy.name, from: current, to: updated, effectiveness, alpha },
        'Strategy weight updated',
      );
      return updated;
    });
  }

  getAlpha(): number {
    return this.alpha;
  }
}
