/**
 * StrategySelector — scores every eligible strategy against the context and
 * picks one.
 *
 * score = w1 * personalityFit
 *       + w2 * (1 - cost adjusted by cognitive load)
 *       + w3 * learned weight
 *       + w4 * recency bonus
 *
 * Ties go to the lower cognitive cost, then to the alphabetically first name.
 * A predicate that throws only removes its own strategy from the round.
 */

import { getLogger } from '../core/logger.js';
import type { UserContext } from '../context/types.js';
import { withRecentInteractions } from '../history/merged-history.js';
import type { HistoryReader, InterventionRecord } from '../history/types.js';
import type { StrategyCatalog } from '../strategies/catalog.js';
import { evaluateRule } from '../strategies/rules.js';
import type { Strategy } from '../strategies/types.js';
import { clamp01, round } from '../utils/math.js';
import { getDefaultProfiles, personalityFit, type PersonalityProfileProvider } from './personality.js';
import type { Exclusion, ScoredStrategy, SelectionResult, SelectorWeights } from './types.js';

export const DEFAULT_SELECTOR_WEIGHTS: SelectorWeights = {
  personalityFit: 0.3,
  cognitiveCost: 0.3,
  learnedWeight: 0.3,
  recency: 0.1,
};

const SCORE_EPSILON = 1e-9;

export interface StrategySelectorOptions {
  weights?: SelectorWeights;
  /** How many of the user's latest records the recency bonus looks at. */
  recencyWindow?: number;
  profiles?: PersonalityProfileProvider;
  onExcluded?: (exclusion: Exclusion, context: UserContext) => void;
}

export class StrategySelector {
  private weights: SelectorWeights;
  private recencyWindow: number;
  private profiles: PersonalityProfileProvider;
  private onExcluded?: StrategySelectorOptions['onExcluded'];

  constructor(
    private readonly catalog: StrategyCatalog,
    options: StrategySelectorOptions = {},
  ) {
    this.weights = options.weights ?? DEFAULT_SELECTOR_WEIGHTS;
    const sum =
      this.weights.personalityFit + this.weights.cognitiveCost + this.weights.learnedWeight + this.weights.recency;
    if (Math.abs(sum - 1) > 1e-6) {
      throw new RangeError(`Selector weights must sum to 1, got ${sum}`);
    }
    this.recencyWindow = Math.max(1, options.recencyWindow ?? 10);
    this.profiles = options.profiles ?? getDefaultProfiles();
    this.onExcluded = options.onExcluded;
  }

  select(context: UserContext, history: HistoryReader, now: number = Date.now()): SelectionResult {
    const view = withRecentInteractions(history, context);
    const recent = view.recentForUser(context.userId, this.recencyWindow);
    const excluded: Exclusion[] = [];
    const scored: ScoredStrategy[] = [];
    let coolingDown = 0;

    for (const strategy of this.catalog.list()) {
      let applicable: boolean;
      try {
        applicable = evaluateRule(strategy.applicability, context);
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        getLogger().warn(
          { strategy: strategy.name, userId: context.userId, error: detail },
          'Applicability predicate failed; excluding strategy',
        );
        this.exclude(excluded, { strategyName: strategy.name, reason: 'predicate_error', detail }, context);
        continue;
      }

      if (!applicable) {
        this.exclude(excluded, { strategyName: strategy.name, reason: 'not_applicable' }, context);
        continue;
      }

      const last = view.lastFor(context.userId, strategy.name);
      if (last && now - last.timestamp < strategy.cooldownMs) {
        coolingDown++;
        this.exclude(
          excluded,
          {
            strategyName: strategy.name,
            reason: 'cooldown',
            detail: `available again at ${new Date(last.timestamp + strategy.cooldownMs).toISOString()}`,
          },
          context,
        );
        continue;
      }

      scored.push(this.score(strategy, context, recent));
    }

    if (scored.length === 0) {
      return {
        kind: 'noop',
        reason: coolingDown > 0 ? 'cooldown_active' : 'no_eligible_strategy',
        excluded,
      };
    }

    scored.sort(compareScored);
    const best = scored[0];
    return {
      kind: 'selected',
      strategy: best.strategy,
      score: best.score,
      breakdown: best.breakdown,
      ranked: scored,
      excluded,
    };
  }

  /**
   * Score one strategy. `recent` is the user's latest records, oldest first.
   */
  score(strategy: Strategy, context: UserContext, recent: InterventionRecord[]): ScoredStrategy {
    const fit = clamp01(personalityFit(this.profiles, context.personalityType, strategy.kind));
    const adjustedCost = Math.min(1, strategy.cognitiveCost * (1 + context.cognitiveLoad));
    const costTerm = 1 - adjustedCost;
    const learnedWeight = clamp01(strategy.weight);
    const recencyBonus = this.recencyBonus(strategy.name, recent);

    const score =
      this.weights.personalityFit * fit +
      this.weights.cognitiveCost * costTerm +
      this.weights.learnedWeight * learnedWeight +
      this.weights.recency * recencyBonus;

    return {
      strategy,
      score: round(score, 9),
      breakdown: {
        personalityFit: fit,
        costTerm: round(costTerm, 9),
        learnedWeight,
        recencyBonus,
      },
    };
  }

  private recencyBonus(strategyName: string, recent: InterventionRecord[]): number {
    const window = recent.slice(Math.max(0, recent.length - this.recencyWindow));
    const uses = window.filter((r) => r.strategyName === strategyName).length;
    return 1 - uses / this.recencyWindow;
  }

  private exclude(list: Exclusion[], exclusion: Exclusion, context: UserContext): void {
    list.push(exclusion);
    this.onExcluded?.(exclusion, context);
  }
}

function compareScored(a: ScoredStrategy, b: ScoredStrategy): number {
  if (Math.abs(a.score - b.score) > SCORE_EPSILON) {
    return b.score - a.score;
  }
  if (a.strategy.cognitiveCost !== b.strategy.cognitiveCost) {
    return a.strategy.cognitiveCost - b.strategy.cognitiveCost;
  }
  return a.strategy.name < b.strategy.name ? -1 : a.strategy.name > b.strategy.name ? 1 : 0;
}
