import type { Strategy } from '../strategies/types.js';

export interface ScoreBreakdown {
  personalityFit: number;
  costTerm: number;
  learnedWeight: number;
  recencyBonus: number;
}

export interface ScoredStrategy {
  strategy: Strategy;
  score: number;
  breakdown: ScoreBreakdown;
}

export type ExclusionReason = 'not_applicable' | 'cooldown' | 'predicate_error';

export interface Exclusion {
  strategyName: string;
  reason: ExclusionReason;
  detail?: string;
}

export type SelectionResult =
  | {
      kind: 'selected';
      strategy: Strategy;
      score: number;
      breakdown: ScoreBreakdown;
      /** Every eligible strategy, best first. */
      ranked: ScoredStrategy[];
      excluded: Exclusion[];
    }
  | {
      kind: 'noop';
      reason: 'no_eligible_strategy' | 'cooldown_active';
      excluded: Exclusion[];
    };

export interface SelectorWeights {
  personalityFit: number;
  cognitiveCost: number;
  learnedWeight: number;
  recency: number;
}
