/**
 * Aggregate view of observed outcomes: how often interventions are taken up
 * and how well they work, overall, per strategy and per personality type.
 */

import type { InterventionRecord } from '../history/types.js';
import { round } from '../utils/math.js';

export type LearningStatus = 'starting' | 'building' | 'active';

export interface OutcomeStats {
  interventions: number;
  withOutcome: number;
  /** Share of reported outcomes marked completed. */
  acceptanceRate: number;
  averageEffectiveness: number;
}

export interface StrategyStats extends OutcomeStats {
  weight: number;
}

export interface LearningSummary extends OutcomeStats {
  status: LearningStatus;
  byStrategy: Record<string, StrategyStats>;
  byPersonality: Record<string, OutcomeStats>;
}

/** Reported outcomes needed before learning counts as active. */
export const ACTIVE_LEARNING_THRESHOLD = 10;

interface Tally {
  interventions: number;
  withOutcome: number;
  completed: number;
  effectiveness: number;
}

function emptyTally(): Tally {
  return { interventions: 0, withOutcome: 0, completed: 0, effectiveness: 0 };
}

function add(tally: Tally, record: InterventionRecord): void {
  tally.interventions++;
  if (record.outcome) {
    tally.withOutcome++;
    tally.effectiveness += record.outcome.effectiveness;
    if (record.outcome.completed) tally.completed++;
  }
}

function toStats(tally: Tally): OutcomeStats {
  const reported = tally.withOutcome;
  return {
    interventions: tally.interventions,
    withOutcome: reported,
    acceptanceRate: reported === 0 ? 0 : round(tally.completed / reported),
    averageEffectiveness: reported === 0 ? 0 : round(tally.effectiveness / reported),
  };
}

function tallyFor(map: Map<string, Tally>, key: string): Tally {
  let tally = map.get(key);
  if (!tally) {
    tally = emptyTally();
    map.set(key, tally);
  }
  return tally;
}

/**
 * Summarize records (latest view, one per intervention). Every strategy in
 * `weights` is listed, including those never delivered.
 */
export function summarizeLearning(
  records: readonly InterventionRecord[],
  weights: Record<string, number>,
): LearningSummary {
  const total = emptyTally();
  const byStrategy = new Map<string, Tally>();
  const byPersonality = new Map<string, Tally>();

  for (const name of Object.keys(weights)) {
    byStrategy.set(name, emptyTally());
  }

  for (const record of records) {
    add(total, record);
    add(tallyFor(byStrategy, record.strategyName), record);
    add(tallyFor(byPersonality, record.contextSnapshot.personalityType), record);
  }

  const strategies: Record<string, StrategyStats> = {};
  for (const name of [...byStrategy.keys()].sort()) {
    const tally = tallyFor(byStrategy, name);
    // Retired strategies keep their stats but have no weight left
    strategies[name] = { ...toStats(tally), weight: weights[name] ?? 0 };
  }

  const personalities: Record<string, OutcomeStats> = {};
  for (const type of [...byPersonality.keys()].sort()) {
    personalities[type] = toStats(tallyFor(byPersonality, type));
  }

  let status: LearningStatus = 'starting';
  if (total.withOutcome > ACTIVE_LEARNING_THRESHOLD) status = 'active';
  else if (total.withOutcome > 0) status = 'building';

  return { ...toStats(total), status, byStrategy: strategies, byPersonality: personalities };
}
