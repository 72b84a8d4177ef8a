/**
 * Strategy Types — closed set of intervention kinds plus serializable
 * applicability rules.
 */

import type { ContextMetric, FocusState, UserContext } from '../context/types.js';

export const STRATEGY_KINDS = [
  'break',
  'breathing',
  'focus-block',
  'task-chunking',
  'habit-stacking',
  'cognitive-reframing',
  'behavioral-activation',
  'goal-review',
  'social-accountability',
] as const;

export type StrategyKind = (typeof STRATEGY_KINDS)[number];

// ═══════════════════════════════════════════════════════════════
// APPLICABILITY RULES
// ═══════════════════════════════════════════════════════════════

export type ApplicabilityRule =
  | { kind: 'always' }
  | { kind: 'metric'; field: ContextMetric; op: 'gte' | 'lte'; value: number }
  | { kind: 'focus'; states: FocusState[] }
  | { kind: 'goal'; anyOf: string[] }
  /** UTC hour window on the context timestamp, `to` exclusive; wraps past midnight when from > to. */
  | { kind: 'hours'; from: number; to: number }
  | { kind: 'all'; rules: ApplicabilityRule[] }
  | { kind: 'any'; rules: ApplicabilityRule[] }
  | { kind: 'not'; rule: ApplicabilityRule }
  /** Programmatic escape hatch; not serializable. */
  | { kind: 'custom'; description: string; test: (context: UserContext) => boolean };

// ═══════════════════════════════════════════════════════════════
// STRATEGIES
// ═══════════════════════════════════════════════════════════════

export interface StrategyDefinition {
  name: string;
  kind: StrategyKind;
  applicability: ApplicabilityRule;
  baseEffectiveness: number;
  cognitiveCost: number;
  cooldownMs: number;
  /** Starting weight; defaults to baseEffectiveness. */
  weight?: number;
  /** EMA learning rate for this strategy; falls back to the configured default. */
  alpha?: number;
}

/**
 * Read-only view handed out by the catalog. `weight` reflects the value at
 * the time of the call.
 */
export interface Strategy {
  readonly name: string;
  readonly kind: StrategyKind;
  readonly applicability: ApplicabilityRule;
  readonly baseEffectiveness: number;
  readonly cognitiveCost: number;
  readonly cooldownMs: number;
  readonly weight: number;
  readonly alpha?: number;
}

/**
 * Durable home for learned weights. Either side may be async.
 */
export interface WeightStore {
  load(): Record<string, number> | Promise<Record<string, number>>;
  save(name: string, weight: number): void | Promise<void>;
}
