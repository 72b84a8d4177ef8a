import type { CommunicationStyle } from '../selection/personality.js';
import type { StrategyKind } from '../strategies/types.js';

export type Difficulty = 'easy' | 'moderate' | 'hard';

export interface ActionStep {
  description: string;
  /** Human-readable estimate, e.g. "5 min". */
  timeframe: string;
  durationMinutes: number;
  difficulty: Difficulty;
  /** Observable condition that tells whether the step was done. */
  successCriterion: string;
}

export type DetailLevel = 'brief' | 'standard' | 'detailed';

export interface DeliveryStyle {
  tone: CommunicationStyle;
  detailLevel: DetailLevel;
}

export interface Intervention {
  type: StrategyKind;
  strategyName: string;
  message: string;
  actionSteps: ActionStep[];
  /** Unique success criteria across the steps, in step order. */
  successMetrics: string[];
  /** Epoch ms at which to check back with the user. */
  followUpAt: number;
  delivery: DeliveryStyle;
  /** True when the generic fallback replaced the strategy's own templates. */
  fallback: boolean;
}

export interface TemplateStep {
  description: string;
  minutes?: number;
  difficulty?: Difficulty;
  successCriterion?: string;
}

export interface InterventionTemplate {
  message: string;
  steps: TemplateStep[];
}

export interface TemplateProvider {
  templatesFor(kind: StrategyKind): InterventionTemplate[];
}
