import type { NormalizedContext } from '../context/types.js';
import type { InterventionRecord } from '../history/types.js';
import type { Intervention } from '../recommendation/types.js';
import type { ScoreBreakdown } from '../selection/types.js';
import type { DeferralReason } from '../timing/types.js';

export interface DeferredDecision {
  deferred: true;
  reason: DeferralReason;
  detail: string;
}

export interface DeliveredDecision {
  deferred: false;
  recordId: string;
  selectedStrategy: string;
  score: number;
  breakdown: ScoreBreakdown;
  intervention: Intervention;
  timing: { followUpAt: number };
}

export type EngineDecision = DeferredDecision | DeliveredDecision;

export interface DecisionWithContext {
  decision: EngineDecision;
  normalized: NormalizedContext;
}

export interface OutcomeResult {
  record: InterventionRecord;
  weight: number;
}
