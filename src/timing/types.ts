export type DeferralReason =
  | 'suboptimal_timing'
  | 'no_eligible_strategy'
  | 'cooldown_active'
  | 'daily_cap_reached';

export type GateRule =
  | 'flow_protection'
  | 'cognitive_overload'
  | 'quiet_hours'
  | 'recent_dismissals'
  | 'min_spacing'
  | 'daily_cap';

export type GateDecision =
  | { allowed: true }
  | { allowed: false; reason: DeferralReason; rule: GateRule; detail: string };

export interface TimingGateOptions {
  highLoadThreshold: number;
  minSpacingMs: number;
  dailyCap: number;
  quietHours?: { from: number; to: number };
  /** Back off after repeated dismissals; omit to disable. */
  dismissalBackoff?: DismissalBackoff;
}

export interface DismissalBackoff {
  /** How many of the user's latest interventions to inspect. */
  window: number;
  /** Dismissals within the window that trigger the back-off. */
  threshold: number;
  /** Outcomes below this effectiveness count as dismissed, as do uncompleted ones. */
  minEffectiveness: number;
  /** Only interventions this recent count. */
  lookbackMs: number;
}
