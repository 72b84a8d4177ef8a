export { TimingGate, DEFAULT_TIMING_OPTIONS, isDismissal } from './timing-gate.js';
export type { DeferralReason, DismissalBackoff, GateDecision, GateRule, TimingGateOptions } from './types.js';
