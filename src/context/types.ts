/**
 * Context Types — normalized user state consumed by every decision stage.
 */

import type { InterventionRecord } from '../history/types.js';

export const FOCUS_STATES = ['deep', 'shallow', 'scattered', 'flow'] as const;

export type FocusState = (typeof FOCUS_STATES)[number];

/** The three bounded metrics rules and scoring read from a context. */
export type ContextMetric = 'cognitiveLoad' | 'energyLevel' | 'stressLevel';

/**
 * Immutable snapshot of one user's state for a single decision call.
 */
export interface UserContext {
  readonly userId: string;
  readonly cognitiveLoad: number;
  readonly energyLevel: number;
  readonly stressLevel: number;
  readonly focusState: FocusState;
  readonly personalityType: string;
  /** Epoch milliseconds at which the state was observed. */
  readonly timeOfDay: number;
  /** Most recent last; bounded by `context.maxRecentInteractions`. */
  readonly recentInteractions: readonly InterventionRecord[];
  readonly goals: ReadonlySet<string>;
}

/**
 * Raw telemetry as a signal provider or API caller hands it over. Every field
 * except `userId` may be absent.
 */
export interface RawSignals {
  userId: string;
  cognitiveLoad?: number;
  energyLevel?: number;
  stressLevel?: number;
  focusState?: string;
  personalityType?: string;
  /** Epoch ms or ISO-8601 string. */
  timestamp?: number | string;
  goals?: Iterable<string>;
  recentInteractions?: InterventionRecord[];

  taskSwitchesPerHour?: number;
  interruptionsPerHour?: number;
  taskComplexity?: number;
  meetingsToday?: number;
  minutesSinceBreak?: number;
  focusMinutes?: number;
  deadlinePressure?: number;
}

export type ContextField =
  | 'cognitiveLoad'
  | 'energyLevel'
  | 'stressLevel'
  | 'focusState'
  | 'personalityType'
  | 'timeOfDay';

export interface NormalizedContext {
  context: UserContext;
  /** Share of core fields that were observed or derived rather than defaulted. */
  confidence: number;
  defaulted: ContextField[];
}

export interface NormalizeOptions {
  now?: number;
  maxRecentInteractions?: number;
}
