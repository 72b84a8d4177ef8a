/**
 * History Types — append-only intervention log.
 */

import type { UserContext } from '../context/types.js';

export interface InterventionOutcome {
  effectiveness: number;
  satisfaction: number;
  completed: boolean;
}

/**
 * JSON-safe copy of the context a record was created from. Goals become a
 * sorted array and nested interactions are dropped so snapshots never chain.
 */
export interface ContextSnapshot {
  userId: string;
  cognitiveLoad: number;
  energyLevel: number;
  stressLevel: number;
  focusState: UserContext['focusState'];
  personalityType: string;
  timeOfDay: number;
  goals: string[];
}

export interface InterventionRecord {
  id: string;
  userId: string;
  strategyName: string;
  timestamp: number;
  contextSnapshot: ContextSnapshot;
  outcome?: InterventionOutcome;
  /** Set on amended copies: the id of the original record. */
  amends?: string;
}

/**
 * Read side used by the timing gate and the selector. Every query sees
 * original records only; amendments never count toward cooldowns or caps.
 */
export interface HistoryReader {
  lastFor(userId: string, strategyName: string): InterventionRecord | undefined;
  lastForUser(userId: string): InterventionRecord | undefined;
  countSince(userId: string, since: number): number;
  /** The user's latest `limit` records, oldest first. */
  recentForUser(userId: string, limit: number): InterventionRecord[];
  /** Outcome attached to a record, if any. */
  outcomeFor(id: string): InterventionOutcome | undefined;
}

export interface InterventionHistoryStore extends HistoryReader {
  /**
   * Append a record. When `cooldownMs` is given, a record for the same user
   * and strategy closer than that raises CooldownViolationError.
   */
  record(rec: InterventionRecord, cooldownMs?: number): InterventionRecord;
  /** Latest view of a record: its amended copy when an outcome was attached. */
  get(id: string): InterventionRecord | undefined;
  /** Append an amended copy carrying the outcome and return it. */
  attachOutcome(id: string, outcome: InterventionOutcome): InterventionRecord;
  /** Latest view of every original record, oldest first. */
  list(): InterventionRecord[];
  /** Total number of appended entries, amendments included. */
  size(): number;
  close?(): void;
}
