/**
 * Shared test fixtures: a fixed clock and record builders.
 */

import { createContext } from '../../src/context/context-model.js';
import type { UserContext } from '../../src/context/types.js';
import type { InterventionRecord } from '../../src/history/types.js';
import { MINUTE_MS } from '../../src/utils/math.js';

/** Monday 2026-03-02 10:00 UTC. */
export const T0 = Date.UTC(2026, 2, 2, 10, 0, 0);

export function minutes(n: number): number {
  return n * MINUTE_MS;
}

export function makeContext(fields: Partial<Omit<UserContext, 'goals'>> & { goals?: string[] } = {}): UserContext {
  return createContext({
    userId: 'user-1',
    cognitiveLoad: 0.3,
    energyLevel: 0.6,
    stressLevel: 0.3,
    focusState: 'shallow',
    personalityType: 'unknown',
    timeOfDay: T0,
    ...fields,
  });
}

let seq = 0;

export function makeRecord(overrides: Partial<InterventionRecord> = {}): InterventionRecord {
  seq++;
  const userId = overrides.userId ?? 'user-1';
  const timestamp = overrides.timestamp ?? T0;
  return {
    id: `fixture-${seq}`,
    userId,
    strategyName: 'micro-break',
    timestamp,
    contextSnapshot: {
      userId,
      cognitiveLoad: 0.3,
      energyLevel: 0.6,
      stressLevel: 0.3,
      focusState: 'shallow',
      personalityType: 'unknown',
      timeOfDay: timestamp,
      goals: [],
    },
    ...overrides,
  };
}
