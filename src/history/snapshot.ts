import type { UserContext } from '../context/types.js';
import type { ContextSnapshot, InterventionOutcome, InterventionRecord } from './types.js';

export function snapshotContext(context: UserContext): ContextSnapshot {
  return {
    userId: context.userId,
    cognitiveLoad: context.cognitiveLoad,
    energyLevel: context.energyLevel,
    stressLevel: context.stressLevel,
    focusState: context.focusState,
    personalityType: context.personalityType,
    timeOfDay: context.timeOfDay,
    goals: [...context.goals].sort(),
  };
}

export function cloneRecord(rec: InterventionRecord): InterventionRecord {
  return {
    ...rec,
    contextSnapshot: { ...rec.contextSnapshot, goals: [...rec.contextSnapshot.goals] },
    outcome: rec.outcome ? cloneOutcome(rec.outcome) : undefined,
  };
}

function cloneOutcome(outcome: InterventionOutcome): InterventionOutcome {
  return { ...outcome };
}
