import { z } from 'zod';
import { FOCUS_STATES } from '../context/types.js';

export const ContextSnapshotSchema = z.object({
  userId: z.string(),
  cognitiveLoad: z.number(),
  energyLevel: z.number(),
  stressLevel: z.number(),
  focusState: z.enum(FOCUS_STATES),
  personalityType: z.string(),
  timeOfDay: z.number(),
  goals: z.array(z.string()),
});

export const OutcomeSchema = z.object({
  effectiveness: z.number().min(0).max(1),
  satisfaction: z.number().min(0).max(1),
  completed: z.boolean(),
});

export const InterventionRecordSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  strategyName: z.string().min(1),
  timestamp: z.number(),
  contextSnapshot: ContextSnapshotSchema,
  outcome: OutcomeSchema.optional(),
  amends: z.string().optional(),
});
