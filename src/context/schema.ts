/**
 * Input-boundary validation for context payloads (API bodies, CLI files).
 *
 * Only `userId` is required. Every other field is optional and tolerant:
 * a malformed value is dropped so that `normalize()` substitutes its default.
 * Keys may be given in camelCase or snake_case.
 */

import { z } from 'zod';
import { ContextValidationError } from '../core/errors.js';
import { InterventionRecordSchema } from '../history/schema.js';
import type { InterventionRecord } from '../history/types.js';
import { normalize } from './context-model.js';
import type { NormalizeOptions, NormalizedContext, RawSignals } from './types.js';

const optionalNumber = z.number().finite().optional().catch(undefined);
const optionalString = z.string().optional().catch(undefined);

const RawSignalsSchema = z.object({
  userId: z.string({ required_error: 'userId is required' }).trim().min(1, 'userId must not be empty'),
  cognitiveLoad: optionalNumber,
  energyLevel: optionalNumber,
  stressLevel: optionalNumber,
  focusState: optionalString,
  personalityType: optionalString,
  timestamp: z.union([z.number().finite(), z.string()]).optional().catch(undefined),
  timeOfDay: z.union([z.number().finite(), z.string()]).optional().catch(undefined),
  goals: z.array(z.string()).optional().catch(undefined),
  recentInteractions: z.array(z.unknown()).optional().catch(undefined),
  taskSwitchesPerHour: optionalNumber,
  interruptionsPerHour: optionalNumber,
  taskComplexity: optionalNumber,
  meetingsToday: optionalNumber,
  minutesSinceBreak: optionalNumber,
  focusMinutes: optionalNumber,
  deadlinePressure: optionalNumber,
});

function camelize(key: string): string {
  return key.replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

/** Shallow snake_case to camelCase key conversion for request bodies. */
export function camelizeKeys(payload: unknown): unknown {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return payload;
  }
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    result[camelize(key)] = value;
  }
  return result;
}

function parseInteractions(entries: unknown[] | undefined): InterventionRecord[] | undefined {
  if (!entries) return undefined;
  const records: InterventionRecord[] = [];
  for (const entry of entries) {
    const parsed = InterventionRecordSchema.safeParse(camelizeKeys(entry));
    if (parsed.success) records.push(parsed.data);
  }
  return records;
}

/**
 * Validate an untrusted payload into RawSignals.
 * Throws ContextValidationError when `userId` is missing or empty.
 */
export function parseRawSignals(payload: unknown): RawSignals {
  const parsed = RawSignalsSchema.safeParse(camelizeKeys(payload));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ContextValidationError(`Invalid context payload: ${issues.join('; ')}`, issues);
  }

  const { timeOfDay, recentInteractions, ...rest } = parsed.data;
  return {
    ...rest,
    timestamp: rest.timestamp ?? timeOfDay,
    recentInteractions: parseInteractions(recentInteractions),
  };
}

export function parseContextPayload(payload: unknown, options: NormalizeOptions = {}): NormalizedContext {
  return normalize(parseRawSignals(payload), options);
}
