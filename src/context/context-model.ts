/**
 * ContextModel — turns raw telemetry into a bounded, frozen UserContext.
 *
 * `normalize()` is pure and total: absent or malformed fields fall back to
 * documented defaults and are reported in `defaulted`, which also drives the
 * confidence sub-score.
 */

import { average, clamp01, hourOfDay } from '../utils/math.js';
import type { InterventionRecord } from '../history/types.js';
import {
  FOCUS_STATES,
  type ContextField,
  type FocusState,
  type NormalizeOptions,
  type NormalizedContext,
  type RawSignals,
  type UserContext,
} from './types.js';

export const CONTEXT_DEFAULTS = {
  cognitiveLoad: 0.5,
  energyLevel: 0.5,
  stressLevel: 0.3,
  focusState: 'shallow',
  personalityType: 'unknown',
} as const satisfies Partial<Record<ContextField, number | string>>;

export const DEFAULT_MAX_RECENT_INTERACTIONS = 50;

const CORE_FIELDS = 6;

/** Relative alertness by UTC hour, 0-23. */
const CIRCADIAN_CURVE = [
  0.3, 0.25, 0.2, 0.2, 0.25, 0.35, 0.5, 0.6, 0.75, 0.9, 0.95, 0.9,
  0.75, 0.65, 0.6, 0.65, 0.75, 0.75, 0.7, 0.6, 0.55, 0.45, 0.4, 0.35,
];

export function circadianFactor(hour: number): number {
  return CIRCADIAN_CURVE[((Math.floor(hour) % 24) + 24) % 24];
}

export function normalize(raw: RawSignals, options: NormalizeOptions = {}): NormalizedContext {
  const defaulted: ContextField[] = [];
  const maxRecent = options.maxRecentInteractions ?? DEFAULT_MAX_RECENT_INTERACTIONS;

  let timeOfDay = parseTimestamp(raw.timestamp);
  if (timeOfDay === undefined) {
    timeOfDay = options.now ?? Date.now();
    defaulted.push('timeOfDay');
  }

  let cognitiveLoad = unitOrUndefined(raw.cognitiveLoad) ?? deriveCognitiveLoad(raw);
  if (cognitiveLoad === undefined) {
    cognitiveLoad = CONTEXT_DEFAULTS.cognitiveLoad;
    defaulted.push('cognitiveLoad');
  }

  let energyLevel = unitOrUndefined(raw.energyLevel) ?? deriveEnergy(raw, timeOfDay);
  if (energyLevel === undefined) {
    energyLevel = CONTEXT_DEFAULTS.energyLevel;
    defaulted.push('energyLevel');
  }

  let stressLevel = unitOrUndefined(raw.stressLevel) ?? deriveStress(raw);
  if (stressLevel === undefined) {
    stressLevel = CONTEXT_DEFAULTS.stressLevel;
    defaulted.push('stressLevel');
  }

  let focusState = parseFocusState(raw.focusState) ?? deriveFocusState(raw);
  if (focusState === undefined) {
    focusState = CONTEXT_DEFAULTS.focusState;
    defaulted.push('focusState');
  }

  let personalityType = typeof raw.personalityType === 'string' ? raw.personalityType.trim() : '';
  if (!personalityType) {
    personalityType = CONTEXT_DEFAULTS.personalityType;
    defaulted.push('personalityType');
  }

  const context: UserContext = Object.freeze({
    userId: raw.userId,
    cognitiveLoad,
    energyLevel,
    stressLevel,
    focusState,
    personalityType,
    timeOfDay,
    recentInteractions: Object.freeze(boundInteractions(raw.recentInteractions ?? [], maxRecent)),
    goals: collectGoals(raw.goals),
  });

  return {
    context,
    confidence: (CORE_FIELDS - defaulted.length) / CORE_FIELDS,
    defaulted,
  };
}

/**
 * Build a context directly from known values, defaulting the rest. Mostly
 * useful for callers and tests that already hold normalized numbers.
 */
export function createContext(fields: Partial<Omit<UserContext, 'goals'>> & { userId: string; goals?: Iterable<string> }): UserContext {
  return normalize({
    userId: fields.userId,
    cognitiveLoad: fields.cognitiveLoad,
    energyLevel: fields.energyLevel,
    stressLevel: fields.stressLevel,
    focusState: fields.focusState,
    personalityType: fields.personalityType,
    timestamp: fields.timeOfDay,
    goals: fields.goals,
    recentInteractions: fields.recentInteractions ? [...fields.recentInteractions] : undefined,
  }).context;
}

// ─── Derivations ────────────────────────────────────────────

function deriveCognitiveLoad(raw: RawSignals): number | undefined {
  const parts: number[] = [];
  const complexity = unitOrUndefined(raw.taskComplexity);
  if (complexity !== undefined) parts.push(complexity);
  const interruptions = nonNegative(raw.interruptionsPerHour);
  if (interruptions !== undefined) parts.push(clamp01(interruptions / 12));
  const switches = nonNegative(raw.taskSwitchesPerHour);
  if (switches !== undefined) parts.push(clamp01(switches / 20));
  return parts.length > 0 ? average(parts) : undefined;
}

function deriveEnergy(raw: RawSignals, timeOfDay: number): number | undefined {
  const sinceBreak = nonNegative(raw.minutesSinceBreak);
  if (sinceBreak === undefined) return undefined;
  return clamp01(average([circadianFactor(hourOfDay(timeOfDay)), 1 - sinceBreak / 240]));
}

function deriveStress(raw: RawSignals): number | undefined {
  const parts: number[] = [];
  const meetings = nonNegative(raw.meetingsToday);
  if (meetings !== undefined) parts.push(clamp01(meetings / 8));
  const deadline = unitOrUndefined(raw.deadlinePressure);
  if (deadline !== undefined) parts.push(deadline);
  return parts.length > 0 ? average(parts) : undefined;
}

function deriveFocusState(raw: RawSignals): FocusState | undefined {
  const minutes = nonNegative(raw.focusMinutes);
  const switches = nonNegative(raw.taskSwitchesPerHour);
  if (minutes === undefined && switches === undefined) return undefined;

  const focused = minutes ?? 0;
  const switching = switches ?? 0;
  if (focused >= 45 && switching <= 2) return 'flow';
  if (switching >= 10) return 'scattered';
  if (focused >= 20) return 'deep';
  return 'shallow';
}

// ─── Field parsing ──────────────────────────────────────────

function unitOrUndefined(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? clamp01(value) : undefined;
}

function nonNegative(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : undefined;
}

function parseFocusState(value: unknown): FocusState | undefined {
  if (typeof value !== 'string') return undefined;
  const lowered = value.trim().toLowerCase();
  return FOCUS_STATES.find((state) => state === lowered);
}

function parseTimestamp(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
}

function collectGoals(goals: Iterable<string> | undefined): ReadonlySet<string> {
  const result = new Set<string>();
  for (const goal of goals ?? []) {
    if (typeof goal !== 'string') continue;
    const trimmed = goal.trim();
    if (trimmed) result.add(trimmed);
  }
  return result;
}

function boundInteractions(records: InterventionRecord[], max: number): InterventionRecord[] {
  return records.slice(Math.max(0, records.length - max));
}
