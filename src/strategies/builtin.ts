import { MINUTE_MS } from '../utils/math.js';
import { StrategyCatalog } from './catalog.js';
import type { StrategyDefinition } from './types.js';

export const BUILTIN_STRATEGIES: StrategyDefinition[] = [
  {
    name: 'micro-break',
    kind: 'break',
    applicability: {
      kind: 'any',
      rules: [
        { kind: 'metric', field: 'energyLevel', op: 'lte', value: 0.4 },
        { kind: 'metric', field: 'stressLevel', op: 'gte', value: 0.5 },
        { kind: 'focus', states: ['scattered'] },
      ],
    },
    baseEffectiveness: 0.7,
    cognitiveCost: 0.1,
    cooldownMs: 60 * MINUTE_MS,
  },
  {
    name: 'box-breathing',
    kind: 'breathing',
    applicability: { kind: 'metric', field: 'stressLevel', op: 'gte', value: 0.6 },
    baseEffectiveness: 0.65,
    cognitiveCost: 0.15,
    cooldownMs: 90 * MINUTE_MS,
  },
  {
    name: 'pomodoro-sprint',
    kind: 'focus-block',
    applicability: {
      kind: 'all',
      rules: [
        { kind: 'metric', field: 'energyLevel', op: 'gte', value: 0.5 },
        { kind: 'metric', field: 'stressLevel', op: 'lte', value: 0.6 },
        { kind: 'focus', states: ['shallow', 'scattered'] },
      ],
    },
    baseEffectiveness: 0.6,
    cognitiveCost: 0.5,
    cooldownMs: 120 * MINUTE_MS,
  },
  {
    name: 'deep-work-block',
    kind: 'focus-block',
    applicability: {
      kind: 'all',
      rules: [
        { kind: 'metric', field: 'energyLevel', op: 'gte', value: 0.6 },
        { kind: 'metric', field: 'stressLevel', op: 'lte', value: 0.4 },
        { kind: 'metric', field: 'cognitiveLoad', op: 'lte', value: 0.5 },
      ],
    },
    baseEffectiveness: 0.7,
    cognitiveCost: 0.8,
    cooldownMs: 180 * MINUTE_MS,
  },
  {
    name: 'task-chunking',
    kind: 'task-chunking',
    applicability: {
      kind: 'any',
      rules: [
        { kind: 'metric', field: 'cognitiveLoad', op: 'gte', value: 0.6 },
        { kind: 'focus', states: ['scattered'] },
      ],
    },
    baseEffectiveness: 0.6,
    cognitiveCost: 0.35,
    cooldownMs: 120 * MINUTE_MS,
  },
  {
    name: 'habit-stacking',
    kind: 'habit-stacking',
    applicability: {
      kind: 'all',
      rules: [
        { kind: 'metric', field: 'stressLevel', op: 'lte', value: 0.5 },
        { kind: 'metric', field: 'energyLevel', op: 'gte', value: 0.4 },
      ],
    },
    baseEffectiveness: 0.55,
    cognitiveCost: 0.3,
    cooldownMs: 240 * MINUTE_MS,
  },
  {
    name: 'cognitive-reframing',
    kind: 'cognitive-reframing',
    applicability: {
      kind: 'all',
      rules: [
        { kind: 'metric', field: 'stressLevel', op: 'gte', value: 0.5 },
        { kind: 'metric', field: 'energyLevel', op: 'gte', value: 0.3 },
      ],
    },
    baseEffectiveness: 0.6,
    cognitiveCost: 0.6,
    cooldownMs: 180 * MINUTE_MS,
  },
  {
    name: 'behavioral-activation',
    kind: 'behavioral-activation',
    applicability: { kind: 'metric', field: 'energyLevel', op: 'lte', value: 0.35 },
    baseEffectiveness: 0.55,
    cognitiveCost: 0.4,
    cooldownMs: 120 * MINUTE_MS,
  },
  {
    name: 'goal-review',
    kind: 'goal-review',
    applicability: {
      kind: 'all',
      rules: [
        { kind: 'metric', field: 'cognitiveLoad', op: 'lte', value: 0.5 },
        { kind: 'not', rule: { kind: 'focus', states: ['deep'] } },
      ],
    },
    baseEffectiveness: 0.5,
    cognitiveCost: 0.45,
    cooldownMs: 240 * MINUTE_MS,
  },
  {
    name: 'accountability-check-in',
    kind: 'social-accountability',
    applicability: { kind: 'goal', anyOf: ['team', 'deadline', 'launch', 'ship'] },
    baseEffectiveness: 0.5,
    cognitiveCost: 0.3,
    cooldownMs: 240 * MINUTE_MS,
  },
];

export function createDefaultCatalog(): StrategyCatalog {
  return new StrategyCatalog(BUILTIN_STRATEGIES);
}
