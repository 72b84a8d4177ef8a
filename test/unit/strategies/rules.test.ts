import { describe, it, expect } from 'vitest';
import { RuleEvaluationError } from '../../../src/core/errors.js';
import { describeRule, evaluateRule } from '../../../src/strategies/rules.js';
import type { ApplicabilityRule } from '../../../src/strategies/types.js';
import { makeContext, T0 } from '../../helpers/fixtures.js';
import { HOUR_MS } from '../../../src/utils/math.js';

describe('evaluateRule', () => {
  const calm = makeContext({ cognitiveLoad: 0.2, energyLevel: 0.7, stressLevel: 0.1, focusState: 'deep' });

  it('compares metrics inclusively', () => {
    const atLeast: ApplicabilityRule = { kind: 'metric', field: 'energyLevel', op: 'gte', value: 0.7 };
    const atMost: ApplicabilityRule = { kind: 'metric', field: 'stressLevel', op: 'lte', value: 0.1 };
    expect(evaluateRule(atLeast, calm)).toBe(true);
    expect(evaluateRule(atMost, calm)).toBe(true);
    expect(evaluateRule({ kind: 'metric', field: 'cognitiveLoad', op: 'gte', value: 0.5 }, calm)).toBe(false);
  });

  it('matches focus states', () => {
    expect(evaluateRule({ kind: 'focus', states: ['deep', 'flow'] }, calm)).toBe(true);
    expect(evaluateRule({ kind: 'focus', states: ['scattered'] }, calm)).toBe(false);
  });

  it('matches goal keywords case-insensitively as substrings', () => {
    const ctx = makeContext({ goals: ['Ship the Launch page'] });
    expect(evaluateRule({ kind: 'goal', anyOf: ['launch'] }, ctx)).toBe(true);
    expect(evaluateRule({ kind: 'goal', anyOf: ['team'] }, ctx)).toBe(false);
    expect(evaluateRule({ kind: 'goal', anyOf: ['launch'] }, makeContext())).toBe(false);
  });

  it('evaluates UTC hour windows, wrapping past midnight', () => {
    // T0 is 10:00 UTC
    expect(evaluateRule({ kind: 'hours', from: 9, to: 12 }, calm)).toBe(true);
    expect(evaluateRule({ kind: 'hours', from: 10, to: 11 }, calm)).toBe(true);
    expect(evaluateRule({ kind: 'hours', from: 8, to: 10 }, calm)).toBe(false);

    const lateNight = makeContext({ timeOfDay: T0 + 13 * HOUR_MS });
    expect(evaluateRule({ kind: 'hours', from: 22, to: 6 }, lateNight)).toBe(true);
    expect(evaluateRule({ kind: 'hours', from: 22, to: 6 }, calm)).toBe(false);
  });

  it('combines rules', () => {
    const rule: ApplicabilityRule = {
      kind: 'all',
      rules: [
        { kind: 'metric', field: 'energyLevel', op: 'gte', value: 0.5 },
        { kind: 'not', rule: { kind: 'focus', states: ['flow'] } },
        {
          kind: 'any',
          rules: [
            { kind: 'metric', field: 'stressLevel', op: 'gte', value: 0.9 },
            { kind: 'always' },
          ],
        },
      ],
    };
    expect(evaluateRule(rule, calm)).toBe(true);
    expect(evaluateRule({ kind: 'any', rules: [] }, calm)).toBe(false);
    expect(evaluateRule({ kind: 'all', rules: [] }, calm)).toBe(true);
  });

  it('runs custom predicates', () => {
    const rule: ApplicabilityRule = {
      kind: 'custom',
      description: 'INTJ only',
      test: (ctx) => ctx.personalityType === 'INTJ',
    };
    expect(evaluateRule(rule, makeContext({ personalityType: 'INTJ' }))).toBe(true);
    expect(evaluateRule(rule, calm)).toBe(false);
  });

  it('throws on malformed rules', () => {
    expect(() => evaluateRule({ kind: 'metric', field: 'energyLevel', op: 'gte', value: Number.NaN }, calm)).toThrow(
      RuleEvaluationError,
    );
    expect(() => evaluateRule({ kind: 'hours', from: 25, to: 3 }, calm)).toThrow(/integer hours in 0-23/);
  });
});

describe('describeRule', () => {
  it('renders nested rules on one line', () => {
    const rule: ApplicabilityRule = {
      kind: 'all',
      rules: [
        { kind: 'metric', field: 'energyLevel', op: 'gte', value: 0.5 },
        {
          kind: 'any',
          rules: [
            { kind: 'focus', states: ['shallow', 'scattered'] },
            { kind: 'not', rule: { kind: 'goal', anyOf: ['team', 'launch'] } },
          ],
        },
      ],
    };
    expect(describeRule(rule)).toBe(
      'energyLevel >= 0.5 and (focus in [shallow, scattered] or not goal mentions team|launch)',
    );
  });
});
