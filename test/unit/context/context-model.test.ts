import { describe, it, expect } from 'vitest';
import { circadianFactor, createContext, normalize } from '../../../src/context/context-model.js';
import { makeRecord, T0 } from '../../helpers/fixtures.js';

describe('normalize', () => {
  it('defaults every missing field and reports zero confidence', () => {
    const { context, confidence, defaulted } = normalize({ userId: 'u-1' }, { now: T0 });

    expect(context).toMatchObject({
      userId: 'u-1',
      cognitiveLoad: 0.5,
      energyLevel: 0.5,
      stressLevel: 0.3,
      focusState: 'shallow',
      personalityType: 'unknown',
      timeOfDay: T0,
    });
    expect(defaulted).toEqual([
      'timeOfDay',
      'cognitiveLoad',
      'energyLevel',
      'stressLevel',
      'focusState',
      'personalityType',
    ]);
    expect(confidence).toBe(0);
  });

  it('keeps supplied values and reports full confidence', () => {
    const { context, confidence, defaulted } = normalize({
      userId: 'u-1',
      cognitiveLoad: 0.2,
      energyLevel: 0.7,
      stressLevel: 0.9,
      focusState: 'deep',
      personalityType: 'INTJ',
      timestamp: T0,
    });

    expect(context.cognitiveLoad).toBe(0.2);
    expect(context.energyLevel).toBe(0.7);
    expect(context.stressLevel).toBe(0.9);
    expect(context.focusState).toBe('deep');
    expect(context.personalityType).toBe('INTJ');
    expect(defaulted).toEqual([]);
    expect(confidence).toBe(1);
  });

  it('clamps metrics into [0, 1]', () => {
    const { context } = normalize({ userId: 'u-1', cognitiveLoad: 1.7, energyLevel: -0.2, stressLevel: 0.5 });
    expect(context.cognitiveLoad).toBe(1);
    expect(context.energyLevel).toBe(0);
    expect(context.stressLevel).toBe(0.5);
  });

  it('treats non-finite metrics as missing', () => {
    const { context, defaulted } = normalize({ userId: 'u-1', cognitiveLoad: Number.NaN, timestamp: T0 });
    expect(context.cognitiveLoad).toBe(0.5);
    expect(defaulted).toContain('cognitiveLoad');
  });

  it('derives cognitive load from task signals', () => {
    const { context } = normalize({
      userId: 'u-1',
      taskComplexity: 0.6,
      interruptionsPerHour: 6,
      taskSwitchesPerHour: 10,
    });
    expect(context.cognitiveLoad).toBeCloseTo((0.6 + 0.5 + 0.5) / 3, 10);
  });

  it('derives energy from time of day and time since the last break', () => {
    const { context } = normalize({ userId: 'u-1', timestamp: T0, minutesSinceBreak: 120 });
    // 10:00 UTC sits at 0.95 on the circadian curve
    expect(context.energyLevel).toBeCloseTo((0.95 + 0.5) / 2, 10);
  });

  it('derives stress from meetings and deadline pressure', () => {
    const { context } = normalize({ userId: 'u-1', meetingsToday: 4, deadlinePressure: 0.9 });
    expect(context.stressLevel).toBeCloseTo(0.7, 10);
  });

  it.each([
    [{ focusMinutes: 50, taskSwitchesPerHour: 1 }, 'flow'],
    [{ focusMinutes: 50, taskSwitchesPerHour: 12 }, 'scattered'],
    [{ focusMinutes: 30, taskSwitchesPerHour: 3 }, 'deep'],
    [{ focusMinutes: 5 }, 'shallow'],
  ] as const)('derives focus state from %o', (signals, expected) => {
    const { context } = normalize({ userId: 'u-1', ...signals });
    expect(context.focusState).toBe(expected);
  });

  it('accepts focus states case-insensitively and defaults unknown ones', () => {
    expect(normalize({ userId: 'u-1', focusState: ' FLOW ' }).context.focusState).toBe('flow');

    const { context, defaulted } = normalize({ userId: 'u-1', focusState: 'zen' });
    expect(context.focusState).toBe('shallow');
    expect(defaulted).toContain('focusState');
  });

  it('parses ISO timestamps', () => {
    const { context } = normalize({ userId: 'u-1', timestamp: '2026-03-02T10:00:00Z' });
    expect(context.timeOfDay).toBe(T0);
  });

  it('trims and de-duplicates goals', () => {
    const { context } = normalize({ userId: 'u-1', goals: [' ship v2 ', 'ship v2', '', 'write docs'] });
    expect([...context.goals]).toEqual(['ship v2', 'write docs']);
  });

  it('keeps only the newest recent interactions', () => {
    const records = [1, 2, 3, 4, 5].map((n) => makeRecord({ id: `r-${n}`, timestamp: T0 + n }));
    const { context } = normalize({ userId: 'user-1', recentInteractions: records }, { maxRecentInteractions: 3 });
    expect(context.recentInteractions.map((r) => r.id)).toEqual(['r-3', 'r-4', 'r-5']);
  });

  it('returns a frozen context', () => {
    const { context } = normalize({ userId: 'u-1' });
    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.recentInteractions)).toBe(true);
  });
});

describe('createContext', () => {
  it('builds a context from already-normalized values', () => {
    const context = createContext({ userId: 'u-2', stressLevel: 0.8, goals: ['launch'] });
    expect(context.stressLevel).toBe(0.8);
    expect(context.cognitiveLoad).toBe(0.5);
    expect(context.goals.has('launch')).toBe(true);
  });
});

describe('circadianFactor', () => {
  it('wraps hours outside 0-23', () => {
    expect(circadianFactor(34)).toBe(circadianFactor(10));
    expect(circadianFactor(-1)).toBe(circadianFactor(23));
  });
});
