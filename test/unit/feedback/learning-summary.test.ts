import { describe, it, expect } from 'vitest';
import { summarizeLearning } from '../../../src/feedback/learning-summary.js';
import type { InterventionOutcome } from '../../../src/history/types.js';
import { makeRecord, minutes, T0 } from '../../helpers/fixtures.js';

function withPersonality(personalityType: string, overrides: Parameters<typeof makeRecord>[0] = {}) {
  const record = makeRecord(overrides);
  return { ...record, contextSnapshot: { ...record.contextSnapshot, personalityType } };
}

const accepted: InterventionOutcome = { effectiveness: 0.8, satisfaction: 0.9, completed: true };
const dismissed: InterventionOutcome = { effectiveness: 0.2, satisfaction: 0.1, completed: false };

describe('summarizeLearning', () => {
  it('starts empty with every known strategy listed', () => {
    const summary = summarizeLearning([], { 'micro-break': 0.7, 'box-breathing': 0.65 });

    expect(summary).toEqual({
      interventions: 0,
      withOutcome: 0,
      acceptanceRate: 0,
      averageEffectiveness: 0,
      status: 'starting',
      byStrategy: {
        'box-breathing': { interventions: 0, withOutcome: 0, acceptanceRate: 0, averageEffectiveness: 0, weight: 0.65 },
        'micro-break': { interventions: 0, withOutcome: 0, acceptanceRate: 0, averageEffectiveness: 0, weight: 0.7 },
      },
      byPersonality: {},
    });
  });

  it('aggregates outcomes overall, per strategy and per personality', () => {
    const records = [
      withPersonality('intj', { timestamp: T0, outcome: accepted }),
      withPersonality('intj', { timestamp: T0 + minutes(60), strategyName: 'box-breathing', outcome: dismissed }),
      withPersonality('manager', { timestamp: T0 + minutes(120), outcome: accepted }),
      withPersonality('manager', { timestamp: T0 + minutes(180), strategyName: 'goal-review' }),
    ];

    const summary = summarizeLearning(records, { 'micro-break': 0.75, 'box-breathing': 0.6 });

    expect(summary.interventions).toBe(4);
    expect(summary.withOutcome).toBe(3);
    expect(summary.acceptanceRate).toBe(0.666667);
    expect(summary.averageEffectiveness).toBe(0.6);
    expect(summary.status).toBe('building');

    expect(summary.byStrategy['micro-break']).toEqual({
      interventions: 2,
      withOutcome: 2,
      acceptanceRate: 1,
      averageEffectiveness: 0.8,
      weight: 0.75,
    });
    // Strategies no longer in the catalog are still reported
    expect(summary.byStrategy['goal-review']).toEqual({
      interventions: 1,
      withOutcome: 0,
      acceptanceRate: 0,
      averageEffectiveness: 0,
      weight: 0,
    });
    expect(summary.byPersonality).toEqual({
      intj: { interventions: 2, withOutcome: 2, acceptanceRate: 0.5, averageEffectiveness: 0.5 },
      manager: { interventions: 2, withOutcome: 1, acceptanceRate: 1, averageEffectiveness: 0.8 },
    });
  });

  it('reports active learning past ten outcomes', () => {
    const records = Array.from({ length: 11 }, (_, i) => makeRecord({ timestamp: T0 + minutes(i * 90), outcome: accepted }));
    expect(summarizeLearning(records, {}).status).toBe('active');
    expect(summarizeLearning(records.slice(0, 10), {}).status).toBe('building');
  });
});
