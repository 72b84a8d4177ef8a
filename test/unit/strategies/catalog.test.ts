import { describe, it, expect } from 'vitest';
import { ConfigError, StrategyNotFoundError } from '../../../src/core/errors.js';
import { BUILTIN_STRATEGIES, createDefaultCatalog } from '../../../src/strategies/builtin.js';
import { StrategyCatalog } from '../../../src/strategies/catalog.js';
import { evaluateRule } from '../../../src/strategies/rules.js';
import type { StrategyDefinition, WeightStore } from '../../../src/strategies/types.js';
import { makeContext, minutes } from '../../helpers/fixtures.js';

function definition(overrides: Partial<StrategyDefinition> = {}): StrategyDefinition {
  return {
    name: 'stretch',
    kind: 'break',
    applicability: { kind: 'always' },
    baseEffectiveness: 0.6,
    cognitiveCost: 0.2,
    cooldownMs: minutes(30),
    ...overrides,
  };
}

describe('StrategyCatalog', () => {
  it('registers strategies with their base effectiveness as starting weight', () => {
    const catalog = new StrategyCatalog([definition()]);
    const strategy = catalog.get('stretch');

    expect(strategy.weight).toBe(0.6);
    expect(strategy.cooldownMs).toBe(minutes(30));
    expect(catalog.size).toBe(1);
    expect(catalog.has('stretch')).toBe(true);
  });

  it('honours an explicit starting weight and clamps static parameters', () => {
    const catalog = new StrategyCatalog([definition({ weight: 0.9, cognitiveCost: 1.5, baseEffectiveness: -1 })]);
    const strategy = catalog.get('stretch');

    expect(strategy.weight).toBe(0.9);
    expect(strategy.cognitiveCost).toBe(1);
    expect(strategy.baseEffectiveness).toBe(0);
  });

  it('rejects invalid definitions', () => {
    const catalog = new StrategyCatalog([definition()]);

    expect(() => catalog.register(definition())).toThrow(ConfigError);
    expect(() => catalog.register(definition({ name: '  ' }))).toThrow('Strategy name must not be empty');
    expect(() => catalog.register(definition({ name: 'x', cooldownMs: -1 }))).toThrow(/non-negative cooldown/);
    expect(() => catalog.register(definition({ name: 'y', alpha: 0 }))).toThrow(/alpha must be in/);
  });

  it('throws StrategyNotFoundError for unknown names', () => {
    const catalog = new StrategyCatalog();
    expect(() => catalog.get('nope')).toThrow(StrategyNotFoundError);
    expect(() => catalog.get('nope')).toThrow('Unknown strategy: nope');
    expect(() => catalog.setWeight('nope', 0.5)).toThrow(StrategyNotFoundError);
    expect(catalog.find('nope')).toBeUndefined();
  });

  it('lists strategies sorted by name', () => {
    const catalog = new StrategyCatalog([definition({ name: 'zeta' }), definition({ name: 'alpha' })]);
    expect(catalog.list().map((s) => s.name)).toEqual(['alpha', 'zeta']);
  });

  it('clamps weights written through setWeight', () => {
    const catalog = new StrategyCatalog([definition()]);

    expect(catalog.setWeight('stretch', 1.3)).toBe(1);
    expect(catalog.setWeight('stretch', -0.3)).toBe(0);
    expect(catalog.weights()).toEqual({ stretch: 0 });
  });

  it('hands out snapshots that do not track later weight changes', () => {
    const catalog = new StrategyCatalog([definition()]);
    const before = catalog.get('stretch');
    catalog.setWeight('stretch', 0.1);

    expect(before.weight).toBe(0.6);
    expect(catalog.getWeight('stretch')).toBe(0.1);
  });

  it('loads persisted weights and reports unknown names', async () => {
    const catalog = new StrategyCatalog([definition()]);
    const store: WeightStore = {
      load: async () => ({ stretch: 0.82, retired: 0.4 }),
      save: () => {},
    };

    const unknown = await catalog.loadWeights(store);

    expect(unknown).toEqual(['retired']);
    expect(catalog.getWeight('stretch')).toBe(0.82);
  });
});

describe('built-in strategies', () => {
  it('registers every built-in definition', () => {
    const catalog = createDefaultCatalog();
    expect(catalog.size).toBe(BUILTIN_STRATEGIES.length);
    expect(catalog.size).toBe(10);
  });

  it('offers a low-cost break to a stressed user with spare capacity', () => {
    const catalog = createDefaultCatalog();
    const ctx = makeContext({ cognitiveLoad: 0.2, stressLevel: 0.9, energyLevel: 0.5, focusState: 'shallow' });

    const applicable = catalog.list().filter((s) => evaluateRule(s.applicability, ctx)).map((s) => s.name);

    expect(applicable).toContain('micro-break');
    expect(applicable).toContain('box-breathing');
    expect(applicable).not.toContain('deep-work-block');
  });

  it('suggests accountability only when goals call for it', () => {
    const catalog = createDefaultCatalog();
    const rule = catalog.get('accountability-check-in').applicability;

    expect(evaluateRule(rule, makeContext({ goals: ['Prepare the team offsite'] }))).toBe(true);
    expect(evaluateRule(rule, makeContext({ goals: ['read a book'] }))).toBe(false);
  });
});
