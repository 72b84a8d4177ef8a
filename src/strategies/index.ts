export { StrategyCatalog } from './catalog.js';
export { BUILTIN_STRATEGIES, createDefaultCatalog } from './builtin.js';
export { evaluateRule, describeRule } from './rules.js';
export { STRATEGY_KINDS } from './types.js';
export type {
  ApplicabilityRule,
  Strategy,
  StrategyDefinition,
  StrategyKind,
  WeightStore,
} from './types.js';
