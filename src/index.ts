/**
 * Cadence — adaptive intervention recommendations
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, InterventionEngine } from 'cadence-coach';
 *
 * const config = new ConfigManager().load();
 * const engine = await InterventionEngine.create({ config });
 * const { decision } = await engine.decidePayload({ userId: 'u-1', stress_level: 0.9 });
 * ```
 */

// Core
export { ConfigManager, type ConfigManagerOptions } from './core/config.js';
export { EventBus, type CadenceEvents } from './core/events.js';
export { createLogger, getLogger, logFilePath, setLogger } from './core/logger.js';
export type { LoggerOptions } from './core/logger.js';
export { AsyncMutex, KeyedMutex } from './core/mutex.js';
export {
  CadenceError,
  ConfigError,
  ContextValidationError,
  StrategyNotFoundError,
  RuleEvaluationError,
  RecordNotFoundError,
  OutcomeConflictError,
  CooldownViolationError,
} from './core/errors.js';
export {
  CadenceConfigSchema,
  defaultConfig,
  type CadenceConfig,
  type CadenceConfigInput,
  type ScoreWeights,
  type TimingConfig,
} from './core/types.js';
export { NAME, VERSION } from './version.js';

// Pipeline
export * from './context/index.js';
export * from './history/index.js';
export * from './strategies/index.js';
export * from './timing/index.js';
export * from './selection/index.js';
export * from './recommendation/index.js';
export * from './feedback/index.js';
export * from './engine/index.js';

// Surfaces
export * from './api/index.js';
