export { InterventionEngine, defaultDbPath, type InterventionEngineOptions } from './intervention-engine.js';
export type { DeliveryAck, DeliveryChannel, SignalProvider } from './ports.js';
export type {
  DecisionWithContext,
  DeferredDecision,
  DeliveredDecision,
  EngineDecision,
  OutcomeResult,
} from './types.js';
