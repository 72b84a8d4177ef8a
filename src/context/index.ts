export { normalize, createContext, circadianFactor, CONTEXT_DEFAULTS } from './context-model.js';
export { parseContextPayload, parseRawSignals } from './schema.js';
export { FOCUS_STATES } from './types.js';
export type {
  ContextField,
  ContextMetric,
  FocusState,
  NormalizeOptions,
  NormalizedContext,
  RawSignals,
  UserContext,
} from './types.js';
