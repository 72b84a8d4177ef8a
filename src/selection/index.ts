export { StrategySelector, DEFAULT_SELECTOR_WEIGHTS, type StrategySelectorOptions } from './strategy-selector.js';
export {
  StaticPersonalityProfiles,
  getDefaultProfiles,
  personalityFit,
  NEUTRAL_FIT,
  COMMUNICATION_STYLES,
  type CommunicationStyle,
  type PersonalityProfile,
  type PersonalityProfileProvider,
} from './personality.js';
export type {
  Exclusion,
  ExclusionReason,
  ScoreBreakdown,
  ScoredStrategy,
  SelectionResult,
  SelectorWeights,
} from './types.js';
