export {
  FeedbackAdapter,
  DEFAULT_ALPHA,
  emaUpdate,
  outcomeEffectiveness,
  type FeedbackAdapterOptions,
} from './feedback-adapter.js';
export {
  summarizeLearning,
  ACTIVE_LEARNING_THRESHOLD,
  type LearningStatus,
  type LearningSummary,
  type OutcomeStats,
  type StrategyStats,
} from './learning-summary.js';
