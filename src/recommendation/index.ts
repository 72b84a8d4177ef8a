export {
  RecommendationGenerator,
  FALLBACK_TEMPLATE,
  formatTimeframe,
  isActionable,
  type RecommendationGeneratorOptions,
} from './recommendation-generator.js';
export { StaticTemplateProvider, getDefaultTemplates } from './templates.js';
export { createRng, pickIndex, type Rng } from './rng.js';
export type {
  ActionStep,
  DeliveryStyle,
  DetailLevel,
  Difficulty,
  Intervention,
  InterventionTemplate,
  TemplateProvider,
  TemplateStep,
} from './types.js';
