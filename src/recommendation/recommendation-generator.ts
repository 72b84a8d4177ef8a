/**
 * RecommendationGenerator — turns a chosen strategy into a deliverable
 * intervention.
 *
 * A template is picked with the injected RNG, filled from the context and
 * checked for actionability: at least one step, and every step carrying a
 * timeframe and a success criterion. A rejected template is replaced by
 * another one; after two rejections the generic fallback is returned.
 */

import { getLogger } from '../core/logger.js';
import type { UserContext } from '../context/types.js';
import { getDefaultProfiles, type PersonalityProfileProvider } from '../selection/personality.js';
import type { Strategy } from '../strategies/types.js';
import { createRng, pickIndex, type Rng } from './rng.js';
import { getDefaultTemplates } from './templates.js';
import type {
  ActionStep,
  DeliveryStyle,
  Intervention,
  InterventionTemplate,
  TemplateProvider,
} from './types.js';

export const FALLBACK_TEMPLATE: InterventionTemplate = {
  message: 'Take a 5-minute break.',
  steps: [
    {
      description: 'Step away from your screen and take a 5-minute break',
      minutes: 5,
      difficulty: 'easy',
      successCriterion: 'Away from the screen for 5 minutes',
    },
  ],
};

const DEFAULT_GOAL = 'your current task';

export interface RecommendationGeneratorOptions {
  templates?: TemplateProvider;
  profiles?: PersonalityProfileProvider;
  /** Injected random source; wins over `seed`. */
  rng?: Rng;
  seed?: number;
  highStressThreshold?: number;
  maxAttempts?: number;
}

export class RecommendationGenerator {
  private templates: TemplateProvider;
  private profiles: PersonalityProfileProvider;
  private rng: Rng;
  private highStressThreshold: number;
  private maxAttempts: number;

  constructor(options: RecommendationGeneratorOptions = {}) {
    this.templates = options.templates ?? getDefaultTemplates();
    this.profiles = options.profiles ?? getDefaultProfiles();
    this.rng = options.rng ?? createRng(options.seed);
    this.highStressThreshold = options.highStressThreshold ?? 0.7;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 2);
  }

  build(strategy: Strategy, context: UserContext, now: number = Date.now()): Intervention {
    const delivery = this.deliveryStyle(context);
    const followUpAt = this.followUpAt(strategy, context, now);
    const candidates = [...this.templates.templatesFor(strategy.kind)];

    for (let attempt = 1; attempt <= this.maxAttempts && candidates.length > 0; attempt++) {
      const [template] = candidates.splice(pickIndex(this.rng, candidates.length), 1);
      const rendered = render(template, context, delivery);
      if (isActionable(rendered.actionSteps)) {
        return {
          type: strategy.kind,
          strategyName: strategy.name,
          ...rendered,
          followUpAt,
          delivery,
          fallback: false,
        };
      }
      getLogger().debug(
        { strategy: strategy.name, attempt },
        'Template rejected: steps lack a timeframe or success criterion',
      );
    }

    getLogger().warn({ strategy: strategy.name, userId: context.userId }, 'Using generic fallback intervention');
    return {
      type: strategy.kind,
      strategyName: strategy.name,
      ...render(FALLBACK_TEMPLATE, context, { ...delivery, detailLevel: 'standard' }),
      followUpAt,
      delivery,
      fallback: true,
    };
  }

  /**
   * Check back after the strategy's cooldown, or after half of it when the
   * user is under high stress.
   */
  followUpAt(strategy: Strategy, context: UserContext, now: number): number {
    const delay = context.stressLevel >= this.highStressThreshold
      ? Math.round(strategy.cooldownMs / 2)
      : strategy.cooldownMs;
    return now + delay;
  }

  deliveryStyle(context: UserContext): DeliveryStyle {
    const tone = this.profiles.getProfile(context.personalityType)?.communicationStyle ?? 'supportive';
    if (context.cognitiveLoad >= 0.6) {
      return { tone, detailLevel: 'brief' };
    }
    if (context.cognitiveLoad <= 0.3 && context.energyLevel >= 0.6) {
      return { tone, detailLevel: 'detailed' };
    }
    return { tone, detailLevel: 'standard' };
  }
}

// ─── Rendering ──────────────────────────────────────────────

function render(
  template: InterventionTemplate,
  context: UserContext,
  delivery: DeliveryStyle,
): Pick<Intervention, 'message' | 'actionSteps' | 'successMetrics'> {
  const goal = [...context.goals].sort()[0] ?? DEFAULT_GOAL;

  let actionSteps: ActionStep[] = template.steps.map((step) => {
    const minutes = step.minutes !== undefined && Number.isFinite(step.minutes) && step.minutes > 0 ? step.minutes : 0;
    return {
      description: fill(step.description, goal, minutes),
      timeframe: minutes > 0 ? formatTimeframe(minutes) : '',
      durationMinutes: minutes,
      difficulty: step.difficulty ?? 'moderate',
      successCriterion: fill(step.successCriterion ?? '', goal, minutes).trim(),
    };
  });

  if (delivery.detailLevel === 'brief') {
    actionSteps = actionSteps.slice(0, 1);
  }

  const totalMinutes = actionSteps.reduce((sum, step) => sum + step.durationMinutes, 0);
  let message = fill(template.message, goal, totalMinutes);
  if (delivery.detailLevel === 'detailed' && actionSteps.length > 0) {
    message = `${message} Start with: ${actionSteps[0].description}.`;
  }

  return {
    message,
    actionSteps,
    successMetrics: [...new Set(actionSteps.map((step) => step.successCriterion).filter(Boolean))],
  };
}

function fill(text: string, goal: string, minutes: number): string {
  return text.replace(/\{goal\}/g, goal).replace(/\{minutes\}/g, String(minutes));
}

export function formatTimeframe(minutes: number): string {
  if (minutes < 60) return `${minutes} min`;
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  return rest > 0 ? `${hours} h ${rest} min` : `${hours} h`;
}

export function isActionable(steps: ActionStep[]): boolean {
  return (
    steps.length > 0 &&
    steps.every(
      (step) =>
        step.description.trim().length > 0 &&
        step.timeframe.trim().length > 0 &&
        step.durationMinutes > 0 &&
        step.successCriterion.trim().length > 0,
    )
  );
}
