import { z } from 'zod';
import { STRATEGY_KINDS, type StrategyKind } from '../strategies/types.js';
import { readDataFile } from '../utils/fs.js';
import type { InterventionTemplate, TemplateProvider } from './types.js';

// Steps are validated for actionability by the generator, not here, so a
// template missing a criterion still loads and gets rejected at build time.
const TemplateSchema = z.object({
  message: z.string().min(1),
  steps: z.array(
    z.object({
      description: z.string(),
      minutes: z.number().optional(),
      difficulty: z.enum(['easy', 'moderate', 'hard']).optional(),
      successCriterion: z.string().optional(),
    }),
  ),
});

const TemplateFileSchema = z.object({
  version: z.literal(1),
  templates: z.record(z.enum(STRATEGY_KINDS), z.array(TemplateSchema)),
});

export class StaticTemplateProvider implements TemplateProvider {
  constructor(private readonly templates: Partial<Record<StrategyKind, InterventionTemplate[]>>) {}

  static fromDataFile(file = 'templates.json'): StaticTemplateProvider {
    return new StaticTemplateProvider(TemplateFileSchema.parse(readDataFile(file)).templates);
  }

  templatesFor(kind: StrategyKind): InterventionTemplate[] {
    return this.templates[kind] ?? [];
  }
}

let defaultTemplates: StaticTemplateProvider | null = null;

export function getDefaultTemplates(): StaticTemplateProvider {
  if (!defaultTemplates) {
    defaultTemplates = StaticTemplateProvider.fromDataFile();
  }
  return defaultTemplates;
}
