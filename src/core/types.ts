import { z } from 'zod';

// ===== Configuration =====

const unit = z.number().min(0).max(1);

export const CadenceConfigSchema = z.object({
  timing: z.object({
    highLoadThreshold: unit.default(0.8),
    minSpacingMinutes: z.number().min(0).default(30),
    dailyCap: z.number().int().min(1).default(8),
    /** UTC hours (0-23) during which nothing is sent; `from === to` disables the window. */
    quietHours: z.object({
      from: z.number().int().min(0).max(23),
      to: z.number().int().min(0).max(23),
    }).optional(),
    /** Back off after `threshold` dismissals among the user's last `window` interventions. */
    dismissals: z.object({
      enabled: z.boolean().default(true),
      window: z.number().int().min(1).default(10),
      threshold: z.number().int().min(1).default(2),
      minEffectiveness: unit.default(0.3),
      lookbackMinutes: z.number().min(0).default(240),
    }).default({}),
  }).default({}),
  selection: z.object({
    weights: z.object({
      personalityFit: unit.default(0.3),
      cognitiveCost: unit.default(0.3),
      learnedWeight: unit.default(0.3),
      recency: unit.default(0.1),
    }).default({}).refine(
      (w) => Math.abs(w.personalityFit + w.cognitiveCost + w.learnedWeight + w.recency - 1) < 1e-6,
      { message: 'selection weights must sum to 1' },
    ),
    recencyWindow: z.number().int().min(1).default(10),
  }).default({}),
  recommendation: z.object({
    highStressThreshold: unit.default(0.7),
    seed: z.number().int().optional(),
  }).default({}),
  feedback: z.object({
    alpha: z.number().gt(0).max(1).default(0.3),
    /** `effectiveness` feeds the reported score as is; `blended` mixes in satisfaction and completion. */
    signal: z.enum(['effectiveness', 'blended']).default('effectiveness'),
  }).default({}),
  context: z.object({
    maxRecentInteractions: z.number().int().min(1).max(500).default(50),
    signalTimeoutMs: z.number().int().min(1).default(2000),
  }).default({}),
  storage: z.object({
    driver: z.enum(['memory', 'sqlite']).default('memory'),
    dbPath: z.string().optional(),
  }).default({}),
  api: z.object({
    port: z.number().int().min(0).max(65535).default(4310),
    apiKey: z.string().optional(),
    corsOrigins: z.array(z.string()).default(['*']),
  }).default({}),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    verbose: z.boolean().default(false),
  }).default({}),
});

export type CadenceConfig = z.infer<typeof CadenceConfigSchema>;
export type CadenceConfigInput = z.input<typeof CadenceConfigSchema>;

export type ScoreWeights = CadenceConfig['selection']['weights'];
export type TimingConfig = CadenceConfig['timing'];

/** Fully defaulted configuration. */
export function defaultConfig(): CadenceConfig {
  return CadenceConfigSchema.parse({});
}
