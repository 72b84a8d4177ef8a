/**
 * Personality profiles: how well each strategy kind suits a personality type
 * and how that type prefers to be addressed. The table itself is data
 * (`data/personality-profiles.json`); callers may plug in their own provider.
 */

import { z } from 'zod';
import { STRATEGY_KINDS, type StrategyKind } from '../strategies/types.js';
import { readDataFile } from '../utils/fs.js';

export const COMMUNICATION_STYLES = [
  'direct',
  'detailed',
  'technical',
  'supportive',
  'enthusiastic',
  'inspiring',
  'empathetic',
] as const;

export type CommunicationStyle = (typeof COMMUNICATION_STYLES)[number];

export interface PersonalityProfile {
  type: string;
  communicationStyle: CommunicationStyle;
  affinity: Partial<Record<StrategyKind, number>>;
}

export interface PersonalityProfileProvider {
  getProfile(personalityType: string): PersonalityProfile | undefined;
}

/** Fit used when the type or the kind is not in the table. */
export const NEUTRAL_FIT = 0.5;

const ProfileFileSchema = z.object({
  version: z.literal(1),
  profiles: z.array(
    z.object({
      type: z.string().min(1),
      communicationStyle: z.enum(COMMUNICATION_STYLES),
      affinity: z.record(z.enum(STRATEGY_KINDS), z.number().min(0).max(1)),
    }),
  ),
});

export class StaticPersonalityProfiles implements PersonalityProfileProvider {
  private profiles: Map<string, PersonalityProfile> = new Map();

  constructor(profiles: PersonalityProfile[]) {
    for (const profile of profiles) {
      this.profiles.set(profile.type.toLowerCase(), profile);
    }
  }

  /** Profiles shipped in `data/personality-profiles.json`. */
  static fromDataFile(file = 'personality-profiles.json'): StaticPersonalityProfiles {
    const parsed = ProfileFileSchema.parse(readDataFile(file));
    return new StaticPersonalityProfiles(parsed.profiles);
  }

  getProfile(personalityType: string): PersonalityProfile | undefined {
    return this.profiles.get(personalityType.trim().toLowerCase());
  }

  get size(): number {
    return this.profiles.size;
  }
}

export function personalityFit(
  provider: PersonalityProfileProvider,
  personalityType: string,
  kind: StrategyKind,
): number {
  return provider.getProfile(personalityType)?.affinity[kind] ?? NEUTRAL_FIT;
}

let defaultProfiles: StaticPersonalityProfiles | null = null;

export function getDefaultProfiles(): StaticPersonalityProfiles {
  if (!defaultProfiles) {
    defaultProfiles = StaticPersonalityProfiles.fromDataFile();
  }
  return defaultProfiles;
}
