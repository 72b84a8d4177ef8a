/**
 * TimingGate — decides whether any intervention may happen right now.
 *
 * Rules run in order and the first match wins. The gate only reads history
 * and never mutates anything, so equal inputs always give equal answers.
 */

import type { UserContext } from '../context/types.js';
import type { HistoryReader } from '../history/types.js';
import { withRecentInteractions } from '../history/merged-history.js';
import { DAY_MS, MINUTE_MS, hourInWindow, hourOfDay } from '../utils/math.js';
import type { InterventionOutcome } from '../history/types.js';
import type { GateDecision, TimingGateOptions } from './types.js';

export const DEFAULT_TIMING_OPTIONS: TimingGateOptions = {
  highLoadThreshold: 0.8,
  minSpacingMs: 30 * MINUTE_MS,
  dailyCap: 8,
  dismissalBackoff: {
    window: 10,
    threshold: 2,
    minEffectiveness: 0.3,
    lookbackMs: 240 * MINUTE_MS,
  },
};

export function isDismissal(outcome: InterventionOutcome, minEffectiveness: number): boolean {
  return !outcome.completed || outcome.effectiveness < minEffectiveness;
}

export class TimingGate {
  private options: TimingGateOptions;

  constructor(options?: Partial<TimingGateOptions>) {
    this.options = { ...DEFAULT_TIMING_OPTIONS, ...options };
  }

  shouldIntervene(context: UserContext, history: HistoryReader, now: number = Date.now()): boolean {
    return this.evaluate(context, history, now).allowed;
  }

  evaluate(context: UserContext, history: HistoryReader, now: number = Date.now()): GateDecision {
    if (context.focusState === 'flow') {
      return {
        allowed: false,
        reason: 'suboptimal_timing',
        rule: 'flow_protection',
        detail: 'user is in flow',
      };
    }

    if (context.cognitiveLoad > this.options.highLoadThreshold) {
      return {
        allowed: false,
        reason: 'suboptimal_timing',
        rule: 'cognitive_overload',
        detail: `cognitive load ${context.cognitiveLoad.toFixed(2)} exceeds ${this.options.highLoadThreshold}`,
      };
    }

    const quiet = this.options.quietHours;
    if (quiet && hourInWindow(hourOfDay(context.timeOfDay), quiet.from, quiet.to)) {
      return {
        allowed: false,
        reason: 'suboptimal_timing',
        rule: 'quiet_hours',
        detail: `inside quiet hours ${quiet.from}-${quiet.to}`,
      };
    }

    const view = withRecentInteractions(history, context);

    const backoff = this.options.dismissalBackoff;
    if (backoff) {
      const since = now - backoff.lookbackMs;
      const dismissed = view
        .recentForUser(context.userId, backoff.window)
        .filter((rec) => rec.timestamp >= since)
        .filter((rec) => {
          const outcome = view.outcomeFor(rec.id);
          return outcome !== undefined && isDismissal(outcome, backoff.minEffectiveness);
        }).length;
      if (dismissed >= backoff.threshold) {
        return {
          allowed: false,
          reason: 'suboptimal_timing',
          rule: 'recent_dismissals',
          detail: `${dismissed} recent interventions were dismissed`,
        };
      }
    }
    const last = view.lastForUser(context.userId);
    if (last && now - last.timestamp < this.options.minSpacingMs) {
      const waitMinutes = Math.ceil((this.options.minSpacingMs - (now - last.timestamp)) / MINUTE_MS);
      return {
        allowed: false,
        reason: 'cooldown_active',
        rule: 'min_spacing',
        detail: `last intervention was too recent; next slot in ${waitMinutes} min`,
      };
    }

    const today = view.countSince(context.userId, now - DAY_MS);
    if (today >= this.options.dailyCap) {
      return {
        allowed: false,
        reason: 'daily_cap_reached',
        rule: 'daily_cap',
        detail: `${today} interventions in the last 24h (cap ${this.options.dailyCap})`,
      };
    }

    return { allowed: true };
  }

  getOptions(): TimingGateOptions {
    return { ...this.options };
  }
}
