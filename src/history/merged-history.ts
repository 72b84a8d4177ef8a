/**
 * Read view that folds a context's `recentInteractions` into a store's
 * answers, so a caller-supplied interaction the store has not seen yet still
 * counts toward spacing, caps, cooldowns and recency.
 */

import type { UserContext } from '../context/types.js';
import type { HistoryReader, InterventionOutcome, InterventionRecord } from './types.js';

class MergedHistory implements HistoryReader {
  constructor(
    private readonly store: HistoryReader,
    private readonly extra: readonly InterventionRecord[],
  ) {}

  lastFor(userId: string, strategyName: string): InterventionRecord | undefined {
    return latest([
      this.store.lastFor(userId, strategyName),
      ...this.extraFor(userId).filter((r) => r.strategyName === strategyName),
    ]);
  }

  lastForUser(userId: string): InterventionRecord | undefined {
    return latest([this.store.lastForUser(userId), ...this.extraFor(userId)]);
  }

  countSince(userId: string, since: number): number {
    const fromStore = this.store.countSince(userId, since);
    const known = new Set(
      this.store
        .recentForUser(userId, fromStore)
        .map((r) => r.id),
    );
    const unseen = this.extraFor(userId).filter((r) => r.timestamp >= since && !known.has(r.id));
    return fromStore + unseen.length;
  }

  recentForUser(userId: string, limit: number): InterventionRecord[] {
    const merged = new Map<string, InterventionRecord>();
    for (const rec of this.store.recentForUser(userId, limit)) merged.set(rec.id, rec);
    for (const rec of this.extraFor(userId)) {
      if (!merged.has(rec.id)) merged.set(rec.id, rec);
    }
    const ordered = [...merged.values()].sort((a, b) => a.timestamp - b.timestamp);
    return ordered.slice(Math.max(0, ordered.length - limit));
  }

  outcomeFor(id: string): InterventionOutcome | undefined {
    const stored = this.store.outcomeFor(id);
    if (stored) return stored;
    for (let i = this.extra.length - 1; i >= 0; i--) {
      const rec = this.extra[i];
      if (rec.id === id && rec.outcome) return { ...rec.outcome };
    }
    return undefined;
  }

  private extraFor(userId: string): InterventionRecord[] {
    return this.extra.filter((r) => r.userId === userId && r.amends === undefined);
  }
}

function latest(records: Array<InterventionRecord | undefined>): InterventionRecord | undefined {
  let best: InterventionRecord | undefined;
  for (const rec of records) {
    if (rec && (!best || rec.timestamp > best.timestamp)) best = rec;
  }
  return best;
}

export function withRecentInteractions(store: HistoryReader, context: UserContext): HistoryReader {
  if (context.recentInteractions.length === 0) return store;
  return new MergedHistory(store, context.recentInteractions);
}
