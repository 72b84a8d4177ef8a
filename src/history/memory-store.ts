/**
 * InMemoryHistoryStore — arena of records plus per-user and per-id indexes.
 *
 * Entries are never removed or mutated. Attaching an outcome appends an
 * amended copy whose `amends` points at the original; `get()` resolves an id
 * to its newest version while cooldown and cap queries only walk originals.
 */

import { CooldownViolationError, OutcomeConflictError, RecordNotFoundError } from '../core/errors.js';
import { clamp01 } from '../utils/math.js';
import { cloneRecord } from './snapshot.js';
import type { InterventionHistoryStore, InterventionOutcome, InterventionRecord } from './types.js';

export class InMemoryHistoryStore implements InterventionHistoryStore {
  private arena: InterventionRecord[] = [];

  /** userId -> arena indexes of original records, in timestamp order */
  private byUser: Map<string, number[]> = new Map();

  /** record id -> arena index of the original */
  private byId: Map<string, number> = new Map();

  /** original id -> arena index of its amended copy */
  private amendments: Map<string, number> = new Map();

  record(rec: InterventionRecord, cooldownMs = 0): InterventionRecord {
    if (this.byId.has(rec.id)) {
      throw new Error(`Duplicate intervention record id: ${rec.id}`);
    }

    if (cooldownMs > 0) {
      for (const i of this.byUser.get(rec.userId) ?? []) {
        const other = this.arena[i];
        const gap = Math.abs(rec.timestamp - other.timestamp);
        if (other.strategyName === rec.strategyName && gap < cooldownMs) {
          throw new CooldownViolationError(rec.userId, rec.strategyName, cooldownMs - gap);
        }
      }
    }

    const stored = cloneRecord({ ...rec, amends: undefined });
    const index = this.arena.push(stored) - 1;
    this.byId.set(stored.id, index);

    const indexes = this.byUser.get(stored.userId) ?? [];
    // Keep timestamp order even when a caller appends out of order
    let pos = indexes.length;
    while (pos > 0 && this.arena[indexes[pos - 1]].timestamp > stored.timestamp) {
      pos--;
    }
    indexes.splice(pos, 0, index);
    this.byUser.set(stored.userId, indexes);

    return cloneRecord(stored);
  }

  get(id: string): InterventionRecord | undefined {
    const amended = this.amendments.get(id);
    if (amended !== undefined) return cloneRecord(this.arena[amended]);
    const original = this.byId.get(id);
    return original === undefined ? undefined : cloneRecord(this.arena[original]);
  }

  attachOutcome(id: string, outcome: InterventionOutcome): InterventionRecord {
    const original = this.byId.get(id);
    if (original === undefined) {
      throw new RecordNotFoundError(id);
    }
    if (this.amendments.has(id)) {
      throw new OutcomeConflictError(id);
    }

    const amended = cloneRecord({
      ...this.arena[original],
      outcome: {
        effectiveness: clamp01(outcome.effectiveness),
        satisfaction: clamp01(outcome.satisfaction),
        completed: outcome.completed,
      },
      amends: id,
    });
    const index = this.arena.push(amended) - 1;
    this.amendments.set(id, index);
    return cloneRecord(amended);
  }

  lastFor(userId: string, strategyName: string): InterventionRecord | undefined {
    const indexes = this.byUser.get(userId) ?? [];
    for (let i = indexes.length - 1; i >= 0; i--) {
      const rec = this.arena[indexes[i]];
      if (rec.strategyName === strategyName) return cloneRecord(rec);
    }
    return undefined;
  }

  lastForUser(userId: string): InterventionRecord | undefined {
    const indexes = this.byUser.get(userId);
    if (!indexes || indexes.length === 0) return undefined;
    return cloneRecord(this.arena[indexes[indexes.length - 1]]);
  }

  countSince(userId: string, since: number): number {
    const indexes = this.byUser.get(userId) ?? [];
    let count = 0;
    for (let i = indexes.length - 1; i >= 0; i--) {
      if (this.arena[indexes[i]].timestamp < since) break;
      count++;
    }
    return count;
  }

  recentForUser(userId: string, limit: number): InterventionRecord[] {
    const indexes = this.byUser.get(userId) ?? [];
    return indexes.slice(Math.max(0, indexes.length - limit)).map((i) => cloneRecord(this.arena[i]));
  }

  outcomeFor(id: string): InterventionOutcome | undefined {
    const index = this.amendments.get(id) ?? this.byId.get(id);
    const outcome = index === undefined ? undefined : this.arena[index].outcome;
    return outcome ? { ...outcome } : undefined;
  }

  list(): InterventionRecord[] {
    return [...this.byId.keys()]
      .map((id) => this.get(id))
      .filter((rec): rec is InterventionRecord => rec !== undefined)
      .sort((a, b) => a.timestamp - b.timestamp);
  }

  size(): number {
    return this.arena.length;
  }
}
