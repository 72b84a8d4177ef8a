/**
 * SQLite-backed history and weight persistence using better-sqlite3.
 *
 * Same append-only semantics as InMemoryHistoryStore: amended copies are
 * new rows with `amends` set, originals are never updated.
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { z } from 'zod';
import { CooldownViolationError, OutcomeConflictError, RecordNotFoundError } from '../core/errors.js';
import type { WeightStore } from '../strategies/types.js';
import { ensureDirSync } from '../utils/fs.js';
import { clamp01 } from '../utils/math.js';
import { ContextSnapshotSchema, OutcomeSchema } from './schema.js';
import type { InterventionHistoryStore, InterventionOutcome, InterventionRecord } from './types.js';

const RecordRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  strategy_name: z.string(),
  timestamp: z.number(),
  context: z.string(),
  outcome: z.string().nullable(),
  amends: z.string().nullable(),
});

const CountRowSchema = z.object({ count: z.number() });
const WeightRowSchema = z.object({ name: z.string(), weight: z.number() });

type RecordRow = z.infer<typeof RecordRowSchema>;

export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    ensureDirSync(dirname(dbPath));
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  return db;
}

export class SQLiteHistoryStore implements InterventionHistoryStore {
  private db: Database.Database;

  constructor(dbPathOrDb: string | Database.Database) {
    this.db = typeof dbPathOrDb === 'string' ? openDatabase(dbPathOrDb) : dbPathOrDb;

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS intervention_records (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        strategy_name TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        context TEXT NOT NULL,
        outcome TEXT,
        amends TEXT
      )
    `);
    this.db.exec(`
      CREATE UNIQUE INDEX IF NOT EXISTS idx_records_original
        ON intervention_records(id) WHERE amends IS NULL
    `);
    this.db.exec(`
      CREATE UNIQUE INDEX IF NOT EXISTS idx_records_amends
        ON intervention_records(amends) WHERE amends IS NOT NULL
    `);
    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_records_user_time
        ON intervention_records(user_id, timestamp)
    `);
  }

  record(rec: InterventionRecord, cooldownMs = 0): InterventionRecord {
    const insert = this.db.transaction((): void => {
      if (this.findOriginal(rec.id)) {
        throw new Error(`Duplicate intervention record id: ${rec.id}`);
      }

      if (cooldownMs > 0) {
        const rows = this.db
          .prepare(`
            SELECT timestamp FROM intervention_records
            WHERE user_id = ? AND strategy_name = ? AND amends IS NULL
              AND timestamp > ? AND timestamp < ?
            ORDER BY ABS(timestamp - ?) LIMIT 1
          `)
          .all(rec.userId, rec.strategyName, rec.timestamp - cooldownMs, rec.timestamp + cooldownMs, rec.timestamp);
        const nearest = rows.map((row) => z.object({ timestamp: z.number() }).parse(row))[0];
        if (nearest) {
          const gap = Math.abs(rec.timestamp - nearest.timestamp);
          throw new CooldownViolationError(rec.userId, rec.strategyName, cooldownMs - gap);
        }
      }

      this.db
        .prepare(`
          INSERT INTO intervention_records (id, user_id, strategy_name, timestamp, context, outcome, amends)
          VALUES (?, ?, ?, ?, ?, ?, NULL)
        `)
        .run(
          rec.id,
          rec.userId,
          rec.strategyName,
          rec.timestamp,
          JSON.stringify(rec.contextSnapshot),
          rec.outcome ? JSON.stringify(rec.outcome) : null,
        );
    });

    insert();
    const stored = this.findOriginal(rec.id);
    if (!stored) {
      throw new RecordNotFoundError(rec.id);
    }
    return stored;
  }

  get(id: string): InterventionRecord | undefined {
    const row = this.db
      .prepare('SELECT * FROM intervention_records WHERE amends = ?')
      .get(id);
    return row === undefined ? this.findOriginal(id) : this.toRecord(RecordRowSchema.parse(row));
  }

  attachOutcome(id: string, outcome: InterventionOutcome): InterventionRecord {
    const amend = this.db.transaction((): void => {
      const original = this.findOriginal(id);
      if (!original) {
        throw new RecordNotFoundError(id);
      }
      const existing = this.db.prepare('SELECT 1 AS found FROM intervention_records WHERE amends = ?').get(id);
      if (existing !== undefined) {
        throw new OutcomeConflictError(id);
      }

      const stored: InterventionOutcome = {
        effectiveness: clamp01(outcome.effectiveness),
        satisfaction: clamp01(outcome.satisfaction),
        completed: outcome.completed,
      };
      this.db
        .prepare(`
          INSERT INTO intervention_records (id, user_id, strategy_name, timestamp, context, outcome, amends)
          VALUES (?, ?, ?, ?, ?, ?, ?)
        `)
        .run(
          original.id,
          original.userId,
          original.strategyName,
          original.timestamp,
          JSON.stringify(original.contextSnapshot),
          JSON.stringify(stored),
          id,
        );
    });

    amend();
    const amended = this.get(id);
    if (!amended) {
      throw new RecordNotFoundError(id);
    }
    return amended;
  }

  lastFor(userId: string, strategyName: string): InterventionRecord | undefined {
    const row = this.db
      .prepare(`
        SELECT * FROM intervention_records
        WHERE user_id = ? AND strategy_name = ? AND amends IS NULL
        ORDER BY timestamp DESC, seq DESC LIMIT 1
      `)
      .get(userId, strategyName);
    return row === undefined ? undefined : this.toRecord(RecordRowSchema.parse(row));
  }

  lastForUser(userId: string): InterventionRecord | undefined {
    const row = this.db
      .prepare(`
        SELECT * FROM intervention_records
        WHERE user_id = ? AND amends IS NULL
        ORDER BY timestamp DESC, seq DESC LIMIT 1
      `)
      .get(userId);
    return row === undefined ? undefined : this.toRecord(RecordRowSchema.parse(row));
  }

  countSince(userId: string, since: number): number {
    const row = this.db
      .prepare(`
        SELECT COUNT(*) AS count FROM intervention_records
        WHERE user_id = ? AND amends IS NULL AND timestamp >= ?
      `)
      .get(userId, since);
    return CountRowSchema.parse(row).count;
  }

  recentForUser(userId: string, limit: number): InterventionRecord[] {
    const rows = this.db
      .prepare(`
        SELECT * FROM intervention_records
        WHERE user_id = ? AND amends IS NULL
        ORDER BY timestamp DESC, seq DESC LIMIT ?
      `)
      .all(userId, limit);
    return rows.map((row) => this.toRecord(RecordRowSchema.parse(row))).reverse();
  }

  outcomeFor(id: string): InterventionOutcome | undefined {
    return this.get(id)?.outcome;
  }

  list(): InterventionRecord[] {
    const rows = this.db
      .prepare(`
        SELECT o.id, o.user_id, o.strategy_name, o.timestamp, o.context,
               COALESCE(a.outcome, o.outcome) AS outcome, a.amends AS amends
        FROM intervention_records o
        LEFT JOIN intervention_records a ON a.amends = o.id
        WHERE o.amends IS NULL
        ORDER BY o.timestamp, o.seq
      `)
      .all();
    return rows.map((row) => this.toRecord(RecordRowSchema.parse(row)));
  }

  size(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM intervention_records').get();
    return CountRowSchema.parse(row).count;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private findOriginal(id: string): InterventionRecord | undefined {
    const row = this.db
      .prepare('SELECT * FROM intervention_records WHERE id = ? AND amends IS NULL')
      .get(id);
    return row === undefined ? undefined : this.toRecord(RecordRowSchema.parse(row));
  }

  private toRecord(row: RecordRow): InterventionRecord {
    const record: InterventionRecord = {
      id: row.id,
      userId: row.user_id,
      strategyName: row.strategy_name,
      timestamp: row.timestamp,
      contextSnapshot: ContextSnapshotSchema.parse(JSON.parse(row.context)),
    };
    if (row.outcome !== null) {
      record.outcome = OutcomeSchema.parse(JSON.parse(row.outcome));
    }
    if (row.amends !== null) {
      record.amends = row.amends;
    }
    return record;
  }
}

/**
 * Persists learned strategy weights next to the history log.
 */
export class SQLiteWeightStore implements WeightStore {
  private db: Database.Database;

  constructor(dbPathOrDb: string | Database.Database) {
    this.db = typeof dbPathOrDb === 'string' ? openDatabase(dbPathOrDb) : dbPathOrDb;
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS strategy_weights (
        name TEXT PRIMARY KEY,
        weight REAL NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);
  }

  load(): Record<string, number> {
    const rows = this.db.prepare('SELECT name, weight FROM strategy_weights').all();
    const weights: Record<string, number> = {};
    for (const row of rows) {
      const parsed = WeightRowSchema.parse(row);
      weights[parsed.name] = parsed.weight;
    }
    return weights;
  }

  save(name: string, weight: number): void {
    this.db
      .prepare(`
        INSERT INTO strategy_weights (name, weight, updated_at) VALUES (?, ?, ?)
        ON CONFLICT(name) DO UPDATE SET weight = excluded.weight, updated_at = excluded.updated_at
      `)
      .run(name, weight, Date.now());
  }
}
