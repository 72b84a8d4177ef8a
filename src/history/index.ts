export { InMemoryHistoryStore } from './memory-store.js';
export { openDatabase, SQLiteHistoryStore, SQLiteWeightStore } from './sqlite-store.js';
export { withRecentInteractions } from './merged-history.js';
export { snapshotContext } from './snapshot.js';
export { InterventionRecordSchema, OutcomeSchema } from './schema.js';
export type {
  ContextSnapshot,
  HistoryReader,
  InterventionHistoryStore,
  InterventionOutcome,
  InterventionRecord,
} from './types.js';
