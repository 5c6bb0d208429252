import type { DB } from "./client.js";
import { MessageLog } from "./messages.js";
import { QueryHistory } from "./queryHistory.js";
import { SchemaCache } from "./schemaCache.js";
import { SessionStore } from "./sessions.js";
import { SummaryStore } from "./summaries.js";

export { initDB, closeDB, type DB } from "./client.js";
export { runMigrations } from "./migrations.js";
export { SessionStore, type Session, type Metadata } from "./sessions.js";
export { MessageLog, type Message, type AppendOptions } from "./messages.js";
export { SchemaCache, isStale, type CachedSchema } from "./schemaCache.js";
export { SummaryStore, type ConversationSummary } from "./summaries.js";
export { QueryHistory, type QueryHistoryEntry, type RecordedQuery } from "./queryHistory.js";
export type { MessageRole } from "./schema.js";

export interface Stores {
  sessions: SessionStore;
  messages: MessageLog;
  schemaCache: SchemaCache;
  summaries: SummaryStore;
  history: QueryHistory;
}

/**
 * Build every store over one handle, sharing a clock.
 */
export function createStores(db: DB, now: () => number = Date.now): Stores {
  return {
    sessions: new SessionStore(db, now),
    messages: new MessageLog(db, now),
    schemaCache: new SchemaCache(db, now),
    summaries: new SummaryStore(db, now),
    history: new QueryHistory(db, now),
  };
}
