/**
 * Persistence schema: row types as stored, plus the DDL for each table.
 * Timestamps are epoch milliseconds; JSON columns hold text.
 */

export type MessageRole = "user" | "assistant" | "system" | "tool";

export interface SessionRow {
  thread_id: string;
  db_name: string;
  host: string;
  user: string;
  created_at: number;
  last_active_at: number;
  metadata: string;
}

export interface MessageRow {
  id: string;
  thread_id: string;
  sequence_no: number;
  role: MessageRole;
  content: string;
  sql_query: string | null;
  query_result: string | null;
  tokens_used: number;
  created_at: number;
  metadata: string;
}

export interface SchemaCacheRow {
  thread_id: string;
  db_name: string;
  schema_snapshot: string;
  table_count: number;
  refreshed_at: number;
}

export interface ConversationSummaryRow {
  thread_id: string;
  summary_text: string;
  summarized_up_to_seq: number;
  message_count_summarized: number;
  created_at: number;
  updated_at: number;
}

export interface QueryHistoryRow {
  id: number;
  thread_id: string;
  message_id: string | null;
  sql_query: string;
  execution_ms: number;
  rows_affected: number;
  success: 0 | 1;
  error_message: string | null;
  executed_at: number;
}

export const SCHEMA_SQL = `
-- One conversation thread per (host, user, database)
CREATE TABLE IF NOT EXISTS sessions (
  thread_id TEXT PRIMARY KEY,
  db_name TEXT NOT NULL,
  host TEXT NOT NULL,
  user TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  last_active_at INTEGER NOT NULL,
  metadata TEXT NOT NULL DEFAULT '{}'
);

CREATE INDEX IF NOT EXISTS idx_sessions_db_name ON sessions(db_name);
CREATE INDEX IF NOT EXISTS idx_sessions_last_active ON sessions(last_active_at);

CREATE TABLE IF NOT EXISTS messages (
  id TEXT PRIMARY KEY,
  thread_id TEXT NOT NULL REFERENCES sessions(thread_id) ON DELETE CASCADE,
  sequence_no INTEGER NOT NULL,
  role TEXT NOT NULL CHECK(role IN ('user', 'assistant', 'system', 'tool')),
  content TEXT NOT NULL,
  sql_query TEXT,
  query_result TEXT,
  tokens_used INTEGER NOT NULL DEFAULT 0,
  created_at INTEGER NOT NULL,
  metadata TEXT NOT NULL DEFAULT '{}',
  UNIQUE (thread_id, sequence_no)
);

CREATE INDEX IF NOT EXISTS idx_messages_thread_seq ON messages(thread_id, sequence_no);

CREATE TABLE IF NOT EXISTS schema_cache (
  thread_id TEXT PRIMARY KEY REFERENCES sessions(thread_id) ON DELETE CASCADE,
  db_name TEXT NOT NULL,
  schema_snapshot TEXT NOT NULL,
  table_count INTEGER NOT NULL DEFAULT 0,
  refreshed_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS conversation_summary (
  thread_id TEXT PRIMARY KEY REFERENCES sessions(thread_id) ON DELETE CASCADE,
  summary_text TEXT NOT NULL,
  summarized_up_to_seq INTEGER NOT NULL,
  message_count_summarized INTEGER NOT NULL,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

-- Audit trail; message_id is a weak reference and outlives purges
CREATE TABLE IF NOT EXISTS query_history (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  thread_id TEXT NOT NULL,
  message_id TEXT,
  sql_query TEXT NOT NULL,
  execution_ms INTEGER NOT NULL DEFAULT 0,
  rows_affected INTEGER NOT NULL DEFAULT 0,
  success INTEGER NOT NULL CHECK(success IN (0, 1)),
  error_message TEXT,
  executed_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_query_history_thread ON query_history(thread_id, id);
CREATE INDEX IF NOT EXISTS idx_query_history_time ON query_history(executed_at);
`;
