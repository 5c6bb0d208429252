import type { ThreadId } from "../agent/identity.js";
import { errorMessage, withPersistence } from "../errors.js";
import { logger } from "../utils/logger.js";
import type { DB } from "./client.js";
import type { QueryHistoryRow } from "./schema.js";

export interface QueryHistoryEntry {
  threadId: ThreadId;
  messageId: string | null;
  sqlText: string;
  executionMs: number;
  rowsAffected: number;
  success: boolean;
  errorMessage: string | null;
  executedAt?: number;
}

export interface RecordedQuery extends Required<QueryHistoryEntry> {
  id: number;
}

function toRecorded(row: QueryHistoryRow): RecordedQuery {
  return {
    id: row.id,
    threadId: row.thread_id,
    messageId: row.message_id,
    sqlText: row.sql_query,
    executionMs: row.execution_ms,
    rowsAffected: row.rows_affected,
    success: row.success === 1,
    errorMessage: row.error_message,
    executedAt: row.executed_at,
  };
}

/**
 * Append-only audit trail of every execution attempt.
 */
export class QueryHistory {
  constructor(
    private readonly db: DB,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Write one audit row. Never throws: an audit failure is logged and the
   * caller's turn carries on. Returns whether the row was written.
   */
  record(entry: QueryHistoryEntry): boolean {
    try {
      this.db
        .prepare(
          `INSERT INTO query_history
             (thread_id, message_id, sql_query, execution_ms, rows_affected, success, error_message, executed_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          entry.threadId,
          entry.messageId,
          entry.sqlText,
          Math.round(entry.executionMs),
          entry.rowsAffected,
          entry.success ? 1 : 0,
          entry.errorMessage,
          entry.executedAt ?? this.now()
        );
      return true;
    } catch (error) {
      logger.error(
        { threadId: entry.threadId, success: entry.success, error: errorMessage(error) },
        "Failed to record query history"
      );
      return false;
    }
  }

  /**
   * Entries for a thread, oldest first, capped at `limit` most recent
   */
  list(threadId: ThreadId, limit: number = 50): RecordedQuery[] {
    const rows = withPersistence("listQueryHistory", () =>
      this.db
        .prepare<[string, number], QueryHistoryRow>(
          "SELECT * FROM query_history WHERE thread_id = ? ORDER BY id DESC LIMIT ?"
        )
        .all(threadId, limit)
    );
    return rows.reverse().map(toRecorded);
  }
}
