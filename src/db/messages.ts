import { randomUUID } from "node:crypto";
import type { ThreadId } from "../agent/identity.js";
import { withPersistence } from "../errors.js";
import { executionResultSchema, type ExecutionResult } from "../target/types.js";
import { logger } from "../utils/logger.js";
import { readJson, type DB } from "./client.js";
import type { MessageRole, MessageRow } from "./schema.js";
import { parseMetadata, type Metadata } from "./sessions.js";

export interface Message {
  id: string;
  threadId: ThreadId;
  sequenceNo: number;
  role: MessageRole;
  content: string;
  sqlText: string | null;
  result: ExecutionResult | null;
  tokensUsed: number;
  createdAt: number;
  metadata: Metadata;
}

export interface AppendOptions {
  sqlText?: string | null;
  result?: ExecutionResult | null;
  tokensUsed?: number;
  metadata?: Metadata;
}

function parseResult(raw: string | null): ExecutionResult | null {
  if (raw === null) return null;
  const parsed = executionResultSchema.safeParse(readJson(raw, "query_result"));
  if (!parsed.success) {
    logger.warn({ issues: parsed.error.issues.length }, "Stored query result failed validation");
    return null;
  }
  return parsed.data;
}

function toMessage(row: MessageRow): Message {
  return {
    id: row.id,
    threadId: row.thread_id,
    sequenceNo: row.sequence_no,
    role: row.role,
    content: row.content,
    sqlText: row.sql_query,
    result: parseResult(row.query_result),
    tokensUsed: row.tokens_used,
    createdAt: row.created_at,
    metadata: parseMetadata(row.metadata),
  };
}

/**
 * Append-only, strictly ordered record of every turn in a thread.
 */
export class MessageLog {
  constructor(
    private readonly db: DB,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Persist a message under the next sequence number of its thread.
   * Numbering and insert share one IMMEDIATE transaction, so the write is
   * all-or-nothing and two writers cannot claim the same number.
   */
  append(threadId: ThreadId, role: MessageRole, content: string, options: AppendOptions = {}): Message {
    const id = randomUUID();
    const createdAt = this.now();
    const sqlText = options.sqlText ?? null;
    const result = options.result ?? null;
    const tokensUsed = options.tokensUsed ?? 0;
    const metadata = options.metadata ?? {};

    const insert = this.db.transaction(() => {
      const next = this.db
        .prepare<[string], { next: number }>(
          "SELECT COALESCE(MAX(sequence_no), 0) + 1 AS next FROM messages WHERE thread_id = ?"
        )
        .get(threadId);
      const sequenceNo = next?.next ?? 1;

      this.db
        .prepare(
          `INSERT INTO messages
             (id, thread_id, sequence_no, role, content, sql_query, query_result, tokens_used, created_at, metadata)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          id,
          threadId,
          sequenceNo,
          role,
          content,
          sqlText,
          result ? JSON.stringify(result) : null,
          tokensUsed,
          createdAt,
          JSON.stringify(metadata)
        );
      return sequenceNo;
    });

    const sequenceNo = withPersistence("appendMessage", () => insert.immediate());

    logger.debug({ threadId, role, sequenceNo }, "Appended message");

    return { id, threadId, sequenceNo, role, content, sqlText, result, tokensUsed, createdAt, metadata };
  }

  /**
   * Messages with `fromSeq <= sequence_no <= toSeq`, ascending.
   */
  readRange(threadId: ThreadId, fromSeq: number, toSeq: number | "latest" = "latest"): Message[] {
    const upper = toSeq === "latest" ? Number.MAX_SAFE_INTEGER : toSeq;
    const rows = withPersistence("readRange", () =>
      this.db
        .prepare<[string, number, number], MessageRow>(
          `SELECT * FROM messages
            WHERE thread_id = ? AND sequence_no >= ? AND sequence_no <= ?
            ORDER BY sequence_no ASC`
        )
        .all(threadId, fromSeq, upper)
    );
    return rows.map(toMessage);
  }

  /**
   * Messages strictly after `afterSeq`. With a limit, the most recent `limit`
   * of them, still ascending.
   */
  readAfter(threadId: ThreadId, afterSeq: number, limit?: number): Message[] {
    if (limit === undefined) {
      return this.readRange(threadId, afterSeq + 1, "latest");
    }
    const rows = withPersistence("readAfter", () =>
      this.db
        .prepare<[string, number, number], MessageRow>(
          `SELECT * FROM messages
            WHERE thread_id = ? AND sequence_no > ?
            ORDER BY sequence_no DESC
            LIMIT ?`
        )
        .all(threadId, afterSeq, limit)
    );
    return rows.reverse().map(toMessage);
  }

  /**
   * Most recent `n` messages, ascending
   */
  recent(threadId: ThreadId, n: number): Message[] {
    return this.readAfter(threadId, 0, n);
  }

  /**
   * Highest sequence number in the thread, 0 when empty
   */
  latestSequence(threadId: ThreadId): number {
    const row = withPersistence("latestSequence", () =>
      this.db
        .prepare<[string], { latest: number }>(
          "SELECT COALESCE(MAX(sequence_no), 0) AS latest FROM messages WHERE thread_id = ?"
        )
        .get(threadId)
    );
    return row?.latest ?? 0;
  }

  countAfter(threadId: ThreadId, afterSeq: number): number {
    const row = withPersistence("countAfter", () =>
      this.db
        .prepare<[string, number], { total: number }>(
          "SELECT COUNT(*) AS total FROM messages WHERE thread_id = ? AND sequence_no > ?"
        )
        .get(threadId, afterSeq)
    );
    return row?.total ?? 0;
  }

  count(threadId: ThreadId): number {
    return this.countAfter(threadId, 0);
  }
}
