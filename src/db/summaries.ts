import type { ThreadId } from "../agent/identity.js";
import { withPersistence } from "../errors.js";
import type { DB } from "./client.js";
import type { ConversationSummaryRow } from "./schema.js";

export interface ConversationSummary {
  threadId: ThreadId;
  summaryText: string;
  summarizedUpToSeq: number;
  foldedCount: number;
  createdAt: number;
  updatedAt: number;
}

function toSummary(row: ConversationSummaryRow): ConversationSummary {
  return {
    threadId: row.thread_id,
    summaryText: row.summary_text,
    summarizedUpToSeq: row.summarized_up_to_seq,
    foldedCount: row.message_count_summarized,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * At most one rolling summary per thread. Written only by the compactor.
 */
export class SummaryStore {
  constructor(
    private readonly db: DB,
    private readonly now: () => number = Date.now
  ) {}

  get(threadId: ThreadId): ConversationSummary | null {
    const row = withPersistence("getSummary", () =>
      this.db
        .prepare<[string], ConversationSummaryRow>("SELECT * FROM conversation_summary WHERE thread_id = ?")
        .get(threadId)
    );
    return row ? toSummary(row) : null;
  }

  /**
   * Replace the summary in one statement. The upsert only lands when it moves
   * `summarized_up_to_seq` forward; returns false when it was refused.
   */
  save(threadId: ThreadId, summaryText: string, summarizedUpToSeq: number, foldedCount: number): boolean {
    const now = this.now();
    const info = withPersistence("saveSummary", () =>
      this.db
        .prepare(
          `INSERT INTO conversation_summary
             (thread_id, summary_text, summarized_up_to_seq, message_count_summarized, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT(thread_id) DO UPDATE SET
             summary_text = excluded.summary_text,
             summarized_up_to_seq = excluded.summarized_up_to_seq,
             message_count_summarized = excluded.message_count_summarized,
             updated_at = excluded.updated_at
           WHERE excluded.summarized_up_to_seq > conversation_summary.summarized_up_to_seq`
        )
        .run(threadId, summaryText, summarizedUpToSeq, foldedCount, now, now)
    );
    return info.changes > 0;
  }
}
