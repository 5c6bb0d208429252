import { z } from "zod";
import { resolveThreadId, type ConnectionIdentity, type ThreadId } from "../agent/identity.js";
import { withPersistence } from "../errors.js";
import { logger } from "../utils/logger.js";
import { readJson, type DB } from "./client.js";
import type { SessionRow } from "./schema.js";

const metadataSchema = z.record(z.unknown());

export type Metadata = z.infer<typeof metadataSchema>;

export interface Session extends ConnectionIdentity {
  threadId: ThreadId;
  createdAt: number;
  lastActiveAt: number;
  metadata: Metadata;
}

export function parseMetadata(raw: string | null): Metadata {
  if (!raw) return {};
  const parsed = metadataSchema.safeParse(readJson(raw, "metadata"));
  return parsed.success ? parsed.data : {};
}

function toSession(row: SessionRow): Session {
  return {
    threadId: row.thread_id,
    host: row.host,
    user: row.user,
    database: row.db_name,
    createdAt: row.created_at,
    lastActiveAt: row.last_active_at,
    metadata: parseMetadata(row.metadata),
  };
}

/**
 * Durable record of one conversation thread per target database.
 */
export class SessionStore {
  constructor(
    private readonly db: DB,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Create the session for this triple if it is new, otherwise only advance
   * its last-active time. A single statement, so concurrent callers converge
   * on the same row.
   */
  ensureSession(host: string, user: string, database: string, metadata: Metadata = {}): ThreadId {
    const threadId = resolveThreadId(host, user, database);
    const now = this.now();

    const info = withPersistence("ensureSession", () =>
      this.db
        .prepare(
          `INSERT INTO sessions (thread_id, db_name, host, user, created_at, last_active_at, metadata)
           VALUES (?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(thread_id) DO UPDATE
             SET last_active_at = MAX(sessions.last_active_at, excluded.last_active_at)`
        )
        .run(threadId, database, host, user, now, now, JSON.stringify(metadata))
    );

    logger.debug({ threadId, database, changes: info.changes }, "Ensured session");
    return threadId;
  }

  /**
   * Advance last-active without touching anything else
   */
  touch(threadId: ThreadId): boolean {
    const info = withPersistence("touch", () =>
      this.db
        .prepare("UPDATE sessions SET last_active_at = MAX(last_active_at, ?) WHERE thread_id = ?")
        .run(this.now(), threadId)
    );
    return info.changes > 0;
  }

  get(threadId: ThreadId): Session | null {
    const row = withPersistence("getSession", () =>
      this.db.prepare<[string], SessionRow>("SELECT * FROM sessions WHERE thread_id = ?").get(threadId)
    );
    return row ? toSession(row) : null;
  }

  /**
   * Sessions reachable with one set of credentials, most recent first
   */
  listFor(host: string, user: string, limit: number = 10): Session[] {
    const rows = withPersistence("listSessionsFor", () =>
      this.db
        .prepare<[string, string, number], SessionRow>(
          "SELECT * FROM sessions WHERE host = ? AND user = ? ORDER BY last_active_at DESC LIMIT ?"
        )
        .all(host, user, limit)
    );
    return rows.map(toSession);
  }

  /**
   * Delete a session. Messages, schema cache and summary cascade with it;
   * query history is left in place.
   */
  purge(threadId: ThreadId): boolean {
    const info = withPersistence("purge", () =>
      this.db.prepare("DELETE FROM sessions WHERE thread_id = ?").run(threadId)
    );
    logger.info({ threadId, deleted: info.changes }, "Purged session");
    return info.changes > 0;
  }
}
