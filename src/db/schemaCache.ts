import type { ThreadId } from "../agent/identity.js";
import { withPersistence } from "../errors.js";
import { schemaSnapshotSchema, type SchemaSnapshot } from "../target/types.js";
import { logger } from "../utils/logger.js";
import { readJson, type DB } from "./client.js";
import type { SchemaCacheRow } from "./schema.js";

export interface CachedSchema {
  database: string;
  snapshot: SchemaSnapshot;
  tableCount: number;
  refreshedAt: number;
  ageMs: number;
}

/**
 * Whether a cache entry should be refreshed under a max-age policy.
 * A max age of 0 means entries never go stale on their own.
 */
export function isStale(entry: CachedSchema | null, maxAgeMs: number): boolean {
  if (!entry) return true;
  if (maxAgeMs <= 0) return false;
  return entry.ageMs > maxAgeMs;
}

/**
 * One structural snapshot per thread. Refresh replaces; staleness policy is
 * the caller's business, the cache only reports age.
 */
export class SchemaCache {
  constructor(
    private readonly db: DB,
    private readonly now: () => number = Date.now
  ) {}

  refresh(threadId: ThreadId, snapshot: SchemaSnapshot): CachedSchema {
    const refreshedAt = this.now();
    const tableCount = snapshot.tables.length;

    withPersistence("refreshSchema", () =>
      this.db
        .prepare(
          `INSERT INTO schema_cache (thread_id, db_name, schema_snapshot, table_count, refreshed_at)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(thread_id) DO UPDATE SET
             db_name = excluded.db_name,
             schema_snapshot = excluded.schema_snapshot,
             table_count = excluded.table_count,
             refreshed_at = excluded.refreshed_at`
        )
        .run(threadId, snapshot.database, JSON.stringify(snapshot), tableCount, refreshedAt)
    );

    logger.info({ threadId, database: snapshot.database, tableCount }, "Schema cache refreshed");

    return { database: snapshot.database, snapshot, tableCount, refreshedAt, ageMs: 0 };
  }

  /**
   * Null means the thread was never refreshed.
   */
  get(threadId: ThreadId): CachedSchema | null {
    const row = withPersistence("getSchema", () =>
      this.db.prepare<[string], SchemaCacheRow>("SELECT * FROM schema_cache WHERE thread_id = ?").get(threadId)
    );
    if (!row) return null;

    const parsed = schemaSnapshotSchema.safeParse(readJson(row.schema_snapshot, "schema_snapshot"));
    if (!parsed.success) {
      logger.warn({ threadId }, "Cached schema failed validation; treating as absent");
      return null;
    }

    return {
      database: row.db_name,
      snapshot: parsed.data,
      tableCount: row.table_count,
      refreshedAt: row.refreshed_at,
      ageMs: Math.max(0, this.now() - row.refreshed_at),
    };
  }
}
