import Database from "better-sqlite3";
import { z } from "zod";
import { DatabaseError, errorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";
import {
  toCell,
  type ExecuteOptions,
  type ExecutionResult,
  type SchemaSnapshot,
  type TableDescriptor,
  type TargetDatabase,
} from "./types.js";

const tableInfoRow = z.object({
  name: z.string(),
  type: z.string(),
  notnull: z.number(),
  dflt_value: z.string().nullable(),
  pk: z.number(),
});

const foreignKeyRow = z.object({
  table: z.string(),
  from: z.string(),
  to: z.string().nullable(),
});

const masterRow = z.object({
  name: z.string(),
  type: z.enum(["table", "view"]),
});

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * SQLite target backed by better-sqlite3. Statements run synchronously, so
 * every call owns the handle for its whole duration.
 */
export class SqliteTarget implements TargetDatabase {
  readonly dialect = "sqlite" as const;
  private db: Database.Database;
  private readonly name: string;

  constructor(filename: string, name?: string) {
    this.db = new Database(filename);
    this.name = name ?? filename;
    logger.debug({ filename }, "Opened SQLite target");
  }

  async execute(sql: string, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    if (options.signal?.aborted) {
      throw new DatabaseError("Statement cancelled before execution", "ABORTED");
    }

    const started = Date.now();
    let result: ExecutionResult;
    try {
      const stmt = this.db.prepare(sql);
      if (stmt.reader) {
        const rows = stmt.raw(true).all();
        result = {
          columns: stmt.columns().map((c) => c.name),
          rows: rows.map((row) => (Array.isArray(row) ? row.map(toCell) : [toCell(row)])),
          rowsAffected: 0,
          lastInsertId: null,
        };
      } else {
        const info = stmt.run();
        result = {
          columns: [],
          rows: [],
          rowsAffected: info.changes,
          lastInsertId: info.changes > 0 ? Number(info.lastInsertRowid) : null,
        };
      }
    } catch (error) {
      const code =
        error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : null;
      throw new DatabaseError(errorMessage(error), code, error);
    }

    // better-sqlite3 cannot interrupt a running statement, and by now a write has committed
    const elapsed = Date.now() - started;
    if (options.timeoutMs !== undefined && elapsed > options.timeoutMs) {
      logger.warn({ elapsed, timeoutMs: options.timeoutMs }, "Statement overran its timeout");
    }
    return result;
  }

  async describe(): Promise<SchemaSnapshot> {
    const objects = z
      .array(masterRow)
      .parse(
        this.db
          .prepare(
            "SELECT name, type FROM sqlite_master WHERE type IN ('table', 'view') AND name NOT LIKE 'sqlite_%' ORDER BY name"
          )
          .all()
      );

    const tables: TableDescriptor[] = [];
    for (const obj of objects.filter((o) => o.type === "table")) {
      const columns = z.array(tableInfoRow).parse(this.db.prepare(`PRAGMA table_info(${quoteIdent(obj.name)})`).all());
      const fks = z.array(foreignKeyRow).parse(this.db.prepare(`PRAGMA foreign_key_list(${quoteIdent(obj.name)})`).all());

      tables.push({
        name: obj.name,
        columns: columns.map((c) => ({
          name: c.name,
          type: c.type || "ANY",
          nullable: c.notnull === 0 && c.pk === 0,
          defaultValue: c.dflt_value,
          primaryKey: c.pk > 0,
        })),
        primaryKey: columns
          .filter((c) => c.pk > 0)
          .sort((a, b) => a.pk - b.pk)
          .map((c) => c.name),
        foreignKeys: fks.map((fk) => ({
          column: fk.from,
          referencedTable: fk.table,
          referencedColumn: fk.to ?? "rowid",
        })),
      });
    }

    return {
      database: this.name,
      tables,
      views: objects.filter((o) => o.type === "view").map((o) => o.name),
    };
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}
