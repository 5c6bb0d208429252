import mysql, { type Pool } from "mysql2/promise";
import { z } from "zod";
import { DatabaseError, TimeoutError, errorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";
import {
  toCell,
  type ExecuteOptions,
  type ExecutionResult,
  type SchemaSnapshot,
  type TableDescriptor,
  type TargetDatabase,
} from "./types.js";

export interface MySqlTargetOptions {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  poolSize: number;
}

const columnRow = z.object({
  TABLE_NAME: z.string(),
  COLUMN_NAME: z.string(),
  COLUMN_TYPE: z.string(),
  IS_NULLABLE: z.string(),
  COLUMN_DEFAULT: z.union([z.string(), z.number()]).nullable(),
  COLUMN_KEY: z.string(),
});

const keyRow = z.object({
  TABLE_NAME: z.string(),
  COLUMN_NAME: z.string(),
  REFERENCED_TABLE_NAME: z.string(),
  REFERENCED_COLUMN_NAME: z.string(),
});

const tableRow = z.object({
  TABLE_NAME: z.string(),
  TABLE_TYPE: z.string(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Convert whatever mysql2 returned for one statement into an ExecutionResult.
 * Reads come back as an array of row objects; writes as a ResultSetHeader.
 */
export function toExecutionResult(result: unknown, fields: unknown): ExecutionResult {
  if (Array.isArray(result)) {
    const columns = Array.isArray(fields)
      ? fields.filter(isRecord).map((f) => String(f.name))
      : [];
    const rows = result.filter(isRecord);
    const names = columns.length > 0 ? columns : Object.keys(rows[0] ?? {});
    return {
      columns: names,
      rows: rows.map((row) => names.map((name) => toCell(row[name]))),
      rowsAffected: 0,
      lastInsertId: null,
    };
  }

  if (isRecord(result)) {
    const affected = typeof result.affectedRows === "number" ? result.affectedRows : 0;
    const insertId = typeof result.insertId === "number" && result.insertId > 0 ? result.insertId : null;
    return { columns: [], rows: [], rowsAffected: affected, lastInsertId: insertId };
  }

  return { columns: [], rows: [], rowsAffected: 0, lastInsertId: null };
}

function toDatabaseError(error: unknown): DatabaseError | TimeoutError {
  if (error instanceof DatabaseError || error instanceof TimeoutError) return error;
  const code =
    error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : null;
  return new DatabaseError(errorMessage(error), code, error);
}

/**
 * MySQL target over a mysql2 pool. Each statement borrows one connection and
 * holds it exclusively until the statement settles.
 */
export class MySqlTarget implements TargetDatabase {
  readonly dialect = "mysql" as const;
  private pool: Pool;
  private readonly database: string;

  constructor(options: MySqlTargetOptions) {
    this.database = options.database;
    this.pool = mysql.createPool({
      host: options.host,
      port: options.port,
      user: options.user,
      password: options.password,
      database: options.database,
      connectionLimit: options.poolSize,
      waitForConnections: true,
      dateStrings: true,
      supportBigNumbers: true,
    });
    logger.info({ host: options.host, database: options.database }, "Created MySQL target pool");
  }

  async execute(sql: string, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    if (options.signal?.aborted) {
      throw new DatabaseError("Statement cancelled before execution", "ABORTED");
    }

    const conn = await this.pool.getConnection().catch((error: unknown) => {
      throw toDatabaseError(error);
    });

    // The signal may have fired while we waited on the pool
    if (options.signal?.aborted) {
      conn.release();
      throw new DatabaseError("Statement cancelled before execution", "ABORTED");
    }

    let destroyed = false;
    const onAbort = () => {
      // Killing the socket is the only way to stop an in-flight statement
      destroyed = true;
      conn.destroy();
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const [result, fields] = await conn.query({ sql, timeout: options.timeoutMs });
      return toExecutionResult(result, fields);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "PROTOCOL_SEQUENCE_TIMEOUT") {
        throw new TimeoutError("execution", options.timeoutMs ?? 0);
      }
      throw toDatabaseError(error);
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
      if (!destroyed) {
        conn.release();
      }
    }
  }

  async describe(): Promise<SchemaSnapshot> {
    const [tableRows] = await this.pool.query(
      "SELECT TABLE_NAME, TABLE_TYPE FROM information_schema.TABLES WHERE TABLE_SCHEMA = ? ORDER BY TABLE_NAME",
      [this.database]
    );
    const [columnRows] = await this.pool.query(
      `SELECT TABLE_NAME, COLUMN_NAME, COLUMN_TYPE, IS_NULLABLE, COLUMN_DEFAULT, COLUMN_KEY
         FROM information_schema.COLUMNS
        WHERE TABLE_SCHEMA = ?
        ORDER BY TABLE_NAME, ORDINAL_POSITION`,
      [this.database]
    );
    const [keyRows] = await this.pool.query(
      `SELECT TABLE_NAME, COLUMN_NAME, REFERENCED_TABLE_NAME, REFERENCED_COLUMN_NAME
         FROM information_schema.KEY_COLUMN_USAGE
        WHERE TABLE_SCHEMA = ? AND REFERENCED_TABLE_NAME IS NOT NULL`,
      [this.database]
    );

    const objects = z.array(tableRow).parse(tableRows);
    const columns = z.array(columnRow).parse(columnRows);
    const keys = z.array(keyRow).parse(keyRows);

    const tables: TableDescriptor[] = objects
      .filter((t) => t.TABLE_TYPE === "BASE TABLE")
      .map((t) => {
        const own = columns.filter((c) => c.TABLE_NAME === t.TABLE_NAME);
        return {
          name: t.TABLE_NAME,
          columns: own.map((c) => ({
            name: c.COLUMN_NAME,
            type: c.COLUMN_TYPE,
            nullable: c.IS_NULLABLE === "YES",
            defaultValue: c.COLUMN_DEFAULT === null ? null : String(c.COLUMN_DEFAULT),
            primaryKey: c.COLUMN_KEY === "PRI",
          })),
          primaryKey: own.filter((c) => c.COLUMN_KEY === "PRI").map((c) => c.COLUMN_NAME),
          foreignKeys: keys
            .filter((k) => k.TABLE_NAME === t.TABLE_NAME)
            .map((k) => ({
              column: k.COLUMN_NAME,
              referencedTable: k.REFERENCED_TABLE_NAME,
              referencedColumn: k.REFERENCED_COLUMN_NAME,
            })),
        };
      });

    return {
      database: this.database,
      tables,
      views: objects.filter((t) => t.TABLE_TYPE === "VIEW").map((t) => t.TABLE_NAME),
    };
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info({ database: this.database }, "Closed MySQL target pool");
  }
}
