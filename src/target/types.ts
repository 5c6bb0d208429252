import { z } from "zod";

/**
 * Structural snapshot of a target database, as cached per thread.
 */
export const columnDescriptorSchema = z.object({
  name: z.string(),
  type: z.string(),
  nullable: z.boolean(),
  defaultValue: z.string().nullable(),
  primaryKey: z.boolean(),
});

export const foreignKeyDescriptorSchema = z.object({
  column: z.string(),
  referencedTable: z.string(),
  referencedColumn: z.string(),
});

export const tableDescriptorSchema = z.object({
  name: z.string(),
  columns: z.array(columnDescriptorSchema),
  primaryKey: z.array(z.string()),
  foreignKeys: z.array(foreignKeyDescriptorSchema),
});

export const schemaSnapshotSchema = z.object({
  database: z.string(),
  tables: z.array(tableDescriptorSchema),
  views: z.array(z.string()).default([]),
});

export type ColumnDescriptor = z.infer<typeof columnDescriptorSchema>;
export type ForeignKeyDescriptor = z.infer<typeof foreignKeyDescriptorSchema>;
export type TableDescriptor = z.infer<typeof tableDescriptorSchema>;
export type SchemaSnapshot = z.infer<typeof schemaSnapshotSchema>;

export const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export type Cell = z.infer<typeof cellSchema>;

export const executionResultSchema = z.object({
  columns: z.array(z.string()),
  rows: z.array(z.array(cellSchema)),
  rowsAffected: z.number(),
  lastInsertId: z.number().nullable(),
});

export type ExecutionResult = z.infer<typeof executionResultSchema>;

export interface ExecuteOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * A SQL-speaking relational database the user converses with.
 * `execute` rejects with a DatabaseError carrying the database's own message.
 */
export interface TargetDatabase {
  readonly dialect: "mysql" | "sqlite";
  execute(sql: string, options?: ExecuteOptions): Promise<ExecutionResult>;
  describe(): Promise<SchemaSnapshot>;
  close(): Promise<void>;
}

/**
 * Normalize a driver value into something that survives JSON storage.
 */
export function toCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString("hex");
  return JSON.stringify(value);
}
