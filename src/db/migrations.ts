import type Database from "better-sqlite3";
import { logger } from "../utils/logger.js";
import { SCHEMA_SQL } from "./schema.js";

/**
 * Migration system for database schema changes
 */

interface Migration {
  id: number;
  name: string;
  sql: string;
}

/**
 * List of migrations in order. Append new entries; never edit applied ones.
 */
export const migrations: Migration[] = [
  {
    id: 1,
    name: "initial_schema",
    sql: SCHEMA_SQL,
  },
];

function initMigrationsTable(db: Database.Database) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS migrations (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    );
  `);
}

function getAppliedMigrations(db: Database.Database): Set<number> {
  const rows = db.prepare<[], { id: number }>("SELECT id FROM migrations").all();
  return new Set(rows.map((r) => r.id));
}

/**
 * Apply a single migration inside a transaction together with its ledger row
 */
function applyMigration(db: Database.Database, migration: Migration) {
  logger.info({ migrationId: migration.id, name: migration.name }, "Applying migration");

  db.transaction(() => {
    db.exec(migration.sql);
    db.prepare("INSERT INTO migrations (id, name, applied_at) VALUES (?, ?, ?)").run(
      migration.id,
      migration.name,
      Date.now()
    );
  })();

  logger.info({ migrationId: migration.id }, "Migration applied");
}

/**
 * Run all pending migrations. Returns the ids that were applied.
 */
export function runMigrations(db: Database.Database): number[] {
  initMigrationsTable(db);

  const applied = getAppliedMigrations(db);
  const pending = migrations.filter((m) => !applied.has(m.id));

  if (pending.length === 0) {
    logger.debug("No pending migrations");
    return [];
  }

  logger.info({ count: pending.length }, "Running migrations");

  for (const migration of pending) {
    applyMigration(db, migration);
  }

  logger.info("All migrations completed");
  return pending.map((m) => m.id);
}
