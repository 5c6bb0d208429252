import Database from "better-sqlite3";
import { PersistenceError } from "../errors.js";
import { logger } from "../utils/logger.js";
import { runMigrations } from "./migrations.js";

export type DB = Database.Database;

/**
 * Open the persistence store and bring its schema up to date.
 * Pass ":memory:" for a throwaway store.
 */
export function initDB(path: string): DB {
  logger.info({ path }, "Initializing database");

  let db: DB;
  try {
    db = new Database(path);
    if (path !== ":memory:") {
      db.pragma("journal_mode = WAL");
    }
    db.pragma("foreign_keys = ON");
    db.pragma("busy_timeout = 5000");
    runMigrations(db);
  } catch (error) {
    throw new PersistenceError("initDB", error);
  }

  logger.info("Database initialized");
  return db;
}

/**
 * Parse a JSON column. Undefined when the stored text is not valid JSON.
 */
export function readJson(raw: string, column: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    if (!(error instanceof SyntaxError)) throw error;
    logger.warn({ column, error: error.message }, "Stored JSON is unreadable");
    return undefined;
  }
}

/**
 * Close the database connection
 */
export function closeDB(db: DB): void {
  if (db.open) {
    db.close();
    logger.info("Database connection closed");
  }
}
