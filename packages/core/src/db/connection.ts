/**
 * SQLite database connection management.
 * Uses the better-sqlite3 sync API.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

/**
 * Open or create a SQLite database at the given path.
 * Ensures the parent directory exists and enables WAL so the CLI can
 * read while the daemon writes.
 */
export function openDatabase(dbPath: string): Database.Database {
  mkdirSync(dirname(dbPath), { recursive: true });

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  return db;
}

/** In-memory database for tests */
export function openMemoryDatabase(): Database.Database {
  const db = new Database(":memory:");
  db.pragma("foreign_keys = ON");
  return db;
}
