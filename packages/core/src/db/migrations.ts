/**
 * SQLite migrations runner.
 * Applies *.sql files from the migrations folder in filename order,
 * each inside a transaction, tracking applied files in _migrations.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

/** Returns the filenames applied by this call */
export function runMigrations(
  db: Database.Database,
  migrationsDir: string
): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      filename TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const rows = db.prepare("SELECT filename FROM _migrations").all() as {
    filename: string;
  }[];
  const applied = new Set(rows.map((row) => row.filename));

  const pending = readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql") && !applied.has(f))
    .sort();

  for (const filename of pending) {
    const sql = readFileSync(join(migrationsDir, filename), "utf-8");
    db.transaction(() => {
      db.exec(sql);
      db.prepare("INSERT INTO _migrations (filename) VALUES (?)").run(filename);
    })();
  }

  return pending;
}

/** packages/core/migrations, resolved from this module's location */
export function getDefaultMigrationsDir(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  return join(here, "..", "..", "migrations");
}
