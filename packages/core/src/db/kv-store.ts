/**
 * Key/value store on the kv_store table.
 * Values are JSON documents stored under fixed keys.
 */

import type Database from "better-sqlite3";

interface KvRow {
  value: string;
}

/** Read and parse the value at key; null when missing or unparseable */
export function getKvValue(db: Database.Database, key: string): unknown {
  const row = db.prepare("SELECT value FROM kv_store WHERE key = ?").get(key) as
    | KvRow
    | undefined;
  if (!row) return null;
  try {
    return JSON.parse(row.value);
  } catch {
    return null;
  }
}

export function setKvValue(db: Database.Database, key: string, value: unknown): void {
  db.prepare(
    `INSERT INTO kv_store (key, value, updated_at) VALUES (?, ?, datetime('now'))
     ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`
  ).run(key, JSON.stringify(value));
}

export function deleteKvValue(db: Database.Database, key: string): void {
  db.prepare("DELETE FROM kv_store WHERE key = ?").run(key);
}
