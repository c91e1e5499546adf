/**
 * Recording history CRUD.
 * Uses the better-sqlite3 sync API.
 */

import type Database from "better-sqlite3";
import { randomUUID } from "node:crypto";
import type { RecordingHistoryEntry, RecordingStatus } from "../types/index.js";

/** Row shape from SQLite */
interface RecordingRow {
  id: string;
  channel_login: string;
  channel_name: string;
  target: string;
  quality: string;
  output_path: string;
  started_at: string;
  ended_at: string | null;
  exit_code: number | null;
  status: RecordingStatus;
}

function rowToEntry(row: RecordingRow): RecordingHistoryEntry {
  return {
    id: row.id,
    channelLogin: row.channel_login,
    channelName: row.channel_name,
    target: row.target,
    quality: row.quality,
    outputPath: row.output_path,
    startedAt: row.started_at,
    endedAt: row.ended_at,
    exitCode: row.exit_code,
    status: row.status,
  };
}

export interface InsertRecordingInput {
  channelLogin: string;
  channelName: string;
  target: string;
  quality: string;
  outputPath: string;
  startedAt: string;
}

/** Insert a history row in the "recording" state */
export function insertRecording(
  db: Database.Database,
  input: InsertRecordingInput
): RecordingHistoryEntry {
  const id = randomUUID();
  db.prepare(
    `INSERT INTO recordings
       (id, channel_login, channel_name, target, quality, output_path, started_at, status)
     VALUES (?, ?, ?, ?, ?, ?, ?, 'recording')`
  ).run(
    id,
    input.channelLogin,
    input.channelName,
    input.target,
    input.quality,
    input.outputPath,
    input.startedAt
  );
  return {
    id,
    ...input,
    endedAt: null,
    exitCode: null,
    status: "recording",
  };
}

/** Close a history row. Returns null when the id is unknown. */
export function finishRecording(
  db: Database.Database,
  id: string,
  status: Exclude<RecordingStatus, "recording">,
  exitCode: number | null,
  endedAt: string = new Date().toISOString()
): RecordingHistoryEntry | null {
  const result = db
    .prepare(
      "UPDATE recordings SET ended_at = ?, exit_code = ?, status = ? WHERE id = ?"
    )
    .run(endedAt, exitCode, status, id);
  return result.changes === 0 ? null : getRecordingById(db, id);
}

export function getRecordingById(
  db: Database.Database,
  id: string
): RecordingHistoryEntry | null {
  const row = db.prepare("SELECT * FROM recordings WHERE id = ?").get(id) as
    | RecordingRow
    | undefined;
  return row ? rowToEntry(row) : null;
}

export interface ListRecordingsOptions {
  channelLogin?: string;
  status?: RecordingStatus;
  limit?: number;
}

/** List history rows, newest first */
export function listRecordingHistory(
  db: Database.Database,
  options: ListRecordingsOptions = {}
): RecordingHistoryEntry[] {
  const conditions: string[] = [];
  const params: (string | number)[] = [];

  if (options.channelLogin) {
    conditions.push("channel_login = ?");
    params.push(options.channelLogin);
  }
  if (options.status) {
    conditions.push("status = ?");
    params.push(options.status);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
  params.push(options.limit ?? 100);

  const rows = db
    .prepare(`SELECT * FROM recordings ${where} ORDER BY started_at DESC LIMIT ?`)
    .all(...params) as RecordingRow[];
  return rows.map(rowToEntry);
}

/**
 * Mark rows still in the "recording" state as interrupted. Called at
 * daemon startup: those sessions died with the previous process.
 * Returns the number of rows updated.
 */
export function markInterruptedRecordings(
  db: Database.Database,
  endedAt: string = new Date().toISOString()
): number {
  return db
    .prepare(
      "UPDATE recordings SET status = 'interrupted', ended_at = ? WHERE status = 'recording'"
    )
    .run(endedAt).changes;
}
