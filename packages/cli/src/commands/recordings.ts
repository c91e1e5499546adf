/**
 * Recordings commands - library listing and maintenance.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  RecordingError,
  RecordingVault,
  errorMessage,
  getDaemonPaths,
  isEncryptedArtifact,
  loadConfig,
  prepareRecordingForPlayback,
  type Config,
  type RecordingHistoryEntry,
} from "@channel-recorder/core";
import { createApiClient, describeApiFailure } from "../api.js";

/** Recording as returned by GET /api/recordings */
export interface RecordingRow {
  channelName: string;
  filename: string;
  path: string;
  recordedAt: string | null;
  encrypted: boolean;
  originalFilename: string | null;
}

export function formatRecordingsTable(recordings: readonly RecordingRow[]): string[] {
  if (recordings.length === 0) {
    return ["No recordings found."];
  }

  const lines = [
    "CHANNEL".padEnd(24) + "RECORDED".padEnd(26) + "ENC".padEnd(5) + "FILE",
    "-".repeat(90),
  ];
  for (const recording of recordings) {
    const channel = recording.channelName.slice(0, 23).padEnd(24);
    const recorded = (recording.recordedAt ?? "unknown").padEnd(26);
    const encrypted = (recording.encrypted ? "yes" : "no").padEnd(5);
    const file = recording.encrypted
      ? `${recording.filename} (${recording.originalFilename ?? "?"})`
      : recording.filename;
    lines.push(`${channel}${recorded}${encrypted}${file}`);
  }
  return lines;
}

export function formatHistoryTable(history: readonly RecordingHistoryEntry[]): string[] {
  if (history.length === 0) {
    return ["No recording history."];
  }

  const lines = [
    "CHANNEL".padEnd(20) + "STATUS".padEnd(13) + "STARTED".padEnd(26) + "ENDED",
    "-".repeat(90),
  ];
  for (const entry of history) {
    lines.push(
      entry.channelLogin.slice(0, 19).padEnd(20) +
        entry.status.padEnd(13) +
        entry.startedAt.padEnd(26) +
        (entry.endedAt ?? "-")
    );
  }
  return lines;
}

export async function recordingsListCommand(options: { json?: boolean } = {}): Promise<void> {
  try {
    const { recordings } = await createApiClient().get<{ recordings: RecordingRow[] }>(
      "/api/recordings"
    );
    if (options.json) {
      console.log(JSON.stringify(recordings, null, 2));
      return;
    }
    for (const line of formatRecordingsTable(recordings)) console.log(line);
  } catch (error) {
    console.error(`Failed to list recordings: ${describeApiFailure(error)}`);
    process.exit(1);
  }
}

export async function recordingsDeleteCommand(file: string): Promise<void> {
  try {
    const result = await createApiClient().delete<{ trashedTo: string | null }>(
      "/api/recordings",
      { path: file }
    );
    console.log(
      result.trashedTo ? `Moved to trash: ${result.trashedTo}` : `Deleted: ${file}`
    );
  } catch (error) {
    console.error(`Failed to delete recording: ${describeApiFailure(error)}`);
    process.exit(1);
  }
}

export async function recordingsMigrateCommand(): Promise<void> {
  try {
    const result = await createApiClient().post<{
      migrated: number;
      skipped: number;
      failed: number;
    }>("/api/recordings/migrate");
    console.log(
      `Encrypted ${result.migrated} recording(s), skipped ${result.skipped} in progress, ${result.failed} failed.`
    );
    if (result.failed > 0) process.exit(1);
  } catch (error) {
    console.error(`Failed to migrate recordings: ${describeApiFailure(error)}`);
    process.exit(1);
  }
}

export async function recordingsPruneCommand(): Promise<void> {
  try {
    const result = await createApiClient().post<{
      deletedCount: number;
      failedCount: number;
      deleted: string[];
    }>("/api/recordings/retention");
    for (const file of result.deleted) console.log(`Deleted ${file}`);
    console.log(`Pruned ${result.deletedCount} recording(s), ${result.failedCount} failure(s).`);
    if (result.failedCount > 0) process.exit(1);
  } catch (error) {
    console.error(`Failed to apply retention: ${describeApiFailure(error)}`);
    process.exit(1);
  }
}

export async function recordingsHistoryCommand(
  options: { channel?: string; status?: string; limit?: string } = {}
): Promise<void> {
  const params = new URLSearchParams();
  if (options.channel) params.set("channel", options.channel);
  if (options.status) params.set("status", options.status);
  if (options.limit) params.set("limit", options.limit);
  const query = params.toString();

  try {
    const { history } = await createApiClient().get<{ history: RecordingHistoryEntry[] }>(
      `/api/recordings/history${query ? `?${query}` : ""}`
    );
    for (const line of formatHistoryTable(history)) console.log(line);
  } catch (error) {
    console.error(`Failed to fetch history: ${describeApiFailure(error)}`);
    process.exit(1);
  }
}

/**
 * Make a recording playable and return the file to open: encrypted
 * artifacts are decrypted into a temp copy, transport streams are
 * remuxed in place.
 */
export async function preparePlayback(
  name: string,
  config: Config = loadConfig(),
  keyFile: string = getDaemonPaths().keyFile,
  tempDir?: string
): Promise<string> {
  const filename = path.basename(name);
  if (isEncryptedArtifact(filename)) {
    const vault = new RecordingVault({ keyFile });
    return vault.createPlaybackCopy(filename, config.recordingsDir, tempDir);
  }

  const filePath = path.resolve(config.recordingsDir, name);
  if (path.dirname(filePath) !== path.resolve(config.recordingsDir) || !fs.existsSync(filePath)) {
    throw new RecordingError(`Recording file not found: ${name}`, "not_found");
  }
  const prepared = await prepareRecordingForPlayback(filePath, {
    remuxToolPath: config.remuxToolPath,
  });
  return prepared.path;
}

export async function recordingsPlayCommand(name: string): Promise<void> {
  try {
    const playable = await preparePlayback(name);
    console.log(playable);
  } catch (error) {
    console.error(`Failed to prepare ${name}: ${errorMessage(error)}`);
    process.exit(1);
  }
}
