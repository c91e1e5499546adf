/**
 * Configuration management.
 * Reads from environment variables with sensible defaults.
 */

import { join } from "node:path";
import { getBaseDir } from "./daemon-paths.js";
import type { RetentionPolicy } from "./finalize/retention.js";

/** Get the default database path in the state directory */
export function getDefaultDbPath(): string {
  return join(getBaseDir(), "channel-recorder.sqlite");
}

/** Get the default recordings directory */
export function getDefaultRecordingsDir(): string {
  return join(getBaseDir(), "recordings");
}

export interface Config {
  /** Port for the daemon to listen on (default: 8790) */
  listenPort: number;

  /** Path to SQLite database file (default: ~/.channel-recorder/channel-recorder.sqlite) */
  dbPath: string;

  recordingsDir: string;

  /** Capture tool override (default: resolve streamlink) */
  captureToolPath: string | null;

  /** Remux tool override (default: resolve ffmpeg) */
  remuxToolPath: string | null;

  /** Default stream quality passed to the capture tool */
  quality: string;

  /** Maximum simultaneous foreground recordings (at least 1) */
  maxConcurrentRecordings: number;

  /** Encrypt finished recordings at rest */
  encryptRecordings: boolean;

  retention: RetentionPolicy;

  /** Bearer token required by the HTTP API (null = no auth) */
  apiToken: string | null;

  /** Restart recordings found in recovery intents at startup */
  resumeRecordings: boolean;
}

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = parseInt(raw, 10);
  return isNaN(value) ? fallback : value;
}

function readString(name: string): string | null {
  const raw = process.env[name]?.trim();
  return raw ? raw : null;
}

/**
 * Load configuration from environment variables.
 */
export function loadConfig(): Config {
  return {
    listenPort: readInt("CR_LISTEN_PORT", 8790),
    dbPath: readString("CR_DB_PATH") ?? getDefaultDbPath(),
    recordingsDir: readString("CR_RECORDINGS_DIR") ?? getDefaultRecordingsDir(),
    captureToolPath: readString("CR_CAPTURE_TOOL_PATH"),
    remuxToolPath: readString("CR_REMUX_TOOL_PATH"),
    quality: readString("CR_QUALITY") ?? "best",
    maxConcurrentRecordings: Math.max(1, readInt("CR_MAX_CONCURRENT", 2)),
    encryptRecordings: process.env["CR_ENCRYPT_RECORDINGS"] === "1",
    retention: {
      maxAgeDays: Math.max(0, readInt("CR_RETENTION_MAX_AGE_DAYS", 0)),
      keepLastGlobal: Math.max(0, readInt("CR_RETENTION_KEEP_LAST", 0)),
      keepLastPerChannel: Math.max(
        0,
        readInt("CR_RETENTION_KEEP_LAST_PER_CHANNEL", 0)
      ),
    },
    apiToken: readString("CR_API_TOKEN"),
    resumeRecordings: process.env["CR_RESUME_RECORDINGS"] === "1",
  };
}
