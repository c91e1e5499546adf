/**
 * Recording types shared by the session manager, the finalization
 * pipeline and the encrypted library.
 */

/** Final state of a capture session as stored in the history table */
export type RecordingStatus =
  | "recording"
  | "completed"
  | "failed"
  | "stopped"
  | "interrupted";

/**
 * Persisted marker for a session that was running when the host
 * process went away. Written on start, removed on stop.
 */
export interface RecoveryIntent {
  /** Capture target URL (https://...) */
  target: string;

  /** Normalized channel login */
  channelLogin: string;

  /** Human readable channel name used for the output filename */
  channelName: string;

  quality: string;

  /** When the intent was written (ISO 8601) */
  capturedAt: string;
}

/** Metadata kept in the encrypted manifest for one artifact */
export interface RecordingManifestEntry {
  channelName: string;

  /** Recording start time (ISO 8601) */
  date: string;

  quality: string;

  /** Plaintext filename before encryption */
  originalFilename: string;
}

/** Encrypted manifest: opaque artifact filename → metadata */
export type RecordingManifest = Record<string, RecordingManifestEntry>;

/** One entry of the recordings library (plaintext or encrypted) */
export interface RecordingListing {
  channelName: string;

  /** Filename on disk */
  filename: string;

  /** Absolute path on disk */
  path: string;

  /** Recording start time, null when it can't be determined */
  recordedAt: Date | null;

  encrypted: boolean;

  /** Original filename for encrypted artifacts */
  originalFilename: string | null;
}

/** Row of the recording history table */
export interface RecordingHistoryEntry {
  id: string;
  channelLogin: string;
  channelName: string;
  target: string;
  quality: string;
  outputPath: string;
  startedAt: string;
  endedAt: string | null;
  exitCode: number | null;
  status: RecordingStatus;
}
