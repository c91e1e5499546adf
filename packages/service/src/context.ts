/**
 * Everything the HTTP routes operate on.
 */

import type Database from "better-sqlite3";
import type {
  ActiveSessionLock,
  RecordingVault,
  RecoveryIntent,
  RetentionPolicy,
} from "@channel-recorder/core";
import type { RecordingFinalizer } from "./finalizer.js";
import type { RecordingSessionManager } from "./session-manager.js";

export interface ServiceContext {
  db: Database.Database;
  manager: RecordingSessionManager;
  finalizer: RecordingFinalizer;
  recordingsDir: string;
  retention: RetentionPolicy;

  /** Set when recordings are encrypted at rest */
  vault: RecordingVault | null;

  /** Intents left by the previous daemon, read once at startup */
  recoveredIntents: RecoveryIntent[];

  /** Sessions the background agent is running */
  backgroundSessions: () => ActiveSessionLock[];
}

/** Outputs no maintenance task may touch: ours plus the agent's */
export function inFlightOutputPaths(context: ServiceContext): string[] {
  return [
    ...context.manager.activeOutputPaths(),
    ...context.backgroundSessions().map((lock) => lock.outputPath),
  ];
}
