/**
 * Wiring of the daemon's recording components.
 */

import type Database from "better-sqlite3";
import {
  RecordingVault,
  cleanupTempPlaybackFiles,
  createLogger,
  createSqliteRecoveryIntentStore,
  markInterruptedRecordings,
  readSessionLocks,
  type Config,
  type Logger,
  type ProcessLauncher,
  type RecoveryIntent,
} from "@channel-recorder/core";
import type { ServiceContext } from "./context.js";
import { RecordingFinalizer } from "./finalizer.js";
import { RecordingSessionManager } from "./session-manager.js";

export interface RecorderServiceOptions {
  config: Config;
  db: Database.Database;

  /** Encryption key file, used when config.encryptRecordings is set */
  keyFile: string;

  /** Lock directory of the background agent */
  agentSessionsDir: string;

  /** Directory swept for leftover playback copies */
  tempDir?: string;

  launcher?: ProcessLauncher;
  resolveCaptureTool?: (override: string | null) => string | null;
  logger?: Logger;
}

export interface RecoveryResult {
  /** Intents left by the previous run */
  recovered: RecoveryIntent[];

  /** Intents restarted because resumeRecordings is on */
  resumed: RecoveryIntent[];
}

export interface RecorderService {
  context: ServiceContext;
  manager: RecordingSessionManager;
  finalizer: RecordingFinalizer;

  /**
   * Read the previous run's recovery intents once and restart them when
   * resuming is enabled. Called after the control API is listening, so a
   * failed startup leaves the intents in place.
   */
  recover: () => RecoveryResult;
}

/**
 * Build the session manager, finalizer and vault for a daemon run.
 * Marks history rows of the previous run as interrupted.
 */
export function createRecorderService(options: RecorderServiceOptions): RecorderService {
  const { config, db } = options;
  const logger = options.logger ?? createLogger("Daemon");

  const interrupted = markInterruptedRecordings(db);
  if (interrupted > 0) {
    logger.warn(`Marked ${interrupted} recording(s) from the previous run as interrupted`);
  }

  const removed = cleanupTempPlaybackFiles(options.tempDir);
  if (removed > 0) {
    logger.info(`Removed ${removed} leftover playback file(s)`);
  }

  const vault = config.encryptRecordings
    ? new RecordingVault({ keyFile: options.keyFile })
    : null;
  const backgroundSessions = () => readSessionLocks(options.agentSessionsDir);
  const backgroundOutputs = () => backgroundSessions().map((lock) => lock.outputPath);

  const manager = new RecordingSessionManager({
    recordingsDir: config.recordingsDir,
    defaultQuality: config.quality,
    maxConcurrentRecordings: config.maxConcurrentRecordings,
    captureToolPath: config.captureToolPath,
    db,
    intents: createSqliteRecoveryIntentStore(db),
    launcher: options.launcher,
    resolveCaptureTool: options.resolveCaptureTool,
    externalOutputPaths: backgroundOutputs,
  });

  const finalizer = new RecordingFinalizer({
    recordingsDir: config.recordingsDir,
    retention: config.retention,
    vault,
    remuxToolPath: config.remuxToolPath,
    activeOutputPaths: () => [...manager.activeOutputPaths(), ...backgroundOutputs()],
  });
  manager.onSessionEnded = async (session) => {
    await finalizer.finalize(session);
  };

  const context: ServiceContext = {
    db,
    manager,
    finalizer,
    recordingsDir: config.recordingsDir,
    retention: config.retention,
    vault,
    recoveredIntents: [],
    backgroundSessions,
  };

  const recover = (): RecoveryResult => {
    const recovered = manager.consumeRecoveryIntents();
    context.recoveredIntents.push(...recovered);

    const resumed: RecoveryIntent[] = [];
    for (const intent of recovered) {
      logger.info(`Recovered recording intent for ${intent.channelLogin} (${intent.capturedAt})`);
      if (!config.resumeRecordings) continue;
      if (manager.startRecording(intent.target, intent.channelName, intent.quality)) {
        resumed.push(intent);
      } else {
        logger.warn(`Could not resume ${intent.channelLogin}: ${manager.errorMessage ?? "unknown error"}`);
      }
    }
    return { recovered, resumed };
  };

  return { context, manager, finalizer, recover };
}
