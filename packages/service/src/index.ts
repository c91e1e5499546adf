/**
 * @channel-recorder/service
 *
 * Local daemon for Channel Recorder.
 * Runs the recording session manager, the finalization pipeline and the
 * control API on localhost, with history and recovery state in SQLite.
 */

import { fileURLToPath } from "node:url";
import {
  loadConfig,
  openDatabase,
  runMigrations,
  getDefaultMigrationsDir,
  getDaemonPaths,
  acquireLockWithCleanup,
  installTimestampLogging,
  releaseLock,
  removePidFile,
  writePidFile,
} from "@channel-recorder/core";
import type Database from "better-sqlite3";
import type { FastifyInstance } from "fastify";
import { createServer, startServer } from "./server.js";
import { createRecorderService, type RecorderService } from "./daemon.js";
import type { RecordingSessionManager } from "./session-manager.js";

export { createServer, startServer, type CreateServerOptions } from "./server.js";
export {
  createRecorderService,
  type RecorderService,
  type RecorderServiceOptions,
  type RecoveryResult,
} from "./daemon.js";
export {
  RecordingSessionManager,
  type RecordingSessionInfo,
  type RecordingSessionManagerOptions,
  type SessionEndedHook,
} from "./session-manager.js";
export {
  RecordingFinalizer,
  SWEEP_INTERVAL_MS,
  type FinalizeResult,
  type RecordingFinalizerOptions,
  type SweepResult,
} from "./finalizer.js";
export type { ServiceContext } from "./context.js";

export interface DaemonHandle {
  app: FastifyInstance;
  manager: RecordingSessionManager;
  shutdown: () => Promise<void>;
}

export interface StartDaemonOptions {
  /** Started in the background by `channel-recorder start -d` */
  daemon?: boolean;

  /** Binds the control API (default: startServer) */
  listen?: (app: FastifyInstance, port: number) => Promise<void>;
}

/**
 * Start the daemon with configuration from the environment.
 * Used by the CLI and by the background entry script.
 *
 * Recovery intents are consumed only once the control API is listening;
 * a failed startup closes everything it opened and releases the lock.
 */
export async function startDaemon(options: StartDaemonOptions = {}): Promise<DaemonHandle> {
  installTimestampLogging();
  const config = loadConfig();
  const paths = getDaemonPaths();
  const listen = options.listen ?? startServer;

  const lock = acquireLockWithCleanup(paths.lockFile, paths.pidFile);
  if (!lock.acquired) {
    throw new Error(
      lock.existingPid
        ? `Another daemon is running (PID ${lock.existingPid})`
        : `Failed to acquire lock: ${lock.error ?? "unknown error"}`
    );
  }

  let db: Database.Database | null = null;
  let service: RecorderService | null = null;
  let app: FastifyInstance | null = null;

  const release = async (): Promise<void> => {
    await service?.finalizer.stopSweeping();
    await service?.manager.shutdown();
    await app?.close();
    db?.close();
    releaseLock(paths.lockFile);
    removePidFile(paths.pidFile);
  };

  try {
    writePidFile(process.pid, paths.pidFile);

    console.log(`Starting Channel Recorder daemon${options.daemon ? " (background)" : ""}...`);
    console.log(`Database: ${config.dbPath}`);
    console.log(`Recordings: ${config.recordingsDir}`);
    console.log(`REST API port: ${config.listenPort}`);

    db = openDatabase(config.dbPath);
    runMigrations(db, getDefaultMigrationsDir());

    service = createRecorderService({
      config,
      db,
      keyFile: paths.keyFile,
      agentSessionsDir: paths.agent.activeSessionsDir,
    });

    app = await createServer({ ...service.context, apiToken: config.apiToken });
    await listen(app, config.listenPort);

    service.recover();
    service.finalizer.startSweeping();
  } catch (error) {
    try {
      await release();
    } catch (cleanupError) {
      console.error("Cleanup after failed startup failed:", cleanupError);
    }
    throw error;
  }

  const { manager } = service;
  const server = app;
  let closing: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (closing === null) {
      console.log("\nShutting down...");
      closing = release();
    }
    return closing;
  };

  process.on("SIGINT", () => shutdown().then(() => process.exit(0)));
  process.on("SIGTERM", () => shutdown().then(() => process.exit(0)));

  return { app: server, manager, shutdown };
}

/** Entry script for spawning the daemon in the background */
export function serviceEntryPath(): string {
  const ext = import.meta.url.endsWith(".ts") ? ".ts" : ".js";
  return fileURLToPath(new URL(`./bin${ext}`, import.meta.url));
}
