/**
 * Start command - runs the daemon in foreground or background.
 */

import { mkdirSync } from "node:fs";
import {
  getDaemonPaths,
  isProcessRunning,
  loadConfig,
  readPidFile,
} from "@channel-recorder/core";
import { serviceEntryPath, startDaemon } from "@channel-recorder/service";
import { loadEnvFile, spawnDetached, stopProcess, waitForPidFile } from "./process-control.js";

export interface StartCommandOptions {
  envFile?: string;
  daemon?: boolean;
  force?: boolean;
}

export async function startCommand(
  options: StartCommandOptions = {}
): Promise<void> {
  // Load env file before anything else if specified
  if (options.envFile) {
    loadEnvFile(options.envFile);
  }

  const config = loadConfig();
  const paths = getDaemonPaths();

  // Check for existing daemon
  const existingPid = readPidFile(paths.pidFile);
  if (existingPid && isProcessRunning(existingPid)) {
    if (options.force) {
      console.log(`Stopping existing daemon (PID ${existingPid})...`);
      const stopped = await stopProcess(existingPid);
      if (!stopped) {
        console.error(
          "Failed to stop existing daemon. Try: channel-recorder stop --force"
        );
        process.exit(1);
      }
      console.log("Existing daemon stopped.");
    } else {
      console.error(
        `Daemon is already running (PID ${existingPid}).\n` +
          "Use --force to restart, or run: channel-recorder stop"
      );
      process.exit(1);
    }
  }

  if (options.daemon) {
    console.log("Starting daemon in background...");
    mkdirSync(paths.baseDir, { recursive: true });
    spawnDetached(serviceEntryPath(), [], paths.logFile);

    const newPid = await waitForPidFile(paths.pidFile);
    if (newPid !== null) {
      console.log(`Daemon started (PID ${newPid})`);
      console.log(`Log file: ${paths.logFile}`);
      console.log(`API: http://127.0.0.1:${config.listenPort}`);
      console.log(`\nRun 'channel-recorder status' to check status.`);
    } else {
      console.error("Failed to start daemon. Check log file for details:");
      console.error(`  ${paths.logFile}`);
      process.exit(1);
    }
    return;
  }

  // Foreground mode: run directly
  try {
    await startDaemon({ daemon: false });
  } catch (error) {
    console.error("Failed to start daemon:", error);
    process.exit(1);
  }
}
