/**
 * Status command - daemon state plus the recordings it is running.
 */

import {
  getDaemonPaths,
  isProcessRunning,
  loadConfig,
  readPidFile,
  type ActiveSessionLock,
} from "@channel-recorder/core";
import type { RecordingSessionInfo } from "@channel-recorder/service";
import { createApiClient } from "../api.js";

interface HealthResponse {
  uptime: number;
  encryption: boolean;
}

interface RecordingStatusResponse {
  activeRecordings: number;
  sessions: RecordingSessionInfo[];
  backgroundSessions: ActiveSessionLock[];
  lastError: string | null;
}

/**
 * Format uptime in human-readable form.
 */
export function formatUptime(seconds: number): string {
  if (seconds < 60) {
    return `${Math.floor(seconds)}s`;
  }
  if (seconds < 3600) {
    const minutes = Math.floor(seconds / 60);
    const secs = Math.floor(seconds % 60);
    return `${minutes}m ${secs}s`;
  }
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${minutes}m`;
}

export async function statusCommand(): Promise<void> {
  const config = loadConfig();
  const paths = getDaemonPaths();

  console.log("Channel Recorder Status");
  console.log("=======================");

  const pid = readPidFile(paths.pidFile);
  if (pid === null || !isProcessRunning(pid)) {
    console.log("State:        stopped");
    console.log(
      pid === null
        ? "Reason:       No PID file found"
        : `Reason:       Stale PID file (${pid} not running)`
    );
    console.log("");
    console.log(`DB Path:      ${config.dbPath}`);
    console.log(`Recordings:   ${config.recordingsDir}`);
    console.log("");
    console.log("Run 'channel-recorder start --daemon' to start.");
    process.exit(1);
  }

  const api = createApiClient(config);
  let health: HealthResponse | null = null;
  let recording: RecordingStatusResponse | null = null;
  try {
    health = await api.get<HealthResponse>("/api/health");
    recording = await api.get<RecordingStatusResponse>("/api/recording/status");
  } catch {
    // API not reachable; reported below
  }

  console.log("State:        running");
  console.log(`PID:          ${pid}`);
  if (health) {
    console.log(`Uptime:       ${formatUptime(health.uptime)}`);
  }
  console.log(`REST API:     ${api.baseUrl} ${health ? "(✓)" : "(✗)"}`);
  console.log(`Encryption:   ${config.encryptRecordings ? "on" : "off"}`);
  console.log(`Recordings:   ${config.recordingsDir}`);
  console.log(`DB Path:      ${config.dbPath}`);

  if (recording) {
    console.log("");
    console.log(`Recording:    ${recording.activeRecordings} active`);
    for (const session of recording.sessions) {
      console.log(`  ${session.channelLogin.padEnd(24)} since ${session.startedAt}`);
    }
    for (const lock of recording.backgroundSessions) {
      console.log(`  ${lock.login.padEnd(24)} since ${lock.startedAt} (background)`);
    }
    if (recording.lastError) {
      console.log(`Last error:   ${recording.lastError}`);
    }
  }

  if (!health) {
    console.log("");
    console.log("⚠ REST API is not reachable. Check the log file:");
    console.log(`  ${paths.logFile}`);
  }
}
