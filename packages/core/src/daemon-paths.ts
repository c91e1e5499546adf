/**
 * State file paths and PID management utilities.
 * Everything lives under ~/.channel-recorder/ unless CR_HOME is set.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { errorCode } from "./errors.js";

export interface DaemonPaths {
  baseDir: string;
  pidFile: string;
  lockFile: string;
  logFile: string;
  dbFile: string;
  keyFile: string;
  agent: AgentPaths;
}

/** Files shared between the app and the background agent */
export interface AgentPaths {
  dir: string;
  desiredStateFile: string;
  activeSessionsDir: string;
  pidFile: string;
  lockFile: string;
  logFile: string;
}

/** Base state directory: $CR_HOME, else ~/.channel-recorder */
export function getBaseDir(): string {
  return process.env["CR_HOME"] ?? path.join(os.homedir(), ".channel-recorder");
}

/**
 * Paths owned by the agent, derived from the desired-state file location.
 * The lock directory sits next to the desired-state file.
 */
export function getAgentPaths(desiredStateFile: string): AgentPaths {
  const dir = path.dirname(desiredStateFile);
  return {
    dir,
    desiredStateFile,
    activeSessionsDir: path.join(dir, "ActiveSessions"),
    pidFile: path.join(dir, "agent.pid"),
    lockFile: path.join(dir, "agent.lock"),
    logFile: path.join(dir, "agent.log"),
  };
}

export function getDaemonPaths(): DaemonPaths {
  const baseDir = getBaseDir();
  return {
    baseDir,
    pidFile: path.join(baseDir, "channel-recorder.pid"),
    lockFile: path.join(baseDir, "channel-recorder.lock"),
    logFile: path.join(baseDir, "channel-recorder.log"),
    dbFile: path.join(baseDir, "channel-recorder.sqlite"),
    keyFile: path.join(baseDir, "recording.key"),
    agent: getAgentPaths(path.join(baseDir, "background", "config.json")),
  };
}

/**
 * Read PID from a PID file.
 * Returns null if the file doesn't exist or is invalid.
 */
export function readPidFile(pidPath: string): number | null {
  try {
    const pid = parseInt(fs.readFileSync(pidPath, "utf-8").trim(), 10);
    return isNaN(pid) || pid <= 0 ? null : pid;
  } catch {
    return null;
  }
}

/** Write PID to a PID file, creating the parent directory if needed */
export function writePidFile(pid: number, pidPath: string): void {
  fs.mkdirSync(path.dirname(pidPath), { recursive: true });
  fs.writeFileSync(pidPath, String(pid), "utf-8");
}

/** Remove a PID file if it exists */
export function removePidFile(pidPath: string): void {
  fs.rmSync(pidPath, { force: true });
}

/**
 * Check if a process with the given PID is currently running.
 * kill(pid, 0) checks existence without sending a signal; EPERM means
 * the process exists but belongs to someone else.
 */
export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) === "EPERM";
  }
}

/**
 * Read a PID file and check whether that process is alive.
 * A stale PID is reported as not running with pid null.
 */
export function checkProcessStatus(pidPath: string): {
  running: boolean;
  pid: number | null;
} {
  const pid = readPidFile(pidPath);
  if (pid === null) {
    return { running: false, pid: null };
  }
  const running = isProcessRunning(pid);
  return { running, pid: running ? pid : null };
}
