/**
 * Lock files.
 *
 * Two kinds live here:
 * - the single-instance PID lock held by the daemon and by the agent,
 *   acquired with exclusive file creation;
 * - per-session locks the agent writes for every capture process it runs
 *   (ActiveSessions/<login>.json), written atomically and wiped at agent
 *   startup since no capture process outlives the agent.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { isProcessRunning, removePidFile } from "./daemon-paths.js";
import { errorCode, errorMessage } from "./errors.js";
import { writeJsonFileAtomic } from "./fs-utils.js";
import type { ActiveSessionLock } from "./types/index.js";

export interface LockResult {
  acquired: boolean;
  existingPid?: number;
  error?: string;
}

function readLockPid(lockPath: string): number | null {
  const pid = parseInt(fs.readFileSync(lockPath, "utf-8").trim(), 10);
  return isNaN(pid) || pid <= 0 ? null : pid;
}

/**
 * Attempt to acquire an exclusive lock.
 * The 'wx' flag makes creation fail if the file already exists.
 */
export function acquireLock(lockPath: string, pid = process.pid): LockResult {
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  try {
    const fd = fs.openSync(lockPath, "wx");
    fs.writeSync(fd, String(pid));
    fs.closeSync(fd);
    return { acquired: true };
  } catch (error) {
    if (errorCode(error) !== "EEXIST") {
      return { acquired: false, error: errorMessage(error) };
    }
    try {
      const existingPid = readLockPid(lockPath);
      return existingPid === null
        ? { acquired: false, error: "Invalid PID in lock file" }
        : { acquired: false, existingPid };
    } catch {
      return { acquired: false, error: "Could not read lock file" };
    }
  }
}

/** Release a lock. Safe to call when the lock doesn't exist. */
export function releaseLock(lockPath: string): void {
  fs.rmSync(lockPath, { force: true });
}

/**
 * Remove the lock (and PID file) when the owning process is gone or the
 * lock content is unreadable. Returns true if a stale lock was removed.
 */
export function checkAndCleanStaleLock(
  lockPath: string,
  pidPath?: string
): boolean {
  if (!fs.existsSync(lockPath)) {
    return false;
  }

  let pid: number | null = null;
  try {
    pid = readLockPid(lockPath);
  } catch {
    pid = null;
  }

  if (pid !== null && isProcessRunning(pid)) {
    return false;
  }

  releaseLock(lockPath);
  if (pidPath) removePidFile(pidPath);
  return true;
}

/** Clean a stale lock first, then try to acquire */
export function acquireLockWithCleanup(
  lockPath: string,
  pidPath?: string,
  pid?: number
): LockResult {
  checkAndCleanStaleLock(lockPath, pidPath);
  return acquireLock(lockPath, pid);
}

/** Lock file path for a channel: <dir>/<normalized-login>.json */
export function sessionLockPath(lockDir: string, login: string): string {
  const safe = login.trim().toLowerCase().replaceAll("/", "_");
  return path.join(lockDir, `${safe}.json`);
}

/** Write a session lock atomically */
export function writeSessionLock(lockDir: string, lock: ActiveSessionLock): void {
  writeJsonFileAtomic(sessionLockPath(lockDir, lock.login), {
    ...lock,
    login: lock.login.toLowerCase(),
  });
}

export function removeSessionLock(lockDir: string, login: string): void {
  fs.rmSync(sessionLockPath(lockDir, login), { force: true });
}

/**
 * Remove every entry in the lock directory, creating it if missing.
 * Returns the number of entries removed.
 */
export function clearSessionLocks(lockDir: string): number {
  fs.mkdirSync(lockDir, { recursive: true });
  const entries = fs.readdirSync(lockDir);
  for (const entry of entries) {
    fs.rmSync(path.join(lockDir, entry), { recursive: true, force: true });
  }
  return entries.length;
}

function isSessionLock(value: unknown): value is ActiveSessionLock {
  return (
    typeof value === "object" &&
    value !== null &&
    "login" in value &&
    typeof value.login === "string" &&
    "pid" in value &&
    typeof value.pid === "number" &&
    "outputPath" in value &&
    typeof value.outputPath === "string" &&
    "startedAt" in value &&
    typeof value.startedAt === "string"
  );
}

/**
 * Read all session locks in a directory.
 * Unreadable or malformed lock files are skipped.
 */
export function readSessionLocks(lockDir: string): ActiveSessionLock[] {
  let entries: string[];
  try {
    entries = fs.readdirSync(lockDir);
  } catch {
    return [];
  }

  const locks: ActiveSessionLock[] = [];
  for (const entry of entries.filter((e) => e.endsWith(".json")).sort()) {
    try {
      const parsed: unknown = JSON.parse(
        fs.readFileSync(path.join(lockDir, entry), "utf-8")
      );
      if (isSessionLock(parsed)) locks.push(parsed);
    } catch {
      // Mid-write or removed between readdir and read
    }
  }
  return locks;
}
