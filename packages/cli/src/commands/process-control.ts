/**
 * Shared helpers for starting and stopping background processes.
 */

import { spawn } from "node:child_process";
import { constants, existsSync, openSync, readFileSync } from "node:fs";
import { isProcessRunning, readPidFile } from "@channel-recorder/core";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse KEY=VALUE lines, ignoring comments and empty lines.
 * Surrounding single or double quotes are removed from values.
 */
export function parseEnvFile(content: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const eqIndex = trimmed.indexOf("=");
    if (eqIndex <= 0) continue;

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }
    values[key] = value;
  }
  return values;
}

/**
 * Load environment variables from a file. Variables already set in the
 * environment win.
 */
export function loadEnvFile(filePath: string): void {
  if (!existsSync(filePath)) {
    console.error(`Env file not found: ${filePath}`);
    process.exit(1);
  }

  for (const [key, value] of Object.entries(parseEnvFile(readFileSync(filePath, "utf-8")))) {
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

/** Wait for a process to exit */
export async function waitForExit(pid: number, timeoutMs: number): Promise<boolean> {
  const startTime = Date.now();
  while (Date.now() - startTime < timeoutMs) {
    await sleep(100);
    if (!isProcessRunning(pid)) {
      return true;
    }
  }
  return !isProcessRunning(pid);
}

/**
 * Send SIGTERM and wait for the process to exit.
 */
export async function stopProcess(pid: number, timeoutMs = 5000): Promise<boolean> {
  try {
    process.kill(pid, "SIGTERM");
  } catch {
    // Process already dead
    return true;
  }
  return waitForExit(pid, timeoutMs);
}

/**
 * Run a TypeScript entry script detached, appending its output to a log
 * file. The child runs with this process's node flags so the tsx loader
 * carries over.
 */
export function spawnDetached(
  entry: string,
  args: readonly string[],
  logFile: string,
  env: NodeJS.ProcessEnv = process.env
): void {
  const logFd = openSync(logFile, constants.O_WRONLY | constants.O_CREAT | constants.O_APPEND);
  const child = spawn(process.execPath, [...process.execArgv, entry, ...args], {
    detached: true,
    stdio: ["ignore", logFd, logFd],
    env,
  });
  child.unref();
}

/** Poll a PID file until it names a running process (up to 5 seconds) */
export async function waitForPidFile(pidFile: string): Promise<number | null> {
  for (let i = 0; i < 10; i++) {
    await sleep(500);
    const pid = readPidFile(pidFile);
    if (pid !== null && isProcessRunning(pid)) {
      return pid;
    }
  }
  return null;
}
