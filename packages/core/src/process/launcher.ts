/**
 * Long-running capture processes.
 *
 * A ProcessHandle bundles everything a session owns about its process:
 * the pid, the stderr buffer (drained continuously so the pipe never
 * blocks the child) and the exit status once the process has closed.
 * Schedulers poll exitInfo() or await exited; tests substitute their own
 * ProcessLauncher.
 */

import { spawn } from "node:child_process";

/** Bytes of stderr kept per process */
const STDERR_LIMIT = 64 * 1024;

export interface ExitInfo {
  /** Exit status, null when terminated by a signal or never started */
  code: number | null;
  signal: NodeJS.Signals | null;

  /** Spawn/runtime error message, if the process failed to run */
  error?: string;
}

export interface ProcessHandle {
  readonly pid: number;

  /** Resolves once the process has exited and its pipes are closed */
  readonly exited: Promise<ExitInfo>;

  /** Exit status, or null while the process is still running */
  exitInfo(): ExitInfo | null;

  /** stderr collected so far (tail, trimmed) */
  stderrText(): string;

  /** Send SIGTERM. No-op once the process has exited. */
  terminate(): void;
}

export type ProcessLauncher = (
  executable: string,
  args: readonly string[]
) => ProcessHandle;

/** Launch a process with stdout discarded and stderr captured */
export const spawnProcess: ProcessLauncher = (executable, args) => {
  const child = spawn(executable, [...args], {
    stdio: ["ignore", "ignore", "pipe"],
    shell: false,
  });

  let exit: ExitInfo | null = null;
  let stderr = "";

  child.stderr?.setEncoding("utf8");
  child.stderr?.on("data", (chunk: string) => {
    stderr = (stderr + chunk).slice(-STDERR_LIMIT);
  });

  const exited = new Promise<ExitInfo>((resolve) => {
    child.once("error", (error) => {
      if (exit) return;
      exit = { code: null, signal: null, error: error.message };
      resolve(exit);
    });
    child.once("close", (code, signal) => {
      if (exit) return;
      exit = { code, signal };
      resolve(exit);
    });
  });

  const pid = child.pid;
  if (pid === undefined) {
    throw new Error(`Failed to launch ${executable}`);
  }

  return {
    pid,
    exited,
    exitInfo: () => exit,
    stderrText: () => stderr.trim(),
    terminate: () => {
      if (exit === null) child.kill("SIGTERM");
    },
  };
};

/** Human readable exit description: "status 1" or "signal SIGTERM" */
export function describeExit(info: ExitInfo): string {
  if (info.error) return `error: ${info.error}`;
  if (info.code !== null) return `status ${info.code}`;
  return `signal ${info.signal ?? "unknown"}`;
}
