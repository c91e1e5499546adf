/**
 * Stop command - stops a running daemon.
 */

import {
  errorCode,
  getDaemonPaths,
  isProcessRunning,
  readPidFile,
  releaseLock,
  removePidFile,
} from "@channel-recorder/core";
import { waitForExit } from "./process-control.js";

export interface StopCommandOptions {
  force?: boolean;
}

export interface StopTarget {
  /** Name used in messages ("Daemon", "Agent") */
  label: string;
  pidFile: string;
  lockFile: string;
}

function cleanup(target: StopTarget): void {
  removePidFile(target.pidFile);
  releaseLock(target.lockFile);
}

/**
 * SIGTERM the process named by a PID file, then SIGKILL with --force
 * when it doesn't exit within 5 seconds.
 */
export async function stopManagedProcess(
  target: StopTarget,
  options: StopCommandOptions = {}
): Promise<void> {
  const { label } = target;
  const pid = readPidFile(target.pidFile);
  if (pid === null) {
    console.log(`${label} is not running (no PID file).`);
    return;
  }

  if (!isProcessRunning(pid)) {
    console.log(`${label} is not running (stale PID ${pid}).`);
    cleanup(target);
    console.log("Cleaned up stale files.");
    return;
  }

  console.log(`Stopping ${label.toLowerCase()} (PID ${pid})...`);
  try {
    process.kill(pid, "SIGTERM");
  } catch (error) {
    const code = errorCode(error);
    if (code === "ESRCH") {
      console.log("Process already exited.");
      cleanup(target);
      return;
    }
    if (code === "EPERM") {
      console.error(`Permission denied. Cannot stop the ${label.toLowerCase()}.`);
      process.exit(1);
    }
    throw error;
  }

  if (await waitForExit(pid, 5000)) {
    console.log(`${label} stopped successfully.`);
    cleanup(target);
    return;
  }

  if (!options.force) {
    console.error(
      `${label} did not stop within 5 seconds.\nUse --force to send SIGKILL.`
    );
    process.exit(1);
  }

  console.log("Process did not exit, sending SIGKILL...");
  try {
    process.kill(pid, "SIGKILL");
  } catch {
    // Exited between the check and the kill
  }

  if (await waitForExit(pid, 500)) {
    console.log(`${label} killed.`);
    cleanup(target);
  } else {
    console.error(`Failed to kill ${label.toLowerCase()}.`);
    process.exit(1);
  }
}

export async function stopCommand(options: StopCommandOptions = {}): Promise<void> {
  const paths = getDaemonPaths();
  await stopManagedProcess(
    { label: "Daemon", pidFile: paths.pidFile, lockFile: paths.lockFile },
    options
  );
}
