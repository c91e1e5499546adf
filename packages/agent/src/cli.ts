/**
 * Agent command line: channel-recorder-agent --config <path>
 */

import * as path from "node:path";
import {
  acquireLockWithCleanup,
  getAgentPaths,
  installTimestampLogging,
  releaseLock,
  removePidFile,
  writePidFile,
} from "@channel-recorder/core";
import { RecorderAgent } from "./reconciler.js";

export const AGENT_USAGE = "Usage: channel-recorder-agent --config <path>";

/** Value following --config, or null when absent */
export function parseAgentArgs(argv: readonly string[]): string | null {
  const index = argv.indexOf("--config");
  if (index === -1) return null;
  const value = argv[index + 1];
  return value === undefined || value === "" ? null : value;
}

/**
 * Run the agent until SIGINT/SIGTERM. Exits 2 on bad usage and 1 when
 * another agent holds the lock for the same desired-state file.
 */
export function runAgentCli(argv: readonly string[]): RecorderAgent {
  const configPath = parseAgentArgs(argv);
  if (configPath === null) {
    process.stderr.write(`${AGENT_USAGE}\n`);
    process.exit(2);
  }

  installTimestampLogging();

  const paths = getAgentPaths(path.resolve(configPath));
  const lock = acquireLockWithCleanup(paths.lockFile, paths.pidFile);
  if (!lock.acquired) {
    console.error(
      lock.existingPid
        ? `[RecorderAgent] Another agent is running (PID ${lock.existingPid})`
        : `[RecorderAgent] Failed to acquire lock: ${lock.error ?? "unknown error"}`
    );
    process.exit(1);
  }
  writePidFile(process.pid, paths.pidFile);

  const agent = new RecorderAgent({
    desiredStateFile: paths.desiredStateFile,
    activeSessionsDir: paths.activeSessionsDir,
  });

  const shutdown = (signal: string) => {
    console.log(`[RecorderAgent] Received ${signal}, shutting down...`);
    agent.stop();
    releaseLock(paths.lockFile);
    removePidFile(paths.pidFile);
    process.exit(0);
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  agent.start();
  return agent;
}
