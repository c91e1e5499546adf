/**
 * Logs command - print the tail of the daemon or agent log.
 */

import { existsSync, readFileSync } from "node:fs";
import { getDaemonPaths } from "@channel-recorder/core";

export interface LogsCommandOptions {
  tail?: string;
  agent?: boolean;
}

/**
 * Get last N lines from a file's content.
 */
export function tailLines(content: string, n: number): string[] {
  const lines = content.split("\n");
  // Remove trailing empty line if present
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return n > 0 ? lines.slice(-n) : [];
}

export async function logsCommand(
  options: LogsCommandOptions = {}
): Promise<void> {
  const paths = getDaemonPaths();
  const logFile = options.agent ? paths.agent.logFile : paths.logFile;
  const parsed = options.tail ? parseInt(options.tail, 10) : 50;
  const tailCount = isNaN(parsed) ? 50 : parsed;

  if (!existsSync(logFile)) {
    console.error(`Log file not found: ${logFile}`);
    console.error("");
    console.error(
      options.agent
        ? "Run 'channel-recorder agent start' to start the background agent."
        : "Run 'channel-recorder start --daemon' to start the daemon."
    );
    process.exit(1);
  }

  const lines = tailLines(readFileSync(logFile, "utf-8"), tailCount);
  if (lines.length === 0) {
    console.log("Log file is empty.");
    return;
  }

  console.log(`Last ${lines.length} lines from ${logFile}:`);
  console.log("=".repeat(60));
  console.log("");

  for (const line of lines) {
    console.log(line);
  }
}
