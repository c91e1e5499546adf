/**
 * Capture tool contract shared by the session manager and the agent.
 */

import { resolveExecutable } from "./process/executable.js";

export const CAPTURE_TOOL_NAME = "streamlink";

export function captureArguments(
  target: string,
  quality: string,
  outputPath: string
): string[] {
  return [
    target,
    quality,
    "--twitch-disable-ads",
    "--twitch-low-latency",
    "--output",
    outputPath,
  ];
}

/**
 * Resolve the capture executable: the override when it is executable,
 * else PATH (unless searchPath is false), else the well-known dirs.
 */
export function resolveCaptureTool(
  override: string | null,
  options: { searchPath?: boolean } = {}
): string | null {
  return resolveExecutable(CAPTURE_TOOL_NAME, {
    override,
    searchPath: options.searchPath ?? true,
  });
}
