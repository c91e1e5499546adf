/**
 * Remux captured transport streams into a seekable MP4 container.
 * The capture tool writes .mp4 names but may produce raw MPEG-TS.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { randomUUID } from "node:crypto";
import { RemuxToolNotFoundError } from "../errors.js";
import { resolveExecutable } from "../process/executable.js";
import { runProcess, type ProcessRunner } from "../process/run.js";
import { isTransportStreamFile } from "./transport-stream.js";

export const REMUX_TOOL_NAME = "ffmpeg";

export interface PreparedRecording {
  path: string;
  didRemux: boolean;
}

export interface PrepareRecordingOptions {
  /** Remux executable override */
  remuxToolPath?: string | null;

  runner?: ProcessRunner;

  /** Tool lookup; defaults to override, then PATH, then well-known dirs */
  resolveTool?: (override: string | null) => string | null;
}

export function remuxArguments(input: string, output: string): string[] {
  return [
    "-y",
    "-hide_banner",
    "-loglevel",
    "error",
    "-i",
    input,
    "-c",
    "copy",
    "-movflags",
    "+faststart",
    "-bsf:a",
    "aac_adtstoasc",
    output,
  ];
}

/** Sibling temp path: <dir>/<stem>.remux-<uuid>.mp4 */
export function remuxTempPath(filePath: string): string {
  const stem = path.basename(filePath, path.extname(filePath));
  return path.join(path.dirname(filePath), `${stem}.remux-${randomUUID()}.mp4`);
}

export function resolveRemuxTool(override: string | null): string | null {
  return resolveExecutable(REMUX_TOOL_NAME, { override });
}

/**
 * Remux the file in place when it is a transport stream.
 * Throws RemuxToolNotFoundError when no remux tool resolves; a failed
 * remux leaves the original untouched.
 */
export async function prepareRecordingForPlayback(
  filePath: string,
  options: PrepareRecordingOptions = {}
): Promise<PreparedRecording> {
  if (!isTransportStreamFile(filePath)) {
    return { path: filePath, didRemux: false };
  }

  const resolveTool = options.resolveTool ?? resolveRemuxTool;
  const tool = resolveTool(options.remuxToolPath ?? null);
  if (tool === null) {
    throw new RemuxToolNotFoundError();
  }

  const tempPath = remuxTempPath(filePath);
  const runner = options.runner ?? runProcess;
  try {
    await runner(tool, remuxArguments(filePath, tempPath));
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }

  return { path: filePath, didRemux: true };
}
