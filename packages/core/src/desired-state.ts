/**
 * Desired-state file shared by the app and the background agent.
 *
 * The app writes it; the agent only reads it. Writes go through a temp
 * file and a rename, so the agent never observes a half-written file,
 * and unchanged content is not rewritten, so the agent's mtime check
 * does not fire for nothing.
 */

import * as fs from "node:fs";
import { normalizeChannels } from "./channels.js";
import { writeFileAtomic } from "./fs-utils.js";
import type { AgentChannel, DesiredState } from "./types/index.js";

export const DESIRED_STATE_VERSION = 1;
export const DEFAULT_POLL_INTERVAL_SECONDS = 25;

export class DesiredStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DesiredStateError";
  }
}

function field(record: object, key: string): unknown {
  return key in record ? Reflect.get(record, key) : undefined;
}

function parseChannel(value: unknown, index: number): AgentChannel {
  if (typeof value !== "object" || value === null) {
    throw new DesiredStateError(`channels[${index}] must be an object`);
  }
  const login = field(value, "login");
  if (typeof login !== "string") {
    throw new DesiredStateError(`channels[${index}].login must be a string`);
  }
  const displayName = field(value, "displayName");
  if (displayName === undefined || displayName === null) {
    return { login };
  }
  if (typeof displayName !== "string") {
    throw new DesiredStateError(
      `channels[${index}].displayName must be a string`
    );
  }
  return { login, displayName };
}

/**
 * Validate a decoded desired-state document.
 * Throws DesiredStateError naming the first bad field.
 */
export function parseDesiredState(value: unknown): DesiredState {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new DesiredStateError("desired state must be a JSON object");
  }

  const version = field(value, "version");
  if (typeof version !== "number" || !Number.isInteger(version)) {
    throw new DesiredStateError("version must be an integer");
  }
  const enabled = field(value, "enabled");
  if (typeof enabled !== "boolean") {
    throw new DesiredStateError("enabled must be a boolean");
  }
  const rawToolPath = field(value, "captureToolPath") ?? null;
  let captureToolPath: string | null = null;
  if (typeof rawToolPath === "string") {
    captureToolPath = rawToolPath;
  } else if (rawToolPath !== null) {
    throw new DesiredStateError("captureToolPath must be a string or null");
  }
  const recordingsDirectory = field(value, "recordingsDirectory");
  if (typeof recordingsDirectory !== "string") {
    throw new DesiredStateError("recordingsDirectory must be a string");
  }
  const quality = field(value, "quality");
  if (typeof quality !== "string") {
    throw new DesiredStateError("quality must be a string");
  }
  const pollIntervalSeconds = field(value, "pollIntervalSeconds");
  if (
    typeof pollIntervalSeconds !== "number" ||
    !Number.isFinite(pollIntervalSeconds) ||
    pollIntervalSeconds < 0
  ) {
    throw new DesiredStateError(
      "pollIntervalSeconds must be a non-negative number"
    );
  }
  const channels = field(value, "channels");
  if (!Array.isArray(channels)) {
    throw new DesiredStateError("channels must be an array");
  }

  return {
    version,
    enabled,
    captureToolPath,
    recordingsDirectory,
    quality,
    pollIntervalSeconds,
    channels: channels.map((channel: unknown, index) =>
      parseChannel(channel, index)
    ),
  };
}

/** Read and validate the desired-state file */
export function readDesiredState(filePath: string): DesiredState {
  const raw = fs.readFileSync(filePath, "utf-8");
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw new DesiredStateError(
      `invalid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseDesiredState(decoded);
}

export function serializeDesiredState(state: DesiredState): string {
  return JSON.stringify(state, null, 2) + "\n";
}

/**
 * Write the desired-state file atomically.
 * Returns false when the file already holds identical content.
 */
export function writeDesiredState(filePath: string, state: DesiredState): boolean {
  const content = serializeDesiredState(state);
  try {
    if (fs.readFileSync(filePath, "utf-8") === content) {
      return false;
    }
  } catch {
    // Missing or unreadable: write it
  }
  writeFileAtomic(filePath, content);
  return true;
}

export interface SyncDesiredStateInput {
  enabled: boolean;
  channels: readonly AgentChannel[];
  captureToolPath?: string | null;
  recordingsDirectory: string;
  quality?: string;
  pollIntervalSeconds?: number;
}

/**
 * Build a desired state from app settings. Channels are normalized and
 * the agent is only enabled when there is something to record.
 */
export function buildDesiredState(input: SyncDesiredStateInput): DesiredState {
  const channels = normalizeChannels(input.channels);
  const captureToolPath = input.captureToolPath?.trim();
  return {
    version: DESIRED_STATE_VERSION,
    enabled: input.enabled && channels.length > 0,
    captureToolPath: captureToolPath ? captureToolPath : null,
    recordingsDirectory: input.recordingsDirectory,
    quality: input.quality ?? "best",
    pollIntervalSeconds: input.pollIntervalSeconds ?? DEFAULT_POLL_INTERVAL_SECONDS,
    channels,
  };
}
