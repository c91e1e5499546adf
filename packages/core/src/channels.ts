/**
 * Channel identity and recording filename helpers.
 * A channel is keyed by its normalized login: trimmed and lowercased.
 */

import type { AgentChannel } from "./types/index.js";

/** Base URL the agent builds capture targets from */
export const CHANNEL_URL_BASE = "https://twitch.tv/";

/** Extension of plaintext recordings written by the capture tool */
export const RECORDING_EXTENSION = ".mp4";

/** Trim + lowercase; null for blank input */
export function normalizeLogin(login: string | null | undefined): string | null {
  const normalized = login?.trim().toLowerCase() ?? "";
  return normalized === "" ? null : normalized;
}

/**
 * Normalize a channel list: trim and lowercase logins, drop blanks and
 * duplicates (first wins), blank display names become absent, sorted by
 * login.
 */
export function normalizeChannels(channels: readonly AgentChannel[]): AgentChannel[] {
  const seen = new Set<string>();
  const result: AgentChannel[] = [];

  for (const channel of channels) {
    const login = normalizeLogin(channel.login);
    if (login === null || seen.has(login)) continue;
    seen.add(login);

    const displayName = channel.displayName?.trim();
    result.push(displayName ? { login, displayName } : { login });
  }

  return result.sort((a, b) =>
    a.login.localeCompare(b.login, undefined, { sensitivity: "base" })
  );
}

export function channelUrl(login: string): string {
  return `${CHANNEL_URL_BASE}${login}`;
}

/** Prefix https:// unless the target already carries a scheme */
export function normalizeTarget(target: string): string {
  const trimmed = target.trim();
  if (trimmed.startsWith("http://") || trimmed.startsWith("https://")) {
    return trimmed;
  }
  return `https://${trimmed}`;
}

/**
 * Resolve the channel login a capture target refers to: the last path
 * segment of the target URL, else the channel name.
 *
 * "twitch.tv/Streamer" → "streamer"
 */
export function resolveChannelLogin(
  target: string,
  channelName?: string | null
): string | null {
  try {
    const url = new URL(normalizeTarget(target));
    const segments = url.pathname.split("/").filter((s) => s.length > 0);
    const last = segments[segments.length - 1];
    if (last !== undefined) {
      return normalizeLogin(decodeURIComponent(last));
    }
  } catch {
    // Not a URL; fall back to the channel name
  }
  return normalizeLogin(channelName);
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as YYYY-MM-DD_HH-mm-ss */
export function formatFilenameTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

/** <name>_<YYYY-MM-DD_HH-mm-ss>.mp4 with spaces turned into underscores */
export function recordingFilename(channelName: string, startedAt: Date): string {
  const safeName = channelName.trim().replace(/\s+/g, "_").replaceAll("/", "_") || "channel";
  return `${safeName}_${formatFilenameTimestamp(startedAt)}${RECORDING_EXTENSION}`;
}

const FILENAME_PATTERN =
  /^(.+)_(\d{4})-(\d{2})-(\d{2})_(\d{2})-(\d{2})-(\d{2})\.[A-Za-z0-9]+$/;

/**
 * Recover channel name and start time from a recording filename.
 * Returns null for names that don't follow the recording pattern.
 */
export function parseRecordingFilename(
  filename: string
): { channelName: string; recordedAt: Date } | null {
  const match = FILENAME_PATTERN.exec(filename);
  if (!match) return null;

  const [, name, year, month, day, hour, minute, second] = match;
  if (name === undefined) return null;
  return {
    channelName: name,
    recordedAt: new Date(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hour),
      Number(minute),
      Number(second)
    ),
  };
}
