/**
 * Recordings directory listing: plaintext captures plus encrypted
 * artifacts described by the manifest.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { parseRecordingFilename } from "../channels.js";
import { errorCode } from "../errors.js";
import type { RecordingListing, RecordingManifest } from "../types/index.js";
import { isEncryptedArtifact, isPlaintextRecording } from "../vault/vault.js";

function fileMtime(filePath: string): Date | null {
  try {
    return fs.statSync(filePath).mtime;
  } catch {
    return null;
  }
}

function parseDate(value: string): Date | null {
  const date = new Date(value);
  return isNaN(date.getTime()) ? null : date;
}

/**
 * List recordings, newest first (undated last). Encrypted artifacts are
 * listed only when a manifest is given; artifacts missing from it show
 * up as channel "unknown".
 */
export function listRecordings(
  directory: string,
  manifest?: RecordingManifest
): RecordingListing[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(directory, { withFileTypes: true });
  } catch (error) {
    if (errorCode(error) === "ENOENT") return [];
    throw error;
  }

  const listings: RecordingListing[] = [];
  for (const entry of entries) {
    if (!entry.isFile()) continue;
    const filePath = path.join(directory, entry.name);

    if (isPlaintextRecording(entry.name)) {
      const parsed = parseRecordingFilename(entry.name);
      listings.push({
        channelName:
          parsed?.channelName ?? path.basename(entry.name, path.extname(entry.name)),
        filename: entry.name,
        path: filePath,
        recordedAt: parsed?.recordedAt ?? fileMtime(filePath),
        encrypted: false,
        originalFilename: null,
      });
    } else if (manifest && isEncryptedArtifact(entry.name)) {
      const described = manifest[entry.name];
      listings.push({
        channelName: described?.channelName ?? "unknown",
        filename: entry.name,
        path: filePath,
        recordedAt: described ? parseDate(described.date) : fileMtime(filePath),
        encrypted: true,
        originalFilename: described?.originalFilename ?? null,
      });
    }
  }

  return listings.sort((a, b) => {
    const at = a.recordedAt?.getTime() ?? -Infinity;
    const bt = b.recordedAt?.getTime() ?? -Infinity;
    return bt - at || a.filename.localeCompare(b.filename);
  });
}
