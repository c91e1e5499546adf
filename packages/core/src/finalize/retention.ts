/**
 * Retention pruning.
 *
 * Limits apply in a fixed order: age, then per channel, then global.
 * Each limit removes the oldest recordings that survived the previous
 * ones. A limit of 0 is disabled.
 */

import * as fs from "node:fs";
import { errorMessage } from "../errors.js";
import { isSamePath } from "../fs-utils.js";
import { createLogger, type Logger } from "../logger.js";
import type { RecordingListing } from "../types/index.js";
import type { RecordingVault } from "../vault/vault.js";
import { listRecordings } from "./library.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RetentionPolicy {
  maxAgeDays: number;
  keepLastGlobal: number;
  keepLastPerChannel: number;
}

export interface RetentionCandidate {
  path: string;
  channelName: string;
  recordedAt: Date;
}

export interface RetentionResult {
  deletedCount: number;
  failedCount: number;

  /** Paths removed, oldest first */
  deleted: string[];
}

export function isRetentionEnabled(policy: RetentionPolicy): boolean {
  return (
    policy.maxAgeDays > 0 ||
    policy.keepLastGlobal > 0 ||
    policy.keepLastPerChannel > 0
  );
}

function oldestFirst(a: RetentionCandidate, b: RetentionCandidate): number {
  return a.recordedAt.getTime() - b.recordedAt.getTime() || a.path.localeCompare(b.path);
}

/** Recordings to delete under policy at now, oldest first */
export function planRetention(
  recordings: readonly RetentionCandidate[],
  policy: RetentionPolicy,
  now: Date = new Date()
): RetentionCandidate[] {
  const sorted = [...recordings].sort(oldestFirst);
  const doomed = new Set<RetentionCandidate>();

  if (policy.maxAgeDays > 0) {
    const cutoff = now.getTime() - policy.maxAgeDays * DAY_MS;
    for (const recording of sorted) {
      if (recording.recordedAt.getTime() < cutoff) doomed.add(recording);
    }
  }

  if (policy.keepLastPerChannel > 0) {
    const byChannel = new Map<string, RetentionCandidate[]>();
    for (const recording of sorted) {
      if (doomed.has(recording)) continue;
      const key = recording.channelName.trim().toLowerCase();
      const group = byChannel.get(key) ?? [];
      group.push(recording);
      byChannel.set(key, group);
    }
    for (const group of byChannel.values()) {
      const excess = group.length - policy.keepLastPerChannel;
      for (const recording of group.slice(0, Math.max(0, excess))) {
        doomed.add(recording);
      }
    }
  }

  if (policy.keepLastGlobal > 0) {
    const remaining = sorted.filter((r) => !doomed.has(r));
    const excess = remaining.length - policy.keepLastGlobal;
    for (const recording of remaining.slice(0, Math.max(0, excess))) {
      doomed.add(recording);
    }
  }

  return sorted.filter((r) => doomed.has(r));
}

export interface EnforceRetentionOptions {
  directory: string;
  policy: RetentionPolicy;

  /** Needed to list and remove encrypted artifacts */
  vault?: RecordingVault;

  /** Outputs of running sessions; never pruned */
  activeOutputPaths?: readonly string[];

  now?: Date;
  logger?: Logger;
}

function toCandidate(listing: RecordingListing): RetentionCandidate | null {
  if (listing.recordedAt === null) return null;
  return {
    path: listing.path,
    channelName: listing.channelName,
    recordedAt: listing.recordedAt,
  };
}

/**
 * Apply a retention policy to a recordings directory.
 * A file that can't be removed is counted and logged; pruning continues.
 */
export function enforceRetention(options: EnforceRetentionOptions): RetentionResult {
  const result: RetentionResult = { deletedCount: 0, failedCount: 0, deleted: [] };
  if (!isRetentionEnabled(options.policy)) return result;

  const logger = options.logger ?? createLogger("Retention");
  const active = options.activeOutputPaths ?? [];
  const manifest = options.vault?.loadManifest(options.directory);

  const listings = listRecordings(options.directory, manifest).filter(
    (listing) => !active.some((p) => isSamePath(p, listing.path))
  );
  const byPath = new Map(listings.map((l) => [l.path, l]));
  const candidates = listings
    .map(toCandidate)
    .filter((c): c is RetentionCandidate => c !== null);

  for (const candidate of planRetention(candidates, options.policy, options.now)) {
    const listing = byPath.get(candidate.path);
    try {
      if (listing?.encrypted && options.vault) {
        options.vault.removeEncryptedRecording(listing.filename, options.directory);
      } else {
        fs.rmSync(candidate.path);
      }
      result.deletedCount++;
      result.deleted.push(candidate.path);
    } catch (error) {
      result.failedCount++;
      logger.error(`Failed to delete ${candidate.path}: ${errorMessage(error)}`);
    }
  }

  if (result.deletedCount > 0 || result.failedCount > 0) {
    logger.info(
      `Pruned ${result.deletedCount} recording(s), ${result.failedCount} failure(s)`
    );
  }
  return result;
}
