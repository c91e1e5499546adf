/**
 * Recordings library endpoints: listing, deletion, encryption migration,
 * retention and history.
 */

import type { FastifyInstance } from "fastify";
import * as path from "node:path";
import {
  enforceRetention,
  isEncryptedArtifact,
  listRecordingHistory,
  listRecordings,
  type RecordingListing,
  type RecordingStatus,
} from "@channel-recorder/core";
import { inFlightOutputPaths, type ServiceContext } from "../context.js";
import { sendError, sendInvalidBody } from "./errors.js";

const RECORDING_STATUSES: readonly RecordingStatus[] = [
  "recording",
  "completed",
  "failed",
  "stopped",
  "interrupted",
];

function isRecordingStatus(value: string): value is RecordingStatus {
  return RECORDING_STATUSES.some((status) => status === value);
}

function toJson(listing: RecordingListing) {
  return {
    channelName: listing.channelName,
    filename: listing.filename,
    path: listing.path,
    recordedAt: listing.recordedAt?.toISOString() ?? null,
    encrypted: listing.encrypted,
    originalFilename: listing.originalFilename,
  };
}

/** Absolute path of a file directly inside the recordings directory */
function resolveRecordingPath(recordingsDir: string, body: unknown): string | null {
  if (typeof body !== "object" || body === null) return null;
  const raw = "path" in body ? body.path : undefined;
  if (typeof raw !== "string" || raw.trim() === "") return null;

  const resolved = path.resolve(recordingsDir, raw.trim());
  return path.dirname(resolved) === path.resolve(recordingsDir) ? resolved : null;
}

export async function registerRecordingsRoutes(
  app: FastifyInstance,
  context: ServiceContext
): Promise<void> {
  const { recordingsDir, vault, manager, finalizer } = context;

  app.get("/api/recordings", async (_request, reply) => {
    try {
      const manifest = vault?.loadManifest(recordingsDir);
      return { ok: true, recordings: listRecordings(recordingsDir, manifest).map(toJson) };
    } catch (error) {
      return sendError(reply, error, "Failed to list recordings");
    }
  });

  app.delete<{ Body: unknown }>("/api/recordings", async (request, reply) => {
    const filePath = resolveRecordingPath(recordingsDir, request.body);
    if (filePath === null) return sendInvalidBody(reply);

    try {
      const filename = path.basename(filePath);
      if (vault && isEncryptedArtifact(filename)) {
        const trashedTo = vault.trashEncryptedRecording(filename, recordingsDir);
        return { ok: true, deleted: filePath, trashedTo };
      }
      const trashedTo = manager.deleteRecording(filePath);
      return { ok: true, deleted: filePath, trashedTo };
    } catch (error) {
      return sendError(reply, error, "Failed to delete recording");
    }
  });

  app.post("/api/recordings/migrate", async (_request, reply) => {
    try {
      const result = await finalizer.migrate();
      if (result === null) {
        return reply.code(409).send({ ok: false, error: "encryption_disabled" });
      }
      return { ok: true, ...result };
    } catch (error) {
      return sendError(reply, error, "Failed to migrate recordings");
    }
  });

  app.post("/api/recordings/retention", async (_request, reply) => {
    try {
      const result = enforceRetention({
        directory: recordingsDir,
        policy: context.retention,
        vault: vault ?? undefined,
        activeOutputPaths: inFlightOutputPaths(context),
      });
      return { ok: true, ...result };
    } catch (error) {
      return sendError(reply, error, "Failed to apply retention");
    }
  });

  app.get<{ Querystring: { channel?: string; status?: string; limit?: string } }>(
    "/api/recordings/history",
    async (request, reply) => {
      const { channel, status, limit } = request.query;
      if (status !== undefined && !isRecordingStatus(status)) {
        return reply.code(400).send({ ok: false, error: "invalid_status" });
      }
      const parsedLimit = limit === undefined ? undefined : parseInt(limit, 10);
      if (parsedLimit !== undefined && (isNaN(parsedLimit) || parsedLimit < 1)) {
        return reply.code(400).send({ ok: false, error: "invalid_limit" });
      }

      try {
        const history = listRecordingHistory(context.db, {
          channelLogin: channel?.trim().toLowerCase() || undefined,
          status,
          limit: parsedLimit,
        });
        return { ok: true, history };
      } catch (error) {
        return sendError(reply, error, "Failed to list recording history");
      }
    }
  );
}
