/**
 * Recording control endpoints: status, start, stop, toggle.
 */

import type { FastifyInstance } from "fastify";
import { resolveChannelLogin } from "@channel-recorder/core";
import type { ServiceContext } from "../context.js";
import { sendError, sendInvalidBody } from "./errors.js";

interface StartBody {
  target: string;
  channelName?: string;
  quality?: string;
}

function isOptionalString(value: unknown): value is string | undefined | null {
  return value === undefined || value === null || typeof value === "string";
}

function parseStartBody(body: unknown): StartBody | null {
  if (typeof body !== "object" || body === null) return null;
  const target = "target" in body ? body.target : undefined;
  if (typeof target !== "string" || target.trim() === "") return null;

  const channelName = "channelName" in body ? body.channelName : undefined;
  const quality = "quality" in body ? body.quality : undefined;
  if (!isOptionalString(channelName) || !isOptionalString(quality)) return null;

  return {
    target,
    channelName: channelName ?? undefined,
    quality: quality?.trim() || undefined,
  };
}

/** Stop body: absent, or an object with an optional channelLogin */
function parseStopLogin(body: unknown): string | null | undefined {
  if (body === undefined || body === null) return null;
  if (typeof body !== "object") return undefined;
  const login = "channelLogin" in body ? body.channelLogin : undefined;
  if (!isOptionalString(login)) return undefined;
  return login?.trim() || null;
}

export async function registerRecordingRoutes(
  app: FastifyInstance,
  context: ServiceContext
): Promise<void> {
  const { manager } = context;

  app.get("/api/recording/status", async () => {
    const backgroundSessions = context.backgroundSessions();
    return {
      ok: true,
      activeRecordings: manager.activeRecordingCount,
      sessions: manager.activeSessions(),
      backgroundSessions,
      anyRecording: manager.activeRecordingCount > 0 || backgroundSessions.length > 0,
      lastError: manager.errorMessage,
      timestamp: new Date().toISOString(),
    };
  });

  app.post<{ Body: unknown }>("/api/recording/start", async (request, reply) => {
    const body = parseStartBody(request.body);
    if (!body) return sendInvalidBody(reply);

    try {
      if (manager.startRecording(body.target, body.channelName, body.quality)) {
        return { ok: true, started: true, outputPath: manager.lastOutputPath };
      }
      return reply.code(409).send({
        ok: false,
        started: false,
        error: manager.errorMessage ?? "unable_to_start",
      });
    } catch (error) {
      return sendError(reply, error, "Failed to start recording");
    }
  });

  app.post<{ Body: unknown }>("/api/recording/stop", async (request, reply) => {
    const login = parseStopLogin(request.body);
    if (login === undefined) return sendInvalidBody(reply);

    manager.stopRecording(login);
    return { ok: true, stopped: true };
  });

  app.post<{ Body: unknown }>("/api/recording/toggle", async (request, reply) => {
    const body = parseStartBody(request.body);
    if (!body) return sendInvalidBody(reply);

    try {
      const login = resolveChannelLogin(body.target, body.channelName);
      const wasRecording = login !== null && manager.isRecording(login);
      const recording = manager.toggleRecording(body.target, body.channelName);

      if (!wasRecording && !recording) {
        return reply.code(409).send({
          ok: false,
          recording: false,
          error: manager.errorMessage ?? "unable_to_start",
        });
      }
      return { ok: true, recording };
    } catch (error) {
      return sendError(reply, error, "Failed to toggle recording");
    }
  });
}
