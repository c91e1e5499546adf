/**
 * Health check endpoint with daemon diagnostics.
 */

import type { FastifyInstance } from "fastify";
import type { ServiceContext } from "../context.js";

export async function registerHealthRoutes(
  app: FastifyInstance,
  context: ServiceContext
): Promise<void> {
  app.get("/api/health", async () => {
    return {
      ok: true,
      status: "ok",
      service: "channel-recorder",
      pid: process.pid,
      uptime: process.uptime(),
      activeRecordings: context.manager.activeRecordingCount,
      encryption: context.vault !== null,
      timestamp: new Date().toISOString(),
    };
  });
}
