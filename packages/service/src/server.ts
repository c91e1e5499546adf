/**
 * Fastify server factory.
 * Creates and configures the daemon's control API.
 */

import Fastify, { type FastifyInstance } from "fastify";
import type { ServiceContext } from "./context.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerRecordingRoutes } from "./routes/recording.js";
import { registerRecordingsRoutes } from "./routes/recordings.js";
import { registerRecoveryIntentRoutes } from "./routes/recovery-intents.js";

export interface CreateServerOptions extends ServiceContext {
  /** Bearer token every request must carry (null = no auth) */
  apiToken?: string | null;

  /** Fastify request logging (default: true) */
  logger?: boolean;
}

/**
 * Create a configured Fastify server instance.
 */
export async function createServer(
  options: CreateServerOptions
): Promise<FastifyInstance> {
  const { apiToken, logger, ...context } = options;

  const app = Fastify({
    logger: logger ?? true,
  });

  if (apiToken) {
    const expected = `Bearer ${apiToken}`;
    app.addHook("onRequest", async (request, reply) => {
      if (request.headers.authorization !== expected) {
        return reply.code(401).send({ ok: false, error: "unauthorized" });
      }
    });
  }

  // Malformed JSON and other client errors share the invalid_body reply
  app.setErrorHandler((error, _request, reply) => {
    const status = error.statusCode ?? 500;
    if (status >= 400 && status < 500) {
      return reply.code(400).send({ ok: false, error: "invalid_body" });
    }
    console.error("Unhandled request error:", error);
    return reply.code(500).send({ ok: false, error: "internal_error" });
  });

  app.setNotFoundHandler((_request, reply) => {
    return reply.code(404).send({ ok: false, error: "not_found" });
  });

  // Register routes
  await registerHealthRoutes(app, context);
  await registerRecordingRoutes(app, context);
  await registerRecordingsRoutes(app, context);
  await registerRecoveryIntentRoutes(app, context);

  return app;
}

/**
 * Start the server on localhost only.
 */
export async function startServer(
  app: FastifyInstance,
  port: number
): Promise<void> {
  await app.listen({
    port,
    host: "127.0.0.1", // localhost only
  });
  console.log(`Channel Recorder daemon listening on http://127.0.0.1:${port}`);
}
