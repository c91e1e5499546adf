/**
 * Recovery intents left by the previous daemon process.
 */

import type { FastifyInstance } from "fastify";
import type { ServiceContext } from "../context.js";

export async function registerRecoveryIntentRoutes(
  app: FastifyInstance,
  context: ServiceContext
): Promise<void> {
  app.get("/api/recovery-intents", async () => {
    return { ok: true, intents: context.recoveredIntents };
  });
}
