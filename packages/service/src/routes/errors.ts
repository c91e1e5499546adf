/**
 * Mapping of thrown errors to JSON error replies.
 */

import type { FastifyReply } from "fastify";
import { IntegrityError, RecordingError, type RecordingErrorCode } from "@channel-recorder/core";

const STATUS_BY_CODE: Record<RecordingErrorCode, number> = {
  invalid_target: 400,
  already_recording: 409,
  concurrency_limit: 409,
  capture_tool_missing: 409,
  recordings_directory: 409,
  in_progress: 409,
  spawn_failed: 409,
  history_unavailable: 503,
  not_found: 404,
};

export function sendInvalidBody(reply: FastifyReply): FastifyReply {
  return reply.code(400).send({ ok: false, error: "invalid_body" });
}

/**
 * Reply for an error thrown by a route handler. Integrity failures are
 * logged at error level and reported as integrity_failure.
 */
export function sendError(
  reply: FastifyReply,
  error: unknown,
  context: string
): FastifyReply {
  if (error instanceof RecordingError) {
    return reply
      .code(STATUS_BY_CODE[error.code])
      .send({ ok: false, error: error.message, code: error.code });
  }
  if (error instanceof IntegrityError) {
    console.error(`${context}: integrity failure:`, error);
    return reply
      .code(500)
      .send({ ok: false, error: "integrity_failure", detail: error.message });
  }
  console.error(`${context}:`, error);
  return reply.code(500).send({ ok: false, error: "internal_error" });
}
