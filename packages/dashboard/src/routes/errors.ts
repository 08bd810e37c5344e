import type { FastifyReply } from "fastify";
import { CofounderError } from "@cofounder/core";
import type { ErrorCode } from "@cofounder/core";

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  INVALID_INPUT: 400,
  UNKNOWN_CATEGORY: 404,
  CHECKPOINT_NOT_FOUND: 404,
  CHECKPOINT_CORRUPTION: 422,
  TASK_ALREADY_RUNNING: 409,
  MODEL_UNAVAILABLE: 503,
};

/**
 * Reply with the HTTP status for a core error. Anything else is rethrown
 * and becomes a 500 from Fastify's error handler.
 */
export function sendError(reply: FastifyReply, error: unknown): FastifyReply {
  if (error instanceof CofounderError) {
    return reply
      .code(STATUS_BY_CODE[error.code] ?? 500)
      .send({ error: error.message, code: error.code });
  }
  throw error;
}
