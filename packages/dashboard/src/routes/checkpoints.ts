/**
 * Checkpoint API Routes
 */

import type { FastifyInstance } from "fastify";
import { toCheckpointResponse } from "../responses.js";
import { sendError } from "./errors.js";

export async function registerCheckpointRoutes(fastify: FastifyInstance): Promise<void> {
  // GET /api/checkpoints - List checkpoints, newest first
  fastify.get<{ Querystring: { taskId?: string } }>("/api/checkpoints", async (request) => {
    const checkpoints = await fastify.cofounder.checkpoints.list(request.query.taskId);
    return { checkpoints: checkpoints.map(toCheckpointResponse) };
  });

  // GET /api/checkpoints/:id - Full checkpoint with its steps
  fastify.get<{ Params: { id: string } }>("/api/checkpoints/:id", async (request, reply) => {
    try {
      const checkpoint = await fastify.cofounder.checkpoints.load(request.params.id);
      return { ...checkpoint, created: checkpoint.created.toISOString() };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  // POST /api/checkpoints/:id/resume - Continue the task in the background
  fastify.post<{ Params: { id: string } }>("/api/checkpoints/:id/resume", async (request, reply) => {
    try {
      const run = await fastify.taskProcessor.resume(request.params.id);
      return reply.code(202).send({ taskId: run.taskId, checkpointId: request.params.id });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  // DELETE /api/checkpoints/:id
  fastify.delete<{ Params: { id: string } }>("/api/checkpoints/:id", async (request, reply) => {
    const deleted = await fastify.cofounder.checkpoints.delete(request.params.id);
    if (!deleted) {
      return reply.code(404).send({ error: "Checkpoint not found" });
    }
    return reply.code(204).send();
  });
}
