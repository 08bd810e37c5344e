/**
 * Context API Routes - read-only view of the context store
 */

import type { FastifyInstance } from "fastify";
import { sendError } from "./errors.js";

export async function registerContextRoutes(fastify: FastifyInstance): Promise<void> {
  // GET /api/context - Usage per category
  fastify.get("/api/context", async () => {
    return fastify.cofounder.contextStore.stats();
  });

  // GET /api/context/:category - Entries of one category, oldest first
  fastify.get<{ Params: { category: string } }>(
    "/api/context/:category",
    async (request, reply) => {
      try {
        const entries = await fastify.cofounder.contextStore.getEntries(request.params.category);
        return { category: request.params.category, entries };
      } catch (error) {
        return sendError(reply, error);
      }
    },
  );
}
