/**
 * Chat API Route
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { respondToChat } from "../chat.js";

const chatBodySchema = z.object({
  text: z.string().max(10000),
});

export async function registerChatRoutes(fastify: FastifyInstance): Promise<void> {
  // POST /api/chat - Route a message: chat reply, or a background task (202)
  fastify.post("/api/chat", async (request, reply) => {
    const body = chatBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send({ error: "Body must be { text: string }" });
    }

    const response = await respondToChat(fastify, body.data.text);
    return reply.code(response.kind === "task" ? 202 : 200).send(response);
  });
}
