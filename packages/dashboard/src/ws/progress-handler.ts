import type { FastifyInstance } from "fastify";
import { errorMessage } from "@cofounder/core";
import { respondToChat } from "../chat.js";
import type { ClientSocket } from "./connection-registry.js";
import { clientMessageSchema } from "./protocol.js";
import type { ClientMessage } from "./protocol.js";

/**
 * WebSocket at /ws. Clients receive every progress event, task update and
 * notification, and can send chat messages or cancel a task.
 */
export async function registerProgressWebSocket(fastify: FastifyInstance): Promise<void> {
  const registry = fastify.connectionRegistry;

  fastify.get("/ws", { websocket: true }, (socket) => {
    fastify.log.info("Progress WebSocket connected");
    registry.add(socket);

    socket.on("message", (raw) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(String(raw));
      } catch {
        registry.send(socket, { type: "error", message: "Invalid JSON" });
        return;
      }

      const message = clientMessageSchema.safeParse(parsed);
      if (!message.success) {
        registry.send(socket, { type: "error", message: "Unknown message" });
        return;
      }

      handleMessage(fastify, socket, message.data).catch((err: unknown) => {
        fastify.log.error({ err: errorMessage(err) }, "WebSocket message failed");
        registry.send(socket, { type: "error", message: errorMessage(err) });
      });
    });

    socket.on("close", () => {
      registry.remove(socket);
      fastify.log.info("Progress WebSocket disconnected");
    });
  });
}

async function handleMessage(
  fastify: FastifyInstance,
  socket: ClientSocket,
  message: ClientMessage,
): Promise<void> {
  const registry = fastify.connectionRegistry;

  switch (message.type) {
    case "chat": {
      const reply = await respondToChat(fastify, message.text);
      registry.send(socket, { type: "chat:reply", reply });
      break;
    }
    case "cancel":
      registry.send(socket, {
        type: "cancel:result",
        taskId: message.taskId,
        cancelled: fastify.taskProcessor.cancel(message.taskId),
      });
      break;
    case "ping":
      registry.send(socket, { type: "pong" });
      break;
  }
}
