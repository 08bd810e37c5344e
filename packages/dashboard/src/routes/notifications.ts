/**
 * Notification API Routes
 *
 * REST endpoints for notification management.
 */

import type { FastifyInstance } from "fastify";
import { toNotificationResponse } from "../responses.js";

export async function registerNotificationRoutes(fastify: FastifyInstance): Promise<void> {
  // GET /api/notifications - List all notifications
  fastify.get("/api/notifications", async () => {
    const service = fastify.cofounder.notifications;
    return {
      notifications: service.getAll().map(toNotificationResponse),
      pendingCount: service.getPending().length,
    };
  });

  // GET /api/notifications/pending - List pending notifications
  fastify.get("/api/notifications/pending", async () => {
    return {
      notifications: fastify.cofounder.notifications.getPending().map(toNotificationResponse),
    };
  });

  // GET /api/notifications/:id - Get single notification
  fastify.get<{ Params: { id: string } }>("/api/notifications/:id", async (request, reply) => {
    const notification = fastify.cofounder.notifications.get(request.params.id);
    if (!notification) {
      return reply.code(404).send({ error: "Notification not found" });
    }
    return toNotificationResponse(notification);
  });

  // POST /api/notifications/:id/read - Mark notification as read
  fastify.post<{ Params: { id: string } }>("/api/notifications/:id/read", async (request, reply) => {
    if (!fastify.cofounder.notifications.markRead(request.params.id)) {
      return reply.code(404).send({ error: "Notification not found" });
    }
    return { success: true };
  });

  // POST /api/notifications/:id/dismiss - Dismiss notification
  fastify.post<{ Params: { id: string } }>(
    "/api/notifications/:id/dismiss",
    async (request, reply) => {
      if (!fastify.cofounder.notifications.dismiss(request.params.id)) {
        return reply.code(404).send({ error: "Notification not found" });
      }
      return { success: true };
    },
  );

  // GET /api/tasks/:id/notifications - Get notifications for a task
  fastify.get<{ Params: { id: string } }>("/api/tasks/:id/notifications", async (request) => {
    return {
      notifications: fastify.cofounder.notifications
        .getForTask(request.params.id)
        .map(toNotificationResponse),
    };
  });
}
