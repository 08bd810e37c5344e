/**
 * Task API Routes
 *
 * REST endpoints for the task registry, execution logs and cancellation.
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { TASK_CATEGORIES } from "@cofounder/core";
import type { ListTasksFilter } from "@cofounder/core";
import { toTaskResponse } from "../responses.js";

const statusSchema = z.enum(["pending", "running", "completed", "failed", "paused"]);

const listQuerySchema = z.object({
  // Comma-separated statuses
  status: z
    .string()
    .transform((value) => value.split(","))
    .pipe(z.array(statusSchema))
    .optional(),
  limit: z.coerce.number().int().positive().optional(),
  offset: z.coerce.number().int().nonnegative().optional(),
});

const pageQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
  offset: z.coerce.number().int().nonnegative().optional(),
});

const createBodySchema = z.object({
  objective: z.string().trim().min(1).max(10000),
  category: z.enum(TASK_CATEGORIES).optional(),
});

export async function registerTaskRoutes(fastify: FastifyInstance): Promise<void> {
  // GET /api/tasks - List tasks with optional filters
  fastify.get("/api/tasks", async (request, reply) => {
    const query = listQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.code(400).send({ error: "Invalid query", issues: query.error.issues });
    }

    const filter: ListTasksFilter = {};
    if (query.data.status) filter.status = query.data.status;
    if (query.data.limit) filter.limit = query.data.limit;
    if (query.data.offset) filter.offset = query.data.offset;

    const tasks = fastify.taskManager.list(filter);
    return { tasks: tasks.map((task) => toTaskResponse(task)) };
  });

  // POST /api/tasks - Start an autonomous task directly
  fastify.post("/api/tasks", async (request, reply) => {
    const body = createBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send({ error: "Body must be { objective: string, category?: string }" });
    }

    const { record } = fastify.taskProcessor.submit(body.data.objective, body.data.category);
    return reply.code(202).send(toTaskResponse(record));
  });

  // GET /api/tasks/:id - Get single task
  fastify.get<{ Params: { id: string } }>("/api/tasks/:id", async (request, reply) => {
    const record = fastify.taskManager.findById(request.params.id);
    if (!record) {
      return reply.code(404).send({ error: "Task not found" });
    }

    return toTaskResponse(record, fastify.cofounder.executor.getTask(record.id));
  });

  // GET /api/tasks/:id/log - Get task execution log
  fastify.get<{ Params: { id: string } }>("/api/tasks/:id/log", async (request, reply) => {
    const record = fastify.taskManager.findById(request.params.id);
    if (!record) {
      return reply.code(404).send({ error: "Task not found" });
    }

    const query = pageQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.code(400).send({ error: "Invalid query", issues: query.error.issues });
    }

    return {
      taskId: record.id,
      events: fastify.logStorage.getEvents(record.id, query.data),
    };
  });

  // POST /api/tasks/:id/cancel - Pause a running task at the next step boundary
  fastify.post<{ Params: { id: string } }>("/api/tasks/:id/cancel", async (request, reply) => {
    if (!fastify.taskProcessor.cancel(request.params.id)) {
      return reply.code(409).send({ error: "Task is not running" });
    }
    return reply.code(202).send({ cancelled: true });
  });
}
