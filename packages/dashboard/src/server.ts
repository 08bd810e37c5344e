import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import fastifyCors from "@fastify/cors";
import fastifyWebSocket from "@fastify/websocket";
import type { Cofounder, NotificationEvent } from "@cofounder/core";
import type { DashboardDatabase } from "./db.js";
import { toNotificationResponse } from "./responses.js";
import { registerChatRoutes } from "./routes/chat.js";
import { registerCheckpointRoutes } from "./routes/checkpoints.js";
import { registerContextRoutes } from "./routes/context.js";
import { registerNotificationRoutes } from "./routes/notifications.js";
import { registerTaskRoutes } from "./routes/tasks.js";
import { TaskLogStorage, TaskManager, TaskProcessor } from "./tasks/index.js";
import { ConnectionRegistry } from "./ws/connection-registry.js";
import { registerProgressWebSocket } from "./ws/progress-handler.js";

export interface ServerOptions {
  cofounder: Cofounder;
  db: DashboardDatabase;
  /** Directory for per-task JSONL execution logs */
  logsDir: string;
  /** Pretty request logging; off in tests */
  logger?: boolean;
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    cofounder: Cofounder;
    taskManager: TaskManager;
    logStorage: TaskLogStorage;
    taskProcessor: TaskProcessor;
    connectionRegistry: ConnectionRegistry;
  }
}

export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const { cofounder } = options;

  const fastify = Fastify({
    logger:
      options.logger === false
        ? false
        : {
            level: "info",
            transport: {
              target: "pino-pretty",
              options: {
                translateTime: "HH:MM:ss Z",
                ignore: "pid,hostname",
              },
            },
          },
  });

  // Allow all origins: local single-user app
  await fastify.register(fastifyCors, {
    origin: true,
  });

  await fastify.register(fastifyWebSocket);

  const connectionRegistry = new ConnectionRegistry();
  const taskManager = new TaskManager(options.db);
  const logStorage = new TaskLogStorage(options.logsDir);
  const taskProcessor = new TaskProcessor({
    cofounder,
    taskManager,
    logStorage,
    connectionRegistry,
  });

  fastify.decorate("cofounder", cofounder);
  fastify.decorate("taskManager", taskManager);
  fastify.decorate("logStorage", logStorage);
  fastify.decorate("taskProcessor", taskProcessor);
  fastify.decorate("connectionRegistry", connectionRegistry);

  // Push notifications to connected clients; a new one counts as
  // delivered once any client has received it
  const onNotification = (event: NotificationEvent): void => {
    const received = connectionRegistry.broadcastToAll({
      type: "notification",
      notification: toNotificationResponse(event.notification),
    });
    if (event.type === "notification:created" && received > 0) {
      cofounder.notifications.markDelivered(event.notification.id);
    }
  };
  cofounder.notifications.on("notification", onNotification);

  fastify.addHook("onClose", async () => {
    cofounder.notifications.off("notification", onNotification);
    await taskProcessor.shutdown();
  });

  await registerProgressWebSocket(fastify);
  await registerChatRoutes(fastify);
  await registerTaskRoutes(fastify);
  await registerCheckpointRoutes(fastify);
  await registerContextRoutes(fastify);
  await registerNotificationRoutes(fastify);

  return fastify;
}
