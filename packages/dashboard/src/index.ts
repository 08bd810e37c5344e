import { join } from "node:path";
import { createCofounder, errorMessage, loadConfig } from "@cofounder/core";
import { openDatabase } from "./db.js";
import { createServer } from "./server.js";

async function main() {
  const config = loadConfig();
  const cofounder = await createCofounder(config);
  const db = openDatabase(join(config.agentDir, "cofounder.db"));

  const server = await createServer({
    cofounder,
    db,
    logsDir: join(config.agentDir, "tasks", "logs"),
  });

  server.log.info(`Agent directory: ${config.agentDir}`);

  const health = await cofounder.model.healthCheck();
  if (health.healthy) {
    server.log.info(`Model ${cofounder.model.model} is ready`);
  } else {
    server.log.warn(`${health.message ?? "Model is not ready"}. ${health.resolution ?? ""}`.trim());
  }

  const port = parseInt(process.env.COFOUNDER_PORT ?? "4321", 10);

  try {
    await server.listen({ port, host: "127.0.0.1" });
    console.log(`\nDashboard running at http://localhost:${port}`);
    console.log("Press Ctrl+C to stop\n");
  } catch (err) {
    console.error("Failed to start server:", errorMessage(err));
    process.exit(1);
  }

  // Graceful shutdown: running tasks pause at their next step and checkpoint
  const shutdown = async (signal: string) => {
    console.log(`\n${signal} received, shutting down gracefully...`);
    try {
      await server.close();
      db.close();
      console.log("Server closed.");
      process.exit(0);
    } catch (err) {
      console.error("Error during shutdown:", errorMessage(err));
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error("Fatal error:", errorMessage(err));
  process.exit(1);
});
