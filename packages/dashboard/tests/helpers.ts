/**
 * Test server with a scripted model, in-memory storage and SQLite
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  MemoryStorage,
  ModelUnavailableError,
  createCofounder,
  loadKeywordConfig,
  resolveConfig,
} from "@cofounder/core";
import type { ChatMessage, HealthResult, ModelClient } from "@cofounder/core";
import { openDatabase } from "../src/db.js";
import { createServer } from "../src/server.js";
import type { ClientSocket } from "../src/ws/connection-registry.js";
import type { ServerMessage } from "../src/ws/protocol.js";

export function createTempDir(prefix = "cofounder-dashboard-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanDir(dir: string): void {
  if (fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

export type Reply = string | Error | (() => string | Promise<string>);

export class ScriptedModel implements ModelClient {
  readonly provider = "ollama" as const;
  readonly model = "scripted";
  private readonly replies: Reply[];

  constructor(replies: Reply[] = []) {
    this.replies = [...replies];
  }

  push(...replies: Reply[]): void {
    this.replies.push(...replies);
  }

  async complete(_messages: ChatMessage[]): Promise<string> {
    const reply = this.replies.shift();
    if (reply === undefined) throw new ModelUnavailableError("No scripted reply left");
    if (reply instanceof Error) throw reply;
    return typeof reply === "function" ? reply() : reply;
  }

  async healthCheck(): Promise<HealthResult> {
    return { healthy: true };
  }
}

/**
 * Socket stand-in that keeps every message sent to it
 */
export class RecordingSocket implements ClientSocket {
  readyState = 1;
  readonly messages: ServerMessage[] = [];
  readonly raw: string[] = [];

  send(data: string): void {
    this.raw.push(data);
    this.messages.push(JSON.parse(data));
  }
}

export async function createTestServer(replies: Reply[] = []) {
  const agentDir = createTempDir();
  const model = new ScriptedModel(replies);
  const config = resolveConfig(
    { executor: { retryBackoff: { initialMs: 0, maxMs: 0, jitter: 0 } } },
    agentDir,
  );
  const cofounder = await createCofounder(config, {
    model,
    storage: new MemoryStorage(),
    keywords: loadKeywordConfig(),
  });
  const db = openDatabase(":memory:");
  const server = await createServer({
    cofounder,
    db,
    logsDir: path.join(agentDir, "tasks", "logs"),
    logger: false,
  });

  return {
    server,
    model,
    cofounder,
    async cleanup() {
      await server.close();
      db.close();
      cleanDir(agentDir);
    },
  };
}
