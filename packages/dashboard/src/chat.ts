/**
 * One chat turn over HTTP or WebSocket. Autonomous requests are started
 * in the background and answered with the new task.
 */

import type { FastifyInstance } from "fastify";
import { CLARIFY_PROMPT, InvalidInputError, errorMessage } from "@cofounder/core";
import type { RouteDecision } from "@cofounder/core";
import { toTaskResponse } from "./responses.js";
import type { ChatResponse } from "./responses.js";

export async function respondToChat(fastify: FastifyInstance, text: string): Promise<ChatResponse> {
  const { cofounder, taskProcessor } = fastify;

  let decision: RouteDecision;
  try {
    decision = await cofounder.router.route(text);
  } catch (error) {
    if (error instanceof InvalidInputError) {
      return { kind: "clarify", text: CLARIFY_PROMPT };
    }
    fastify.log.error({ err: errorMessage(error) }, "Routing failed");
    return { kind: "chat", text: `Sorry, I couldn't process that: ${errorMessage(error)}`, failed: true };
  }

  if (decision.classification.mode === "chat") {
    return cofounder.chat(text, decision.context);
  }

  const { record } = taskProcessor.submit(text, decision.classification.taskCategory);
  return { kind: "task", task: toTaskResponse(record) };
}
