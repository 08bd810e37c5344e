import { z } from "zod";
import type { ProgressEvent } from "@cofounder/core";
import type { ChatResponse, NotificationResponse, TaskResponse } from "../responses.js";

// Messages from the browser

export const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("chat"), text: z.string().max(10000) }),
  z.object({ type: z.literal("cancel"), taskId: z.string().min(1) }),
  z.object({ type: z.literal("ping") }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

// Messages to the browser

export type ServerMessage =
  | { type: "progress"; event: ProgressEvent }
  | { type: "task:updated"; task: TaskResponse }
  | { type: "notification"; notification: NotificationResponse }
  | { type: "chat:reply"; reply: ChatResponse }
  | { type: "cancel:result"; taskId: string; cancelled: boolean }
  | { type: "pong" }
  | { type: "error"; message: string };
