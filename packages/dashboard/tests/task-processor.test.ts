/**
 * Unit Tests — Task Processor
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { TaskAlreadyRunningError } from "@cofounder/core";
import { createTestServer } from "./helpers.js";

let ctx: Awaited<ReturnType<typeof createTestServer>>;

beforeEach(async () => {
  ctx = await createTestServer();
});

afterEach(async () => {
  await ctx.cleanup();
});

describe("TaskProcessor", () => {
  it("records the error when no plan can be made", async () => {
    ctx.model.push("I am not sure what you mean.");

    const { record, run } = ctx.server.taskProcessor.submit("Build me something");
    await expect(run.completion).resolves.toBeNull();

    expect(ctx.server.taskManager.findById(record.id)).toMatchObject({
      status: "failed",
      error: "Model reply contained no usable steps",
    });
  });

  it("refuses to resume a task that is still running", async () => {
    let resumeError: unknown = null;
    ctx.model.push(
      "1. Write the hero copy\n2. Lay out the page",
      async () => {
        const [record] = ctx.server.taskManager.list();
        const live = ctx.cofounder.executor.getTask(record.id);
        if (live) {
          const checkpoint = await ctx.cofounder.checkpoints.save(live, "interval");
          resumeError = await ctx.server.taskProcessor.resume(checkpoint.id).then(
            () => null,
            (error: unknown) => error,
          );
        }
        return "Hero copy written.";
      },
      "Layout done.",
    );

    const { run } = ctx.server.taskProcessor.submit("Build me a landing page", "code");
    const outcome = await run.completion;

    expect(resumeError).toBeInstanceOf(TaskAlreadyRunningError);
    expect(outcome?.status).toBe("completed");
  });

  it("pauses running tasks on shutdown", async () => {
    let shutdown: Promise<void> | undefined;
    ctx.model.push("1. Write the hero copy\n2. Lay out the page", () => {
      shutdown = ctx.server.taskProcessor.shutdown();
      return "Hero copy written.";
    });

    const { record, run } = ctx.server.taskProcessor.submit("Build me a landing page", "code");
    const outcome = await run.completion;
    await shutdown;

    expect(outcome?.status).toBe("paused");
    expect(ctx.server.taskManager.findById(record.id)).toMatchObject({
      status: "paused",
      completedSteps: 1,
      checkpointId: outcome?.checkpointId,
    });
  });
});
