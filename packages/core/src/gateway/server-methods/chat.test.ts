import { describe, expect, it, vi } from "vitest";
import { ZodError } from "zod";
import type { ChatPipeline, ChatRequest, ChatResult } from "../../agent/runtime.js";
import { createChatHandler } from "./chat.js";

function fakePipeline() {
  const handle = vi.fn(
    async (request: ChatRequest): Promise<ChatResult> => ({
      sessionId: request.sessionId ?? "generated",
      toolUsed: "chat",
      text: "Hello!",
      usedModel: "test-model",
    }),
  );
  const pipeline: Pick<ChatPipeline, "handle"> = { handle };
  return { pipeline, handle };
}

describe("chat handler", () => {
  it("wraps the pipeline result with ok", async () => {
    const { pipeline } = fakePipeline();
    const handler = createChatHandler(pipeline);

    const result = await handler({ body: { input: "hi", sessionId: "s1" } });

    expect(result).toEqual({
      ok: true,
      sessionId: "s1",
      toolUsed: "chat",
      text: "Hello!",
      usedModel: "test-model",
    });
  });

  it("maps null fields to undefined", async () => {
    const { pipeline, handle } = fakePipeline();
    await createChatHandler(pipeline)({ body: { input: null, mode: null, sessionId: null } });

    expect(handle).toHaveBeenCalledWith({ input: undefined, mode: undefined, sessionId: undefined });
  });

  it("throws ZodError for a non-string input", async () => {
    const { pipeline, handle } = fakePipeline();
    await expect(createChatHandler(pipeline)({ body: { input: 42 } })).rejects.toBeInstanceOf(
      ZodError,
    );
    expect(handle).not.toHaveBeenCalled();
  });
});
