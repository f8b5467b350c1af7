import { z } from "zod";
import type { ChatPipeline } from "../../agent/runtime.js";
import type { RouteHandler } from "./types.js";

/**
 * POST /api/chat: one conversational turn.
 */

const ChatBodySchema = z.object({
  input: z.string().nullish(),
  mode: z.string().nullish(),
  sessionId: z.string().nullish(),
});

export function createChatHandler(pipeline: Pick<ChatPipeline, "handle">): RouteHandler {
  return async ({ body }) => {
    const parsed = ChatBodySchema.parse(body);
    const result = await pipeline.handle({
      input: parsed.input ?? undefined,
      mode: parsed.mode ?? undefined,
      sessionId: parsed.sessionId ?? undefined,
    });
    return { ok: true, ...result };
  };
}
