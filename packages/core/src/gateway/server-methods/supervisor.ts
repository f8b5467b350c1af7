import { z } from "zod";
import type { ResponseComposer } from "../../agent/composer.js";
import { EMPTY_INPUT_REPLY } from "../../agent/runtime.js";
import type { TextModel } from "../../agent/types.js";
import type { RouteHandler } from "./types.js";

/**
 * POST /api/supervisor: legacy single-shot chat. No session, no planning,
 * no tools; kept for older clients.
 */

const SupervisorBodySchema = z.object({
  input: z.string().nullish(),
});

export function createSupervisorHandler(deps: {
  composer: Pick<ResponseComposer, "compose">;
  model: TextModel;
}): RouteHandler {
  return async ({ body }) => {
    const input = (SupervisorBodySchema.parse(body).input ?? "").trim();
    if (!input) {
      return { ok: true, intent: "chat", text: EMPTY_INPUT_REPLY, usedModel: deps.model.modelId };
    }

    const text = await deps.composer.compose("chat", input, { action: "chat", why: "supervisor" }, []);
    return { ok: true, intent: "chat", text, usedModel: deps.model.modelId };
  };
}
