import type { TextModel } from "../../agent/types.js";
import type { RouteHandler } from "./types.js";

/** GET /api/models: what the configured key can see, for picking GEMINI_MODEL. */
export function createModelsHandler(model: TextModel): RouteHandler {
  return async () => ({ ok: true, models: await model.listModels() });
}
