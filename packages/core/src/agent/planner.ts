import { z } from "zod";
import type { AppLogger } from "../infra/logger.js";
import { withSpan } from "../infra/telemetry.js";
import type { ChatSession } from "../sessions/types.js";
import { extractJsonObject } from "./json.js";
import { PLANNER_SYSTEM_PROMPT, plannerUserText } from "./prompts.js";
import {
  CHAT_ACTIONS,
  type ActionPlan,
  type ChatMode,
  type TextModel,
} from "./types.js";

const PLANNER_TEMPERATURE = 0;
const PLANNER_MAX_TOKENS = 220;

/**
 * Every field falls back on its own, so a partially valid reply keeps the
 * parts that are usable.
 */
const PlanReplySchema = z.object({
  action: z
    .preprocess(
      (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
      z.enum(CHAT_ACTIONS),
    )
    .catch("chat"),
  why: z.string().trim().min(1).catch("n/a"),
  need_tools: z.boolean().optional().catch(undefined),
});

export function parsePlanReply(raw: string): ActionPlan {
  const reply = PlanReplySchema.parse(extractJsonObject(raw) ?? {});
  return {
    action: reply.action,
    why: reply.why,
    needTools: reply.need_tools ?? reply.action !== "chat",
  };
}

/**
 * One classification call per message. A forced mode skips the model
 * entirely.
 */
export class ActionPlanner {
  constructor(
    private readonly model: TextModel,
    private readonly logger?: AppLogger,
  ) {}

  async plan(userText: string, session: ChatSession, mode: ChatMode): Promise<ActionPlan> {
    if (mode !== "auto") {
      return { action: mode, why: `forced_by_mode:${mode}`, needTools: true };
    }

    return withSpan("chat.plan", { "session.id": session.id }, async () => {
      const raw = await this.model.generate({
        systemInstruction: PLANNER_SYSTEM_PROMPT,
        userText: plannerUserText(userText, {
          has_last_health: session.lastHealth !== undefined,
          has_last_metrics: session.lastMetrics !== undefined,
          has_last_report: Boolean(session.lastReport),
        }),
        temperature: PLANNER_TEMPERATURE,
        maxOutputTokens: PLANNER_MAX_TOKENS,
      });

      const plan = parsePlanReply(raw);
      this.logger?.info(
        `Planned action=${plan.action} needTools=${plan.needTools} why=${plan.why}`,
      );
      return plan;
    });
  }
}
