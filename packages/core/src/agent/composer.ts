import { UpstreamError } from "../infra/errors.js";
import { withSpan } from "../infra/telemetry.js";
import {
  CHAT_SYSTEM_PROMPT,
  REPORT_SYSTEM_PROMPT,
  TOOL_ANSWER_SYSTEM_PROMPT,
  reportUserText,
  toolAnswerUserText,
} from "./prompts.js";
import type { ChatAction, ChatTurn, TextModel, ToolPayload } from "./types.js";

const CHAT_TEMPERATURE = 0.45;
const TOOL_TEMPERATURE = 0.35;
const ANSWER_MAX_TOKENS = 900;

export const PAYLOAD_CHAR_LIMIT = 12_000;

/** Health sections a report is written from; extra keys are ignored. */
export interface ReportHealthInput {
  local?: unknown;
  cloud?: unknown;
  custom?: unknown;
}

function pretty(value: unknown): string {
  return JSON.stringify(value ?? {}, null, 2);
}

export function serializePayload(payload: ToolPayload): string {
  return JSON.stringify(payload, null, 2).slice(0, PAYLOAD_CHAR_LIMIT);
}

export class ResponseComposer {
  constructor(private readonly model: TextModel) {}

  /**
   * Final answer for a turn. Plain chat carries the prior history; every
   * other action is grounded in the serialized tool payload.
   */
  async compose(
    action: ChatAction,
    userText: string,
    payload: ToolPayload,
    history: readonly ChatTurn[],
  ): Promise<string> {
    return withSpan("chat.compose", { "chat.action": action }, async () => {
      const text =
        action === "chat"
          ? await this.model.generate({
              systemInstruction: CHAT_SYSTEM_PROMPT,
              userText,
              history,
              temperature: CHAT_TEMPERATURE,
              maxOutputTokens: ANSWER_MAX_TOKENS,
            })
          : await this.model.generate({
              systemInstruction: TOOL_ANSWER_SYSTEM_PROMPT,
              userText: toolAnswerUserText(userText, action, serializePayload(payload)),
              temperature: TOOL_TEMPERATURE,
              maxOutputTokens: ANSWER_MAX_TOKENS,
            });

      if (!text) {
        throw new UpstreamError("Model returned an empty answer");
      }
      return text;
    });
  }

  async composeReport(health: ReportHealthInput, metrics: unknown): Promise<string> {
    return withSpan("report.compose", {}, async () => {
      const markdown = await this.model.generate({
        systemInstruction: REPORT_SYSTEM_PROMPT,
        userText: reportUserText({
          local: pretty(health.local),
          cloud: pretty(health.cloud),
          custom: pretty(health.custom),
          metrics: pretty(metrics),
        }),
      });

      if (!markdown) {
        throw new UpstreamError("Model returned an empty report");
      }
      return markdown;
    });
  }
}
