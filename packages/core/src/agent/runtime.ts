import { randomUUID } from "node:crypto";
import { AnswerGenerationError, ConfigError, ToolExecutionError } from "../infra/errors.js";
import { createLogger, type AppLogger } from "../infra/logger.js";
import type { HealthSnapshot, MetricsSnapshot } from "../health/types.js";
import { KeyedLock } from "../sessions/lock.js";
import type { ChatSessionStore } from "../sessions/store.js";
import type { ResponseComposer } from "./composer.js";
import type { ActionPlanner } from "./planner.js";
import type { ToolExecutor } from "./tool-executor.js";
import type { ChatAction, ChatMode, TextModel, ToolPayload } from "./types.js";

export const EMPTY_INPUT_REPLY = "Say something and I'll help.";

const FORCED_MODES: ReadonlySet<string> = new Set(["health", "metrics", "report", "daily_report"]);

export interface ChatRequest {
  input?: string;
  mode?: string;
  sessionId?: string;
}

export interface ChatResult {
  sessionId: string;
  toolUsed: ChatAction | "none";
  text: string;
  usedModel?: string;
  health?: HealthSnapshot;
  metrics?: MetricsSnapshot;
  reportMarkdown?: string;
}

function isChatMode(value: string): value is ChatMode {
  return value === "auto" || FORCED_MODES.has(value);
}

/** Unknown or missing modes route through the planner. */
export function normalizeMode(mode: string | undefined): ChatMode {
  const normalized = (mode ?? "auto").trim().toLowerCase();
  return isChatMode(normalized) ? normalized : "auto";
}

export interface ChatPipelineDeps {
  model: TextModel;
  sessions: ChatSessionStore;
  planner: ActionPlanner;
  executor: ToolExecutor;
  composer: ResponseComposer;
  logger?: AppLogger;
}

/**
 * One chat turn: record the message, plan, run tools, compose, record the
 * answer. Turns for the same session run one at a time.
 */
export class ChatPipeline {
  private readonly lock = new KeyedLock();
  private readonly logger: AppLogger;

  constructor(private readonly deps: ChatPipelineDeps) {
    this.logger = deps.logger ?? createLogger("chat");
  }

  async handle(request: ChatRequest): Promise<ChatResult> {
    const sessionId = request.sessionId?.trim() || randomUUID();
    return this.lock.run(sessionId, () => this.turn(sessionId, request));
  }

  private async turn(sessionId: string, request: ChatRequest): Promise<ChatResult> {
    const { sessions, planner, executor, composer, model } = this.deps;
    const session = sessions.getOrCreate(sessionId);

    const userText = (request.input ?? "").trim();
    if (!userText) {
      return { sessionId, toolUsed: "none", text: EMPTY_INPUT_REPLY };
    }

    sessions.appendTurn(session, "user", userText);
    const plan = await planner.plan(userText, session, normalizeMode(request.mode));

    let payload: ToolPayload;
    try {
      payload = await executor.execute(plan, session);
    } catch (err) {
      if (err instanceof ConfigError) throw err;
      this.logger.error("Tool execution failed", err);
      throw new ToolExecutionError(err);
    }

    let text: string;
    try {
      text = await composer.compose(plan.action, userText, payload, session.history.slice(0, -1));
    } catch (err) {
      if (err instanceof ConfigError) throw err;
      this.logger.error("Answer generation failed", err);
      throw new AnswerGenerationError(err);
    }

    sessions.appendTurn(session, "model", text);

    const result: ChatResult = {
      sessionId,
      toolUsed: plan.action,
      text,
      usedModel: model.modelId,
    };
    if (payload.health) result.health = payload.health;
    if (payload.metrics) result.metrics = payload.metrics;
    if (payload.reportMarkdown !== undefined) result.reportMarkdown = payload.reportMarkdown;
    return result;
  }
}
