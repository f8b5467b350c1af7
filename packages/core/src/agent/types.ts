/**
 * Core types for the model client and the chat pipeline.
 */

import type { HealthSnapshot, MetricsSnapshot } from "../health/types.js";

export type TurnRole = "user" | "model";

export interface ChatTurn {
  role: TurnRole;
  text: string;
}

export interface GenerateRequest {
  systemInstruction: string;
  userText: string;
  history?: readonly ChatTurn[];
  temperature?: number;
  maxOutputTokens?: number;
}

export interface ModelInfo {
  name: string;
  supportsGenerateContent: boolean;
  supportedGenerationMethods: string[];
}

/**
 * Text-completion boundary. Implementations are nondeterministic; callers
 * treat the returned text as untrusted.
 */
export interface TextModel {
  /** Identifier reported back to API callers as `usedModel`. */
  readonly modelId: string;
  generate(request: GenerateRequest): Promise<string>;
  listModels(): Promise<ModelInfo[]>;
}

export const CHAT_ACTIONS = ["chat", "health", "metrics", "report", "daily_report"] as const;

/** Routing decision unit for one chat message. */
export type ChatAction = (typeof CHAT_ACTIONS)[number];

/** Actions a caller may force, bypassing the planner. */
export type ForcedAction = Exclude<ChatAction, "chat">;

export type ChatMode = "auto" | ForcedAction;

export interface ActionPlan {
  action: ChatAction;
  why: string;
  needTools: boolean;
}

/**
 * Tool outputs handed to the composer. Only the fields the action needs are
 * present.
 */
export interface ToolPayload {
  action: ChatAction;
  why: string;
  health?: HealthSnapshot;
  metrics?: MetricsSnapshot;
  reportMarkdown?: string;
}
