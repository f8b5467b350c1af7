/**
 * Google Gemini client using the native REST API (no SDK dependency).
 * Uses the v1beta generateContent and models endpoints.
 */

import { z } from "zod";
import type { ModelConfig } from "../config/types.js";
import { resolveSecret } from "../config/secrets.js";
import { ConfigError, UpstreamError } from "../infra/errors.js";
import { fetchWithTimeout, readJsonSafe } from "../infra/http.js";
import type { ChatTurn, GenerateRequest, ModelInfo, TextModel } from "./types.js";

const DEFAULT_TEMPERATURE = 0.4;
const DEFAULT_MAX_OUTPUT_TOKENS = 900;

// ---------------------------------------------------------------------------
// Gemini API types
// ---------------------------------------------------------------------------

interface GeminiContent {
  role: "user" | "model";
  parts: Array<{ text: string }>;
}

const GeminiErrorSchema = z.object({ message: z.string().optional() });

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .optional(),
  error: GeminiErrorSchema.optional(),
});

type GeminiResponse = z.infer<typeof GeminiResponseSchema>;

const GeminiModelListSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string().optional(),
        supportedGenerationMethods: z.array(z.string()).optional(),
      }),
    )
    .optional(),
  error: GeminiErrorSchema.optional(),
});

// ---------------------------------------------------------------------------
// Request formatting
// ---------------------------------------------------------------------------

/**
 * Strip a single leading `models/` so both `gemini-1.5-flash` and
 * `models/gemini-1.5-flash` resolve to the same endpoint.
 */
export function normalizeModelId(model: string): string {
  const trimmed = model.trim();
  return trimmed.startsWith("models/") ? trimmed.slice("models/".length) : trimmed;
}

export function buildGenerateBody(request: GenerateRequest): Record<string, unknown> {
  const contents: GeminiContent[] = [
    ...(request.history ?? []).map(toGeminiContent),
    { role: "user", parts: [{ text: request.userText }] },
  ];

  return {
    contents,
    generationConfig: {
      temperature: request.temperature ?? DEFAULT_TEMPERATURE,
      maxOutputTokens: request.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
    },
    ...(request.systemInstruction && {
      systemInstruction: { role: "system", parts: [{ text: request.systemInstruction }] },
    }),
  };
}

function toGeminiContent(turn: ChatTurn): GeminiContent {
  return { role: turn.role, parts: [{ text: turn.text }] };
}

export function extractCandidateText(data: GeminiResponse): string {
  const parts = data.candidates?.[0]?.content?.parts ?? [];
  return parts
    .map((p) => (typeof p.text === "string" ? p.text : ""))
    .join("")
    .trim();
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class GeminiClient implements TextModel {
  private readonly config: ModelConfig;

  constructor(config: ModelConfig) {
    this.config = config;
  }

  get modelId(): string {
    return this.config.model;
  }

  async generate(request: GenerateRequest): Promise<string> {
    const apiKey = this.requireApiKey();
    const model = normalizeModelId(this.config.model);
    if (!model) {
      throw new ConfigError("GEMINI_MODEL missing. Set it in .env (use /api/models).");
    }

    const response = await fetchWithTimeout(
      `${this.config.baseUrl}/models/${model}:generateContent`,
      {
        method: "POST",
        headers: { "Content-Type": "application/json", "x-goog-api-key": apiKey },
        body: JSON.stringify(buildGenerateBody(request)),
      },
      this.config.timeoutMs,
    );

    const parsed = GeminiResponseSchema.safeParse(await readJsonSafe(response));
    const body: GeminiResponse = parsed.success ? parsed.data : {};
    if (!response.ok) {
      throw new UpstreamError(body.error?.message ?? "Gemini API error", response.status);
    }
    return extractCandidateText(body);
  }

  async listModels(): Promise<ModelInfo[]> {
    const apiKey = this.requireApiKey();
    const response = await fetchWithTimeout(
      `${this.config.baseUrl}/models`,
      { method: "GET", headers: { "x-goog-api-key": apiKey } },
      this.config.timeoutMs,
    );

    const parsed = GeminiModelListSchema.safeParse(await readJsonSafe(response));
    const body: z.infer<typeof GeminiModelListSchema> = parsed.success ? parsed.data : {};
    if (!response.ok) {
      throw new UpstreamError(body.error?.message ?? "Failed to list models", response.status);
    }

    return (body.models ?? []).map((m) => {
      const methods = m.supportedGenerationMethods ?? [];
      return {
        name: m.name ?? "",
        supportsGenerateContent: methods.includes("generateContent"),
        supportedGenerationMethods: methods,
      };
    });
  }

  private requireApiKey(): string {
    const apiKey = resolveSecret(this.config.apiKeyEnvVar);
    if (!apiKey) {
      throw new ConfigError(`${this.config.apiKeyEnvVar} missing. Set it in .env`);
    }
    return apiKey;
  }
}
