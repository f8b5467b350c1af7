import { describe, expect, it, vi } from "vitest";
import { UpstreamError } from "../infra/errors.js";
import { PAYLOAD_CHAR_LIMIT, ResponseComposer, serializePayload } from "./composer.js";
import {
  CHAT_SYSTEM_PROMPT,
  REPORT_SYSTEM_PROMPT,
  TOOL_ANSWER_SYSTEM_PROMPT,
} from "./prompts.js";
import type { GenerateRequest, TextModel } from "./types.js";

function modelReplying(text: string) {
  const generate = vi.fn(async (_request: GenerateRequest) => text);
  const model: TextModel = { modelId: "test-model", generate, listModels: async () => [] };
  return { model, generate };
}

describe("serializePayload", () => {
  it("pretty-prints with two spaces", () => {
    expect(serializePayload({ action: "health", why: "x" })).toBe(
      '{\n  "action": "health",\n  "why": "x"\n}',
    );
  });

  it("truncates to the character budget", () => {
    const text = serializePayload({ action: "report", why: "x", reportMarkdown: "a".repeat(20_000) });
    expect(text).toHaveLength(PAYLOAD_CHAR_LIMIT);
  });
});

describe("ResponseComposer.compose", () => {
  it("answers chat with history and the chat instruction", async () => {
    const { model, generate } = modelReplying("Hi there.");
    const history = [
      { role: "user" as const, text: "earlier" },
      { role: "model" as const, text: "reply" },
    ];

    const text = await new ResponseComposer(model).compose(
      "chat",
      "hello",
      { action: "chat", why: "n/a" },
      history,
    );

    expect(text).toBe("Hi there.");
    expect(generate.mock.calls[0]?.[0]).toEqual({
      systemInstruction: CHAT_SYSTEM_PROMPT,
      userText: "hello",
      history,
      temperature: 0.45,
      maxOutputTokens: 900,
    });
  });

  it("grounds tool answers in the serialized payload", async () => {
    const { model, generate } = modelReplying("All clear.");
    await new ResponseComposer(model).compose(
      "health",
      "status?",
      { action: "health", why: "status" },
      [{ role: "user", text: "ignored" }],
    );

    const request = generate.mock.calls[0]?.[0];
    expect(request?.systemInstruction).toBe(TOOL_ANSWER_SYSTEM_PROMPT);
    expect(request?.temperature).toBe(0.35);
    expect(request?.history).toBeUndefined();
    expect(request?.userText).toBe(
      'USER_QUESTION:\nstatus?\n\nACTION:\nhealth\n\nTOOL_OUTPUTS (JSON):\n{\n  "action": "health",\n  "why": "status"\n}\n',
    );
  });

  it("treats an empty answer as an upstream failure", async () => {
    const { model } = modelReplying("");
    await expect(
      new ResponseComposer(model).compose("chat", "hi", { action: "chat", why: "n/a" }, []),
    ).rejects.toBeInstanceOf(UpstreamError);
  });
});

describe("ResponseComposer.composeReport", () => {
  it("embeds each health section and the metrics", async () => {
    const { model, generate } = modelReplying("# Daily report");
    const markdown = await new ResponseComposer(model).composeReport(
      { local: { cpu_percent: 12 }, cloud: { status: "ok" } },
      { range: "24h" },
    );

    expect(markdown).toBe("# Daily report");
    const request = generate.mock.calls[0]?.[0];
    expect(request?.systemInstruction).toBe(REPORT_SYSTEM_PROMPT);
    expect(request?.temperature).toBeUndefined();
    expect(request?.userText).toContain('LOCAL HEALTH:\n{\n  "cpu_percent": 12\n}\n');
    expect(request?.userText).toContain('CLOUD HEALTH:\n{\n  "status": "ok"\n}\n');
    expect(request?.userText).toContain("CUSTOM ENDPOINTS:\n{}\n");
    expect(request?.userText).toContain('METRICS:\n{\n  "range": "24h"\n}\n');
    expect(request?.userText).toContain("risk score (Low/Med/High)");
  });
});
