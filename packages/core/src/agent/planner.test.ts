import { describe, expect, it, vi } from "vitest";
import type { ChatSession } from "../sessions/types.js";
import { ActionPlanner, parsePlanReply } from "./planner.js";
import { PLANNER_SYSTEM_PROMPT } from "./prompts.js";
import type { GenerateRequest, TextModel } from "./types.js";

function modelReplying(text: string) {
  const generate = vi.fn(async (_request: GenerateRequest) => text);
  const model: TextModel = { modelId: "test-model", generate, listModels: async () => [] };
  return { model, generate };
}

function session(overrides: Partial<ChatSession> = {}): ChatSession {
  return { id: "s-1", lastActivity: 0, history: [], ...overrides };
}

describe("parsePlanReply", () => {
  it("reads a well-formed reply", () => {
    expect(parsePlanReply('{"action":"metrics","why":"trend","need_tools":true}')).toEqual({
      action: "metrics",
      why: "trend",
      needTools: true,
    });
  });

  it("falls back to chat for non-JSON output", () => {
    expect(parsePlanReply("not json")).toEqual({ action: "chat", why: "n/a", needTools: false });
  });

  it("falls back to chat for an unknown action", () => {
    expect(parsePlanReply('{"action":"reboot","why":"asked","need_tools":true}')).toEqual({
      action: "chat",
      why: "asked",
      needTools: true,
    });
  });

  it("normalizes action case and whitespace", () => {
    expect(parsePlanReply('{"action":"  Daily_Report "}').action).toBe("daily_report");
  });

  it("defaults need_tools from the action when missing or not boolean", () => {
    expect(parsePlanReply('{"action":"health"}').needTools).toBe(true);
    expect(parsePlanReply('{"action":"chat","need_tools":"yes"}').needTools).toBe(false);
    expect(parsePlanReply('{"action":"health","need_tools":false}').needTools).toBe(false);
  });

  it("finds the object inside surrounding text", () => {
    expect(parsePlanReply('Here you go: {"action":"report","why":"summary"} done').action).toBe(
      "report",
    );
  });
});

describe("ActionPlanner", () => {
  it("honours a forced mode without calling the model", async () => {
    const { model, generate } = modelReplying('{"action":"chat"}');
    const plan = await new ActionPlanner(model).plan("anything at all", session(), "metrics");

    expect(plan).toEqual({ action: "metrics", why: "forced_by_mode:metrics", needTools: true });
    expect(generate).not.toHaveBeenCalled();
  });

  it("asks the model once with deterministic sampling and context flags", async () => {
    const { model, generate } = modelReplying('{"action":"health","why":"status","need_tools":true}');
    const plan = await new ActionPlanner(model).plan(
      "give me details",
      session({ lastReport: "# Report" }),
      "auto",
    );

    expect(plan).toEqual({ action: "health", why: "status", needTools: true });
    expect(generate).toHaveBeenCalledTimes(1);
    const request = generate.mock.calls[0]?.[0];
    expect(request?.systemInstruction).toBe(PLANNER_SYSTEM_PROMPT);
    expect(request?.temperature).toBe(0);
    expect(request?.maxOutputTokens).toBe(220);
    expect(request?.userText).toBe(
      'User message: give me details\nContext flags: {"has_last_health":false,"has_last_metrics":false,"has_last_report":true}\n',
    );
  });

  it("falls back to chat when the model reply is unusable", async () => {
    const { model } = modelReplying("not json");
    const plan = await new ActionPlanner(model).plan("hello", session(), "auto");
    expect(plan.action).toBe("chat");
    expect(plan.needTools).toBe(false);
  });
});
