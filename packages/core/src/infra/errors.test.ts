import { describe, expect, it } from "vitest";
import {
  AnswerGenerationError,
  AppError,
  ConfigError,
  NotFoundError,
  ToolExecutionError,
  UpstreamError,
  ValidationError,
  describeError,
} from "./errors.js";

describe("error hierarchy", () => {
  it("ConfigError is a 500 with CONFIG_ERROR", () => {
    const err = new ConfigError("GEMINI_MODEL missing");
    expect(err).toBeInstanceOf(AppError);
    expect(err.statusCode).toBe(500);
    expect(err.code).toBe("CONFIG_ERROR");
    expect(err.name).toBe("ConfigError");
  });

  it("ValidationError and NotFoundError carry client statuses", () => {
    expect(new ValidationError("bad").statusCode).toBe(400);
    expect(new NotFoundError("gone").statusCode).toBe(404);
  });

  it("UpstreamError keeps the upstream status", () => {
    const err = new UpstreamError("quota exceeded", 429);
    expect(err.upstreamStatus).toBe(429);
    expect(err.statusCode).toBe(502);
  });

  it("ToolExecutionError prefixes the cause message", () => {
    const cause = new Error("socket hang up");
    const err = new ToolExecutionError(cause);
    expect(err.message).toBe("Tool execution failed: socket hang up");
    expect(err.cause).toBe(cause);
    expect(err.code).toBe("TOOL_EXECUTION_FAILED");
  });

  it("AnswerGenerationError is distinct from ToolExecutionError", () => {
    const err = new AnswerGenerationError("empty response");
    expect(err.message).toBe("Answer generation failed: empty response");
    expect(err).not.toBeInstanceOf(ToolExecutionError);
  });

  it("describeError stringifies non-errors", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError(7)).toBe("7");
  });
});
