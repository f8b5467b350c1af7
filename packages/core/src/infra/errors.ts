export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", 500, cause);
    this.name = "ConfigError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "VALIDATION_ERROR", 400, cause);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "NOT_FOUND", 404, cause);
    this.name = "NotFoundError";
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(limitBytes: number) {
    super(`Request body exceeds ${limitBytes} bytes`, "PAYLOAD_TOO_LARGE", 413);
    this.name = "PayloadTooLargeError";
  }
}

/**
 * A remote dependency answered with an error status or an unusable body.
 */
export class UpstreamError extends AppError {
  constructor(
    message: string,
    public readonly upstreamStatus?: number,
    cause?: unknown,
  ) {
    super(message, "UPSTREAM_ERROR", 502, cause);
    this.name = "UpstreamError";
  }
}

export class ToolExecutionError extends AppError {
  constructor(cause: unknown) {
    super(`Tool execution failed: ${describeError(cause)}`, "TOOL_EXECUTION_FAILED", 500, cause);
    this.name = "ToolExecutionError";
  }
}

export class AnswerGenerationError extends AppError {
  constructor(cause: unknown) {
    super(
      `Answer generation failed: ${describeError(cause)}`,
      "ANSWER_GENERATION_FAILED",
      500,
      cause,
    );
    this.name = "AnswerGenerationError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
