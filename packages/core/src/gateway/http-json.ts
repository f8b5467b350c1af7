import type { ServerResponse } from "node:http";
import { ZodError } from "zod";
import {
  AppError,
  PayloadTooLargeError,
  ValidationError,
  describeError,
} from "../infra/errors.js";

export const MAX_BODY_BYTES = 1024 * 1024;

export interface ErrorBody {
  ok: false;
  error: { code: string; message: string };
}

/**
 * Read and parse a JSON request body. An empty body reads as `{}`. Past the
 * limit the rest of the stream is read and discarded, so the socket stays
 * open for the 413 reply.
 */
export async function readJsonBody(
  req: AsyncIterable<unknown>,
  limitBytes: number = MAX_BODY_BYTES,
): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size <= limitBytes) chunks.push(buf);
  }
  if (size > limitBytes) {
    throw new PayloadTooLargeError(limitBytes);
  }

  const text = Buffer.concat(chunks).toString("utf8").trim();
  if (!text) return {};

  try {
    return JSON.parse(text) as unknown;
  } catch (err) {
    throw new ValidationError("Request body is not valid JSON", err);
  }
}

export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    "Content-Type": "application/json; charset=utf-8",
    "Content-Length": Buffer.byteLength(payload),
  });
  res.end(payload);
}

/**
 * Map any thrown value to a status and the wire error body. Upstream 5xx
 * statuses are reported as 500.
 */
export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof ZodError) {
    const message = err.issues
      .map((issue) => `${issue.path.join(".") || "(body)"}: ${issue.message}`)
      .join("; ");
    return { status: 400, body: { ok: false, error: { code: "VALIDATION_ERROR", message } } };
  }
  if (err instanceof AppError) {
    const status = err.statusCode >= 500 ? 500 : err.statusCode;
    return { status, body: { ok: false, error: { code: err.code, message: err.message } } };
  }
  return {
    status: 500,
    body: { ok: false, error: { code: "INTERNAL_ERROR", message: describeError(err) } },
  };
}
