import { SpanStatusCode, trace, type Tracer } from "@opentelemetry/api";

/**
 * Spans are recorded through the OpenTelemetry API only. Without a
 * registered SDK the tracer is a no-op.
 */

export function getTracer(name: string = "opspulse"): Tracer {
  return trace.getTracer(name);
}

export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: () => Promise<T>,
): Promise<T> {
  return getTracer().startActiveSpan(name, { attributes }, async (span) => {
    try {
      return await fn();
    } catch (err) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    } finally {
      span.end();
    }
  });
}
