import { performance } from "node:perf_hooks";
import { z } from "zod";
import type { EndpointsConfig } from "../config/types.js";
import { describeError } from "../infra/errors.js";
import { fetchWithTimeout } from "../infra/http.js";
import type { AppLogger } from "../infra/logger.js";
import type { CustomHealth, EndpointResult, HealthCollector } from "./types.js";

const EndpointEntrySchema = z.object({
  name: z.string().min(1),
  url: z.string().min(1),
});

export type EndpointEntry = z.infer<typeof EndpointEntrySchema>;

export type ParsedEndpoints =
  | { kind: "list"; entries: EndpointEntry[] }
  | { kind: "not_a_list" };

/**
 * Lenient reader for the `CUSTOM_ENDPOINTS` value. Unparseable JSON counts as
 * an empty list; entries without a name or url are dropped.
 */
export function parseEndpointList(raw: string): ParsedEndpoints {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return { kind: "list", entries: [] };
  }
  if (!Array.isArray(value)) return { kind: "not_a_list" };

  const entries: EndpointEntry[] = [];
  for (const item of value) {
    const parsed = EndpointEntrySchema.safeParse(item);
    if (parsed.success) entries.push(parsed.data);
  }
  return { kind: "list", entries };
}

export async function probeEndpoint(
  entry: EndpointEntry,
  timeoutMs: number,
): Promise<EndpointResult> {
  const start = performance.now();
  let httpStatus: number | null = null;
  let error: string | null = null;

  try {
    const response = await fetchWithTimeout(entry.url, { method: "GET", redirect: "follow" }, timeoutMs);
    httpStatus = response.status;
    await response.body?.cancel();
    if (response.status < 200 || response.status >= 400) {
      error = `Bad status ${response.status}`;
    }
  } catch (err) {
    error = describeError(err);
  }

  return {
    name: entry.name,
    url: entry.url,
    status: httpStatus !== null && error === null ? "UP" : "DOWN",
    http_status: httpStatus,
    latency_ms: Math.floor(performance.now() - start),
    error,
  };
}

export class EndpointHealthCollector implements HealthCollector<CustomHealth> {
  constructor(
    private readonly config: EndpointsConfig,
    private readonly logger?: AppLogger,
  ) {}

  async collect(): Promise<CustomHealth> {
    const parsed = parseEndpointList(this.config.raw);
    if (parsed.kind === "not_a_list") {
      return {
        configured: false,
        results: [],
        warnings: ["CUSTOM: CUSTOM_ENDPOINTS is not a JSON list"],
      };
    }

    const results = await Promise.all(
      parsed.entries.map((entry) => probeEndpoint(entry, this.config.timeoutMs)),
    );

    const warnings: string[] = [];
    for (const result of results) {
      if (result.status === "UP") continue;
      this.logger?.warn(`Endpoint ${result.name} is down: ${result.error ?? "unknown"}`);
      warnings.push(`CUSTOM: ${result.name} DOWN (${result.error ?? "unknown"})`);
    }

    return { configured: true, results, warnings };
  }
}
