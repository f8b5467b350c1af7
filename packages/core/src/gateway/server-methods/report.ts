import { z } from "zod";
import type { ResponseComposer } from "../../agent/composer.js";
import type { TextModel } from "../../agent/types.js";
import type { HealthSource } from "../../health/aggregator.js";
import type { MetricsSource } from "../../health/metrics.js";
import type { RouteHandler } from "./types.js";

const ReportBodySchema = z.object({
  health: z
    .object({
      local: z.unknown().optional(),
      cloud: z.unknown().optional(),
      custom: z.unknown().optional(),
    })
    .passthrough()
    .nullish(),
  metrics: z.record(z.unknown()).nullish(),
});

function hasKeys(value: object | null | undefined): value is object {
  return value !== null && value !== undefined && Object.keys(value).length > 0;
}

/**
 * POST /api/report: summarize the given snapshots, fetching whichever one
 * the caller left out.
 */
export function createReportHandler(deps: {
  health: HealthSource;
  metrics: MetricsSource;
  composer: ResponseComposer;
  model: TextModel;
}): RouteHandler {
  return async ({ body }) => {
    const parsed = ReportBodySchema.parse(body);

    const health = hasKeys(parsed.health) ? parsed.health : await deps.health.aggregate();
    const metrics = hasKeys(parsed.metrics) ? parsed.metrics : await deps.metrics.snapshot();
    const reportMarkdown = await deps.composer.composeReport(health, metrics);

    return { ok: true, reportMarkdown, usedModel: deps.model.modelId };
  };
}
