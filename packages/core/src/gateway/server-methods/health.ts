import type { HealthSource } from "../../health/aggregator.js";
import type { MetricsSource } from "../../health/metrics.js";
import type { RouteHandler } from "./types.js";

/** GET /healthz: liveness only, touches no collaborator. */
export function createHealthzHandler(now: () => Date = () => new Date()): RouteHandler {
  return async () => ({ ok: true, timestamp: now().toISOString() });
}

/** GET /api/healthcheck */
export function createHealthcheckHandler(health: HealthSource): RouteHandler {
  return async () => ({ ok: true, data: await health.aggregate() });
}

/** GET /api/metrics */
export function createMetricsHandler(metrics: MetricsSource): RouteHandler {
  return async () => ({ ok: true, data: await metrics.snapshot() });
}
