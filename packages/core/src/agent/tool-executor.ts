import type { HealthSource } from "../health/aggregator.js";
import type { MetricsSource } from "../health/metrics.js";
import { withSpan } from "../infra/telemetry.js";
import type { ChatSession, SessionCache } from "../sessions/types.js";
import type { ResponseComposer } from "./composer.js";
import type { ActionPlan, ChatAction, ToolPayload } from "./types.js";

const HEALTH_ACTIONS: ReadonlySet<ChatAction> = new Set(["health", "daily_report", "report"]);
const METRICS_ACTIONS: ReadonlySet<ChatAction> = new Set(["metrics", "daily_report", "report"]);
const REPORT_ACTIONS: ReadonlySet<ChatAction> = new Set(["report", "daily_report"]);

/**
 * Runs the fetches an action needs and records each result in the session
 * cache as soon as it arrives. A failure aborts the rest of the turn; whatever was
 * cached before it stays cached.
 */
export class ToolExecutor {
  constructor(
    private readonly health: HealthSource,
    private readonly metrics: MetricsSource,
    private readonly composer: ResponseComposer,
    private readonly sessions: SessionCache,
  ) {}

  async execute(plan: ActionPlan, session: ChatSession): Promise<ToolPayload> {
    const payload: ToolPayload = { action: plan.action, why: plan.why };
    if (plan.needTools) {
      await withSpan("chat.tools", { "chat.action": plan.action }, () =>
        this.fetchFresh(plan.action, session, payload),
      );
    }
    return withCachedFallback(payload, session);
  }

  private async fetchFresh(
    action: ChatAction,
    session: ChatSession,
    payload: ToolPayload,
  ): Promise<void> {
    if (HEALTH_ACTIONS.has(action)) {
      const health = await this.health.aggregate();
      this.sessions.cacheHealth(session, health);
      payload.health = health;
    }

    if (METRICS_ACTIONS.has(action)) {
      const metrics = await this.metrics.snapshot();
      this.sessions.cacheMetrics(session, metrics);
      payload.metrics = metrics;
    }

    if (REPORT_ACTIONS.has(action)) {
      const health = payload.health ?? session.lastHealth ?? {};
      const metrics = payload.metrics ?? session.lastMetrics ?? {};
      const report = await this.composer.composeReport(health, metrics);
      this.sessions.cacheReport(session, report);
      payload.reportMarkdown = report;
    }
  }
}

/**
 * Follow-up answers reuse the session's last result for the action's own
 * tool when this turn did not fetch it. Cached values are used as-is.
 */
export function withCachedFallback(payload: ToolPayload, session: ChatSession): ToolPayload {
  switch (payload.action) {
    case "health":
      if (!payload.health && session.lastHealth) payload.health = session.lastHealth;
      break;
    case "metrics":
      if (!payload.metrics && session.lastMetrics) payload.metrics = session.lastMetrics;
      break;
    case "report":
    case "daily_report":
      if (payload.reportMarkdown === undefined && session.lastReport) {
        payload.reportMarkdown = session.lastReport;
      }
      break;
    case "chat":
      break;
  }
  return payload;
}
