import type { ChatTurn } from "../agent/types.js";
import type { HealthSnapshot, MetricsSnapshot } from "../health/types.js";

/**
 * Per-conversation state. Cached snapshots are replaced wholesale on each
 * successful fetch.
 */
export interface ChatSession {
  id: string;
  /** Epoch milliseconds of the last lookup. */
  lastActivity: number;
  history: ChatTurn[];
  lastHealth?: HealthSnapshot;
  lastMetrics?: MetricsSnapshot;
  lastReport?: string;
}

/** Write path for a session's cached tool results. */
export interface SessionCache {
  cacheHealth(session: ChatSession, health: HealthSnapshot): void;
  cacheMetrics(session: ChatSession, metrics: MetricsSnapshot): void;
  cacheReport(session: ChatSession, reportMarkdown: string): void;
}

export interface SessionStoreOptions {
  idleMinutes: number;
  maxTurns: number;
  now?: () => number;
}
