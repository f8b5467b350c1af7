import type { TurnRole } from "../agent/types.js";
import type { HealthSnapshot, MetricsSnapshot } from "../health/types.js";
import type { ChatSession, SessionCache, SessionStoreOptions } from "./types.js";

/**
 * In-memory session map with idle expiry. Expired sessions are purged lazily
 * on every lookup; there is no background timer and nothing survives a
 * restart.
 */
export class ChatSessionStore implements SessionCache {
  private readonly sessions = new Map<string, ChatSession>();
  private readonly idleMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.idleMs = options.idleMinutes * 60_000;
    this.maxEntries = options.maxTurns * 2;
    this.now = options.now ?? Date.now;
  }

  getOrCreate(sessionId: string): ChatSession {
    this.purgeExpired();

    const now = this.now();
    const existing = this.sessions.get(sessionId);
    if (existing) {
      existing.lastActivity = now;
      return existing;
    }

    const session: ChatSession = { id: sessionId, lastActivity: now, history: [] };
    this.sessions.set(sessionId, session);
    return session;
  }

  /** Append a turn and drop the oldest entries beyond `2 × maxTurns`. */
  appendTurn(session: ChatSession, role: TurnRole, text: string): void {
    session.history.push({ role, text });
    const excess = session.history.length - this.maxEntries;
    if (excess > 0) {
      session.history.splice(0, excess);
    }
  }

  cacheHealth(session: ChatSession, health: HealthSnapshot): void {
    session.lastHealth = health;
  }

  cacheMetrics(session: ChatSession, metrics: MetricsSnapshot): void {
    session.lastMetrics = metrics;
  }

  cacheReport(session: ChatSession, reportMarkdown: string): void {
    session.lastReport = reportMarkdown;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  purgeExpired(): number {
    const cutoff = this.now() - this.idleMs;
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (session.lastActivity < cutoff) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }
}
