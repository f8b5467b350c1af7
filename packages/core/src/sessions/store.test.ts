import { describe, expect, it } from "vitest";
import { ChatSessionStore } from "./store.js";

function makeStore(maxTurns = 10) {
  let now = 1_000_000;
  const store = new ChatSessionStore({ idleMinutes: 60, maxTurns, now: () => now });
  return {
    store,
    advance(ms: number) {
      now += ms;
    },
  };
}

describe("ChatSessionStore", () => {
  it("creates an empty session for an unseen id", () => {
    const { store } = makeStore();
    const session = store.getOrCreate("s-1");
    expect(session).toEqual({ id: "s-1", lastActivity: 1_000_000, history: [] });
  });

  it("returns the same history and refreshes activity on a repeat lookup", () => {
    const { store, advance } = makeStore();
    const first = store.getOrCreate("s-1");
    store.appendTurn(first, "user", "hello");

    advance(5 * 60_000);
    const second = store.getOrCreate("s-1");

    expect(second).toBe(first);
    expect(second.history).toEqual([{ role: "user", text: "hello" }]);
    expect(second.lastActivity).toBe(1_000_000 + 5 * 60_000);
  });

  it("replaces cached snapshots wholesale", () => {
    const { store } = makeStore();
    const session = store.getOrCreate("s-1");
    store.cacheReport(session, "# First");
    store.cacheReport(session, "# Second");
    expect(session.lastReport).toBe("# Second");
    expect(session.history).toEqual([]);
  });

  it("bounds history at twice the turn limit, dropping the oldest", () => {
    const { store } = makeStore(2);
    const session = store.getOrCreate("s-1");
    for (let i = 1; i <= 7; i++) {
      store.appendTurn(session, i % 2 === 1 ? "user" : "model", `m${i}`);
      expect(session.history.length).toBeLessThanOrEqual(4);
    }
    expect(session.history.map((t) => t.text)).toEqual(["m4", "m5", "m6", "m7"]);
  });

  it("purges idle sessions on a lookup of any id", () => {
    const { store, advance } = makeStore();
    store.getOrCreate("old");
    advance(61 * 60_000);

    store.getOrCreate("other");
    expect(store.has("old")).toBe(false);
    expect(store.has("other")).toBe(true);
    expect(store.size).toBe(1);
  });

  it("keeps sessions that are exactly at the idle limit", () => {
    const { store, advance } = makeStore();
    store.getOrCreate("edge");
    advance(60 * 60_000);
    expect(store.purgeExpired()).toBe(0);
    expect(store.has("edge")).toBe(true);
  });

  it("starts fresh after expiry", () => {
    const { store, advance } = makeStore();
    store.appendTurn(store.getOrCreate("s-1"), "user", "hi");
    advance(2 * 60 * 60_000);
    expect(store.getOrCreate("s-1").history).toEqual([]);
  });
});
