import { describe, expect, it, vi } from "vitest";
import { CloudSchema } from "../config/schema.js";
import { HealthAggregator } from "./aggregator.js";
import { CloudHealthCollector } from "./cloud.js";
import type { CustomHealth, HealthCollector, LocalHealth } from "./types.js";

const quietLocal: HealthCollector<LocalHealth> = {
  collect: async () => ({
    cpu_percent: 40,
    memory_percent: 50,
    disk_percent: 60,
    uptime_seconds: 120,
    warnings: [],
  }),
};

const noEndpoints: HealthCollector<CustomHealth> = {
  collect: async () => ({ configured: true, results: [], warnings: [] }),
};

const unconfiguredCloud = new CloudHealthCollector(CloudSchema.parse({}), {
  getToken: vi.fn(async () => "unused"),
});

const fixedNow = () => new Date("2026-03-10T12:00:00.000Z");

describe("HealthAggregator", () => {
  it("reports all checks healthy when nothing warns", async () => {
    const snapshot = await new HealthAggregator(
      { local: quietLocal, cloud: unconfiguredCloud, custom: noEndpoints },
      undefined,
      fixedNow,
    ).aggregate();

    expect(snapshot.timestamp).toBe("2026-03-10T12:00:00.000Z");
    expect(snapshot.summary).toEqual({ total: 5, healthy: 5, warnings: 0 });
    expect(snapshot.warnings).toEqual([]);
    expect(snapshot.cloud.configured).toBe(false);
    expect(snapshot.cloud.status).toBe("not_configured");
  });

  it("sums warnings across sources in local, cloud, custom order", async () => {
    const local: HealthCollector<LocalHealth> = {
      collect: async () => ({
        ...(await quietLocal.collect()),
        warnings: ["LOCAL: High CPU 91.0% (>= 85%)"],
      }),
    };
    const custom: HealthCollector<CustomHealth> = {
      collect: async () => ({
        configured: true,
        results: [],
        warnings: ["CUSTOM: a DOWN (x)", "CUSTOM: b DOWN (y)"],
      }),
    };

    const snapshot = await new HealthAggregator({ local, cloud: unconfiguredCloud, custom }).aggregate();
    expect(snapshot.summary).toEqual({ total: 5, healthy: 2, warnings: 3 });
    expect(snapshot.warnings).toEqual([
      "LOCAL: High CPU 91.0% (>= 85%)",
      "CUSTOM: a DOWN (x)",
      "CUSTOM: b DOWN (y)",
    ]);
  });

  it("never reports a negative healthy count", async () => {
    const custom: HealthCollector<CustomHealth> = {
      collect: async () => ({
        configured: true,
        results: [],
        warnings: ["1", "2", "3", "4", "5", "6", "7"].map((n) => `CUSTOM: e${n} DOWN (x)`),
      }),
    };
    const snapshot = await new HealthAggregator({ local: quietLocal, cloud: unconfiguredCloud, custom }).aggregate();
    expect(snapshot.summary).toEqual({ total: 5, healthy: 0, warnings: 7 });
  });

  it("isolates a failing collector", async () => {
    const cloud = {
      collect: vi.fn(async () => {
        throw new Error("socket hang up");
      }),
    };

    const snapshot = await new HealthAggregator({ local: quietLocal, cloud, custom: noEndpoints }).aggregate();
    expect(snapshot.local.cpu_percent).toBe(40);
    expect(snapshot.cloud.status).toBe("error");
    expect(snapshot.warnings).toEqual(["AZURE: check failed - socket hang up"]);
    expect(snapshot.summary.healthy).toBe(4);
  });
});
