import { describe, expect, it } from "vitest";
import type { HostSampler } from "./local.js";
import { MetricsGenerator, syntheticSeries } from "./metrics.js";

const END = new Date("2026-03-10T12:00:00.000Z");

const sampler: HostSampler = {
  cpuPercent: async () => 40,
  memoryPercent: () => 50,
  diskPercent: async () => 60,
  uptimeSeconds: () => 1,
};

describe("syntheticSeries", () => {
  it("produces hourly points ending at the given time", () => {
    const series = syntheticSeries(END, 50, 10, () => 0.5, 3);
    expect(series).toEqual([
      { t: "2026-03-10T10:00:00.000Z", v: 50 },
      { t: "2026-03-10T11:00:00.000Z", v: 50 },
      { t: "2026-03-10T12:00:00.000Z", v: 50 },
    ]);
  });

  it("applies jitter and clamps to 0..100", () => {
    expect(syntheticSeries(END, 98, 10, () => 1, 1)[0]?.v).toBe(100);
    expect(syntheticSeries(END, 2, 10, () => 0, 1)[0]?.v).toBe(0);
    expect(syntheticSeries(END, 50, 10, () => 0.75, 1)[0]?.v).toBe(52.5);
  });
});

describe("MetricsGenerator", () => {
  it("builds four 24-point series from live and fixed bases", async () => {
    const metrics = await new MetricsGenerator(sampler, {
      random: () => 0.5,
      now: () => END,
    }).snapshot();

    expect(metrics.timestamp).toBe("2026-03-10T12:00:00.000Z");
    expect(metrics.range).toBe("24h");
    expect(metrics.syntheticTrend).toBe(true);
    for (const series of [metrics.cpu, metrics.memory, metrics.disk, metrics.netio]) {
      expect(series).toHaveLength(24);
    }
    expect(metrics.cpu[0]).toEqual({ t: "2026-03-09T13:00:00.000Z", v: 40 });
    expect(metrics.memory[23]).toEqual({ t: "2026-03-10T12:00:00.000Z", v: 50 });
    expect(metrics.disk[5]?.v).toBe(55);
    expect(metrics.netio[5]?.v).toBe(35);
  });
});
