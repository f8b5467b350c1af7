import type { HostSampler } from "./local.js";
import { round2 } from "./local.js";
import type { MetricsSnapshot, SeriesPoint } from "./types.js";

const POINTS = 24;
const HOUR_MS = 60 * 60 * 1000;

const DISK_BASE = 55;
const NETIO_BASE = 35;

const JITTER = { cpu: 18, memory: 14, disk: 10, netio: 22 } as const;

export interface MetricsSource {
  snapshot(): Promise<MetricsSnapshot>;
}

export interface MetricsOptions {
  random?: () => number;
  now?: () => Date;
}

function clampPercent(value: number): number {
  return Math.max(0, Math.min(100, value));
}

/**
 * Hourly series ending at `end`, oldest first. Each value is the base plus
 * uniform jitter, clamped to 0..100.
 */
export function syntheticSeries(
  end: Date,
  base: number,
  jitter: number,
  random: () => number,
  points = POINTS,
): SeriesPoint[] {
  const series: SeriesPoint[] = [];
  for (let i = 0; i < points; i++) {
    const t = new Date(end.getTime() - (points - 1 - i) * HOUR_MS);
    const v = clampPercent(base + (random() - 0.5) * jitter);
    series.push({ t: t.toISOString(), v: round2(v) });
  }
  return series;
}

/**
 * 24h trend seeded from one live CPU and memory reading. Disk and network
 * series use fixed bases; the whole trend is marked synthetic.
 */
export class MetricsGenerator implements MetricsSource {
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(
    private readonly sampler: HostSampler,
    options: MetricsOptions = {},
  ) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  async snapshot(): Promise<MetricsSnapshot> {
    const baseCpu = await this.sampler.cpuPercent();
    const baseMem = this.sampler.memoryPercent();
    const end = this.now();

    return {
      timestamp: end.toISOString(),
      range: "24h",
      syntheticTrend: true,
      cpu: syntheticSeries(end, baseCpu, JITTER.cpu, this.random),
      memory: syntheticSeries(end, baseMem, JITTER.memory, this.random),
      disk: syntheticSeries(end, DISK_BASE, JITTER.disk, this.random),
      netio: syntheticSeries(end, NETIO_BASE, JITTER.netio, this.random),
    };
  }
}
