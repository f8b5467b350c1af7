import { cpus, freemem, totalmem, uptime } from "node:os";
import { statfs } from "node:fs/promises";
import type { ThresholdsConfig } from "../config/types.js";
import type { HealthCollector, LocalHealth } from "./types.js";

const CPU_SAMPLE_MS = 200;

/**
 * Point-in-time host readings. Percentages are 0..100.
 */
export interface HostSampler {
  cpuPercent(): Promise<number>;
  memoryPercent(): number;
  diskPercent(): Promise<number>;
  uptimeSeconds(): number;
}

interface CpuTotals {
  idle: number;
  total: number;
}

function readCpuTotals(): CpuTotals {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus()) {
    const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
    idle += cpuIdle;
    total += user + nice + sys + cpuIdle + irq;
  }
  return { idle, total };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function rootDiskPath(): string {
  return process.platform === "win32" ? `${process.env.SYSTEMDRIVE ?? "C:"}\\` : "/";
}

/**
 * Sampler backed by `node:os` and `fs.statfs`. CPU usage is the busy share
 * between two snapshots taken `cpuSampleMs` apart.
 */
export function createHostSampler(options?: {
  cpuSampleMs?: number;
  diskPath?: string;
}): HostSampler {
  const sampleMs = options?.cpuSampleMs ?? CPU_SAMPLE_MS;
  const diskPath = options?.diskPath ?? rootDiskPath();

  return {
    async cpuPercent() {
      const start = readCpuTotals();
      await sleep(sampleMs);
      const end = readCpuTotals();
      const total = end.total - start.total;
      if (total <= 0) return 0;
      return ((total - (end.idle - start.idle)) / total) * 100;
    },

    memoryPercent() {
      const total = totalmem();
      if (total <= 0) return 0;
      return ((total - freemem()) / total) * 100;
    },

    async diskPercent() {
      const stats = await statfs(diskPath);
      const used = (stats.blocks - stats.bfree) * stats.bsize;
      const available = stats.bavail * stats.bsize;
      if (used + available <= 0) return 0;
      return (used / (used + available)) * 100;
    },

    uptimeSeconds() {
      return Math.floor(uptime());
    },
  };
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Local host check. Always produces a report; threshold breaches become
 * warnings rather than failures.
 */
export class LocalHealthCollector implements HealthCollector<LocalHealth> {
  constructor(
    private readonly sampler: HostSampler,
    private readonly thresholds: ThresholdsConfig,
  ) {}

  async collect(): Promise<LocalHealth> {
    const [cpu, disk] = await Promise.all([
      this.sampler.cpuPercent(),
      this.sampler.diskPercent(),
    ]);
    const mem = this.sampler.memoryPercent();
    const warnings: string[] = [];

    if (cpu >= this.thresholds.cpu) {
      warnings.push(`LOCAL: High CPU ${cpu.toFixed(1)}% (>= ${this.thresholds.cpu}%)`);
    }
    if (mem >= this.thresholds.memory) {
      warnings.push(`LOCAL: High Memory ${mem.toFixed(1)}% (>= ${this.thresholds.memory}%)`);
    }
    if (disk >= this.thresholds.disk) {
      warnings.push(`LOCAL: High Disk ${disk.toFixed(1)}% (>= ${this.thresholds.disk}%)`);
    }

    return {
      cpu_percent: round2(cpu),
      memory_percent: round2(mem),
      disk_percent: round2(disk),
      uptime_seconds: this.sampler.uptimeSeconds(),
      warnings,
    };
  }
}
