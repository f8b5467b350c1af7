import { describeError } from "../infra/errors.js";
import type { AppLogger } from "../infra/logger.js";
import { withSpan } from "../infra/telemetry.js";
import { emptyCloudHealth } from "./cloud.js";
import type {
  CloudHealth,
  CustomHealth,
  HealthCollector,
  HealthSnapshot,
  LocalHealth,
} from "./types.js";

/** Three local thresholds, one cloud check, one custom endpoint check. */
export const TOTAL_CHECKS = 5;

export interface HealthCollectors {
  local: HealthCollector<LocalHealth>;
  cloud: HealthCollector<CloudHealth>;
  custom: HealthCollector<CustomHealth>;
}

export interface HealthSource {
  aggregate(): Promise<HealthSnapshot>;
}

/**
 * Fans out to the three collectors concurrently. A collector that throws is
 * reported as a warning on its own section; the others still complete.
 */
export class HealthAggregator implements HealthSource {
  constructor(
    private readonly collectors: HealthCollectors,
    private readonly logger?: AppLogger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async aggregate(): Promise<HealthSnapshot> {
    return withSpan("health.aggregate", {}, async () => {
      const [local, cloud, custom] = await Promise.allSettled([
        this.collectors.local.collect(),
        this.collectors.cloud.collect(),
        this.collectors.custom.collect(),
      ]);

      const snapshot = {
        local: local.status === "fulfilled" ? local.value : this.failedLocal(local.reason),
        cloud: cloud.status === "fulfilled" ? cloud.value : this.failedCloud(cloud.reason),
        custom: custom.status === "fulfilled" ? custom.value : this.failedCustom(custom.reason),
      };

      const warnings = [
        ...snapshot.local.warnings,
        ...snapshot.cloud.warnings,
        ...snapshot.custom.warnings,
      ];

      return {
        timestamp: this.now().toISOString(),
        summary: {
          total: TOTAL_CHECKS,
          healthy: Math.max(0, TOTAL_CHECKS - warnings.length),
          warnings: warnings.length,
        },
        warnings,
        ...snapshot,
      };
    });
  }

  private failedLocal(reason: unknown): LocalHealth {
    const message = describeError(reason);
    this.logger?.warn(`Local health collection failed: ${message}`);
    return {
      cpu_percent: 0,
      memory_percent: 0,
      disk_percent: 0,
      uptime_seconds: 0,
      warnings: [`LOCAL: collection failed - ${message}`],
    };
  }

  private failedCloud(reason: unknown): CloudHealth {
    const message = describeError(reason);
    this.logger?.warn(`Cloud health collection failed: ${message}`);
    return emptyCloudHealth(true, "error", `Azure checks failed: ${message}`, [
      `AZURE: check failed - ${message}`,
    ]);
  }

  private failedCustom(reason: unknown): CustomHealth {
    const message = describeError(reason);
    this.logger?.warn(`Endpoint probing failed: ${message}`);
    return { configured: true, results: [], warnings: [`CUSTOM: probe failed - ${message}`] };
  }
}
