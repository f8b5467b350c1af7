/**
 * Snapshot shapes returned by the health collectors. Field names follow the
 * JSON the dashboard consumes.
 */

export interface LocalHealth {
  cpu_percent: number;
  memory_percent: number;
  disk_percent: number;
  uptime_seconds: number;
  warnings: string[];
}

export type CloudStatus = "not_configured" | "auth_failed" | "error" | "ok" | "warnings";

export interface CloudResource {
  name: string;
  state: string;
}

export interface StorageResource {
  name: string;
  provisioningState: string;
}

export interface CloudHealth {
  configured: boolean;
  status: CloudStatus;
  message: string;
  vms: CloudResource[];
  appServices: CloudResource[];
  storageAccounts: StorageResource[];
  warnings: string[];
}

export type EndpointStatus = "UP" | "DOWN";

export interface EndpointResult {
  name: string;
  url: string;
  status: EndpointStatus;
  http_status: number | null;
  latency_ms: number;
  error: string | null;
}

export interface CustomHealth {
  configured: boolean;
  results: EndpointResult[];
  warnings: string[];
}

export interface HealthSummary {
  total: number;
  healthy: number;
  warnings: number;
}

export interface HealthSnapshot {
  timestamp: string;
  summary: HealthSummary;
  warnings: string[];
  local: LocalHealth;
  cloud: CloudHealth;
  custom: CustomHealth;
}

export interface SeriesPoint {
  t: string;
  v: number;
}

export interface MetricsSnapshot {
  timestamp: string;
  range: "24h";
  syntheticTrend: boolean;
  cpu: SeriesPoint[];
  memory: SeriesPoint[];
  disk: SeriesPoint[];
  netio: SeriesPoint[];
}

/** Anything that can contribute a health sub-report. */
export interface HealthCollector<T extends { warnings: string[] }> {
  collect(): Promise<T>;
}
