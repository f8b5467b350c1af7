import type { Env } from "../config/env.js";
import { loadConfig } from "../config/loader.js";
import type { GatewayConfig } from "../config/types.js";
import { describeError } from "../infra/errors.js";
import { parseEndpointList } from "../health/endpoints.js";

export interface DoctorCheck {
  name: string;
  status: "pass" | "warn" | "fail";
  message: string;
}

export interface DoctorReport {
  checks: DoctorCheck[];
  ok: boolean;
}

export interface DoctorOptions {
  configPath?: string;
  env?: Env;
  /** Defaults to `process.version`. */
  nodeVersion?: string;
}

const MIN_NODE_MAJOR = 20;

/**
 * Run all doctor diagnostic checks and return a report. Checks that need a
 * valid config are skipped when it does not load.
 */
export async function runDoctorChecks(options: DoctorOptions = {}): Promise<DoctorReport> {
  const env = options.env ?? process.env;
  const checks: DoctorCheck[] = [checkNodeVersion(options.nodeVersion ?? process.version)];

  let config: GatewayConfig | undefined;
  try {
    config = loadConfig({ env, filePath: options.configPath });
    checks.push({
      name: "Config",
      status: "pass",
      message: options.configPath ? `Loaded ${options.configPath}` : "Loaded from environment",
    });
  } catch (err) {
    checks.push({ name: "Config", status: "fail", message: describeError(err) });
  }

  if (config) {
    checks.push(checkModelKey(config, env));
    checks.push(checkModelId(config));
    checks.push(checkCloud(config, env));
    checks.push(checkEndpoints(config));
  }

  return { checks, ok: checks.every((c) => c.status !== "fail") };
}

function checkNodeVersion(version: string): DoctorCheck {
  const match = version.match(/^v(\d+)\./);
  const major = match?.[1] ? parseInt(match[1], 10) : NaN;
  if (Number.isNaN(major)) {
    return {
      name: "Node version",
      status: "fail",
      message: `Unable to parse Node.js version: ${version}`,
    };
  }
  if (major >= MIN_NODE_MAJOR) {
    return {
      name: "Node version",
      status: "pass",
      message: `Node.js ${version} >= v${MIN_NODE_MAJOR}`,
    };
  }
  return {
    name: "Node version",
    status: "fail",
    message: `Node.js ${version} is below minimum v${MIN_NODE_MAJOR}`,
  };
}

function isSet(env: Env, name: string): boolean {
  return Boolean(env[name]?.trim());
}

function checkModelKey(config: GatewayConfig, env: Env): DoctorCheck {
  const name = config.model.apiKeyEnvVar;
  return isSet(env, name)
    ? { name: "Model API key", status: "pass", message: `${name} is set` }
    : { name: "Model API key", status: "fail", message: `${name} is not set` };
}

function checkModelId(config: GatewayConfig): DoctorCheck {
  return config.model.model
    ? { name: "Model", status: "pass", message: `Using ${config.model.model}` }
    : {
        name: "Model",
        status: "fail",
        message: "GEMINI_MODEL is not set (list candidates with GET /api/models)",
      };
}

function checkCloud(config: GatewayConfig, env: Env): DoctorCheck {
  const { subscriptionId, resourceGroup } = config.cloud;
  if (!subscriptionId || !resourceGroup) {
    return {
      name: "Azure",
      status: "warn",
      message: "Not configured; cloud checks will report not_configured",
    };
  }

  const missing = [
    config.cloud.tenantIdEnvVar,
    config.cloud.clientIdEnvVar,
    config.cloud.clientSecretEnvVar,
  ].filter((name) => !isSet(env, name));
  if (missing.length > 0) {
    return {
      name: "Azure",
      status: "warn",
      message: `Missing ${missing.join(", ")}; cloud checks will report auth_failed`,
    };
  }
  return {
    name: "Azure",
    status: "pass",
    message: `Subscription ${subscriptionId}, resource group ${resourceGroup}`,
  };
}

function checkEndpoints(config: GatewayConfig): DoctorCheck {
  const parsed = parseEndpointList(config.endpoints.raw);
  if (parsed.kind === "not_a_list") {
    return {
      name: "Custom endpoints",
      status: "fail",
      message: "CUSTOM_ENDPOINTS is not a JSON list",
    };
  }
  if (parsed.entries.length === 0) {
    return { name: "Custom endpoints", status: "pass", message: "None configured" };
  }
  return {
    name: "Custom endpoints",
    status: "pass",
    message: `${parsed.entries.length} endpoint(s): ${parsed.entries.map((e) => e.name).join(", ")}`,
  };
}

/**
 * Format a doctor report as human-readable text.
 * Uses [PASS], [WARN], [FAIL] prefixes.
 */
export function formatDoctorResults(report: DoctorReport): string {
  const lines = report.checks.map((check) => {
    const prefix =
      check.status === "pass"
        ? "[PASS]"
        : check.status === "warn"
          ? "[WARN]"
          : "[FAIL]";
    return `${prefix} ${check.name}: ${check.message}`;
  });

  lines.push("");
  lines.push(
    report.ok ? "All checks passed." : "Some checks failed. See above.",
  );

  return lines.join("\n");
}
