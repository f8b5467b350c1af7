import { existsSync, readFileSync } from "node:fs";
import JSON5 from "json5";
import { ConfigError } from "../infra/errors.js";
import { isRecord } from "../infra/http.js";
import { configFromEnv, type Env } from "./env.js";
import { GatewayConfigSchema } from "./schema.js";
import type { GatewayConfig } from "./types.js";

export interface LoadConfigOptions {
  env?: Env;
  /** Optional JSON or JSON5 file used as the base layer. */
  filePath?: string;
}

/**
 * Load and validate config. The file (if any) is the base, environment
 * variables override it, schema defaults fill the rest.
 */
export function loadConfig(options: LoadConfigOptions = {}): GatewayConfig {
  const env = options.env ?? process.env;
  const fileConfig = options.filePath ? readConfigFile(options.filePath) : {};
  const merged = deepMerge(fileConfig, configFromEnv(env));

  const result = GatewayConfigSchema.safeParse(merged);
  if (!result.success) {
    const messages = result.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`,
    );
    throw new ConfigError(
      `Config validation failed:\n${messages.map((m) => `  - ${m}`).join("\n")}`,
    );
  }
  return result.data;
}

function readConfigFile(filePath: string): Record<string, unknown> {
  if (!existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  const raw = readFileSync(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON or JSON5: ${filePath}`, err);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file must contain an object: ${filePath}`);
  }
  return parsed;
}

export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = out[key];
    out[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }
  return out;
}
