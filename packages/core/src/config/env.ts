/**
 * Maps the process environment onto the raw (pre-validation) config shape.
 * Blank values are ignored so that file or schema defaults apply.
 */

export type Env = Record<string, string | undefined>;

type RawSection = Record<string, unknown>;
export type RawConfig = Record<string, RawSection>;

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readNumber(env: Env, key: string): number | string | undefined {
  const value = read(env, key);
  if (value === undefined) return undefined;
  const num = Number(value);
  // Leave unparseable text in place so schema validation reports it.
  return Number.isFinite(num) ? num : value;
}

function readSeconds(env: Env, key: string): number | string | undefined {
  const value = readNumber(env, key);
  return typeof value === "number" ? Math.round(value * 1000) : value;
}

export function parseAllowedOrigins(raw: string): string[] {
  if (raw === "*") return ["*"];
  return raw
    .split(",")
    .map((o) => o.trim())
    .filter(Boolean);
}

function compact(section: RawSection): RawSection | undefined {
  const entries = Object.entries(section).filter(([, v]) => v !== undefined);
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

export function configFromEnv(env: Env): RawConfig {
  const origins = read(env, "ALLOWED_ORIGINS");
  const host = read(env, "HOST");
  const apiVersions = compact({
    vm: read(env, "AZURE_VM_API_VERSION"),
    web: read(env, "AZURE_WEB_API_VERSION"),
    storage: read(env, "AZURE_STORAGE_API_VERSION"),
  });

  const sections: Record<string, RawSection | undefined> = {
    server: compact({
      port: readNumber(env, "PORT"),
      bind: host ? "custom" : undefined,
      host,
      allowedOrigins: origins ? parseAllowedOrigins(origins) : undefined,
    }),
    model: compact({
      model: read(env, "GEMINI_MODEL"),
      baseUrl: read(env, "GEMINI_BASE"),
      apiKeyEnvVar: read(env, "GEMINI_API_KEY_ENV"),
    }),
    cloud: compact({
      subscriptionId: read(env, "AZURE_SUBSCRIPTION_ID"),
      resourceGroup: read(env, "AZURE_RESOURCE_GROUP"),
      apiVersions,
    }),
    endpoints: compact({
      raw: read(env, "CUSTOM_ENDPOINTS"),
      timeoutMs: readSeconds(env, "CUSTOM_ENDPOINT_TIMEOUT_SEC"),
    }),
    thresholds: compact({
      cpu: readNumber(env, "LOCAL_CPU_WARN"),
      memory: readNumber(env, "LOCAL_MEM_WARN"),
      disk: readNumber(env, "LOCAL_DISK_WARN"),
    }),
    sessions: compact({
      idleMinutes: readNumber(env, "SESSION_TTL_MIN"),
      maxTurns: readNumber(env, "CHAT_HISTORY_TURNS"),
    }),
    logging: compact({
      level: read(env, "LOG_LEVEL")?.toLowerCase(),
    }),
  };

  const result: RawConfig = {};
  for (const [name, section] of Object.entries(sections)) {
    if (section) result[name] = section;
  }
  return result;
}
