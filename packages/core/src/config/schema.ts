import { z } from "zod";

const percent = z.number().min(0).max(100);

export const ServerSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8000),
  bind: z.enum(["loopback", "lan", "custom"]).default("loopback"),
  host: z.string().optional(),
  allowedOrigins: z.array(z.string().min(1)).min(1).default(["*"]),
});

export const ModelSchema = z.object({
  provider: z.literal("gemini").default("gemini"),
  apiKeyEnvVar: z.string().default("GEMINI_API_KEY"),
  model: z.string().default(""),
  baseUrl: z.string().url().default("https://generativelanguage.googleapis.com/v1beta"),
  timeoutMs: z.number().int().min(1).default(60_000),
});

export const CloudApiVersionsSchema = z.object({
  vm: z.string().default("2024-03-01"),
  web: z.string().default("2024-04-01"),
  storage: z.string().default("2023-01-01"),
});

export const CloudSchema = z.object({
  subscriptionId: z.string().default(""),
  resourceGroup: z.string().default(""),
  tenantIdEnvVar: z.string().default("AZURE_TENANT_ID"),
  clientIdEnvVar: z.string().default("AZURE_CLIENT_ID"),
  clientSecretEnvVar: z.string().default("AZURE_CLIENT_SECRET"),
  managementBaseUrl: z.string().url().default("https://management.azure.com"),
  authorityBaseUrl: z.string().url().default("https://login.microsoftonline.com"),
  apiVersions: CloudApiVersionsSchema.default({}),
  timeoutMs: z.number().int().min(1).default(30_000),
});

export const EndpointsSchema = z.object({
  /** Raw JSON list of `{name, url}`; parsed leniently at probe time. */
  raw: z.string().default("[]"),
  timeoutMs: z.number().int().min(1).default(5_000),
});

export const ThresholdsSchema = z.object({
  cpu: percent.default(85),
  memory: percent.default(90),
  disk: percent.default(90),
});

export const SessionsSchema = z.object({
  idleMinutes: z.number().min(0).default(60),
  maxTurns: z.number().int().min(1).default(10),
});

export const LoggingSchema = z.object({
  level: z
    .enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
  redactSecrets: z.boolean().default(true),
});

export const GatewayConfigSchema = z.object({
  server: ServerSchema.default({}),
  model: ModelSchema.default({}),
  cloud: CloudSchema.default({}),
  endpoints: EndpointsSchema.default({}),
  thresholds: ThresholdsSchema.default({}),
  sessions: SessionsSchema.default({}),
  logging: LoggingSchema.default({}),
});
