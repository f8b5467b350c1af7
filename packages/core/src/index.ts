// Config
export { GatewayConfigSchema } from "./config/schema.js";
export type {
  CloudConfig,
  EndpointsConfig,
  GatewayConfig,
  LoggingConfig,
  ModelConfig,
  ServerConfig,
  SessionsConfig,
  ThresholdsConfig,
} from "./config/types.js";
export { loadConfig } from "./config/loader.js";
export { configFromEnv } from "./config/env.js";
export { resolveSecret } from "./config/secrets.js";

// Infrastructure
export { createLogger, redactSensitive } from "./infra/logger.js";
export type { AppLogger, LogLevel } from "./infra/logger.js";
export {
  AppError,
  AnswerGenerationError,
  ConfigError,
  NotFoundError,
  PayloadTooLargeError,
  ToolExecutionError,
  UpstreamError,
  ValidationError,
} from "./infra/errors.js";
export { fetchWithTimeout, TimeoutError } from "./infra/http.js";
export { withSpan } from "./infra/telemetry.js";

// Health
export { HealthAggregator, TOTAL_CHECKS } from "./health/aggregator.js";
export type { HealthCollectors, HealthSource } from "./health/aggregator.js";
export { LocalHealthCollector, createHostSampler } from "./health/local.js";
export type { HostSampler } from "./health/local.js";
export { CloudHealthCollector } from "./health/cloud.js";
export { ClientCredentialsTokenProvider } from "./health/azure-auth.js";
export type { AccessTokenProvider } from "./health/azure-auth.js";
export { EndpointHealthCollector, parseEndpointList } from "./health/endpoints.js";
export { MetricsGenerator } from "./health/metrics.js";
export type { MetricsSource } from "./health/metrics.js";
export type {
  CloudHealth,
  CustomHealth,
  EndpointResult,
  HealthCollector,
  HealthSnapshot,
  LocalHealth,
  MetricsSnapshot,
} from "./health/types.js";

// Chat
export { GeminiClient } from "./agent/gemini.js";
export { ActionPlanner, parsePlanReply } from "./agent/planner.js";
export { ToolExecutor } from "./agent/tool-executor.js";
export { ResponseComposer } from "./agent/composer.js";
export { ChatPipeline, normalizeMode } from "./agent/runtime.js";
export type { ChatRequest, ChatResult } from "./agent/runtime.js";
export { CHAT_ACTIONS } from "./agent/types.js";
export type {
  ActionPlan,
  ChatAction,
  ChatMode,
  ChatTurn,
  TextModel,
  ToolPayload,
} from "./agent/types.js";

// Sessions
export { ChatSessionStore } from "./sessions/store.js";
export { KeyedLock } from "./sessions/lock.js";
export type { ChatSession, SessionCache } from "./sessions/types.js";

// Gateway
export { createGateway, buildRoutes } from "./gateway/server.js";
export type { GatewayInstance, GatewayOptions } from "./gateway/server.js";
export { createGatewayHttpServer } from "./gateway/server-http.js";
export { createServices } from "./services.js";
export type { Services } from "./services.js";

// CLI
export { runDoctorChecks, formatDoctorResults } from "./cli/doctor.js";
export type { DoctorCheck, DoctorReport } from "./cli/doctor.js";
