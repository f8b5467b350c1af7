import { ResponseComposer } from "./agent/composer.js";
import { GeminiClient } from "./agent/gemini.js";
import { ActionPlanner } from "./agent/planner.js";
import { ChatPipeline } from "./agent/runtime.js";
import { ToolExecutor } from "./agent/tool-executor.js";
import type { TextModel } from "./agent/types.js";
import type { GatewayConfig } from "./config/types.js";
import { HealthAggregator } from "./health/aggregator.js";
import { ClientCredentialsTokenProvider } from "./health/azure-auth.js";
import { CloudHealthCollector } from "./health/cloud.js";
import { EndpointHealthCollector } from "./health/endpoints.js";
import { LocalHealthCollector, createHostSampler, type HostSampler } from "./health/local.js";
import { MetricsGenerator } from "./health/metrics.js";
import { createLogger, type AppLogger } from "./infra/logger.js";
import { ChatSessionStore } from "./sessions/store.js";

/**
 * Everything the gateway and the CLI need, built once at startup.
 */
export interface Services {
  config: GatewayConfig;
  model: TextModel;
  sessions: ChatSessionStore;
  health: HealthAggregator;
  metrics: MetricsGenerator;
  composer: ResponseComposer;
  pipeline: ChatPipeline;
}

export interface ServiceOverrides {
  model?: TextModel;
  sampler?: HostSampler;
  logger?: (name: string) => AppLogger;
}

export function createServices(config: GatewayConfig, overrides: ServiceOverrides = {}): Services {
  const logOptions = {
    level: config.logging.level,
    redact: config.logging.redactSecrets,
  };
  const logger = overrides.logger ?? ((name: string) => createLogger(name, logOptions));

  const model = overrides.model ?? new GeminiClient(config.model);
  const sampler = overrides.sampler ?? createHostSampler();

  const health = new HealthAggregator(
    {
      local: new LocalHealthCollector(sampler, config.thresholds),
      cloud: new CloudHealthCollector(
        config.cloud,
        new ClientCredentialsTokenProvider(config.cloud),
        logger("cloud"),
      ),
      custom: new EndpointHealthCollector(config.endpoints, logger("endpoints")),
    },
    logger("health"),
  );
  const metrics = new MetricsGenerator(sampler);

  const sessions = new ChatSessionStore({
    idleMinutes: config.sessions.idleMinutes,
    maxTurns: config.sessions.maxTurns,
  });
  const composer = new ResponseComposer(model);
  const pipeline = new ChatPipeline({
    model,
    sessions,
    planner: new ActionPlanner(model, logger("planner")),
    executor: new ToolExecutor(health, metrics, composer, sessions),
    composer,
    logger: logger("chat"),
  });

  return { config, model, sessions, health, metrics, composer, pipeline };
}
