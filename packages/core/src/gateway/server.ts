import type { Server as HttpServer } from "node:http";
import type { AddressInfo } from "node:net";
import type { GatewayConfig } from "../config/types.js";
import { createLogger, type AppLogger } from "../infra/logger.js";
import type { Services } from "../services.js";
import { resolveBindHost } from "./net.js";
import { createGatewayHttpServer } from "./server-http.js";
import { createChatHandler } from "./server-methods/chat.js";
import {
  createHealthcheckHandler,
  createHealthzHandler,
  createMetricsHandler,
} from "./server-methods/health.js";
import { createModelsHandler } from "./server-methods/models.js";
import { createReportHandler } from "./server-methods/report.js";
import { createSupervisorHandler } from "./server-methods/supervisor.js";
import type { RouteHandler, RouteKey, RouteTable } from "./server-methods/types.js";

/**
 * Gateway bootstrap: route table, HTTP server, listen/close lifecycle.
 */

export interface GatewayInstance {
  httpServer: HttpServer;
  logger: AppLogger;
  listen(): Promise<AddressInfo>;
  close(): Promise<void>;
}

export interface GatewayOptions {
  config: GatewayConfig;
  services: Services;
  logger?: AppLogger;
}

export function buildRoutes(services: Services): RouteTable {
  return new Map<RouteKey, RouteHandler>([
    ["GET /healthz", createHealthzHandler()],
    ["GET /api/healthcheck", createHealthcheckHandler(services.health)],
    ["GET /api/metrics", createMetricsHandler(services.metrics)],
    ["GET /api/models", createModelsHandler(services.model)],
    [
      "POST /api/report",
      createReportHandler({
        health: services.health,
        metrics: services.metrics,
        composer: services.composer,
        model: services.model,
      }),
    ],
    ["POST /api/chat", createChatHandler(services.pipeline)],
    [
      "POST /api/supervisor",
      createSupervisorHandler({ composer: services.composer, model: services.model }),
    ],
  ]);
}

export function createGateway(options: GatewayOptions): GatewayInstance {
  const { config, services } = options;
  const serverConfig = config.server;

  const logger =
    options.logger ??
    createLogger("gateway", {
      level: config.logging.level,
      redact: config.logging.redactSecrets,
    });

  const httpServer = createGatewayHttpServer({
    routes: buildRoutes(services),
    allowedOrigins: serverConfig.allowedOrigins,
    logger,
  });

  const host = resolveBindHost(serverConfig.bind, serverConfig.host);

  async function listen(): Promise<AddressInfo> {
    return new Promise<AddressInfo>((resolve, reject) => {
      httpServer.once("error", reject);
      httpServer.listen(serverConfig.port, host, () => {
        httpServer.off("error", reject);
        const address = httpServer.address();
        const info: AddressInfo =
          address && typeof address === "object"
            ? address
            : { address: host, family: "IPv4", port: serverConfig.port };
        logger.info(`Gateway listening on http://${host}:${info.port}`);
        resolve(info);
      });
    });
  }

  async function close(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      httpServer.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  return { httpServer, logger, listen, close };
}
