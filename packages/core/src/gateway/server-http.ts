import {
  createServer as createHttpServer,
  type Server as HttpServer,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";
import { NotFoundError } from "../infra/errors.js";
import type { AppLogger } from "../infra/logger.js";
import { buildCspHeader, generateCspNonce } from "./csp.js";
import { renderDashboardHtml } from "./dashboard/serve.js";
import { readJsonBody, sendJson, toErrorResponse } from "./http-json.js";
import { resolveAllowedOrigin } from "./net.js";
import type { RouteKey, RouteTable } from "./server-methods/types.js";

/**
 * Express-free HTTP server: security headers and CORS on every response, the
 * dashboard at `/`, and a JSON route table for everything else.
 */

export interface HttpServerOptions {
  routes: RouteTable;
  allowedOrigins: readonly string[];
  logger: AppLogger;
  /** Serve the dashboard page at GET /. */
  dashboard?: boolean;
}

export function createGatewayHttpServer(options: HttpServerOptions): HttpServer {
  const { routes, allowedOrigins, logger } = options;
  const serveDashboard = options.dashboard !== false;

  async function dispatch(req: IncomingMessage, res: ServerResponse, nonce: string): Promise<void> {
    const method = req.method ?? "GET";
    const path = (req.url ?? "/").split("?")[0] ?? "/";

    if (method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    if (method === "GET" && path === "/" && serveDashboard) {
      res.writeHead(200, { "Content-Type": "text/html; charset=utf-8" });
      res.end(renderDashboardHtml(nonce));
      return;
    }

    const key: RouteKey = `${method === "POST" ? "POST" : "GET"} ${path}`;
    const handler = method === "GET" || method === "POST" ? routes.get(key) : undefined;
    if (!handler) {
      throw new NotFoundError(`No route for ${method} ${path}`);
    }

    const body = method === "POST" ? await readJsonBody(req) : {};
    sendJson(res, 200, await handler({ body }));
  }

  return createHttpServer((req, res) => {
    const started = Date.now();
    const nonce = generateCspNonce();
    applySecurityHeaders(res, nonce);
    applyCorsHeaders(req, res, allowedOrigins);

    void dispatch(req, res, nonce)
      .catch((err: unknown) => {
        const { status, body } = toErrorResponse(err);
        if (status >= 500) {
          logger.error(`${req.method} ${req.url} failed: ${body.error.message}`, err);
        } else {
          logger.warn(`${req.method} ${req.url} -> ${status} ${body.error.code}`);
        }
        if (res.headersSent) {
          res.end();
        } else {
          sendJson(res, status, body);
        }
      })
      .finally(() => {
        logger.debug(`${req.method} ${req.url} ${res.statusCode} ${Date.now() - started}ms`);
      });
  });
}

/**
 * Apply security headers to every HTTP response.
 */
function applySecurityHeaders(res: ServerResponse, nonce: string): void {
  res.setHeader("Content-Security-Policy", buildCspHeader(nonce));
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("X-XSS-Protection", "0");
  res.setHeader("Referrer-Policy", "strict-origin-when-cross-origin");
  res.setHeader("Permissions-Policy", "camera=(), microphone=(), geolocation=()");
}

function applyCorsHeaders(
  req: IncomingMessage,
  res: ServerResponse,
  allowedOrigins: readonly string[],
): void {
  const allowed = resolveAllowedOrigin(req.headers.origin, allowedOrigins);
  if (!allowed) return;

  res.setHeader("Access-Control-Allow-Origin", allowed);
  if (allowed !== "*") res.setHeader("Vary", "Origin");
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  res.setHeader(
    "Access-Control-Allow-Headers",
    req.headers["access-control-request-headers"] ?? "Content-Type",
  );
  res.setHeader("Access-Control-Max-Age", "600");
}
