import type { z } from "zod";
import type {
  CloudSchema,
  EndpointsSchema,
  GatewayConfigSchema,
  LoggingSchema,
  ModelSchema,
  ServerSchema,
  SessionsSchema,
  ThresholdsSchema,
} from "./schema.js";

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type ServerConfig = z.infer<typeof ServerSchema>;
export type ModelConfig = z.infer<typeof ModelSchema>;
export type CloudConfig = z.infer<typeof CloudSchema>;
export type EndpointsConfig = z.infer<typeof EndpointsSchema>;
export type ThresholdsConfig = z.infer<typeof ThresholdsSchema>;
export type SessionsConfig = z.infer<typeof SessionsSchema>;
export type LoggingConfig = z.infer<typeof LoggingSchema>;
