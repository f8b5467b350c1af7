import { ConfigError } from "../infra/errors.js";

/**
 * Config holds env var NAMES for credentials; the values are only ever
 * read from the process environment at the moment they are needed.
 */

const ENV_VAR_NAME_RE = /^[A-Z][A-Z0-9_]{0,127}$/;

export function resolveSecret(envVarName: string): string | undefined {
  if (!ENV_VAR_NAME_RE.test(envVarName)) {
    throw new ConfigError(
      `Invalid env var name: "${envVarName}". Must be uppercase alphanumeric with underscores.`,
    );
  }
  const value = process.env[envVarName]?.trim();
  return value ? value : undefined;
}
