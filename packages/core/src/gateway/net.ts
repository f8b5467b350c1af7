/**
 * Resolve the bind host address for the gateway.
 */
export function resolveBindHost(
  bind: "loopback" | "lan" | "custom",
  customHost?: string,
): string {
  switch (bind) {
    case "loopback":
      return "127.0.0.1";
    case "lan":
      return "0.0.0.0";
    case "custom":
      return customHost?.trim() || "0.0.0.0";
  }
}

/**
 * `Access-Control-Allow-Origin` value for a request, or undefined when the
 * origin is not allowed. A `*` entry allows every origin.
 */
export function resolveAllowedOrigin(
  origin: string | undefined,
  allowedOrigins: readonly string[],
): string | undefined {
  if (allowedOrigins.includes("*")) return "*";
  if (!origin) return undefined;
  return allowedOrigins.includes(origin) ? origin : undefined;
}
