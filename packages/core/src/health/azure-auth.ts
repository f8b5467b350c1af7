import { z } from "zod";
import type { CloudConfig } from "../config/types.js";
import { resolveSecret } from "../config/secrets.js";
import { fetchWithTimeout, readJsonSafe } from "../infra/http.js";

const MANAGEMENT_SCOPE = "https://management.azure.com/.default";
const EXPIRY_SKEW_MS = 60_000;

export interface AccessTokenProvider {
  getToken(): Promise<string>;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive().default(3600),
});

const TokenErrorSchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional(),
});

interface CachedToken {
  accessToken: string;
  expiresAt: number;
}

/**
 * OAuth2 client-credentials flow against the Microsoft identity platform.
 * The token is cached until shortly before it expires.
 */
export class ClientCredentialsTokenProvider implements AccessTokenProvider {
  private cached: CachedToken | null = null;

  constructor(
    private readonly config: CloudConfig,
    private readonly now: () => number = Date.now,
  ) {}

  async getToken(): Promise<string> {
    if (this.cached && this.now() < this.cached.expiresAt - EXPIRY_SKEW_MS) {
      return this.cached.accessToken;
    }

    const tenantId = resolveSecret(this.config.tenantIdEnvVar);
    const clientId = resolveSecret(this.config.clientIdEnvVar);
    const clientSecret = resolveSecret(this.config.clientSecretEnvVar);
    if (!tenantId || !clientId || !clientSecret) {
      throw new Error(
        `credentials missing: set ${this.config.tenantIdEnvVar}, ` +
          `${this.config.clientIdEnvVar} and ${this.config.clientSecretEnvVar}`,
      );
    }

    const response = await fetchWithTimeout(
      `${this.config.authorityBaseUrl}/${encodeURIComponent(tenantId)}/oauth2/v2.0/token`,
      {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({
          grant_type: "client_credentials",
          client_id: clientId,
          client_secret: clientSecret,
          scope: MANAGEMENT_SCOPE,
        }),
      },
      this.config.timeoutMs,
    );

    const data = await readJsonSafe(response);
    if (!response.ok) {
      const parsed = TokenErrorSchema.safeParse(data);
      const detail = parsed.success
        ? (parsed.data.error_description ?? parsed.data.error)
        : undefined;
      throw new Error(`token request failed (${response.status})${detail ? `: ${detail}` : ""}`);
    }

    const parsed = TokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error("token response did not contain an access_token");
    }

    this.cached = {
      accessToken: parsed.data.access_token,
      expiresAt: this.now() + parsed.data.expires_in * 1000,
    };
    return this.cached.accessToken;
  }
}
