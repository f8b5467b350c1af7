import { randomBytes } from "node:crypto";

/**
 * Nonce-based Content Security Policy for the dashboard page and API
 * responses. No inline script or style runs without the per-request nonce.
 */

export function generateCspNonce(): string {
  return randomBytes(16).toString("base64");
}

/**
 * The dashboard only talks to its own origin, so `connect-src` stays at
 * `'self'`.
 */
export function buildCspHeader(nonce: string): string {
  return [
    "default-src 'self'",
    "base-uri 'none'",
    "object-src 'none'",
    "frame-ancestors 'none'",
    `script-src 'self' 'nonce-${nonce}'`,
    `style-src 'self' 'nonce-${nonce}'`,
    "img-src 'self' data:",
    "font-src 'self'",
    "connect-src 'self'",
  ].join("; ");
}
