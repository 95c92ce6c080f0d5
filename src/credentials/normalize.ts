import type { CredentialType } from "./types.js";

const BEARER_PREFIX = /^bearer\s+/i;
const COOKIE_PREFIX = /^cookie\s*:/i;
const PATH_LIKE = /^(?:~|\.{1,2})?[\\/]|^[A-Za-z]:[\\/]/;

export function stripBearerPrefix(token: string): string {
  return token.trim().replace(BEARER_PREFIX, "").trim();
}

export function isClaudeOAuthToken(token: string): boolean {
  const stripped = stripBearerPrefix(token);
  if (!stripped || COOKIE_PREFIX.test(stripped) || stripped.includes("=")) return false;
  return stripped.toLowerCase().startsWith("sk-ant-oat");
}

/**
 * Classifies a pasted legacy token. Providers that name a session cookie treat bare
 * values as that cookie; everywhere else a bare value is an API key.
 */
export function inferLegacyCredentialType(
  token: string,
  opts: { cookieName?: string } = {},
): CredentialType {
  const trimmed = token.trim();
  if (BEARER_PREFIX.test(trimmed) || isClaudeOAuthToken(trimmed)) return "oauth";
  if (COOKIE_PREFIX.test(trimmed) || trimmed.includes("=")) return "cookie_header";
  if (PATH_LIKE.test(trimmed)) return "cli_session";
  return opts.cookieName ? "cookie_header" : "api_key";
}

/** Epoch values below 1e12 are seconds (1e12 ms is September 2001). */
export function toEpochMs(value: number): number {
  return value < 1e12 ? Math.round(value * 1000) : value;
}

export function normalizeScope(scope: unknown): string[] | undefined {
  if (Array.isArray(scope)) {
    const list = scope.filter((entry): entry is string => typeof entry === "string" && entry.length > 0);
    return list.length > 0 ? list : undefined;
  }
  if (typeof scope !== "string") return undefined;
  const list = scope.split(/[\s,]+/).filter(Boolean);
  return list.length > 0 ? list : undefined;
}
