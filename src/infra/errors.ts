export type DecryptionFailure = "key_unavailable" | "ciphertext_malformed" | "authentication_tag_mismatch";

export type FetchErrorKind =
  | "network"
  | "rate_limited"
  | "auth_expired"
  | "not_installed"
  | "parse"
  | "timeout"
  | "cancelled";

export type ErrorKind =
  | DecryptionFailure
  | FetchErrorKind
  | "store_unavailable"
  | "migration_failed"
  | "invalid_config";

type ErrorOptions = { cause?: unknown };

export class UsagebarError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UsagebarError";
    this.kind = kind;
  }
}

export class DecryptionError extends UsagebarError {
  readonly reason: DecryptionFailure;

  constructor(reason: DecryptionFailure, message: string, options?: ErrorOptions) {
    super(reason, message, options);
    this.name = "DecryptionError";
    this.reason = reason;
  }
}

export class CookieStoreError extends UsagebarError {
  readonly storePath?: string;

  constructor(message: string, options?: ErrorOptions & { storePath?: string }) {
    super("store_unavailable", message, options);
    this.name = "CookieStoreError";
    this.storePath = options?.storePath;
  }
}

export class MigrationError extends UsagebarError {
  readonly fromVersion: number;
  readonly toVersion: number;

  constructor(
    message: string,
    options: ErrorOptions & { fromVersion: number; toVersion: number },
  ) {
    super("migration_failed", message, options);
    this.name = "MigrationError";
    this.fromVersion = options.fromVersion;
    this.toVersion = options.toVersion;
  }
}

export class UsageFetchError extends UsagebarError {
  readonly retryAfterMs?: number;
  readonly status?: number;

  constructor(
    kind: FetchErrorKind,
    message: string,
    options?: ErrorOptions & { retryAfterMs?: number; status?: number },
  ) {
    super(kind, message, options);
    this.name = "UsageFetchError";
    this.retryAfterMs = options?.retryAfterMs;
    this.status = options?.status;
  }
}

/** Thrown when an AbortSignal fires; `cause` carries the signal's reason. */
export class AbortError extends Error {
  constructor(message = "aborted", options?: ErrorOptions) {
    super(message, options);
    this.name = "AbortError";
  }
}

export class ConfigValidationError extends UsagebarError {
  readonly code = "INVALID_CONFIG";
  readonly details: string;

  constructor(configPath: string, details: string) {
    super("invalid_config", `Invalid config at ${configPath}:\n${details}`);
    this.name = "ConfigValidationError";
    this.details = details;
  }
}

export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object" || !("code" in err)) return undefined;
  const code = err.code;
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

export function isAbortError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err instanceof AbortError) return true;
  if (err instanceof UsagebarError) return err.kind === "cancelled";
  return err.name === "AbortError" || err.message === "aborted";
}

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

/** Maps any thrown value onto the error taxonomy. Unknown failures count as network errors. */
export function toErrorKind(err: unknown): ErrorKind {
  if (err instanceof UsagebarError) return err.kind;
  if (isAbortError(err)) return "cancelled";
  if (err instanceof SyntaxError) return "parse";
  const code = extractErrorCode(err);
  if (code === "ENOENT") return "not_installed";
  if (code && NETWORK_ERROR_CODES.has(code)) return "network";
  if (err instanceof Error && err.cause !== undefined && err.cause !== err) {
    const nested = extractErrorCode(err.cause);
    if (nested && NETWORK_ERROR_CODES.has(nested)) return "network";
  }
  return "network";
}

export function isTransientErrorKind(kind: ErrorKind): boolean {
  return kind === "network" || kind === "rate_limited";
}

/**
 * How much an error tells the user. Higher ranks win when a plan reports its final failure;
 * "could not find a browser" says less than "your session expired".
 */
export function errorKindRank(kind: ErrorKind): number {
  switch (kind) {
    case "auth_expired":
    case "parse":
    case "rate_limited":
    case "key_unavailable":
    case "ciphertext_malformed":
    case "authentication_tag_mismatch":
    case "migration_failed":
    case "invalid_config":
      return 3;
    case "network":
    case "timeout":
      return 2;
    case "store_unavailable":
    case "not_installed":
      return 1;
    case "cancelled":
      return 0;
  }
}

export function retryAfterMsOf(err: unknown): number | undefined {
  return err instanceof UsageFetchError ? err.retryAfterMs : undefined;
}

export function assertNever(value: never, label = "value"): never {
  throw new Error(`Unhandled ${label}: ${JSON.stringify(value)}`);
}
