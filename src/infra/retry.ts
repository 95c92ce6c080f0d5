import { computeRetryDelay, sleepWithAbort } from "./backoff.js";

export type RetryConfig = {
  attempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitter?: number;
};

export type ResolvedRetryConfig = Required<RetryConfig>;

export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  err: unknown;
  label?: string;
};

export type RetryOptions = RetryConfig & {
  label?: string;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  retryAfterMs?: (err: unknown) => number | undefined;
  onRetry?: (info: RetryInfo) => void;
  signal?: AbortSignal;
};

const DEFAULT_RETRY_CONFIG: ResolvedRetryConfig = {
  attempts: 3,
  minDelayMs: 300,
  maxDelayMs: 30_000,
  jitter: 0,
};

function asFiniteNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function clampNumber(value: unknown, fallback: number, min?: number, max?: number): number {
  const next = asFiniteNumber(value);
  if (next === undefined) return fallback;
  const floor = typeof min === "number" ? min : Number.NEGATIVE_INFINITY;
  const ceiling = typeof max === "number" ? max : Number.POSITIVE_INFINITY;
  return Math.min(Math.max(next, floor), ceiling);
}

export function resolveRetryConfig(
  defaults: ResolvedRetryConfig = DEFAULT_RETRY_CONFIG,
  overrides?: RetryConfig,
): ResolvedRetryConfig {
  const attempts = Math.max(1, Math.round(clampNumber(overrides?.attempts, defaults.attempts, 1)));
  const minDelayMs = Math.max(
    0,
    Math.round(clampNumber(overrides?.minDelayMs, defaults.minDelayMs, 0)),
  );
  const maxDelayMs = Math.max(
    minDelayMs,
    Math.round(clampNumber(overrides?.maxDelayMs, defaults.maxDelayMs, 0)),
  );
  const jitter = clampNumber(overrides?.jitter, defaults.jitter, 0, 1);
  return { attempts, minDelayMs, maxDelayMs, jitter };
}

/**
 * Runs `fn` until it resolves or the attempt budget is spent. A `retryAfterMs` hint
 * replaces the computed delay, clamped into [minDelayMs, maxDelayMs]. Sleeps observe `signal`.
 */
export async function retryAsync<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const resolved = resolveRetryConfig(DEFAULT_RETRY_CONFIG, options);
  const shouldRetry = options.shouldRetry ?? (() => true);
  let lastErr: unknown;
  for (let attempt = 1; attempt <= resolved.attempts; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      lastErr = err;
      if (attempt >= resolved.attempts || !shouldRetry(err, attempt)) break;
      const hinted = options.retryAfterMs?.(err);
      const delayMs =
        typeof hinted === "number" && Number.isFinite(hinted)
          ? Math.min(Math.max(hinted, resolved.minDelayMs), resolved.maxDelayMs)
          : computeRetryDelay(resolved, attempt);
      options.onRetry?.({ attempt, maxAttempts: resolved.attempts, delayMs, err, label: options.label });
      await sleepWithAbort(delayMs, options.signal);
    }
  }
  throw lastErr;
}
