import { setTimeout as delay } from "node:timers/promises";

import { abortError } from "./abort.js";

export type BackoffWindow = {
  minDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the base delay added or removed at random, 0..1. */
  jitter: number;
};

/**
 * Delay before retry `attempt` (1-based): `minDelayMs * 2^(attempt-1)` spread by ±jitter,
 * then capped at `maxDelayMs`.
 */
export function computeRetryDelay(window: BackoffWindow, attempt: number, random = Math.random): number {
  const base = window.minDelayMs * 2 ** Math.max(attempt - 1, 0);
  const spread = base * window.jitter * (random() * 2 - 1);
  return Math.max(0, Math.min(window.maxDelayMs, Math.round(base + spread)));
}

/** Rejects with an AbortError as soon as `signal` fires. */
export async function sleepWithAbort(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) throw abortError(signal);
  if (ms <= 0) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) throw abortError(signal);
    throw err;
  }
}
