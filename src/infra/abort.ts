import { AbortError } from "./errors.js";

export type TimeoutOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
  onTimeout: () => Error;
};

/** The error an aborted operation rejects with; the signal's reason rides along as `cause`. */
export function abortError(signal?: AbortSignal): AbortError {
  return new AbortError("aborted", { cause: signal?.reason });
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw abortError(signal);
}

/**
 * Runs `work` with its own AbortSignal. The signal fires when the timeout elapses or the
 * parent signal aborts; the returned promise rejects at that moment even if `work` ignores it.
 */
export async function runWithTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  opts: TimeoutOptions,
): Promise<T> {
  throwIfAborted(opts.signal);
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;
  const interrupted = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => {
        const err = opts.onTimeout();
        controller.abort(err);
        reject(err);
      },
      Math.max(0, opts.timeoutMs),
    );
    onParentAbort = () => {
      const err = abortError(opts.signal);
      controller.abort(err);
      reject(err);
    };
    opts.signal?.addEventListener("abort", onParentAbort, { once: true });
  });
  try {
    return await Promise.race([work(controller.signal), interrupted]);
  } finally {
    if (timer) clearTimeout(timer);
    if (onParentAbort) opts.signal?.removeEventListener("abort", onParentAbort);
  }
}

/** Settles with `promise`, or rejects as soon as `signal` aborts. `promise` keeps running. */
export async function raceWithAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  throwIfAborted(signal);
  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(abortError(signal));
    signal.addEventListener("abort", onAbort, { once: true });
  });
  try {
    return await Promise.race([promise, aborted]);
  } finally {
    if (onAbort) signal.removeEventListener("abort", onAbort);
  }
}
