import { abortError, raceWithAbort } from "./abort.js";

export type Release = () => void;

export type AcquireOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

export class LockTimeoutError extends Error {
  readonly key: string;

  constructor(key: string, timeoutMs: number) {
    super(`lock wait for ${key} exceeded ${timeoutMs}ms`);
    this.name = "LockTimeoutError";
    this.key = key;
  }
}

type Waiter = {
  grant: () => void;
};

type Slot = {
  active: number;
  waiters: Waiter[];
};

/**
 * Counting semaphore per key. Holders of one key never delay another key;
 * waiters on a key are served in arrival order.
 */
export class KeyedSemaphore {
  private readonly slots = new Map<string, Slot>();

  constructor(private readonly limit = 1) {}

  acquire(key: string, opts: AcquireOptions = {}): Promise<Release> {
    if (opts.signal?.aborted) return Promise.reject(abortError(opts.signal));
    const slot = this.slots.get(key) ?? { active: 0, waiters: [] };
    this.slots.set(key, slot);
    if (slot.active < Math.max(1, this.limit)) {
      slot.active += 1;
      return Promise.resolve(this.createRelease(key));
    }
    return new Promise<Release>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const cleanup = () => {
        if (timer) clearTimeout(timer);
        opts.signal?.removeEventListener("abort", onAbort);
      };
      const waiter: Waiter = {
        grant: () => {
          cleanup();
          resolve(this.createRelease(key));
        },
      };
      const drop = (err: Error) => {
        const index = slot.waiters.indexOf(waiter);
        if (index >= 0) slot.waiters.splice(index, 1);
        cleanup();
        reject(err);
      };
      const onAbort = () => drop(abortError(opts.signal));
      if (typeof opts.timeoutMs === "number") {
        const timeoutMs = opts.timeoutMs;
        timer = setTimeout(() => drop(new LockTimeoutError(key, timeoutMs)), timeoutMs);
      }
      opts.signal?.addEventListener("abort", onAbort, { once: true });
      slot.waiters.push(waiter);
    });
  }

  /** Resolves to null instead of throwing when the wait times out. */
  async tryAcquire(key: string, timeoutMs: number): Promise<Release | null> {
    try {
      return await this.acquire(key, { timeoutMs });
    } catch (err) {
      if (err instanceof LockTimeoutError) return null;
      throw err;
    }
  }

  async run<T>(key: string, fn: () => Promise<T>, opts?: AcquireOptions): Promise<T> {
    const release = await this.acquire(key, opts);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return (this.slots.get(key)?.active ?? 0) > 0;
  }

  private createRelease(key: string): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const slot = this.slots.get(key);
      if (!slot) return;
      const next = slot.waiters.shift();
      if (next) {
        // The slot passes straight to the next waiter.
        next.grant();
        return;
      }
      slot.active -= 1;
      if (slot.active <= 0) this.slots.delete(key);
    };
  }
}

export class KeyedMutex extends KeyedSemaphore {
  constructor() {
    super(1);
  }
}

type Flight<T> = {
  promise: Promise<T>;
  controller: AbortController;
  /** Joined callers whose signal has not fired yet; callers without a signal never leave. */
  live: number;
};

/**
 * Collapses concurrent calls for the same key onto one in-flight run. The run gets its own
 * signal, which fires only after every caller that joined it has aborted.
 */
export class SingleFlight<T> {
  private readonly inflight = new Map<string, Flight<T>>();

  run(key: string, fn: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) return Promise.reject(abortError(signal));
    let flight = this.inflight.get(key);
    if (!flight || flight.controller.signal.aborted) {
      const controller = new AbortController();
      const promise: Promise<T> = Promise.resolve()
        .then(() => fn(controller.signal))
        .finally(() => {
          if (this.inflight.get(key)?.promise === promise) this.inflight.delete(key);
        });
      flight = { promise, controller, live: 0 };
      this.inflight.set(key, flight);
    }
    return this.join(flight, signal);
  }

  has(key: string): boolean {
    return this.inflight.has(key);
  }

  get size(): number {
    return this.inflight.size;
  }

  private async join(flight: Flight<T>, signal?: AbortSignal): Promise<T> {
    flight.live += 1;
    if (!signal) return flight.promise;
    const leave = () => {
      flight.live -= 1;
      if (flight.live === 0) flight.controller.abort(signal.reason);
    };
    signal.addEventListener("abort", leave, { once: true });
    try {
      return await raceWithAbort(flight.promise, signal);
    } finally {
      signal.removeEventListener("abort", leave);
    }
  }
}
