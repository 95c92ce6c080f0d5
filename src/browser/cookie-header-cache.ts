import { z } from "zod";

import { DEFAULT_COOKIE_STALENESS_MS } from "../config/defaults.js";
import { CookieStoreError, formatErrorMessage } from "../infra/errors.js";
import { isRecord, loadJsonFile, saveJsonFile } from "../infra/json-file.js";
import { KeyedMutex } from "../infra/keyed-lock.js";
import { throwIfAborted } from "../infra/abort.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { normalizeCookieDomain } from "./cookie-store.js";

const log = createSubsystemLogger("browser/cookie-cache");

const CACHE_FILE_VERSION = 1;

export type CookieHeaderEntry = {
  header: string;
  extractedAt: number;
  staleAfterMs: number;
  sourceLabel: string;
};

export type CookieCacheTarget = {
  provider: string;
  account: string;
  domain: string;
};

export type CookieHeaderRefresher = (
  target: CookieCacheTarget,
  signal?: AbortSignal,
) => Promise<{ header: string; sourceLabel: string }>;

export type CookieHeaderCacheOptions = {
  refresh: CookieHeaderRefresher;
  stalenessMs?: number;
  now?: () => number;
  /** Persists the table here (0600) when set. */
  cachePath?: string;
};

export type GetOrRefreshOptions = {
  signal?: AbortSignal;
  /** Skip the freshness check. */
  force?: boolean;
};

const CookieHeaderEntrySchema = z.object({
  header: z.string().min(1),
  extractedAt: z.number(),
  staleAfterMs: z.number().nonnegative(),
  sourceLabel: z.string(),
});

function cacheKey(provider: string, account: string, domain: string): string {
  return `${provider}|${account}|${normalizeCookieDomain(domain)}`;
}

function accountPrefix(provider: string, account: string): string {
  return `${provider}|${account}|`;
}

/**
 * Cookie headers per (provider, account, domain). Entries inside their staleness window
 * are served without I/O; misses for one key share a single refresh and never wait on
 * another key.
 */
export class CookieHeaderCache {
  private readonly entries = new Map<string, CookieHeaderEntry>();
  private readonly locks = new KeyedMutex();
  private readonly refresh: CookieHeaderRefresher;
  private readonly stalenessMs: number;
  private readonly now: () => number;
  private readonly cachePath?: string;
  private dirty = false;

  constructor(opts: CookieHeaderCacheOptions) {
    this.refresh = opts.refresh;
    this.stalenessMs = opts.stalenessMs ?? DEFAULT_COOKIE_STALENESS_MS;
    this.now = opts.now ?? Date.now;
    this.cachePath = opts.cachePath;
    if (this.cachePath) this.load(this.cachePath);
  }

  isFresh(entry: CookieHeaderEntry): boolean {
    const age = this.now() - entry.extractedAt;
    return age >= 0 && age < entry.staleAfterMs;
  }

  peek(provider: string, account: string, domain: string): CookieHeaderEntry | undefined {
    return this.entries.get(cacheKey(provider, account, domain));
  }

  async getOrRefresh(
    provider: string,
    account: string,
    domain: string,
    opts: GetOrRefreshOptions = {},
  ): Promise<CookieHeaderEntry> {
    const key = cacheKey(provider, account, domain);
    const cached = this.entries.get(key);
    if (!opts.force && cached && this.isFresh(cached)) return cached;

    const release = await this.locks.acquire(key, { signal: opts.signal });
    try {
      // A concurrent miss may have refreshed while this caller waited.
      const current = this.entries.get(key);
      if (!opts.force && current && this.isFresh(current)) return current;
      if (opts.force && current && current !== cached && this.isFresh(current)) return current;

      throwIfAborted(opts.signal);
      const startedAt = this.now();
      const result = await this.refresh({ provider, account, domain }, opts.signal);
      throwIfAborted(opts.signal);
      if (!result.header) {
        throw new CookieStoreError(`no cookies found for ${domain}`);
      }
      const entry: CookieHeaderEntry = {
        header: result.header,
        extractedAt: startedAt,
        staleAfterMs: this.stalenessMs,
        sourceLabel: result.sourceLabel,
      };
      return this.commit(key, entry);
    } finally {
      release();
    }
  }

  /** Stores an entry unless a newer extraction is already present. */
  set(provider: string, account: string, domain: string, entry: CookieHeaderEntry): CookieHeaderEntry {
    return this.commit(cacheKey(provider, account, domain), entry);
  }

  /** Drops one domain, or every domain of the account when `domain` is omitted. */
  invalidate(provider: string, account: string, domain?: string): number {
    let removed = 0;
    if (domain !== undefined) {
      if (this.entries.delete(cacheKey(provider, account, domain))) removed += 1;
    } else {
      const prefix = accountPrefix(provider, account);
      for (const key of [...this.entries.keys()]) {
        if (key.startsWith(prefix) && this.entries.delete(key)) removed += 1;
      }
    }
    if (removed > 0) {
      log.debug("cookie cache invalidated", { provider, account, domain, removed });
      this.markDirty();
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Writes pending changes to `cachePath`. */
  flush(): void {
    if (!this.cachePath || !this.dirty) return;
    const entries: Record<string, CookieHeaderEntry> = {};
    for (const [key, entry] of this.entries) entries[key] = entry;
    saveJsonFile(this.cachePath, { version: CACHE_FILE_VERSION, entries });
    this.dirty = false;
  }

  private commit(key: string, entry: CookieHeaderEntry): CookieHeaderEntry {
    const existing = this.entries.get(key);
    if (existing && existing.extractedAt > entry.extractedAt) return existing;
    this.entries.set(key, entry);
    this.markDirty();
    return entry;
  }

  private markDirty(): void {
    this.dirty = true;
    if (!this.cachePath) return;
    try {
      this.flush();
    } catch (err) {
      log.warn("failed to persist cookie cache", { error: formatErrorMessage(err) });
    }
  }

  private load(cachePath: string): void {
    const raw = loadJsonFile(cachePath);
    if (!isRecord(raw) || raw.version !== CACHE_FILE_VERSION || !isRecord(raw.entries)) return;
    for (const [key, value] of Object.entries(raw.entries)) {
      const parsed = CookieHeaderEntrySchema.safeParse(value);
      if (parsed.success) this.entries.set(key, parsed.data);
    }
  }
}
