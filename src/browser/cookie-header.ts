import type { BrowserId } from "../config/types.js";
import { CookieStoreError, DecryptionError, formatErrorMessage, toErrorKind } from "../infra/errors.js";
import { throwIfAborted } from "../infra/abort.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { decryptCookieValue, hasVersionPrefix } from "./cookie-crypto.js";
import type { CookieKeyProvider } from "./cookie-keys.js";
import type { CookieStoreReader, RawCookie } from "./cookie-store.js";
import {
  type BrowserProfile,
  discoverBrowserProfiles,
  formatProfileLabel,
  type ProfileDiscoveryOptions,
} from "./profiles.js";

const log = createSubsystemLogger("browser/cookies");

export type CookiePair = { name: string; value: string };

export type DecryptedCookie = CookiePair & {
  hostKey: string;
  expiresAt?: number;
  lastAccessedAt?: number;
  sourceLabel: string;
};

/** Later expiry wins; when either expiry is missing or they tie, the later access wins. */
function supersedes(candidate: DecryptedCookie, current: DecryptedCookie): boolean {
  if (
    candidate.expiresAt !== undefined &&
    current.expiresAt !== undefined &&
    candidate.expiresAt !== current.expiresAt
  ) {
    return candidate.expiresAt > current.expiresAt;
  }
  return (candidate.lastAccessedAt ?? 0) > (current.lastAccessedAt ?? 0);
}

/**
 * Collapses cookies from several stores into one list. Names are case-sensitive and
 * keep the position of their first appearance. Expired cookies are dropped.
 */
export function mergeCookies(cookies: readonly DecryptedCookie[], now = Date.now()): DecryptedCookie[] {
  const order: string[] = [];
  const byName = new Map<string, DecryptedCookie>();
  for (const cookie of cookies) {
    if (cookie.expiresAt !== undefined && cookie.expiresAt <= now) continue;
    const existing = byName.get(cookie.name);
    if (!existing) {
      order.push(cookie.name);
      byName.set(cookie.name, cookie);
    } else if (supersedes(cookie, existing)) {
      byName.set(cookie.name, cookie);
    }
  }
  const merged: DecryptedCookie[] = [];
  for (const name of order) {
    const cookie = byName.get(name);
    if (cookie) merged.push(cookie);
  }
  return merged;
}

export function serializeCookiePairs(pairs: readonly CookiePair[]): string {
  return pairs.map((pair) => `${pair.name}=${pair.value}`).join("; ");
}

export function parseCookieHeader(header: string): CookiePair[] {
  const pairs: CookiePair[] = [];
  for (const part of header.split(";")) {
    const trimmed = part.trim();
    const eq = trimmed.indexOf("=");
    if (eq <= 0) continue;
    pairs.push({ name: trimmed.slice(0, eq).trim(), value: trimmed.slice(eq + 1).trim() });
  }
  return pairs;
}

/**
 * Normalizes a pasted cookie credential: strips a `Cookie:` prefix, drops empty parts,
 * collapses duplicate names (last value wins, first position kept) and turns a bare
 * value into `<cookieName>=<value>` when the provider names its session cookie.
 */
export function normalizeManualCookieHeader(raw: string, opts: { cookieName?: string } = {}): string {
  let text = raw.trim().replace(/^cookie\s*:\s*/i, "").trim();
  if (!text) return "";
  if (opts.cookieName && !text.includes("=") && !text.includes(";")) {
    text = `${opts.cookieName}=${text}`;
  }
  const order: string[] = [];
  const values = new Map<string, string>();
  for (const pair of parseCookieHeader(text)) {
    if (!values.has(pair.name)) order.push(pair.name);
    values.set(pair.name, pair.value);
  }
  return order.map((name) => `${name}=${values.get(name) ?? ""}`).join("; ");
}

export function formatCookieRequestHeader(header: string): string {
  return `Cookie: ${header}`;
}

export type CookieExtraction = {
  header: string;
  sourceLabel: string;
  cookieCount: number;
};

export type CookieExtractorOptions = {
  reader: CookieStoreReader;
  keys: CookieKeyProvider;
  browsers: readonly BrowserId[];
  discovery?: ProfileDiscoveryOptions;
  /** Replaces profile discovery; used by tests and explicit profile pins. */
  profiles?: (browser: BrowserId) => BrowserProfile[];
  now?: () => number;
};

async function decryptRaw(
  cookie: RawCookie,
  key: Buffer | null,
  keys: CookieKeyProvider,
): Promise<string> {
  if (cookie.encryptedValue === undefined) return cookie.value ?? "";
  const blob = cookie.encryptedValue;
  if (!hasVersionPrefix(blob) && keys.unprotect) {
    const plain = await keys.unprotect(blob);
    return plain.toString("utf8");
  }
  return decryptCookieValue(blob, {
    scheme: "chromium",
    key,
    hostKey: cookie.hostKey,
    dbVersion: cookie.dbVersion,
  });
}

async function decryptProfileCookies(
  profile: BrowserProfile,
  raw: RawCookie[],
  keys: CookieKeyProvider,
): Promise<DecryptedCookie[]> {
  const sourceLabel = formatProfileLabel(profile);
  let key: Buffer | null = null;
  if (profile.family === "chromium" && raw.some((cookie) => cookie.encryptedValue !== undefined)) {
    try {
      key = await keys.masterKey(profile);
    } catch (err) {
      log.warn(`master key unavailable for ${sourceLabel}`, { error: formatErrorMessage(err) });
    }
  }
  const out: DecryptedCookie[] = [];
  for (const cookie of raw) {
    try {
      const value = await decryptRaw(cookie, key, keys);
      out.push({
        name: cookie.name,
        value,
        hostKey: cookie.hostKey,
        expiresAt: cookie.expiresAt,
        lastAccessedAt: cookie.lastAccessedAt,
        sourceLabel,
      });
    } catch (err) {
      // Names only: values never reach the log.
      log.debug(`skipping cookie ${cookie.name} from ${sourceLabel}`, {
        reason: err instanceof DecryptionError ? err.reason : toErrorKind(err),
      });
    }
  }
  return out;
}

/**
 * Reads every configured browser profile for `domains`, decrypts and merges the values
 * into one header. Throws CookieStoreError when nothing usable was found.
 */
export async function extractCookieHeader(
  domains: readonly string[],
  opts: CookieExtractorOptions,
  signal?: AbortSignal,
): Promise<CookieExtraction> {
  const now = (opts.now ?? Date.now)();
  const collected: DecryptedCookie[] = [];
  let storesRead = 0;
  let lastStoreError: unknown;
  for (const browser of opts.browsers) {
    const profiles = opts.profiles
      ? opts.profiles(browser)
      : discoverBrowserProfiles(browser, opts.discovery);
    for (const profile of profiles) {
      throwIfAborted(signal);
      try {
        const raw = await opts.reader.readCookies({ profile, domains, signal });
        storesRead += 1;
        if (raw.length === 0) continue;
        collected.push(...(await decryptProfileCookies(profile, raw, opts.keys)));
      } catch (err) {
        if (signal?.aborted) throw err;
        lastStoreError = err;
        log.debug(`cookie store skipped: ${formatProfileLabel(profile)}`, {
          error: formatErrorMessage(err),
        });
      }
    }
  }
  throwIfAborted(signal);
  const merged = mergeCookies(collected, now);
  const header = serializeCookiePairs(merged);
  if (!header) {
    const detail = storesRead === 0 && lastStoreError ? `: ${formatErrorMessage(lastStoreError)}` : "";
    throw new CookieStoreError(`no cookies found for ${domains.join(", ")}${detail}`, {
      cause: lastStoreError,
    });
  }
  const sources = [...new Set(merged.map((cookie) => cookie.sourceLabel))];
  return { header, sourceLabel: sources.join(", "), cookieCount: merged.length };
}
