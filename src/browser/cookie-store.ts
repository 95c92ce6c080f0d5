import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import initSqlJs from "sql.js";
import type { Database, ParamsObject, SqlJsStatic, SqlValue } from "sql.js";
import { z } from "zod";

import type { BrowserId } from "../config/types.js";
import { AbortError, CookieStoreError, extractErrorCode, formatErrorMessage } from "../infra/errors.js";
import { KeyedSemaphore } from "../infra/keyed-lock.js";
import { type ResolvedRetryConfig, retryAsync } from "../infra/retry.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { DEFAULT_COOKIE_LOCK_RETRY, DEFAULT_STORE_MAX_CONCURRENT } from "../config/defaults.js";
import type { BrowserProfile } from "./profiles.js";

const log = createSubsystemLogger("browser/cookies");

/** Microseconds between 1601-01-01 (Windows FILETIME epoch) and the Unix epoch. */
const CHROMIUM_EPOCH_OFFSET_MICROS = 11_644_473_600_000_000;

// A browser holding its store open shows up as a sharing violation on read.
const LOCK_ERROR_CODES = new Set(["EBUSY", "EPERM", "EACCES"]);

export type RawCookie = {
  name: string;
  /** Plaintext value (Firefox, or Chromium rows that were never encrypted). */
  value?: string;
  /** Encrypted Chromium value; decrypt with the profile's master key. */
  encryptedValue?: Buffer;
  hostKey: string;
  path: string;
  /** ms epoch; absent for session cookies. */
  expiresAt?: number;
  lastAccessedAt?: number;
  isSecure: boolean;
  isHttpOnly: boolean;
  browser: BrowserId;
  profile: string;
  dbVersion: number;
};

export type ReadCookiesParams = {
  profile: BrowserProfile;
  domains: readonly string[];
  signal?: AbortSignal;
};

export type CookieStoreReaderOptions = {
  maxConcurrentPerStore?: number;
  lockRetry?: ResolvedRetryConfig;
  /** Directory for lock-fallback copies; defaults to the OS temp dir. */
  tempDir?: string;
  readFile?: (filePath: string) => Buffer;
};

const ChromiumRowSchema = z.object({
  name: z.string(),
  value: z.string().nullable(),
  // The column defaults to '' (TEXT) on rows that were never encrypted.
  encrypted_value: z.union([z.instanceof(Uint8Array), z.string()]).nullable(),
  host_key: z.string(),
  path: z.string(),
  expires_utc: z.number(),
  last_access_utc: z.number().nullable(),
  is_secure: z.number(),
  is_httponly: z.number(),
});

const FirefoxRowSchema = z.object({
  name: z.string(),
  value: z.string(),
  host: z.string(),
  path: z.string(),
  expiry: z.number().nullable(),
  lastAccessed: z.number().nullable(),
  isSecure: z.number(),
  isHttpOnly: z.number(),
});

const MetaRowSchema = z.object({ value: z.union([z.string(), z.number()]) });

export function chromiumTimeToMs(micros: number | null | undefined): number | undefined {
  if (!micros || micros <= 0) return undefined;
  return Math.round((micros - CHROMIUM_EPOCH_OFFSET_MICROS) / 1000);
}

/** Firefox stores expiry in seconds (ms since 2023 builds) and lastAccessed in µs. */
function firefoxExpiryToMs(expiry: number | null): number | undefined {
  if (!expiry || expiry <= 0) return undefined;
  return expiry > 1e12 ? expiry : expiry * 1000;
}

export function normalizeCookieDomain(domain: string): string {
  return domain.trim().replace(/^\.+/, "").toLowerCase();
}

/** `example.com` matches `example.com`, `.example.com` and every subdomain. */
export function hostMatchesDomain(host: string, domain: string): boolean {
  const normalizedHost = normalizeCookieDomain(host);
  const normalizedDomain = normalizeCookieDomain(domain);
  if (!normalizedDomain) return false;
  return normalizedHost === normalizedDomain || normalizedHost.endsWith(`.${normalizedDomain}`);
}

// LIKE narrows the scan; hostMatchesDomain drops lookalikes such as `notexample.com`.
function domainPatterns(domains: readonly string[]): string[] {
  const out = new Set<string>();
  for (const domain of domains) {
    const normalized = normalizeCookieDomain(domain);
    if (normalized) out.add(`%${normalized}`);
  }
  return [...out];
}

export function isLockError(err: unknown): boolean {
  const code = extractErrorCode(err);
  return Boolean(code && LOCK_ERROR_CODES.has(code));
}

let sqlRuntime: Promise<SqlJsStatic> | undefined;

function loadSqlRuntime(): Promise<SqlJsStatic> {
  // Under NodeNext the default import of this CommonJS package is module.exports.
  sqlRuntime ??= initSqlJs.default().catch((err: unknown) => {
    sqlRuntime = undefined;
    throw err;
  });
  return sqlRuntime;
}

/**
 * The in-memory image has no WAL beside it, so a WAL-mode header (format bytes 18/19
 * set to 2) is rewritten to rollback-journal mode before opening.
 */
function toRollbackJournalImage(bytes: Buffer): Uint8Array {
  const image = new Uint8Array(bytes);
  if (image.length >= 20 && image[18] === 2 && image[19] === 2) {
    image[18] = 1;
    image[19] = 1;
  }
  return image;
}

function selectRows(db: Database, sql: string, params: SqlValue[] = []): ParamsObject[] {
  const statement = db.prepare(sql, params);
  try {
    const rows: ParamsObject[] = [];
    while (statement.step()) rows.push(statement.getAsObject());
    return rows;
  } finally {
    statement.free();
  }
}

function hasTable(db: Database, table: string): boolean {
  return selectRows(db, "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?", [table]).length > 0;
}

function readChromiumMetaVersion(db: Database): number {
  if (!hasTable(db, "meta")) return 0;
  const [row] = selectRows(db, "SELECT value FROM meta WHERE key = 'version'");
  const parsed = MetaRowSchema.safeParse(row);
  if (!parsed.success) return 0;
  const version = Number(parsed.data.value);
  return Number.isFinite(version) ? version : 0;
}

function queryChromium(
  db: Database,
  profile: BrowserProfile,
  domains: readonly string[],
): RawCookie[] {
  const patterns = domainPatterns(domains);
  if (patterns.length === 0) return [];
  const dbVersion = readChromiumMetaVersion(db);
  const where = patterns.map(() => "host_key LIKE ?").join(" OR ");
  const rows = selectRows(
    db,
    `SELECT name, value, encrypted_value, host_key, path, expires_utc, last_access_utc,\n` +
      `       is_secure, is_httponly\n` +
      `  FROM cookies\n` +
      ` WHERE ${where}`,
    patterns,
  );
  const cookies: RawCookie[] = [];
  for (const raw of rows) {
    const parsed = ChromiumRowSchema.safeParse(raw);
    if (!parsed.success) continue;
    const row = parsed.data;
    if (!domains.some((domain) => hostMatchesDomain(row.host_key, domain))) continue;
    const blob = row.encrypted_value;
    const encrypted = blob instanceof Uint8Array && blob.length > 0 ? Buffer.from(blob) : undefined;
    cookies.push({
      name: row.name,
      value: encrypted ? undefined : (row.value ?? ""),
      encryptedValue: encrypted,
      hostKey: row.host_key,
      path: row.path,
      expiresAt: chromiumTimeToMs(row.expires_utc),
      lastAccessedAt: chromiumTimeToMs(row.last_access_utc),
      isSecure: row.is_secure !== 0,
      isHttpOnly: row.is_httponly !== 0,
      browser: profile.browser,
      profile: profile.name,
      dbVersion,
    });
  }
  return cookies;
}

function queryFirefox(
  db: Database,
  profile: BrowserProfile,
  domains: readonly string[],
): RawCookie[] {
  const patterns = domainPatterns(domains);
  if (patterns.length === 0) return [];
  const where = patterns.map(() => "host LIKE ?").join(" OR ");
  const rows = selectRows(
    db,
    `SELECT name, value, host, path, expiry, lastAccessed, isSecure, isHttpOnly\n` +
      `  FROM moz_cookies\n` +
      ` WHERE ${where}`,
    patterns,
  );
  const cookies: RawCookie[] = [];
  for (const raw of rows) {
    const parsed = FirefoxRowSchema.safeParse(raw);
    if (!parsed.success) continue;
    const row = parsed.data;
    if (!domains.some((domain) => hostMatchesDomain(row.host, domain))) continue;
    cookies.push({
      name: row.name,
      value: row.value,
      hostKey: row.host,
      path: row.path,
      expiresAt: firefoxExpiryToMs(row.expiry),
      lastAccessedAt: row.lastAccessed ? Math.round(row.lastAccessed / 1000) : undefined,
      isSecure: row.isSecure !== 0,
      isHttpOnly: row.isHttpOnly !== 0,
      browser: profile.browser,
      profile: profile.name,
      dbVersion: 0,
    });
  }
  return cookies;
}

/** Opens an in-memory image of the store; the file on disk is only ever read. */
function queryImage(
  SQL: SqlJsStatic,
  bytes: Buffer,
  profile: BrowserProfile,
  domains: readonly string[],
): RawCookie[] {
  const db = new SQL.Database(toRollbackJournalImage(bytes));
  try {
    return profile.family === "firefox"
      ? queryFirefox(db, profile, domains)
      : queryChromium(db, profile, domains);
  } finally {
    db.close();
  }
}

/**
 * Reads cookies from browser SQLite stores through sql.js images of the files, so a store
 * is never written. Access to one store file is serialized; a store the browser holds
 * locked is retried, then read from a temp copy.
 */
export class CookieStoreReader {
  private readonly queue: KeyedSemaphore;
  private readonly lockRetry: ResolvedRetryConfig;
  private readonly tempDir: string;
  private readonly readFile: (filePath: string) => Buffer;

  constructor(opts: CookieStoreReaderOptions = {}) {
    this.queue = new KeyedSemaphore(opts.maxConcurrentPerStore ?? DEFAULT_STORE_MAX_CONCURRENT);
    this.lockRetry = opts.lockRetry ?? DEFAULT_COOKIE_LOCK_RETRY;
    this.tempDir = opts.tempDir ?? os.tmpdir();
    this.readFile = opts.readFile ?? ((filePath) => fs.readFileSync(filePath));
  }

  async readCookies(params: ReadCookiesParams): Promise<RawCookie[]> {
    const { profile, domains, signal } = params;
    if (!fs.existsSync(profile.cookieDbPath)) {
      throw new CookieStoreError(`cookie store not found for ${profile.browser} (${profile.name})`, {
        storePath: profile.cookieDbPath,
      });
    }
    let SQL: SqlJsStatic;
    try {
      SQL = await loadSqlRuntime();
    } catch (err) {
      throw this.wrap(err, profile);
    }
    return await this.queue.run(
      profile.cookieDbPath,
      async () => {
        let bytes: Buffer;
        try {
          bytes = await retryAsync(async () => this.readFile(profile.cookieDbPath), {
            ...this.lockRetry,
            label: `cookies:${profile.browser}`,
            shouldRetry: (err) => isLockError(err),
            signal,
            onRetry: (info) =>
              log.debug("cookie store locked; retrying", {
                browser: profile.browser,
                profile: profile.name,
                attempt: info.attempt,
                delayMs: info.delayMs,
              }),
          });
        } catch (err) {
          if (isLockError(err)) {
            log.debug("cookie store still locked; reading a temp copy", {
              browser: profile.browser,
              profile: profile.name,
            });
            bytes = this.readCopy(profile);
          } else {
            throw this.wrap(err, profile);
          }
        }
        try {
          return queryImage(SQL, bytes, profile, domains);
        } catch (err) {
          throw this.wrap(err, profile);
        }
      },
      { signal },
    );
  }

  /** Copies the store into a private temp dir and reads the copy. */
  private readCopy(profile: BrowserProfile): Buffer {
    let dir: string | undefined;
    try {
      dir = fs.mkdtempSync(path.join(this.tempDir, "usagebar-cookies-"));
      const copy = path.join(dir, path.basename(profile.cookieDbPath));
      fs.copyFileSync(profile.cookieDbPath, copy);
      return this.readFile(copy);
    } catch (err) {
      throw this.wrap(err, profile);
    } finally {
      if (dir) fs.rmSync(dir, { recursive: true, force: true });
    }
  }

  private wrap(err: unknown, profile: BrowserProfile): Error {
    if (err instanceof CookieStoreError) return err;
    if (err instanceof AbortError) return err;
    return new CookieStoreError(
      `cannot read ${profile.browser} cookies (${profile.name}): ${formatErrorMessage(err)}`,
      { cause: err, storePath: profile.cookieDbPath },
    );
  }
}
