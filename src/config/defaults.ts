import os from "node:os";
import path from "node:path";

import { type ResolvedRetryConfig, resolveRetryConfig } from "../infra/retry.js";
import { resolveCacheDir, resolveStateDir, resolveUserPath } from "./paths.js";
import type { BrowserId, StrategyKind, UsagebarConfig } from "./types.js";

/** Cookie headers older than this are re-extracted before use. */
export const DEFAULT_COOKIE_STALENESS_MS = 5 * 60_000;
export const DEFAULT_STRATEGY_TIMEOUT_MS = 10_000;
// CLI strategies spawn a process and may refresh a token first.
export const DEFAULT_CLI_STRATEGY_TIMEOUT_MS = 20_000;
export const DEFAULT_STRATEGY_RETRY: ResolvedRetryConfig = {
  attempts: 3,
  minDelayMs: 500,
  maxDelayMs: 8_000,
  jitter: 0.1,
};
export const DEFAULT_FETCH_MAX_CONCURRENT = 4;
export const DEFAULT_MAX_ACCOUNTS_PER_PROVIDER = 6;
export const DEFAULT_STORE_MAX_CONCURRENT = 1;
export const DEFAULT_COOKIE_LOCK_RETRY: ResolvedRetryConfig = {
  attempts: 4,
  minDelayMs: 50,
  maxDelayMs: 800,
  jitter: 0.1,
};
export const DEFAULT_SCANNER_LOCK_TIMEOUT_MS = 250;
export const DEFAULT_BROWSERS: readonly BrowserId[] = [
  "chrome",
  "edge",
  "brave",
  "arc",
  "chromium",
  "firefox",
];

export function defaultTimeoutForStrategy(kind: StrategyKind): number {
  return kind === "cli" ? DEFAULT_CLI_STRATEGY_TIMEOUT_MS : DEFAULT_STRATEGY_TIMEOUT_MS;
}

export type ResolvedCookieSettings = {
  stalenessMs: number;
  browsers: BrowserId[];
  browserRoots: Partial<Record<BrowserId, string>>;
  maxConcurrentPerStore: number;
  lockRetry: ResolvedRetryConfig;
  cachePath?: string;
};

export function resolveCookieSettings(cfg: UsagebarConfig = {}): ResolvedCookieSettings {
  const cookies = cfg.cookies ?? {};
  const browserRoots: Partial<Record<BrowserId, string>> = {};
  for (const [browser, root] of Object.entries(cookies.browserRoots ?? {})) {
    const id = DEFAULT_BROWSERS.find((candidate) => candidate === browser);
    if (id && root) browserRoots[id] = resolveUserPath(root);
  }
  return {
    stalenessMs: cookies.stalenessMs ?? DEFAULT_COOKIE_STALENESS_MS,
    browsers: cookies.browsers ? [...new Set(cookies.browsers)] : [...DEFAULT_BROWSERS],
    browserRoots,
    maxConcurrentPerStore: cookies.maxConcurrentPerStore ?? DEFAULT_STORE_MAX_CONCURRENT,
    lockRetry: resolveRetryConfig(DEFAULT_COOKIE_LOCK_RETRY, cookies.lockRetry),
    cachePath: cookies.cachePath ? resolveUserPath(cookies.cachePath) : undefined,
  };
}

export type ResolvedFetchSettings = {
  maxConcurrent: number;
  maxAccountsPerProvider: number;
};

export function resolveFetchSettings(cfg: UsagebarConfig = {}): ResolvedFetchSettings {
  return {
    maxConcurrent: cfg.fetch?.maxConcurrent ?? DEFAULT_FETCH_MAX_CONCURRENT,
    maxAccountsPerProvider: cfg.fetch?.maxAccountsPerProvider ?? DEFAULT_MAX_ACCOUNTS_PER_PROVIDER,
  };
}

export type ResolvedScannerSettings = {
  lockTimeoutMs: number;
  cachePath: string;
  pricingPath?: string;
};

export function resolveScannerSettings(
  cfg: UsagebarConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedScannerSettings {
  const scanner = cfg.scanner ?? {};
  return {
    lockTimeoutMs: scanner.lockTimeoutMs ?? DEFAULT_SCANNER_LOCK_TIMEOUT_MS,
    cachePath: scanner.cachePath
      ? resolveUserPath(scanner.cachePath)
      : path.join(resolveCacheDir(env), "cost-scan.json"),
    pricingPath: scanner.pricingPath ? resolveUserPath(scanner.pricingPath) : undefined,
  };
}

export function resolveCredentialStorePath(
  cfg: UsagebarConfig = {},
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const explicit = cfg.credentials?.storePath;
  if (explicit) return resolveUserPath(explicit, homedir);
  return path.join(resolveStateDir(env, homedir), "credentials.json");
}

/** Pre-v2 token-accounts file, imported once into the credential store. */
export function resolveLegacyTokenAccountsPath(
  cfg: UsagebarConfig = {},
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const explicit = cfg.credentials?.legacyTokenAccountsPath;
  if (explicit) return resolveUserPath(explicit, homedir);
  return path.join(resolveStateDir(env, homedir), "token-accounts.json");
}
