import path from "node:path";

import { type AccountFetchResult, AccountRegistry } from "../accounts/registry.js";
import { extractCookieHeader } from "../browser/cookie-header.js";
import { CookieHeaderCache } from "../browser/cookie-header-cache.js";
import type { CookieKeyProvider } from "../browser/cookie-keys.js";
import { createPlatformKeyProvider } from "../browser/cookie-keys.platform.js";
import { CookieStoreReader } from "../browser/cookie-store.js";
import type { BrowserProfile } from "../browser/profiles.js";
import {
  resolveCookieSettings,
  resolveCredentialStorePath,
  resolveFetchSettings,
  resolveLegacyTokenAccountsPath,
  resolveScannerSettings,
} from "../config/defaults.js";
import { loadConfig } from "../config/io.js";
import { resolveCacheDir } from "../config/paths.js";
import type { BrowserId, UsagebarConfig } from "../config/types.js";
import { type CostLogRoot, resolveCostLogRoots } from "../cost/session-roots.js";
import { type DirectoryScanResult, JsonlScanner, type ScanOptions, type ScanResult } from "../cost/jsonl-scanner.js";
import { loadPricingTable } from "../cost/pricing.js";
import { CredentialMigrator, type MigrationReport } from "../credentials/migrations.js";
import { CredentialStore } from "../credentials/store.js";
import { formatErrorMessage, UsagebarError } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { FetchPlanOrchestrator } from "./fetch-plan.js";
import { findProvider, resolveProviders } from "./providers.js";
import type { AuthStrategy, ExecutorRegistry, Provider, StrategyExecutor } from "./types.js";

const log = createSubsystemLogger("usage/core");

/**
 * Looks executors up by strategy id (`claude.oauth`), then by `${provider}.${kind}`,
 * then by bare kind for adapters shared across providers.
 */
export function createExecutorRegistry(executors: Readonly<Record<string, StrategyExecutor>>): ExecutorRegistry {
  const table = new Map(Object.entries(executors));
  return {
    resolve: (provider: Provider, strategy: AuthStrategy) =>
      table.get(strategy.id) ?? table.get(`${provider.id}.${strategy.kind}`) ?? table.get(strategy.kind),
  };
}

export type UsageCoreOptions = {
  executors: ExecutorRegistry | Readonly<Record<string, StrategyExecutor>>;
  /** Loaded from the config file when omitted. */
  config?: UsagebarConfig;
  env?: NodeJS.ProcessEnv;
  keys?: CookieKeyProvider;
  /** Replaces browser profile discovery. */
  profiles?: (browser: BrowserId) => BrowserProfile[];
  fetch?: typeof fetch;
  now?: () => number;
};

export type FetchAllOptions = {
  signal?: AbortSignal;
  provider?: string;
};

export type CostDirectoryScan = DirectoryScanResult & { source?: CostLogRoot["source"] };

export type UsageCore = {
  readonly providers: readonly Provider[];
  readonly accounts: AccountRegistry;
  start(): Promise<MigrationReport>;
  fetchAllEnabled(opts?: FetchAllOptions): Promise<AccountFetchResult[]>;
  scanCost(filePath: string, opts?: ScanOptions): Promise<ScanResult>;
  /** Scans `root`, or every local agent log root when omitted. */
  scanCostDirectory(root?: string, opts?: ScanOptions & { days?: number }): Promise<CostDirectoryScan[]>;
  invalidateCookieCache(provider: string, account: string, domain?: string): number;
  migrateCredentials(): Promise<MigrationReport>;
  shutdown(): Promise<void>;
};

function isExecutorRegistry(
  value: ExecutorRegistry | Readonly<Record<string, StrategyExecutor>>,
): value is ExecutorRegistry {
  return typeof value.resolve === "function";
}

export function createUsageCore(options: UsageCoreOptions): UsageCore {
  const env = options.env ?? process.env;
  const config = options.config ?? loadConfig({ env });
  const providers = resolveProviders(config);
  const cookieSettings = resolveCookieSettings(config);
  const fetchSettings = resolveFetchSettings(config);
  const scannerSettings = resolveScannerSettings(config, env);

  const store = new CredentialStore({
    storePath: resolveCredentialStorePath(config, env),
    legacyTokenAccountsPath: resolveLegacyTokenAccountsPath(config, env),
    now: options.now,
  });
  const cookieNameFor = (provider: string) => findProvider(providers, provider)?.cookieName;
  const migrator = new CredentialMigrator({ store, cookieNameFor, now: options.now });
  const accounts = new AccountRegistry({
    store,
    providers,
    maxConcurrent: fetchSettings.maxConcurrent,
    maxAccountsPerProvider: fetchSettings.maxAccountsPerProvider,
    now: options.now,
  });

  const reader = new CookieStoreReader({
    maxConcurrentPerStore: cookieSettings.maxConcurrentPerStore,
    lockRetry: cookieSettings.lockRetry,
  });
  const keys = options.keys ?? createPlatformKeyProvider();
  const cookieCache = new CookieHeaderCache({
    stalenessMs: cookieSettings.stalenessMs,
    cachePath: cookieSettings.cachePath ?? path.join(resolveCacheDir(env), "cookie-headers.json"),
    now: options.now,
    refresh: async (target, signal) => {
      const extraction = await extractCookieHeader(
        [target.domain],
        {
          reader,
          keys,
          browsers: cookieSettings.browsers,
          discovery: { env, roots: cookieSettings.browserRoots },
          profiles: options.profiles,
          now: options.now,
        },
        signal,
      );
      log.debug(`extracted ${extraction.cookieCount} cookie(s) for ${target.provider}/${target.account}`, {
        source: extraction.sourceLabel,
      });
      return { header: extraction.header, sourceLabel: extraction.sourceLabel };
    },
  });

  const orchestrator = new FetchPlanOrchestrator({
    executors: isExecutorRegistry(options.executors)
      ? options.executors
      : createExecutorRegistry(options.executors),
    cookieCache,
    fetch: options.fetch,
  });
  const scanner = new JsonlScanner({
    pricing: loadPricingTable(scannerSettings.pricingPath),
    lockTimeoutMs: scannerSettings.lockTimeoutMs,
    cachePath: scannerSettings.cachePath,
    now: options.now,
  });

  const lifetime = new AbortController();
  let started: Promise<MigrationReport> | undefined;
  let closed = false;

  const assertOpen = () => {
    if (closed) throw new UsagebarError("cancelled", "usage core is shut down");
  };
  const withLifetime = (signal?: AbortSignal) =>
    signal ? AbortSignal.any([signal, lifetime.signal]) : lifetime.signal;

  const migrateCredentials = async (): Promise<MigrationReport> => {
    assertOpen();
    return migrator.migrateAll();
  };

  return {
    providers,
    accounts,

    async start() {
      assertOpen();
      started ??= migrateCredentials().catch((err: unknown) => {
        started = undefined;
        throw err;
      });
      return started;
    },

    async fetchAllEnabled(opts = {}) {
      assertOpen();
      const signal = withLifetime(opts.signal);
      const results = await accounts.fetchAll(
        ({ provider, account }) => orchestrator.execute(provider, account, { signal }),
        { enabledOnly: true, provider: opts.provider },
      );
      for (const { provider, account, result } of results) {
        if (result.status !== "success" && result.status !== "partial") continue;
        try {
          await accounts.markUsed(provider, account.id);
        } catch (err) {
          log.warn(`could not record last use of ${provider}/${account.id}`, {
            error: formatErrorMessage(err),
          });
        }
      }
      return results;
    },

    scanCost(filePath, opts = {}) {
      assertOpen();
      return scanner.scan(filePath, { signal: withLifetime(opts.signal) });
    },

    async scanCostDirectory(root, opts = {}) {
      assertOpen();
      const signal = withLifetime(opts.signal);
      if (root !== undefined) {
        return [await scanner.scanDirectory(root, { days: opts.days, signal })];
      }
      const out: CostDirectoryScan[] = [];
      for (const logRoot of resolveCostLogRoots(env)) {
        const summary = await scanner.scanDirectory(logRoot.path, { days: opts.days, signal });
        out.push({ ...summary, source: logRoot.source });
      }
      return out;
    },

    invalidateCookieCache(provider, account, domain) {
      return cookieCache.invalidate(provider, account, domain);
    },

    migrateCredentials,

    async shutdown() {
      if (closed) return;
      closed = true;
      lifetime.abort(new UsagebarError("cancelled", "usage core shut down"));
      try {
        cookieCache.flush();
      } catch (err) {
        log.warn("failed to flush cookie cache", { error: formatErrorMessage(err) });
      }
      log.debug("usage core stopped", { inflight: orchestrator.inflight });
    },
  };
}
