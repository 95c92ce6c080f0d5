export {
  createExecutorRegistry,
  createUsageCore,
  type CostDirectoryScan,
  type FetchAllOptions,
  type UsageCore,
  type UsageCoreOptions,
} from "./usage/core.js";
export { FetchPlanOrchestrator, mergeSnapshots, pickFailure } from "./usage/fetch-plan.js";
export { findProvider, loadDefaultProviderTable, resolveProviders } from "./usage/providers.js";
export type {
  AuthStrategy,
  ExecutorRegistry,
  FetchAttempt,
  FetchAttemptOutcome,
  FetchFailure,
  FetchResult,
  Provider,
  StrategyContext,
  StrategyExecutor,
  StrategyOutcome,
  UsageSnapshot,
  UsageWindow,
} from "./usage/types.js";

export {
  type Account,
  type AccountFetchResult,
  AccountRegistry,
  DEFAULT_ACCOUNT_ID,
  type NewAccount,
} from "./accounts/registry.js";

export { decryptCookieValue, sealCookieValue, type CookieBlobMeta } from "./browser/cookie-crypto.js";
export { type CookieKeyProvider, createStaticKeyProvider } from "./browser/cookie-keys.js";
export { createPlatformKeyProvider } from "./browser/cookie-keys.platform.js";
export { CookieStoreReader, type RawCookie } from "./browser/cookie-store.js";
export {
  type CookieExtraction,
  extractCookieHeader,
  normalizeManualCookieHeader,
} from "./browser/cookie-header.js";
export { CookieHeaderCache, type CookieHeaderEntry } from "./browser/cookie-header-cache.js";
export { type BrowserProfile, discoverBrowserProfiles, discoverProfiles } from "./browser/profiles.js";

export { CredentialMigrator, type MigrationOutcome, type MigrationReport } from "./credentials/migrations.js";
export { CredentialStore } from "./credentials/store.js";
export type { Credential, CredentialRecord, CredentialType } from "./credentials/types.js";

export {
  type CostUsageTotals,
  type DirectoryScanResult,
  JsonlScanner,
  type ParseError,
  type ScanResult,
} from "./cost/jsonl-scanner.js";
export { estimateCost, loadPricingTable, type PricingTable, type TokenUsage } from "./cost/pricing.js";
export { listJsonlFiles, resolveCostLogRoots } from "./cost/session-roots.js";

export { clearConfigCache, loadConfig } from "./config/io.js";
export type { UsagebarConfig } from "./config/types.js";
export {
  CookieStoreError,
  ConfigValidationError,
  DecryptionError,
  type ErrorKind,
  MigrationError,
  toErrorKind,
  UsageFetchError,
  UsagebarError,
} from "./infra/errors.js";
export { createSubsystemLogger, type SubsystemLogger } from "./logging/subsystem.js";
