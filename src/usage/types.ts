import type { ResolvedRetryConfig } from "../infra/retry.js";
import type { ErrorKind } from "../infra/errors.js";
import type { SourceMode, StrategyKind } from "../config/types.js";
import type { Account } from "../accounts/registry.js";
import type { Credential } from "../credentials/types.js";
import type { SubsystemLogger } from "../logging/subsystem.js";

export type AuthStrategy = Readonly<{
  kind: StrategyKind;
  id: string;
  timeoutMs: number;
  retry: Readonly<ResolvedRetryConfig>;
}>;

export type Provider = Readonly<{
  id: string;
  displayName: string;
  enabled: boolean;
  strategies: readonly AuthStrategy[];
  cookieDomains: readonly string[];
  cookieName?: string;
  sourceMode: SourceMode;
}>;

export type UsageWindow = {
  label: string;
  usedPercent: number;
  resetAt?: number;
  windowMinutes?: number;
};

export type UsageSnapshot = {
  provider: string;
  displayName: string;
  accountLabel: string;
  windows: UsageWindow[];
  plan?: string;
  credits?: { remaining: number; total?: number; unit?: string };
  identity?: { email?: string; organization?: string };
  updatedAt: number;
  /** Strategy id that produced the data. */
  source: string;
};

export type FetchAttemptOutcome = "unavailable" | "success" | "partial" | "failed";

export type FetchAttempt = Readonly<{
  strategyId: string;
  kind: StrategyKind;
  outcome: FetchAttemptOutcome;
  /** Executions of the strategy, retries included. */
  attempts: number;
  errorKind?: ErrorKind;
  message?: string;
}>;

export type FetchFailure = { kind: ErrorKind; message: string };

export type FetchResult =
  | Readonly<{
      status: "success";
      snapshot: UsageSnapshot;
      strategyId: string;
      /** Warnings of earlier partial outcomes folded into this snapshot. */
      warning?: string;
      attempts: readonly FetchAttempt[];
    }>
  | Readonly<{
      status: "partial";
      snapshot: UsageSnapshot;
      warning: string;
      strategyId: string;
      attempts: readonly FetchAttempt[];
    }>
  | Readonly<{ status: "failure"; error: FetchFailure; attempts: readonly FetchAttempt[] }>
  | Readonly<{ status: "cancelled"; attempts: readonly FetchAttempt[] }>;

export type StrategyOutcome =
  | { status: "complete"; snapshot: UsageSnapshot }
  | { status: "partial"; snapshot: UsageSnapshot; warning: string; missing: string[] };

export type StrategyContext = {
  provider: Provider;
  account: Account;
  strategy: AuthStrategy;
  /** Stored credential for the strategy's kind, if the account has one. */
  credential?: Credential;
  /** Cookie header for `domain` (defaults to the provider's first cookie domain). */
  cookieHeader: (domain?: string) => Promise<string>;
  signal: AbortSignal;
  fetch: typeof fetch;
  logger: SubsystemLogger;
};

/** Provider adapter for one authentication channel. */
export type StrategyExecutor = {
  isAvailable: (ctx: StrategyContext) => boolean | Promise<boolean>;
  execute: (ctx: StrategyContext) => Promise<StrategyOutcome>;
};

/** Executors keyed by strategy id, falling back to `${provider}.${kind}` lookups by kind. */
export type ExecutorRegistry = {
  resolve: (provider: Provider, strategy: AuthStrategy) => StrategyExecutor | undefined;
};
