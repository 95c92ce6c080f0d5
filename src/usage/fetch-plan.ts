import type { Account } from "../accounts/registry.js";
import type { CookieHeaderCache } from "../browser/cookie-header-cache.js";
import type { SourceMode, StrategyKind } from "../config/types.js";
import { CREDENTIAL_TYPE_FOR_STRATEGY, type Credential } from "../credentials/types.js";
import { runWithTimeout, throwIfAborted } from "../infra/abort.js";
import {
  CookieStoreError,
  errorKindRank,
  formatErrorMessage,
  isAbortError,
  isTransientErrorKind,
  retryAfterMsOf,
  toErrorKind,
  UsageFetchError,
} from "../infra/errors.js";
import { SingleFlight } from "../infra/keyed-lock.js";
import { retryAsync } from "../infra/retry.js";
import { redactSensitiveText } from "../logging/redact.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type {
  AuthStrategy,
  ExecutorRegistry,
  FetchAttempt,
  FetchFailure,
  FetchResult,
  Provider,
  StrategyContext,
  StrategyOutcome,
  UsageSnapshot,
  UsageWindow,
} from "./types.js";

const log = createSubsystemLogger("usage/fetch");

export type FetchPlanOptions = {
  executors: ExecutorRegistry;
  /** Backs `ctx.cookieHeader` for accounts without a stored cookie header. */
  cookieCache?: CookieHeaderCache;
  fetch?: typeof fetch;
};

export type ExecuteOptions = {
  signal?: AbortSignal;
  /** Overrides the provider's configured source mode for this call. */
  sourceMode?: SourceMode;
};

const SOURCE_MODE_KINDS: Record<Exclude<SourceMode, "auto">, StrategyKind> = {
  web: "cookie",
  cli: "cli",
  oauth: "oauth",
};

/** Strategies a source mode allows, in plan order. API keys only run under `auto`. */
export function strategiesForSourceMode(
  strategies: readonly AuthStrategy[],
  mode: SourceMode,
): readonly AuthStrategy[] {
  if (mode === "auto") return strategies;
  const kind = SOURCE_MODE_KINDS[mode];
  return strategies.filter((strategy) => strategy.kind === kind);
}

type StrategyRun =
  | { status: "unavailable" }
  | { status: "done"; outcome: StrategyOutcome; executions: number }
  | { status: "error"; error: unknown; executions: number };

type PendingPartial = {
  snapshot: UsageSnapshot;
  strategyId: string;
  warnings: string[];
  missing: Set<string>;
};

function mergeWindows(base: UsageWindow[], extra: UsageWindow[]): UsageWindow[] {
  const labels = new Set(base.map((window) => window.label));
  return [...base, ...extra.filter((window) => !labels.has(window.label))];
}

/** `base` wins field by field; `extra` only fills what `base` lacks. */
export function mergeSnapshots(base: UsageSnapshot, extra: UsageSnapshot): UsageSnapshot {
  const identity =
    base.identity || extra.identity
      ? {
          email: base.identity?.email ?? extra.identity?.email,
          organization: base.identity?.organization ?? extra.identity?.organization,
        }
      : undefined;
  const merged: UsageSnapshot = {
    ...base,
    windows: mergeWindows(base.windows, extra.windows),
    updatedAt: Math.max(base.updatedAt, extra.updatedAt),
  };
  const plan = base.plan ?? extra.plan;
  if (plan !== undefined) merged.plan = plan;
  const credits = base.credits ?? extra.credits;
  if (credits !== undefined) merged.credits = credits;
  if (identity) merged.identity = identity;
  return merged;
}

function freezeResult(result: FetchResult): FetchResult {
  Object.freeze(result.attempts);
  return Object.freeze(result);
}

/** Highest rank wins; on equal rank the later failure wins. */
export function pickFailure(failures: readonly FetchFailure[]): FetchFailure {
  let best: FetchFailure | undefined;
  for (const failure of failures) {
    if (!best || errorKindRank(failure.kind) >= errorKindRank(best.kind)) best = failure;
  }
  return best ?? { kind: "not_installed", message: "no available strategy" };
}

/**
 * Runs a provider's strategies in declared order for one account and reports the first
 * success, a merged partial, or the most specific failure.
 */
export class FetchPlanOrchestrator {
  private readonly executors: ExecutorRegistry;
  private readonly cookieCache?: CookieHeaderCache;
  private readonly fetchImpl: typeof fetch;
  private readonly flights = new SingleFlight<StrategyRun>();

  constructor(opts: FetchPlanOptions) {
    this.executors = opts.executors;
    this.cookieCache = opts.cookieCache;
    this.fetchImpl = opts.fetch ?? globalThis.fetch;
  }

  get inflight(): number {
    return this.flights.size;
  }

  async execute(provider: Provider, account: Account, opts: ExecuteOptions = {}): Promise<FetchResult> {
    const attempts: FetchAttempt[] = [];
    const failures: FetchFailure[] = [];
    let partial: PendingPartial | undefined;
    const signal = opts.signal;
    const mode = opts.sourceMode ?? provider.sourceMode;
    const strategies = strategiesForSourceMode(provider.strategies, mode);
    if (strategies.length === 0) {
      return freezeResult({
        status: "failure",
        error: { kind: "not_installed", message: `${provider.id} has no strategy for source mode ${mode}` },
        attempts,
      });
    }

    for (const strategy of strategies) {
      if (signal?.aborted) return freezeResult({ status: "cancelled", attempts });
      let run: StrategyRun;
      try {
        run = await this.runShared(provider, account, strategy, signal);
      } catch (err) {
        if (isAbortError(err)) return freezeResult({ status: "cancelled", attempts });
        throw err;
      }

      if (run.status === "unavailable") {
        attempts.push({ strategyId: strategy.id, kind: strategy.kind, outcome: "unavailable", attempts: 0 });
        continue;
      }

      if (run.status === "error") {
        if (isAbortError(run.error) && signal?.aborted) {
          return freezeResult({ status: "cancelled", attempts });
        }
        const kind = toErrorKind(run.error);
        const message = redactSensitiveText(formatErrorMessage(run.error));
        attempts.push({
          strategyId: strategy.id,
          kind: strategy.kind,
          outcome: "failed",
          attempts: run.executions,
          errorKind: kind,
          message,
        });
        failures.push({ kind, message });
        log.debug(`${strategy.id} failed for ${account.id}: ${kind}`, { message });
        if (strategy.kind === "cookie" && kind === "auth_expired") {
          const dropped = this.cookieCache?.invalidate(provider.id, account.id) ?? 0;
          if (dropped > 0) log.info(`dropped ${dropped} cached cookie header(s) for ${provider.id}/${account.id}`);
        }
        continue;
      }

      const outcome = run.outcome;
      if (outcome.status === "complete") {
        attempts.push({ strategyId: strategy.id, kind: strategy.kind, outcome: "success", attempts: run.executions });
        if (!partial) return freezeResult({ status: "success", snapshot: outcome.snapshot, strategyId: strategy.id, attempts });
        return freezeResult({
          status: "success",
          snapshot: mergeSnapshots(outcome.snapshot, partial.snapshot),
          strategyId: strategy.id,
          warning: partial.warnings.join("; "),
          attempts,
        });
      }

      attempts.push({ strategyId: strategy.id, kind: strategy.kind, outcome: "partial", attempts: run.executions });
      if (!partial) {
        partial = {
          snapshot: outcome.snapshot,
          strategyId: strategy.id,
          warnings: [outcome.warning],
          missing: new Set(outcome.missing),
        };
      } else {
        const missing = partial.missing;
        partial = {
          snapshot: mergeSnapshots(partial.snapshot, outcome.snapshot),
          strategyId: partial.strategyId,
          warnings: partial.warnings.includes(outcome.warning)
            ? partial.warnings
            : [...partial.warnings, outcome.warning],
          missing: new Set(outcome.missing.filter((field) => missing.has(field))),
        };
      }
      if (partial.missing.size === 0) {
        return freezeResult({
          status: "success",
          snapshot: partial.snapshot,
          strategyId: partial.strategyId,
          warning: partial.warnings.join("; "),
          attempts,
        });
      }
    }

    if (partial) {
      return freezeResult({
        status: "partial",
        snapshot: partial.snapshot,
        warning: partial.warnings.join("; "),
        strategyId: partial.strategyId,
        attempts,
      });
    }
    return freezeResult({ status: "failure", error: pickFailure(failures), attempts });
  }

  /**
   * Concurrent calls for one (provider, account, strategy) share a single run. The run is
   * cancelled only when every joined caller has aborted.
   */
  private runShared(
    provider: Provider,
    account: Account,
    strategy: AuthStrategy,
    signal?: AbortSignal,
  ): Promise<StrategyRun> {
    const key = `${provider.id}/${account.id}/${strategy.id}`;
    return this.flights.run(key, (shared) => this.runStrategy(provider, account, strategy, shared), signal);
  }

  private async runStrategy(
    provider: Provider,
    account: Account,
    strategy: AuthStrategy,
    signal: AbortSignal,
  ): Promise<StrategyRun> {
    const executor = this.executors.resolve(provider, strategy);
    if (!executor) return { status: "unavailable" };
    const logger = log.child(strategy.id);
    const baseContext: StrategyContext = {
      provider,
      account,
      strategy,
      credential: credentialForStrategy(account, strategy),
      cookieHeader: (domain) => this.resolveCookieHeader(provider, account, domain, signal),
      signal,
      fetch: this.fetchImpl,
      logger,
    };

    let executions = 0;
    try {
      throwIfAborted(signal);
      if (!(await executor.isAvailable(baseContext))) return { status: "unavailable" };
      const outcome = await retryAsync(
        () => {
          executions += 1;
          return runWithTimeout((attemptSignal) => executor.execute({ ...baseContext, signal: attemptSignal }), {
            timeoutMs: strategy.timeoutMs,
            signal,
            onTimeout: () =>
              new UsageFetchError("timeout", `${strategy.id} timed out after ${strategy.timeoutMs}ms`),
          });
        },
        {
          ...strategy.retry,
          label: strategy.id,
          signal,
          shouldRetry: (err) => !isAbortError(err) && isTransientErrorKind(toErrorKind(err)),
          retryAfterMs: retryAfterMsOf,
          onRetry: (info) =>
            logger.debug(`retrying after ${toErrorKind(info.err)} (${info.attempt}/${info.maxAttempts})`, {
              delayMs: info.delayMs,
            }),
        },
      );
      return { status: "done", outcome, executions };
    } catch (error) {
      return { status: "error", error, executions };
    }
  }

  private async resolveCookieHeader(
    provider: Provider,
    account: Account,
    domain: string | undefined,
    signal?: AbortSignal,
  ): Promise<string> {
    const stored = account.credentials.cookie;
    if (stored?.type === "cookie_header") return stored.header;
    const target = domain ?? provider.cookieDomains[0];
    if (!target) throw new CookieStoreError(`${provider.id} declares no cookie domain`);
    if (!this.cookieCache) throw new CookieStoreError("browser cookie import is disabled");
    const entry = await this.cookieCache.getOrRefresh(provider.id, account.id, target, { signal });
    return entry.header;
  }
}

function credentialForStrategy(account: Account, strategy: AuthStrategy): Credential | undefined {
  const credential = account.credentials[strategy.kind];
  return credential?.type === CREDENTIAL_TYPE_FOR_STRATEGY[strategy.kind] ? credential : undefined;
}
