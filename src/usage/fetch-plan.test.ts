import { describe, expect, it, type Mock, vi } from "vitest";

import type { Account } from "../accounts/registry.js";
import { CookieHeaderCache } from "../browser/cookie-header-cache.js";
import { UsageFetchError } from "../infra/errors.js";
import { FetchPlanOrchestrator, mergeSnapshots, pickFailure, strategiesForSourceMode } from "./fetch-plan.js";
import { type ProviderDefinition, resolveProviders } from "./providers.js";
import type { StrategyContext, StrategyExecutor, StrategyOutcome, UsageSnapshot } from "./types.js";

const FAST_RETRY = { attempts: 3, minDelayMs: 1, maxDelayMs: 5, jitter: 0 };

const DEMO_DEFINITION: ProviderDefinition = {
  id: "demo",
  displayName: "Demo",
  enabled: true,
  strategies: [
    { kind: "oauth", id: "demo.a", retry: FAST_RETRY, timeoutMs: 1_000 },
    { kind: "cookie", id: "demo.b", retry: FAST_RETRY, timeoutMs: 1_000 },
    { kind: "cli", id: "demo.c", retry: FAST_RETRY, timeoutMs: 1_000 },
  ],
  cookieDomains: ["demo.test"],
  cookieName: "sid",
};

const [PROVIDER] = resolveProviders({}, [DEMO_DEFINITION]);

const ACCOUNT: Account = {
  id: "acct",
  provider: "demo",
  label: "Demo",
  createdAt: 0,
  credentials: {},
  implicit: true,
};

function snapshot(source: string, overrides: Partial<UsageSnapshot> = {}): UsageSnapshot {
  return {
    provider: "demo",
    displayName: "Demo",
    accountLabel: "Demo",
    windows: [{ label: "5h", usedPercent: 10 }],
    updatedAt: 100,
    source,
    ...overrides,
  };
}

function complete(source: string, overrides: Partial<UsageSnapshot> = {}): StrategyOutcome {
  return { status: "complete", snapshot: snapshot(source, overrides) };
}

function executor(
  execute: (ctx: StrategyContext) => Promise<StrategyOutcome>,
  available = true,
): StrategyExecutor & { execute: Mock<StrategyExecutor["execute"]> } {
  return { isAvailable: () => available, execute: vi.fn<StrategyExecutor["execute"]>(execute) };
}

function orchestrator(table: Record<string, StrategyExecutor>, cookieCache?: CookieHeaderCache) {
  return new FetchPlanOrchestrator({
    executors: { resolve: (_provider, strategy) => table[strategy.id] },
    cookieCache,
  });
}

describe("FetchPlanOrchestrator", () => {
  it("retries a transient failure up to its budget, then falls through", async () => {
    const a = executor(async () => {
      throw new UsageFetchError("network", "socket hang up");
    });
    const b = executor(async () => complete("demo.b"));
    const result = await orchestrator({ "demo.a": a, "demo.b": b }).execute(PROVIDER, ACCOUNT);

    expect(a.execute).toHaveBeenCalledTimes(3);
    expect(result.status).toBe("success");
    expect(result.attempts).toEqual([
      {
        strategyId: "demo.a",
        kind: "oauth",
        outcome: "failed",
        attempts: 3,
        errorKind: "network",
        message: "socket hang up",
      },
      { strategyId: "demo.b", kind: "cookie", outcome: "success", attempts: 1 },
    ]);
  });

  it("does not retry auth_expired", async () => {
    const a = executor(async () => {
      throw new UsageFetchError("auth_expired", "token expired");
    });
    const result = await orchestrator({ "demo.a": a }).execute(PROVIDER, ACCOUNT);
    expect(a.execute).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ status: "failure", error: { kind: "auth_expired", message: "token expired" } });
  });

  it("retries a rate limit and succeeds", async () => {
    let calls = 0;
    const a = executor(async () => {
      calls += 1;
      if (calls === 1) throw new UsageFetchError("rate_limited", "slow down", { retryAfterMs: 2 });
      return complete("demo.a");
    });
    const result = await orchestrator({ "demo.a": a }).execute(PROVIDER, ACCOUNT);
    expect(result.status).toBe("success");
    expect(result.attempts[0]).toMatchObject({ outcome: "success", attempts: 2 });
  });

  it("records unavailable strategies and reports when none ran", async () => {
    const a = executor(async () => complete("demo.a"), false);
    const result = await orchestrator({ "demo.a": a }).execute(PROVIDER, ACCOUNT);
    expect(a.execute).not.toHaveBeenCalled();
    expect(result).toEqual({
      status: "failure",
      error: { kind: "not_installed", message: "no available strategy" },
      attempts: [
        { strategyId: "demo.a", kind: "oauth", outcome: "unavailable", attempts: 0 },
        { strategyId: "demo.b", kind: "cookie", outcome: "unavailable", attempts: 0 },
        { strategyId: "demo.c", kind: "cli", outcome: "unavailable", attempts: 0 },
      ],
    });
  });

  it("reports the most specific failure", async () => {
    const a = executor(async () => {
      throw new UsageFetchError("parse", "unexpected body");
    });
    const b = executor(async () => {
      throw new UsageFetchError("not_installed", "no browser");
    });
    const c = executor(async () => {
      throw new UsageFetchError("timeout", "slow");
    });
    const result = await orchestrator({ "demo.a": a, "demo.b": b, "demo.c": c }).execute(PROVIDER, ACCOUNT);
    expect(result).toMatchObject({ status: "failure", error: { kind: "parse", message: "unexpected body" } });
  });

  it("times out a hung strategy and aborts its signal", async () => {
    const [provider] = resolveProviders({}, [
      { id: "slow", displayName: "Slow", enabled: true, strategies: [{ kind: "cli", timeoutMs: 20, retry: FAST_RETRY }] },
    ]);
    let seen: AbortSignal | undefined;
    const hung = executor(
      (ctx) =>
        new Promise<StrategyOutcome>((_, reject) => {
          seen = ctx.signal;
          ctx.signal.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );
    const result = await orchestrator({ "slow.cli": hung }).execute(provider, { ...ACCOUNT, provider: "slow" });
    expect(hung.execute).toHaveBeenCalledTimes(1);
    expect(seen?.aborted).toBe(true);
    expect(result).toMatchObject({
      status: "failure",
      error: { kind: "timeout", message: "slow.cli timed out after 20ms" },
    });
  });

  it("returns a partial when nothing later fills the gaps", async () => {
    const a = executor(async () => ({
      status: "partial",
      snapshot: snapshot("demo.a"),
      warning: "credits unavailable",
      missing: ["credits"],
    }));
    const b = executor(async () => {
      throw new UsageFetchError("auth_expired", "expired");
    });
    const result = await orchestrator({ "demo.a": a, "demo.b": b }).execute(PROVIDER, ACCOUNT);
    expect(result).toMatchObject({
      status: "partial",
      strategyId: "demo.a",
      warning: "credits unavailable",
      snapshot: { windows: [{ label: "5h", usedPercent: 10 }] },
    });
  });

  it("merges partials until every missing field is filled", async () => {
    const a = executor(async () => ({
      status: "partial",
      snapshot: snapshot("demo.a"),
      warning: "credits unavailable",
      missing: ["credits"],
    }));
    const b = executor(async () => ({
      status: "partial",
      snapshot: snapshot("demo.b", {
        windows: [
          { label: "5h", usedPercent: 99 },
          { label: "weekly", usedPercent: 40 },
        ],
        credits: { remaining: 12 },
      }),
      warning: "plan unavailable",
      missing: ["plan"],
    }));
    const result = await orchestrator({ "demo.a": a, "demo.b": b }).execute(PROVIDER, ACCOUNT);
    expect(result.status).toBe("success");
    if (result.status !== "success") return;
    expect(result.strategyId).toBe("demo.a");
    expect(result.snapshot.windows).toEqual([
      { label: "5h", usedPercent: 10 },
      { label: "weekly", usedPercent: 40 },
    ]);
    expect(result.snapshot.credits).toEqual({ remaining: 12 });
    expect(result.warning).toBe("credits unavailable; plan unavailable");
  });

  it("fills a later success from an earlier partial", async () => {
    const a = executor(async () => ({
      status: "partial",
      snapshot: snapshot("demo.a", { plan: "pro" }),
      warning: "windows incomplete",
      missing: ["windows"],
    }));
    const b = executor(async () => complete("demo.b", { windows: [{ label: "weekly", usedPercent: 5 }] }));
    const result = await orchestrator({ "demo.a": a, "demo.b": b }).execute(PROVIDER, ACCOUNT);
    expect(result).toMatchObject({
      status: "success",
      strategyId: "demo.b",
      warning: "windows incomplete",
      snapshot: { plan: "pro", source: "demo.b" },
    });
  });

  it("leaves warning unset on a clean success", async () => {
    const a = executor(async () => complete("demo.a"));
    const result = await orchestrator({ "demo.a": a }).execute(PROVIDER, ACCOUNT);
    expect(result.status === "success" && result.warning).toBeUndefined();
  });

  it("invalidates cached cookies when a cookie strategy reports auth_expired", async () => {
    const refresh = vi.fn(async () => ({ header: "sid=test-cookie", sourceLabel: "Chrome (Default)" }));
    const cache = new CookieHeaderCache({ refresh });
    let header = "";
    const b = executor(async (ctx) => {
      header = await ctx.cookieHeader();
      throw new UsageFetchError("auth_expired", "session expired");
    });
    const result = await orchestrator({ "demo.b": b }, cache).execute(PROVIDER, ACCOUNT);
    expect(header).toBe("sid=test-cookie");
    expect(refresh).toHaveBeenCalledTimes(1);
    expect(cache.peek("demo", "acct", "demo.test")).toBeUndefined();
    expect(result).toMatchObject({ status: "failure", error: { kind: "auth_expired" } });
  });

  it("hands a stored cookie credential to the cookie strategy", async () => {
    const refresh = vi.fn(async () => ({ header: "sid=browser", sourceLabel: "Chrome (Default)" }));
    const cache = new CookieHeaderCache({ refresh });
    const stored = { type: "cookie_header" as const, header: "sid=manual", schemaVersion: 4 };
    let seen: { header: string; credential: unknown } | undefined;
    const b = executor(async (ctx) => {
      seen = { header: await ctx.cookieHeader(), credential: ctx.credential };
      return complete("demo.b");
    });
    await orchestrator({ "demo.b": b }, cache).execute(PROVIDER, {
      ...ACCOUNT,
      implicit: false,
      credentials: { cookie: stored },
    });
    expect(seen).toEqual({ header: "sid=manual", credential: stored });
    expect(refresh).not.toHaveBeenCalled();
  });

  it("shares one in-flight run per provider, account and strategy", async () => {
    let resolve: (outcome: StrategyOutcome) => void = () => {};
    const a = executor(
      () =>
        new Promise<StrategyOutcome>((settle) => {
          resolve = settle;
        }),
    );
    const plan = orchestrator({ "demo.a": a });
    const first = plan.execute(PROVIDER, ACCOUNT);
    const second = plan.execute(PROVIDER, ACCOUNT);
    await vi.waitFor(() => expect(a.execute).toHaveBeenCalledTimes(1));
    resolve(complete("demo.a"));
    const results = await Promise.all([first, second]);
    expect(results.map((result) => result.status)).toEqual(["success", "success"]);
    expect(a.execute).toHaveBeenCalledTimes(1);
    expect(plan.inflight).toBe(0);
  });

  it("returns cancelled when the caller aborts", async () => {
    const controller = new AbortController();
    const a = executor(
      (ctx) =>
        new Promise<StrategyOutcome>((_, reject) => {
          ctx.signal.addEventListener("abort", () => reject(new Error("aborted")));
          controller.abort();
        }),
    );
    const result = await orchestrator({ "demo.a": a }).execute(PROVIDER, ACCOUNT, { signal: controller.signal });
    expect(result).toEqual({ status: "cancelled", attempts: [] });
  });

  it("keeps a shared run going for callers that did not abort", async () => {
    let resolve: (outcome: StrategyOutcome) => void = () => {};
    let shared: AbortSignal | undefined;
    const a = executor(
      (ctx) =>
        new Promise<StrategyOutcome>((settle) => {
          shared = ctx.signal;
          resolve = settle;
        }),
    );
    const b = executor(async () => complete("demo.b"));
    const plan = orchestrator({ "demo.a": a, "demo.b": b });
    const leaving = new AbortController();
    const staying = new AbortController();
    const first = plan.execute(PROVIDER, ACCOUNT, { signal: leaving.signal });
    const second = plan.execute(PROVIDER, ACCOUNT, { signal: staying.signal });
    await vi.waitFor(() => expect(a.execute).toHaveBeenCalledTimes(1));

    leaving.abort();
    expect(await first).toEqual({ status: "cancelled", attempts: [] });
    expect(shared?.aborted).toBe(false);

    resolve(complete("demo.a"));
    expect(await second).toMatchObject({
      status: "success",
      strategyId: "demo.a",
      attempts: [{ strategyId: "demo.a", kind: "oauth", outcome: "success", attempts: 1 }],
    });
    expect(b.execute).not.toHaveBeenCalled();
  });

  it("cancels a shared run once every caller has aborted", async () => {
    let shared: AbortSignal | undefined;
    const a = executor(
      (ctx) =>
        new Promise<StrategyOutcome>((_, reject) => {
          shared = ctx.signal;
          ctx.signal.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );
    const plan = orchestrator({ "demo.a": a });
    const one = new AbortController();
    const two = new AbortController();
    const first = plan.execute(PROVIDER, ACCOUNT, { signal: one.signal });
    const second = plan.execute(PROVIDER, ACCOUNT, { signal: two.signal });
    await vi.waitFor(() => expect(a.execute).toHaveBeenCalledTimes(1));

    one.abort();
    expect(shared?.aborted).toBe(false);
    two.abort();
    expect(shared?.aborted).toBe(true);
    expect(await Promise.all([first, second])).toEqual([
      { status: "cancelled", attempts: [] },
      { status: "cancelled", attempts: [] },
    ]);
  });

  it("runs only the strategies the provider's source mode allows", async () => {
    const [webOnly] = resolveProviders({ providers: { demo: { sourceMode: "web" } } }, [
      { ...DEMO_DEFINITION },
    ]);
    const a = executor(async () => complete("demo.a"));
    const b = executor(async () => complete("demo.b"));
    const result = await orchestrator({ "demo.a": a, "demo.b": b }).execute(webOnly, ACCOUNT);
    expect(a.execute).not.toHaveBeenCalled();
    expect(result).toMatchObject({
      status: "success",
      strategyId: "demo.b",
      attempts: [{ strategyId: "demo.b", kind: "cookie", outcome: "success", attempts: 1 }],
    });
  });

  it("lets a call override the source mode", async () => {
    const c = executor(async () => complete("demo.c"));
    const result = await orchestrator({ "demo.c": c }).execute(PROVIDER, ACCOUNT, { sourceMode: "cli" });
    expect(result).toMatchObject({ status: "success", strategyId: "demo.c" });
    expect(result.attempts.map((attempt) => attempt.strategyId)).toEqual(["demo.c"]);
  });

  it("fails without attempts when the source mode matches no strategy", async () => {
    const [cookieOnly] = resolveProviders({}, [
      { ...DEMO_DEFINITION, strategies: [{ kind: "cookie", retry: FAST_RETRY }] },
    ]);
    const result = await orchestrator({}).execute(cookieOnly, ACCOUNT, { sourceMode: "oauth" });
    expect(result).toEqual({
      status: "failure",
      error: { kind: "not_installed", message: "demo has no strategy for source mode oauth" },
      attempts: [],
    });
  });

  it("freezes results", async () => {
    const a = executor(async () => complete("demo.a"));
    const result = await orchestrator({ "demo.a": a }).execute(PROVIDER, ACCOUNT);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.attempts)).toBe(true);
  });
});

describe("pickFailure", () => {
  it("prefers the later failure on equal rank", () => {
    expect(
      pickFailure([
        { kind: "auth_expired", message: "first" },
        { kind: "network", message: "second" },
        { kind: "parse", message: "third" },
      ]),
    ).toEqual({ kind: "parse", message: "third" });
  });
});

describe("mergeSnapshots", () => {
  it("keeps base fields and fills identity gaps", () => {
    const merged = mergeSnapshots(
      snapshot("a", { identity: { email: "a@example.com" }, updatedAt: 5 }),
      snapshot("b", { identity: { organization: "Org" }, plan: "team", updatedAt: 9 }),
    );
    expect(merged).toEqual({
      ...snapshot("a"),
      identity: { email: "a@example.com", organization: "Org" },
      plan: "team",
      updatedAt: 9,
    });
  });
});

describe("strategiesForSourceMode", () => {
  const [provider] = resolveProviders({}, [
    {
      ...DEMO_DEFINITION,
      strategies: [...DEMO_DEFINITION.strategies, { kind: "api_key", id: "demo.d", retry: FAST_RETRY }],
    },
  ]);

  it("keeps every strategy under auto, api keys included", () => {
    expect(strategiesForSourceMode(provider.strategies, "auto").map((strategy) => strategy.id)).toEqual([
      "demo.a",
      "demo.b",
      "demo.c",
      "demo.d",
    ]);
  });

  it("maps web, cli and oauth to one strategy kind each", () => {
    const ids = (["web", "cli", "oauth"] as const).map((mode) =>
      strategiesForSourceMode(provider.strategies, mode).map((strategy) => strategy.id),
    );
    expect(ids).toEqual([["demo.b"], ["demo.c"], ["demo.a"]]);
  });
});
