import { describe, expect, it } from "vitest";

import { findProvider, loadDefaultProviderTable, resolveProviders } from "./providers.js";

describe("loadDefaultProviderTable", () => {
  it("ships codex and claude enabled by default", () => {
    const table = loadDefaultProviderTable();
    const enabled = table.filter((entry) => entry.enabled).map((entry) => entry.id);
    expect(enabled).toEqual(["codex", "claude"]);
    expect(new Set(table.map((entry) => entry.id)).size).toBe(table.length);
  });
});

describe("resolveProviders", () => {
  it("fills strategy ids, timeouts and retry budgets", () => {
    const claude = findProvider(resolveProviders(), "claude");
    expect(claude?.cookieName).toBe("sessionKey");
    expect(claude?.strategies.map((strategy) => [strategy.id, strategy.timeoutMs])).toEqual([
      ["claude.oauth", 10_000],
      ["claude.cookie", 10_000],
      ["claude.cli", 20_000],
    ]);
    expect(claude?.strategies[0].retry).toEqual({
      attempts: 3,
      minDelayMs: 500,
      maxDelayMs: 8_000,
      jitter: 0.1,
    });
  });

  it("merges overrides over the built-in entry", () => {
    const providers = resolveProviders({
      providers: {
        cursor: { enabled: true, strategies: [{ kind: "cookie", timeoutMs: 5_000, retry: { attempts: 1 } }] },
        codex: { enabled: false },
      },
    });
    const cursor = findProvider(providers, "cursor");
    expect(cursor?.enabled).toBe(true);
    expect(cursor?.cookieDomains).toEqual(["cursor.com"]);
    expect(cursor?.strategies[0]).toMatchObject({ id: "cursor.cookie", timeoutMs: 5_000 });
    expect(cursor?.strategies[0].retry.attempts).toBe(1);
    expect(findProvider(providers, "codex")?.enabled).toBe(false);
  });

  it("defaults the source mode to auto and takes a configured one", () => {
    const providers = resolveProviders({ providers: { claude: { sourceMode: "web" } } });
    expect(findProvider(providers, "codex")?.sourceMode).toBe("auto");
    expect(findProvider(providers, "claude")?.sourceMode).toBe("web");
  });

  it("appends user-only providers after the built-ins", () => {
    const providers = resolveProviders({
      providers: {
        internal: { enabled: true, strategies: [{ kind: "api_key", id: "internal.key" }] },
      },
    });
    const last = providers[providers.length - 1];
    expect(last.id).toBe("internal");
    expect(last.displayName).toBe("internal");
    expect(last.strategies.map((strategy) => strategy.id)).toEqual(["internal.key"]);
  });

  it("skips unknown providers without strategies", () => {
    const providers = resolveProviders({ providers: { ghost: { enabled: true } } });
    expect(findProvider(providers, "ghost")).toBeUndefined();
  });

  it("rejects duplicate strategy ids", () => {
    expect(() =>
      resolveProviders({
        providers: {
          codex: { strategies: [{ kind: "oauth", id: "same" }, { kind: "cli", id: "same" }] },
        },
      }),
    ).toThrow(/duplicate strategy ids/);
  });

  it("freezes the resolved table", () => {
    const providers = resolveProviders();
    expect(Object.isFrozen(providers)).toBe(true);
    expect(Object.isFrozen(providers[0])).toBe(true);
    expect(Object.isFrozen(providers[0].strategies[0])).toBe(true);
  });
});
