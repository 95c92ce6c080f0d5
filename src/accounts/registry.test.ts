import path from "node:path";

import { describe, expect, it } from "vitest";

import { makeTempDir } from "../../test/helpers/temp-home.js";
import { CredentialStore } from "../credentials/store.js";
import { resolveProviders } from "../usage/providers.js";
import type { FetchResult } from "../usage/types.js";
import { AccountRegistry, type AccountRegistryOptions } from "./registry.js";

const PROVIDERS = resolveProviders({}, [
  {
    id: "alpha",
    displayName: "Alpha",
    enabled: true,
    strategies: [{ kind: "cookie" }, { kind: "api_key" }],
    cookieDomains: ["alpha.test"],
    cookieName: "sid",
  },
  { id: "beta", displayName: "Beta", enabled: true, strategies: [{ kind: "api_key" }] },
  { id: "gamma", displayName: "Gamma", enabled: false, strategies: [{ kind: "cli" }] },
]);

async function createRegistry(opts: Partial<AccountRegistryOptions> = {}) {
  const dir = await makeTempDir();
  const store = new CredentialStore({ storePath: path.join(dir, "credentials.json") });
  let clock = 0;
  const registry = new AccountRegistry({
    store,
    providers: PROVIDERS,
    now: () => {
      clock += 1;
      return clock;
    },
    ...opts,
  });
  return { store, registry };
}

function success(label: string): FetchResult {
  return {
    status: "success",
    strategyId: "alpha.cookie",
    attempts: [],
    snapshot: {
      provider: "alpha",
      displayName: "Alpha",
      accountLabel: label,
      windows: [],
      updatedAt: 0,
      source: "alpha.cookie",
    },
  };
}

const keysOf = (accounts: Array<{ provider: string; id: string }>) =>
  accounts.map((account) => `${account.provider}/${account.id}`);

describe("AccountRegistry.listAccounts", () => {
  it("synthesizes a default account for providers without stored accounts", async () => {
    const { registry } = await createRegistry();
    const enabled = registry.listAccounts({ enabledOnly: true });
    expect(keysOf(enabled)).toEqual(["alpha/default", "beta/default"]);
    expect(enabled[0]).toMatchObject({ label: "Alpha", implicit: true, credentials: {} });
    expect(keysOf(registry.listAccounts())).toEqual(["alpha/default", "beta/default", "gamma/default"]);
  });

  it("orders by provider, then creation time", async () => {
    const { registry } = await createRegistry();
    await registry.addAccount({
      provider: "alpha",
      accountId: "first",
      label: "First",
      credential: { type: "api_key", key: "test-key-1" },
    });
    await registry.addAccount({
      provider: "beta",
      accountId: "b",
      label: "B",
      credential: { type: "api_key", key: "test-key-2" },
    });
    await registry.addAccount({
      provider: "alpha",
      accountId: "second",
      label: "Second",
      credential: { type: "api_key", key: "test-key-3" },
    });
    expect(keysOf(registry.listAccounts({ enabledOnly: true }))).toEqual([
      "alpha/first",
      "alpha/second",
      "beta/b",
    ]);
  });

  it("skips records that are not at the current schema version", async () => {
    const { store, registry } = await createRegistry();
    await store.putRecord({
      provider: "beta",
      accountId: "old",
      slot: "api_key",
      schemaVersion: 2,
      data: { label: "Old", createdAt: 1, credential: { type: "api_key", key: "test-key" } },
    });
    expect(keysOf(registry.listAccounts({ provider: "beta" }))).toEqual(["beta/default"]);
  });
});

describe("AccountRegistry.addAccount", () => {
  it("normalizes a bare cookie value with the provider cookie name", async () => {
    const { registry } = await createRegistry();
    const account = await registry.addAccount({
      provider: "alpha",
      accountId: "acct",
      label: "  ",
      credential: { type: "cookie_header", header: "Cookie: test-session" },
    });
    expect(account.label).toBe("Alpha");
    expect(account.credentials.cookie).toEqual({
      type: "cookie_header",
      header: "sid=test-session",
      schemaVersion: 4,
    });
  });

  it("adds a second credential to the same account", async () => {
    const { registry } = await createRegistry();
    await registry.addAccount({
      provider: "alpha",
      accountId: "acct",
      label: "Work",
      credential: { type: "cookie_header", header: "sid=test-session" },
    });
    const account = await registry.addAccount({
      provider: "alpha",
      accountId: "acct",
      label: "Work",
      credential: { type: "api_key", key: " test-key " },
    });
    expect(account.createdAt).toBe(1);
    expect(Object.keys(account.credentials).sort()).toEqual(["api_key", "cookie"]);
    expect(account.credentials.api_key).toEqual({ type: "api_key", key: "test-key", schemaVersion: 4 });
  });

  it("rejects unknown providers", async () => {
    const { registry } = await createRegistry();
    await expect(
      registry.addAccount({ provider: "nope", label: "x", credential: { type: "api_key", key: "k" } }),
    ).rejects.toMatchObject({ kind: "invalid_config" });
  });

  it("rejects an empty cookie header", async () => {
    const { registry } = await createRegistry();
    await expect(
      registry.addAccount({
        provider: "beta",
        label: "x",
        credential: { type: "cookie_header", header: "Cookie: " },
      }),
    ).rejects.toMatchObject({ kind: "invalid_config" });
  });
});

describe("AccountRegistry metadata", () => {
  it("removes an account and falls back to the default", async () => {
    const { registry } = await createRegistry();
    await registry.addAccount({
      provider: "beta",
      accountId: "b",
      label: "B",
      credential: { type: "api_key", key: "test-key" },
    });
    expect(await registry.removeAccount("beta", "b")).toBe(true);
    expect(await registry.removeAccount("beta", "b")).toBe(false);
    expect(keysOf(registry.listAccounts({ provider: "beta" }))).toEqual(["beta/default"]);
  });

  it("stamps lastUsedAt", async () => {
    const { registry } = await createRegistry();
    await registry.addAccount({
      provider: "beta",
      accountId: "b",
      label: "B",
      credential: { type: "api_key", key: "test-key" },
    });
    await registry.markUsed("beta", "b");
    expect(registry.getAccount("beta", "b")?.lastUsedAt).toBe(2);
  });
});

describe("AccountRegistry.fetchAll", () => {
  it("keeps input order and isolates a crashing account", async () => {
    const { registry } = await createRegistry();
    const results = await registry.fetchAll(async ({ provider, account }) => {
      if (provider.id === "alpha") throw new Error("boom");
      return success(account.label);
    });
    expect(results.map((entry) => [entry.provider, entry.result.status])).toEqual([
      ["alpha", "failure"],
      ["beta", "success"],
    ]);
    expect(results[0].result).toEqual({
      status: "failure",
      error: { kind: "network", message: "boom" },
      attempts: [],
    });
  });

  it("bounds concurrency", async () => {
    const { registry } = await createRegistry({ maxConcurrent: 2 });
    for (const id of ["a", "b", "c", "d"]) {
      await registry.addAccount({
        provider: "alpha",
        accountId: id,
        label: id,
        credential: { type: "api_key", key: `test-key-${id}` },
      });
    }
    let active = 0;
    let peak = 0;
    const results = await registry.fetchAll(async ({ account }) => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
      return success(account.label);
    });
    expect(results).toHaveLength(5);
    expect(peak).toBe(2);
  });

  it("caps the accounts fetched per provider", async () => {
    const { registry } = await createRegistry({ maxAccountsPerProvider: 2 });
    for (const id of ["a", "b", "c"]) {
      await registry.addAccount({
        provider: "alpha",
        accountId: id,
        label: id,
        credential: { type: "api_key", key: `test-key-${id}` },
      });
    }
    const results = await registry.fetchAll(async ({ account }) => success(account.label));
    expect(results.map((entry) => `${entry.provider}/${entry.account.id}`)).toEqual([
      "alpha/a",
      "alpha/b",
      "beta/default",
    ]);
  });

  it("fetches the accounts listed when it started", async () => {
    const { registry } = await createRegistry({ maxConcurrent: 1 });
    const results = await registry.fetchAll(async ({ account }) => {
      if (account.provider === "alpha") {
        await registry.addAccount({
          provider: "beta",
          accountId: "late",
          label: "Late",
          credential: { type: "api_key", key: "test-key" },
        });
      }
      return success(account.label);
    });
    expect(results.map((entry) => `${entry.provider}/${entry.account.id}`)).toEqual([
      "alpha/default",
      "beta/default",
    ]);
  });
});
