import fs from "node:fs";
import path from "node:path";

import { describe, expect, it, vi } from "vitest";

import { makeTempDir } from "../../test/helpers/temp-home.js";
import {
  CredentialMigrator,
  DEFAULT_MIGRATION_STEPS,
  type MigrationStep,
  planMigration,
} from "./migrations.js";
import { CredentialStore } from "./store.js";
import type { CredentialRecord } from "./types.js";

const NOW = 1_750_000_000_000;

async function createStore() {
  const dir = await makeTempDir();
  const storePath = path.join(dir, "credentials.json");
  return { storePath, store: new CredentialStore({ storePath }) };
}

function legacyRecord(overrides: Partial<CredentialRecord> = {}): CredentialRecord {
  return {
    provider: "claude",
    accountId: "a1",
    slot: "cookie",
    schemaVersion: 1,
    data: { label: "Work", token: "abc123", added_at: 1_700_000_000 },
    ...overrides,
  };
}

const cookieNameFor = (provider: string) => (provider === "claude" ? "sessionKey" : undefined);

describe("planMigration", () => {
  it("chooses the shortest chain", () => {
    const shortcut: MigrationStep = { from: 1, to: 3, describe: "shortcut", apply: (data) => data };
    const plan = planMigration([...DEFAULT_MIGRATION_STEPS, shortcut], 1, 4);
    expect(plan?.map((step) => `${step.from}->${step.to}`)).toEqual(["1->3", "3->4"]);
  });

  it("returns null without a path", () => {
    expect(planMigration(DEFAULT_MIGRATION_STEPS.slice(1), 1, 4)).toBeNull();
  });
});

describe("CredentialMigrator", () => {
  it("migrates a legacy token account to the current schema", async () => {
    const { store } = await createStore();
    await store.putRecord(legacyRecord());
    const migrator = new CredentialMigrator({ store, cookieNameFor, now: () => NOW });

    const outcome = await migrator.migrate(legacyRecord());
    expect(outcome.status).toBe("migrated");
    expect(outcome.record).toEqual({
      provider: "claude",
      accountId: "a1",
      slot: "cookie",
      schemaVersion: 4,
      data: {
        label: "Work",
        createdAt: 1_700_000_000_000,
        credential: { type: "cookie_header", header: "sessionKey=abc123", schemaVersion: 4 },
      },
    });
    expect(store.listRecords()).toEqual([outcome.record]);
    expect(store.read().migrations).toEqual({
      "claude/a1/cookie": { schemaVersion: 4, lastMigratedAt: NOW },
    });
  });

  it("strips bearer prefixes from oauth tokens", async () => {
    const { store } = await createStore();
    const migrator = new CredentialMigrator({ store, now: () => NOW });
    const outcome = await migrator.migrate(
      legacyRecord({
        provider: "claude",
        slot: "oauth",
        data: { label: "OAuth", token: "Bearer sk-ant-oat01-test", added_at: 1_700_000_000, last_used: 1_700_000_500 },
      }),
    );
    expect(outcome.record.data).toEqual({
      label: "OAuth",
      createdAt: 1_700_000_000_000,
      lastUsedAt: 1_700_000_500_000,
      credential: { type: "oauth", accessToken: "sk-ant-oat01-test", schemaVersion: 4 },
    });
  });

  it("converts second expiries and scope strings from v3 records", async () => {
    const { store } = await createStore();
    const migrator = new CredentialMigrator({ store, now: () => NOW });
    const outcome = await migrator.migrate({
      provider: "gemini",
      accountId: "g1",
      slot: "oauth",
      schemaVersion: 3,
      data: {
        label: "Gemini",
        createdAt: 1,
        credential: {
          type: "oauth",
          accessToken: "test-access",
          refreshToken: "test-refresh",
          expiresAt: 1_760_000_000,
          scope: "openid email",
        },
      },
    });
    expect(outcome).toMatchObject({ status: "migrated", from: 3, to: 4 });
    expect(outcome.record.data.credential).toEqual({
      type: "oauth",
      accessToken: "test-access",
      refreshToken: "test-refresh",
      expiresAt: 1_760_000_000_000,
      scope: ["openid", "email"],
      schemaVersion: 4,
    });
  });

  it("leaves current records untouched and is idempotent", async () => {
    const { store, storePath } = await createStore();
    const migrator = new CredentialMigrator({ store, cookieNameFor, now: () => NOW });
    const first = await migrator.migrate(legacyRecord());
    const before = fs.readFileSync(storePath, "utf8");
    const put = vi.spyOn(store, "putRecord");

    const second = await migrator.migrate(first.record);
    expect(second).toEqual({ status: "unchanged", record: first.record });
    expect(put).not.toHaveBeenCalled();
    expect(fs.readFileSync(storePath, "utf8")).toBe(before);
  });

  it("treats a repeated migration of the same legacy record as a no-op", async () => {
    const { store, storePath } = await createStore();
    await store.putRecord(legacyRecord());
    const migrator = new CredentialMigrator({ store, cookieNameFor, now: () => NOW });
    const first = await migrator.migrate(legacyRecord());
    expect(first.status).toBe("migrated");
    const before = fs.readFileSync(storePath, "utf8");

    const second = await migrator.migrate(legacyRecord());
    expect(second).toEqual({ status: "unchanged", record: first.record });
    expect(fs.readFileSync(storePath, "utf8")).toBe(before);
    expect(store.listRecords().map((record) => record.schemaVersion)).toEqual([4]);
  });

  it("continues from the stored version when handed a stale copy", async () => {
    const { store } = await createStore();
    await store.putRecord(
      legacyRecord({
        schemaVersion: 3,
        data: {
          label: "Work",
          createdAt: 1_700_000_000_000,
          credential: { type: "cookie_header", header: "sessionKey=abc123" },
        },
      }),
      { migratedAt: NOW - 1 },
    );

    const outcome = await new CredentialMigrator({ store, cookieNameFor, now: () => NOW }).migrate(
      legacyRecord(),
    );
    expect(outcome).toMatchObject({ status: "migrated", from: 3, to: 4 });
    expect(store.read().migrations["claude/a1/cookie"]).toEqual({ schemaVersion: 4, lastMigratedAt: NOW });
  });

  it("refuses a record that lags behind its ledger entry", async () => {
    const { store } = await createStore();
    await store.update((file) => {
      file.records.push(legacyRecord());
      file.migrations["claude/a1/cookie"] = { schemaVersion: 4, lastMigratedAt: NOW };
      return true;
    });
    const outcome = await new CredentialMigrator({ store, cookieNameFor }).migrate(legacyRecord());
    expect(outcome.status).toBe("failed");
    if (outcome.status !== "failed") return;
    expect([outcome.error.fromVersion, outcome.error.toVersion]).toEqual([1, 4]);
    expect(store.listRecords()[0]?.schemaVersion).toBe(1);
  });

  it("resumes from the last persisted step after a failure", async () => {
    const { store } = await createStore();
    const failing: MigrationStep[] = [
      ...DEFAULT_MIGRATION_STEPS.slice(0, 2),
      {
        from: 3,
        to: 4,
        describe: "crashes",
        apply: () => {
          throw new Error("disk yanked");
        },
      },
    ];
    const crashed = await new CredentialMigrator({ store, steps: failing, cookieNameFor }).migrate(
      legacyRecord(),
    );
    expect(crashed.status).toBe("failed");
    expect(crashed.status === "failed" ? crashed.error.kind : undefined).toBe("migration_failed");
    expect(store.listRecords()[0]?.schemaVersion).toBe(3);

    const [persisted] = store.listRecords();
    if (!persisted) throw new Error("record missing");
    const resumed = await new CredentialMigrator({ store, cookieNameFor }).migrate(persisted);
    expect(resumed).toMatchObject({ status: "migrated", from: 3, to: 4 });
    expect(store.listRecords()[0]?.schemaVersion).toBe(4);
  });

  it("refuses unknown future versions without writing", async () => {
    const { store, storePath } = await createStore();
    const outcome = await new CredentialMigrator({ store }).migrate(
      legacyRecord({ schemaVersion: 9 }),
    );
    expect(outcome.status).toBe("failed");
    expect(fs.existsSync(storePath)).toBe(false);
  });

  it("reports per-record failures without stopping the batch", async () => {
    const { store } = await createStore();
    await store.putRecord(legacyRecord());
    await store.putRecord(
      legacyRecord({ provider: "cursor", accountId: "c1", data: { label: "Broken", added_at: 1 } }),
    );
    const report = await new CredentialMigrator({ store, cookieNameFor, now: () => NOW }).migrateAll();
    expect([report.migrated, report.unchanged, report.failed]).toEqual([1, 0, 1]);
    const cursor = store.listRecords().find((record) => record.provider === "cursor");
    expect(cursor?.schemaVersion).toBe(1);
  });

  it("fails when a cookie header normalizes to nothing", async () => {
    const { store } = await createStore();
    const outcome = await new CredentialMigrator({ store }).migrate(
      legacyRecord({ provider: "cursor", data: { label: "x", token: "Cookie:", added_at: 1 } }),
    );
    expect(outcome.status).toBe("failed");
  });
});
