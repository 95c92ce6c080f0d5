import { randomUUID } from "node:crypto";
import fs from "node:fs";

import lockfile from "proper-lockfile";
import { z } from "zod";

import { formatErrorMessage, extractErrorCode, MigrationError, UsagebarError } from "../infra/errors.js";
import { isRecord, loadJsonFile, saveJsonFile } from "../infra/json-file.js";
import {
  CREDENTIAL_SCHEMA_VERSION,
  CREDENTIAL_STORE_LOCK_OPTIONS,
  CREDENTIAL_STORE_VERSION,
  log,
} from "./constants.js";
import { inferLegacyCredentialType } from "./normalize.js";
import {
  type CredentialRecord,
  credentialRecordKey,
  CredentialRecordSchema,
  type CredentialStoreFile,
  type MigrationRecord,
  strategyKindForCredential,
} from "./types.js";

const MigrationRecordSchema = z.object({
  schemaVersion: z.number().int(),
  lastMigratedAt: z.number(),
});

const LegacyTokenAccountSchema = z.object({
  id: z.string().optional(),
  label: z.string(),
  token: z.string(),
  added_at: z.number(),
  last_used: z.number().nullable().optional(),
});

const LegacyTokenAccountsFileSchema = z.object({
  version: z.number().optional(),
  providers: z.record(
    z.string(),
    // Unknown keys such as active_index are dropped; every imported account is fetched.
    z.object({ accounts: z.array(LegacyTokenAccountSchema) }),
  ),
});

export type CredentialStoreOptions = {
  storePath: string;
  /** Pre-v2 token-accounts.json; imported by {@link CredentialStore.importLegacyTokenAccounts}. */
  legacyTokenAccountsPath?: string;
  now?: () => number;
};

function emptyStore(): CredentialStoreFile {
  return { version: CREDENTIAL_STORE_VERSION, records: [], migrations: {} };
}

function coerceStore(raw: unknown): CredentialStoreFile {
  if (!isRecord(raw)) return emptyStore();
  const records: CredentialRecord[] = [];
  if (Array.isArray(raw.records)) {
    for (const entry of raw.records) {
      const parsed = CredentialRecordSchema.safeParse(entry);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        log.warn("dropping unreadable credential record", { issues: parsed.error.issues.length });
      }
    }
  }
  const migrations: Record<string, MigrationRecord> = {};
  if (isRecord(raw.migrations)) {
    for (const [key, value] of Object.entries(raw.migrations)) {
      const parsed = MigrationRecordSchema.safeParse(value);
      if (parsed.success) migrations[key] = parsed.data;
    }
  }
  return {
    version: typeof raw.version === "number" ? raw.version : CREDENTIAL_STORE_VERSION,
    records,
    migrations,
  };
}

/**
 * credentials.json: one record per account credential, plus the migration ledger.
 * Every mutation reloads the file under a proper-lockfile lock and writes it atomically.
 */
export class CredentialStore {
  readonly storePath: string;
  private readonly legacyPath?: string;
  private readonly now: () => number;

  constructor(opts: CredentialStoreOptions) {
    this.storePath = opts.storePath;
    this.legacyPath = opts.legacyTokenAccountsPath;
    this.now = opts.now ?? Date.now;
  }

  read(): CredentialStoreFile {
    return coerceStore(loadJsonFile(this.storePath));
  }

  listRecords(): CredentialRecord[] {
    return this.read().records;
  }

  /** The stored record under `key` and its migration ledger entry, read together. */
  lookup(key: string): { record?: CredentialRecord; migration?: MigrationRecord } {
    const store = this.read();
    return {
      record: store.records.find((entry) => credentialRecordKey(entry) === key),
      migration: store.migrations[key],
    };
  }

  /** Runs `updater` on a fresh copy under the lock; it returns true to save. */
  async update(updater: (store: CredentialStoreFile) => boolean): Promise<CredentialStoreFile> {
    this.ensureFile();
    let release: (() => Promise<void>) | undefined;
    try {
      release = await lockfile.lock(this.storePath, CREDENTIAL_STORE_LOCK_OPTIONS);
    } catch (err) {
      throw new UsagebarError(
        "store_unavailable",
        `credential store is locked: ${formatErrorMessage(err)}`,
        { cause: err },
      );
    }
    try {
      const store = this.read();
      if (updater(store)) this.write(store);
      return store;
    } finally {
      try {
        await release();
      } catch (err) {
        log.debug("credential store unlock failed", { error: formatErrorMessage(err) });
      }
    }
  }

  /**
   * Inserts or replaces a record. Throws MigrationError when the stored record is at a
   * newer schema version than `record`.
   */
  async putRecord(record: CredentialRecord, opts: { migratedAt?: number } = {}): Promise<void> {
    const key = credentialRecordKey(record);
    await this.update((store) => {
      const index = store.records.findIndex((entry) => credentialRecordKey(entry) === key);
      const existing = index >= 0 ? store.records[index] : undefined;
      if (existing && existing.schemaVersion > record.schemaVersion) {
        throw new MigrationError(
          `refusing to downgrade ${key} from v${existing.schemaVersion} to v${record.schemaVersion}`,
          { fromVersion: existing.schemaVersion, toVersion: record.schemaVersion },
        );
      }
      if (index >= 0) store.records[index] = record;
      else store.records.push(record);
      if (opts.migratedAt !== undefined) {
        const previous = store.migrations[key];
        store.migrations[key] = {
          schemaVersion: record.schemaVersion,
          lastMigratedAt: Math.max(opts.migratedAt, previous?.lastMigratedAt ?? 0),
        };
      }
      return true;
    });
  }

  async removeAccount(provider: string, accountId: string): Promise<number> {
    let removed = 0;
    await this.update((store) => {
      const before = store.records.length;
      store.records = store.records.filter(
        (entry) => entry.provider !== provider || entry.accountId !== accountId,
      );
      removed = before - store.records.length;
      const prefix = `${provider}/${accountId}/`;
      for (const key of Object.keys(store.migrations)) {
        if (key.startsWith(prefix)) delete store.migrations[key];
      }
      return removed > 0;
    });
    return removed;
  }

  /** Stamps `lastUsedAt` on the current-version records of an account. */
  async markUsed(provider: string, accountId: string, at = this.now()): Promise<void> {
    await this.update((store) => {
      let changed = false;
      for (const entry of store.records) {
        if (entry.provider !== provider || entry.accountId !== accountId) continue;
        if (entry.schemaVersion !== CREDENTIAL_SCHEMA_VERSION) continue;
        entry.data = { ...entry.data, lastUsedAt: at };
        changed = true;
      }
      return changed;
    });
  }

  /**
   * Moves accounts from the legacy token-accounts file into this store as schema v1
   * records, then deletes the legacy file. Returns the number of imported accounts.
   */
  async importLegacyTokenAccounts(
    cookieNameFor: (provider: string) => string | undefined = () => undefined,
  ): Promise<number> {
    const legacyPath = this.legacyPath;
    if (!legacyPath || !fs.existsSync(legacyPath)) return 0;
    const parsed = LegacyTokenAccountsFileSchema.safeParse(loadJsonFile(legacyPath));
    if (!parsed.success) {
      log.warn("legacy token-accounts file is unreadable; leaving it in place", { legacyPath });
      return 0;
    }
    let imported = 0;
    await this.update((store) => {
      for (const [provider, data] of Object.entries(parsed.data.providers)) {
        for (const account of data.accounts) {
          const type = inferLegacyCredentialType(account.token, {
            cookieName: cookieNameFor(provider),
          });
          const record: CredentialRecord = {
            provider,
            accountId: account.id ?? randomUUID(),
            slot: strategyKindForCredential(type),
            schemaVersion: 1,
            data: {
              label: account.label,
              token: account.token,
              added_at: account.added_at,
              ...(typeof account.last_used === "number" ? { last_used: account.last_used } : {}),
            },
          };
          const key = credentialRecordKey(record);
          if (store.records.some((entry) => credentialRecordKey(entry) === key)) continue;
          store.records.push(record);
          imported += 1;
        }
      }
      return imported > 0;
    });
    try {
      fs.unlinkSync(legacyPath);
    } catch (err) {
      if (extractErrorCode(err) !== "ENOENT") {
        log.warn("failed to delete legacy token-accounts file after import", {
          legacyPath,
          error: formatErrorMessage(err),
        });
      }
    }
    if (imported > 0) log.info(`imported ${imported} legacy token account(s)`);
    return imported;
  }

  private ensureFile(): void {
    if (fs.existsSync(this.storePath)) return;
    saveJsonFile(this.storePath, emptyStore());
  }

  private write(store: CredentialStoreFile): void {
    saveJsonFile(this.storePath, {
      version: CREDENTIAL_STORE_VERSION,
      records: store.records,
      migrations: store.migrations,
    } satisfies CredentialStoreFile);
  }
}
