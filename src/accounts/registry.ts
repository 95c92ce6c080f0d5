import { randomUUID } from "node:crypto";

import { normalizeManualCookieHeader } from "../browser/cookie-header.js";
import { DEFAULT_FETCH_MAX_CONCURRENT, DEFAULT_MAX_ACCOUNTS_PER_PROVIDER } from "../config/defaults.js";
import type { StrategyKind } from "../config/types.js";
import { CREDENTIAL_SCHEMA_VERSION } from "../credentials/constants.js";
import { stripBearerPrefix } from "../credentials/normalize.js";
import type { CredentialStore } from "../credentials/store.js";
import {
  type Credential,
  type CredentialRecord,
  CurrentRecordDataSchema,
  strategyKindForCredential,
} from "../credentials/types.js";
import { runWithConcurrency } from "../infra/concurrency.js";
import { assertNever, formatErrorMessage, isAbortError, toErrorKind, UsagebarError } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { redactSensitiveText } from "../logging/redact.js";
import type { FetchResult, Provider } from "../usage/types.js";

const log = createSubsystemLogger("accounts");

/** Id of the account synthesized for providers with no stored accounts. */
export const DEFAULT_ACCOUNT_ID = "default";

export type Account = Readonly<{
  id: string;
  provider: string;
  label: string;
  createdAt: number;
  lastUsedAt?: number;
  credentials: Readonly<Partial<Record<StrategyKind, Credential>>>;
  /** True for the synthesized default account. */
  implicit: boolean;
}>;

export type AccountFetchResult = {
  provider: string;
  account: Account;
  result: FetchResult;
};

export type AccountRunner = (target: { provider: Provider; account: Account }) => Promise<FetchResult>;

export type AccountRegistryOptions = {
  store: CredentialStore;
  providers: readonly Provider[];
  maxConcurrent?: number;
  maxAccountsPerProvider?: number;
  now?: () => number;
};

export type NewAccount = {
  provider: string;
  label: string;
  /** Credential payload; `schemaVersion` is filled in. */
  credential: DistributiveOmit<Credential, "schemaVersion">;
  accountId?: string;
};

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

type MutableAccount = {
  id: string;
  provider: string;
  label: string;
  createdAt: number;
  lastUsedAt?: number;
  credentials: Partial<Record<StrategyKind, Credential>>;
};

function implicitAccount(provider: Provider): Account {
  return Object.freeze({
    id: DEFAULT_ACCOUNT_ID,
    provider: provider.id,
    label: provider.displayName,
    createdAt: 0,
    credentials: Object.freeze({}),
    implicit: true,
  });
}

function freezeAccount(account: MutableAccount): Account {
  return Object.freeze({
    ...account,
    credentials: Object.freeze({ ...account.credentials }),
    implicit: false,
  });
}

/**
 * Accounts per provider, read from the credential store. Listings are snapshots:
 * fetches already running keep the accounts they started with.
 */
export class AccountRegistry {
  private readonly store: CredentialStore;
  private providers: readonly Provider[];
  private readonly maxConcurrent: number;
  private readonly maxAccountsPerProvider: number;
  private readonly now: () => number;

  constructor(opts: AccountRegistryOptions) {
    this.store = opts.store;
    this.providers = opts.providers;
    this.maxConcurrent = opts.maxConcurrent ?? DEFAULT_FETCH_MAX_CONCURRENT;
    this.maxAccountsPerProvider = opts.maxAccountsPerProvider ?? DEFAULT_MAX_ACCOUNTS_PER_PROVIDER;
    this.now = opts.now ?? Date.now;
  }

  setProviders(providers: readonly Provider[]): void {
    this.providers = providers;
  }

  getProvider(id: string): Provider | undefined {
    return this.providers.find((provider) => provider.id === id);
  }

  /** Flat list in provider order, then account creation order. */
  listAccounts(opts: { enabledOnly?: boolean; provider?: string } = {}): Account[] {
    const grouped = this.groupRecords(this.store.listRecords());
    const accounts: Account[] = [];
    for (const provider of this.providers) {
      if (opts.enabledOnly && !provider.enabled) continue;
      if (opts.provider && provider.id !== opts.provider) continue;
      const stored = grouped.get(provider.id);
      if (!stored || stored.length === 0) {
        accounts.push(implicitAccount(provider));
        continue;
      }
      stored.sort((a, b) => a.createdAt - b.createdAt || a.id.localeCompare(b.id));
      accounts.push(...stored.map(freezeAccount));
    }
    return accounts;
  }

  getAccount(providerId: string, accountId: string): Account | undefined {
    return this.listAccounts({ provider: providerId }).find((account) => account.id === accountId);
  }

  async addAccount(input: NewAccount): Promise<Account> {
    const provider = this.getProvider(input.provider);
    if (!provider) {
      throw new UsagebarError("invalid_config", `unknown provider "${input.provider}"`);
    }
    const credential = this.normalizeCredential(provider, input.credential);
    const accountId = input.accountId ?? randomUUID();
    const existing = this.getAccount(provider.id, accountId);
    const record: CredentialRecord = {
      provider: provider.id,
      accountId,
      slot: strategyKindForCredential(credential.type),
      schemaVersion: CREDENTIAL_SCHEMA_VERSION,
      data: {
        label: input.label.trim() || provider.displayName,
        createdAt: existing && !existing.implicit ? existing.createdAt : this.now(),
        credential,
      },
    };
    await this.store.putRecord(record);
    log.info(`added ${record.slot} credential for ${provider.id}`, { accountId });
    const added = this.getAccount(provider.id, accountId);
    if (!added) throw new UsagebarError("store_unavailable", "account vanished after write");
    return added;
  }

  async removeAccount(providerId: string, accountId: string): Promise<boolean> {
    const removed = await this.store.removeAccount(providerId, accountId);
    if (removed > 0) log.info(`removed account from ${providerId}`, { accountId });
    return removed > 0;
  }

  async markUsed(providerId: string, accountId: string): Promise<void> {
    if (accountId === DEFAULT_ACCOUNT_ID) return;
    await this.store.markUsed(providerId, accountId, this.now());
  }

  /**
   * Runs one fetch per account on a bounded pool. Results keep listing order; a runner
   * that throws only fails its own account.
   */
  async fetchAll(
    runner: AccountRunner,
    opts: { enabledOnly?: boolean; provider?: string } = {},
  ): Promise<AccountFetchResult[]> {
    const accounts = this.capPerProvider(
      this.listAccounts({ enabledOnly: opts.enabledOnly ?? true, provider: opts.provider }),
    );
    const targets: Array<{ provider: Provider; account: Account }> = [];
    for (const account of accounts) {
      const provider = this.getProvider(account.provider);
      if (provider) targets.push({ provider, account });
    }
    const settled = await runWithConcurrency(
      targets.map((target) => () => runner(target)),
      this.maxConcurrent,
    );
    return settled.map((outcome, index): AccountFetchResult => {
      const target = targets[index];
      if (outcome.status === "fulfilled") {
        return { provider: target.provider.id, account: target.account, result: outcome.value };
      }
      const reason: unknown = outcome.reason;
      if (isAbortError(reason)) {
        return {
          provider: target.provider.id,
          account: target.account,
          result: Object.freeze({ status: "cancelled", attempts: [] }),
        };
      }
      const message = redactSensitiveText(formatErrorMessage(reason));
      log.warn(`fetch crashed for ${target.provider.id}/${target.account.id}: ${message}`);
      return {
        provider: target.provider.id,
        account: target.account,
        result: Object.freeze({
          status: "failure",
          error: { kind: toErrorKind(reason), message },
          attempts: [],
        }),
      };
    });
  }

  private capPerProvider(accounts: Account[]): Account[] {
    const counts = new Map<string, number>();
    return accounts.filter((account) => {
      const count = (counts.get(account.provider) ?? 0) + 1;
      counts.set(account.provider, count);
      if (count === this.maxAccountsPerProvider + 1) {
        log.warn(`${account.provider}: only the first ${this.maxAccountsPerProvider} accounts are fetched`);
      }
      return count <= this.maxAccountsPerProvider;
    });
  }

  private normalizeCredential(
    provider: Provider,
    credential: DistributiveOmit<Credential, "schemaVersion">,
  ): Credential {
    switch (credential.type) {
      case "cookie_header": {
        const header = normalizeManualCookieHeader(credential.header, { cookieName: provider.cookieName });
        if (!header) throw new UsagebarError("invalid_config", "cookie header is empty");
        return { ...credential, header, schemaVersion: CREDENTIAL_SCHEMA_VERSION };
      }
      case "oauth":
        return {
          ...credential,
          accessToken: stripBearerPrefix(credential.accessToken),
          schemaVersion: CREDENTIAL_SCHEMA_VERSION,
        };
      case "api_key":
        return { ...credential, key: credential.key.trim(), schemaVersion: CREDENTIAL_SCHEMA_VERSION };
      case "cli_session":
        return { ...credential, schemaVersion: CREDENTIAL_SCHEMA_VERSION };
      default:
        return assertNever(credential, "credential");
    }
  }

  private groupRecords(records: CredentialRecord[]): Map<string, MutableAccount[]> {
    const byProvider = new Map<string, MutableAccount[]>();
    const byKey = new Map<string, MutableAccount>();
    for (const record of records) {
      if (record.schemaVersion !== CREDENTIAL_SCHEMA_VERSION) {
        log.debug(`skipping ${record.provider}/${record.accountId}: schema v${record.schemaVersion}`);
        continue;
      }
      const parsed = CurrentRecordDataSchema.safeParse(record.data);
      if (!parsed.success) {
        log.warn(`skipping unreadable credential ${record.provider}/${record.accountId}/${record.slot}`);
        continue;
      }
      const data = parsed.data;
      const key = `${record.provider}/${record.accountId}`;
      let account = byKey.get(key);
      if (!account) {
        account = {
          id: record.accountId,
          provider: record.provider,
          label: data.label,
          createdAt: data.createdAt,
          credentials: {},
        };
        byKey.set(key, account);
        const list = byProvider.get(record.provider) ?? [];
        list.push(account);
        byProvider.set(record.provider, list);
      }
      account.createdAt = Math.min(account.createdAt, data.createdAt);
      if (data.lastUsedAt !== undefined) {
        account.lastUsedAt = Math.max(account.lastUsedAt ?? 0, data.lastUsedAt);
      }
      account.credentials[record.slot] = data.credential;
    }
    return byProvider;
  }
}
