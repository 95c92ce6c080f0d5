import { normalizeManualCookieHeader } from "../browser/cookie-header.js";
import { assertNever, formatErrorMessage, MigrationError } from "../infra/errors.js";
import { isRecord } from "../infra/json-file.js";
import { CREDENTIAL_SCHEMA_VERSION, log } from "./constants.js";
import {
  inferLegacyCredentialType,
  normalizeScope,
  stripBearerPrefix,
  toEpochMs,
} from "./normalize.js";
import type { CredentialStore } from "./store.js";
import {
  type CredentialRecord,
  credentialRecordKey,
  type CredentialType,
  CurrentRecordDataSchema,
  strategyKindForCredential,
} from "./types.js";

type RecordData = Record<string, unknown>;

export type MigrationStepContext = {
  provider: string;
  /** Session cookie name of the provider, when it has one. */
  cookieName?: string;
};

export type MigrationStep = {
  from: number;
  to: number;
  describe: string;
  apply: (data: RecordData, ctx: MigrationStepContext) => RecordData;
};

export type MigrationOutcome =
  | { status: "unchanged"; record: CredentialRecord }
  | { status: "migrated"; record: CredentialRecord; from: number; to: number }
  | { status: "failed"; error: MigrationError; record: CredentialRecord };

export type MigrationReport = {
  migrated: number;
  unchanged: number;
  failed: number;
  outcomes: MigrationOutcome[];
};

function requireString(data: RecordData, field: string): string {
  const value = data[field];
  if (typeof value !== "string" || !value.trim()) {
    throw new Error(`missing ${field}`);
  }
  return value;
}

function requireCredential(data: RecordData): RecordData {
  const credential = data.credential;
  if (!isRecord(credential)) throw new Error("missing credential");
  return credential;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function legacyCredential(type: CredentialType, token: string): RecordData {
  switch (type) {
    case "oauth":
      return { type, accessToken: token };
    case "cookie_header":
      return { type, header: token };
    case "cli_session":
      return { type, path: token };
    case "api_key":
      return { type, key: token };
    default:
      return assertNever(type, "credential type");
  }
}

/** v1 legacy token account `{ label, token, added_at }` (seconds) to a typed credential. */
const legacyTokenToTypedCredential: MigrationStep = {
  from: 1,
  to: 2,
  describe: "type legacy token accounts",
  apply(data, ctx) {
    const token = requireString(data, "token").trim();
    const addedAt = optionalNumber(data.added_at);
    if (addedAt === undefined) throw new Error("missing added_at");
    const lastUsed = optionalNumber(data.last_used);
    const credential = legacyCredential(
      inferLegacyCredentialType(token, { cookieName: ctx.cookieName }),
      token,
    );
    const label = typeof data.label === "string" && data.label.trim() ? data.label.trim() : ctx.provider;
    return {
      label,
      createdAt: Math.round(addedAt * 1000),
      ...(lastUsed !== undefined ? { lastUsedAt: Math.round(lastUsed * 1000) } : {}),
      credential,
    };
  },
};

const normalizeHeadersAndBearer: MigrationStep = {
  from: 2,
  to: 3,
  describe: "normalize cookie headers and bearer tokens",
  apply(data, ctx) {
    const credential = { ...requireCredential(data) };
    if (credential.type === "cookie_header") {
      const header = normalizeManualCookieHeader(requireString(credential, "header"), {
        cookieName: ctx.cookieName,
      });
      if (!header) throw new Error("cookie header is empty after normalization");
      credential.header = header;
    } else if (credential.type === "oauth") {
      const accessToken = stripBearerPrefix(requireString(credential, "accessToken"));
      if (!accessToken) throw new Error("access token is empty after normalization");
      credential.accessToken = accessToken;
    }
    return { ...data, credential };
  },
};

const millisecondExpiryAndScopes: MigrationStep = {
  from: 3,
  to: 4,
  describe: "store expiry in ms and scopes as arrays",
  apply(data) {
    const credential = { ...requireCredential(data) };
    const expiresAt = optionalNumber(credential.expiresAt);
    if (expiresAt !== undefined) credential.expiresAt = toEpochMs(expiresAt);
    else delete credential.expiresAt;
    if ("scope" in credential) {
      const scope = normalizeScope(credential.scope);
      if (scope) credential.scope = scope;
      else delete credential.scope;
    }
    credential.schemaVersion = 4;
    return { ...data, credential };
  },
};

export const DEFAULT_MIGRATION_STEPS: readonly MigrationStep[] = [
  legacyTokenToTypedCredential,
  normalizeHeadersAndBearer,
  millisecondExpiryAndScopes,
];

/** Fewest-steps chain from `from` to `to`, or null when the table has no path. */
export function planMigration(
  steps: readonly MigrationStep[],
  from: number,
  to: number,
): MigrationStep[] | null {
  if (from === to) return [];
  const queue: Array<{ version: number; path: MigrationStep[] }> = [{ version: from, path: [] }];
  const seen = new Set<number>([from]);
  while (queue.length > 0) {
    const current = queue.shift();
    if (!current) break;
    for (const step of steps) {
      if (step.from !== current.version || step.to <= step.from || seen.has(step.to)) continue;
      const path = [...current.path, step];
      if (step.to === to) return path;
      seen.add(step.to);
      queue.push({ version: step.to, path });
    }
  }
  return null;
}

export type CredentialMigratorOptions = {
  store: CredentialStore;
  steps?: readonly MigrationStep[];
  latestVersion?: number;
  cookieNameFor?: (provider: string) => string | undefined;
  now?: () => number;
};

/**
 * Brings stored credential records to the current schema one step at a time. Each
 * step is persisted before the next runs, so an interrupted chain resumes where it
 * stopped.
 */
export class CredentialMigrator {
  private readonly store: CredentialStore;
  private readonly steps: readonly MigrationStep[];
  private readonly latestVersion: number;
  private readonly cookieNameFor: (provider: string) => string | undefined;
  private readonly now: () => number;

  constructor(opts: CredentialMigratorOptions) {
    this.store = opts.store;
    this.steps = opts.steps ?? DEFAULT_MIGRATION_STEPS;
    this.latestVersion = opts.latestVersion ?? CREDENTIAL_SCHEMA_VERSION;
    this.cookieNameFor = opts.cookieNameFor ?? (() => undefined);
    this.now = opts.now ?? Date.now;
  }

  /**
   * Migrates the stored copy of `record` when it is at least as new as `record`, so a
   * stale or repeated call resumes from what the store already holds.
   */
  async migrate(incoming: CredentialRecord): Promise<MigrationOutcome> {
    const key = credentialRecordKey(incoming);
    const { record: stored, migration } = this.store.lookup(key);
    const record = stored && stored.schemaVersion >= incoming.schemaVersion ? stored : incoming;
    const from = record.schemaVersion;
    if (migration && migration.schemaVersion > from) {
      return {
        status: "failed",
        record,
        error: new MigrationError(
          `${key} is at v${from} but its ledger records v${migration.schemaVersion}`,
          { fromVersion: from, toVersion: migration.schemaVersion },
        ),
      };
    }
    if (from === this.latestVersion) return { status: "unchanged", record };
    if (from > this.latestVersion) {
      return {
        status: "failed",
        record,
        error: new MigrationError(
          `${key} has unknown schema v${from} (latest is v${this.latestVersion})`,
          { fromVersion: from, toVersion: this.latestVersion },
        ),
      };
    }
    const plan = planMigration(this.steps, from, this.latestVersion);
    if (!plan) {
      return {
        status: "failed",
        record,
        error: new MigrationError(`no migration path from v${from} to v${this.latestVersion}`, {
          fromVersion: from,
          toVersion: this.latestVersion,
        }),
      };
    }

    const ctx: MigrationStepContext = {
      provider: record.provider,
      cookieName: this.cookieNameFor(record.provider),
    };
    let current = record;
    for (const step of plan) {
      try {
        const data = step.apply(structuredClone(current.data), ctx);
        if (step.to === this.latestVersion) {
          const validated = CurrentRecordDataSchema.safeParse(data);
          if (!validated.success) {
            throw new Error(
              validated.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
            );
          }
          const kind = strategyKindForCredential(validated.data.credential.type);
          if (kind !== current.slot) {
            throw new Error(`credential type ${validated.data.credential.type} does not fit slot ${current.slot}`);
          }
        }
        const next: CredentialRecord = { ...current, schemaVersion: step.to, data };
        await this.store.putRecord(next, { migratedAt: this.now() });
        current = next;
      } catch (err) {
        const error =
          err instanceof MigrationError
            ? err
            : new MigrationError(
                `${key} v${step.from}->v${step.to} (${step.describe}) failed: ${formatErrorMessage(err)}`,
                { cause: err, fromVersion: step.from, toVersion: step.to },
              );
        log.warn(error.message);
        return { status: "failed", error, record: current };
      }
    }
    log.debug(`migrated ${key} v${from}->v${current.schemaVersion}`);
    return { status: "migrated", record: current, from, to: current.schemaVersion };
  }

  /** Imports legacy token accounts, then migrates every stored record in order. */
  async migrateAll(): Promise<MigrationReport> {
    await this.store.importLegacyTokenAccounts(this.cookieNameFor);
    const report: MigrationReport = { migrated: 0, unchanged: 0, failed: 0, outcomes: [] };
    for (const record of this.store.listRecords()) {
      const outcome = await this.migrate(record);
      report.outcomes.push(outcome);
      report[outcome.status] += 1;
    }
    if (report.migrated > 0 || report.failed > 0) {
      log.info(
        `credential migration: ${report.migrated} migrated, ${report.unchanged} unchanged, ${report.failed} failed`,
      );
    }
    return report;
  }
}
