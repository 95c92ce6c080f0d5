import { z } from "zod";

import { StrategyKindSchema } from "../config/zod-schema.js";
import type { StrategyKind } from "../config/types.js";
import { assertNever } from "../infra/errors.js";

export const OAuthCredentialSchema = z.object({
  type: z.literal("oauth"),
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).optional(),
  accountId: z.string().optional(),
  scope: z.array(z.string()).optional(),
  expiresAt: z.number().optional(),
  schemaVersion: z.number().int(),
});

export const CookieHeaderCredentialSchema = z.object({
  type: z.literal("cookie_header"),
  header: z.string().min(1),
  expiresAt: z.number().optional(),
  schemaVersion: z.number().int(),
});

export const ApiKeyCredentialSchema = z.object({
  type: z.literal("api_key"),
  key: z.string().min(1),
  expiresAt: z.number().optional(),
  schemaVersion: z.number().int(),
});

export const CliSessionCredentialSchema = z.object({
  type: z.literal("cli_session"),
  path: z.string().min(1),
  profile: z.string().optional(),
  expiresAt: z.number().optional(),
  schemaVersion: z.number().int(),
});

export const CredentialSchema = z.discriminatedUnion("type", [
  OAuthCredentialSchema,
  CookieHeaderCredentialSchema,
  ApiKeyCredentialSchema,
  CliSessionCredentialSchema,
]);

export type OAuthCredential = z.infer<typeof OAuthCredentialSchema>;
export type CookieHeaderCredential = z.infer<typeof CookieHeaderCredentialSchema>;
export type ApiKeyCredential = z.infer<typeof ApiKeyCredentialSchema>;
export type CliSessionCredential = z.infer<typeof CliSessionCredentialSchema>;
export type Credential = z.infer<typeof CredentialSchema>;
export type CredentialType = Credential["type"];

export const CREDENTIAL_TYPE_FOR_STRATEGY = {
  oauth: "oauth",
  cookie: "cookie_header",
  cli: "cli_session",
  api_key: "api_key",
} as const satisfies Record<StrategyKind, CredentialType>;

export function strategyKindForCredential(type: CredentialType): StrategyKind {
  switch (type) {
    case "oauth":
      return "oauth";
    case "cookie_header":
      return "cookie";
    case "cli_session":
      return "cli";
    case "api_key":
      return "api_key";
    default:
      return assertNever(type, "credential type");
  }
}

/** Payload of a record at the current schema version. */
export const CurrentRecordDataSchema = z.object({
  label: z.string(),
  createdAt: z.number(),
  lastUsedAt: z.number().optional(),
  credential: CredentialSchema,
});

export type CurrentRecordData = z.infer<typeof CurrentRecordDataSchema>;

/**
 * One credential of one account as persisted. `data` has the shape of its
 * `schemaVersion`; only current records are typed as {@link CurrentRecordData}.
 */
export const CredentialRecordSchema = z.object({
  provider: z.string().min(1),
  accountId: z.string().min(1),
  slot: StrategyKindSchema,
  schemaVersion: z.number().int().min(1),
  data: z.record(z.string(), z.unknown()),
});

export type CredentialRecord = z.infer<typeof CredentialRecordSchema>;

export type MigrationRecord = {
  schemaVersion: number;
  lastMigratedAt: number;
};

export type CredentialStoreFile = {
  version: number;
  records: CredentialRecord[];
  /** Keyed by {@link credentialRecordKey}. */
  migrations: Record<string, MigrationRecord>;
};

export function credentialRecordKey(record: Pick<CredentialRecord, "provider" | "accountId" | "slot">): string {
  return `${record.provider}/${record.accountId}/${record.slot}`;
}
