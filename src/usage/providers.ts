import fs from "node:fs";

import { z } from "zod";

import { DEFAULT_STRATEGY_RETRY, defaultTimeoutForStrategy } from "../config/defaults.js";
import type { ProviderConfig, StrategyConfig, UsagebarConfig } from "../config/types.js";
import { SourceModeSchema, StrategyConfigSchema } from "../config/zod-schema.js";
import { UsagebarError } from "../infra/errors.js";
import { resolveRetryConfig } from "../infra/retry.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { AuthStrategy, Provider } from "./types.js";

const log = createSubsystemLogger("usage/providers");

const DEFAULT_TABLE_URL = new URL("./default-providers.json", import.meta.url);

const ProviderDefinitionSchema = z
  .object({
    id: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/),
    displayName: z.string().min(1),
    enabled: z.boolean(),
    strategies: z.array(StrategyConfigSchema).min(1),
    cookieDomains: z.array(z.string().min(1)).optional(),
    cookieName: z.string().min(1).optional(),
    sourceMode: SourceModeSchema.optional(),
  })
  .strict();

const ProviderTableSchema = z.object({ providers: z.array(ProviderDefinitionSchema) }).strict();

export type ProviderDefinition = z.infer<typeof ProviderDefinitionSchema>;

let defaultTable: ProviderDefinition[] | null = null;

/** Built-in provider table shipped beside this module. */
export function loadDefaultProviderTable(): ProviderDefinition[] {
  if (defaultTable) return defaultTable;
  const raw: unknown = JSON.parse(fs.readFileSync(DEFAULT_TABLE_URL, "utf8"));
  const parsed = ProviderTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UsagebarError(
      "invalid_config",
      `default provider table is invalid: ${parsed.error.issues.map((iss) => iss.path.join(".")).join(", ")}`,
    );
  }
  defaultTable = parsed.data.providers;
  return defaultTable;
}

function resolveStrategy(providerId: string, strategy: StrategyConfig): AuthStrategy {
  return Object.freeze({
    kind: strategy.kind,
    id: strategy.id ?? `${providerId}.${strategy.kind}`,
    timeoutMs: strategy.timeoutMs ?? defaultTimeoutForStrategy(strategy.kind),
    retry: Object.freeze(resolveRetryConfig(DEFAULT_STRATEGY_RETRY, strategy.retry)),
  });
}

function freezeProvider(
  id: string,
  base: Omit<ProviderDefinition, "id"> | undefined,
  override: ProviderConfig | undefined,
): Provider | null {
  const strategies = override?.strategies ?? base?.strategies;
  if (!strategies || strategies.length === 0) return null;
  const resolved = strategies.map((strategy) => resolveStrategy(id, strategy));
  const ids = new Set(resolved.map((strategy) => strategy.id));
  if (ids.size !== resolved.length) {
    throw new UsagebarError("invalid_config", `provider ${id} declares duplicate strategy ids`);
  }
  const cookieName = override?.cookieName ?? base?.cookieName;
  return Object.freeze({
    id,
    displayName: override?.displayName ?? base?.displayName ?? id,
    enabled: override?.enabled ?? base?.enabled ?? false,
    strategies: Object.freeze(resolved),
    cookieDomains: Object.freeze([...(override?.cookieDomains ?? base?.cookieDomains ?? [])]),
    sourceMode: override?.sourceMode ?? base?.sourceMode ?? "auto",
    ...(cookieName ? { cookieName } : {}),
  });
}

/**
 * Merges user provider config over the built-in table. Built-in order comes first,
 * then user-only providers in config order. The result is frozen.
 */
export function resolveProviders(
  cfg: UsagebarConfig = {},
  defaults: readonly ProviderDefinition[] = loadDefaultProviderTable(),
): readonly Provider[] {
  const overrides = cfg.providers ?? {};
  const providers: Provider[] = [];
  const seen = new Set<string>();
  for (const definition of defaults) {
    seen.add(definition.id);
    const override = overrides[definition.id];
    const provider = freezeProvider(definition.id, definition, override);
    if (provider) providers.push(provider);
  }
  for (const [id, override] of Object.entries(overrides)) {
    if (seen.has(id)) continue;
    const provider = freezeProvider(id, undefined, override);
    if (!provider) {
      log.warn(`ignoring provider "${id}": unknown provider without strategies`);
      continue;
    }
    providers.push(provider);
  }
  return Object.freeze(providers);
}

export function findProvider(providers: readonly Provider[], id: string): Provider | undefined {
  return providers.find((provider) => provider.id === id);
}
