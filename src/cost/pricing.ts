import fs from "node:fs";

import { z } from "zod";

import { UsagebarError } from "../infra/errors.js";
import { loadJsonFile } from "../infra/json-file.js";
import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("cost/pricing");

const DEFAULT_PRICING_URL = new URL("./pricing.json", import.meta.url);

/** Token counts of one usage event. `input` excludes cached input. */
export type TokenUsage = {
  input: number;
  output: number;
  cacheRead: number;
  cacheWrite: number;
};

const RateSchema = z.number().nonnegative();

const PriceTierSchema = z.object({
  thresholdTokens: z.number().int().positive(),
  input: RateSchema,
  output: RateSchema,
  cacheRead: RateSchema.optional(),
  cacheWrite: RateSchema.optional(),
});

const ModelPriceSchema = z.object({
  input: RateSchema,
  output: RateSchema,
  cacheRead: RateSchema.optional(),
  cacheWrite: RateSchema.optional(),
  tier: PriceTierSchema.optional(),
});

const PricingFileSchema = z.object({
  version: z.number().int().optional(),
  unit: z.string().optional(),
  models: z.record(z.string(), ModelPriceSchema),
});

/** USD per million tokens. */
export type ModelPrice = z.infer<typeof ModelPriceSchema>;

export type PricingTable = {
  models: Record<string, ModelPrice>;
};

function parsePricingFile(raw: unknown, source: string): PricingTable {
  const parsed = PricingFileSchema.safeParse(raw);
  if (!parsed.success) {
    const paths = parsed.error.issues.map((iss) => iss.path.join(".") || "<root>").join(", ");
    throw new UsagebarError("invalid_config", `pricing table ${source} is invalid: ${paths}`);
  }
  return { models: parsed.data.models };
}

let defaultPricing: PricingTable | null = null;

export function loadDefaultPricing(): PricingTable {
  if (!defaultPricing) {
    defaultPricing = parsePricingFile(JSON.parse(fs.readFileSync(DEFAULT_PRICING_URL, "utf8")), "pricing.json");
  }
  return defaultPricing;
}

/** Built-in prices, with models from `overridePath` added or replaced. */
export function loadPricingTable(overridePath?: string): PricingTable {
  const base = loadDefaultPricing();
  if (!overridePath) return base;
  const raw = loadJsonFile(overridePath);
  if (raw === undefined) {
    log.warn(`pricing override not found or unreadable: ${overridePath}`);
    return base;
  }
  const override = parsePricingFile(raw, overridePath);
  return { models: { ...base.models, ...override.models } };
}

/**
 * Canonical pricing key for a model id as logs write it:
 * `openai/gpt-5` becomes `gpt-5`, `anthropic.claude-sonnet-4-5-v1:0` becomes `claude-sonnet-4-5`.
 */
export function normalizeModelName(raw: string): string {
  let name = raw.trim().toLowerCase();
  name = name.replace(/^openai\//, "").replace(/^anthropic\./, "");
  if (name.includes("claude-")) {
    const tail = name.slice(name.lastIndexOf(".") + 1);
    if (tail.startsWith("claude-")) name = tail;
  }
  return name.replace(/-v\d+:\d+$/, "");
}

/** Longest table key that is a prefix of the normalized model name. */
export function findModelPrice(table: PricingTable, model: string): ModelPrice | undefined {
  const name = normalizeModelName(model);
  let bestKey: string | undefined;
  for (const key of Object.keys(table.models)) {
    if (!name.startsWith(key)) continue;
    if (!bestKey || key.length > bestKey.length) bestKey = key;
  }
  return bestKey === undefined ? undefined : table.models[bestKey];
}

function tiered(tokens: number, rate: number, tierRate: number | undefined, threshold: number | undefined) {
  const count = Math.max(0, tokens);
  if (threshold === undefined || tierRate === undefined) return count * rate;
  const below = Math.min(count, threshold);
  return below * rate + Math.max(0, count - threshold) * tierRate;
}

/** Estimated USD cost, or undefined when the model has no price. */
export function estimateCost(table: PricingTable, model: string | undefined, usage: TokenUsage): number | undefined {
  if (!model) return undefined;
  const price = findModelPrice(table, model);
  if (!price) return undefined;
  const tier = price.tier;
  const threshold = tier?.thresholdTokens;
  const cacheReadRate = price.cacheRead ?? price.input;
  const cacheWriteRate = price.cacheWrite ?? price.input;
  const total =
    tiered(usage.input, price.input, tier?.input, threshold) +
    tiered(usage.output, price.output, tier?.output, threshold) +
    tiered(usage.cacheRead, cacheReadRate, tier?.cacheRead, threshold) +
    tiered(usage.cacheWrite, cacheWriteRate, tier?.cacheWrite, threshold);
  if (!Number.isFinite(total)) return undefined;
  return total / 1_000_000;
}
