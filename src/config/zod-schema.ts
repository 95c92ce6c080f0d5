import { z } from "zod";

import { ALLOWED_LOG_LEVELS } from "../logging/levels.js";

export const LogLevelSchema = z.enum(ALLOWED_LOG_LEVELS);

export const LoggingConfigSchema = z
  .object({
    level: LogLevelSchema.optional(),
    file: z.string().optional(),
    consoleLevel: LogLevelSchema.optional(),
    consoleStyle: z.union([z.literal("pretty"), z.literal("compact"), z.literal("json")]).optional(),
    redactSensitive: z.union([z.literal("off"), z.literal("logs")]).optional(),
    redactPatterns: z.array(z.string()).optional(),
  })
  .strict();

export const StrategyKindSchema = z.enum(["oauth", "cookie", "cli", "api_key"]);

export const SourceModeSchema = z.enum(["auto", "web", "cli", "oauth"]);

export const BrowserIdSchema = z.enum(["chrome", "edge", "brave", "arc", "chromium", "firefox"]);

export const RetryConfigSchema = z
  .object({
    attempts: z.number().int().min(1).max(10).optional(),
    minDelayMs: z.number().int().nonnegative().optional(),
    maxDelayMs: z.number().int().nonnegative().optional(),
    jitter: z.number().min(0).max(1).optional(),
  })
  .strict();

export const StrategyConfigSchema = z
  .object({
    kind: StrategyKindSchema,
    id: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
    retry: RetryConfigSchema.optional(),
  })
  .strict();

export const ProviderConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    displayName: z.string().min(1).optional(),
    strategies: z.array(StrategyConfigSchema).min(1).optional(),
    cookieDomains: z.array(z.string().min(1)).optional(),
    cookieName: z.string().min(1).optional(),
    sourceMode: SourceModeSchema.optional(),
  })
  .strict();

export const CookiesConfigSchema = z
  .object({
    stalenessMs: z.number().int().nonnegative().optional(),
    browsers: z.array(BrowserIdSchema).optional(),
    browserRoots: z.record(BrowserIdSchema, z.string()).optional(),
    maxConcurrentPerStore: z.number().int().min(1).optional(),
    lockRetry: RetryConfigSchema.optional(),
    cachePath: z.string().optional(),
  })
  .strict();

export const UsagebarSchema = z
  .object({
    logging: LoggingConfigSchema.optional(),
    providers: z.record(z.string(), ProviderConfigSchema).optional(),
    cookies: CookiesConfigSchema.optional(),
    fetch: z
      .object({
        maxConcurrent: z.number().int().min(1).optional(),
        maxAccountsPerProvider: z.number().int().min(1).optional(),
      })
      .strict()
      .optional(),
    scanner: z
      .object({
        lockTimeoutMs: z.number().int().nonnegative().optional(),
        cachePath: z.string().optional(),
        pricingPath: z.string().optional(),
      })
      .strict()
      .optional(),
    credentials: z
      .object({
        storePath: z.string().optional(),
        legacyTokenAccountsPath: z.string().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();
