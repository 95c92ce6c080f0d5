import type { z } from "zod";

import type {
  BrowserIdSchema,
  CookiesConfigSchema,
  LoggingConfigSchema,
  ProviderConfigSchema,
  RetryConfigSchema,
  SourceModeSchema,
  StrategyConfigSchema,
  StrategyKindSchema,
  UsagebarSchema,
} from "./zod-schema.js";

export type UsagebarConfig = z.infer<typeof UsagebarSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type StrategyConfig = z.infer<typeof StrategyConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type CookiesConfig = z.infer<typeof CookiesConfigSchema>;

/** Authentication channel a provider can be reached through. */
export type StrategyKind = z.infer<typeof StrategyKindSchema>;
export type BrowserId = z.infer<typeof BrowserIdSchema>;
/** Which channels a provider may be fetched through; `auto` allows every strategy. */
export type SourceMode = z.infer<typeof SourceModeSchema>;

export type ConfigValidationIssue = {
  path: string;
  message: string;
};
