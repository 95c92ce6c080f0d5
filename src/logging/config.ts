import fs from "node:fs";

import json5 from "json5";

import { resolveConfigPath } from "../config/paths.js";
import type { LoggingConfig } from "../config/types.js";
import { LoggingConfigSchema } from "../config/zod-schema.js";
import { parseLogLevel } from "./levels.js";

function readLoggingBlock(configPath: string): LoggingConfig {
  let parsed: unknown;
  try {
    if (!fs.existsSync(configPath)) return {};
    parsed = json5.parse(fs.readFileSync(configPath, "utf-8"));
  } catch {
    // The full config load reports parse errors through the logger itself.
    return {};
  }
  if (!parsed || typeof parsed !== "object" || !("logging" in parsed)) return {};
  const result = LoggingConfigSchema.safeParse(parsed.logging);
  return result.success ? result.data : {};
}

/**
 * The `logging` block of the config file with USAGEBAR_LOG_LEVEL and USAGEBAR_LOG_FILE
 * applied on top. USAGEBAR_VERBOSE=1 lowers the console level to debug.
 */
export function readLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const cfg = readLoggingBlock(resolveConfigPath(env));
  const level = parseLogLevel(env.USAGEBAR_LOG_LEVEL);
  if (level) cfg.level = level;
  const file = env.USAGEBAR_LOG_FILE?.trim();
  if (file) cfg.file = file;
  if (env.USAGEBAR_VERBOSE === "1") cfg.consoleLevel = "debug";
  return cfg;
}
