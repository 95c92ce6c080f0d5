import fs from "node:fs";

import JSON5 from "json5";

import { ConfigValidationError } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { resolveConfigPath } from "./paths.js";
import type { UsagebarConfig } from "./types.js";
import { validateConfigObject } from "./validation.js";

const log = createSubsystemLogger("config");

export type ParseConfigJson5Result = { ok: true; parsed: unknown } | { ok: false; error: string };

export type ConfigIoDeps = {
  fs?: Pick<typeof fs, "existsSync" | "readFileSync" | "statSync">;
  json5?: { parse: (value: string) => unknown };
  env?: NodeJS.ProcessEnv;
  configPath?: string;
};

export function parseConfigJson5(
  raw: string,
  json5: { parse: (value: string) => unknown } = JSON5,
): ParseConfigJson5Result {
  try {
    return { ok: true, parsed: json5.parse(raw) };
  } catch (err) {
    return { ok: false, error: String(err) };
  }
}

export function createConfigIO(overrides: ConfigIoDeps = {}) {
  const deps = {
    fs: overrides.fs ?? fs,
    json5: overrides.json5 ?? JSON5,
    env: overrides.env ?? process.env,
  };
  const configPath = overrides.configPath ?? resolveConfigPath(deps.env);

  /**
   * Missing file means "all defaults". A file that fails to parse or validate throws
   * ConfigValidationError, since silently dropping a provider table would disable fetches.
   */
  function loadConfig(): UsagebarConfig {
    if (!deps.fs.existsSync(configPath)) return {};
    const raw = deps.fs.readFileSync(configPath, "utf-8");
    const parsed = parseConfigJson5(raw, deps.json5);
    if (!parsed.ok) {
      log.error(`failed to parse ${configPath}`, { error: parsed.error });
      throw new ConfigValidationError(configPath, `- <root>: JSON5 parse failed: ${parsed.error}`);
    }
    const validated = validateConfigObject(parsed.parsed ?? {});
    if (!validated.ok) {
      const details = validated.issues
        .map((iss) => `- ${iss.path || "<root>"}: ${iss.message}`)
        .join("\n");
      log.error(`invalid config at ${configPath}`, { issues: validated.issues.length });
      throw new ConfigValidationError(configPath, details);
    }
    return validated.config;
  }

  return { configPath, loadConfig };
}

type ConfigCacheEntry = { configPath: string; mtimeMs: number; config: UsagebarConfig };

let configCache: ConfigCacheEntry | null = null;

export function clearConfigCache(): void {
  configCache = null;
}

/** Loads the active config file, re-reading only when its mtime changes. */
export function loadConfig(overrides: ConfigIoDeps = {}): UsagebarConfig {
  const io = createConfigIO(overrides);
  const statFs = overrides.fs ?? fs;
  const mtimeMs = statFs.existsSync(io.configPath) ? statFs.statSync(io.configPath).mtimeMs : -1;
  const cached = configCache;
  if (cached && cached.configPath === io.configPath && cached.mtimeMs === mtimeMs) {
    return cached.config;
  }
  const config = io.loadConfig();
  configCache = { configPath: io.configPath, mtimeMs, config };
  return config;
}
