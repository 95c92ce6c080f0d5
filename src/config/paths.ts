import os from "node:os";
import path from "node:path";

const STATE_DIRNAME = ".usagebar";
const CONFIG_FILENAME = "usagebar.json";

export function resolveUserPath(input: string, homedir: () => string = os.homedir): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith("~")) {
    const expanded = trimmed.replace(/^~(?=$|[\\/])/, homedir());
    return path.resolve(expanded);
  }
  return path.resolve(trimmed);
}

/**
 * State directory for mutable data (credentials, caches).
 * Can be overridden via USAGEBAR_STATE_DIR.
 * Default: ~/.usagebar
 */
export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.USAGEBAR_STATE_DIR?.trim();
  if (override) return resolveUserPath(override, homedir);
  return path.join(homedir(), STATE_DIRNAME);
}

/**
 * Config file path (JSON5).
 * Can be overridden via USAGEBAR_CONFIG_PATH.
 * Default: ~/.usagebar/usagebar.json (or $USAGEBAR_STATE_DIR/usagebar.json)
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  stateDir: string = resolveStateDir(env, os.homedir),
): string {
  const override = env.USAGEBAR_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override);
  return path.join(stateDir, CONFIG_FILENAME);
}

export function resolveCacheDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveStateDir(env), "cache");
}
