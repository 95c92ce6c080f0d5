import fs from "node:fs";
import path from "node:path";

import { Logger as TsLogger } from "tslog";

import { resolveStateDir } from "../config/paths.js";
import type { LoggingConfig } from "../config/types.js";
import { readLoggingConfig } from "./config.js";
import { type LogLevel, levelToMinLevel, parseLogLevel } from "./levels.js";
import { loggingState } from "./state.js";

const LOG_PREFIX = "usagebar";
const LOG_SUFFIX = ".log";
const LOG_RETENTION_DAYS = 3;
const DAY_MS = 24 * 60 * 60 * 1000;

export type LoggerSettings = LoggingConfig;

export type LogObj = { date?: Date } & Record<string, unknown>;

export type LoggerResolvedSettings = {
  level: LogLevel;
  file: string;
};

export function resolveLoggingConfig(): LoggingConfig | undefined {
  return loggingState.overrideSettings ?? readLoggingConfig();
}

/** `<state dir>/logs/usagebar-YYYY-MM-DD.log`, one file per local day. */
export function rollingLogPath(now: Date = new Date(), dir = path.join(resolveStateDir(), "logs")): string {
  const day = [
    now.getFullYear(),
    String(now.getMonth() + 1).padStart(2, "0"),
    String(now.getDate()).padStart(2, "0"),
  ].join("-");
  return path.join(dir, `${LOG_PREFIX}-${day}${LOG_SUFFIX}`);
}

function isRollingLogName(name: string): boolean {
  return new RegExp(`^${LOG_PREFIX}-\\d{4}-\\d{2}-\\d{2}\\${LOG_SUFFIX}$`).test(name);
}

function pruneRollingLogs(dir: string, now = Date.now()): void {
  const cutoff = now - LOG_RETENTION_DAYS * DAY_MS;
  let names: string[];
  try {
    names = fs.readdirSync(dir);
  } catch {
    return;
  }
  for (const name of names) {
    if (!isRollingLogName(name)) continue;
    const fullPath = path.join(dir, name);
    try {
      if (fs.statSync(fullPath).mtimeMs < cutoff) fs.rmSync(fullPath, { force: true });
    } catch {
      // raced with another process
    }
  }
}

function resolveSettings(): LoggerResolvedSettings {
  const cfg = resolveLoggingConfig();
  return {
    level: parseLogLevel(cfg?.level) ?? "info",
    file: cfg?.file ?? rollingLogPath(),
  };
}

function buildLogger(settings: LoggerResolvedSettings): TsLogger<LogObj> {
  const logger = new TsLogger<LogObj>({
    name: LOG_PREFIX,
    minLevel: levelToMinLevel(settings.level),
    type: "hidden",
  });
  if (settings.level === "silent") return logger;

  const dir = path.dirname(settings.file);
  fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  if (isRollingLogName(path.basename(settings.file))) pruneRollingLogs(dir);
  logger.attachTransport((logObj) => {
    const time = (logObj.date ?? new Date()).toISOString();
    try {
      fs.appendFileSync(settings.file, `${JSON.stringify({ ...logObj, time })}\n`, {
        encoding: "utf8",
        mode: 0o600,
      });
    } catch {
      // file sink errors are dropped
    }
  });
  return logger;
}

export function getLogger(): TsLogger<LogObj> {
  const settings = resolveSettings();
  const cached = loggingState.cachedLogger;
  const previous = loggingState.cachedSettings;
  if (cached && previous && previous.level === settings.level && previous.file === settings.file) {
    return cached;
  }
  const logger = buildLogger(settings);
  loggingState.cachedLogger = logger;
  loggingState.cachedSettings = settings;
  return logger;
}

/** File logger tagged with `{ subsystem }`; messages arrive already redacted. */
export function getSubsystemFileLogger(subsystem: string): TsLogger<LogObj> {
  const name = JSON.stringify({ subsystem });
  return getLogger().getSubLogger({ name, prefix: [name] });
}

export function setLoggerOverride(settings: LoggerSettings | null): void {
  loggingState.overrideSettings = settings;
  loggingState.cachedLogger = null;
  loggingState.cachedSettings = null;
  loggingState.cachedConsoleSettings = null;
}

export function resetLogger(): void {
  setLoggerOverride(null);
}
