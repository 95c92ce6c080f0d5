import { type LogLevel, parseLogLevel } from "./levels.js";
import { resolveLoggingConfig } from "./logger.js";
import { loggingState } from "./state.js";

export type ConsoleStyle = "pretty" | "compact" | "json";
export type ConsoleLoggerSettings = {
  level: LogLevel;
  style: ConsoleStyle;
};

function resolveConsoleSettings(): ConsoleLoggerSettings {
  const cfg = resolveLoggingConfig();
  return {
    level: parseLogLevel(cfg?.consoleLevel) ?? "warn",
    style: cfg?.consoleStyle ?? (process.stderr.isTTY ? "pretty" : "compact"),
  };
}

export function getConsoleSettings(): ConsoleLoggerSettings {
  const settings = resolveConsoleSettings();
  const cached = loggingState.cachedConsoleSettings;
  if (cached && cached.level === settings.level && cached.style === settings.style) return cached;
  loggingState.cachedConsoleSettings = settings;
  return settings;
}

function normalizeFilter(filters: readonly string[]): string[] | null {
  const normalized = filters.map((value) => value.trim()).filter((value) => value.length > 0);
  return normalized.length > 0 ? normalized : null;
}

export function setConsoleSubsystemFilter(filters?: readonly string[] | null): void {
  loggingState.consoleSubsystemFilter = filters ? normalizeFilter(filters) : null;
}

/** `cost` matches `cost` and `cost/scanner`. USAGEBAR_LOG_SUBSYSTEMS applies when no filter is set. */
export function shouldLogSubsystemToConsole(subsystem: string): boolean {
  const filter =
    loggingState.consoleSubsystemFilter ??
    normalizeFilter((process.env.USAGEBAR_LOG_SUBSYSTEMS ?? "").split(","));
  if (!filter) return true;
  return filter.some((prefix) => subsystem === prefix || subsystem.startsWith(`${prefix}/`));
}
