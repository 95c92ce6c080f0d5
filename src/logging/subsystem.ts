import { Chalk } from "chalk";
import type { Logger as TsLogger } from "tslog";

import { getConsoleSettings, shouldLogSubsystemToConsole } from "./console.js";
import { type LogLevel, isLevelEnabled } from "./levels.js";
import { getLogger, getSubsystemFileLogger, type LogObj } from "./logger.js";
import { redactLogMeta, redactSensitiveText } from "./redact.js";
import { loggingState } from "./state.js";

export type LogMeta = Record<string, unknown>;

export type SubsystemLogger = {
  subsystem: string;
  trace: (message: string, meta?: LogMeta) => void;
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  fatal: (message: string, meta?: LogMeta) => void;
  child: (name: string) => SubsystemLogger;
};

type ChalkInstance = InstanceType<typeof Chalk>;

// NO_COLOR wins unless FORCE_COLOR is set to something other than 0.
function consoleColor(env: NodeJS.ProcessEnv = process.env): ChalkInstance {
  const force = env.FORCE_COLOR?.trim();
  if (force && force !== "0") return new Chalk({ level: 1 });
  if (env.NO_COLOR) return new Chalk({ level: 0 });
  const term = env.TERM?.toLowerCase() ?? "";
  const capable =
    process.stderr.isTTY || Boolean(env.COLORTERM || env.TERM_PROGRAM) || (term !== "" && term !== "dumb");
  return new Chalk({ level: capable ? 1 : 0 });
}

const SUBSYSTEM_COLORS = ["cyan", "green", "yellow", "blue", "magenta"] as const;
const LEVEL_COLORS = {
  fatal: "red",
  error: "red",
  warn: "yellow",
  info: "white",
  debug: "gray",
  trace: "gray",
  silent: "gray",
} as const satisfies Record<LogLevel, string>;

function subsystemColorName(subsystem: string): (typeof SUBSYSTEM_COLORS)[number] {
  let hash = 0;
  for (const ch of subsystem) hash = (hash * 31 + ch.charCodeAt(0)) >>> 0;
  return SUBSYSTEM_COLORS[hash % SUBSYSTEM_COLORS.length];
}

/** `usage/fetch-plan/codex` prints as `fetch-plan/codex`. */
export function formatSubsystemForConsole(subsystem: string): string {
  const parts = subsystem.split("/").filter(Boolean);
  return parts.length === 0 ? subsystem : parts.slice(-2).join("/");
}

function formatMetaSuffix(meta?: LogMeta): string {
  if (!meta) return "";
  const parts: string[] = [];
  for (const [key, value] of Object.entries(meta)) {
    if (value === undefined) continue;
    const rendered =
      typeof value === "string" || typeof value === "number" || typeof value === "boolean"
        ? String(value)
        : JSON.stringify(value);
    parts.push(`${key}=${rendered}`);
  }
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

export function formatConsoleLine(opts: {
  level: LogLevel;
  subsystem: string;
  message: string;
  style: "pretty" | "compact" | "json";
  meta?: LogMeta;
  now?: Date;
}): string {
  const now = opts.now ?? new Date();
  if (opts.style === "json") {
    return JSON.stringify({
      time: now.toISOString(),
      level: opts.level,
      subsystem: opts.subsystem,
      message: opts.message,
      ...opts.meta,
    });
  }
  const shown = formatSubsystemForConsole(opts.subsystem);
  const color = consoleColor();
  const time = opts.style === "pretty" ? `${color.gray(now.toISOString().slice(11, 19))} ` : "";
  const tag = color[subsystemColorName(shown)](`[${shown}]`);
  const body = color[LEVEL_COLORS[opts.level]](opts.message);
  return `${time}${tag} ${body}${color.gray(formatMetaSuffix(opts.meta))}`;
}

function writeConsoleLine(level: LogLevel, line: string) {
  const sink = loggingState.rawConsole ?? console;
  if (level === "error" || level === "fatal") {
    sink.error(line);
  } else if (level === "warn") {
    sink.warn(line);
  } else {
    sink.log(line);
  }
}

function logToFile(fileLogger: TsLogger<LogObj>, level: LogLevel, message: string, meta?: LogMeta) {
  const args: unknown[] = meta && Object.keys(meta).length > 0 ? [meta, message] : [message];
  switch (level) {
    case "trace":
      fileLogger.trace(...args);
      return;
    case "debug":
      fileLogger.debug(...args);
      return;
    case "info":
      fileLogger.info(...args);
      return;
    case "warn":
      fileLogger.warn(...args);
      return;
    case "error":
      fileLogger.error(...args);
      return;
    case "fatal":
      fileLogger.fatal(...args);
      return;
    case "silent":
      return;
  }
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  let fileLogger: { base: TsLogger<LogObj>; sub: TsLogger<LogObj> } | null = null;
  const getFileLogger = () => {
    const base = getLogger();
    if (!fileLogger || fileLogger.base !== base) fileLogger = { base, sub: getSubsystemFileLogger(subsystem) };
    return fileLogger.sub;
  };
  const emit = (level: LogLevel, rawMessage: string, rawMeta?: LogMeta) => {
    const message = redactSensitiveText(rawMessage);
    const meta = rawMeta && Object.keys(rawMeta).length > 0 ? redactLogMeta(rawMeta) : undefined;
    logToFile(getFileLogger(), level, message, meta);
    const consoleSettings = getConsoleSettings();
    if (!isLevelEnabled(level, consoleSettings.level)) return;
    if (!shouldLogSubsystemToConsole(subsystem)) return;
    writeConsoleLine(
      level,
      formatConsoleLine({ level, subsystem, message, style: consoleSettings.style, meta }),
    );
  };

  return {
    subsystem,
    trace: (message, meta) => emit("trace", message, meta),
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
    fatal: (message, meta) => emit("fatal", message, meta),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}
