export const ALLOWED_LOG_LEVELS = ["silent", "fatal", "error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof ALLOWED_LOG_LEVELS)[number];

// tslog numbering: fatal=0 .. trace=5.
const TSLOG_MIN_LEVEL: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
  silent: Number.POSITIVE_INFINITY,
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const candidate = value?.trim().toLowerCase();
  return ALLOWED_LOG_LEVELS.find((level) => level === candidate);
}

export function levelToMinLevel(level: LogLevel): number {
  return TSLOG_MIN_LEVEL[level];
}

/** True when a message at `level` passes a sink configured at `threshold`. */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  if (level === "silent" || threshold === "silent") return false;
  return TSLOG_MIN_LEVEL[level] <= TSLOG_MIN_LEVEL[threshold];
}
