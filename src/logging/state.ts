import type { Logger as TsLogger } from "tslog";

import type { ConsoleLoggerSettings } from "./console.js";
import type { LoggerResolvedSettings, LoggerSettings, LogObj } from "./logger.js";

type RawConsole = Pick<Console, "log" | "warn" | "error">;

export const loggingState: {
  cachedLogger: TsLogger<LogObj> | null;
  cachedSettings: LoggerResolvedSettings | null;
  cachedConsoleSettings: ConsoleLoggerSettings | null;
  overrideSettings: LoggerSettings | null;
  /** Subsystem prefixes shown on the console; null shows all. */
  consoleSubsystemFilter: string[] | null;
  /** Replaces `console` as the console sink. */
  rawConsole: RawConsole | null;
} = {
  cachedLogger: null,
  cachedSettings: null,
  cachedConsoleSettings: null,
  overrideSettings: null,
  consoleSubsystemFilter: null,
  rawConsole: null,
};
