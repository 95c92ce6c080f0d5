import { afterEach, describe, expect, it, vi } from "vitest";

import { setConsoleSubsystemFilter } from "./console.js";
import { setLoggerOverride } from "./logger.js";
import { loggingState } from "./state.js";
import {
  createSubsystemLogger,
  formatConsoleLine,
  formatSubsystemForConsole,
} from "./subsystem.js";

function captureConsole() {
  const log = vi.fn();
  const warn = vi.fn();
  const error = vi.fn();
  loggingState.rawConsole = { log, warn, error };
  return { log, warn, error };
}

afterEach(() => {
  loggingState.rawConsole = null;
  setConsoleSubsystemFilter(null);
  vi.unstubAllEnvs();
});

describe("formatSubsystemForConsole", () => {
  it("keeps the last two segments", () => {
    expect(formatSubsystemForConsole("usage/fetch-plan/codex")).toBe("fetch-plan/codex");
    expect(formatSubsystemForConsole("browser/cookies")).toBe("browser/cookies");
  });
});

describe("formatConsoleLine", () => {
  it("renders json lines with meta", () => {
    const line = formatConsoleLine({
      level: "warn",
      subsystem: "browser/cookies",
      message: "db locked",
      style: "json",
      meta: { attempt: 2 },
      now: new Date("2026-01-02T03:04:05.000Z"),
    });
    expect(JSON.parse(line)).toEqual({
      time: "2026-01-02T03:04:05.000Z",
      level: "warn",
      subsystem: "browser/cookies",
      message: "db locked",
      attempt: 2,
    });
  });

  it("renders plain compact and pretty lines under NO_COLOR", () => {
    vi.stubEnv("FORCE_COLOR", "");
    vi.stubEnv("NO_COLOR", "1");
    const base = {
      level: "info" as const,
      subsystem: "usage/fetch-plan/codex",
      message: "fetched",
      meta: { ms: 12, skipped: undefined },
      now: new Date("2026-01-02T03:04:05.000Z"),
    };
    expect(formatConsoleLine({ ...base, style: "compact" })).toBe("[fetch-plan/codex] fetched ms=12");
    expect(formatConsoleLine({ ...base, style: "pretty" })).toBe(
      "03:04:05 [fetch-plan/codex] fetched ms=12",
    );
  });
});

describe("createSubsystemLogger", () => {
  it("writes redacted json lines to the console sink", () => {
    setLoggerOverride({ level: "silent", consoleLevel: "info", consoleStyle: "json" });
    const sink = captureConsole();
    const log = createSubsystemLogger("browser/cookies");
    log.info("sending Cookie: sessionKey=abcdef1234567890ghij", { provider: "claude" });
    expect(sink.log).toHaveBeenCalledTimes(1);
    const parsed: unknown = JSON.parse(String(sink.log.mock.calls[0]?.[0]));
    expect(parsed).toMatchObject({
      level: "info",
      subsystem: "browser/cookies",
      message: "sending Cookie: sessio…ghij",
      provider: "claude",
    });
  });

  it("routes errors to stderr and drops levels under the console threshold", () => {
    setLoggerOverride({ level: "silent", consoleLevel: "warn", consoleStyle: "compact" });
    const sink = captureConsole();
    const log = createSubsystemLogger("usage");
    log.info("hidden");
    log.error("boom");
    expect(sink.log).not.toHaveBeenCalled();
    expect(sink.error).toHaveBeenCalledTimes(1);
  });

  it("respects the subsystem filter for children", () => {
    setLoggerOverride({ level: "silent", consoleLevel: "debug", consoleStyle: "json" });
    setConsoleSubsystemFilter(["cost"]);
    const sink = captureConsole();
    createSubsystemLogger("cost").child("scanner").debug("scanned");
    createSubsystemLogger("usage").debug("skipped");
    expect(sink.log).toHaveBeenCalledTimes(1);
    expect(String(sink.log.mock.calls[0]?.[0])).toContain('"subsystem":"cost/scanner"');
  });
});
