import { describe, it, expect } from "vitest";

import { createLogger, formatLogLine, parseLogLevel, resolveLogLevel, type LogLevel } from "../logger.js";

describe("logger", () => {
  const epoch = () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

  it("should format lines with an ISO timestamp and level", () => {
    expect(formatLogLine("warn", "disk nearly full", epoch())).toBe(
      "[2024-01-02T03:04:05.000Z] [WARN] disk nearly full",
    );
  });

  it("should drop messages below the configured level", () => {
    const written: Array<[LogLevel, string]> = [];
    const log = createLogger({ level: "info", now: epoch, write: (line, level) => written.push([level, line]) });

    log.debug("hidden");
    log.info("shown");
    log.error("also shown");

    expect(written).toEqual([
      ["info", "[2024-01-02T03:04:05.000Z] [INFO] shown"],
      ["error", "[2024-01-02T03:04:05.000Z] [ERROR] also shown"],
    ]);
  });

  it("should write everything at debug level", () => {
    const written: string[] = [];
    const log = createLogger({ level: "debug", now: epoch, write: (line) => written.push(line) });

    log.debug("a");
    log.warn("b");

    expect(written).toEqual(["[2024-01-02T03:04:05.000Z] [DEBUG] a", "[2024-01-02T03:04:05.000Z] [WARN] b"]);
  });

  it("should parse level names case-insensitively", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel(" warn ")).toBe("warn");
    expect(parseLogLevel("verbose")).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });

  it("should let --verbose win over the environment", () => {
    expect(resolveLogLevel(true, { GITSYNC_LOG_LEVEL: "error" })).toBe("debug");
    expect(resolveLogLevel(undefined, { GITSYNC_LOG_LEVEL: "error" })).toBe("error");
    expect(resolveLogLevel(false, {})).toBe("info");
  });
});
