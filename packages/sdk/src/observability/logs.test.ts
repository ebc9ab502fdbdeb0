import { describe, it, expect, afterEach, vi } from "vitest";
import { Logger, formatLogLine } from "./logs.js";

describe("formatLogLine", () => {
  it("should format all fields on one line", () => {
    const line = formatLogLine({
      timestamp: "2026-01-02T03:04:05.000Z",
      level: "warn",
      event: "lookup.cache.size_warning",
      table: "car_types",
      message: "cache is large",
      details: { size: 3 },
    });

    expect(line).toBe(
      '[2026-01-02T03:04:05.000Z] [WARN] [lookup.cache.size_warning] car_types cache is large {"size":3}'
    );
  });

  it("should omit missing fields", () => {
    expect(
      formatLogLine({ timestamp: "2026-01-02T03:04:05.000Z", level: "info", event: "lookup.ready" })
    ).toBe("[2026-01-02T03:04:05.000Z] [INFO] [lookup.ready]");
  });
});

describe("Logger", () => {
  const originalDebug = process.env.LOOKUP_DEBUG;

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalDebug !== undefined) {
      process.env.LOOKUP_DEBUG = originalDebug;
    } else {
      delete process.env.LOOKUP_DEBUG;
    }
  });

  it("should route levels to console methods", () => {
    const info = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger();

    logger.info("a");
    logger.warn("b");
    logger.error("c");

    expect(info).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("should print debug lines only when LOOKUP_DEBUG is set", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const logger = new Logger();

    delete process.env.LOOKUP_DEBUG;
    logger.debug("hidden");
    process.env.LOOKUP_DEBUG = "1";
    logger.debug("shown");

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0]?.[0]).toContain("[DEBUG] [shown]");
  });

  it("should stay silent when disabled", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = new Logger();

    logger.setEnabled(false);
    logger.warn("quiet");

    expect(warn).not.toHaveBeenCalled();
  });
});
