import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { LogLevel, createLogger, resolveMinLevel } from "../../src/core/Logger.js";

describe("resolveMinLevel", () => {
  it("prefers LOG_LEVEL, then DEBUG_LOG", () => {
    expect(resolveMinLevel({ LOG_LEVEL: "error", DEBUG_LOG: "true" })).toBe(LogLevel.ERROR);
    expect(resolveMinLevel({ DEBUG_LOG: "true", VITEST: "true" })).toBe(LogLevel.DEBUG);
  });

  it("falls back to WARN under vitest and INFO otherwise", () => {
    expect(resolveMinLevel({ LOG_LEVEL: "loud", VITEST: "true" })).toBe(LogLevel.WARN);
    expect(resolveMinLevel({})).toBe(LogLevel.INFO);
  });
});

describe("createLogger", () => {
  beforeEach(() => {
    vi.stubEnv("LOG_LEVEL", "");
    vi.stubEnv("DEBUG_LOG", "");
    vi.stubEnv("LOG_TO_FILE", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("reads DEBUG_LOG set after the logger was created", () => {
    const log = createLogger("test:logger");
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    log.debug("hidden");
    vi.stubEnv("DEBUG_LOG", "true");
    log.debug("visible");

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0]?.[0]).toMatch(/\[DEBUG\].*: visible$/);
  });

  it("reads LOG_LEVEL set after the logger was created", () => {
    const log = createLogger("test:logger");
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    vi.stubEnv("LOG_LEVEL", "error");
    log.warn("dropped");

    expect(warn).not.toHaveBeenCalled();
    expect(log.getConfig().minLevel).toBe(LogLevel.ERROR);
  });

  it("lets children follow the environment too", () => {
    const child = createLogger("test:logger").child("test:child");
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    vi.stubEnv("DEBUG_LOG", "true");
    child.debug("visible");

    expect(debug).toHaveBeenCalledTimes(1);
  });

  it("keeps an explicit level regardless of the environment", () => {
    const log = createLogger("test:logger", { minLevel: LogLevel.SILENT });
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    vi.stubEnv("DEBUG_LOG", "true");
    log.error("dropped");

    expect(error).not.toHaveBeenCalled();
  });
});
