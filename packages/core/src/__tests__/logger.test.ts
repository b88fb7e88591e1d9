import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config, createLogger, currentLogLevel } from "../index.js";

describe("createLogger", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    config.reset();
  });

  it("should prefix messages with scope and level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createLogger("reduce").warn("cap reached", 42);
    expect(warn).toHaveBeenCalledWith("[smartnumber/reduce] WARN: cap reached", 42);
  });

  it("should drop messages below the default warn level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const log = createLogger("parse");
    log.debug("hidden");
    log.info("hidden");
    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
  });

  it("should follow logLevel changes at call time", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = createLogger("parse");
    config.set({ logLevel: "debug" });
    log.debug("shown");
    expect(debug).toHaveBeenCalledWith("[smartnumber/parse] DEBUG: shown");
  });

  it("should silence everything when off", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    config.set({ logLevel: "off" });
    createLogger("x").error("hidden");
    expect(error).not.toHaveBeenCalled();
  });

  it("should keep errors at the error level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    config.set({ logLevel: "error" });
    const log = createLogger("x");
    log.warn("hidden");
    log.error("shown");
    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("[smartnumber/x] ERROR: shown");
  });
});

describe("currentLogLevel", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  it("should read the configured level", () => {
    config.set({ logLevel: "info" });
    expect(currentLogLevel()).toBe("info");
  });

  it("should fall back to warn for unknown levels", () => {
    vi.stubEnv("SMARTNUMBER_LOG_LEVEL", "toString");
    expect(currentLogLevel()).toBe("warn");
  });
});
