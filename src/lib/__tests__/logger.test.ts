import { describe, it, expect, vi, afterEach } from "vitest";
import {
  configureLogger,
  createLogger,
  getLogLevel,
  initLogger,
  isLogLevel,
} from "../logger";

describe("logger", () => {
  afterEach(() => {
    configureLogger({ level: "silent" });
    vi.restoreAllMocks();
  });

  it("prefixes messages with the scope", () => {
    configureLogger({ level: "debug" });
    const debugSpy = vi.spyOn(console, "debug").mockImplementation(() => {});

    createLogger("ToastController").debug("shown", 1);

    expect(debugSpy).toHaveBeenCalledWith("[ToastController]", "shown", 1);
  });

  it("drops messages below the configured level", () => {
    configureLogger({ level: "warn" });
    const infoSpy = vi.spyOn(console, "info").mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = createLogger("Test");

    log.info("ignored");
    log.warn("kept");
    log.error("also kept");

    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith("[Test]", "kept");
    expect(errorSpy).toHaveBeenCalledWith("[Test]", "also kept");
  });

  it("silent suppresses errors too", () => {
    configureLogger({ level: "silent" });
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    createLogger("Test").error("nope");

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("falls back to warn when no level is given", () => {
    configureLogger({});
    expect(getLogLevel()).toBe("warn");
  });

  describe("initLogger", () => {
    it("reads TOAST_LOG_LEVEL", () => {
      initLogger({ TOAST_LOG_LEVEL: "info" });
      expect(getLogLevel()).toBe("info");
    });

    it("keeps the default for unknown values", () => {
      initLogger({ TOAST_LOG_LEVEL: "verbose" });
      expect(getLogLevel()).toBe("warn");
    });
  });

  it("recognizes only known levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("toString")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
