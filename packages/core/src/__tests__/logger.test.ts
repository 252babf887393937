import { afterEach, describe, expect, it, vi } from "vitest";
import { config } from "../config.js";
import { createLogger, trace } from "../logger.js";

function spyConsole() {
  return {
    error: vi.spyOn(console, "error").mockImplementation(() => {}),
    warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
    info: vi.spyOn(console, "info").mockImplementation(() => {}),
    debug: vi.spyOn(console, "debug").mockImplementation(() => {}),
  };
}

afterEach(() => {
  vi.restoreAllMocks();
  config.reset();
});

describe("createLogger", () => {
  it("prints warnings and errors at the default level", () => {
    const out = spyConsole();
    const log = createLogger("demo");
    log.error("e");
    log.warn("w");
    log.info("i");
    log.debug("d");
    expect(out.error).toHaveBeenCalledWith("[pledge/demo] ERROR: e");
    expect(out.warn).toHaveBeenCalledWith("[pledge/demo] WARN: w");
    expect(out.info).not.toHaveBeenCalled();
    expect(out.debug).not.toHaveBeenCalled();
  });

  it("follows the configured level", () => {
    const out = spyConsole();
    const log = createLogger("demo");
    config.set({ log: "debug" });
    log.debug("d");
    config.set({ log: "silent" });
    log.error("e");
    expect(out.debug).toHaveBeenCalledWith("[pledge/demo] DEBUG: d");
    expect(out.error).not.toHaveBeenCalled();
  });
});

describe("trace", () => {
  it("does nothing, not even build the message, when tracing is off", () => {
    const out = spyConsole();
    const message = vi.fn(() => "m");
    config.set({ log: "debug" });
    trace("demo", message);
    expect(message).not.toHaveBeenCalled();
    expect(out.debug).not.toHaveBeenCalled();
  });

  it("logs at debug level when tracing is on", () => {
    const out = spyConsole();
    config.set({ trace: true, log: "debug" });
    trace("demo", () => "step");
    expect(out.debug).toHaveBeenCalledWith("[pledge/demo] DEBUG: step");
  });

  it("is still filtered by the log level", () => {
    const out = spyConsole();
    config.set({ trace: true });
    trace("demo", () => "step");
    expect(out.debug).not.toHaveBeenCalled();
  });
});
