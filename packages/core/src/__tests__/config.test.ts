import { mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { config } from "../config.js";

beforeEach(() => {
  config.reset();
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
  config.reset();
});

describe("config", () => {
  it("has defaults", () => {
    expect(config.get("trace")).toBe(false);
    expect(config.get("indent")).toBe(2);
    expect(config.get("log")).toBe("warn");
  });

  it("merges programmatic values", () => {
    config.set({ trace: true });
    config.set({ indent: 4 });
    expect(config.get("trace")).toBe(true);
    expect(config.get("indent")).toBe(4);
  });

  it("ignores invalid values with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    config.set({ indent: -1 });
    expect(config.get("indent")).toBe(2);
    expect(warn).toHaveBeenCalledWith('[pledge/config] WARN: ignoring config.set() key "indent": -1');
  });

  it("reads PLEDGE_* environment variables", () => {
    vi.stubEnv("PLEDGE_TRACE", "1");
    vi.stubEnv("PLEDGE_INDENT", "3");
    vi.stubEnv("PLEDGE_LOG", "debug");
    config.reset();
    expect(config.get("trace")).toBe(true);
    expect(config.get("indent")).toBe(3);
    expect(config.get("log")).toBe("debug");
  });

  it("warns about unusable environment values", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.stubEnv("PLEDGE_LOG", "loud");
    config.reset();
    expect(config.get("log")).toBe("warn");
    expect(warn).toHaveBeenCalledWith('[pledge/config] WARN: ignoring environment key "log": "loud"');
  });

  it("prefers programmatic values over the environment", () => {
    vi.stubEnv("PLEDGE_INDENT", "3");
    config.set({ indent: 6 });
    expect(config.get("indent")).toBe(6);
  });

  it("reset drops programmatic values", () => {
    config.set({ log: "silent" });
    config.reset();
    expect(config.get("log")).toBe("warn");
  });
});

describe("config files", () => {
  const home = process.cwd();
  let dir = "";

  beforeEach(() => {
    dir = realpathSync(mkdtempSync(join(tmpdir(), "pledge-config-")));
    process.chdir(dir);
  });

  afterEach(() => {
    process.chdir(home);
    rmSync(dir, { recursive: true, force: true });
  });

  it("finds nothing without printing a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    config.reset();
    expect(config.get("indent")).toBe(2);
    expect(config.getConfigFilePath()).toBeUndefined();
    expect(warn).not.toHaveBeenCalled();
  });

  it("reads .pledgerc.json", () => {
    writeFileSync(join(dir, ".pledgerc.json"), JSON.stringify({ indent: 4, trace: true }));
    config.reset();
    expect(config.get("indent")).toBe(4);
    expect(config.get("trace")).toBe(true);
    expect(config.getConfigFilePath()).toBe(join(dir, ".pledgerc.json"));
  });

  it("reads the pledge key of package.json", () => {
    writeFileSync(join(dir, "package.json"), JSON.stringify({ name: "fixture", pledge: { log: "debug" } }));
    config.reset();
    expect(config.get("log")).toBe("debug");
    expect(config.getConfigFilePath()).toBe(join(dir, "package.json"));
  });

  it("lets the environment override a file", () => {
    writeFileSync(join(dir, ".pledgerc.json"), JSON.stringify({ indent: 4 }));
    vi.stubEnv("PLEDGE_INDENT", "3");
    config.reset();
    expect(config.get("indent")).toBe(3);
  });

  it("drops invalid file values with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    writeFileSync(join(dir, ".pledgerc.json"), JSON.stringify({ indent: "wide", log: "info" }));
    config.reset();
    expect(config.get("indent")).toBe(2);
    expect(config.get("log")).toBe("info");
    expect(warn).toHaveBeenCalledWith(
      `[pledge/config] WARN: ignoring ${join(dir, ".pledgerc.json")} key "indent": "wide"`,
    );
  });
});
