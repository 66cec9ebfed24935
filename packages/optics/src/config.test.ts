/**
 * Configuration Tests
 */
import { afterEach, describe, it, expect } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { config, loadConfig } from "./config.js";

function fixtureDir(files: Record<string, string>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "optikit-config-"));
  fs.writeFileSync(path.join(dir, "package.json"), JSON.stringify({ name: "fixture" }));
  for (const [name, contents] of Object.entries(files)) {
    fs.writeFileSync(path.join(dir, name), contents);
  }
  return dir;
}

afterEach(() => {
  config.reset();
});

describe("config", () => {
  it("should fall back to defaults", () => {
    const loaded = loadConfig({ searchFrom: fixtureDir({}), env: {} });
    expect(loaded).toEqual({
      debug: false,
      laws: { iterations: 100 },
      nexus: { staleAccessors: "reject" },
    });
  });

  it("should read an rc file", () => {
    const dir = fixtureDir({
      ".optikitrc.json": JSON.stringify({
        laws: { iterations: 7 },
        nexus: { staleAccessors: "warn" },
      }),
    });
    loadConfig({ searchFrom: dir, env: {} });
    expect(config.get("laws.iterations")).toBe(7);
    expect(config.get("nexus.staleAccessors")).toBe("warn");
    expect(config.getConfigFilePath()).toBe(path.join(dir, ".optikitrc.json"));
  });

  it("should read the package.json key", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "optikit-config-"));
    fs.writeFileSync(
      path.join(dir, "package.json"),
      JSON.stringify({ name: "fixture", optikit: { debug: true } }),
    );
    expect(loadConfig({ searchFrom: dir, env: {} }).debug).toBe(true);
  });

  it("should let environment variables override files", () => {
    const dir = fixtureDir({
      ".optikitrc.json": JSON.stringify({ laws: { iterations: 7 } }),
    });
    const loaded = loadConfig({
      searchFrom: dir,
      env: { OPTIKIT_LAWS_ITERATIONS: "9", OPTIKIT_NEXUS__STALEACCESSORS: "warn" },
    });
    expect(loaded.laws.iterations).toBe(9);
    expect(loaded.nexus.staleAccessors).toBe("warn");
  });

  it("should read single-digit numbers from the environment", () => {
    const loaded = loadConfig({
      searchFrom: fixtureDir({}),
      env: { OPTIKIT_LAWS_ITERATIONS: "1" },
    });
    expect(loaded.laws.iterations).toBe(1);
  });

  it("should read 1 and 0 as debug flags", () => {
    expect(
      loadConfig({ searchFrom: fixtureDir({}), env: { OPTIKIT_DEBUG: "0" } }).debug,
    ).toBe(false);
    expect(
      loadConfig({ searchFrom: fixtureDir({}), env: { OPTIKIT_DEBUG: "true" } }).debug,
    ).toBe(true);
  });

  it("should ignore values of the wrong type", () => {
    const dir = fixtureDir({
      ".optikitrc.json": JSON.stringify({ laws: { iterations: "many" } }),
    });
    const loaded = loadConfig({
      searchFrom: dir,
      env: { OPTIKIT_NEXUS__STALEACCESSORS: "explode" },
    });
    expect(loaded.laws.iterations).toBe(100);
    expect(loaded.nexus.staleAccessors).toBe("reject");
  });

  it("should let config.set override files and env", () => {
    loadConfig({ searchFrom: fixtureDir({}), env: { OPTIKIT_DEBUG: "1" } });
    expect(config.get("debug")).toBe(true);
    config.set({ debug: false, laws: { iterations: 3 } });
    expect(config.get("debug")).toBe(false);
    expect(config.get("laws.iterations")).toBe(3);
  });

  it("reset should drop programmatic overrides", () => {
    config.set({ nexus: { staleAccessors: "warn" } });
    config.reset();
    loadConfig({ searchFrom: fixtureDir({}), env: {} });
    expect(config.get("nexus.staleAccessors")).toBe("reject");
  });
});
