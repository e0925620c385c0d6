/**
 * Tests for Unified Configuration System
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { config, defineConfig, DEFAULT_RUNTIME_MODULE } from "@untagged/core";

describe("config.get and config.set", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    config.reset();
  });

  it("should read defaults when no config file is present", () => {
    expect(config.get<string>("runtimeModule")).toBe(DEFAULT_RUNTIME_MODULE);
    expect(config.get<boolean>("verbose")).toBe(false);
    expect(config.get<boolean>("color")).toBe(false);
    expect(config.getConfigFilePath()).toBeUndefined();
  });

  it("should let programmatic values win", () => {
    config.set({ verbose: true, runtimeModule: "./rt.js" });

    expect(config.get<boolean>("verbose")).toBe(true);
    expect(config.get<string>("runtimeModule")).toBe("./rt.js");
    expect(config.has("verbose")).toBe(true);
  });

  it("should keep overrides set before the first read", () => {
    config.set({ color: true });
    expect(config.getAll().color).toBe(true);
  });

  it("should forget overrides on reset()", () => {
    config.set({ runtimeModule: "./rt.js" });
    config.reset();
    expect(config.get<string>("runtimeModule")).toBe(DEFAULT_RUNTIME_MODULE);
  });
});

describe("loadConfigFromEnv", () => {
  it("should map prefixed variables to camelCase keys", () => {
    const loaded = config.loadConfigFromEnv({
      UNTAGGED_VERBOSE: "1",
      UNTAGGED_RUNTIME_MODULE: "./rt.js",
      UNTAGGED_COLOR: "false",
      UNTAGGED_DEPTH: "3",
      PATH: "/usr/bin",
    });

    expect(loaded).toEqual({
      verbose: true,
      runtimeModule: "./rt.js",
      color: false,
      depth: 3,
    });
  });

  it("should ignore unrelated variables", () => {
    expect(config.loadConfigFromEnv({ HOME: "/root" })).toEqual({});
  });
});

describe("loadConfigFromFiles", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "untagged-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    config.reset();
  });

  it("should read an rc file", () => {
    fs.writeFileSync(path.join(dir, ".untaggedrc.json"), JSON.stringify({ verbose: true }));

    expect(config.loadConfigFromFiles(dir)).toEqual({ verbose: true });
  });

  it("should read the package.json key", () => {
    fs.writeFileSync(
      path.join(dir, "package.json"),
      JSON.stringify({ name: "app", untagged: { runtimeModule: "./rt.js" } })
    );

    expect(config.loadConfigFromFiles(dir)).toEqual({ runtimeModule: "./rt.js" });
  });

  it("should skip an ES module config file", () => {
    fs.writeFileSync(path.join(dir, ".untaggedrc.mjs"), "export default { verbose: true };\n");

    expect(config.loadConfigFromFiles(dir)).toEqual({});
  });

  it("should return nothing when no file exists", () => {
    expect(config.loadConfigFromFiles(dir)).toEqual({});
  });

  it("should reject a configuration that is not an object", () => {
    const file = path.join(dir, ".untaggedrc.json");
    fs.writeFileSync(file, "[1, 2]");

    expect(() => config.loadConfigFromFiles(dir)).toThrow(
      `${file}: untagged configuration must be an object`
    );
  });
});

describe("defineConfig", () => {
  it("should return the configuration unchanged", () => {
    const cfg = { verbose: true };
    expect(defineConfig(cfg)).toBe(cfg);
  });
});
