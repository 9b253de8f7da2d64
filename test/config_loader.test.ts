import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { DEFAULT_CONFIG } from "../src/config/defaults.js";
import { applyEnvOverrides, deepMerge, loadConfig } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";
import { isBridgeError } from "../src/core/errors.js";
import { tmpDir } from "./helpers.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../config");

describe("config loader", () => {
  it("ships a base.yaml identical to the built-in defaults", () => {
    expect(loadConfig(undefined, CONFIG_DIR, {})).toEqual(DEFAULT_CONFIG);
  });

  it("merges an environment layer over base", () => {
    const config = loadConfig("strict", CONFIG_DIR, {});
    expect(config.scoring.publication_threshold).toBe(0.8);
    expect(config.scoring.staleness_window_days).toBe(30);
    expect(config.publisher.generate_description).toBe(false);
    // untouched keys survive
    expect(config.scoring.weight_docs).toBe(0.3);
    expect(config.publisher.redact_secrets).toBe(true);
  });

  it("returns base config when the env layer does not exist", () => {
    expect(loadConfig("nonexistent-env", CONFIG_DIR, {})).toEqual(DEFAULT_CONFIG);
  });

  it("applies BRIDGE_ environment variables last", () => {
    const config = loadConfig("strict", CONFIG_DIR, {
      BRIDGE_PROJECT_ID: "lab",
      BRIDGE_SCORING__PUBLICATION_THRESHOLD: "0.75",
      BRIDGE_PUBLISHER__REDACT_SECRETS: "false",
      BRIDGE_SCANNER__TEST_DIRS: "spec, checks",
      UNRELATED: "ignored",
    });
    expect(config.project_id).toBe("lab");
    expect(config.scoring.publication_threshold).toBe(0.75);
    expect(config.publisher.redact_secrets).toBe(false);
    expect(config.scanner.test_dirs).toEqual(["spec", "checks"]);
  });

  it("throws CONFIG_INVALID for values the schema rejects", () => {
    let caught: unknown;
    try {
      loadConfig(undefined, CONFIG_DIR, { BRIDGE_SCORING__PUBLICATION_THRESHOLD: "high" });
    } catch (e) {
      caught = e;
    }
    expect(isBridgeError(caught, "CONFIG_INVALID")).toBe(true);
  });

  describe("custom directories", () => {
    let dir: string;

    beforeEach(() => {
      dir = tmpDir("config");
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("falls back to defaults when the directory has no base.yaml", () => {
      expect(loadConfig(undefined, dir, {})).toEqual(DEFAULT_CONFIG);
    });

    it("reads .yml layers", () => {
      fs.writeFileSync(path.join(dir, "dev.yml"), "project_id: lab\n");
      expect(loadConfig("dev", dir, {}).project_id).toBe("lab");
    });

    it("rejects a layer that is not a mapping", () => {
      fs.writeFileSync(path.join(dir, "base.yaml"), "- just\n- a list\n");
      expect(() => loadConfig(undefined, dir, {})).toThrow(/not a mapping/);
    });

    it("rejects unknown keys", () => {
      fs.writeFileSync(path.join(dir, "base.yaml"), "scoring:\n  weight_vibes: 1\n");
      expect(() => loadConfig(undefined, dir, {})).toThrow(/Invalid configuration/);
    });
  });
});

describe("deepMerge", () => {
  it("merges nested objects and replaces arrays", () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] }, d: 1 }, { a: { c: [3] }, e: 2 })).toEqual({ a: { b: 1, c: [3] }, d: 1, e: 2 });
  });

  it("ignores null and undefined overrides", () => {
    expect(deepMerge({ a: 1 }, { a: null, b: undefined })).toEqual({ a: 1 });
  });
});

describe("applyEnvOverrides", () => {
  it("coerces numbers and booleans", () => {
    expect(applyEnvOverrides({ x: { n: 1, flag: true } }, { BRIDGE_X__N: "2.5", BRIDGE_X__FLAG: "false" })).toEqual({
      x: { n: 2.5, flag: false },
    });
  });
});

describe("config validator", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: null });
  });

  it("rejects a missing section", () => {
    const { publisher: _omit, ...rest } = DEFAULT_CONFIG;
    expect(validateConfig(rest).valid).toBe(false);
  });
});
