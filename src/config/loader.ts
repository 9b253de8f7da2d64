import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { BridgeError, errorMessage } from "../core/errors.js";
import { packageRoot } from "../core/paths.js";
import { DEFAULT_CONFIG } from "./defaults.js";
import { isBridgeConfig, validateConfig } from "./validator.js";
import type { BridgeConfig } from "../types/config.js";

export const ENV_PREFIX = "BRIDGE_";

type Doc = Record<string, unknown>;

function isPlainObject(value: unknown): value is Doc {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Doc, override: Doc): Doc {
  const result: Doc = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isPlainObject(val)) {
      const current = result[key];
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file as an object, or an empty object if it does not exist. */
function loadYaml(filePath: string): Doc {
  if (!fs.existsSync(filePath)) return {};
  let doc: unknown;
  try {
    doc = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new BridgeError("CONFIG_INVALID", `Failed to parse ${filePath}: ${errorMessage(e)}`, { path: filePath }, { cause: e });
  }
  if (doc === null || doc === undefined) return {};
  if (!isPlainObject(doc)) {
    throw new BridgeError("CONFIG_INVALID", `Config file is not a mapping: ${filePath}`, { path: filePath });
  }
  return doc;
}

/** "0.5" → 0.5, "true" → true; arrays take comma-separated values. */
function coerceEnvValue(raw: string, current: unknown): unknown {
  if (Array.isArray(current)) {
    return raw.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
  }
  if (raw === "true") return true;
  if (raw === "false") return false;
  if (raw.trim() !== "" && /^-?\d+(\.\d+)?$/.test(raw.trim())) return Number(raw);
  return raw;
}

/**
 * Apply BRIDGE_ prefixed environment variable overrides.
 * BRIDGE_PROJECT_ID → project_id
 * BRIDGE_SCORING__PUBLICATION_THRESHOLD → scoring.publication_threshold
 */
export function applyEnvOverrides(config: Doc, env: NodeJS.ProcessEnv = process.env): Doc {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    const leaf = segments[segments.length - 1];
    if (!leaf) continue;

    let current: unknown = result;
    for (const seg of segments) {
      current = isPlainObject(current) ? current[seg] : undefined;
    }

    let patch: Doc = { [leaf]: coerceEnvValue(value, current) };
    for (const seg of segments.slice(0, -1).reverse()) {
      patch = { [seg]: patch };
    }
    result = deepMerge(result, patch);
  }
  return result;
}

/**
 * Load layered config: defaults ← base.yaml ← {envName}.yaml ← environment variables.
 * Throws BridgeError("CONFIG_INVALID") when the result does not match the config schema.
 *
 * @param envName - Optional environment name; loads `{configDir}/{envName}.yaml` (or .yml) as an override layer.
 * @param configDir - Config directory; defaults to the package's config/.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const dir = configDir ?? path.join(packageRoot(), "config");

  let merged = deepMerge(structuredClone(DEFAULT_CONFIG), loadYaml(path.join(dir, "base.yaml")));
  if (envName) {
    const envFile = [".yaml", ".yml"].map((ext) => path.join(dir, envName + ext)).find((f) => fs.existsSync(f));
    if (envFile) merged = deepMerge(merged, loadYaml(envFile));
  }
  merged = applyEnvOverrides(merged, env);

  if (!isBridgeConfig(merged)) {
    const { errors } = validateConfig(merged);
    throw new BridgeError("CONFIG_INVALID", `Invalid configuration: ${errors ?? "unknown error"}`, { configDir: dir });
  }
  return merged;
}
