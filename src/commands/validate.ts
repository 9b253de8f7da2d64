import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { type Diagnostic, diag } from "../core/diagnostics.js";
import { errorMessage, isBridgeError } from "../core/errors.js";
import { packageRoot } from "../core/paths.js";
import { EXIT } from "./exit-codes.js";
import { type CommandResult, succeed } from "./result.js";

function listYamlFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((e) => e.isFile() && (e.name.endsWith(".yml") || e.name.endsWith(".yaml")))
    .map((e) => e.name)
    .sort();
}

/**
 * Validate every layer in a config directory: base.yaml alone, and each
 * other <env>.yaml merged over it. Environment variables are not applied.
 */
export function validateCommand(opts: { configDir?: string }): CommandResult<{ files: string[] }> {
  const dir = path.resolve(opts.configDir ?? path.join(packageRoot(), "config"));
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    return succeed({ files: [] }, [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${dir}`, { path: dir })], EXIT.INVALID_ARGS);
  }

  const files = listYamlFiles(dir);
  if (files.length === 0) {
    return succeed({ files }, [diag("error", "CONFIG_NO_YAML", `No YAML files found in config dir: ${dir}`, { path: dir })], EXIT.INVALID_ARGS);
  }

  const errors: Diagnostic[] = [];
  for (const file of files) {
    const envName = file.replace(/\.ya?ml$/, "");
    try {
      loadConfig(envName === "base" ? undefined : envName, dir, {});
    } catch (e) {
      const code = isBridgeError(e) ? e.code : "CONFIG_READ_FAILED";
      errors.push(diag("error", code, `${file}: ${errorMessage(e)}`, { path: path.join(dir, file) }));
    }
  }

  if (errors.length > 0) return succeed({ files }, errors, EXIT.INVALID_ARGS);
  return succeed({ files }, [diag("info", "OK", `OK (${files.length} file(s))`)]);
}
