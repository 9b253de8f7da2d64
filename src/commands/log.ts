import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { type Diagnostic, diag } from "../core/diagnostics.js";
import { EvolutionLog, defaultEvolutionLogPath } from "../publisher/evolution-log.js";
import type { EvolutionLogEntry } from "../types/manifest.js";
import { type CommandResult, fail, succeed } from "./result.js";

export type LogCommandOpts = {
  dest: string;
  /** Show only the most recent entries. */
  limit?: number;
  configDir?: string;
  env?: string;
};

export function logCommand(opts: LogCommandOpts): CommandResult<EvolutionLogEntry[]> {
  try {
    const config = loadConfig(opts.env, opts.configDir);
    const file = config.publisher.evolution_log
      ? path.resolve(config.publisher.evolution_log)
      : defaultEvolutionLogPath(path.resolve(opts.dest));
    const { entries, invalidLines } = new EvolutionLog(file).read();
    const shown = opts.limit !== undefined && opts.limit >= 0 ? entries.slice(Math.max(0, entries.length - opts.limit)) : entries;

    const diagnostics: Diagnostic[] = invalidLines.map((line) =>
      diag("warn", "LOG_LINE_INVALID", `Ignoring invalid evolution log line ${line}`, { path: file, details: { line } }),
    );
    for (const e of shown) {
      diagnostics.push(diag("info", "EVOLUTION", `${e.timestamp}  ${e.source_path} -> ${e.output_name}`, { details: { ...e } }));
    }
    return succeed(shown, diagnostics);
  } catch (e) {
    return fail(e);
  }
}
