import fs from "node:fs";
import path from "node:path";
import { createRegistry } from "../schema/registry.js";
import type { EvolutionLogEntry } from "../types/manifest.js";

export const DEFAULT_EVOLUTION_LOG = ".evolution.jsonl";

export function defaultEvolutionLogPath(destRoot: string): string {
  return path.join(destRoot, DEFAULT_EVOLUTION_LOG);
}

export type EvolutionReadResult = {
  entries: EvolutionLogEntry[];
  /** 1-based line numbers that did not parse or match the entry schema. */
  invalidLines: number[];
};

/**
 * Append-only evolution log, one JSON object per line. Nothing here edits
 * or truncates existing lines.
 */
export class EvolutionLog {
  constructor(readonly filePath: string) {}

  /** Create the log (and its directory) if absent. Existing lines are kept. */
  init(): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.closeSync(fs.openSync(this.filePath, "a"));
  }

  serialize(entry: EvolutionLogEntry): string {
    return JSON.stringify(entry) + "\n";
  }

  /** Append one pre-serialized line (see serialize). */
  appendLine(line: string): void {
    fs.appendFileSync(this.filePath, line, "utf8");
  }

  append(entry: EvolutionLogEntry): void {
    this.appendLine(this.serialize(entry));
  }

  read(): EvolutionReadResult {
    if (!fs.existsSync(this.filePath)) return { entries: [], invalidLines: [] };

    const guard = createRegistry().guard<EvolutionLogEntry>("evolution-entry");
    const entries: EvolutionLogEntry[] = [];
    const invalidLines: number[] = [];

    const lines = fs.readFileSync(this.filePath, "utf8").split("\n");
    lines.forEach((line, i) => {
      if (line.trim() === "") return;
      let data: unknown;
      try {
        data = JSON.parse(line);
      } catch {
        invalidLines.push(i + 1);
        return;
      }
      if (guard.check(data)) entries.push(data);
      else invalidLines.push(i + 1);
    });

    return { entries, invalidLines };
  }
}
