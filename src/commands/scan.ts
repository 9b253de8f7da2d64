import { loadConfig } from "../config/loader.js";
import { type Diagnostic, diag } from "../core/diagnostics.js";
import { WorkspaceScanner } from "../scanner/scanner.js";
import { rankCandidates, scoreAll } from "../scorer/scorer.js";
import type { ScoredCandidate } from "../types/candidate.js";
import { type CommandResult, fail, succeed } from "./result.js";

export type ScanCommandOpts = {
  workspace: string;
  configDir?: string;
  env?: string;
  now?: Date;
};

/** Scan and score without publishing; highest score first. */
export function scanCommand(opts: ScanCommandOpts): CommandResult<ScoredCandidate[]> {
  try {
    const config = loadConfig(opts.env, opts.configDir);
    const scanner = new WorkspaceScanner(opts.workspace, config.scanner);
    const ranked = rankCandidates(scoreAll(scanner.scan(), config.scoring, opts.now ?? new Date()));

    const diagnostics: Diagnostic[] = scanner.skipped.map((w) =>
      diag("warn", w.code, `skipped unreadable path ${w.path}: ${w.message}`, { path: w.path }),
    );
    for (const c of ranked) {
      diagnostics.push(
        diag("info", c.eligible ? "ELIGIBLE" : "INELIGIBLE", `${c.score.toFixed(4)}  ${c.eligible ? "eligible  " : "ineligible"}  ${c.path}`, {
          path: c.path,
          details: { score: c.score, signals: c.signals, sizeBytes: c.sizeBytes, category: c.category },
        }),
      );
    }
    return succeed(ranked, diagnostics);
  } catch (e) {
    return fail(e);
  }
}
