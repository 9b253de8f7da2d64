import path from "node:path";
import { DEFAULT_CONFIG } from "../config/defaults.js";
import { normalizeProjectId } from "../publisher/naming.js";
import { type PublishMode, type PublishOutcome, Publisher } from "../publisher/publisher.js";
import { WorkspaceScanner } from "../scanner/scanner.js";
import { rankCandidates, scoreAll } from "../scorer/scorer.js";
import type { ScanWarning, ScoredCandidate } from "../types/candidate.js";
import type { BridgeConfig } from "../types/config.js";

export type PipelineOptions = {
  workspaceRoot: string;
  destRoot: string;
  mode: PublishMode;
  config?: BridgeConfig;
  /** Reference time for recency scoring and manifest timestamps. */
  now?: Date;
};

export type ReportEntry = {
  sourcePath: string;
  score: number;
  eligible: boolean;
  proposedPublicName?: string;
  wouldCollideWith?: string;
};

export type RunSummary = {
  scanned: number;
  eligible: number;
  published: number;
  /** Eligible but skipped because of a name collision. */
  skipped: number;
  failed: number;
  /** Dry-run only: eligible candidates that would publish cleanly. */
  wouldPublish: number;
  warnings: number;
};

export type PipelineResult = {
  mode: PublishMode;
  projectId: string;
  summary: RunSummary;
  report: ReportEntry[];
  scored: ScoredCandidate[];
  outcomes: PublishOutcome[];
  warnings: ScanWarning[];
};

/** Project id from config, else the workspace directory's name. */
export function resolveProjectId(workspaceRoot: string, config: BridgeConfig): string {
  return normalizeProjectId(config.project_id ?? path.basename(path.resolve(workspaceRoot)), config.naming);
}

export function summarize(scored: readonly ScoredCandidate[], outcomes: readonly PublishOutcome[], warnings: number): RunSummary {
  const count = (status: PublishOutcome["status"]) => outcomes.filter((o) => o.status === status).length;
  return {
    scanned: scored.length,
    eligible: scored.filter((c) => c.eligible).length,
    published: count("published"),
    skipped: count("collision"),
    failed: count("failed"),
    wouldPublish: count("would_publish"),
    warnings,
  };
}

/**
 * Scan → score → publish. Per-candidate failures are in `outcomes`; only
 * run-level problems (missing workspace, locked or corrupt destination) throw.
 */
export async function runPipeline(opts: PipelineOptions): Promise<PipelineResult> {
  const config = opts.config ?? DEFAULT_CONFIG;
  const now = opts.now ?? new Date();

  // A destination inside the workspace is never scanned as a source.
  const scanner = new WorkspaceScanner(opts.workspaceRoot, config.scanner, { excludeAbsolute: [opts.destRoot] });
  const scored = rankCandidates(scoreAll(scanner.scan(), config.scoring, now));

  const projectId = resolveProjectId(opts.workspaceRoot, config);
  const publisher = new Publisher({
    destRoot: opts.destRoot,
    projectId,
    naming: config.naming,
    settings: config.publisher,
    now: () => now,
  });
  const outcomes = await publisher.publish(scored, opts.mode);

  const bySource = new Map(outcomes.map((o) => [o.sourcePath, o]));
  const report = scored.map((c): ReportEntry => {
    const outcome = bySource.get(c.path);
    const entry: ReportEntry = { sourcePath: c.path, score: c.score, eligible: c.eligible };
    if (outcome) entry.proposedPublicName = outcome.publicName;
    if (outcome?.status === "collision") entry.wouldCollideWith = outcome.existingSource ?? outcome.existingName;
    return entry;
  });

  return {
    mode: opts.mode,
    projectId,
    summary: summarize(scored, outcomes, scanner.skipped.length),
    report,
    scored,
    outcomes,
    warnings: [...scanner.skipped],
  };
}
