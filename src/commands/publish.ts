import { loadConfig } from "../config/loader.js";
import { type Diagnostic, diag } from "../core/diagnostics.js";
import { type PipelineResult, runPipeline } from "../core/pipeline.js";
import type { PublishOutcome } from "../publisher/publisher.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { type CommandResult, fail, succeed } from "./result.js";

export type PublishCommandOpts = {
  workspace: string;
  dest: string;
  /** Without this the run is a dry run. */
  apply?: boolean;
  configDir?: string;
  env?: string;
  now?: Date;
};

/** Failures outrank collisions; both outrank success. */
export function pipelineExitCode(result: PipelineResult): ExitCode {
  if (result.summary.eligible === 0) return EXIT.NO_ELIGIBLE;
  if (result.summary.failed > 0) return EXIT.FAILURE;
  if (result.summary.skipped > 0) return EXIT.NAME_COLLISION;
  return EXIT.SUCCESS;
}

function outcomeDiagnostic(outcome: PublishOutcome): Diagnostic {
  const details = { sourcePath: outcome.sourcePath, publicName: outcome.publicName, score: outcome.score, notes: outcome.notes };
  switch (outcome.status) {
    case "published":
      return diag("info", "PUBLISHED", `published ${outcome.sourcePath} -> ${outcome.publicName}`, { path: outcome.targetDir, details });
    case "would_publish":
      return diag("info", "WOULD_PUBLISH", `would publish ${outcome.sourcePath} -> ${outcome.publicName} (score ${outcome.score})`, { details });
    case "collision":
      return diag("error", "NAME_COLLISION", outcome.message, {
        details: { ...details, existingName: outcome.existingName, existingSource: outcome.existingSource },
      });
    case "failed":
      return diag("error", outcome.code, outcome.message, { details });
  }
}

export function describeRun(result: PipelineResult): Diagnostic[] {
  const diagnostics: Diagnostic[] = result.warnings.map((w) =>
    diag("warn", w.code, `skipped unreadable path ${w.path}: ${w.message}`, { path: w.path }),
  );

  for (const entry of result.report) {
    if (!entry.eligible) {
      diagnostics.push(diag("info", "INELIGIBLE", `ineligible ${entry.sourcePath} (score ${entry.score})`, { details: { ...entry } }));
    }
  }
  diagnostics.push(...result.outcomes.map(outcomeDiagnostic));

  const s = result.summary;
  const counts =
    result.mode === "apply"
      ? `scanned=${s.scanned} eligible=${s.eligible} published=${s.published} skipped=${s.skipped} failed=${s.failed} warnings=${s.warnings}`
      : `scanned=${s.scanned} eligible=${s.eligible} would_publish=${s.wouldPublish} skipped=${s.skipped} warnings=${s.warnings} (dry run)`;
  diagnostics.push(diag("info", "SUMMARY", counts, { details: { ...s, mode: result.mode } }));
  return diagnostics;
}

export async function publishCommand(opts: PublishCommandOpts): Promise<CommandResult<PipelineResult>> {
  try {
    const config = loadConfig(opts.env, opts.configDir);
    const result = await runPipeline({
      workspaceRoot: opts.workspace,
      destRoot: opts.dest,
      mode: opts.apply ? "apply" : "dryRun",
      config,
      now: opts.now,
    });
    return succeed(result, describeRun(result), pipelineExitCode(result));
  } catch (e) {
    return fail(e);
  }
}
