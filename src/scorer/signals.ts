import type { ScoreSignals } from "../types/candidate.js";
import type { ScoringConfig } from "../types/config.js";

export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Logarithmic size signal in [0, 1], saturating at `saturationBytes` so a
 * single huge file cannot dominate.
 */
export function sizeSignal(sizeBytes: number, saturationBytes: number): number {
  if (sizeBytes <= 0) return 0;
  return Math.min(1, Math.log1p(sizeBytes) / Math.log1p(saturationBytes));
}

/** Linear decay from 1 (modified now) to 0 at the staleness window and beyond. */
export function recencySignal(modifiedAt: Date, now: Date, stalenessWindowDays: number): number {
  const ageDays = Math.max(0, (now.getTime() - modifiedAt.getTime()) / DAY_MS);
  if (ageDays >= stalenessWindowDays) return 0;
  return 1 - ageDays / stalenessWindowDays;
}

export function computeSignals(
  input: { sizeBytes: number; modifiedAt: Date; hasDocumentation: boolean; hasTests: boolean },
  scoring: Pick<ScoringConfig, "size_saturation_bytes" | "staleness_window_days">,
  now: Date,
): ScoreSignals {
  return {
    size: sizeSignal(input.sizeBytes, scoring.size_saturation_bytes),
    recency: recencySignal(input.modifiedAt, now, scoring.staleness_window_days),
    docs: input.hasDocumentation ? 1 : 0,
    tests: input.hasTests ? 1 : 0,
  };
}
