import { DEFAULT_SCORING } from "../config/defaults.js";
import type { Candidate, ScoredCandidate, ScoreSignals } from "../types/candidate.js";
import type { ScoringConfig } from "../types/config.js";
import { computeSignals } from "./signals.js";

/** Scores are rounded to this many decimal places before the threshold test. */
const SCORE_PRECISION = 4;

function round(value: number): number {
  const factor = 10 ** SCORE_PRECISION;
  return Math.round(value * factor) / factor;
}

/** Weighted mean of the signals, in [0, 1]. All-zero weights score 0. */
export function weightedScore(signals: ScoreSignals, scoring: ScoringConfig): number {
  const totalWeight = scoring.weight_size + scoring.weight_recency + scoring.weight_docs + scoring.weight_tests;
  if (totalWeight <= 0) return 0;
  const sum =
    scoring.weight_size * signals.size +
    scoring.weight_recency * signals.recency +
    scoring.weight_docs * signals.docs +
    scoring.weight_tests * signals.tests;
  return round(sum / totalWeight);
}

/** Inclusive: a score equal to the threshold is eligible. */
export function isEligible(score: number, scoring: Pick<ScoringConfig, "publication_threshold">): boolean {
  return score >= scoring.publication_threshold;
}

/**
 * Score one candidate. Pure: the result depends only on the candidate, the
 * scoring config and `now`.
 */
export function scoreCandidate(
  candidate: Candidate,
  scoring: ScoringConfig = DEFAULT_SCORING,
  now: Date = new Date(),
): ScoredCandidate {
  const signals = computeSignals(candidate, scoring, now);
  const score = weightedScore(signals, scoring);
  return { ...candidate, score, signals, eligible: isEligible(score, scoring) };
}

export function scoreAll(
  candidates: Iterable<Candidate>,
  scoring: ScoringConfig = DEFAULT_SCORING,
  now: Date = new Date(),
): ScoredCandidate[] {
  const scored: ScoredCandidate[] = [];
  for (const candidate of candidates) {
    scored.push(scoreCandidate(candidate, scoring, now));
  }
  return scored;
}

/** Highest score first; ties broken by path so the order is stable. */
export function rankCandidates(scored: readonly ScoredCandidate[]): ScoredCandidate[] {
  return [...scored].sort((a, b) => {
    if (a.score !== b.score) return b.score - a.score;
    return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
  });
}
