/** Output category, derived from the file extension. */
export type Category = "tool" | "data" | "config" | "documentation" | "other";

/** A regular file discovered in the workspace. Never persisted. */
export type Candidate = {
  /** POSIX-style path relative to the workspace root. */
  path: string;
  absolutePath: string;
  sizeBytes: number;
  modifiedAt: Date;
  hasDocumentation: boolean;
  hasTests: boolean;
  category: Category;
};

export type ScoreSignals = {
  size: number;
  recency: number;
  docs: number;
  tests: number;
};

export type ScoredCandidate = Candidate & {
  score: number;
  signals: ScoreSignals;
  eligible: boolean;
};

export type ScanWarning = {
  path: string;
  code: "PERMISSION_DENIED";
  message: string;
};
