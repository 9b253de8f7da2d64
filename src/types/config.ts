/** Configuration sections, layered as base.yaml ← <env>.yaml ← BRIDGE_* env vars. */

export type ScannerConfig = {
  /** minimatch globs tested against entry names and relative paths. */
  ignore: string[];
  /** README-like file names, compared case-insensitively. */
  doc_names: string[];
  /** Extensions of same-stem description files (e.g. my_tool.md). */
  doc_extensions: string[];
  /** Directories beside a file that may hold its tests. */
  test_dirs: string[];
};

export type ScoringConfig = {
  weight_size: number;
  weight_recency: number;
  weight_docs: number;
  weight_tests: number;
  publication_threshold: number;
  staleness_window_days: number;
  size_saturation_bytes: number;
};

export type NamingConfig = {
  public_separator: string;
  internal_separators: string[];
  generic_names: string[];
  lowercase: boolean;
};

export type PublisherConfig = {
  generate_description: boolean;
  redact_secrets: boolean;
  lock_stale_seconds: number;
  /** Evolution log location; defaults to <dest>/.evolution.jsonl. */
  evolution_log?: string;
};

export type BridgeConfig = {
  schema_version: string;
  /** Prefix for generic public names; defaults to the workspace directory name. */
  project_id?: string;
  scanner: ScannerConfig;
  scoring: ScoringConfig;
  naming: NamingConfig;
  publisher: PublisherConfig;
};
