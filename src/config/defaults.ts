import type { BridgeConfig, NamingConfig, PublisherConfig, ScannerConfig, ScoringConfig } from "../types/config.js";

export const DEFAULT_SCANNER: ScannerConfig = {
  ignore: [
    ".git",
    ".hg",
    ".svn",
    "node_modules",
    "__pycache__",
    ".cache",
    ".pytest_cache",
    ".DS_Store",
    "Thumbs.db",
    "*.pyc",
    ".bridge",
  ],
  doc_names: ["README", "README.md", "README.txt", "README.rst"],
  doc_extensions: [".md", ".txt", ".rst"],
  test_dirs: ["test", "tests", "__tests__"],
};

/** Weights need not sum to 1; the score is their weighted mean. */
export const DEFAULT_SCORING: ScoringConfig = {
  weight_size: 0.15,
  weight_recency: 0.25,
  weight_docs: 0.3,
  weight_tests: 0.3,
  publication_threshold: 0.6,
  staleness_window_days: 90,
  size_saturation_bytes: 10_000,
};

export const DEFAULT_NAMING: NamingConfig = {
  public_separator: "-",
  internal_separators: ["_", " "],
  generic_names: ["config", "utils", "util", "index", "data", "helper", "helpers", "main", "common", "settings"],
  lowercase: true,
};

export const DEFAULT_PUBLISHER: PublisherConfig = {
  generate_description: true,
  redact_secrets: true,
  lock_stale_seconds: 600,
};

export const DEFAULT_CONFIG: BridgeConfig = {
  schema_version: "1.0.0",
  scanner: DEFAULT_SCANNER,
  scoring: DEFAULT_SCORING,
  naming: DEFAULT_NAMING,
  publisher: DEFAULT_PUBLISHER,
};
