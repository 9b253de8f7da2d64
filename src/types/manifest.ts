import type { Category } from "./candidate.js";

/** Extraction manifest, stored as <dest>/<public_name>/manifest.json. Immutable once written. */
export type ExtractionManifest = {
  schema_version: string;
  source_path: string;
  public_name: string;
  extracted_at: string;
  transformation_notes: string[];
  score_at_extraction: number;
  category: Category;
  project_id: string;
  sha256: string;
  bytes: number;
};

/** One line of the append-only evolution log (JSON Lines). */
export type EvolutionLogEntry = {
  source_path: string;
  output_name: string;
  timestamp: string;
  notes: string[];
  score: number;
  sha256: string;
};
