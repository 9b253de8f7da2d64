import path from "node:path";
import type { Category } from "../types/candidate.js";

const CATEGORY_BY_EXTENSION: Record<string, Category> = {
  ".py": "tool",
  ".sh": "tool",
  ".js": "tool",
  ".mjs": "tool",
  ".cjs": "tool",
  ".ts": "tool",
  ".rb": "tool",
  ".go": "tool",
  ".json": "data",
  ".jsonl": "data",
  ".csv": "data",
  ".tsv": "data",
  ".xml": "data",
  ".yaml": "config",
  ".yml": "config",
  ".toml": "config",
  ".ini": "config",
  ".cfg": "config",
  ".md": "documentation",
  ".rst": "documentation",
  ".txt": "documentation",
  ".adoc": "documentation",
};

export function categorize(fileName: string): Category {
  return CATEGORY_BY_EXTENSION[path.extname(fileName).toLowerCase()] ?? "other";
}
