import path from "node:path";
import { DEFAULT_NAMING } from "../config/defaults.js";
import type { NamingConfig } from "../types/config.js";

export type NamingResult = {
  publicName: string;
  /** Applied rules, in order, e.g. "replace-separators: my_tool.py -> my-tool.py". */
  notes: string[];
};

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function splitName(name: string): { stem: string; ext: string } {
  const ext = path.posix.extname(name);
  return { stem: name.slice(0, name.length - ext.length), ext };
}

/**
 * Separator and case normalization shared by public names and project ids.
 * Each rule that changes the value appends a note.
 */
function normalizeStem(stem: string, ext: string, naming: NamingConfig, notes: string[]): { stem: string; ext: string } {
  const sep = naming.public_separator;
  const before = () => stem + ext;

  let name = before();
  const unhidden = stem.replace(/^\.+/, "");
  if (unhidden !== stem && unhidden !== "") {
    stem = unhidden;
    notes.push(`strip-leading-dot: ${name} -> ${before()}`);
  }

  name = before();
  let replaced = stem;
  for (const internal of naming.internal_separators) {
    replaced = replaced.split(internal).join(sep);
  }
  if (replaced !== stem) {
    stem = replaced;
    notes.push(`replace-separators: ${name} -> ${before()}`);
  }

  name = before();
  const escaped = escapeRegExp(sep);
  const collapsed = stem
    .replace(new RegExp(`(?:${escaped})+`, "g"), sep)
    .replace(new RegExp(`^(?:${escaped})+|(?:${escaped})+$`, "g"), "");
  if (collapsed !== stem && collapsed !== "") {
    stem = collapsed;
    notes.push(`collapse-separators: ${name} -> ${before()}`);
  }

  name = before();
  if (naming.lowercase && name !== name.toLowerCase()) {
    stem = stem.toLowerCase();
    ext = ext.toLowerCase();
    notes.push(`lowercase: ${name} -> ${before()}`);
  }

  return { stem, ext };
}

/** Normalize a project identifier with the same separator and case rules. */
export function normalizeProjectId(raw: string, naming: NamingConfig = DEFAULT_NAMING): string {
  const { stem } = normalizeStem(raw.trim(), "", naming, []);
  return stem === "" ? "project" : stem;
}

/**
 * Derive the public name for a workspace file. Deterministic: the same path,
 * naming config and project id always give the same name and notes.
 *
 *   my_tool.py  -> my-tool.py
 *   config.toml -> <project>-config.toml
 */
export function derivePublicName(relPath: string, naming: NamingConfig, projectId: string): NamingResult {
  const notes: string[] = [];
  const base = path.posix.basename(relPath);
  const split = splitName(base);
  let { stem, ext } = normalizeStem(split.stem, split.ext, naming, notes);

  const generic = new Set(naming.generic_names.map((n) => n.toLowerCase()));
  if (generic.has(stem.toLowerCase())) {
    const name = stem + ext;
    stem = `${projectId}${naming.public_separator}${stem}`;
    notes.push(`prefix-generic: ${name} -> ${stem + ext}`);
  }

  return { publicName: stem + ext, notes };
}
