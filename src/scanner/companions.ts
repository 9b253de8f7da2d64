import path from "node:path";
import { escapeRegExp } from "../publisher/naming.js";
import type { ScannerConfig } from "../types/config.js";

/** Stem of a file name: "my_tool.py" → "my_tool", ".env" → ".env". */
export function fileStem(fileName: string): string {
  return path.basename(fileName, path.extname(fileName));
}

/** Reads a sibling file's text, or null when it cannot be read. */
export type SiblingReader = (name: string) => string | null;

/**
 * True when a description file sits beside `fileName`: a same-stem file
 * with a documentation extension (my_tool.md), or a README-like sibling
 * whose text mentions the file name as a whole token.
 */
export function detectDocumentation(
  fileName: string,
  siblings: readonly string[],
  readSibling: SiblingReader,
  config: Pick<ScannerConfig, "doc_names" | "doc_extensions">,
): boolean {
  const stem = fileStem(fileName);
  const docExtensions = new Set(config.doc_extensions.map((e) => e.toLowerCase()));
  const docNames = new Set(config.doc_names.map((n) => n.toLowerCase()));

  for (const sibling of siblings) {
    if (sibling === fileName) continue;
    if (stem !== "" && fileStem(sibling) === stem && docExtensions.has(path.extname(sibling).toLowerCase())) {
      return true;
    }
  }

  // The name as a whole token: "my_tool.py" does not mention "tool.py".
  const mentionPattern = new RegExp(`(^|[^\\w.-])${escapeRegExp(fileName)}($|[^\\w-])`);
  for (const sibling of siblings) {
    if (sibling === fileName || !docNames.has(sibling.toLowerCase())) continue;
    const text = readSibling(sibling);
    if (text !== null && mentionPattern.test(text)) return true;
  }

  return false;
}

/** Test-file name prefixes that belong to `stem`. */
export function testNamePrefixes(stem: string): string[] {
  return [`test_${stem}.`, `${stem}_test.`, `${stem}.test.`, `${stem}.spec.`];
}

/**
 * True when a test-like file for `fileName` sits beside it or in one of the
 * listed test directories.
 */
export function detectTests(
  fileName: string,
  siblings: readonly string[],
  testDirEntries: readonly string[],
): boolean {
  const stem = fileStem(fileName);
  if (stem === "") return false;
  const prefixes = testNamePrefixes(stem);
  const matches = (name: string): boolean => name !== fileName && prefixes.some((p) => name.startsWith(p));
  return siblings.some(matches) || testDirEntries.some(matches);
}
