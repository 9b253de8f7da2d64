import { minimatch } from "minimatch";

/**
 * Match a workspace entry against ignore globs. Each pattern is tried
 * against the bare entry name and the path relative to the workspace root,
 * so ".git" and "build/**" both work.
 */
export function matchIgnorePattern(name: string, relPath: string, patterns: readonly string[]): string | null {
  for (const pattern of patterns) {
    if (minimatch(name, pattern, { dot: true }) || minimatch(relPath, pattern, { dot: true })) {
      return pattern;
    }
  }
  return null;
}
