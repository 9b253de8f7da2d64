import fs from "node:fs";
import path from "node:path";
import { DEFAULT_SCANNER } from "../config/defaults.js";
import { BridgeError, errnoCode, errorMessage } from "../core/errors.js";
import type { Candidate, ScanWarning } from "../types/candidate.js";
import type { ScannerConfig } from "../types/config.js";
import { categorize } from "./category.js";
import { detectDocumentation, detectTests } from "./companions.js";
import { matchIgnorePattern } from "./ignore.js";

/** README files larger than this are not searched for mentions. */
const MAX_README_BYTES = 256 * 1024;

const PERMISSION_CODES = new Set(["EACCES", "EPERM"]);

function byName(a: fs.Dirent, b: fs.Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

export type ScanOptions = {
  /** Absolute paths skipped together with everything below them, matched exactly rather than as globs. */
  excludeAbsolute?: readonly string[];
};

/**
 * Workspace scanner: a lazy, depth-first walk that yields one Candidate per
 * regular file. Entries within a directory are visited in name order, so
 * two scans of the same tree yield the same sequence. Symbolic links are
 * skipped, never followed.
 *
 * Unreadable entries do not abort the walk; they are collected in `skipped`.
 */
export class WorkspaceScanner {
  readonly root: string;
  readonly skipped: ScanWarning[] = [];
  private readonly excluded: Set<string>;

  constructor(
    root: string,
    private readonly config: ScannerConfig = DEFAULT_SCANNER,
    options: ScanOptions = {},
  ) {
    this.root = path.resolve(root);
    this.excluded = new Set((options.excludeAbsolute ?? []).map((p) => path.resolve(p)));
  }

  /**
   * Start a scan. Throws BridgeError("WORKSPACE_NOT_FOUND") immediately if
   * the root is missing or not a directory.
   */
  scan(): Generator<Candidate, void, undefined> {
    let stat: fs.Stats;
    try {
      stat = fs.statSync(this.root);
    } catch (e) {
      throw new BridgeError("WORKSPACE_NOT_FOUND", `Workspace not found: ${this.root}`, { path: this.root }, { cause: e });
    }
    if (!stat.isDirectory()) {
      throw new BridgeError("WORKSPACE_NOT_FOUND", `Workspace is not a directory: ${this.root}`, { path: this.root });
    }
    this.skipped.length = 0;
    return this.walk(this.root, "");
  }

  private *walk(dirAbs: string, dirRel: string): Generator<Candidate, void, undefined> {
    const entries = this.list(dirAbs, dirRel);
    if (!entries) return;
    entries.sort(byName);

    const siblings = entries.map((e) => e.name);
    const readmeCache = new Map<string, string | null>();
    const readSibling = (name: string): string | null => {
      if (!readmeCache.has(name)) {
        readmeCache.set(name, this.readText(path.join(dirAbs, name), joinRel(dirRel, name)));
      }
      return readmeCache.get(name) ?? null;
    };
    let testDirEntries: string[] | null = null;

    for (const entry of entries) {
      const rel = joinRel(dirRel, entry.name);
      const abs = path.join(dirAbs, entry.name);

      if (this.excluded.has(abs)) continue;
      if (matchIgnorePattern(entry.name, rel, this.config.ignore)) continue;
      if (entry.isSymbolicLink()) continue;

      if (entry.isDirectory()) {
        yield* this.walk(abs, rel);
        continue;
      }
      if (!entry.isFile()) continue;

      let stat: fs.Stats;
      try {
        stat = fs.lstatSync(abs);
      } catch (e) {
        // Removed since the directory was listed.
        if (errnoCode(e) === "ENOENT") continue;
        if (this.recordPermission(rel, e)) continue;
        throw e;
      }

      testDirEntries ??= this.listTestDirs(dirAbs, dirRel, entries);

      yield {
        path: rel,
        absolutePath: abs,
        sizeBytes: stat.size,
        modifiedAt: stat.mtime,
        hasDocumentation: detectDocumentation(entry.name, siblings, readSibling, this.config),
        hasTests: detectTests(entry.name, siblings, testDirEntries),
        category: categorize(entry.name),
      };
    }
  }

  private list(dirAbs: string, dirRel: string): fs.Dirent[] | null {
    try {
      return fs.readdirSync(dirAbs, { withFileTypes: true });
    } catch (e) {
      // Removed since its parent was listed.
      if (dirRel !== "" && errnoCode(e) === "ENOENT") return null;
      if (this.recordPermission(dirRel === "" ? "." : dirRel, e)) return null;
      throw e;
    }
  }

  /** File names inside sibling test directories (test/, tests/, __tests__/). */
  private listTestDirs(dirAbs: string, dirRel: string, siblings: readonly fs.Dirent[]): string[] {
    const names: string[] = [];
    for (const testDir of this.config.test_dirs) {
      const dirent = siblings.find((e) => e.name === testDir);
      if (!dirent || !dirent.isDirectory()) continue;
      const entries = this.list(path.join(dirAbs, testDir), joinRel(dirRel, testDir));
      if (entries) names.push(...entries.filter((e) => e.isFile()).map((e) => e.name));
    }
    return names;
  }

  private readText(abs: string, rel: string): string | null {
    try {
      const stat = fs.statSync(abs);
      if (!stat.isFile() || stat.size > MAX_README_BYTES) return null;
      return fs.readFileSync(abs, "utf8");
    } catch (e) {
      if (this.recordPermission(rel, e)) return null;
      throw e;
    }
  }

  private recordPermission(rel: string, err: unknown): boolean {
    const code = errnoCode(err);
    if (!code || !PERMISSION_CODES.has(code)) return false;
    if (!this.skipped.some((w) => w.path === rel)) {
      this.skipped.push({ path: rel, code: "PERMISSION_DENIED", message: errorMessage(err) });
    }
    return true;
  }
}

function joinRel(dirRel: string, name: string): string {
  return dirRel === "" ? name : `${dirRel}/${name}`;
}
