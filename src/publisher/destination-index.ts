import fs from "node:fs";
import path from "node:path";
import { BridgeError, errnoCode, errorMessage } from "../core/errors.js";
import type { ExtractionManifest } from "../types/manifest.js";
import { MANIFEST_FILE, readManifest } from "./manifest.js";

export type IndexEntry = {
  name: string;
  /** Source recorded in the entry's manifest; null for entries not written by a publish. */
  sourcePath: string | null;
  manifest: ExtractionManifest | null;
};

/**
 * Names present at a destination root, keyed case-insensitively so that
 * collisions are caught on case-insensitive filesystems too. Hidden entries
 * (lock file, staging area, evolution log) are not publications.
 */
export class DestinationIndex {
  private readonly entries = new Map<string, IndexEntry>();

  /**
   * Index a destination root. A missing root is empty. Throws
   * DESTINATION_UNREADABLE if the root cannot be listed and MANIFEST_CORRUPT
   * if any manifest is unreadable.
   */
  static load(destRoot: string): DestinationIndex {
    const index = new DestinationIndex();
    let dirents: fs.Dirent[];
    try {
      dirents = fs.readdirSync(destRoot, { withFileTypes: true });
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return index;
      throw new BridgeError("DESTINATION_UNREADABLE", `Cannot read destination ${destRoot}: ${errorMessage(e)}`, { path: destRoot }, { cause: e });
    }

    for (const dirent of dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))) {
      if (dirent.name.startsWith(".")) continue;
      const manifestPath = path.join(destRoot, dirent.name, MANIFEST_FILE);
      const manifest = dirent.isDirectory() && fs.existsSync(manifestPath) ? readManifest(manifestPath) : null;
      index.entries.set(dirent.name.toLowerCase(), {
        name: dirent.name,
        sourcePath: manifest ? manifest.source_path : null,
        manifest,
      });
    }
    return index;
  }

  find(name: string): IndexEntry | undefined {
    return this.entries.get(name.toLowerCase());
  }

  add(name: string, sourcePath: string, manifest: ExtractionManifest | null = null): void {
    this.entries.set(name.toLowerCase(), { name, sourcePath, manifest });
  }

  list(): IndexEntry[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }
}
