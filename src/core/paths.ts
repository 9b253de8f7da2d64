import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Directory holding package.json, found by walking up from this module.
 * Works from both src/ (tests) and dist/src/ (built CLI).
 */
export function packageRoot(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (fs.existsSync(path.join(dir, "package.json"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) throw new Error("package.json not found above " + import.meta.url);
    dir = parent;
  }
}
