import fs from "node:fs";
import path from "node:path";
import { type Diagnostic, diag } from "../core/diagnostics.js";
import { DestinationIndex } from "../publisher/destination-index.js";
import { sha256Hex } from "../publisher/manifest.js";
import { EXIT } from "./exit-codes.js";
import { type CommandResult, fail, succeed } from "./result.js";

function isWithinDir(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(rootDir, candidatePath);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

/**
 * Re-check every publication against its manifest: the artifact exists inside
 * its directory, and its size and sha256 match.
 */
export function verifyCommand(opts: { dest: string }): CommandResult<{ checked: number; problems: number }> {
  try {
    const destRoot = path.resolve(opts.dest);
    const errors: Diagnostic[] = [];
    let checked = 0;

    for (const entry of DestinationIndex.load(destRoot).list()) {
      const manifest = entry.manifest;
      if (!manifest) continue;
      checked++;

      const dir = path.join(destRoot, entry.name);
      if (manifest.public_name !== entry.name) {
        errors.push(
          diag("error", "NAME_MISMATCH", `Manifest public_name ${manifest.public_name} does not match directory ${entry.name}`, { path: dir }),
        );
      }

      const target = path.resolve(dir, manifest.public_name);
      if (!isWithinDir(dir, target)) {
        errors.push(diag("error", "PATH_ESCAPES_DIR", `Manifest path escapes publication dir: ${manifest.public_name}`, { path: dir }));
        continue;
      }
      if (!fs.existsSync(target) || !fs.statSync(target).isFile()) {
        errors.push(diag("error", "ARTIFACT_MISSING", `Missing artifact file: ${path.relative(destRoot, target)}`, { path: target }));
        continue;
      }

      const content = fs.readFileSync(target);
      if (content.length !== manifest.bytes) {
        errors.push(
          diag("error", "SIZE_MISMATCH", `Artifact size mismatch (${entry.name}): manifest=${manifest.bytes} actual=${content.length}`, {
            path: target,
            details: { expectedBytes: manifest.bytes, actualBytes: content.length },
          }),
        );
      }
      const actual = sha256Hex(content);
      if (actual !== manifest.sha256) {
        errors.push(
          diag("error", "SHA256_MISMATCH", `Artifact sha256 mismatch (${entry.name}): manifest=${manifest.sha256} actual=${actual}`, {
            path: target,
            details: { expectedSha256: manifest.sha256, actualSha256: actual },
          }),
        );
      }
    }

    const value = { checked, problems: errors.length };
    if (errors.length > 0) return succeed(value, errors, EXIT.FAILURE);
    return succeed(value, [diag("info", "OK", `Verified ${checked} publication(s)`)]);
  } catch (e) {
    return fail(e);
  }
}
