import { createHash } from "node:crypto";
import fs from "node:fs";
import { BridgeError, errorMessage } from "../core/errors.js";
import { createRegistry } from "../schema/registry.js";
import type { Category } from "../types/candidate.js";
import type { ExtractionManifest } from "../types/manifest.js";

export const MANIFEST_FILE = "manifest.json";
export const MANIFEST_SCHEMA_VERSION = "1.0.0";

export function sha256Hex(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

export type ManifestBuildInput = {
  sourcePath: string;
  publicName: string;
  notes: string[];
  score: number;
  category: Category;
  projectId: string;
  content: Buffer;
  extractedAt: Date;
};

export function buildManifest(input: ManifestBuildInput): ExtractionManifest {
  return {
    schema_version: MANIFEST_SCHEMA_VERSION,
    source_path: input.sourcePath,
    public_name: input.publicName,
    extracted_at: input.extractedAt.toISOString(),
    transformation_notes: [...input.notes],
    score_at_extraction: input.score,
    category: input.category,
    project_id: input.projectId,
    sha256: sha256Hex(input.content),
    bytes: input.content.length,
  };
}

export function serializeManifest(manifest: ExtractionManifest): string {
  return JSON.stringify(manifest, null, 2) + "\n";
}

/**
 * Read and validate a manifest. Anything unreadable or off-schema is
 * MANIFEST_CORRUPT: collision detection cannot trust that destination.
 */
export function readManifest(filePath: string): ExtractionManifest {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new BridgeError("MANIFEST_CORRUPT", `Unreadable manifest ${filePath}: ${errorMessage(e)}`, { path: filePath }, { cause: e });
  }

  const guard = createRegistry().guard<ExtractionManifest>("manifest");
  if (!guard.check(data)) {
    throw new BridgeError("MANIFEST_CORRUPT", `Invalid manifest ${filePath}: ${guard.errorsText()}`, { path: filePath });
  }
  return data;
}
