import type { ExtractionManifest } from "../types/manifest.js";

export const DESCRIPTION_FILE = "README.md";

/** Description written beside artifacts that were published without one. */
export function renderDescription(manifest: ExtractionManifest): string {
  const notes = manifest.transformation_notes.length > 0
    ? manifest.transformation_notes.map((n) => `- ${n}`).join("\n")
    : "- none";

  return [
    `# ${manifest.public_name}`,
    "",
    `Published from \`${manifest.source_path}\` on ${manifest.extracted_at.slice(0, 10)}.`,
    "",
    `- Category: ${manifest.category}`,
    `- Score at extraction: ${manifest.score_at_extraction}`,
    `- SHA-256: ${manifest.sha256}`,
    "",
    "## Transformations",
    "",
    notes,
    "",
  ].join("\n");
}
