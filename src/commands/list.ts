import path from "node:path";
import { type Diagnostic, diag } from "../core/diagnostics.js";
import { DestinationIndex, type IndexEntry } from "../publisher/destination-index.js";
import { type CommandResult, fail, succeed } from "./result.js";

/** List publications at a destination root. */
export function listCommand(opts: { dest: string }): CommandResult<IndexEntry[]> {
  try {
    const entries = DestinationIndex.load(path.resolve(opts.dest)).list();
    const diagnostics: Diagnostic[] = entries.map((e) =>
      e.manifest
        ? diag("info", "PUBLICATION", `${e.name}  <- ${e.manifest.source_path}  ${e.manifest.extracted_at}`, {
            details: { ...e.manifest },
          })
        : diag("warn", "UNMANAGED_ENTRY", `${e.name} has no manifest`, { path: e.name }),
    );
    if (entries.length === 0) diagnostics.push(diag("info", "EMPTY", "No publications found."));
    return succeed(entries, diagnostics);
  } catch (e) {
    return fail(e);
  }
}
