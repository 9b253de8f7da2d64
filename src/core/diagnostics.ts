export type OutputFormat = "human" | "jsonl";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

export function isOutputFormat(value: string): value is OutputFormat {
  return value === "human" || value === "jsonl";
}

/** One line, without the trailing newline. */
export function formatDiagnostic(d: Diagnostic, format: OutputFormat): string {
  if (format === "jsonl") return JSON.stringify(d);
  const prefix = d.level === "info" ? "" : `${d.level}: `;
  return `${prefix}${d.message}`;
}

export type OutputStreams = {
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
};

/**
 * Write diagnostics. jsonl: every record on stdout. human: errors and
 * warnings on stderr, the rest on stdout.
 */
export function emit(
  diagnostics: readonly Diagnostic[],
  format: OutputFormat,
  streams: OutputStreams = { stdout: process.stdout, stderr: process.stderr },
): void {
  for (const d of diagnostics) {
    const line = formatDiagnostic(d, format) + "\n";
    if (format === "human" && d.level !== "info") streams.stderr.write(line);
    else streams.stdout.write(line);
  }
}
