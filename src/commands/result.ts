import { type Diagnostic, diag } from "../core/diagnostics.js";
import { errorMessage, isBridgeError } from "../core/errors.js";
import { type ExitCode, EXIT, exitCodeForError } from "./exit-codes.js";

/** What every command returns to the CLI; only cli.ts turns it into process output. */
export type CommandResult<T> = {
  ok: boolean;
  exitCode: ExitCode;
  diagnostics: Diagnostic[];
  value?: T;
};

export function succeed<T>(value: T, diagnostics: Diagnostic[], exitCode: ExitCode = EXIT.SUCCESS): CommandResult<T> {
  return { ok: exitCode === EXIT.SUCCESS, exitCode, diagnostics, value };
}

function errorPath(err: unknown): string | undefined {
  if (!isBridgeError(err)) return undefined;
  const p = err.details?.path;
  return typeof p === "string" ? p : undefined;
}

/** Map a thrown error to a failed result carrying one error diagnostic. */
export function fail<T>(err: unknown, diagnostics: Diagnostic[] = []): CommandResult<T> {
  const code = isBridgeError(err) ? err.code : "UNEXPECTED";
  const p = errorPath(err);
  return {
    ok: false,
    exitCode: exitCodeForError(err),
    diagnostics: [...diagnostics, diag("error", code, errorMessage(err), p ? { path: p } : undefined)],
  };
}
