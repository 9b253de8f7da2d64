export const BRIDGE_ERROR_CODES = [
  "WORKSPACE_NOT_FOUND",
  "PERMISSION_DENIED",
  "NAME_COLLISION",
  "WRITE_FAILURE",
  "MANIFEST_CORRUPT",
  "DESTINATION_UNREADABLE",
  "LOCK_HELD",
  "CONFIG_INVALID",
] as const;

export type BridgeErrorCode = (typeof BRIDGE_ERROR_CODES)[number];

/**
 * Error raised for run-level failures. Per-candidate failures (collisions,
 * write failures) are reported as outcomes instead of being thrown.
 */
export class BridgeError extends Error {
  constructor(
    public readonly code: BridgeErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BridgeError";
  }
}

export function isBridgeError(err: unknown, code?: BridgeErrorCode): err is BridgeError {
  return err instanceof BridgeError && (code === undefined || err.code === code);
}

/** Node system error code (ENOENT, EACCES, ...), if any. */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
