import { type BridgeErrorCode, isBridgeError } from "../core/errors.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1,
  NO_ELIGIBLE: 2,
  NAME_COLLISION: 3,
  WORKSPACE_NOT_FOUND: 4,
  INVALID_ARGS: 5,
  DESTINATION_LOCKED: 6,
  DESTINATION_CORRUPT: 7,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

const EXIT_BY_ERROR: Record<BridgeErrorCode, ExitCode> = {
  WORKSPACE_NOT_FOUND: EXIT.WORKSPACE_NOT_FOUND,
  PERMISSION_DENIED: EXIT.FAILURE,
  NAME_COLLISION: EXIT.NAME_COLLISION,
  WRITE_FAILURE: EXIT.FAILURE,
  MANIFEST_CORRUPT: EXIT.DESTINATION_CORRUPT,
  DESTINATION_UNREADABLE: EXIT.DESTINATION_CORRUPT,
  LOCK_HELD: EXIT.DESTINATION_LOCKED,
  CONFIG_INVALID: EXIT.INVALID_ARGS,
};

export function exitCodeForError(err: unknown): ExitCode {
  return isBridgeError(err) ? EXIT_BY_ERROR[err.code] : EXIT.FAILURE;
}
