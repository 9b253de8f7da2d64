import fs from "node:fs";
import path from "node:path";
import { BridgeError, errnoCode, errorMessage } from "../core/errors.js";

export const LOCK_FILE = ".bridge.lock";

export type LockOptions = {
  /** A lock file older than this is treated as abandoned and replaced. */
  staleSeconds: number;
  now?: () => Date;
};

export type LockInfo = {
  pid: number;
  acquired_at: string;
};

function tryCreate(lockPath: string, info: LockInfo): boolean {
  let fd: number;
  try {
    fd = fs.openSync(lockPath, "wx");
  } catch (e) {
    if (errnoCode(e) === "EEXIST") return false;
    throw new BridgeError("DESTINATION_UNREADABLE", `Cannot create lock ${lockPath}: ${errorMessage(e)}`, { path: lockPath }, { cause: e });
  }
  try {
    fs.writeSync(fd, JSON.stringify(info) + "\n");
  } finally {
    fs.closeSync(fd);
  }
  return true;
}

function describeHolder(lockPath: string): string {
  try {
    return fs.readFileSync(lockPath, "utf8").trim();
  } catch (e) {
    return `unreadable (${errorMessage(e)})`;
  }
}

/**
 * Acquire <destRoot>/.bridge.lock with exclusive-create semantics. A stale
 * lock is removed and creation retried once.
 */
export function acquireLock(destRoot: string, opts: LockOptions): string {
  const now = opts.now ?? (() => new Date());
  const lockPath = path.join(destRoot, LOCK_FILE);
  const info: LockInfo = { pid: process.pid, acquired_at: now().toISOString() };

  if (tryCreate(lockPath, info)) return lockPath;

  let ageMs = 0;
  try {
    ageMs = now().getTime() - fs.statSync(lockPath).mtime.getTime();
  } catch (e) {
    // Released between our attempt and the stat.
    if (errnoCode(e) !== "ENOENT") throw e;
    ageMs = Number.POSITIVE_INFINITY;
  }

  if (ageMs > opts.staleSeconds * 1000) {
    fs.rmSync(lockPath, { force: true });
    if (tryCreate(lockPath, info)) return lockPath;
  }

  throw new BridgeError("LOCK_HELD", `Destination is locked by another run: ${describeHolder(lockPath)}`, { path: lockPath });
}

export function releaseLock(lockPath: string): void {
  fs.rmSync(lockPath, { force: true });
}

/**
 * Run `fn` while holding the destination lock. The lock is released on every
 * exit path, including a thrown error.
 */
export async function withDestinationLock<T>(
  destRoot: string,
  opts: LockOptions,
  fn: () => T | Promise<T>,
): Promise<T> {
  const lockPath = acquireLock(destRoot, opts);
  try {
    return await fn();
  } finally {
    releaseLock(lockPath);
  }
}
