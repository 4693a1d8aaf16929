/**
 * filelock.ts — Advisory file locking and atomic write utilities.
 *
 * Locks are a `.lock` sidecar created with O_EXCL and holding the owner's
 * PID, so the CLI and the bot can both touch the knowledge base. Writes go
 * to a temp file in the same directory and are renamed over the target.
 */

import fs from "node:fs";
import path from "node:path";
import { PersistenceError } from "./errors.js";

const LOCK_POLL_MS = 50;
const LOCK_TIMEOUT_MS = 10_000;
const LOCK_STALE_MS = 60_000;

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * A lock is stale when its owning process is gone, or when no PID can be
 * read and the file is older than LOCK_STALE_MS.
 */
function isLockStale(lockPath: string): boolean {
  try {
    const pid = parseInt(fs.readFileSync(lockPath, "utf-8").trim(), 10);
    if (!isNaN(pid)) {
      try {
        process.kill(pid, 0);
        return false;
      } catch {
        return true;
      }
    }
    return Date.now() - fs.statSync(lockPath).mtimeMs > LOCK_STALE_MS;
  } catch {
    return true;
  }
}

function removeQuietly(filePath: string): void {
  fs.rmSync(filePath, { force: true });
}

function acquireLockSync(filePath: string): () => void {
  const lockPath = filePath + ".lock";
  const deadline = Date.now() + LOCK_TIMEOUT_MS;

  for (;;) {
    try {
      const fd = fs.openSync(lockPath, fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_EXCL);
      fs.writeSync(fd, process.pid.toString());
      fs.closeSync(fd);
      break;
    } catch (err: unknown) {
      if (!isErrnoException(err) || err.code !== "EEXIST") throw err;
      if (Date.now() > deadline) {
        throw new Error(`Timeout acquiring lock on ${lockPath}`);
      }
      if (isLockStale(lockPath)) {
        removeQuietly(lockPath);
        continue;
      }
      Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, LOCK_POLL_MS);
    }
  }

  return () => removeQuietly(lockPath);
}

/**
 * Execute `fn` while holding an exclusive file lock on `filePath`.
 */
export function withFileLockSync<T>(filePath: string, fn: () => T): T {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const release = acquireLockSync(filePath);
  try {
    return fn();
  } finally {
    release();
  }
}

/**
 * Write `data` to `filePath` atomically via a temp file + rename.
 * Throws PersistenceError; the previous file is left untouched on failure.
 */
export function atomicWrite(filePath: string, data: string): void {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.tmp-${process.pid}-${Date.now()}`);
  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(tmpPath, data, "utf-8");
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    removeQuietly(tmpPath);
    throw new PersistenceError(filePath, err);
  }
}
