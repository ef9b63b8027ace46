/**
 * Instance lock
 *
 * A lock file holding the owner's PID guarantees that at most one live
 * gitsync process runs cycles at a time. The file is created with a hard
 * link from a fully written temp file, so it never exists half-written.
 * A lock whose owner is dead is stale and gets reclaimed. Reclaiming
 * happens under a guard file so that only one process at a time can
 * remove a stale lock.
 */

import fs from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { readFileSync, rmSync } from "node:fs";
import path from "node:path";
import crypto from "node:crypto";

import { getConfigDir } from "../config.js";
import { AlreadyRunningError, getErrnoCode } from "../errors.js";

const LOCK_FILE = "gitsync.lock";
const MAX_ATTEMPTS = 50;
const RETRY_DELAY_MS = 25;
// A guard is held for a read and a remove; one older than this was abandoned
const GUARD_STALE_MS = 10_000;

export type InstanceLock = {
  path: string;
  pid: number;
  /** Remove the lock file if we still own it. Safe to call more than once. */
  release: () => Promise<void>;
};

export type LockHolder = {
  /** null when the file content is not a PID */
  pid: number | null;
};

export function getLockPath(): string {
  return path.join(getConfigDir(), LOCK_FILE);
}

/**
 * Check whether a process exists. EPERM means it exists but belongs to
 * another user.
 */
export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) {
    return false;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return getErrnoCode(error) === "EPERM";
  }
}

function parsePid(content: string): number | null {
  const trimmed = content.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Read the current lock owner, or undefined when no lock file exists
 */
export async function readLockHolder(lockPath: string): Promise<LockHolder | undefined> {
  try {
    const content = await fs.readFile(lockPath, "utf-8");
    return { pid: parsePid(content) };
  } catch (error) {
    if (getErrnoCode(error) === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

async function tryCreateLock(lockPath: string, pid: number): Promise<boolean> {
  const tempPath = `${lockPath}.${pid}.${crypto.randomBytes(4).toString("hex")}.tmp`;
  await fs.writeFile(tempPath, `${pid}\n`, "utf-8");
  try {
    await fs.link(tempPath, lockPath);
    return true;
  } catch (error) {
    if (getErrnoCode(error) === "EEXIST") {
      return false;
    }
    throw error;
  } finally {
    await fs.rm(tempPath, { force: true });
  }
}

function releaseLockFileSync(lockPath: string, pid: number): void {
  try {
    if (parsePid(readFileSync(lockPath, "utf-8")) === pid) {
      rmSync(lockPath, { force: true });
    }
  } catch (error) {
    if (getErrnoCode(error) !== "ENOENT") {
      process.stderr.write(`Failed to release lock ${lockPath}: ${String(error)}\n`);
    }
  }
}

/**
 * Acquire the instance lock.
 *
 * @throws AlreadyRunningError when a live process holds the lock
 */
export async function acquireInstanceLock(
  lockPath: string = getLockPath(),
  pid: number = process.pid,
): Promise<InstanceLock> {
  await fs.mkdir(path.dirname(lockPath), { recursive: true });

  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    if (await tryCreateLock(lockPath, pid)) {
      return createLockHandle(lockPath, pid);
    }

    const holder = await readLockHolder(lockPath);
    if (!holder) {
      continue;
    }
    if (holder.pid !== null && isProcessAlive(holder.pid)) {
      throw new AlreadyRunningError(holder.pid, lockPath);
    }

    await reclaimStaleLock(lockPath, holder.pid, pid);
  }

  throw new Error(`Could not acquire instance lock at ${lockPath} after ${MAX_ATTEMPTS} attempts`);
}

function getGuardPath(lockPath: string): string {
  return `${lockPath}.reclaim`;
}

/**
 * Remove the lock file if it still names the stale holder. The removal runs
 * under an exclusive guard file; when another process holds the guard this
 * returns after a short wait and the caller retries.
 */
async function reclaimStaleLock(lockPath: string, stalePid: number | null, pid: number): Promise<void> {
  const guardPath = getGuardPath(lockPath);
  let guard: FileHandle;
  try {
    guard = await fs.open(guardPath, "wx");
  } catch (error) {
    if (getErrnoCode(error) !== "EEXIST") {
      throw error;
    }
    await clearAbandonedGuard(guardPath);
    await delay(RETRY_DELAY_MS);
    return;
  }

  try {
    await guard.writeFile(`${pid}\n`, "utf-8");
    const current = await readLockHolder(lockPath);
    if (current && current.pid === stalePid) {
      await fs.rm(lockPath, { force: true });
    }
  } finally {
    await guard.close();
    await fs.rm(guardPath, { force: true });
  }
}

async function clearAbandonedGuard(guardPath: string): Promise<void> {
  let content: string;
  let modifiedAt: number;
  try {
    content = await fs.readFile(guardPath, "utf-8");
    modifiedAt = (await fs.stat(guardPath)).mtimeMs;
  } catch (error) {
    if (getErrnoCode(error) === "ENOENT") {
      return;
    }
    throw error;
  }

  // An empty guard is one whose owner has not written its pid yet
  const owner = parsePid(content);
  const abandoned = owner === null ? Date.now() - modifiedAt > GUARD_STALE_MS : !isProcessAlive(owner);
  if (abandoned) {
    await fs.rm(guardPath, { force: true });
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function createLockHandle(lockPath: string, pid: number): InstanceLock {
  let released = false;

  // Last resort for paths that skip release(), e.g. process.exit()
  const onExit = () => releaseLockFileSync(lockPath, pid);
  process.on("exit", onExit);

  return {
    path: lockPath,
    pid,
    release: async () => {
      if (released) return;
      released = true;
      process.off("exit", onExit);

      const holder = await readLockHolder(lockPath);
      if (holder?.pid === pid) {
        await fs.rm(lockPath, { force: true });
      }
    },
  };
}

/**
 * Run fn while holding the instance lock; the lock is released on every
 * exit path.
 */
export async function withInstanceLock<T>(
  fn: (lock: InstanceLock) => Promise<T>,
  lockPath: string = getLockPath(),
): Promise<T> {
  const lock = await acquireInstanceLock(lockPath);
  try {
    return await fn(lock);
  } finally {
    await lock.release();
  }
}
