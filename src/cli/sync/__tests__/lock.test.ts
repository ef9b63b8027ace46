/**
 * Tests for the instance lock
 */

import { describe, it, beforeEach, afterEach, expect } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";

import { AlreadyRunningError } from "../../errors.js";
import { acquireInstanceLock, isProcessAlive, readLockHolder, withInstanceLock } from "../lock.js";

// Far above any real pid_max
const DEAD_PID = 999_999_999;

describe("Instance lock", () => {
  let tempDir: string;
  let lockPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "gitsync-lock-test-"));
    lockPath = path.join(tempDir, "gitsync.lock");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("isProcessAlive", () => {
    it("should report the current process as alive", () => {
      expect(isProcessAlive(process.pid)).toBe(true);
    });

    it("should report a nonexistent pid as dead", () => {
      expect(isProcessAlive(DEAD_PID)).toBe(false);
    });

    it("should reject pids that are not positive integers", () => {
      expect(isProcessAlive(0)).toBe(false);
      expect(isProcessAlive(-1)).toBe(false);
      expect(isProcessAlive(1.5)).toBe(false);
    });
  });

  it("should create the lock file with our pid", async () => {
    const lock = await acquireInstanceLock(lockPath);

    expect(await fs.readFile(lockPath, "utf-8")).toBe(`${process.pid}\n`);
    expect(await readLockHolder(lockPath)).toEqual({ pid: process.pid });

    await lock.release();
  });

  it("should leave no temp files behind", async () => {
    const lock = await acquireInstanceLock(lockPath);

    expect(await fs.readdir(tempDir)).toEqual(["gitsync.lock"]);

    await lock.release();
  });

  it("should refuse while a live process holds the lock", async () => {
    await fs.writeFile(lockPath, `${process.pid}\n`);

    const attempt = acquireInstanceLock(lockPath);

    await expect(attempt).rejects.toBeInstanceOf(AlreadyRunningError);
    await expect(attempt).rejects.toMatchObject({ pid: process.pid, lockPath });
    // The holder's lock is untouched
    expect(await fs.readFile(lockPath, "utf-8")).toBe(`${process.pid}\n`);
  });

  it("should refuse a second acquisition in the same process", async () => {
    const lock = await acquireInstanceLock(lockPath);

    await expect(acquireInstanceLock(lockPath)).rejects.toThrow(
      `Another gitsync instance is already running (PID ${process.pid})`,
    );

    await lock.release();
  });

  it("should reclaim a lock left by a dead process", async () => {
    await fs.writeFile(lockPath, `${DEAD_PID}\n`);

    const lock = await acquireInstanceLock(lockPath);

    expect(await readLockHolder(lockPath)).toEqual({ pid: process.pid });
    await lock.release();
  });

  it("should reclaim a lock file that does not contain a pid", async () => {
    await fs.writeFile(lockPath, "not a pid");

    expect(await readLockHolder(lockPath)).toEqual({ pid: null });
    const lock = await acquireInstanceLock(lockPath);

    expect(await readLockHolder(lockPath)).toEqual({ pid: process.pid });
    await lock.release();
  });

  it("should not remove a stale lock while another process is reclaiming it", async () => {
    const guardPath = `${lockPath}.reclaim`;
    await fs.writeFile(lockPath, `${DEAD_PID}\n`);
    // Another live process is mid-reclaim
    await fs.writeFile(guardPath, `${process.pid}\n`);

    const contender = acquireInstanceLock(lockPath, 4242);
    await new Promise((resolve) => setTimeout(resolve, 100));

    expect(await fs.readFile(lockPath, "utf-8")).toBe(`${DEAD_PID}\n`);

    // The other process finishes: its own lock replaces the stale one in one step
    await fs.writeFile(`${lockPath}.next`, `${process.pid}\n`);
    await fs.rename(`${lockPath}.next`, lockPath);
    await fs.rm(guardPath);

    await expect(contender).rejects.toBeInstanceOf(AlreadyRunningError);
    expect(await readLockHolder(lockPath)).toEqual({ pid: process.pid });
  });

  it("should clear a reclaim guard left by a dead process", async () => {
    await fs.writeFile(lockPath, `${DEAD_PID}\n`);
    await fs.writeFile(`${lockPath}.reclaim`, `${DEAD_PID}\n`);

    const lock = await acquireInstanceLock(lockPath);

    expect(await readLockHolder(lockPath)).toEqual({ pid: process.pid });
    expect(await fs.readdir(tempDir)).toEqual(["gitsync.lock"]);
    await lock.release();
  });

  it("should let exactly one of two concurrent reclaimers win", async () => {
    await fs.writeFile(lockPath, `${DEAD_PID}\n`);

    const results = await Promise.allSettled([acquireInstanceLock(lockPath), acquireInstanceLock(lockPath)]);

    const won = results.flatMap((r) => (r.status === "fulfilled" ? [r.value] : []));
    const lost = results.flatMap((r) => (r.status === "rejected" ? [r.reason] : []));
    expect(won).toHaveLength(1);
    expect(lost).toHaveLength(1);
    expect(lost[0]).toBeInstanceOf(AlreadyRunningError);
    expect(await readLockHolder(lockPath)).toEqual({ pid: process.pid });

    for (const lock of won) {
      await lock.release();
    }
  });

  it("should remove the file on release, and tolerate a second release", async () => {
    const lock = await acquireInstanceLock(lockPath);

    await lock.release();
    await lock.release();

    expect(await readLockHolder(lockPath)).toBeUndefined();
  });

  it("should not remove a lock that another process now owns", async () => {
    const lock = await acquireInstanceLock(lockPath);
    await fs.writeFile(lockPath, `${DEAD_PID}\n`);

    await lock.release();

    expect(await readLockHolder(lockPath)).toEqual({ pid: DEAD_PID });
  });

  describe("withInstanceLock", () => {
    it("should hold the lock while fn runs", async () => {
      const holder = await withInstanceLock(() => readLockHolder(lockPath), lockPath);

      expect(holder).toEqual({ pid: process.pid });
      expect(await readLockHolder(lockPath)).toBeUndefined();
    });

    it("should release the lock when fn throws", async () => {
      await expect(
        withInstanceLock(async () => {
          throw new Error("cycle blew up");
        }, lockPath),
      ).rejects.toThrow("cycle blew up");

      expect(await readLockHolder(lockPath)).toBeUndefined();
    });
  });
});
