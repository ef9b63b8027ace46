/**
 * Scheduler and daemon lifecycle
 *
 * Modes:
 * - once: lock, one cycle, unlock
 * - continuous: lock once, then cycle / sleep until a shutdown signal
 * - background: spawn a detached copy of this CLI in continuous mode, with
 *   output appended to the log file and its PID recorded in the pidfile
 */

import fs from "node:fs/promises";
import path from "node:path";
import { spawn } from "node:child_process";
import * as z from "zod";

import { getConfigDir, MAX_INTERVAL_MINUTES, MIN_INTERVAL_MINUTES, type SyncConfig } from "../config.js";
import { AlreadyRunningError, errorMessage, getErrnoCode } from "../errors.js";
import type { Logger } from "../logger.js";
import { runCycle, type CycleOptions } from "./cycle.js";
import { GitCli, type GitClient } from "./git.js";
import { isProcessAlive, withInstanceLock, getLockPath, readLockHolder } from "./lock.js";
import { formatSummary, type CycleSummary } from "./outcome.js";
import { probe as tcpProbe, type Prober } from "./probe.js";
import { createChangeWatcher, type ChangeWatcherOptions } from "./watcher.js";

const DAEMON_LOG_FILE = "daemon.log";
const PID_FILE = "daemon.pid";
const MAX_LOG_SIZE = 1024 * 1024; // 1MB
const MINUTE_MS = 60_000;

/** Hidden flag the background parent passes to its detached child */
export const DETACHED_CHILD_FLAG = "--detached-child";

const DaemonStateSchema = z.object({
  pid: z.number().int().positive(),
  logFile: z.string().min(1),
  startedAt: z.string().min(1),
});

export type DaemonState = z.infer<typeof DaemonStateSchema>;

export type DaemonStatus = { running: false } | { running: true; state: DaemonState };

export type StopResult = "stopped" | "not-running" | "timeout";

export type Sleeper = {
  /** Resolves after ms, on abort, or on wake() */
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** End the current sleep, or the next one if none is running */
  wake: () => void;
};

export type SchedulerOptions = {
  config: SyncConfig;
  log: Logger;
  /** Defaults to the git executable, with the configured network timeout */
  git?: GitClient;
  probe?: Prober;
  /** Minutes between cycles; defaults to the configured interval */
  intervalMinutes?: number;
  pushOverride?: boolean;
  lockPath?: string;
  signal?: AbortSignal;
  /** Wake early when tracked files change */
  watch?: boolean | ChangeWatcherOptions;
  sleeper?: Sleeper;
};

export type RunMode = "once" | "continuous" | "background" | "detached-child";

export type RunOptions = SchedulerOptions & {
  mode: RunMode;
  pidFile?: string;
  logFile?: string;
  /** Arguments for the detached child (background mode) */
  childArgs?: string[];
};

export type RunResult =
  | { mode: "once"; summary: CycleSummary }
  | { mode: "continuous" | "detached-child"; cycles: number }
  | { mode: "background"; pid: number; logFile: string };

/**
 * Get PID file path
 */
export function getPidFilePath(): string {
  return path.join(getConfigDir(), PID_FILE);
}

/**
 * Get daemon log path
 */
export function getDaemonLogPath(): string {
  return path.join(getConfigDir(), DAEMON_LOG_FILE);
}

/**
 * Read the recorded daemon state. A missing or unreadable pidfile both
 * mean "no daemon recorded".
 */
export async function readDaemonState(pidFile: string = getPidFilePath()): Promise<DaemonState | undefined> {
  let content: string;
  try {
    content = await fs.readFile(pidFile, "utf-8");
  } catch (error) {
    if (getErrnoCode(error) === "ENOENT") {
      return undefined;
    }
    throw error;
  }

  try {
    const parsed = DaemonStateSchema.safeParse(JSON.parse(content));
    return parsed.success ? parsed.data : undefined;
  } catch {
    // Not JSON
    return undefined;
  }
}

export async function writeDaemonState(state: DaemonState, pidFile: string = getPidFilePath()): Promise<void> {
  await fs.mkdir(path.dirname(pidFile), { recursive: true });
  await fs.writeFile(pidFile, JSON.stringify(state, null, 2) + "\n", "utf-8");
}

/**
 * Remove the pidfile, but only if it still describes pid (when given)
 */
export async function removeDaemonState(pidFile: string = getPidFilePath(), pid?: number): Promise<void> {
  if (pid !== undefined) {
    const state = await readDaemonState(pidFile);
    if (state && state.pid !== pid) {
      return;
    }
  }
  await fs.rm(pidFile, { force: true });
}

/**
 * Get daemon status, cleaning up a pidfile left by a dead process
 */
export async function getDaemonStatus(pidFile: string = getPidFilePath()): Promise<DaemonStatus> {
  const state = await readDaemonState(pidFile);

  if (state && isProcessAlive(state.pid)) {
    return { running: true, state };
  }

  await fs.rm(pidFile, { force: true });
  return { running: false };
}

/**
 * Ask a running daemon to shut down gracefully (SIGTERM) and wait for it.
 * No daemon is not an error: the result is "not-running".
 */
export async function stopDaemon(
  pidFile: string = getPidFilePath(),
  options: { timeoutMs?: number; pollMs?: number } = {},
): Promise<StopResult> {
  const status = await getDaemonStatus(pidFile);
  if (!status.running) {
    return "not-running";
  }

  const { pid } = status.state;
  try {
    process.kill(pid, "SIGTERM");
  } catch (error) {
    if (getErrnoCode(error) !== "ESRCH") {
      throw error;
    }
  }

  const timeoutMs = options.timeoutMs ?? 30_000;
  const pollMs = options.pollMs ?? 250;
  const deadline = Date.now() + timeoutMs;

  while (isProcessAlive(pid)) {
    if (Date.now() >= deadline) {
      return "timeout";
    }
    await new Promise((r) => setTimeout(r, pollMs));
  }

  await removeDaemonState(pidFile, pid);
  return "stopped";
}

/**
 * Move the log aside once it grows past MAX_LOG_SIZE
 */
export async function rotateLog(logFile: string, maxSize: number = MAX_LOG_SIZE): Promise<boolean> {
  try {
    const stats = await fs.stat(logFile);
    if (stats.size <= maxSize) {
      return false;
    }
  } catch (error) {
    if (getErrnoCode(error) === "ENOENT") {
      return false;
    }
    throw error;
  }

  await fs.rename(logFile, `${logFile}.old`);
  return true;
}

export function createSleeper(): Sleeper {
  let wakeCurrent: (() => void) | null = null;
  let wakePending = false;

  return {
    sleep: (ms, signal) =>
      new Promise<void>((resolve) => {
        if (signal?.aborted || wakePending) {
          wakePending = false;
          resolve();
          return;
        }

        const done = () => {
          clearTimeout(timer);
          signal?.removeEventListener("abort", done);
          wakeCurrent = null;
          resolve();
        };

        const timer = setTimeout(done, ms);
        signal?.addEventListener("abort", done, { once: true });
        wakeCurrent = done;
      }),

    wake: () => {
      if (wakeCurrent) {
        wakeCurrent();
      } else {
        wakePending = true;
      }
    },
  };
}

/**
 * Resolve the interval in minutes, clamped to what a timer can hold
 */
export function effectiveIntervalMinutes(
  requested: number | undefined,
  config: SyncConfig,
  log: Logger,
): number {
  const interval = requested ?? config.intervalMinutes;
  if (!Number.isFinite(interval) || interval < MIN_INTERVAL_MINUTES) {
    log.warn(`Interval too low (${interval}); using ${MIN_INTERVAL_MINUTES} minute`);
    return MIN_INTERVAL_MINUTES;
  }
  if (interval > MAX_INTERVAL_MINUTES) {
    log.warn(`Interval too high (${interval}); using ${MAX_INTERVAL_MINUTES} minutes`);
    return MAX_INTERVAL_MINUTES;
  }
  return interval;
}

function buildCycleOptions(options: SchedulerOptions): CycleOptions {
  const { config } = options;
  return {
    git: options.git ?? new GitCli({ networkTimeoutMs: config.gitTimeoutSeconds * 1000 }),
    probe: options.probe ?? tcpProbe,
    network: { host: config.networkHost, port: config.networkPort },
    probeTimeoutMs: config.probeTimeoutSeconds * 1000,
    pushOverride: options.pushOverride,
    log: options.log,
    signal: options.signal,
  };
}

/**
 * Run exactly one cycle under the instance lock
 */
export async function syncOnce(options: SchedulerOptions): Promise<CycleSummary> {
  return withInstanceLock(async () => {
    const summary = await runCycle(options.config.entries, buildCycleOptions(options));
    if (options.config.entries.length > 0) {
      options.log.info(formatSummary(summary));
    }
    return summary;
  }, options.lockPath ?? getLockPath());
}

async function runLoop(options: SchedulerOptions): Promise<number> {
  const { config, log, signal } = options;
  const intervalMs = effectiveIntervalMinutes(options.intervalMinutes, config, log) * MINUTE_MS;
  const sleeper = options.sleeper ?? createSleeper();
  const cycleOptions = buildCycleOptions(options);

  const watcher =
    options.watch && config.entries.length > 0
      ? createChangeWatcher(
          config.entries.map((e) => e.path),
          {
            ...(typeof options.watch === "object" ? options.watch : {}),
            onError: (error) => log.warn(`Watcher error: ${errorMessage(error)}`),
          },
        )
      : null;
  watcher?.on("changes", (dirs) => {
    log.debug(`Changes detected in ${dirs.length} director${dirs.length === 1 ? "y" : "ies"}`);
    sleeper.wake();
  });

  log.info(
    `Sync loop started: ${config.entries.length} entr${config.entries.length === 1 ? "y" : "ies"}, ` +
      `every ${intervalMs / MINUTE_MS} minute(s)${watcher ? ", watching for changes" : ""}`,
  );

  let cycles = 0;
  try {
    while (!signal?.aborted) {
      cycles++;
      const summary = await runCycle(config.entries, cycleOptions);
      if (config.entries.length > 0) {
        log.info(formatSummary(summary));
      }
      if (signal?.aborted) break;
      await sleeper.sleep(intervalMs, signal);
    }
  } finally {
    await watcher?.close();
    log.info(`Sync loop stopped after ${cycles} cycle(s)`);
  }

  return cycles;
}

/**
 * Cycle until options.signal aborts, holding the instance lock throughout
 */
export async function runContinuous(options: SchedulerOptions): Promise<number> {
  return withInstanceLock(() => runLoop(options), options.lockPath ?? getLockPath());
}

/**
 * Body of the detached background process: record the daemon state after
 * taking the lock, and remove it again on the way out.
 */
async function runDetachedChild(options: RunOptions): Promise<number> {
  const pidFile = options.pidFile ?? getPidFilePath();
  const logFile = options.logFile ?? getDaemonLogPath();

  return withInstanceLock(async () => {
    await writeDaemonState({ pid: process.pid, logFile, startedAt: new Date().toISOString() }, pidFile);
    try {
      return await runLoop(options);
    } finally {
      await removeDaemonState(pidFile, process.pid);
    }
  }, options.lockPath ?? getLockPath());
}

/**
 * Start this CLI again as a detached background process
 */
export async function startDaemonBackground(options: {
  childArgs: string[];
  pidFile?: string;
  logFile?: string;
  lockPath?: string;
  startupTimeoutMs?: number;
}): Promise<{ pid: number; logFile: string }> {
  const pidFile = options.pidFile ?? getPidFilePath();
  const logFile = options.logFile ?? getDaemonLogPath();
  const lockPath = options.lockPath ?? getLockPath();

  const status = await getDaemonStatus(pidFile);
  if (status.running) {
    throw new AlreadyRunningError(status.state.pid, pidFile);
  }

  // A foreground run holds the lock without a pidfile; the child would only fail on it
  const holder = await readLockHolder(lockPath);
  if (holder && holder.pid !== null && isProcessAlive(holder.pid)) {
    throw new AlreadyRunningError(holder.pid, lockPath);
  }

  await fs.mkdir(path.dirname(logFile), { recursive: true });
  await rotateLog(logFile);

  const cliPath = process.argv[1];
  const log = await fs.open(logFile, "a");
  let childPid: number | undefined;
  try {
    const child = spawn(process.execPath, [...process.execArgv, cliPath, ...options.childArgs], {
      detached: true,
      stdio: ["ignore", log.fd, log.fd],
    });
    child.unref();
    childPid = child.pid;
  } finally {
    await log.close();
  }

  if (childPid === undefined) {
    throw new Error("Failed to start daemon in background");
  }

  // Wait for the child to take the lock and record itself
  const deadline = Date.now() + (options.startupTimeoutMs ?? 5000);
  while (Date.now() < deadline) {
    await new Promise((r) => setTimeout(r, 200));
    const state = await readDaemonState(pidFile);
    if (state?.pid === childPid && isProcessAlive(childPid)) {
      return { pid: childPid, logFile };
    }
    if (!isProcessAlive(childPid)) {
      break;
    }
  }

  throw new Error(`Failed to start daemon in background; see ${logFile}`);
}

/**
 * Scheduler entry point: pick the mode once at startup
 */
export async function runScheduler(options: RunOptions): Promise<RunResult> {
  switch (options.mode) {
    case "once":
      return { mode: "once", summary: await syncOnce(options) };
    case "continuous":
      return { mode: "continuous", cycles: await runContinuous(options) };
    case "detached-child":
      return { mode: "detached-child", cycles: await runDetachedChild(options) };
    case "background": {
      const started = await startDaemonBackground({
        childArgs: options.childArgs ?? ["run", DETACHED_CHILD_FLAG],
        pidFile: options.pidFile,
        logFile: options.logFile,
        lockPath: options.lockPath,
      });
      return { mode: "background", ...started };
    }
  }
}

/**
 * Turn SIGINT/SIGTERM into an abort of the returned signal. A second
 * signal exits immediately (the lock's exit hook still releases it).
 */
export function installShutdownHandlers(log: Logger): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();

  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      log.warn(`Received ${signal} again; exiting now`);
      process.exit(130);
    }
    log.info(`Received ${signal}; finishing the current entry before stopping`);
    controller.abort();
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    },
  };
}
