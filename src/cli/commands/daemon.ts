/**
 * gitsync run / stop / status / logs - scheduler and background daemon
 */

import fs from "node:fs/promises";

import { getConfigPath, loadConfig } from "../config.js";
import { getErrnoCode } from "../errors.js";
import { createLogger, resolveLogLevel } from "../logger.js";
import { exitWithError, expandPath, formatPath } from "../shared.js";
import {
  DETACHED_CHILD_FLAG,
  getDaemonLogPath,
  getDaemonStatus,
  getPidFilePath,
  installShutdownHandlers,
  runScheduler,
  stopDaemon,
  type RunMode,
} from "../sync/daemon.js";
import { getLockPath, isProcessAlive, readLockHolder } from "../sync/lock.js";
import { summaryExitCode } from "../sync/outcome.js";

export type RunCommandOptions = {
  interval?: number;
  once?: boolean;
  daemon?: boolean;
  pidfile?: string;
  logfile?: string;
  /** false with --no-push-all */
  pushAll?: boolean;
  watch?: boolean;
  verbose?: boolean;
  detachedChild?: boolean;
};

export type PidFileOptions = {
  pidfile?: string;
};

export type StatusOptions = PidFileOptions & {
  json?: boolean;
};

export type LogsOptions = {
  lines?: number;
  logfile?: string;
};

const DEFAULT_LOG_LINES = 50;

function selectMode(options: RunCommandOptions): RunMode {
  if (options.detachedChild) return "detached-child";
  if (options.once && options.daemon) {
    exitWithError("--once and --daemon cannot be combined", "Use 'gitsync sync' for a single foreground cycle.");
  }
  if (options.daemon) return "background";
  if (options.once) return "once";
  return "continuous";
}

/**
 * Arguments that make the detached child behave like this invocation
 */
export function buildChildArgs(options: RunCommandOptions, pidFile: string, logFile: string): string[] {
  const args = ["run", DETACHED_CHILD_FLAG, "--pidfile", pidFile, "--logfile", logFile];
  if (options.interval !== undefined) args.push("--interval", String(options.interval));
  if (options.pushAll === false) args.push("--no-push-all");
  if (options.watch) args.push("--watch");
  if (options.verbose) args.push("--verbose");
  return args;
}

export async function runCommand(options: RunCommandOptions): Promise<void> {
  const mode = selectMode(options);
  const log = createLogger({ level: resolveLogLevel(options.verbose) });
  const config = await loadConfig();

  const pidFile = options.pidfile ? expandPath(options.pidfile) : getPidFilePath();
  const logFile = options.logfile ? expandPath(options.logfile) : getDaemonLogPath();

  if (mode === "background") {
    const result = await runScheduler({
      mode,
      config,
      log,
      pidFile,
      logFile,
      childArgs: buildChildArgs(options, pidFile, logFile),
    });
    if (result.mode === "background") {
      console.log(`Daemon started with PID ${result.pid}`);
      console.log(`Log file: ${formatPath(result.logFile)}`);
    }
    return;
  }

  if (config.entries.length === 0) {
    log.warn("No tracked paths; cycles will do nothing until one is added and the process restarted.");
  }

  const shutdown = installShutdownHandlers(log);
  try {
    const result = await runScheduler({
      mode,
      config,
      log,
      pidFile,
      logFile,
      intervalMinutes: options.interval,
      pushOverride: options.pushAll === false ? false : undefined,
      watch: options.watch,
      signal: shutdown.signal,
    });
    if (result.mode === "once") {
      process.exitCode = summaryExitCode(result.summary);
    }
  } finally {
    shutdown.dispose();
  }
}

/**
 * Ask the background daemon to stop. Nothing running is not an error.
 */
export async function stopCommand(options: PidFileOptions): Promise<void> {
  const pidFile = options.pidfile ? expandPath(options.pidfile) : getPidFilePath();
  const status = await getDaemonStatus(pidFile);

  if (!status.running) {
    console.log("No daemon running.");
    return;
  }

  console.log(`Stopping daemon (PID ${status.state.pid})...`);
  const result = await stopDaemon(pidFile);

  switch (result) {
    case "stopped":
    case "not-running":
      console.log("Daemon stopped.");
      return;
    case "timeout":
      exitWithError(
        `Daemon (PID ${status.state.pid}) did not exit in time`,
        "It may be finishing a slow git operation; check 'gitsync logs' and try again.",
      );
  }
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  const pidFile = options.pidfile ? expandPath(options.pidfile) : getPidFilePath();
  const daemon = await getDaemonStatus(pidFile);
  const holder = await readLockHolder(getLockPath());
  const holderPid = holder?.pid ?? null;
  const lockPid = holderPid !== null && isProcessAlive(holderPid) ? holderPid : null;
  const config = await loadConfig();

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          daemon: daemon.running ? daemon.state : null,
          lockHolder: lockPid,
          configPath: getConfigPath(),
          entries: config.entries.length,
        },
        null,
        2,
      ),
    );
    return;
  }

  if (daemon.running) {
    console.log("Daemon status: running");
    console.log(`  PID: ${daemon.state.pid}`);
    console.log(`  Started: ${daemon.state.startedAt}`);
    console.log(`  Log: ${formatPath(daemon.state.logFile)}`);
  } else {
    console.log("Daemon status: stopped");
  }
  console.log(`Instance lock: ${lockPid === null ? "free" : `held by PID ${lockPid}`}`);
  console.log(`Config: ${formatPath(getConfigPath())} (${config.entries.length} tracked)`);
}

/**
 * Print the tail of the daemon log
 */
export async function logsCommand(options: LogsOptions): Promise<void> {
  const logFile = options.logfile ? expandPath(options.logfile) : getDaemonLogPath();

  let content: string;
  try {
    content = await fs.readFile(logFile, "utf-8");
  } catch (error) {
    if (getErrnoCode(error) === "ENOENT") {
      console.log("No daemon log found.");
      return;
    }
    throw error;
  }

  const lines = content.split("\n").filter(Boolean);
  for (const line of lines.slice(-(options.lines ?? DEFAULT_LOG_LINES))) {
    console.log(line);
  }
}
