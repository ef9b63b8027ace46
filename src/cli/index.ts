#!/usr/bin/env node
/**
 * gitsync CLI
 *
 * Keeps local directories committed and pushed to their git remotes.
 */

import { InvalidArgumentError, Option, program } from "commander";

import {
  addCommand,
  listCommand,
  logsCommand,
  removeCommand,
  runCommand,
  statusCommand,
  stopCommand,
  syncCommand,
} from "./commands/index.js";
import { handleCommandError } from "./shared.js";
import { DETACHED_CHILD_FLAG } from "./sync/daemon.js";
import { VERSION } from "./version.js";

function parseInterval(value: string): number {
  const minutes = Number(value);
  if (value.trim() === "" || !Number.isFinite(minutes)) {
    throw new InvalidArgumentError("Interval must be a number of minutes.");
  }
  return minutes;
}

function parseLines(value: string): number {
  const lines = Number(value);
  if (!Number.isInteger(lines) || lines <= 0) {
    throw new InvalidArgumentError("Line count must be a positive integer.");
  }
  return lines;
}

program
  .name("gitsync")
  .description("Periodically commit and push local directories to git remotes")
  .version(VERSION);

// gitsync add <path>
program
  .command("add <path>")
  .description("Track a directory, or update a tracked one")
  .option("-r, --remote <url>", "Remote URL (empty string clears it)")
  .option("-b, --branch <name>", "Branch to commit to and push (default: main)")
  .option("--push", "Push after committing (default for new entries)")
  .option("--no-push", "Commit locally only")
  .option("-m, --commit-message <template>", "Commit message; {timestamp} and {date} are filled in")
  .action(addCommand);

// gitsync remove <path>
program
  .command("remove <path>")
  .alias("rm")
  .description("Stop tracking a directory (its files are left alone)")
  .action(removeCommand);

// gitsync list
program
  .command("list")
  .alias("ls")
  .description("List tracked directories")
  .option("--json", "Output as JSON")
  .action(listCommand);

// gitsync sync
program
  .command("sync")
  .description("Run one sync cycle now")
  .option("--no-push-all", "Commit only; do not push any entry")
  .option("-v, --verbose", "Debug logging")
  .action(syncCommand);

// gitsync run
program
  .command("run")
  .description("Sync on an interval until stopped")
  .option("-i, --interval <minutes>", "Minutes between cycles (minimum 1)", parseInterval)
  .option("--once", "Run a single cycle and exit")
  .option("-d, --daemon", "Run in the background")
  .option("--pidfile <path>", "Daemon PID file")
  .option("--logfile <path>", "Daemon log file")
  .option("--no-push-all", "Commit only; do not push any entry")
  .option("-w, --watch", "Also sync shortly after files change")
  .option("-v, --verbose", "Debug logging")
  .addOption(new Option(DETACHED_CHILD_FLAG).hideHelp())
  .action(runCommand);

// gitsync stop
program
  .command("stop")
  .description("Stop the background daemon")
  .option("--pidfile <path>", "Daemon PID file")
  .action(stopCommand);

// gitsync status
program
  .command("status")
  .description("Show daemon, lock and configuration status")
  .option("--pidfile <path>", "Daemon PID file")
  .option("--json", "Output as JSON")
  .action(statusCommand);

// gitsync logs
program
  .command("logs")
  .description("Show the daemon log")
  .option("-n, --lines <number>", "Number of lines to show (default: 50)", parseLines)
  .option("--logfile <path>", "Daemon log file")
  .action(logsCommand);

try {
  await program.parseAsync();
} catch (error) {
  handleCommandError(error);
}
