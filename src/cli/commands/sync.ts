/**
 * gitsync sync - run one cycle over every tracked directory
 */

import { loadConfig } from "../config.js";
import { createLogger, resolveLogLevel } from "../logger.js";
import { installShutdownHandlers, syncOnce } from "../sync/daemon.js";
import { summaryExitCode } from "../sync/outcome.js";

export type SyncOptions = {
  /** false with --no-push-all: commit only, for every entry */
  pushAll?: boolean;
  verbose?: boolean;
};

export async function syncCommand(options: SyncOptions): Promise<void> {
  const log = createLogger({ level: resolveLogLevel(options.verbose) });
  const config = await loadConfig();

  if (config.entries.length === 0) {
    console.log("No tracked paths; add one first.");
    console.log("Run: gitsync add <path> --remote <url>");
    return;
  }

  const shutdown = installShutdownHandlers(log);
  try {
    const summary = await syncOnce({
      config,
      log,
      pushOverride: options.pushAll === false ? false : undefined,
      signal: shutdown.signal,
    });
    process.exitCode = summaryExitCode(summary);
  } finally {
    shutdown.dispose();
  }
}
