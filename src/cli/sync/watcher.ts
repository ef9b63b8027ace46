/**
 * Debounced change watcher for tracked directories
 *
 * Used by the continuous scheduler to start the next cycle early when
 * files change, instead of waiting out the full interval.
 */

import chokidar, { type FSWatcher } from "chokidar";
import path from "node:path";
import { EventEmitter } from "node:events";
import { minimatch } from "minimatch";

export type ChangeWatcherOptions = {
  /** Debounce interval in milliseconds (default: 5000) */
  debounceMs?: number;
  /** Patterns, relative to each directory, whose changes are ignored */
  ignore?: string[];
  /** Use polling instead of native events (for network drives) */
  usePolling?: boolean;
  /** Polling interval in milliseconds (default: 1000) */
  pollInterval?: number;
  /** Receives watcher errors */
  onError?: (error: unknown) => void;
};

export type ChangeWatcher = {
  /** Stop watching and clean up */
  close: () => Promise<void>;
  /** Fires with the directories that changed since the last flush */
  on: (event: "changes", listener: (dirs: string[]) => void) => void;
  off: (event: "changes", listener: (dirs: string[]) => void) => void;
  /** Whether the initial scan has finished */
  readonly ready: boolean;
};

const DEFAULT_DEBOUNCE_MS = 5000;
const DEFAULT_POLL_INTERVAL = 1000;

export const DEFAULT_IGNORE = [".git", ".git/**"];

/**
 * Check whether filePath, inside dir, matches one of the ignore patterns
 */
export function isIgnored(dir: string, filePath: string, patterns: readonly string[]): boolean {
  const relativePath = path.relative(dir, filePath).split(path.sep).join("/");
  if (!relativePath || relativePath.startsWith("..")) {
    return false;
  }
  return patterns.some((pattern) => minimatch(relativePath, pattern, { dot: true }));
}

function owningDir(dirs: readonly string[], filePath: string): string | undefined {
  return dirs.find((dir) => filePath === dir || filePath.startsWith(dir + path.sep));
}

export function createChangeWatcher(
  dirs: readonly string[],
  options: ChangeWatcherOptions = {},
): ChangeWatcher {
  const debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
  const ignore = options.ignore ?? DEFAULT_IGNORE;

  const emitter = new EventEmitter();
  let watcher: FSWatcher | null = null;
  let ready = false;

  let pendingDirs = new Set<string>();
  let debounceTimer: NodeJS.Timeout | null = null;

  const flushChanges = () => {
    debounceTimer = null;
    if (pendingDirs.size > 0) {
      const changed = Array.from(pendingDirs);
      pendingDirs = new Set();
      emitter.emit("changes", changed);
    }
  };

  const ignored = (filePath: string) => {
    const dir = owningDir(dirs, filePath);
    return dir !== undefined && isIgnored(dir, filePath, ignore);
  };

  const handleEvent = (filePath: string) => {
    const dir = owningDir(dirs, filePath);
    if (!dir || isIgnored(dir, filePath, ignore)) {
      return;
    }

    pendingDirs.add(dir);
    if (debounceTimer) {
      clearTimeout(debounceTimer);
    }
    debounceTimer = setTimeout(flushChanges, debounceMs);
  };

  watcher = chokidar.watch([...dirs], {
    ignored,
    persistent: true,
    ignoreInitial: true,
    usePolling: options.usePolling ?? false,
    interval: options.pollInterval ?? DEFAULT_POLL_INTERVAL,
  });

  watcher
    .on("all", (_event, filePath) => handleEvent(filePath))
    .on("ready", () => {
      ready = true;
    })
    .on("error", (error) => {
      options.onError?.(error);
    });

  return {
    close: async () => {
      if (debounceTimer) {
        clearTimeout(debounceTimer);
        debounceTimer = null;
      }
      if (watcher) {
        await watcher.close();
        watcher = null;
      }
      emitter.removeAllListeners();
    },

    on: (event, listener) => {
      emitter.on(event, listener);
    },

    off: (event, listener) => {
      emitter.off(event, listener);
    },

    get ready() {
      return ready;
    },
  };
}
