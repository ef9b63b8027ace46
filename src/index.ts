/**
 * gitsync - keep local directories committed and pushed to git remotes
 *
 * Library entry point. The CLI lives in ./cli/index.ts.
 */

export * from "./cli/sync/index.js";
export {
  addEntry,
  removeEntry,
  listEntries,
  loadConfig,
  saveConfig,
  parseConfig,
  getConfigDir,
  getConfigPath,
  getDefaultConfig,
  type AddEntryInput,
  type AddEntryResult,
  type SyncConfig,
  type SyncEntry,
} from "./cli/config.js";
export { AlreadyRunningError, ConfigError } from "./cli/errors.js";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./cli/logger.js";
export { ExitCode } from "./cli/shared.js";
