/**
 * CLI Commands
 */

export { addCommand, removeCommand, listCommand, type AddOptions, type ListOptions } from "./entries.js";
export { syncCommand, type SyncOptions } from "./sync.js";
export {
  runCommand,
  stopCommand,
  statusCommand,
  logsCommand,
  buildChildArgs,
  type RunCommandOptions,
  type PidFileOptions,
  type StatusOptions,
  type LogsOptions,
} from "./daemon.js";
