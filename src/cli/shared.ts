/**
 * Shared CLI utilities
 *
 * Path handling, exit codes and error reporting used by all CLI commands.
 */

import * as path from "node:path";
import * as os from "node:os";

import { AlreadyRunningError, ConfigError, errorMessage } from "./errors.js";

/**
 * CLI exit codes.
 *
 * @see https://nodejs.org/api/process.html#process_exit_codes
 */
export const ExitCode = {
  Success: 0,
  EntryFailed: 1,
  FatalError: 2,
  AlreadyRunning: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Expand a leading ~ and resolve to an absolute path
 */
export function expandPath(filePath: string): string {
  if (filePath === "~") {
    return os.homedir();
  }
  if (filePath.startsWith("~/")) {
    return path.resolve(os.homedir(), filePath.slice(2));
  }
  return path.resolve(filePath);
}

/**
 * Format a path for display (use ~ for home directory)
 */
export function formatPath(filePath: string): string {
  const home = os.homedir();
  if (filePath === home) {
    return "~";
  }
  if (filePath.startsWith(home + path.sep)) {
    return "~" + filePath.slice(home.length);
  }
  return filePath;
}

/**
 * Exit with an error message and optional suggestion.
 *
 * All CLI errors should use this for consistent formatting.
 */
export function exitWithError(
  message: string,
  suggestion?: string,
  code: ExitCode = ExitCode.FatalError,
): never {
  console.error(`Error: ${message}`);
  if (suggestion) {
    console.error(`  Suggestion: ${suggestion}`);
  }
  process.exit(code);
}

/**
 * Print a warning message (non-fatal).
 */
export function warn(message: string): void {
  console.error(`Warning: ${message}`);
}

/**
 * Report an error that escaped a command and exit with the matching code.
 */
export function handleCommandError(error: unknown): never {
  if (error instanceof AlreadyRunningError) {
    exitWithError(
      error.message,
      "Wait for it to finish, or run 'gitsync stop' if it is a background daemon.",
      ExitCode.AlreadyRunning,
    );
  }
  if (error instanceof ConfigError) {
    exitWithError(
      error.message,
      `Fix or remove ${formatPath(error.configPath)}`,
    );
  }
  exitWithError(errorMessage(error));
}
