/**
 * Error types shared by the CLI and the sync engine
 */

export type ErrnoException = NodeJS.ErrnoException;

export const isErrnoException = (error: unknown): error is ErrnoException =>
  error instanceof Error && "code" in error;

export const getErrnoCode = (error: unknown): string | undefined =>
  isErrnoException(error) && typeof error.code === "string"
    ? error.code
    : undefined;

/**
 * The configuration store is unreadable or malformed.
 * Always fatal: syncing with guessed defaults could touch the wrong directories.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Another live process holds the instance lock
 */
export class AlreadyRunningError extends Error {
  constructor(
    public readonly pid: number,
    public readonly lockPath: string,
  ) {
    super(`Another gitsync instance is already running (PID ${pid})`);
    this.name = "AlreadyRunningError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
