/**
 * Configuration store
 *
 * The tracked entries and process-wide defaults live in a single JSON file:
 * $GITSYNC_HOME/config.json, else $XDG_CONFIG_HOME/gitsync/config.json,
 * else ~/.config/gitsync/config.json.
 *
 * A missing file means "no entries yet" and yields the defaults. A file that
 * exists but cannot be parsed or validated raises ConfigError.
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import crypto from "node:crypto";
import * as z from "zod";

import { ConfigError, getErrnoCode } from "./errors.js";
import { expandPath } from "./shared.js";

const CONFIG_FILENAME = "config.json";
const APP_DIR = "gitsync";

export const DEFAULT_BRANCH = "main";
export const DEFAULT_COMMIT_MESSAGE = "Auto-sync";
export const DEFAULT_INTERVAL_MINUTES = 5;
export const MIN_INTERVAL_MINUTES = 1;
/** Longest sleep a Node timer can hold (2^31-1 ms), in whole minutes */
export const MAX_INTERVAL_MINUTES = 35_791;
export const DEFAULT_NETWORK_HOST = "github.com";
export const DEFAULT_NETWORK_PORT = 443;
export const DEFAULT_PROBE_TIMEOUT_SECONDS = 2;
export const DEFAULT_GIT_TIMEOUT_SECONDS = 120;

const EntryFileSchema = z
  .object({
    path: z.string().min(1),
    remote: z.string().min(1).nullable().optional(),
    branch: z.string().min(1).default(DEFAULT_BRANCH),
    push: z.boolean().default(true),
    commit_message: z.string().min(1).default(DEFAULT_COMMIT_MESSAGE),
  })
  .strict();

const ConfigFileSchema = z
  .object({
    entries: z.array(EntryFileSchema).default([]),
    interval_minutes: z
      .number()
      .int()
      .min(MIN_INTERVAL_MINUTES)
      .max(MAX_INTERVAL_MINUTES)
      .default(DEFAULT_INTERVAL_MINUTES),
    network_host: z.string().min(1).default(DEFAULT_NETWORK_HOST),
    network_port: z.number().int().min(1).max(65535).default(DEFAULT_NETWORK_PORT),
    probe_timeout_seconds: z.number().positive().default(DEFAULT_PROBE_TIMEOUT_SECONDS),
    git_timeout_seconds: z.number().positive().default(DEFAULT_GIT_TIMEOUT_SECONDS),
  })
  .strict()
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.entries.forEach((entry, index) => {
      const resolved = expandPath(entry.path);
      if (seen.has(resolved)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["entries", index, "path"],
          message: `Duplicate entry path: ${resolved}`,
        });
      }
      seen.add(resolved);
    });
  });

export type ConfigFile = z.input<typeof ConfigFileSchema>;

export type SyncEntry = {
  /** Absolute path of the tracked directory (unique key) */
  path: string;
  /** Remote URL, or null for a local-only entry */
  remote: string | null;
  branch: string;
  /** Whether this entry publishes to its remote */
  push: boolean;
  /** Commit message template; supports {timestamp} and {date} */
  commitMessage: string;
};

export type SyncConfig = {
  entries: SyncEntry[];
  intervalMinutes: number;
  /** Fallback reachability target when an entry's remote gives no host */
  networkHost: string;
  networkPort: number;
  probeTimeoutSeconds: number;
  /** Upper bound for each network git command */
  gitTimeoutSeconds: number;
};

/**
 * Get the directory holding config, lock, pidfile and log
 */
export function getConfigDir(): string {
  const override = process.env.GITSYNC_HOME;
  if (override) {
    return path.resolve(override);
  }
  const xdg = process.env.XDG_CONFIG_HOME;
  const base = xdg ? path.resolve(xdg) : path.join(os.homedir(), ".config");
  return path.join(base, APP_DIR);
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), CONFIG_FILENAME);
}

export function getDefaultConfig(): SyncConfig {
  return {
    entries: [],
    intervalMinutes: DEFAULT_INTERVAL_MINUTES,
    networkHost: DEFAULT_NETWORK_HOST,
    networkPort: DEFAULT_NETWORK_PORT,
    probeTimeoutSeconds: DEFAULT_PROBE_TIMEOUT_SECONDS,
    gitTimeoutSeconds: DEFAULT_GIT_TIMEOUT_SECONDS,
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Validate raw JSON content of the config file
 */
export function parseConfig(input: unknown, configPath: string): SyncConfig {
  const result = ConfigFileSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      `Invalid config at ${configPath}: ${formatIssues(result.error)}`,
      configPath,
    );
  }

  const data = result.data;
  return {
    entries: data.entries.map((entry) => ({
      path: expandPath(entry.path),
      remote: entry.remote ?? null,
      branch: entry.branch,
      push: entry.push,
      commitMessage: entry.commit_message,
    })),
    intervalMinutes: data.interval_minutes,
    networkHost: data.network_host,
    networkPort: data.network_port,
    probeTimeoutSeconds: data.probe_timeout_seconds,
    gitTimeoutSeconds: data.git_timeout_seconds,
  };
}

export function serializeConfig(config: SyncConfig): ConfigFile {
  return {
    entries: config.entries.map((entry) => ({
      path: entry.path,
      remote: entry.remote,
      branch: entry.branch,
      push: entry.push,
      commit_message: entry.commitMessage,
    })),
    interval_minutes: config.intervalMinutes,
    network_host: config.networkHost,
    network_port: config.networkPort,
    probe_timeout_seconds: config.probeTimeoutSeconds,
    git_timeout_seconds: config.gitTimeoutSeconds,
  };
}

/**
 * Load the configuration. A missing file yields the defaults without
 * writing anything; every other failure is a ConfigError.
 */
export async function loadConfig(configPath: string = getConfigPath()): Promise<SyncConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (getErrnoCode(error) === "ENOENT") {
      return getDefaultConfig();
    }
    throw new ConfigError(`Cannot read config at ${configPath}: ${String(error)}`, configPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Config at ${configPath} is not valid JSON: ${String(error)}`, configPath);
  }

  return parseConfig(raw, configPath);
}

/**
 * Save the configuration atomically (temp file, then rename)
 */
export async function saveConfig(
  config: SyncConfig,
  configPath: string = getConfigPath(),
): Promise<void> {
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  const tempPath = `${configPath}.${crypto.randomBytes(4).toString("hex")}.tmp`;

  try {
    await fs.writeFile(tempPath, JSON.stringify(serializeConfig(config), null, 2) + "\n", "utf-8");
    await fs.rename(tempPath, configPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export type AddEntryInput = {
  path: string;
  remote?: string | null;
  branch?: string;
  push?: boolean;
  commitMessage?: string;
};

export type AddEntryResult = {
  config: SyncConfig;
  entry: SyncEntry;
  created: boolean;
};

/**
 * Add an entry, or update the existing entry for the same path in place.
 * Attributes left undefined keep their stored value (or the default for a
 * new entry); an empty remote clears it.
 */
export function addEntry(config: SyncConfig, input: AddEntryInput): AddEntryResult {
  const entryPath = expandPath(input.path);
  const index = config.entries.findIndex((e) => e.path === entryPath);
  const existing = index >= 0 ? config.entries[index] : undefined;

  const entry: SyncEntry = {
    path: entryPath,
    remote: input.remote === undefined ? (existing?.remote ?? null) : input.remote || null,
    branch: input.branch ?? existing?.branch ?? DEFAULT_BRANCH,
    push: input.push ?? existing?.push ?? true,
    commitMessage: input.commitMessage ?? existing?.commitMessage ?? DEFAULT_COMMIT_MESSAGE,
  };

  const entries =
    index >= 0
      ? config.entries.map((e, i) => (i === index ? entry : e))
      : [...config.entries, entry];

  return {
    config: { ...config, entries },
    entry,
    created: index < 0,
  };
}

/**
 * Remove the entry for a path
 */
export function removeEntry(
  config: SyncConfig,
  entryPath: string,
): { config: SyncConfig; removed: boolean } {
  const target = expandPath(entryPath);
  const entries = config.entries.filter((e) => e.path !== target);
  return {
    config: { ...config, entries },
    removed: entries.length < config.entries.length,
  };
}

/**
 * Read-only snapshot of the tracked entries
 */
export function listEntries(config: SyncConfig): SyncEntry[] {
  return config.entries.map((entry) => ({ ...entry }));
}
