/**
 * gitsync add / remove / list - manage tracked directories
 */

import {
  addEntry,
  getConfigPath,
  listEntries,
  loadConfig,
  removeEntry,
  saveConfig,
  type SyncEntry,
} from "../config.js";
import { formatPath, warn } from "../shared.js";

export type AddOptions = {
  remote?: string;
  branch?: string;
  /** undefined keeps the stored value (true for new entries) */
  push?: boolean;
  commitMessage?: string;
};

export type ListOptions = {
  json?: boolean;
};

function describeEntry(entry: SyncEntry): string[] {
  return [
    `  Path:    ${formatPath(entry.path)}`,
    `  Remote:  ${entry.remote ?? "(none)"}`,
    `  Branch:  ${entry.branch}`,
    `  Push:    ${entry.push ? "enabled" : "disabled"}`,
    `  Message: ${entry.commitMessage}`,
  ];
}

/**
 * Track a directory, or update the settings of one already tracked
 */
export async function addCommand(dir: string, options: AddOptions): Promise<void> {
  const configPath = getConfigPath();
  const config = await loadConfig(configPath);

  const result = addEntry(config, {
    path: dir,
    remote: options.remote,
    branch: options.branch,
    push: options.push,
    commitMessage: options.commitMessage,
  });
  await saveConfig(result.config, configPath);

  console.log(result.created ? "Added entry:" : "Updated entry:");
  for (const line of describeEntry(result.entry)) {
    console.log(line);
  }
  if (result.entry.push && !result.entry.remote) {
    warn("Push is enabled but no remote is set; changes will only be committed locally.");
  }
}

/**
 * Stop tracking a directory. The directory itself is left untouched.
 */
export async function removeCommand(dir: string): Promise<void> {
  const configPath = getConfigPath();
  const config = await loadConfig(configPath);

  const result = removeEntry(config, dir);
  if (!result.removed) {
    console.log(`Not tracked: ${dir}`);
    return;
  }

  await saveConfig(result.config, configPath);
  console.log(`Removed entry: ${dir}`);
}

export async function listCommand(options: ListOptions): Promise<void> {
  const config = await loadConfig();
  const entries = listEntries(config);

  if (options.json) {
    console.log(JSON.stringify(entries, null, 2));
    return;
  }

  if (entries.length === 0) {
    console.log("No tracked paths.");
    console.log("Run: gitsync add <path> --remote <url>");
    return;
  }

  console.log(`Tracked paths (${entries.length}):`);
  for (const entry of entries) {
    console.log();
    for (const line of describeEntry(entry)) {
      console.log(line);
    }
  }
}
