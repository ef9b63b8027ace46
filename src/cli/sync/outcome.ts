/**
 * Sync outcomes and cycle summaries
 */

import type { SyncEntry } from "../config.js";
import type { LogLevel } from "../logger.js";
import { ExitCode, formatPath } from "../shared.js";

export const SYNC_OUTCOME_KINDS = [
  "no-change",
  "committed-only",
  "committed-and-pushed",
  "push-skipped-offline",
  "push-skipped-disabled",
  "failed",
] as const;

export type SyncOutcomeKind = (typeof SYNC_OUTCOME_KINDS)[number];

/** Operator step an entry was in when it failed */
export type SyncStep = "ensure-repo" | "commit" | "status" | "fetch" | "rebase" | "push" | "unexpected";

export type SyncOutcome =
  | { kind: Exclude<SyncOutcomeKind, "failed"> }
  | {
      kind: "failed";
      step: SyncStep;
      message: string;
      /** Whether a commit was made before the failure */
      committed: boolean;
    };

export type EntrySyncResult = {
  entry: SyncEntry;
  outcome: SyncOutcome;
  durationMs: number;
};

export type CycleSummary = {
  /** Results in configuration order */
  results: EntrySyncResult[];
  counts: Record<SyncOutcomeKind, number>;
  /** Entries not attempted because shutdown was requested */
  skipped: number;
  cancelled: boolean;
};

export function emptyCounts(): Record<SyncOutcomeKind, number> {
  return {
    "no-change": 0,
    "committed-only": 0,
    "committed-and-pushed": 0,
    "push-skipped-offline": 0,
    "push-skipped-disabled": 0,
    failed: 0,
  };
}

export function emptySummary(): CycleSummary {
  return { results: [], counts: emptyCounts(), skipped: 0, cancelled: false };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled outcome: ${JSON.stringify(value)}`);
}

export function describeOutcome(outcome: SyncOutcome): string {
  switch (outcome.kind) {
    case "no-change":
      return "idle, nothing to commit or push";
    case "committed-only":
      return "committed locally";
    case "committed-and-pushed":
      return "published to remote";
    case "push-skipped-offline":
      return "remote unreachable, unpushed commits will be pushed on a later run";
    case "push-skipped-disabled":
      return "push disabled or no remote configured";
    case "failed":
      return `failed during ${outcome.step}: ${outcome.message}`;
    default:
      return assertNever(outcome);
  }
}

export function outcomeLogLevel(kind: SyncOutcomeKind): LogLevel {
  switch (kind) {
    case "no-change":
    case "push-skipped-disabled":
      return "debug";
    case "committed-only":
    case "committed-and-pushed":
    case "push-skipped-offline":
      return "info";
    case "failed":
      return "error";
    default:
      return assertNever(kind);
  }
}

export function formatEntryResult(result: EntrySyncResult): string {
  return `${formatPath(result.entry.path)}: ${result.outcome.kind} (${describeOutcome(result.outcome)})`;
}

export function formatSummary(summary: CycleSummary): string {
  const parts = SYNC_OUTCOME_KINDS.filter((kind) => summary.counts[kind] > 0).map(
    (kind) => `${kind}=${summary.counts[kind]}`,
  );
  if (summary.skipped > 0) {
    parts.push(`skipped=${summary.skipped}`);
  }
  const total = summary.results.length + summary.skipped;
  const noun = total === 1 ? "entry" : "entries";
  const details = parts.length > 0 ? ` (${parts.join(", ")})` : "";
  return `Cycle ${summary.cancelled ? "interrupted" : "finished"}: ${total} ${noun}${details}`;
}

export function hasFailures(summary: CycleSummary): boolean {
  return summary.counts.failed > 0;
}

export function summaryExitCode(summary: CycleSummary): ExitCode {
  return hasFailures(summary) ? ExitCode.EntryFailed : ExitCode.Success;
}
