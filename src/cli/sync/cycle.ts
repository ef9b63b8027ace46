/**
 * Cycle runner - one operator pass over every entry, in configuration order
 */

import type { SyncEntry } from "../config.js";
import { errorMessage } from "../errors.js";
import { syncEntry, type OperatorContext } from "./operator.js";
import {
  emptySummary,
  formatEntryResult,
  outcomeLogLevel,
  type CycleSummary,
  type SyncOutcome,
} from "./outcome.js";

export type CycleOptions = OperatorContext & {
  /** When aborted, the current entry finishes and the rest are skipped */
  signal?: AbortSignal;
};

export async function runCycle(
  entries: readonly SyncEntry[],
  options: CycleOptions,
): Promise<CycleSummary> {
  const summary = emptySummary();
  const { log, signal } = options;

  for (let i = 0; i < entries.length; i++) {
    if (signal?.aborted) {
      summary.cancelled = true;
      summary.skipped = entries.length - i;
      log.warn(`Shutdown requested; skipping ${summary.skipped} remaining entr${summary.skipped === 1 ? "y" : "ies"}`);
      break;
    }

    const entry = entries[i];
    const started = Date.now();
    let outcome: SyncOutcome;
    try {
      outcome = await syncEntry(entry, options);
    } catch (error) {
      // One entry must never take the rest of the cycle down with it
      outcome = { kind: "failed", step: "unexpected", committed: false, message: errorMessage(error) };
    }

    const result = { entry, outcome, durationMs: Date.now() - started };
    summary.results.push(result);
    summary.counts[outcome.kind]++;
    log[outcomeLogLevel(outcome.kind)](formatEntryResult(result));
  }

  return summary;
}
