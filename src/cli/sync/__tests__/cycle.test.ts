/**
 * Tests for the cycle runner
 */

import { describe, it, expect, beforeEach } from "vitest";

import type { SyncEntry } from "../../config.js";
import { createLogger, type LogLevel } from "../../logger.js";
import { runCycle, type CycleOptions } from "../cycle.js";
import { formatSummary, summaryExitCode } from "../outcome.js";
import { FakeGit } from "./fake-git.js";

function makeEntry(dir: string, overrides: Partial<SyncEntry> = {}): SyncEntry {
  return {
    path: dir,
    remote: `/srv/git/${dir.split("/").pop()}.git`,
    branch: "main",
    push: true,
    commitMessage: "Auto-sync",
    ...overrides,
  };
}

describe("runCycle", () => {
  let git: FakeGit;
  let lines: Array<{ level: LogLevel; line: string }>;
  let options: CycleOptions;

  beforeEach(() => {
    git = new FakeGit();
    lines = [];
    options = {
      git,
      probe: async () => true,
      network: { host: "fallback.test", port: 443 },
      probeTimeoutMs: 2000,
      log: createLogger({ level: "debug", write: (line, level) => lines.push({ level, line }) }),
    };
  });

  it("should return an empty summary without touching anything for zero entries", async () => {
    const summary = await runCycle([], options);

    expect(summary.results).toEqual([]);
    expect(summary.cancelled).toBe(false);
    expect(git.calls).toEqual([]);
    expect(lines).toEqual([]);
    expect(formatSummary(summary)).toBe("Cycle finished: 0 entries");
  });

  it("should run entries in configuration order", async () => {
    const entries = [makeEntry("/srv/b"), makeEntry("/srv/a"), makeEntry("/srv/c")];

    const summary = await runCycle(entries, options);

    expect(summary.results.map((r) => r.entry.path)).toEqual(["/srv/b", "/srv/a", "/srv/c"]);
    const firstCallPerDir = git.calls.filter((call) => call.method === "ensureRepo").map((call) => call.dir);
    expect(firstCallPerDir).toEqual(["/srv/b", "/srv/a", "/srv/c"]);
  });

  it("should isolate a failing entry from the others", async () => {
    git.seed("/srv/a", { dirty: true });
    git.seed("/srv/b", { dirty: true });
    git.failOn("commitIfDirty", "/srv/a", new Error("index.lock exists"));

    const summary = await runCycle([makeEntry("/srv/a"), makeEntry("/srv/b")], options);

    expect(summary.results.map((r) => r.outcome.kind)).toEqual(["failed", "committed-and-pushed"]);
    expect(summary.counts.failed).toBe(1);
    expect(summary.counts["committed-and-pushed"]).toBe(1);
    expect(summaryExitCode(summary)).toBe(1);
    expect(formatSummary(summary)).toBe("Cycle finished: 2 entries (committed-and-pushed=1, failed=1)");
  });

  it("should log one line per entry at the outcome's level", async () => {
    git.seed("/srv/a", { dirty: true });
    git.seed("/srv/b");

    await runCycle([makeEntry("/srv/a"), makeEntry("/srv/b", { push: false })], options);

    const resultLines = lines.filter((l) => /\/srv\/[ab]: /.test(l.line));
    expect(resultLines.map((l) => l.level)).toEqual(["info", "debug"]);
    expect(resultLines[0].line).toMatch(/\[INFO\] \/srv\/a: committed-and-pushed \(published to remote\)$/);
    expect(resultLines[1].line).toMatch(
      /\[DEBUG\] \/srv\/b: push-skipped-disabled \(push disabled or no remote configured\)$/,
    );
  });

  it("should keep going when every entry fails", async () => {
    const entries = [makeEntry("/srv/a"), makeEntry("/srv/b")];
    const broken: CycleOptions = {
      ...options,
      now: () => {
        throw new Error("clock unavailable");
      },
    };

    const summary = await runCycle(entries, broken);

    expect(summary.results[0].outcome).toEqual({
      kind: "failed",
      step: "commit",
      committed: false,
      message: "clock unavailable",
    });
    expect(summary.results).toHaveLength(2);
    expect(summary.counts.failed).toBe(2);
  });

  it("should finish the current entry and skip the rest once aborted", async () => {
    const controller = new AbortController();
    git.seed("/srv/a", { dirty: true });
    // Abort while the first entry is in progress
    const probe = async () => {
      controller.abort();
      return true;
    };

    const entries = [
      makeEntry("/srv/a", { remote: "https://example.com/a.git" }),
      makeEntry("/srv/b"),
      makeEntry("/srv/c"),
    ];

    const summary = await runCycle(entries, { ...options, probe, signal: controller.signal });

    expect(summary.results.map((r) => r.outcome.kind)).toEqual(["committed-and-pushed"]);
    expect(summary.cancelled).toBe(true);
    expect(summary.skipped).toBe(2);
    expect(git.repos.has("/srv/b")).toBe(false);
    expect(formatSummary(summary)).toBe("Cycle interrupted: 3 entries (committed-and-pushed=1, skipped=2)");
    expect(lines.at(-1)?.line).toMatch(/\[WARN\] Shutdown requested; skipping 2 remaining entries$/);
  });
});
