/**
 * Repository operator
 *
 * Brings one entry to a committed, published state for one cycle:
 * ensure repo → commit → connectivity gate → fetch → rebase → push.
 * The first failing step ends the pass for that entry only.
 */

import type { SyncEntry } from "../config.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { formatPath } from "../shared.js";
import type { GitClient } from "./git.js";
import type { SyncOutcome, SyncStep } from "./outcome.js";
import { resolveProbeTarget, type ProbeTarget, type Prober } from "./probe.js";

export type OperatorContext = {
  git: GitClient;
  probe: Prober;
  /** Fallback reachability target for remotes that do not name a host */
  network: ProbeTarget;
  probeTimeoutMs: number;
  /** Run-wide push setting; overrides each entry's flag when set */
  pushOverride?: boolean;
  log: Logger;
  now?: () => Date;
};

const pad = (value: number) => String(value).padStart(2, "0");

function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function formatTimestamp(date: Date): string {
  return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Render a commit message template. {timestamp} and {date} are replaced
 * with local time; a template without placeholders gets the timestamp
 * appended in parentheses.
 */
export function renderCommitMessage(template: string, date: Date): string {
  if (!template.includes("{timestamp}") && !template.includes("{date}")) {
    return `${template} (${formatTimestamp(date)})`;
  }
  return template
    .replaceAll("{timestamp}", formatTimestamp(date))
    .replaceAll("{date}", formatDate(date));
}

export async function syncEntry(entry: SyncEntry, ctx: OperatorContext): Promise<SyncOutcome> {
  const { git, log } = ctx;
  const dir = entry.path;
  const branch = entry.branch;
  const now = ctx.now ?? (() => new Date());

  let step: SyncStep = "ensure-repo";
  let committed = false;

  try {
    if (await git.ensureRepo(dir, branch)) {
      log.info(`Initialized repository at ${formatPath(dir)} on branch ${branch}`);
    }
    if (entry.remote) {
      await git.ensureRemote(dir, entry.remote);
    }
    if (await git.abortInterruptedRebase(dir)) {
      log.warn(`Aborted a rebase left in progress in ${formatPath(dir)}`);
    }
    await git.ensureBranch(dir, branch);

    step = "commit";
    committed = await git.commitIfDirty(dir, renderCommitMessage(entry.commitMessage, now()));
    if (committed) {
      log.debug(`Committed changes in ${formatPath(dir)}`);
    }

    const pushEnabled = ctx.pushOverride ?? entry.push;
    if (!pushEnabled || !entry.remote) {
      return { kind: committed ? "committed-only" : "push-skipped-disabled" };
    }

    const target = resolveProbeTarget(entry.remote, ctx.network);
    if (target && !(await ctx.probe(target.host, target.port, ctx.probeTimeoutMs))) {
      log.debug(`${target.host}:${target.port} unreachable; not contacting remote for ${formatPath(dir)}`);
      if (committed) {
        return { kind: "committed-only" };
      }
      step = "status";
      const pending = await git.countUnpushed(dir, branch);
      return { kind: pending > 0 ? "push-skipped-offline" : "no-change" };
    }

    step = "fetch";
    const remoteState = await git.fetch(dir, branch);

    if (remoteState === "fetched") {
      step = "rebase";
      const rebase = await git.rebaseOnto(dir, branch);
      if (!rebase.ok) {
        return {
          kind: "failed",
          step,
          committed,
          message:
            `rebase onto origin/${branch} failed and was aborted; ` +
            `manual intervention required${rebase.detail ? `: ${rebase.detail}` : ""}`,
        };
      }
    }

    // Earlier offline cycles may have left commits behind, so this does
    // not depend on whether anything was committed just now.
    step = "push";
    const pending = await git.countUnpushed(dir, branch);
    if (pending === 0) {
      return { kind: "no-change" };
    }

    await git.push(dir, branch);
    log.debug(`Pushed ${pending} commit(s) from ${formatPath(dir)} to origin/${branch}`);
    return { kind: "committed-and-pushed" };
  } catch (error) {
    return { kind: "failed", step, committed, message: errorMessage(error) };
  }
}
