/**
 * Git capability used by the repository operator
 *
 * GitClient is the narrow surface the operator sequences; GitCli implements
 * it by running the git executable with bounded timeouts. Tests substitute
 * an in-memory implementation.
 */

import { execFile } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";

import { redactCredentials } from "./redact.js";

export type RemoteBranchState = "fetched" | "missing";

export type RebaseResult = { ok: true } | { ok: false; detail: string };

export interface GitClient {
  /** Create the directory and repository if needed; true when a repository was initialized */
  ensureRepo(dir: string, branch: string): Promise<boolean>;
  /** Point origin at url, adding it if missing */
  ensureRemote(dir: string, url: string): Promise<void>;
  /** Abort a rebase left behind by an interrupted run; true if one was found */
  abortInterruptedRebase(dir: string): Promise<boolean>;
  /** Check out (or create) the branch, also from detached or unborn HEAD */
  ensureBranch(dir: string, branch: string): Promise<void>;
  /** Stage everything and commit; false when the working tree is clean */
  commitIfDirty(dir: string, message: string): Promise<boolean>;
  /** Local commits not on the last-known origin/<branch> */
  countUnpushed(dir: string, branch: string): Promise<number>;
  fetch(dir: string, branch: string): Promise<RemoteBranchState>;
  /** Replay local commits onto origin/<branch>, aborting on conflict */
  rebaseOnto(dir: string, branch: string): Promise<RebaseResult>;
  push(dir: string, branch: string): Promise<void>;
}

export type GitResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

export class GitCommandError extends Error {
  constructor(
    public readonly args: string[],
    public readonly result: GitResult,
  ) {
    super(GitCommandError.describe(args, result));
    this.name = "GitCommandError";
  }

  private static describe(args: string[], result: GitResult): string {
    const command = redactCredentials(`git ${args.join(" ")}`);
    if (result.timedOut) {
      return `${command} timed out`;
    }
    const output = redactCredentials((result.stderr || result.stdout).trim());
    return `${command} failed (exit ${result.exitCode})${output ? `: ${output}` : ""}`;
  }
}

export type GitCliOptions = {
  /** Timeout for local commands in ms (default: 30s) */
  timeoutMs?: number;
  /** Timeout for commands that talk to the remote in ms (default: 120s) */
  networkTimeoutMs?: number;
  /** Extra environment variables for every git process */
  env?: NodeJS.ProcessEnv;
  /** Git executable (default: $GITSYNC_GIT_COMMAND or "git") */
  gitCommand?: string;
};

type RunOptions = {
  network?: boolean;
  allowFailure?: boolean;
};

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_NETWORK_TIMEOUT_MS = 120_000;
const MAX_BUFFER = 16 * 1024 * 1024;

export function buildGitEnv(overrides: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv {
  return {
    ...process.env,
    // Fail instead of waiting for credentials nobody will type
    GIT_TERMINAL_PROMPT: "0",
    GIT_EDITOR: "true",
    ...overrides,
  };
}

function execGit(
  command: string,
  args: string[],
  options: { cwd: string; timeout: number; env: NodeJS.ProcessEnv },
): Promise<GitResult> {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        cwd: options.cwd,
        timeout: options.timeout,
        env: options.env,
        maxBuffer: MAX_BUFFER,
        encoding: "utf8",
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }
        if (error.killed) {
          resolve({ exitCode: null, stdout, stderr, timedOut: true });
          return;
        }
        if (typeof error.code === "number") {
          resolve({ exitCode: error.code, stdout, stderr, timedOut: false });
          return;
        }
        // Spawn failure, e.g. git is not installed
        reject(error);
      },
    );
  });
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export class GitCli implements GitClient {
  private readonly timeoutMs: number;
  private readonly networkTimeoutMs: number;
  private readonly env: NodeJS.ProcessEnv;
  private readonly gitCommand: string;

  constructor(options: GitCliOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.networkTimeoutMs = options.networkTimeoutMs ?? DEFAULT_NETWORK_TIMEOUT_MS;
    this.env = buildGitEnv(options.env);
    this.gitCommand = options.gitCommand ?? process.env.GITSYNC_GIT_COMMAND ?? "git";
  }

  async run(dir: string, args: string[], options: RunOptions = {}): Promise<GitResult> {
    const result = await execGit(this.gitCommand, args, {
      cwd: dir,
      timeout: options.network ? this.networkTimeoutMs : this.timeoutMs,
      env: this.env,
    });
    if (result.timedOut || (result.exitCode !== 0 && !options.allowFailure)) {
      throw new GitCommandError(args, result);
    }
    return result;
  }

  private async succeeds(dir: string, args: string[]): Promise<boolean> {
    const result = await this.run(dir, args, { allowFailure: true });
    return result.exitCode === 0;
  }

  private hasCommits(dir: string): Promise<boolean> {
    return this.succeeds(dir, ["rev-parse", "--verify", "--quiet", "HEAD"]);
  }

  async ensureRepo(dir: string, branch: string): Promise<boolean> {
    await fs.mkdir(dir, { recursive: true });
    if (await pathExists(path.join(dir, ".git"))) {
      return false;
    }

    await this.run(dir, ["init", "--quiet"]);
    await this.run(dir, ["symbolic-ref", "HEAD", `refs/heads/${branch}`]);
    return true;
  }

  async ensureRemote(dir: string, url: string): Promise<void> {
    const current = await this.run(dir, ["remote", "get-url", "origin"], { allowFailure: true });
    if (current.exitCode !== 0) {
      await this.run(dir, ["remote", "add", "origin", url]);
    } else if (current.stdout.trim() !== url) {
      await this.run(dir, ["remote", "set-url", "origin", url]);
    }
  }

  async abortInterruptedRebase(dir: string): Promise<boolean> {
    for (const marker of ["rebase-merge", "rebase-apply"]) {
      const result = await this.run(dir, ["rev-parse", "--git-path", marker]);
      if (await pathExists(path.resolve(dir, result.stdout.trim()))) {
        await this.run(dir, ["rebase", "--abort"]);
        return true;
      }
    }
    return false;
  }

  async ensureBranch(dir: string, branch: string): Promise<void> {
    const head = await this.run(dir, ["symbolic-ref", "--quiet", "--short", "HEAD"], {
      allowFailure: true,
    });
    if (head.exitCode === 0 && head.stdout.trim() === branch) {
      return;
    }

    if (!(await this.hasCommits(dir))) {
      await this.run(dir, ["symbolic-ref", "HEAD", `refs/heads/${branch}`]);
      return;
    }

    const exists = await this.succeeds(dir, [
      "show-ref",
      "--verify",
      "--quiet",
      `refs/heads/${branch}`,
    ]);
    await this.run(dir, exists ? ["checkout", "--quiet", branch] : ["checkout", "--quiet", "-b", branch]);
  }

  async commitIfDirty(dir: string, message: string): Promise<boolean> {
    const status = await this.run(dir, ["status", "--porcelain"]);
    if (!status.stdout.trim()) {
      return false;
    }

    await this.run(dir, ["add", "--all"]);
    await this.run(dir, ["commit", "--quiet", "-m", message]);
    return true;
  }

  async countUnpushed(dir: string, branch: string): Promise<number> {
    if (!(await this.hasCommits(dir))) {
      return 0;
    }

    const tracking = `refs/remotes/origin/${branch}`;
    const hasTracking = await this.succeeds(dir, ["rev-parse", "--verify", "--quiet", tracking]);
    const range = hasTracking ? [`${tracking}..HEAD`] : ["HEAD"];
    const result = await this.run(dir, ["rev-list", "--count", ...range]);
    return Number.parseInt(result.stdout.trim(), 10) || 0;
  }

  async fetch(dir: string, branch: string): Promise<RemoteBranchState> {
    const heads = await this.run(dir, ["ls-remote", "--heads", "origin", `refs/heads/${branch}`], {
      network: true,
    });

    if (!heads.stdout.trim()) {
      // The branch is gone (or never existed); drop any stale tracking ref
      await this.run(dir, ["update-ref", "-d", `refs/remotes/origin/${branch}`], {
        allowFailure: true,
      });
      return "missing";
    }

    await this.run(
      dir,
      ["fetch", "--quiet", "origin", `+refs/heads/${branch}:refs/remotes/origin/${branch}`],
      { network: true },
    );
    return "fetched";
  }

  async rebaseOnto(dir: string, branch: string): Promise<RebaseResult> {
    const upstream = `refs/remotes/origin/${branch}`;

    if (!(await this.hasCommits(dir))) {
      // Nothing local to replay; start from the remote tip
      const checkout = await this.run(dir, ["checkout", "--quiet", "-B", branch, upstream], {
        allowFailure: true,
      });
      return checkout.exitCode === 0
        ? { ok: true }
        : { ok: false, detail: (checkout.stderr || checkout.stdout).trim() };
    }

    let rebase: GitResult;
    try {
      rebase = await this.run(dir, ["rebase", "--quiet", upstream], { allowFailure: true });
    } catch (error) {
      // Timed out mid-rebase: restore the pre-rebase state before giving up
      await this.run(dir, ["rebase", "--abort"], { allowFailure: true });
      throw error;
    }
    if (rebase.exitCode === 0) {
      return { ok: true };
    }

    await this.run(dir, ["rebase", "--abort"], { allowFailure: true });
    return { ok: false, detail: redactCredentials((rebase.stderr || rebase.stdout).trim()) };
  }

  async push(dir: string, branch: string): Promise<void> {
    await this.run(dir, ["push", "--quiet", "--set-upstream", "origin", `refs/heads/${branch}:refs/heads/${branch}`], {
      network: true,
    });
  }
}
