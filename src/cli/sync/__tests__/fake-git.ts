/**
 * In-memory GitClient for operator, cycle and scheduler tests.
 *
 * Commits are opaque ids; a remote branch is the list of ids it holds (or
 * absent when the branch does not exist yet).
 */

import type { GitClient, RebaseResult, RemoteBranchState } from "../git.js";

export type FakeRepo = {
  branch: string;
  dirty: boolean;
  commits: string[];
  messages: string[];
  remoteUrl: string | null;
  /** Last-known origin/<branch>, null when never fetched or gone */
  tracking: string[] | null;
  conflictOnRebase: boolean;
  rebaseInProgress: boolean;
};

export type GitMethod = keyof GitClient;

export type GitCall = { method: GitMethod; dir: string };

export class FakeGit implements GitClient {
  readonly repos = new Map<string, FakeRepo>();
  readonly remotes = new Map<string, string[]>();
  readonly calls: GitCall[] = [];
  private readonly failures = new Map<string, Error>();
  private nextCommit = 1;

  /** Create (or replace) a repository with the given state */
  seed(dir: string, state: Partial<FakeRepo> = {}): FakeRepo {
    const repo: FakeRepo = {
      branch: "main",
      dirty: false,
      commits: [],
      messages: [],
      remoteUrl: null,
      tracking: null,
      conflictOnRebase: false,
      rebaseInProgress: false,
      ...state,
    };
    this.repos.set(dir, repo);
    return repo;
  }

  repo(dir: string): FakeRepo {
    const repo = this.repos.get(dir);
    if (!repo) {
      throw new Error(`fatal: not a git repository: ${dir}`);
    }
    return repo;
  }

  /** Make the next calls of method on dir throw */
  failOn(method: GitMethod, dir: string, error: Error): void {
    this.failures.set(`${method}:${dir}`, error);
  }

  /** Simulate another machine pushing a commit */
  pushFromElsewhere(url: string, id: string): void {
    this.remotes.set(url, [...(this.remotes.get(url) ?? []), id]);
  }

  methodsCalled(dir: string): GitMethod[] {
    return this.calls.filter((call) => call.dir === dir).map((call) => call.method);
  }

  private record(method: GitMethod, dir: string): void {
    this.calls.push({ method, dir });
    const failure = this.failures.get(`${method}:${dir}`);
    if (failure) {
      throw failure;
    }
  }

  private remoteOf(dir: string): string {
    const url = this.repo(dir).remoteUrl;
    if (!url) {
      throw new Error("fatal: 'origin' does not appear to be a git repository");
    }
    return url;
  }

  async ensureRepo(dir: string, branch: string): Promise<boolean> {
    this.record("ensureRepo", dir);
    if (this.repos.has(dir)) {
      return false;
    }
    this.seed(dir, { branch });
    return true;
  }

  async ensureRemote(dir: string, url: string): Promise<void> {
    this.record("ensureRemote", dir);
    this.repo(dir).remoteUrl = url;
  }

  async abortInterruptedRebase(dir: string): Promise<boolean> {
    this.record("abortInterruptedRebase", dir);
    const repo = this.repo(dir);
    const found = repo.rebaseInProgress;
    repo.rebaseInProgress = false;
    return found;
  }

  async ensureBranch(dir: string, branch: string): Promise<void> {
    this.record("ensureBranch", dir);
    this.repo(dir).branch = branch;
  }

  async commitIfDirty(dir: string, message: string): Promise<boolean> {
    this.record("commitIfDirty", dir);
    const repo = this.repo(dir);
    if (!repo.dirty) {
      return false;
    }
    repo.commits.push(`local-${this.nextCommit++}`);
    repo.messages.push(message);
    repo.dirty = false;
    return true;
  }

  async countUnpushed(dir: string): Promise<number> {
    this.record("countUnpushed", dir);
    const repo = this.repo(dir);
    const tracking = repo.tracking;
    return tracking ? repo.commits.filter((id) => !tracking.includes(id)).length : repo.commits.length;
  }

  async fetch(dir: string): Promise<RemoteBranchState> {
    this.record("fetch", dir);
    const repo = this.repo(dir);
    const remote = this.remotes.get(this.remoteOf(dir));
    if (!remote) {
      repo.tracking = null;
      return "missing";
    }
    repo.tracking = [...remote];
    return "fetched";
  }

  async rebaseOnto(dir: string): Promise<RebaseResult> {
    this.record("rebaseOnto", dir);
    const repo = this.repo(dir);
    const upstream = repo.tracking ?? [];
    if (repo.conflictOnRebase) {
      return { ok: false, detail: "CONFLICT (content): Merge conflict in notes.md" };
    }
    const localOnly = repo.commits.filter((id) => !upstream.includes(id));
    repo.commits = [...upstream, ...localOnly];
    return { ok: true };
  }

  async push(dir: string): Promise<void> {
    this.record("push", dir);
    const repo = this.repo(dir);
    const url = this.remoteOf(dir);
    const remote = this.remotes.get(url) ?? [];
    if (remote.some((id) => !repo.commits.includes(id))) {
      throw new Error("! [rejected] main -> main (fetch first)");
    }
    this.remotes.set(url, [...repo.commits]);
    repo.tracking = [...repo.commits];
  }
}
