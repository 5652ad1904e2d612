import type { RepoSlug } from './types';

/**
 * IVersionControl - Git primitives consumed by the release flow
 *
 * Every method works against the repository the implementation was created
 * for. Refs are plain git revisions (`master`, `upstream/master`, `v1.2.0`,
 * a SHA, `HEAD`).
 */
export interface IVersionControl {
  // ─── Repository ────────────────────────────────────────────────────────
  /** Absolute path of the working tree root */
  root(): Promise<string>;
  /** Remote names (e.g. origin, upstream) */
  remotes(): Promise<string[]>;
  /** Owner and repository parsed from a remote URL */
  remoteSlug(remote: string): Promise<RepoSlug>;

  // ─── Sync ──────────────────────────────────────────────────────────────
  /** Fetch tags and branches from the given remotes, pruning stale refs */
  fetch(...remotes: string[]): Promise<void>;
  /** Rebase-pull the current branch from a remote */
  pull(remote: string): Promise<void>;
  /** Push a branch (or tag) and set its upstream */
  push(remote: string, branch: string, force?: boolean): Promise<void>;
  /** Force-push a single tag */
  pushTag(tag: string, remote: string): Promise<void>;

  // ─── Branches ──────────────────────────────────────────────────────────
  currentBranch(): Promise<string>;
  /** Local branches, or branches of `remote` with the remote prefix stripped */
  branches(remote?: string): Promise<string[]>;
  /** Commit SHA a ref points at */
  branchSha(ref: string): Promise<string>;
  createBranch(branch: string, base: string): Promise<void>;
  checkout(branch: string): Promise<void>;
  /** Hard reset of the current branch onto a ref */
  reset(ref: string): Promise<void>;
  /**
   * Rebase the current branch onto `onto`. With `commits`, only the last
   * `commits` commits are moved. Returns whether HEAD changed.
   */
  rebase(onto: string, commits?: number): Promise<boolean>;
  /** Whether `branch` exists on `remote` at the same SHA as locally */
  isUpToDate(branch: string, remote: string): Promise<boolean>;

  // ─── History ───────────────────────────────────────────────────────────
  /** Subject lines of the last `count` commits on a ref, newest first */
  log(ref: string, count?: number): Promise<string[]>;
  lastCommitMessage(ref: string): Promise<string>;
  /** SHA of the newest commit whose message matches, or '' */
  findCommitSha(message: string): Promise<string>;
  /** Full message of a commit */
  commitMessage(sha: string): Promise<string>;
  /** Paths touched by a commit relative to its first parent */
  filesChanged(sha: string): Promise<string[]>;

  // ─── Working tree ──────────────────────────────────────────────────────
  /** No staged and no unstaged changes to tracked files */
  isClean(): Promise<boolean>;
  /** Unstaged changes to tracked files */
  hasUnstagedChanges(): Promise<boolean>;
  /** Paths that differ from HEAD (staged or not) */
  changedFiles(): Promise<string[]>;
  add(...files: string[]): Promise<void>;
  /**
   * Commit staged changes. Amends when the last commit of the current
   * branch already carries `title`.
   */
  commit(title: string, body: string): Promise<void>;
  /** Stash everything including untracked files. Returns whether anything was stashed */
  stash(): Promise<boolean>;
  stashPop(): Promise<void>;

  // ─── Tags ──────────────────────────────────────────────────────────────
  /** Release tags merged into HEAD, newest first */
  releaseTags(withRc?: boolean): Promise<string[]>;
  releaseTagExists(tag: string): Promise<boolean>;
  /** Most recent `v*` tag reachable from HEAD */
  currentTag(): Promise<string>;
  /** Create an annotated tag on HEAD */
  tag(tag: string, message: string, sign: boolean): Promise<void>;
  tagHasSignature(tag: string): Promise<boolean>;
  verifyTag(tag: string): Promise<boolean>;
  /** Replace an annotated tag with a signed one carrying the same message */
  signTag(tag: string): Promise<void>;
}
