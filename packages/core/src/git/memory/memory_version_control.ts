/**
 * MemoryVersionControl - In-memory IVersionControl for tests
 *
 * Histories are arrays of commits, oldest first. Remote-tracking refs
 * (`origin/master`) read the remote's branches directly, so fetch only
 * needs to copy tags.
 *
 * Test Helpers:
 * - setBranch(name, commits) / setCurrentBranch(name)
 * - setRemote(name, url) / setRemoteBranch(remote, name, commits)
 * - setTag(name, tag) / setRemoteTag(remote, name, tag)
 * - touch(...paths): mark files as modified in the working tree
 * - operations: names of mutating calls, in order
 *
 * @module git/memory
 */

import type { IVersionControl } from '../version_control';
import type { RepoSlug } from '../types';
import { BranchNotFoundError, GitCommandError, RemoteError } from '../errors';
import { parseRemoteSlug } from '../remote';
import { sortReleaseTags } from '../../version';

export type MemoryCommit = {
  sha: string;
  /** Subject line */
  message: string;
  body: string;
  files: string[];
};

export type MemoryTag = {
  /** Tagged commit */
  sha: string;
  message: string;
  signed: boolean;
  /** Outcome of signature verification for signed tags */
  valid: boolean;
};

type MemoryRemote = {
  url: string;
  branches: Map<string, MemoryCommit[]>;
  tags: Map<string, MemoryTag>;
};

type Stashed = {
  unstaged: string[];
  staged: string[];
};

/** Commit fixture with no files and no body */
export function memoryCommit(sha: string, message: string, files: string[] = []): MemoryCommit {
  return { sha, message, body: '', files };
}

export class MemoryVersionControl implements IVersionControl {
  readonly operations: string[] = [];

  private readonly repoRoot: string;
  private current: string;
  private readonly branchMap = new Map<string, MemoryCommit[]>();
  private readonly remoteMap = new Map<string, MemoryRemote>();
  private readonly tagMap = new Map<string, MemoryTag>();
  private unstaged: string[] = [];
  private staged: string[] = [];
  private readonly stashes: Stashed[] = [];
  private shaCounter = 0;

  constructor(repoRoot: string = '/repo', currentBranch: string = 'master') {
    this.repoRoot = repoRoot;
    this.current = currentBranch;
    this.branchMap.set(currentBranch, []);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  setBranch(name: string, commits: MemoryCommit[]): void {
    this.branchMap.set(name, [...commits]);
  }

  setCurrentBranch(name: string): void {
    if (!this.branchMap.has(name)) {
      this.branchMap.set(name, []);
    }
    this.current = name;
  }

  getBranch(name: string): MemoryCommit[] | undefined {
    const commits = this.branchMap.get(name);
    return commits ? [...commits] : undefined;
  }

  setRemote(name: string, url: string): void {
    const existing = this.remoteMap.get(name);
    this.remoteMap.set(name, {
      url,
      branches: existing?.branches ?? new Map(),
      tags: existing?.tags ?? new Map(),
    });
  }

  setRemoteBranch(remote: string, name: string, commits: MemoryCommit[]): void {
    this.requireRemote(remote).branches.set(name, [...commits]);
  }

  getRemoteBranch(remote: string, name: string): MemoryCommit[] | undefined {
    const commits = this.remoteMap.get(remote)?.branches.get(name);
    return commits ? [...commits] : undefined;
  }

  setTag(name: string, tag: MemoryTag): void {
    this.tagMap.set(name, { ...tag });
  }

  getTag(name: string): MemoryTag | undefined {
    const tag = this.tagMap.get(name);
    return tag ? { ...tag } : undefined;
  }

  setRemoteTag(remote: string, name: string, tag: MemoryTag): void {
    this.requireRemote(remote).tags.set(name, { ...tag });
  }

  getRemoteTag(remote: string, name: string): MemoryTag | undefined {
    const tag = this.remoteMap.get(remote)?.tags.get(name);
    return tag ? { ...tag } : undefined;
  }

  /** Marks files as modified and unstaged */
  touch(...paths: string[]): void {
    for (const path of paths) {
      if (!this.unstaged.includes(path)) {
        this.unstaged.push(path);
      }
    }
  }

  /** Next generated commit SHA */
  nextSha(): string {
    this.shaCounter += 1;
    return `memsha${this.shaCounter}`;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  private requireRemote(name: string): MemoryRemote {
    const remote = this.remoteMap.get(name);
    if (!remote) {
      throw new RemoteError(name, `Remote ${name} does not exist.`);
    }
    return remote;
  }

  private allHistories(): MemoryCommit[][] {
    const histories = [...this.branchMap.values()];
    for (const remote of this.remoteMap.values()) {
      histories.push(...remote.branches.values());
    }
    return histories;
  }

  /** History ending at a commit SHA, found in any branch */
  private historyOfSha(sha: string): MemoryCommit[] | undefined {
    for (const history of this.allHistories()) {
      const index = history.findIndex((commit) => commit.sha === sha);
      if (index !== -1) {
        return history.slice(0, index + 1);
      }
    }
    return undefined;
  }

  /** Resolution order: HEAD, local branch, remote/branch, tag, SHA */
  private resolve(ref: string): MemoryCommit[] {
    if (ref === 'HEAD') {
      return [...(this.branchMap.get(this.current) ?? [])];
    }
    const local = this.branchMap.get(ref);
    if (local) {
      return [...local];
    }
    const slash = ref.indexOf('/');
    if (slash !== -1) {
      const remote = this.remoteMap.get(ref.slice(0, slash));
      const branch = remote?.branches.get(ref.slice(slash + 1));
      if (branch) {
        return [...branch];
      }
    }
    const tag = this.tagMap.get(ref);
    const history = this.historyOfSha(tag ? tag.sha : ref);
    if (history) {
      return history;
    }
    throw new BranchNotFoundError(ref);
  }

  private head(): MemoryCommit | undefined {
    const history = this.branchMap.get(this.current) ?? [];
    return history[history.length - 1];
  }

  private findCommit(sha: string): MemoryCommit | undefined {
    const history = this.historyOfSha(sha);
    return history?.[history.length - 1];
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REPOSITORY
  // ═══════════════════════════════════════════════════════════════════════

  async root(): Promise<string> {
    return this.repoRoot;
  }

  async remotes(): Promise<string[]> {
    return [...this.remoteMap.keys()];
  }

  async remoteSlug(remote: string): Promise<RepoSlug> {
    const { url } = this.requireRemote(remote);
    const slug = parseRemoteSlug(url);
    if (!slug) {
      throw new RemoteError(remote, `Could not parse remote URL: ${url}`);
    }
    return slug;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // SYNC
  // ═══════════════════════════════════════════════════════════════════════

  async fetch(...remotes: string[]): Promise<void> {
    this.operations.push(`fetch ${remotes.join(' ')}`);
    for (const name of remotes) {
      for (const [tagName, tag] of this.requireRemote(name).tags) {
        this.tagMap.set(tagName, { ...tag });
      }
    }
  }

  async pull(remote: string): Promise<void> {
    this.operations.push(`pull ${remote}`);
    const upstream = this.resolve(`${remote}/${this.current}`);
    const known = new Set(upstream.map((commit) => commit.sha));
    const local = this.branchMap.get(this.current) ?? [];
    this.branchMap.set(this.current, [...upstream, ...local.filter((commit) => !known.has(commit.sha))]);
  }

  async push(remote: string, branch: string, force: boolean = false): Promise<void> {
    this.operations.push(`push ${remote} ${branch}${force ? ' --force' : ''}`);
    const target = this.requireRemote(remote);
    const local = this.resolve(branch);
    const existing = target.branches.get(branch) ?? [];
    const fastForward = existing.every((commit, index) => local[index]?.sha === commit.sha);
    if (!force && !fastForward) {
      throw new GitCommandError('git push failed', 'rejected (non-fast-forward)', `git push ${remote} ${branch}`);
    }
    target.branches.set(branch, local);
  }

  async pushTag(tag: string, remote: string): Promise<void> {
    this.operations.push(`push-tag ${remote} ${tag}`);
    const local = this.tagMap.get(tag);
    if (!local) {
      throw new BranchNotFoundError(tag);
    }
    this.requireRemote(remote).tags.set(tag, { ...local });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // BRANCHES
  // ═══════════════════════════════════════════════════════════════════════

  async currentBranch(): Promise<string> {
    return this.current;
  }

  async branches(remote?: string): Promise<string[]> {
    if (remote === undefined) {
      return [...this.branchMap.keys()];
    }
    return [...this.requireRemote(remote).branches.keys()];
  }

  async branchSha(ref: string): Promise<string> {
    const history = this.resolve(ref);
    return history[history.length - 1]?.sha ?? '';
  }

  async createBranch(branch: string, base: string): Promise<void> {
    this.operations.push(`create-branch ${branch} ${base}`);
    if (this.branchMap.has(branch)) {
      throw new GitCommandError('git checkout failed', `a branch named '${branch}' already exists`);
    }
    this.branchMap.set(branch, this.resolve(base));
    this.current = branch;
  }

  async checkout(branch: string): Promise<void> {
    this.operations.push(`checkout ${branch}`);
    if (!this.branchMap.has(branch)) {
      // Like git, a branch that only exists on a remote gets a local copy.
      const tracked = [...this.remoteMap.values()].find((remote) => remote.branches.has(branch));
      const commits = tracked?.branches.get(branch);
      if (!commits) {
        throw new BranchNotFoundError(branch);
      }
      this.branchMap.set(branch, [...commits]);
    }
    this.current = branch;
  }

  async reset(ref: string): Promise<void> {
    this.operations.push(`reset ${ref}`);
    this.branchMap.set(this.current, this.resolve(ref));
    this.unstaged = [];
    this.staged = [];
  }

  async rebase(onto: string, commits: number = 0): Promise<boolean> {
    this.operations.push(`rebase ${onto}${commits ? ` ${commits}` : ''}`);
    const history = this.branchMap.get(this.current) ?? [];
    const base = this.resolve(onto);
    const baseShas = new Set(base.map((commit) => commit.sha));
    const moved = commits
      ? history.slice(-commits)
      : history.filter((commit) => !baseShas.has(commit.sha));
    const kept = history.slice(0, history.length - moved.length);

    if (kept[kept.length - 1]?.sha === base[base.length - 1]?.sha) {
      return false;
    }
    this.branchMap.set(this.current, [
      ...base,
      ...moved.map((commit) => ({ ...commit, sha: this.nextSha() })),
    ]);
    return true;
  }

  async isUpToDate(branch: string, remote: string): Promise<boolean> {
    const remoteCommits = this.requireRemote(remote).branches.get(branch);
    if (!remoteCommits) {
      return false;
    }
    return (await this.branchSha(branch)) === (remoteCommits[remoteCommits.length - 1]?.sha ?? '');
  }

  // ═══════════════════════════════════════════════════════════════════════
  // HISTORY
  // ═══════════════════════════════════════════════════════════════════════

  async log(ref: string, count: number = 100): Promise<string[]> {
    return this.resolve(ref).reverse().slice(0, count).map((commit) => commit.message);
  }

  async lastCommitMessage(ref: string): Promise<string> {
    const [message] = await this.log(ref, 1);
    return message ?? '';
  }

  async findCommitSha(message: string): Promise<string> {
    const history = this.branchMap.get(this.current) ?? [];
    const match = [...history].reverse().find((commit) =>
      `${commit.message}\n\n${commit.body}`.includes(message)
    );
    return match?.sha ?? '';
  }

  async commitMessage(sha: string): Promise<string> {
    const commit = this.findCommit(sha);
    if (!commit) {
      throw new BranchNotFoundError(sha);
    }
    const body = commit.body.trim();
    return body ? `${commit.message}\n\n${body}` : commit.message;
  }

  async filesChanged(sha: string): Promise<string[]> {
    const commit = this.findCommit(sha);
    if (!commit) {
      throw new BranchNotFoundError(sha);
    }
    return [...commit.files];
  }

  // ═══════════════════════════════════════════════════════════════════════
  // WORKING TREE
  // ═══════════════════════════════════════════════════════════════════════

  async isClean(): Promise<boolean> {
    return this.unstaged.length === 0 && this.staged.length === 0;
  }

  async hasUnstagedChanges(): Promise<boolean> {
    return this.unstaged.length > 0;
  }

  async changedFiles(): Promise<string[]> {
    return [...new Set([...this.staged, ...this.unstaged])];
  }

  async add(...files: string[]): Promise<void> {
    this.operations.push(`add ${files.join(' ')}`);
    const selected = files.includes('.')
      ? this.unstaged
      : this.unstaged.filter((path) => files.includes(path));
    for (const path of selected) {
      if (!this.staged.includes(path)) {
        this.staged.push(path);
      }
    }
    this.unstaged = this.unstaged.filter((path) => !selected.includes(path));
  }

  async commit(title: string, body: string): Promise<void> {
    if (this.staged.length === 0) {
      throw new GitCommandError('git commit failed', 'nothing to commit, working tree clean');
    }
    const history = this.branchMap.get(this.current) ?? [];
    const last = history[history.length - 1];
    const amend = last !== undefined && last.message === title;
    this.operations.push(`commit${amend ? ' --amend' : ''} ${title}`);

    const files = amend ? [...new Set([...last.files, ...this.staged])] : [...this.staged];
    const commit: MemoryCommit = { sha: this.nextSha(), message: title, body, files };
    this.branchMap.set(this.current, amend ? [...history.slice(0, -1), commit] : [...history, commit]);
    this.staged = [];
  }

  async stash(): Promise<boolean> {
    if (this.unstaged.length === 0) {
      return false;
    }
    this.operations.push('stash');
    this.stashes.push({ unstaged: this.unstaged, staged: this.staged });
    this.unstaged = [];
    this.staged = [];
    return true;
  }

  async stashPop(): Promise<void> {
    const stashed = this.stashes.pop();
    if (!stashed) {
      throw new GitCommandError('git stash failed', 'No stash entries found.');
    }
    this.operations.push('stash-pop');
    this.unstaged = stashed.unstaged;
    this.staged = stashed.staged;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TAGS
  // ═══════════════════════════════════════════════════════════════════════

  async releaseTags(withRc: boolean = true): Promise<string[]> {
    const merged = new Set((this.branchMap.get(this.current) ?? []).map((commit) => commit.sha));
    const names = [...this.tagMap.entries()].filter(([, tag]) => merged.has(tag.sha)).map(([name]) => name);
    return sortReleaseTags(names, withRc);
  }

  async releaseTagExists(tag: string): Promise<boolean> {
    return (await this.releaseTags()).includes(tag);
  }

  async currentTag(): Promise<string> {
    const [latest] = await this.releaseTags();
    if (latest === undefined) {
      throw new GitCommandError('git describe failed', 'fatal: No names found, cannot describe anything.');
    }
    return latest;
  }

  async tag(tag: string, message: string, sign: boolean): Promise<void> {
    this.operations.push(`tag ${tag}${sign ? ' --sign' : ''}`);
    const head = this.head();
    if (!head) {
      throw new BranchNotFoundError('HEAD');
    }
    if (this.tagMap.has(tag)) {
      throw new GitCommandError('git tag failed', `fatal: tag '${tag}' already exists`);
    }
    this.tagMap.set(tag, { sha: head.sha, message, signed: sign, valid: sign });
  }

  async tagHasSignature(tag: string): Promise<boolean> {
    const found = this.tagMap.get(tag);
    if (!found) {
      throw new BranchNotFoundError(tag);
    }
    return found.signed;
  }

  async verifyTag(tag: string): Promise<boolean> {
    const found = this.tagMap.get(tag);
    return found !== undefined && found.signed && found.valid;
  }

  async signTag(tag: string): Promise<void> {
    this.operations.push(`sign-tag ${tag}`);
    const found = this.tagMap.get(tag);
    if (!found) {
      throw new BranchNotFoundError(tag);
    }
    this.tagMap.set(tag, { ...found, signed: true, valid: true });
  }
}
