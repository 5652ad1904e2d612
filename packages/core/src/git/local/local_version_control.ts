/**
 * LocalVersionControl - git CLI implementation of IVersionControl
 *
 * Runs git through an injected `execCommand`, so the same class works
 * against a real checkout (CLI) and against scripted results (tests).
 *
 * @module git/local
 */

import type { IVersionControl } from '../version_control';
import type { ExecCommand, ExecOptions, ExecResult, RepoSlug, VersionControlDependencies } from '../types';
import { GitCommandError, RemoteError } from '../errors';
import { parseRemoteSlug } from '../remote';
import { sortReleaseTags } from '../../version';
import { createLogger } from '../../logger';

const logger = createLogger('[LocalVersionControl] ');

const PGP_SIGNATURE_MARKER = '-----BEGIN PGP SIGNATURE-----';

export class LocalVersionControl implements IVersionControl {
  private repoRoot: string;
  private readonly execCommand: ExecCommand;

  constructor(dependencies: VersionControlDependencies) {
    this.execCommand = dependencies.execCommand;
    this.repoRoot = dependencies.repoRoot || '';
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  private async ensureRepoRoot(): Promise<string> {
    if (!this.repoRoot) {
      const result = await this.execCommand('git', ['rev-parse', '--show-toplevel']);
      if (result.exitCode !== 0) {
        throw new GitCommandError('Not in a Git repository', result.stderr);
      }
      this.repoRoot = result.stdout.trim();
    }
    return this.repoRoot;
  }

  /** Runs git in the repository root without interpreting the exit code */
  private async execGit(args: string[], options?: ExecOptions): Promise<ExecResult> {
    const cwd = options?.cwd || await this.ensureRepoRoot();
    return this.execCommand('git', args, { ...options, cwd });
  }

  /** Runs git and fails on a non-zero exit code */
  private async runCall(args: string[], options?: ExecOptions): Promise<void> {
    const result = await this.execGit(args, options);
    if (result.exitCode !== 0) {
      throw new GitCommandError(`git ${args[0]} failed`, result.stderr, `git ${args.join(' ')}`);
    }
  }

  /** Runs git and returns its trimmed stdout, failing on a non-zero exit code */
  private async runOutput(args: string[]): Promise<string> {
    const result = await this.execGit(args);
    if (result.exitCode !== 0) {
      throw new GitCommandError(`git ${args[0]} failed`, result.stderr, `git ${args.join(' ')}`);
    }
    return result.stdout.trim();
  }

  private async runLines(args: string[]): Promise<string[]> {
    const output = await this.runOutput(args);
    return output ? output.split('\n') : [];
  }

  /** Runs `git diff --quiet --exit-code`; true when there are differences */
  private async diffExitCode(...args: string[]): Promise<boolean> {
    const result = await this.execGit(['diff', '--quiet', '--exit-code', ...args]);
    return result.exitCode !== 0;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REPOSITORY
  // ═══════════════════════════════════════════════════════════════════════

  async root(): Promise<string> {
    return this.ensureRepoRoot();
  }

  async remotes(): Promise<string[]> {
    return this.runLines(['remote']);
  }

  async remoteSlug(remote: string): Promise<RepoSlug> {
    const url = await this.runOutput(['remote', 'get-url', remote]);
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
    logger.debug(`Fetching ${remotes.join(', ')}`);
    await this.runCall(['fetch', '--quiet', '--tags', '--prune', '--force', '--multiple', ...remotes]);
  }

  async pull(remote: string): Promise<void> {
    const branch = await this.currentBranch();
    await this.runCall(['pull', '--rebase', '--quiet', remote, branch]);
  }

  async push(remote: string, branch: string, force: boolean = false): Promise<void> {
    const args = ['push', '--quiet'];
    if (force) {
      args.push('--force');
    }
    args.push('--set-upstream', remote, branch);
    await this.runCall(args);
  }

  async pushTag(tag: string, remote: string): Promise<void> {
    await this.runCall(['push', '--quiet', '--force', remote, tag]);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // BRANCHES
  // ═══════════════════════════════════════════════════════════════════════

  async currentBranch(): Promise<string> {
    return this.runOutput(['rev-parse', '--abbrev-ref', 'HEAD']);
  }

  async branches(remote?: string): Promise<string[]> {
    if (remote !== undefined && !(await this.remotes()).includes(remote)) {
      throw new RemoteError(remote, `Remote ${remote} does not exist.`);
    }
    const args = ['branch', '--list', '--no-column', '--format=%(refname:short)'];
    if (remote !== undefined) {
      args.push('--remotes');
    }
    const names = await this.runLines(args);
    if (remote === undefined) {
      return names;
    }
    const prefix = `${remote}/`;
    return names.filter((name) => name.startsWith(prefix)).map((name) => name.slice(prefix.length));
  }

  async branchSha(ref: string): Promise<string> {
    return this.runOutput(['rev-list', '--max-count=1', ref]);
  }

  async createBranch(branch: string, base: string): Promise<void> {
    await this.runCall(['checkout', '--quiet', '-b', branch, base]);
  }

  async checkout(branch: string): Promise<void> {
    await this.runCall(['checkout', '--quiet', branch]);
  }

  async reset(ref: string): Promise<void> {
    await this.runCall(['reset', '--quiet', '--hard', ref]);
  }

  async rebase(onto: string, commits: number = 0): Promise<boolean> {
    const oldSha = await this.branchSha('HEAD');
    if (!commits) {
      await this.runCall(['rebase', '--quiet', onto]);
    } else {
      // Rebasing a commit range leaves HEAD detached; move the branch afterwards.
      const branch = await this.currentBranch();
      await this.runCall(['rebase', '--quiet', '--onto', onto, `HEAD~${commits}`]);
      const newSha = await this.branchSha('HEAD');
      await this.checkout(branch);
      await this.reset(newSha);
    }
    return oldSha !== (await this.branchSha('HEAD'));
  }

  async isUpToDate(branch: string, remote: string): Promise<boolean> {
    if (!(await this.branches(remote)).includes(branch)) {
      return false;
    }
    return (await this.branchSha(branch)) === (await this.branchSha(`${remote}/${branch}`));
  }

  // ═══════════════════════════════════════════════════════════════════════
  // HISTORY
  // ═══════════════════════════════════════════════════════════════════════

  async log(ref: string, count: number = 100): Promise<string[]> {
    const lines = await this.runLines(['log', '--oneline', '--no-decorate', `--max-count=${count}`, ref]);
    return lines.map((line) => {
      const space = line.indexOf(' ');
      return space === -1 ? '' : line.slice(space + 1).trim();
    });
  }

  async lastCommitMessage(ref: string): Promise<string> {
    const [message] = await this.log(ref, 1);
    return message ?? '';
  }

  async findCommitSha(message: string): Promise<string> {
    return this.runOutput(['log', '--format=%H', '--grep', message, '-1']);
  }

  async commitMessage(sha: string): Promise<string> {
    return this.runOutput(['show', '--quiet', '--format=%B', sha]);
  }

  async filesChanged(sha: string): Promise<string[]> {
    return this.runLines(['diff', '--name-only', `${sha}^`]);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // WORKING TREE
  // ═══════════════════════════════════════════════════════════════════════

  async isClean(): Promise<boolean> {
    return !(await this.diffExitCode()) && !(await this.diffExitCode('--cached'));
  }

  async hasUnstagedChanges(): Promise<boolean> {
    return this.diffExitCode();
  }

  async changedFiles(): Promise<string[]> {
    return this.runLines(['diff', '--name-only', 'HEAD']);
  }

  async add(...files: string[]): Promise<void> {
    await this.runCall(['add', ...files]);
  }

  async commit(title: string, body: string): Promise<void> {
    const args = ['commit', '--quiet'];
    if ((await this.lastCommitMessage(await this.currentBranch())) === title) {
      args.push('--amend');
    }
    args.push('--message', title, '--message', body);
    await this.runCall(args);
  }

  async stash(): Promise<boolean> {
    if (!(await this.diffExitCode())) {
      return false;
    }
    await this.runCall(['stash', '--quiet', '--include-untracked']);
    return true;
  }

  async stashPop(): Promise<void> {
    await this.runCall(['stash', 'pop', '--quiet']);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TAGS
  // ═══════════════════════════════════════════════════════════════════════

  async releaseTags(withRc: boolean = true): Promise<string[]> {
    return sortReleaseTags(await this.runLines(['tag', '--merged']), withRc);
  }

  async releaseTagExists(tag: string): Promise<boolean> {
    return (await this.releaseTags()).includes(tag);
  }

  async currentTag(): Promise<string> {
    return this.runOutput(['describe', '--tags', '--abbrev=0', '--match', 'v*']);
  }

  async tag(tag: string, message: string, sign: boolean): Promise<void> {
    const args = ['tag'];
    if (sign) {
      args.push('--sign');
    }
    args.push('--annotate', '--message', message, tag);
    await this.runCall(args, { interactive: sign });
  }

  async tagHasSignature(tag: string): Promise<boolean> {
    return (await this.runOutput(['cat-file', 'tag', tag])).includes(PGP_SIGNATURE_MARKER);
  }

  async verifyTag(tag: string): Promise<boolean> {
    const result = await this.execGit(['verify-tag', '--verbose', tag]);
    if (result.exitCode !== 0) {
      logger.warn(`Tag ${tag} failed verification: ${result.stderr.trim()}`);
    }
    return result.exitCode === 0;
  }

  async signTag(tag: string): Promise<void> {
    await this.runCall(['tag', '--sign', '--force', tag, `${tag}^{}`], { interactive: true });
  }
}
