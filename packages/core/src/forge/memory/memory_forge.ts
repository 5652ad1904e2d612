/**
 * MemoryForge - In-memory IForge for tests
 *
 * Holds milestones, issues, pull requests, CI results and releases in maps.
 * Reads return copies; mutate state through the setters below or through
 * IForge calls.
 *
 * Test Helpers:
 * - addMilestone / setIssue / setChecks / setWorkflowRuns / setRelease
 * - mergePullRequest / closePullRequest / publishRelease
 * - hooks: react to bot-side writes (signed pushes, API tags, ready PRs)
 * - calls: names of mutating calls, in order
 *
 * @module forge/memory
 */

import type { IForge, PullRequestStateFilter } from '../forge';
import type {
  ApiTagRequest,
  CheckRun,
  Issue,
  Milestone,
  NewPullRequest,
  NewRelease,
  PullRequest,
  PullRequestPatch,
  Release,
  ReleaseAsset,
  SignedCommitRequest,
  WorkflowRun,
} from '../types';
import { ForgeApiError, ForgeObjectNotFoundError } from '../errors';
import { publishedCandidates, selectNextMilestone } from '../selection';

export type MemoryForgeHooks = {
  /** Head SHA of a newly created pull request */
  resolveHeadSha?: (request: NewPullRequest) => string;
  onPushSigned?: (request: SignedCommitRequest, sha: string) => void;
  onCreateTag?: (request: ApiTagRequest, sha: string) => void;
  onMarkReady?: (pullRequest: PullRequest) => void;
};

export type MemoryForgeOptions = {
  owner?: string;
  repo?: string;
  actor?: string;
  hooks?: MemoryForgeHooks;
};

export type MemoryApiTag = ApiTagRequest & { sha: string };

export class MemoryForge implements IForge {
  readonly owner: string;
  readonly repo: string;
  readonly calls: string[] = [];
  hooks: MemoryForgeHooks;
  /** Branch name => SHA for refs moved through pushSigned */
  readonly branches = new Map<string, string>();
  readonly apiTags = new Map<string, MemoryApiTag>();
  cacheInvalidations = 0;

  private readonly actorLogin: string;
  private readonly milestoneMap = new Map<number, Milestone>();
  private readonly issueMap = new Map<number, Issue>();
  private readonly pullMap = new Map<number, PullRequest>();
  private readonly checkMap = new Map<string, CheckRun[]>();
  private readonly runMap = new Map<string, WorkflowRun[]>();
  private readonly releaseMap = new Map<string, Release>();
  private readonly assetData = new Map<number, Buffer>();
  private nextNumber = 1;
  private nextId = 1;

  constructor(options: MemoryForgeOptions = {}) {
    this.owner = options.owner ?? 'acme';
    this.repo = options.repo ?? 'widgets';
    this.actorLogin = options.actor ?? 'maintainer';
    this.hooks = options.hooks ?? {};
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  addMilestone(title: string, state: 'open' | 'closed' = 'open'): Milestone {
    const number = this.milestoneMap.size + 1;
    const milestone: Milestone = { number, title, state, htmlUrl: this.url(`milestone/${number}`) };
    this.milestoneMap.set(number, milestone);
    return { ...milestone };
  }

  getMilestone(number: number): Milestone | undefined {
    const milestone = this.milestoneMap.get(number);
    return milestone ? { ...milestone } : undefined;
  }

  setIssue(issue: Partial<Issue> & { number: number }): Issue {
    const existing = this.issueMap.get(issue.number);
    const merged: Issue = {
      title: '',
      body: '',
      user: this.actorLogin,
      assignees: [],
      htmlUrl: this.url(`issues/${issue.number}`),
      state: 'open',
      milestone: null,
      ...existing,
      ...issue,
    };
    this.issueMap.set(issue.number, merged);
    this.nextNumber = Math.max(this.nextNumber, issue.number + 1);
    return structuredClone(merged);
  }

  issue(number: number): Issue | undefined {
    const issue = this.issueMap.get(number);
    return issue ? structuredClone(issue) : undefined;
  }

  setPullRequest(pr: Partial<PullRequest> & { number: number }): PullRequest {
    const existing = this.pullMap.get(pr.number);
    const merged: PullRequest = {
      nodeId: `PR_node${pr.number}`,
      title: '',
      body: '',
      htmlUrl: this.url(`pull/${pr.number}`),
      state: 'open',
      draft: false,
      merged: false,
      milestone: null,
      headRef: '',
      headSha: '',
      baseRef: 'master',
      ...existing,
      ...pr,
    };
    this.pullMap.set(pr.number, merged);
    this.nextNumber = Math.max(this.nextNumber, pr.number + 1);
    return { ...merged };
  }

  pullRequest(number: number): PullRequest | undefined {
    const pr = this.pullMap.get(number);
    return pr ? { ...pr } : undefined;
  }

  pullRequests(): PullRequest[] {
    return [...this.pullMap.values()].map((pr) => ({ ...pr }));
  }

  mergePullRequest(number: number): void {
    this.setPullRequest({ number, state: 'closed', merged: true });
  }

  closePullRequest(number: number): void {
    this.setPullRequest({ number, state: 'closed', merged: false });
  }

  setChecks(commit: string, runs: Array<Partial<CheckRun> & { name: string }>): void {
    this.checkMap.set(
      commit,
      runs.map((run) => ({
        id: this.nextId++,
        status: 'completed',
        conclusion: 'success',
        htmlUrl: this.url(`runs/${run.name}`),
        ...run,
      }))
    );
  }

  setWorkflowRuns(branch: string, headSha: string, runs: Array<Partial<WorkflowRun> & { name: string }>): void {
    this.runMap.set(
      `${branch}@${headSha}`,
      runs.map((run) => {
        const id = this.nextId++;
        return {
          id,
          event: 'push',
          status: 'completed',
          conclusion: 'success',
          htmlUrl: this.url(`actions/runs/${id}`),
          path: `.github/workflows/${run.name}.yml`,
          ...run,
        };
      })
    );
  }

  setRelease(release: Partial<Release> & { tagName: string }): Release {
    const existing = this.releaseMap.get(release.tagName);
    const merged: Release = {
      id: existing?.id ?? this.nextId++,
      body: '',
      draft: true,
      prerelease: false,
      publishedAt: null,
      assets: [],
      ...existing,
      ...release,
    };
    this.releaseMap.set(release.tagName, merged);
    return structuredClone(merged);
  }

  release(tag: string): Release | undefined {
    const release = this.releaseMap.get(tag);
    return release ? structuredClone(release) : undefined;
  }

  publishRelease(tag: string, publishedAt: string = '2025-01-01T00:00:00Z'): void {
    this.requireRelease(tag);
    this.setRelease({ tagName: tag, draft: false, publishedAt });
  }

  assetContent(tag: string, name: string): Buffer | undefined {
    const asset = this.releaseMap.get(tag)?.assets.find((a) => a.name === name);
    return asset ? this.assetData.get(asset.id) : undefined;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  private url(path: string): string {
    return `https://github.com/${this.owner}/${this.repo}/${path}`;
  }

  private requireIssue(number: number): Issue {
    const issue = this.issueMap.get(number);
    if (!issue) {
      throw new ForgeApiError(`Not found: get issue ${number}`, 'NOT_FOUND', 404);
    }
    return issue;
  }

  private requireRelease(tag: string): Release {
    const release = this.releaseMap.get(tag);
    if (!release) {
      throw new ForgeObjectNotFoundError('Release', `${tag} in ${this.owner}/${this.repo}`);
    }
    return release;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // IDENTITY
  // ═══════════════════════════════════════════════════════════════════════

  async actor(): Promise<string> {
    return this.actorLogin;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // MILESTONES
  // ═══════════════════════════════════════════════════════════════════════

  async milestones(): Promise<Milestone[]> {
    return [...this.milestoneMap.values()].filter((m) => m.state === 'open').map((m) => ({ ...m }));
  }

  async milestone(title: string): Promise<Milestone> {
    const found = (await this.milestones()).find((m) => m.title === title);
    if (!found) {
      throw new ForgeObjectNotFoundError('Milestone', title);
    }
    return found;
  }

  async nextMilestone(): Promise<Milestone> {
    return selectNextMilestone(await this.milestones());
  }

  async closeMilestone(milestone: number): Promise<void> {
    const found = this.milestoneMap.get(milestone);
    if (!found) {
      throw new ForgeApiError(`Not found: close milestone ${milestone}`, 'NOT_FOUND', 404);
    }
    this.calls.push(`closeMilestone ${milestone}`);
    found.state = 'closed';
  }

  // ═══════════════════════════════════════════════════════════════════════
  // ISSUES
  // ═══════════════════════════════════════════════════════════════════════

  async getIssue(issue: number): Promise<Issue> {
    return structuredClone(this.requireIssue(issue));
  }

  async openMilestoneIssues(milestone: number): Promise<Issue[]> {
    return [...this.issueMap.values()]
      .filter((issue) => issue.milestone === milestone && issue.state === 'open')
      .map((issue) => structuredClone(issue));
  }

  async renameIssue(issue: number, title: string): Promise<void> {
    this.calls.push(`renameIssue ${issue} ${title}`);
    this.requireIssue(issue).title = title;
  }

  async closeIssue(issue: number): Promise<void> {
    this.calls.push(`closeIssue ${issue}`);
    this.requireIssue(issue).state = 'closed';
  }

  async assignMilestone(issue: number, milestone: number): Promise<void> {
    this.calls.push(`assignMilestone ${issue} ${milestone}`);
    const pr = this.pullMap.get(issue);
    if (pr) {
      pr.milestone = milestone;
      return;
    }
    this.requireIssue(issue).milestone = milestone;
  }

  async addAssignees(issue: number, logins: string[]): Promise<void> {
    this.calls.push(`addAssignees ${issue} ${logins.join(',')}`);
    const found = this.requireIssue(issue);
    found.assignees = [...new Set([...found.assignees, ...logins])];
  }

  async removeAssignees(issue: number, logins: string[]): Promise<void> {
    this.calls.push(`removeAssignees ${issue} ${logins.join(',')}`);
    const found = this.requireIssue(issue);
    found.assignees = found.assignees.filter((login) => !logins.includes(login));
  }

  async editIssueBody(issue: number, edit: (body: string) => string): Promise<void> {
    const found = this.requireIssue(issue);
    const body = edit(found.body);
    if (body !== found.body) {
      this.calls.push(`editIssueBody ${issue}`);
      found.body = body;
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PULL REQUESTS
  // ═══════════════════════════════════════════════════════════════════════

  async createPullRequest(request: NewPullRequest): Promise<PullRequest> {
    this.calls.push(`createPullRequest ${request.head}`);
    const separator = request.head.indexOf(':');
    return this.setPullRequest({
      number: this.nextNumber,
      title: request.title,
      body: request.body,
      draft: true,
      milestone: request.milestone || null,
      headRef: separator === -1 ? request.head : request.head.slice(separator + 1),
      headSha: this.hooks.resolveHeadSha?.(request) ?? '',
      baseRef: request.base,
    });
  }

  async findPullRequest(headSha: string, base: string): Promise<PullRequest | null> {
    const found = [...this.pullMap.values()].find((pr) => pr.headSha === headSha && pr.baseRef === base);
    return found ? { ...found } : null;
  }

  async findPullRequestForBranch(
    head: string,
    base: string,
    state: PullRequestStateFilter = 'all'
  ): Promise<PullRequest | null> {
    const separator = head.indexOf(':');
    const branch = separator === -1 ? head : head.slice(separator + 1);
    const found = [...this.pullMap.values()].find(
      (pr) => pr.headRef === branch && pr.baseRef === base && (state === 'all' || pr.state === state)
    );
    return found ? { ...found } : null;
  }

  async changePullRequest(pullRequest: number, patch: PullRequestPatch): Promise<void> {
    this.calls.push(`changePullRequest ${pullRequest} ${Object.keys(patch).sort().join(',')}`);
    const found = this.pullMap.get(pullRequest);
    if (!found) {
      throw new ForgeApiError(`Not found: update pull request ${pullRequest}`, 'NOT_FOUND', 404);
    }
    this.pullMap.set(pullRequest, { ...found, ...patch });
  }

  async markReadyForReview(nodeId: string): Promise<void> {
    const found = [...this.pullMap.values()].find((pr) => pr.nodeId === nodeId);
    if (!found) {
      throw new ForgeApiError(`Not found: mark ${nodeId} ready for review`, 'NOT_FOUND', 404);
    }
    this.calls.push(`markReadyForReview ${found.number}`);
    found.draft = false;
    this.hooks.onMarkReady?.({ ...found });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // CI
  // ═══════════════════════════════════════════════════════════════════════

  async checks(commit: string): Promise<Map<string, CheckRun>> {
    const runs = this.checkMap.get(commit) ?? [];
    return new Map(runs.map((run) => [run.name, { ...run }]));
  }

  async workflowRuns(branch: string, headSha: string): Promise<WorkflowRun[]> {
    return (this.runMap.get(`${branch}@${headSha}`) ?? []).map((run) => ({ ...run }));
  }

  // ═══════════════════════════════════════════════════════════════════════
  // RELEASES
  // ═══════════════════════════════════════════════════════════════════════

  async latestRelease(): Promise<string> {
    const [latest] = [...this.releaseMap.values()]
      .filter((r): r is Release & { publishedAt: string } => !r.draft && !r.prerelease && r.publishedAt !== null)
      .sort((a, b) => b.publishedAt.localeCompare(a.publishedAt));
    if (!latest) {
      throw new ForgeApiError('Not found: get latest release', 'NOT_FOUND', 404);
    }
    return latest.tagName;
  }

  async releaseCandidates(version: string): Promise<number[]> {
    return publishedCandidates([...this.releaseMap.values()], version);
  }

  async getRelease(tag: string): Promise<Release | null> {
    return this.release(tag) ?? null;
  }

  async createRelease(release: NewRelease): Promise<Release> {
    if (this.releaseMap.has(release.tagName)) {
      throw new ForgeApiError(`Validation failed: create release ${release.tagName}`, 'CONFLICT', 422);
    }
    this.calls.push(`createRelease ${release.tagName}`);
    return this.setRelease({ ...release, publishedAt: release.draft ? null : '2025-01-01T00:00:00Z' });
  }

  async releaseAssets(tag: string): Promise<ReleaseAsset[]> {
    return this.requireRelease(tag).assets.map((asset) => ({ ...asset }));
  }

  async uploadAsset(tag: string, name: string, contentType: string, data: Buffer): Promise<void> {
    const release = this.requireRelease(tag);
    this.calls.push(`uploadAsset ${tag} ${name}`);
    const id = this.nextId++;
    release.assets.push({
      id,
      name,
      contentType,
      browserDownloadUrl: this.url(`releases/download/${tag}/${name}`),
    });
    this.assetData.set(id, data);
  }

  async downloadAsset(assetId: number): Promise<Buffer> {
    const data = this.assetData.get(assetId);
    if (!data) {
      throw new ForgeApiError(`Not found: download asset ${assetId}`, 'NOT_FOUND', 404);
    }
    return data;
  }

  async setReleaseNotes(tag: string, notes: string, prerelease: boolean): Promise<void> {
    const release = this.requireRelease(tag);
    this.calls.push(`setReleaseNotes ${tag}`);
    release.body = notes;
    release.prerelease = prerelease;
  }

  async isReleasePublished(tag: string): Promise<boolean> {
    return this.requireRelease(tag).publishedAt !== null;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // GIT OBJECTS
  // ═══════════════════════════════════════════════════════════════════════

  async pushSigned(request: SignedCommitRequest): Promise<string> {
    const sha = `signed-commit-${this.nextId++}`;
    this.calls.push(`pushSigned ${request.branch}`);
    this.branches.set(request.branch, sha);
    this.hooks.onPushSigned?.(request, sha);
    return sha;
  }

  async createTag(request: ApiTagRequest): Promise<string> {
    const sha = `tag-object-${this.nextId++}`;
    const message = request.message.endsWith('\n') ? request.message : `${request.message}\n`;
    this.calls.push(`createTag ${request.tag}`);
    this.apiTags.set(request.tag, { ...request, message, sha });
    this.hooks.onCreateTag?.({ ...request, message }, sha);
    return sha;
  }

  invalidateCache(): void {
    this.cacheInvalidations += 1;
  }
}
