/**
 * GitHubForge - GitHub REST/GraphQL implementation of IForge (Octokit)
 *
 * @module forge/github
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
import type {
  GitHubForgeDependencies,
  IssueData,
  MilestoneData,
  PullRequestData,
  ReleaseAssetData,
  ReleaseData,
} from './github_forge.types';
import { BOT_TAGGER } from './github_forge.types';
import { ForgeApiError, ForgeObjectNotFoundError, isOctokitRequestError, mapOctokitError, responseBody } from '../errors';
import { ForgeCache } from '../forge_cache';
import { publishedCandidates, selectNextMilestone } from '../selection';
import { createLogger } from '../../logger';

const logger = createLogger('[GitHubForge] ');

const MARK_READY_FOR_REVIEW = `
  mutation MarkPrReady($pullRequestId: ID!) {
    markPullRequestReadyForReview(input: { pullRequestId: $pullRequestId }) {
      pullRequest {
        id
      }
    }
  }
`;

export class GitHubForge implements IForge {
  private readonly deps: GitHubForgeDependencies;
  private readonly cache = new ForgeCache();
  private readonly milestoneCache = this.cache.table<'open', Milestone[]>();
  private readonly issueCache = this.cache.table<number, Issue>();
  private readonly milestoneIssueCache = this.cache.table<number, Issue[]>();
  private readonly releaseListCache = this.cache.table<'all', ReleaseData[]>();
  private actorLogin: string | undefined;

  constructor(deps: GitHubForgeDependencies) {
    this.deps = deps;
    this.actorLogin = deps.actor;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  private get repoParams(): { owner: string; repo: string } {
    return { owner: this.deps.owner, repo: this.deps.repo };
  }

  private get releaser() {
    return this.deps.releaserOctokit ?? this.deps.octokit;
  }

  /**
   * Runs an API call, logging the raw response body of a failed request and
   * re-raising it as ForgeApiError.
   */
  private async call<T>(context: string, body: () => Promise<T>): Promise<T> {
    try {
      return await body();
    } catch (error: unknown) {
      if (!(error instanceof ForgeApiError)) {
        logger.error(`${context} failed: ${responseBody(error) || String(error)}`);
      }
      throw mapOctokitError(error, context);
    }
  }

  private forgetIssue(issue: number): void {
    this.issueCache.delete(issue);
    this.milestoneIssueCache.clear();
  }

  private async releaseList(): Promise<ReleaseData[]> {
    return this.releaseListCache.get('all', async () => {
      return this.deps.octokit.paginate(this.deps.octokit.rest.repos.listReleases, {
        ...this.repoParams,
        per_page: 100,
      });
    });
  }

  /** Fresh release payload; the id comes from the cached list (drafts have no tag ref) */
  private async releaseData(tag: string): Promise<ReleaseData | null> {
    const listed = (await this.releaseList()).find((release) => release.tag_name === tag);
    if (!listed) {
      return null;
    }
    const { data } = await this.deps.octokit.rest.repos.getRelease({
      ...this.repoParams,
      release_id: listed.id,
    });
    return data;
  }

  private async requireReleaseData(tag: string): Promise<ReleaseData> {
    const data = await this.releaseData(tag);
    if (!data) {
      throw new ForgeObjectNotFoundError('Release', `${tag} in ${this.deps.owner}/${this.deps.repo}`);
    }
    return data;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // IDENTITY
  // ═══════════════════════════════════════════════════════════════════════

  async actor(): Promise<string> {
    if (this.actorLogin === undefined) {
      const { data } = await this.call('get authenticated user', () =>
        this.deps.octokit.rest.users.getAuthenticated()
      );
      this.actorLogin = data.login;
    }
    return this.actorLogin;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // MILESTONES
  // ═══════════════════════════════════════════════════════════════════════

  async milestones(): Promise<Milestone[]> {
    return this.call('list milestones', () =>
      this.milestoneCache.get('open', async () => {
        const data = await this.deps.octokit.paginate(this.deps.octokit.rest.issues.listMilestones, {
          ...this.repoParams,
          state: 'open',
          per_page: 100,
        });
        return data.map(toMilestone);
      })
    );
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
    await this.call(`close milestone ${milestone}`, () =>
      this.deps.octokit.rest.issues.updateMilestone({
        ...this.repoParams,
        milestone_number: milestone,
        state: 'closed',
      })
    );
    this.milestoneCache.clear();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // ISSUES
  // ═══════════════════════════════════════════════════════════════════════

  async getIssue(issue: number): Promise<Issue> {
    return this.call(`get issue ${issue}`, () =>
      this.issueCache.get(issue, async () => {
        const { data } = await this.deps.octokit.rest.issues.get({ ...this.repoParams, issue_number: issue });
        return toIssue(data);
      })
    );
  }

  async openMilestoneIssues(milestone: number): Promise<Issue[]> {
    return this.call(`list issues of milestone ${milestone}`, () =>
      this.milestoneIssueCache.get(milestone, async () => {
        const { data } = await this.deps.octokit.rest.issues.listForRepo({
          ...this.repoParams,
          milestone: String(milestone),
          state: 'open',
          per_page: 100,
        });
        return data.map(toIssue);
      })
    );
  }

  async renameIssue(issue: number, title: string): Promise<void> {
    await this.call(`rename issue ${issue}`, () =>
      this.deps.octokit.rest.issues.update({ ...this.repoParams, issue_number: issue, title })
    );
    this.forgetIssue(issue);
  }

  async closeIssue(issue: number): Promise<void> {
    await this.call(`close issue ${issue}`, () =>
      this.deps.octokit.rest.issues.update({ ...this.repoParams, issue_number: issue, state: 'closed' })
    );
    this.forgetIssue(issue);
  }

  async assignMilestone(issue: number, milestone: number): Promise<void> {
    await this.call(`assign milestone ${milestone} to #${issue}`, () =>
      this.deps.octokit.rest.issues.update({ ...this.repoParams, issue_number: issue, milestone })
    );
    this.forgetIssue(issue);
  }

  async addAssignees(issue: number, logins: string[]): Promise<void> {
    await this.call(`assign #${issue}`, () =>
      this.deps.octokit.rest.issues.addAssignees({ ...this.repoParams, issue_number: issue, assignees: logins })
    );
    this.forgetIssue(issue);
  }

  async removeAssignees(issue: number, logins: string[]): Promise<void> {
    await this.call(`unassign #${issue}`, () =>
      this.deps.octokit.rest.issues.removeAssignees({ ...this.repoParams, issue_number: issue, assignees: logins })
    );
    this.forgetIssue(issue);
  }

  async editIssueBody(issue: number, edit: (body: string) => string): Promise<void> {
    this.forgetIssue(issue);
    const current = await this.getIssue(issue);
    const body = edit(current.body);
    if (body === current.body) {
      return;
    }
    await this.call(`edit body of #${issue}`, () =>
      this.deps.octokit.rest.issues.update({ ...this.repoParams, issue_number: issue, body })
    );
    this.forgetIssue(issue);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PULL REQUESTS
  // ═══════════════════════════════════════════════════════════════════════

  async createPullRequest(request: NewPullRequest): Promise<PullRequest> {
    const { data } = await this.call(`create pull request ${request.head}`, () =>
      this.releaser.rest.pulls.create({
        ...this.repoParams,
        title: request.title,
        body: request.body,
        head: request.head,
        base: request.base,
        draft: true,
      })
    );
    const pr = toPullRequest(data);
    if (request.milestone) {
      // Milestones of pull requests live on the issue endpoint.
      await this.assignMilestone(pr.number, request.milestone);
      return { ...pr, milestone: request.milestone };
    }
    return pr;
  }

  async findPullRequest(headSha: string, base: string): Promise<PullRequest | null> {
    const { data } = await this.call(`find pull request for ${headSha}`, () =>
      this.deps.octokit.rest.pulls.list({ ...this.repoParams, state: 'all', base, per_page: 100 })
    );
    const found = data.find((pr) => pr.head.sha === headSha);
    return found ? toPullRequest(found) : null;
  }

  async findPullRequestForBranch(
    head: string,
    base: string,
    state: PullRequestStateFilter = 'all'
  ): Promise<PullRequest | null> {
    const { data } = await this.call(`find pull request for ${head}`, () =>
      this.deps.octokit.rest.pulls.list({ ...this.repoParams, state, base, head, per_page: 100 })
    );
    const [first] = data;
    return first ? toPullRequest(first) : null;
  }

  async changePullRequest(pullRequest: number, patch: PullRequestPatch): Promise<void> {
    const { milestone, ...fields } = patch;
    if (Object.keys(fields).length > 0) {
      await this.call(`update pull request ${pullRequest}`, () =>
        this.deps.octokit.rest.pulls.update({ ...this.repoParams, pull_number: pullRequest, ...fields })
      );
    }
    if (milestone !== undefined) {
      await this.assignMilestone(pullRequest, milestone);
    }
  }

  async markReadyForReview(nodeId: string): Promise<void> {
    await this.call(`mark ${nodeId} ready for review`, () =>
      this.deps.octokit.graphql(MARK_READY_FOR_REVIEW, { pullRequestId: nodeId })
    );
  }

  // ═══════════════════════════════════════════════════════════════════════
  // CI
  // ═══════════════════════════════════════════════════════════════════════

  async checks(commit: string): Promise<Map<string, CheckRun>> {
    return this.call(`list checks of ${commit}`, async () => {
      const runs = new Map<string, CheckRun>();
      const { data: suites } = await this.deps.octokit.rest.checks.listSuitesForRef({
        ...this.repoParams,
        ref: commit,
      });
      for (const suite of suites.check_suites) {
        const { data } = await this.deps.octokit.rest.checks.listForSuite({
          ...this.repoParams,
          check_suite_id: suite.id,
        });
        for (const run of data.check_runs) {
          runs.set(run.name, {
            id: run.id,
            name: run.name,
            status: run.status,
            conclusion: run.conclusion ?? null,
            htmlUrl: run.html_url ?? '',
          });
        }
      }
      return runs;
    });
  }

  async workflowRuns(branch: string, headSha: string): Promise<WorkflowRun[]> {
    const { data } = await this.call(`list workflow runs of ${branch}@${headSha}`, () =>
      this.deps.octokit.rest.actions.listWorkflowRunsForRepo({ ...this.repoParams, branch, head_sha: headSha })
    );
    return data.workflow_runs.map((run) => ({
      id: run.id,
      name: run.name ?? '',
      event: run.event,
      status: run.status ?? '',
      conclusion: run.conclusion ?? null,
      htmlUrl: run.html_url,
      path: run.path,
    }));
  }

  // ═══════════════════════════════════════════════════════════════════════
  // RELEASES
  // ═══════════════════════════════════════════════════════════════════════

  async latestRelease(): Promise<string> {
    const { data } = await this.call('get latest release', () =>
      this.deps.octokit.rest.repos.getLatestRelease(this.repoParams)
    );
    return data.tag_name;
  }

  async releaseCandidates(version: string): Promise<number[]> {
    const releases = await this.call('list releases', () => this.releaseList());
    return publishedCandidates(releases.map(toRelease), version);
  }

  async getRelease(tag: string): Promise<Release | null> {
    const data = await this.call(`get release ${tag}`, () => this.releaseData(tag));
    return data ? toRelease(data) : null;
  }

  async createRelease(release: NewRelease): Promise<Release> {
    const { data } = await this.call(`create release ${release.tagName}`, () =>
      this.deps.octokit.rest.repos.createRelease({
        ...this.repoParams,
        tag_name: release.tagName,
        body: release.body,
        draft: release.draft,
        prerelease: release.prerelease,
      })
    );
    this.releaseListCache.clear();
    return toRelease(data);
  }

  async releaseAssets(tag: string): Promise<ReleaseAsset[]> {
    const data = await this.call(`list assets of ${tag}`, () => this.requireReleaseData(tag));
    return data.assets.map(toAsset);
  }

  async uploadAsset(tag: string, name: string, contentType: string, data: Buffer): Promise<void> {
    await this.call(`upload ${name} to ${tag}`, async () => {
      const release = await this.requireReleaseData(tag);
      await this.deps.octokit.request(`POST ${release.upload_url}`, {
        name,
        data,
        headers: {
          'content-type': contentType,
          'content-length': data.length,
        },
      });
    });
  }

  async downloadAsset(assetId: number): Promise<Buffer> {
    const response = await this.call(`download asset ${assetId}`, () =>
      this.deps.octokit.rest.repos.getReleaseAsset({
        ...this.repoParams,
        asset_id: assetId,
        headers: { accept: 'application/octet-stream' },
      })
    );
    // With the octet-stream media type the payload is the raw file.
    const payload: unknown = response.data;
    if (payload instanceof ArrayBuffer) {
      return Buffer.from(payload);
    }
    if (Buffer.isBuffer(payload)) {
      return payload;
    }
    throw new ForgeApiError(`Unexpected payload for asset ${assetId}`, 'INVALID_RESPONSE');
  }

  async setReleaseNotes(tag: string, notes: string, prerelease: boolean): Promise<void> {
    await this.call(`set release notes of ${tag}`, async () => {
      const release = await this.requireReleaseData(tag);
      await this.deps.octokit.rest.repos.updateRelease({
        ...this.repoParams,
        release_id: release.id,
        body: notes,
        tag_name: tag,
        prerelease,
      });
    });
  }

  async isReleasePublished(tag: string): Promise<boolean> {
    const data = await this.call(`get release ${tag}`, () => this.requireReleaseData(tag));
    return data.published_at !== null;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // GIT OBJECTS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Creates blobs for the files of a local commit, a tree on top of
   * `parentSha`, and a commit signed by GitHub; then creates or force-moves
   * the branch ref with the releaser token.
   */
  async pushSigned(request: SignedCommitRequest): Promise<string> {
    return this.call(`push signed commit to ${request.branch}`, async () => {
      const tree: Array<{ path: string; mode: '100644'; type: 'blob'; sha: string }> = [];
      for (const file of request.files) {
        const { data: blob } = await this.deps.octokit.rest.git.createBlob({
          ...this.repoParams,
          content: file.content,
          encoding: 'utf-8',
        });
        tree.push({ path: file.path, mode: '100644', type: 'blob', sha: blob.sha });
      }

      const { data: newTree } = await this.deps.octokit.rest.git.createTree({
        ...this.repoParams,
        base_tree: request.parentSha,
        tree,
      });

      const { data: commit } = await this.deps.octokit.rest.git.createCommit({
        ...this.repoParams,
        message: request.message,
        tree: newTree.sha,
        parents: [request.parentSha],
      });

      if (await this.branchExists(request.branch)) {
        await this.releaser.rest.git.updateRef({
          ...this.repoParams,
          ref: `heads/${request.branch}`,
          sha: commit.sha,
          force: true,
        });
      } else {
        await this.releaser.rest.git.createRef({
          ...this.repoParams,
          ref: `refs/heads/${request.branch}`,
          sha: commit.sha,
        });
      }
      logger.info(`Pushed ${commit.sha} to ${request.branch}`);
      return commit.sha;
    });
  }

  private async branchExists(branch: string): Promise<boolean> {
    try {
      await this.deps.octokit.rest.repos.getBranch({ ...this.repoParams, branch });
      return true;
    } catch (error: unknown) {
      if (isOctokitRequestError(error) && error.status === 404) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Creates an unsigned annotated tag by github-actions[bot]. A human signs
   * it later with the same annotation.
   */
  async createTag(request: ApiTagRequest): Promise<string> {
    const message = request.message.endsWith('\n') ? request.message : `${request.message}\n`;
    return this.call(`create tag ${request.tag}`, async () => {
      const { data: tag } = await this.deps.octokit.rest.git.createTag({
        ...this.repoParams,
        tag: request.tag,
        message,
        object: request.commitSha,
        type: 'commit',
        tagger: { ...BOT_TAGGER },
      });
      await this.deps.octokit.rest.git.createRef({
        ...this.repoParams,
        ref: `refs/tags/${request.tag}`,
        sha: tag.sha,
      });
      return tag.sha;
    });
  }

  invalidateCache(): void {
    this.cache.clear();
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// MAPPERS
// ═══════════════════════════════════════════════════════════════════════════

function toState(state: string): 'open' | 'closed' {
  return state === 'closed' ? 'closed' : 'open';
}

function toMilestone(data: MilestoneData): Milestone {
  return { number: data.number, title: data.title, htmlUrl: data.html_url, state: toState(data.state) };
}

function toIssue(data: IssueData): Issue {
  return {
    number: data.number,
    title: data.title,
    body: data.body ?? '',
    user: data.user?.login ?? '',
    assignees: (data.assignees ?? []).map((a) => a.login),
    htmlUrl: data.html_url,
    state: toState(data.state),
    milestone: data.milestone?.number ?? null,
  };
}

function toPullRequest(data: PullRequestData): PullRequest {
  return {
    number: data.number,
    nodeId: data.node_id,
    title: data.title,
    body: data.body ?? '',
    htmlUrl: data.html_url,
    state: toState(data.state),
    draft: data.draft ?? false,
    merged: data.merged_at !== null,
    milestone: data.milestone?.number ?? null,
    headRef: data.head.ref,
    headSha: data.head.sha,
    baseRef: data.base.ref,
  };
}

function toAsset(data: ReleaseAssetData): ReleaseAsset {
  return {
    id: data.id,
    name: data.name,
    contentType: data.content_type,
    browserDownloadUrl: data.browser_download_url,
  };
}

function toRelease(data: ReleaseData): Release {
  return {
    id: data.id,
    tagName: data.tag_name,
    body: data.body ?? '',
    draft: data.draft,
    prerelease: data.prerelease,
    publishedAt: data.published_at,
    assets: data.assets.map(toAsset),
  };
}
