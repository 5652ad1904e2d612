/**
 * GitHubForge Unit Tests
 *
 * Octokit is replaced by jest.fn() endpoints; each test asserts the request
 * parameters sent and the mapped result.
 */

import { GitHubForge } from './github_forge';
import type { Octokit } from '@octokit/rest';
import { ForgeApiError, ForgeObjectNotFoundError } from '../errors';

// ==================== Test Helpers ====================

function createMockOctokit() {
  return {
    paginate: jest.fn(),
    graphql: jest.fn(),
    request: jest.fn(),
    rest: {
      users: { getAuthenticated: jest.fn() },
      issues: {
        listMilestones: jest.fn(),
        updateMilestone: jest.fn(),
        get: jest.fn(),
        listForRepo: jest.fn(),
        update: jest.fn(),
        addAssignees: jest.fn(),
        removeAssignees: jest.fn(),
      },
      pulls: { create: jest.fn(), list: jest.fn(), update: jest.fn() },
      checks: { listSuitesForRef: jest.fn(), listForSuite: jest.fn() },
      actions: { listWorkflowRunsForRepo: jest.fn() },
      repos: {
        listReleases: jest.fn(),
        getRelease: jest.fn(),
        getLatestRelease: jest.fn(),
        createRelease: jest.fn(),
        updateRelease: jest.fn(),
        getReleaseAsset: jest.fn(),
        getBranch: jest.fn(),
      },
      git: {
        createBlob: jest.fn(),
        createTree: jest.fn(),
        createCommit: jest.fn(),
        createRef: jest.fn(),
        updateRef: jest.fn(),
        createTag: jest.fn(),
      },
    },
  };
}

type MockOctokit = ReturnType<typeof createMockOctokit>;

function asOctokit(mock: MockOctokit): Octokit {
  return mock as unknown as Octokit;
}

function createOctokitError(status: number, message = 'Error'): Error & { status: number } {
  const error = new Error(message) as Error & { status: number };
  error.status = status;
  return error;
}

function issueData(number: number, overrides: Record<string, unknown> = {}) {
  return {
    number,
    title: `Issue ${number}`,
    body: 'body',
    state: 'open',
    html_url: `https://github.com/acme/widgets/issues/${number}`,
    user: { login: 'alice' },
    assignees: [{ login: 'bob' }],
    milestone: { number: 7 },
    ...overrides,
  };
}

function pullData(number: number, overrides: Record<string, unknown> = {}) {
  return {
    number,
    node_id: `PR_${number}`,
    title: `PR ${number}`,
    body: null,
    html_url: `https://github.com/acme/widgets/pull/${number}`,
    state: 'open',
    draft: true,
    merged_at: null,
    milestone: null,
    head: { ref: 'release/v1.2.0', sha: 'head-sha' },
    base: { ref: 'master' },
    ...overrides,
  };
}

function releaseData(id: number, tag: string, overrides: Record<string, unknown> = {}) {
  return {
    id,
    tag_name: tag,
    body: `notes for ${tag}`,
    draft: false,
    prerelease: false,
    published_at: '2025-03-01T00:00:00Z',
    upload_url: `https://uploads.github.com/repos/acme/widgets/releases/${id}/assets`,
    assets: [],
    ...overrides,
  };
}

// ==================== Tests ====================

describe('GitHubForge', () => {
  let octokit: MockOctokit;
  let releaser: MockOctokit;
  let forge: GitHubForge;

  beforeEach(() => {
    octokit = createMockOctokit();
    releaser = createMockOctokit();
    forge = new GitHubForge({
      octokit: asOctokit(octokit),
      releaserOctokit: asOctokit(releaser),
      owner: 'acme',
      repo: 'widgets',
    });
  });

  describe('identity', () => {
    it('should resolve the actor from the authenticated user once', async () => {
      octokit.rest.users.getAuthenticated.mockResolvedValue({ data: { login: 'alice' } });

      expect(await forge.actor()).toBe('alice');
      expect(await forge.actor()).toBe('alice');
      expect(octokit.rest.users.getAuthenticated).toHaveBeenCalledTimes(1);
    });

    it('should prefer an explicit actor', async () => {
      const explicit = new GitHubForge({ octokit: asOctokit(octokit), owner: 'acme', repo: 'widgets', actor: 'carol' });

      expect(await explicit.actor()).toBe('carol');
      expect(octokit.rest.users.getAuthenticated).not.toHaveBeenCalled();
    });
  });

  describe('milestones', () => {
    beforeEach(() => {
      octokit.paginate.mockResolvedValue([
        { number: 3, title: 'v1.10.0', html_url: 'https://github.com/acme/widgets/milestone/3', state: 'open' },
        { number: 2, title: 'v1.9.x', html_url: 'https://github.com/acme/widgets/milestone/2', state: 'open' },
        { number: 1, title: 'v1.9.2', html_url: 'https://github.com/acme/widgets/milestone/1', state: 'open' },
      ]);
    });

    it('should pick the smallest versioned milestone and cache the list', async () => {
      const next = await forge.nextMilestone();
      await forge.milestone('v1.10.0');

      expect(next).toEqual({
        number: 1,
        title: 'v1.9.2',
        htmlUrl: 'https://github.com/acme/widgets/milestone/1',
        state: 'open',
      });
      expect(octokit.paginate).toHaveBeenCalledTimes(1);
      expect(octokit.paginate).toHaveBeenCalledWith(octokit.rest.issues.listMilestones, {
        owner: 'acme',
        repo: 'widgets',
        state: 'open',
        per_page: 100,
      });
    });

    it('should throw ForgeObjectNotFoundError for an unknown title', async () => {
      await expect(forge.milestone('v9.9.9')).rejects.toBeInstanceOf(ForgeObjectNotFoundError);
    });

    it('should reload milestones after closing one', async () => {
      octokit.rest.issues.updateMilestone.mockResolvedValue({ data: {} });

      await forge.milestones();
      await forge.closeMilestone(1);
      await forge.milestones();

      expect(octokit.rest.issues.updateMilestone).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        milestone_number: 1,
        state: 'closed',
      });
      expect(octokit.paginate).toHaveBeenCalledTimes(2);
    });
  });

  describe('issues', () => {
    it('should map and cache an issue until it is changed', async () => {
      octokit.rest.issues.get.mockResolvedValue({ data: issueData(5) });
      octokit.rest.issues.update.mockResolvedValue({ data: {} });

      const issue = await forge.getIssue(5);
      await forge.getIssue(5);
      await forge.renameIssue(5, 'Release v1.2.0');
      await forge.getIssue(5);

      expect(issue).toEqual({
        number: 5,
        title: 'Issue 5',
        body: 'body',
        user: 'alice',
        assignees: ['bob'],
        htmlUrl: 'https://github.com/acme/widgets/issues/5',
        state: 'open',
        milestone: 7,
      });
      expect(octokit.rest.issues.get).toHaveBeenCalledTimes(2);
      expect(octokit.rest.issues.update).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        issue_number: 5,
        title: 'Release v1.2.0',
      });
    });

    it('should list open issues of a milestone by number', async () => {
      octokit.rest.issues.listForRepo.mockResolvedValue({ data: [issueData(8, { milestone: null, body: null })] });

      const issues = await forge.openMilestoneIssues(7);

      expect(octokit.rest.issues.listForRepo).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        milestone: '7',
        state: 'open',
        per_page: 100,
      });
      expect(issues.map((i) => [i.number, i.body, i.milestone])).toEqual([[8, '', null]]);
    });

    it('should write an edited body only when it changed', async () => {
      octokit.rest.issues.get.mockResolvedValue({ data: issueData(5, { body: 'old' }) });
      octokit.rest.issues.update.mockResolvedValue({ data: {} });

      await forge.editIssueBody(5, (body) => body);
      await forge.editIssueBody(5, (body) => `${body}\nnew`);

      expect(octokit.rest.issues.get).toHaveBeenCalledTimes(2);
      expect(octokit.rest.issues.update).toHaveBeenCalledTimes(1);
      expect(octokit.rest.issues.update).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        issue_number: 5,
        body: 'old\nnew',
      });
    });

    it('should send assignee changes', async () => {
      octokit.rest.issues.addAssignees.mockResolvedValue({ data: {} });
      octokit.rest.issues.removeAssignees.mockResolvedValue({ data: {} });

      await forge.removeAssignees(5, ['release-bot']);
      await forge.addAssignees(5, ['alice']);

      expect(octokit.rest.issues.removeAssignees).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        issue_number: 5,
        assignees: ['release-bot'],
      });
      expect(octokit.rest.issues.addAssignees).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        issue_number: 5,
        assignees: ['alice'],
      });
    });
  });

  describe('pull requests', () => {
    it('should create a draft with the releaser client and set its milestone', async () => {
      releaser.rest.pulls.create.mockResolvedValue({ data: pullData(12) });
      octokit.rest.issues.update.mockResolvedValue({ data: {} });

      const pr = await forge.createPullRequest({
        title: 'Release v1.2.0',
        body: 'notes',
        head: 'acme:release/v1.2.0',
        base: 'master',
        milestone: 7,
      });

      expect(releaser.rest.pulls.create).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        title: 'Release v1.2.0',
        body: 'notes',
        head: 'acme:release/v1.2.0',
        base: 'master',
        draft: true,
      });
      expect(octokit.rest.pulls.create).not.toHaveBeenCalled();
      expect(octokit.rest.issues.update).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        issue_number: 12,
        milestone: 7,
      });
      expect(pr).toEqual({
        number: 12,
        nodeId: 'PR_12',
        title: 'PR 12',
        body: '',
        htmlUrl: 'https://github.com/acme/widgets/pull/12',
        state: 'open',
        draft: true,
        merged: false,
        milestone: 7,
        headRef: 'release/v1.2.0',
        headSha: 'head-sha',
        baseRef: 'master',
      });
    });

    it('should find a pull request by head SHA among all states', async () => {
      octokit.rest.pulls.list.mockResolvedValue({
        data: [pullData(10, { head: { ref: 'a', sha: 'other' } }), pullData(11, { merged_at: '2025-01-01T00:00:00Z' })],
      });

      const pr = await forge.findPullRequest('head-sha', 'master');

      expect(octokit.rest.pulls.list).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        state: 'all',
        base: 'master',
        per_page: 100,
      });
      expect(pr?.number).toBe(11);
      expect(pr?.merged).toBe(true);
    });

    it('should return null when no pull request matches the branch', async () => {
      octokit.rest.pulls.list.mockResolvedValue({ data: [] });

      const pr = await forge.findPullRequestForBranch('acme:release/v1.2.0', 'master', 'open');

      expect(pr).toBeNull();
      expect(octokit.rest.pulls.list).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        state: 'open',
        base: 'master',
        head: 'acme:release/v1.2.0',
        per_page: 100,
      });
    });

    it('should send the milestone of a patch through the issue endpoint', async () => {
      octokit.rest.pulls.update.mockResolvedValue({ data: {} });
      octokit.rest.issues.update.mockResolvedValue({ data: {} });

      await forge.changePullRequest(12, { title: 'Release v1.2.0', milestone: 7 });
      await forge.changePullRequest(13, { milestone: 8 });

      expect(octokit.rest.pulls.update).toHaveBeenCalledTimes(1);
      expect(octokit.rest.pulls.update).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        pull_number: 12,
        title: 'Release v1.2.0',
      });
      expect(octokit.rest.issues.update).toHaveBeenCalledTimes(2);
    });

    it('should mark a pull request ready through GraphQL', async () => {
      octokit.graphql.mockResolvedValue({});

      await forge.markReadyForReview('PR_12');

      expect(octokit.graphql).toHaveBeenCalledWith(expect.stringContaining('markPullRequestReadyForReview'), {
        pullRequestId: 'PR_12',
      });
    });
  });

  describe('CI', () => {
    it('should collect check runs of every suite keyed by name', async () => {
      octokit.rest.checks.listSuitesForRef.mockResolvedValue({ data: { check_suites: [{ id: 1 }, { id: 2 }] } });
      octokit.rest.checks.listForSuite
        .mockResolvedValueOnce({
          data: { check_runs: [{ id: 11, name: 'build', status: 'completed', conclusion: 'success', html_url: 'u1' }] },
        })
        .mockResolvedValueOnce({
          data: { check_runs: [{ id: 12, name: 'lint', status: 'in_progress', conclusion: null, html_url: null }] },
        });

      const checks = await forge.checks('abc');

      expect([...checks.keys()]).toEqual(['build', 'lint']);
      expect(checks.get('lint')).toEqual({ id: 12, name: 'lint', status: 'in_progress', conclusion: null, htmlUrl: '' });
      expect(octokit.rest.checks.listSuitesForRef).toHaveBeenCalledWith({ owner: 'acme', repo: 'widgets', ref: 'abc' });
    });

    it('should map workflow runs of a branch and SHA', async () => {
      octokit.rest.actions.listWorkflowRunsForRepo.mockResolvedValue({
        data: {
          workflow_runs: [
            {
              id: 3,
              name: 'Release',
              event: 'push',
              status: 'queued',
              conclusion: null,
              html_url: 'https://github.com/acme/widgets/actions/runs/3',
              path: '.github/workflows/release.yml',
            },
          ],
        },
      });

      const runs = await forge.workflowRuns('v1.2.0', 'abc');

      expect(octokit.rest.actions.listWorkflowRunsForRepo).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        branch: 'v1.2.0',
        head_sha: 'abc',
      });
      expect(runs).toEqual([
        {
          id: 3,
          name: 'Release',
          event: 'push',
          status: 'queued',
          conclusion: null,
          htmlUrl: 'https://github.com/acme/widgets/actions/runs/3',
          path: '.github/workflows/release.yml',
        },
      ]);
    });
  });

  describe('releases', () => {
    it('should count published prereleases of a version', async () => {
      octokit.paginate.mockResolvedValue([
        releaseData(1, 'v1.2.0-rc.1', { prerelease: true }),
        releaseData(2, 'v1.2.0-rc.2', { prerelease: true, draft: true }),
        releaseData(3, 'v1.2.0-rc.3', { prerelease: true }),
        releaseData(4, 'v1.1.0'),
      ]);

      expect(await forge.releaseCandidates('v1.2.0')).toEqual([1, 3]);
    });

    it('should return null for a tag without a release', async () => {
      octokit.paginate.mockResolvedValue([releaseData(4, 'v1.1.0')]);

      expect(await forge.getRelease('v1.2.0')).toBeNull();
      expect(octokit.rest.repos.getRelease).not.toHaveBeenCalled();
    });

    it('should fetch release details fresh by listed id', async () => {
      octokit.paginate.mockResolvedValue([releaseData(4, 'v1.2.0', { draft: true, published_at: null })]);
      octokit.rest.repos.getRelease.mockResolvedValue({
        data: releaseData(4, 'v1.2.0', {
          draft: true,
          published_at: null,
          assets: [{ id: 9, name: 'widgets-v1.2.0.tar.gz', content_type: 'application/gzip', browser_download_url: 'd' }],
        }),
      });

      const assets = await forge.releaseAssets('v1.2.0');
      const published = await forge.isReleasePublished('v1.2.0');

      expect(octokit.rest.repos.getRelease).toHaveBeenCalledWith({ owner: 'acme', repo: 'widgets', release_id: 4 });
      expect(assets).toEqual([
        { id: 9, name: 'widgets-v1.2.0.tar.gz', contentType: 'application/gzip', browserDownloadUrl: 'd' },
      ]);
      expect(published).toBe(false);
      expect(octokit.paginate).toHaveBeenCalledTimes(1);
    });

    it('should upload to the release upload URL', async () => {
      octokit.paginate.mockResolvedValue([releaseData(4, 'v1.2.0')]);
      octokit.rest.repos.getRelease.mockResolvedValue({ data: releaseData(4, 'v1.2.0') });
      octokit.request.mockResolvedValue({ data: {} });
      const data = Buffer.from('signature');

      await forge.uploadAsset('v1.2.0', 'a.tar.gz.asc', 'application/pgp-signature', data);

      expect(octokit.request).toHaveBeenCalledWith(
        'POST https://uploads.github.com/repos/acme/widgets/releases/4/assets',
        {
          name: 'a.tar.gz.asc',
          data,
          headers: { 'content-type': 'application/pgp-signature', 'content-length': 9 },
        }
      );
    });

    it('should convert a downloaded ArrayBuffer to a Buffer', async () => {
      const bytes = new Uint8Array([104, 105]);
      octokit.rest.repos.getReleaseAsset.mockResolvedValue({ data: bytes.buffer });

      const content = await forge.downloadAsset(9);

      expect(content.toString('utf8')).toBe('hi');
      expect(octokit.rest.repos.getReleaseAsset).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        asset_id: 9,
        headers: { accept: 'application/octet-stream' },
      });
    });

    it('should reject an unexpected asset payload', async () => {
      octokit.rest.repos.getReleaseAsset.mockResolvedValue({ data: { name: 'json' } });

      await expect(forge.downloadAsset(9)).rejects.toMatchObject({ code: 'INVALID_RESPONSE' });
    });

    it('should create a release and drop the cached list', async () => {
      octokit.paginate.mockResolvedValueOnce([]).mockResolvedValueOnce([releaseData(5, 'v1.2.0', { draft: true })]);
      octokit.rest.repos.createRelease.mockResolvedValue({ data: releaseData(5, 'v1.2.0', { draft: true }) });
      octokit.rest.repos.getRelease.mockResolvedValue({ data: releaseData(5, 'v1.2.0', { draft: true }) });

      expect(await forge.getRelease('v1.2.0')).toBeNull();
      await forge.createRelease({ tagName: 'v1.2.0', body: 'notes', draft: true, prerelease: false });
      const release = await forge.getRelease('v1.2.0');

      expect(octokit.rest.repos.createRelease).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        tag_name: 'v1.2.0',
        body: 'notes',
        draft: true,
        prerelease: false,
      });
      expect(release?.id).toBe(5);
    });

    it('should update notes and prerelease flag', async () => {
      octokit.paginate.mockResolvedValue([releaseData(4, 'v1.2.0-rc.1')]);
      octokit.rest.repos.getRelease.mockResolvedValue({ data: releaseData(4, 'v1.2.0-rc.1') });
      octokit.rest.repos.updateRelease.mockResolvedValue({ data: {} });

      await forge.setReleaseNotes('v1.2.0-rc.1', 'formatted', true);

      expect(octokit.rest.repos.updateRelease).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        release_id: 4,
        body: 'formatted',
        tag_name: 'v1.2.0-rc.1',
        prerelease: true,
      });
    });

    it('should report a missing release by tag', async () => {
      octokit.paginate.mockResolvedValue([]);

      await expect(forge.isReleasePublished('v1.2.0')).rejects.toThrow(
        'Release not found: v1.2.0 in acme/widgets'
      );
    });
  });

  describe('git objects', () => {
    beforeEach(() => {
      octokit.rest.git.createBlob
        .mockResolvedValueOnce({ data: { sha: 'blob-1' } })
        .mockResolvedValueOnce({ data: { sha: 'blob-2' } });
      octokit.rest.git.createTree.mockResolvedValue({ data: { sha: 'tree-1' } });
      octokit.rest.git.createCommit.mockResolvedValue({ data: { sha: 'commit-1' } });
    });

    const request = {
      parentSha: 'parent',
      branch: 'release/v1.2.0',
      message: 'chore: Release v1.2.0\n\nnotes',
      files: [
        { path: 'CHANGELOG.md', content: '# Changelog' },
        { path: 'docs/notes.md', content: 'notes' },
      ],
    };

    it('should create the branch ref when the branch is missing', async () => {
      octokit.rest.repos.getBranch.mockRejectedValue(createOctokitError(404));
      releaser.rest.git.createRef.mockResolvedValue({ data: {} });

      const sha = await forge.pushSigned(request);

      expect(sha).toBe('commit-1');
      expect(octokit.rest.git.createTree).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        base_tree: 'parent',
        tree: [
          { path: 'CHANGELOG.md', mode: '100644', type: 'blob', sha: 'blob-1' },
          { path: 'docs/notes.md', mode: '100644', type: 'blob', sha: 'blob-2' },
        ],
      });
      expect(octokit.rest.git.createCommit).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        message: 'chore: Release v1.2.0\n\nnotes',
        tree: 'tree-1',
        parents: ['parent'],
      });
      expect(releaser.rest.git.createRef).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        ref: 'refs/heads/release/v1.2.0',
        sha: 'commit-1',
      });
    });

    it('should force-move an existing branch with the releaser client', async () => {
      octokit.rest.repos.getBranch.mockResolvedValue({ data: {} });
      releaser.rest.git.updateRef.mockResolvedValue({ data: {} });

      await forge.pushSigned(request);

      expect(releaser.rest.git.updateRef).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        ref: 'heads/release/v1.2.0',
        sha: 'commit-1',
        force: true,
      });
      expect(octokit.rest.git.updateRef).not.toHaveBeenCalled();
    });

    it('should create an annotated tag with a trailing newline', async () => {
      octokit.rest.git.createTag.mockResolvedValue({ data: { sha: 'tag-obj' } });
      octokit.rest.git.createRef.mockResolvedValue({ data: {} });

      const sha = await forge.createTag({ tag: 'v1.2.0', commitSha: 'commit-1', message: 'notes' });

      expect(sha).toBe('tag-obj');
      expect(octokit.rest.git.createTag).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        tag: 'v1.2.0',
        message: 'notes\n',
        object: 'commit-1',
        type: 'commit',
        tagger: {
          name: 'github-actions[bot]',
          email: '41898282+github-actions[bot]@users.noreply.github.com',
        },
      });
      expect(octokit.rest.git.createRef).toHaveBeenCalledWith({
        owner: 'acme',
        repo: 'widgets',
        ref: 'refs/tags/v1.2.0',
        sha: 'tag-obj',
      });
    });
  });

  describe('errors and caching', () => {
    it.each([
      [403, 'PERMISSION_DENIED', 'Permission denied: get issue 5'],
      [404, 'NOT_FOUND', 'Not found: get issue 5'],
      [502, 'SERVER_ERROR', 'Server error (502): get issue 5'],
    ])('should map HTTP %i to %s', async (status, code, message) => {
      octokit.rest.issues.get.mockRejectedValue(createOctokitError(status));

      const error = await forge.getIssue(5).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ForgeApiError);
      expect(error).toMatchObject({ code, message, statusCode: status });
    });

    it('should map non-HTTP failures to NETWORK_ERROR', async () => {
      octokit.rest.pulls.list.mockRejectedValue(new Error('socket hang up'));

      await expect(forge.findPullRequest('abc', 'master')).rejects.toMatchObject({
        code: 'NETWORK_ERROR',
        message: 'Network error: socket hang up',
      });
    });

    it('should not cache a failed read', async () => {
      octokit.rest.issues.get
        .mockRejectedValueOnce(createOctokitError(502))
        .mockResolvedValueOnce({ data: issueData(5) });

      await expect(forge.getIssue(5)).rejects.toBeInstanceOf(ForgeApiError);
      expect((await forge.getIssue(5)).number).toBe(5);
    });

    it('should reload every cached read after invalidateCache', async () => {
      octokit.rest.issues.get.mockResolvedValue({ data: issueData(5) });
      octokit.paginate.mockResolvedValue([]);

      await forge.getIssue(5);
      await forge.milestones();
      forge.invalidateCache();
      await forge.getIssue(5);
      await forge.milestones();

      expect(octokit.rest.issues.get).toHaveBeenCalledTimes(2);
      expect(octokit.paginate).toHaveBeenCalledTimes(2);
    });
  });
});
