import { ReleaseOrchestrator } from './release_orchestrator';
import { MemoryVersionControl, memoryCommit } from '../git/memory/memory_version_control';
import type { MemoryCommit } from '../git/memory/memory_version_control';
import { MemoryForge } from '../forge/memory/memory_forge';
import type { CheckRun } from '../forge/types';
import { MemoryWorkspace } from '../workspace/memory/memory_workspace';
import { MemoryReleaseTools } from '../release_tools/memory/memory_release_tools';
import { RecordingStageReporter } from '../stage/recording_reporter';
import { StageRunner } from '../stage/stage';
import { InvalidState, UserAbort } from '../stage/errors';
import { START_WAIT_MS } from '../stage/poll';
import { createReleaseConfig } from '../config/release_config';
import { DEFAULT_SETTINGS } from '../config/settings';
import type { ReleaseConfig, ReleaseSettings } from '../config/config.types';

const SETTINGS: ReleaseSettings = { ...DEFAULT_SETTINGS, projectName: 'widgets', editor: 'vim' };

function changelogFor(version: string): string {
  return [
    `<a name="${version}"></a>`,
    `## ${version} (2025-03-01)`,
    '',
    '### Release notes',
    '',
    'Faster widget rendering.',
    '',
    '#### Features',
    '',
    '- render widgets in parallel',
    '',
  ].join('\n');
}

function tip(commits: MemoryCommit[] | undefined): string {
  return commits?.[commits.length - 1]?.sha ?? '';
}

type CheckFixture = Partial<CheckRun> & { name: string };

type Harness = {
  vcs: MemoryVersionControl;
  forge: MemoryForge;
  workspace: MemoryWorkspace;
  tools: MemoryReleaseTools;
  reporter: RecordingStageReporter;
  printed: string[];
  /** Check runs reported for every new PR head */
  checks: CheckFixture[];
  sleep: jest.Mock<Promise<void>, [number]>;
  create(overrides?: Partial<ReleaseConfig>): ReleaseOrchestrator;
};

/**
 * A fork-based local release: `upstream` is the project, `origin` the
 * maintainer's fork. Pull requests follow the fork's branch tips whenever
 * the run sleeps, the way the forge catches up with pushes.
 */
function createHarness(): Harness {
  const initial = memoryCommit('m1', 'feat: Initial', ['README.md']);
  const vcs = new MemoryVersionControl('/repo', 'master');
  vcs.setBranch('master', [initial]);
  vcs.setRemote('upstream', 'git@github.com:acme/widgets.git');
  vcs.setRemote('origin', 'git@github.com:alice/widgets.git');
  vcs.setRemoteBranch('upstream', 'master', [initial]);
  vcs.setRemoteBranch('origin', 'master', [initial]);

  const workspace = new MemoryWorkspace('/repo', { '.gitignore': '/_build/\n' }, { onChange: (path) => vcs.touch(path) });
  const forge = new MemoryForge({ actor: 'alice' });
  const tools = new MemoryReleaseTools(forge);
  const reporter = new RecordingStageReporter();
  const printed: string[] = [];

  const syncPullRequests = (): void => {
    for (const pr of forge.pullRequests()) {
      const sha = tip(vcs.getRemoteBranch('origin', pr.headRef));
      if (sha && sha !== pr.headSha) {
        forge.setPullRequest({ number: pr.number, headSha: sha });
        forge.setChecks(sha, harness.checks);
      }
    }
  };

  const harness: Harness = {
    vcs,
    forge,
    workspace,
    tools,
    reporter,
    printed,
    checks: [{ name: 'build' }, { name: 'test' }],
    sleep: jest.fn(async (_ms: number) => syncPullRequests()),
    create(overrides = {}) {
      return new ReleaseOrchestrator(createReleaseConfig(overrides), {
        vcs,
        forge,
        workspace,
        tools,
        settings: SETTINGS,
        runner: new StageRunner(reporter),
        sleep: harness.sleep,
        print: (line) => printed.push(line),
      });
    },
  };

  forge.hooks = {
    resolveHeadSha: (request) => {
      const sha = tip(vcs.getRemoteBranch('origin', request.head.slice(request.head.indexOf(':') + 1)));
      forge.setChecks(sha, harness.checks);
      return sha;
    },
  };
  tools.hooks = {
    onEdit: async (path) => {
      await workspace.writeFile(path, changelogFor('v1.3.0-rc.2'));
    },
  };
  return harness;
}

/** Release commit `r1` already merged into main through PR 5 */
function createMergedHarness() {
  const harness = createHarness();
  const { vcs, forge, workspace } = harness;
  const history = [
    memoryCommit('m1', 'feat: Initial', ['README.md']),
    { ...memoryCommit('r1', 'chore: Release v1.3.0-rc.2', ['CHANGELOG.md']), body: 'Faster widget rendering.\n' },
  ];
  vcs.setBranch('master', history);
  vcs.setRemoteBranch('upstream', 'master', history);
  workspace.setFile('CHANGELOG.md', changelogFor('v1.3.0-rc.2'));
  forge.addMilestone('v1.3.0');
  forge.setPullRequest({ number: 5, headRef: 'release/v1.3.0-rc.2', headSha: 'r1', state: 'closed', merged: true });
  forge.setWorkflowRuns('master', 'r1', [{ name: 'ci' }]);
  forge.setWorkflowRuns('v1.3.0-rc.2', 'r1', [{ name: 'build-binaries' }]);
  return harness;
}

describe('ReleaseOrchestrator', () => {
  describe('preconditions', () => {
    it('requires the source branch to be checked out', async () => {
      const { create } = createHarness();

      await expect(create({ branch: 'develop' }).runStages()).rejects.toThrow(
        new InvalidState('Expected to be on develop, but on master')
      );
    });

    it('requires a clean working tree', async () => {
      const { create, vcs } = createHarness();
      vcs.touch('scratch.txt');

      await expect(create().runStages()).rejects.toThrow('Working tree is not clean');
    });

    it('requires an issue under CI', async () => {
      const { create } = createHarness();

      await expect(create({ githubActions: true }).run()).rejects.toThrow(
        'Issue number is required when running in GitHub Actions'
      );
    });
  });

  describe('tracking issue', () => {
    it('asks for the bot to be assigned before doing anything', async () => {
      const { create, forge } = createHarness();
      forge.setIssue({ number: 7, title: 'Release tracking issue', assignees: ['alice'] });

      await expect(create({ issue: 7 }).run()).rejects.toThrow(new UserAbort('Assign the issue to release-bot'));
      expect(forge.calls).toEqual([]);
    });

    it('hands an unrelated issue back to the human', async () => {
      const { create, forge, reporter } = createHarness();
      forge.setIssue({ number: 7, title: 'Crash on startup', assignees: ['release-bot'] });

      await expect(create({ issue: 7 }).run()).rejects.toThrow('Returning to the user to deal with the issue');
      expect(forge.calls).toEqual(['removeAssignees 7 release-bot', 'addAssignees 7 alice']);
      expect(forge.issue(7)?.assignees).toEqual(['alice']);
      expect(reporter.lines('paused')).toEqual(['Check issue: Returning to the user to deal with the issue']);
    });

    it('takes production mode from the issue body', async () => {
      const { create, forge, workspace } = createHarness();
      forge.addMilestone('v1.3.0');
      forge.setIssue({ number: 7, title: 'Release tracking issue', body: 'Production release', assignees: ['release-bot'] });
      workspace.setFile('CHANGELOG.md', changelogFor('v1.3.0'));
      const orchestrator = create({ issue: 7, dryrun: true, resume: true });

      const result = await orchestrator.run();

      expect(result).toEqual({ version: 'v1.3.0', status: 'dry-run' });
      expect(orchestrator.releaseConfig.production).toBe(true);
      expect(forge.issue(7)?.title).toBe('Release tracking issue: v1.3.0');
      expect(forge.issue(7)?.milestone).toBe(1);
    });
  });

  describe('version resolution', () => {
    it('accepts an explicit version', async () => {
      const { create, forge, workspace, reporter, printed } = createHarness();
      forge.addMilestone('v1.3.0');
      workspace.setFile('CHANGELOG.md', changelogFor('v1.2.3'));

      const result = await create({ version: 'v1.2.3', dryrun: true, resume: true }).run();

      expect(result).toEqual({ version: 'v1.2.3', status: 'dry-run' });
      expect(reporter.lines('ok')).toContain('Version: Accepting override version v1.2.3');
      expect(printed).toEqual([
        'title: chore: Release v1.2.3',
        'body: Faster widget rendering.',
        'head: alice:release/v1.2.3',
        'base: master',
        'milestone: v1.3.0',
      ]);
    });

    it('picks the next release candidate of the next milestone', async () => {
      const { create, forge, reporter } = createHarness();
      forge.addMilestone('v1.4.0');
      forge.addMilestone('v1.3.0');
      forge.setRelease({ tagName: 'v1.3.0-rc.1', draft: false, prerelease: true, publishedAt: '2025-02-01T00:00:00Z' });
      forge.setRelease({ tagName: 'v1.3.0-rc.3', draft: true, prerelease: true });

      const result = await create({ dryrun: true }).run();

      expect(result.version).toBe('v1.3.0-rc.2');
      expect(reporter.lines('ok')).toContain('Version: v1.3.0-rc.2');
    });

    it('rejects a malformed version', async () => {
      const { create } = createHarness();

      await expect(create({ version: 'banana' }).run()).rejects.toThrow(/^Version: Invalid version: banana/);
    });

    it('resolves latest to the latest published release', async () => {
      const { create, forge, workspace, reporter } = createHarness();
      forge.addMilestone('v1.3.0');
      workspace.setFile('CHANGELOG.md', changelogFor('v1.2.1'));
      forge.setRelease({ tagName: 'v1.2.0', draft: false, publishedAt: '2025-01-10T00:00:00Z' });
      forge.setRelease({ tagName: 'v1.2.1', draft: false, publishedAt: '2025-01-20T00:00:00Z' });

      const result = await create({ version: 'latest', dryrun: true, resume: true }).run();

      expect(result.version).toBe('v1.2.1');
      expect(reporter.lines('ok')).toContain('Version: Using latest release v1.2.1');
    });
  });

  describe('release branch', () => {
    const releaseBranch = 'release/v1.3.0-rc.2';

    function createResumeHarness(last: MemoryCommit) {
      const harness = createHarness();
      const main = [memoryCommit('m1', 'feat: Initial'), memoryCommit('m2', 'fix: Late fix')];
      harness.vcs.setBranch('master', main);
      harness.vcs.setRemoteBranch('upstream', 'master', main);
      harness.vcs.setBranch(releaseBranch, [memoryCommit('m1', 'feat: Initial'), last]);
      harness.workspace.setFile('CHANGELOG.md', changelogFor('v1.3.0-rc.2'));
      harness.forge.addMilestone('v1.3.0');
      return harness;
    }

    it('rebases an existing release commit onto the source branch', async () => {
      const { create, vcs, reporter } = createResumeHarness(memoryCommit('r0', 'chore: Release v1.3.0-rc.2'));

      await create({ version: 'v1.3.0-rc.2', dryrun: true, resume: true }).run();

      expect(reporter.lines('ok')).toContain(
        "Create release branch: Branch 'release/v1.3.0-rc.2' already exists; rebased onto master"
      );
      expect(vcs.getBranch(releaseBranch)?.map((commit) => commit.message)).toEqual([
        'feat: Initial',
        'fix: Late fix',
        'chore: Release v1.3.0-rc.2',
      ]);
    });

    it('resets a branch without a release commit', async () => {
      const { create, vcs, reporter } = createResumeHarness(memoryCommit('w1', 'wip: Experiment'));

      await create({ version: 'v1.3.0-rc.2', dryrun: true, resume: true }).run();

      expect(reporter.lines('ok')).toContain(
        "Create release branch: Branch 'release/v1.3.0-rc.2' already exists; reset to master"
      );
      expect(vcs.getBranch(releaseBranch)?.map((commit) => commit.sha)).toEqual(['m1', 'm2']);
    });

    it('leaves the branch alone when rebasing is off', async () => {
      const { create, vcs, reporter } = createResumeHarness(memoryCommit('w1', 'wip: Experiment'));

      await create({ version: 'v1.3.0-rc.2', dryrun: true, resume: true, rebase: false }).run();

      expect(reporter.lines('ok')).toContain(
        "Create release branch: Branch 'release/v1.3.0-rc.2' already exists; skipping rebase"
      );
      expect(vcs.getBranch(releaseBranch)?.map((commit) => commit.sha)).toEqual(['m1', 'w1']);
    });

    it('adds the build directory to .gitignore in the release commit', async () => {
      const { create, forge, vcs, workspace, reporter } = createHarness();
      forge.addMilestone('v1.3.0');
      workspace.setFile('.gitignore', 'node_modules/\n');

      await create({ version: 'v1.3.0-rc.2', dryrun: true }).run();

      expect(reporter.lines('ok')).toContain('Update .gitignore: Added /_build/');
      expect(workspace.getFile('.gitignore')).toBe('node_modules/\n/_build/\n');
      expect(vcs.getBranch(releaseBranch)?.[1]?.files).toEqual(['.gitignore', 'CHANGELOG.md']);
    });
  });

  describe('pull request', () => {
    it('creates a draft PR and waits for its checks', async () => {
      const { create, forge, vcs, reporter } = createHarness();
      forge.addMilestone('v1.3.0');

      const result = await create({ version: 'v1.3.0-rc.2', verify: true }).run();

      expect(result).toEqual({ version: 'v1.3.0-rc.2', status: 'verified' });
      expect(vcs.operations).toContain('push origin release/v1.3.0-rc.2 --force');
      const [pr] = forge.pullRequests();
      expect(pr).toMatchObject({
        number: 1,
        title: 'chore: Release v1.3.0-rc.2',
        body: '<!-- Releaser:start -->\nFaster widget rendering.\n<!-- Releaser:end -->\n',
        draft: true,
        milestone: 1,
        headRef: 'release/v1.3.0-rc.2',
      });
      expect(reporter.lines('ok')).toContain('Await checks: All 2 checks passed');
    });

    it('patches an existing PR instead of opening another one', async () => {
      const { create, forge, tools, sleep } = createHarness();
      forge.addMilestone('v1.3.0');
      forge.setPullRequest({
        number: 3,
        title: 'Old title',
        body: 'Please test on ARM.',
        headRef: 'release/v1.3.0-rc.2',
        draft: true,
      });

      const result = await create({ version: 'v1.3.0-rc.2', verify: true }).run();

      expect(result.status).toBe('verified');
      expect(forge.calls).toContain('changePullRequest 3 body,milestone,title');
      expect(forge.calls).not.toContain('createPullRequest alice:release/v1.3.0-rc.2');
      expect(forge.pullRequest(3)).toMatchObject({
        title: 'chore: Release v1.3.0-rc.2',
        milestone: 1,
        body: '<!-- Releaser:start -->\nFaster widget rendering.\n<!-- Releaser:end -->\nPlease test on ARM.',
        draft: true,
      });
      expect(tools.calls[0]).toBe('validate');
      expect(sleep).toHaveBeenCalledWith(5_000);
    });

    it('ignores its own check in verify mode', async () => {
      const harness = createHarness();
      harness.forge.addMilestone('v1.3.0');
      harness.checks = [{ name: 'build' }, { name: 'Verify release/signatures', status: 'in_progress', conclusion: null }];

      const result = await harness.create({ version: 'v1.3.0-rc.2', verify: true }).run();

      expect(result.status).toBe('verified');
      expect(harness.reporter.lines('ok')).toContain('Await checks: All 1 checks passed');
    });

    it('lists every failed check', async () => {
      const harness = createHarness();
      harness.forge.addMilestone('v1.3.0');
      harness.checks = [
        { name: 'build', conclusion: 'failure' },
        { name: 'lint', conclusion: 'failure' },
        { name: 'test' },
      ];

      await expect(harness.create({ version: 'v1.3.0-rc.2' }).run()).rejects.toThrow(
        new InvalidState('2 checks failed on https://github.com/acme/widgets/pull/1: build, lint', 'Await checks')
      );
    });

    it('applies formatter fixes while other checks are still running', async () => {
      const harness = createHarness();
      const { forge, vcs, workspace, tools, reporter } = harness;
      forge.addMilestone('v1.3.0');
      workspace.setFile('src/widget.ts', 'export const x=1\n');
      harness.checks = [
        { name: 'common / restyled', conclusion: 'failure' },
        { name: 'build', status: 'in_progress', conclusion: null },
      ];
      tools.hooks.onRestyle = async () => {
        await workspace.writeFile('src/widget.ts', 'export const x = 1;\n');
        harness.checks = [{ name: 'common / restyled' }, { name: 'build' }];
      };

      // Nobody merges the PR, so the run ends waiting for the merge.
      await expect(harness.create({ version: 'v1.3.0-rc.2' }).run()).rejects.toThrow(
        'Await merged: Timeout waiting for PR to be merged'
      );
      expect(reporter.lines('ok')).toEqual(
        expect.arrayContaining([
          'Restyled: Restyled changes applied',
          'Await checks: All 2 checks passed',
          'Ready for review: PR 1 is now ready for review',
        ])
      );
      const release = vcs.getBranch('release/v1.3.0-rc.2') ?? [];
      expect(release.map((commit) => commit.message)).toEqual(['feat: Initial', 'chore: Release v1.3.0-rc.2']);
      expect(release[1]?.files).toEqual(['CHANGELOG.md', 'src/widget.ts']);
    });
  });

  describe('after the merge', () => {
    it('waits for the main build to start', async () => {
      const harness = createMergedHarness();
      const { forge, reporter } = harness;
      forge.setWorkflowRuns('master', 'r1', []);
      harness.sleep.mockImplementationOnce(async () => {
        forge.setWorkflowRuns('master', 'r1', [{ name: 'ci' }]);
      });

      const result = await harness.create({ version: 'v1.3.0-rc.2' }).run();

      expect(result).toEqual({ version: 'v1.3.0-rc.2', status: 'completed' });
      expect(harness.sleep).toHaveBeenCalledTimes(1);
      expect(harness.sleep).toHaveBeenCalledWith(START_WAIT_MS);
      expect(reporter.lines('progress')).toContain('Await main build: Waiting for builds to start for master');
      expect(reporter.lines('ok')).toContain('Await main build: master branch built');
    });

    it('tags, signs and publishes the rest of the release', async () => {
      const { create, forge, vcs, tools, reporter } = createMergedHarness();

      await create({ version: 'v1.3.0-rc.2' }).run();

      expect(vcs.getRemoteTag('upstream', 'v1.3.0-rc.2')).toEqual({
        sha: 'r1',
        message: 'Faster widget rendering.\n',
        signed: true,
        valid: true,
      });
      expect(tools.calls).toEqual(['tarballs v1.3.0-rc.2', 'sign v1.3.0-rc.2', 'verify v1.3.0-rc.2']);
      expect(forge.release('v1.3.0-rc.2')?.assets.map((asset) => asset.name)).toEqual([
        'v1.3.0-rc.2.tar.gz',
        'v1.3.0-rc.2.tar.xz',
        'v1.3.0-rc.2.tar.gz.asc',
        'v1.3.0-rc.2.tar.xz.asc',
      ]);
      expect(forge.release('v1.3.0-rc.2')).toMatchObject({ draft: true, prerelease: true });
      expect(forge.cacheInvalidations).toBe(1);
      expect(reporter.lines('ok').slice(-4)).toEqual([
        'Format release notes: Release notes formatted',
        'Publish release: Not automated; publish the draft release on the forge',
        'Close milestone: Not closing milestone for release candidate',
        'Close issue: No issue to close',
      ]);
    });

    it('does not sign a tag that is already signed', async () => {
      const { create, vcs, reporter } = createMergedHarness();
      vcs.setTag('v1.3.0-rc.2', { sha: 'r1', message: 'Faster widget rendering.\n', signed: true, valid: true });

      await create({ version: 'v1.3.0-rc.2' }).run();

      expect(vcs.operations).not.toContain('sign-tag v1.3.0-rc.2');
      expect(vcs.operations).not.toContain('tag v1.3.0-rc.2 --sign');
      expect(reporter.lines('ok')).toEqual(
        expect.arrayContaining([
          'Tag release: Pushed tag v1.3.0-rc.2 to upstream',
          'Sign tag: Tag v1.3.0-rc.2 already signed',
        ])
      );
    });

    it('fails on a tag with a bad signature', async () => {
      const { create, vcs } = createMergedHarness();
      vcs.setTag('v1.3.0-rc.2', { sha: 'r1', message: 'Faster widget rendering.\n', signed: true, valid: false });

      await expect(create({ version: 'v1.3.0-rc.2' }).run()).rejects.toThrow(
        'Sign tag: Tag v1.3.0-rc.2 has an invalid signature'
      );
    });

    it('fails when the main build fails', async () => {
      const { create, forge } = createMergedHarness();
      forge.setWorkflowRuns('master', 'r1', [{ name: 'ci', conclusion: 'failure' }]);
      const [run] = await forge.workflowRuns('master', 'r1');

      await expect(create({ version: 'v1.3.0-rc.2' }).run()).rejects.toThrow(
        `Await main build: master branch failed to build: ${run?.htmlUrl}`
      );
    });

    it('ignores workflow runs triggered by issue events', async () => {
      const { create, forge, reporter } = createMergedHarness();
      forge.setWorkflowRuns('master', 'r1', [
        { name: 'triage', event: 'issues', conclusion: 'failure' },
        { name: 'ci' },
      ]);

      await create({ version: 'v1.3.0-rc.2' }).run();

      expect(reporter.lines('ok')).toContain('Await main build: master branch built');
    });

    it('fails when the PR was closed without merging', async () => {
      const { create, forge } = createMergedHarness();
      forge.closePullRequest(5);

      await expect(create({ version: 'v1.3.0-rc.2' }).run()).rejects.toThrow(
        'Await merged: PR 5 was closed without being merged'
      );
    });

    it('gives up waiting for a merge after an hour', async () => {
      const harness = createMergedHarness();
      harness.forge.setPullRequest({ number: 5, state: 'open', merged: false });

      await expect(harness.create({ version: 'v1.3.0-rc.2' }).run()).rejects.toThrow(
        'Await merged: Timeout waiting for PR to be merged'
      );
      expect(harness.sleep).toHaveBeenCalledTimes(119);
      expect(harness.sleep).toHaveBeenLastCalledWith(30_000);
    });

    it('fails when a release asset does not verify', async () => {
      const { create, tools } = createMergedHarness();
      tools.verificationFailures = ['v1.3.0-rc.2.tar.gz: bad signature'];

      await expect(create({ version: 'v1.3.0-rc.2' }).run()).rejects.toThrow(
        'Verify release assets: Release asset verification failed: v1.3.0-rc.2.tar.gz: bad signature'
      );
    });

    it('refuses to close a milestone that is not next', async () => {
      const { create, forge, workspace, vcs } = createMergedHarness();
      const history = [
        memoryCommit('m1', 'feat: Initial'),
        { ...memoryCommit('r1', 'chore: Release v1.2.0', ['CHANGELOG.md']), body: 'Faster widget rendering.\n' },
      ];
      vcs.setBranch('master', history);
      vcs.setRemoteBranch('upstream', 'master', history);
      workspace.setFile('CHANGELOG.md', changelogFor('v1.2.0'));
      forge.setPullRequest({ number: 5, headRef: 'release/v1.2.0' });
      forge.setWorkflowRuns('v1.2.0', 'r1', [{ name: 'build-binaries' }]);

      await expect(create({ version: 'v1.2.0', production: true }).run()).rejects.toThrow(
        'Close milestone: Milestone v1.3.0 is not the next milestone'
      );
    });
  });
});
