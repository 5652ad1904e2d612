/**
 * ReleaseOrchestrator - drives a release from tracking issue to published release
 *
 * Every stage inspects external state (git, forge, changelog) before acting,
 * so a run can be interrupted at any point and simply started again. Waits
 * are bounded polls; human gates end the run with a `UserAbort` after the
 * tracking issue has been handed to the invoking human.
 *
 * Stage order:
 * 1. Init, version, rename issue, assign milestone, production readiness
 * 2. Branch-and-PR block (skipped once the release commit is on main)
 * 3. Await merge, await main build
 * 4. Tag, sign tag
 * 5. Binaries, tarballs, asset signatures, asset verification
 * 6. Release notes, publish, close milestone, close issue
 *
 * @module release
 */

import type { IVersionControl } from '../git/version_control';
import type { IForge } from '../forge/forge';
import type { Milestone, PullRequest, SignedCommitFile } from '../forge/types';
import type { IWorkspace } from '../workspace/workspace';
import type { IReleaseTools } from '../release_tools/release_tools';
import type { ReleaseConfig, ReleaseSettings } from '../config/config.types';
import type { ReleaseMilestone } from '../dashboard';
import type { ReleaseNotes } from '../changelog';
import type { Sleep } from '../stage/stage.types';
import type { ReleaseOrchestratorDependencies, ReleaseRunResult } from './release_orchestrator.types';
import { Stage, StageRunner } from '../stage/stage';
import { UserAbort, requireState } from '../stage/errors';
import { POLL_POLICIES, START_WAIT_MS, poll, realSleep } from '../stage/poll';
import { patchDashboard, renderDashboard } from '../dashboard';
import { patchReleaserSection } from '../markdown';
import {
  Changelog,
  ReleaseNotesNotFoundError,
  extractIssueReleaseNotes,
  formatReleaseNotes,
} from '../changelog';
import { VERSION_PATTERN, VERSION_REGEX, milestoneTitle } from '../version';
import { ensureGitignoreEntry } from '../workspace/gitignore';
import { withCheckout, withResetOnExit, withStash } from '../git/scoped';
import { ForgeObjectNotFoundError } from '../forge/errors';
import { AssetVerificationError } from '../release_tools/errors';
import { hasTarballs } from '../release_tools/assets';
import { createLogger } from '../logger';
import { detectMilestones } from './progress';
import { pullRequestPatch } from './pull_request_patch';
import {
  TRACKING_ISSUE_PREFIX,
  isProductionIssue,
  releaseBranchName,
  releaseCommitMessage,
  releaseIssueTitle,
  versionFromIssueTitle,
} from './naming';

const logger = createLogger('[Release] ');

const GITIGNORE_FILE = '.gitignore';

export class ReleaseOrchestrator {
  private readonly config: ReleaseConfig;
  private readonly vcs: IVersionControl;
  private readonly forge: IForge;
  private readonly workspace: IWorkspace;
  private readonly tools: IReleaseTools;
  private readonly settings: ReleaseSettings;
  private readonly runner: StageRunner;
  private readonly sleep: Sleep;
  private readonly print: (line: string) => void;
  private readonly changelog: Changelog;

  /** Milestone shown as current on the dashboard */
  private current: ReleaseMilestone | null = null;
  private version: string | null = null;

  constructor(config: ReleaseConfig, deps: ReleaseOrchestratorDependencies) {
    this.config = { ...config };
    this.vcs = deps.vcs;
    this.forge = deps.forge;
    this.workspace = deps.workspace;
    this.tools = deps.tools;
    this.settings = deps.settings;
    this.runner = deps.runner ?? new StageRunner();
    this.sleep = deps.sleep ?? realSleep;
    this.print = deps.print ?? ((line) => logger.info(line));
    this.changelog = new Changelog(deps.workspace, deps.settings.changelogFile);
  }

  /** Options as updated by the tracking issue */
  get releaseConfig(): Readonly<ReleaseConfig> {
    return this.config;
  }

  /**
   * Runs every stage with uncommitted work stashed, on the source branch,
   * and resets the working branch on every exit path.
   *
   * @throws UserAbort when a human has to act before the release can go on
   * @throws InvalidState when a precondition does not hold or a stage fails
   */
  async run(): Promise<ReleaseRunResult> {
    return withStash(this.vcs, () =>
      withCheckout(this.vcs, this.config.branch, () =>
        withResetOnExit(this.vcs, () => this.runStages())
      )
    );
  }

  async runStages(): Promise<ReleaseRunResult> {
    const branch = await this.vcs.currentBranch();
    requireState(branch === this.config.branch, `Expected to be on ${this.config.branch}, but on ${branch}`);
    requireState(await this.vcs.isClean(), 'Working tree is not clean');

    await this.stageInit();
    const version = await this.stageVersion();
    this.version = version;
    await this.stageRenameIssue(version);
    await this.stageAssignMilestone(version);
    await this.stageProductionReady(version);

    await this.beginMilestone('Preparation');
    if (!(await this.vcs.log(this.config.mainBranch)).includes(releaseCommitMessage(version))) {
      await this.stageBranch(version);
      await this.stageGitignore();
      await this.stageValidate();
      await this.stageReleaseNotes(version);
      await this.stageCommit(version);
      await this.stagePush();
      if (!(await this.stagePullRequest(version))) {
        return { version, status: 'dry-run' };
      }
      await this.beginMilestone('Review');
      await this.stageAwaitChecks(version);
      if (this.config.verify) {
        // CI may not mark the PR ready; the checks are all this mode does.
        return { version, status: 'verified' };
      }
      await this.stageReadyForReview(version);
    } else {
      logger.info(`Release branch ${releaseBranchName(version)} already merged.`);
      await this.beginMilestone('Review');
    }
    await this.stageAwaitMerged(version);
    await this.stageAwaitMainBuild();

    await this.beginMilestone('Tagging');
    await this.stageTag(version);
    await this.stageSignTag(version);

    await this.beginMilestone('Binaries');
    await this.stageBuildBinaries(version);
    await this.stageCreateTarballs(version);
    await this.stageSignReleaseAssets(version);
    await this.stageVerifyReleaseAssets(version);

    await this.beginMilestone('Publication');
    await this.stageFormatReleaseNotes(version);
    await this.stagePublishRelease(version);
    await this.stageCloseMilestone(version);
    await this.stageCloseIssue();

    await this.beginMilestone(null);
    return { version, status: 'completed' };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PREAMBLE
  // ═══════════════════════════════════════════════════════════════════════

  private async stageInit(): Promise<void> {
    requireState(
      !this.config.githubActions || this.config.issue !== 0,
      'Issue number is required when running in GitHub Actions'
    );
    if (!this.config.issue) {
      return;
    }
    const issueNumber = this.config.issue;
    await this.runner.run('Check issue', 'Checking the release tracking issue', async (stage: Stage) => {
      const issue = await this.forge.getIssue(issueNumber);
      const bot = this.settings.botLogin;
      if (!issue.assignees.includes(bot)) {
        stage.ok(`Release issue ${issue.htmlUrl} is assigned to [${issue.assignees.join(', ')}], not ${bot}.`);
        throw new UserAbort(`Assign the issue to ${bot}`);
      }
      if (!issue.title.startsWith(TRACKING_ISSUE_PREFIX)) {
        await this.assignToUser(stage, 'deal with the issue');
      }
      this.config.production = isProductionIssue(issue.body);
      stage.ok(`Processing release issue ${issue.htmlUrl}`);
    });
  }

  private async stageVersion(): Promise<string> {
    const remotes = [...new Set([this.config.upstream, 'origin'])];
    await this.runner.run('Fetch upstream', `Fetching tags and branches from ${remotes.join(', ')}`, async (stage: Stage) => {
      await this.vcs.fetch(...remotes);
      const { branch, mainBranch, upstream } = this.config;
      if (
        branch === mainBranch &&
        (await this.vcs.branchSha('HEAD')) !== (await this.vcs.branchSha(`${upstream}/${branch}`))
      ) {
        await this.vcs.pull(upstream);
      }
      stage.ok((await this.vcs.branchSha(`${upstream}/${mainBranch}`)).slice(0, 7));
    });

    return this.runner.run('Version', 'Determine the upcoming version', async (stage: Stage) => {
      if (this.config.issue) {
        const issue = await this.forge.getIssue(this.config.issue);
        const fromTitle = versionFromIssueTitle(issue.title);
        if (fromTitle) {
          this.config.version = fromTitle;
        }
      }

      const requested = this.config.version;
      if (requested === 'latest') {
        const latest = await this.forge.latestRelease();
        stage.ok(`Using latest release ${latest}`);
        return latest;
      }
      if (requested) {
        if (!VERSION_REGEX.test(requested)) {
          stage.fail(`Invalid version: ${requested} (expected: ${VERSION_PATTERN})`);
        }
        stage.ok(`Accepting override version ${requested}`);
        return requested;
      }

      let version = (await this.forge.nextMilestone()).title;
      if (!this.config.production) {
        const rc = Math.max(0, ...(await this.forge.releaseCandidates(version)));
        version = `${version}-rc.${rc + 1}`;
      }
      if (!VERSION_REGEX.test(version)) {
        stage.fail(`Invalid version: ${version} (expected: ${VERSION_PATTERN})`);
      }
      stage.ok(version);
      return version;
    });
  }

  private async stageRenameIssue(version: string): Promise<void> {
    await this.runner.run('Rename issue', 'Renaming the release tracking issue', async (stage: Stage) => {
      if (!this.config.issue) {
        stage.ok('No issue to rename');
        return;
      }
      const title = releaseIssueTitle(version);
      const issue = await this.forge.getIssue(this.config.issue);
      if (issue.title === title) {
        stage.ok(`Issue already named '${title}'`);
        return;
      }
      await this.forge.renameIssue(this.config.issue, title);
      stage.ok(`Issue renamed to '${title}'`);
    });
  }

  private async stageAssignMilestone(version: string): Promise<void> {
    await this.runner.run('Assign milestone', 'Attaching the tracking issue to its milestone', async (stage: Stage) => {
      if (!this.config.issue) {
        stage.ok('No issue to assign');
        return;
      }
      const title = milestoneTitle(version);
      let milestone: Milestone;
      try {
        milestone = await this.forge.milestone(title);
      } catch (error) {
        if (error instanceof ForgeObjectNotFoundError) {
          stage.fail(`Milestone ${title} not found`);
        }
        throw error;
      }
      const issue = await this.forge.getIssue(this.config.issue);
      if (issue.milestone === milestone.number) {
        stage.ok(`Issue already on milestone ${title}`);
        return;
      }
      await this.forge.assignMilestone(this.config.issue, milestone.number);
      stage.ok(`Issue assigned to milestone ${title}`);
    });
  }

  private async stageProductionReady(version: string): Promise<void> {
    await this.runner.run('Production ready', 'Checking if the release has any more open issues', async (stage: Stage) => {
      if (!this.config.production) {
        stage.ok('Release candidate; not checking milestone');
        return;
      }
      const milestone = await this.forge.nextMilestone();
      const open = (await this.forge.openMilestoneIssues(milestone.number)).filter(
        (issue) => issue.title !== releaseCommitMessage(version) && issue.number !== this.config.issue
      );
      if (open.length > 0) {
        stage.fail(`${open.length} issues are still open for ${version}: ${milestone.htmlUrl}`);
      }
      stage.ok(`No open issues for ${version}`);
    });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // BRANCH AND PULL REQUEST
  // ═══════════════════════════════════════════════════════════════════════

  private async stageBranch(version: string): Promise<void> {
    await this.runner.run('Create release branch', 'Creating a release branch', async (stage: Stage) => {
      const releaseBranch = releaseBranchName(version);
      const source = this.config.branch;
      const exists =
        (await this.vcs.branches()).includes(releaseBranch) ||
        (await this.vcs.branches('origin')).includes(releaseBranch);

      if (exists) {
        await this.vcs.checkout(releaseBranch);
        let action: string;
        if (!this.config.rebase) {
          action = 'skipping rebase';
        } else if ((await this.vcs.lastCommitMessage(releaseBranch)) === releaseCommitMessage(version)) {
          action = (await this.vcs.rebase(source, 1)) ? `rebased onto ${source}` : `already on ${source}`;
        } else {
          await this.vcs.reset(source);
          action = `reset to ${source}`;
        }
        stage.ok(`Branch '${releaseBranch}' already exists; ${action}`);
      } else {
        await this.vcs.createBranch(releaseBranch, source);
        stage.ok(`Branch '${releaseBranch}' created @ ${(await this.vcs.branchSha(releaseBranch)).slice(0, 7)}`);
      }

      const current = await this.vcs.currentBranch();
      requireState(current === releaseBranch, `Expected to be on ${releaseBranch}, but on ${current}`);
    });
  }

  private async stageGitignore(): Promise<void> {
    await this.runner.run('Update .gitignore', 'Ignoring the build tool working directory', async (stage: Stage) => {
      const entry = this.settings.gitignoreEntry;
      const updated = ensureGitignoreEntry(await this.workspace.readFile(GITIGNORE_FILE), entry);
      if (updated === null) {
        stage.ok(`${entry} already ignored`);
        return;
      }
      await this.workspace.writeFile(GITIGNORE_FILE, updated);
      await this.vcs.add(GITIGNORE_FILE);
      stage.ok(`Added ${entry}`);
    });
  }

  private async stageValidate(): Promise<void> {
    await this.runner.run('Validate', 'Validating the release branch', async () => {
      await this.tools.validate({ commit: !this.config.verify });
    });
  }

  private async stageReleaseNotes(version: string): Promise<void> {
    const file = this.settings.changelogFile;
    await this.runner.run('Write release notes', 'Opening editor', async (stage: Stage) => {
      if (this.config.resume && (await this.changelog.hasReleaseNotes(version))) {
        stage.ok('Skipping');
        return;
      }

      if (!this.config.githubActions) {
        await this.tools.editFile(file);
        await this.vcs.add(file);
        stage.ok();
        return;
      }

      const milestone = await this.forge.nextMilestone();
      const tracking = (await this.forge.openMilestoneIssues(milestone.number)).filter((issue) =>
        issue.assignees.includes(this.settings.botLogin)
      );
      const [issue, ...others] = tracking;
      if (!issue) {
        stage.fail('No tracking issue found');
      }
      if (others.length > 0) {
        stage.fail(`Multiple tracking issues found: ${tracking.map((i) => i.htmlUrl).join(', ')}`);
      }
      const notes = extractIssueReleaseNotes(issue.body);
      if (!notes) {
        stage.fail('No release notes found in issue body');
      }
      await this.changelog.setReleaseNotes(version, notes);
      await this.vcs.add(file);
      stage.ok(`Release notes copied from ${issue.htmlUrl}`);
    });
  }

  private async stageCommit(version: string, parent?: Stage): Promise<void> {
    await this.runner.run(
      'Commit changes',
      'Committing changes',
      async (stage: Stage) => {
        const notes = await this.releaseNotes(stage, version);
        if (await this.vcs.isClean()) {
          stage.ok('No changes to commit');
          return;
        }
        const changes = await this.vcs.changedFiles();
        await this.vcs.commit(releaseCommitMessage(version), `${notes.notes}\n`);
        stage.ok(changes.join(', '));
      },
      parent
    );
  }

  private async stagePush(parent?: Stage): Promise<void> {
    await this.runner.run(
      'Push changes',
      'Pushing changes to origin',
      async (stage: Stage) => {
        const releaseBranch = await this.vcs.currentBranch();
        const remote = this.config.githubActions ? this.config.upstream : 'origin';
        if (await this.vcs.isUpToDate(releaseBranch, remote)) {
          stage.ok('No changes to push');
          return;
        }

        if (this.config.dryrun) {
          stage.ok('Dry run; not pushing changes');
        } else if (this.config.githubActions) {
          const releaseSha = await this.vcs.branchSha(releaseBranch);
          const sha = await this.forge.pushSigned({
            parentSha: await this.vcs.branchSha(this.config.mainBranch),
            branch: releaseBranch,
            message: await this.vcs.commitMessage(releaseSha),
            files: await this.commitFiles(stage, releaseSha),
          });
          await this.vcs.fetch(this.config.upstream);
          await this.vcs.reset(sha);
          stage.ok(sha);
        } else {
          await this.vcs.push('origin', releaseBranch, this.config.force);
          stage.ok();
        }
      },
      parent
    );
  }

  /**
   * @returns false when this is a dry run and no pull request exists to wait for
   */
  private async stagePullRequest(version: string): Promise<boolean> {
    return this.runner.run('Create pull request', 'Creating a pull request on the forge', async (stage: Stage) => {
      const title = releaseCommitMessage(version);
      const body = (await this.releaseNotes(stage, version)).notes;
      const { owner } = await this.vcs.remoteSlug('origin');
      const head = `${owner}:${releaseBranchName(version)}`;
      const base = this.config.mainBranch;
      const milestone = await this.forge.nextMilestone();
      const existing = await this.forge.findPullRequestForBranch(head, base, 'open');

      if (this.config.dryrun) {
        stage.ok('Dry run; not creating a pull request');
        this.print(`title: ${title}`);
        this.print(`body: ${body}`);
        this.print(`head: ${head}`);
        this.print(`base: ${base}`);
        this.print(`milestone: ${milestone.title}`);
        if (existing) {
          this.print(`Existing PR: ${existing.htmlUrl}`);
        }
        return false;
      }

      if (existing) {
        const patch = pullRequestPatch(existing, title, body, milestone.number);
        if (Object.keys(patch).length === 0) {
          stage.ok(`PR already exists: ${existing.htmlUrl}`);
          return true;
        }
        await this.forge.changePullRequest(existing.number, patch);
        stage.ok(`Modified PR: ${existing.htmlUrl}`);
        return true;
      }

      stage.progress(`Creating PR: ${title} (${head} -> ${base}) on milestone ${milestone.number}`);
      const pr = await this.forge.createPullRequest({
        title,
        body: patchReleaserSection('', body),
        head,
        base,
        milestone: milestone.number,
      });
      stage.ok(pr.htmlUrl);
      return true;
    });
  }

  private async stageAwaitChecks(version: string): Promise<void> {
    await this.runner.run('Await checks', 'Waiting for checks to pass', async (stage: Stage) => {
      const outcome = await poll<void>(POLL_POLICIES.checks, this.sleep, async () => {
        const pr = await this.awaitHeadPullRequest(stage, version);
        const checks = await this.forge.checks(pr.headSha);
        if (checks.size === 0) {
          stage.progress('Awaiting checks to start');
          return { done: false, waitMs: START_WAIT_MS };
        }
        if (this.config.verify) {
          checks.delete(this.settings.selfCheck);
        }

        const runs = [...checks.values()];
        const completed = runs.filter((run) => run.status === 'completed');
        const inProgress = runs.filter((run) => run.status === 'in_progress');
        const passed = runs.filter((run) => run.conclusion === 'success');
        const failed = runs.filter((run) => run.conclusion === 'failure').map((run) => run.name);
        const neutral = runs.filter((run) => run.conclusion === 'neutral');

        if (completed.length === runs.length) {
          if (failed.length > 0) {
            stage.fail(`${failed.length} checks failed on ${pr.htmlUrl}: ${failed.join(', ')}`);
          }
          stage.ok(`All ${completed.length} checks passed`);
          return { done: true, value: undefined };
        }

        stage.progress(
          `${passed.length} checks passed, ${neutral.length} checks neutral, ` +
            `${failed.length} failed, ${inProgress.length} in progress`
        );
        if (checks.get(this.settings.restyleCheck)?.conclusion === 'failure') {
          await this.stageRestyled(version, stage);
        }
        return { done: false };
      });

      if (outcome.status === 'timeout') {
        stage.fail('Timeout waiting for checks to pass');
      }
    });
  }

  private async stageRestyled(version: string, parent: Stage): Promise<void> {
    if (this.config.verify) {
      return;
    }
    await this.runner.run(
      'Restyled',
      'Applying restyled fixes',
      async (stage: Stage) => {
        await this.tools.restyle();
        if (await this.vcs.isClean()) {
          stage.fail('Failed to apply restyled changes');
        }
        await this.vcs.add('.');
        await this.stageCommit(version, stage);
        await this.stagePush(stage);
        stage.ok('Restyled changes applied');
      },
      parent
    );
  }

  private async stageReadyForReview(version: string): Promise<void> {
    await this.runner.run('Ready for review', 'Marking PR as ready for review', async (stage: Stage) => {
      const pr = await this.findHeadPullRequest(version);
      if (!pr) {
        stage.fail('PR not found');
      }
      if (pr.draft) {
        await this.forge.markReadyForReview(pr.nodeId);
        stage.ok(`PR ${pr.number} is now ready for review`);
      } else {
        stage.ok(`PR ${pr.number} is already ready for review`);
      }
    });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // MERGE
  // ═══════════════════════════════════════════════════════════════════════

  private async stageAwaitMerged(version: string): Promise<void> {
    await this.runner.run('Await merged', 'Waiting for the PR to be merged', async (stage: Stage) => {
      const outcome = await poll<void>(POLL_POLICIES.merge, this.sleep, async () => {
        const pr = await this.findHeadPullRequest(version);
        if (!pr) {
          stage.fail(`PR not found for ${version}`);
        }
        if (pr.state === 'closed') {
          if (!pr.merged) {
            stage.fail(`PR ${pr.number} was closed without being merged`);
          }
          stage.ok(`PR ${pr.number} was merged`);
          await this.vcs.checkout(this.config.mainBranch);
          await this.vcs.pull(this.config.upstream);
          return { done: true, value: undefined };
        }
        stage.progress(`PR ${pr.number} is still open`);
        return { done: false };
      });

      if (outcome.status === 'timeout') {
        stage.fail('Timeout waiting for PR to be merged');
      }
    });
  }

  private async stageAwaitMainBuild(): Promise<void> {
    const main = this.config.mainBranch;
    await this.runner.run('Await main build', `Waiting for the ${main} branch to be built`, async (stage: Stage) => {
      const outcome = await poll<void>(POLL_POLICIES.mainBuild, this.sleep, async () => {
        const headSha = await this.vcs.branchSha(main);
        const builds = (await this.forge.workflowRuns(main, headSha)).filter((run) => run.event !== 'issues');
        const [first] = builds;
        if (!first) {
          stage.progress(`Waiting for builds to start for ${main}`);
          return { done: false, waitMs: START_WAIT_MS };
        }
        const failed = builds.find((run) => run.conclusion === 'failure');
        if (failed) {
          stage.fail(`${main} branch failed to build: ${failed.htmlUrl}`);
        }
        if (builds.every((run) => run.status === 'completed')) {
          stage.ok(`${main} branch built`);
          return { done: true, value: undefined };
        }
        stage.progress(`${main} branch still building: ${first.htmlUrl}`);
        return { done: false };
      });

      if (outcome.status === 'timeout') {
        stage.fail(`Timeout waiting for ${main} branch to be built`);
      }
    });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TAG
  // ═══════════════════════════════════════════════════════════════════════

  private async stageTag(version: string): Promise<void> {
    await this.runner.run('Tag release', 'Tagging the release', async (stage: Stage) => {
      const message = `${(await this.releaseNotes(stage, version)).notes}\n`;
      const ci = this.config.githubActions;

      if (await this.vcs.releaseTagExists(version)) {
        stage.progress(`Tag ${version} already exists`);
        if (ci) {
          stage.ok('No tag push required');
          return;
        }
      } else {
        await this.vcs.tag(version, message, !ci);
        stage.progress(`Tagged ${version}`);
      }

      if (this.config.dryrun) {
        stage.ok('Dry run; not pushing tag');
      } else if (ci) {
        stage.progress(`Pushing tag ${version} through the forge API`);
        const sha = await this.forge.createTag({
          tag: version,
          commitSha: await this.vcs.branchSha(version),
          message,
        });
        await this.vcs.fetch(this.config.upstream);
        await this.ensureDraftRelease(version);
        stage.ok(`Tagged ${version} @ ${sha}`);
      } else {
        await this.vcs.pushTag(version, this.config.upstream);
        stage.ok(`Pushed tag ${version} to ${this.config.upstream}`);
      }
    });
  }

  private async stageSignTag(version: string): Promise<void> {
    await this.runner.run('Sign tag', 'Signing the release tag', async (stage: Stage) => {
      if (await this.vcs.tagHasSignature(version)) {
        if (!(await this.vcs.verifyTag(version))) {
          stage.fail(`Tag ${version} has an invalid signature`);
        }
        stage.ok(`Tag ${version} already signed`);
        return;
      }
      if (this.config.githubActions) {
        await this.assignToUser(stage, 'sign the tag');
      }
      await this.vcs.signTag(version);
      if (this.config.dryrun) {
        stage.ok(`Signed ${version}; dry run, not pushing tag`);
        return;
      }
      await this.vcs.pushTag(version, this.config.upstream);
      stage.ok(`Signed ${version} and pushed it to ${this.config.upstream}`);
    });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // BINARIES AND ASSETS
  // ═══════════════════════════════════════════════════════════════════════

  private async stageBuildBinaries(version: string): Promise<void> {
    await this.runner.run('Build binaries', 'Waiting for binaries to be built', async (stage: Stage) => {
      // Refetch: a human may have replaced the tag with a signed one.
      let headSha = await this.vcs.branchSha(version);
      const started = await poll<string>(POLL_POLICIES.buildStart, this.sleep, async () => {
        await this.vcs.fetch(this.config.upstream);
        headSha = await this.vcs.branchSha(version);
        if ((await this.forge.workflowRuns(version, headSha)).length > 0) {
          return { done: true, value: headSha };
        }
        stage.progress(`Waiting for builds to start for ${version} @ ${headSha}`);
        return { done: false };
      });
      if (started.status === 'timeout' && this.config.githubActions) {
        stage.ok('No builds found; waiting for a human to sign the tag');
        await this.assignToUser(stage, 'sign the tag');
      }

      const outcome = await poll<void>(POLL_POLICIES.binaries, this.sleep, async () => {
        const builds = await this.forge.workflowRuns(version, headSha);
        const [first] = builds;
        if (!first) {
          stage.progress(`Waiting for builds to start for ${version} @ ${headSha}`);
          return { done: false, waitMs: START_WAIT_MS };
        }
        const failed = builds.find((run) => run.conclusion === 'failure');
        if (failed) {
          stage.fail(`Binaries failed to build: ${failed.htmlUrl}`);
        }
        if (builds.every((run) => run.status === 'completed')) {
          stage.ok(`Binaries built: ${builds.length} workflows completed for ${headSha}`);
          // The release created by the tag workflows must become visible.
          this.forge.invalidateCache();
          return { done: true, value: undefined };
        }
        stage.progress(`Binaries still building: ${first.htmlUrl}`);
        return { done: false };
      });

      if (outcome.status === 'timeout') {
        stage.fail('Timeout waiting for binaries to be built');
      }
    });
  }

  private async stageCreateTarballs(version: string): Promise<void> {
    await this.runner.run('Create tarballs', 'Creating tarballs', async (stage: Stage) => {
      const release = await this.forge.getRelease(version);
      if (release && hasTarballs(release.assets, version)) {
        stage.ok('Tarballs already created');
        return;
      }
      if (!release) {
        await this.ensureDraftRelease(version);
      }
      await this.tools.createTarballs(version);
      stage.ok('Tarballs created');
    });
  }

  private async stageSignReleaseAssets(version: string): Promise<void> {
    await this.runner.run('Sign release assets', 'Signing release assets', async (stage: Stage) => {
      if (this.config.githubActions) {
        const pending = await this.tools.pendingSignatures(version);
        if (pending.length === 0) {
          stage.ok('All release assets have been signed');
          return;
        }
        stage.progress(`${pending.length} release assets need signing`);
        await this.assignToUser(stage, 'sign the assets');
      }
      await this.tools.signAssets(version);
      stage.ok('Release assets signed');
    });
  }

  private async stageVerifyReleaseAssets(version: string): Promise<void> {
    await this.runner.run('Verify release assets', 'Verifying release assets', async (stage: Stage) => {
      try {
        await this.tools.verifyAssets(version);
      } catch (error) {
        if (error instanceof AssetVerificationError) {
          stage.fail(error.message);
        }
        throw error;
      }
      stage.ok('Release assets verified');
    });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PUBLICATION
  // ═══════════════════════════════════════════════════════════════════════

  private async stageFormatReleaseNotes(version: string): Promise<void> {
    await this.runner.run('Format release notes', 'Formatting release notes on the forge release', async (stage: Stage) => {
      const notes = await this.releaseNotes(stage, version);
      await this.forge.setReleaseNotes(version, formatReleaseNotes(notes), !this.config.production);
      stage.ok('Release notes formatted');
    });
  }

  private async stagePublishRelease(version: string): Promise<void> {
    await this.runner.run('Publish release', 'Publishing the release', async (stage: Stage) => {
      if (await this.forge.isReleasePublished(version)) {
        stage.ok('Release already published');
        return;
      }
      if (this.config.githubActions) {
        stage.ok('Asking user to publish the release');
        await this.assignToUser(stage, 'publish the release');
      }
      stage.ok('Not automated; publish the draft release on the forge');
    });
  }

  private async stageCloseMilestone(version: string): Promise<void> {
    await this.runner.run('Close milestone', 'Closing the release milestone', async (stage: Stage) => {
      if (!this.config.production) {
        stage.ok('Not closing milestone for release candidate');
        return;
      }
      const milestone = await this.forge.nextMilestone();
      if (milestone.title !== version) {
        stage.fail(`Milestone ${milestone.title} is not the next milestone`);
      }
      await this.forge.closeMilestone(milestone.number);
      stage.ok(`Milestone ${milestone.title} closed`);
    });
  }

  private async stageCloseIssue(): Promise<void> {
    await this.runner.run('Close issue', 'Closing the release tracking issue', async (stage: Stage) => {
      if (!this.config.issue) {
        stage.ok('No issue to close');
        return;
      }
      const issue = await this.forge.getIssue(this.config.issue);
      if (issue.state === 'closed') {
        stage.ok('Issue already closed');
        return;
      }
      await this.forge.closeIssue(this.config.issue);
      stage.ok(`Issue ${this.config.issue} closed`);
    });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Hands the tracking issue from the bot to the invoking human and ends
   * the run.
   */
  private async assignToUser(stage: Stage, action: string): Promise<never> {
    const instruction = `Returning to the user to ${action}`;
    if (this.config.issue) {
      const actor = await this.forge.actor();
      await this.forge.removeAssignees(this.config.issue, [this.settings.botLogin]);
      await this.forge.addAssignees(this.config.issue, [actor]);
      await this.updateDashboard(this.current, instruction);
      stage.ok(`Assigned to ${actor}`);
    }
    throw new UserAbort(instruction);
  }

  private async beginMilestone(milestone: ReleaseMilestone | null): Promise<void> {
    this.current = milestone;
    await this.updateDashboard(milestone, null);
  }

  private async updateDashboard(current: ReleaseMilestone | null, instruction: string | null): Promise<void> {
    const issue = this.config.issue;
    const version = this.version;
    if (!issue || version === null) {
      return;
    }
    await this.runner.run('Update dashboard', 'Updating the release progress dashboard', async (stage: Stage) => {
      const done = await detectMilestones({
        vcs: this.vcs,
        forge: this.forge,
        mainBranch: this.config.mainBranch,
        version,
      });
      const rendered = renderDashboard(done, current, instruction);
      await this.forge.editIssueBody(issue, (body) => patchDashboard(body, rendered));
      stage.ok(done.size > 0 ? [...done].join(', ') : 'No milestones done');
    });
  }

  private async releaseNotes(stage: Stage, version: string): Promise<ReleaseNotes> {
    try {
      return await this.changelog.getReleaseNotes(version);
    } catch (error) {
      if (error instanceof ReleaseNotesNotFoundError) {
        stage.fail(error.message);
      }
      throw error;
    }
  }

  /** Contents of the files a commit touched, as the signed-commit API takes them */
  private async commitFiles(stage: Stage, sha: string): Promise<SignedCommitFile[]> {
    const files: SignedCommitFile[] = [];
    for (const path of await this.vcs.filesChanged(sha)) {
      const content = await this.workspace.readFile(path);
      if (content === null) {
        stage.fail(`Cannot push deleted file ${path} as a signed commit`);
      }
      files.push({ path, content });
    }
    return files;
  }

  private async findHeadPullRequest(version: string): Promise<PullRequest | null> {
    const sha = await this.vcs.findCommitSha(releaseCommitMessage(version));
    if (!sha) {
      return null;
    }
    return this.forge.findPullRequest(sha, this.config.mainBranch);
  }

  /** Waits for the forge to report a PR for the pushed release commit */
  private async awaitHeadPullRequest(stage: Stage, version: string): Promise<PullRequest> {
    const outcome = await poll<PullRequest>(POLL_POLICIES.pullRequestSync, this.sleep, async () => {
      const pr = await this.findHeadPullRequest(version);
      if (pr) {
        return { done: true, value: pr };
      }
      stage.progress(`Waiting for release PR for ${version}`);
      return { done: false };
    });
    if (outcome.status === 'timeout') {
      stage.fail('Timeout waiting for PR to be created/updated');
    }
    return outcome.value;
  }

  private async ensureDraftRelease(version: string): Promise<void> {
    if (await this.forge.getRelease(version)) {
      return;
    }
    const notes = await this.changelog.getReleaseNotes(version);
    await this.forge.createRelease({
      tagName: version,
      body: formatReleaseNotes(notes),
      draft: true,
      prerelease: !this.config.production,
    });
  }
}
