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
} from './types';

export type PullRequestStateFilter = 'open' | 'closed' | 'all';

/**
 * IForge - source-control host operations consumed by the release flow
 *
 * Milestones, issues and the release list are cached per instance;
 * `invalidateCache()` drops every cached read. Pull requests, check runs,
 * workflow runs, release details and assets are always fetched fresh.
 */
export interface IForge {
  /** Login of the human driving this run */
  actor(): Promise<string>;

  // ─── Milestones ────────────────────────────────────────────────────────
  /** Open milestones */
  milestones(): Promise<Milestone[]>;
  milestone(title: string): Promise<Milestone>;
  /** Open `vX.Y.Z` milestone with the smallest version */
  nextMilestone(): Promise<Milestone>;
  closeMilestone(milestone: number): Promise<void>;

  // ─── Issues ────────────────────────────────────────────────────────────
  getIssue(issue: number): Promise<Issue>;
  openMilestoneIssues(milestone: number): Promise<Issue[]>;
  renameIssue(issue: number, title: string): Promise<void>;
  closeIssue(issue: number): Promise<void>;
  /** Also sets the milestone of pull requests */
  assignMilestone(issue: number, milestone: number): Promise<void>;
  addAssignees(issue: number, logins: string[]): Promise<void>;
  removeAssignees(issue: number, logins: string[]): Promise<void>;
  /** Re-reads the issue body, applies `edit` and writes it back if it changed */
  editIssueBody(issue: number, edit: (body: string) => string): Promise<void>;

  // ─── Pull requests ─────────────────────────────────────────────────────
  /** Creates a draft pull request on the given milestone */
  createPullRequest(request: NewPullRequest): Promise<PullRequest>;
  findPullRequest(headSha: string, base: string): Promise<PullRequest | null>;
  findPullRequestForBranch(head: string, base: string, state?: PullRequestStateFilter): Promise<PullRequest | null>;
  changePullRequest(pullRequest: number, patch: PullRequestPatch): Promise<void>;
  markReadyForReview(nodeId: string): Promise<void>;

  // ─── CI ────────────────────────────────────────────────────────────────
  /** Check runs of all check suites on a commit, keyed by check name */
  checks(commit: string): Promise<Map<string, CheckRun>>;
  workflowRuns(branch: string, headSha: string): Promise<WorkflowRun[]>;

  // ─── Releases ──────────────────────────────────────────────────────────
  /** Tag of the latest published release */
  latestRelease(): Promise<string>;
  /** rc numbers of published prereleases of `version` */
  releaseCandidates(version: string): Promise<number[]>;
  /** Release for a tag, drafts included, or null */
  getRelease(tag: string): Promise<Release | null>;
  createRelease(release: NewRelease): Promise<Release>;
  releaseAssets(tag: string): Promise<ReleaseAsset[]>;
  uploadAsset(tag: string, name: string, contentType: string, data: Buffer): Promise<void>;
  downloadAsset(assetId: number): Promise<Buffer>;
  setReleaseNotes(tag: string, notes: string, prerelease: boolean): Promise<void>;
  isReleasePublished(tag: string): Promise<boolean>;

  // ─── Git objects (attributed to the bot) ──────────────────────────────
  /** Re-creates a commit through the API and moves a branch to it. Returns the new SHA */
  pushSigned(request: SignedCommitRequest): Promise<string>;
  /** Creates an unsigned annotated tag. Returns the tag object SHA */
  createTag(request: ApiTagRequest): Promise<string>;

  invalidateCache(): void;
}
