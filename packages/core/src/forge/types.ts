/**
 * Type Definitions for the Forge collaborator
 *
 * Plain data snapshots of forge objects. Every read returns a fresh object;
 * callers never mutate them to change forge state.
 */

export type RepoSlug = {
  owner: string;
  repo: string;
};

export type Milestone = {
  number: number;
  title: string;
  htmlUrl: string;
  state: 'open' | 'closed';
};

export type Issue = {
  number: number;
  title: string;
  body: string;
  user: string;
  assignees: string[];
  htmlUrl: string;
  state: 'open' | 'closed';
  /** Milestone number, if the issue is on one */
  milestone: number | null;
};

export type PullRequestState = 'open' | 'closed';

export type PullRequest = {
  number: number;
  nodeId: string;
  title: string;
  body: string;
  htmlUrl: string;
  state: PullRequestState;
  draft: boolean;
  merged: boolean;
  milestone: number | null;
  /** Branch name of the head ref (without owner) */
  headRef: string;
  headSha: string;
  baseRef: string;
};

/** Fields of a pull request that the release flow may change */
export type PullRequestPatch = {
  state?: PullRequestState;
  title?: string;
  body?: string;
  milestone?: number;
};

export type NewPullRequest = {
  title: string;
  body: string;
  /** `owner:branch` or `branch` */
  head: string;
  base: string;
  milestone: number;
};

export type CheckRun = {
  id: number;
  name: string;
  status: string;
  conclusion: string | null;
  htmlUrl: string;
};

export type WorkflowRun = {
  id: number;
  name: string;
  event: string;
  status: string;
  conclusion: string | null;
  htmlUrl: string;
  path: string;
};

export type ReleaseAsset = {
  id: number;
  name: string;
  contentType: string;
  browserDownloadUrl: string;
};

export type Release = {
  id: number;
  tagName: string;
  body: string;
  draft: boolean;
  prerelease: boolean;
  publishedAt: string | null;
  assets: ReleaseAsset[];
};

export type NewRelease = {
  tagName: string;
  body: string;
  draft: boolean;
  prerelease: boolean;
};

export type SignedCommitFile = {
  path: string;
  content: string;
};

export type SignedCommitRequest = {
  /** Commit the new commit is created on top of */
  parentSha: string;
  /** Branch moved to the new commit (created when missing) */
  branch: string;
  message: string;
  files: SignedCommitFile[];
};

export type ApiTagRequest = {
  tag: string;
  commitSha: string;
  message: string;
};
