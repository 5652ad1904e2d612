/**
 * Types for GitHubForge.
 *
 * The `*Data` types are the subsets of GitHub REST payloads the forge reads.
 * Octokit's response types are assignable to them.
 */

import type { Octokit } from '@octokit/rest';

/**
 * Dependencies for GitHubForge.
 */
export type GitHubForgeDependencies = {
  /** Octokit instance (authenticated) */
  octokit: Octokit;
  /**
   * Octokit for ref updates and pull request creation. Pushes made with the
   * default workflow token do not trigger workflows. Defaults to `octokit`.
   */
  releaserOctokit?: Octokit;
  /** GitHub repo owner */
  owner: string;
  /** GitHub repo name */
  repo: string;
  /** Invoking human; the authenticated user when absent */
  actor?: string;
};

/** Author of tags created through the API */
export const BOT_TAGGER = {
  name: 'github-actions[bot]',
  email: '41898282+github-actions[bot]@users.noreply.github.com',
} as const;

export type MilestoneData = {
  number: number;
  title: string;
  html_url: string;
  state: string;
};

export type IssueData = {
  number: number;
  title: string;
  body?: string | null;
  state: string;
  html_url: string;
  user: { login: string } | null;
  assignees?: Array<{ login: string }> | null;
  milestone: { number: number } | null;
};

export type PullRequestData = {
  number: number;
  node_id: string;
  title: string;
  body: string | null;
  html_url: string;
  state: string;
  draft?: boolean;
  merged_at: string | null;
  milestone: { number: number } | null;
  head: { ref: string; sha: string };
  base: { ref: string };
};

export type ReleaseAssetData = {
  id: number;
  name: string;
  content_type: string;
  browser_download_url: string;
};

export type ReleaseData = {
  id: number;
  tag_name: string;
  body?: string | null;
  draft: boolean;
  prerelease: boolean;
  published_at: string | null;
  upload_url: string;
  assets: ReleaseAssetData[];
};
