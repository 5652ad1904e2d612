import type { PullRequest, PullRequestPatch } from '../forge/types';
import { getReleaserSection, patchReleaserSection } from '../markdown';

/**
 * Fields of an existing release PR that differ from what the release wants.
 * Only the machine-owned section of the body is compared and replaced.
 */
export function pullRequestPatch(
  pr: Pick<PullRequest, 'state' | 'title' | 'body' | 'milestone'>,
  title: string,
  body: string,
  milestone: number,
): PullRequestPatch {
  const patch: PullRequestPatch = {};
  if (pr.state !== 'open') {
    patch.state = 'open';
  }
  if (pr.title !== title) {
    patch.title = title;
  }
  if (pr.milestone !== milestone) {
    patch.milestone = milestone;
  }
  if (getReleaserSection(pr.body) !== body) {
    patch.body = patchReleaserSection(pr.body, body);
  }
  return patch;
}
