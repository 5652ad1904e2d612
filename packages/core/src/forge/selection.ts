import type { Milestone, Release } from './types';
import { ForgeObjectNotFoundError } from './errors';
import { MILESTONE_VERSION_REGEX, compareVersions, parseVersion, releaseCandidateNumbers } from '../version';

/**
 * Milestone with the smallest `vX.Y.Z` title. Titles like `v1.18.x` are
 * ignored.
 */
export function selectNextMilestone(milestones: Milestone[]): Milestone {
  const versioned = milestones.filter((m) => MILESTONE_VERSION_REGEX.test(m.title));
  const [next] = versioned.sort((a, b) => compareVersions(parseVersion(a.title), parseVersion(b.title)));
  if (!next) {
    throw new ForgeObjectNotFoundError('Milestone', 'next release');
  }
  return next;
}

/** rc numbers of published (non-draft) prereleases of `version` */
export function publishedCandidates(releases: Array<Pick<Release, 'tagName' | 'draft' | 'prerelease'>>, version: string): number[] {
  const tags = releases
    .filter((r) => r.tagName.includes(`${version}-rc.`) && r.prerelease && !r.draft)
    .map((r) => r.tagName);
  return releaseCandidateNumbers(version, tags);
}
