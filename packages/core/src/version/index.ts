/**
 * Version parsing, ordering and naming helpers
 *
 * @module version
 */

export {
  VERSION_PATTERN,
  VERSION_REGEX,
  RELEASE_BRANCH_PREFIX,
  RELEASE_BRANCH_REGEX,
  MILESTONE_VERSION_REGEX,
  VersionParseError,
  isVersion,
  parseVersion,
  formatVersion,
  compareVersions,
  isReleaseCandidate,
  sortReleaseTags,
  releaseCandidateNumbers,
  milestoneTitle,
} from './version';
export type { Version } from './version';
