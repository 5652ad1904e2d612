/**
 * Release version model
 *
 * Versions look like `v1.2.3` or `v1.2.3-rc.4`. The patch component may be
 * omitted (`v1.2`); it is then null and compares as 0.
 *
 * @module version
 */

export const VERSION_PATTERN = String.raw`v\d+\.\d+(?:\.\d+)?(?:-rc\.\d+)?`;

/** Matches a version at the start of a string (like a prefix match) */
export const VERSION_REGEX = new RegExp(`^${VERSION_PATTERN}`);

export const RELEASE_BRANCH_PREFIX = 'release';

export const RELEASE_BRANCH_REGEX = new RegExp(`^${RELEASE_BRANCH_PREFIX}/${VERSION_PATTERN}`);

/** Milestone titles eligible as "next release": exact `vX.Y.Z` */
export const MILESTONE_VERSION_REGEX = /^v\d+\.\d+\.\d+$/;

const PARSE_REGEX = /^v(\d+)\.(\d+)(?:\.(\d+))?(?:-rc\.(\d+))?/;

export type Version = {
  major: number;
  minor: number;
  /** Null when the version was written without one */
  patch: number | null;
  /** Release candidate number; null for a final release */
  rc: number | null;
};

export class VersionParseError extends Error {
  constructor(public readonly input: string) {
    super(`Could not parse version: ${input}`);
    this.name = 'VersionParseError';
    Object.setPrototypeOf(this, VersionParseError.prototype);
  }
}

export function isVersion(input: string): boolean {
  return VERSION_REGEX.test(input);
}

export function parseVersion(input: string): Version {
  const match = PARSE_REGEX.exec(input);
  if (!match) {
    throw new VersionParseError(input);
  }
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: match[3] ? Number(match[3]) : null,
    rc: match[4] ? Number(match[4]) : null,
  };
}

export function formatVersion(version: Version): string {
  const base =
    version.patch === null
      ? `v${version.major}.${version.minor}`
      : `v${version.major}.${version.minor}.${version.patch}`;
  return version.rc === null ? base : `${base}-rc.${version.rc}`;
}

/**
 * Total order over versions. A final release sorts after every release
 * candidate of the same major.minor.patch; a missing patch counts as 0.
 */
export function compareVersions(a: Version, b: Version): number {
  if (a.major !== b.major) return a.major - b.major;
  if (a.minor !== b.minor) return a.minor - b.minor;
  const patchA = a.patch ?? 0;
  const patchB = b.patch ?? 0;
  if (patchA !== patchB) return patchA - patchB;
  if (a.rc === b.rc) return 0;
  if (a.rc === null) return 1;
  if (b.rc === null) return -1;
  return a.rc - b.rc;
}

export function isReleaseCandidate(version: string): boolean {
  return version.includes('-rc.');
}

/**
 * Sorts version tags newest first. Non-version tags are dropped.
 * Unless `withRc` is false, release candidates are kept only while their
 * final release does not exist yet.
 */
export function sortReleaseTags(tags: string[], withRc: boolean = true): string[] {
  const sorted = tags
    .filter(isVersion)
    .sort((a, b) => compareVersions(parseVersion(b), parseVersion(a)));

  if (!withRc) {
    return sorted.filter((tag) => !isReleaseCandidate(tag));
  }
  const finals = new Set(sorted.filter((tag) => !isReleaseCandidate(tag)));
  return sorted.filter((tag) => {
    const [base] = tag.split('-rc.');
    return !isReleaseCandidate(tag) || base === undefined || !finals.has(base);
  });
}

/** Extracts the rc numbers of `<version>-rc.N` tag names */
export function releaseCandidateNumbers(version: string, tagNames: string[]): number[] {
  const numbers: number[] = [];
  for (const name of tagNames) {
    if (!name.includes(`${version}-rc.`)) continue;
    const match = /-rc\.(\d+)$/.exec(name);
    if (match?.[1]) {
      numbers.push(Number(match[1]));
    }
  }
  return numbers;
}

/**
 * Milestone title a version belongs to. Release candidates are filed under
 * `vMAJOR.MINOR.0` of their version.
 */
export function milestoneTitle(version: string): string {
  if (!isReleaseCandidate(version)) {
    return version;
  }
  const parsed = parseVersion(version);
  return `v${parsed.major}.${parsed.minor}.0`;
}
