import { RELEASE_BRANCH_PREFIX } from '../version';

export const TRACKING_ISSUE_PREFIX = 'Release tracking issue';

/** Body line of a tracking issue asking for a production release */
export const PRODUCTION_MARKER = 'Production release';

export function releaseCommitMessage(version: string): string {
  return `chore: Release ${version}`;
}

export function releaseIssueTitle(version: string): string {
  return `${TRACKING_ISSUE_PREFIX}: ${version}`;
}

export function releaseBranchName(version: string): string {
  return `${RELEASE_BRANCH_PREFIX}/${version}`;
}

/** Version named by a tracking issue title, if any */
export function versionFromIssueTitle(title: string): string | null {
  const prefix = `${TRACKING_ISSUE_PREFIX}: `;
  return title.startsWith(prefix) ? title.slice(prefix.length) : null;
}

export function isProductionIssue(body: string): boolean {
  return body.split(/\r?\n/).includes(PRODUCTION_MARKER);
}
