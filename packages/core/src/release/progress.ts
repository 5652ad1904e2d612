/**
 * Release progress detection
 *
 * Derives which release milestones are done from external state only, so
 * the dashboard can be rebuilt at any time.
 */

import type { IVersionControl } from '../git/version_control';
import type { IForge } from '../forge/forge';
import type { ReleaseMilestone } from '../dashboard';
import { impliedMilestones } from '../dashboard';
import { hasTarballs, unsignedAssets } from '../release_tools/assets';
import { releaseBranchName, releaseCommitMessage } from './naming';

export type ProgressSources = {
  vcs: IVersionControl;
  forge: IForge;
  mainBranch: string;
  version: string;
};

export async function detectMilestones(sources: ProgressSources): Promise<Set<ReleaseMilestone>> {
  const { vcs, forge, mainBranch, version } = sources;
  const done = new Set<ReleaseMilestone>();

  const { owner } = await vcs.remoteSlug('origin');
  const pr = await forge.findPullRequestForBranch(`${owner}:${releaseBranchName(version)}`, mainBranch, 'all');
  if (pr) {
    done.add('Preparation');
  }

  if ((await vcs.log(mainBranch)).includes(releaseCommitMessage(version))) {
    done.add('Review');
  }

  if ((await vcs.releaseTagExists(version)) && (await vcs.tagHasSignature(version))) {
    done.add('Tagging');
  }

  const release = await forge.getRelease(version);
  if (release) {
    if (hasTarballs(release.assets, version) && unsignedAssets(release.assets).length === 0) {
      done.add('Binaries');
    }
    if (release.publishedAt !== null) {
      done.add('Publication');
    }
  }

  return impliedMilestones(done);
}
