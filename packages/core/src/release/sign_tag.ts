import type { IVersionControl } from '../git/version_control';
import { InvalidState } from '../stage/errors';
import { createLogger } from '../logger';

const logger = createLogger('[SignTag] ');

export type SignTagOptions = {
  /** Defaults to the most recent `v*` tag reachable from HEAD */
  tag?: string;
  upstream: string;
  /** Only check an existing signature; never sign */
  verifyOnly: boolean;
  /** Sign without pushing the tag */
  localOnly: boolean;
};

export type SignTagResult = {
  tag: string;
  status: 'already-signed' | 'signed' | 'pushed';
};

/**
 * Replaces an unsigned release tag with a signed one and pushes it.
 */
export async function signReleaseTag(vcs: IVersionControl, options: SignTagOptions): Promise<SignTagResult> {
  await vcs.fetch(options.upstream);
  const tag = options.tag || (await vcs.currentTag());

  if (await vcs.tagHasSignature(tag)) {
    logger.info(`Tag ${tag} already signed`);
    if (options.verifyOnly && !(await vcs.verifyTag(tag))) {
      throw new InvalidState(`Tag ${tag} has an invalid signature`);
    }
    return { tag, status: 'already-signed' };
  }
  if (options.verifyOnly) {
    throw new InvalidState(`Tag ${tag} is not signed`);
  }

  await vcs.signTag(tag);
  if (options.localOnly) {
    logger.info(`Signed ${tag}; not pushing`);
    return { tag, status: 'signed' };
  }
  await vcs.pushTag(tag, options.upstream);
  logger.info(`Signed ${tag} and pushed it to ${options.upstream}`);
  return { tag, status: 'pushed' };
}
