import type { RepoSlug } from './types';

const REMOTE_SLUG_REGEX = /[:/]([^/]+)\/([^./]+)(?:\.git)?$/;

/**
 * Owner and repository of an ssh or https remote URL, or null.
 *
 * @example
 * parseRemoteSlug('git@github.com:acme/widgets.git'); // { owner: 'acme', repo: 'widgets' }
 */
export function parseRemoteSlug(url: string): RepoSlug | null {
  const match = REMOTE_SLUG_REGEX.exec(url.trim());
  if (!match || match[1] === undefined || match[2] === undefined) {
    return null;
  }
  return { owner: match[1], repo: match[2] };
}
