import type { ReleaseEnvironment } from './config.types';
import type { RepoSlug } from '../forge/types';

/** `owner/repo`, or undefined for anything else */
export function parseRepository(value: string | undefined): RepoSlug | undefined {
  const match = /^([^/\s]+)\/([^/\s]+)$/.exec(value?.trim() ?? '');
  if (!match?.[1] || !match[2]) {
    return undefined;
  }
  return { owner: match[1], repo: match[2] };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value?.trim() ? value.trim() : undefined;
}

export function readEnvironment(env: NodeJS.ProcessEnv = process.env): ReleaseEnvironment {
  const token = nonEmpty(env['GITHUB_TOKEN']);
  return {
    token,
    releaserToken: nonEmpty(env['RELEASER_TOKEN']) ?? token,
    repository: parseRepository(env['GITHUB_REPOSITORY']),
    actor: nonEmpty(env['GITHUB_ACTOR']),
    apiUrl: nonEmpty(env['GITHUB_API_URL']),
    editor: nonEmpty(env['EDITOR']),
    ci: env['GITHUB_ACTIONS'] === 'true',
  };
}
