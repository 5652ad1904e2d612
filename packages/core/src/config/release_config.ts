import type { ReleaseConfig } from './config.types';

export const DEFAULT_RELEASE_CONFIG: Readonly<ReleaseConfig> = {
  branch: 'master',
  mainBranch: 'master',
  dryrun: false,
  force: true,
  githubActions: false,
  issue: 0,
  production: false,
  rebase: true,
  resume: false,
  verify: false,
  version: '',
  upstream: 'upstream',
};

export function createReleaseConfig(overrides: Partial<ReleaseConfig> = {}): ReleaseConfig {
  return { ...DEFAULT_RELEASE_CONFIG, ...overrides };
}
