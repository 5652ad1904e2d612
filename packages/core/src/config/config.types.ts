import type { RepoSlug } from '../forge/types';

/**
 * Options of one release run. Only `production` and `version` change after
 * construction, when the tracking issue supplies them.
 */
export type ReleaseConfig = {
  /** Branch the release is cut from */
  branch: string;
  mainBranch: string;
  dryrun: boolean;
  /** Force-push the release branch */
  force: boolean;
  /** Running as the CI bot */
  githubActions: boolean;
  /** Tracking issue number; 0 when there is none */
  issue: number;
  production: boolean;
  /** Allow rebasing an existing release branch */
  rebase: boolean;
  /** Keep release notes already in the changelog */
  resume: boolean;
  /** Stop after checks; never flip the PR to ready */
  verify: boolean;
  /** Empty to pick the version automatically; `latest` for the latest release */
  version: string;
  upstream: string;
};

/**
 * Repository-level settings (`.relkit.yml`).
 */
export type ReleaseSettings = {
  /** Login the CI bot acts as */
  botLogin: string;
  changelogFile: string;
  /** Build-tool working directory kept out of release commits */
  gitignoreEntry: string;
  /** Check run whose failure is fixed by the formatter */
  restyleCheck: string;
  /** Check run of this tool itself; ignored in verify mode */
  selfCheck: string;
  restyleCommand: string;
  validateCommand: string | null;
  /** Prefix of the directory inside source tarballs */
  projectName: string;
  editor: string;
};

/** Contents of a settings file; every key is optional */
export type SettingsFile = {
  botLogin?: string;
  changelogFile?: string;
  gitignoreEntry?: string;
  restyleCheck?: string;
  selfCheck?: string;
  restyleCommand?: string;
  validateCommand?: string | null;
  projectName?: string;
  editor?: string;
};

/**
 * Values taken from the process environment.
 */
export type ReleaseEnvironment = {
  token: string | undefined;
  /** Token for ref updates and PR creation; falls back to `token` */
  releaserToken: string | undefined;
  repository: RepoSlug | undefined;
  actor: string | undefined;
  apiUrl: string | undefined;
  editor: string | undefined;
  /** Running inside a CI workflow */
  ci: boolean;
};
