export type { IForge, PullRequestStateFilter } from './forge';
export type {
  ApiTagRequest,
  CheckRun,
  Issue,
  Milestone,
  NewPullRequest,
  NewRelease,
  PullRequest,
  PullRequestPatch,
  PullRequestState,
  Release,
  ReleaseAsset,
  RepoSlug,
  SignedCommitFile,
  SignedCommitRequest,
  WorkflowRun,
} from './types';
export type { ForgeApiErrorCode } from './errors';
export {
  ForgeApiError,
  ForgeObjectNotFoundError,
  isOctokitRequestError,
  mapOctokitError,
} from './errors';
export { CachedTable, ForgeCache } from './forge_cache';
export { publishedCandidates, selectNextMilestone } from './selection';
export { GitHubForge } from './github/github_forge';
export type { GitHubForgeDependencies } from './github/github_forge.types';
export { BOT_TAGGER } from './github/github_forge.types';
export { MemoryForge } from './memory/memory_forge';
export type { MemoryApiTag, MemoryForgeHooks, MemoryForgeOptions } from './memory/memory_forge';
