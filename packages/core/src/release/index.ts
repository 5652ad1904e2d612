/**
 * Release orchestration
 *
 * @module release
 */

export { ReleaseOrchestrator } from './release_orchestrator';
export type {
  ReleaseOrchestratorDependencies,
  ReleaseRunResult,
  ReleaseRunStatus,
} from './release_orchestrator.types';
export { detectMilestones } from './progress';
export type { ProgressSources } from './progress';
export { pullRequestPatch } from './pull_request_patch';
export { signReleaseTag } from './sign_tag';
export type { SignTagOptions, SignTagResult } from './sign_tag';
export {
  PRODUCTION_MARKER,
  TRACKING_ISSUE_PREFIX,
  isProductionIssue,
  releaseBranchName,
  releaseCommitMessage,
  releaseIssueTitle,
  versionFromIssueTitle,
} from './naming';
