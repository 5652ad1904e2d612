/**
 * VersionControl - git primitives for the release flow
 *
 * @module git
 */

export type { IVersionControl } from './version_control';
export { LocalVersionControl } from './local/local_version_control';
export { MemoryVersionControl, memoryCommit } from './memory/memory_version_control';
export type { MemoryCommit, MemoryTag } from './memory/memory_version_control';
export { withStash, withCheckout, withResetOnExit } from './scoped';
export { parseRemoteSlug } from './remote';

export type {
  ExecOptions,
  ExecResult,
  ExecCommand,
  VersionControlDependencies,
  RepoSlug,
} from './types';

export {
  GitError,
  GitCommandError,
  BranchNotFoundError,
  RemoteError,
} from './errors';
