export type { IWorkspace } from './workspace';
export { FsWorkspace } from './fs/fs_workspace';
export { MemoryWorkspace } from './memory/memory_workspace';
export type { MemoryWorkspaceOptions } from './memory/memory_workspace';
export { ensureGitignoreEntry } from './gitignore';
