/**
 * Type Definitions for the VersionControl module
 *
 * These types define the contracts for git operations,
 * dependencies, and data structures used throughout the module.
 */

/**
 * Options for executing shell commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
  /** Timeout in milliseconds */
  timeout?: number;
  /** Attach the command to the terminal (editors, gpg pinentry) */
  interactive?: boolean;
};

/**
 * Result of executing a shell command
 */
export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error output */
  stderr: string;
};

export type ExecCommand = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

/**
 * Dependencies required by LocalVersionControl
 *
 * Command execution is injected so tests never spawn git.
 */
export type VersionControlDependencies = {
  /** Path to the repository root (optional, auto-detected if not provided) */
  repoRoot?: string;
  /** Function to execute shell commands (required) */
  execCommand: ExecCommand;
};

/**
 * Owner and repository name of a hosted remote
 */
export type RepoSlug = {
  owner: string;
  repo: string;
};
