/**
 * Custom Error Classes for the VersionControl module
 */

/**
 * Base error class for all git-related errors
 */
export class GitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitError';
    Object.setPrototypeOf(this, GitError.prototype);
  }
}

/**
 * Error thrown when a git command fails
 */
export class GitCommandError extends GitError {
  public readonly stderr: string;
  public readonly command?: string | undefined;

  constructor(message: string, stderr: string = '', command?: string | undefined) {
    super(message);
    this.name = 'GitCommandError';
    this.stderr = stderr;
    this.command = command;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

/**
 * Error thrown when a branch, tag or commit cannot be resolved
 */
export class BranchNotFoundError extends GitError {
  public readonly branchName: string;

  constructor(branchName: string) {
    super(`Branch not found: ${branchName}`);
    this.name = 'BranchNotFoundError';
    this.branchName = branchName;
    Object.setPrototypeOf(this, BranchNotFoundError.prototype);
  }
}

/**
 * Error thrown when a remote does not exist or its URL cannot be parsed
 */
export class RemoteError extends GitError {
  public readonly remote: string;

  constructor(remote: string, message: string) {
    super(message);
    this.name = 'RemoteError';
    this.remote = remote;
    Object.setPrototypeOf(this, RemoteError.prototype);
  }
}
