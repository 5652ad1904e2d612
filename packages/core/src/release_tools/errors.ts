/**
 * Errors raised by release tools.
 */

export class ReleaseToolError extends Error {
  constructor(message: string, public readonly output: string = '') {
    super(message);
    this.name = 'ReleaseToolError';
    Object.setPrototypeOf(this, ReleaseToolError.prototype);
  }
}

/**
 * One or more release assets failed verification.
 */
export class AssetVerificationError extends ReleaseToolError {
  constructor(public readonly failures: string[]) {
    super(`Release asset verification failed: ${failures.join(', ')}`);
    this.name = 'AssetVerificationError';
    Object.setPrototypeOf(this, AssetVerificationError.prototype);
  }
}
