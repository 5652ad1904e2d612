/**
 * Control-flow signals raised by release stages.
 *
 * `InvalidState` is a real failure: a stage could not establish its
 * postcondition. `UserAbort` is not a failure; it pauses the run until a
 * human has acted, and callers treat it as a successful exit.
 */

/**
 * A precondition was violated, a stage failed, or a wait timed out.
 */
export class InvalidState extends Error {
  public readonly stage: string | undefined;
  public readonly reason: string;

  constructor(reason: string, stage?: string) {
    super(stage ? `${stage}: ${reason}` : reason);
    this.name = 'InvalidState';
    this.stage = stage;
    this.reason = reason;
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

/**
 * The run reached a human gate (sign a tag, publish a release, ...).
 * Carries the instruction to show to the human.
 */
export class UserAbort extends Error {
  public readonly instruction: string;

  constructor(instruction: string) {
    super(instruction);
    this.name = 'UserAbort';
    this.instruction = instruction;
    Object.setPrototypeOf(this, UserAbort.prototype);
  }
}

export function isUserAbort(error: unknown): error is UserAbort {
  return error instanceof UserAbort;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

/**
 * Throws InvalidState unless the condition holds.
 */
export function requireState(condition: boolean, message: string = 'Requirement not met'): asserts condition {
  if (!condition) {
    throw new InvalidState(message);
  }
}
