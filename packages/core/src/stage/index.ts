/**
 * Stage execution, control-flow signals and bounded polling
 *
 * @module stage
 */

export { Stage, StageRunner, LoggerStageReporter } from './stage';
export { RecordingStageReporter } from './recording_reporter';
export type { RecordedStageEvent } from './recording_reporter';
export { InvalidState, UserAbort, isUserAbort, isInvalidState, requireState } from './errors';
export { poll, realSleep, POLL_POLICIES, START_WAIT_MS } from './poll';
export type { PollPolicyName } from './poll';
export type {
  StageReporter,
  StageInfo,
  StageOutcome,
  PollPolicy,
  PollStep,
  PollOutcome,
  Sleep,
} from './stage.types';
