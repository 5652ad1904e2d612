import type { PollOutcome, PollPolicy, PollStep, Sleep } from './stage.types';

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Wait used while an external process has not started yet */
export const START_WAIT_MS = 10_000;

/**
 * Every bounded wait in the release flow, in one place.
 */
export const POLL_POLICIES = {
  /** PR to show up for the pushed release commit (~1 minute) */
  pullRequestSync: { attempts: 10, intervalMs: 5_000 },
  /** PR checks to complete (~1 hour) */
  checks: { attempts: 120, intervalMs: 30_000 },
  /** Release PR to be merged (~1 hour) */
  merge: { attempts: 120, intervalMs: 30_000 },
  /** Main branch workflows to complete (~1 hour) */
  mainBuild: { attempts: 120, intervalMs: 30_000 },
  /** Tag workflows to appear (~1 minute) */
  buildStart: { attempts: 6, intervalMs: 10_000 },
  /** Tag workflows to complete (~1 hour) */
  binaries: { attempts: 120, intervalMs: 30_000 },
} satisfies Record<string, PollPolicy>;

export type PollPolicyName = keyof typeof POLL_POLICIES;

/**
 * Evaluates `step` up to `policy.attempts` times, sleeping between
 * attempts, until it reports done. Never sleeps after the last attempt.
 */
export async function poll<T>(
  policy: PollPolicy,
  sleep: Sleep,
  step: (attempt: number) => Promise<PollStep<T>>,
): Promise<PollOutcome<T>> {
  for (let attempt = 0; attempt < policy.attempts; attempt++) {
    const result = await step(attempt);
    if (result.done) {
      return { status: 'done', value: result.value };
    }
    if (attempt + 1 < policy.attempts) {
      await sleep(result.waitMs ?? policy.intervalMs);
    }
  }
  return { status: 'timeout' };
}
