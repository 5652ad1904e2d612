/**
 * Scoped working-tree guards
 *
 * Each wrapper runs `body` and restores the checkout on every exit path,
 * including thrown errors and UserAbort.
 */

import type { IVersionControl } from './version_control';
import { createLogger } from '../logger';

const logger = createLogger('[Git] ');

/** Stashes uncommitted changes for the duration of `body` */
export async function withStash<T>(vcs: IVersionControl, body: () => Promise<T>): Promise<T> {
  const stashed = await vcs.stash();
  if (!stashed) {
    return body();
  }
  logger.info('Stashing changes.');
  return guarded(body, 'Restoring stashed changes', async () => {
    logger.info('Restoring stashed changes.');
    await vcs.stashPop();
  });
}

/** Checks out `branch` and moves back to the original branch afterwards */
export async function withCheckout<T>(vcs: IVersionControl, branch: string, body: () => Promise<T>): Promise<T> {
  const original = await vcs.currentBranch();
  if (branch !== original) {
    logger.info(`Checking out ${branch} (from ${original}).`);
    await vcs.checkout(branch);
  }
  return guarded(body, `Moving back to ${original}`, async () => {
    if ((await vcs.currentBranch()) !== original) {
      logger.info(`Moving back to ${original}.`);
      await vcs.checkout(original);
    }
  });
}

/** Hard-resets whatever branch is checked out when `body` ends */
export async function withResetOnExit<T>(vcs: IVersionControl, body: () => Promise<T>): Promise<T> {
  return guarded(body, 'Resetting the working tree', async () => {
    await vcs.reset(await vcs.currentBranch());
  });
}

// ═══════════════════════════════════════════════════════════════════════
// PRIVATE HELPERS
// ═══════════════════════════════════════════════════════════════════════

/**
 * Runs `restore` after `body`. When `body` throws, a failing `restore` is
 * logged and the error from `body` is the one that propagates.
 */
async function guarded<T>(body: () => Promise<T>, action: string, restore: () => Promise<void>): Promise<T> {
  let result: T;
  try {
    result = await body();
  } catch (error) {
    try {
      await restore();
    } catch (restoreError) {
      logger.error(`${action} failed: ${restoreError instanceof Error ? restoreError.message : String(restoreError)}`);
    }
    throw error;
  }
  await restore();
  return result;
}
