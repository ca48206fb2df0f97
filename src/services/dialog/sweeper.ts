/**
 * @fileoverview Background sweeper for idle dialogs.
 *
 * Runs a cleanup job on a fixed interval, never overlapping itself.
 */

import { createLogger } from '../../utils/observability/index.js';
import { errorMessage } from '../../utils/errors.js';

const logger = createLogger({ domain: 'sweeper' });

/**
 * Interface for interval job runners.
 */
export interface Poller {
  /** Start the polling loop */
  start(): void;
  /** Stop the polling loop and wait for any in-flight run to complete */
  stop(): Promise<void>;
  /** Check if the poller is running */
  isRunning(): boolean;
}

/**
 * Create an interval-based poller.
 *
 * @param job - Function to call on each interval
 * @param intervalMs - Polling interval in milliseconds
 * @param runOnStart - Also run once immediately on start
 */
export function createIntervalPoller(
  job: () => Promise<void>,
  intervalMs: number,
  runOnStart = false
): Poller {
  let intervalId: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<void> | null = null;

  /**
   * Wrapper to prevent overlapping executions and catch errors.
   */
  function runSafe(): void {
    if (inFlight) {
      logger.debug('sweep_skip_overlap');
      return;
    }

    inFlight = job()
      .catch((error: unknown) => {
        logger.error('sweep_failed', { error: errorMessage(error) });
      })
      .finally(() => {
        inFlight = null;
      });
  }

  return {
    start(): void {
      if (intervalId !== null) {
        logger.warn('sweeper_already_running');
        return;
      }

      logger.info('sweeper_started', { intervalMs });
      if (runOnStart) runSafe();

      intervalId = setInterval(runSafe, intervalMs);
      intervalId.unref();
    },

    async stop(): Promise<void> {
      if (intervalId === null) {
        return;
      }

      clearInterval(intervalId);
      intervalId = null;

      if (inFlight) {
        await inFlight;
      }
      logger.info('sweeper_stopped');
    },

    isRunning(): boolean {
      return intervalId !== null;
    },
  };
}

/**
 * Poller that closes dialogs idle past the timeout.
 */
export function createDialogSweeper(
  cleanup: { cleanupInactiveDialogs(): Promise<number> },
  intervalMs: number
): Poller {
  return createIntervalPoller(async () => {
    const closed = await cleanup.cleanupInactiveDialogs();
    logger.debug('sweep_completed', { count: closed });
  }, intervalMs);
}
