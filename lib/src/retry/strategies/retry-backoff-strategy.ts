import { FullFailedEventConfig } from '../../common/config';
import { FailedEvent } from '../../failed-event/failed-event';

/**
 * Decides if a failed event is due for the next retry attempt.
 * @param failedEvent The pending failed event
 * @param nowInSec The current time in epoch seconds
 * @returns true if the failed event should be retried in this pass
 */
export interface RetryBackoffStrategy {
  (failedEvent: FailedEvent, nowInSec: number): boolean;
}

/**
 * Get the default exponential backoff strategy. The first retry is due
 * `retryBackoffBaseInSec` seconds after the failed attempt and the delay
 * doubles with every further attempt up to `retryBackoffMaxInSec`.
 */
export const defaultRetryBackoffStrategy = (
  config: Pick<FullFailedEventConfig, 'settings'>,
): RetryBackoffStrategy => {
  const { retryBackoffBaseInSec, retryBackoffMaxInSec } = config.settings;
  return (failedEvent: FailedEvent, nowInSec: number): boolean => {
    const exponent = Math.max(failedEvent.attemptCount - 1, 0);
    const delay = Math.min(
      retryBackoffBaseInSec * 2 ** exponent,
      retryBackoffMaxInSec,
    );
    return failedEvent.attemptedAt + delay <= nowInSec;
  };
};
