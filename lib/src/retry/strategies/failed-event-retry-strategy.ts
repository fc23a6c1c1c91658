import { FullFailedEventConfig } from '../../common/config';
import { ExtendedError } from '../../common/error';
import { FailedEvent } from '../../failed-event/failed-event';

/**
 * Decides if a failed event should be retried again after another failed
 * attempt or if it should be abandoned.
 */
export interface FailedEventRetryStrategy {
  /**
   * @param failedEvent The failed event. Its attemptCount already includes the attempt that just failed.
   * @param error The error that was thrown from the handler (or the timeout error)
   * @returns true if the failed event should be retried, otherwise false.
   */
  (failedEvent: FailedEvent, error: ExtendedError): boolean;
}

/**
 * Get the default retry strategy. It checks that the maximum number of
 * attempts (`config.settings.maxAttempts`) is not reached. With the
 * `enableMaxAttemptsProtection` setting turned off failed events are retried
 * forever.
 */
export const defaultFailedEventRetryStrategy = (
  config: Pick<FullFailedEventConfig, 'settings'>,
): FailedEventRetryStrategy => {
  return (failedEvent: FailedEvent): boolean => {
    if (!config.settings.enableMaxAttemptsProtection) {
      return true;
    }
    return failedEvent.attemptCount < config.settings.maxAttempts;
  };
};
