import { FailedEventRetryStrategy } from './strategies/failed-event-retry-strategy';
import { HandlerTimeoutStrategy } from './strategies/handler-timeout-strategy';
import { RetryBackoffStrategy } from './strategies/retry-backoff-strategy';

export interface RetryStrategies {
  /**
   * Defines the handler timeout strategy. By default, it uses the configured
   * handlerTimeoutInMs setting.
   */
  handlerTimeoutStrategy: HandlerTimeoutStrategy;

  /**
   * Decides if a failed event should be retried again or abandoned after
   * another failed attempt.
   */
  failedEventRetryStrategy: FailedEventRetryStrategy;

  /**
   * Decides if a pending failed event is due for a retry in the current pass.
   */
  retryBackoffStrategy: RetryBackoffStrategy;
}
