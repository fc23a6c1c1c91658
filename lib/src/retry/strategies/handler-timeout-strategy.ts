import { FullFailedEventConfig } from '../../common/config';
import { FailedEvent } from '../../failed-event/failed-event';

/**
 * Defines how much time in milliseconds the handler is allowed to take to
 * process a given failed event before the attempt counts as failed.
 * @param failedEvent The failed event that is retried
 * @returns The time in milliseconds for the timeout
 */
export interface HandlerTimeoutStrategy {
  (failedEvent: FailedEvent): number;
}

/**
 * Get the default handler timeout strategy which uses the handlerTimeoutInMs
 * setting.
 */
export const defaultHandlerTimeoutStrategy =
  (config: Pick<FullFailedEventConfig, 'settings'>): HandlerTimeoutStrategy =>
  () => {
    return config.settings.handlerTimeoutInMs;
  };
