import { EventCodec, jsonEventCodec } from '../codec/event-codec';
import { FailedEventSettings, defaultSettings } from '../common/config';
import { UnknownHandlerError } from '../common/error';
import { FailedEventLogger } from '../common/logger';
import { FailedEventStore } from '../failed-event/failed-event-store';
import { createEventHandlerRegistry } from '../handler/event-handler-registry';
import { executeEventHandler } from '../handler/execute-event-handler';
import { FailedEventHandler } from '../handler/failed-event-handler';
import { createFailedEventCapture } from './capture-failed-event';

export type EventProcessingResult =
  | { status: 'processed' }
  | { status: 'dead-lettered'; failedEventId: string };

export interface EventProcessorOptions {
  /** The codec to encode failed events. Defaults to the JSON envelope codec. */
  codec?: EventCodec;
}

/**
 * Creates the live ingestion entry point. It runs the handler that is
 * registered for the handler name and stores the event as failed event when
 * the handler throws an error or does not finish within the handler timeout.
 * Events for an unknown handler name are stored as well.
 * @param store The failed event store
 * @param handlers The event handlers
 * @param config The settings with the handler timeout
 * @param logger A logger instance for logging trace up to error logs
 * @param options The optional codec
 * @returns The function to process one event. It rejects only if a failed event could not be stored.
 */
export const createEventProcessor = (
  store: FailedEventStore,
  handlers: FailedEventHandler[],
  config: { settings: FailedEventSettings },
  logger: FailedEventLogger,
  options?: EventProcessorOptions,
): ((
  handlerName: string,
  event: unknown,
  metadata: { imei: string; timestamp: number },
) => Promise<EventProcessingResult>) => {
  const registry = createEventHandlerRegistry(handlers);
  const capture = createFailedEventCapture(
    store,
    logger,
    options?.codec ?? jsonEventCodec,
  );
  const handlerTimeoutInMs =
    config.settings.handlerTimeoutInMs ?? defaultSettings.handlerTimeoutInMs;

  return async (
    handlerName: string,
    event: unknown,
    { imei, timestamp }: { imei: string; timestamp: number },
  ): Promise<EventProcessingResult> => {
    const handler = registry.get(handlerName);
    if (!handler) {
      const error = new UnknownHandlerError(handlerName);
      logger.error(error, error.message);
    } else {
      const error = await executeEventHandler(
        handler,
        event,
        { imei, timestamp, attempt: 1 },
        handlerTimeoutInMs,
      );
      if (!error) {
        logger.trace(
          `Processed the event of the device ${imei} with the handler "${handlerName}".`,
        );
        return { status: 'processed' };
      }
      logger.warn(
        error,
        `Processing the event of the device ${imei} with the handler "${handlerName}" failed. Storing it as failed event.`,
      );
    }
    const failedEventId = await capture(event, { handlerName, imei, timestamp });
    return { status: 'dead-lettered', failedEventId };
  };
};
