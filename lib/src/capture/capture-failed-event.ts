import { EventCodec, jsonEventCodec } from '../codec/event-codec';
import { FailedEventLogger } from '../common/logger';
import { FailedEventStore } from '../failed-event/failed-event-store';

/** The metadata that is stored next to the encoded event. */
export interface FailedEventMetadata {
  /** The name of the handler that failed and that should process the event on retry. */
  handlerName: string;
  /** The IMEI of the device/vehicle which sent the event. */
  imei: string;
  /** The origin time of the event in epoch seconds. */
  timestamp: number;
  /** The time of the failed attempt in epoch seconds. Defaults to now. */
  attemptedAt?: number;
}

/**
 * Creates the function that live ingestion handlers call when they failed to
 * process an event. The event is encoded and stored for a later retry.
 * @param store The failed event store
 * @param logger A logger instance for logging trace up to error logs
 * @param codec The codec to encode the event. Defaults to the JSON envelope codec.
 * @returns The capture function. It resolves to the id of the stored failed event and rejects when the event cannot be encoded or stored.
 */
export const createFailedEventCapture = <TEvent = unknown>(
  store: FailedEventStore,
  logger: FailedEventLogger,
  codec: Pick<EventCodec<TEvent>, 'encode'> = jsonEventCodec,
): ((event: TEvent, metadata: FailedEventMetadata) => Promise<string>) => {
  return async (
    event: TEvent,
    { handlerName, imei, timestamp, attemptedAt }: FailedEventMetadata,
  ): Promise<string> => {
    const eventData = codec.encode(event);
    const id = await store.record({
      eventData,
      handlerName,
      imei,
      timestamp,
      attemptedAt,
    });
    logger.info(
      { failedEventId: id, handlerName, imei, timestamp },
      `The event of the device ${imei} for the handler "${handlerName}" was stored as failed event ${id}.`,
    );
    return id;
  };
};
