import EventEmitter from 'events';
import { ExtendedError } from '../common/error';
import { FailedEvent } from '../failed-event/failed-event';

/** Information about the event that is handed to the handler next to the event itself. */
export interface EventHandlerContext {
  /** The IMEI of the device/vehicle which sent the event. */
  imei: string;
  /** The origin time of the event in epoch seconds. */
  timestamp: number;
  /** The processing attempt number. The first live attempt is 1. */
  attempt: number;
  /** The id of the failed event when the event is retried from the failed event table. */
  failedEventId?: string;
  /**
   * Emits "timeout" when the handler did not finish within the handler
   * timeout. The result of the handler is ignored after that.
   */
  cancellation: EventEmitter;
}

/**
 * A named event handler. The handler name is stored with every failed event
 * and is used to find the handler again when the event is retried.
 */
export interface FailedEventHandler<TEvent = unknown> {
  /** The unique name of the handler (max 191 characters). */
  handlerName: string;

  /**
   * Custom business logic to process the event. It is fine to throw an error
   * if the event cannot be processed: the event is then stored as a failed
   * event (or kept for another retry).
   * @param event The (decoded) event.
   * @param context The event metadata and the cancellation emitter.
   */
  process(event: TEvent, context: EventHandlerContext): Promise<void>;

  /**
   * Optional validation of the decoded event data. Throw an error if the
   * value is not a valid event: it is then treated as undecodable.
   * @param value The value that was decoded from the stored event data.
   * @returns The typed event.
   */
  parseEvent?(value: unknown): TEvent;

  /**
   * Optional business logic that runs after a retry attempt failed.
   * @param error The error that was thrown while processing the event.
   * @param failedEvent The failed event including the updated attempt count.
   * @param retry True if the event will be retried again.
   */
  handleError?(
    error: ExtendedError,
    failedEvent: FailedEvent,
    retry: boolean,
  ): Promise<void>;
}
