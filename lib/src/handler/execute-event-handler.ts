import EventEmitter from 'events';
import {
  ExtendedError,
  HandlerError,
  ensureExtendedError,
} from '../common/error';
import { awaitWithTimeout } from '../common/utils';
import { EventHandlerContext, FailedEventHandler } from './failed-event-handler';

/**
 * Runs the handler for one event and waits at most the timeout for it.
 * @param handler The event handler
 * @param event The decoded event
 * @param context The event metadata (the cancellation emitter is created here)
 * @param timeoutInMs The maximum time the handler may take
 * @returns undefined on success or the normalized error. A timeout keeps the TIMEOUT error code, all other errors are HandlerErrors.
 */
export const executeEventHandler = async <TEvent>(
  handler: FailedEventHandler<TEvent>,
  event: TEvent,
  context: Omit<EventHandlerContext, 'cancellation'>,
  timeoutInMs: number,
): Promise<ExtendedError | undefined> => {
  const cancellation = new EventEmitter();
  try {
    await awaitWithTimeout(
      () => handler.process(event, { ...context, cancellation }),
      timeoutInMs,
      `Could not process the event with the handler "${handler.handlerName}" within the timeout of ${timeoutInMs} milliseconds.`,
    );
    return undefined;
  } catch (e) {
    const err = ensureExtendedError(e, 'HANDLER_FAILED');
    if (err.errorCode === 'TIMEOUT') {
      cancellation.emit('timeout', err);
      return err;
    }
    return new HandlerError(
      `The event handler "${handler.handlerName}" failed: ${err.message}`,
      handler.handlerName,
      err,
    );
  }
};
