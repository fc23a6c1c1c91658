import { FailedEventStoreError } from '../common/error';
import { FailedEventHandler } from './failed-event-handler';

export interface EventHandlerRegistry {
  /** Get the handler that is registered for the handler name. */
  get(handlerName: string): FailedEventHandler | undefined;
  /** The names of all registered handlers. */
  handlerNames(): string[];
}

/**
 * Creates the lookup of the event handlers by their handler name.
 * @param handlers The event handlers. Every handler name must be unique.
 * @throws FailedEventStoreError if the list is empty or a handler name is used more than once.
 */
export const createEventHandlerRegistry = (
  handlers: FailedEventHandler[],
): EventHandlerRegistry => {
  const registry = new Map<string, FailedEventHandler>();
  for (const handler of handlers) {
    if (registry.has(handler.handlerName)) {
      throw new FailedEventStoreError(
        `Only one event handler can be registered for one handler name. Multiple event handlers use the handler name "${handler.handlerName}".`,
        'CONFLICTING_EVENT_HANDLERS',
      );
    }
    registry.set(handler.handlerName, handler);
  }

  if (registry.size === 0) {
    throw new FailedEventStoreError(
      'At least one event handler must be provided.',
      'NO_EVENT_HANDLER_REGISTERED',
    );
  }

  return {
    get: (handlerName: string) => registry.get(handlerName),
    handlerNames: () => [...registry.keys()],
  };
};
