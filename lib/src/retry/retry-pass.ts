import { EventCodec } from '../codec/event-codec';
import { FullFailedEventConfig } from '../common/config';
import {
  DecodeError,
  FailedEventError,
  NotFoundError,
  UnknownHandlerError,
} from '../common/error';
import { FailedEventLogger } from '../common/logger';
import { epochSeconds } from '../common/utils';
import { createImeiConcurrencyController } from '../concurrency-controller/create-imei-concurrency-controller';
import { FailedEvent, PendingCursor } from '../failed-event/failed-event';
import { FailedEventStore } from '../failed-event/failed-event-store';
import { EventHandlerRegistry } from '../handler/event-handler-registry';
import { executeEventHandler } from '../handler/execute-event-handler';
import { RetryStrategies } from './retry-strategies';

/** The counters of one retry pass. */
export interface RetryPassResult {
  /** Failed events that were processed and removed. */
  succeeded: number;
  /** Failed events whose retry failed again. They are kept for a later pass. */
  failed: number;
  /** Failed events that failed again and reached the retry limit. */
  abandoned: number;
  /** Failed events whose stored data could not be decoded. */
  undecodable: number;
  /** Failed events without a registered handler. They are left untouched. */
  unknownHandler: number;
  /** Failed events that are still in their backoff time. */
  notDue: number;
  /** True if the pass stopped because the pass timeout was reached. */
  timedOut: boolean;
}

type RetryOutcome = Exclude<keyof RetryPassResult, 'timedOut'>;

export interface RetryPassDependencies {
  store: FailedEventStore;
  registry: EventHandlerRegistry;
  codec: EventCodec;
  strategies: RetryStrategies;
  config: Pick<FullFailedEventConfig, 'settings'>;
  logger: FailedEventLogger;
}

/**
 * Runs one retry pass over the pending failed events. The events are loaded
 * in batches ordered by their origin timestamp until no more pending events
 * are found or the pass timeout is reached. Events of the same device are
 * retried one after the other, different devices in parallel.
 * Handler and decode errors are handled per failed event. A store error (other
 * than a failed event that was removed concurrently) stops the pass.
 * @param dependencies The store, handlers, codec, strategies, config, and logger
 * @param signal Stops the pass after the running retries when `stopped` is set
 * @returns The counters of the pass
 */
export const runRetryPass = async (
  dependencies: RetryPassDependencies,
  signal: { stopped: boolean } = { stopped: false },
): Promise<RetryPassResult> => {
  const { store, config, logger } = dependencies;
  const { retryBatchSize, retryConcurrency, retryPassTimeoutInMs } =
    config.settings;
  const result: RetryPassResult = {
    succeeded: 0,
    failed: 0,
    abandoned: 0,
    undecodable: 0,
    unknownHandler: 0,
    notDue: 0,
    timedOut: false,
  };
  const deadline = Date.now() + retryPassTimeoutInMs;
  const controller = createImeiConcurrencyController(retryConcurrency);
  const isDone = () => {
    if (Date.now() >= deadline) {
      result.timedOut = true;
    }
    return signal.stopped || result.timedOut;
  };

  let after: PendingCursor | undefined;
  while (!isDone()) {
    const batch = await store.listPending(
      retryBatchSize,
      after ? { after } : undefined,
    );
    const last = batch[batch.length - 1];
    if (!last) {
      break;
    }
    after = { timestamp: last.timestamp, id: last.id };
    logger.trace(`Retrying a batch of ${batch.length} failed events.`);

    const now = epochSeconds();
    let abortError: unknown;
    await Promise.all(
      batch.map(async (failedEvent) => {
        const release = await controller.acquire(failedEvent);
        try {
          if (abortError !== undefined || isDone()) {
            return;
          }
          const outcome = await retryFailedEvent(failedEvent, now, dependencies);
          result[outcome]++;
        } catch (error) {
          if (abortError === undefined) {
            abortError = error;
          }
        } finally {
          release();
        }
      }),
    );
    if (abortError !== undefined) {
      throw abortError;
    }
    if (batch.length < retryBatchSize) {
      break;
    }
  }
  return result;
};

const retryFailedEvent = async (
  failedEvent: FailedEvent,
  nowInSec: number,
  { store, registry, codec, strategies, config, logger }: RetryPassDependencies,
): Promise<RetryOutcome> => {
  const { id, handlerName, imei, timestamp } = failedEvent;
  if (!strategies.retryBackoffStrategy(failedEvent, nowInSec)) {
    logger.trace(`The failed event ${id} is not yet due for a retry.`);
    return 'notDue';
  }

  const handler = registry.get(handlerName);
  if (!handler) {
    const error = new UnknownHandlerError(handlerName);
    logger.error(
      new FailedEventError(error.message, error.errorCode, failedEvent),
      `The failed event ${id} is skipped as no event handler is registered for the handler name "${handlerName}".`,
    );
    return 'unknownHandler';
  }

  let event: unknown;
  try {
    const value = codec.decode(failedEvent.eventData);
    event = handler.parseEvent ? handler.parseEvent(value) : value;
  } catch (e) {
    const error =
      e instanceof DecodeError
        ? e
        : new DecodeError(
            `The failed event data is not a valid event for the handler "${handlerName}".`,
            e,
          );
    const abandon = config.settings.abandonUndecodableEvents;
    logger.error(
      new FailedEventError(error.message, error.errorCode, failedEvent, error),
      `Could not decode the failed event ${id}. ${
        abandon ? 'Abandoning it.' : 'Leaving it untouched.'
      }`,
    );
    if (abandon) {
      await abandonFailedEvent(failedEvent, store, logger);
    }
    return 'undecodable';
  }

  logger.debug(
    { failedEventId: id, handlerName, imei },
    `Retrying the failed event ${id} with the handler "${handlerName}".`,
  );
  const error = await executeEventHandler(
    handler,
    event,
    {
      imei,
      timestamp,
      attempt: failedEvent.attemptCount + 1,
      failedEventId: id,
    },
    strategies.handlerTimeoutStrategy(failedEvent),
  );
  if (!error) {
    await store.remove(id);
    logger.debug(`Removed the successfully retried failed event ${id}.`);
    return 'succeeded';
  }

  let updated: FailedEvent;
  try {
    updated = await store.markRetried(id, epochSeconds());
  } catch (e) {
    if (e instanceof NotFoundError) {
      logger.debug(
        `The failed event ${id} was removed while it was retried. Skipping the attempt update.`,
      );
      return 'failed';
    }
    throw e;
  }

  const retry = strategies.failedEventRetryStrategy(updated, error);
  if (handler.handleError) {
    try {
      await handler.handleError(error, updated, retry);
    } catch (handleErrorError) {
      logger.error(
        new FailedEventError(
          `The error handling of the event handler "${handlerName}" failed.`,
          'HANDLER_FAILED',
          updated,
          handleErrorError,
        ),
        `The error handling of the event handler "${handlerName}" failed. Please make sure that your error handling code does not throw an error!`,
      );
    }
  }

  if (retry) {
    logger.warn(
      { err: error, failedEventId: id, attemptCount: updated.attemptCount },
      `Retrying the failed event ${id} failed. It will be retried again.`,
    );
    return 'failed';
  }
  await abandonFailedEvent(updated, store, logger);
  logger.error(
    new FailedEventError(
      error.message,
      'GIVING_UP_EVENT_HANDLING',
      updated,
      error,
    ),
    `Giving up processing the failed event ${id} after ${updated.attemptCount} attempts.`,
  );
  return 'abandoned';
};

const abandonFailedEvent = async (
  { id }: FailedEvent,
  store: FailedEventStore,
  logger: FailedEventLogger,
): Promise<void> => {
  try {
    await store.markAbandoned(id, epochSeconds());
  } catch (e) {
    if (e instanceof NotFoundError) {
      logger.debug(
        `The failed event ${id} was removed before it could be abandoned.`,
      );
      return;
    }
    throw e;
  }
};
