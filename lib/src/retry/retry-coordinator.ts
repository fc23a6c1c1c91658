import { Pool } from 'pg';
import { EventCodec, jsonEventCodec } from '../codec/event-codec';
import {
  FailedEventConfig,
  FullFailedEventConfig,
  applyDefaultFailedEventConfigValues,
} from '../common/config';
import { createDatabasePool } from '../common/database';
import { FailedEventStoreError, ensureExtendedError } from '../common/error';
import { FailedEventLogger } from '../common/logger';
import { runScheduledFailedEventCleanup } from '../failed-event/failed-event-cleanup';
import { FailedEventStore } from '../failed-event/failed-event-store';
import { createPostgresFailedEventStore } from '../failed-event/postgres-failed-event-store';
import { createEventHandlerRegistry } from '../handler/event-handler-registry';
import { FailedEventHandler } from '../handler/failed-event-handler';
import { RetryPassResult, runRetryPass } from './retry-pass';
import { RetryStrategies } from './retry-strategies';
import { defaultFailedEventRetryStrategy } from './strategies/failed-event-retry-strategy';
import { defaultHandlerTimeoutStrategy } from './strategies/handler-timeout-strategy';
import { defaultRetryBackoffStrategy } from './strategies/retry-backoff-strategy';

export interface RetryCoordinatorOptions {
  /** Strategies to provide custom logic for handling specific scenarios */
  strategies?: Partial<RetryStrategies>;
  /** The codec to decode the stored event data. Defaults to the JSON envelope codec. */
  codec?: EventCodec;
  /**
   * A custom failed event store. When it is provided no database pool is
   * created and the scheduled cleanup is not started.
   */
  store?: FailedEventStore;
}

/**
 * Initialize the retry coordinator. It runs a retry pass over the pending
 * failed events right away and then again `retryIntervalInMs` after every
 * finished pass. Passes never overlap.
 * @param config The configuration object with the database connection details and the retry settings.
 * @param handlers The event handlers. A failed event is retried with the handler that has the stored handler name.
 * @param logger A logger instance for logging trace up to error logs
 * @param options Optional strategies, codec, and store
 * @returns A function for a clean shutdown and a function to run a retry pass right away. If a pass is already running, the returned promise resolves once the running pass finishes.
 */
export const initializeRetryCoordinator = (
  config: FailedEventConfig,
  handlers: FailedEventHandler[],
  logger: FailedEventLogger,
  options?: RetryCoordinatorOptions,
): [
  shutdown: { (): Promise<void> },
  runRetryPassOnce: { (): Promise<RetryPassResult> },
] => {
  const fullConfig = applyDefaultFailedEventConfigValues(config);
  const registry = createEventHandlerRegistry(handlers);
  const strategies = applyDefaultStrategies(options?.strategies, fullConfig);
  let pool: Pool | undefined;
  let store: FailedEventStore;
  if (options?.store) {
    store = options.store;
  } else {
    pool = createDatabasePool(fullConfig.dbConfig, logger);
    store = createPostgresFailedEventStore(pool, fullConfig, logger);
  }
  const cleanupTimeout = pool
    ? runScheduledFailedEventCleanup(pool, fullConfig, logger)
    : undefined;

  const handlerNames = registry.handlerNames();
  logger.info(
    { handlerNames },
    `Started the failed event retry coordinator for the handlers ${handlerNames
      .map((name) => `"${name}"`)
      .join(', ')}.`,
  );

  const signal = { stopped: false };
  let currentPass: Promise<RetryPassResult> | undefined;
  let nextPassTimeout: NodeJS.Timeout | undefined;

  const runRetryPassOnce = (): Promise<RetryPassResult> => {
    if (signal.stopped) {
      return Promise.reject(
        new FailedEventStoreError(
          'The retry coordinator was shut down.',
          'RETRY_PASS_FAILED',
        ),
      );
    }
    if (!currentPass) {
      logger.debug('Starting a failed event retry pass.');
      currentPass = runRetryPass(
        {
          store,
          registry,
          codec: options?.codec ?? jsonEventCodec,
          strategies,
          config: fullConfig,
          logger,
        },
        signal,
      )
        .then((result) => {
          logPassResult(result, logger);
          return result;
        })
        .finally(() => {
          currentPass = undefined;
        });
    }
    return currentPass;
  };

  const scheduleNextPass = (delayInMs: number) => {
    if (signal.stopped) {
      return;
    }
    nextPassTimeout = setTimeout(() => {
      void runRetryPassOnce()
        .catch((e) => {
          logger.error(
            ensureExtendedError(e, 'RETRY_PASS_FAILED'),
            'The failed event retry pass failed. It is attempted again with the next pass.',
          );
        })
        .finally(() => scheduleNextPass(fullConfig.settings.retryIntervalInMs));
    }, delayInMs);
  };
  scheduleNextPass(0);

  return [
    async () => {
      signal.stopped = true;
      clearTimeout(nextPassTimeout);
      clearInterval(cleanupTimeout);
      await Promise.allSettled([currentPass]);
      await pool?.end();
    },
    runRetryPassOnce,
  ];
};

const applyDefaultStrategies = (
  strategies: Partial<RetryStrategies> | undefined,
  config: FullFailedEventConfig,
): RetryStrategies => ({
  handlerTimeoutStrategy:
    strategies?.handlerTimeoutStrategy ?? defaultHandlerTimeoutStrategy(config),
  failedEventRetryStrategy:
    strategies?.failedEventRetryStrategy ??
    defaultFailedEventRetryStrategy(config),
  retryBackoffStrategy:
    strategies?.retryBackoffStrategy ?? defaultRetryBackoffStrategy(config),
});

const logPassResult = (
  result: RetryPassResult,
  logger: FailedEventLogger,
) => {
  const message = `Finished the failed event retry pass: ${result.succeeded} succeeded, ${result.failed} failed, ${result.abandoned} abandoned, ${result.undecodable} undecodable, ${result.unknownHandler} without handler, ${result.notDue} not due.`;
  const worked =
    result.succeeded +
    result.failed +
    result.abandoned +
    result.undecodable +
    result.unknownHandler;
  if (result.timedOut) {
    logger.warn(
      result,
      `${message} The pass timeout was reached before all failed events were retried.`,
    );
  } else if (worked > 0) {
    logger.info(result, message);
  } else {
    logger.trace(result, message);
  }
};
