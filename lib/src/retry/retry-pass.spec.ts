import { jsonEventCodec } from '../codec/event-codec';
import { FullFailedEventSettings, defaultSettings } from '../common/config';
import { NotFoundError, StorageError } from '../common/error';
import { getInMemoryLogger } from '../common/logger';
import { sleep } from '../common/utils';
import { FailedEvent } from '../failed-event/failed-event';
import { createEventHandlerRegistry } from '../handler/event-handler-registry';
import {
  EventHandlerContext,
  FailedEventHandler,
} from '../handler/failed-event-handler';
import { createInMemoryFailedEventStore } from '../test-utils/in-memory-failed-event-store';
import { RetryPassDependencies, runRetryPass } from './retry-pass';
import { defaultFailedEventRetryStrategy } from './strategies/failed-event-retry-strategy';
import { defaultHandlerTimeoutStrategy } from './strategies/handler-timeout-strategy';
import { defaultRetryBackoffStrategy } from './strategies/retry-backoff-strategy';

const imei = '490154203237518';

const storedEvent = (
  id: string,
  overrides: Partial<FailedEvent> = {},
): FailedEvent => ({
  id,
  timestamp: 1000,
  attemptedAt: 1000,
  eventData: jsonEventCodec.encode({ seq: Number(id) }),
  handlerName: 'gps',
  imei,
  attemptCount: 1,
  abandonedAt: null,
  ...overrides,
});

const createDependencies = (
  handlers: FailedEventHandler[],
  initialEvents: FailedEvent[],
  settingsOverrides: Partial<FullFailedEventSettings> = {},
) => {
  const settings: FullFailedEventSettings = {
    ...defaultSettings,
    retryBackoffBaseInSec: 0,
    ...settingsOverrides,
  };
  const config = { settings };
  const [store, rows] = createInMemoryFailedEventStore(initialEvents);
  const [logger, logs] = getInMemoryLogger('test');
  const dependencies: RetryPassDependencies = {
    store,
    registry: createEventHandlerRegistry(handlers),
    codec: jsonEventCodec,
    strategies: {
      handlerTimeoutStrategy: defaultHandlerTimeoutStrategy(config),
      failedEventRetryStrategy: defaultFailedEventRetryStrategy(config),
      retryBackoffStrategy: defaultRetryBackoffStrategy(config),
    },
    config,
    logger,
  };
  return { dependencies, store, rows, logs };
};

const emptyResult = {
  succeeded: 0,
  failed: 0,
  abandoned: 0,
  undecodable: 0,
  unknownHandler: 0,
  notDue: 0,
  timedOut: false,
};

const succeedingHandler = (handlerName = 'gps'): FailedEventHandler => ({
  handlerName,
  process: jest.fn().mockResolvedValue(undefined),
});

const failingHandler = (handlerName = 'gps'): FailedEventHandler => ({
  handlerName,
  process: jest.fn().mockRejectedValue(new Error('vehicle API down')),
});

describe('runRetryPass', () => {
  beforeEach(() => {
    jest.spyOn(Date, 'now').mockReturnValue(1_050_000);
  });
  afterEach(() => jest.restoreAllMocks());

  it('removes a failed event that was processed successfully', async () => {
    // Arrange
    const handler = succeedingHandler();
    const { dependencies, store, rows } = createDependencies(
      [handler],
      [storedEvent('7')],
    );

    // Act
    const result = await runRetryPass(dependencies);

    // Assert
    expect(result).toEqual({ ...emptyResult, succeeded: 1 });
    expect(handler.process).toHaveBeenCalledWith(
      { seq: 7 },
      expect.objectContaining({
        imei,
        timestamp: 1000,
        attempt: 2,
        failedEventId: '7',
      }),
    );
    expect(rows.has('7')).toBe(false);
    await expect(store.listPending(10)).resolves.toEqual([]);
    await expect(store.remove('7')).resolves.toBeUndefined();
  });

  it('keeps a failed event and updates the attempted at time when the retry fails', async () => {
    // Arrange
    const { dependencies, rows, logs } = createDependencies(
      [failingHandler()],
      [storedEvent('7')],
    );

    // Act
    const result = await runRetryPass(dependencies);

    // Assert
    expect(result).toEqual({ ...emptyResult, failed: 1 });
    expect(rows.get('7')).toEqual({
      ...storedEvent('7'),
      attemptedAt: 1050,
      attemptCount: 2,
    });
    const warning = logs.find((l) => l.type === 'warn');
    expect(warning?.args[1]).toBe(
      'Retrying the failed event 7 failed. It will be retried again.',
    );
  });

  it('abandons a failed event that reached the max attempts', async () => {
    // Arrange
    const handleError = jest.fn().mockResolvedValue(undefined);
    const handler: FailedEventHandler = {
      ...failingHandler(),
      handleError,
    };
    const { dependencies, rows, logs } = createDependencies(
      [handler],
      [storedEvent('7', { attemptCount: 9 })],
      { maxAttempts: 10 },
    );

    // Act
    const result = await runRetryPass(dependencies);

    // Assert
    expect(result).toEqual({ ...emptyResult, abandoned: 1 });
    expect(rows.get('7')).toMatchObject({
      attemptCount: 10,
      attemptedAt: 1050,
      abandonedAt: 1050,
    });
    expect(handleError).toHaveBeenCalledWith(
      expect.objectContaining({ errorCode: 'HANDLER_FAILED' }),
      expect.objectContaining({ id: '7', attemptCount: 10 }),
      false,
    );
    const giveUp = logs.find((l) => l.type === 'error');
    expect(giveUp?.args[0]).toMatchObject({
      errorCode: 'GIVING_UP_EVENT_HANDLING',
    });
    expect(giveUp?.args[1]).toBe(
      'Giving up processing the failed event 7 after 10 attempts.',
    );
  });

  it('does not abandon a failed event when the max attempts protection is disabled', async () => {
    // Arrange
    const { dependencies, rows } = createDependencies(
      [failingHandler()],
      [storedEvent('7', { attemptCount: 20 })],
      { maxAttempts: 10, enableMaxAttemptsProtection: false },
    );

    // Act
    const result = await runRetryPass(dependencies);

    // Assert
    expect(result).toEqual({ ...emptyResult, failed: 1 });
    expect(rows.get('7')?.abandonedAt).toBeNull();
  });

  it('abandons an undecodable failed event without consuming an attempt', async () => {
    // Arrange
    const handler = succeedingHandler();
    const eventData = jsonEventCodec.encode({ lat: 52.52 }).slice(0, -5);
    const { dependencies, rows, logs } = createDependencies(
      [handler],
      [storedEvent('7', { eventData })],
    );

    // Act
    const result = await runRetryPass(dependencies);

    // Assert
    expect(result).toEqual({ ...emptyResult, undecodable: 1 });
    expect(handler.process).not.toHaveBeenCalled();
    expect(rows.get('7')).toEqual({
      ...storedEvent('7', { eventData }),
      attemptedAt: 1000,
      attemptCount: 1,
      abandonedAt: 1050,
    });
    const error = logs.find((l) => l.type === 'error');
    expect(error?.args[0]).toMatchObject({ errorCode: 'DECODE_ERROR' });
    expect(error?.args[1]).toBe(
      'Could not decode the failed event 7. Abandoning it.',
    );
  });

  it('leaves an undecodable failed event untouched when abandoning is disabled', async () => {
    // Arrange
    const eventData = 'not json';
    const { dependencies, rows } = createDependencies(
      [succeedingHandler()],
      [storedEvent('7', { eventData })],
      { abandonUndecodableEvents: false },
    );

    // Act
    const result = await runRetryPass(dependencies);

    // Assert
    expect(result).toEqual({ ...emptyResult, undecodable: 1 });
    expect(rows.get('7')).toEqual(storedEvent('7', { eventData }));
  });

  it('treats an event that the handler cannot parse as undecodable', async () => {
    // Arrange
    const handler: FailedEventHandler<{ lat: number }> = {
      handlerName: 'gps',
      process: jest.fn(),
      parseEvent: (value) => {
        if (
          typeof value === 'object' &&
          value !== null &&
          'lat' in value &&
          typeof value.lat === 'number'
        ) {
          return { lat: value.lat };
        }
        throw new Error('The GPS event has no latitude.');
      },
    };
    const { dependencies, rows } = createDependencies(
      [handler],
      [storedEvent('7')],
    );

    // Act
    const result = await runRetryPass(dependencies);

    // Assert
    expect(result).toEqual({ ...emptyResult, undecodable: 1 });
    expect(handler.process).not.toHaveBeenCalled();
    expect(rows.get('7')?.abandonedAt).toBe(1050);
  });

  it('skips a failed event without a registered handler and continues with the batch', async () => {
    // Arrange
    const handler = succeedingHandler();
    const { dependencies, rows, logs } = createDependencies(
      [handler],
      [
        storedEvent('1', { handlerName: 'obd', timestamp: 100 }),
        storedEvent('2', { timestamp: 200, imei: '356938035643809' }),
      ],
    );

    // Act
    const result = await runRetryPass(dependencies);

    // Assert
    expect(result).toEqual({ ...emptyResult, succeeded: 1, unknownHandler: 1 });
    expect(rows.get('1')).toEqual(
      storedEvent('1', { handlerName: 'obd', timestamp: 100 }),
    );
    expect(rows.has('2')).toBe(false);
    const error = logs.find((l) => l.type === 'error');
    expect(error?.args[0]).toMatchObject({
      errorCode: 'UNKNOWN_HANDLER',
      message: 'No event handler is registered for the handler name "obd".',
    });
  });

  it('counts a failed event that is still in its backoff time as not due', async () => {
    // Arrange
    const handler = succeedingHandler();
    const { dependencies, rows } = createDependencies(
      [handler],
      [storedEvent('7')],
      { retryBackoffBaseInSec: 60 },
    );

    // Act
    const result = await runRetryPass(dependencies);

    // Assert
    expect(result).toEqual({ ...emptyResult, notDue: 1 });
    expect(handler.process).not.toHaveBeenCalled();
    expect(rows.get('7')).toEqual(storedEvent('7'));
  });

  it('counts a handler that does not finish within the timeout as failed', async () => {
    // Arrange
    const handler: FailedEventHandler = {
      handlerName: 'gps',
      process: () => sleep(200),
    };
    const { dependencies, rows } = createDependencies(
      [handler],
      [storedEvent('7')],
      { handlerTimeoutInMs: 10 },
    );

    // Act
    const result = await runRetryPass(dependencies);

    // Assert
    expect(result).toEqual({ ...emptyResult, failed: 1 });
    expect(rows.get('7')?.attemptCount).toBe(2);
  });

  it('retries the failed events of one device in timestamp order', async () => {
    // Arrange
    const order: string[] = [];
    const handler: FailedEventHandler = {
      handlerName: 'gps',
      process: async (_event: unknown, context: EventHandlerContext) => {
        await sleep(context.timestamp === 100 ? 30 : 1);
        order.push(`${context.imei}:${context.timestamp}`);
      },
    };
    const { dependencies } = createDependencies(
      [handler],
      [
        storedEvent('1', { timestamp: 300 }),
        storedEvent('2', { timestamp: 100 }),
        storedEvent('3', { timestamp: 150, imei: '356938035643809' }),
        storedEvent('4', { timestamp: 200 }),
      ],
    );

    // Act
    const result = await runRetryPass(dependencies);

    // Assert
    expect(result).toEqual({ ...emptyResult, succeeded: 4 });
    expect(order.filter((o) => o.startsWith(imei))).toEqual([
      `${imei}:100`,
      `${imei}:200`,
      `${imei}:300`,
    ]);
    expect(order[0]).toBe('356938035643809:150');
  });

  it('pages through all pending failed events in batches', async () => {
    // Arrange
    const { dependencies, store, rows } = createDependencies(
      [failingHandler()],
      ['1', '2', '3', '4', '5'].map((id) =>
        storedEvent(id, { timestamp: Number(id) }),
      ),
      { retryBatchSize: 2 },
    );
    const listPending = jest.spyOn(store, 'listPending');

    // Act
    const result = await runRetryPass(dependencies);

    // Assert
    expect(result).toEqual({ ...emptyResult, failed: 5 });
    expect(listPending.mock.calls).toEqual([
      [2, undefined],
      [2, { after: { timestamp: 2, id: '2' } }],
      [2, { after: { timestamp: 4, id: '4' } }],
    ]);
    expect([...rows.values()].map((r) => r.attemptCount)).toEqual([
      2, 2, 2, 2, 2,
    ]);
  });

  it('tolerates a failed event that was removed concurrently', async () => {
    // Arrange
    const { dependencies, store, logs } = createDependencies(
      [failingHandler()],
      [storedEvent('7')],
    );
    jest
      .spyOn(store, 'markRetried')
      .mockRejectedValue(new NotFoundError('7'));

    // Act
    const result = await runRetryPass(dependencies);

    // Assert
    expect(result).toEqual({ ...emptyResult, failed: 1 });
    expect(logs.map((l) => l.args[0])).toContain(
      'The failed event 7 was removed while it was retried. Skipping the attempt update.',
    );
  });

  it('stops the pass on a store error', async () => {
    // Arrange
    const { dependencies, store } = createDependencies(
      [failingHandler()],
      [storedEvent('1'), storedEvent('2', { imei: '356938035643809' })],
    );
    const error = new StorageError('Could not update the failed event attempt.');
    jest.spyOn(store, 'markRetried').mockRejectedValue(error);
    const listPending = jest.spyOn(store, 'listPending');

    // Act + Assert
    await expect(runRetryPass(dependencies)).rejects.toBe(error);
    expect(listPending).toHaveBeenCalledTimes(1);
  });

  it('stops when the pass timeout is reached', async () => {
    // Arrange
    const handler = succeedingHandler();
    const { dependencies } = createDependencies(
      [handler],
      [storedEvent('7')],
      { retryPassTimeoutInMs: 0 },
    );

    // Act
    const result = await runRetryPass(dependencies);

    // Assert
    expect(result).toEqual({ ...emptyResult, timedOut: true });
    expect(handler.process).not.toHaveBeenCalled();
  });

  it('does not start when the signal is stopped', async () => {
    // Arrange
    const { dependencies, store } = createDependencies(
      [succeedingHandler()],
      [storedEvent('7')],
    );
    const listPending = jest.spyOn(store, 'listPending');

    // Act
    const result = await runRetryPass(dependencies, { stopped: true });

    // Assert
    expect(result).toEqual(emptyResult);
    expect(listPending).not.toHaveBeenCalled();
  });
});
