import { FailedEventStoreError } from './error';

/**
 * Sleep for a given amount of milliseconds
 * @param milliseconds The time in milliseconds to sleep
 * @returns The (void) promise to await
 */
export const sleep = async (milliseconds: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, milliseconds));

/**
 * Run a promise but make sure to wait only a maximum amount of time for it to finish.
 * @param promise The promise to execute
 * @param timeoutInMs The amount of time in milliseconds to wait for the promise to finish
 * @param failureMessage The message for the error if the timeout was reached
 * @returns The promise return value or a timeout error is thrown
 */
export const awaitWithTimeout = <T>(
  promise: () => Promise<T>,
  timeoutInMs: number,
  failureMessage?: string,
): Promise<T> => {
  let timeoutHandle: NodeJS.Timeout;
  const timeoutPromise = new Promise<never>((_resolve, reject) => {
    timeoutHandle = setTimeout(
      () =>
        reject(
          new FailedEventStoreError(failureMessage ?? 'Timeout', 'TIMEOUT'),
        ),
      timeoutInMs,
    );
  });

  // A synchronous throw of the callback must still clear the timer.
  const work = Promise.resolve().then(promise);
  return Promise.race([work, timeoutPromise]).finally(() =>
    clearTimeout(timeoutHandle),
  );
};

/**
 * The current time in whole seconds since the unix epoch. All failed event
 * timestamps use this unit.
 */
export const epochSeconds = (): number => Math.floor(Date.now() / 1000);
