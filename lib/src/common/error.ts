import { FailedEvent } from '../failed-event/failed-event';

export type ErrorCode =
  | 'DB_ERROR'
  | 'STORAGE_ERROR'
  | 'NOT_FOUND'
  | 'INVALID_FAILED_EVENT'
  | 'ENCODE_ERROR'
  | 'DECODE_ERROR'
  | 'UNKNOWN_HANDLER'
  | 'HANDLER_FAILED'
  | 'GIVING_UP_EVENT_HANDLING'
  | 'CONFLICTING_EVENT_HANDLERS'
  | 'NO_EVENT_HANDLER_REGISTERED'
  | 'TIMEOUT'
  | 'RETRY_PASS_FAILED'
  | 'EVENT_CLEANUP_ERROR';

export interface ExtendedError extends Error {
  errorCode: ErrorCode;
  innerError?: Error;
}

/** An error that was raised from the failed event library. Includes an error code. */
export class FailedEventStoreError extends Error implements ExtendedError {
  public innerError?: Error;
  constructor(
    message: string,
    public errorCode: ErrorCode,
    innerError?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.innerError = ensureError(innerError);
  }
}

/** An error that was raised when working on a specific stored failed event. */
export class FailedEventError extends FailedEventStoreError {
  constructor(
    message: string,
    errorCode: ErrorCode,
    public failedEvent: FailedEvent,
    innerError?: unknown,
  ) {
    super(message, errorCode, innerError);
    this.name = this.constructor.name;
  }
}

/** The database is unreachable or rejected a read or write. */
export class StorageError extends FailedEventStoreError {
  constructor(message: string, innerError?: unknown) {
    super(message, 'STORAGE_ERROR', innerError);
  }
}

/** The failed event does not exist (anymore). Usually removed by a concurrent successful retry. */
export class NotFoundError extends FailedEventStoreError {
  constructor(public failedEventId: string) {
    super(`The failed event with id ${failedEventId} was not found.`, 'NOT_FOUND');
  }
}

/** The stored event data is corrupt and cannot be turned back into an event. */
export class DecodeError extends FailedEventStoreError {
  constructor(message: string, innerError?: unknown) {
    super(message, 'DECODE_ERROR', innerError);
  }
}

/** No event handler is registered for the stored handler name. */
export class UnknownHandlerError extends FailedEventStoreError {
  constructor(public handlerName: string) {
    super(
      `No event handler is registered for the handler name "${handlerName}".`,
      'UNKNOWN_HANDLER',
    );
  }
}

/** The event handler threw an error while processing an event. */
export class HandlerError extends FailedEventStoreError {
  constructor(
    message: string,
    public handlerName: string,
    innerError?: unknown,
  ) {
    super(message, 'HANDLER_FAILED', innerError);
  }
}

/**
 * Returns the error as verified Error object or wraps the input as
 * ExtendedError with error code and potential innerError.
 * @param error The error variable to check
 * @param fallbackErrorCode The error code to use if the error has none yet
 * @returns The error if the input was already an error otherwise a wrapped error. Enriched with the error code property.
 */
export const ensureExtendedError = (
  error: unknown,
  fallbackErrorCode: ErrorCode,
): ExtendedError => {
  if (error instanceof FailedEventStoreError) {
    return error;
  }
  const err = ensureError(error) ?? new Error('Unknown error');
  return Object.assign(err, { errorCode: fallbackErrorCode });
};

const ensureError = (error: unknown): Error | undefined => {
  if (error === null || error === undefined) {
    return undefined;
  }
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
};
