import { FailedEvent } from '../failed-event/failed-event';

/**
 * A concurrency controller that defines how concurrency must be handled when
 * retrying failed events: in parallel and/or sequentially.
 */
export interface ConcurrencyController {
  /** Acquire a lock (if any) and return a function to release it. */
  acquire(failedEvent: FailedEvent): Promise<() => void>;
}
