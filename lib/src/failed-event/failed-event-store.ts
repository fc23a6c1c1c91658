import { FailedEvent, NewFailedEvent, PendingCursor } from './failed-event';

export interface ListPendingOptions {
  /** Only return events with a timestamp lower than this value (epoch seconds). */
  before?: number;
  /** Only return events that are ordered after this cursor. */
  after?: PendingCursor;
}

export interface FailedEventStats {
  /** The number of failed events that are still retried. */
  pending: number;
  /** The number of failed events that were excluded from automatic retries. */
  abandoned: number;
  /** The origin timestamp of the oldest pending event (epoch seconds). */
  oldestPendingTimestamp: number | null;
}

/**
 * Durable storage of failed events. Every operation reads or writes the
 * database directly. Nothing is cached between calls.
 */
export interface FailedEventStore {
  /**
   * Insert a new failed event.
   * @returns The id of the stored failed event.
   * @throws StorageError if the database is not available or rejects the insert.
   */
  record(event: NewFailedEvent): Promise<string>;

  /**
   * List the failed events that are not abandoned, ordered by their origin
   * timestamp (and id) ascending.
   */
  listPending(
    limit: number,
    options?: ListPendingOptions,
  ): Promise<FailedEvent[]>;

  /**
   * Set the attempted at time of a failed event and increase its attempt count.
   * @returns The updated failed event.
   * @throws NotFoundError if the failed event does not exist (anymore).
   */
  markRetried(id: string, attemptedAt: number): Promise<FailedEvent>;

  /**
   * Exclude a failed event from further automatic retries. It is kept in the
   * table for inspection.
   * @throws NotFoundError if the failed event does not exist (anymore).
   */
  markAbandoned(id: string, abandonedAt: number): Promise<void>;

  /** Delete a failed event. Deleting a missing failed event or an id that was never assigned is not an error. */
  remove(id: string): Promise<void>;

  /** List all failed events of one device ordered by their origin timestamp. */
  listByImei(imei: string, limit: number): Promise<FailedEvent[]>;

  /** Get the IMEI of the pending failed event that was attempted most recently. */
  nextFailedImei(): Promise<string | null>;

  /** Get the row counts and the staleness of the failed events. */
  getStats(): Promise<FailedEventStats>;
}
