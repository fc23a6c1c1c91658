/** The data to store when an event handler failed to process an event. */
export interface NewFailedEvent {
  /** The encoded event payload. It is opaque to the store. */
  eventData: string;
  /** The name of the handler that failed and that must reprocess the event (max 191 characters). */
  handlerName: string;
  /** The IMEI of the device/vehicle which sent the event (max 20 characters). */
  imei: string;
  /** The origin time of the event in epoch seconds. */
  timestamp: number;
  /** The time of the failed processing attempt in epoch seconds. Defaults to now. */
  attemptedAt?: number;
}

/** A failed event as it is stored in the failed event table. */
export interface FailedEvent {
  /** The unique identifier assigned by the database (64-bit integer as string). */
  id: string;
  /** The origin time of the event in epoch seconds. */
  timestamp: number;
  /** The time of the most recent failed processing attempt in epoch seconds. */
  attemptedAt: number;
  /** The encoded event payload. */
  eventData: string;
  /** The name of the handler that must reprocess the event. */
  handlerName: string;
  /** The IMEI of the device/vehicle which sent the event. */
  imei: string;
  /** The number of failed processing attempts, including the initial one. */
  attemptCount: number;
  /** The time in epoch seconds when the event was excluded from automatic retries. */
  abandonedAt: number | null;
}

/** Position after which `listPending` continues when paging through the table. */
export interface PendingCursor {
  timestamp: number;
  id: string;
}

export const maxHandlerNameLength = 191;
export const maxImeiLength = 20;
