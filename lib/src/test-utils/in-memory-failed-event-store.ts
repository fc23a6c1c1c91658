import { NotFoundError } from '../common/error';
import { epochSeconds } from '../common/utils';
import { FailedEvent, NewFailedEvent } from '../failed-event/failed-event';
import {
  FailedEventStats,
  FailedEventStore,
  ListPendingOptions,
} from '../failed-event/failed-event-store';

const compare = (
  a: Pick<FailedEvent, 'timestamp' | 'id'>,
  b: Pick<FailedEvent, 'timestamp' | 'id'>,
) => a.timestamp - b.timestamp || Number(a.id) - Number(b.id);

/**
 * A failed event store that keeps the failed events in a map. It follows the
 * ordering and attempt rules of the PostgreSQL store and is meant for tests.
 * @param initialEvents Failed events that should already exist. Their ids must be numeric strings.
 * @returns The store and the map of the stored failed events by their id
 */
export const createInMemoryFailedEventStore = (
  initialEvents: FailedEvent[] = [],
): [store: FailedEventStore, rows: Map<string, FailedEvent>] => {
  const rows = new Map<string, FailedEvent>();
  let lastId = 0;
  for (const event of initialEvents) {
    rows.set(event.id, { ...event });
    lastId = Math.max(lastId, Number(event.id));
  }

  const get = (id: string): FailedEvent => {
    const row = rows.get(id);
    if (!row) {
      throw new NotFoundError(id);
    }
    return row;
  };

  const store: FailedEventStore = {
    record: async (event: NewFailedEvent): Promise<string> => {
      const id = String(++lastId);
      rows.set(id, {
        id,
        timestamp: event.timestamp,
        attemptedAt: Math.max(
          event.attemptedAt ?? epochSeconds(),
          event.timestamp,
        ),
        eventData: event.eventData,
        handlerName: event.handlerName,
        imei: event.imei,
        attemptCount: 1,
        abandonedAt: null,
      });
      return id;
    },

    listPending: async (
      limit: number,
      options?: ListPendingOptions,
    ): Promise<FailedEvent[]> => {
      if (limit <= 0) {
        return [];
      }
      const { before, after } = options ?? {};
      return [...rows.values()]
        .filter(
          (row) =>
            row.abandonedAt === null &&
            (before === undefined || row.timestamp < before) &&
            (after === undefined || compare(row, after) > 0),
        )
        .sort(compare)
        .slice(0, limit)
        .map((row) => ({ ...row }));
    },

    markRetried: async (
      id: string,
      attemptedAt: number,
    ): Promise<FailedEvent> => {
      const row = get(id);
      row.attemptedAt = Math.max(attemptedAt, row.timestamp);
      row.attemptCount++;
      return { ...row };
    },

    markAbandoned: async (id: string, abandonedAt: number): Promise<void> => {
      get(id).abandonedAt = abandonedAt;
    },

    remove: async (id: string): Promise<void> => {
      rows.delete(id);
    },

    listByImei: async (imei: string, limit: number): Promise<FailedEvent[]> =>
      [...rows.values()]
        .filter((row) => row.imei === imei)
        .sort(compare)
        .slice(0, limit)
        .map((row) => ({ ...row })),

    nextFailedImei: async (): Promise<string | null> => {
      const pending = [...rows.values()].filter(
        (row) => row.abandonedAt === null,
      );
      pending.sort((a, b) => b.attemptedAt - a.attemptedAt);
      return pending[0]?.imei ?? null;
    },

    getStats: async (): Promise<FailedEventStats> => {
      const all = [...rows.values()];
      const pending = all.filter((row) => row.abandonedAt === null);
      return {
        pending: pending.length,
        abandoned: all.length - pending.length,
        oldestPendingTimestamp:
          pending.length > 0
            ? Math.min(...pending.map((row) => row.timestamp))
            : null,
      };
    },
  };
  return [store, rows];
};
