import { QueryResult, QueryResultRow } from 'pg';
import { FullFailedEventConfig } from '../common/config';
import { DatabaseClient } from '../common/database';
import {
  FailedEventStoreError,
  NotFoundError,
  StorageError,
} from '../common/error';
import { FailedEventLogger } from '../common/logger';
import { epochSeconds } from '../common/utils';
import {
  FailedEvent,
  NewFailedEvent,
  maxHandlerNameLength,
  maxImeiLength,
} from './failed-event';
import {
  FailedEventStats,
  FailedEventStore,
  ListPendingOptions,
} from './failed-event-store';

/** The failed event row as it is returned from the "pg" library. BIGINT values are strings. */
type FailedEventRow = {
  id: string;
  timestamp: string;
  attempted_at: string;
  event_data: string;
  handler_name: string;
  imei: string;
  attempt_count: number;
  abandoned_at: string | null;
};

type FailedEventStatsRow = {
  pending: string;
  abandoned: string;
  oldest_pending_timestamp: string | null;
};

const columns = /* sql */ `id, "timestamp", attempted_at, event_data, handler_name, imei, attempt_count, abandoned_at`;

/**
 * Creates the failed event store that persists failed events in a PostgreSQL
 * table. Every operation is a single SQL statement so no explicit transaction
 * is needed.
 * @param client The database pool (or client) to run the queries with.
 * @param config The configuration settings that define the database schema and table.
 * @param logger A logger instance for logging trace up to error logs.
 * @returns The failed event store.
 */
export const createPostgresFailedEventStore = (
  client: DatabaseClient,
  { settings }: Pick<FullFailedEventConfig, 'settings'>,
  logger: FailedEventLogger,
): FailedEventStore => {
  const table = `${settings.dbSchema}.${settings.dbTable}`;

  const query = async <T extends QueryResultRow>(
    action: string,
    sql: string,
    values: unknown[],
  ): Promise<QueryResult<T>> => {
    try {
      return await client.query(sql, values);
    } catch (error) {
      throw new StorageError(`Could not ${action}.`, error);
    }
  };

  return {
    record: async (event: NewFailedEvent): Promise<string> => {
      validateNewFailedEvent(event);
      const attemptedAt = Math.max(
        event.attemptedAt ?? epochSeconds(),
        event.timestamp,
      );
      const result = await query<{ id: string }>(
        'store the failed event',
        /* sql */ `INSERT INTO ${table} ("timestamp", attempted_at, event_data, handler_name, imei) VALUES ($1, $2, $3, $4, $5) RETURNING id;`,
        [
          event.timestamp,
          attemptedAt,
          event.eventData,
          event.handlerName,
          event.imei,
        ],
      );
      const id = result.rows[0]?.id;
      if (id === undefined) {
        throw new StorageError(
          'The database did not return an id for the stored failed event.',
        );
      }
      logger.debug(
        { id, handlerName: event.handlerName, imei: event.imei },
        `Stored the failed event with id ${id}.`,
      );
      return String(id);
    },

    listPending: async (
      limit: number,
      options?: ListPendingOptions,
    ): Promise<FailedEvent[]> => {
      if (limit <= 0) {
        return [];
      }
      const values: unknown[] = [];
      let sql = /* sql */ `SELECT ${columns} FROM ${table} WHERE abandoned_at IS NULL`;
      if (options?.before !== undefined) {
        values.push(options.before);
        sql += /* sql */ ` AND "timestamp" < $${values.length}`;
      }
      if (options?.after) {
        values.push(options.after.timestamp, options.after.id);
        sql += /* sql */ ` AND ("timestamp", id) > ($${values.length - 1}, $${
          values.length
        })`;
      }
      values.push(limit);
      sql += /* sql */ ` ORDER BY "timestamp" ASC, id ASC LIMIT $${values.length};`;
      const result = await query<FailedEventRow>(
        'list the pending failed events',
        sql,
        values,
      );
      return result.rows.map(mapFailedEvent);
    },

    markRetried: async (
      id: string,
      attemptedAt: number,
    ): Promise<FailedEvent> => {
      if (!isStoredId(id)) {
        throw new NotFoundError(id);
      }
      logger.debug(`Updating the attempted at time of the failed event ${id}.`);
      const result = await query<FailedEventRow>(
        'update the failed event attempt',
        /* sql */ `UPDATE ${table} SET attempted_at = GREATEST($2, "timestamp"), attempt_count = attempt_count + 1 WHERE id = $1 RETURNING ${columns};`,
        [id, attemptedAt],
      );
      const row = result.rows[0];
      if (!row) {
        throw new NotFoundError(id);
      }
      return mapFailedEvent(row);
    },

    markAbandoned: async (id: string, abandonedAt: number): Promise<void> => {
      if (!isStoredId(id)) {
        throw new NotFoundError(id);
      }
      logger.debug(`Abandoning the failed event ${id}.`);
      const result = await query(
        'abandon the failed event',
        /* sql */ `UPDATE ${table} SET abandoned_at = $2 WHERE id = $1;`,
        [id, abandonedAt],
      );
      if (!result.rowCount) {
        throw new NotFoundError(id);
      }
    },

    remove: async (id: string): Promise<void> => {
      if (!isStoredId(id)) {
        return;
      }
      logger.debug(`Deleting the failed event ${id}.`);
      await query(
        'delete the failed event',
        /* sql */ `DELETE FROM ${table} WHERE id = $1;`,
        [id],
      );
    },

    listByImei: async (imei: string, limit: number): Promise<FailedEvent[]> => {
      const result = await query<FailedEventRow>(
        'list the failed events of the device',
        /* sql */ `SELECT ${columns} FROM ${table} WHERE imei = $1 ORDER BY "timestamp" ASC, id ASC LIMIT $2;`,
        [imei, limit],
      );
      return result.rows.map(mapFailedEvent);
    },

    nextFailedImei: async (): Promise<string | null> => {
      const result = await query<{ imei: string }>(
        'find the next failed device',
        /* sql */ `SELECT imei FROM ${table} WHERE abandoned_at IS NULL ORDER BY attempted_at DESC LIMIT 1;`,
        [],
      );
      return result.rows[0]?.imei ?? null;
    },

    getStats: async (): Promise<FailedEventStats> => {
      const result = await query<FailedEventStatsRow>(
        'load the failed event statistics',
        /* sql */ `SELECT COUNT(*) FILTER (WHERE abandoned_at IS NULL) AS pending, COUNT(*) FILTER (WHERE abandoned_at IS NOT NULL) AS abandoned, MIN("timestamp") FILTER (WHERE abandoned_at IS NULL) AS oldest_pending_timestamp FROM ${table};`,
        [],
      );
      const row = result.rows[0];
      return {
        pending: Number(row?.pending ?? 0),
        abandoned: Number(row?.abandoned ?? 0),
        oldestPendingTimestamp:
          row?.oldest_pending_timestamp != null
            ? Number(row.oldest_pending_timestamp)
            : null,
      };
    },
  };
};

const validateNewFailedEvent = ({
  handlerName,
  imei,
  timestamp,
  attemptedAt,
}: NewFailedEvent): void => {
  const problems: string[] = [];
  if (!handlerName || handlerName.length > maxHandlerNameLength) {
    problems.push(
      `the handler name must have between 1 and ${maxHandlerNameLength} characters`,
    );
  }
  if (!imei || imei.length > maxImeiLength) {
    problems.push(`the IMEI must have between 1 and ${maxImeiLength} characters`);
  }
  if (!Number.isSafeInteger(timestamp)) {
    problems.push('the timestamp must be an integer (epoch seconds)');
  }
  if (attemptedAt !== undefined && !Number.isSafeInteger(attemptedAt)) {
    problems.push('the attempted at time must be an integer (epoch seconds)');
  }
  if (problems.length > 0) {
    throw new FailedEventStoreError(
      `The failed event cannot be stored: ${problems.join(', ')}.`,
      'INVALID_FAILED_EVENT',
    );
  }
};

const mapFailedEvent = (row: FailedEventRow): FailedEvent => ({
  id: String(row.id),
  timestamp: Number(row.timestamp),
  attemptedAt: Number(row.attempted_at),
  eventData: row.event_data,
  handlerName: row.handler_name,
  imei: row.imei,
  attemptCount: Number(row.attempt_count),
  abandonedAt: row.abandoned_at !== null ? Number(row.abandoned_at) : null,
});

/** Ids are BIGSERIAL values. Anything else cannot match a stored row. */
const isStoredId = (id: string): boolean => /^\d{1,19}$/.test(id);
