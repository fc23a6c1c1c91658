import { FullFailedEventConfig } from '../common/config';
import { DatabaseClient } from '../common/database';
import { ensureExtendedError } from '../common/error';
import { FailedEventLogger } from '../common/logger';
import { epochSeconds } from '../common/utils';

/**
 * Deletes abandoned failed events. Pending failed events are never deleted
 * here: they stay until a retry succeeds or they are abandoned.
 * @param client A database client or directly the database pool. The used DB role must have permissions to delete failed events.
 * @param config The configuration settings that define the database table and the retention time.
 * @returns The number of deleted rows
 */
export const runFailedEventCleanupOnce = async (
  client: DatabaseClient,
  {
    settings: { dbSchema, dbTable, cleanupAbandonedInSec },
  }: Pick<FullFailedEventConfig, 'settings'>,
): Promise<number> => {
  if (!cleanupAbandonedInSec) {
    return 0;
  }
  const result = await client.query(
    /* sql */ `DELETE FROM ${dbSchema}.${dbTable} WHERE abandoned_at IS NOT NULL AND abandoned_at < $1 RETURNING id;`,
    [epochSeconds() - cleanupAbandonedInSec],
  );
  return result.rowCount ?? 0;
};

/**
 * Runs the abandoned failed event cleanup in the configured interval.
 * @param pool The database pool that should be used to run the cleanup queries.
 * @param config The configuration settings that define the table, the interval and the retention time.
 * @param logger A logger object used to log processing issues.
 * @returns A timeout from setInterval that you must clear once the cleanup should be stopped or undefined if the cleanup is disabled.
 */
export const runScheduledFailedEventCleanup = (
  pool: DatabaseClient,
  config: Pick<FullFailedEventConfig, 'settings'>,
  logger: FailedEventLogger,
): NodeJS.Timeout | undefined => {
  const { settings } = config;
  if (!settings.cleanupIntervalInMs || !settings.cleanupAbandonedInSec) {
    return undefined;
  }
  return setInterval(() => {
    runFailedEventCleanupOnce(pool, config)
      .then((deleted) => {
        if (deleted > 0) {
          logger.info(`Deleted ${deleted} abandoned failed events during cleanup.`);
        } else {
          logger.trace('Deleted no abandoned failed events during cleanup.');
        }
      })
      .catch((e) => {
        const err = ensureExtendedError(e, 'EVENT_CLEANUP_ERROR');
        logger.warn(err, 'Could not run the failed event cleanup logic.');
      });
  }, settings.cleanupIntervalInMs);
};
