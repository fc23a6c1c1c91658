import { Client, ClientBase, ClientConfig, Pool, PoolClient } from 'pg';
import { ensureExtendedError } from './error';
import { FailedEventLogger } from './logger';

/**
 * This interface combines the used query functions from the 'pg' library
 * `Pool`, `Client`, `ClientBase`, and `PoolClient`.
 */
export declare type DatabaseClient = Pool | PoolClient | ClientBase | Client;

/**
 * Creates the PostgreSQL pool used by the failed event store and attaches
 * error and notice logging.
 * @param dbConfig The "pg" library connection settings
 * @param logger The logger for pool errors and notices
 * @returns The created pool
 */
export const createDatabasePool = (
  dbConfig: ClientConfig,
  logger: FailedEventLogger,
): Pool => {
  const pool = new Pool(dbConfig);
  pool.on('error', (error) => {
    logger.error(ensureExtendedError(error, 'DB_ERROR'), 'PostgreSQL pool error');
  });
  pool.on('connect', (client) => {
    client.removeAllListeners('notice');
    client.on('notice', (msg) => {
      logger.trace(`raised notice ${msg.message}`);
    });
  });
  return pool;
};
