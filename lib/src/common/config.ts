import { ClientConfig } from 'pg';
import {
  Env,
  SettingDescription,
  getEnvVariableBoolean,
  getEnvVariableNumber,
  getEnvVariableString,
  printConfigSettings,
} from './env-settings';

export type FullFailedEventConfig = Required<FailedEventConfig> & {
  settings: FullFailedEventSettings;
};

export type FullFailedEventSettings = Required<FailedEventSettings>;

export interface FailedEventConfig {
  /**
   * The "pg" library based settings to initialize the PostgreSQL connection
   * pool. The user needs select, insert, update, and delete permissions on the
   * failed event table.
   */
  dbConfig: ClientConfig;
  /** Failed event store and retry coordinator settings */
  settings: FailedEventSettings;
}

export interface FailedEventSettings {
  /** The database schema name where the table is located. Default is "public". */
  dbSchema?: string;
  /** The database table of the failed events. Default is "failed_event". */
  dbTable?: string;
  /** Time in milliseconds between the end of one retry pass and the start of the next one. Default is 30s. */
  retryIntervalInMs?: number;
  /** The number of failed events loaded at once while paging through the table. Default is 50. */
  retryBatchSize?: number;
  /**
   * The number of devices (IMEIs) whose failed events are retried in parallel.
   * Events of the same device are always retried one after the other. Default is 5.
   */
  retryConcurrency?: number;
  /**
   * A retry pass stops taking new failed events after this time in
   * milliseconds. The remaining ones are picked up by the next pass. Default is 5 minutes.
   */
  retryPassTimeoutInMs?: number;
  /**
   * Event handlers that do not finish can block further events from being
   * processed. A handler that takes longer than this timeout (in milliseconds)
   * counts as failed. Default is 15s.
   */
  handlerTimeoutInMs?: number;
  /**
   * The maximum number of failed attempts for one event. Once reached, the
   * event is abandoned: it stays in the table but is not retried anymore.
   * Default is 10.
   */
  maxAttempts?: number;
  /** Enable the max attempts protection. Defaults to true. */
  enableMaxAttemptsProtection?: boolean;
  /**
   * Abandon failed events whose stored data cannot be decoded. When disabled
   * they are left untouched and are reported again on every pass. Default is true.
   */
  abandonUndecodableEvents?: boolean;
  /** The delay in seconds before the first retry. It doubles with every further failed attempt. Default is 60. */
  retryBackoffBaseInSec?: number;
  /** The maximum delay in seconds between two retries. Default is 3600. */
  retryBackoffMaxInSec?: number;
  /**
   * Time in milliseconds between the executions of the abandoned event
   * cleanup. Leave it zero to disable the cleanup (default).
   */
  cleanupIntervalInMs?: number;
  /** Delete abandoned events where the abandoned_at value is older than this in seconds. Zero (default) disables it. */
  cleanupAbandonedInSec?: number;
}

export const defaultSettings: FullFailedEventSettings = {
  dbSchema: 'public',
  dbTable: 'failed_event',
  retryIntervalInMs: 30_000,
  retryBatchSize: 50,
  retryConcurrency: 5,
  retryPassTimeoutInMs: 5 * 60 * 1000,
  handlerTimeoutInMs: 15_000,
  maxAttempts: 10,
  enableMaxAttemptsProtection: true,
  abandonUndecodableEvents: true,
  retryBackoffBaseInSec: 60,
  retryBackoffMaxInSec: 60 * 60,
  cleanupIntervalInMs: 0,
  cleanupAbandonedInSec: 0,
};

export const applyDefaultFailedEventConfigValues = (
  config: FailedEventConfig,
): FullFailedEventConfig => ({
  ...config,
  settings: {
    ...defaultSettings,
    ...config.settings,
  },
});

export const envPrefix = 'FAILED_EVENT_';

const settingsMap: SettingDescription[] = [
  { constantName: 'DB_SCHEMA', default: defaultSettings.dbSchema },
  { constantName: 'DB_TABLE', default: defaultSettings.dbTable },
  {
    constantName: 'RETRY_INTERVAL_IN_MS',
    default: defaultSettings.retryIntervalInMs,
  },
  { constantName: 'RETRY_BATCH_SIZE', default: defaultSettings.retryBatchSize },
  {
    constantName: 'RETRY_CONCURRENCY',
    default: defaultSettings.retryConcurrency,
  },
  {
    constantName: 'RETRY_PASS_TIMEOUT_IN_MS',
    default: defaultSettings.retryPassTimeoutInMs,
  },
  {
    constantName: 'HANDLER_TIMEOUT_IN_MS',
    default: defaultSettings.handlerTimeoutInMs,
  },
  { constantName: 'MAX_ATTEMPTS', default: defaultSettings.maxAttempts },
  {
    constantName: 'ENABLE_MAX_ATTEMPTS_PROTECTION',
    default: defaultSettings.enableMaxAttemptsProtection,
  },
  {
    constantName: 'ABANDON_UNDECODABLE_EVENTS',
    default: defaultSettings.abandonUndecodableEvents,
  },
  {
    constantName: 'RETRY_BACKOFF_BASE_IN_SEC',
    default: defaultSettings.retryBackoffBaseInSec,
  },
  {
    constantName: 'RETRY_BACKOFF_MAX_IN_SEC',
    default: defaultSettings.retryBackoffMaxInSec,
  },
  {
    constantName: 'CLEANUP_INTERVAL_IN_MS',
    default: defaultSettings.cleanupIntervalInMs,
  },
  {
    constantName: 'CLEANUP_ABANDONED_IN_SEC',
    default: defaultSettings.cleanupAbandonedInSec,
  },
];

/**
 * Loads the environment variables into the failed event settings object.
 * Please use the `printFailedEventEnvVariables` function to get a list of all
 * the supported variables.
 * @example
 * FAILED_EVENT_DB_SCHEMA=telematics
 * FAILED_EVENT_DB_TABLE=failed_event
 * FAILED_EVENT_MAX_ATTEMPTS=20
 * @param env The process.env variable or a custom object.
 * @returns The settings object filled with the ENV variables or the defaults
 */
export const getFailedEventSettings = (
  env: Env = process.env,
): FullFailedEventSettings => {
  const key = (constantName: string) => `${envPrefix}${constantName}`;
  const d = defaultSettings;
  return {
    dbSchema: getEnvVariableString(env, key('DB_SCHEMA'), d.dbSchema),
    dbTable: getEnvVariableString(env, key('DB_TABLE'), d.dbTable),
    retryIntervalInMs: getEnvVariableNumber(
      env,
      key('RETRY_INTERVAL_IN_MS'),
      d.retryIntervalInMs,
    ),
    retryBatchSize: getEnvVariableNumber(
      env,
      key('RETRY_BATCH_SIZE'),
      d.retryBatchSize,
    ),
    retryConcurrency: getEnvVariableNumber(
      env,
      key('RETRY_CONCURRENCY'),
      d.retryConcurrency,
    ),
    retryPassTimeoutInMs: getEnvVariableNumber(
      env,
      key('RETRY_PASS_TIMEOUT_IN_MS'),
      d.retryPassTimeoutInMs,
    ),
    handlerTimeoutInMs: getEnvVariableNumber(
      env,
      key('HANDLER_TIMEOUT_IN_MS'),
      d.handlerTimeoutInMs,
    ),
    maxAttempts: getEnvVariableNumber(env, key('MAX_ATTEMPTS'), d.maxAttempts),
    enableMaxAttemptsProtection: getEnvVariableBoolean(
      env,
      key('ENABLE_MAX_ATTEMPTS_PROTECTION'),
      d.enableMaxAttemptsProtection,
    ),
    abandonUndecodableEvents: getEnvVariableBoolean(
      env,
      key('ABANDON_UNDECODABLE_EVENTS'),
      d.abandonUndecodableEvents,
    ),
    retryBackoffBaseInSec: getEnvVariableNumber(
      env,
      key('RETRY_BACKOFF_BASE_IN_SEC'),
      d.retryBackoffBaseInSec,
    ),
    retryBackoffMaxInSec: getEnvVariableNumber(
      env,
      key('RETRY_BACKOFF_MAX_IN_SEC'),
      d.retryBackoffMaxInSec,
    ),
    cleanupIntervalInMs: getEnvVariableNumber(
      env,
      key('CLEANUP_INTERVAL_IN_MS'),
      d.cleanupIntervalInMs,
    ),
    cleanupAbandonedInSec: getEnvVariableNumber(
      env,
      key('CLEANUP_ABANDONED_IN_SEC'),
      d.cleanupAbandonedInSec,
    ),
  };
};

/**
 * Prints the available env variables and their default values.
 * @param defaultOverrides Values to print instead of the defaults e.g. `{ DB_SCHEMA: 'telematics' }`.
 */
export const printFailedEventEnvVariables = (
  defaultOverrides?: Record<string, string>,
): string => printConfigSettings(settingsMap, envPrefix, defaultOverrides);
