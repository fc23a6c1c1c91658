/* eslint-disable @typescript-eslint/no-empty-function */
import pino, { BaseLogger, DestinationStream, LevelWithSilent } from 'pino';
import { envPrefix } from './config';
import { Env } from './env-settings';

export type FailedEventLogger = BaseLogger;

const logLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

/** The raw telemetry payload can contain driver data and is never logged. */
const redactedPaths = [
  'eventData',
  'failedEvent.eventData',
  'err.failedEvent.eventData',
];

/**
 * Reads the log level from the `FAILED_EVENT_LOG_LEVEL` variable.
 * @returns The level or "info" if the variable is missing or not a pino level
 */
export const getLogLevel = (env: Env = process.env): LevelWithSilent => {
  const value = env[`${envPrefix}LOG_LEVEL`]?.trim().toLowerCase();
  return logLevels.find((level) => level === value) ?? 'info';
};

/**
 * Creates the pino logger of the failed event store and retry coordinator.
 * The stored event data is redacted from all log entries.
 * @param name The logger name
 * @param level The minimum level. Defaults to the `FAILED_EVENT_LOG_LEVEL` variable.
 * @param destination Where to write the log lines. Defaults to stdout.
 */
export const getDefaultLogger = (
  name = 'failed-events',
  level: LevelWithSilent = getLogLevel(),
  destination?: DestinationStream,
): FailedEventLogger => {
  const options = {
    name,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: redactedPaths, censor: '[redacted]' },
  };
  return destination ? pino(options, destination) : pino(options);
};

/**
 * Disable the logger.
 */
export const getDisabledLogger = (): FailedEventLogger => ({
  fatal: () => {},
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
  trace: () => {},
  silent: () => {},
  level: 'silent',
});

/**
 * Writes all logs to an array that is returned from this call.
 * @param context Add this to every log entry
 * @returns The logger instance and the array of in-memory logs
 */
export const getInMemoryLogger = (
  context: string,
): [logger: FailedEventLogger, logs: InMemoryLogEntry[]] => {
  const logs: InMemoryLogEntry[] = [];
  const l =
    (type: string) =>
    (...args: unknown[]) => {
      logs.push({ type, args, date: new Date().toISOString(), context });
    };
  const logger = {
    fatal: l('fatal'),
    error: l('error'),
    warn: l('warn'),
    info: l('info'),
    debug: l('debug'),
    trace: l('trace'),
    silent: l('silent'),
    level: 'trace',
  };
  return [logger, logs];
};

export interface InMemoryLogEntry {
  context: string;
  type: string;
  date: string;
  args: unknown[];
}
