export {
  FailedEventMetadata,
  createFailedEventCapture,
} from './capture/capture-failed-event';
export {
  EventProcessingResult,
  EventProcessorOptions,
  createEventProcessor,
} from './capture/event-processor';
export { EventCodec, jsonEventCodec } from './codec/event-codec';
export {
  FailedEventConfig,
  FailedEventSettings,
  FullFailedEventConfig,
  FullFailedEventSettings,
  applyDefaultFailedEventConfigValues,
  defaultSettings,
  envPrefix,
  getFailedEventSettings,
  printFailedEventEnvVariables,
} from './common/config';
export { DatabaseClient, createDatabasePool } from './common/database';
export {
  DecodeError,
  ErrorCode,
  ExtendedError,
  FailedEventError,
  FailedEventStoreError,
  HandlerError,
  NotFoundError,
  StorageError,
  UnknownHandlerError,
  ensureExtendedError,
} from './common/error';
export {
  FailedEventLogger,
  InMemoryLogEntry,
  getDefaultLogger,
  getDisabledLogger,
  getInMemoryLogger,
  getLogLevel,
} from './common/logger';
export { epochSeconds } from './common/utils';
export { ConcurrencyController } from './concurrency-controller/concurrency-controller';
export { createImeiConcurrencyController } from './concurrency-controller/create-imei-concurrency-controller';
export {
  FailedEvent,
  NewFailedEvent,
  PendingCursor,
} from './failed-event/failed-event';
export {
  runFailedEventCleanupOnce,
  runScheduledFailedEventCleanup,
} from './failed-event/failed-event-cleanup';
export {
  FailedEventStats,
  FailedEventStore,
  ListPendingOptions,
} from './failed-event/failed-event-store';
export { createPostgresFailedEventStore } from './failed-event/postgres-failed-event-store';
export {
  EventHandlerRegistry,
  createEventHandlerRegistry,
} from './handler/event-handler-registry';
export {
  EventHandlerContext,
  FailedEventHandler,
} from './handler/failed-event-handler';
export {
  RetryCoordinatorOptions,
  initializeRetryCoordinator,
} from './retry/retry-coordinator';
export {
  RetryPassDependencies,
  RetryPassResult,
  runRetryPass,
} from './retry/retry-pass';
export { RetryStrategies } from './retry/retry-strategies';
export {
  FailedEventRetryStrategy,
  defaultFailedEventRetryStrategy,
} from './retry/strategies/failed-event-retry-strategy';
export {
  HandlerTimeoutStrategy,
  defaultHandlerTimeoutStrategy,
} from './retry/strategies/handler-timeout-strategy';
export {
  RetryBackoffStrategy,
  defaultRetryBackoffStrategy,
} from './retry/strategies/retry-backoff-strategy';
export { DatabaseSetup, DatabaseSetupConfig } from './setup/database-setup';
export { DatabaseSetupExporter } from './setup/database-setup-exporter';
export { createInMemoryFailedEventStore } from './test-utils/in-memory-failed-event-store';
