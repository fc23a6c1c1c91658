import { maxHandlerNameLength, maxImeiLength } from '../failed-event/failed-event';

export interface DatabaseSetupConfig {
  database: string;
  schema: string;
  table: string;
  /** The role of the retry coordinator: reads, updates, and deletes failed events. */
  coordinatorRole: string;
  /** The role of the live ingestion handlers that only store failed events. Uses the coordinator role if not set. */
  captureRole?: string;
}

/** Create the database roles and grant connect permissions */
const dropAndCreateRoles = ({
  database,
  coordinatorRole,
  captureRole,
}: DatabaseSetupConfig): string => {
  let sql = /* sql */ `
-- DROP OWNED BY ${coordinatorRole};
-- DROP ROLE IF EXISTS ${coordinatorRole};
-- CREATE ROLE ${coordinatorRole} WITH LOGIN PASSWORD 'secret-password';
-- GRANT CONNECT ON DATABASE ${database} TO ${coordinatorRole};
`;

  if (captureRole && captureRole !== coordinatorRole) {
    sql += /* sql */ `
-- DROP OWNED BY ${captureRole};
-- DROP ROLE IF EXISTS ${captureRole};
-- CREATE ROLE ${captureRole} WITH LOGIN PASSWORD 'secret-password';
-- GRANT CONNECT ON DATABASE ${database} TO ${captureRole};
`;
  }
  return sql;
};

/**
 * Create the failed event table. It ensures that the schema of the database
 * exists as well.
 */
const dropAndCreateTable = ({ schema, table }: DatabaseSetupConfig): string => {
  return /* sql */ `
CREATE SCHEMA IF NOT EXISTS ${schema};

DROP TABLE IF EXISTS ${schema}.${table} CASCADE;
CREATE TABLE ${schema}.${table} (
  id BIGSERIAL PRIMARY KEY,
  "timestamp" BIGINT NOT NULL,
  attempted_at BIGINT NOT NULL,
  event_data TEXT NOT NULL,
  handler_name VARCHAR(${maxHandlerNameLength}) NOT NULL,
  imei VARCHAR(${maxImeiLength}) NOT NULL,
  attempt_count INTEGER NOT NULL DEFAULT 1,
  abandoned_at BIGINT
);
ALTER TABLE ${schema}.${table} ADD CONSTRAINT ${table}_attempted_at_check
  CHECK (attempted_at >= "timestamp");`;
};

/** Grant permissions for the coordinator and capture role */
const grantPermissions = ({
  coordinatorRole,
  captureRole,
  schema,
  table,
}: DatabaseSetupConfig): string => {
  const capture = captureRole ?? coordinatorRole;
  return /* sql */ `
GRANT USAGE ON SCHEMA ${schema} TO ${capture};
GRANT USAGE ON SCHEMA ${schema} TO ${coordinatorRole};

GRANT INSERT ON ${schema}.${table} TO ${capture};
GRANT USAGE ON SEQUENCE ${schema}.${table}_id_seq TO ${capture};
GRANT SELECT, INSERT, UPDATE, DELETE ON ${schema}.${table} TO ${coordinatorRole};
GRANT USAGE ON SEQUENCE ${schema}.${table}_id_seq TO ${coordinatorRole};
`;
};

/** Create the indexes for the ordered retry and the device lookups */
const createIndexes = ({ schema, table }: DatabaseSetupConfig): string => {
  return /* sql */ `
CREATE INDEX idx_${table}_timestamp ON ${schema}.${table} ("timestamp");
CREATE INDEX idx_${table}_imei ON ${schema}.${table} (imei);
`;
};

export const DatabaseSetup = {
  dropAndCreateRoles,
  dropAndCreateTable,
  grantPermissions,
  createIndexes,
};
