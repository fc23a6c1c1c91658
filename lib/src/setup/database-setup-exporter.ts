import { DatabaseSetup, DatabaseSetupConfig } from './database-setup';
const { dropAndCreateRoles, dropAndCreateTable, grantPermissions, createIndexes } =
  DatabaseSetup;

/**
 * Creates the full SQL script to set up the failed event table, its indexes,
 * and the role permissions.
 * @param config The database, schema, table, and role names
 * @param skipRoles Do not include the (commented out) role creation
 * @returns The SQL script
 */
const createSetupScript = (
  config: DatabaseSetupConfig,
  skipRoles = false,
): string => {
  return `-- Failed event table setup for the database ${config.database}
${skipRoles ? '' : dropAndCreateRoles(config)}
-- Drop and create the failed event table and ensure the schema exists
${dropAndCreateTable(config)}

-- Grant permissions for the coordinator and capture role
${grantPermissions(config)}
-- Create the indexes for the retry order and the device lookups
${createIndexes(config)}`;
};

export const DatabaseSetupExporter = {
  createSetupScript,
};
