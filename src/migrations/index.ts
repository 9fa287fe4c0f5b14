export {
  type Column,
  type ForeignKey,
  type Migration,
  type MigrationOperation,
  type SchemaModel,
  DEFAULT_SCHEMA_PATH,
  loadSchemaModel,
  parseSchemaModel,
} from "./model.js";
export { generateMigrationScript, quoteIdentifier, quoteString, renderOperation, splitBatches } from "./generator.js";
export {
  type SqlConnectionOptions,
  type SqlExecutor,
  type SqlParameter,
  type SqlRow,
  MssqlExecutor,
  createMssqlExecutor,
} from "./executor.js";
export {
  type GrantMethod,
  type IdentityGrant,
  type MigrationOutcome,
  type MigrationRunOptions,
  PUBLISHER_ADMIN_ROLE_ID,
  RUNTIME_ROLES,
  SEED_KNOWN_USER_SQL,
  appliedMigrations,
  applyMigrations,
  externalUserGrantSql,
  passwordUserGrantSql,
  pendingMigrations,
} from "./runner.js";
