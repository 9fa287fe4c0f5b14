/**
 * Schema Migration Runner
 *
 * Applies the idempotent script for the pending migrations, grants each
 * compute identity runtime access, and seeds the publisher admin users.
 */

import { ProvisioningError, errorMessageOf } from "../errors.js";
import { getLogger, type Logger } from "../logging/index.js";
import { generatePassword } from "../secrets/index.js";
import type { SqlExecutor } from "./executor.js";
import { generateMigrationScript, quoteIdentifier, quoteString, splitBatches } from "./generator.js";
import type { SchemaModel } from "./model.js";

// =============================================================================
// Types
// =============================================================================

export type GrantMethod = "external-provider" | "password";

export type IdentityGrant = {
  identity: string;
  method: GrantMethod;
};

export type MigrationOutcome = {
  applied: string[];
  batches: number;
  grants: IdentityGrant[];
  seededUsers: number;
};

export type MigrationRunOptions = {
  model: SchemaModel;
  /** Compute identities (web app names) that get runtime access. */
  identities?: readonly string[];
  /** Publisher admin emails seeded into `KnownUsers` with role 1. */
  knownUsers?: readonly string[];
  allowPasswordFallback?: boolean;
  /**
   * Called as soon as a fallback password is generated, before the contained
   * user is created, so the credential is never lost.
   */
  persistPassword?: (identity: string, password: string) => Promise<void>;
  logger?: Logger;
};

export const PUBLISHER_ADMIN_ROLE_ID = 1;

export const RUNTIME_ROLES = ["db_datareader", "db_datawriter"] as const;

// =============================================================================
// SQL builders
// =============================================================================

function roleStatements(user: string): string[] {
  const quoted = quoteIdentifier(user);
  return [
    ...RUNTIME_ROLES.map((role) => `ALTER ROLE ${role} ADD MEMBER ${quoted};`),
    `GRANT EXECUTE TO ${quoted};`,
  ];
}

function userExists(user: string): string {
  return `IF NOT EXISTS (SELECT 1 FROM sys.database_principals WHERE name = ${quoteString(user)})`;
}

export function externalUserGrantSql(identity: string): string {
  return [
    `${userExists(identity)}\n    CREATE USER ${quoteIdentifier(identity)} FROM EXTERNAL PROVIDER;`,
    ...roleStatements(identity),
  ].join("\n");
}

export function roleGrantSql(identity: string): string {
  return roleStatements(identity).join("\n");
}

export function passwordUserGrantSql(identity: string, password: string): string {
  return [
    `${userExists(identity)}\n    CREATE USER ${quoteIdentifier(identity)} WITH PASSWORD = ${quoteString(password)};`,
    `ALTER USER ${quoteIdentifier(identity)} WITH PASSWORD = ${quoteString(password)};`,
    ...roleStatements(identity),
  ].join("\n");
}

export const SEED_KNOWN_USER_SQL = [
  "IF NOT EXISTS (SELECT 1 FROM [KnownUsers] WHERE [UserEmail] = @email)",
  "    INSERT INTO [KnownUsers] ([UserEmail], [RoleId]) VALUES (@email, @roleId);",
].join("\n");

export const PRINCIPAL_SQL =
  "SELECT [type], [authentication_type] FROM sys.database_principals WHERE [name] = @name;";

// sys.database_principals: type E/X are Entra users/groups, authentication_type 2 is DATABASE, 4 is EXTERNAL.
const EXTERNAL_PRINCIPAL_TYPES = new Set(["E", "X"]);
const DATABASE_AUTHENTICATION = 2;
const EXTERNAL_AUTHENTICATION = 4;

// =============================================================================
// Runner
// =============================================================================

/** IDs of the migrations already recorded in the history table. */
export async function appliedMigrations(executor: SqlExecutor, historyTable: string): Promise<Set<string>> {
  const exists = await executor.query(`SELECT OBJECT_ID(${quoteString(historyTable)}) AS [id];`);
  const id = exists[0]?.id;
  if (id === null || id === undefined) return new Set();
  const rows = await executor.query(`SELECT [MigrationId] FROM ${quoteIdentifier(historyTable)};`);
  const ids = new Set<string>();
  for (const row of rows) {
    if (typeof row.MigrationId === "string") ids.add(row.MigrationId);
  }
  return ids;
}

export async function pendingMigrations(executor: SqlExecutor, model: SchemaModel): Promise<string[]> {
  const applied = await appliedMigrations(executor, model.historyTable);
  return model.migrations.map((m) => m.id).filter((id) => !applied.has(id));
}

/**
 * How the database user for `identity` authenticates, or null when there is
 * no such user yet.
 */
export async function existingGrantMethod(executor: SqlExecutor, identity: string): Promise<GrantMethod | null> {
  const [row] = await executor.query(PRINCIPAL_SQL, { name: identity });
  if (!row) return null;
  const type = typeof row.type === "string" ? row.type.trim() : "";
  if (EXTERNAL_PRINCIPAL_TYPES.has(type) || row.authentication_type === EXTERNAL_AUTHENTICATION) {
    return "external-provider";
  }
  if (row.authentication_type === DATABASE_AUTHENTICATION) return "password";
  throw new ProvisioningError(
    "CONFLICT",
    `Database principal "${identity}" exists but is neither an Entra user nor a contained password user`,
    {
      resourceKind: "sql-database",
      resourceName: identity,
      operation: "grant",
      remediation: `drop the database user "${identity}" and re-run`,
    },
  );
}

async function grantIdentity(
  executor: SqlExecutor,
  identity: string,
  options: MigrationRunOptions,
  log: Logger,
): Promise<IdentityGrant> {
  const existing = await existingGrantMethod(executor, identity);
  if (existing === "password") {
    if (!options.allowPasswordFallback) {
      throw new ProvisioningError(
        "TRUST_MODEL",
        `Database user "${identity}" authenticates with a password, not its managed identity`,
        {
          resourceKind: "sql-database",
          resourceName: identity,
          operation: "grant",
          remediation: `re-run with --allow-sql-password-fallback, or drop the database user "${identity}" so it is recreated from the managed identity`,
        },
      );
    }
    log.warn(`Database user "${identity}" is a password user created by an earlier fallback; keeping it`);
    await executor.batch(roleGrantSql(identity));
    return { identity, method: "password" };
  }
  if (existing === "external-provider") {
    await executor.batch(roleGrantSql(identity));
    log.info(`Managed identity "${identity}" already has a database user; role grants refreshed`);
    return { identity, method: "external-provider" };
  }

  try {
    await executor.batch(externalUserGrantSql(identity));
    log.info(`Granted database access to managed identity "${identity}"`);
    return { identity, method: "external-provider" };
  } catch (error) {
    if (!options.allowPasswordFallback) {
      throw new ProvisioningError(
        "TRUST_MODEL",
        `Could not create a database user for managed identity "${identity}": ${errorMessageOf(error)}`,
        {
          resourceKind: "sql-database",
          resourceName: identity,
          operation: "grant",
          remediation:
            "grant the SQL server identity Directory Readers, or re-run with --allow-sql-password-fallback",
          cause: error,
        },
      );
    }
    log.warn(`Managed identity user for "${identity}" could not be created; falling back to a password user`, {
      error: errorMessageOf(error),
    });
    const password = generatePassword();
    await options.persistPassword?.(identity, password);
    await executor.batch(passwordUserGrantSql(identity, password));
    return { identity, method: "password" };
  }
}

/**
 * Bring a database up to the declared schema model and grant runtime access.
 * Safe to repeat: applied migrations, existing users and seeded rows are
 * left as they are.
 */
export async function applyMigrations(executor: SqlExecutor, options: MigrationRunOptions): Promise<MigrationOutcome> {
  const log = options.logger ?? getLogger("migrations");
  const { model } = options;

  const pending = await pendingMigrations(executor, model);
  let batches = 0;
  if (pending.length === 0) {
    log.info("Database schema is up to date");
  } else {
    log.info(`Applying ${pending.length} migration(s)`, { migrations: pending });
    for (const batch of splitBatches(generateMigrationScript(model))) {
      await executor.batch(batch);
      batches++;
    }
  }

  const grants: IdentityGrant[] = [];
  for (const identity of options.identities ?? []) {
    grants.push(await grantIdentity(executor, identity, options, log));
  }

  let seededUsers = 0;
  for (const email of options.knownUsers ?? []) {
    await executor.query(SEED_KNOWN_USER_SQL, { email, roleId: PUBLISHER_ADMIN_ROLE_ID });
    seededUsers++;
  }

  return { applied: pending, batches, grants, seededUsers };
}
