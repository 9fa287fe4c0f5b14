/**
 * Declared schema model: an ordered list of migrations, each a list of
 * operations, validated with TypeBox on load.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ProvisioningError } from "../errors.js";

const columnSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  type: Type.String({ minLength: 1 }),
  nullable: Type.Optional(Type.Boolean()),
  identity: Type.Optional(Type.Boolean()),
  defaultSql: Type.Optional(Type.String()),
});

const foreignKeySchema = Type.Object({
  name: Type.String(),
  columns: Type.Array(Type.String(), { minItems: 1 }),
  principalTable: Type.String(),
  principalColumns: Type.Array(Type.String(), { minItems: 1 }),
  onDelete: Type.Optional(Type.Union([Type.Literal("CASCADE"), Type.Literal("NO ACTION"), Type.Literal("SET NULL")])),
});

const createTableSchema = Type.Object({
  op: Type.Literal("createTable"),
  table: Type.String(),
  columns: Type.Array(columnSchema, { minItems: 1 }),
  primaryKey: Type.Array(Type.String(), { minItems: 1 }),
  foreignKeys: Type.Optional(Type.Array(foreignKeySchema)),
});

const addColumnSchema = Type.Object({
  op: Type.Literal("addColumn"),
  table: Type.String(),
  column: columnSchema,
});

const createIndexSchema = Type.Object({
  op: Type.Literal("createIndex"),
  name: Type.String(),
  table: Type.String(),
  columns: Type.Array(Type.String(), { minItems: 1 }),
  unique: Type.Optional(Type.Boolean()),
});

const insertDataSchema = Type.Object({
  op: Type.Literal("insertData"),
  table: Type.String(),
  columns: Type.Array(Type.String(), { minItems: 1 }),
  rows: Type.Array(Type.Array(Type.Union([Type.String(), Type.Number(), Type.Boolean(), Type.Null()]))),
  identityInsert: Type.Optional(Type.Boolean()),
});

const sqlSchema = Type.Object({
  op: Type.Literal("sql"),
  /** Statement run through EXEC so it may be the first in its batch (procedures, views). */
  text: Type.String({ minLength: 1 }),
});

export const operationSchema = Type.Union([
  createTableSchema,
  addColumnSchema,
  createIndexSchema,
  insertDataSchema,
  sqlSchema,
]);

export const migrationSchema = Type.Object({
  id: Type.String({ pattern: "^[0-9]{14}_[A-Za-z0-9]+$" }),
  operations: Type.Array(operationSchema, { minItems: 1 }),
});

export const schemaModelSchema = Type.Object({
  productVersion: Type.String(),
  historyTable: Type.String({ default: "__EFMigrationsHistory" }),
  migrations: Type.Array(migrationSchema),
});

export type Column = Static<typeof columnSchema>;
export type ForeignKey = Static<typeof foreignKeySchema>;
export type MigrationOperation = Static<typeof operationSchema>;
export type Migration = Static<typeof migrationSchema>;
export type SchemaModel = Static<typeof schemaModelSchema>;

export const DEFAULT_SCHEMA_PATH = fileURLToPath(new URL("../../schema/saas-kit.migrations.json", import.meta.url));

/**
 * Validate a parsed model. Migration IDs must be unique and ascending; the
 * generator relies on that order.
 */
export function parseSchemaModel(data: unknown, source = "schema model"): SchemaModel {
  const candidate = Value.Default(schemaModelSchema, data);
  if (!Value.Check(schemaModelSchema, candidate)) {
    const problems = [...Value.Errors(schemaModelSchema, candidate)].slice(0, 5).map((e) => `${e.path}: ${e.message}`);
    throw new ProvisioningError("VALIDATION", `Invalid ${source}:\n  - ${problems.join("\n  - ")}`);
  }
  const ids = candidate.migrations.map((m) => m.id);
  for (let i = 1; i < ids.length; i++) {
    if (ids[i] <= ids[i - 1]) {
      throw new ProvisioningError("VALIDATION", `Invalid ${source}: migration ${ids[i]} is out of order or duplicated`);
    }
  }
  return candidate;
}

export async function loadSchemaModel(filePath = DEFAULT_SCHEMA_PATH): Promise<SchemaModel> {
  const text = await readFile(filePath, "utf8");
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ProvisioningError("VALIDATION", `${filePath} is not valid JSON`, { cause: error });
  }
  return parseSchemaModel(data, filePath);
}
