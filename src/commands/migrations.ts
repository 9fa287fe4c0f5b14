/**
 * `saas-provision migrations`: inspect the schema migrations without a
 * database. `script` prints the idempotent script the deploy applies;
 * `list` prints the migration IDs in order.
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { generateMigrationScript, loadSchemaModel, type SchemaModel } from "../migrations/index.js";
import type { RuntimeEnv } from "../runtime.js";

export type MigrationsScriptOptions = {
  schema?: string;
  output?: string;
};

export async function migrationsScriptCommand(options: MigrationsScriptOptions, runtime: RuntimeEnv): Promise<string> {
  const model = await loadSchemaModel(options.schema);
  const script = generateMigrationScript(model);
  if (!options.output) {
    runtime.log(script.trimEnd());
    return script;
  }
  const target = path.resolve(options.output);
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, script, "utf8");
  runtime.log(`Wrote ${model.migrations.length} migrations to ${target}`);
  return script;
}

export async function migrationsListCommand(options: Pick<MigrationsScriptOptions, "schema">, runtime: RuntimeEnv): Promise<SchemaModel> {
  const model = await loadSchemaModel(options.schema);
  for (const migration of model.migrations) {
    runtime.log(`${migration.id}  ${migration.operations.length} operations`);
  }
  return model;
}
