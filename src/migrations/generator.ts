/**
 * Idempotent T-SQL migration script generation.
 *
 * Output follows the EF Core `--idempotent` layout: the history table is
 * created when missing, every migration body is guarded by a history check,
 * and batches are separated by `GO`. Generation is a pure function of the
 * model, so two runs over the same model yield identical text.
 */

import type { Column, ForeignKey, Migration, MigrationOperation, SchemaModel } from "./model.js";

export function quoteIdentifier(name: string): string {
  return `[${name.replace(/]/g, "]]")}]`;
}

export function quoteString(value: string): string {
  return `N'${value.replace(/'/g, "''")}'`;
}

function literal(value: string | number | boolean | null): string {
  if (value === null) return "NULL";
  if (typeof value === "boolean") return value ? "CAST(1 AS bit)" : "CAST(0 AS bit)";
  if (typeof value === "number") return String(value);
  return quoteString(value);
}

function columnDefinition(column: Column): string {
  const parts = [quoteIdentifier(column.name), column.type];
  parts.push(column.nullable ? "NULL" : "NOT NULL");
  if (column.identity) parts.push("IDENTITY");
  if (column.defaultSql !== undefined) parts.push(`DEFAULT ${column.defaultSql}`);
  return parts.join(" ");
}

function foreignKeyDefinition(fk: ForeignKey): string {
  const cols = fk.columns.map(quoteIdentifier).join(", ");
  const principal = fk.principalColumns.map(quoteIdentifier).join(", ");
  const onDelete = fk.onDelete && fk.onDelete !== "NO ACTION" ? ` ON DELETE ${fk.onDelete}` : "";
  return `CONSTRAINT ${quoteIdentifier(fk.name)} FOREIGN KEY (${cols}) REFERENCES ${quoteIdentifier(fk.principalTable)} (${principal})${onDelete}`;
}

function indent(text: string, spaces = 4): string {
  const pad = " ".repeat(spaces);
  return text
    .split("\n")
    .map((line) => (line.length > 0 ? pad + line : line))
    .join("\n");
}

export function renderOperation(op: MigrationOperation): string {
  switch (op.op) {
    case "createTable": {
      const lines = op.columns.map(columnDefinition);
      lines.push(`CONSTRAINT ${quoteIdentifier(`PK_${op.table}`)} PRIMARY KEY (${op.primaryKey.map(quoteIdentifier).join(", ")})`);
      for (const fk of op.foreignKeys ?? []) lines.push(foreignKeyDefinition(fk));
      return `CREATE TABLE ${quoteIdentifier(op.table)} (\n${indent(lines.join(",\n"))}\n);`;
    }
    case "addColumn":
      return `ALTER TABLE ${quoteIdentifier(op.table)} ADD ${columnDefinition(op.column)};`;
    case "createIndex": {
      const unique = op.unique ? "UNIQUE " : "";
      return `CREATE ${unique}INDEX ${quoteIdentifier(op.name)} ON ${quoteIdentifier(op.table)} (${op.columns.map(quoteIdentifier).join(", ")});`;
    }
    case "insertData": {
      const table = quoteIdentifier(op.table);
      const columns = op.columns.map(quoteIdentifier).join(", ");
      const values = op.rows.map((row) => `(${row.map(literal).join(", ")})`).join(",\n");
      const insert = `INSERT INTO ${table} (${columns})\nVALUES ${values};`;
      if (!op.identityInsert) return insert;
      return `SET IDENTITY_INSERT ${table} ON;\n${insert}\nSET IDENTITY_INSERT ${table} OFF;`;
    }
    case "sql":
      return `EXEC(${quoteString(op.text)});`;
  }
}

function guarded(history: string, migrationId: string, body: string): string {
  return [
    `IF NOT EXISTS(SELECT * FROM ${quoteIdentifier(history)} WHERE [MigrationId] = ${quoteString(migrationId)})`,
    "BEGIN",
    indent(body),
    "END;",
    "GO",
  ].join("\n");
}

function renderMigration(model: SchemaModel, migration: Migration): string[] {
  const blocks = migration.operations.map((op) => guarded(model.historyTable, migration.id, renderOperation(op)));
  blocks.push(
    guarded(
      model.historyTable,
      migration.id,
      `INSERT INTO ${quoteIdentifier(model.historyTable)} ([MigrationId], [ProductVersion])\nVALUES (${quoteString(migration.id)}, ${quoteString(model.productVersion)});`,
    ),
  );
  return blocks;
}

/**
 * Generate the full idempotent script for a schema model.
 */
export function generateMigrationScript(model: SchemaModel): string {
  const history = quoteIdentifier(model.historyTable);
  const blocks: string[] = [
    [
      `IF OBJECT_ID(${quoteString(model.historyTable)}) IS NULL`,
      "BEGIN",
      indent(
        [
          `CREATE TABLE ${history} (`,
          "    [MigrationId] nvarchar(150) NOT NULL,",
          "    [ProductVersion] nvarchar(32) NOT NULL,",
          `    CONSTRAINT ${quoteIdentifier(`PK_${model.historyTable}`)} PRIMARY KEY ([MigrationId])`,
          ");",
        ].join("\n"),
      ),
      "END;",
      "GO",
    ].join("\n"),
    "BEGIN TRANSACTION;\nGO",
  ];
  for (const migration of model.migrations) {
    blocks.push(...renderMigration(model, migration));
  }
  blocks.push("COMMIT;\nGO");
  return `${blocks.join("\n\n")}\n`;
}

/** Split a script on `GO` separator lines, dropping empty batches. */
export function splitBatches(script: string): string[] {
  const batches: string[] = [];
  let current: string[] = [];
  for (const line of script.split(/\r?\n/)) {
    if (/^\s*GO\s*;?\s*$/i.test(line)) {
      const batch = current.join("\n").trim();
      if (batch) batches.push(batch);
      current = [];
    } else {
      current.push(line);
    }
  }
  const tail = current.join("\n").trim();
  if (tail) batches.push(tail);
  return batches;
}
