import type { Command } from "commander";

import {
  migrationsListCommand,
  migrationsScriptCommand,
  type MigrationsScriptOptions,
} from "../../commands/migrations.js";
import type { RuntimeEnv } from "../../runtime.js";
import { runCommandWithRuntime } from "../cli-utils.js";

export function registerMigrationsCommand(program: Command, runtime: RuntimeEnv) {
  const migrations = program.command("migrations").description("Inspect the database schema migrations");

  migrations
    .command("script")
    .description("Print the idempotent migration script")
    .option("--schema <file>", "Schema model JSON (default: the bundled SaaS schema)")
    .option("--output <file>", "Write the script to a file instead of stdout")
    .action(async (_opts: unknown, command: Command) => {
      await runCommandWithRuntime(runtime, async () => {
        await migrationsScriptCommand(command.opts<MigrationsScriptOptions>(), runtime);
      });
    });

  migrations
    .command("list")
    .description("List migration IDs in the order they apply")
    .option("--schema <file>", "Schema model JSON (default: the bundled SaaS schema)")
    .action(async (_opts: unknown, command: Command) => {
      await runCommandWithRuntime(runtime, async () => {
        await migrationsListCommand(command.opts<MigrationsScriptOptions>(), runtime);
      });
    });
}
