import { Command } from "commander";

import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { VERSION } from "../version.js";
import { registerDeployCommand } from "./program/register.deploy.js";
import { registerMigrationsCommand } from "./program/register.migrations.js";
import { registerPlanCommand } from "./program/register.plan.js";

export const CLI_NAME = "saas-provision";

export function buildProgram(runtime: RuntimeEnv = defaultRuntime): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description("Idempotent provisioning for the Azure Marketplace SaaS accelerator")
    .version(VERSION)
    .configureOutput({
      writeOut: (text) => runtime.log(text.trimEnd()),
      writeErr: (text) => runtime.error(text.trimEnd()),
    })
    .exitOverride((error) => {
      runtime.exit(error.exitCode);
      throw error;
    });

  registerDeployCommand(program, runtime);
  registerPlanCommand(program, runtime);
  registerMigrationsCommand(program, runtime);
  return program;
}
