import type { Command } from "commander";

import { deployCommand, type DeployOptions } from "../../commands/deploy.js";
import { DEFAULT_RECORD_PATH } from "../../record/index.js";
import type { RuntimeEnv } from "../../runtime.js";
import { runCommandWithRuntime } from "../cli-utils.js";
import { addDeploymentOptions } from "./deployment-options.js";

export function registerDeployCommand(program: Command, runtime: RuntimeEnv) {
  addDeploymentOptions(
    program
      .command("deploy")
      .description("Provision the network, apps, identities, vault and database, then deploy both sites"),
  )
    .option("--output <file>", "Where to write the deployment record", DEFAULT_RECORD_PATH)
    .option("--dry-run", "Walk the plan without credentials or cloud calls")
    .action(async (_opts: unknown, command: Command) => {
      await runCommandWithRuntime(runtime, async () => {
        await deployCommand(command.opts<DeployOptions>(), runtime);
      });
    });
}
