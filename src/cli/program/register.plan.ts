import type { Command } from "commander";

import { planCommand, type PlanOptions } from "../../commands/plan.js";
import type { RuntimeEnv } from "../../runtime.js";
import { runCommandWithRuntime } from "../cli-utils.js";
import { addDeploymentOptions } from "./deployment-options.js";

export function registerPlanCommand(program: Command, runtime: RuntimeEnv) {
  addDeploymentOptions(
    program.command("plan").description("Print the validated deployment plan without touching Azure"),
  )
    .option("--json", "Print the plan as JSON")
    .action(async (_opts: unknown, command: Command) => {
      await runCommandWithRuntime(runtime, async () => {
        await planCommand(command.opts<PlanOptions>(), runtime);
      });
    });
}
