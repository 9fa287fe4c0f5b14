/**
 * `saas-provision plan`: generate the blueprint plan for a configuration,
 * validate it, and print the steps in the order a deploy would run them.
 * Needs no credential; the deployer shows up as `$global` placeholders.
 */

import {
  clearStepRegistry,
  executionOrder,
  getStepDefinition,
  registerProvisioningStepsDryRun,
  saasAcceleratorBlueprint,
  validatePlan,
  type ExecutionPlan,
} from "../orchestration/index.js";
import { configureOutput, theme } from "../cli/cli-utils.js";
import { loadDeploymentConfig, type DeploymentFlags } from "../cli/config-layers.js";
import type { RuntimeEnv } from "../runtime.js";
import { validationError } from "../errors.js";

export type PlanOptions = DeploymentFlags & {
  json?: boolean;
};

export async function planCommand(
  options: PlanOptions,
  runtime: RuntimeEnv,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ExecutionPlan> {
  const config = await loadDeploymentConfig(options, env);
  configureOutput(config);

  clearStepRegistry();
  registerProvisioningStepsDryRun();
  const plan = saasAcceleratorBlueprint.generate({ config });
  const validation = validatePlan(plan);
  const errors = validation.issues.filter((issue) => issue.severity === "error");
  if (errors.length > 0) {
    throw validationError(`Plan "${plan.name}" is invalid: ${errors.map((issue) => issue.message).join("; ")}`);
  }

  const ordered = executionOrder(plan.steps);

  if (options.json) {
    runtime.log(JSON.stringify({ ...plan, steps: ordered }, null, 2));
    return plan;
  }

  runtime.log(`${theme.info(plan.name)} (${plan.steps.length} steps)`);
  for (const [index, step] of ordered.entries()) {
    const phase = getStepDefinition(step.type)?.phase ?? "?";
    const deps = step.dependsOn.length > 0 ? theme.muted(` <- ${step.dependsOn.join(", ")}`) : "";
    runtime.log(`  ${String(index + 1).padStart(2)}. [${phase}] ${step.id} (${step.type})${deps}`);
  }
  for (const issue of validation.issues) {
    runtime.log(theme.warn(`  warning: ${issue.message}`));
  }
  return plan;
}
