/**
 * `saas-provision deploy`: the full provisioning run.
 *
 * Configuration is resolved and validated first; only then is a credential
 * created and the signed-in principal read. The blueprint plan runs phase by
 * phase, refreshing each step's token audiences before it starts, and a
 * deployment record is written once every step has succeeded.
 */

import type { DeploymentConfig } from "../config.js";
import { createCredentialsManager, type CredentialsManager } from "../credentials/index.js";
import { enableDiagnostics, onDiagnosticEvent } from "../diagnostics.js";
import { ProvisioningError } from "../errors.js";
import { getLogger } from "../logging/index.js";
import {
  clearStepRegistry,
  createProvisioningServices,
  orchestrate,
  registerProvisioningSteps,
  registerProvisioningStepsDryRun,
  saasAcceleratorBlueprint,
  webAppHostName,
  type ExecutionPlan,
  type OrchestrationOptions,
  type OrchestrationResult,
  type ProvisioningServices,
} from "../orchestration/index.js";
import { DEFAULT_RECORD_PATH, buildDeploymentRecord, writeDeploymentRecord, type DeploymentRecord } from "../record/index.js";
import { configureOutput, theme } from "../cli/cli-utils.js";
import { loadDeploymentConfig, type DeploymentFlags } from "../cli/config-layers.js";
import type { RuntimeEnv } from "../runtime.js";
import type { ProvisioningContext } from "../types.js";

export type DeployOptions = DeploymentFlags & {
  output?: string;
  dryRun?: boolean;
};

export type DeployCredentials = Pick<
  CredentialsManager,
  "getContext" | "getAccessToken" | "refreshTokens" | "getSignedInPrincipal"
>;

/** Seams for the cloud-facing parts of a run. */
export type DeployDeps = {
  env: NodeJS.ProcessEnv;
  createCredentials: (config: DeploymentConfig) => DeployCredentials;
  createServices: (config: DeploymentConfig, context: ProvisioningContext, credentials: DeployCredentials) => ProvisioningServices;
  orchestrate: (plan: ExecutionPlan, options?: OrchestrationOptions) => Promise<OrchestrationResult>;
  now: () => Date;
};

export type DeployOutcome = {
  result: OrchestrationResult;
  record?: DeploymentRecord;
  recordPath?: string;
};

const defaultDeps: DeployDeps = {
  env: process.env,
  createCredentials: (config) =>
    createCredentialsManager({
      tenantId: config.tenantId,
      subscriptionId: config.subscriptionId,
      credentialMethod: config.credentialMethod,
    }),
  createServices: createProvisioningServices,
  orchestrate: (plan, options) => orchestrate(plan, options),
  now: () => new Date(),
};

function printSteps(result: OrchestrationResult, runtime: RuntimeEnv): void {
  for (const step of result.steps) {
    const icon =
      step.status === "succeeded" ? theme.success("✓") : step.status === "failed" ? theme.error("✗") : theme.muted("○");
    const detail = step.error ? ` ${theme.error(step.error)}` : "";
    runtime.log(`  ${icon} ${step.stepName} [${step.stepType}] ${step.durationMs}ms${detail}`);
  }
}

function failureOf(result: OrchestrationResult): unknown {
  const error = result.failure?.error;
  if (error instanceof ProvisioningError) return error;
  const failedStep = result.failure?.stepId ? ` at step "${result.failure.stepId}"` : "";
  return new Error(`Provisioning failed${failedStep}: ${result.errors.join("; ") || "Unknown error"}`);
}

export async function deployCommand(
  options: DeployOptions,
  runtime: RuntimeEnv,
  overrides: Partial<DeployDeps> = {},
): Promise<DeployOutcome> {
  const deps: DeployDeps = { ...defaultDeps, ...overrides };
  const config = await loadDeploymentConfig(options, deps.env);
  configureOutput(config);
  const log = getLogger("deploy");

  clearStepRegistry();

  if (options.dryRun) {
    registerProvisioningStepsDryRun();
    const plan = saasAcceleratorBlueprint.generate({ config });
    const result = await deps.orchestrate(plan, { dryRun: true });
    if (!config.quiet) printSteps(result, runtime);
    if (result.status === "failed") throw failureOf(result);
    runtime.log(theme.success(`Dry run of ${plan.steps.length} steps succeeded; nothing was changed.`));
    return { result };
  }

  if (config.verbose) {
    enableDiagnostics();
    onDiagnosticEvent((event) => {
      log.debug(`${event.service} ${event.operation}${event.durationMs === undefined ? "" : ` ${event.durationMs}ms`}`, {
        type: event.type,
        resource: event.resourceName,
        statusCode: event.statusCode,
        error: event.error,
      });
    });
  }

  const credentials = deps.createCredentials(config);
  const context = await credentials.getContext();
  const deployer = await credentials.getSignedInPrincipal();
  log.info(`Signed in as ${deployer.login} (${deployer.principalType})`);

  let services: ProvisioningServices | null = null;
  registerProvisioningSteps(() => {
    services ??= deps.createServices(config, context, credentials);
    return services;
  });

  const plan = saasAcceleratorBlueprint.generate({ config, deployer });
  const result = await deps.orchestrate(plan, {
    beforeStep: (_step, definition) => credentials.refreshTokens(definition.audiences),
  });
  if (!config.quiet) printSteps(result, runtime);
  if (result.status === "failed") throw failureOf(result);

  const record = buildDeploymentRecord(config, result, deps.now());
  const recordPath = await writeDeploymentRecord(record, options.output ?? DEFAULT_RECORD_PATH);

  runtime.log(theme.success(`Deployment succeeded (${result.steps.length} steps, ${result.totalDurationMs}ms)`));
  runtime.log(`  Admin site:    https://${webAppHostName(record.adminWebAppName)}`);
  runtime.log(`  Landing page:  https://${webAppHostName(record.portalWebAppName)}`);
  runtime.log(`  Record:        ${recordPath}`);
  return { result, record, recordPath };
}
