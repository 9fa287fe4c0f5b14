/**
 * Provisioning Orchestration
 *
 * Public API for plans, steps and the sequential engine.
 */

export type {
  StepTypeId,
  StepInstanceId,
  StepStatus,
  StepPhase,
  StepParameterDef,
  StepOutputDef,
  StepTypeDefinition,
  PlanStep,
  StepOutputRef,
  ExecutionPlan,
  PlanValidation,
  PlanValidationIssue,
  OrchestrationOptions,
  OrchestrationEvent,
  OrchestrationEventListener,
  OrchestrationResult,
  StepExecutionResult,
  StepContext,
  StepExecuteFn,
  StepHandler,
  Blueprint,
} from "./types.js";
export { PHASE_ORDER } from "./types.js";

export {
  registerStepType,
  getStepDefinition,
  getStepHandler,
  listStepTypes,
  listStepTypesByPhase,
  hasStepType,
  clearStepRegistry,
} from "./registry.js";

export {
  PROVISIONING_STEP_DEFINITIONS,
  SQL_ADMIN_LOGIN,
  registerProvisioningSteps,
  registerProvisioningStepsDryRun,
} from "./steps.js";

export {
  validatePlan,
  assertValidPlan,
  topologicalSort,
  flattenLayers,
  executionOrder,
  isOutputRef,
  parseOutputRef,
  resolveStepParams,
} from "./planner.js";

export { Orchestrator, orchestrate } from "./engine.js";

export { saasAcceleratorBlueprint, getBlueprint, listBlueprints, WEB_PROJECTS } from "./blueprints.js";
export type { SaasAcceleratorParams } from "./blueprints.js";

export { createProvisioningServices } from "./services.js";
export type { ProvisioningServices } from "./services.js";

export { buildAppSettings, buildConnectionStrings, webAppHostName, MARKETPLACE_API } from "./settings.js";
export type { WebAppRole } from "./settings.js";
