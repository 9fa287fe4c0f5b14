/**
 * Provisioning Orchestration: Type Definitions
 *
 * A plan is a DAG of steps. Each step names a registered step type, carries
 * parameters that may reference another step's outputs
 * (`<stepId>.outputs.<name>`), and runs once its dependencies have succeeded.
 */

import type { TokenAudience } from "../credentials/index.js";
import type { Logger } from "../logging/index.js";

// =============================================================================
// Step Definitions
// =============================================================================

/** Unique identifier for a step type (e.g. "ensure-resource-group"). */
export type StepTypeId = string;

/** Unique identifier for a step instance within a plan. */
export type StepInstanceId = string;

export type StepStatus = "pending" | "running" | "succeeded" | "failed" | "skipped";

export type ValidationSeverity = "error" | "warning";

export type ParamType = "string" | "number" | "boolean" | "object" | "array";

export type StepParameterDef = {
  name: string;
  type: ParamType;
  description: string;
  required?: boolean;
};

export type StepOutputDef = {
  name: string;
  type: ParamType;
  description: string;
};

/** Provisioning phase a step belongs to; plans run the phases in this order. */
export type StepPhase = "network" | "compute" | "identity" | "data" | "deploy";

export const PHASE_ORDER: readonly StepPhase[] = ["network", "compute", "identity", "data", "deploy"];

export type StepTypeDefinition = {
  id: StepTypeId;
  label: string;
  description: string;
  phase: StepPhase;
  parameters: StepParameterDef[];
  outputs: StepOutputDef[];
  /** Token audiences refreshed before the step runs. */
  audiences: readonly TokenAudience[];
};

// =============================================================================
// Plan
// =============================================================================

/** Format: `${stepInstanceId}.outputs.${outputName}` */
export type StepOutputRef = `${string}.outputs.${string}`;

export type PlanStep = {
  id: StepInstanceId;
  type: StepTypeId;
  name: string;
  /** Literal values or output references, resolved just before the step runs. */
  params: Record<string, unknown>;
  dependsOn: StepInstanceId[];
};

export type ExecutionPlan = {
  id: string;
  name: string;
  description: string;
  blueprintId?: string;
  steps: PlanStep[];
  globalParams: Record<string, unknown>;
  createdAt: string;
};

export type PlanValidationIssue = {
  severity: ValidationSeverity;
  stepId?: StepInstanceId;
  message: string;
  code: string;
};

export type PlanValidation = {
  valid: boolean;
  issues: PlanValidationIssue[];
};

// =============================================================================
// Execution
// =============================================================================

export type OrchestrationOptions = {
  /** Validate and walk the plan without calling any handler. */
  dryRun?: boolean;
  /** Runs before each step's handler; a rejection fails the step. */
  beforeStep?: (step: PlanStep, definition: StepTypeDefinition) => Promise<void>;
  logger?: Logger;
};

export type OrchestrationEventType =
  | "plan:start"
  | "plan:complete"
  | "plan:failed"
  | "step:start"
  | "step:complete"
  | "step:failed"
  | "step:skipped";

export type OrchestrationEvent = {
  type: OrchestrationEventType;
  planId: string;
  stepId?: StepInstanceId;
  stepName?: string;
  timestamp: string;
  message: string;
  error?: string;
  outputs?: Record<string, unknown>;
  progress?: { completed: number; total: number; percentage: number };
};

export type OrchestrationEventListener = (event: OrchestrationEvent) => void;

export type StepExecutionResult = {
  stepId: StepInstanceId;
  stepName: string;
  stepType: StepTypeId;
  status: StepStatus;
  durationMs: number;
  outputs: Record<string, unknown>;
  error?: string;
};

export type OrchestrationResult = {
  planId: string;
  planName: string;
  status: "succeeded" | "failed";
  dryRun: boolean;
  startedAt: string;
  completedAt: string;
  totalDurationMs: number;
  steps: StepExecutionResult[];
  /** Outputs of every succeeded step, keyed by step ID. */
  outputs: Record<string, Record<string, unknown>>;
  errors: string[];
  /** The error that stopped the run, as thrown. */
  failure?: { stepId?: StepInstanceId; error: unknown };
};

// =============================================================================
// Step Handler
// =============================================================================

export type StepContext = {
  /** Resolved parameters (references replaced with values). */
  params: Record<string, unknown>;
  globalParams: Record<string, unknown>;
  log: Logger;
};

export type StepExecuteFn = (ctx: StepContext) => Promise<Record<string, unknown>>;

export type StepHandler = {
  execute: StepExecuteFn;
};

// =============================================================================
// Blueprints
// =============================================================================

export type Blueprint<P> = {
  id: string;
  name: string;
  description: string;
  generate: (params: P) => ExecutionPlan;
};
