/**
 * Orchestration Engine
 *
 * Validates the plan, orders it topologically and runs it one step at a
 * time. The first failure stops the run; later steps are reported as
 * skipped and nothing is rolled back, so a re-run resumes from the cloud
 * state that was left behind.
 */

import { errorMessageOf } from "../errors.js";
import { getLogger, type Logger } from "../logging/index.js";
import { formatErrorMessage } from "../retry.js";
import { assertValidPlan, executionOrder, resolveStepParams, topologicalSort } from "./planner.js";
import { getStepDefinition, getStepHandler } from "./registry.js";
import type {
  ExecutionPlan,
  OrchestrationEvent,
  OrchestrationEventListener,
  OrchestrationOptions,
  OrchestrationResult,
  PlanStep,
  StepExecutionResult,
  StepTypeDefinition,
} from "./types.js";

export class Orchestrator {
  private options: OrchestrationOptions;
  private listeners: OrchestrationEventListener[] = [];
  private log: Logger;

  constructor(options: OrchestrationOptions = {}) {
    this.options = options;
    this.log = options.logger ?? getLogger("orchestrator");
  }

  /** Subscribe to lifecycle events. Returns an unsubscribe function. */
  on(listener: OrchestrationEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private emit(event: Omit<OrchestrationEvent, "timestamp">): void {
    const full: OrchestrationEvent = { ...event, timestamp: new Date().toISOString() };
    for (const listener of this.listeners) {
      try {
        listener(full);
      } catch (error) {
        this.log.debug(`Orchestration listener failed: ${errorMessageOf(error)}`);
      }
    }
  }

  async execute(plan: ExecutionPlan): Promise<OrchestrationResult> {
    const started = Date.now();
    const dryRun = this.options.dryRun ?? false;
    const finish = (
      status: OrchestrationResult["status"],
      steps: StepExecutionResult[],
      outputs: Map<string, Record<string, unknown>>,
      failure?: OrchestrationResult["failure"],
    ): OrchestrationResult => ({
      planId: plan.id,
      planName: plan.name,
      status,
      dryRun,
      startedAt: new Date(started).toISOString(),
      completedAt: new Date().toISOString(),
      totalDurationMs: Date.now() - started,
      steps,
      outputs: Object.fromEntries(outputs),
      errors: failure ? [formatErrorMessage(failure.error)] : [],
      failure,
    });

    let ordered: PlanStep[];
    try {
      assertValidPlan(plan);
      topologicalSort(plan.steps);
      ordered = executionOrder(plan.steps);
    } catch (error) {
      this.emit({ type: "plan:failed", planId: plan.id, message: errorMessageOf(error), error: errorMessageOf(error) });
      return finish("failed", [], new Map(), { error });
    }

    const outputs = new Map<string, Record<string, unknown>>();
    const results: StepExecutionResult[] = [];
    const total = ordered.length;
    let failure: OrchestrationResult["failure"];

    this.emit({
      type: "plan:start",
      planId: plan.id,
      message: `Starting plan "${plan.name}" with ${total} steps${dryRun ? " (dry run)" : ""}`,
      progress: { completed: 0, total, percentage: 0 },
    });

    for (const step of ordered) {
      if (failure) {
        results.push(this.skip(plan, step, "Skipped due to earlier failure"));
        continue;
      }
      const result = await this.executeStep(plan, step, outputs);
      results.push(result.step);
      if (result.step.status === "failed") {
        failure = { stepId: step.id, error: result.error };
      } else {
        outputs.set(step.id, result.step.outputs);
        const completed = outputs.size;
        this.emit({
          type: "step:complete",
          planId: plan.id,
          stepId: step.id,
          stepName: step.name,
          message: `Step "${step.name}" succeeded in ${result.step.durationMs}ms${dryRun ? " (dry run)" : ""}`,
          outputs: result.step.outputs,
          progress: { completed, total, percentage: Math.round((completed / total) * 100) },
        });
      }
    }

    this.emit({
      type: failure ? "plan:failed" : "plan:complete",
      planId: plan.id,
      message: failure ? `Plan "${plan.name}" failed at step "${failure.stepId}"` : `Plan "${plan.name}" completed in ${Date.now() - started}ms`,
    });
    return finish(failure ? "failed" : "succeeded", results, outputs, failure);
  }

  private async executeStep(
    plan: ExecutionPlan,
    step: PlanStep,
    outputs: ReadonlyMap<string, Record<string, unknown>>,
  ): Promise<{ step: StepExecutionResult; error?: unknown }> {
    const stepStart = Date.now();
    const log = this.log.withContext({ runId: plan.id, stepId: step.id });
    const base = { stepId: step.id, stepName: step.name, stepType: step.type };

    this.emit({ type: "step:start", planId: plan.id, stepId: step.id, stepName: step.name, message: `Starting step "${step.name}" (${step.type})` });
    log.info(`Step "${step.name}"`);

    try {
      const definition = getStepDefinition(step.type);
      const handler = getStepHandler(step.type);
      if (!definition || !handler) {
        throw new Error(`No handler registered for step type "${step.type}"`);
      }
      const params = resolveStepParams(step, outputs, plan.globalParams);

      let stepOutputs: Record<string, unknown>;
      if (this.options.dryRun) {
        stepOutputs = dryRunOutputs(definition);
      } else {
        await this.options.beforeStep?.(step, definition);
        stepOutputs = await handler.execute({ params, globalParams: plan.globalParams, log });
      }
      return { step: { ...base, status: "succeeded", durationMs: Date.now() - stepStart, outputs: stepOutputs } };
    } catch (error) {
      const message = formatErrorMessage(error);
      log.error(`Step "${step.name}" failed: ${message}`);
      this.emit({ type: "step:failed", planId: plan.id, stepId: step.id, stepName: step.name, message: `Step "${step.name}" failed: ${message}`, error: message });
      return { step: { ...base, status: "failed", durationMs: Date.now() - stepStart, outputs: {}, error: message }, error };
    }
  }

  private skip(plan: ExecutionPlan, step: PlanStep, reason: string): StepExecutionResult {
    this.emit({ type: "step:skipped", planId: plan.id, stepId: step.id, stepName: step.name, message: `Step "${step.name}" skipped: ${reason}` });
    return { stepId: step.id, stepName: step.name, stepType: step.type, status: "skipped", durationMs: 0, outputs: {} };
  }
}

/** Placeholder outputs so a dry run can resolve downstream references. */
function dryRunOutputs(definition: StepTypeDefinition): Record<string, unknown> {
  const outputs: Record<string, unknown> = {};
  for (const out of definition.outputs) {
    outputs[out.name] = `<dry-run:${out.name}>`;
  }
  return outputs;
}

/** Create an engine and run a plan in one call. */
export async function orchestrate(
  plan: ExecutionPlan,
  options?: OrchestrationOptions,
  listener?: OrchestrationEventListener,
): Promise<OrchestrationResult> {
  const engine = new Orchestrator(options);
  if (listener) engine.on(listener);
  return engine.execute(plan);
}
