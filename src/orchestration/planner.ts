/**
 * DAG Planner & Dependency Resolver
 *
 * Validates execution plans, resolves inter-step references and orders the
 * steps topologically.
 */

import { ProvisioningError } from "../errors.js";
import { getStepDefinition } from "./registry.js";
import { PHASE_ORDER } from "./types.js";
import type {
  ExecutionPlan,
  ParamType,
  PlanStep,
  PlanValidation,
  PlanValidationIssue,
  StepOutputRef,
} from "./types.js";

// =============================================================================
// Output References
// =============================================================================

const OUTPUT_REF_REGEX = /^([a-zA-Z0-9_-]+)\.outputs\.([a-zA-Z0-9_]+)$/;
const GLOBAL_PREFIX = "$global.";

export function isOutputRef(value: string): value is StepOutputRef {
  return OUTPUT_REF_REGEX.test(value);
}

export function parseOutputRef(ref: string): { sourceStepId: string; outputName: string } | null {
  const match = OUTPUT_REF_REGEX.exec(ref);
  if (!match) return null;
  return { sourceStepId: match[1], outputName: match[2] };
}

/** Every output reference in a parameter value (top level or array element). */
function referencesIn(value: unknown): string[] {
  if (typeof value === "string") return isOutputRef(value) ? [value] : [];
  if (Array.isArray(value)) return value.flatMap(referencesIn);
  return [];
}

/** Step IDs a step depends on, declared or implied by its output references. */
export function dependenciesOf(step: PlanStep): Set<string> {
  const deps = new Set(step.dependsOn);
  for (const value of Object.values(step.params)) {
    for (const ref of referencesIn(value)) {
      const parsed = parseOutputRef(ref);
      if (parsed) deps.add(parsed.sourceStepId);
    }
  }
  return deps;
}

// =============================================================================
// Plan Validation
// =============================================================================

function typeOf(value: unknown): ParamType | "null" {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  const t = typeof value;
  if (t === "string" || t === "number" || t === "boolean") return t;
  return "object";
}

/**
 * Validate a plan: unknown step types, missing or mistyped parameters, bad
 * `dependsOn` entries, bad output references, duplicate IDs and cycles.
 * Safe to execute when `valid` is true.
 */
export function validatePlan(plan: ExecutionPlan): PlanValidation {
  const issues: PlanValidationIssue[] = [];
  const stepMap = new Map(plan.steps.map((s) => [s.id, s]));

  const seen = new Set<string>();
  for (const step of plan.steps) {
    if (seen.has(step.id)) {
      issues.push({ severity: "error", stepId: step.id, code: "DUPLICATE_ID", message: `Duplicate step ID "${step.id}"` });
    }
    seen.add(step.id);
  }

  for (const step of plan.steps) {
    const def = getStepDefinition(step.type);
    if (!def) {
      issues.push({ severity: "error", stepId: step.id, code: "UNKNOWN_STEP_TYPE", message: `Unknown step type "${step.type}"` });
      continue;
    }

    for (const paramDef of def.parameters) {
      const value = step.params[paramDef.name];
      if (value === undefined || value === null || value === "") {
        if (paramDef.required) {
          issues.push({
            severity: "error",
            stepId: step.id,
            code: "MISSING_PARAM",
            message: `Missing required parameter "${paramDef.name}" for step type "${step.type}"`,
          });
        }
        continue;
      }
      if (typeof value === "string" && (isOutputRef(value) || value.startsWith(GLOBAL_PREFIX))) continue;
      const actual = typeOf(value);
      if (actual !== paramDef.type) {
        issues.push({
          severity: "error",
          stepId: step.id,
          code: "INVALID_PARAM_TYPE",
          message: `Parameter "${paramDef.name}" of step "${step.id}" must be ${paramDef.type}, got ${actual}`,
        });
      }
    }

    for (const name of Object.keys(step.params)) {
      if (!def.parameters.some((p) => p.name === name)) {
        issues.push({
          severity: "warning",
          stepId: step.id,
          code: "UNKNOWN_PARAM",
          message: `Step type "${step.type}" takes no parameter "${name}"`,
        });
      }
    }
  }

  for (const step of plan.steps) {
    for (const depId of step.dependsOn) {
      if (depId === step.id) {
        issues.push({ severity: "error", stepId: step.id, code: "SELF_DEP", message: "Step depends on itself" });
      } else if (!stepMap.has(depId)) {
        issues.push({ severity: "error", stepId: step.id, code: "INVALID_DEP", message: `dependsOn refers to unknown step "${depId}"` });
      }
    }
  }

  for (const step of plan.steps) {
    for (const [paramName, value] of Object.entries(step.params)) {
      for (const ref of referencesIn(value)) {
        const parsed = parseOutputRef(ref);
        if (!parsed) continue;
        const source = stepMap.get(parsed.sourceStepId);
        if (!source) {
          issues.push({
            severity: "error",
            stepId: step.id,
            code: "UNKNOWN_OUTPUT_STEP",
            message: `Output ref "${ref}" in "${paramName}" refers to unknown step "${parsed.sourceStepId}"`,
          });
          continue;
        }
        const sourceDef = getStepDefinition(source.type);
        if (sourceDef && !sourceDef.outputs.some((o) => o.name === parsed.outputName)) {
          issues.push({
            severity: "error",
            stepId: step.id,
            code: "INVALID_OUTPUT_NAME",
            message: `Output ref "${ref}": step type "${source.type}" has no output named "${parsed.outputName}"`,
          });
        }
        if (!isTransitiveDependency(step.id, parsed.sourceStepId, stepMap)) {
          issues.push({
            severity: "warning",
            stepId: step.id,
            code: "UNDECLARED_DEP",
            message: `Output ref "${ref}" references step "${parsed.sourceStepId}" which is not a declared dependency`,
          });
        }
      }
    }
  }

  const cycle = detectCycle(plan.steps);
  if (cycle) {
    issues.push({ severity: "error", code: "CYCLE", message: `Circular dependency detected: ${cycle.join(" -> ")}` });
  }

  return { valid: issues.every((i) => i.severity !== "error"), issues };
}

/** Throw a VALIDATION error listing every error-level issue. */
export function assertValidPlan(plan: ExecutionPlan): void {
  const validation = validatePlan(plan);
  if (validation.valid) return;
  const errors = validation.issues.filter((i) => i.severity === "error").map((i) => (i.stepId ? `${i.stepId}: ${i.message}` : i.message));
  throw new ProvisioningError("VALIDATION", `Invalid plan "${plan.name}":\n  - ${errors.join("\n  - ")}`);
}

// =============================================================================
// Topological Sort
// =============================================================================

/**
 * Kahn's algorithm, layer by layer. Steps within a layer keep their plan
 * order, so the result is deterministic.
 */
export function topologicalSort(steps: readonly PlanStep[]): PlanStep[][] {
  const order = new Map(steps.map((s, i) => [s.id, i]));
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const step of steps) {
    inDegree.set(step.id, 0);
    dependents.set(step.id, []);
  }
  for (const step of steps) {
    for (const dep of dependenciesOf(step)) {
      const list = dependents.get(dep);
      if (!list) continue;
      list.push(step.id);
      inDegree.set(step.id, (inDegree.get(step.id) ?? 0) + 1);
    }
  }

  const byPlanOrder = (a: PlanStep, b: PlanStep) => (order.get(a.id) ?? 0) - (order.get(b.id) ?? 0);
  const layers: PlanStep[][] = [];
  let layer = steps.filter((s) => inDegree.get(s.id) === 0);
  let processed = 0;

  while (layer.length > 0) {
    layers.push(layer);
    processed += layer.length;
    const next: PlanStep[] = [];
    for (const step of layer) {
      for (const id of dependents.get(step.id) ?? []) {
        const degree = (inDegree.get(id) ?? 1) - 1;
        inDegree.set(id, degree);
        const dependent = steps[order.get(id) ?? -1];
        if (degree === 0 && dependent) next.push(dependent);
      }
    }
    layer = next.sort(byPlanOrder);
  }

  if (processed < steps.length) {
    throw new ProvisioningError("VALIDATION", "Cycle detected in execution plan");
  }
  return layers;
}

export function flattenLayers(layers: PlanStep[][]): PlanStep[] {
  return layers.flat();
}

/**
 * Linear run order. Among the steps whose dependencies are done, the one in
 * the earliest phase runs first, ties broken by plan order. Call on a plan
 * that passed `topologicalSort`.
 */
export function executionOrder(steps: readonly PlanStep[]): PlanStep[] {
  const rank = new Map(
    steps.map((s, i) => {
      const phase = getStepDefinition(s.type)?.phase;
      const phaseIndex = phase ? PHASE_ORDER.indexOf(phase) : PHASE_ORDER.length;
      return [s.id, phaseIndex * steps.length + i];
    }),
  );
  const done = new Set<string>();
  const remaining = [...steps];
  const ordered: PlanStep[] = [];

  while (remaining.length > 0) {
    let best = -1;
    for (let i = 0; i < remaining.length; i++) {
      const candidate = remaining[i];
      const ready = [...dependenciesOf(candidate)].every((dep) => done.has(dep) || !rank.has(dep));
      if (ready && (best < 0 || (rank.get(candidate.id) ?? 0) < (rank.get(remaining[best].id) ?? 0))) best = i;
    }
    if (best < 0) throw new ProvisioningError("VALIDATION", "Cycle detected in execution plan");
    const [next] = remaining.splice(best, 1);
    ordered.push(next);
    done.add(next.id);
  }
  return ordered;
}

// =============================================================================
// Parameter Resolution
// =============================================================================

function resolveValue(
  value: unknown,
  outputs: ReadonlyMap<string, Record<string, unknown>>,
  globalParams: Record<string, unknown>,
): unknown {
  if (Array.isArray(value)) return value.map((v) => resolveValue(v, outputs, globalParams));
  if (typeof value !== "string") return value;

  const parsed = parseOutputRef(value);
  if (parsed) {
    const stepOutputs = outputs.get(parsed.sourceStepId);
    if (!stepOutputs) {
      throw new ProvisioningError("VALIDATION", `Cannot resolve "${value}": step "${parsed.sourceStepId}" has no outputs yet`);
    }
    const outputValue = stepOutputs[parsed.outputName];
    if (outputValue === undefined) {
      throw new ProvisioningError(
        "VALIDATION",
        `Cannot resolve "${value}": output "${parsed.outputName}" not found in step "${parsed.sourceStepId}"`,
      );
    }
    return outputValue;
  }
  if (value.startsWith(GLOBAL_PREFIX)) {
    return globalParams[value.slice(GLOBAL_PREFIX.length)] ?? value;
  }
  return value;
}

/** Substitute output references and `$global.` values in a step's params. */
export function resolveStepParams(
  step: PlanStep,
  outputs: ReadonlyMap<string, Record<string, unknown>>,
  globalParams: Record<string, unknown>,
): Record<string, unknown> {
  const resolved: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(step.params)) {
    resolved[key] = resolveValue(value, outputs, globalParams);
  }
  return resolved;
}

// =============================================================================
// Helpers
// =============================================================================

function isTransitiveDependency(stepId: string, sourceStepId: string, stepMap: Map<string, PlanStep>): boolean {
  const visited = new Set<string>();
  const queue = [stepId];

  for (let current = queue.pop(); current !== undefined; current = queue.pop()) {
    if (visited.has(current)) continue;
    visited.add(current);
    for (const dep of stepMap.get(current)?.dependsOn ?? []) {
      if (dep === sourceStepId) return true;
      queue.push(dep);
    }
  }
  return false;
}

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

/** Depth-first cycle search. Returns the cycle path, or null. */
function detectCycle(steps: readonly PlanStep[]): string[] | null {
  const stepMap = new Map(steps.map((s) => [s.id, s]));
  const color = new Map<string, number>(steps.map((s) => [s.id, WHITE]));
  const path: string[] = [];

  const visit = (id: string): string[] | null => {
    color.set(id, GRAY);
    path.push(id);
    const step = stepMap.get(id);
    for (const dep of step ? dependenciesOf(step) : []) {
      const c = color.get(dep);
      if (c === undefined) continue;
      if (c === GRAY) return [...path.slice(path.indexOf(dep)), dep];
      if (c === WHITE) {
        const cycle = visit(dep);
        if (cycle) return cycle;
      }
    }
    path.pop();
    color.set(id, BLACK);
    return null;
  };

  for (const step of steps) {
    if (color.get(step.id) === WHITE) {
      const cycle = visit(step.id);
      if (cycle) return cycle;
    }
  }
  return null;
}
