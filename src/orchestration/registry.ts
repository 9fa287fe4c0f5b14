/**
 * Step Registry
 *
 * Central registry for step type definitions and their handlers.
 */

import type { StepHandler, StepPhase, StepTypeDefinition, StepTypeId } from "./types.js";

const stepDefinitions = new Map<StepTypeId, StepTypeDefinition>();
const stepHandlers = new Map<StepTypeId, StepHandler>();

export function registerStepType(definition: StepTypeDefinition, handler: StepHandler): void {
  if (stepDefinitions.has(definition.id)) {
    throw new Error(`Step type "${definition.id}" is already registered`);
  }
  stepDefinitions.set(definition.id, definition);
  stepHandlers.set(definition.id, handler);
}

export function getStepDefinition(id: StepTypeId): StepTypeDefinition | undefined {
  return stepDefinitions.get(id);
}

export function getStepHandler(id: StepTypeId): StepHandler | undefined {
  return stepHandlers.get(id);
}

export function listStepTypes(): StepTypeDefinition[] {
  return [...stepDefinitions.values()];
}

export function listStepTypesByPhase(phase: StepPhase): StepTypeDefinition[] {
  return [...stepDefinitions.values()].filter((d) => d.phase === phase);
}

export function hasStepType(id: StepTypeId): boolean {
  return stepDefinitions.has(id);
}

/** Clear all registrations (tests). */
export function clearStepRegistry(): void {
  stepDefinitions.clear();
  stepHandlers.clear();
}
