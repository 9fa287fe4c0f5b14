/**
 * Typed access to resolved step parameters.
 */

import { ProvisioningError } from "../errors.js";

function invalid(name: string, expected: string, value: unknown): ProvisioningError {
  const got = Array.isArray(value) ? "array" : value === null ? "null" : typeof value;
  return new ProvisioningError("VALIDATION", `Step parameter "${name}" must be ${expected} (got ${got})`);
}

export function stringParam(params: Record<string, unknown>, name: string): string {
  const value = params[name];
  if (typeof value !== "string" || value.length === 0) throw invalid(name, "a non-empty string", value);
  return value;
}

export function optionalStringParam(params: Record<string, unknown>, name: string): string | undefined {
  const value = params[name];
  if (value === undefined || value === null || value === "") return undefined;
  if (typeof value !== "string") throw invalid(name, "a string", value);
  return value;
}

export function booleanParam(params: Record<string, unknown>, name: string, fallback = false): boolean {
  const value = params[name];
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") throw invalid(name, "a boolean", value);
  return value;
}

export function stringArrayParam(params: Record<string, unknown>, name: string): string[] {
  const value = params[name];
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw invalid(name, "an array of strings", value);
  const result: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") throw invalid(name, "an array of strings", value);
    result.push(item);
  }
  return result;
}

export function stringRecordParam(params: Record<string, unknown>, name: string): Record<string, string> {
  const value = params[name];
  if (value === undefined) return {};
  if (typeof value !== "object" || value === null || Array.isArray(value)) throw invalid(name, "an object", value);
  const result: Record<string, string> = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item !== "string") throw invalid(`${name}.${key}`, "a string", item);
    result[key] = item;
  }
  return result;
}

/** A string parameter restricted to a fixed set of values. */
export function choiceParam<T extends string>(params: Record<string, unknown>, name: string, choices: readonly T[]): T {
  const value = params[name];
  const match = choices.find((c) => c === value);
  if (match === undefined) throw invalid(name, `one of ${choices.join(", ")}`, value);
  return match;
}
