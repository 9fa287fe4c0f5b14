/**
 * Provisioning Errors
 *
 * Error taxonomy for a provisioning run. Everything except a not-found read
 * propagates to the top level and terminates the run.
 */

import type { ResourceKind } from "./types.js";

export type ProvisioningErrorCode =
  | "VALIDATION"
  | "NOT_FOUND"
  | "PROPAGATION"
  | "AUTHENTICATION"
  | "CONFLICT"
  | "TRUST_MODEL"
  | "TOOL_FAILED"
  | "TIMEOUT";

export type ProvisioningErrorOptions = {
  resourceKind?: ResourceKind;
  resourceName?: string;
  operation?: string;
  remediation?: string;
  cause?: unknown;
};

export class ProvisioningError extends Error {
  readonly code: ProvisioningErrorCode;
  readonly resourceKind?: ResourceKind;
  readonly resourceName?: string;
  readonly operation?: string;
  readonly remediation?: string;
  override readonly cause?: unknown;

  constructor(code: ProvisioningErrorCode, message: string, options?: ProvisioningErrorOptions) {
    super(message);
    this.name = "ProvisioningError";
    this.code = code;
    this.resourceKind = options?.resourceKind;
    this.resourceName = options?.resourceName;
    this.operation = options?.operation;
    this.remediation = options?.remediation;
    this.cause = options?.cause;
    Error.captureStackTrace?.(this, ProvisioningError);
  }
}

export function validationError(message: string): ProvisioningError {
  return new ProvisioningError("VALIDATION", message);
}

export function conflictError(
  kind: ResourceKind,
  name: string,
  message: string,
  remediation: string,
): ProvisioningError {
  return new ProvisioningError("CONFLICT", message, {
    resourceKind: kind,
    resourceName: name,
    remediation,
  });
}

export function isProvisioningError(error: unknown): error is ProvisioningError {
  return error instanceof ProvisioningError;
}

// =============================================================================
// Classification of raw SDK / REST failures
// =============================================================================

function field(error: unknown, key: string): unknown {
  return typeof error === "object" && error !== null ? Reflect.get(error, key) : undefined;
}

/** The status code an ARM, Graph or Kudu failure carries, if any. */
export function statusCodeOf(error: unknown): number | undefined {
  const statusCode = field(error, "statusCode");
  const status = field(error, "status");
  if (typeof statusCode === "number") return statusCode;
  if (typeof status === "number") return status;
  return undefined;
}

export function errorCodeOf(error: unknown): string | undefined {
  const code = field(error, "code");
  return typeof code === "string" ? code : undefined;
}

export function errorMessageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  const message = field(error, "message");
  return typeof message === "string" ? message : String(error);
}

const NOT_FOUND_CODES = new Set([
  "ResourceNotFound",
  "ResourceGroupNotFound",
  "NotFound",
  "ParentResourceNotFound",
  "SecretNotFound",
  "Request_ResourceNotFound",
]);

export function isNotFoundError(error: unknown): boolean {
  if (statusCodeOf(error) === 404) return true;
  const code = errorCodeOf(error);
  return code !== undefined && NOT_FOUND_CODES.has(code);
}

const PROPAGATION_CODES = new Set([
  "ParentResourceNotFound",
  "ReferencedResourceNotProvisioned",
  "AnotherOperationInProgress",
  "InUseSubnetCannotBeUpdated",
  "PrincipalNotFound",
  "Request_ResourceNotFound",
  "InvalidResourceReference",
]);

/**
 * Whether a failure looks like the dependent resource is not yet visible to
 * the control plane (as opposed to a real fault).
 */
export function isPropagationError(error: unknown): boolean {
  if (isProvisioningError(error)) return error.code === "PROPAGATION";
  const code = errorCodeOf(error);
  if (code !== undefined && PROPAGATION_CODES.has(code)) return true;
  const message = errorMessageOf(error).toLowerCase();
  return (
    message.includes("does not exist in the directory") ||
    message.includes("not yet provisioned") ||
    message.includes("another operation is in progress") ||
    message.includes("does not reference a valid application object")
  );
}
