/**
 * Diagnostics
 *
 * Event stream for control-plane call tracing. Every read and write that
 * goes to Azure Resource Manager, Microsoft Graph, Key Vault or Kudu passes
 * through `instrumentedCall`, so a subscriber sees the full call sequence of a
 * run (tests use this to assert that validation failures make no call).
 */

import { errorMessageOf, statusCodeOf } from "./errors.js";
import type { ResourceKind } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type DiagnosticEventType =
  | "azure.api.call"
  | "azure.api.error"
  | "azure.credential.refresh"
  | "azure.resource.change";

export type DiagnosticEvent = {
  type: DiagnosticEventType;
  timestamp: number;
  seq: number;
  service: string;
  operation: string;
  durationMs?: number;
  resourceKind?: ResourceKind;
  resourceName?: string;
  resourceGroup?: string;
  statusCode?: number;
  error?: string;
  metadata?: Record<string, unknown>;
};

export type DiagnosticListener = (event: DiagnosticEvent) => void;

export type CallTarget = {
  resourceKind?: ResourceKind;
  resourceName?: string;
  resourceGroup?: string;
  metadata?: Record<string, unknown>;
};

// =============================================================================
// Global State
// =============================================================================

let diagnosticsEnabled = false;
let seq = 0;
const listeners = new Set<DiagnosticListener>();

// =============================================================================
// Public API
// =============================================================================

export function enableDiagnostics(): void {
  diagnosticsEnabled = true;
}

export function disableDiagnostics(): void {
  diagnosticsEnabled = false;
}

export function isDiagnosticsEnabled(): boolean {
  return diagnosticsEnabled;
}

/** Subscribe to diagnostic events. Returns an unsubscribe function. */
export function onDiagnosticEvent(listener: DiagnosticListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

export function emitDiagnosticEvent(event: Omit<DiagnosticEvent, "timestamp" | "seq">): void {
  if (!diagnosticsEnabled) return;

  const fullEvent: DiagnosticEvent = {
    ...event,
    timestamp: Date.now(),
    seq: ++seq,
  };

  for (const listener of listeners) {
    try {
      listener(fullEvent);
    } catch {
      // a failing subscriber must not fail the provisioning call
    }
  }
}

/**
 * Wrap a control-plane call with diagnostic instrumentation.
 */
export async function instrumentedCall<T>(
  service: string,
  operation: string,
  fn: () => Promise<T>,
  target?: CallTarget,
): Promise<T> {
  if (!diagnosticsEnabled) return fn();

  const start = Date.now();

  try {
    const result = await fn();
    emitDiagnosticEvent({
      type: "azure.api.call",
      service,
      operation,
      durationMs: Date.now() - start,
      ...target,
    });
    return result;
  } catch (error) {
    emitDiagnosticEvent({
      type: "azure.api.error",
      service,
      operation,
      durationMs: Date.now() - start,
      statusCode: statusCodeOf(error),
      error: errorMessageOf(error),
      ...target,
    });
    throw error;
  }
}

/** Record that a resource was created (or a write changed it). */
export function recordResourceChange(kind: ResourceKind, name: string, operation: string, resourceGroup?: string): void {
  emitDiagnosticEvent({
    type: "azure.resource.change",
    service: kind,
    operation,
    resourceKind: kind,
    resourceName: name,
    resourceGroup,
  });
}

export function resetDiagnosticsForTest(): void {
  diagnosticsEnabled = false;
  seq = 0;
  listeners.clear();
}
