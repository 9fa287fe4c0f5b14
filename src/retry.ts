/**
 * Retry Utilities
 *
 * Two retry policies live here:
 * - `withAzureRetry`: exponential backoff with jitter for transient faults
 *   (throttling, 5xx, dropped sockets). Applies to any control-plane call.
 * - `withPropagationRetry`: a bounded number of attempts with a fixed delay,
 *   only for operations known to race with dependency propagation.
 */

import type { AzureRetryOptions, PropagationRetryOptions, ResourceKind } from "./types.js";
import {
  ProvisioningError,
  errorCodeOf,
  errorMessageOf,
  isPropagationError,
  statusCodeOf,
} from "./errors.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<AzureRetryOptions>;

export const AZURE_RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

export const PROPAGATION_RETRY_DEFAULTS: Required<PropagationRetryOptions> = {
  attempts: 3,
  delayMs: 10_000,
};

/**
 * Azure error codes that are safe to retry.
 */
export const AZURE_RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  "ERR_SOCKET_CONNECTION_TIMEOUT",
  "RequestTimeout",
  "ServiceUnavailable",
  "InternalServerError",
  "ServerBusy",
  "TooManyRequests",
  "OperationTimedOut",
  "GatewayTimeout",
  "ServiceTimeout",
  "RetryableError",
]);

const RETRYABLE_MESSAGE_PATTERNS = [
  "throttl",
  "too many requests",
  "rate limit",
  "server busy",
  "temporarily unavailable",
  "service unavailable",
  "connection reset",
  "socket hang up",
  "econnreset",
  "etimedout",
  "network error",
  "fetch failed",
];

// =============================================================================
// Error Checking
// =============================================================================

/**
 * Determine whether an Azure error is a transient fault that is safe to retry.
 */
export function shouldRetryAzureError(error: unknown): boolean {
  if (error === null || error === undefined) return false;
  if (error instanceof ProvisioningError) return false;

  const code = errorCodeOf(error);
  if (code && AZURE_RETRYABLE_CODES.has(code)) return true;

  const statusCode = statusCodeOf(error) ?? 0;
  if (statusCode === 429) return true;
  if (statusCode >= 500 && statusCode < 600) return true;

  const message = errorMessageOf(error).toLowerCase();
  return RETRYABLE_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern));
}

function headerValue(error: unknown, name: string): string | undefined {
  if (typeof error !== "object" || error === null || !("headers" in error)) return undefined;
  const { headers } = error;
  if (typeof headers !== "object" || headers === null) return undefined;
  if ("get" in headers && typeof headers.get === "function") {
    const value: unknown = headers.get(name);
    return typeof value === "string" ? value : undefined;
  }
  const raw: unknown = Reflect.get(headers, name) ?? Reflect.get(headers, name.toLowerCase());
  return typeof raw === "string" ? raw : undefined;
}

/**
 * Extract the Retry-After header from an Azure error response (in ms).
 */
export function getAzureRetryAfterMs(error: unknown): number | null {
  const retryAfter = headerValue(error, "retry-after");
  if (!retryAfter) return null;

  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return null;
}

// =============================================================================
// Retry Execution
// =============================================================================

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with transient-fault retry logic.
 */
export async function withAzureRetry<T>(
  fn: () => Promise<T>,
  options?: AzureRetryOptions,
): Promise<T> {
  const config: RetryConfig = {
    maxAttempts: options?.maxAttempts ?? AZURE_RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? AZURE_RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? AZURE_RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? AZURE_RETRY_DEFAULTS.jitterFactor,
  };

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!shouldRetryAzureError(error)) break;

      const retryAfterMs = getAzureRetryAfterMs(error);
      let delayMs: number;

      if (retryAfterMs !== null) {
        delayMs = Math.min(retryAfterMs, config.maxDelayMs);
      } else {
        const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
        const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
        const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
        delayMs = Math.max(config.minDelayMs, cappedDelay + jitter);
      }

      await sleep(delayMs);
    }
  }

  throw lastError;
}

export type PropagationTarget = {
  kind: ResourceKind;
  name: string;
  operation: string;
};

/**
 * Retry an operation that races with dependency propagation.
 *
 * Only propagation failures are retried, with a fixed delay between attempts.
 * Anything else is rethrown at once. When every attempt fails the error names
 * the resource and operation.
 */
export async function withPropagationRetry<T>(
  target: PropagationTarget,
  fn: () => Promise<T>,
  options?: PropagationRetryOptions,
  onRetry?: (attempt: number, error: unknown) => void,
): Promise<T> {
  const attempts = Math.max(1, options?.attempts ?? PROPAGATION_RETRY_DEFAULTS.attempts);
  const delayMs = options?.delayMs ?? PROPAGATION_RETRY_DEFAULTS.delayMs;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isPropagationError(error)) throw error;
      lastError = error;
      if (attempt < attempts) {
        onRetry?.(attempt, error);
        await sleep(delayMs);
      }
    }
  }

  throw new ProvisioningError(
    "PROPAGATION",
    `${target.operation} ${target.kind} "${target.name}" failed after ${attempts} attempts: ${errorMessageOf(lastError)}`,
    { resourceKind: target.kind, resourceName: target.name, operation: target.operation, cause: lastError },
  );
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an error into a single human-readable line.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  if (error instanceof ProvisioningError) {
    return error.remediation ? `${error.message} (${error.remediation})` : error.message;
  }

  const code = errorCodeOf(error);
  const statusCode = statusCodeOf(error);
  const parts: string[] = [];
  if (code) parts.push(`[${code}]`);
  if (statusCode) parts.push(`(HTTP ${statusCode})`);
  parts.push(errorMessageOf(error) || "Unknown error");

  return parts.join(" ");
}
