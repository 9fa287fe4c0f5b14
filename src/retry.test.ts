/**
 * Retry Tests
 */

import { describe, it, expect, vi } from "vitest";
import { ProvisioningError } from "./errors.js";
import {
  shouldRetryAzureError,
  getAzureRetryAfterMs,
  withAzureRetry,
  withPropagationRetry,
  formatErrorMessage,
  AZURE_RETRYABLE_CODES,
} from "./retry.js";

describe("shouldRetryAzureError", () => {
  it("returns false for null/undefined", () => {
    expect(shouldRetryAzureError(null)).toBe(false);
    expect(shouldRetryAzureError(undefined)).toBe(false);
  });

  it("retries known Azure error codes", () => {
    for (const code of AZURE_RETRYABLE_CODES) {
      expect(shouldRetryAzureError({ code })).toBe(true);
    }
  });

  it("retries throttling and 5xx, not other 4xx", () => {
    expect(shouldRetryAzureError({ statusCode: 429 })).toBe(true);
    expect(shouldRetryAzureError({ statusCode: 503 })).toBe(true);
    expect(shouldRetryAzureError({ status: 502 })).toBe(true);
    expect(shouldRetryAzureError({ statusCode: 400 })).toBe(false);
    expect(shouldRetryAzureError({ statusCode: 409 })).toBe(false);
  });

  it("retries errors with retryable message patterns", () => {
    expect(shouldRetryAzureError(new Error("socket hang up"))).toBe(true);
    expect(shouldRetryAzureError({ message: "Request was throttled" })).toBe(true);
  });

  it("never retries a classified provisioning error", () => {
    expect(shouldRetryAzureError(new ProvisioningError("CONFLICT", "service unavailable"))).toBe(false);
  });
});

describe("getAzureRetryAfterMs", () => {
  it("parses seconds from a plain header object", () => {
    expect(getAzureRetryAfterMs({ headers: { "retry-after": "5" } })).toBe(5000);
  });

  it("reads a Headers-like object", () => {
    const headers = new Map([["retry-after", "2"]]);
    expect(getAzureRetryAfterMs({ headers })).toBe(2000);
  });

  it("returns null without a header", () => {
    expect(getAzureRetryAfterMs({ message: "error" })).toBe(null);
    expect(getAzureRetryAfterMs({ headers: {} })).toBe(null);
    expect(getAzureRetryAfterMs(undefined)).toBe(null);
  });
});

describe("withAzureRetry", () => {
  it("retries a transient error and succeeds", async () => {
    const fn = vi.fn().mockRejectedValueOnce({ code: "TooManyRequests", statusCode: 429 }).mockResolvedValue("ok");

    await expect(withAzureRetry(fn, { maxAttempts: 3, minDelayMs: 1, maxDelayMs: 10 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("throws the last error after exhausting attempts", async () => {
    const error = { code: "ServiceUnavailable", statusCode: 503, message: "Down" };
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withAzureRetry(fn, { maxAttempts: 2, minDelayMs: 1, maxDelayMs: 10 })).rejects.toEqual(error);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry non-retryable errors", async () => {
    const error = { code: "ResourceNotFound", statusCode: 404, message: "Not found" };
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withAzureRetry(fn, { maxAttempts: 3, minDelayMs: 1, maxDelayMs: 10 })).rejects.toEqual(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("withPropagationRetry", () => {
  const target = { kind: "key-vault" as const, name: "demo-kv", operation: "set-access-policy" };

  it("makes exactly the configured number of attempts and names the resource", async () => {
    const fn = vi.fn().mockRejectedValue({ code: "PrincipalNotFound", message: "Principal does not exist in the directory" });
    const onRetry = vi.fn();

    const error = await withPropagationRetry(target, fn, { attempts: 4, delayMs: 0 }, onRetry).catch((e: unknown) => e);

    expect(fn).toHaveBeenCalledTimes(4);
    expect(onRetry).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(ProvisioningError);
    expect(error).toMatchObject({
      code: "PROPAGATION",
      resourceKind: "key-vault",
      resourceName: "demo-kv",
      operation: "set-access-policy",
      message: 'set-access-policy key-vault "demo-kv" failed after 4 attempts: Principal does not exist in the directory',
    });
  });

  it("stops on the first success", async () => {
    const fn = vi.fn().mockRejectedValueOnce({ code: "ParentResourceNotFound", message: "parent" }).mockResolvedValue("done");

    await expect(withPropagationRetry(target, fn, { attempts: 3, delayMs: 0 })).resolves.toBe("done");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("rethrows other failures at once", async () => {
    const error = { code: "AuthorizationFailed", statusCode: 403, message: "Forbidden" };
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withPropagationRetry(target, fn, { attempts: 3, delayMs: 0 })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("formatErrorMessage", () => {
  it("handles empty and string errors", () => {
    expect(formatErrorMessage(undefined)).toBe("Unknown error");
    expect(formatErrorMessage("boom")).toBe("boom");
  });

  it("appends a remediation hint", () => {
    const error = new ProvisioningError("CONFLICT", 'SQL server name "demo-sql" is taken', { remediation: "choose another prefix" });
    expect(formatErrorMessage(error)).toBe('SQL server name "demo-sql" is taken (choose another prefix)');
  });

  it("formats SDK errors with code and status", () => {
    expect(formatErrorMessage({ code: "Forbidden", statusCode: 403, message: "Access denied" })).toBe(
      "[Forbidden] (HTTP 403) Access denied",
    );
  });
});
