/**
 * Diagnostics Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  enableDiagnostics,
  disableDiagnostics,
  isDiagnosticsEnabled,
  onDiagnosticEvent,
  emitDiagnosticEvent,
  instrumentedCall,
  recordResourceChange,
  resetDiagnosticsForTest,
  type DiagnosticEvent,
} from "./diagnostics.js";

beforeEach(() => {
  resetDiagnosticsForTest();
});

describe("enableDiagnostics / disableDiagnostics", () => {
  it("toggles diagnostics state", () => {
    expect(isDiagnosticsEnabled()).toBe(false);
    enableDiagnostics();
    expect(isDiagnosticsEnabled()).toBe(true);
    disableDiagnostics();
    expect(isDiagnosticsEnabled()).toBe(false);
  });
});

describe("onDiagnosticEvent", () => {
  it("numbers events in emission order", () => {
    enableDiagnostics();
    const events: DiagnosticEvent[] = [];
    onDiagnosticEvent((e) => events.push(e));

    emitDiagnosticEvent({ type: "azure.api.call", service: "sql", operation: "servers.get" });
    emitDiagnosticEvent({ type: "azure.api.call", service: "sql", operation: "databases.get" });

    expect(events.map((e) => [e.seq, e.operation])).toEqual([
      [1, "servers.get"],
      [2, "databases.get"],
    ]);
  });

  it("does not emit when disabled", () => {
    const listener = vi.fn();
    onDiagnosticEvent(listener);
    emitDiagnosticEvent({ type: "azure.api.call", service: "sql", operation: "servers.get" });
    expect(listener).not.toHaveBeenCalled();
  });

  it("unsubscribes and survives a throwing listener", () => {
    enableDiagnostics();
    const listener = vi.fn();
    onDiagnosticEvent(() => {
      throw new Error("listener bug");
    });
    const unsub = onDiagnosticEvent(listener);

    emitDiagnosticEvent({ type: "azure.api.call", service: "sql", operation: "a" });
    unsub();
    emitDiagnosticEvent({ type: "azure.api.call", service: "sql", operation: "b" });

    expect(listener).toHaveBeenCalledTimes(1);
  });
});

describe("instrumentedCall", () => {
  it("records a successful call with its target", async () => {
    enableDiagnostics();
    const events: DiagnosticEvent[] = [];
    onDiagnosticEvent((e) => events.push(e));

    const result = await instrumentedCall("keyvault", "vaults.get", async () => "vault", {
      resourceKind: "key-vault",
      resourceName: "demo-kv",
    });

    expect(result).toBe("vault");
    expect(events[0]).toMatchObject({
      type: "azure.api.call",
      service: "keyvault",
      operation: "vaults.get",
      resourceKind: "key-vault",
      resourceName: "demo-kv",
    });
  });

  it("records and rethrows failures with status and message", async () => {
    enableDiagnostics();
    const events: DiagnosticEvent[] = [];
    onDiagnosticEvent((e) => events.push(e));
    const failure = { statusCode: 409, message: "Conflict" };

    await expect(instrumentedCall("sql", "servers.create", () => Promise.reject(failure))).rejects.toBe(failure);
    expect(events[0]).toMatchObject({ type: "azure.api.error", statusCode: 409, error: "Conflict" });
  });

  it("passes straight through when disabled", async () => {
    const listener = vi.fn();
    onDiagnosticEvent(listener);
    expect(await instrumentedCall("sql", "servers.get", async () => 1)).toBe(1);
    expect(listener).not.toHaveBeenCalled();
  });
});

describe("recordResourceChange", () => {
  it("emits a resource change event", () => {
    enableDiagnostics();
    const events: DiagnosticEvent[] = [];
    onDiagnosticEvent((e) => events.push(e));

    recordResourceChange("sql-database", "AMPSaaSDB", "create", "demo");

    expect(events[0]).toMatchObject({
      type: "azure.resource.change",
      resourceKind: "sql-database",
      resourceName: "AMPSaaSDB",
      resourceGroup: "demo",
      operation: "create",
    });
  });
});
