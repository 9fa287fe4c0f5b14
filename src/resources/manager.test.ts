/**
 * Azure Resource Manager: Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { ResourceEnsurer } from "../ensurer/index.js";
import { createLogger, MemoryTransport } from "../logging/index.js";
import type { ProvisioningContext } from "../types.js";
import { AzureResourceManager } from "./manager.js";

const { mockResourceGroups } = vi.hoisted(() => ({
  mockResourceGroups: { get: vi.fn(), createOrUpdate: vi.fn() },
}));

vi.mock("@azure/arm-resources", () => ({
  ResourceManagementClient: vi.fn().mockImplementation(function () {
    return { resourceGroups: mockResourceGroups };
  }),
}));

const context: ProvisioningContext = {
  tenantId: "tenant-1",
  subscriptionId: "sub-1",
  credential: { getToken: vi.fn() },
};

const RG_ID = "/subscriptions/sub-1/resourceGroups/demo";

describe("AzureResourceManager", () => {
  let mgr: AzureResourceManager;

  beforeEach(() => {
    vi.clearAllMocks();
    mgr = new AzureResourceManager(context, { maxAttempts: 1, minDelayMs: 0, maxDelayMs: 0 });
  });

  it("maps an existing resource group", async () => {
    mockResourceGroups.get.mockResolvedValue({
      id: RG_ID,
      name: "demo",
      location: "eastus",
      tags: { env: "test" },
      properties: { provisioningState: "Succeeded" },
    });

    expect(await mgr.getResourceGroup("demo")).toEqual({
      id: RG_ID,
      name: "demo",
      location: "eastus",
      tags: { env: "test" },
      provisioningState: "Succeeded",
    });
  });

  it("returns null when the group does not exist", async () => {
    mockResourceGroups.get.mockRejectedValue({ code: "ResourceGroupNotFound", statusCode: 404 });
    expect(await mgr.getResourceGroup("missing")).toBeNull();
  });

  it("rethrows authorization failures", async () => {
    mockResourceGroups.get.mockRejectedValue({ code: "AuthorizationFailed", statusCode: 403 });
    await expect(mgr.getResourceGroup("demo")).rejects.toMatchObject({ code: "AuthorizationFailed" });
  });

  it("creates with location and tags", async () => {
    mockResourceGroups.createOrUpdate.mockResolvedValue({ id: RG_ID, name: "demo", location: "eastus" });

    const rg = await mgr.createResourceGroup("demo", "eastus", { app: "saas" });

    expect(mockResourceGroups.createOrUpdate).toHaveBeenCalledWith("demo", { location: "eastus", tags: { app: "saas" } });
    expect(rg.id).toBe(RG_ID);
  });

  it("is created once when ensured twice", async () => {
    mockResourceGroups.get
      .mockRejectedValueOnce({ statusCode: 404 })
      .mockResolvedValue({ id: RG_ID, name: "demo", location: "eastus" });
    mockResourceGroups.createOrUpdate.mockResolvedValue({ id: RG_ID, name: "demo", location: "eastus" });
    const ensurer = new ResourceEnsurer({ logger: createLogger("test", { transports: [new MemoryTransport()] }) });
    const driver = mgr.resourceGroupDriver("demo", "eastus");

    const first = await ensurer.ensure(driver);
    const second = await ensurer.ensure(driver);

    expect([first.created, second.created]).toEqual([true, false]);
    expect(second.resourceId).toBe(first.resourceId);
    expect(first.attributes).toEqual({ location: "eastus" });
    expect(mockResourceGroups.createOrUpdate).toHaveBeenCalledTimes(1);
  });
});
