/**
 * Azure Key Vault Manager: Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { AzureKeyVaultManager, hasPermissions } from "./manager.js";
import { READER_PERMISSIONS } from "./types.js";
import type { ProvisioningContext } from "../types.js";

// ---------------------------------------------------------------------------
// Mock SDK
// ---------------------------------------------------------------------------

const mockVaults = {
  get: vi.fn(),
  beginCreateOrUpdateAndWait: vi.fn(),
  checkNameAvailability: vi.fn(),
  getDeleted: vi.fn(),
  updateAccessPolicy: vi.fn(),
};

vi.mock("@azure/arm-keyvault", () => ({
  KeyVaultManagementClient: vi.fn().mockImplementation(function () {
    return { vaults: mockVaults };
  }),
}));

const context: ProvisioningContext = {
  tenantId: "tenant-1",
  subscriptionId: "sub-1",
  credential: { getToken: vi.fn() },
};

function vault(accessPolicies: Array<{ objectId: string; permissions: { secrets?: string[]; keys?: string[] } }> = []) {
  return {
    id: "/subscriptions/sub-1/resourceGroups/rg-1/providers/Microsoft.KeyVault/vaults/demo-kv",
    name: "demo-kv",
    location: "eastus",
    properties: {
      tenantId: "tenant-1",
      sku: { family: "A", name: "standard" },
      vaultUri: "https://demo-kv.vault.azure.net/",
      provisioningState: "Succeeded",
      accessPolicies,
    },
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("AzureKeyVaultManager", () => {
  let mgr: AzureKeyVaultManager;

  beforeEach(() => {
    vi.clearAllMocks();
    mgr = new AzureKeyVaultManager(context, { maxAttempts: 1, minDelayMs: 0, maxDelayMs: 0 }, { attempts: 3, delayMs: 0 });
  });

  describe("getVault", () => {
    it("maps vault URI and access policies", async () => {
      mockVaults.get.mockResolvedValue(vault([{ objectId: "oid-1", permissions: { secrets: ["get", "list"] } }]));
      const kv = await mgr.getVault("rg-1", "demo-kv");
      expect(kv?.vaultUri).toBe("https://demo-kv.vault.azure.net/");
      expect(kv?.accessPolicies).toEqual([{ objectId: "oid-1", secrets: ["get", "list"], keys: [] }]);
    });

    it("returns null on 404", async () => {
      mockVaults.get.mockRejectedValue({ statusCode: 404 });
      expect(await mgr.getVault("rg-1", "demo-kv")).toBeNull();
    });
  });

  describe("createVault", () => {
    it("creates a standard vault in the context tenant with no policies", async () => {
      mockVaults.beginCreateOrUpdateAndWait.mockResolvedValue(vault());
      await mgr.createVault("rg-1", "demo-kv", "eastus");
      expect(mockVaults.beginCreateOrUpdateAndWait).toHaveBeenCalledWith("rg-1", "demo-kv", {
        location: "eastus",
        properties: {
          tenantId: "tenant-1",
          sku: { family: "A", name: "standard" },
          accessPolicies: [],
          enableSoftDelete: true,
        },
        tags: undefined,
      });
    });
  });

  describe("assertVaultNameAvailable", () => {
    it("passes when the name is free", async () => {
      mockVaults.checkNameAvailability.mockResolvedValue({ nameAvailable: true });
      await expect(mgr.assertVaultNameAvailable("demo-kv", "eastus")).resolves.toBeUndefined();
    });

    it("suggests a purge when a soft-deleted vault holds the name", async () => {
      mockVaults.checkNameAvailability.mockResolvedValue({ nameAvailable: false, reason: "AlreadyExists" });
      mockVaults.getDeleted.mockResolvedValue({ name: "demo-kv" });
      await expect(mgr.assertVaultNameAvailable("demo-kv", "eastus")).rejects.toMatchObject({
        code: "CONFLICT",
        message: 'Key Vault "demo-kv" exists in a soft-deleted state',
        remediation:
          "purge the soft-deleted vault (az keyvault purge --name demo-kv --location eastus) or pass a different --key-vault name",
      });
    });

    it("suggests a rename when another tenant owns the name", async () => {
      mockVaults.checkNameAvailability.mockResolvedValue({ nameAvailable: false, message: "taken" });
      mockVaults.getDeleted.mockRejectedValue({ statusCode: 404 });
      await expect(mgr.assertVaultNameAvailable("demo-kv", "eastus")).rejects.toMatchObject({
        code: "CONFLICT",
        message: 'Key Vault name "demo-kv" is not available: taken',
      });
    });
  });

  describe("grantAccess", () => {
    it("adds exactly get/list on secrets and keys", async () => {
      mockVaults.get.mockResolvedValue(vault());
      mockVaults.updateAccessPolicy.mockResolvedValue({});
      const changed = await mgr.grantAccess("rg-1", "demo-kv", { objectId: "mi-1", ...READER_PERMISSIONS });
      expect(changed).toBe(true);
      expect(mockVaults.updateAccessPolicy).toHaveBeenCalledWith("rg-1", "demo-kv", "add", {
        properties: {
          accessPolicies: [
            { tenantId: "tenant-1", objectId: "mi-1", permissions: { secrets: ["get", "list"], keys: ["get", "list"] } },
          ],
        },
      });
    });

    it("skips the update when the policy already covers the grant", async () => {
      mockVaults.get.mockResolvedValue(vault([{ objectId: "mi-1", permissions: { secrets: ["Get", "List"], keys: ["get", "list"] } }]));
      const changed = await mgr.grantAccess("rg-1", "demo-kv", { objectId: "mi-1", ...READER_PERMISSIONS });
      expect(changed).toBe(false);
      expect(mockVaults.updateAccessPolicy).not.toHaveBeenCalled();
    });

    it("retries while the principal propagates", async () => {
      mockVaults.get.mockResolvedValue(vault());
      mockVaults.updateAccessPolicy
        .mockRejectedValueOnce({ code: "PrincipalNotFound", message: "principal not found" })
        .mockResolvedValueOnce({});
      await mgr.grantAccess("rg-1", "demo-kv", { objectId: "mi-1", ...READER_PERMISSIONS });
      expect(mockVaults.updateAccessPolicy).toHaveBeenCalledTimes(2);
    });

    it("fails with NOT_FOUND when the vault is missing", async () => {
      mockVaults.get.mockRejectedValue({ statusCode: 404 });
      await expect(mgr.grantAccess("rg-1", "demo-kv", { objectId: "mi-1", ...READER_PERMISSIONS })).rejects.toMatchObject({
        code: "NOT_FOUND",
      });
    });
  });
});

describe("hasPermissions", () => {
  it("requires every requested permission", () => {
    const policies = [{ objectId: "mi-1", secrets: ["get"], keys: ["get", "list"] }];
    expect(hasPermissions(policies, { objectId: "mi-1", ...READER_PERMISSIONS })).toBe(false);
  });
});
