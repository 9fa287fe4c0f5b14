/**
 * Azure SQL Manager: Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { AzureSQLManager } from "./manager.js";
import { ResourceEnsurer } from "../ensurer/index.js";
import { createLogger, MemoryTransport } from "../logging/index.js";
import type { ProvisioningContext } from "../types.js";

const mockServers = { get: vi.fn(), beginCreateOrUpdateAndWait: vi.fn(), checkNameAvailability: vi.fn() };
const mockDatabases = { get: vi.fn(), beginCreateOrUpdateAndWait: vi.fn() };
const mockFirewallRules = { get: vi.fn(), createOrUpdate: vi.fn() };

vi.mock("@azure/arm-sql", () => ({
  SqlManagementClient: vi.fn().mockImplementation(function () {
    return { servers: mockServers, databases: mockDatabases, firewallRules: mockFirewallRules };
  }),
}));

const context: ProvisioningContext = {
  tenantId: "tenant-1",
  subscriptionId: "sub-1",
  credential: { getToken: vi.fn() },
};

const SERVER_ID = "/subscriptions/sub-1/resourceGroups/rg-1/providers/Microsoft.Sql/servers/demo-sql";

const entraOptions = {
  tenantId: "tenant-1",
  entraAdmin: { login: "admin@contoso.test", objectId: "oid-1", principalType: "User" as const },
};

describe("AzureSQLManager", () => {
  let mgr: AzureSQLManager;

  beforeEach(() => {
    vi.clearAllMocks();
    mgr = new AzureSQLManager(context, { maxAttempts: 1, minDelayMs: 0, maxDelayMs: 0 });
  });

  // ---------- Servers ----------

  describe("createServer", () => {
    it("creates an Entra-only server when no SQL admin is given", async () => {
      mockServers.beginCreateOrUpdateAndWait.mockResolvedValue({
        id: SERVER_ID, name: "demo-sql", location: "eastus", state: "Ready",
        fullyQualifiedDomainName: "demo-sql.database.windows.net",
        administrators: { login: "admin@contoso.test" },
      });
      const server = await mgr.createServer("rg-1", "demo-sql", "eastus", entraOptions);
      const params = mockServers.beginCreateOrUpdateAndWait.mock.calls[0][2];
      expect(params.administratorLogin).toBeUndefined();
      expect(params.administrators).toEqual({
        administratorType: "ActiveDirectory",
        login: "admin@contoso.test",
        sid: "oid-1",
        principalType: "User",
        tenantId: "tenant-1",
        azureADOnlyAuthentication: true,
      });
      expect(server.entraAdminLogin).toBe("admin@contoso.test");
    });

    it("enables SQL authentication when a SQL admin is given", async () => {
      mockServers.beginCreateOrUpdateAndWait.mockResolvedValue({ id: SERVER_ID, name: "demo-sql" });
      await mgr.createServer("rg-1", "demo-sql", "eastus", {
        ...entraOptions,
        sqlAdmin: { login: "demoadmin", password: "test-secret" },
      });
      const params = mockServers.beginCreateOrUpdateAndWait.mock.calls[0][2];
      expect(params.administratorLogin).toBe("demoadmin");
      expect(params.administrators.azureADOnlyAuthentication).toBe(false);
    });
  });

  describe("serverDriver", () => {
    it("raises a conflict when the global name is taken elsewhere", async () => {
      mockServers.checkNameAvailability.mockResolvedValue({ available: false, reason: "AlreadyExists", message: "taken" });
      const driver = mgr.serverDriver("rg-1", "demo-sql", "eastus", entraOptions);
      await expect(driver.create()).rejects.toMatchObject({
        code: "CONFLICT",
        resourceName: "demo-sql",
        remediation: "choose a different name prefix",
      });
      expect(mockServers.beginCreateOrUpdateAndWait).not.toHaveBeenCalled();
    });

    it("reuses an existing server through the ensurer", async () => {
      mockServers.get.mockResolvedValue({ id: SERVER_ID, name: "demo-sql", state: "Ready" });
      const ensurer = new ResourceEnsurer({ logger: createLogger("test", { transports: [new MemoryTransport()] }) });
      const outcome = await ensurer.ensure(mgr.serverDriver("rg-1", "demo-sql", "eastus", entraOptions));
      expect(outcome.created).toBe(false);
      expect(outcome.resourceId).toBe(SERVER_ID);
      expect(mockServers.checkNameAvailability).not.toHaveBeenCalled();
    });
  });

  // ---------- Databases ----------

  describe("getDatabase", () => {
    it("maps status and sku", async () => {
      mockDatabases.get.mockResolvedValue({
        id: `${SERVER_ID}/databases/AMPSaaSDB`, name: "AMPSaaSDB", location: "eastus",
        status: "Online", sku: { name: "S0" },
      });
      const db = await mgr.getDatabase("rg-1", "demo-sql", "AMPSaaSDB");
      expect(db?.status).toBe("Online");
      expect(db?.skuName).toBe("S0");
      expect(db?.serverName).toBe("demo-sql");
    });

    it("returns null on 404", async () => {
      mockDatabases.get.mockRejectedValue({ statusCode: 404 });
      expect(await mgr.getDatabase("rg-1", "demo-sql", "AMPSaaSDB")).toBeNull();
    });
  });

  describe("createDatabase", () => {
    it("passes the sku", async () => {
      mockDatabases.beginCreateOrUpdateAndWait.mockResolvedValue({ id: "db-id", name: "AMPSaaSDB" });
      await mgr.createDatabase("rg-1", "demo-sql", "AMPSaaSDB", "eastus", "S0");
      expect(mockDatabases.beginCreateOrUpdateAndWait).toHaveBeenCalledWith("rg-1", "demo-sql", "AMPSaaSDB", {
        location: "eastus",
        sku: { name: "S0" },
        tags: undefined,
      });
    });
  });

  // ---------- Firewall ----------

  describe("createFirewallRule", () => {
    it("creates the rule", async () => {
      mockFirewallRules.createOrUpdate.mockResolvedValue({
        id: "fw-1", name: "AllowAzureServices", startIpAddress: "0.0.0.0", endIpAddress: "0.0.0.0",
      });
      const rule = await mgr.createFirewallRule("rg-1", "demo-sql", "AllowAzureServices", "0.0.0.0", "0.0.0.0");
      expect(rule.startIpAddress).toBe("0.0.0.0");
      expect(mockFirewallRules.createOrUpdate).toHaveBeenCalledWith("rg-1", "demo-sql", "AllowAzureServices", {
        startIpAddress: "0.0.0.0",
        endIpAddress: "0.0.0.0",
      });
    });
  });
});
