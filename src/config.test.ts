import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  DEFAULT_NETWORK,
  configFromEnv,
  deriveResourceNames,
  networkConfig,
  resolveDeploymentConfig,
  validateKeyVaultName,
  validateNamePrefix,
} from "./config.js";
import { enableDiagnostics, onDiagnosticEvent, resetDiagnosticsForTest, type DiagnosticEvent } from "./diagnostics.js";
import { ProvisioningError } from "./errors.js";

const base = {
  namePrefix: "contoso-saas",
  location: "eastus",
  tenantId: "tenant-1",
  subscriptionId: "sub-1",
  publisherAdminUsers: ["admin@contoso.test"],
};

describe("resolveDeploymentConfig", () => {
  const events: DiagnosticEvent[] = [];

  beforeEach(() => {
    events.length = 0;
    enableDiagnostics();
    onDiagnosticEvent((event) => events.push(event));
  });

  afterEach(() => {
    resetDiagnosticsForTest();
  });

  it("applies defaults", () => {
    const config = resolveDeploymentConfig(base);
    expect(config.sqlDatabaseName).toBe("AMPSaaSDB");
    expect(config.appServicePlanSku).toBe("B1");
    expect(config.allowSqlPasswordFallback).toBe(false);
    expect(config.credentialMethod).toBe("default");
    expect(config.tags).toEqual({});
  });

  it("lets later layers win and skips undefined values", () => {
    const config = resolveDeploymentConfig(base, { location: "westus2" }, { location: undefined, sqlDatabaseSku: "S1" });
    expect(config.location).toBe("westus2");
    expect(config.sqlDatabaseSku).toBe("S1");
  });

  it("rejects a 22-character prefix without any external call", () => {
    const prefix = "a".repeat(22);

    expect(() => resolveDeploymentConfig(base, { namePrefix: prefix })).toThrow(
      "Name prefix must be 21 characters or fewer (got 22)",
    );
    expect(events).toEqual([]);
  });

  it("lists every problem in one validation error", () => {
    let caught: unknown;
    try {
      resolveDeploymentConfig(base, { publisherAdminUsers: ["not-an-email"], fulfillmentAppSecret: "test-secret" });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ProvisioningError);
    expect(caught).toMatchObject({ code: "VALIDATION" });
    expect(String(caught)).toContain('Publisher admin "not-an-email" is not an email address');
    expect(String(caught)).toContain("fulfillmentAppSecret requires fulfillmentAppId");
  });

  it("reports schema errors with the field path", () => {
    expect(() => resolveDeploymentConfig({ ...base, publisherAdminUsers: [] })).toThrow(/publisherAdminUsers: /);
  });

  it("requires the SQL admin login and object ID together", () => {
    expect(() => resolveDeploymentConfig(base, { sqlAdminLogin: "dba@contoso.test" })).toThrow(
      "sqlAdminLogin and sqlAdminObjectId must be supplied together",
    );
  });
});

describe("name validation", () => {
  it("accepts prefixes of 3 to 21 lowercase characters", () => {
    expect(validateNamePrefix("abc")).toEqual([]);
    expect(validateNamePrefix("a".repeat(21))).toEqual([]);
    expect(validateNamePrefix("ab")).toEqual(["Name prefix must be at least 3 characters (got 2)"]);
    expect(validateNamePrefix("demo-")).toEqual(["Name prefix must not end with a hyphen"]);
  });

  it("checks Key Vault names", () => {
    expect(validateKeyVaultName("demo-kv")).toEqual([]);
    expect(validateKeyVaultName("a--b")).toEqual(['Key Vault name "a--b" may contain only letters, digits and single hyphens']);
    expect(validateKeyVaultName("x".repeat(25))).toHaveLength(1);
  });

  it("accepts the longest prefix, whose vault name is exactly 24 characters", () => {
    const config = resolveDeploymentConfig(base, { namePrefix: "a".repeat(21) });
    expect(deriveResourceNames(config).keyVault).toHaveLength(24);
  });

  it("rejects an explicit vault name that is too long", () => {
    expect(() => resolveDeploymentConfig(base, { keyVaultName: "v".repeat(25) })).toThrow(
      `Key Vault name "${"v".repeat(25)}" must be 3-24 characters`,
    );
  });
});

describe("deriveResourceNames", () => {
  it("derives every name from the prefix", () => {
    const names = deriveResourceNames(resolveDeploymentConfig(base));
    expect(names).toEqual({
      resourceGroup: "contoso-saas",
      keyVault: "contoso-saas-kv",
      sqlServer: "contoso-saas-sql",
      sqlDatabase: "AMPSaaSDB",
      appServicePlan: "contoso-saas-asp",
      adminWebApp: "contoso-saas-admin",
      portalWebApp: "contoso-saas-portal",
      virtualNetwork: "contoso-saas-vnet",
      sqlPrivateEndpoint: "contoso-saas-db-pe",
      keyVaultPrivateEndpoint: "contoso-saas-kv-pe",
      fulfillmentApp: "contoso-saas-FulfillmentAppReg",
      landingPageApp: "contoso-saas-LandingpageAppReg",
      adminPortalApp: "contoso-saas-AdminPortalAppReg",
    });
  });

  it("honours explicit resource group and vault names", () => {
    const names = deriveResourceNames(resolveDeploymentConfig(base, { resourceGroup: "rg-saas", keyVaultName: "saas-vault" }));
    expect(names.resourceGroup).toBe("rg-saas");
    expect(names.keyVault).toBe("saas-vault");
  });
});

describe("environment and network", () => {
  it("reads tenant and subscription from the environment", () => {
    expect(configFromEnv({ AZURE_TENANT_ID: "t", AZURE_SUBSCRIPTION_ID: "s" })).toEqual({ tenantId: "t", subscriptionId: "s" });
  });

  it("falls back to the default address plan", () => {
    expect(networkConfig(resolveDeploymentConfig(base))).toEqual(DEFAULT_NETWORK);
  });
});
