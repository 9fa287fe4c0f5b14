import { describe, it, expect, beforeEach } from "vitest";
import { resolveDeploymentConfig } from "../config.js";
import { createLogger, MemoryTransport } from "../logging/index.js";
import { getBlueprint, listBlueprints, saasAcceleratorBlueprint } from "./blueprints.js";
import { orchestrate } from "./engine.js";
import { executionOrder, validatePlan } from "./planner.js";
import { clearStepRegistry, getStepDefinition } from "./registry.js";
import { registerProvisioningStepsDryRun } from "./steps.js";
import { PHASE_ORDER } from "./types.js";

const baseConfig = {
  namePrefix: "demo",
  location: "eastus",
  tenantId: "tenant-1",
  subscriptionId: "sub-1",
  publisherAdminUsers: ["admin@contoso.test"],
};

const deployer = { objectId: "oid-deployer", login: "deployer@contoso.test", principalType: "User" } as const;

function generate(overrides: Record<string, unknown> = {}, withDeployer = true) {
  const config = resolveDeploymentConfig(baseConfig, overrides);
  return saasAcceleratorBlueprint.generate({ config, deployer: withDeployer ? deployer : undefined });
}

describe("blueprint registry", () => {
  it("lists the saas-accelerator blueprint", () => {
    expect(listBlueprints().map((b) => b.id)).toEqual(["saas-accelerator"]);
    expect(getBlueprint("saas-accelerator")).toBe(saasAcceleratorBlueprint);
    expect(getBlueprint("nonexistent")).toBeUndefined();
  });
});

describe("saas-accelerator", () => {
  beforeEach(() => {
    clearStepRegistry();
    registerProvisioningStepsDryRun();
  });

  it("generates a plan that validates without issues", () => {
    const plan = generate();
    expect(plan.blueprintId).toBe("saas-accelerator");
    expect(plan.steps).toHaveLength(29);
    expect(validatePlan(plan)).toEqual({ valid: true, issues: [] });
  });

  it("derives resource names from the prefix", () => {
    const plan = generate();
    const params = (id: string) => plan.steps.find((s) => s.id === id)?.params;

    expect(params("rg")?.name).toBe("demo");
    expect(params("kv")?.name).toBe("demo-kv");
    expect(params("sql")?.name).toBe("demo-sql");
    expect(params("admin")?.name).toBe("demo-admin");
    expect(params("portal")?.name).toBe("demo-portal");
    expect(params("pe-sql")?.name).toBe("demo-db-pe");
    expect(params("app-landing")?.displayName).toBe("demo-LandingpageAppReg");
  });

  it("runs the phases in order", () => {
    const phases = executionOrder(generate().steps).map((s) => getStepDefinition(s.type)?.phase ?? "unknown");
    const ranks = phases.map((p) => PHASE_ORDER.findIndex((phase) => phase === p));
    expect(ranks).toEqual([...ranks].sort((a, b) => a - b));
    expect(phases[0]).toBe("network");
    expect(phases[phases.length - 1]).toBe("deploy");
  });

  it("registers sign-in redirect URIs on the web app hosts", () => {
    const landing = generate().steps.find((s) => s.id === "app-landing");
    expect(landing?.params.redirectUris).toEqual([
      "https://demo-portal.azurewebsites.net",
      "https://demo-portal.azurewebsites.net/",
      "https://demo-portal.azurewebsites.net/Home/Index",
      "https://demo-portal.azurewebsites.net/Home/Index/",
    ]);
    expect(landing?.params.signInAudience).toBe("AzureADandPersonalMicrosoftAccount");
  });

  it("uses the signed-in principal as SQL administrator unless one is configured", () => {
    const plan = generate();
    expect(plan.steps.find((s) => s.id === "sql")?.params.adminObjectId).toBe("$global.deployerObjectId");
    expect(plan.globalParams).toMatchObject({ deployerObjectId: "oid-deployer", deployerLogin: "deployer@contoso.test", deployerPrincipalType: "User" });

    const configured = generate({ sqlAdminLogin: "dba@contoso.test", sqlAdminObjectId: "oid-dba" });
    expect(configured.steps.find((s) => s.id === "sql")?.params).toMatchObject({
      adminLogin: "dba@contoso.test",
      adminObjectId: "oid-dba",
      adminPrincipalType: "User",
    });
  });

  it("adds a client IP firewall rule before migrations when an address is given", () => {
    const plan = generate({ clientIp: "203.0.113.7" });
    const rule = plan.steps.find((s) => s.id === "fw-client");
    expect(rule?.params).toMatchObject({ name: "ClientIp", startIp: "203.0.113.7", endIp: "203.0.113.7" });
    expect(plan.steps.find((s) => s.id === "migrate")?.dependsOn).toContain("fw-client");
  });

  it("passes supplied application IDs through", () => {
    const plan = generate({ fulfillmentAppId: "app-f", fulfillmentAppSecret: "test-secret", landingPageAppId: "app-l" });
    expect(plan.steps.find((s) => s.id === "app-fulfillment")?.params).toMatchObject({ applicationId: "app-f", clientSecret: "test-secret" });
    expect(plan.steps.find((s) => s.id === "app-landing")?.params.applicationId).toBe("app-l");
  });

  it("dry-runs end to end with placeholders and no deployer", async () => {
    const plan = generate({}, false);
    expect(plan.globalParams).toEqual({ namePrefix: "demo", location: "eastus" });

    const result = await orchestrate(plan, {
      dryRun: true,
      logger: createLogger("test", { transports: [new MemoryTransport()] }),
    });
    expect(result.status).toBe("succeeded");
    expect(result.steps.every((s) => s.status === "succeeded")).toBe(true);
    expect(result.outputs.kv).toEqual({ vaultName: "<dry-run:vaultName>", vaultId: "<dry-run:vaultId>", vaultUri: "<dry-run:vaultUri>" });
  });
});
