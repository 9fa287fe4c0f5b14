/**
 * Built-in Blueprints
 *
 * Parameterized templates that generate an ExecutionPlan. The
 * `saas-accelerator` blueprint lays out the full marketplace deployment,
 * phase by phase: network, compute, identity, data, deploy.
 */

import { deriveResourceNames, networkConfig, type DeploymentConfig } from "../config.js";
import type { SignedInPrincipal } from "../credentials/index.js";
import { PRIVATE_DNS_ZONES } from "../network/index.js";
import { SECRET_NAMES } from "../secrets/index.js";
import { ALLOW_AZURE_SERVICES_RULE } from "../sql/index.js";
import { signInRedirectUris, webAppHostName } from "./settings.js";
import type { Blueprint, ExecutionPlan, PlanStep } from "./types.js";

// =============================================================================
// Helpers
// =============================================================================

let planCounter = 0;
function nextPlanId(prefix: string): string {
  return `${prefix}-${Date.now()}-${++planCounter}`;
}

function step(id: string, type: string, params: Record<string, unknown>, dependsOn: string[] = [], stepName?: string): PlanStep {
  return { id, type, name: stepName ?? id, params, dependsOn };
}

function ref(stepId: string, output: string): string {
  return `${stepId}.outputs.${output}`;
}

// =============================================================================
// SaaS Accelerator
// =============================================================================

export type SaasAcceleratorParams = {
  config: DeploymentConfig;
  /**
   * Principal running the deployment. It becomes the SQL Entra administrator
   * (unless the config names one) and gets write access to the vault. When
   * absent the plan carries `$global.deployer*` placeholders (plan previews).
   */
  deployer?: SignedInPrincipal;
};

/** Projects deployed to the two web apps, relative to the source root. */
export const WEB_PROJECTS = {
  admin: { name: "AdminSite", projectPath: "src/AdminSite/AdminSite.csproj" },
  portal: { name: "CustomerSite", projectPath: "src/CustomerSite/CustomerSite.csproj" },
} as const;

export const saasAcceleratorBlueprint: Blueprint<SaasAcceleratorParams> = {
  id: "saas-accelerator",
  name: "SaaS Accelerator",
  description:
    "Marketplace SaaS accelerator: private network, App Service, Key Vault, Entra ID apps, Azure SQL with migrations, and both web apps deployed",

  generate({ config, deployer }): ExecutionPlan {
    const names = deriveResourceNames(config);
    const net = networkConfig(config);
    const { location, tags } = config;
    const rg = ref("rg", "resourceGroupName");
    const vault = ref("kv", "vaultName");
    const adminHost = webAppHostName(names.adminWebApp);
    const portalHost = webAppHostName(names.portalWebApp);
    const steps: PlanStep[] = [];

    // --- network -------------------------------------------------------------

    steps.push(step("rg", "ensure-resource-group", { name: names.resourceGroup, location, tags }, [], "Resource group"));
    steps.push(
      step(
        "vnet",
        "ensure-virtual-network",
        { resourceGroup: rg, name: names.virtualNetwork, location, addressPrefix: net.addressPrefix, tags },
        ["rg"],
        "Virtual network",
      ),
    );

    const subnets: Array<{ id: string; name: string; prefix: string; extra: Record<string, unknown> }> = [
      { id: "subnet-default", name: "default", prefix: net.defaultSubnetPrefix, extra: {} },
      {
        id: "subnet-web",
        name: "web",
        prefix: net.webSubnetPrefix,
        extra: { delegations: ["Microsoft.Web/serverFarms"], serviceEndpoints: ["Microsoft.Sql", "Microsoft.KeyVault"] },
      },
      { id: "subnet-sql", name: "sql", prefix: net.sqlSubnetPrefix, extra: { privateEndpoints: true } },
      { id: "subnet-kv", name: "kv", prefix: net.keyVaultSubnetPrefix, extra: { privateEndpoints: true } },
    ];
    for (const subnet of subnets) {
      steps.push(
        step(
          subnet.id,
          "ensure-subnet",
          {
            resourceGroup: rg,
            vnetName: ref("vnet", "vnetName"),
            name: subnet.name,
            location,
            addressPrefix: subnet.prefix,
            ...subnet.extra,
          },
          ["vnet"],
          `Subnet ${subnet.name}`,
        ),
      );
    }

    // --- compute -------------------------------------------------------------

    steps.push(
      step(
        "plan",
        "ensure-app-service-plan",
        { resourceGroup: rg, name: names.appServicePlan, location, sku: config.appServicePlanSku, tags },
        ["rg"],
        "App Service plan",
      ),
    );
    for (const [id, name] of [
      ["admin", names.adminWebApp],
      ["portal", names.portalWebApp],
    ] as const) {
      steps.push(
        step(
          id,
          "ensure-web-app",
          { resourceGroup: rg, name, location, planId: ref("plan", "planId"), tags },
          ["plan"],
          `Web app ${name}`,
        ),
      );
    }

    steps.push(step("kv", "ensure-key-vault", { resourceGroup: rg, name: names.keyVault, location, tags }, ["rg"], "Key Vault"));
    steps.push(
      step(
        "kv-access-deployer",
        "grant-key-vault-access",
        { resourceGroup: rg, vaultName: vault, objectId: "$global.deployerObjectId", access: "writer" },
        ["kv"],
        "Key Vault access (deployer)",
      ),
    );
    for (const id of ["admin", "portal"]) {
      steps.push(
        step(
          `kv-access-${id}`,
          "grant-key-vault-access",
          { resourceGroup: rg, vaultName: vault, objectId: ref(id, "principalId"), access: "reader" },
          ["kv", id],
          `Key Vault access (${id})`,
        ),
      );
    }

    // --- identity ------------------------------------------------------------

    steps.push(
      step(
        "app-fulfillment",
        "ensure-app-registration",
        {
          displayName: names.fulfillmentApp,
          signInAudience: "AzureADMyOrg",
          confidential: true,
          applicationId: config.fulfillmentAppId,
          clientSecret: config.fulfillmentAppSecret,
          vaultName: vault,
          secretName: SECRET_NAMES.applicationSecret,
        },
        ["kv-access-deployer"],
        "Fulfillment API app",
      ),
    );
    steps.push(
      step(
        "app-landing",
        "ensure-app-registration",
        {
          displayName: names.landingPageApp,
          signInAudience: "AzureADandPersonalMicrosoftAccount",
          confidential: false,
          applicationId: config.landingPageAppId,
          redirectUris: signInRedirectUris(portalHost),
          logoutUrl: `https://${portalHost}/logout`,
          enableIdTokenIssuance: true,
          requestUserRead: true,
        },
        [],
        "Landing page app",
      ),
    );
    steps.push(
      step(
        "app-admin",
        "ensure-app-registration",
        {
          displayName: names.adminPortalApp,
          signInAudience: "AzureADMyOrg",
          confidential: false,
          applicationId: config.adminPortalAppId,
          redirectUris: signInRedirectUris(adminHost),
          logoutUrl: `https://${adminHost}/logout`,
          enableIdTokenIssuance: true,
          requestUserRead: true,
        },
        [],
        "Admin portal app",
      ),
    );

    // --- data ----------------------------------------------------------------

    steps.push(
      step(
        "sql",
        "ensure-sql-server",
        {
          resourceGroup: rg,
          name: names.sqlServer,
          location,
          adminLogin: config.sqlAdminLogin ?? "$global.deployerLogin",
          adminObjectId: config.sqlAdminObjectId ?? "$global.deployerObjectId",
          adminPrincipalType: config.sqlAdminObjectId ? "User" : "$global.deployerPrincipalType",
          allowPasswordFallback: config.allowSqlPasswordFallback,
          vaultName: vault,
          tags,
        },
        ["rg", "kv-access-deployer"],
        "SQL server",
      ),
    );
    steps.push(
      step(
        "db",
        "ensure-sql-database",
        { resourceGroup: rg, serverName: ref("sql", "serverName"), name: names.sqlDatabase, location, sku: config.sqlDatabaseSku, tags },
        ["sql"],
        "SQL database",
      ),
    );
    steps.push(
      step(
        "fw-azure",
        "ensure-sql-firewall-rule",
        {
          resourceGroup: rg,
          serverName: ref("sql", "serverName"),
          name: ALLOW_AZURE_SERVICES_RULE,
          startIp: "0.0.0.0",
          endIp: "0.0.0.0",
        },
        ["sql"],
        "Firewall: Azure services",
      ),
    );
    const migrationDeps = ["db", "fw-azure"];
    if (config.clientIp) {
      steps.push(
        step(
          "fw-client",
          "ensure-sql-firewall-rule",
          { resourceGroup: rg, serverName: ref("sql", "serverName"), name: "ClientIp", startIp: config.clientIp, endIp: config.clientIp },
          ["sql"],
          "Firewall: client IP",
        ),
      );
      migrationDeps.push("fw-client");
    }

    const privateLinks = [
      { id: "sql", group: "sqlServer", endpoint: names.sqlPrivateEndpoint, subnet: "subnet-sql", target: ref("sql", "serverId") },
      { id: "kv", group: "vault", endpoint: names.keyVaultPrivateEndpoint, subnet: "subnet-kv", target: ref("kv", "vaultId") },
    ] as const;
    for (const link of privateLinks) {
      steps.push(
        step(
          `dns-${link.id}`,
          "ensure-private-dns-zone",
          {
            resourceGroup: rg,
            zoneName: PRIVATE_DNS_ZONES[link.group],
            linkName: `${names.virtualNetwork}-${link.id}-link`,
            vnetId: ref("vnet", "vnetId"),
            tags,
          },
          ["vnet"],
          `Private DNS zone (${link.id})`,
        ),
      );
      steps.push(
        step(
          `pe-${link.id}`,
          "ensure-private-endpoint",
          {
            resourceGroup: rg,
            name: link.endpoint,
            location,
            subnetId: ref(link.subnet, "subnetId"),
            targetResourceId: link.target,
            groupId: link.group,
            zoneId: ref(`dns-${link.id}`, "zoneId"),
            tags,
          },
          [link.subnet, link.id, `dns-${link.id}`],
          `Private endpoint (${link.id})`,
        ),
      );
    }

    steps.push(
      step(
        "connection-string",
        "store-connection-string",
        { vaultName: vault, serverFqdn: ref("sql", "serverFqdn"), databaseName: ref("db", "databaseName") },
        ["db", "kv-access-deployer"],
        "Connection string secret",
      ),
    );
    steps.push(
      step(
        "migrate",
        "apply-migrations",
        {
          serverFqdn: ref("sql", "serverFqdn"),
          databaseName: ref("db", "databaseName"),
          identities: [ref("admin", "webAppName"), ref("portal", "webAppName")],
          knownUsers: config.publisherAdminUsers,
          allowPasswordFallback: config.allowSqlPasswordFallback,
          vaultName: vault,
        },
        [...migrationDeps, "admin", "portal", "kv-access-deployer"],
        "Database migrations",
      ),
    );

    // --- deploy --------------------------------------------------------------

    for (const role of ["admin", "portal"] as const) {
      const project = WEB_PROJECTS[role];
      steps.push(
        step(
          `configure-${role}`,
          "configure-web-app",
          {
            resourceGroup: rg,
            webAppName: ref(role, "webAppName"),
            role,
            vaultName: vault,
            fulfillmentAppId: ref("app-fulfillment", "applicationId"),
            landingPageAppId: ref("app-landing", "applicationId"),
            adminPortalAppId: ref("app-admin", "applicationId"),
            portalHostName: ref("portal", "defaultHostName"),
            hostName: ref(role, "defaultHostName"),
            knownUsers: config.publisherAdminUsers,
            sqlGrants: ref("migrate", "grants"),
          },
          [role, "portal", `kv-access-${role}`, "app-fulfillment", "app-landing", "app-admin", "connection-string", "migrate"],
          `Configure ${project.name}`,
        ),
      );
      steps.push(
        step(
          `deploy-${role}`,
          "deploy-web-app",
          {
            resourceGroup: rg,
            webAppName: ref(role, "webAppName"),
            projectName: project.name,
            projectPath: project.projectPath,
            integrationSubnetId: ref("subnet-web", "subnetId"),
            logoPngUrl: config.logoPngUrl,
            logoIcoUrl: config.logoIcoUrl,
          },
          [`configure-${role}`, "subnet-web"],
          `Deploy ${project.name}`,
        ),
      );
    }

    return {
      id: nextPlanId("saas"),
      name: `SaaS Accelerator: ${config.namePrefix}`,
      description: `Deploy the SaaS accelerator "${config.namePrefix}" to ${location}`,
      blueprintId: "saas-accelerator",
      steps,
      globalParams: {
        namePrefix: config.namePrefix,
        location,
        ...(deployer && {
          deployerObjectId: deployer.objectId,
          deployerLogin: deployer.login,
          deployerPrincipalType: deployer.principalType,
        }),
      },
      createdAt: new Date().toISOString(),
    };
  },
};

// =============================================================================
// Registry
// =============================================================================

const BLUEPRINTS = new Map<string, Blueprint<SaasAcceleratorParams>>([[saasAcceleratorBlueprint.id, saasAcceleratorBlueprint]]);

export function getBlueprint(id: string): Blueprint<SaasAcceleratorParams> | undefined {
  return BLUEPRINTS.get(id);
}

export function listBlueprints(): Array<Pick<Blueprint<SaasAcceleratorParams>, "id" | "name" | "description">> {
  return [...BLUEPRINTS.values()].map(({ id, name, description }) => ({ id, name, description }));
}
