/**
 * Built-in Provisioning Steps
 *
 * Each step ensures one piece of the deployment through the resource
 * ensurer or a domain service, and returns the outputs later steps
 * reference.
 */

import { TOKEN_AUDIENCES } from "../credentials/index.js";
import { publishAndDeploy } from "../deploy/index.js";
import { ProvisioningError } from "../errors.js";
import { READER_PERMISSIONS, WRITER_PERMISSIONS } from "../keyvault/index.js";
import { applyMigrations } from "../migrations/index.js";
import { PRIVATE_DNS_ZONES, type PrivateLinkGroup } from "../network/index.js";
import { generatePassword, SECRET_NAMES, storeSecret } from "../secrets/index.js";
import type { SignInAudience } from "../identity/index.js";
import type { SqlPrincipalType } from "../sql/index.js";
import {
  booleanParam,
  choiceParam,
  optionalStringParam,
  stringArrayParam,
  stringParam,
  stringRecordParam,
} from "./params.js";
import { registerStepType } from "./registry.js";
import type { ProvisioningServices } from "./services.js";
import {
  buildAppSettings,
  buildConnectionStrings,
  connectionSecretName,
  managedIdentityConnectionString,
  passwordConnectionString,
  WEB_APP_ROLES,
} from "./settings.js";
import type { StepContext, StepHandler, StepOutputDef, StepParameterDef, StepTypeDefinition } from "./types.js";

// =============================================================================
// Helpers
// =============================================================================

function p(name: string, type: StepParameterDef["type"], description: string, required = true): StepParameterDef {
  return { name, type, description, required };
}

function o(name: string, type: StepOutputDef["type"], description: string): StepOutputDef {
  return { name, type, description };
}

type ServicesAccessor = () => ProvisioningServices;

const ARM = [TOKEN_AUDIENCES.management] as const;

const SIGN_IN_AUDIENCES: readonly SignInAudience[] = ["AzureADMyOrg", "AzureADMultipleOrgs", "AzureADandPersonalMicrosoftAccount"];
const PRINCIPAL_TYPES: readonly SqlPrincipalType[] = ["User", "Group", "Application"];
const LINK_GROUPS: readonly PrivateLinkGroup[] = ["sqlServer", "vault"];

function tagsOf(ctx: StepContext): Record<string, string> {
  return stringRecordParam(ctx.params, "tags");
}

// =============================================================================
// Network
// =============================================================================

const ensureResourceGroupDef: StepTypeDefinition = {
  id: "ensure-resource-group",
  label: "Ensure Resource Group",
  description: "Create the resource group unless it already exists",
  phase: "network",
  parameters: [p("name", "string", "Resource group name"), p("location", "string", "Azure region"), p("tags", "object", "Resource tags", false)],
  outputs: [o("resourceGroupName", "string", "Resource group name"), o("resourceGroupId", "string", "Resource ID"), o("created", "boolean", "Created in this run")],
  audiences: ARM,
};

function ensureResourceGroupHandler(services: ServicesAccessor): StepHandler {
  return {
    async execute(ctx) {
      const name = stringParam(ctx.params, "name");
      const { resources, ensurer } = services();
      const outcome = await ensurer.ensure(resources.resourceGroupDriver(name, stringParam(ctx.params, "location"), tagsOf(ctx)));
      return { resourceGroupName: name, resourceGroupId: outcome.resourceId, created: outcome.created };
    },
  };
}

const ensureVNetDef: StepTypeDefinition = {
  id: "ensure-virtual-network",
  label: "Ensure Virtual Network",
  description: "Create the virtual network unless it already exists",
  phase: "network",
  parameters: [
    p("resourceGroup", "string", "Target resource group"),
    p("name", "string", "VNet name"),
    p("location", "string", "Azure region"),
    p("addressPrefix", "string", "Address space (CIDR)"),
    p("tags", "object", "Resource tags", false),
  ],
  outputs: [o("vnetName", "string", "VNet name"), o("vnetId", "string", "VNet resource ID")],
  audiences: ARM,
};

function ensureVNetHandler(services: ServicesAccessor): StepHandler {
  return {
    async execute(ctx) {
      const name = stringParam(ctx.params, "name");
      const { network, ensurer } = services();
      const outcome = await ensurer.ensure(
        network.vnetDriver(
          stringParam(ctx.params, "resourceGroup"),
          name,
          stringParam(ctx.params, "location"),
          [stringParam(ctx.params, "addressPrefix")],
          tagsOf(ctx),
        ),
      );
      return { vnetName: name, vnetId: outcome.resourceId };
    },
  };
}

const ensureSubnetDef: StepTypeDefinition = {
  id: "ensure-subnet",
  label: "Ensure Subnet",
  description: "Create a subnet (retrying while its VNet propagates)",
  phase: "network",
  parameters: [
    p("resourceGroup", "string", "Target resource group"),
    p("vnetName", "string", "Parent VNet"),
    p("name", "string", "Subnet name"),
    p("location", "string", "Azure region"),
    p("addressPrefix", "string", "Subnet prefix (CIDR)"),
    p("delegations", "array", "Services the subnet is delegated to", false),
    p("serviceEndpoints", "array", "Service endpoints", false),
    p("privateEndpoints", "boolean", "Hosts private endpoints", false),
  ],
  outputs: [o("subnetName", "string", "Subnet name"), o("subnetId", "string", "Subnet resource ID")],
  audiences: ARM,
};

function ensureSubnetHandler(services: ServicesAccessor): StepHandler {
  return {
    async execute(ctx) {
      const name = stringParam(ctx.params, "name");
      const { network, ensurer } = services();
      const outcome = await ensurer.ensure(
        network.subnetDriver(stringParam(ctx.params, "resourceGroup"), stringParam(ctx.params, "vnetName"), name, stringParam(ctx.params, "location"), {
          addressPrefix: stringParam(ctx.params, "addressPrefix"),
          delegations: stringArrayParam(ctx.params, "delegations"),
          serviceEndpoints: stringArrayParam(ctx.params, "serviceEndpoints"),
          disablePrivateEndpointPolicies: booleanParam(ctx.params, "privateEndpoints"),
        }),
      );
      return { subnetName: name, subnetId: outcome.resourceId };
    },
  };
}

const ensurePrivateDnsZoneDef: StepTypeDefinition = {
  id: "ensure-private-dns-zone",
  label: "Ensure Private DNS Zone",
  description: "Create a private DNS zone and link it to the VNet",
  phase: "network",
  parameters: [
    p("resourceGroup", "string", "Target resource group"),
    p("zoneName", "string", "Zone name, e.g. privatelink.database.windows.net"),
    p("linkName", "string", "VNet link name"),
    p("vnetId", "string", "VNet resource ID"),
    p("tags", "object", "Resource tags", false),
  ],
  outputs: [o("zoneName", "string", "Zone name"), o("zoneId", "string", "Zone resource ID")],
  audiences: ARM,
};

function ensurePrivateDnsZoneHandler(services: ServicesAccessor): StepHandler {
  return {
    async execute(ctx) {
      const resourceGroup = stringParam(ctx.params, "resourceGroup");
      const zoneName = stringParam(ctx.params, "zoneName");
      const { network, ensurer } = services();
      const zone = await ensurer.ensure(network.privateDnsZoneDriver(resourceGroup, zoneName, tagsOf(ctx)));
      await ensurer.ensure(
        network.vnetLinkDriver(resourceGroup, zoneName, stringParam(ctx.params, "linkName"), stringParam(ctx.params, "vnetId")),
      );
      return { zoneName, zoneId: zone.resourceId };
    },
  };
}

const ensurePrivateEndpointDef: StepTypeDefinition = {
  id: "ensure-private-endpoint",
  label: "Ensure Private Endpoint",
  description: "Create a private endpoint and register it in its private DNS zone",
  phase: "data",
  parameters: [
    p("resourceGroup", "string", "Target resource group"),
    p("name", "string", "Endpoint name"),
    p("location", "string", "Azure region"),
    p("subnetId", "string", "Subnet hosting the endpoint"),
    p("targetResourceId", "string", "Resource the endpoint connects to"),
    p("groupId", "string", "Private Link group (sqlServer or vault)"),
    p("zoneId", "string", "Private DNS zone resource ID"),
    p("tags", "object", "Resource tags", false),
  ],
  outputs: [o("endpointName", "string", "Endpoint name"), o("endpointId", "string", "Endpoint resource ID")],
  audiences: ARM,
};

function ensurePrivateEndpointHandler(services: ServicesAccessor): StepHandler {
  return {
    async execute(ctx) {
      const resourceGroup = stringParam(ctx.params, "resourceGroup");
      const name = stringParam(ctx.params, "name");
      const groupId = choiceParam(ctx.params, "groupId", LINK_GROUPS);
      const { network, ensurer } = services();
      const outcome = await ensurer.ensure(
        network.privateEndpointDriver(
          resourceGroup,
          name,
          stringParam(ctx.params, "location"),
          { subnetId: stringParam(ctx.params, "subnetId"), targetResourceId: stringParam(ctx.params, "targetResourceId"), groupId },
          tagsOf(ctx),
        ),
      );
      await network.attachPrivateDnsZoneGroup(resourceGroup, name, stringParam(ctx.params, "zoneId"), PRIVATE_DNS_ZONES[groupId]);
      return { endpointName: name, endpointId: outcome.resourceId };
    },
  };
}

// =============================================================================
// Compute
// =============================================================================

const ensureAppServicePlanDef: StepTypeDefinition = {
  id: "ensure-app-service-plan",
  label: "Ensure App Service Plan",
  description: "Create the App Service plan unless it already exists",
  phase: "compute",
  parameters: [
    p("resourceGroup", "string", "Target resource group"),
    p("name", "string", "Plan name"),
    p("location", "string", "Azure region"),
    p("sku", "string", "Plan SKU, e.g. B1"),
    p("tags", "object", "Resource tags", false),
  ],
  outputs: [o("planName", "string", "Plan name"), o("planId", "string", "Plan resource ID")],
  audiences: ARM,
};

function ensureAppServicePlanHandler(services: ServicesAccessor): StepHandler {
  return {
    async execute(ctx) {
      const name = stringParam(ctx.params, "name");
      const { webApps, ensurer } = services();
      const outcome = await ensurer.ensure(
        webApps.planDriver(stringParam(ctx.params, "resourceGroup"), name, stringParam(ctx.params, "location"), stringParam(ctx.params, "sku"), tagsOf(ctx)),
      );
      return { planName: name, planId: outcome.resourceId };
    },
  };
}

const ensureWebAppDef: StepTypeDefinition = {
  id: "ensure-web-app",
  label: "Ensure Web App",
  description: "Create a web app with a system-assigned managed identity",
  phase: "compute",
  parameters: [
    p("resourceGroup", "string", "Target resource group"),
    p("name", "string", "Web app name"),
    p("location", "string", "Azure region"),
    p("planId", "string", "App Service plan resource ID"),
    p("tags", "object", "Resource tags", false),
  ],
  outputs: [
    o("webAppName", "string", "Web app name"),
    o("webAppId", "string", "Web app resource ID"),
    o("principalId", "string", "Managed identity object ID"),
    o("defaultHostName", "string", "Default host name"),
  ],
  audiences: ARM,
};

function ensureWebAppHandler(services: ServicesAccessor): StepHandler {
  return {
    async execute(ctx) {
      const name = stringParam(ctx.params, "name");
      const { webApps, ensurer } = services();
      const outcome = await ensurer.ensure(
        webApps.webAppDriver(stringParam(ctx.params, "resourceGroup"), name, stringParam(ctx.params, "location"), stringParam(ctx.params, "planId"), {
          tags: tagsOf(ctx),
        }),
      );
      const principalId = outcome.resource.principalId;
      if (!principalId) {
        throw new ProvisioningError("CONFLICT", `Web app "${name}" has no system-assigned managed identity`, {
          resourceKind: "web-app",
          resourceName: name,
          operation: "ensure",
          remediation: `enable it with: az webapp identity assign --name ${name}`,
        });
      }
      return {
        webAppName: name,
        webAppId: outcome.resourceId,
        principalId,
        defaultHostName: outcome.resource.defaultHostName ?? `${name}.azurewebsites.net`,
      };
    },
  };
}

const ensureKeyVaultDef: StepTypeDefinition = {
  id: "ensure-key-vault",
  label: "Ensure Key Vault",
  description: "Create the Key Vault (checking for reserved or soft-deleted names first)",
  phase: "compute",
  parameters: [
    p("resourceGroup", "string", "Target resource group"),
    p("name", "string", "Vault name"),
    p("location", "string", "Azure region"),
    p("tags", "object", "Resource tags", false),
  ],
  outputs: [o("vaultName", "string", "Vault name"), o("vaultId", "string", "Vault resource ID"), o("vaultUri", "string", "Vault URI")],
  audiences: ARM,
};

function ensureKeyVaultHandler(services: ServicesAccessor): StepHandler {
  return {
    async execute(ctx) {
      const name = stringParam(ctx.params, "name");
      const { keyVault, ensurer } = services();
      const outcome = await ensurer.ensure(
        keyVault.vaultDriver(stringParam(ctx.params, "resourceGroup"), name, stringParam(ctx.params, "location"), tagsOf(ctx)),
      );
      return { vaultName: name, vaultId: outcome.resourceId, vaultUri: outcome.resource.vaultUri };
    },
  };
}

const grantKeyVaultAccessDef: StepTypeDefinition = {
  id: "grant-key-vault-access",
  label: "Grant Key Vault Access",
  description: "Add an access policy: readers get {get, list}, the deployer may also set secrets",
  phase: "compute",
  parameters: [
    p("resourceGroup", "string", "Vault resource group"),
    p("vaultName", "string", "Vault name"),
    p("objectId", "string", "Principal object ID"),
    p("access", "string", "reader or writer"),
  ],
  outputs: [o("objectId", "string", "Principal object ID"), o("changed", "boolean", "Whether a policy was added")],
  audiences: ARM,
};

function grantKeyVaultAccessHandler(services: ServicesAccessor): StepHandler {
  return {
    async execute(ctx) {
      const objectId = stringParam(ctx.params, "objectId");
      const permissions = choiceParam(ctx.params, "access", ["reader", "writer"]) === "writer" ? WRITER_PERMISSIONS : READER_PERMISSIONS;
      const changed = await services().keyVault.grantAccess(stringParam(ctx.params, "resourceGroup"), stringParam(ctx.params, "vaultName"), {
        objectId,
        ...permissions,
      });
      return { objectId, changed };
    },
  };
}

// =============================================================================
// Identity
// =============================================================================

const ensureAppRegistrationDef: StepTypeDefinition = {
  id: "ensure-app-registration",
  label: "Ensure App Registration",
  description: "Create or reuse an Entra ID application and its service principal",
  phase: "identity",
  parameters: [
    p("displayName", "string", "Application display name"),
    p("signInAudience", "string", "Sign-in audience"),
    p("confidential", "boolean", "Issue a client secret"),
    p("applicationId", "string", "Existing application ID to use", false),
    p("clientSecret", "string", "Existing client secret", false),
    p("redirectUris", "array", "Web redirect URIs", false),
    p("logoutUrl", "string", "Front-channel logout URL", false),
    p("enableIdTokenIssuance", "boolean", "Issue ID tokens from the authorize endpoint", false),
    p("requestUserRead", "boolean", "Request Graph User.Read", false),
    p("vaultName", "string", "Vault receiving the client secret", false),
    p("secretName", "string", "Secret name for the client secret", false),
  ],
  outputs: [
    o("applicationId", "string", "Application (client) ID"),
    o("objectId", "string", "Application object ID"),
    o("created", "boolean", "Created in this run"),
    o("secretStored", "boolean", "A client secret was written to the vault"),
  ],
  audiences: [TOKEN_AUDIENCES.graph],
};

function ensureAppRegistrationHandler(services: ServicesAccessor): StepHandler {
  return {
    async execute(ctx) {
      const { appRegistrations, secrets } = services();
      const vaultName = optionalStringParam(ctx.params, "vaultName");
      const secretName = optionalStringParam(ctx.params, "secretName");
      const suppliedSecret = optionalStringParam(ctx.params, "clientSecret");
      const persist =
        vaultName && secretName ? (value: string) => storeSecret(secrets, vaultName, secretName, value) : undefined;

      let secretStored = false;
      const registration = await appRegistrations.createOrReuse({
        displayName: stringParam(ctx.params, "displayName"),
        applicationId: optionalStringParam(ctx.params, "applicationId"),
        clientSecret: suppliedSecret,
        confidential: booleanParam(ctx.params, "confidential"),
        signInAudience: choiceParam(ctx.params, "signInAudience", SIGN_IN_AUDIENCES),
        redirectUris: stringArrayParam(ctx.params, "redirectUris"),
        logoutUrl: optionalStringParam(ctx.params, "logoutUrl"),
        enableIdTokenIssuance: booleanParam(ctx.params, "enableIdTokenIssuance"),
        requestUserRead: booleanParam(ctx.params, "requestUserRead"),
        hasPersistedSecret:
          vaultName && secretName ? async () => (await secrets.getSecret(vaultName, secretName)) !== null : undefined,
        persistSecret: persist
          ? async (value) => {
              const record = await persist(value);
              secretStored = true;
              return record;
            }
          : undefined,
      });

      if (persist && suppliedSecret && !secretStored) {
        await persist(suppliedSecret);
        secretStored = true;
      }
      return { applicationId: registration.applicationId, objectId: registration.objectId, created: registration.created, secretStored };
    },
  };
}

// =============================================================================
// Data
// =============================================================================

const ensureSqlServerDef: StepTypeDefinition = {
  id: "ensure-sql-server",
  label: "Ensure SQL Server",
  description: "Create the Azure SQL logical server with an Entra ID administrator",
  phase: "data",
  parameters: [
    p("resourceGroup", "string", "Target resource group"),
    p("name", "string", "Server name"),
    p("location", "string", "Azure region"),
    p("adminLogin", "string", "Entra administrator login"),
    p("adminObjectId", "string", "Entra administrator object ID"),
    p("adminPrincipalType", "string", "User, Group or Application"),
    p("allowPasswordFallback", "boolean", "Also enable SQL authentication", false),
    p("vaultName", "string", "Vault receiving the SQL admin password", false),
    p("tags", "object", "Resource tags", false),
  ],
  outputs: [o("serverName", "string", "Server name"), o("serverId", "string", "Server resource ID"), o("serverFqdn", "string", "Server FQDN")],
  audiences: ARM,
};

/** SQL-authentication admin login used only with the password fallback. */
export const SQL_ADMIN_LOGIN = "saasadmin";

function ensureSqlServerHandler(services: ServicesAccessor): StepHandler {
  return {
    async execute(ctx) {
      const resourceGroup = stringParam(ctx.params, "resourceGroup");
      const name = stringParam(ctx.params, "name");
      const { sql, ensurer, secrets, context } = services();

      let sqlAdmin: { login: string; password: string } | undefined;
      if (booleanParam(ctx.params, "allowPasswordFallback") && (await sql.getServer(resourceGroup, name)) === null) {
        const password = generatePassword();
        await storeSecret(secrets, stringParam(ctx.params, "vaultName"), SECRET_NAMES.sqlAdminPassword, password);
        sqlAdmin = { login: SQL_ADMIN_LOGIN, password };
      }

      const outcome = await ensurer.ensure(
        sql.serverDriver(resourceGroup, name, stringParam(ctx.params, "location"), {
          tenantId: context.tenantId,
          entraAdmin: {
            login: stringParam(ctx.params, "adminLogin"),
            objectId: stringParam(ctx.params, "adminObjectId"),
            principalType: choiceParam(ctx.params, "adminPrincipalType", PRINCIPAL_TYPES),
          },
          sqlAdmin,
          tags: tagsOf(ctx),
        }),
      );
      return {
        serverName: name,
        serverId: outcome.resourceId,
        serverFqdn: outcome.resource.fullyQualifiedDomainName ?? `${name}.database.windows.net`,
      };
    },
  };
}

const ensureSqlDatabaseDef: StepTypeDefinition = {
  id: "ensure-sql-database",
  label: "Ensure SQL Database",
  description: "Create the application database unless it already exists",
  phase: "data",
  parameters: [
    p("resourceGroup", "string", "Target resource group"),
    p("serverName", "string", "Server name"),
    p("name", "string", "Database name"),
    p("location", "string", "Azure region"),
    p("sku", "string", "Database SKU, e.g. S0"),
    p("tags", "object", "Resource tags", false),
  ],
  outputs: [o("databaseName", "string", "Database name"), o("databaseId", "string", "Database resource ID")],
  audiences: ARM,
};

function ensureSqlDatabaseHandler(services: ServicesAccessor): StepHandler {
  return {
    async execute(ctx) {
      const name = stringParam(ctx.params, "name");
      const { sql, ensurer } = services();
      const outcome = await ensurer.ensure(
        sql.databaseDriver(
          stringParam(ctx.params, "resourceGroup"),
          stringParam(ctx.params, "serverName"),
          name,
          stringParam(ctx.params, "location"),
          stringParam(ctx.params, "sku"),
          tagsOf(ctx),
        ),
      );
      return { databaseName: name, databaseId: outcome.resourceId };
    },
  };
}

const ensureSqlFirewallRuleDef: StepTypeDefinition = {
  id: "ensure-sql-firewall-rule",
  label: "Ensure SQL Firewall Rule",
  description: "Open the SQL server firewall for an address range",
  phase: "data",
  parameters: [
    p("resourceGroup", "string", "Target resource group"),
    p("serverName", "string", "Server name"),
    p("name", "string", "Rule name"),
    p("startIp", "string", "First address"),
    p("endIp", "string", "Last address"),
  ],
  outputs: [o("ruleName", "string", "Rule name"), o("ruleId", "string", "Rule resource ID")],
  audiences: ARM,
};

function ensureSqlFirewallRuleHandler(services: ServicesAccessor): StepHandler {
  return {
    async execute(ctx) {
      const name = stringParam(ctx.params, "name");
      const { sql, ensurer } = services();
      const outcome = await ensurer.ensure(
        sql.firewallRuleDriver(
          stringParam(ctx.params, "resourceGroup"),
          stringParam(ctx.params, "serverName"),
          name,
          stringParam(ctx.params, "startIp"),
          stringParam(ctx.params, "endIp"),
        ),
      );
      return { ruleName: name, ruleId: outcome.resourceId };
    },
  };
}

const storeConnectionStringDef: StepTypeDefinition = {
  id: "store-connection-string",
  label: "Store Connection String",
  description: "Write the managed-identity connection string to the vault",
  phase: "data",
  parameters: [
    p("vaultName", "string", "Vault name"),
    p("serverFqdn", "string", "SQL server FQDN"),
    p("databaseName", "string", "Database name"),
  ],
  outputs: [o("secretName", "string", "Secret name"), o("version", "string", "Secret version")],
  audiences: [],
};

function storeConnectionStringHandler(services: ServicesAccessor): StepHandler {
  return {
    async execute(ctx) {
      const record = await storeSecret(
        services().secrets,
        stringParam(ctx.params, "vaultName"),
        SECRET_NAMES.connectionString,
        managedIdentityConnectionString(stringParam(ctx.params, "serverFqdn"), stringParam(ctx.params, "databaseName")),
      );
      return { secretName: record.secretName, version: record.version };
    },
  };
}

const applyMigrationsDef: StepTypeDefinition = {
  id: "apply-migrations",
  label: "Apply Database Migrations",
  description: "Apply pending schema migrations, grant runtime identities and seed publisher admins",
  phase: "data",
  parameters: [
    p("serverFqdn", "string", "SQL server FQDN"),
    p("databaseName", "string", "Database name"),
    p("identities", "array", "Web apps granted database access"),
    p("knownUsers", "array", "Publisher admin emails", false),
    p("allowPasswordFallback", "boolean", "Allow password users when the external provider fails", false),
    p("vaultName", "string", "Vault receiving fallback credentials"),
  ],
  outputs: [o("applied", "array", "Migrations applied in this run"), o("grants", "array", "Grant method per identity")],
  audiences: [TOKEN_AUDIENCES.sql],
};

function applyMigrationsHandler(services: ServicesAccessor): StepHandler {
  return {
    async execute(ctx) {
      const { credentials, openSql, loadSchema, secrets } = services();
      const server = stringParam(ctx.params, "serverFqdn");
      const database = stringParam(ctx.params, "databaseName");
      const vaultName = stringParam(ctx.params, "vaultName");

      const executor = openSql({ server, database, accessToken: await credentials.getAccessToken(TOKEN_AUDIENCES.sql) });
      try {
        const outcome = await applyMigrations(executor, {
          model: await loadSchema(),
          identities: stringArrayParam(ctx.params, "identities"),
          knownUsers: stringArrayParam(ctx.params, "knownUsers"),
          allowPasswordFallback: booleanParam(ctx.params, "allowPasswordFallback"),
          persistPassword: async (identity, password) => {
            await storeSecret(secrets, vaultName, `${identity}-SqlPassword`, password);
            await storeSecret(
              secrets,
              vaultName,
              connectionSecretName(identity, true),
              passwordConnectionString(server, database, identity, password),
            );
          },
          logger: ctx.log,
        });
        return { applied: outcome.applied, grants: outcome.grants };
      } finally {
        await executor.close();
      }
    },
  };
}

// =============================================================================
// Deploy
// =============================================================================

const configureWebAppDef: StepTypeDefinition = {
  id: "configure-web-app",
  label: "Configure Web App",
  description: "Write app settings and the Key Vault connection string reference",
  phase: "deploy",
  parameters: [
    p("resourceGroup", "string", "Target resource group"),
    p("webAppName", "string", "Web app name"),
    p("role", "string", "admin or portal"),
    p("vaultName", "string", "Vault name"),
    p("fulfillmentAppId", "string", "Fulfillment API application ID"),
    p("landingPageAppId", "string", "Landing page application ID"),
    p("adminPortalAppId", "string", "Admin portal application ID"),
    p("portalHostName", "string", "Landing page host name"),
    p("hostName", "string", "Host name of this web app"),
    p("knownUsers", "array", "Publisher admin emails", false),
    p("sqlGrants", "array", "Grant method per identity", false),
  ],
  outputs: [o("settingsCount", "number", "App settings written"), o("connectionSecret", "string", "Secret the connection string references")],
  audiences: ARM,
};

function usesPasswordUser(grants: unknown, identity: string): boolean {
  if (!Array.isArray(grants)) return false;
  return grants.some(
    (grant: unknown) =>
      typeof grant === "object" &&
      grant !== null &&
      Reflect.get(grant, "identity") === identity &&
      Reflect.get(grant, "method") === "password",
  );
}

function configureWebAppHandler(services: ServicesAccessor): StepHandler {
  return {
    async execute(ctx) {
      const { webApps, context } = services();
      const resourceGroup = stringParam(ctx.params, "resourceGroup");
      const webAppName = stringParam(ctx.params, "webAppName");
      const vaultName = stringParam(ctx.params, "vaultName");

      const settings = buildAppSettings({
        role: choiceParam(ctx.params, "role", WEB_APP_ROLES),
        tenantId: context.tenantId,
        vaultName,
        fulfillmentAppId: stringParam(ctx.params, "fulfillmentAppId"),
        landingPageAppId: stringParam(ctx.params, "landingPageAppId"),
        adminPortalAppId: stringParam(ctx.params, "adminPortalAppId"),
        portalHostName: stringParam(ctx.params, "portalHostName"),
        hostName: stringParam(ctx.params, "hostName"),
        knownUsers: stringArrayParam(ctx.params, "knownUsers"),
      });
      const secretName = connectionSecretName(webAppName, usesPasswordUser(ctx.params.sqlGrants, webAppName));

      await webApps.updateAppSettings(resourceGroup, webAppName, settings);
      await webApps.updateConnectionStrings(resourceGroup, webAppName, buildConnectionStrings(vaultName, secretName));
      return { settingsCount: Object.keys(settings).length, connectionSecret: secretName };
    },
  };
}

const deployWebAppDef: StepTypeDefinition = {
  id: "deploy-web-app",
  label: "Deploy Web App",
  description: "Publish, package and zip-deploy a .NET project, then attach VNet integration",
  phase: "deploy",
  parameters: [
    p("resourceGroup", "string", "Target resource group"),
    p("webAppName", "string", "Web app name"),
    p("projectName", "string", "Artifact name"),
    p("projectPath", "string", ".csproj path relative to the source root"),
    p("integrationSubnetId", "string", "Delegated subnet for VNet integration", false),
    p("logoPngUrl", "string", "Logo PNG URL", false),
    p("logoIcoUrl", "string", "Favicon URL", false),
  ],
  outputs: [
    o("deploymentId", "string", "Kudu deployment ID"),
    o("artifactPath", "string", "Uploaded archive"),
    o("vnetIntegrated", "boolean", "VNet integration attached in this run"),
  ],
  audiences: ARM,
};

function deployWebAppHandler(services: ServicesAccessor): StepHandler {
  return {
    async execute(ctx) {
      const logoPngUrl = optionalStringParam(ctx.params, "logoPngUrl");
      const logoIcoUrl = optionalStringParam(ctx.params, "logoIcoUrl");
      const outcome = await publishAndDeploy(
        {
          name: stringParam(ctx.params, "projectName"),
          projectPath: stringParam(ctx.params, "projectPath"),
          appName: stringParam(ctx.params, "webAppName"),
          resourceGroup: stringParam(ctx.params, "resourceGroup"),
          branding: logoPngUrl || logoIcoUrl ? { logoPngUrl, logoIcoUrl } : undefined,
          integrationSubnetId: optionalStringParam(ctx.params, "integrationSubnetId"),
        },
        services().deploy,
      );
      return { deploymentId: outcome.deploymentId, artifactPath: outcome.package.artifactPath, vnetIntegrated: outcome.vnetIntegrated };
    },
  };
}

// =============================================================================
// Registration
// =============================================================================

export const PROVISIONING_STEP_DEFINITIONS: StepTypeDefinition[] = [
  ensureResourceGroupDef,
  ensureVNetDef,
  ensureSubnetDef,
  ensurePrivateDnsZoneDef,
  ensureAppServicePlanDef,
  ensureWebAppDef,
  ensureKeyVaultDef,
  grantKeyVaultAccessDef,
  ensureAppRegistrationDef,
  ensureSqlServerDef,
  ensureSqlDatabaseDef,
  ensureSqlFirewallRuleDef,
  ensurePrivateEndpointDef,
  storeConnectionStringDef,
  applyMigrationsDef,
  configureWebAppDef,
  deployWebAppDef,
];

const HANDLERS: Record<string, (services: ServicesAccessor) => StepHandler> = {
  [ensureResourceGroupDef.id]: ensureResourceGroupHandler,
  [ensureVNetDef.id]: ensureVNetHandler,
  [ensureSubnetDef.id]: ensureSubnetHandler,
  [ensurePrivateDnsZoneDef.id]: ensurePrivateDnsZoneHandler,
  [ensureAppServicePlanDef.id]: ensureAppServicePlanHandler,
  [ensureWebAppDef.id]: ensureWebAppHandler,
  [ensureKeyVaultDef.id]: ensureKeyVaultHandler,
  [grantKeyVaultAccessDef.id]: grantKeyVaultAccessHandler,
  [ensureAppRegistrationDef.id]: ensureAppRegistrationHandler,
  [ensureSqlServerDef.id]: ensureSqlServerHandler,
  [ensureSqlDatabaseDef.id]: ensureSqlDatabaseHandler,
  [ensureSqlFirewallRuleDef.id]: ensureSqlFirewallRuleHandler,
  [ensurePrivateEndpointDef.id]: ensurePrivateEndpointHandler,
  [storeConnectionStringDef.id]: storeConnectionStringHandler,
  [applyMigrationsDef.id]: applyMigrationsHandler,
  [configureWebAppDef.id]: configureWebAppHandler,
  [deployWebAppDef.id]: deployWebAppHandler,
};

/**
 * Register every provisioning step. Services are resolved lazily, on the
 * first step that runs.
 */
export function registerProvisioningSteps(getServices: ServicesAccessor): void {
  for (const def of PROVISIONING_STEP_DEFINITIONS) {
    const factory = HANDLERS[def.id];
    if (!factory) throw new Error(`No handler for step type "${def.id}"`);
    registerStepType(def, factory(getServices));
  }
}

/** Register definitions whose handlers refuse to run (plan validation and dry runs). */
export function registerProvisioningStepsDryRun(): void {
  registerProvisioningSteps(() => {
    throw new ProvisioningError("VALIDATION", "Provisioning services are not available in a dry run");
  });
}
