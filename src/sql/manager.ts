/**
 * Azure SQL Manager
 *
 * Logical servers, databases and firewall rules via @azure/arm-sql.
 */

import type { Database, Server } from "@azure/arm-sql";
import { instrumentedCall, type CallTarget } from "../diagnostics.js";
import type { ResourceDriver } from "../ensurer/index.js";
import { conflictError, isNotFoundError } from "../errors.js";
import { withAzureRetry } from "../retry.js";
import type { AzureRetryOptions, AzureTagSet, ProvisioningContext } from "../types.js";
import type { SqlDatabase, SqlFirewallRule, SqlServer, SqlServerOptions } from "./types.js";

// =============================================================================
// AzureSQLManager
// =============================================================================

export class AzureSQLManager {
  private context: ProvisioningContext;
  private retryOptions: AzureRetryOptions;

  constructor(context: ProvisioningContext, retryOptions?: AzureRetryOptions) {
    this.context = context;
    this.retryOptions = retryOptions ?? {};
  }

  private async getClient() {
    const { SqlManagementClient } = await import("@azure/arm-sql");
    return new SqlManagementClient(this.context.credential, this.context.subscriptionId);
  }

  private call<T>(operation: string, fn: () => Promise<T>, target: CallTarget): Promise<T> {
    return instrumentedCall("sql", operation, () => withAzureRetry(fn, this.retryOptions), target);
  }

  // ---------------------------------------------------------------------------
  // Servers
  // ---------------------------------------------------------------------------

  async getServer(resourceGroup: string, serverName: string): Promise<SqlServer | null> {
    const client = await this.getClient();
    return this.call(
      "servers.get",
      async () => {
        try {
          return toServer(await client.servers.get(resourceGroup, serverName), resourceGroup);
        } catch (e) {
          if (isNotFoundError(e)) return null;
          throw e;
        }
      },
      { resourceKind: "sql-server", resourceName: serverName, resourceGroup },
    );
  }

  /**
   * Server names are global across Azure. A name taken by another
   * subscription is a conflict the run cannot recover from.
   */
  async assertServerNameAvailable(serverName: string): Promise<void> {
    const client = await this.getClient();
    const result = await this.call(
      "servers.checkNameAvailability",
      () => client.servers.checkNameAvailability({ name: serverName, type: "Microsoft.Sql/servers" }),
      { resourceKind: "sql-server", resourceName: serverName },
    );
    if (result.available === false) {
      throw conflictError(
        "sql-server",
        serverName,
        `SQL server name "${serverName}" is not available: ${result.message ?? result.reason ?? "name in use"}`,
        "choose a different name prefix",
      );
    }
  }

  async createServer(
    resourceGroup: string,
    serverName: string,
    location: string,
    options: SqlServerOptions,
  ): Promise<SqlServer> {
    const client = await this.getClient();
    return this.call(
      "servers.createOrUpdate",
      async () => {
        const s = await client.servers.beginCreateOrUpdateAndWait(resourceGroup, serverName, {
          location,
          version: "12.0",
          minimalTlsVersion: "1.2",
          publicNetworkAccess: "Enabled",
          administratorLogin: options.sqlAdmin?.login,
          administratorLoginPassword: options.sqlAdmin?.password,
          administrators: {
            administratorType: "ActiveDirectory",
            login: options.entraAdmin.login,
            sid: options.entraAdmin.objectId,
            principalType: options.entraAdmin.principalType,
            tenantId: options.tenantId,
            azureADOnlyAuthentication: options.sqlAdmin === undefined,
          },
          tags: options.tags,
        });
        return toServer(s, resourceGroup);
      },
      { resourceKind: "sql-server", resourceName: serverName, resourceGroup },
    );
  }

  serverDriver(
    resourceGroup: string,
    serverName: string,
    location: string,
    options: SqlServerOptions,
  ): ResourceDriver<SqlServer> {
    return {
      spec: { kind: "sql-server", name: serverName, resourceGroup, region: location, dependsOn: [resourceGroup] },
      get: () => this.getServer(resourceGroup, serverName),
      create: async () => {
        await this.assertServerNameAvailable(serverName);
        return this.createServer(resourceGroup, serverName, location, options);
      },
      describe: (s) => ({
        resourceId: s.id,
        attributes: { fullyQualifiedDomainName: s.fullyQualifiedDomainName, entraAdmin: s.entraAdminLogin },
      }),
      isReady: async () => (await this.getServer(resourceGroup, serverName))?.state === "Ready",
    };
  }

  // ---------------------------------------------------------------------------
  // Databases
  // ---------------------------------------------------------------------------

  async getDatabase(resourceGroup: string, serverName: string, dbName: string): Promise<SqlDatabase | null> {
    const client = await this.getClient();
    return this.call(
      "databases.get",
      async () => {
        try {
          return toDatabase(await client.databases.get(resourceGroup, serverName, dbName), serverName, resourceGroup);
        } catch (e) {
          if (isNotFoundError(e)) return null;
          throw e;
        }
      },
      { resourceKind: "sql-database", resourceName: dbName, resourceGroup },
    );
  }

  async createDatabase(
    resourceGroup: string,
    serverName: string,
    dbName: string,
    location: string,
    skuName: string,
    tags?: AzureTagSet,
  ): Promise<SqlDatabase> {
    const client = await this.getClient();
    return this.call(
      "databases.createOrUpdate",
      async () => {
        const d = await client.databases.beginCreateOrUpdateAndWait(resourceGroup, serverName, dbName, {
          location,
          sku: { name: skuName },
          tags,
        });
        return toDatabase(d, serverName, resourceGroup);
      },
      { resourceKind: "sql-database", resourceName: dbName, resourceGroup },
    );
  }

  databaseDriver(
    resourceGroup: string,
    serverName: string,
    dbName: string,
    location: string,
    skuName: string,
    tags?: AzureTagSet,
  ): ResourceDriver<SqlDatabase> {
    return {
      spec: { kind: "sql-database", name: dbName, resourceGroup, region: location, dependsOn: [serverName] },
      get: () => this.getDatabase(resourceGroup, serverName, dbName),
      create: () => this.createDatabase(resourceGroup, serverName, dbName, location, skuName, tags),
      describe: (d) => ({ resourceId: d.id, attributes: { sku: d.skuName, status: d.status } }),
      isReady: async () => (await this.getDatabase(resourceGroup, serverName, dbName))?.status === "Online",
    };
  }

  // ---------------------------------------------------------------------------
  // Firewall rules
  // ---------------------------------------------------------------------------

  async getFirewallRule(resourceGroup: string, serverName: string, ruleName: string): Promise<SqlFirewallRule | null> {
    const client = await this.getClient();
    return this.call(
      "firewallRules.get",
      async () => {
        try {
          const r = await client.firewallRules.get(resourceGroup, serverName, ruleName);
          return { id: r.id ?? "", name: r.name ?? ruleName, startIpAddress: r.startIpAddress ?? "", endIpAddress: r.endIpAddress ?? "" };
        } catch (e) {
          if (isNotFoundError(e)) return null;
          throw e;
        }
      },
      { resourceKind: "sql-firewall-rule", resourceName: ruleName, resourceGroup },
    );
  }

  async createFirewallRule(
    resourceGroup: string,
    serverName: string,
    ruleName: string,
    startIp: string,
    endIp: string,
  ): Promise<SqlFirewallRule> {
    const client = await this.getClient();
    return this.call(
      "firewallRules.createOrUpdate",
      async () => {
        const r = await client.firewallRules.createOrUpdate(resourceGroup, serverName, ruleName, {
          startIpAddress: startIp,
          endIpAddress: endIp,
        });
        return { id: r.id ?? "", name: r.name ?? ruleName, startIpAddress: r.startIpAddress ?? "", endIpAddress: r.endIpAddress ?? "" };
      },
      { resourceKind: "sql-firewall-rule", resourceName: ruleName, resourceGroup },
    );
  }

  firewallRuleDriver(
    resourceGroup: string,
    serverName: string,
    ruleName: string,
    startIp: string,
    endIp: string,
  ): ResourceDriver<SqlFirewallRule> {
    return {
      spec: { kind: "sql-firewall-rule", name: ruleName, resourceGroup, region: "", dependsOn: [serverName] },
      get: () => this.getFirewallRule(resourceGroup, serverName, ruleName),
      create: () => this.createFirewallRule(resourceGroup, serverName, ruleName, startIp, endIp),
      describe: (r) => ({ resourceId: r.id, attributes: { startIpAddress: r.startIpAddress, endIpAddress: r.endIpAddress } }),
    };
  }
}

// =============================================================================
// Mapping
// =============================================================================

function toServer(s: Server, resourceGroup: string): SqlServer {
  return {
    id: s.id ?? "",
    name: s.name ?? "",
    resourceGroup,
    location: s.location ?? "",
    fullyQualifiedDomainName: s.fullyQualifiedDomainName,
    administratorLogin: s.administratorLogin,
    entraAdminLogin: s.administrators?.login,
    state: s.state,
    publicNetworkAccess: s.publicNetworkAccess,
  };
}

function toDatabase(d: Database, serverName: string, resourceGroup: string): SqlDatabase {
  return {
    id: d.id ?? "",
    name: d.name ?? "",
    serverName,
    resourceGroup,
    location: d.location ?? "",
    status: d.status,
    skuName: d.sku?.name,
    collation: d.collation,
  };
}
