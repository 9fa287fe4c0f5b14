/**
 * The managers and clients step handlers call, built once per run from the
 * explicit provisioning context.
 */

import type { DeploymentConfig } from "../config.js";
import type { CredentialsManager } from "../credentials/index.js";
import { KuduClient, type DeployTarget } from "../deploy/index.js";
import { ResourceEnsurer } from "../ensurer/index.js";
import { AppRegistrationProvisioner, GraphDirectoryClient } from "../identity/index.js";
import { AzureKeyVaultManager } from "../keyvault/index.js";
import { getLogger, type Logger } from "../logging/index.js";
import {
  createMssqlExecutor,
  loadSchemaModel,
  type SchemaModel,
  type SqlConnectionOptions,
  type SqlExecutor,
} from "../migrations/index.js";
import { AzureNetworkManager } from "../network/index.js";
import { AzureResourceManager } from "../resources/index.js";
import { KeyVaultSecretStore, type SecretStore } from "../secrets/index.js";
import { AzureSQLManager } from "../sql/index.js";
import { ToolRunner } from "../tools/index.js";
import type { ProvisioningContext } from "../types.js";
import { AzureWebAppManager } from "../webapp/index.js";

export type ProvisioningServices = {
  context: ProvisioningContext;
  ensurer: Pick<ResourceEnsurer, "ensure">;
  resources: Pick<AzureResourceManager, "resourceGroupDriver">;
  network: Pick<
    AzureNetworkManager,
    "vnetDriver" | "subnetDriver" | "privateDnsZoneDriver" | "vnetLinkDriver" | "privateEndpointDriver" | "attachPrivateDnsZoneGroup"
  >;
  sql: Pick<AzureSQLManager, "getServer" | "serverDriver" | "databaseDriver" | "firewallRuleDriver">;
  keyVault: Pick<AzureKeyVaultManager, "vaultDriver" | "grantAccess">;
  webApps: Pick<AzureWebAppManager, "planDriver" | "webAppDriver" | "updateAppSettings" | "updateConnectionStrings">;
  appRegistrations: Pick<AppRegistrationProvisioner, "createOrReuse">;
  secrets: SecretStore;
  deploy: DeployTarget;
  credentials: Pick<CredentialsManager, "getAccessToken">;
  openSql: (options: SqlConnectionOptions) => SqlExecutor;
  loadSchema: () => Promise<SchemaModel>;
  logger: Logger;
};

export function createProvisioningServices(
  config: DeploymentConfig,
  context: ProvisioningContext,
  credentials: Pick<CredentialsManager, "getAccessToken">,
): ProvisioningServices {
  const retry = config.retry;
  const logger = getLogger("steps");
  const webApps = new AzureWebAppManager(context, retry);

  return {
    context,
    ensurer: new ResourceEnsurer({
      propagationRetry: config.propagationRetry,
      readiness: config.readiness,
      logger: getLogger("ensurer"),
    }),
    resources: new AzureResourceManager(context, retry),
    network: new AzureNetworkManager(context, retry),
    sql: new AzureSQLManager(context, retry),
    keyVault: new AzureKeyVaultManager(context, retry, config.propagationRetry),
    webApps,
    appRegistrations: new AppRegistrationProvisioner(new GraphDirectoryClient(context, retry), {
      visibility: config.readiness,
      propagationRetry: config.propagationRetry,
      logger: getLogger("identity"),
    }),
    secrets: new KeyVaultSecretStore(context, retry),
    deploy: {
      sourceRoot: config.sourceRoot,
      artifactRoot: config.artifactRoot,
      runner: new ToolRunner(),
      kudu: new KuduClient(context),
      webApps,
    },
    credentials,
    openSql: (options) => createMssqlExecutor(options, retry),
    loadSchema: () => loadSchemaModel(),
    logger,
  };
}
