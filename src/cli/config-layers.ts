/**
 * Builds the layered deployment configuration for a command: JSON config
 * file, then environment, then command-line flags.
 */

import { readFile } from "node:fs/promises";
import { configFromEnv, resolveDeploymentConfig, type DeploymentConfig } from "../config.js";
import { errorMessageOf, validationError } from "../errors.js";

/** Options shared by `deploy` and `plan`, as commander hands them over. */
export type DeploymentFlags = {
  config?: string;
  prefix?: string;
  location?: string;
  tenant?: string;
  subscription?: string;
  adminUsers?: string[];
  fulfillmentAppId?: string;
  fulfillmentAppSecret?: string;
  landingPageAppId?: string;
  adminPortalAppId?: string;
  keyVault?: string;
  resourceGroup?: string;
  sqlDatabase?: string;
  logoPng?: string;
  logoIco?: string;
  clientIp?: string;
  sourceRoot?: string;
  allowSqlPasswordFallback?: boolean;
  quiet?: boolean;
  verbose?: boolean;
};

export function configFromFlags(flags: DeploymentFlags): Record<string, unknown> {
  return {
    namePrefix: flags.prefix,
    location: flags.location,
    tenantId: flags.tenant,
    subscriptionId: flags.subscription,
    publisherAdminUsers: flags.adminUsers,
    fulfillmentAppId: flags.fulfillmentAppId,
    fulfillmentAppSecret: flags.fulfillmentAppSecret,
    landingPageAppId: flags.landingPageAppId,
    adminPortalAppId: flags.adminPortalAppId,
    keyVaultName: flags.keyVault,
    resourceGroup: flags.resourceGroup,
    sqlDatabaseName: flags.sqlDatabase,
    logoPngUrl: flags.logoPng,
    logoIcoUrl: flags.logoIco,
    clientIp: flags.clientIp,
    sourceRoot: flags.sourceRoot,
    allowSqlPasswordFallback: flags.allowSqlPasswordFallback,
    quiet: flags.quiet,
    verbose: flags.verbose,
  };
}

export async function readConfigFile(filePath: string): Promise<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    throw validationError(`Could not read config file "${filePath}": ${errorMessageOf(error)}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw validationError(`Config file "${filePath}" must hold a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

export async function loadDeploymentConfig(
  flags: DeploymentFlags,
  env: NodeJS.ProcessEnv = process.env,
): Promise<DeploymentConfig> {
  const fileLayer = flags.config ? await readConfigFile(flags.config) : {};
  return resolveDeploymentConfig(fileLayer, configFromEnv(env), configFromFlags(flags));
}
