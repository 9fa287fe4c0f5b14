/**
 * Deployment Record
 *
 * Summary of a successful run, written as JSON for the operator: the IDs
 * and names needed to find, configure or re-run the deployment. Holds no
 * secret values.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { deriveResourceNames, type DeploymentConfig } from "../config.js";
import { ProvisioningError, validationError } from "../errors.js";
import type { OrchestrationResult } from "../orchestration/index.js";

export const DEFAULT_RECORD_PATH = "deployment-record.json";

export const deploymentRecordSchema = Type.Object({
  tenantId: Type.String(),
  subscriptionId: Type.String(),
  resourceGroup: Type.String(),
  location: Type.String(),
  namePrefix: Type.String(),
  fulfillmentAppId: Type.String(),
  landingPageAppId: Type.String(),
  adminPortalAppId: Type.String(),
  keyVaultName: Type.String(),
  sqlServerName: Type.String(),
  sqlDatabaseName: Type.String(),
  adminWebAppName: Type.String(),
  portalWebAppName: Type.String(),
  createdAt: Type.String(),
});

export type DeploymentRecord = Static<typeof deploymentRecordSchema>;

function output(result: OrchestrationResult, stepId: string, name: string): string {
  const value = result.outputs[stepId]?.[name];
  if (typeof value !== "string" || value.length === 0) {
    throw new ProvisioningError("VALIDATION", `Run "${result.planId}" has no output "${name}" from step "${stepId}"`);
  }
  return value;
}

export function buildDeploymentRecord(config: DeploymentConfig, result: OrchestrationResult, now: Date = new Date()): DeploymentRecord {
  if (result.status !== "succeeded" || result.dryRun) {
    throw validationError(`A deployment record needs a successful run (run "${result.planId}" is ${result.dryRun ? "a dry run" : result.status})`);
  }
  const names = deriveResourceNames(config);
  return {
    tenantId: config.tenantId,
    subscriptionId: config.subscriptionId,
    resourceGroup: output(result, "rg", "resourceGroupName"),
    location: config.location,
    namePrefix: config.namePrefix,
    fulfillmentAppId: output(result, "app-fulfillment", "applicationId"),
    landingPageAppId: output(result, "app-landing", "applicationId"),
    adminPortalAppId: output(result, "app-admin", "applicationId"),
    keyVaultName: output(result, "kv", "vaultName"),
    sqlServerName: output(result, "sql", "serverName"),
    sqlDatabaseName: output(result, "db", "databaseName"),
    adminWebAppName: names.adminWebApp,
    portalWebAppName: names.portalWebApp,
    createdAt: now.toISOString(),
  };
}

/** Write the record, creating the parent directory. Returns the absolute path. */
export async function writeDeploymentRecord(record: DeploymentRecord, filePath: string = DEFAULT_RECORD_PATH): Promise<string> {
  const target = path.resolve(filePath);
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, `${JSON.stringify(record, null, 2)}\n`, "utf8");
  return target;
}

export async function readDeploymentRecord(filePath: string = DEFAULT_RECORD_PATH): Promise<DeploymentRecord> {
  const text = await readFile(filePath, "utf8");
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ProvisioningError("VALIDATION", `${filePath} is not valid JSON`, { cause: error });
  }
  if (!Value.Check(deploymentRecordSchema, data)) {
    const first = [...Value.Errors(deploymentRecordSchema, data)][0];
    throw validationError(`${filePath} is not a deployment record${first ? ` (${first.path || "/"}: ${first.message})` : ""}`);
  }
  return data;
}
