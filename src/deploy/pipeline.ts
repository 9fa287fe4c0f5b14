/**
 * Build-and-Deploy Pipeline
 *
 * publish → branding → archive → zip deploy → wait for completion → VNet
 * integration. The first failing step aborts the rest.
 */

import path from "node:path";
import { getLogger } from "../logging/index.js";
import { dotnetPublish, type ToolRunner } from "../tools/index.js";
import type { AzureWebAppManager } from "../webapp/index.js";
import { archiveDirectory } from "./archive.js";
import { applyBranding } from "./branding.js";
import type { KuduClient } from "./kudu.js";
import type { DeploymentOutcome, DeploymentPackage, DeployProject } from "./types.js";

const log = getLogger("deploy");

export type DeployTarget = {
  sourceRoot: string;
  artifactRoot: string;
  runner: ToolRunner;
  kudu: Pick<KuduClient, "zipDeploy" | "waitForDeployment">;
  webApps: Pick<AzureWebAppManager, "attachVNetIntegration">;
};

export function packagePaths(project: DeployProject, target: Pick<DeployTarget, "sourceRoot" | "artifactRoot">): DeploymentPackage & {
  publishDir: string;
} {
  const artifactRoot = path.resolve(target.artifactRoot);
  return {
    sourcePath: path.resolve(target.sourceRoot, project.projectPath),
    publishDir: path.join(artifactRoot, project.name),
    artifactPath: path.join(artifactRoot, `${project.name}.zip`),
  };
}

export async function publishAndDeploy(project: DeployProject, target: DeployTarget): Promise<DeploymentOutcome> {
  const paths = packagePaths(project, target);
  const plog = log.withContext({ stepId: project.name, resource: project.appName });

  plog.info(`Publishing ${project.projectPath}`);
  await dotnetPublish(target.runner, paths.sourcePath, paths.publishDir);

  const brandingFiles = project.branding ? await applyBranding(paths.publishDir, project.branding) : [];

  const archive = await archiveDirectory(paths.publishDir, paths.artifactPath);
  plog.info(`Packaged ${paths.artifactPath}`, { bytes: archive.byteLength });

  const statusUrl = await target.kudu.zipDeploy(project.appName, archive);
  const status = await target.kudu.waitForDeployment(project.appName, statusUrl);
  plog.info(`Deployed ${project.name} to ${project.appName}`, { deploymentId: status.id });

  const vnetIntegrated = project.integrationSubnetId
    ? await target.webApps.attachVNetIntegration(project.resourceGroup, project.appName, project.integrationSubnetId)
    : false;

  return {
    appName: project.appName,
    package: { sourcePath: paths.sourcePath, artifactPath: paths.artifactPath },
    deploymentId: status.id,
    archiveBytes: archive.byteLength,
    brandingFiles,
    vnetIntegrated,
  };
}
