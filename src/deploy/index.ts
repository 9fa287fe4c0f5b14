export { publishAndDeploy, packagePaths } from "./pipeline.js";
export type { DeployTarget } from "./pipeline.js";
export { KuduClient, scmHost } from "./kudu.js";
export { archiveDirectory, listFiles } from "./archive.js";
export { applyBranding } from "./branding.js";
export { KUDU_STATUS, BRANDING_FILES } from "./types.js";
export type {
  DeploymentPackage,
  DeploymentOutcome,
  DeployProject,
  BrandingAssets,
  KuduDeployStatus,
} from "./types.js";
