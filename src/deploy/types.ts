/**
 * Build-and-Deploy Pipeline: Type Definitions
 */

/** Build output bundled for upload. */
export type DeploymentPackage = {
  sourcePath: string;
  artifactPath: string;
};

export type BrandingAssets = {
  logoPngUrl?: string;
  logoIcoUrl?: string;
};

/** One .NET project deployed to one web app. */
export type DeployProject = {
  name: string;
  /** .csproj path, relative to the source root. */
  projectPath: string;
  appName: string;
  resourceGroup: string;
  branding?: BrandingAssets;
  /** Delegated subnet for regional VNet integration. */
  integrationSubnetId?: string;
};

export type KuduDeployStatus = {
  id: string;
  status: number;
  statusText: string;
  complete: boolean;
};

export type DeploymentOutcome = {
  appName: string;
  package: DeploymentPackage;
  deploymentId: string;
  archiveBytes: number;
  brandingFiles: string[];
  vnetIntegrated: boolean;
};

/** Kudu DeployStatus values. */
export const KUDU_STATUS = {
  pending: 0,
  building: 1,
  deploying: 2,
  failed: 3,
  success: 4,
} as const;

/** File names the web apps expect under wwwroot. */
export const BRANDING_FILES = {
  png: "contoso-sales.png",
  ico: "favicon.ico",
} as const;
