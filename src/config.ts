/**
 * Deployment configuration schema (TypeBox), defaults, and resource naming.
 *
 * Resolution order, lowest precedence first: schema defaults, JSON config
 * file, environment, CLI flags. Everything here is pure: a configuration is
 * fully validated before any credential is resolved or any cloud call made.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { validationError } from "./errors.js";

// =============================================================================
// Schema
// =============================================================================

const retrySchema = Type.Object({
  maxAttempts: Type.Optional(Type.Integer({ minimum: 1 })),
  minDelayMs: Type.Optional(Type.Integer({ minimum: 0 })),
  maxDelayMs: Type.Optional(Type.Integer({ minimum: 0 })),
});

const propagationSchema = Type.Object({
  attempts: Type.Integer({ minimum: 1, default: 3 }),
  delayMs: Type.Integer({ minimum: 0, default: 10_000 }),
});

const readinessSchema = Type.Object({
  intervalMs: Type.Integer({ minimum: 0, default: 5_000 }),
  timeoutMs: Type.Integer({ minimum: 0, default: 300_000 }),
});

const networkSchema = Type.Object({
  addressPrefix: Type.String({ default: "10.0.0.0/20" }),
  defaultSubnetPrefix: Type.String({ default: "10.0.0.0/24" }),
  webSubnetPrefix: Type.String({ default: "10.0.1.0/24" }),
  sqlSubnetPrefix: Type.String({ default: "10.0.2.0/24" }),
  keyVaultSubnetPrefix: Type.String({ default: "10.0.3.0/24" }),
});

export const configSchema = Type.Object({
  namePrefix: Type.String({ description: "Prefix for every resource name (3-21 chars)" }),
  location: Type.String({ minLength: 1, description: "Azure region (e.g. eastus)" }),
  tenantId: Type.String({ minLength: 1, description: "Entra ID tenant ID" }),
  subscriptionId: Type.String({ minLength: 1, description: "Azure subscription ID" }),
  publisherAdminUsers: Type.Array(Type.String(), { minItems: 1, description: "Publisher admin emails" }),
  resourceGroup: Type.Optional(Type.String({ minLength: 1 })),
  keyVaultName: Type.Optional(Type.String({ minLength: 1 })),
  sqlDatabaseName: Type.String({ minLength: 1, default: "AMPSaaSDB" }),
  sqlDatabaseSku: Type.String({ default: "S0" }),
  appServicePlanSku: Type.String({ default: "B1" }),
  fulfillmentAppId: Type.Optional(Type.String({ minLength: 1 })),
  fulfillmentAppSecret: Type.Optional(Type.String({ minLength: 1 })),
  landingPageAppId: Type.Optional(Type.String({ minLength: 1 })),
  adminPortalAppId: Type.Optional(Type.String({ minLength: 1 })),
  sqlAdminObjectId: Type.Optional(Type.String({ minLength: 1 })),
  sqlAdminLogin: Type.Optional(Type.String({ minLength: 1 })),
  clientIp: Type.Optional(Type.String({ minLength: 1 })),
  logoPngUrl: Type.Optional(Type.String({ minLength: 1 })),
  logoIcoUrl: Type.Optional(Type.String({ minLength: 1 })),
  sourceRoot: Type.String({ default: "." }),
  artifactRoot: Type.String({ default: "publish" }),
  allowSqlPasswordFallback: Type.Boolean({ default: false }),
  credentialMethod: Type.Union(
    [
      Type.Literal("default"),
      Type.Literal("cli"),
      Type.Literal("service-principal"),
      Type.Literal("managed-identity"),
    ],
    { default: "default" },
  ),
  tags: Type.Record(Type.String(), Type.String(), { default: {} }),
  network: Type.Optional(networkSchema),
  retry: Type.Optional(retrySchema),
  propagationRetry: Type.Optional(propagationSchema),
  readiness: Type.Optional(readinessSchema),
  quiet: Type.Boolean({ default: false }),
  verbose: Type.Boolean({ default: false }),
});

export type DeploymentConfig = Static<typeof configSchema>;
export type NetworkConfig = Static<typeof networkSchema>;

export const NAME_PREFIX_MAX_LENGTH = 21;
export const NAME_PREFIX_MIN_LENGTH = 3;
export const KEY_VAULT_NAME_MAX_LENGTH = 24;

export const DEFAULT_NETWORK: NetworkConfig = {
  addressPrefix: "10.0.0.0/20",
  defaultSubnetPrefix: "10.0.0.0/24",
  webSubnetPrefix: "10.0.1.0/24",
  sqlSubnetPrefix: "10.0.2.0/24",
  keyVaultSubnetPrefix: "10.0.3.0/24",
};

// =============================================================================
// Validation
// =============================================================================

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const KEY_VAULT_PATTERN = /^[a-zA-Z][a-zA-Z0-9-]*[a-zA-Z0-9]$/;

/**
 * Check a name prefix against the naming scheme. Returns the problems found
 * (empty when valid).
 */
export function validateNamePrefix(prefix: string): string[] {
  const problems: string[] = [];
  if (prefix.length > NAME_PREFIX_MAX_LENGTH) {
    problems.push(`Name prefix must be ${NAME_PREFIX_MAX_LENGTH} characters or fewer (got ${prefix.length})`);
  }
  if (prefix.length < NAME_PREFIX_MIN_LENGTH) {
    problems.push(`Name prefix must be at least ${NAME_PREFIX_MIN_LENGTH} characters (got ${prefix.length})`);
  }
  if (!/^[a-z][a-z0-9-]*$/.test(prefix)) {
    problems.push("Name prefix must start with a lowercase letter and contain only lowercase letters, digits and hyphens");
  }
  if (prefix.endsWith("-")) {
    problems.push("Name prefix must not end with a hyphen");
  }
  return problems;
}

export function validateKeyVaultName(name: string): string[] {
  const problems: string[] = [];
  if (name.length < 3 || name.length > KEY_VAULT_NAME_MAX_LENGTH) {
    problems.push(`Key Vault name "${name}" must be 3-${KEY_VAULT_NAME_MAX_LENGTH} characters`);
  }
  if (!KEY_VAULT_PATTERN.test(name) || name.includes("--")) {
    problems.push(`Key Vault name "${name}" may contain only letters, digits and single hyphens`);
  }
  return problems;
}

function semanticProblems(config: DeploymentConfig): string[] {
  const problems = validateNamePrefix(config.namePrefix);
  const names = deriveResourceNames(config);
  problems.push(...validateKeyVaultName(names.keyVault));

  for (const email of config.publisherAdminUsers) {
    if (!EMAIL_PATTERN.test(email)) problems.push(`Publisher admin "${email}" is not an email address`);
  }
  if (config.fulfillmentAppSecret && !config.fulfillmentAppId) {
    problems.push("fulfillmentAppSecret requires fulfillmentAppId");
  }
  if (Boolean(config.sqlAdminLogin) !== Boolean(config.sqlAdminObjectId)) {
    problems.push("sqlAdminLogin and sqlAdminObjectId must be supplied together");
  }
  return problems;
}

/**
 * Merge config layers (lowest precedence first), apply defaults, and
 * validate. Throws a VALIDATION error listing every problem found.
 */
export function resolveDeploymentConfig(...layers: Array<Record<string, unknown>>): DeploymentConfig {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }

  const candidate = Value.Default(configSchema, merged);
  if (!Value.Check(configSchema, candidate)) {
    const problems = [...Value.Errors(configSchema, candidate)].map(
      (e) => `${e.path.replace(/^\//, "") || "config"}: ${e.message}`,
    );
    throw validationError(`Invalid deployment configuration:\n  - ${problems.join("\n  - ")}`);
  }

  const problems = semanticProblems(candidate);
  if (problems.length > 0) {
    throw validationError(`Invalid deployment configuration:\n  - ${problems.join("\n  - ")}`);
  }
  return candidate;
}

/** Configuration layer read from the process environment. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  return {
    tenantId: env.AZURE_TENANT_ID,
    subscriptionId: env.AZURE_SUBSCRIPTION_ID,
  };
}

// =============================================================================
// Naming
// =============================================================================

export type ResourceNames = {
  resourceGroup: string;
  keyVault: string;
  sqlServer: string;
  sqlDatabase: string;
  appServicePlan: string;
  adminWebApp: string;
  portalWebApp: string;
  virtualNetwork: string;
  sqlPrivateEndpoint: string;
  keyVaultPrivateEndpoint: string;
  fulfillmentApp: string;
  landingPageApp: string;
  adminPortalApp: string;
};

export function deriveResourceNames(config: Pick<DeploymentConfig, "namePrefix" | "resourceGroup" | "keyVaultName" | "sqlDatabaseName">): ResourceNames {
  const prefix = config.namePrefix;
  return {
    resourceGroup: config.resourceGroup ?? prefix,
    keyVault: config.keyVaultName ?? `${prefix}-kv`,
    sqlServer: `${prefix}-sql`,
    sqlDatabase: config.sqlDatabaseName,
    appServicePlan: `${prefix}-asp`,
    adminWebApp: `${prefix}-admin`,
    portalWebApp: `${prefix}-portal`,
    virtualNetwork: `${prefix}-vnet`,
    sqlPrivateEndpoint: `${prefix}-db-pe`,
    keyVaultPrivateEndpoint: `${prefix}-kv-pe`,
    fulfillmentApp: `${prefix}-FulfillmentAppReg`,
    landingPageApp: `${prefix}-LandingpageAppReg`,
    adminPortalApp: `${prefix}-AdminPortalAppReg`,
  };
}

export function networkConfig(config: DeploymentConfig): NetworkConfig {
  return config.network ?? DEFAULT_NETWORK;
}
