/**
 * Azure App Service (Web Apps): Type Definitions
 */

// =============================================================================
// Web App
// =============================================================================

export type WebApp = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  state?: string;
  defaultHostName?: string;
  serverFarmId?: string;
  httpsOnly?: boolean;
  /** Object ID of the system-assigned managed identity. */
  principalId?: string;
  virtualNetworkSubnetId?: string;
};

export type WebAppOptions = {
  /** .NET runtime the site runs (siteConfig.netFrameworkVersion). */
  netFrameworkVersion?: string;
  tags?: Record<string, string>;
};

export type ConnectionStringType = "SQLAzure" | "SQLServer" | "Custom";

export type ConnectionStringSetting = {
  value: string;
  type: ConnectionStringType;
};

// =============================================================================
// App Service Plan
// =============================================================================

export type AppServicePlan = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  sku?: string;
  status?: string;
  provisioningState?: string;
};

/** A Key Vault reference App Service resolves with the site's identity. */
export function keyVaultReference(vaultName: string, secretName: string): string {
  return `@Microsoft.KeyVault(VaultName=${vaultName};SecretName=${secretName})`;
}
