/**
 * Azure Key Vault: Type Definitions
 */

// =============================================================================
// Key Vault
// =============================================================================

export type KeyVault = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  vaultUri: string;
  tenantId?: string;
  sku?: string;
  enableSoftDelete?: boolean;
  provisioningState?: string;
  accessPolicies: KeyVaultAccessPolicy[];
};

// =============================================================================
// Access Policies
// =============================================================================

export type SecretPermission = "get" | "list" | "set" | "delete";
export type KeyPermission = "get" | "list";

export type KeyVaultAccessPolicy = {
  objectId: string;
  secrets: string[];
  keys: string[];
};

export type AccessPolicyGrant = {
  objectId: string;
  secrets: readonly SecretPermission[];
  keys: readonly KeyPermission[];
};

/** Runtime identities read configuration and nothing else. */
export const READER_PERMISSIONS = {
  secrets: ["get", "list"],
  keys: ["get", "list"],
} as const satisfies Pick<AccessPolicyGrant, "secrets" | "keys">;

/** The deploying principal stores generated secrets. */
export const WRITER_PERMISSIONS = {
  secrets: ["get", "list", "set"],
  keys: [],
} as const satisfies Pick<AccessPolicyGrant, "secrets" | "keys">;
