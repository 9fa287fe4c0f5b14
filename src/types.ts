/**
 * Shared Types
 *
 * Core type definitions used across the provisioning modules.
 */

import type { TokenCredential } from "@azure/identity";

// =============================================================================
// Resource Kinds
// =============================================================================

export type ResourceKind =
  | "resource-group"
  | "virtual-network"
  | "subnet"
  | "sql-server"
  | "sql-database"
  | "sql-firewall-rule"
  | "key-vault"
  | "app-service-plan"
  | "web-app"
  | "app-registration"
  | "private-endpoint"
  | "private-dns-zone";

// =============================================================================
// Resource Specs & Results
// =============================================================================

/**
 * Declarative description of one cloud resource to ensure exists.
 * Identity for idempotency purposes is `(kind, name, resourceGroup)`.
 */
export type ResourceSpec = {
  kind: ResourceKind;
  name: string;
  resourceGroup: string;
  region: string;
  dependsOn: string[];
};

export type ProvisioningResult = {
  resourceId: string;
  created: boolean;
  attributes: Record<string, string>;
};

// =============================================================================
// Session Context
// =============================================================================

/**
 * Explicit credential/session value threaded through every manager.
 * Nothing reads the active tenant or subscription from ambient CLI state.
 */
export type ProvisioningContext = {
  tenantId: string;
  subscriptionId: string;
  credential: TokenCredential;
};

// =============================================================================
// Common Configuration
// =============================================================================

export type AzureRetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

/** Fixed-backoff retry for operations that race with dependency propagation. */
export type PropagationRetryOptions = {
  attempts?: number;
  delayMs?: number;
};

/** Poll-until-ready bounds used after a create call. */
export type ReadinessOptions = {
  intervalMs?: number;
  timeoutMs?: number;
};

export type AzureTagSet = Record<string, string>;
