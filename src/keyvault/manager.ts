/**
 * Azure Key Vault Manager
 *
 * Vault lifecycle and access policies via @azure/arm-keyvault. Secret values
 * are handled by the secret store (../secrets), never here.
 */

import type { Vault } from "@azure/arm-keyvault";
import { instrumentedCall, type CallTarget } from "../diagnostics.js";
import type { ResourceDriver } from "../ensurer/index.js";
import { conflictError, isNotFoundError, ProvisioningError } from "../errors.js";
import { getLogger } from "../logging/index.js";
import { withAzureRetry, withPropagationRetry } from "../retry.js";
import type { AzureRetryOptions, AzureTagSet, PropagationRetryOptions, ProvisioningContext } from "../types.js";
import type { AccessPolicyGrant, KeyVault, KeyVaultAccessPolicy } from "./types.js";

const log = getLogger("keyvault");

// =============================================================================
// AzureKeyVaultManager
// =============================================================================

export class AzureKeyVaultManager {
  private context: ProvisioningContext;
  private retryOptions: AzureRetryOptions;
  private propagationRetry?: PropagationRetryOptions;

  constructor(
    context: ProvisioningContext,
    retryOptions?: AzureRetryOptions,
    propagationRetry?: PropagationRetryOptions,
  ) {
    this.context = context;
    this.retryOptions = retryOptions ?? {};
    this.propagationRetry = propagationRetry;
  }

  private async getManagementClient() {
    const { KeyVaultManagementClient } = await import("@azure/arm-keyvault");
    return new KeyVaultManagementClient(this.context.credential, this.context.subscriptionId);
  }

  private call<T>(operation: string, fn: () => Promise<T>, target: CallTarget): Promise<T> {
    return instrumentedCall("keyvault", operation, () => withAzureRetry(fn, this.retryOptions), target);
  }

  /**
   * Get a specific vault.
   */
  async getVault(resourceGroup: string, vaultName: string): Promise<KeyVault | null> {
    const client = await this.getManagementClient();
    return this.call(
      "vaults.get",
      async () => {
        try {
          return toVault(await client.vaults.get(resourceGroup, vaultName), resourceGroup);
        } catch (e) {
          if (isNotFoundError(e)) return null;
          throw e;
        }
      },
      { resourceKind: "key-vault", resourceName: vaultName, resourceGroup },
    );
  }

  /**
   * Vault names are global and stay reserved while a deleted vault is in its
   * soft-delete retention period. Both cases abort with a remediation hint.
   */
  async assertVaultNameAvailable(vaultName: string, location: string): Promise<void> {
    const client = await this.getManagementClient();
    const target: CallTarget = { resourceKind: "key-vault", resourceName: vaultName };
    const result = await this.call(
      "vaults.checkNameAvailability",
      () => client.vaults.checkNameAvailability({ name: vaultName, type: "Microsoft.KeyVault/vaults" }),
      target,
    );
    if (result.nameAvailable !== false) return;

    const deleted = await this.call(
      "vaults.getDeleted",
      async () => {
        try {
          return await client.vaults.getDeleted(vaultName, location);
        } catch (e) {
          if (isNotFoundError(e)) return null;
          throw e;
        }
      },
      target,
    );
    if (deleted) {
      throw conflictError(
        "key-vault",
        vaultName,
        `Key Vault "${vaultName}" exists in a soft-deleted state`,
        `purge the soft-deleted vault (az keyvault purge --name ${vaultName} --location ${location}) or pass a different --key-vault name`,
      );
    }
    throw conflictError(
      "key-vault",
      vaultName,
      `Key Vault name "${vaultName}" is not available: ${result.message ?? result.reason ?? "name in use"}`,
      "pass a different --key-vault name or name prefix",
    );
  }

  async createVault(resourceGroup: string, vaultName: string, location: string, tags?: AzureTagSet): Promise<KeyVault> {
    const client = await this.getManagementClient();
    return this.call(
      "vaults.createOrUpdate",
      async () => {
        const v = await client.vaults.beginCreateOrUpdateAndWait(resourceGroup, vaultName, {
          location,
          properties: {
            tenantId: this.context.tenantId,
            sku: { family: "A", name: "standard" },
            accessPolicies: [],
            enableSoftDelete: true,
          },
          tags,
        });
        return toVault(v, resourceGroup);
      },
      { resourceKind: "key-vault", resourceName: vaultName, resourceGroup },
    );
  }

  vaultDriver(resourceGroup: string, vaultName: string, location: string, tags?: AzureTagSet): ResourceDriver<KeyVault> {
    return {
      spec: { kind: "key-vault", name: vaultName, resourceGroup, region: location, dependsOn: [resourceGroup] },
      get: () => this.getVault(resourceGroup, vaultName),
      create: async () => {
        await this.assertVaultNameAvailable(vaultName, location);
        return this.createVault(resourceGroup, vaultName, location, tags);
      },
      describe: (v) => ({ resourceId: v.id, attributes: { vaultUri: v.vaultUri } }),
      isReady: async () => (await this.getVault(resourceGroup, vaultName))?.provisioningState === "Succeeded",
    };
  }

  // ---------------------------------------------------------------------------
  // Access policies
  // ---------------------------------------------------------------------------

  /**
   * Add an access policy unless the principal already holds every requested
   * permission. Returns true when the vault was changed.
   *
   * A managed identity created moments earlier may not yet be resolvable by
   * the vault, so the update is retried on propagation failures.
   */
  async grantAccess(resourceGroup: string, vaultName: string, grant: AccessPolicyGrant): Promise<boolean> {
    const vault = await this.getVault(resourceGroup, vaultName);
    if (!vault) {
      throw new ProvisioningError("NOT_FOUND", `Key Vault "${vaultName}" not found in "${resourceGroup}"`, {
        resourceKind: "key-vault",
        resourceName: vaultName,
        operation: "grant-access",
      });
    }
    if (hasPermissions(vault.accessPolicies, grant)) {
      log.debug(`Access policy for ${grant.objectId} already present on ${vaultName}`);
      return false;
    }

    const client = await this.getManagementClient();
    await withPropagationRetry(
      { kind: "key-vault", name: vaultName, operation: "grant-access" },
      () =>
        this.call(
          "vaults.updateAccessPolicy",
          () =>
            client.vaults.updateAccessPolicy(resourceGroup, vaultName, "add", {
              properties: {
                accessPolicies: [
                  {
                    tenantId: this.context.tenantId,
                    objectId: grant.objectId,
                    permissions: { secrets: [...grant.secrets], keys: [...grant.keys] },
                  },
                ],
              },
            }),
          { resourceKind: "key-vault", resourceName: vaultName, resourceGroup },
        ),
      this.propagationRetry,
      (attempt) => log.warn(`Principal ${grant.objectId} not yet visible to ${vaultName} (attempt ${attempt}), retrying`),
    );
    log.info(`Granted secrets [${grant.secrets.join(",")}] keys [${grant.keys.join(",")}] to ${grant.objectId}`);
    return true;
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function hasPermissions(policies: KeyVaultAccessPolicy[], grant: AccessPolicyGrant): boolean {
  const policy = policies.find((p) => p.objectId === grant.objectId);
  if (!policy) return false;
  const secrets = new Set(policy.secrets.map((s) => s.toLowerCase()));
  const keys = new Set(policy.keys.map((k) => k.toLowerCase()));
  return grant.secrets.every((s) => secrets.has(s)) && grant.keys.every((k) => keys.has(k));
}

function toVault(v: Vault, resourceGroup: string): KeyVault {
  return {
    id: v.id ?? "",
    name: v.name ?? "",
    resourceGroup,
    location: v.location ?? "",
    vaultUri: v.properties.vaultUri ?? "",
    tenantId: v.properties.tenantId,
    sku: v.properties.sku.name,
    enableSoftDelete: v.properties.enableSoftDelete,
    provisioningState: v.properties.provisioningState,
    accessPolicies: (v.properties.accessPolicies ?? []).map((p) => ({
      objectId: p.objectId,
      secrets: p.permissions.secrets ?? [],
      keys: p.permissions.keys ?? [],
    })),
  };
}
