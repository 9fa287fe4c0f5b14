/**
 * Secret Stores
 *
 * `KeyVaultSecretStore` writes through @azure/keyvault-secrets; the in-memory
 * store has the same contract for tests and dry runs.
 */

import { randomBytes, randomInt } from "node:crypto";
import { instrumentedCall } from "../diagnostics.js";
import { ProvisioningError, isNotFoundError } from "../errors.js";
import { getLogger } from "../logging/index.js";
import { withAzureRetry } from "../retry.js";
import type { AzureRetryOptions, ProvisioningContext } from "../types.js";
import type { SecretRecord, SecretStore } from "./types.js";

const log = getLogger("secrets");

export function vaultUrl(vaultName: string): string {
  return `https://${vaultName}.vault.azure.net`;
}

// =============================================================================
// Key Vault
// =============================================================================

export class KeyVaultSecretStore implements SecretStore {
  readonly kind = "keyvault";
  private context: ProvisioningContext;
  private retryOptions: AzureRetryOptions;

  constructor(context: ProvisioningContext, retryOptions?: AzureRetryOptions) {
    this.context = context;
    this.retryOptions = retryOptions ?? {};
  }

  private async getSecretClient(vaultName: string) {
    const { SecretClient } = await import("@azure/keyvault-secrets");
    return new SecretClient(vaultUrl(vaultName), this.context.credential);
  }

  async setSecret(vaultName: string, secretName: string, value: string, contentType?: string): Promise<SecretRecord> {
    const client = await this.getSecretClient(vaultName);
    return instrumentedCall(
      "keyvault-secrets",
      "setSecret",
      () =>
        withAzureRetry(async () => {
          const s = await client.setSecret(secretName, value, { contentType });
          return { vaultName, secretName, value: s.value ?? value, version: s.properties.version ?? "" };
        }, this.retryOptions),
      { resourceKind: "key-vault", resourceName: vaultName, metadata: { secretName } },
    );
  }

  async getSecret(vaultName: string, secretName: string, version?: string): Promise<SecretRecord | null> {
    const client = await this.getSecretClient(vaultName);
    return instrumentedCall(
      "keyvault-secrets",
      "getSecret",
      () =>
        withAzureRetry(async () => {
          try {
            const s = await client.getSecret(secretName, { version });
            return { vaultName, secretName, value: s.value ?? "", version: s.properties.version ?? "" };
          } catch (e) {
            if (isNotFoundError(e)) return null;
            throw e;
          }
        }, this.retryOptions),
      { resourceKind: "key-vault", resourceName: vaultName, metadata: { secretName } },
    );
  }
}

// =============================================================================
// In-memory
// =============================================================================

export class InMemorySecretStore implements SecretStore {
  readonly kind = "memory";
  private versions = new Map<string, SecretRecord[]>();
  private counter = 0;

  async setSecret(vaultName: string, secretName: string, value: string): Promise<SecretRecord> {
    const key = `${vaultName}/${secretName}`;
    const record: SecretRecord = { vaultName, secretName, value, version: `v${++this.counter}` };
    this.versions.set(key, [...(this.versions.get(key) ?? []), record]);
    return { ...record };
  }

  async getSecret(vaultName: string, secretName: string, version?: string): Promise<SecretRecord | null> {
    const history = this.versions.get(`${vaultName}/${secretName}`) ?? [];
    const record = version ? history.find((r) => r.version === version) : history[history.length - 1];
    return record ? { ...record } : null;
  }

  /** Number of versions written under a name. */
  versionCount(vaultName: string, secretName: string): number {
    return this.versions.get(`${vaultName}/${secretName}`)?.length ?? 0;
  }
}

// =============================================================================
// Operations
// =============================================================================

/**
 * Persist a secret and return its record. The value is never logged.
 */
export async function storeSecret(
  store: SecretStore,
  vaultName: string,
  secretName: string,
  value: string,
): Promise<SecretRecord> {
  if (value.length === 0) {
    throw new ProvisioningError("VALIDATION", `Refusing to store an empty value for secret "${secretName}"`, {
      resourceKind: "key-vault",
      resourceName: vaultName,
      operation: "store-secret",
    });
  }
  const record = await store.setSecret(vaultName, secretName, value);
  log.info(`Stored secret "${secretName}" in ${vaultName}`, { version: record.version, store: store.kind });
  return record;
}

const PASSWORD_CLASSES = ["ABCDEFGHJKLMNPQRSTUVWXYZ", "abcdefghijkmnopqrstuvwxyz", "23456789", "!#%*-_+="];

/**
 * Random password satisfying the Azure SQL complexity policy (every
 * character class present).
 */
export function generatePassword(length = 32): string {
  const all = PASSWORD_CLASSES.join("");
  const chars = PASSWORD_CLASSES.map((set) => set[randomInt(set.length)]);
  const bytes = randomBytes(length);
  for (let i = chars.length; i < length; i++) {
    chars.push(all[bytes[i] % all.length]);
  }
  for (let i = chars.length - 1; i > 0; i--) {
    const j = randomInt(i + 1);
    [chars[i], chars[j]] = [chars[j], chars[i]];
  }
  return chars.join("");
}
