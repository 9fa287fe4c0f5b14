/**
 * Secret Persistence: Type Definitions
 */

/** One version of a stored secret. `value` must never be logged. */
export type SecretRecord = {
  vaultName: string;
  secretName: string;
  value: string;
  version: string;
};

/**
 * Backing store for generated secrets. The orchestrator only writes; reads
 * exist for verification and tests.
 */
export interface SecretStore {
  readonly kind: string;
  setSecret(vaultName: string, secretName: string, value: string, contentType?: string): Promise<SecretRecord>;
  getSecret(vaultName: string, secretName: string, version?: string): Promise<SecretRecord | null>;
}

/** Secret names the web apps read through Key Vault references. */
export const SECRET_NAMES = {
  applicationSecret: "ADApplicationSecret",
  connectionString: "DefaultConnection",
  sqlAdminPassword: "SqlAdminPassword",
} as const;
