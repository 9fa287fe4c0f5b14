export { KeyVaultSecretStore, InMemorySecretStore, storeSecret, generatePassword, vaultUrl } from "./store.js";
export { SECRET_NAMES } from "./types.js";
export type { SecretRecord, SecretStore } from "./types.js";
