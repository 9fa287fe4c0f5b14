export { AzureKeyVaultManager, hasPermissions } from "./manager.js";
export { READER_PERMISSIONS, WRITER_PERMISSIONS } from "./types.js";
export type {
  KeyVault,
  KeyVaultAccessPolicy,
  AccessPolicyGrant,
  SecretPermission,
  KeyPermission,
} from "./types.js";
