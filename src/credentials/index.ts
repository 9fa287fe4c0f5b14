export { CredentialsManager, createCredentialsManager, principalFromToken, TOKEN_AUDIENCES } from "./manager.js";
export type { CredentialMethod, CredentialsManagerOptions, SignedInPrincipal, TokenAudience } from "./manager.js";
