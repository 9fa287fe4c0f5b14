export { GraphDirectoryClient, GRAPH_BASE_URL } from "./graph.js";
export { AppRegistrationProvisioner, buildManifest, secretExpiry, SECRET_VALIDITY_YEARS } from "./provisioner.js";
export type { AppRegistrationProvisionerOptions } from "./provisioner.js";
export type {
  AppRegistration,
  AppRegConfig,
  ApplicationManifest,
  DirectoryClient,
  GraphApplication,
  GraphServicePrincipal,
  GraphPasswordCredential,
  SignInAudience,
} from "./types.js";
