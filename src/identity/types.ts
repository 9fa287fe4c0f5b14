/**
 * Identity: Type Definitions
 */

import type { SecretRecord } from "../secrets/index.js";

export type SignInAudience =
  | "AzureADMyOrg"
  | "AzureADMultipleOrgs"
  | "AzureADandPersonalMicrosoftAccount";

export type AppRegistration = {
  displayName: string;
  applicationId: string;
  objectId: string;
  /** Present only when a new password credential was issued in this run. */
  clientSecret?: string;
  redirectUris: string[];
  signInAudience: SignInAudience;
  created: boolean;
};

export type AppRegConfig = {
  displayName: string;
  /** Caller-supplied application (client) ID. When set, nothing is created. */
  applicationId?: string;
  /** Caller-supplied secret for `applicationId`. */
  clientSecret?: string;
  /** Confidential clients get a password credential. */
  confidential: boolean;
  signInAudience: SignInAudience;
  redirectUris?: string[];
  logoutUrl?: string;
  enableIdTokenIssuance?: boolean;
  /** Request the delegated Graph `User.Read` permission (SSO apps). */
  requestUserRead?: boolean;
  /**
   * Called with a newly issued secret before `createOrReuse` returns; the
   * secret cannot be read back from the directory afterwards.
   */
  persistSecret?: (secret: string) => Promise<SecretRecord>;
  /**
   * Whether an earlier run already persisted a secret for this application.
   * A reused application then gets no new password credential.
   */
  hasPersistedSecret?: () => Promise<boolean>;
};

export type GraphApplication = {
  id: string;
  appId: string;
  displayName: string;
  signInAudience?: string;
  redirectUris: string[];
};

export type GraphServicePrincipal = {
  id: string;
  appId: string;
};

export type GraphPasswordCredential = {
  keyId?: string;
  secretText: string;
  endDateTime?: string;
};

export type ApplicationManifest = {
  displayName: string;
  signInAudience: SignInAudience;
  web?: {
    redirectUris: string[];
    logoutUrl?: string;
    implicitGrantSettings: { enableIdTokenIssuance: boolean };
  };
  requiredResourceAccess?: Array<{
    resourceAppId: string;
    resourceAccess: Array<{ id: string; type: "Scope" | "Role" }>;
  }>;
};

/** Directory operations the provisioner needs. */
export interface DirectoryClient {
  getApplicationByAppId(appId: string): Promise<GraphApplication | null>;
  findApplicationsByDisplayName(displayName: string): Promise<GraphApplication[]>;
  createApplication(manifest: ApplicationManifest): Promise<GraphApplication>;
  getServicePrincipalByAppId(appId: string): Promise<GraphServicePrincipal | null>;
  createServicePrincipal(appId: string): Promise<GraphServicePrincipal>;
  addPassword(objectId: string, displayName: string, endDateTime: Date): Promise<GraphPasswordCredential>;
}

export const MICROSOFT_GRAPH_APP_ID = "00000003-0000-0000-c000-000000000000";
export const USER_READ_SCOPE_ID = "e1fe6dd8-ba31-4d61-89e7-88639da4683d";
