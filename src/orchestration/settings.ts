/**
 * Web app configuration for the admin portal and the customer landing page.
 * Secrets are never written into settings; they are Key Vault references
 * resolved by each app's managed identity.
 */

import { SECRET_NAMES } from "../secrets/index.js";
import { keyVaultReference, type ConnectionStringSetting } from "../webapp/index.js";

export type WebAppRole = "admin" | "portal";

export const WEB_APP_ROLES: readonly WebAppRole[] = ["admin", "portal"];

/** Marketplace SaaS fulfillment API constants. */
export const MARKETPLACE_API = {
  baseUrl: "https://marketplaceapi.microsoft.com/api",
  version: "2018-08-31",
  resource: "20e940b3-4c77-4b0b-9a53-9e16a1b010a7",
  authority: "https://login.microsoftonline.com",
} as const;

export type AppSettingsInput = {
  role: WebAppRole;
  tenantId: string;
  vaultName: string;
  fulfillmentAppId: string;
  landingPageAppId: string;
  adminPortalAppId: string;
  portalHostName: string;
  /** Host name of the app being configured. */
  hostName: string;
  knownUsers: readonly string[];
};

export function webAppHostName(appName: string): string {
  return `${appName}.azurewebsites.net`;
}

export function buildAppSettings(input: AppSettingsInput): Record<string, string> {
  const prefix = "SaaSApiConfiguration__";
  const settings: Record<string, string> = {
    [`${prefix}AdAuthenticationEndPoint`]: MARKETPLACE_API.authority,
    [`${prefix}ClientId`]: input.fulfillmentAppId,
    [`${prefix}ClientSecret`]: keyVaultReference(input.vaultName, SECRET_NAMES.applicationSecret),
    [`${prefix}MTClientId`]: input.role === "admin" ? input.adminPortalAppId : input.landingPageAppId,
    [`${prefix}FulFillmentAPIBaseURL`]: MARKETPLACE_API.baseUrl,
    [`${prefix}FulFillmentAPIVersion`]: MARKETPLACE_API.version,
    [`${prefix}GrantType`]: "client_credentials",
    [`${prefix}Resource`]: MARKETPLACE_API.resource,
    [`${prefix}SaaSAppUrl`]: `https://${input.portalHostName}/`,
    [`${prefix}SignedOutRedirectUri`]: `https://${input.hostName}/Home/Index/`,
    [`${prefix}TenantId`]: input.tenantId,
    [`${prefix}SupportMeteredBilling`]: "true",
  };
  if (input.role === "admin") {
    settings.KnownUsers = input.knownUsers.join(",");
    settings[`${prefix}IsAdminPortalMultiTenant`] = "false";
  }
  return settings;
}

/** Vault secret holding the connection string a web app uses. */
export function connectionSecretName(appName: string, passwordUser: boolean): string {
  return passwordUser ? `${appName}-${SECRET_NAMES.connectionString}` : SECRET_NAMES.connectionString;
}

export function buildConnectionStrings(vaultName: string, secretName: string): Record<string, ConnectionStringSetting> {
  return {
    [SECRET_NAMES.connectionString]: { value: keyVaultReference(vaultName, secretName), type: "SQLAzure" },
  };
}

/** Connection string for a managed identity; carries no secret. */
export function managedIdentityConnectionString(serverFqdn: string, database: string): string {
  return `Server=tcp:${serverFqdn},1433;Initial Catalog=${database};Authentication=Active Directory Managed Identity;Encrypt=True;`;
}

export function passwordConnectionString(serverFqdn: string, database: string, user: string, password: string): string {
  return `Server=tcp:${serverFqdn},1433;Initial Catalog=${database};User ID=${user};Password=${password};Encrypt=True;`;
}

/** Redirect URIs registered for a sign-in app hosted at `hostName`. */
export function signInRedirectUris(hostName: string): string[] {
  const base = `https://${hostName}`;
  return [base, `${base}/`, `${base}/Home/Index`, `${base}/Home/Index/`];
}
