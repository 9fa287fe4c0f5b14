import { describe, it, expect } from "vitest";
import {
  buildAppSettings,
  buildConnectionStrings,
  connectionSecretName,
  managedIdentityConnectionString,
  passwordConnectionString,
  signInRedirectUris,
  type AppSettingsInput,
} from "./settings.js";

const input: AppSettingsInput = {
  role: "portal",
  tenantId: "tenant-1",
  vaultName: "demo-kv",
  fulfillmentAppId: "app-fulfillment",
  landingPageAppId: "app-landing",
  adminPortalAppId: "app-admin",
  portalHostName: "demo-portal.azurewebsites.net",
  hostName: "demo-portal.azurewebsites.net",
  knownUsers: ["admin@contoso.test", "ops@contoso.test"],
};

describe("buildAppSettings", () => {
  it("references the client secret in Key Vault instead of embedding it", () => {
    const settings = buildAppSettings(input);
    expect(settings.SaaSApiConfiguration__ClientSecret).toBe("@Microsoft.KeyVault(VaultName=demo-kv;SecretName=ADApplicationSecret)");
    expect(settings.SaaSApiConfiguration__ClientId).toBe("app-fulfillment");
    expect(settings.SaaSApiConfiguration__TenantId).toBe("tenant-1");
    expect(settings.SaaSApiConfiguration__SaaSAppUrl).toBe("https://demo-portal.azurewebsites.net/");
  });

  it("signs the landing page in with the landing page app", () => {
    const settings = buildAppSettings(input);
    expect(settings.SaaSApiConfiguration__MTClientId).toBe("app-landing");
    expect(settings.KnownUsers).toBeUndefined();
  });

  it("adds the publisher admins to the admin portal", () => {
    const settings = buildAppSettings({ ...input, role: "admin", hostName: "demo-admin.azurewebsites.net" });
    expect(settings.SaaSApiConfiguration__MTClientId).toBe("app-admin");
    expect(settings.KnownUsers).toBe("admin@contoso.test,ops@contoso.test");
    expect(settings.SaaSApiConfiguration__IsAdminPortalMultiTenant).toBe("false");
    expect(settings.SaaSApiConfiguration__SignedOutRedirectUri).toBe("https://demo-admin.azurewebsites.net/Home/Index/");
  });
});

describe("connection strings", () => {
  it("carries no secret for managed identities", () => {
    expect(managedIdentityConnectionString("demo-sql.database.windows.net", "AMPSaaSDB")).toBe(
      "Server=tcp:demo-sql.database.windows.net,1433;Initial Catalog=AMPSaaSDB;Authentication=Active Directory Managed Identity;Encrypt=True;",
    );
  });

  it("embeds the password for a password user", () => {
    expect(passwordConnectionString("demo-sql.database.windows.net", "AMPSaaSDB", "demo-admin", "test-password")).toBe(
      "Server=tcp:demo-sql.database.windows.net,1433;Initial Catalog=AMPSaaSDB;User ID=demo-admin;Password=test-password;Encrypt=True;",
    );
  });

  it("names the secret per app only for password users", () => {
    expect(connectionSecretName("demo-admin", false)).toBe("DefaultConnection");
    expect(connectionSecretName("demo-admin", true)).toBe("demo-admin-DefaultConnection");
  });

  it("points DefaultConnection at the vault", () => {
    expect(buildConnectionStrings("demo-kv", "DefaultConnection")).toEqual({
      DefaultConnection: { value: "@Microsoft.KeyVault(VaultName=demo-kv;SecretName=DefaultConnection)", type: "SQLAzure" },
    });
  });
});

describe("signInRedirectUris", () => {
  it("covers the site root and the home page", () => {
    expect(signInRedirectUris("demo-admin.azurewebsites.net")).toEqual([
      "https://demo-admin.azurewebsites.net",
      "https://demo-admin.azurewebsites.net/",
      "https://demo-admin.azurewebsites.net/Home/Index",
      "https://demo-admin.azurewebsites.net/Home/Index/",
    ]);
  });
});
