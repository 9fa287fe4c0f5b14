import { describe, it, expect, vi, beforeEach } from "vitest";
import { AppRegistrationProvisioner, buildManifest, secretExpiry } from "./provisioner.js";
import type { AppRegConfig, DirectoryClient, GraphApplication } from "./types.js";
import { createLogger, MemoryTransport } from "../logging/index.js";
import { setProgressSilent } from "../progress.js";
import { InMemorySecretStore } from "../secrets/index.js";

setProgressSilent(true);

const fulfillmentApp: GraphApplication = {
  id: "obj-1",
  appId: "app-1",
  displayName: "demo-FulfillmentAppReg",
  signInAudience: "AzureADMyOrg",
  redirectUris: [],
};

function fakeDirectory(): { [K in keyof DirectoryClient]: ReturnType<typeof vi.fn> } & DirectoryClient {
  return {
    getApplicationByAppId: vi.fn().mockResolvedValue(fulfillmentApp),
    findApplicationsByDisplayName: vi.fn().mockResolvedValue([]),
    createApplication: vi.fn().mockResolvedValue(fulfillmentApp),
    getServicePrincipalByAppId: vi.fn().mockResolvedValue(null),
    createServicePrincipal: vi.fn().mockResolvedValue({ id: "sp-1", appId: "app-1" }),
    addPassword: vi.fn().mockResolvedValue({ keyId: "key-1", secretText: "test-secret", endDateTime: "2028-01-01T00:00:00Z" }),
  };
}

const baseConfig: AppRegConfig = {
  displayName: "demo-FulfillmentAppReg",
  confidential: true,
  signInAudience: "AzureADMyOrg",
};

describe("AppRegistrationProvisioner", () => {
  let directory: ReturnType<typeof fakeDirectory>;
  let provisioner: AppRegistrationProvisioner;

  beforeEach(() => {
    directory = fakeDirectory();
    provisioner = new AppRegistrationProvisioner(directory, {
      visibility: { intervalMs: 0, timeoutMs: 1_000 },
      propagationRetry: { attempts: 3, delayMs: 0 },
      logger: createLogger("test", { transports: [new MemoryTransport()] }),
      now: () => new Date("2026-01-15T00:00:00Z"),
    });
  });

  it("never creates an application when an ID is supplied", async () => {
    const reg = await provisioner.createOrReuse({ ...baseConfig, applicationId: "app-1", clientSecret: "test-secret" });
    expect(directory.createApplication).not.toHaveBeenCalled();
    expect(directory.createServicePrincipal).not.toHaveBeenCalled();
    expect(directory.addPassword).not.toHaveBeenCalled();
    expect(reg.applicationId).toBe("app-1");
    expect(reg.clientSecret).toBe("test-secret");
    expect(reg.created).toBe(false);
  });

  it("appends a password to a supplied application without a secret", async () => {
    const reg = await provisioner.createOrReuse({ ...baseConfig, applicationId: "app-1" });
    expect(directory.createApplication).not.toHaveBeenCalled();
    expect(directory.addPassword).toHaveBeenCalledWith("obj-1", "demo-FulfillmentAppReg-secret", new Date("2028-01-15T00:00:00Z"));
    expect(reg.clientSecret).toBe("test-secret");
  });

  it("fails when the supplied application does not exist", async () => {
    directory.getApplicationByAppId.mockResolvedValue(null);
    await expect(provisioner.createOrReuse({ ...baseConfig, applicationId: "missing" })).rejects.toMatchObject({
      code: "NOT_FOUND",
      message: "Application missing was not found in the tenant",
    });
  });

  it("creates application, service principal and secret in order", async () => {
    const store = new InMemorySecretStore();
    const persistSecret = vi.fn((secret: string) => store.setSecret("demo-kv", "ADApplicationSecret", secret));
    const reg = await provisioner.createOrReuse({ ...baseConfig, persistSecret });

    expect(directory.createApplication).toHaveBeenCalledTimes(1);
    expect(directory.createServicePrincipal).toHaveBeenCalledWith("app-1");
    expect(persistSecret).toHaveBeenCalledWith("test-secret");
    expect((await store.getSecret("demo-kv", "ADApplicationSecret"))?.value).toBe("test-secret");
    expect(reg.created).toBe(true);
    expect(reg.objectId).toBe("obj-1");
  });

  it("reuses an application found by display name", async () => {
    directory.findApplicationsByDisplayName.mockResolvedValue([fulfillmentApp]);
    directory.getServicePrincipalByAppId.mockResolvedValue({ id: "sp-1", appId: "app-1" });
    const reg = await provisioner.createOrReuse({ ...baseConfig, confidential: false });
    expect(directory.createApplication).not.toHaveBeenCalled();
    expect(directory.createServicePrincipal).not.toHaveBeenCalled();
    expect(reg.created).toBe(false);
    expect(reg.clientSecret).toBeUndefined();
  });

  it("issues one client secret across repeated runs", async () => {
    const store = new InMemorySecretStore();
    const config: AppRegConfig = {
      ...baseConfig,
      persistSecret: (secret) => store.setSecret("demo-kv", "ADApplicationSecret", secret),
      hasPersistedSecret: async () => (await store.getSecret("demo-kv", "ADApplicationSecret")) !== null,
    };

    const first = await provisioner.createOrReuse(config);
    directory.findApplicationsByDisplayName.mockResolvedValue([fulfillmentApp]);
    directory.getServicePrincipalByAppId.mockResolvedValue({ id: "sp-1", appId: "app-1" });
    const second = await provisioner.createOrReuse(config);

    expect(directory.createApplication).toHaveBeenCalledTimes(1);
    expect(directory.addPassword).toHaveBeenCalledTimes(1);
    expect(first.clientSecret).toBe("test-secret");
    expect(second.clientSecret).toBeUndefined();
    expect(second.created).toBe(false);
    expect((await store.getSecret("demo-kv", "ADApplicationSecret"))?.value).toBe("test-secret");
  });

  it("issues a secret for a reused application when none is stored", async () => {
    directory.findApplicationsByDisplayName.mockResolvedValue([fulfillmentApp]);
    directory.getServicePrincipalByAppId.mockResolvedValue({ id: "sp-1", appId: "app-1" });
    const reg = await provisioner.createOrReuse({ ...baseConfig, hasPersistedSecret: async () => false });
    expect(directory.addPassword).toHaveBeenCalledTimes(1);
    expect(reg.clientSecret).toBe("test-secret");
  });

  it("rejects ambiguous display names", async () => {
    directory.findApplicationsByDisplayName.mockResolvedValue([fulfillmentApp, { ...fulfillmentApp, id: "obj-2" }]);
    await expect(provisioner.createOrReuse(baseConfig)).rejects.toMatchObject({ code: "CONFLICT" });
  });

  it("polls until the new application is visible", async () => {
    directory.getApplicationByAppId.mockResolvedValueOnce(null).mockResolvedValueOnce(null).mockResolvedValue(fulfillmentApp);
    await provisioner.createOrReuse({ ...baseConfig, confidential: false });
    expect(directory.getApplicationByAppId).toHaveBeenCalledTimes(3);
  });

  it("retries service principal creation while the application replicates", async () => {
    directory.createServicePrincipal
      .mockRejectedValueOnce({ statusCode: 400, message: "The appId 'app-1' of the service principal does not reference a valid application object." })
      .mockResolvedValue({ id: "sp-1", appId: "app-1" });
    await provisioner.createOrReuse({ ...baseConfig, confidential: false });
    expect(directory.createServicePrincipal).toHaveBeenCalledTimes(2);
  });
});

describe("buildManifest", () => {
  it("builds an SSO manifest with ID token issuance", () => {
    expect(
      buildManifest({
        displayName: "demo-LandingpageAppReg",
        confidential: false,
        signInAudience: "AzureADandPersonalMicrosoftAccount",
        redirectUris: ["https://demo-portal.azurewebsites.net", "https://demo-portal.azurewebsites.net/Home/Index"],
        logoutUrl: "https://demo-portal.azurewebsites.net/logout",
        enableIdTokenIssuance: true,
        requestUserRead: true,
      }),
    ).toEqual({
      displayName: "demo-LandingpageAppReg",
      signInAudience: "AzureADandPersonalMicrosoftAccount",
      web: {
        redirectUris: ["https://demo-portal.azurewebsites.net", "https://demo-portal.azurewebsites.net/Home/Index"],
        logoutUrl: "https://demo-portal.azurewebsites.net/logout",
        implicitGrantSettings: { enableIdTokenIssuance: true },
      },
      requiredResourceAccess: [
        {
          resourceAppId: "00000003-0000-0000-c000-000000000000",
          resourceAccess: [{ id: "e1fe6dd8-ba31-4d61-89e7-88639da4683d", type: "Scope" }],
        },
      ],
    });
  });

  it("omits the web platform when there are no redirect URIs", () => {
    expect(buildManifest(baseConfig)).toEqual({ displayName: "demo-FulfillmentAppReg", signInAudience: "AzureADMyOrg" });
  });
});

describe("secretExpiry", () => {
  it("adds two years", () => {
    expect(secretExpiry(new Date("2026-03-01T12:00:00Z")).toISOString()).toBe("2028-03-01T12:00:00.000Z");
  });
});
