import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { GraphDirectoryClient } from "./graph.js";
import type { ProvisioningContext } from "../types.js";

const getToken = vi.fn();
const context: ProvisioningContext = { tenantId: "tenant-1", subscriptionId: "sub-1", credential: { getToken } };

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("GraphDirectoryClient", () => {
  const fetchMock = vi.fn();
  let client: GraphDirectoryClient;

  beforeEach(() => {
    vi.stubGlobal("fetch", fetchMock);
    fetchMock.mockReset();
    getToken.mockResolvedValue({ token: "graph-token", expiresOnTimestamp: Date.now() + 3_600_000 });
    client = new GraphDirectoryClient(context, { maxAttempts: 1 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("looks up an application by app ID with a bearer token", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse(200, { id: "obj-1", appId: "app-1", displayName: "demo-AdminPortalAppReg", web: { redirectUris: ["https://x"] } }),
    );
    const app = await client.getApplicationByAppId("app-1");
    expect(app).toEqual({
      id: "obj-1",
      appId: "app-1",
      displayName: "demo-AdminPortalAppReg",
      signInAudience: undefined,
      redirectUris: ["https://x"],
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://graph.microsoft.com/v1.0/applications(appId='app-1')");
    expect(init.headers.Authorization).toBe("Bearer graph-token");
    expect(getToken).toHaveBeenCalledWith("https://graph.microsoft.com/.default", { tenantId: "tenant-1" });
  });

  it("maps a Graph 404 to null", async () => {
    fetchMock.mockResolvedValue(jsonResponse(404, { error: { code: "Request_ResourceNotFound", message: "gone" } }));
    expect(await client.getApplicationByAppId("app-1")).toBeNull();
  });

  it("escapes quotes in display-name filters", async () => {
    fetchMock.mockResolvedValue(jsonResponse(200, { value: [] }));
    await client.findApplicationsByDisplayName("o'brien-app");
    expect(fetchMock.mock.calls[0][0]).toBe(
      `https://graph.microsoft.com/v1.0/applications?$filter=${encodeURIComponent("displayName eq 'o''brien-app'")}`,
    );
  });

  it("posts the password credential with its expiry", async () => {
    fetchMock.mockResolvedValue(jsonResponse(200, { keyId: "k", secretText: "test-secret" }));
    const cred = await client.addPassword("obj-1", "demo-secret", new Date("2028-01-01T00:00:00Z"));
    expect(cred.secretText).toBe("test-secret");
    const [, init] = fetchMock.mock.calls[0];
    expect(init.method).toBe("POST");
    expect(JSON.parse(init.body)).toEqual({
      passwordCredential: { displayName: "demo-secret", endDateTime: "2028-01-01T00:00:00.000Z" },
    });
  });

  it("surfaces Graph error codes", async () => {
    fetchMock.mockResolvedValue(jsonResponse(403, { error: { code: "Authorization_RequestDenied", message: "Insufficient privileges" } }));
    await expect(client.createServicePrincipal("app-1")).rejects.toMatchObject({
      statusCode: 403,
      code: "Authorization_RequestDenied",
      message: "Insufficient privileges",
    });
  });

  it("fails with AUTHENTICATION when no token is returned", async () => {
    getToken.mockResolvedValue(null);
    await expect(client.getApplicationByAppId("app-1")).rejects.toMatchObject({ code: "AUTHENTICATION" });
  });
});
