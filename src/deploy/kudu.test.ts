import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { KuduClient, scmHost } from "./kudu.js";
import { setProgressSilent } from "../progress.js";
import type { ProvisioningContext } from "../types.js";

setProgressSilent(true);

const getToken = vi.fn();
const context: ProvisioningContext = { tenantId: "tenant-1", subscriptionId: "sub-1", credential: { getToken } };

const STATUS_URL = "https://demo-admin.scm.azurewebsites.net/api/deployments/abc";

function statusResponse(status: number, extra: Record<string, unknown> = {}): Response {
  return new Response(JSON.stringify({ id: "abc", status, ...extra }), { status: 200 });
}

describe("KuduClient", () => {
  const fetchMock = vi.fn();
  let kudu: KuduClient;

  beforeEach(() => {
    vi.stubGlobal("fetch", fetchMock);
    fetchMock.mockReset();
    getToken.mockResolvedValue({ token: "arm-token", expiresOnTimestamp: Date.now() + 3_600_000 });
    kudu = new KuduClient(context, { intervalMs: 0, timeoutMs: 1_000 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("uses the app's SCM host", () => {
    expect(scmHost("demo-admin")).toBe("https://demo-admin.scm.azurewebsites.net");
  });

  it("posts the archive and returns the status location", async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 202, headers: { Location: STATUS_URL } }));
    const url = await kudu.zipDeploy("demo-admin", new Uint8Array([1, 2, 3]));
    expect(url).toBe(STATUS_URL);
    const [target, init] = fetchMock.mock.calls[0];
    expect(target).toBe("https://demo-admin.scm.azurewebsites.net/api/zipdeploy?isAsync=true");
    expect(init.method).toBe("POST");
    expect(init.headers["Content-Type"]).toBe("application/zip");
    expect(init.headers.Authorization).toBe("Bearer arm-token");
  });

  it("falls back to the latest deployment when no location is returned", async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 202 }));
    expect(await kudu.zipDeploy("demo-admin", new Uint8Array())).toBe(
      "https://demo-admin.scm.azurewebsites.net/api/deployments/latest",
    );
  });

  it("polls until the deployment succeeds", async () => {
    fetchMock
      .mockResolvedValueOnce(statusResponse(1))
      .mockResolvedValueOnce(statusResponse(2))
      .mockResolvedValueOnce(statusResponse(4, { complete: true }));
    const status = await kudu.waitForDeployment("demo-admin", STATUS_URL);
    expect(status).toEqual({ id: "abc", status: 4, statusText: "", complete: true });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("raises the status text of a failed deployment", async () => {
    fetchMock.mockResolvedValue(statusResponse(3, { status_text: "Deployment failed: disk full", complete: true }));
    await expect(kudu.waitForDeployment("demo-admin", STATUS_URL)).rejects.toMatchObject({
      code: "TOOL_FAILED",
      message: "Zip deploy to demo-admin failed: Deployment failed: disk full",
    });
  });
});
