/**
 * Kudu (App Service SCM) client: zip deploy and deployment status.
 */

import { Type } from "@sinclair/typebox";
import { instrumentedCall } from "../diagnostics.js";
import { ProvisioningError } from "../errors.js";
import { request, requestJson } from "../http.js";
import { getLogger } from "../logging/index.js";
import { waitUntilReady } from "../progress.js";
import type { ProvisioningContext, ReadinessOptions } from "../types.js";
import { KUDU_STATUS, type KuduDeployStatus } from "./types.js";

const log = getLogger("deploy/kudu");

const deployStatusSchema = Type.Object({
  id: Type.String(),
  status: Type.Integer(),
  status_text: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  complete: Type.Optional(Type.Boolean()),
});

export function scmHost(appName: string): string {
  return `https://${appName}.scm.azurewebsites.net`;
}

export class KuduClient {
  private context: ProvisioningContext;
  private polling: ReadinessOptions;

  constructor(context: ProvisioningContext, polling?: ReadinessOptions) {
    this.context = context;
    this.polling = polling ?? { intervalMs: 5_000, timeoutMs: 15 * 60_000 };
  }

  private async token(): Promise<string> {
    const token = await this.context.credential.getToken("https://management.azure.com/.default", {
      tenantId: this.context.tenantId,
    });
    if (!token) {
      throw new ProvisioningError("AUTHENTICATION", "No management token was returned for Kudu", {
        operation: "get-token",
      });
    }
    return token.token;
  }

  /**
   * Upload a zip package asynchronously. Resolves with the URL to poll for
   * the deployment's status.
   */
  async zipDeploy(appName: string, archive: Uint8Array): Promise<string> {
    const token = await this.token();
    const response = await instrumentedCall(
      "kudu",
      "zipdeploy",
      () =>
        request(`${scmHost(appName)}/api/zipdeploy?isAsync=true`, {
          method: "POST",
          token,
          body: archive,
          contentType: "application/zip",
        }),
      { resourceKind: "web-app", resourceName: appName, metadata: { bytes: archive.byteLength } },
    );
    return response.headers.get("location") ?? `${scmHost(appName)}/api/deployments/latest`;
  }

  async getStatus(appName: string, statusUrl: string): Promise<KuduDeployStatus> {
    const token = await this.token();
    const s = await instrumentedCall(
      "kudu",
      "deployments.get",
      () => requestJson(statusUrl, deployStatusSchema, { token }),
      { resourceKind: "web-app", resourceName: appName },
    );
    return {
      id: s.id,
      status: s.status,
      statusText: s.status_text ?? "",
      complete: s.complete ?? (s.status === KUDU_STATUS.success || s.status === KUDU_STATUS.failed),
    };
  }

  /**
   * Poll until the deployment completes. A failed deployment raises
   * TOOL_FAILED with Kudu's status text unchanged.
   */
  async waitForDeployment(appName: string, statusUrl: string): Promise<KuduDeployStatus> {
    const state: { last?: KuduDeployStatus } = {};
    await waitUntilReady(
      { kind: "web-app", name: appName, operation: "zip-deploy" },
      async () => {
        const last = await this.getStatus(appName, statusUrl);
        state.last = last;
        log.debug(`Deployment ${last.id} on ${appName}: status ${last.status}`);
        if (last.status === KUDU_STATUS.failed) {
          throw new ProvisioningError(
            "TOOL_FAILED",
            `Zip deploy to ${appName} failed: ${last.statusText || "no status text"}`,
            { resourceKind: "web-app", resourceName: appName, operation: "zip-deploy" },
          );
        }
        return last.complete && last.status === KUDU_STATUS.success;
      },
      this.polling,
    );
    if (!state.last) {
      throw new ProvisioningError("TOOL_FAILED", `No deployment status for ${appName}`, {
        resourceKind: "web-app",
        resourceName: appName,
        operation: "zip-deploy",
      });
    }
    return state.last;
  }
}
