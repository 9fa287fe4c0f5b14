/**
 * Microsoft Graph Client
 *
 * The handful of application / service principal endpoints provisioning
 * uses, over REST with a Graph token from the run's credential.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { instrumentedCall } from "../diagnostics.js";
import { ProvisioningError, isNotFoundError } from "../errors.js";
import { requestJson, type RequestOptions } from "../http.js";
import { withAzureRetry } from "../retry.js";
import type { AzureRetryOptions, ProvisioningContext } from "../types.js";
import type {
  ApplicationManifest,
  DirectoryClient,
  GraphApplication,
  GraphPasswordCredential,
  GraphServicePrincipal,
} from "./types.js";

export const GRAPH_BASE_URL = "https://graph.microsoft.com/v1.0";

const applicationSchema = Type.Object({
  id: Type.String(),
  appId: Type.String(),
  displayName: Type.String(),
  signInAudience: Type.Optional(Type.String()),
  web: Type.Optional(Type.Object({ redirectUris: Type.Optional(Type.Array(Type.String())) })),
});

const applicationListSchema = Type.Object({ value: Type.Array(applicationSchema) });

const servicePrincipalSchema = Type.Object({ id: Type.String(), appId: Type.String() });

const passwordSchema = Type.Object({
  keyId: Type.Optional(Type.String()),
  secretText: Type.String(),
  endDateTime: Type.Optional(Type.String()),
});

function toApplication(a: Static<typeof applicationSchema>): GraphApplication {
  return {
    id: a.id,
    appId: a.appId,
    displayName: a.displayName,
    signInAudience: a.signInAudience,
    redirectUris: a.web?.redirectUris ?? [],
  };
}

function escapeODataString(value: string): string {
  return value.replace(/'/g, "''");
}

export class GraphDirectoryClient implements DirectoryClient {
  private context: ProvisioningContext;
  private retryOptions: AzureRetryOptions;
  private baseUrl: string;

  constructor(context: ProvisioningContext, retryOptions?: AzureRetryOptions, baseUrl = GRAPH_BASE_URL) {
    this.context = context;
    this.retryOptions = retryOptions ?? {};
    this.baseUrl = baseUrl;
  }

  private async token(): Promise<string> {
    const token = await this.context.credential.getToken("https://graph.microsoft.com/.default", {
      tenantId: this.context.tenantId,
    });
    if (!token) {
      throw new ProvisioningError("AUTHENTICATION", "No Microsoft Graph token was returned", { operation: "get-token" });
    }
    return token.token;
  }

  private async call<S extends TSchema>(
    operation: string,
    path: string,
    schema: S,
    options: RequestOptions,
    resourceName?: string,
  ): Promise<Static<S>> {
    return instrumentedCall(
      "graph",
      operation,
      () =>
        withAzureRetry(async () => {
          const token = await this.token();
          return requestJson(`${this.baseUrl}${path}`, schema, { ...options, token });
        }, this.retryOptions),
      { resourceKind: "app-registration", resourceName },
    );
  }

  private async callOrNull<S extends TSchema>(
    operation: string,
    path: string,
    schema: S,
    resourceName: string,
  ): Promise<Static<S> | null> {
    try {
      return await this.call(operation, path, schema, {}, resourceName);
    } catch (e) {
      if (isNotFoundError(e)) return null;
      throw e;
    }
  }

  async getApplicationByAppId(appId: string): Promise<GraphApplication | null> {
    const app = await this.callOrNull(
      "applications.get",
      `/applications(appId='${encodeURIComponent(appId)}')`,
      applicationSchema,
      appId,
    );
    return app ? toApplication(app) : null;
  }

  async findApplicationsByDisplayName(displayName: string): Promise<GraphApplication[]> {
    const filter = encodeURIComponent(`displayName eq '${escapeODataString(displayName)}'`);
    const list = await this.call(
      "applications.list",
      `/applications?$filter=${filter}`,
      applicationListSchema,
      {},
      displayName,
    );
    return list.value.map(toApplication);
  }

  async createApplication(manifest: ApplicationManifest): Promise<GraphApplication> {
    const app = await this.call(
      "applications.create",
      "/applications",
      applicationSchema,
      { method: "POST", json: manifest },
      manifest.displayName,
    );
    return toApplication(app);
  }

  async getServicePrincipalByAppId(appId: string): Promise<GraphServicePrincipal | null> {
    return this.callOrNull(
      "servicePrincipals.get",
      `/servicePrincipals(appId='${encodeURIComponent(appId)}')`,
      servicePrincipalSchema,
      appId,
    );
  }

  async createServicePrincipal(appId: string): Promise<GraphServicePrincipal> {
    return this.call(
      "servicePrincipals.create",
      "/servicePrincipals",
      servicePrincipalSchema,
      { method: "POST", json: { appId } },
      appId,
    );
  }

  async addPassword(objectId: string, displayName: string, endDateTime: Date): Promise<GraphPasswordCredential> {
    return this.call(
      "applications.addPassword",
      `/applications/${encodeURIComponent(objectId)}/addPassword`,
      passwordSchema,
      { method: "POST", json: { passwordCredential: { displayName, endDateTime: endDateTime.toISOString() } } },
      objectId,
    );
  }
}
