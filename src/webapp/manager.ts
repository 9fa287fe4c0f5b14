/**
 * Azure Web App Manager
 *
 * App Service plans, web apps, settings and VNet integration via
 * @azure/arm-appservice.
 */

import type { AppServicePlan as ArmPlan, Site } from "@azure/arm-appservice";
import { instrumentedCall, type CallTarget } from "../diagnostics.js";
import type { ResourceDriver } from "../ensurer/index.js";
import { isNotFoundError } from "../errors.js";
import { getLogger } from "../logging/index.js";
import { withAzureRetry } from "../retry.js";
import type { AzureRetryOptions, AzureTagSet, ProvisioningContext } from "../types.js";
import type { AppServicePlan, ConnectionStringSetting, WebApp, WebAppOptions } from "./types.js";

const log = getLogger("webapp");

// =============================================================================
// AzureWebAppManager
// =============================================================================

export class AzureWebAppManager {
  private context: ProvisioningContext;
  private retryOptions: AzureRetryOptions;

  constructor(context: ProvisioningContext, retryOptions?: AzureRetryOptions) {
    this.context = context;
    this.retryOptions = retryOptions ?? {};
  }

  private async getClient() {
    const { WebSiteManagementClient } = await import("@azure/arm-appservice");
    return new WebSiteManagementClient(this.context.credential, this.context.subscriptionId);
  }

  private call<T>(operation: string, fn: () => Promise<T>, target: CallTarget): Promise<T> {
    return instrumentedCall("appservice", operation, () => withAzureRetry(fn, this.retryOptions), target);
  }

  // ---------------------------------------------------------------------------
  // App Service plans
  // ---------------------------------------------------------------------------

  async getAppServicePlan(resourceGroup: string, name: string): Promise<AppServicePlan | null> {
    const client = await this.getClient();
    return this.call(
      "appServicePlans.get",
      async () => {
        try {
          return toPlan(await client.appServicePlans.get(resourceGroup, name), resourceGroup);
        } catch (e) {
          if (isNotFoundError(e)) return null;
          throw e;
        }
      },
      { resourceKind: "app-service-plan", resourceName: name, resourceGroup },
    );
  }

  async createAppServicePlan(
    resourceGroup: string,
    name: string,
    location: string,
    skuName: string,
    tags?: AzureTagSet,
  ): Promise<AppServicePlan> {
    const client = await this.getClient();
    return this.call(
      "appServicePlans.createOrUpdate",
      async () => {
        const plan = await client.appServicePlans.beginCreateOrUpdateAndWait(resourceGroup, name, {
          location,
          kind: "app",
          sku: { name: skuName },
          tags,
        });
        return toPlan(plan, resourceGroup);
      },
      { resourceKind: "app-service-plan", resourceName: name, resourceGroup },
    );
  }

  planDriver(resourceGroup: string, name: string, location: string, skuName: string, tags?: AzureTagSet): ResourceDriver<AppServicePlan> {
    return {
      spec: { kind: "app-service-plan", name, resourceGroup, region: location, dependsOn: [resourceGroup] },
      get: () => this.getAppServicePlan(resourceGroup, name),
      create: () => this.createAppServicePlan(resourceGroup, name, location, skuName, tags),
      describe: (p) => ({ resourceId: p.id, attributes: { sku: p.sku } }),
      isReady: async () => (await this.getAppServicePlan(resourceGroup, name))?.status === "Ready",
    };
  }

  // ---------------------------------------------------------------------------
  // Web apps
  // ---------------------------------------------------------------------------

  async getWebApp(resourceGroup: string, name: string): Promise<WebApp | null> {
    const client = await this.getClient();
    return this.call(
      "webApps.get",
      async () => {
        try {
          return toWebApp(await client.webApps.get(resourceGroup, name), resourceGroup);
        } catch (e) {
          if (isNotFoundError(e)) return null;
          throw e;
        }
      },
      { resourceKind: "web-app", resourceName: name, resourceGroup },
    );
  }

  /**
   * Create a web app on a plan with a system-assigned managed identity,
   * HTTPS only.
   */
  async createWebApp(
    resourceGroup: string,
    name: string,
    location: string,
    planId: string,
    options: WebAppOptions = {},
  ): Promise<WebApp> {
    const client = await this.getClient();
    return this.call(
      "webApps.createOrUpdate",
      async () => {
        const site = await client.webApps.beginCreateOrUpdateAndWait(resourceGroup, name, {
          location,
          serverFarmId: planId,
          httpsOnly: true,
          identity: { type: "SystemAssigned" },
          siteConfig: {
            netFrameworkVersion: options.netFrameworkVersion ?? "v8.0",
            minTlsVersion: "1.2",
            ftpsState: "Disabled",
          },
          tags: options.tags,
        });
        return toWebApp(site, resourceGroup);
      },
      { resourceKind: "web-app", resourceName: name, resourceGroup },
    );
  }

  webAppDriver(
    resourceGroup: string,
    name: string,
    location: string,
    planId: string,
    options?: WebAppOptions,
  ): ResourceDriver<WebApp> {
    return {
      spec: { kind: "web-app", name, resourceGroup, region: location, dependsOn: [planId] },
      get: () => this.getWebApp(resourceGroup, name),
      create: () => this.createWebApp(resourceGroup, name, location, planId, options),
      describe: (w) => ({
        resourceId: w.id,
        attributes: { defaultHostName: w.defaultHostName, principalId: w.principalId },
      }),
      isReady: async () => (await this.getWebApp(resourceGroup, name))?.state === "Running",
    };
  }

  // ---------------------------------------------------------------------------
  // Configuration
  // ---------------------------------------------------------------------------

  /**
   * Merge settings into the app's existing application settings. Keys not
   * named here are left as they are.
   */
  async updateAppSettings(resourceGroup: string, name: string, settings: Record<string, string>): Promise<void> {
    const client = await this.getClient();
    const target: CallTarget = { resourceKind: "web-app", resourceName: name, resourceGroup };
    const current = await this.call("webApps.listApplicationSettings", () => client.webApps.listApplicationSettings(resourceGroup, name), target);
    await this.call(
      "webApps.updateApplicationSettings",
      () => client.webApps.updateApplicationSettings(resourceGroup, name, { properties: { ...current.properties, ...settings } }),
      target,
    );
    log.info(`Updated ${Object.keys(settings).length} app settings on ${name}`);
  }

  async updateConnectionStrings(
    resourceGroup: string,
    name: string,
    connectionStrings: Record<string, ConnectionStringSetting>,
  ): Promise<void> {
    const client = await this.getClient();
    const target: CallTarget = { resourceKind: "web-app", resourceName: name, resourceGroup };
    const current = await this.call("webApps.listConnectionStrings", () => client.webApps.listConnectionStrings(resourceGroup, name), target);
    await this.call(
      "webApps.updateConnectionStrings",
      () => client.webApps.updateConnectionStrings(resourceGroup, name, { properties: { ...current.properties, ...connectionStrings } }),
      target,
    );
  }

  /**
   * Route the app's outbound traffic through a delegated subnet. Skipped
   * when the app is already integrated with that subnet.
   */
  async attachVNetIntegration(resourceGroup: string, name: string, subnetId: string): Promise<boolean> {
    const app = await this.getWebApp(resourceGroup, name);
    if (app?.virtualNetworkSubnetId?.toLowerCase() === subnetId.toLowerCase()) return false;

    const client = await this.getClient();
    await this.call(
      "webApps.createOrUpdateSwiftVirtualNetworkConnectionWithCheck",
      () => client.webApps.createOrUpdateSwiftVirtualNetworkConnectionWithCheck(resourceGroup, name, { subnetResourceId: subnetId }),
      { resourceKind: "web-app", resourceName: name, resourceGroup },
    );
    log.info(`Attached ${name} to subnet ${subnetId}`);
    return true;
  }

  async restartWebApp(resourceGroup: string, name: string): Promise<void> {
    const client = await this.getClient();
    await this.call("webApps.restart", () => client.webApps.restart(resourceGroup, name), {
      resourceKind: "web-app",
      resourceName: name,
      resourceGroup,
    });
  }
}

// =============================================================================
// Mapping
// =============================================================================

function toPlan(plan: ArmPlan, resourceGroup: string): AppServicePlan {
  return {
    id: plan.id ?? "",
    name: plan.name ?? "",
    resourceGroup,
    location: plan.location,
    sku: plan.sku?.name,
    status: plan.status,
    provisioningState: plan.provisioningState,
  };
}

function toWebApp(site: Site, resourceGroup: string): WebApp {
  return {
    id: site.id ?? "",
    name: site.name ?? "",
    resourceGroup,
    location: site.location,
    state: site.state,
    defaultHostName: site.defaultHostName,
    serverFarmId: site.serverFarmId,
    httpsOnly: site.httpsOnly,
    principalId: site.identity?.principalId,
    virtualNetworkSubnetId: site.virtualNetworkSubnetId,
  };
}
