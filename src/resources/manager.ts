/**
 * Azure Resource Manager
 *
 * Resource group lifecycle via @azure/arm-resources.
 */

import type { ResourceGroup as ArmResourceGroup } from "@azure/arm-resources";
import { instrumentedCall } from "../diagnostics.js";
import type { ResourceDriver } from "../ensurer/index.js";
import { isNotFoundError } from "../errors.js";
import { withAzureRetry } from "../retry.js";
import type { AzureRetryOptions, AzureTagSet, ProvisioningContext } from "../types.js";
import type { ResourceGroup } from "./types.js";

export class AzureResourceManager {
  private context: ProvisioningContext;
  private retryOptions?: AzureRetryOptions;

  constructor(context: ProvisioningContext, retryOptions?: AzureRetryOptions) {
    this.context = context;
    this.retryOptions = retryOptions;
  }

  private async getClient() {
    const { ResourceManagementClient } = await import("@azure/arm-resources");
    return new ResourceManagementClient(this.context.credential, this.context.subscriptionId);
  }

  async getResourceGroup(name: string): Promise<ResourceGroup | null> {
    const client = await this.getClient();
    return instrumentedCall("resources", "resourceGroups.get", () =>
      withAzureRetry(async () => {
        try {
          return toResourceGroup(await client.resourceGroups.get(name));
        } catch (e) {
          if (isNotFoundError(e)) return null;
          throw e;
        }
      }, this.retryOptions),
      { resourceKind: "resource-group", resourceName: name },
    );
  }

  async createResourceGroup(name: string, location: string, tags?: AzureTagSet): Promise<ResourceGroup> {
    const client = await this.getClient();
    return instrumentedCall("resources", "resourceGroups.createOrUpdate", () =>
      withAzureRetry(async () => {
        const rg = await client.resourceGroups.createOrUpdate(name, { location, tags });
        return toResourceGroup(rg);
      }, this.retryOptions),
      { resourceKind: "resource-group", resourceName: name },
    );
  }

  resourceGroupDriver(name: string, location: string, tags?: AzureTagSet): ResourceDriver<ResourceGroup> {
    return {
      spec: { kind: "resource-group", name, resourceGroup: name, region: location, dependsOn: [] },
      get: () => this.getResourceGroup(name),
      create: () => this.createResourceGroup(name, location, tags),
      describe: (rg) => ({ resourceId: rg.id, attributes: { location: rg.location } }),
    };
  }
}

function toResourceGroup(rg: ArmResourceGroup): ResourceGroup {
  return {
    id: rg.id ?? "",
    name: rg.name ?? "",
    location: rg.location,
    tags: rg.tags,
    provisioningState: rg.properties?.provisioningState,
  };
}
