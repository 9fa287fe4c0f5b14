/**
 * Azure Network Manager
 *
 * Virtual networks, subnets and private endpoints via @azure/arm-network;
 * private DNS zones and their VNet links via @azure/arm-privatedns.
 */

import type {
  PrivateEndpoint as ArmPrivateEndpoint,
  Subnet as ArmSubnet,
  VirtualNetwork as ArmVirtualNetwork,
} from "@azure/arm-network";
import { instrumentedCall, type CallTarget } from "../diagnostics.js";
import type { ResourceDriver } from "../ensurer/index.js";
import { isNotFoundError } from "../errors.js";
import { withAzureRetry } from "../retry.js";
import type { AzureRetryOptions, AzureTagSet, ProvisioningContext } from "../types.js";
import {
  PRIVATE_DNS_ZONES,
  type PrivateDnsZone,
  type PrivateEndpoint,
  type PrivateEndpointOptions,
  type Subnet,
  type SubnetOptions,
  type VirtualNetwork,
  type VirtualNetworkLink,
} from "./types.js";

// =============================================================================
// AzureNetworkManager
// =============================================================================

export class AzureNetworkManager {
  private context: ProvisioningContext;
  private retryOptions: AzureRetryOptions;

  constructor(context: ProvisioningContext, retryOptions?: AzureRetryOptions) {
    this.context = context;
    this.retryOptions = retryOptions ?? {};
  }

  private async getClient() {
    const { NetworkManagementClient } = await import("@azure/arm-network");
    return new NetworkManagementClient(this.context.credential, this.context.subscriptionId);
  }

  private async getDnsClient() {
    const { PrivateDnsManagementClient } = await import("@azure/arm-privatedns");
    return new PrivateDnsManagementClient(this.context.credential, this.context.subscriptionId);
  }

  /** Read call: not-found resolves to null. */
  private read<T>(operation: string, fn: () => Promise<T>, target: CallTarget): Promise<T | null> {
    return instrumentedCall("network", operation, () =>
      withAzureRetry(async () => {
        try {
          return await fn();
        } catch (e) {
          if (isNotFoundError(e)) return null;
          throw e;
        }
      }, this.retryOptions),
      target,
    );
  }

  private write<T>(operation: string, fn: () => Promise<T>, target: CallTarget): Promise<T> {
    return instrumentedCall("network", operation, () => withAzureRetry(fn, this.retryOptions), target);
  }

  // ---------------------------------------------------------------------------
  // Virtual networks
  // ---------------------------------------------------------------------------

  async getVNet(resourceGroup: string, vnetName: string): Promise<VirtualNetwork | null> {
    const client = await this.getClient();
    return this.read(
      "virtualNetworks.get",
      async () => toVirtualNetwork(await client.virtualNetworks.get(resourceGroup, vnetName), resourceGroup),
      { resourceKind: "virtual-network", resourceName: vnetName, resourceGroup },
    );
  }

  async createVNet(
    resourceGroup: string,
    vnetName: string,
    location: string,
    addressPrefixes: string[],
    tags?: AzureTagSet,
  ): Promise<VirtualNetwork> {
    const client = await this.getClient();
    return this.write(
      "virtualNetworks.createOrUpdate",
      async () => {
        const v = await client.virtualNetworks.beginCreateOrUpdateAndWait(resourceGroup, vnetName, {
          location,
          addressSpace: { addressPrefixes },
          tags,
        });
        return toVirtualNetwork(v, resourceGroup);
      },
      { resourceKind: "virtual-network", resourceName: vnetName, resourceGroup },
    );
  }

  vnetDriver(
    resourceGroup: string,
    vnetName: string,
    location: string,
    addressPrefixes: string[],
    tags?: AzureTagSet,
  ): ResourceDriver<VirtualNetwork> {
    return {
      spec: { kind: "virtual-network", name: vnetName, resourceGroup, region: location, dependsOn: [resourceGroup] },
      get: () => this.getVNet(resourceGroup, vnetName),
      create: () => this.createVNet(resourceGroup, vnetName, location, addressPrefixes, tags),
      describe: (v) => ({ resourceId: v.id, attributes: { addressSpace: v.addressSpace.join(",") } }),
      isReady: async () => (await this.getVNet(resourceGroup, vnetName))?.provisioningState === "Succeeded",
    };
  }

  // ---------------------------------------------------------------------------
  // Subnets
  // ---------------------------------------------------------------------------

  async getSubnet(resourceGroup: string, vnetName: string, subnetName: string): Promise<Subnet | null> {
    const client = await this.getClient();
    return this.read(
      "subnets.get",
      async () => toSubnet(await client.subnets.get(resourceGroup, vnetName, subnetName)),
      { resourceKind: "subnet", resourceName: subnetName, resourceGroup },
    );
  }

  async createSubnet(resourceGroup: string, vnetName: string, subnetName: string, options: SubnetOptions): Promise<Subnet> {
    const client = await this.getClient();
    return this.write(
      "subnets.createOrUpdate",
      async () => {
        const s = await client.subnets.beginCreateOrUpdateAndWait(resourceGroup, vnetName, subnetName, {
          addressPrefix: options.addressPrefix,
          delegations: options.delegations?.map((serviceName) => ({ name: serviceName.replace(/\//g, "."), serviceName })),
          serviceEndpoints: options.serviceEndpoints?.map((service) => ({ service })),
          privateEndpointNetworkPolicies: options.disablePrivateEndpointPolicies ? "Disabled" : undefined,
        });
        return toSubnet(s);
      },
      { resourceKind: "subnet", resourceName: subnetName, resourceGroup },
    );
  }

  /**
   * Subnet creation right after its VNet is the known propagation race, so
   * this driver is propagation-sensitive.
   */
  subnetDriver(
    resourceGroup: string,
    vnetName: string,
    subnetName: string,
    location: string,
    options: SubnetOptions,
  ): ResourceDriver<Subnet> {
    return {
      spec: { kind: "subnet", name: subnetName, resourceGroup, region: location, dependsOn: [vnetName] },
      get: () => this.getSubnet(resourceGroup, vnetName, subnetName),
      create: () => this.createSubnet(resourceGroup, vnetName, subnetName, options),
      describe: (s) => ({ resourceId: s.id, attributes: { addressPrefix: s.addressPrefix } }),
      propagationSensitive: true,
    };
  }

  // ---------------------------------------------------------------------------
  // Private endpoints
  // ---------------------------------------------------------------------------

  async getPrivateEndpoint(resourceGroup: string, name: string): Promise<PrivateEndpoint | null> {
    const client = await this.getClient();
    return this.read(
      "privateEndpoints.get",
      async () => toPrivateEndpoint(await client.privateEndpoints.get(resourceGroup, name)),
      { resourceKind: "private-endpoint", resourceName: name, resourceGroup },
    );
  }

  async createPrivateEndpoint(
    resourceGroup: string,
    name: string,
    location: string,
    options: PrivateEndpointOptions,
    tags?: AzureTagSet,
  ): Promise<PrivateEndpoint> {
    const client = await this.getClient();
    return this.write(
      "privateEndpoints.createOrUpdate",
      async () => {
        const pe = await client.privateEndpoints.beginCreateOrUpdateAndWait(resourceGroup, name, {
          location,
          subnet: { id: options.subnetId },
          privateLinkServiceConnections: [
            { name: `${name}-conn`, privateLinkServiceId: options.targetResourceId, groupIds: [options.groupId] },
          ],
          tags,
        });
        return toPrivateEndpoint(pe);
      },
      { resourceKind: "private-endpoint", resourceName: name, resourceGroup },
    );
  }

  /**
   * Register the endpoint's private IP in the zone for its Private Link
   * group. Idempotent (PUT of a fixed zone group name).
   */
  async attachPrivateDnsZoneGroup(resourceGroup: string, endpointName: string, zoneId: string, zoneName: string): Promise<void> {
    const client = await this.getClient();
    await this.write(
      "privateDnsZoneGroups.createOrUpdate",
      () =>
        client.privateDnsZoneGroups.beginCreateOrUpdateAndWait(resourceGroup, endpointName, "default", {
          privateDnsZoneConfigs: [{ name: zoneName.replace(/\./g, "-"), privateDnsZoneId: zoneId }],
        }),
      { resourceKind: "private-endpoint", resourceName: endpointName, resourceGroup },
    );
  }

  privateEndpointDriver(
    resourceGroup: string,
    name: string,
    location: string,
    options: PrivateEndpointOptions,
    tags?: AzureTagSet,
  ): ResourceDriver<PrivateEndpoint> {
    return {
      spec: { kind: "private-endpoint", name, resourceGroup, region: location, dependsOn: [options.targetResourceId] },
      get: () => this.getPrivateEndpoint(resourceGroup, name),
      create: () => this.createPrivateEndpoint(resourceGroup, name, location, options, tags),
      describe: (pe) => ({
        resourceId: pe.id,
        attributes: { subnetId: pe.subnetId, targetResourceId: pe.targetResourceId, dnsZone: PRIVATE_DNS_ZONES[options.groupId] },
      }),
      isReady: async () => (await this.getPrivateEndpoint(resourceGroup, name))?.provisioningState === "Succeeded",
    };
  }

  // ---------------------------------------------------------------------------
  // Private DNS
  // ---------------------------------------------------------------------------

  async getPrivateDnsZone(resourceGroup: string, zoneName: string): Promise<PrivateDnsZone | null> {
    const client = await this.getDnsClient();
    return this.read(
      "privateZones.get",
      async () => {
        const z = await client.privateZones.get(resourceGroup, zoneName);
        return { id: z.id ?? "", name: z.name ?? zoneName, provisioningState: z.provisioningState };
      },
      { resourceKind: "private-dns-zone", resourceName: zoneName, resourceGroup },
    );
  }

  async createPrivateDnsZone(resourceGroup: string, zoneName: string, tags?: AzureTagSet): Promise<PrivateDnsZone> {
    const client = await this.getDnsClient();
    return this.write(
      "privateZones.createOrUpdate",
      async () => {
        const z = await client.privateZones.beginCreateOrUpdateAndWait(resourceGroup, zoneName, { location: "global", tags });
        return { id: z.id ?? "", name: z.name ?? zoneName, provisioningState: z.provisioningState };
      },
      { resourceKind: "private-dns-zone", resourceName: zoneName, resourceGroup },
    );
  }

  async getVNetLink(resourceGroup: string, zoneName: string, linkName: string): Promise<VirtualNetworkLink | null> {
    const client = await this.getDnsClient();
    return this.read(
      "virtualNetworkLinks.get",
      async () => {
        const l = await client.virtualNetworkLinks.get(resourceGroup, zoneName, linkName);
        return { id: l.id ?? "", name: l.name ?? linkName, virtualNetworkId: l.virtualNetwork?.id, provisioningState: l.provisioningState };
      },
      { resourceKind: "private-dns-zone", resourceName: `${zoneName}/${linkName}`, resourceGroup },
    );
  }

  async createVNetLink(resourceGroup: string, zoneName: string, linkName: string, vnetId: string): Promise<VirtualNetworkLink> {
    const client = await this.getDnsClient();
    return this.write(
      "virtualNetworkLinks.createOrUpdate",
      async () => {
        const l = await client.virtualNetworkLinks.beginCreateOrUpdateAndWait(resourceGroup, zoneName, linkName, {
          location: "global",
          virtualNetwork: { id: vnetId },
          registrationEnabled: false,
        });
        return { id: l.id ?? "", name: l.name ?? linkName, virtualNetworkId: l.virtualNetwork?.id, provisioningState: l.provisioningState };
      },
      { resourceKind: "private-dns-zone", resourceName: `${zoneName}/${linkName}`, resourceGroup },
    );
  }

  privateDnsZoneDriver(resourceGroup: string, zoneName: string, tags?: AzureTagSet): ResourceDriver<PrivateDnsZone> {
    return {
      spec: { kind: "private-dns-zone", name: zoneName, resourceGroup, region: "global", dependsOn: [resourceGroup] },
      get: () => this.getPrivateDnsZone(resourceGroup, zoneName),
      create: () => this.createPrivateDnsZone(resourceGroup, zoneName, tags),
      describe: (z) => ({ resourceId: z.id }),
    };
  }

  vnetLinkDriver(resourceGroup: string, zoneName: string, linkName: string, vnetId: string): ResourceDriver<VirtualNetworkLink> {
    return {
      spec: { kind: "private-dns-zone", name: `${zoneName}/${linkName}`, resourceGroup, region: "global", dependsOn: [zoneName] },
      get: () => this.getVNetLink(resourceGroup, zoneName, linkName),
      create: () => this.createVNetLink(resourceGroup, zoneName, linkName, vnetId),
      describe: (l) => ({ resourceId: l.id, attributes: { virtualNetworkId: l.virtualNetworkId } }),
    };
  }
}

// =============================================================================
// Mapping
// =============================================================================

function toSubnet(s: ArmSubnet): Subnet {
  return {
    id: s.id ?? "",
    name: s.name ?? "",
    addressPrefix: s.addressPrefix ?? "",
    provisioningState: s.provisioningState,
    delegations: s.delegations?.map((d) => d.serviceName ?? ""),
    serviceEndpoints: s.serviceEndpoints?.map((e) => e.service ?? ""),
    privateEndpointNetworkPolicies: s.privateEndpointNetworkPolicies,
  };
}

function toVirtualNetwork(v: ArmVirtualNetwork, resourceGroup: string): VirtualNetwork {
  return {
    id: v.id ?? "",
    name: v.name ?? "",
    resourceGroup,
    location: v.location ?? "",
    addressSpace: v.addressSpace?.addressPrefixes ?? [],
    provisioningState: v.provisioningState,
    subnets: (v.subnets ?? []).map(toSubnet),
  };
}

function toPrivateEndpoint(pe: ArmPrivateEndpoint): PrivateEndpoint {
  return {
    id: pe.id ?? "",
    name: pe.name ?? "",
    location: pe.location ?? "",
    subnetId: pe.subnet?.id,
    provisioningState: pe.provisioningState,
    targetResourceId: pe.privateLinkServiceConnections?.[0]?.privateLinkServiceId,
  };
}
