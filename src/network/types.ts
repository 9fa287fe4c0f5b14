/**
 * Networking: Type Definitions
 */

export type VirtualNetwork = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  addressSpace: string[];
  provisioningState?: string;
  subnets: Subnet[];
};

export type Subnet = {
  id: string;
  name: string;
  addressPrefix: string;
  provisioningState?: string;
  delegations?: string[];
  serviceEndpoints?: string[];
  privateEndpointNetworkPolicies?: string;
};

export type SubnetOptions = {
  addressPrefix: string;
  /** Service names to delegate the subnet to, e.g. `Microsoft.Web/serverFarms`. */
  delegations?: string[];
  serviceEndpoints?: string[];
  /** Private endpoints require network policies disabled on their subnet. */
  disablePrivateEndpointPolicies?: boolean;
};

/** Private Link sub-resource a private endpoint connects to. */
export type PrivateLinkGroup = "sqlServer" | "vault";

export type PrivateEndpoint = {
  id: string;
  name: string;
  location: string;
  subnetId?: string;
  provisioningState?: string;
  targetResourceId?: string;
};

export type PrivateEndpointOptions = {
  subnetId: string;
  targetResourceId: string;
  groupId: PrivateLinkGroup;
};

export type PrivateDnsZone = {
  id: string;
  name: string;
  provisioningState?: string;
};

export type VirtualNetworkLink = {
  id: string;
  name: string;
  virtualNetworkId?: string;
  provisioningState?: string;
};

/** Private DNS zone for each Private Link group. */
export const PRIVATE_DNS_ZONES: Record<PrivateLinkGroup, string> = {
  sqlServer: "privatelink.database.windows.net",
  vault: "privatelink.vaultcore.azure.net",
};
