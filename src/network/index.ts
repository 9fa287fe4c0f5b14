export { AzureNetworkManager } from "./manager.js";
export { PRIVATE_DNS_ZONES } from "./types.js";
export type {
  VirtualNetwork,
  Subnet,
  SubnetOptions,
  PrivateEndpoint,
  PrivateEndpointOptions,
  PrivateLinkGroup,
  PrivateDnsZone,
  VirtualNetworkLink,
} from "./types.js";
