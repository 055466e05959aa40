/**
 * Azure Networking — Type Definitions
 */

export type VirtualNetworkSummary = {
  name: string;
  resourceGroup: string;
  location: string;
  addressPrefixes: string[];
};

export type PublicIPSummary = {
  name: string;
  ipAddress: string;
  resourceGroup: string;
  location: string;
  sku: string;
};
