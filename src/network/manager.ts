/**
 * Azure Network Manager
 *
 * Lists virtual networks and public IP addresses via @azure/arm-network.
 */

import type { CredentialProvider } from "../credentials/manager.js";
import type { AzureRetryOptions } from "../types.js";
import { withAzureRetry } from "../retry.js";
import { traceAzureCall } from "../diagnostics.js";
import { extractResourceGroup } from "../resource-id.js";
import type { PublicIPSummary, VirtualNetworkSummary } from "./types.js";

export class AzureNetworkManager {
  constructor(
    private readonly credentials: CredentialProvider,
    private readonly subscriptionId: string,
    private readonly retryOptions?: AzureRetryOptions,
  ) {}

  private async getClient() {
    const { NetworkManagementClient } = await import("@azure/arm-network");
    const { credential } = await this.credentials.getCredential();
    return new NetworkManagementClient(credential, this.subscriptionId);
  }

  async listVirtualNetworks(): Promise<VirtualNetworkSummary[]> {
    return traceAzureCall({ service: "network", operation: "listVirtualNetworks" }, () =>
      withAzureRetry(async () => {
        const client = await this.getClient();
        const results: VirtualNetworkSummary[] = [];
        for await (const vnet of client.virtualNetworks.listAll()) {
          results.push({
            name: vnet.name ?? "",
            resourceGroup: extractResourceGroup(vnet.id),
            location: vnet.location ?? "",
            addressPrefixes: vnet.addressSpace?.addressPrefixes ?? [],
          });
        }
        return results;
      }, this.retryOptions),
    );
  }

  async listPublicIPs(): Promise<PublicIPSummary[]> {
    return traceAzureCall({ service: "network", operation: "listPublicIPs" }, () =>
      withAzureRetry(async () => {
        const client = await this.getClient();
        const results: PublicIPSummary[] = [];
        for await (const ip of client.publicIPAddresses.listAll()) {
          results.push({
            name: ip.name ?? "",
            // Dynamic IPs have no address until attached to a running resource
            ipAddress: ip.ipAddress ?? "Not assigned",
            resourceGroup: extractResourceGroup(ip.id),
            location: ip.location ?? "",
            sku: ip.sku?.name ?? "Basic",
          });
        }
        return results;
      }, this.retryOptions),
    );
  }
}
