/**
 * Azure Agent — Inventory
 *
 * The read-only operations the intent dispatcher can issue, and the
 * SDK-backed implementation composed from the service managers.
 */

import type { CredentialProvider } from "./credentials/manager.js";
import { AzureVMManager } from "./vms/manager.js";
import { AzureMonitorManager } from "./monitor/manager.js";
import { AzureNetworkManager } from "./network/manager.js";
import { AzureResourceManager } from "./resources/manager.js";
import { AzureResourceGraphManager } from "./resourcegraph/manager.js";
import type { AzureRetryOptions, DiscoveredResource, ResourceGroupSummary } from "./types.js";
import type { VMStatus, VMSummary } from "./vms/types.js";
import type { MetricQueryOptions, MetricReading } from "./monitor/types.js";
import type { PublicIPSummary, VirtualNetworkSummary } from "./network/types.js";

export interface AzureInventory {
  listVMs(): Promise<VMSummary[]>;
  findVM(name: string): Promise<VMSummary | null>;
  getVMStatus(resourceGroup: string, vmName: string): Promise<VMStatus>;
  getMetrics(resourceId: string, options?: MetricQueryOptions): Promise<MetricReading[]>;
  listResourceGroups(): Promise<ResourceGroupSummary[]>;
  listVirtualNetworks(): Promise<VirtualNetworkSummary[]>;
  listPublicIPs(): Promise<PublicIPSummary[]>;
  queryResources(providerType: string): Promise<DiscoveredResource[]>;
  listResourceTypes(): Promise<string[]>;
}

export class AzureService implements AzureInventory {
  readonly vms: AzureVMManager;
  readonly monitor: AzureMonitorManager;
  readonly network: AzureNetworkManager;
  readonly resources: AzureResourceManager;
  readonly resourceGraph: AzureResourceGraphManager;

  constructor(credentials: CredentialProvider, subscriptionId: string, retryOptions?: AzureRetryOptions) {
    this.vms = new AzureVMManager(credentials, subscriptionId, retryOptions);
    this.monitor = new AzureMonitorManager(credentials, subscriptionId, retryOptions);
    this.network = new AzureNetworkManager(credentials, subscriptionId, retryOptions);
    this.resources = new AzureResourceManager(credentials, subscriptionId, retryOptions);
    this.resourceGraph = new AzureResourceGraphManager(credentials, subscriptionId, retryOptions);
  }

  listVMs(): Promise<VMSummary[]> {
    return this.vms.listVMs();
  }

  findVM(name: string): Promise<VMSummary | null> {
    return this.vms.findVM(name);
  }

  getVMStatus(resourceGroup: string, vmName: string): Promise<VMStatus> {
    return this.vms.getVMStatus(resourceGroup, vmName);
  }

  getMetrics(resourceId: string, options?: MetricQueryOptions): Promise<MetricReading[]> {
    return this.monitor.getMetrics(resourceId, options);
  }

  listResourceGroups(): Promise<ResourceGroupSummary[]> {
    return this.resources.listResourceGroups();
  }

  listVirtualNetworks(): Promise<VirtualNetworkSummary[]> {
    return this.network.listVirtualNetworks();
  }

  listPublicIPs(): Promise<PublicIPSummary[]> {
    return this.network.listPublicIPs();
  }

  queryResources(providerType: string): Promise<DiscoveredResource[]> {
    return this.resourceGraph.queryResources(providerType);
  }

  listResourceTypes(): Promise<string[]> {
    return this.resources.listResourceTypes();
  }
}
