/**
 * Intent Handler
 *
 * Classifies a query, issues the matching read-only inventory call and
 * renders the result as markdown. Operation failures are rendered as text,
 * never thrown, so a chat client always gets a readable answer.
 */

import type { AzureInventory } from "../inventory.js";
import type { DiscoveredResource, Logger, ResourceGroupSummary } from "../types.js";
import type { VMStatus, VMSummary } from "../vms/types.js";
import type { MetricReading } from "../monitor/types.js";
import type { PublicIPSummary, VirtualNetworkSummary } from "../network/types.js";
import { formatErrorMessage } from "../retry.js";
import { lastSegment, vmResourceId } from "../resource-id.js";
import { bulletList, formatMetricValue, markdownTable, titleCase } from "../format/markdown.js";
import { classifyIntent, type Matcher } from "./classifier.js";
import { matchResourceType } from "./fuzzy.js";
import type { Intent, MetricKind } from "./types.js";

export const HELP_TEXT =
  "I'm sorry, I couldn't determine the specific Azure action for that query.\n\n" +
  "Try asking things like:\n" +
  "- 'Show all VMs'\n" +
  "- 'Status of VM MyVMName'\n" +
  "- 'CPU for MyVMName'\n" +
  "- 'List resource groups'";

export const METRIC_NAMES: Record<MetricKind, string[]> = {
  cpu: ["Percentage CPU"],
  memory: ["Available Memory Bytes"],
  metrics: ["Percentage CPU", "Available Memory Bytes"],
};

export type IntentHandlerOptions = {
  /** Replaces the built-in matcher list. */
  matchers?: readonly Matcher[];
};

export class IntentHandler {
  constructor(
    private readonly inventory: AzureInventory,
    private readonly subscriptionId: string,
    private readonly logger: Logger,
    private readonly options: IntentHandlerOptions = {},
  ) {}

  async processQuery(query: string): Promise<string> {
    this.logger.info(`Processing query: ${query.toLowerCase()}`);

    let intent = classifyIntent(query, this.options.matchers);
    if (intent.kind === "unknown") {
      intent = await this.resolveFromCatalog(query);
    }
    this.logger.debug(`Resolved intent: ${intent.kind}`);

    return this.dispatch(intent);
  }

  private dispatch(intent: Intent): Promise<string> {
    switch (intent.kind) {
      case "list-vms":
        return this.handleListVMs();
      case "vm-status":
        return this.handleVMStatus(intent.vmName);
      case "metrics":
        return this.handleMetrics(intent.resourceName, intent.metric);
      case "list-resource-groups":
        return this.handleListResourceGroups();
      case "list-vnets":
        return this.handleListVirtualNetworks();
      case "list-public-ips":
        return this.handleListPublicIPs();
      case "discover":
        return this.handleDiscovery(intent.keyword, intent.providerType);
      case "unknown":
        return Promise.resolve(HELP_TEXT);
    }
  }

  /** Match the query against the live resource-type catalog. */
  private async resolveFromCatalog(query: string): Promise<Intent> {
    let catalog: string[];
    try {
      catalog = await this.inventory.listResourceTypes();
    } catch (err) {
      this.logger.warn(`Resource type catalog unavailable: ${formatErrorMessage(err)}`);
      return { kind: "unknown" };
    }

    const match = matchResourceType(query, catalog);
    if (!match) return { kind: "unknown" };
    this.logger.info(`Catalog match: ${match.keyword} -> ${match.providerType} (score ${match.score})`);
    return { kind: "discover", keyword: match.keyword, providerType: match.providerType };
  }

  // ---------------------------------------------------------------------------
  // Compute
  // ---------------------------------------------------------------------------

  private async handleListVMs(): Promise<string> {
    let vms: VMSummary[];
    try {
      vms = await this.inventory.listVMs();
    } catch (err) {
      return `Error fetching VMs: ${formatErrorMessage(err)}`;
    }

    if (vms.length === 0) return "No Virtual Machines found in the current subscription.";

    return (
      `### Virtual Machines (Subscription: \`${this.subscriptionId}\`)\n\n` +
      markdownTable(
        ["Name", "Resource Group", "Location", "Size", "OS", "State"],
        vms.map((vm) => [vm.name, vm.resourceGroup, vm.location, vm.size, vm.osType, vm.provisioningState]),
      )
    );
  }

  private async handleVMStatus(vmName: string): Promise<string> {
    let vm: VMSummary | null;
    try {
      vm = await this.inventory.findVM(vmName);
    } catch (err) {
      return `Error fetching VMs: ${formatErrorMessage(err)}`;
    }
    if (!vm) return `Could not find VM named \`${vmName}\` in the subscription.`;

    let status: VMStatus;
    try {
      status = await this.inventory.getVMStatus(vm.resourceGroup, vm.name);
    } catch (err) {
      return `Error fetching status for \`${vmName}\`: ${formatErrorMessage(err)}`;
    }

    return (
      `### Health Status: \`${status.name}\`\n\n` +
      bulletList([
        `**Power State:** ${status.status}`,
        `**Provisioning State:** ${status.provisioningState}`,
        `**Resource Group:** ${vm.resourceGroup}`,
        `**Size:** ${status.size}`,
        `**Location:** ${status.location}`,
      ])
    );
  }

  private async handleMetrics(resourceName: string, metric: MetricKind): Promise<string> {
    let vm: VMSummary | null;
    try {
      vm = await this.inventory.findVM(resourceName);
    } catch (err) {
      return `Error fetching VMs: ${formatErrorMessage(err)}`;
    }
    if (!vm) return `Could not find a Virtual Machine named \`${resourceName}\` to fetch metrics.`;

    let readings: MetricReading[];
    try {
      const resourceId = vm.id || vmResourceId(this.subscriptionId, vm.resourceGroup, vm.name);
      readings = await this.inventory.getMetrics(resourceId, { metricNames: METRIC_NAMES[metric] });
    } catch (err) {
      return `Error fetching metrics: ${formatErrorMessage(err)}`;
    }

    const header = `### Latest Metrics for \`${vm.name}\`\n\n`;
    if (readings.length === 0) {
      return `${header}No metric data available for this resource in the last hour.`;
    }

    const lines = readings.map((reading) => {
      const values = reading.values.length
        ? reading.values.map((v) => formatMetricValue(v, reading.unit)).join(", ")
        : "N/A";
      return `**${reading.name}:** ${values} (Last 5 mins)`;
    });
    return `${header}${bulletList(lines)}\n`;
  }

  // ---------------------------------------------------------------------------
  // Resources & Networking
  // ---------------------------------------------------------------------------

  private async handleListResourceGroups(): Promise<string> {
    let groups: ResourceGroupSummary[];
    try {
      groups = await this.inventory.listResourceGroups();
    } catch (err) {
      return `Error fetching Resource Groups: ${formatErrorMessage(err)}`;
    }

    if (groups.length === 0) return "No Resource Groups found in the current subscription.";
    return `### Resource Groups\n\n${bulletList(groups.map((rg) => `\`${rg.name}\` (${rg.location})`))}\n`;
  }

  private async handleListVirtualNetworks(): Promise<string> {
    let vnets: VirtualNetworkSummary[];
    try {
      vnets = await this.inventory.listVirtualNetworks();
    } catch (err) {
      return `Error fetching VNets: ${formatErrorMessage(err)}`;
    }

    if (vnets.length === 0) return "No Virtual Networks found in the current subscription.";

    return (
      `### Virtual Networks (Subscription: \`${this.subscriptionId}\`)\n\n` +
      markdownTable(
        ["Name", "Resource Group", "Location", "Address Prefix"],
        vnets.map((vnet) => [vnet.name, vnet.resourceGroup, vnet.location, vnet.addressPrefixes.join(", ")]),
      )
    );
  }

  private async handleListPublicIPs(): Promise<string> {
    let ips: PublicIPSummary[];
    try {
      ips = await this.inventory.listPublicIPs();
    } catch (err) {
      return `Error fetching Public IPs: ${formatErrorMessage(err)}`;
    }

    if (ips.length === 0) return "No Public IP Addresses found.";

    return (
      `### Public IP Addresses (Subscription: \`${this.subscriptionId}\`)\n\n` +
      markdownTable(
        ["Name", "IP Address", "Resource Group", "Location", "SKU"],
        ips.map((ip) => [ip.name, ip.ipAddress, ip.resourceGroup, ip.location, ip.sku]),
      )
    );
  }

  private async handleDiscovery(keyword: string, providerType: string): Promise<string> {
    let resources: DiscoveredResource[];
    try {
      resources = await this.inventory.queryResources(providerType);
    } catch (err) {
      return `Error fetching \`${keyword}\` resources: ${formatErrorMessage(err)}`;
    }

    if (resources.length === 0) return `No \`${keyword}\` resources found in the current subscription.`;

    return (
      `### Azure ${titleCase(keyword)} Resources\n\n` +
      markdownTable(
        ["Name", "Resource Group", "Location", "Type"],
        resources.map((r) => [r.name, r.resourceGroup, r.location, lastSegment(r.type)]),
      )
    );
  }
}

export function createIntentHandler(
  inventory: AzureInventory,
  subscriptionId: string,
  logger: Logger,
  options?: IntentHandlerOptions,
): IntentHandler {
  return new IntentHandler(inventory, subscriptionId, logger, options);
}
