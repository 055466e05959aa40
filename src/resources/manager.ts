/**
 * Azure Resource Manager
 *
 * Resource groups and the registered resource-type catalog via @azure/arm-resources.
 */

import type { CredentialProvider } from "../credentials/manager.js";
import type { AzureRetryOptions, ResourceGroupSummary } from "../types.js";
import { withAzureRetry } from "../retry.js";
import { traceAzureCall } from "../diagnostics.js";

/** Provider endpoints listed as resource types that never hold resources. */
const NON_RESOURCE_TYPES = new Set(["operations", "locations", "operationresults", "operationstatuses", "checknameavailability"]);

/**
 * Whether a provider resource type can hold top-level resources. Child types
 * (`locations/usages`, `virtualMachines/extensions`) never show up as rows in
 * Resource Graph's `Resources` table.
 */
export function isDiscoverableResourceType(resourceType: string): boolean {
  return !resourceType.includes("/") && !NON_RESOURCE_TYPES.has(resourceType.toLowerCase());
}

export class AzureResourceManager {
  constructor(
    private readonly credentials: CredentialProvider,
    private readonly subscriptionId: string,
    private readonly retryOptions?: AzureRetryOptions,
  ) {}

  private async getClient() {
    const { ResourceManagementClient } = await import("@azure/arm-resources");
    const { credential } = await this.credentials.getCredential();
    return new ResourceManagementClient(credential, this.subscriptionId);
  }

  async listResourceGroups(): Promise<ResourceGroupSummary[]> {
    return traceAzureCall({ service: "resources", operation: "listResourceGroups" }, () =>
      withAzureRetry(async () => {
        const client = await this.getClient();
        const results: ResourceGroupSummary[] = [];
        for await (const rg of client.resourceGroups.list()) {
          results.push({ name: rg.name ?? "", location: rg.location });
        }
        return results;
      }, this.retryOptions),
    );
  }

  /**
   * Top-level resource types the subscription's providers expose, as
   * `Namespace/resourceType` (e.g. `Microsoft.Compute/disks`). Sorted, no duplicates.
   */
  async listResourceTypes(): Promise<string[]> {
    return traceAzureCall({ service: "resources", operation: "listResourceTypes" }, () =>
      withAzureRetry(async () => {
        const client = await this.getClient();
        const types = new Set<string>();
        for await (const provider of client.providers.list()) {
          if (!provider.namespace) continue;
          for (const rt of provider.resourceTypes ?? []) {
            if (!rt.resourceType || !isDiscoverableResourceType(rt.resourceType)) continue;
            types.add(`${provider.namespace}/${rt.resourceType}`);
          }
        }
        return [...types].sort();
      }, this.retryOptions),
    );
  }
}
