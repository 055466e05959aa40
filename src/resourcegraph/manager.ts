/**
 * Azure Resource Graph Manager
 *
 * Discovers resources of one provider type through @azure/arm-resourcegraph.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { CredentialProvider } from "../credentials/manager.js";
import type { AzureRetryOptions, DiscoveredResource } from "../types.js";
import { withAzureRetry } from "../retry.js";
import { traceAzureCall } from "../diagnostics.js";

const ResourceRowSchema = Type.Object({
  name: Type.String(),
  resourceGroup: Type.String(),
  location: Type.String(),
  type: Type.String(),
});

/** Page size requested from Resource Graph; the service caps it at 1000. */
const PAGE_SIZE = 1000;

/**
 * KQL for listing resources of one type, projected to the discovery columns.
 */
export function buildDiscoveryQuery(providerType: string): string {
  const escaped = providerType.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
  return [
    "Resources",
    `| where type =~ '${escaped}'`,
    "| project name, resourceGroup, location, type",
    "| order by name asc",
  ].join(" ");
}

export class AzureResourceGraphManager {
  constructor(
    private readonly credentials: CredentialProvider,
    private readonly subscriptionId: string,
    private readonly retryOptions?: AzureRetryOptions,
  ) {}

  private async getClient() {
    const { ResourceGraphClient } = await import("@azure/arm-resourcegraph");
    const { credential } = await this.credentials.getCredential();
    return new ResourceGraphClient(credential);
  }

  /**
   * All resources of the given type in the subscription, following skip tokens.
   */
  async queryResources(providerType: string): Promise<DiscoveredResource[]> {
    const query = buildDiscoveryQuery(providerType);

    return traceAzureCall({ service: "resourcegraph", operation: "queryResources", target: providerType }, async () => {
      const client = await this.getClient();
      const results: DiscoveredResource[] = [];
      let skipToken: string | undefined;

      do {
        const page = await withAzureRetry(
          () =>
            client.resources({
              subscriptions: [this.subscriptionId],
              query,
              options: { resultFormat: "objectArray", top: PAGE_SIZE, skipToken },
            }),
          this.retryOptions,
        );

        const rows: unknown[] = Array.isArray(page.data) ? page.data : [];
        for (const row of rows) {
          if (Value.Check(ResourceRowSchema, row)) {
            results.push({ name: row.name, resourceGroup: row.resourceGroup, location: row.location, type: row.type });
          }
        }
        skipToken = page.skipToken;
      } while (skipToken);

      return results;
    });
  }
}
