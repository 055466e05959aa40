/**
 * Azure Monitor Manager
 *
 * Reads platform metrics for a resource via @azure/arm-monitor.
 */

import type { CredentialProvider } from "../credentials/manager.js";
import type { AzureRetryOptions } from "../types.js";
import { withAzureRetry } from "../retry.js";
import { traceAzureCall } from "../diagnostics.js";
import type { MetricQueryOptions, MetricReading } from "./types.js";

export const DEFAULT_METRIC_NAMES = ["Percentage CPU"];

/** Trailing readings kept per metric: the last five one-minute averages. */
const LATEST_READINGS = 5;

export class AzureMonitorManager {
  constructor(
    private readonly credentials: CredentialProvider,
    private readonly subscriptionId: string,
    private readonly retryOptions?: AzureRetryOptions,
  ) {}

  private async getMonitorClient() {
    const { MonitorClient } = await import("@azure/arm-monitor");
    const { credential } = await this.credentials.getCredential();
    return new MonitorClient(credential, this.subscriptionId);
  }

  /**
   * Average readings of the given metrics over the timespan, one per interval.
   */
  async getMetrics(resourceId: string, options: MetricQueryOptions = {}): Promise<MetricReading[]> {
    const metricNames = options.metricNames ?? DEFAULT_METRIC_NAMES;

    return traceAzureCall({ service: "monitor", operation: "getMetrics", target: resourceId }, () =>
      withAzureRetry(async () => {
        const client = await this.getMonitorClient();
        const response = await client.metrics.list(resourceId, {
          timespan: options.timespan ?? "PT1H",
          interval: options.interval ?? "PT1M",
          metricnames: metricNames.join(","),
          aggregation: "Average",
        });

        return (response.value ?? []).map((metric) => {
          const points = metric.timeseries?.[0]?.data ?? [];
          const values = points
            .map((point) => point.average)
            .filter((avg): avg is number => typeof avg === "number")
            .map(round2);

          return {
            name: metric.name.localizedValue ?? metric.name.value,
            unit: String(metric.unit ?? ""),
            values: values.slice(-LATEST_READINGS),
          };
        });
      }, this.retryOptions),
    );
  }
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
