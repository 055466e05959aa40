export { AzureMonitorManager, DEFAULT_METRIC_NAMES } from "./manager.js";

export type { MetricReading, MetricQueryOptions } from "./types.js";
