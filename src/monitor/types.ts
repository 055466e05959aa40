/**
 * Azure Monitor — Type Definitions
 */

export type MetricReading = {
  /** Localized metric name, e.g. "Percentage CPU". */
  name: string;
  unit: string;
  /** Most recent averages, oldest first, rounded to 2 decimals. */
  values: number[];
};

export type MetricQueryOptions = {
  metricNames?: string[];
  /** ISO 8601 duration. Default: PT1H. */
  timespan?: string;
  /** ISO 8601 grain. Default: PT1M. */
  interval?: string;
};
