/**
 * Intent Classification — Type Definitions
 */

export type MetricKind = "cpu" | "memory" | "metrics";

export type ServiceAlias = {
  keyword: string;
  providerType: string;
};

export type Intent =
  | { kind: "list-vms" }
  | { kind: "vm-status"; vmName: string }
  | { kind: "metrics"; resourceName: string; metric: MetricKind }
  | { kind: "list-resource-groups" }
  | { kind: "list-vnets" }
  | { kind: "list-public-ips" }
  | { kind: "discover"; keyword: string; providerType: string }
  | { kind: "unknown" };

export type IntentKind = Intent["kind"];
