/**
 * Intent Classifier
 *
 * Routes a free-text query to one of the fixed read-only operations by
 * running an ordered list of matchers. The first matcher that fires wins,
 * so earlier entries shadow later ones (e.g. "list vms" never reaches the
 * "vm" service alias).
 */

import { findServiceAlias, SERVICE_ALIASES } from "./aliases.js";
import type { Intent, MetricKind, ServiceAlias } from "./types.js";

export type Matcher = {
  name: string;
  match: (query: string) => Intent | null;
};

const LIST_VM_KEYWORDS = [
  "list vms",
  "show vms",
  "show all vms",
  "get vms",
  "list virtual machines",
  "show virtual machines",
];
const RESOURCE_GROUP_KEYWORDS = ["resource groups", "list rgs", "show rgs"];
const VNET_KEYWORDS = ["vnets", "networks", "virtual network"];
const PUBLIC_IP_KEYWORDS = ["public ips", "ip addresses", "ips"];

const VM_STATUS_PATTERN = /(status|health|state) of (?:vm|virtual machine) ([\w-]+)/;
const METRICS_PATTERN = /(cpu|memory|metrics) (?:for|of) ([\w-]+)/;

function containsAny(query: string, keywords: readonly string[]): boolean {
  return keywords.some((kw) => query.includes(kw));
}

function keywordMatcher(name: string, keywords: readonly string[], intent: Intent): Matcher {
  return { name, match: (query) => (containsAny(query, keywords) ? intent : null) };
}

function isMetricKind(value: string): value is MetricKind {
  return value === "cpu" || value === "memory" || value === "metrics";
}

export function buildMatchers(aliases: readonly ServiceAlias[] = SERVICE_ALIASES): Matcher[] {
  return [
    keywordMatcher("list-vms", LIST_VM_KEYWORDS, { kind: "list-vms" }),
    {
      name: "vm-status",
      match: (query) => {
        const m = VM_STATUS_PATTERN.exec(query);
        return m?.[2] ? { kind: "vm-status", vmName: m[2] } : null;
      },
    },
    {
      name: "metrics",
      match: (query) => {
        const m = METRICS_PATTERN.exec(query);
        if (!m?.[1] || !m[2] || !isMetricKind(m[1])) return null;
        return { kind: "metrics", metric: m[1], resourceName: m[2] };
      },
    },
    keywordMatcher("list-resource-groups", RESOURCE_GROUP_KEYWORDS, { kind: "list-resource-groups" }),
    keywordMatcher("list-vnets", VNET_KEYWORDS, { kind: "list-vnets" }),
    keywordMatcher("list-public-ips", PUBLIC_IP_KEYWORDS, { kind: "list-public-ips" }),
    {
      name: "service-alias",
      match: (query) => {
        const alias = findServiceAlias(query, aliases);
        return alias ? { kind: "discover", keyword: alias.keyword, providerType: alias.providerType } : null;
      },
    },
  ];
}

const DEFAULT_MATCHERS = buildMatchers();

/**
 * Classify a query. Matching is case-insensitive; `unknown` means no
 * matcher fired and the caller should try the catalog fallback.
 */
export function classifyIntent(query: string, matchers: readonly Matcher[] = DEFAULT_MATCHERS): Intent {
  const normalized = query.toLowerCase();
  for (const matcher of matchers) {
    const intent = matcher.match(normalized);
    if (intent) return intent;
  }
  return { kind: "unknown" };
}
