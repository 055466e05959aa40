export { classifyIntent, buildMatchers, type Matcher } from "./classifier.js";
export { SERVICE_ALIASES, findServiceAlias } from "./aliases.js";
export { matchResourceType, tokenize, type CatalogMatch } from "./fuzzy.js";
export { IntentHandler, createIntentHandler, HELP_TEXT, METRIC_NAMES, type IntentHandlerOptions } from "./handler.js";
export type { Intent, IntentKind, MetricKind, ServiceAlias } from "./types.js";
