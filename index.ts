/**
 * Azure Agent — Package Entry Point
 *
 * Natural-language, read-only queries over Azure infrastructure, served
 * through an OpenAI-compatible chat completion endpoint.
 */

export { VERSION } from "./src/version.js";

export { loadConfig, loadDotEnv, validateConfig, reportConfig, configSchema } from "./src/config.js";
export type { AgentConfig } from "./src/config.js";
export { createLogger, silentLogger, formatLogLine } from "./src/logger.js";
export { AgentError, ConfigError, RequestValidationError, AuthenticationError } from "./src/errors.js";
export { withAzureRetry, formatErrorMessage, shouldRetryAzureError } from "./src/retry.js";
export { setAzureTracing, onAzureCall, formatAzureCallTrace, type AzureCallTrace } from "./src/diagnostics.js";

export { AzureCredentialsManager, createCredentialsManager, createCredentialsManagerFromConfig } from "./src/credentials/index.js";
export { AzureVMManager } from "./src/vms/index.js";
export { AzureMonitorManager } from "./src/monitor/index.js";
export { AzureNetworkManager } from "./src/network/index.js";
export { AzureResourceManager } from "./src/resources/index.js";
export { AzureResourceGraphManager, buildDiscoveryQuery } from "./src/resourcegraph/index.js";
export { AzureService, type AzureInventory } from "./src/inventory.js";

export { IntentHandler, createIntentHandler, classifyIntent, matchResourceType, SERVICE_ALIASES } from "./src/intent/index.js";
export type { Intent, ServiceAlias } from "./src/intent/index.js";

export { startApiServer, type ApiServerOptions, type ApiServerHandle, type QueryProcessor } from "./src/api/server.js";
export { queryAzure, type QueryAzureOptions } from "./src/tool/client.js";
export { createAgentProgram, registerAgentCli } from "./src/cli.js";

export type { Logger, LogLevel, AzureRetryOptions, AzureCredentialMethod } from "./src/types.js";
