/**
 * Azure Agent — Configuration
 *
 * Environment-driven configuration, declared as a TypeBox schema.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import dotenv from "dotenv";
import { ConfigError } from "./errors.js";
import type { Logger } from "./types.js";

export const DEFAULT_PORT = 6003;
export const DEFAULT_MODEL_NAME = "azure-agent";

const CredentialMethodSchema = Type.Union([
  Type.Literal("service-principal"),
  Type.Literal("default"),
  Type.Literal("cli"),
  Type.Literal("managed-identity"),
]);

const LogLevelSchema = Type.Union([
  Type.Literal("DEBUG"),
  Type.Literal("INFO"),
  Type.Literal("WARNING"),
  Type.Literal("ERROR"),
]);

export const configSchema = Type.Object({
  tenantId: Type.Optional(Type.String({ description: "Azure AD tenant ID" })),
  clientId: Type.Optional(Type.String({ description: "Service principal application ID" })),
  clientSecret: Type.Optional(Type.String({ description: "Service principal secret" })),
  subscriptionId: Type.Optional(Type.String({ description: "Subscription to query" })),
  credentialMethod: CredentialMethodSchema,
  host: Type.String(),
  port: Type.Integer({ minimum: 0, maximum: 65535 }),
  logLevel: LogLevelSchema,
  corsOrigin: Type.String(),
  apiKey: Type.Optional(Type.String({ description: "Bearer key required by the chat API" })),
  modelName: Type.String({ minLength: 1 }),
  retryMaxAttempts: Type.Integer({ minimum: 1, maximum: 10 }),
});

export type AgentConfig = Static<typeof configSchema>;

type Env = Record<string, string | undefined>;

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readLogLevel(env: Env): string {
  const level = (read(env, "LOG_LEVEL") ?? "INFO").toUpperCase();
  return level === "WARN" ? "WARNING" : level;
}

/**
 * Load `.env` from the working directory into `process.env`.
 * Variables already set in the environment win.
 */
export function loadDotEnv(path?: string): void {
  dotenv.config(path ? { path } : undefined);
}

/**
 * Build the agent configuration from environment variables.
 */
export function loadConfig(env: Env = process.env): AgentConfig {
  const raw = {
    tenantId: read(env, "AZURE_TENANT_ID"),
    clientId: read(env, "AZURE_CLIENT_ID"),
    clientSecret: read(env, "AZURE_CLIENT_SECRET"),
    subscriptionId: read(env, "AZURE_SUBSCRIPTION_ID"),
    credentialMethod: read(env, "AZURE_CREDENTIAL_METHOD") ?? "service-principal",
    host: read(env, "HOST") ?? "0.0.0.0",
    port: read(env, "PORT") ?? String(DEFAULT_PORT),
    logLevel: readLogLevel(env),
    corsOrigin: read(env, "CORS_ORIGIN") ?? "*",
    apiKey: read(env, "API_KEY"),
    modelName: read(env, "MODEL_NAME") ?? DEFAULT_MODEL_NAME,
    retryMaxAttempts: read(env, "AZURE_RETRY_MAX_ATTEMPTS") ?? "3",
  };

  const converted = Value.Convert(configSchema, raw);
  if (Value.Check(configSchema, converted)) return converted;

  const first = Value.Errors(configSchema, converted).First();
  const where = first ? first.path.replace(/^\//, "") : "config";
  throw new ConfigError(`Invalid configuration for ${where}: ${first?.message ?? "unknown error"}`);
}

/**
 * List the required Azure variables that are not set.
 * Tenant, client and secret are only required for service principal auth.
 */
export function validateConfig(config: AgentConfig): string[] {
  const missing: string[] = [];
  if (config.credentialMethod === "service-principal") {
    if (!config.tenantId) missing.push("AZURE_TENANT_ID");
    if (!config.clientId) missing.push("AZURE_CLIENT_ID");
    if (!config.clientSecret) missing.push("AZURE_CLIENT_SECRET");
  }
  if (!config.subscriptionId) missing.push("AZURE_SUBSCRIPTION_ID");
  return missing;
}

/**
 * Log configuration problems. Returns true when the configuration is complete.
 */
export function reportConfig(config: AgentConfig, logger: Logger): boolean {
  const missing = validateConfig(config);
  if (missing.length === 0) return true;

  logger.error(`Missing required environment variables: ${missing.join(", ")}`);
  logger.warn("Configuration is incomplete. Azure SDK calls will likely fail until .env is properly configured.");
  return false;
}
