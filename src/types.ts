/**
 * Azure Agent — Shared Types
 *
 * Core type definitions used across the service modules.
 */

// =============================================================================
// Common Configuration
// =============================================================================

export type AzureRetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

export type AzureCredentialMethod =
  | "default"
  | "cli"
  | "service-principal"
  | "managed-identity";

// =============================================================================
// Logging
// =============================================================================

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

// =============================================================================
// Resource Records
// =============================================================================

/** Row returned by a Resource Graph discovery query. */
export type DiscoveredResource = {
  name: string;
  resourceGroup: string;
  location: string;
  type: string;
};

export type ResourceGroupSummary = {
  name: string;
  location: string;
};
