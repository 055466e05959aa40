/**
 * Azure Agent — Retry Utilities
 *
 * Retry logic for Azure management calls with exponential backoff and jitter.
 */

import type { AzureRetryOptions } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<AzureRetryOptions>;

export const AZURE_RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * Azure error codes that are safe to retry.
 */
export const AZURE_RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "RequestTimeout",
  "ServiceUnavailable",
  "InternalServerError",
  "ServerBusy",
  "TooManyRequests",
  "OperationTimedOut",
  "GatewayTimeout",
  "RateLimiting",
]);

const RETRYABLE_MESSAGE_PATTERNS = [
  "throttl",
  "too many requests",
  "rate limit",
  "server busy",
  "temporarily unavailable",
  "service unavailable",
  "connection reset",
  "socket hang up",
  "network error",
  "fetch failed",
];

// =============================================================================
// Error Inspection
// =============================================================================

type ErrorFields = {
  code?: string;
  statusCode?: number;
  message?: string;
  headers?: Record<string, string>;
};

function readField(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

/**
 * Pull the fields the retry policy cares about out of an unknown thrown value.
 * Azure SDK errors (RestError) carry `code`, `statusCode` and `response.headers`.
 */
function inspectError(error: unknown): ErrorFields {
  if (typeof error !== "object" || error === null) return {};

  const code = readField(error, "code");
  const statusCode = readField(error, "statusCode") ?? readField(error, "status");
  const message = readField(error, "message");

  let headers: Record<string, string> | undefined;
  const rawHeaders = readField(error, "headers") ?? readHeadersFromResponse(error);
  if (typeof rawHeaders === "object" && rawHeaders !== null) {
    headers = {};
    for (const [key, value] of Object.entries(rawHeaders)) {
      if (typeof value === "string") headers[key.toLowerCase()] = value;
    }
  }

  return {
    code: typeof code === "string" ? code : undefined,
    statusCode: typeof statusCode === "number" ? statusCode : undefined,
    message: typeof message === "string" ? message : undefined,
    headers,
  };
}

function readHeadersFromResponse(error: object): unknown {
  const response = readField(error, "response");
  if (typeof response !== "object" || response === null) return undefined;
  const headers = readField(response, "headers");
  // @azure/core-rest-pipeline exposes HttpHeaders with toJSON()
  if (typeof headers === "object" && headers !== null && "toJSON" in headers) {
    const toJSON = readField(headers, "toJSON");
    if (typeof toJSON === "function") return toJSON.call(headers);
  }
  return headers;
}

/**
 * Determine whether an Azure error is safe to retry.
 */
export function shouldRetryAzureError(error: unknown): boolean {
  const { code, statusCode, message } = inspectError(error);

  if (code && AZURE_RETRYABLE_CODES.has(code)) return true;

  // 429 = throttled, 5xx = server errors
  if (statusCode === 429) return true;
  if (statusCode !== undefined && statusCode >= 500 && statusCode < 600) return true;

  const lowered = (message ?? "").toLowerCase();
  return RETRYABLE_MESSAGE_PATTERNS.some((pattern) => lowered.includes(pattern));
}

/**
 * Extract the Retry-After value from an Azure error response (in ms).
 */
export function getAzureRetryAfterMs(error: unknown): number | null {
  const { headers } = inspectError(error);
  const retryAfter = headers?.["retry-after"];
  if (!retryAfter) return null;

  // Either delta-seconds or an HTTP date
  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return null;
}

// =============================================================================
// Retry Execution
// =============================================================================

/**
 * Execute a function with Azure-specific retry logic.
 */
export async function withAzureRetry<T>(
  fn: () => Promise<T>,
  options?: AzureRetryOptions,
): Promise<T> {
  const config: RetryConfig = {
    maxAttempts: options?.maxAttempts ?? AZURE_RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? AZURE_RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? AZURE_RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? AZURE_RETRY_DEFAULTS.jitterFactor,
  };

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!shouldRetryAzureError(error)) break;

      const retryAfterMs = getAzureRetryAfterMs(error);
      let delayMs: number;

      if (retryAfterMs !== null) {
        delayMs = Math.min(retryAfterMs, config.maxDelayMs);
      } else {
        const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
        const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
        const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
        delayMs = Math.max(config.minDelayMs, cappedDelay + jitter);
      }

      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  throw lastError;
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an Azure error into a human-readable message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  const { code, statusCode, message } = inspectError(error);

  const parts: string[] = [];
  if (code) parts.push(`[${code}]`);
  if (statusCode) parts.push(`(HTTP ${statusCode})`);
  parts.push(message ?? String(error));

  return parts.join(" ");
}
