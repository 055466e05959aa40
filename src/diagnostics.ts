/**
 * Azure Agent — SDK Call Tracing
 *
 * Managers wrap each SDK call in `traceAzureCall`. While tracing is on, every
 * finished call produces one `AzureCallTrace` for the subscribers: what was
 * called, what it was scoped to, how long it took, and how many rows came
 * back or why it failed.
 */

import { createLogger } from "./logger.js";
import { formatErrorMessage } from "./retry.js";
import type { Logger } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type AzureCall = {
  service: string;
  operation: string;
  /** Resource type, resource ID or resource group the call was scoped to. */
  target?: string;
};

export type AzureCallTrace = AzureCall & {
  seq: number;
  outcome: "ok" | "error";
  durationMs: number;
  /** Number of items, for calls that return a list. */
  rowCount?: number;
  statusCode?: number;
  error?: string;
};

export type AzureCallListener = (trace: AzureCallTrace) => void;

// =============================================================================
// State
// =============================================================================

let tracingEnabled = false;
let seq = 0;
const listeners = new Set<AzureCallListener>();
let traceLogger: Logger = createLogger("azure-agent.diagnostics");

export function setAzureTracing(enabled: boolean): void {
  tracingEnabled = enabled;
}

export function isAzureTracingEnabled(): boolean {
  return tracingEnabled;
}

/** Where listener failures are reported. */
export function setAzureTraceLogger(logger: Logger): void {
  traceLogger = logger;
}

/** Subscribe to call traces. Returns an unsubscribe function. */
export function onAzureCall(listener: AzureCallListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

// =============================================================================
// Tracing
// =============================================================================

function publish(trace: Omit<AzureCallTrace, "seq">): void {
  const full: AzureCallTrace = { ...trace, seq: ++seq };
  for (const listener of listeners) {
    // A broken subscriber must not fail a call that already completed.
    try {
      listener(full);
    } catch (err) {
      traceLogger.warn(`Trace listener failed on ${trace.service}.${trace.operation}: ${formatErrorMessage(err)}`);
    }
  }
}

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

export async function traceAzureCall<T>(call: AzureCall, fn: () => Promise<T>): Promise<T> {
  if (!tracingEnabled) return fn();

  const start = Date.now();
  let result: T;
  try {
    result = await fn();
  } catch (error) {
    publish({
      ...call,
      outcome: "error",
      durationMs: Date.now() - start,
      statusCode: statusCodeOf(error),
      error: formatErrorMessage(error),
    });
    throw error;
  }

  publish({
    ...call,
    outcome: "ok",
    durationMs: Date.now() - start,
    rowCount: Array.isArray(result) ? result.length : undefined,
  });
  return result;
}

/** One log line per trace, e.g. `resourcegraph.queryResources [Microsoft.Web/sites] ok 12ms rows=3`. */
export function formatAzureCallTrace(trace: AzureCallTrace): string {
  const target = trace.target ? ` [${trace.target}]` : "";
  const rows = trace.rowCount !== undefined ? ` rows=${trace.rowCount}` : "";
  const status = trace.statusCode ? ` status=${trace.statusCode}` : "";
  const failure = trace.error ? ` error=${trace.error}` : "";
  return `${trace.service}.${trace.operation}${target} ${trace.outcome} ${trace.durationMs}ms${rows}${status}${failure}`;
}

export function resetAzureTracingForTest(): void {
  tracingEnabled = false;
  seq = 0;
  listeners.clear();
  traceLogger = createLogger("azure-agent.diagnostics");
}
