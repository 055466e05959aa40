/**
 * Azure Agent — SDK Call Tracing Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  formatAzureCallTrace,
  isAzureTracingEnabled,
  onAzureCall,
  resetAzureTracingForTest,
  setAzureTraceLogger,
  setAzureTracing,
  traceAzureCall,
} from "./diagnostics.js";

function makeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

beforeEach(() => {
  resetAzureTracingForTest();
  // start, end
  vi.spyOn(Date, "now").mockReturnValueOnce(1_000).mockReturnValueOnce(1_012);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("setAzureTracing", () => {
  it("toggles tracing", () => {
    expect(isAzureTracingEnabled()).toBe(false);
    setAzureTracing(true);
    expect(isAzureTracingEnabled()).toBe(true);
    setAzureTracing(false);
    expect(isAzureTracingEnabled()).toBe(false);
  });
});

describe("traceAzureCall", () => {
  it("passes the result through without traces when disabled", async () => {
    const listener = vi.fn();
    onAzureCall(listener);
    await expect(traceAzureCall({ service: "compute", operation: "listVMs" }, async () => 42)).resolves.toBe(42);
    expect(listener).not.toHaveBeenCalled();
  });

  it("reports the target, duration and row count of a list call", async () => {
    setAzureTracing(true);
    const listener = vi.fn();
    onAzureCall(listener);

    await traceAzureCall(
      { service: "resourcegraph", operation: "queryResources", target: "Microsoft.Web/sites" },
      async () => ["a", "b", "c"],
    );

    expect(listener).toHaveBeenCalledWith({
      service: "resourcegraph",
      operation: "queryResources",
      target: "Microsoft.Web/sites",
      outcome: "ok",
      durationMs: 12,
      rowCount: 3,
      seq: 1,
    });
  });

  it("leaves the row count out for single-object results", async () => {
    setAzureTracing(true);
    const listener = vi.fn();
    onAzureCall(listener);

    await traceAzureCall({ service: "compute", operation: "getVMStatus" }, async () => ({ name: "web-01" }));

    expect(listener.mock.calls[0][0].rowCount).toBeUndefined();
  });

  it("reports failures with the status code and rethrows", async () => {
    setAzureTracing(true);
    const listener = vi.fn();
    onAzureCall(listener);
    const err = Object.assign(new Error("denied"), { statusCode: 403 });

    await expect(
      traceAzureCall({ service: "compute", operation: "getVMStatus" }, async () => { throw err; }),
    ).rejects.toBe(err);

    const trace = listener.mock.calls[0][0];
    expect(trace.outcome).toBe("error");
    expect(trace.statusCode).toBe(403);
    expect(trace.error).toBe("(HTTP 403) denied");
  });

  it("resolves even when a listener throws, and reports the listener failure", async () => {
    setAzureTracing(true);
    const logger = makeLogger();
    setAzureTraceLogger(logger);
    const after = vi.fn();
    onAzureCall(() => {
      throw new Error("sink closed");
    });
    onAzureCall(after);

    await expect(traceAzureCall({ service: "compute", operation: "listVMs" }, async () => ["vm"])).resolves.toEqual([
      "vm",
    ]);
    expect(after).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith("Trace listener failed on compute.listVMs: sink closed");
  });

  it("numbers traces in order and stops after unsubscribe", async () => {
    vi.mocked(Date.now).mockReturnValue(5);
    setAzureTracing(true);
    const listener = vi.fn();
    const unsubscribe = onAzureCall(listener);

    await traceAzureCall({ service: "network", operation: "listVirtualNetworks" }, async () => []);
    await traceAzureCall({ service: "network", operation: "listPublicIPs" }, async () => []);
    unsubscribe();
    await traceAzureCall({ service: "network", operation: "listPublicIPs" }, async () => []);

    expect(listener.mock.calls.map((c) => c[0].seq)).toEqual([1, 2]);
  });
});

describe("formatAzureCallTrace", () => {
  it("renders a successful list call", () => {
    expect(
      formatAzureCallTrace({
        seq: 1,
        service: "resourcegraph",
        operation: "queryResources",
        target: "Microsoft.Web/sites",
        outcome: "ok",
        durationMs: 12,
        rowCount: 3,
      }),
    ).toBe("resourcegraph.queryResources [Microsoft.Web/sites] ok 12ms rows=3");
  });

  it("renders a failure", () => {
    expect(
      formatAzureCallTrace({
        seq: 2,
        service: "monitor",
        operation: "getMetrics",
        outcome: "error",
        durationMs: 5,
        statusCode: 403,
        error: "denied",
      }),
    ).toBe("monitor.getMetrics error 5ms status=403 error=denied");
  });
});
