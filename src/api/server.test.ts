/**
 * Tests for the chat completion API server (src/api/server.ts).
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { startApiServer, countWords, type ApiServerHandle, type QueryProcessor } from "./server.js";
import { silentLogger } from "../logger.js";
import { VERSION } from "../version.js";

// =============================================================================
// Helpers
// =============================================================================

let handle: ApiServerHandle | null = null;

function makeProcessor() {
  return { processQuery: vi.fn(async (query: string) => `answer: ${query}`) };
}

async function startTestServer(
  overrides: { apiKey?: string; corsOrigin?: string; modelName?: string; processor?: QueryProcessor } = {},
): Promise<ApiServerHandle> {
  handle = await startApiServer({
    port: 0, // random free port
    host: "127.0.0.1",
    processor: overrides.processor ?? makeProcessor(),
    apiKey: overrides.apiKey,
    corsOrigin: overrides.corsOrigin,
    modelName: overrides.modelName,
    logger: silentLogger,
  });
  return handle;
}

function getBaseUrl(h: ApiServerHandle): string {
  const addr = h.server.address();
  if (typeof addr === "string" || !addr) throw new Error("No server address");
  return `http://127.0.0.1:${addr.port}`;
}

async function req(
  baseUrl: string,
  path: string,
  opts: { method?: string; body?: unknown; rawBody?: string; headers?: Record<string, string> } = {},
): Promise<{ status: number; body: any; text: string; headers: Record<string, string> }> {
  const method = opts.method ?? "GET";
  const bodyStr = opts.rawBody ?? (opts.body ? JSON.stringify(opts.body) : undefined);

  const res = await fetch(`${baseUrl}${path}`, {
    method,
    headers: {
      "Content-Type": "application/json",
      ...opts.headers,
    },
    body: bodyStr,
  });

  const text = await res.text();
  let parsed: unknown;
  try { parsed = JSON.parse(text); } catch { parsed = text; }
  return {
    status: res.status,
    body: parsed,
    text,
    headers: Object.fromEntries(res.headers.entries()),
  };
}

function completion(content: unknown, extra: Record<string, unknown> = {}) {
  return { model: "azure-agent", messages: [{ role: "user", content }], ...extra };
}

afterEach(async () => {
  if (handle) {
    await handle.close();
    handle = null;
  }
});

// =============================================================================
// Tests
// =============================================================================

describe("API Server", () => {
  // ─── Startup & Health ─────────────────────────────────────────────

  describe("startup and health", () => {
    it("GET /health reports the service and version", async () => {
      const h = await startTestServer();
      const res = await req(getBaseUrl(h), "/health");
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: "healthy", service: "azure-agent", version: VERSION });
    });

    it("rejects an out-of-range port", async () => {
      await expect(
        startApiServer({ port: 70000, host: "127.0.0.1", processor: makeProcessor(), logger: silentLogger }),
      ).rejects.toThrow("Invalid port: 70000. Must be 0-65535.");
    });
  });

  // ─── CORS ─────────────────────────────────────────────────────────

  describe("CORS", () => {
    it("responds to OPTIONS with 204 and CORS headers", async () => {
      const h = await startTestServer();
      const res = await req(getBaseUrl(h), "/v1/chat/completions", { method: "OPTIONS" });
      expect(res.status).toBe(204);
      expect(res.headers["access-control-allow-origin"]).toBe("*");
      expect(res.headers["access-control-allow-headers"]).toBe("Content-Type, Authorization, X-API-Key");
    });

    it("uses custom corsOrigin", async () => {
      const h = await startTestServer({ corsOrigin: "https://chat.example.com" });
      const res = await req(getBaseUrl(h), "/health");
      expect(res.headers["access-control-allow-origin"]).toBe("https://chat.example.com");
    });
  });

  // ─── Authentication ───────────────────────────────────────────────

  describe("authentication", () => {
    it("rejects requests without API key when key is configured", async () => {
      const h = await startTestServer({ apiKey: "test-key" });
      const res = await req(getBaseUrl(h), "/v1/chat/completions", { method: "POST", body: completion("list vms") });
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: { message: "Unauthorized", type: "authentication_error" } });
    });

    it("accepts the key via X-API-Key", async () => {
      const h = await startTestServer({ apiKey: "test-key" });
      const res = await req(getBaseUrl(h), "/v1/models", { headers: { "X-API-Key": "test-key" } });
      expect(res.status).toBe(200);
    });

    it("accepts the key via Authorization Bearer", async () => {
      const h = await startTestServer({ apiKey: "test-key" });
      const res = await req(getBaseUrl(h), "/v1/models", { headers: { Authorization: "Bearer test-key" } });
      expect(res.status).toBe(200);
    });

    it("rejects a bare Authorization header without the Bearer scheme", async () => {
      const h = await startTestServer({ apiKey: "test-key" });
      const res = await req(getBaseUrl(h), "/v1/models", { headers: { Authorization: "test-key" } });
      expect(res.status).toBe(401);
    });

    it("rejects a wrong key", async () => {
      const h = await startTestServer({ apiKey: "test-key" });
      const res = await req(getBaseUrl(h), "/v1/models", { headers: { Authorization: "Bearer wrong-key" } });
      expect(res.status).toBe(401);
    });

    it("leaves /health open", async () => {
      const h = await startTestServer({ apiKey: "test-key" });
      const res = await req(getBaseUrl(h), "/health");
      expect(res.status).toBe(200);
    });
  });

  // ─── Routing ──────────────────────────────────────────────────────

  describe("routing", () => {
    it("returns 404 for unknown routes", async () => {
      const h = await startTestServer();
      const res = await req(getBaseUrl(h), "/v1/nope");
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: { message: "Not found: GET /v1/nope", type: "invalid_request_error" } });
    });

    it("ignores the query string when matching", async () => {
      const h = await startTestServer();
      const res = await req(getBaseUrl(h), "/health?check=1");
      expect(res.status).toBe(200);
    });
  });

  // ─── GET /v1/models ───────────────────────────────────────────────

  describe("GET /v1/models", () => {
    it("lists the configured model", async () => {
      const h = await startTestServer({ modelName: "azure-infra" });
      const res = await req(getBaseUrl(h), "/v1/models");
      expect(res.body).toEqual({
        object: "list",
        data: [{ id: "azure-infra", object: "model", created: 0, owned_by: "azure-agent" }],
      });
    });
  });

  // ─── POST /v1/chat/completions ────────────────────────────────────

  describe("POST /v1/chat/completions", () => {
    it("answers the last user message", async () => {
      const processor = makeProcessor();
      const h = await startTestServer({ processor });
      const res = await req(getBaseUrl(h), "/v1/chat/completions", {
        method: "POST",
        body: {
          model: "azure-agent",
          messages: [
            { role: "system", content: "be brief" },
            { role: "user", content: "first question" },
            { role: "assistant", content: "first answer" },
            { role: "user", content: "show all vms" },
          ],
        },
      });

      expect(res.status).toBe(200);
      expect(processor.processQuery).toHaveBeenCalledWith("show all vms");
      expect(res.body.id).toMatch(/^chatcmpl-[0-9a-f-]{36}$/);
      expect(res.body.object).toBe("chat.completion");
      expect(res.body.model).toBe("azure-agent");
      expect(Number.isInteger(res.body.created)).toBe(true);
      expect(res.body.choices).toEqual([
        { index: 0, message: { role: "assistant", content: "answer: show all vms" }, finish_reason: "stop" },
      ]);
      expect(res.body.usage).toEqual({ prompt_tokens: 3, completion_tokens: 4, total_tokens: 7 });
    });

    it("echoes the requested model", async () => {
      const h = await startTestServer();
      const res = await req(getBaseUrl(h), "/v1/chat/completions", {
        method: "POST",
        body: { model: "something-else", messages: [{ role: "user", content: "list vms" }] },
      });
      expect(res.body.model).toBe("something-else");
    });

    it("joins text parts of array content", async () => {
      const processor = makeProcessor();
      const h = await startTestServer({ processor });
      await req(getBaseUrl(h), "/v1/chat/completions", {
        method: "POST",
        body: completion([
          { type: "text", text: "list" },
          { type: "image_url" },
          { type: "text", text: "vms" },
        ]),
      });
      expect(processor.processQuery).toHaveBeenCalledWith("list\nvms");
    });

    it("returns 400 without a user message", async () => {
      const h = await startTestServer();
      const res = await req(getBaseUrl(h), "/v1/chat/completions", {
        method: "POST",
        body: { model: "azure-agent", messages: [{ role: "system", content: "hi" }] },
      });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: { message: "No user message found in request", type: "invalid_request_error" },
      });
    });

    it("returns 400 for a blank user message", async () => {
      const h = await startTestServer();
      const res = await req(getBaseUrl(h), "/v1/chat/completions", { method: "POST", body: completion("   ") });
      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe("No user message found in request");
    });

    it("returns 400 for a body without messages", async () => {
      const h = await startTestServer();
      const res = await req(getBaseUrl(h), "/v1/chat/completions", { method: "POST", body: { model: "azure-agent" } });
      expect(res.status).toBe(400);
      expect(res.body.error.message).toMatch(/^Invalid request at messages/);
      expect(res.body.error.type).toBe("invalid_request_error");
    });

    it("returns 400 for invalid JSON", async () => {
      const h = await startTestServer();
      const res = await req(getBaseUrl(h), "/v1/chat/completions", { method: "POST", rawBody: "{nope" });
      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe("Invalid JSON body");
    });

    it("streams server-sent chunks when stream is true", async () => {
      const h = await startTestServer();
      const res = await req(getBaseUrl(h), "/v1/chat/completions", {
        method: "POST",
        body: completion("list vms", { stream: true }),
      });

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toBe("text/event-stream");

      const events = res.text.split("\n\n").filter(Boolean);
      expect(events).toHaveLength(3);
      expect(events[2]).toBe("data: [DONE]");

      const first = JSON.parse(events[0].slice("data: ".length));
      const last = JSON.parse(events[1].slice("data: ".length));
      expect(first.object).toBe("chat.completion.chunk");
      expect(first.choices[0]).toEqual({
        index: 0,
        delta: { role: "assistant", content: "answer: list vms" },
        finish_reason: null,
      });
      expect(last.choices[0]).toEqual({ index: 0, delta: {}, finish_reason: "stop" });
      expect(last.id).toBe(first.id);
    });
  });

  // ─── Error Handling ───────────────────────────────────────────────

  describe("error handling", () => {
    it("does not leak internal error details", async () => {
      const processor = { processQuery: vi.fn().mockRejectedValue(new Error("secret stack detail")) };
      const h = await startTestServer({ processor });
      const res = await req(getBaseUrl(h), "/v1/chat/completions", { method: "POST", body: completion("list vms") });
      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: { message: "Internal server error", type: "server_error" } });
    });
  });

  // ─── Shutdown ─────────────────────────────────────────────────────

  describe("shutdown", () => {
    it("close() stops the server and detaches signal handlers", async () => {
      const before = process.listenerCount("SIGTERM");
      const h = await startTestServer();
      expect(process.listenerCount("SIGTERM")).toBe(before + 1);
      await h.close();
      handle = null;
      expect(h.server.listening).toBe(false);
      expect(process.listenerCount("SIGTERM")).toBe(before);
    });
  });
});

describe("countWords", () => {
  it("counts whitespace-separated words", () => {
    expect(countWords("  show all\n vms ")).toBe(3);
    expect(countWords("")).toBe(0);
  });
});
