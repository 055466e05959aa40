/**
 * Azure Agent — HTTP API Server
 *
 * OpenAI-compatible chat endpoint in front of the intent handler, so chat
 * front ends can register the agent as a model.
 * Uses Node's built-in http module.
 *
 * Endpoints:
 *   POST /v1/chat/completions — answer the last user message
 *   GET  /v1/models           — list the agent's model
 *   GET  /health              — health check
 */

import { createServer, type IncomingMessage, type ServerResponse, type Server } from "node:http";
import { randomUUID, timingSafeEqual } from "node:crypto";
import { AgentError, RequestValidationError } from "../errors.js";
import { createLogger } from "../logger.js";
import { DEFAULT_MODEL_NAME } from "../config.js";
import type { Logger } from "../types.js";
import { VERSION } from "../version.js";
import { lastUserMessage, parseChatCompletionRequest } from "./schema.js";

// =============================================================================
// Types
// =============================================================================

/** Anything that turns a query into a markdown answer. */
export type QueryProcessor = {
  processQuery(query: string): Promise<string>;
};

export type ApiServerOptions = {
  port: number;
  host: string;
  processor: QueryProcessor;
  /** Model id reported by /v1/models (default: "azure-agent"). */
  modelName?: string;
  apiKey?: string;
  /** Request body read timeout in ms (default: 30000). */
  bodyTimeout?: number;
  /** Allowed CORS origins (default: "*"). */
  corsOrigin?: string;
  logger?: Logger;
};

export type ApiServerHandle = {
  server: Server;
  close: () => Promise<void>;
};

type RouteHandler = (req: IncomingMessage, res: ServerResponse, body: unknown) => Promise<void>;

type OpenAIErrorType = "invalid_request_error" | "authentication_error" | "server_error";

const MAX_BODY = 10 * 1024 * 1024; // 10MB

// =============================================================================
// Helpers
// =============================================================================

/** Standard security + CORS headers applied to every response. */
function securityHeaders(corsOrigin: string): Record<string, string> {
  return {
    "Access-Control-Allow-Origin": corsOrigin,
    "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type, Authorization, X-API-Key",
    "X-Content-Type-Options": "nosniff",
    "X-Frame-Options": "DENY",
    "Cache-Control": "no-store",
  };
}

function json(res: ServerResponse, data: unknown, status = 200, corsOrigin = "*"): void {
  res.writeHead(status, {
    "Content-Type": "application/json",
    ...securityHeaders(corsOrigin),
  });
  res.end(JSON.stringify(data));
}

function errorType(status: number): OpenAIErrorType {
  if (status === 401) return "authentication_error";
  return status >= 500 ? "server_error" : "invalid_request_error";
}

function error(res: ServerResponse, message: string, status = 400, corsOrigin = "*"): void {
  json(res, { error: { message, type: errorType(status) } }, status, corsOrigin);
}

async function readBody(req: IncomingMessage, timeoutMs = 30_000): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    const timer = setTimeout(() => {
      req.destroy();
      reject(new AgentError("Request body read timeout", 408));
    }, timeoutMs);

    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY) {
        clearTimeout(timer);
        req.destroy();
        reject(new AgentError("Request body too large", 413));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      clearTimeout(timer);
      const raw = Buffer.concat(chunks).toString("utf-8");
      if (!raw.trim()) { resolve({}); return; }
      try { resolve(JSON.parse(raw)); }
      catch { reject(new RequestValidationError("Invalid JSON body")); }
    });
    req.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });
  });
}

function bearerToken(header: string | undefined): string | undefined {
  return header?.startsWith("Bearer ") ? header.slice("Bearer ".length) : undefined;
}

/** Whitespace-separated word count, reported as token usage. */
export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

// =============================================================================
// Server
// =============================================================================

export async function startApiServer(opts: ApiServerOptions): Promise<ApiServerHandle> {
  const logger = opts.logger ?? createLogger("azure-agent.api");
  const corsOrigin = opts.corsOrigin ?? "*";
  const bodyTimeout = opts.bodyTimeout ?? 30_000;
  const modelName = opts.modelName ?? DEFAULT_MODEL_NAME;

  if (!Number.isFinite(opts.port) || opts.port < 0 || opts.port > 65535) {
    throw new Error(`Invalid port: ${opts.port}. Must be 0-65535.`);
  }

  const authenticate = (req: IncomingMessage): boolean => {
    if (!opts.apiKey) return true;
    const key = req.headers["x-api-key"] ?? bearerToken(req.headers.authorization);
    if (typeof key !== "string" || key.length === 0) return false;
    const expected = Buffer.from(opts.apiKey, "utf-8");
    const received = Buffer.from(key, "utf-8");
    if (expected.length !== received.length) return false;
    return timingSafeEqual(expected, received);
  };

  // ─── Route Definitions ─────────────────────────────────────────

  const routes = new Map<string, RouteHandler>();
  const route = (method: string, path: string, handler: RouteHandler) => {
    routes.set(`${method} ${path}`, handler);
  };

  route("GET", "/health", async (_req, res) => {
    json(res, { status: "healthy", service: "azure-agent", version: VERSION }, 200, corsOrigin);
  });

  route("GET", "/v1/models", async (_req, res) => {
    json(
      res,
      {
        object: "list",
        data: [{ id: modelName, object: "model", created: 0, owned_by: "azure-agent" }],
      },
      200,
      corsOrigin,
    );
  });

  route("POST", "/v1/chat/completions", async (_req, res, body) => {
    const request = parseChatCompletionRequest(body);
    const query = lastUserMessage(request);
    if (!query) throw new RequestValidationError("No user message found in request");

    let content: string;
    try {
      content = await opts.processor.processQuery(query);
    } catch (err) {
      logger.error(`Error processing chat completion: ${err instanceof Error ? err.message : String(err)}`);
      throw err;
    }

    const id = `chatcmpl-${randomUUID()}`;
    const created = Math.floor(Date.now() / 1000);

    if (request.stream) {
      res.writeHead(200, {
        ...securityHeaders(corsOrigin),
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
      });
      const chunk = (delta: Record<string, string>, finishReason: "stop" | null) => ({
        id,
        object: "chat.completion.chunk",
        created,
        model: request.model,
        choices: [{ index: 0, delta, finish_reason: finishReason }],
      });
      res.write(`data: ${JSON.stringify(chunk({ role: "assistant", content }, null))}\n\n`);
      res.write(`data: ${JSON.stringify(chunk({}, "stop"))}\n\n`);
      res.end("data: [DONE]\n\n");
      return;
    }

    const promptTokens = countWords(query);
    const completionTokens = countWords(content);
    json(
      res,
      {
        id,
        object: "chat.completion",
        created,
        model: request.model,
        choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
        usage: {
          prompt_tokens: promptTokens,
          completion_tokens: completionTokens,
          total_tokens: promptTokens + completionTokens,
        },
      },
      200,
      corsOrigin,
    );
  });

  // ─── Start Server ──────────────────────────────────────────────

  const server = createServer(async (req, res) => {
    if (req.method === "OPTIONS") {
      res.writeHead(204, securityHeaders(corsOrigin));
      res.end();
      return;
    }

    const contentLength = req.headers["content-length"];
    if (contentLength && parseInt(contentLength, 10) > MAX_BODY) {
      error(res, "Request body too large", 413, corsOrigin);
      req.destroy();
      return;
    }

    const url = req.url?.split("?")[0] ?? "/";
    const method = req.method ?? "GET";

    // Health stays open so container health checks need no key.
    if (url !== "/health" && !authenticate(req)) {
      error(res, "Unauthorized", 401, corsOrigin);
      return;
    }

    const handler = routes.get(`${method} ${url}`);
    if (!handler) {
      error(res, `Not found: ${method} ${url}`, 404, corsOrigin);
      return;
    }

    try {
      const body = method === "POST" ? await readBody(req, bodyTimeout) : {};
      await handler(req, res, body);
    } catch (err) {
      if (err instanceof AgentError && err.statusCode < 500) {
        error(res, err.message, err.statusCode, corsOrigin);
        return;
      }
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`Error handling ${method} ${url}: ${message}`);
      // Don't leak internal error details to the client
      error(res, "Internal server error", 500, corsOrigin);
    }
  });

  server.headersTimeout = 60_000;
  server.requestTimeout = 60_000;

  const shutdown = () => {
    close().then(() => process.exit(0)).catch(() => process.exit(1));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  const close = (): Promise<void> =>
    new Promise((resolve, reject) => {
      logger.info("Shutting down…");
      process.removeListener("SIGINT", shutdown);
      process.removeListener("SIGTERM", shutdown);
      server.close((err) => (err ? reject(err) : resolve()));
    });

  return new Promise<ApiServerHandle>((resolve, reject) => {
    server.on("error", reject);
    server.listen(opts.port, opts.host, () => {
      logger.info(`Azure-Agent API listening on http://${opts.host}:${opts.port}`);
      logger.info(`Auth: ${opts.apiKey ? "API key required" : "open (no auth)"}`);
      resolve({ server, close });
    });
  });
}
