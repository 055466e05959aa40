/**
 * Chat front-end tool adapter.
 *
 * Lets a chat UI's tool runner forward a question to the agent over its
 * chat completion endpoint and get the markdown answer back as a string.
 * Never throws: failures come back as readable text for the chat.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { DEFAULT_MODEL_NAME } from "../config.js";

export const DEFAULT_AGENT_URL = "http://azure-agent:6003/v1/chat/completions";
export const DEFAULT_TIMEOUT_MS = 30_000;

export type QueryAzureOptions = {
  url?: string;
  timeoutMs?: number;
  model?: string;
  /** Sent as a bearer token when the agent requires an API key. */
  apiKey?: string;
};

const CompletionResponseSchema = Type.Object({
  choices: Type.Array(
    Type.Object({
      message: Type.Object({ content: Type.String() }),
    }),
    { minItems: 1 },
  ),
});

/** Thrown for connection, timeout and non-2xx failures. */
class TransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TransportError";
  }
}

async function post(url: string, payload: unknown, options: QueryAzureOptions): Promise<unknown> {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (options.apiKey) headers.Authorization = `Bearer ${options.apiKey}`;

  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers,
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
  } catch (err) {
    throw new TransportError(err instanceof Error ? err.message : String(err));
  }

  if (!response.ok) {
    throw new TransportError(`HTTP ${response.status} ${response.statusText} for url: ${url}`);
  }
  return response.json();
}

/**
 * Query Azure infrastructure (VMs, status, metrics, resource groups, ...)
 * in natural language, e.g. "show all vms" or "cpu for web-server".
 */
export async function queryAzure(query: string, options: QueryAzureOptions = {}): Promise<string> {
  const url = options.url ?? DEFAULT_AGENT_URL;
  const payload = {
    model: options.model ?? DEFAULT_MODEL_NAME,
    messages: [{ role: "user", content: query }],
    stream: false,
  };

  try {
    const data = await post(url, payload, options);
    if (!Value.Check(CompletionResponseSchema, data)) {
      throw new Error("Malformed completion response: missing choices[0].message.content");
    }
    return data.choices[0]?.message.content ?? "";
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    if (err instanceof TransportError) return `Error connecting to Azure-Agent: ${reason}`;
    return `Unexpected error: ${reason}`;
  }
}
