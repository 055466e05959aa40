/**
 * Chat Completions — Request Schema
 *
 * The subset of the OpenAI Chat Completions request the agent reads.
 * Unknown fields (temperature, max_tokens, ...) are accepted and ignored.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { RequestValidationError } from "../errors.js";

const TextPartSchema = Type.Object({
  type: Type.String(),
  text: Type.Optional(Type.String()),
});

export const ChatMessageSchema = Type.Object({
  role: Type.String(),
  content: Type.Union([Type.String(), Type.Array(TextPartSchema), Type.Null()]),
});

export const ChatCompletionRequestSchema = Type.Object({
  model: Type.String(),
  messages: Type.Array(ChatMessageSchema),
  stream: Type.Optional(Type.Boolean()),
});

export type ChatMessage = Static<typeof ChatMessageSchema>;
export type ChatCompletionRequest = Static<typeof ChatCompletionRequestSchema>;

export function parseChatCompletionRequest(body: unknown): ChatCompletionRequest {
  if (Value.Check(ChatCompletionRequestSchema, body)) return body;
  const first = Value.Errors(ChatCompletionRequestSchema, body).First();
  const path = first?.path ? first.path.replace(/^\//, "").replace(/\//g, ".") : "body";
  throw new RequestValidationError(`Invalid request at ${path}: ${first?.message ?? "unexpected shape"}`);
}

/** Text of a message; array content has its text parts joined by newlines. */
export function messageText(message: ChatMessage): string {
  if (typeof message.content === "string") return message.content;
  if (message.content === null) return "";
  return message.content
    .filter((part) => part.type === "text" && typeof part.text === "string")
    .map((part) => part.text)
    .join("\n");
}

/** Text of the last user message, or null when there is none with content. */
export function lastUserMessage(request: ChatCompletionRequest): string | null {
  for (let i = request.messages.length - 1; i >= 0; i--) {
    const message = request.messages[i];
    if (message?.role !== "user") continue;
    const text = messageText(message);
    return text.trim() ? text : null;
  }
  return null;
}
