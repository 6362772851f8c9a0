/**
 * Shape checks for JSON coming back from a native server.
 *
 * These are deliberately shallow: they confirm the fields callers read
 * (choices, usage, data) and let everything else pass through.
 */

import type {
  ChatCompletionChunk,
  ChatCompletionResponse,
  CompletionChunk,
  CompletionResponse,
  EmbeddingResponse,
  ModelListResponse,
  ServerHealthResponse,
  ServerInfoResponse,
  TokenizeResponse,
  UsageInfo,
} from "./types";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasChoiceArray(value: unknown): value is Record<string, unknown> & { choices: unknown[] } {
  return isRecord(value) && Array.isArray(value.choices);
}

export function isCompletionResponse(value: unknown): value is CompletionResponse {
  return hasChoiceArray(value) && value.choices.every((c) => isRecord(c) && typeof c.text === "string");
}

export function isCompletionChunk(value: unknown): value is CompletionChunk {
  return isCompletionResponse(value);
}

export function isChatCompletionResponse(value: unknown): value is ChatCompletionResponse {
  return (
    hasChoiceArray(value) &&
    value.choices.every(
      (c) => isRecord(c) && isRecord(c.message) && typeof c.message.content === "string"
    )
  );
}

export function isChatCompletionChunk(value: unknown): value is ChatCompletionChunk {
  // The final frame of some servers carries only usage and an empty choices array
  return hasChoiceArray(value) && value.choices.every((c) => isRecord(c) && isRecord(c.delta));
}

export function isEmbeddingResponse(value: unknown): value is EmbeddingResponse {
  return (
    isRecord(value) &&
    Array.isArray(value.data) &&
    value.data.every((d) => isRecord(d) && Array.isArray(d.embedding))
  );
}

export function isModelListResponse(value: unknown): value is ModelListResponse {
  return isRecord(value) && Array.isArray(value.data);
}

export function isServerHealthResponse(value: unknown): value is ServerHealthResponse {
  return isRecord(value) && typeof value.status === "string";
}

export function isServerInfoResponse(value: unknown): value is ServerInfoResponse {
  return isRecord(value);
}

export function isTokenizeResponse(value: unknown): value is TokenizeResponse {
  return isRecord(value) && Array.isArray(value.tokens);
}

/**
 * Completion tokens reported by a response, 0 when the server sent no usage.
 */
export function completionTokensOf(value: { usage?: UsageInfo }): number {
  const tokens = value.usage?.completion_tokens;
  return typeof tokens === "number" && Number.isFinite(tokens) ? tokens : 0;
}
