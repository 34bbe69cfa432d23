import type { JsonObject, JsonValue, TokenUsage } from "./types.js";

export type ClassifiedResponse =
  | { kind: "success"; value: JsonValue }
  | { kind: "error"; value: JsonObject; error: JsonValue }
  | { kind: "opaque"; text: string };

export interface ApiErrorDetails {
  code?: number;
  status?: string;
  message?: string;
  /** The whole `error` member as returned by the API */
  raw: JsonValue;
}

/**
 * Classify a raw API response body. Anything that does not parse as JSON
 * is opaque; a JSON object with a truthy `error` member is an API error.
 */
export function classify(raw: string): ClassifiedResponse {
  let value: JsonValue;
  try {
    value = JSON.parse(raw);
  } catch {
    return { kind: "opaque", text: raw };
  }

  if (isObject(value)) {
    const error = value.error;
    if (error !== undefined && error !== null && error !== false) {
      return { kind: "error", value, error };
    }
  }
  return { kind: "success", value };
}

/** `candidates[0].content.parts[0].text`, or "" when any step is missing. */
export function extractText(value: JsonValue): string {
  const candidate = first(member(value, "candidates"));
  const part = first(member(member(candidate, "content"), "parts"));
  const text = member(part, "text");
  return typeof text === "string" ? text : "";
}

/**
 * Token counts from `usageMetadata`. Counts the API did not report are left
 * out rather than zeroed.
 */
export function extractUsage(value: JsonValue): TokenUsage {
  const meta = member(value, "usageMetadata");
  const usage: TokenUsage = {};

  const promptTokens = member(meta, "promptTokenCount");
  if (typeof promptTokens === "number") usage.promptTokens = promptTokens;

  const responseTokens = member(meta, "candidatesTokenCount");
  if (typeof responseTokens === "number") usage.responseTokens = responseTokens;

  const totalTokens = member(meta, "totalTokenCount");
  if (typeof totalTokens === "number") usage.totalTokens = totalTokens;

  return usage;
}

export function extractApiError(value: JsonValue): ApiErrorDetails | undefined {
  const error = member(value, "error");
  if (error === undefined || error === null || error === false) return undefined;

  const details: ApiErrorDetails = { raw: error };
  const code = member(error, "code");
  if (typeof code === "number") details.code = code;
  const status = member(error, "status");
  if (typeof status === "string") details.status = status;
  const message = member(error, "message");
  if (typeof message === "string") details.message = message;
  return details;
}

export function isObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function member(value: JsonValue | undefined, key: string): JsonValue | undefined {
  return isObject(value) && Object.hasOwn(value, key) ? value[key] : undefined;
}

function first(value: JsonValue | undefined): JsonValue | undefined {
  return Array.isArray(value) && value.length > 0 ? value[0] : undefined;
}
