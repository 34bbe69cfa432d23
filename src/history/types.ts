import { z } from "zod";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

/**
 * The stored response payload. Which branch applies is decided once, when
 * the response is classified, and carried with the record from then on.
 */
export type FullResponse =
  | { kind: "json"; value: JsonValue }
  | { kind: "text"; text: string };

export interface HistoryRecord {
  /** UTC, second precision: `2024-05-01T12:00:00Z` */
  timestamp: string;
  model: string;
  prompt: string;
  fullResponse: FullResponse;
  textResponse: string;
}

/**
 * On-disk shape of a record. Files written before `full_response_type`
 * existed, or with the older `response` key, still load.
 */
export const StoredRecordSchema = z.object({
  timestamp: z.string().default(""),
  model: z.string().default(""),
  prompt: z.string().default(""),
  full_response: JsonValueSchema.optional(),
  response: JsonValueSchema.optional(),
  full_response_type: z.enum(["json", "text"]).optional(),
  text_response: z.string().nullable().optional(),
});

export interface StoredRecord {
  timestamp: string;
  model: string;
  prompt: string;
  full_response: JsonValue;
  full_response_type: FullResponse["kind"];
  text_response: string;
}

export interface TokenUsage {
  promptTokens?: number;
  responseTokens?: number;
  totalTokens?: number;
}
