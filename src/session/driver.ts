import type { GenerateContentClient } from "../api/client.js";
import { classify, extractApiError, extractText } from "../history/classifier.js";
import { formatJson } from "../history/json-format.js";
import type { HistoryStore } from "../history/store.js";
import type { JsonValue } from "../history/types.js";
import type { Painter } from "../utils/ansi.js";
import { EmptyResponseError, TransportError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("session");

export interface SessionOutput {
  print(line: string): void;
  printError(line: string): void;
}

export interface SessionDeps {
  client: GenerateContentClient;
  store: HistoryStore;
  output: SessionOutput;
  paint: Painter;
}

/**
 * Run one prompt: call the API, record the exchange, print the answer.
 * Resolves with the process exit code.
 */
export async function runPrompt(deps: SessionDeps, model: string, prompt: string): Promise<number> {
  const { client, store, output, paint } = deps;

  output.print(`${paint("blue", "Using model:")} ${paint("green", model)}`);
  output.print(paint("blue", "Sending request..."));
  output.print("");

  let raw: string;
  try {
    raw = await client.generate(model, prompt);
    if (raw.trim().length === 0) throw new EmptyResponseError();
  } catch (err) {
    if (err instanceof TransportError || err instanceof EmptyResponseError) {
      log.debug({ code: err.code, cause: err.cause }, "Request failed");
      output.printError(paint("red", `Error: ${err.message}`));
      return 1;
    }
    throw err;
  }

  const response = classify(raw);
  // History is best effort: the answer is shown even if this returns undefined
  await store.append(model, prompt, raw, response);

  switch (response.kind) {
    case "error": {
      output.printError(paint("red", "=== API Error Response ==="));
      const summary = summarizeApiError(response.value);
      if (summary) output.printError(summary);
      output.printError(formatJson(response.error, paint));
      return 1;
    }
    case "success": {
      const text = extractText(response.value);
      output.print(text !== "" ? text : "No text response found in API response");
      return 0;
    }
    case "opaque":
      output.print("Invalid JSON response from API");
      return 0;
  }
}

/** `400 INVALID_ARGUMENT: message`, from whichever parts the error carries. */
function summarizeApiError(value: JsonValue): string | undefined {
  const details = extractApiError(value);
  if (!details?.message) return undefined;
  const label = [details.code, details.status].filter((part) => part !== undefined).join(" ");
  return label ? `${label}: ${details.message}` : details.message;
}
