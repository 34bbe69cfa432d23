import { createPainter, type Painter } from "../utils/ansi.js";
import { extractUsage } from "./classifier.js";
import { formatJson } from "./json-format.js";
import type { HistoryRecord, TokenUsage } from "./types.js";

export const EMPTY_HISTORY_MESSAGE = "No conversation history found.";

export interface RenderOptions {
  color?: boolean;
  /** Column at which text responses are wrapped inside their box */
  wrapWidth?: number;
}

/** Placeholders older logs stored in place of an absent text response. */
const TEXT_SENTINELS = new Set(["null", "empty"]);

/** Render the history newest first, one numbered block per record. */
export function renderHistory(records: HistoryRecord[], options: RenderOptions = {}): string {
  if (records.length === 0) return EMPTY_HISTORY_MESSAGE;

  const paint = createPainter(options.color ?? false);
  const width = options.wrapWidth ?? 65;

  const lines = ["", paint("cyan", "=== Conversation History (Newest First) ==="), ""];
  records.forEach((record, i) => {
    lines.push(...renderRecord(record, i + 1, paint, width));
  });
  return lines.join("\n");
}

function renderRecord(record: HistoryRecord, index: number, paint: Painter, width: number): string[] {
  const lines = [
    `${paint("magenta", `[${index}]`)} ${paint("yellow", record.timestamp)} | ${paint("green", record.model)}`,
    paint("blue", "❓ Prompt:"),
    ...indent(record.prompt, paint),
  ];

  if (record.textResponse !== "" && !TEXT_SENTINELS.has(record.textResponse)) {
    lines.push(paint("green", "💬 Text Response:"), ...box(record.textResponse, width, paint));
  }

  lines.push(paint("blue", "🔧 Full API Response:"));
  const { fullResponse } = record;
  switch (fullResponse.kind) {
    case "json": {
      lines.push(formatJson(fullResponse.value, paint));
      const usage = formatUsage(extractUsage(fullResponse.value));
      if (usage) lines.push(`${paint("yellow", "📊 Token Usage:")} ${usage}`);
      break;
    }
    case "text":
      lines.push(...indent(fullResponse.text, paint));
      break;
  }

  lines.push(paint("dim", "─".repeat(width + 4)), "");
  return lines;
}

/** Shown only when the prompt count is known; other counts appear if present. */
export function formatUsage(usage: TokenUsage): string | undefined {
  if (usage.promptTokens === undefined) return undefined;
  const parts = [`Prompt: ${usage.promptTokens}`];
  if (usage.responseTokens !== undefined) parts.push(`Response: ${usage.responseTokens}`);
  if (usage.totalTokens !== undefined) parts.push(`Total: ${usage.totalTokens}`);
  return parts.join(" | ");
}

/**
 * Word-wrap each line at `width`, breaking after the last space that fits
 * and splitting words longer than the width.
 */
export function wrapText(text: string, columns: number): string[] {
  const width = Math.max(1, columns);
  const out: string[] = [];
  for (const source of text.split("\n")) {
    let line = source;
    while (line.length > width) {
      const cut = line.slice(0, width).lastIndexOf(" ");
      if (cut > 0) {
        out.push(line.slice(0, cut));
        line = line.slice(cut + 1);
      } else {
        // never split a surrogate pair
        const end = width > 1 && isHighSurrogate(line.charCodeAt(width - 1)) ? width - 1 : width;
        out.push(line.slice(0, end));
        line = line.slice(end);
      }
    }
    out.push(line);
  }
  return out;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function box(text: string, width: number, paint: Painter): string[] {
  const rule = "─".repeat(width + 2);
  return [
    paint("bright", `┌${rule}┐`),
    ...wrapText(text, width).map(
      (line) => `${paint("bright", "│")} ${line.padEnd(width)} ${paint("bright", "│")}`,
    ),
    paint("bright", `└${rule}┘`),
  ];
}

function indent(text: string, paint: Painter): string[] {
  return text.split("\n").map((line) => `   ${paint("plain", line)}`);
}
