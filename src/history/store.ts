import fs from "node:fs/promises";
import path from "node:path";
import writeFileAtomic from "write-file-atomic";
import { StorageError, errorMessage } from "../utils/errors.js";
import { createChildLogger, type Logger } from "../utils/logger.js";
import { classify, extractText, type ClassifiedResponse } from "./classifier.js";
import type { FullResponse, HistoryRecord, JsonValue, StoredRecord } from "./types.js";
import { StoredRecordSchema } from "./types.js";

export const HISTORY_LIMIT = 50;

/** How much of an opaque response is kept as its text_response. */
const OPAQUE_TEXT_BYTES = 1000;

const FILE_MODE = 0o600;

export interface HistoryStoreOptions {
  filePath: string;
  /** Copy the log here after every successful append */
  mirrorDir?: string;
  /** Clock used for record timestamps */
  now?: () => Date;
  logger?: Logger;
}

type ReadResult =
  | { state: "missing" }
  | { state: "corrupt"; reason: string }
  | { state: "unreadable"; reason: string }
  | { state: "ok"; entries: unknown[] };

/**
 * Bounded, newest-first conversation history kept as one JSON array on disk.
 *
 * Every write replaces the whole file through a temp file and a rename, so a
 * reader never sees a half-written log. There is no locking between
 * processes: two concurrent appends can lose one of the records.
 */
export class HistoryStore {
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly options: HistoryStoreOptions) {
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createChildLogger("history-store");
  }

  get filePath(): string {
    return this.options.filePath;
  }

  /**
   * Create the log if it is missing and reset it if it does not parse.
   * A file that exists but cannot be read is left alone.
   */
  async initialize(): Promise<void> {
    const current = await this.read();
    if (current.state === "ok") return;
    if (current.state === "unreadable") {
      this.log.warn({ file: this.filePath, reason: current.reason }, "History file could not be read");
      return;
    }

    if (current.state === "corrupt") {
      this.log.warn(
        { file: this.filePath, reason: current.reason },
        "History file is corrupted, resetting",
      );
    }

    try {
      await this.write([]);
    } catch (err) {
      this.log.warn({ file: this.filePath, err: errorMessage(err) }, "Failed to initialize history file");
    }
  }

  /**
   * Prepend a record for the response and trim the log. Callers that have
   * already classified the response pass the result to avoid a second parse.
   * Returns undefined when the record could not be written; the file is
   * left as it was.
   */
  async append(
    model: string,
    prompt: string,
    rawResponse: string,
    classified?: ClassifiedResponse,
  ): Promise<HistoryRecord | undefined> {
    const current = await this.read();
    let existing: unknown[] = [];
    if (current.state === "ok") {
      existing = current.entries;
    } else if (current.state === "unreadable") {
      this.log.warn(
        { file: this.filePath, reason: current.reason },
        "History file could not be read, skipping update",
      );
      return undefined;
    } else if (current.state === "corrupt") {
      this.log.warn(
        { file: this.filePath, reason: current.reason },
        "History file is corrupted, starting a new log",
      );
    }

    let record: HistoryRecord;
    let entries: unknown[];
    try {
      record = this.buildRecord(model, prompt, classified ?? classify(rawResponse));
      entries = [toStored(record), ...existing].slice(0, HISTORY_LIMIT);
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, "Failed to update conversation history");
      return undefined;
    }

    try {
      await this.write(entries);
    } catch (err) {
      this.log.warn(
        { file: this.filePath, err: errorMessage(err) },
        "Failed to update conversation history",
      );
      return undefined;
    }

    if (this.options.mirrorDir) {
      await this.mirrorTo(this.options.mirrorDir);
    }
    return record;
  }

  async clear(): Promise<void> {
    try {
      await this.write([]);
    } catch (err) {
      throw new StorageError(`Failed to clear ${this.filePath}`, err);
    }
  }

  /** All records, newest first. A missing or unreadable log loads as empty. */
  async load(): Promise<HistoryRecord[]> {
    const current = await this.read();
    if (current.state === "missing") return [];
    if (current.state !== "ok") {
      const message =
        current.state === "corrupt" ? "History file is corrupted" : "History file could not be read";
      this.log.warn({ file: this.filePath, reason: current.reason }, message);
      return [];
    }

    const records: HistoryRecord[] = [];
    current.entries.forEach((entry, index) => {
      const record = fromStored(entry);
      if (record) {
        records.push(record);
      } else {
        this.log.warn({ file: this.filePath, index }, "Skipping malformed history entry");
      }
    });
    return records;
  }

  /** Best-effort copy of the log into another directory. */
  async mirrorTo(dir: string): Promise<void> {
    try {
      await fs.copyFile(this.filePath, path.join(dir, path.basename(this.filePath)));
    } catch (err) {
      this.log.debug({ dir, err: errorMessage(err) }, "History mirror skipped");
    }
  }

  private buildRecord(model: string, prompt: string, classified: ClassifiedResponse): HistoryRecord {
    const timestamp = formatTimestamp(this.now());

    if (classified.kind === "opaque") {
      return {
        timestamp,
        model,
        prompt,
        fullResponse: { kind: "text", text: classified.text },
        textResponse: opaqueText(classified.text),
      };
    }

    return {
      timestamp,
      model,
      prompt,
      fullResponse: { kind: "json", value: classified.value },
      textResponse: extractText(classified.value),
    };
  }

  private async read(): Promise<ReadResult> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return { state: "missing" };
      return { state: "unreadable", reason: errorMessage(err) };
    }

    if (content.trim().length === 0) {
      return { state: "corrupt", reason: "empty file" };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      return { state: "corrupt", reason: errorMessage(err) };
    }
    if (!Array.isArray(parsed)) {
      return { state: "corrupt", reason: "not a JSON array" };
    }
    return { state: "ok", entries: parsed };
  }

  private async write(entries: unknown[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFileAtomic(this.filePath, JSON.stringify(entries, null, 2) + "\n", {
      encoding: "utf-8",
      mode: FILE_MODE,
    });
  }
}

export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/** First 1000 bytes of an opaque body, without NUL characters. */
function opaqueText(text: string): string {
  const head = Buffer.from(text, "utf-8").subarray(0, OPAQUE_TEXT_BYTES).toString("utf-8");
  return head.replace(/\0/g, "");
}

function toStored(record: HistoryRecord): StoredRecord {
  const { fullResponse } = record;
  return {
    timestamp: record.timestamp,
    model: record.model,
    prompt: record.prompt,
    full_response: fullResponse.kind === "json" ? fullResponse.value : fullResponse.text,
    full_response_type: fullResponse.kind,
    text_response: record.textResponse,
  };
}

function fromStored(entry: unknown): HistoryRecord | undefined {
  const result = StoredRecordSchema.safeParse(entry);
  if (!result.success) return undefined;
  const stored = result.data;

  const payload: JsonValue =
    stored.full_response !== undefined ? stored.full_response : (stored.response ?? "");
  const fullResponse = toFullResponse(payload, stored.full_response_type);
  if (!fullResponse) return undefined;

  let textResponse = stored.text_response ?? "";
  if (stored.text_response == null && fullResponse.kind === "json") {
    textResponse = extractText(fullResponse.value);
  }

  return {
    timestamp: stored.timestamp,
    model: stored.model,
    prompt: stored.prompt,
    fullResponse,
    textResponse,
  };
}

function toFullResponse(
  payload: JsonValue,
  kind: FullResponse["kind"] | undefined,
): FullResponse | undefined {
  switch (kind) {
    case "json":
      return { kind: "json", value: payload };
    case "text":
      return typeof payload === "string" ? { kind: "text", text: payload } : undefined;
    case undefined:
      return typeof payload === "string"
        ? { kind: "text", text: payload }
        : { kind: "json", value: payload };
  }
}
