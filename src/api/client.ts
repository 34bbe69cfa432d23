import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { TransportError, errorMessage } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("gemini-api");

/** Sends one prompt and resolves with the raw response body, whatever it is. */
export interface GenerateContentClient {
  generate(model: string, prompt: string): Promise<string>;
}

export interface GeminiClientOptions {
  endpoint: string;
  apiKey: string;
  /** 0 disables the timeout */
  timeoutMs?: number;
  /** Replaces the HTTP transport, used by tests */
  adapter?: AxiosAdapter;
}

export class GeminiClient implements GenerateContentClient {
  private readonly http: AxiosInstance;

  constructor(private readonly opts: GeminiClientOptions) {
    this.http = axios.create({
      baseURL: opts.endpoint.replace(/\/+$/, ""),
      timeout: opts.timeoutMs ?? 0,
      adapter: opts.adapter,
      headers: {
        "Content-Type": "application/json",
        "x-goog-api-key": opts.apiKey,
      },
      // The body is stored verbatim, so keep it as text and let every
      // HTTP status through: error payloads are logged like answers.
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
  }

  async generate(model: string, prompt: string): Promise<string> {
    const body = { contents: [{ parts: [{ text: prompt }] }] };
    const url = `/${encodeURIComponent(model)}:generateContent`;

    try {
      const res = await this.http.post<unknown>(url, body);
      log.debug({ model, status: res.status }, "Response received");
      return typeof res.data === "string" ? res.data : "";
    } catch (err) {
      throw new TransportError(`Failed to make API request: ${errorMessage(err)}`, err);
    }
  }
}
